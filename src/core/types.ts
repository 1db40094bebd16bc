export interface ResolvedCommand {
    name: string
    args: string[]
    isNaturalLanguage: boolean
}

export interface MetricsSnapshot {
    cpuPercent: number
    memoryPercent: number
    processCount: number
    cores: number
    perCore: number[]
    memoryTotal: number
    memoryUsed: number
    timestamp: number
}

export type OutputKind = 'result' | 'error' | 'clear'

export type OutputEvent =
    | { type: 'output'; tabId: string; output: string; kind: OutputKind }
    | { type: 'directory_change'; tabId: string; directory: string }

export interface TranscriptEntry {
    sessionId: string
    command: string
    output: string
    kind: OutputKind
    at: number
}

export const EMPTY_SNAPSHOT: Readonly<MetricsSnapshot> = {
    cpuPercent: 0,
    memoryPercent: 0,
    processCount: 0,
    cores: 0,
    perCore: [],
    memoryTotal: 0,
    memoryUsed: 0,
    timestamp: 0,
}
