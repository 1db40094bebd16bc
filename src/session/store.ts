import type { SessionRemovalReason, TypedEventEmitter } from '../core/events.js'
import type { OutputKind, TranscriptEntry } from '../core/types.js'
import type { Logger } from '../logger/index.js'

export interface Session {
    readonly id: string
    readonly currentDirectory: string
    readonly history: readonly string[]
    readonly createdAt: number
}

interface SessionRecord {
    id: string
    currentDirectory: string
    history: string[]
    transcript: TranscriptEntry[]
    createdAt: number
}

export interface SessionStoreOptions {
    rootDirectory: string
    historyLimit: number
    dedupeHistory: boolean
    transcriptLimit: number
    /** Liveness window after `release`; 0 removes immediately. */
    ttlMs: number
}

function pushBounded<T>(list: T[], item: T, limit: number): void {
    list.push(item)
    if (list.length > limit) list.splice(0, list.length - limit)
}

/**
 * Owns every live session record. All mutation goes through the methods
 * here; callers only ever see read-only views.
 */
export class SessionStore {
    private sessions = new Map<string, SessionRecord>()
    private expiry = new Map<string, ReturnType<typeof setTimeout>>()

    constructor(
        private options: SessionStoreOptions,
        private eventBus: TypedEventEmitter,
        private logger: Logger,
        private now: () => number = Date.now
    ) {}

    getOrCreate(sessionId: string): Session {
        if (this.isReleased(sessionId)) {
            this.logger.debug({ sessionId }, 'session resumed')
            this.cancelExpiry(sessionId)
        }
        const existing = this.sessions.get(sessionId)
        if (existing) return existing

        const record: SessionRecord = {
            id: sessionId,
            currentDirectory: this.options.rootDirectory,
            history: [],
            transcript: [],
            createdAt: this.now(),
        }
        this.sessions.set(sessionId, record)
        this.logger.debug({ sessionId }, 'session created')
        this.eventBus.emit('session:created', { sessionId })
        return record
    }

    get(sessionId: string): Session | undefined {
        return this.sessions.get(sessionId)
    }

    has(sessionId: string): boolean {
        return this.sessions.has(sessionId)
    }

    appendHistory(sessionId: string, rawCommand: string): void {
        const record = this.sessions.get(sessionId)
        if (!record) return
        if (this.options.dedupeHistory && record.history[record.history.length - 1] === rawCommand) return
        pushBounded(record.history, rawCommand, this.options.historyLimit)
    }

    getHistory(sessionId: string): string[] {
        return [...(this.sessions.get(sessionId)?.history ?? [])]
    }

    updateDirectory(sessionId: string, newDirectory: string): void {
        const record = this.sessions.get(sessionId)
        if (record) record.currentDirectory = newDirectory
    }

    recordTranscript(sessionId: string, command: string, output: string, kind: OutputKind): void {
        const record = this.sessions.get(sessionId)
        if (!record) return
        pushBounded(record.transcript, { sessionId, command, output, kind, at: this.now() }, this.options.transcriptLimit)
    }

    /** One session's transcript, or every live session's merged by time. */
    getTranscript(sessionId?: string): TranscriptEntry[] {
        if (sessionId !== undefined) return [...(this.sessions.get(sessionId)?.transcript ?? [])]
        const all: TranscriptEntry[] = []
        for (const record of this.sessions.values()) all.push(...record.transcript)
        return all.sort((a, b) => a.at - b.at)
    }

    /** Starts the liveness window; `getOrCreate` before it ends keeps the session. */
    release(sessionId: string): void {
        if (!this.sessions.has(sessionId)) return
        if (this.options.ttlMs === 0) {
            this.remove(sessionId, 'expired')
            return
        }
        this.cancelExpiry(sessionId)
        const timer = setTimeout(() => {
            this.expiry.delete(sessionId)
            this.remove(sessionId, 'expired')
        }, this.options.ttlMs)
        timer.unref()
        this.expiry.set(sessionId, timer)
    }

    isReleased(sessionId: string): boolean {
        return this.expiry.has(sessionId)
    }

    remove(sessionId: string, reason: SessionRemovalReason = 'closed'): boolean {
        this.cancelExpiry(sessionId)
        if (!this.sessions.delete(sessionId)) return false
        this.logger.debug({ sessionId, reason }, 'session removed')
        this.eventBus.emit('session:removed', { sessionId, reason })
        return true
    }

    get size(): number {
        return this.sessions.size
    }

    dispose(): void {
        for (const timer of this.expiry.values()) clearTimeout(timer)
        this.expiry.clear()
    }

    private cancelExpiry(sessionId: string): void {
        const timer = this.expiry.get(sessionId)
        if (timer === undefined) return
        clearTimeout(timer)
        this.expiry.delete(sessionId)
    }
}
