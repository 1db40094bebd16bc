import { z } from 'zod'

export const LOG_LEVELS = ['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

export const ConfigSchema = z
    .object({
        host: z.string().min(1).optional(),
        port: z.number().int().min(0).max(65535).optional(),
        rootDirectory: z.string().min(1).optional(),
        sandboxRoot: z.string().min(1).optional(),
        historyLimit: z.number().int().positive().optional(),
        dedupeHistory: z.boolean().optional(),
        transcriptLimit: z.number().int().positive().optional(),
        metricsIntervalMs: z.number().int().positive().optional(),
        commandTimeoutMs: z.number().int().nonnegative().optional(),
        sessionTtlMs: z.number().int().nonnegative().optional(),
        passthrough: z.boolean().optional(),
        blockedCommands: z.array(z.string().min(1)).optional(),
        nlMarker: z.string().length(1).optional(),
        logLevel: z.enum(LOG_LEVELS).optional(),
    })
    .strict()

export type Config = z.infer<typeof ConfigSchema>

export interface ResolvedConfig {
    host: string
    port: number
    rootDirectory: string
    sandboxRoot?: string
    historyLimit: number
    dedupeHistory: boolean
    transcriptLimit: number
    metricsIntervalMs: number
    commandTimeoutMs: number
    sessionTtlMs: number
    passthrough: boolean
    blockedCommands: string[]
    nlMarker: string
    logLevel: LogLevel
}
