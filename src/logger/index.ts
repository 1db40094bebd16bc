import { type Logger as PinoLogger, pino } from 'pino'
import type { ResolvedConfig } from '../config/schema.js'

export type Logger = PinoLogger

export function createLogger(config: Pick<ResolvedConfig, 'logLevel'>): Logger {
    const verbose = config.logLevel === 'debug' || config.logLevel === 'trace'
    return pino({
        name: 'shellcast',
        level: config.logLevel,
        transport: verbose ? { target: 'pino-pretty', options: { colorize: true } } : undefined,
    })
}

export function createSilentLogger(): Logger {
    return pino({ level: 'silent' })
}
