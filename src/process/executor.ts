import { ExecaError, execa } from 'execa'
import { DispatchError } from '../core/errors.js'
import { err, ok, type Result } from '../core/result.js'

export interface ProcessResult {
    stdout: string
    stderr: string
    exitCode: number
}

/**
 * Runs one host program. Arguments arrive already tokenized and are never
 * handed to a shell. A spawn failure for a missing program is
 * `UnknownCommand`; exceeding the time limit is `Timeout`. A program that
 * ran and exited non-zero is still `ok`: its exit code is part of the result.
 */
export interface ProcessExecutor {
    execute(name: string, args: readonly string[], cwd: string): Promise<Result<ProcessResult, DispatchError>>
}

export interface ExecaProcessExecutorOptions {
    /** 0 disables the limit. */
    timeoutMs: number
}

function asText(value: unknown): string {
    if (typeof value === 'string') return value
    if (Array.isArray(value)) return value.map(String).join('\n')
    return ''
}

export class ExecaProcessExecutor implements ProcessExecutor {
    constructor(private options: ExecaProcessExecutorOptions) {}

    async execute(name: string, args: readonly string[], cwd: string): Promise<Result<ProcessResult, DispatchError>> {
        try {
            const { stdout, stderr, exitCode } = await execa(name, args, {
                cwd,
                timeout: this.options.timeoutMs > 0 ? this.options.timeoutMs : undefined,
                stdin: 'ignore',
            })
            return ok({ stdout, stderr, exitCode: exitCode ?? 0 })
        } catch (error) {
            if (!(error instanceof ExecaError)) throw error

            if (error.timedOut) {
                const seconds = this.options.timeoutMs / 1000
                return err(new DispatchError('Timeout', `Command timed out after ${seconds} seconds`, { cause: error }))
            }
            if (error.code === 'ENOENT' && error.exitCode === undefined) {
                return err(new DispatchError('UnknownCommand', `Command '${name}' not found.`, { cause: error }))
            }
            if (error.exitCode === undefined) {
                return err(
                    new DispatchError('ExecutionFailed', `${name}: ${error.originalMessage || error.shortMessage}`, {
                        cause: error,
                    })
                )
            }
            return ok({ stdout: asText(error.stdout), stderr: asText(error.stderr), exitCode: error.exitCode })
        }
    }
}

/** stdout and stderr, trailing newlines trimmed, empty streams omitted. */
export function combineOutput(result: Pick<ProcessResult, 'stdout' | 'stderr'>): string {
    return [result.stdout, result.stderr]
        .map((stream) => stream.replace(/\n+$/, ''))
        .filter(Boolean)
        .join('\n')
}

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/** First blocked phrase occurring in `raw` as whole words, case-insensitively. */
export function findBlocked(raw: string, blocked: readonly string[]): string | undefined {
    const normalized = raw.trim().replace(/\s+/g, ' ')
    return blocked.find((phrase) => new RegExp(`(?:^|\\s)${escapeRegExp(phrase)}(?:\\s|$)`, 'i').test(normalized))
}
