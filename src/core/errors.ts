export type ErrorCategory = 'resolution' | 'navigator' | 'dispatch' | 'transport' | 'config'

export type NavigatorErrorCode =
    | 'NotFound'
    | 'NotADirectory'
    | 'AlreadyExists'
    | 'PermissionDenied'
    | 'Forbidden'
    | 'InvalidArguments'

export type DispatchErrorCode = 'UnknownCommand' | 'ExecutionFailed' | 'Timeout' | 'Blocked'

export class ShellcastError extends Error {
    readonly category: ErrorCategory
    readonly code: string

    constructor(message: string, category: ErrorCategory, code: string, options?: ErrorOptions) {
        super(message, options)
        this.name = 'ShellcastError'
        this.category = category
        this.code = code
    }
}

export class ResolutionError extends ShellcastError {
    declare readonly code: 'UnrecognizedIntent'
    readonly input: string
    readonly suggestions: string[]

    constructor(message: string, input: string, suggestions: string[] = []) {
        super(message, 'resolution', 'UnrecognizedIntent')
        this.name = 'ResolutionError'
        this.input = input
        this.suggestions = suggestions
    }
}

export interface NavigatorErrorOptions extends ErrorOptions {
    /** Set when an earlier operand already moved or removed the working directory. */
    newDirectory?: string
}

export class NavigatorError extends ShellcastError {
    declare readonly code: NavigatorErrorCode
    readonly newDirectory?: string

    constructor(code: NavigatorErrorCode, message: string, options?: NavigatorErrorOptions) {
        super(message, 'navigator', code, options)
        this.name = 'NavigatorError'
        this.newDirectory = options?.newDirectory
    }
}

export class DispatchError extends ShellcastError {
    declare readonly code: DispatchErrorCode

    constructor(code: DispatchErrorCode, message: string, options?: ErrorOptions) {
        super(message, 'dispatch', code, options)
        this.name = 'DispatchError'
    }
}

export class TransportError extends ShellcastError {
    declare readonly code: 'ChannelClosed'

    constructor(message: string, options?: ErrorOptions) {
        super(message, 'transport', 'ChannelClosed', options)
        this.name = 'TransportError'
    }
}

export class ConfigError extends ShellcastError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'config', 'InvalidConfig', options)
        this.name = 'ConfigError'
    }
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message
    return String(error)
}

/** Node system errors carry an errno string in `code` (ENOENT, EACCES, ...). */
export function errnoCode(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error) {
        const { code } = error
        if (typeof code === 'string') return code
    }
    return undefined
}

const ERRNO_REASONS: Record<string, { code: NavigatorErrorCode; reason: string }> = {
    ENOENT: { code: 'NotFound', reason: 'No such file or directory' },
    ENOTDIR: { code: 'NotADirectory', reason: 'Not a directory' },
    EISDIR: { code: 'InvalidArguments', reason: 'Is a directory' },
    EEXIST: { code: 'AlreadyExists', reason: 'File exists' },
    ENOTEMPTY: { code: 'InvalidArguments', reason: 'Directory not empty' },
    EACCES: { code: 'PermissionDenied', reason: 'Permission denied' },
    EPERM: { code: 'PermissionDenied', reason: 'Operation not permitted' },
}

/**
 * Converts a thrown file system error into a NavigatorError whose message
 * reads like the coreutils diagnostic: `<command>: <subject>: <reason>`.
 */
export function toNavigatorError(error: unknown, command: string, subject: string): NavigatorError {
    const errno = errnoCode(error)
    const known = errno ? ERRNO_REASONS[errno] : undefined
    if (known) {
        return new NavigatorError(known.code, `${command}: ${subject}: ${known.reason}`, { cause: error })
    }
    return new NavigatorError('InvalidArguments', `${command}: ${subject}: ${errorMessage(error)}`, { cause: error })
}
