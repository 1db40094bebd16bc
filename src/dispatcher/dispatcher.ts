import { DispatchError, NavigatorError, type ShellcastError, errorMessage } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import { KeyedLock } from '../core/lock.js'
import { err, ok, type Result } from '../core/result.js'
import type { OutputEvent, OutputKind, ResolvedCommand } from '../core/types.js'
import type { Logger } from '../logger/index.js'
import { type ProcessExecutor, combineOutput, findBlocked } from '../process/executor.js'
import type { CommandResolver } from '../resolver/resolver.js'
import { closestMatches } from '../resolver/similarity.js'
import type { Session, SessionStore } from '../session/store.js'
import type { CommandOutcome, CommandRegistry, CommandServices } from './registry.js'

export interface DispatcherOptions {
    /** Route names missing from the registry to the process executor. */
    passthrough: boolean
    blockedCommands: readonly string[]
}

export interface DispatcherDeps {
    store: SessionStore
    resolver: CommandResolver
    registry: CommandRegistry
    services: CommandServices
    executor: ProcessExecutor
    eventBus: TypedEventEmitter
    logger: Logger
}

function outputEvent(tabId: string, output: string, kind: OutputKind): OutputEvent {
    return { type: 'output', tabId, output, kind }
}

/**
 * Runs one line of input for a session. Lines for the same session run one
 * at a time in arrival order, so each sees the directory the previous one
 * left behind; different sessions never wait on each other.
 *
 * Sessions are opened by the transport. A line whose session was removed
 * while it waited in the queue is dropped, and a released session is not
 * renewed by running its queued lines.
 */
export class CommandDispatcher {
    private lock = new KeyedLock()

    constructor(
        private deps: DispatcherDeps,
        private options: DispatcherOptions
    ) {}

    handle(sessionId: string, raw: string): Promise<OutputEvent[]> {
        return this.lock.run(sessionId, () => this.execute(sessionId, raw))
    }

    private async execute(sessionId: string, raw: string): Promise<OutputEvent[]> {
        const { store, resolver, eventBus, logger } = this.deps
        const session = store.get(sessionId)
        if (!session) {
            logger.debug({ sessionId }, 'dropped input for a closed session')
            return []
        }

        const resolution = resolver.resolve(raw)
        if (!resolution.ok) {
            return [outputEvent(sessionId, resolution.error.message, 'error')]
        }
        if (resolution.value.kind === 'noop') return []

        const { command } = resolution.value
        const input = raw.trim()
        const cwd = session.currentDirectory
        const started = Date.now()
        eventBus.emit('command:start', { sessionId, name: command.name })

        let result: Result<CommandOutcome, ShellcastError>
        try {
            result = await this.run(command, session)
        } catch (error) {
            const message = `${command.name}: ${errorMessage(error)}`
            result = err(new DispatchError('ExecutionFailed', message, { cause: error }))
        }

        const events: OutputEvent[] = []
        let newDirectory: string | undefined
        if (result.ok) {
            const kind = result.value.kind ?? 'result'
            events.push(outputEvent(sessionId, result.value.output, kind))
            newDirectory = result.value.newDirectory
            store.recordTranscript(sessionId, input, result.value.output, kind)
        } else {
            const { error } = result
            logger.debug({ sessionId, command: command.name, code: error.code }, 'command failed')
            if (error instanceof DispatchError && error.code === 'Timeout') {
                logger.warn({ sessionId, command: command.name }, 'command timed out')
            }
            events.push(outputEvent(sessionId, error.message, 'error'))
            if (error instanceof NavigatorError) newDirectory = error.newDirectory
            store.recordTranscript(sessionId, input, error.message, 'error')
        }

        store.appendHistory(sessionId, input)
        if (newDirectory !== undefined && newDirectory !== cwd && store.has(sessionId)) {
            store.updateDirectory(sessionId, newDirectory)
            events.push({ type: 'directory_change', tabId: sessionId, directory: newDirectory })
        }

        eventBus.emit('command:complete', {
            sessionId,
            name: command.name,
            duration: Date.now() - started,
            success: result.ok,
        })
        return events
    }

    private async run(command: ResolvedCommand, session: Session): Promise<Result<CommandOutcome, ShellcastError>> {
        const { registry, services, store } = this.deps
        const spec = registry.get(command.name)
        if (spec) {
            return spec.handler({
                sessionId: session.id,
                cwd: session.currentDirectory,
                args: command.args,
                history: store.getHistory(session.id),
                services,
                registry,
            })
        }

        if (!this.options.passthrough) return err(this.unknownCommand(command.name))

        const commandLine = [command.name, ...command.args].join(' ')
        if (findBlocked(commandLine, this.options.blockedCommands) !== undefined) {
            return err(new DispatchError('Blocked', `Potentially dangerous command '${commandLine}' blocked for safety reasons.`))
        }

        const executed = await this.deps.executor.execute(command.name, command.args, session.currentDirectory)
        if (!executed.ok) {
            if (executed.error.code === 'UnknownCommand') return err(this.unknownCommand(command.name, executed.error))
            return executed
        }

        const { exitCode } = executed.value
        const output = combineOutput(executed.value)
        if (exitCode !== 0) {
            return err(new DispatchError('ExecutionFailed', output || `${command.name}: exited with code ${exitCode}`))
        }
        return ok({ output: output || '(no output)' })
    }

    private unknownCommand(name: string, cause?: Error): DispatchError {
        const suggestions = closestMatches(name.toLowerCase(), this.deps.registry.names())
        const hint = suggestions.length > 0 ? ` Did you mean: ${suggestions.join(', ')}?` : ''
        return new DispatchError('UnknownCommand', `Command '${name}' not found.${hint}`, { cause })
    }
}
