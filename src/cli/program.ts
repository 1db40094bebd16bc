import { Command, InvalidArgumentError } from 'commander'
import { loadConfig } from '../config/loader.js'
import type { Config } from '../config/schema.js'
import { type Container, createContainer } from '../core/container.js'
import { errorMessage } from '../core/errors.js'
import { NodeFileSystem } from '../core/fs.js'
import { VERSION, formatError, formatStartup } from './ui.js'

export interface ServeOptions {
    port?: number
    host?: string
    root?: string
    sandbox?: string
    historyLimit?: number
    passthrough: boolean
    debug?: boolean
}

function parseInteger(min: number, max: number) {
    return (value: string): number => {
        const parsed = Number(value)
        if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
            throw new InvalidArgumentError(`Expected an integer between ${min} and ${max}.`)
        }
        return parsed
    }
}

/** CLI flags as a config layer; only flags the user actually passed are set. */
export function cliFlagsFrom(options: ServeOptions): Partial<Config> {
    return {
        port: options.port,
        host: options.host,
        rootDirectory: options.root,
        sandboxRoot: options.sandbox,
        historyLimit: options.historyLimit,
        passthrough: options.passthrough ? undefined : false,
        logLevel: options.debug ? 'debug' : undefined,
    }
}

function installShutdown(container: Container): void {
    let stopping = false
    const stop = (signal: NodeJS.Signals) => {
        if (stopping) return
        stopping = true
        container.logger.info({ signal }, 'shutting down')
        container.logger.info(container.stats.formatStatus())
        container
            .shutdown()
            .then(() => process.exit(0))
            .catch((error: unknown) => {
                console.error(formatError(errorMessage(error)))
                process.exit(1)
            })
    }
    process.once('SIGINT', stop)
    process.once('SIGTERM', stop)
}

export function createProgram(): Command {
    const program = new Command()

    program
        .name('shellcast')
        .description('Multi-tab command shell served to the browser over WebSocket')
        .version(VERSION)
        .option('--port <n>', 'Port for HTTP and WebSocket', parseInteger(0, 65535))
        .option('--host <addr>', 'Bind address')
        .option('--root <dir>', 'Initial directory for new tabs')
        .option('--sandbox <dir>', 'Keep writes and cd inside this directory')
        .option('--history-limit <n>', 'Commands kept per tab', parseInteger(1, 1_000_000))
        .option('--no-passthrough', 'Only run built-in commands')
        .option('--debug', 'Enable debug logging')
        .action(async (options: ServeOptions) => {
            try {
                const config = await loadConfig({ fs: new NodeFileSystem(), cliFlags: cliFlagsFrom(options) })
                const container = createContainer(config)
                installShutdown(container)

                const address = await container.initialize()
                console.log(
                    formatStartup({
                        host: config.host,
                        port: address.port,
                        rootDirectory: config.rootDirectory,
                        sandboxRoot: config.sandboxRoot,
                        passthrough: config.passthrough,
                    })
                )
            } catch (error) {
                console.error(formatError(errorMessage(error)))
                process.exit(1)
            }
        })

    return program
}
