import type { AddressInfo } from 'node:net'
import type { ResolvedConfig } from '../config/schema.js'
import { Autocompleter } from '../dispatcher/autocomplete.js'
import { CommandDispatcher } from '../dispatcher/dispatcher.js'
import { BUILTIN_COMMANDS, CommandRegistry } from '../dispatcher/registry.js'
import { BroadcastHub } from '../hub/broadcast-hub.js'
import type { Logger } from '../logger/index.js'
import { createLogger } from '../logger/index.js'
import { CommandStats } from '../metrics/collector.js'
import { type HostProbe, OsHostProbe } from '../metrics/probe.js'
import { MetricsSampler } from '../metrics/sampler.js'
import { Navigator } from '../navigator/navigator.js'
import { ExecaProcessExecutor, type ProcessExecutor } from '../process/executor.js'
import { CommandResolver } from '../resolver/resolver.js'
import { ShellGateway } from '../server/gateway.js'
import { ShellServer } from '../server/http.js'
import { SessionStore } from '../session/store.js'
import { errorMessage } from './errors.js'
import { TypedEventEmitter } from './events.js'
import { type FileSystem, NodeFileSystem } from './fs.js'

export interface Container {
    config: ResolvedConfig
    logger: Logger
    eventBus: TypedEventEmitter
    fs: FileSystem
    store: SessionStore
    resolver: CommandResolver
    navigator: Navigator
    registry: CommandRegistry
    dispatcher: CommandDispatcher
    autocompleter: Autocompleter
    sampler: MetricsSampler
    stats: CommandStats
    hub: BroadcastHub
    gateway: ShellGateway
    server: ShellServer
    /** Starts the sampler and the server; resolves with the bound address. */
    initialize(): Promise<AddressInfo>
    shutdown(): Promise<void>
}

/** Replaceable host collaborators, for running the engine without touching the machine. */
export interface ContainerOverrides {
    logger?: Logger
    fs?: FileSystem
    probe?: HostProbe
    executor?: ProcessExecutor
}

export function createContainer(config: ResolvedConfig, overrides: ContainerOverrides = {}): Container {
    const logger = overrides.logger ?? createLogger(config)
    const eventBus = new TypedEventEmitter((event, error) =>
        logger.warn({ event, error: errorMessage(error) }, 'event listener failed')
    )
    const fs = overrides.fs ?? new NodeFileSystem()
    const probe = overrides.probe ?? new OsHostProbe()
    const executor = overrides.executor ?? new ExecaProcessExecutor({ timeoutMs: config.commandTimeoutMs })

    const store = new SessionStore(
        {
            rootDirectory: config.rootDirectory,
            historyLimit: config.historyLimit,
            dedupeHistory: config.dedupeHistory,
            transcriptLimit: config.transcriptLimit,
            ttlMs: config.sessionTtlMs,
        },
        eventBus,
        logger
    )
    const stats = new CommandStats(eventBus)
    const registry = new CommandRegistry(BUILTIN_COMMANDS)
    const resolver = new CommandResolver({ marker: config.nlMarker })
    const navigator = new Navigator(fs, { home: config.rootDirectory, sandboxRoot: config.sandboxRoot })
    const sampler = new MetricsSampler(probe, logger, { intervalMs: config.metricsIntervalMs })
    const dispatcher = new CommandDispatcher(
        {
            store,
            resolver,
            registry,
            services: {
                navigator,
                metrics: sampler,
                probe,
                shorthand: { marker: config.nlMarker, examples: resolver.examples },
            },
            executor,
            eventBus,
            logger,
        },
        { passthrough: config.passthrough, blockedCommands: config.blockedCommands }
    )
    const autocompleter = new Autocompleter(registry, navigator)
    const hub = new BroadcastHub(store, eventBus, logger)
    const gateway = new ShellGateway({ dispatcher, autocompleter, store, hub, sampler, logger })
    const server = new ShellServer({ gateway, store, hub, sampler, stats, logger, startedAt: Date.now() })

    let unsubscribeMetrics: (() => void) | undefined

    const container: Container = {
        config,
        logger,
        eventBus,
        fs,
        store,
        resolver,
        navigator,
        registry,
        dispatcher,
        autocompleter,
        sampler,
        stats,
        hub,
        gateway,
        server,

        async initialize() {
            unsubscribeMetrics = sampler.onSample((snapshot) => hub.broadcastMetrics(snapshot))
            sampler.start()
            return server.listen(config.port, config.host)
        },

        async shutdown() {
            const errors: Error[] = []
            try {
                sampler.stop()
                unsubscribeMetrics?.()
            } catch (e) {
                errors.push(e instanceof Error ? e : new Error(String(e)))
            }
            try {
                await server.close()
            } catch (e) {
                errors.push(e instanceof Error ? e : new Error(String(e)))
            }
            try {
                store.dispose()
                stats.dispose()
                eventBus.removeAll()
            } catch (e) {
                errors.push(e instanceof Error ? e : new Error(String(e)))
            }
            if (errors.length > 0) {
                logger.warn({ errors: errors.map((e) => e.message) }, 'Errors during shutdown')
            }
        },
    }

    return container
}
