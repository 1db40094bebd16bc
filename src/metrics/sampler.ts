import { errorMessage } from '../core/errors.js'
import { EMPTY_SNAPSHOT, type MetricsSnapshot } from '../core/types.js'
import type { Logger } from '../logger/index.js'
import type { HostProbe } from './probe.js'

export type SnapshotListener = (snapshot: MetricsSnapshot) => void

export interface MetricsSamplerOptions {
    intervalMs: number
}

/**
 * Polls the host probe on a fixed period. Ticks never overlap: a tick that
 * fires while the previous read is still running is skipped. A failed read
 * republishes the last good snapshot with a fresh timestamp.
 */
export class MetricsSampler {
    private snapshot: MetricsSnapshot = { ...EMPTY_SNAPSHOT }
    private timer?: ReturnType<typeof setInterval>
    private inFlight = false
    private listeners = new Set<SnapshotListener>()

    constructor(
        private probe: HostProbe,
        private logger: Logger,
        private options: MetricsSamplerOptions,
        private now: () => number = Date.now
    ) {}

    onSample(listener: SnapshotListener): () => void {
        this.listeners.add(listener)
        return () => this.listeners.delete(listener)
    }

    latest(): MetricsSnapshot {
        return this.snapshot
    }

    get running(): boolean {
        return this.timer !== undefined
    }

    start(): void {
        if (this.running) return
        this.tick()
        this.timer = setInterval(() => this.tick(), this.options.intervalMs)
        this.timer.unref()
    }

    stop(): void {
        if (!this.timer) return
        clearInterval(this.timer)
        this.timer = undefined
    }

    /** Reads the host once and publishes the result to every listener. */
    async sample(): Promise<MetricsSnapshot> {
        try {
            const [cpu, memory, processCount] = await Promise.all([
                this.probe.readCpu(),
                this.probe.readMemory(),
                this.probe.countProcesses(),
            ])
            this.snapshot = {
                cpuPercent: cpu.percent,
                memoryPercent: memory.percent,
                processCount,
                cores: cpu.cores,
                perCore: cpu.perCore,
                memoryTotal: memory.total,
                memoryUsed: memory.used,
                timestamp: this.now(),
            }
        } catch (error) {
            this.logger.warn({ error: errorMessage(error) }, 'metrics read failed, reusing last snapshot')
            this.snapshot = { ...this.snapshot, timestamp: this.now() }
        }
        this.publish(this.snapshot)
        return this.snapshot
    }

    private tick(): void {
        if (this.inFlight) {
            this.logger.debug('metrics tick skipped, previous read still running')
            return
        }
        this.inFlight = true
        this.sample()
            .catch((error: unknown) => this.logger.error({ error: errorMessage(error) }, 'metrics tick failed'))
            .finally(() => {
                this.inFlight = false
            })
    }

    private publish(snapshot: MetricsSnapshot): void {
        for (const listener of [...this.listeners]) {
            try {
                listener(snapshot)
            } catch (error) {
                this.logger.warn({ error: errorMessage(error) }, 'metrics listener failed')
            }
        }
    }
}
