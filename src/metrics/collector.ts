import type { EventMap, TypedEventEmitter } from '../core/events.js'

interface CommandMetrics {
    invocations: number
    errors: number
    totalDuration: number
}

export interface StatsReport {
    sessions: { live: number; peak: number; created: number }
    commands: Record<string, CommandMetrics & { averageDuration: number }>
}

export class CommandStats {
    private commands = new Map<string, CommandMetrics>()
    private sessions = { live: 0, peak: 0, created: 0 }
    private cleanups: Array<() => void> = []

    constructor(eventBus: TypedEventEmitter) {
        const onComplete = ({ name, duration, success }: EventMap['command:complete']) => {
            const m = this.ensureCommand(name)
            m.invocations++
            m.totalDuration += duration
            if (!success) m.errors++
        }
        eventBus.on('command:complete', onComplete)
        this.cleanups.push(() => eventBus.off('command:complete', onComplete))

        const onCreated = () => {
            this.sessions.created++
            this.sessions.live++
            this.sessions.peak = Math.max(this.sessions.peak, this.sessions.live)
        }
        eventBus.on('session:created', onCreated)
        this.cleanups.push(() => eventBus.off('session:created', onCreated))

        const onRemoved = () => {
            this.sessions.live = Math.max(0, this.sessions.live - 1)
        }
        eventBus.on('session:removed', onRemoved)
        this.cleanups.push(() => eventBus.off('session:removed', onRemoved))
    }

    dispose(): void {
        for (const cleanup of this.cleanups) cleanup()
        this.cleanups = []
    }

    private ensureCommand(name: string): CommandMetrics {
        let m = this.commands.get(name)
        if (!m) {
            m = { invocations: 0, errors: 0, totalDuration: 0 }
            this.commands.set(name, m)
        }
        return m
    }

    report(): StatsReport {
        const commands: StatsReport['commands'] = {}
        for (const [name, m] of [...this.commands].sort(([a], [b]) => a.localeCompare(b))) {
            commands[name] = { ...m, averageDuration: m.invocations > 0 ? Math.round(m.totalDuration / m.invocations) : 0 }
        }
        return { sessions: { ...this.sessions }, commands }
    }

    formatStatus(): string {
        const lines = [`Sessions: ${this.sessions.live} live, ${this.sessions.peak} peak, ${this.sessions.created} created`]
        if (this.commands.size > 0) {
            lines.push('Command metrics:')
            for (const [name, m] of this.commands) {
                lines.push(`  ${name}: ${m.invocations} calls, ${m.errors} errors, ${m.totalDuration}ms total`)
            }
        }
        return lines.join('\n')
    }
}
