import { describe, expect, it } from 'vitest'
import { TypedEventEmitter } from '../../../src/core/events.js'
import { CommandStats } from '../../../src/metrics/collector.js'

describe('CommandStats', () => {
    it('aggregates command completions', () => {
        const eventBus = new TypedEventEmitter()
        const stats = new CommandStats(eventBus)

        eventBus.emit('command:complete', { sessionId: 't', name: 'ls', duration: 10, success: true })
        eventBus.emit('command:complete', { sessionId: 't', name: 'ls', duration: 21, success: false })
        eventBus.emit('command:complete', { sessionId: 't', name: 'cd', duration: 4, success: true })

        expect(stats.report().commands).toEqual({
            cd: { invocations: 1, errors: 0, totalDuration: 4, averageDuration: 4 },
            ls: { invocations: 2, errors: 1, totalDuration: 31, averageDuration: 16 },
        })
    })

    it('tracks live and peak sessions', () => {
        const eventBus = new TypedEventEmitter()
        const stats = new CommandStats(eventBus)

        eventBus.emit('session:created', { sessionId: 'a' })
        eventBus.emit('session:created', { sessionId: 'b' })
        eventBus.emit('session:removed', { sessionId: 'a', reason: 'closed' })

        expect(stats.report().sessions).toEqual({ live: 1, peak: 2, created: 2 })
        expect(stats.formatStatus()).toBe('Sessions: 1 live, 2 peak, 2 created')
    })

    it('formats command lines and stops listening after dispose', () => {
        const eventBus = new TypedEventEmitter()
        const stats = new CommandStats(eventBus)
        eventBus.emit('command:complete', { sessionId: 't', name: 'pwd', duration: 2, success: true })
        stats.dispose()
        eventBus.emit('command:complete', { sessionId: 't', name: 'pwd', duration: 2, success: true })

        expect(stats.formatStatus()).toBe(
            ['Sessions: 0 live, 0 peak, 0 created', 'Command metrics:', '  pwd: 1 calls, 0 errors, 2ms total'].join('\n')
        )
    })
})
