import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import type { MetricsSnapshot } from '../../../src/core/types.js'
import { createSilentLogger } from '../../../src/logger/index.js'
import type { CpuReading } from '../../../src/metrics/probe.js'
import { MetricsSampler } from '../../../src/metrics/sampler.js'
import { FakeProbe } from '../../helpers/fakes.js'

describe('MetricsSampler', () => {
    it('publishes a snapshot built from the probe', async () => {
        const probe = new FakeProbe()
        const sampler = new MetricsSampler(probe, createSilentLogger(), { intervalMs: 1000 }, () => 42)
        const seen: MetricsSnapshot[] = []
        sampler.onSample((snapshot) => seen.push(snapshot))

        const snapshot = await sampler.sample()

        expect(snapshot).toEqual({
            cpuPercent: 12.5,
            memoryPercent: 50,
            processCount: 42,
            cores: 2,
            perCore: [10, 15],
            memoryTotal: 8 * 1024 * 1024 * 1024,
            memoryUsed: 4 * 1024 * 1024 * 1024,
            timestamp: 42,
        })
        expect(seen).toEqual([snapshot])
        expect(sampler.latest()).toBe(snapshot)
    })

    it('keeps the last values with a fresh timestamp when a read fails', async () => {
        const probe = new FakeProbe()
        let clock = 1
        const sampler = new MetricsSampler(probe, createSilentLogger(), { intervalMs: 1000 }, () => clock++)
        await sampler.sample()
        probe.failWith = new Error('probe down')

        const snapshot = await sampler.sample()

        expect(snapshot.cpuPercent).toBe(12.5)
        expect(snapshot.timestamp).toBe(2)
    })

    it('starts from zeros before the first read', () => {
        const sampler = new MetricsSampler(new FakeProbe(), createSilentLogger(), { intervalMs: 1000 })
        expect(sampler.latest().cpuPercent).toBe(0)
        expect(sampler.latest().perCore).toEqual([])
    })

    it('stops notifying unsubscribed listeners and survives throwing ones', async () => {
        const sampler = new MetricsSampler(new FakeProbe(), createSilentLogger(), { intervalMs: 1000 })
        const listener = vi.fn()
        sampler.onSample(() => {
            throw new Error('listener broke')
        })
        const unsubscribe = sampler.onSample(listener)
        await sampler.sample()
        unsubscribe()
        await sampler.sample()
        expect(listener).toHaveBeenCalledTimes(1)
    })

    describe('timer', () => {
        beforeEach(() => {
            vi.useFakeTimers()
        })

        afterEach(() => {
            vi.useRealTimers()
        })

        it('reads immediately and then every interval', async () => {
            const probe = new FakeProbe()
            const sampler = new MetricsSampler(probe, createSilentLogger(), { intervalMs: 1000 })
            sampler.start()
            expect(sampler.running).toBe(true)
            await vi.advanceTimersByTimeAsync(0)
            expect(probe.reads).toBe(1)
            await vi.advanceTimersByTimeAsync(2000)
            expect(probe.reads).toBe(3)
            sampler.stop()
            await vi.advanceTimersByTimeAsync(5000)
            expect(probe.reads).toBe(3)
            expect(sampler.running).toBe(false)
        })

        it('skips ticks while a read is still running', async () => {
            const probe = new FakeProbe()
            let finish: (reading: CpuReading) => void = () => {}
            let calls = 0
            probe.readCpu = () => {
                calls++
                return new Promise<CpuReading>((resolve) => {
                    finish = resolve
                })
            }
            const sampler = new MetricsSampler(probe, createSilentLogger(), { intervalMs: 1000 })
            sampler.start()
            await vi.advanceTimersByTimeAsync(3000)
            expect(calls).toBe(1)

            finish({ percent: 1, perCore: [1], cores: 1 })
            await vi.advanceTimersByTimeAsync(1000)
            expect(calls).toBe(2)
            sampler.stop()
        })
    })
})
