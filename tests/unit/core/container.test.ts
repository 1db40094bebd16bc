import { describe, expect, it } from 'vitest'
import { DEFAULT_CONFIG } from '../../../src/config/defaults.js'
import type { ResolvedConfig } from '../../../src/config/schema.js'
import { createContainer } from '../../../src/core/container.js'
import { MockFileSystem } from '../../../src/core/fs.js'
import { createSilentLogger } from '../../../src/logger/index.js'
import { FakeProbe, FakeProcessExecutor, RecordingChannel, exited } from '../../helpers/fakes.js'

const config: ResolvedConfig = {
    ...DEFAULT_CONFIG,
    rootDirectory: '/work',
    sandboxRoot: '/work',
}

function build() {
    const fs = new MockFileSystem()
    fs.setFile('/work/readme.md', 'hi\n')
    const executor = new FakeProcessExecutor().on('uname', () => exited('Linux\n'))
    const container = createContainer(config, {
        logger: createSilentLogger(),
        fs,
        probe: new FakeProbe(),
        executor,
    })
    return { container, executor }
}

describe('createContainer', () => {
    it('wires the engine end to end', async () => {
        const { container } = build()
        const channel = new RecordingChannel('c1')
        container.gateway.connect(channel)

        await container.gateway.receive('c1', JSON.stringify({ event: 'command', data: { tab_id: 't', command: 'cat readme.md' } }))
        await container.gateway.receive('c1', JSON.stringify({ event: 'command', data: { tab_id: 't', command: 'uname' } }))

        expect(channel.events('output')).toEqual([
            { event: 'output', data: { tab_id: 't', output: 'hi', type: 'result' } },
            { event: 'output', data: { tab_id: 't', output: 'Linux', type: 'result' } },
        ])
        expect(container.stats.report().commands.cat?.invocations).toBe(1)
        await container.shutdown()
    })

    it('applies the sandbox from config', async () => {
        const { container } = build()
        container.store.getOrCreate('t')
        const [event] = await container.dispatcher.handle('t', 'cd /etc')
        expect(event).toEqual({ type: 'output', tabId: 't', output: 'cd: /etc: outside the sandbox', kind: 'error' })
        await container.shutdown()
    })

    it('feeds sampled metrics to connected channels', async () => {
        const { container } = build()
        const channel = new RecordingChannel('c1')
        container.gateway.connect(channel)
        const unsubscribe = container.sampler.onSample((snapshot) => container.hub.broadcastMetrics(snapshot))
        await container.sampler.sample()
        unsubscribe()

        const frames = channel.events('system_info')
        expect(frames).toHaveLength(2)
        const last = frames[1]
        expect(last?.event === 'system_info' && last.data.process_count).toBe(42)
        await container.shutdown()
    })
})
