import { describe, expect, it } from 'vitest'
import { configFromEnv, loadConfig } from '../../../src/config/loader.js'
import { MockFileSystem } from '../../../src/core/fs.js'

const GLOBAL = '/home/tester/.config/shellcast/config.json'

function workspace(...dirs: string[]): MockFileSystem {
    const fs = new MockFileSystem()
    for (const dir of ['/work', ...dirs]) fs.setDirectory(dir)
    return fs
}

function load(fs: MockFileSystem, extra: Partial<Parameters<typeof loadConfig>[0]> = {}) {
    return loadConfig({ fs, projectDir: '/work', env: {}, globalConfigFile: GLOBAL, ...extra })
}

describe('loadConfig', () => {
    it('returns defaults when no config files exist', async () => {
        const config = await load(workspace(), { cliFlags: { rootDirectory: '/work' } })
        expect(config.port).toBe(5000)
        expect(config.host).toBe('0.0.0.0')
        expect(config.historyLimit).toBe(1000)
        expect(config.passthrough).toBe(true)
        expect(config.nlMarker).toBe('!')
        expect(config.logLevel).toBe('info')
        expect(config.sandboxRoot).toBeUndefined()
    })

    it('merges files, env and CLI flags in priority order', async () => {
        const fs = new MockFileSystem()
        fs.setFile(GLOBAL, JSON.stringify({ port: 7000, historyLimit: 10, host: '127.0.0.1' }))
        fs.setFile('/work/.shellcast/config.json', JSON.stringify({ port: 7001, historyLimit: 20 }))
        const config = await load(fs, {
            env: { SHELLCAST_PORT: '7002' },
            cliFlags: { historyLimit: 30, rootDirectory: '/work' },
        })
        expect(config.host).toBe('127.0.0.1')
        expect(config.port).toBe(7002)
        expect(config.historyLimit).toBe(30)
    })

    it('ignores undefined CLI values', async () => {
        const config = await load(workspace(), {
            env: { SHELLCAST_PORT: '6000' },
            cliFlags: { port: undefined, rootDirectory: '/work' },
        })
        expect(config.port).toBe(6000)
    })

    it('resolves relative directories against the project dir', async () => {
        const config = await load(workspace('/work/jail/home'), { cliFlags: { sandboxRoot: 'jail', rootDirectory: 'jail/home' } })
        expect(config.sandboxRoot).toBe('/work/jail')
        expect(config.rootDirectory).toBe('/work/jail/home')
    })

    it('starts tabs in the sandbox root when no root is given', async () => {
        const config = await load(workspace('/srv/box'), { cliFlags: { sandboxRoot: '/srv/box' } })
        expect(config.rootDirectory).toBe('/srv/box')
    })

    it('rejects a root outside the sandbox', async () => {
        await expect(
            load(new MockFileSystem(), { cliFlags: { sandboxRoot: '/srv/box', rootDirectory: '/etc' } })
        ).rejects.toThrow('rootDirectory /etc lies outside sandboxRoot /srv/box')
    })

    it('rejects a root that does not exist', async () => {
        await expect(load(workspace(), { env: { SHELLCAST_ROOT: '/does/not/exist' } })).rejects.toThrow(
            'rootDirectory /does/not/exist does not exist'
        )
    })

    it('rejects a sandbox that is not a directory', async () => {
        const fs = workspace()
        fs.setFile('/work/box', 'not a directory')
        await expect(load(fs, { cliFlags: { sandboxRoot: 'box' } })).rejects.toThrow('sandboxRoot /work/box is not a directory')
    })

    it('rejects unknown keys in config files', async () => {
        const fs = new MockFileSystem()
        fs.setFile(GLOBAL, JSON.stringify({ colour: 'blue' }))
        await expect(load(fs)).rejects.toThrow(`Invalid config file ${GLOBAL}`)
    })

    it('rejects malformed JSON', async () => {
        const fs = new MockFileSystem()
        fs.setFile(GLOBAL, '{ nope')
        await expect(load(fs)).rejects.toThrow(`Invalid config file ${GLOBAL}`)
    })
})

describe('configFromEnv', () => {
    it('reads SHELLCAST_ variables', () => {
        expect(
            configFromEnv({
                SHELLCAST_HOST: 'localhost',
                SHELLCAST_PORT: '8080',
                SHELLCAST_ROOT: '/data',
                SHELLCAST_SANDBOX: '/data',
                SHELLCAST_LOG_LEVEL: 'debug',
            })
        ).toEqual({ host: 'localhost', port: 8080, rootDirectory: '/data', sandboxRoot: '/data', logLevel: 'debug' })
    })

    it('rejects bad values', () => {
        expect(() => configFromEnv({ SHELLCAST_PORT: 'abc' })).toThrow('Invalid SHELLCAST_PORT: abc')
        expect(() => configFromEnv({ SHELLCAST_LOG_LEVEL: 'loud' })).toThrow('Invalid SHELLCAST_LOG_LEVEL: loud')
    })
})
