import { mkdir, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { DispatchError } from '../../../src/core/errors.js'
import { err } from '../../../src/core/result.js'
import { createEngine, type EngineOptions, exited, makeTempDir, removeTempDir } from '../../helpers/fakes.js'

describe('CommandDispatcher', () => {
    let root: string

    beforeEach(async () => {
        root = await makeTempDir()
        await mkdir(path.join(root, 'sub'))
        await writeFile(path.join(root, 'notes.txt'), 'remember\n')
    })

    afterEach(async () => {
        await removeTempDir(root)
    })

    const engineWith = (options: Partial<EngineOptions> = {}) => {
        const engine = createEngine({ root, ...options })
        for (const tabId of ['t', 'u', 'a', 'b']) engine.store.getOrCreate(tabId)
        return engine
    }

    describe('built-in commands', () => {
        it('answers with an output event', async () => {
            const { dispatcher } = engineWith()
            expect(await dispatcher.handle('t', 'ls')).toEqual([
                { type: 'output', tabId: 't', output: 'notes.txt  sub/', kind: 'result' },
            ])
        })

        it('follows cd with a directory change', async () => {
            const { dispatcher, store } = engineWith()
            const sub = path.join(root, 'sub')
            expect(await dispatcher.handle('t', 'cd sub')).toEqual([
                { type: 'output', tabId: 't', output: `Changed directory to: ${sub}`, kind: 'result' },
                { type: 'directory_change', tabId: 't', directory: sub },
            ])
            expect(store.get('t')?.currentDirectory).toBe(sub)
            expect(await dispatcher.handle('t', 'pwd')).toEqual([{ type: 'output', tabId: 't', output: sub, kind: 'result' }])
        })

        it('keeps directories per session', async () => {
            const { dispatcher, store } = engineWith()
            await dispatcher.handle('a', 'cd sub')
            await dispatcher.handle('b', 'pwd')
            expect(store.get('b')?.currentDirectory).toBe(root)
        })

        it('reports navigator failures as errors', async () => {
            const { dispatcher } = engineWith()
            expect(await dispatcher.handle('t', 'cd nowhere')).toEqual([
                { type: 'output', tabId: 't', output: 'cd: nowhere: No such file or directory', kind: 'error' },
            ])
        })

        it('passes clear through', async () => {
            const { dispatcher } = engineWith()
            expect(await dispatcher.handle('t', 'clear')).toEqual([{ type: 'output', tabId: 't', output: '', kind: 'clear' }])
        })

        it('turns a throwing handler into an execution failure', async () => {
            const engine = engineWith()
            engine.probe.listProcesses = async () => {
                throw new Error('ps missing')
            }
            expect(await engine.dispatcher.handle('t', 'top')).toEqual([
                { type: 'output', tabId: 't', output: 'top: ps missing', kind: 'error' },
            ])
        })

        it('refuses destructive commands outside the sandbox', async () => {
            const { dispatcher } = engineWith({ sandboxRoot: root })
            const [event] = await dispatcher.handle('t', `rm -r ${root}`)
            expect(event).toEqual({
                type: 'output',
                tabId: 't',
                output: `rm: cannot remove '${root}': refusing to operate on the sandbox root`,
                kind: 'error',
            })
        })
    })

    describe('history and transcript', () => {
        it('records trimmed input for successes and failures', async () => {
            const { dispatcher, store } = engineWith()
            await dispatcher.handle('t', '  ls  ')
            await dispatcher.handle('t', 'cat nope')
            await dispatcher.handle('t', 'cat nope')
            expect(store.getHistory('t')).toEqual(['ls', 'cat nope'])
        })

        it('skips blank lines and unresolved shorthand', async () => {
            const { dispatcher, store } = engineWith()
            expect(await dispatcher.handle('t', '   ')).toEqual([])
            const [event] = await dispatcher.handle('t', '!florp the widgets')
            expect(event?.type === 'output' && event.kind).toBe('error')
            expect(event?.type === 'output' && event.output.startsWith('Unrecognized request: florp the widgets')).toBe(true)
            expect(store.getHistory('t')).toEqual([])
        })

        it('history shows earlier commands but not itself', async () => {
            const { dispatcher } = engineWith()
            await dispatcher.handle('t', 'pwd')
            await dispatcher.handle('t', 'echo hi')
            expect(await dispatcher.handle('t', 'history')).toEqual([
                { type: 'output', tabId: 't', output: '1  pwd\n2  echo hi', kind: 'result' },
            ])
        })

        it('records transcript entries with their kind', async () => {
            const { dispatcher, store } = engineWith()
            await dispatcher.handle('t', 'echo hi')
            await dispatcher.handle('t', 'cat nope')
            expect(store.getTranscript('t').map(({ command, output, kind }) => ({ command, output, kind }))).toEqual([
                { command: 'echo hi', output: 'hi', kind: 'result' },
                { command: 'cat nope', output: 'cat: nope: No such file or directory', kind: 'error' },
            ])
        })
    })

    describe('host programs', () => {
        it('runs unknown names through the executor in the session directory', async () => {
            const engine = engineWith()
            engine.executor.on('git', () => exited('On branch main\n'))
            await engine.dispatcher.handle('t', 'cd sub')
            expect(await engine.dispatcher.handle('t', 'git status')).toEqual([
                { type: 'output', tabId: 't', output: 'On branch main', kind: 'result' },
            ])
            expect(engine.executor.calls).toEqual([{ name: 'git', args: ['status'], cwd: path.join(root, 'sub') }])
        })

        it('prints a placeholder for silent programs', async () => {
            const engine = engineWith()
            engine.executor.on('true', () => exited(''))
            expect(await engine.dispatcher.handle('t', 'true')).toEqual([
                { type: 'output', tabId: 't', output: '(no output)', kind: 'result' },
            ])
        })

        it('reports non-zero exits as errors', async () => {
            const engine = engineWith()
            engine.executor.on('make', () => exited('', 'no rule to make target\n', 2))
            engine.executor.on('false', () => exited('', '', 1))
            expect(await engine.dispatcher.handle('t', 'make')).toEqual([
                { type: 'output', tabId: 't', output: 'no rule to make target', kind: 'error' },
            ])
            expect(await engine.dispatcher.handle('t', 'false')).toEqual([
                { type: 'output', tabId: 't', output: 'false: exited with code 1', kind: 'error' },
            ])
        })

        it('suggests built-ins for unknown programs', async () => {
            const { dispatcher } = engineWith()
            expect(await dispatcher.handle('t', 'lss')).toEqual([
                { type: 'output', tabId: 't', output: "Command 'lss' not found. Did you mean: ls?", kind: 'error' },
            ])
        })

        it('reports timeouts', async () => {
            const engine = engineWith()
            engine.executor.on('sleep', () => err(new DispatchError('Timeout', 'Command timed out after 10 seconds')))
            expect(await engine.dispatcher.handle('t', 'sleep 60')).toEqual([
                { type: 'output', tabId: 't', output: 'Command timed out after 10 seconds', kind: 'error' },
            ])
        })

        it('blocks dangerous commands before running them', async () => {
            const engine = engineWith()
            engine.executor.on('dd', () => exited('should not run'))
            expect(await engine.dispatcher.handle('t', 'dd if=/dev/zero of=disk.img')).toEqual([
                {
                    type: 'output',
                    tabId: 't',
                    output: "Potentially dangerous command 'dd if=/dev/zero of=disk.img' blocked for safety reasons.",
                    kind: 'error',
                },
            ])
            expect(engine.executor.calls).toEqual([])
        })

        it('does not run host programs when passthrough is off', async () => {
            const engine = engineWith({ passthrough: false })
            engine.executor.on('zzz', () => exited('ran'))
            expect(await engine.dispatcher.handle('t', 'zzz')).toEqual([
                { type: 'output', tabId: 't', output: "Command 'zzz' not found.", kind: 'error' },
            ])
            expect(engine.executor.calls).toEqual([])
        })
    })

    describe('ordering', () => {
        it('runs lines for one session in arrival order', async () => {
            const engine = engineWith()
            let release: () => void = () => {}
            const gate = new Promise<void>((resolve) => {
                release = resolve
            })
            engine.executor.on('slow', async () => {
                await gate
                return exited('slow done')
            })

            const first = engine.dispatcher.handle('t', 'slow')
            const second = engine.dispatcher.handle('t', 'cd sub')
            const third = engine.dispatcher.handle('t', 'pwd')
            const other = await engine.dispatcher.handle('u', 'echo free')

            expect(other).toEqual([{ type: 'output', tabId: 'u', output: 'free', kind: 'result' }])
            expect(engine.store.getHistory('t')).toEqual([])
            release()

            expect((await first)[0]).toEqual({ type: 'output', tabId: 't', output: 'slow done', kind: 'result' })
            expect((await second)[1]).toEqual({ type: 'directory_change', tabId: 't', directory: path.join(root, 'sub') })
            expect(await third).toEqual([{ type: 'output', tabId: 't', output: path.join(root, 'sub'), kind: 'result' }])
            expect(engine.store.getHistory('t')).toEqual(['slow', 'cd sub', 'pwd'])
        })

        it('emits start and completion events', async () => {
            const engine = engineWith()
            const seen: string[] = []
            engine.eventBus.on('command:start', ({ name }) => seen.push(`start:${name}`))
            engine.eventBus.on('command:complete', ({ name, success }) => seen.push(`done:${name}:${success}`))
            await engine.dispatcher.handle('t', 'pwd')
            await engine.dispatcher.handle('t', 'cat nope')
            expect(seen).toEqual(['start:pwd', 'done:pwd:true', 'start:cat', 'done:cat:false'])
        })
    })

    describe('session lifetime', () => {
        it('drops input for a session that does not exist', async () => {
            const engine = engineWith()
            expect(await engine.dispatcher.handle('gone', 'pwd')).toEqual([])
            expect(engine.store.has('gone')).toBe(false)
        })

        it('drops queued lines once their session is removed', async () => {
            const engine = engineWith()
            let release: () => void = () => {}
            const gate = new Promise<void>((resolve) => {
                release = resolve
            })
            engine.executor.on('build', async () => {
                await gate
                return exited('built')
            })

            const first = engine.dispatcher.handle('t', 'build')
            const second = engine.dispatcher.handle('t', 'echo second')
            await vi.waitFor(() => expect(engine.executor.calls).toHaveLength(1))
            engine.store.remove('t')
            release()

            expect(await first).toEqual([{ type: 'output', tabId: 't', output: 'built', kind: 'result' }])
            expect(await second).toEqual([])
            expect(engine.store.has('t')).toBe(false)
            expect(engine.store.size).toBe(3)
        })

        it('leaves the liveness window of a released session running', async () => {
            const engine = engineWith({ ttlMs: 60_000 })
            engine.store.release('t')
            expect(await engine.dispatcher.handle('t', 'echo late')).toEqual([
                { type: 'output', tabId: 't', output: 'late', kind: 'result' },
            ])
            expect(engine.store.isReleased('t')).toBe(true)
            engine.store.dispose()
        })
    })
})
