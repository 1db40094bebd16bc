import type { ShellcastError } from '../core/errors.js'
import { ok, type Result } from '../core/result.js'
import type { MetricsSnapshot, OutputKind } from '../core/types.js'
import type { HostProbe } from '../metrics/probe.js'
import type { Navigator } from '../navigator/navigator.js'

export type CommandGroup = 'navigator' | 'system' | 'builtin'

export interface CommandServices {
    navigator: Navigator
    metrics: { latest(): MetricsSnapshot }
    probe: Pick<HostProbe, 'listProcesses'>
    /** Natural-language examples listed by `help`. */
    shorthand: { marker: string; examples: ReadonlyArray<{ example: string; description: string }> }
}

export interface CommandContext {
    sessionId: string
    cwd: string
    args: string[]
    history: readonly string[]
    services: CommandServices
    registry: CommandRegistry
}

export interface CommandOutcome {
    output: string
    kind?: Exclude<OutputKind, 'error'>
    newDirectory?: string
}

export type CommandHandler = (ctx: CommandContext) => Promise<Result<CommandOutcome, ShellcastError>>

export interface CommandSpec {
    name: string
    group: CommandGroup
    description: string
    usage: string
    /** Arguments complete against directory entries. */
    takesPaths: boolean
    flags: string[]
    handler: CommandHandler
}

export class CommandRegistry {
    private specs = new Map<string, CommandSpec>()

    constructor(specs: Iterable<CommandSpec>) {
        for (const spec of specs) {
            const key = spec.name.toLowerCase()
            if (this.specs.has(key)) throw new Error(`Duplicate command: ${spec.name}`)
            this.specs.set(key, spec)
        }
    }

    get(name: string): CommandSpec | undefined {
        return this.specs.get(name.toLowerCase())
    }

    has(name: string): boolean {
        return this.specs.has(name.toLowerCase())
    }

    names(): string[] {
        return [...this.specs.keys()].sort()
    }

    all(): CommandSpec[] {
        return this.names().flatMap((name) => this.specs.get(name) ?? [])
    }
}

const MB = 1024 * 1024

function megabytes(bytes: number): number {
    return Math.floor(bytes / MB)
}

export function formatCpu(snapshot: MetricsSnapshot): string {
    const lines = [`Total cores: ${snapshot.cores || 'N/A'}`, 'CPU Usage Per Core:']
    if (snapshot.perCore.length === 0) {
        lines.push('  Unable to get CPU usage information')
    } else {
        snapshot.perCore.forEach((percent, i) => lines.push(`  Core ${i}: ${percent.toFixed(1)}%`))
    }
    lines.push(`Total CPU Usage: ${snapshot.cpuPercent.toFixed(1)}%`)
    return lines.join('\n')
}

export function formatMemory(snapshot: MetricsSnapshot): string {
    return [
        'Memory Information:',
        `  Total: ${megabytes(snapshot.memoryTotal)} MB`,
        `  Used: ${megabytes(snapshot.memoryUsed)} MB (${snapshot.memoryPercent.toFixed(1)}%)`,
        `  Free: ${megabytes(snapshot.memoryTotal - snapshot.memoryUsed)} MB`,
    ].join('\n')
}

function formatHelp(ctx: CommandContext): string {
    const [topic] = ctx.args
    if (topic !== undefined) {
        const spec = ctx.registry.get(topic)
        if (!spec) return `help: no help topics match '${topic.toLowerCase()}'`
        return `${spec.name} - ${spec.description}\nUsage: ${spec.usage}`
    }

    const lines = ['Available commands:']
    for (const spec of ctx.registry.all()) lines.push(`  ${spec.name.padEnd(10)} - ${spec.description}`)

    const { marker, examples } = ctx.services.shorthand
    if (examples.length > 0) {
        lines.push('', `Natural language (prefix with ${marker}):`)
        for (const { example, description } of examples) lines.push(`  ${marker}${example.padEnd(38)} - ${description}`)
    }
    lines.push('', 'Other programs on the host run directly.')
    return lines.join('\n')
}

const navigatorCommand = (
    name: string,
    description: string,
    usage: string,
    flags: string[],
    handler: CommandHandler
): CommandSpec => ({ name, group: 'navigator', description, usage, takesPaths: true, flags, handler })

const systemCommand = (name: string, description: string, handler: CommandHandler): CommandSpec => ({
    name,
    group: 'system',
    description,
    usage: name,
    takesPaths: false,
    flags: [],
    handler,
})

const builtinCommand = (name: string, description: string, usage: string, handler: CommandHandler): CommandSpec => ({
    name,
    group: 'builtin',
    description,
    usage,
    takesPaths: false,
    flags: [],
    handler,
})

const list: CommandHandler = ({ services, cwd, args }) => services.navigator.list(cwd, args)

export const BUILTIN_COMMANDS: readonly CommandSpec[] = [
    navigatorCommand('ls', 'List directory contents', 'ls [-a] [-l] [path...]', ['-a', '-l', '-la', '-al'], list),
    navigatorCommand('dir', 'List directory contents', 'dir [-a] [-l] [path...]', ['-a', '-l', '-la', '-al'], list),
    navigatorCommand('cd', 'Change directory', 'cd [dir]', [], ({ services, cwd, args }) =>
        services.navigator.changeDirectory(cwd, args[0])
    ),
    {
        ...navigatorCommand('pwd', 'Print working directory', 'pwd', [], async ({ services, cwd }) =>
            services.navigator.printWorkingDirectory(cwd)
        ),
        takesPaths: false,
    },
    navigatorCommand('mkdir', 'Make directory', 'mkdir [-p] dir...', ['-p'], ({ services, cwd, args }) =>
        services.navigator.makeDirectory(cwd, args)
    ),
    navigatorCommand('rmdir', 'Remove empty directory', 'rmdir dir...', [], ({ services, cwd, args }) =>
        services.navigator.removeDirectory(cwd, args)
    ),
    navigatorCommand('rm', 'Remove file or directory', 'rm [-r] [-f] path...', ['-r', '-f', '-rf'], ({ services, cwd, args }) =>
        services.navigator.remove(cwd, args)
    ),
    navigatorCommand('cp', 'Copy file or directory', 'cp [-r] source... dest', ['-r', '-R'], ({ services, cwd, args }) =>
        services.navigator.copy(cwd, args)
    ),
    navigatorCommand('mv', 'Move file or directory', 'mv source... dest', [], ({ services, cwd, args }) =>
        services.navigator.move(cwd, args)
    ),
    navigatorCommand('cat', 'Display file contents', 'cat file...', [], ({ services, cwd, args }) =>
        services.navigator.printFile(cwd, args)
    ),
    navigatorCommand('touch', 'Create an empty file', 'touch file...', [], ({ services, cwd, args }) =>
        services.navigator.touch(cwd, args)
    ),
    systemCommand('cpu', 'Display CPU information', async ({ services }) => ok({ output: formatCpu(services.metrics.latest()) })),
    systemCommand('memory', 'Display memory information', async ({ services }) =>
        ok({ output: formatMemory(services.metrics.latest()) })
    ),
    systemCommand('processes', 'Count running processes', async ({ services }) =>
        ok({ output: `Running processes: ${services.metrics.latest().processCount}` })
    ),
    systemCommand('top', 'Display system processes', async ({ services }) => {
        const snapshot = services.metrics.latest()
        const processes = await services.probe.listProcesses(10)
        const lines = [
            `CPU Usage: ${snapshot.cpuPercent.toFixed(1)}%`,
            `Memory: ${snapshot.memoryPercent.toFixed(1)}% used (${megabytes(snapshot.memoryUsed)} MB / ${megabytes(snapshot.memoryTotal)} MB)`,
            '',
            'PID\tCPU%\tMEM%\tUSER\tCOMMAND',
            ...processes.map((p) => `${p.pid}\t${p.cpu.toFixed(1)}\t${p.memory.toFixed(1)}\t${p.user}\t${p.command}`),
        ]
        return ok({ output: lines.join('\n') })
    }),
    builtinCommand('help', 'Display help information', 'help [command]', async (ctx) => ok({ output: formatHelp(ctx) })),
    builtinCommand('history', 'Show command history', 'history', async ({ history }) => {
        const width = String(history.length).length
        return ok({ output: history.map((entry, i) => `${String(i + 1).padStart(width)}  ${entry}`).join('\n') })
    }),
    builtinCommand('echo', 'Display a line of text', 'echo [text...]', async ({ args }) => ok({ output: args.join(' ') })),
    builtinCommand('clear', 'Clear the terminal screen', 'clear', async () => ok<CommandOutcome>({ output: '', kind: 'clear' })),
    builtinCommand('exit', 'Exit the terminal', 'exit', async () => ok({ output: 'Exiting terminal...' })),
]
