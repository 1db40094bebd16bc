import path from 'node:path'
import { NavigatorError, errnoCode, toNavigatorError } from '../core/errors.js'
import type { DirectoryEntry, FileStat, FileSystem } from '../core/fs.js'
import { err, ok, type Result } from '../core/result.js'
import { byName, displayName, formatLongLine } from './listing.js'
import { type PathPolicy, insideSandbox, isFilesystemRoot, isWithin, resolvePath } from './paths.js'

export interface NavigatorOutcome {
    output: string
    /** Present when the operation moved the working directory. */
    newDirectory?: string
}

export type NavigatorResult = Result<NavigatorOutcome, NavigatorError>

interface ParsedArgs {
    flags: Set<string>
    operands: string[]
}

export function parseArgs(args: readonly string[]): ParsedArgs {
    const flags = new Set<string>()
    const operands: string[] = []
    let flagsDone = false
    for (const arg of args) {
        if (!flagsDone && arg === '--') {
            flagsDone = true
        } else if (!flagsDone && arg.length > 1 && arg.startsWith('-')) {
            for (const letter of arg.slice(1)) flags.add(letter)
        } else {
            operands.push(arg)
        }
    }
    return { flags, operands }
}

/** Collects per-operand lines; the first failure decides the error code. */
class Report {
    private lines: string[] = []
    private failure?: NavigatorError

    add(line: string): void {
        this.lines.push(line)
    }

    fail(error: NavigatorError): void {
        this.lines.push(error.message)
        this.failure ??= error
    }

    finish(newDirectory?: string): NavigatorResult {
        if (this.failure) {
            return err(
                new NavigatorError(this.failure.code, this.lines.join('\n'), { cause: this.failure, newDirectory })
            )
        }
        return ok({ output: this.lines.join('\n'), newDirectory })
    }
}

/**
 * Directory-mutating primitives run against a session's working directory.
 * Every path is resolved and normalized before the file system is touched.
 */
export class Navigator {
    constructor(
        private fs: FileSystem,
        private policy: PathPolicy
    ) {}

    resolve(cwd: string, target: string): string {
        return resolvePath(cwd, target, this.policy)
    }

    async list(cwd: string, args: readonly string[]): Promise<NavigatorResult> {
        const { flags, operands } = parseArgs(args)
        const showHidden = flags.has('a')
        const long = flags.has('l')
        const targets = operands.length > 0 ? operands : ['.']
        const sections: string[] = []

        for (const target of targets) {
            const abs = this.resolve(cwd, target)
            const stat = await this.statOrError(abs, 'ls', `cannot access '${target}'`)
            if (stat instanceof NavigatorError) return err(stat)

            let body: string
            if (!stat.isDirectory) {
                body = long ? formatLongLine(path.basename(abs), stat) : target
            } else {
                let entries
                try {
                    entries = await this.fs.readdir(abs)
                } catch (error) {
                    return err(toNavigatorError(error, 'ls', `cannot open directory '${target}'`))
                }
                entries = entries.filter((e) => showHidden || !e.name.startsWith('.')).sort(byName)
                if (entries.length === 0) {
                    body = '(empty directory)'
                } else if (long) {
                    const lines: string[] = []
                    for (const entry of entries) {
                        const entryStat = await this.fs.stat(path.join(abs, entry.name)).catch(() => undefined)
                        lines.push(entryStat ? formatLongLine(displayName(entry), entryStat) : displayName(entry))
                    }
                    body = lines.join('\n')
                } else {
                    body = entries.map(displayName).join('  ')
                }
            }
            sections.push(targets.length > 1 ? `${target}:\n${body}` : body)
        }

        return ok({ output: sections.join('\n\n') })
    }

    async changeDirectory(cwd: string, target?: string): Promise<NavigatorResult> {
        const shown = target ?? '~'
        const dest = target === undefined || target === '' ? path.resolve(this.policy.home) : this.resolve(cwd, target)

        if (!insideSandbox(dest, this.policy)) {
            return err(new NavigatorError('Forbidden', `cd: ${shown}: outside the sandbox`))
        }

        const stat = await this.statOrError(dest, 'cd', shown)
        if (stat instanceof NavigatorError) return err(stat)
        if (!stat.isDirectory) {
            return err(new NavigatorError('NotADirectory', `cd: ${shown}: Not a directory`))
        }

        return ok({ output: `Changed directory to: ${dest}`, newDirectory: dest })
    }

    printWorkingDirectory(cwd: string): NavigatorResult {
        return ok({ output: cwd })
    }

    async makeDirectory(cwd: string, args: readonly string[]): Promise<NavigatorResult> {
        const { flags, operands } = parseArgs(args)
        if (operands.length === 0) return err(new NavigatorError('InvalidArguments', 'mkdir: missing operand'))

        const report = new Report()
        for (const operand of operands) {
            const abs = this.resolve(cwd, operand)
            const subject = `cannot create directory '${operand}'`
            if (!insideSandbox(abs, this.policy)) {
                report.fail(new NavigatorError('Forbidden', `mkdir: ${subject}: outside the sandbox`))
                continue
            }
            try {
                await this.fs.mkdir(abs, { recursive: flags.has('p') })
                report.add(`Directory created: ${abs}`)
            } catch (error) {
                report.fail(toNavigatorError(error, 'mkdir', subject))
            }
        }
        return report.finish()
    }

    async removeDirectory(cwd: string, args: readonly string[]): Promise<NavigatorResult> {
        const { operands } = parseArgs(args)
        if (operands.length === 0) return err(new NavigatorError('InvalidArguments', 'rmdir: missing operand'))

        const report = new Report()
        let removedCwd = false
        for (const operand of operands) {
            const abs = this.resolve(cwd, operand)
            const subject = `failed to remove '${operand}'`
            const forbidden = this.guardDestructive('rmdir', subject, abs)
            if (forbidden) {
                report.fail(forbidden)
                continue
            }
            try {
                await this.fs.rmdir(abs)
                report.add(`Directory removed: ${abs}`)
                if (isWithin(abs, cwd)) removedCwd = true
            } catch (error) {
                report.fail(toNavigatorError(error, 'rmdir', subject))
            }
        }
        return report.finish(removedCwd ? await this.survivingAncestor(cwd) : undefined)
    }

    async remove(cwd: string, args: readonly string[]): Promise<NavigatorResult> {
        const { flags, operands } = parseArgs(args)
        if (operands.length === 0) return err(new NavigatorError('InvalidArguments', 'rm: missing operand'))

        const recursive = flags.has('r') || flags.has('R')
        const force = flags.has('f')
        const report = new Report()
        let removedCwd = false

        for (const operand of operands) {
            const abs = this.resolve(cwd, operand)
            const subject = `cannot remove '${operand}'`
            const forbidden = this.guardDestructive('rm', subject, abs)
            if (forbidden) {
                report.fail(forbidden)
                continue
            }

            let stat: FileStat
            try {
                stat = await this.fs.stat(abs)
            } catch (error) {
                if (force && errnoCode(error) === 'ENOENT') continue
                report.fail(toNavigatorError(error, 'rm', subject))
                continue
            }

            if (stat.isDirectory && !recursive) {
                report.fail(new NavigatorError('InvalidArguments', `rm: ${subject}: Is a directory`))
                continue
            }

            try {
                await this.fs.remove(abs, { recursive: stat.isDirectory })
                report.add(stat.isDirectory ? `Removed directory: ${abs}` : `Removed file: ${abs}`)
                if (isWithin(abs, cwd)) removedCwd = true
            } catch (error) {
                report.fail(toNavigatorError(error, 'rm', subject))
            }
        }

        return report.finish(removedCwd ? await this.survivingAncestor(cwd) : undefined)
    }

    async copy(cwd: string, args: readonly string[]): Promise<NavigatorResult> {
        const { flags, operands } = parseArgs(args)
        const missing = missingOperand('cp', operands)
        if (missing) return err(missing)

        const recursive = flags.has('r') || flags.has('R')
        const destArg = operands[operands.length - 1] ?? ''
        const sources = operands.slice(0, -1)
        const destAbs = this.resolve(cwd, destArg)

        if (!insideSandbox(destAbs, this.policy)) {
            return err(new NavigatorError('Forbidden', `cp: cannot create '${destArg}': outside the sandbox`))
        }
        const destIsDir = await this.isDirectory(destAbs)
        if (sources.length > 1 && !destIsDir) {
            return err(new NavigatorError('NotADirectory', `cp: target '${destArg}': Not a directory`))
        }

        const report = new Report()
        for (const source of sources) {
            const srcAbs = this.resolve(cwd, source)
            const stat = await this.statOrError(srcAbs, 'cp', `cannot stat '${source}'`)
            if (stat instanceof NavigatorError) {
                report.fail(stat)
                continue
            }
            if (stat.isDirectory && !recursive) {
                report.fail(new NavigatorError('InvalidArguments', `cp: -r not specified; omitting directory '${source}'`))
                continue
            }

            const target = destIsDir ? path.join(destAbs, path.basename(srcAbs)) : destAbs
            if (stat.isDirectory && isWithin(srcAbs, target)) {
                report.fail(
                    new NavigatorError('InvalidArguments', `cp: cannot copy a directory, '${source}', into itself, '${destArg}'`)
                )
                continue
            }
            if (stat.isDirectory && (await this.fs.exists(target)) && !(await this.isDirectory(target))) {
                report.fail(
                    new NavigatorError('AlreadyExists', `cp: cannot overwrite non-directory '${destArg}' with directory '${source}'`)
                )
                continue
            }

            try {
                await this.fs.copy(srcAbs, target, { recursive: stat.isDirectory })
                report.add(`${stat.isDirectory ? 'Copied directory' : 'Copied file'}: ${srcAbs} -> ${target}`)
            } catch (error) {
                report.fail(toNavigatorError(error, 'cp', `cannot copy '${source}'`))
            }
        }
        return report.finish()
    }

    async move(cwd: string, args: readonly string[]): Promise<NavigatorResult> {
        const { operands } = parseArgs(args)
        const missing = missingOperand('mv', operands)
        if (missing) return err(missing)

        const destArg = operands[operands.length - 1] ?? ''
        const sources = operands.slice(0, -1)
        const destAbs = this.resolve(cwd, destArg)

        if (!insideSandbox(destAbs, this.policy)) {
            return err(new NavigatorError('Forbidden', `mv: cannot move to '${destArg}': outside the sandbox`))
        }
        const destIsDir = await this.isDirectory(destAbs)
        if (sources.length > 1 && !destIsDir) {
            return err(new NavigatorError('NotADirectory', `mv: target '${destArg}': Not a directory`))
        }

        const report = new Report()
        let newCwd = cwd
        for (const source of sources) {
            const srcAbs = this.resolve(cwd, source)
            const subject = `cannot move '${source}'`
            const forbidden = this.guardDestructive('mv', subject, srcAbs)
            if (forbidden) {
                report.fail(forbidden)
                continue
            }

            const stat = await this.statOrError(srcAbs, 'mv', `cannot stat '${source}'`)
            if (stat instanceof NavigatorError) {
                report.fail(stat)
                continue
            }

            const target = destIsDir ? path.join(destAbs, path.basename(srcAbs)) : destAbs
            if (target === srcAbs) {
                report.fail(new NavigatorError('InvalidArguments', `mv: '${source}' and '${destArg}' are the same file`))
                continue
            }
            if (stat.isDirectory && isWithin(srcAbs, target)) {
                report.fail(
                    new NavigatorError('InvalidArguments', `mv: cannot move '${source}' to a subdirectory of itself, '${destArg}'`)
                )
                continue
            }

            try {
                await this.fs.rename(srcAbs, target)
                report.add(`Moved: ${srcAbs} -> ${target}`)
                if (isWithin(srcAbs, newCwd)) newCwd = path.join(target, path.relative(srcAbs, newCwd))
            } catch (error) {
                report.fail(toNavigatorError(error, 'mv', subject))
            }
        }
        return report.finish(newCwd !== cwd ? newCwd : undefined)
    }

    async printFile(cwd: string, args: readonly string[]): Promise<NavigatorResult> {
        const { operands } = parseArgs(args)
        if (operands.length === 0) return err(new NavigatorError('InvalidArguments', 'cat: missing operand'))

        const report = new Report()
        for (const operand of operands) {
            const abs = this.resolve(cwd, operand)
            const stat = await this.statOrError(abs, 'cat', operand)
            if (stat instanceof NavigatorError) {
                report.fail(stat)
                continue
            }
            if (stat.isDirectory) {
                report.fail(new NavigatorError('InvalidArguments', `cat: ${operand}: Is a directory`))
                continue
            }
            try {
                report.add((await this.fs.readText(abs)).replace(/\n$/, ''))
            } catch (error) {
                report.fail(toNavigatorError(error, 'cat', operand))
            }
        }
        return report.finish()
    }

    async touch(cwd: string, args: readonly string[]): Promise<NavigatorResult> {
        const { operands } = parseArgs(args)
        if (operands.length === 0) return err(new NavigatorError('InvalidArguments', 'touch: missing file operand'))

        const report = new Report()
        for (const operand of operands) {
            const abs = this.resolve(cwd, operand)
            const subject = `cannot touch '${operand}'`
            if (!insideSandbox(abs, this.policy)) {
                report.fail(new NavigatorError('Forbidden', `touch: ${subject}: outside the sandbox`))
                continue
            }
            try {
                await this.fs.touch(abs)
                report.add(`Touched file: ${abs}`)
            } catch (error) {
                report.fail(toNavigatorError(error, 'touch', subject))
            }
        }
        return report.finish()
    }

    /** Entries of `dir`, or none when it cannot be read. */
    async entries(dir: string): Promise<DirectoryEntry[]> {
        try {
            return await this.fs.readdir(dir)
        } catch {
            return []
        }
    }

    private guardDestructive(command: string, subject: string, abs: string): NavigatorError | undefined {
        if (isFilesystemRoot(abs)) {
            return new NavigatorError('Forbidden', `${command}: ${subject}: refusing to operate on the filesystem root`)
        }
        if (this.policy.sandboxRoot !== undefined && path.resolve(this.policy.sandboxRoot) === abs) {
            return new NavigatorError('Forbidden', `${command}: ${subject}: refusing to operate on the sandbox root`)
        }
        if (!insideSandbox(abs, this.policy)) {
            return new NavigatorError('Forbidden', `${command}: ${subject}: outside the sandbox`)
        }
        return undefined
    }

    private async statOrError(abs: string, command: string, subject: string): Promise<FileStat | NavigatorError> {
        try {
            return await this.fs.stat(abs)
        } catch (error) {
            return toNavigatorError(error, command, subject)
        }
    }

    private async isDirectory(abs: string): Promise<boolean> {
        try {
            return (await this.fs.stat(abs)).isDirectory
        } catch {
            return false
        }
    }

    private async survivingAncestor(dir: string): Promise<string> {
        let current = dir
        while (!(await this.isDirectory(current))) {
            const parent = path.dirname(current)
            if (parent === current) break
            current = parent
        }
        return current
    }
}

function missingOperand(command: string, operands: string[]): NavigatorError | undefined {
    if (operands.length === 0) return new NavigatorError('InvalidArguments', `${command}: missing file operand`)
    if (operands.length === 1) {
        return new NavigatorError('InvalidArguments', `${command}: missing destination file operand after '${operands[0]}'`)
    }
    return undefined
}
