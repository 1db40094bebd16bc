import { constants, type Stats } from 'node:fs'
import * as fsp from 'node:fs/promises'
import path from 'node:path'
import { errnoCode } from './errors.js'

export interface FileStat {
    isDirectory: boolean
    isFile: boolean
    size: number
    mode: number
    mtime: Date
}

export interface DirectoryEntry {
    name: string
    isDirectory: boolean
}

export interface FileSystem {
    readText(path: string): Promise<string>
    readJSON<T>(path: string): Promise<T>
    writeText(path: string, content: string): Promise<void>
    exists(path: string): Promise<boolean>
    stat(path: string): Promise<FileStat>
    readdir(path: string): Promise<DirectoryEntry[]>
    mkdir(path: string, options?: { recursive?: boolean }): Promise<void>
    rmdir(path: string): Promise<void>
    remove(path: string, options?: { recursive?: boolean }): Promise<void>
    copy(source: string, destination: string, options?: { recursive?: boolean }): Promise<void>
    rename(source: string, destination: string): Promise<void>
    touch(path: string): Promise<void>
}

function toStat(stats: Stats): FileStat {
    return {
        isDirectory: stats.isDirectory(),
        isFile: stats.isFile(),
        size: stats.size,
        mode: stats.mode,
        mtime: stats.mtime,
    }
}

export class NodeFileSystem implements FileSystem {
    async readText(filePath: string): Promise<string> {
        return fsp.readFile(filePath, 'utf-8')
    }

    async readJSON<T>(filePath: string): Promise<T> {
        return JSON.parse(await this.readText(filePath)) as T
    }

    async writeText(filePath: string, content: string): Promise<void> {
        await fsp.writeFile(filePath, content, 'utf-8')
    }

    async exists(filePath: string): Promise<boolean> {
        try {
            await fsp.access(filePath, constants.F_OK)
            return true
        } catch {
            return false
        }
    }

    async stat(filePath: string): Promise<FileStat> {
        return toStat(await fsp.stat(filePath))
    }

    async readdir(dirPath: string): Promise<DirectoryEntry[]> {
        const entries = await fsp.readdir(dirPath, { withFileTypes: true })
        const result: DirectoryEntry[] = []
        for (const entry of entries) {
            let isDirectory = entry.isDirectory()
            if (entry.isSymbolicLink()) {
                isDirectory = await fsp
                    .stat(path.join(dirPath, entry.name))
                    .then((s) => s.isDirectory())
                    .catch(() => false)
            }
            result.push({ name: entry.name, isDirectory })
        }
        return result
    }

    async mkdir(dirPath: string, options?: { recursive?: boolean }): Promise<void> {
        await fsp.mkdir(dirPath, { recursive: options?.recursive ?? false })
    }

    async rmdir(dirPath: string): Promise<void> {
        await fsp.rmdir(dirPath)
    }

    async remove(target: string, options?: { recursive?: boolean }): Promise<void> {
        await fsp.rm(target, { recursive: options?.recursive ?? false })
    }

    async copy(source: string, destination: string, options?: { recursive?: boolean }): Promise<void> {
        await fsp.cp(source, destination, { recursive: options?.recursive ?? false, preserveTimestamps: true })
    }

    async rename(source: string, destination: string): Promise<void> {
        try {
            await fsp.rename(source, destination)
        } catch (error) {
            if (errnoCode(error) !== 'EXDEV') throw error
            // different devices: fall back to copy + delete
            await fsp.cp(source, destination, { recursive: true, preserveTimestamps: true })
            await fsp.rm(source, { recursive: true })
        }
    }

    async touch(filePath: string): Promise<void> {
        const now = new Date()
        const handle = await fsp.open(filePath, 'a')
        try {
            await handle.utimes(now, now)
        } finally {
            await handle.close()
        }
    }
}

class MockFsError extends Error {
    constructor(
        readonly code: string,
        syscall: string,
        target: string
    ) {
        super(`${code}: ${syscall} '${target}'`)
    }
}

/** In-memory tree for tests. Paths are absolute POSIX paths. */
export class MockFileSystem implements FileSystem {
    private files = new Map<string, { content: string; mtime: Date }>()
    private dirs = new Set<string>(['/'])

    async readText(filePath: string): Promise<string> {
        const file = this.files.get(filePath)
        if (file === undefined) {
            throw new MockFsError(this.dirs.has(filePath) ? 'EISDIR' : 'ENOENT', 'open', filePath)
        }
        return file.content
    }

    async readJSON<T>(filePath: string): Promise<T> {
        return JSON.parse(await this.readText(filePath)) as T
    }

    async writeText(filePath: string, content: string): Promise<void> {
        this.requireParent(filePath, 'open')
        this.files.set(filePath, { content, mtime: new Date() })
    }

    async exists(filePath: string): Promise<boolean> {
        return this.files.has(filePath) || this.dirs.has(filePath)
    }

    async stat(filePath: string): Promise<FileStat> {
        if (this.dirs.has(filePath)) {
            return { isDirectory: true, isFile: false, size: 4096, mode: 0o40755, mtime: new Date(0) }
        }
        const file = this.files.get(filePath)
        if (!file) throw new MockFsError('ENOENT', 'stat', filePath)
        return { isDirectory: false, isFile: true, size: file.content.length, mode: 0o100644, mtime: file.mtime }
    }

    async readdir(dirPath: string): Promise<DirectoryEntry[]> {
        if (!this.dirs.has(dirPath)) {
            throw new MockFsError(this.files.has(dirPath) ? 'ENOTDIR' : 'ENOENT', 'scandir', dirPath)
        }
        const entries: DirectoryEntry[] = []
        for (const dir of this.dirs) {
            if (dir !== '/' && path.posix.dirname(dir) === dirPath) {
                entries.push({ name: path.posix.basename(dir), isDirectory: true })
            }
        }
        for (const file of this.files.keys()) {
            if (path.posix.dirname(file) === dirPath) {
                entries.push({ name: path.posix.basename(file), isDirectory: false })
            }
        }
        return entries
    }

    async mkdir(dirPath: string, options?: { recursive?: boolean }): Promise<void> {
        if (options?.recursive) {
            const parent = path.posix.dirname(dirPath)
            if (parent !== dirPath && !this.dirs.has(parent)) await this.mkdir(parent, options)
            if (this.files.has(dirPath)) throw new MockFsError('EEXIST', 'mkdir', dirPath)
            this.dirs.add(dirPath)
            return
        }
        if (await this.exists(dirPath)) throw new MockFsError('EEXIST', 'mkdir', dirPath)
        this.requireParent(dirPath, 'mkdir')
        this.dirs.add(dirPath)
    }

    async rmdir(dirPath: string): Promise<void> {
        if (!this.dirs.has(dirPath)) {
            throw new MockFsError(this.files.has(dirPath) ? 'ENOTDIR' : 'ENOENT', 'rmdir', dirPath)
        }
        if ((await this.readdir(dirPath)).length > 0) throw new MockFsError('ENOTEMPTY', 'rmdir', dirPath)
        this.dirs.delete(dirPath)
    }

    async remove(target: string, options?: { recursive?: boolean }): Promise<void> {
        if (this.files.delete(target)) return
        if (!this.dirs.has(target)) throw new MockFsError('ENOENT', 'rm', target)
        if (!options?.recursive) throw new MockFsError('EISDIR', 'rm', target)
        const prefix = `${target}/`
        for (const dir of [...this.dirs]) if (dir === target || dir.startsWith(prefix)) this.dirs.delete(dir)
        for (const file of [...this.files.keys()]) if (file.startsWith(prefix)) this.files.delete(file)
    }

    async copy(source: string, destination: string, options?: { recursive?: boolean }): Promise<void> {
        const file = this.files.get(source)
        if (file) {
            this.requireParent(destination, 'copyfile')
            this.files.set(destination, { ...file })
            return
        }
        if (!this.dirs.has(source)) throw new MockFsError('ENOENT', 'cp', source)
        if (!options?.recursive) throw new MockFsError('EISDIR', 'cp', source)
        this.relocate(source, destination, false)
    }

    async rename(source: string, destination: string): Promise<void> {
        if (!(await this.exists(source))) throw new MockFsError('ENOENT', 'rename', source)
        this.requireParent(destination, 'rename')
        this.relocate(source, destination, true)
    }

    async touch(filePath: string): Promise<void> {
        const file = this.files.get(filePath)
        if (file) {
            file.mtime = new Date()
            return
        }
        if (this.dirs.has(filePath)) return
        await this.writeText(filePath, '')
    }

    setFile(filePath: string, content: string): void {
        let dir = path.posix.dirname(filePath)
        while (!this.dirs.has(dir)) {
            this.dirs.add(dir)
            dir = path.posix.dirname(dir)
        }
        this.files.set(filePath, { content, mtime: new Date(0) })
    }

    setDirectory(dirPath: string): void {
        let dir = dirPath
        while (!this.dirs.has(dir)) {
            this.dirs.add(dir)
            dir = path.posix.dirname(dir)
        }
    }

    private requireParent(target: string, syscall: string): void {
        if (!this.dirs.has(path.posix.dirname(target))) throw new MockFsError('ENOENT', syscall, target)
    }

    private relocate(source: string, destination: string, removeSource: boolean): void {
        const prefix = `${source}/`
        const mapPath = (p: string) => destination + p.slice(source.length)

        const file = this.files.get(source)
        if (file) {
            this.files.set(destination, file)
            if (removeSource) this.files.delete(source)
            return
        }
        for (const dir of [...this.dirs]) {
            if (dir === source || dir.startsWith(prefix)) {
                this.dirs.add(mapPath(dir))
                if (removeSource) this.dirs.delete(dir)
            }
        }
        for (const [p, entry] of [...this.files]) {
            if (p.startsWith(prefix)) {
                this.files.set(mapPath(p), { ...entry })
                if (removeSource) this.files.delete(p)
            }
        }
    }
}
