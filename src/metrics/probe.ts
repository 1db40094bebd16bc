import os from 'node:os'
import { execa } from 'execa'

export interface CpuReading {
    percent: number
    perCore: number[]
    cores: number
}

export interface MemoryReading {
    percent: number
    total: number
    used: number
}

export interface ProcessInfo {
    pid: number
    cpu: number
    memory: number
    user: string
    command: string
}

/** Reads the host. Any method may reject; the sampler absorbs failures. */
export interface HostProbe {
    readCpu(): Promise<CpuReading>
    readMemory(): Promise<MemoryReading>
    countProcesses(): Promise<number>
    /** Busiest first. */
    listProcesses(limit: number): Promise<ProcessInfo[]>
}

export function toPercent(value: number): number {
    if (!Number.isFinite(value)) return 0
    return Math.round(Math.min(100, Math.max(0, value)) * 10) / 10
}

interface CoreTimes {
    idle: number
    total: number
}

function coreTimes(cpu: os.CpuInfo): CoreTimes {
    const { user, nice, sys, idle, irq } = cpu.times
    return { idle, total: user + nice + sys + idle + irq }
}

/** Busy share of each core between two readings of `os.cpus()`. */
export function cpuDelta(previous: readonly CoreTimes[], current: readonly CoreTimes[]): CpuReading {
    const perCore = current.map((now, i) => {
        const before = previous[i]
        if (!before) return 0
        const total = now.total - before.total
        if (total <= 0) return 0
        return toPercent(((total - (now.idle - before.idle)) / total) * 100)
    })
    const average = perCore.length > 0 ? perCore.reduce((sum, p) => sum + p, 0) / perCore.length : 0
    return { percent: toPercent(average), perCore, cores: current.length }
}

const PS_ARGS = ['-A', '-o', 'pid=,pcpu=,pmem=,user=,comm=']

export function parsePsOutput(stdout: string): ProcessInfo[] {
    const processes: ProcessInfo[] = []
    for (const line of stdout.split('\n')) {
        const match = /^\s*(\d+)\s+([\d.]+)\s+([\d.]+)\s+(\S+)\s+(.+?)\s*$/.exec(line)
        if (!match) continue
        const [, pid, cpu, memory, user, command] = match
        processes.push({
            pid: Number(pid),
            cpu: Number(cpu),
            memory: Number(memory),
            user: user ?? '',
            command: command ?? '',
        })
    }
    return processes
}

export class OsHostProbe implements HostProbe {
    private previous: CoreTimes[] = []

    async readCpu(): Promise<CpuReading> {
        const current = os.cpus().map(coreTimes)
        const reading = cpuDelta(this.previous, current)
        this.previous = current
        return reading
    }

    async readMemory(): Promise<MemoryReading> {
        const total = os.totalmem()
        const used = total - os.freemem()
        return { percent: toPercent(total > 0 ? (used / total) * 100 : 0), total, used }
    }

    async countProcesses(): Promise<number> {
        return (await this.readProcesses()).length
    }

    async listProcesses(limit: number): Promise<ProcessInfo[]> {
        const processes = await this.readProcesses()
        return processes.sort((a, b) => b.cpu - a.cpu || a.pid - b.pid).slice(0, limit)
    }

    private async readProcesses(): Promise<ProcessInfo[]> {
        const { stdout } = await execa('ps', PS_ARGS, { timeout: 5000 })
        return parsePsOutput(stdout)
    }
}
