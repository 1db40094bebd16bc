import type { DirectoryEntry, FileStat } from '../core/fs.js'

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec']

export function modeString(stat: Pick<FileStat, 'isDirectory' | 'mode'>): string {
    const bits = 'rwxrwxrwx'
    let out = stat.isDirectory ? 'd' : '-'
    for (let i = 0; i < 9; i++) {
        out += stat.mode & (1 << (8 - i)) ? bits.charAt(i) : '-'
    }
    return out
}

function pad2(n: number): string {
    return String(n).padStart(2, '0')
}

export function formatMtime(date: Date): string {
    return `${MONTHS[date.getMonth()] ?? '???'} ${pad2(date.getDate())} ${pad2(date.getHours())}:${pad2(date.getMinutes())}`
}

export function displayName(entry: DirectoryEntry): string {
    return entry.isDirectory ? `${entry.name}/` : entry.name
}

export function formatLongLine(name: string, stat: FileStat): string {
    return `${modeString(stat)} ${String(stat.size).padStart(8)} ${formatMtime(stat.mtime)} ${name}`
}

export function byName(a: DirectoryEntry, b: DirectoryEntry): number {
    if (a.name < b.name) return -1
    if (a.name > b.name) return 1
    return 0
}
