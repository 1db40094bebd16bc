import type { TranscriptEntry } from '../core/types.js'

export type TranscriptFormat = 'txt' | 'md'

/** UTC `YYYY-MM-DD HH:MM:SS`. */
export function formatTimestamp(at: number): string {
    return new Date(at).toISOString().slice(0, 19).replace('T', ' ')
}

export function formatTranscriptText(entries: readonly TranscriptEntry[]): string {
    const lines: string[] = []
    for (const entry of entries) {
        lines.push(`[${formatTimestamp(entry.at)}] [${entry.sessionId}] $ ${entry.command}`)
        if (entry.output) {
            for (const line of entry.output.split('\n')) lines.push(`  ${line}`)
            lines.push('')
        }
    }
    return lines.join('\n')
}

export function formatTranscriptMarkdown(entries: readonly TranscriptEntry[]): string {
    const lines = ['# Terminal Command History', '']
    let currentDate: string | undefined

    for (const entry of entries) {
        const timestamp = formatTimestamp(entry.at)
        const date = timestamp.slice(0, 10)
        if (date !== currentDate) {
            currentDate = date
            lines.push(`## ${date}`, '')
        }

        lines.push(`### ${timestamp} (Tab: ${entry.sessionId})`, '', '```bash', `$ ${entry.command}`, '```', '')
        if (entry.output) {
            lines.push('**Output:**', '', '```', entry.output, '```', '')
        }
    }
    return lines.join('\n')
}

export function formatTranscript(entries: readonly TranscriptEntry[], format: TranscriptFormat): string {
    return format === 'md' ? formatTranscriptMarkdown(entries) : formatTranscriptText(entries)
}
