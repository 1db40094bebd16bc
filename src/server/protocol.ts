import { z } from 'zod'
import { err, ok, type Result } from '../core/result.js'
import type { MetricsSnapshot, OutputEvent, OutputKind } from '../core/types.js'

const TabId = z.string().min(1).max(128).default('default')

export const InboundSchema = z.discriminatedUnion('event', [
    z.object({ event: z.literal('command'), data: z.object({ command: z.string(), tab_id: TabId }) }),
    z.object({ event: z.literal('autocomplete'), data: z.object({ command: z.string(), tab_id: TabId }) }),
    z.object({ event: z.literal('get_history'), data: z.object({ tab_id: TabId }) }),
    z.object({ event: z.literal('new_tab'), data: z.object({ tab_id: TabId }) }),
    z.object({ event: z.literal('close_tab'), data: z.object({ tab_id: TabId }) }),
])

export type InboundMessage = z.infer<typeof InboundSchema>

export type OutboundMessage =
    | { event: 'output'; data: { tab_id: string; output: string; type: OutputKind } }
    | { event: 'directory_change'; data: { tab_id: string; directory: string } }
    | { event: 'autocomplete_suggestions'; data: { tab_id: string; suggestions: string[] } }
    | { event: 'history'; data: { tab_id: string; history: string[] } }
    | {
          event: 'system_info'
          data: {
              cpu: { percent: number; cores: number; per_core: number[] }
              memory: { percent: number; total: number; used: number }
              process_count: number
              timestamp: number
          }
      }
    | { event: 'error'; data: { message: string } }

export function parseInbound(raw: string): Result<InboundMessage, string> {
    let frame: unknown
    try {
        frame = JSON.parse(raw)
    } catch {
        return err('Invalid JSON')
    }

    const parsed = InboundSchema.safeParse(frame)
    if (!parsed.success) {
        const issue = parsed.error.issues[0]
        const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : ''
        return err(`Invalid message: ${where}${issue?.message ?? 'unknown format'}`)
    }
    return ok(parsed.data)
}

export function toOutbound(event: OutputEvent): OutboundMessage {
    switch (event.type) {
        case 'output':
            return { event: 'output', data: { tab_id: event.tabId, output: event.output, type: event.kind } }
        case 'directory_change':
            return { event: 'directory_change', data: { tab_id: event.tabId, directory: event.directory } }
    }
}

export function systemInfoMessage(snapshot: MetricsSnapshot): OutboundMessage {
    return {
        event: 'system_info',
        data: {
            cpu: { percent: snapshot.cpuPercent, cores: snapshot.cores, per_core: snapshot.perCore },
            memory: { percent: snapshot.memoryPercent, total: snapshot.memoryTotal, used: snapshot.memoryUsed },
            process_count: snapshot.processCount,
            timestamp: snapshot.timestamp,
        },
    }
}

export function errorMessageFrame(message: string): OutboundMessage {
    return { event: 'error', data: { message } }
}
