import { describe, expect, it } from 'vitest'
import { errorMessageFrame, parseInbound, systemInfoMessage, toOutbound } from '../../../src/server/protocol.js'
import { STATIC_SNAPSHOT } from '../../helpers/fakes.js'

describe('parseInbound', () => {
    it('accepts command frames', () => {
        const result = parseInbound(JSON.stringify({ event: 'command', data: { command: 'ls -la', tab_id: 'tab-2' } }))
        expect(result).toEqual({ ok: true, value: { event: 'command', data: { command: 'ls -la', tab_id: 'tab-2' } } })
    })

    it('defaults the tab id', () => {
        const result = parseInbound(JSON.stringify({ event: 'get_history', data: {} }))
        expect(result).toEqual({ ok: true, value: { event: 'get_history', data: { tab_id: 'default' } } })
    })

    it('rejects malformed JSON', () => {
        expect(parseInbound('{oops')).toEqual({ ok: false, error: 'Invalid JSON' })
    })

    it('names the offending field', () => {
        expect(parseInbound(JSON.stringify({ event: 'command', data: { tab_id: 't' } }))).toEqual({
            ok: false,
            error: 'Invalid message: data.command: Required',
        })
        expect(parseInbound(JSON.stringify({ event: 'new_tab', data: { tab_id: '' } }))).toEqual({
            ok: false,
            error: 'Invalid message: data.tab_id: String must contain at least 1 character(s)',
        })
    })

    it('rejects unknown events', () => {
        const result = parseInbound(JSON.stringify({ event: 'reboot', data: {} }))
        expect(result.ok).toBe(false)
        if (!result.ok) expect(result.error.startsWith('Invalid message: event: Invalid discriminator value')).toBe(true)
    })
})

describe('outbound frames', () => {
    it('maps engine events to snake_case frames', () => {
        expect(toOutbound({ type: 'output', tabId: 't', output: 'hi', kind: 'result' })).toEqual({
            event: 'output',
            data: { tab_id: 't', output: 'hi', type: 'result' },
        })
        expect(toOutbound({ type: 'directory_change', tabId: 't', directory: '/srv' })).toEqual({
            event: 'directory_change',
            data: { tab_id: 't', directory: '/srv' },
        })
    })

    it('builds system info from a snapshot', () => {
        expect(systemInfoMessage(STATIC_SNAPSHOT)).toEqual({
            event: 'system_info',
            data: {
                cpu: { percent: 12.5, cores: 2, per_core: [10, 15] },
                memory: { percent: 50, total: 8 * 1024 * 1024 * 1024, used: 4 * 1024 * 1024 * 1024 },
                process_count: 42,
                timestamp: 1_700_000_000_000,
            },
        })
    })

    it('wraps error text', () => {
        expect(errorMessageFrame('nope')).toEqual({ event: 'error', data: { message: 'nope' } })
    })
})
