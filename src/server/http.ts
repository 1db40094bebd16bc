import { type IncomingMessage, type Server, type ServerResponse, createServer } from 'node:http'
import type { AddressInfo } from 'node:net'
import { WebSocketServer } from 'ws'
import { errorMessage } from '../core/errors.js'
import type { BroadcastHub } from '../hub/broadcast-hub.js'
import type { Logger } from '../logger/index.js'
import type { CommandStats } from '../metrics/collector.js'
import type { MetricsSampler } from '../metrics/sampler.js'
import type { SessionStore } from '../session/store.js'
import { formatTranscript } from '../session/transcript.js'
import type { ShellGateway } from './gateway.js'
import { systemInfoMessage } from './protocol.js'
import { WebSocketChannel } from './ws-channel.js'

export interface HttpResponse {
    status: number
    headers: Record<string, string>
    body: string
}

export interface RouteDeps {
    store: SessionStore
    hub: BroadcastHub
    sampler: Pick<MetricsSampler, 'latest'>
    stats: CommandStats
    startedAt: number
    now?: () => number
}

function json(status: number, payload: unknown): HttpResponse {
    return { status, headers: { 'Content-Type': 'application/json' }, body: JSON.stringify(payload) }
}

const EXPORT_TYPES = {
    txt: { contentType: 'text/plain; charset=utf-8', filename: 'terminal_history.txt' },
    md: { contentType: 'text/markdown; charset=utf-8', filename: 'terminal_history.md' },
} as const

function isExportFormat(value: string): value is keyof typeof EXPORT_TYPES {
    return value === 'txt' || value === 'md'
}

export function routeRequest(method: string, rawUrl: string, deps: RouteDeps): HttpResponse {
    const url = new URL(rawUrl, 'http://localhost')
    if (method !== 'GET') return json(404, { error: 'Not found' })

    switch (url.pathname) {
        case '/api/export-logs': {
            const format = url.searchParams.get('format') ?? 'txt'
            if (!isExportFormat(format)) return json(400, { error: `Unsupported format: ${format}` })
            const tabId = url.searchParams.get('tab_id') ?? undefined
            const { contentType, filename } = EXPORT_TYPES[format]
            return {
                status: 200,
                headers: { 'Content-Type': contentType, 'Content-Disposition': `attachment; filename="${filename}"` },
                body: formatTranscript(deps.store.getTranscript(tabId), format),
            }
        }
        case '/api/system-info':
            return json(200, systemInfoMessage(deps.sampler.latest()).data)
        case '/api/stats':
            return json(200, deps.stats.report())
        case '/health': {
            const now = deps.now ?? Date.now
            return json(200, {
                status: 'ok',
                sessions: deps.store.size,
                channels: deps.hub.size,
                uptimeMs: now() - deps.startedAt,
            })
        }
        default:
            return json(404, { error: 'Not found' })
    }
}

export interface ShellServerDeps extends RouteDeps {
    gateway: ShellGateway
    logger: Logger
}

/** One HTTP server carrying both the JSON routes and the WebSocket endpoint. */
export class ShellServer {
    private http: Server
    private wss: WebSocketServer

    constructor(private deps: ShellServerDeps) {
        this.http = createServer((req, res) => this.handleHttp(req, res))
        this.wss = new WebSocketServer({ server: this.http })
        this.wss.on('connection', (socket) => {
            const channel = new WebSocketChannel(socket)
            deps.gateway.connect(channel)

            socket.on('message', (data) => {
                deps.gateway.receive(channel.id, data.toString()).catch((error: unknown) => {
                    deps.logger.error({ channelId: channel.id, error: errorMessage(error) }, 'message handling failed')
                })
            })
            socket.on('close', () => deps.gateway.disconnect(channel.id))
            socket.on('error', (error) => {
                deps.logger.warn({ channelId: channel.id, error: error.message }, 'socket error')
            })
        })
    }

    listen(port: number, host: string): Promise<AddressInfo> {
        return new Promise((resolve, reject) => {
            this.http.once('error', reject)
            this.http.listen(port, host, () => {
                this.http.off('error', reject)
                const address = this.http.address()
                if (address === null || typeof address === 'string') {
                    reject(new Error('Server is not listening on a TCP port'))
                    return
                }
                this.deps.logger.info({ host: address.address, port: address.port }, 'server listening')
                resolve(address)
            })
        })
    }

    async close(): Promise<void> {
        this.deps.hub.closeAll()
        await new Promise<void>((resolve) => this.wss.close(() => resolve()))
        await new Promise<void>((resolve, reject) => {
            this.http.close((error) => (error ? reject(error) : resolve()))
            this.http.closeAllConnections()
        })
        this.deps.logger.info('server stopped')
    }

    private handleHttp(req: IncomingMessage, res: ServerResponse): void {
        let response: HttpResponse
        try {
            response = routeRequest(req.method ?? 'GET', req.url ?? '/', this.deps)
        } catch (error) {
            this.deps.logger.error({ url: req.url, error: errorMessage(error) }, 'request failed')
            response = json(500, { error: errorMessage(error) })
        }
        res.writeHead(response.status, response.headers)
        res.end(response.body)
    }
}
