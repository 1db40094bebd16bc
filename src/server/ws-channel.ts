import { randomUUID } from 'node:crypto'
import { WebSocket } from 'ws'
import { TransportError } from '../core/errors.js'
import type { Channel } from '../hub/broadcast-hub.js'
import type { OutboundMessage } from './protocol.js'

export class WebSocketChannel implements Channel {
    readonly id: string

    constructor(
        private socket: WebSocket,
        id: string = randomUUID()
    ) {
        this.id = id
    }

    send(message: OutboundMessage): Promise<void> {
        if (this.socket.readyState !== WebSocket.OPEN) {
            return Promise.reject(new TransportError(`Channel ${this.id} is closed`))
        }
        return new Promise((resolve, reject) => {
            this.socket.send(JSON.stringify(message), (error) => {
                if (error) reject(new TransportError(`Channel ${this.id} write failed: ${error.message}`, { cause: error }))
                else resolve()
            })
        })
    }

    close(): void {
        if (this.socket.readyState === WebSocket.OPEN || this.socket.readyState === WebSocket.CONNECTING) {
            this.socket.close(1001, 'server closing')
        }
    }
}
