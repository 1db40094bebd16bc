import { TransportError, errorMessage } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import type { MetricsSnapshot, OutputEvent } from '../core/types.js'
import type { Logger } from '../logger/index.js'
import { type OutboundMessage, systemInfoMessage, toOutbound } from '../server/protocol.js'
import type { SessionStore } from '../session/store.js'

/** One client connection. A rejected `send` means the connection is gone. */
export interface Channel {
    readonly id: string
    send(message: OutboundMessage): Promise<void>
    close(): void
}

/**
 * Tracks connected channels and which tabs each one hosts. Metrics go to
 * every channel; session output only to the channel bound to that tab.
 * Delivery is best effort: a failed write drops the channel and tears down
 * the sessions it hosted.
 */
export class BroadcastHub {
    private channels = new Map<string, Channel>()
    private bindings = new Map<string, string>()

    constructor(
        private store: SessionStore,
        private eventBus: TypedEventEmitter,
        private logger: Logger
    ) {}

    attach(channel: Channel): void {
        this.channels.set(channel.id, channel)
        this.logger.info({ channelId: channel.id, channels: this.channels.size }, 'client connected')
    }

    /** Orderly disconnect: hosted sessions enter their liveness window. */
    detach(channelId: string): string[] {
        if (!this.channels.delete(channelId)) return []
        const tabs = this.unbindChannel(channelId)
        for (const tab of tabs) this.store.release(tab)
        this.logger.info({ channelId, channels: this.channels.size }, 'client disconnected')
        this.eventBus.emit('channel:closed', { channelId, sessions: tabs })
        return tabs
    }

    bind(tabId: string, channelId: string): void {
        if (!this.channels.has(channelId)) {
            throw new TransportError(`Channel ${channelId} is not connected`)
        }
        this.bindings.set(tabId, channelId)
    }

    unbind(tabId: string): void {
        this.bindings.delete(tabId)
    }

    channelFor(tabId: string): string | undefined {
        return this.bindings.get(tabId)
    }

    tabsOf(channelId: string): string[] {
        const tabs: string[] = []
        for (const [tab, owner] of this.bindings) if (owner === channelId) tabs.push(tab)
        return tabs.sort()
    }

    get size(): number {
        return this.channels.size
    }

    /** Returns false when the tab has no live channel. */
    sendTo(tabId: string, message: OutboundMessage): boolean {
        const channelId = this.channelFor(tabId)
        if (channelId === undefined) return false
        return this.sendToChannel(channelId, message)
    }

    sendToChannel(channelId: string, message: OutboundMessage): boolean {
        const channel = this.channels.get(channelId)
        if (!channel) return false
        this.write(channel, message)
        return true
    }

    deliver(events: readonly OutputEvent[]): void {
        for (const event of events) {
            if (!this.sendTo(event.tabId, toOutbound(event))) {
                this.logger.debug({ tabId: event.tabId, type: event.type }, 'dropped event for unbound tab')
            }
        }
    }

    broadcast(message: OutboundMessage): number {
        const recipients = [...this.channels.values()]
        for (const channel of recipients) this.write(channel, message)
        return recipients.length
    }

    broadcastMetrics(snapshot: MetricsSnapshot): number {
        return this.broadcast(systemInfoMessage(snapshot))
    }

    closeAll(): void {
        for (const channel of [...this.channels.values()]) {
            channel.close()
            this.detach(channel.id)
        }
    }

    private write(channel: Channel, message: OutboundMessage): void {
        channel.send(message).catch((error: unknown) => this.teardown(channel, error))
    }

    private teardown(channel: Channel, error: unknown): void {
        if (this.channels.get(channel.id) !== channel) return
        this.channels.delete(channel.id)
        const tabs = this.unbindChannel(channel.id)
        this.logger.warn({ channelId: channel.id, sessions: tabs, error: errorMessage(error) }, 'channel write failed')
        for (const tab of tabs) this.store.remove(tab, 'transport')
        channel.close()
        this.eventBus.emit('channel:closed', { channelId: channel.id, sessions: tabs })
    }

    private unbindChannel(channelId: string): string[] {
        const tabs = this.tabsOf(channelId)
        for (const tab of tabs) this.bindings.delete(tab)
        return tabs
    }
}
