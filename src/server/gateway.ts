import { errorMessage } from '../core/errors.js'
import type { Autocompleter } from '../dispatcher/autocomplete.js'
import type { CommandDispatcher } from '../dispatcher/dispatcher.js'
import type { BroadcastHub, Channel } from '../hub/broadcast-hub.js'
import type { Logger } from '../logger/index.js'
import type { MetricsSampler } from '../metrics/sampler.js'
import type { Session, SessionStore } from '../session/store.js'
import { type InboundMessage, errorMessageFrame, parseInbound, systemInfoMessage } from './protocol.js'

export interface GatewayDeps {
    dispatcher: CommandDispatcher
    autocompleter: Autocompleter
    store: SessionStore
    hub: BroadcastHub
    sampler: MetricsSampler
    logger: Logger
}

/** Turns inbound frames from any transport into calls on the engine. */
export class ShellGateway {
    constructor(private deps: GatewayDeps) {}

    connect(channel: Channel): void {
        const { hub, sampler } = this.deps
        hub.attach(channel)
        hub.sendToChannel(channel.id, systemInfoMessage(sampler.latest()))
    }

    disconnect(channelId: string): void {
        this.deps.hub.detach(channelId)
    }

    async receive(channelId: string, raw: string): Promise<void> {
        const parsed = parseInbound(raw)
        if (!parsed.ok) {
            this.deps.logger.debug({ channelId, error: parsed.error }, 'rejected frame')
            this.deps.hub.sendToChannel(channelId, errorMessageFrame(parsed.error))
            return
        }

        try {
            await this.route(channelId, parsed.value)
        } catch (error) {
            this.deps.logger.error({ channelId, event: parsed.value.event, error: errorMessage(error) }, 'message handling failed')
            this.deps.hub.sendToChannel(channelId, errorMessageFrame(errorMessage(error)))
        }
    }

    private async route(channelId: string, message: InboundMessage): Promise<void> {
        const { dispatcher, autocompleter, store, hub } = this.deps
        const tabId = message.data.tab_id

        switch (message.event) {
            case 'command': {
                this.attachTab(tabId, channelId)
                hub.deliver(await dispatcher.handle(tabId, message.data.command))
                return
            }
            case 'autocomplete': {
                const session = this.attachTab(tabId, channelId)
                const suggestions = await autocompleter.suggest(message.data.command, session.currentDirectory)
                hub.sendTo(tabId, { event: 'autocomplete_suggestions', data: { tab_id: tabId, suggestions } })
                return
            }
            case 'get_history': {
                this.attachTab(tabId, channelId)
                hub.sendTo(tabId, { event: 'history', data: { tab_id: tabId, history: store.getHistory(tabId) } })
                return
            }
            case 'new_tab': {
                const session = this.attachTab(tabId, channelId)
                hub.sendTo(tabId, { event: 'directory_change', data: { tab_id: tabId, directory: session.currentDirectory } })
                return
            }
            case 'close_tab': {
                hub.unbind(tabId)
                store.remove(tabId, 'closed')
                return
            }
        }
    }

    private attachTab(tabId: string, channelId: string): Session {
        this.deps.hub.bind(tabId, channelId)
        return this.deps.store.getOrCreate(tabId)
    }
}
