export type SessionRemovalReason = 'closed' | 'expired' | 'transport'

export type EventMap = {
    'session:created': { sessionId: string }
    'session:removed': { sessionId: string; reason: SessionRemovalReason }
    'command:start': { sessionId: string; name: string }
    'command:complete': { sessionId: string; name: string; duration: number; success: boolean }
    'channel:closed': { channelId: string; sessions: string[] }
}

type EventHandler<T> = (data: T) => void

type HandlerSets = { [K in keyof EventMap]?: Set<EventHandler<EventMap[K]>> }

export class TypedEventEmitter {
    private handlers: HandlerSets = {}
    private onListenerError?: (event: keyof EventMap, error: unknown) => void

    constructor(onListenerError?: (event: keyof EventMap, error: unknown) => void) {
        this.onListenerError = onListenerError
    }

    on<K extends keyof EventMap>(event: K, handler: EventHandler<EventMap[K]>): void {
        this.getSet(event).add(handler)
    }

    off<K extends keyof EventMap>(event: K, handler: EventHandler<EventMap[K]>): void {
        this.getSet(event).delete(handler)
    }

    emit<K extends keyof EventMap>(event: K, data: EventMap[K]): void {
        for (const handler of [...this.getSet(event)]) {
            try {
                handler(data)
            } catch (error) {
                // listeners are cross-cutting; report and keep going
                this.onListenerError?.(event, error)
            }
        }
    }

    removeAll(): void {
        this.handlers = {}
    }

    private getSet<K extends keyof EventMap>(event: K): Set<EventHandler<EventMap[K]>> {
        const handlers: { [P in K]?: Set<EventHandler<EventMap[P]>> } = this.handlers
        const existing = handlers[event]
        if (existing) return existing
        const created = new Set<EventHandler<EventMap[K]>>()
        handlers[event] = created
        return created
    }
}
