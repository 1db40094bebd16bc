export interface LockHandle {
    release(): void
}

/**
 * FIFO mutex per key. Holders of the same key run strictly one after another
 * in acquisition order; different keys never wait on each other.
 */
export class KeyedLock {
    private tails = new Map<string, Promise<void>>()

    async acquire(key: string): Promise<LockHandle> {
        const previous = this.tails.get(key) ?? Promise.resolve()

        let releaseNext: () => void = () => {}
        const current = new Promise<void>((resolve) => {
            releaseNext = resolve
        })
        const tail = previous.then(() => current)
        this.tails.set(key, tail)

        await previous

        let released = false
        return {
            release: () => {
                if (released) return
                released = true
                releaseNext()
                if (this.tails.get(key) === tail) this.tails.delete(key)
            },
        }
    }

    async run<T>(key: string, task: () => Promise<T>): Promise<T> {
        const handle = await this.acquire(key)
        try {
            return await task()
        } finally {
            handle.release()
        }
    }
}
