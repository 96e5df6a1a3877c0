/**
 * Serializes async work per key. Work for different keys runs independently.
 */
export class PerKeyLock<K = string> {
    private tails = new Map<K, Promise<void>>()

    async runExclusive<T>(key: K, fn: () => Promise<T>): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve()
        let release: () => void = () => {}
        const current = new Promise<void>((resolve) => {
            release = resolve
        })
        const tail = previous.then(() => current)
        this.tails.set(key, tail)

        await previous
        try {
            return await fn()
        } finally {
            release()
            if (this.tails.get(key) === tail) this.tails.delete(key)
        }
    }

    isLocked(key: K): boolean {
        return this.tails.has(key)
    }

    /** Resolves once every queued task has finished. */
    async drain(): Promise<void> {
        while (this.tails.size > 0) {
            await Promise.all([...this.tails.values()])
        }
    }
}
