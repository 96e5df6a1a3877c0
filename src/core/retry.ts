import { classifyError, isAbortError } from './errors.js'

export interface RetryOptions {
    maxRetries: number
    baseDelay: number
    maxDelay: number
    /** Aborting skips the remaining attempts and rethrows the last failure. */
    signal?: AbortSignal
    onRetry?: (error: unknown, attempt: number, delay: number) => void
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
    maxRetries: 3,
    baseDelay: 1000,
    maxDelay: 8000,
}

/** Exponential backoff capped at `maxDelay`, plus up to 10% jitter. */
export function backoffDelay(attempt: number, opts: Pick<RetryOptions, 'baseDelay' | 'maxDelay'>): number {
    const delay = Math.min(opts.baseDelay * 2 ** attempt, opts.maxDelay)
    return delay + delay * 0.1 * Math.random()
}

// Resolves false when the signal fires before the delay elapses.
function pause(ms: number, signal?: AbortSignal): Promise<boolean> {
    if (signal?.aborted) return Promise.resolve(false)
    return new Promise((resolve) => {
        const onAbort = () => {
            clearTimeout(timer)
            resolve(false)
        }
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort)
            resolve(true)
        }, ms)
        signal?.addEventListener('abort', onAbort, { once: true })
    })
}

export async function withRetry<T>(fn: () => Promise<T>, opts: RetryOptions = DEFAULT_RETRY_OPTIONS): Promise<T> {
    let attempt = 0
    for (;;) {
        try {
            return await fn()
        } catch (error) {
            if (attempt >= opts.maxRetries || classifyError(error) === 'permanent' || opts.signal?.aborted) throw error
            const delay = backoffDelay(attempt, opts)
            attempt++
            opts.onRetry?.(error, attempt, delay)
            if (!(await pause(delay, opts.signal))) throw error
        }
    }
}

export type CircuitState = 'closed' | 'open' | 'half-open'

export interface CircuitBreakerOptions {
    /** Consecutive failures that open the circuit. */
    threshold?: number
    cooldownMs?: number
    now?: () => number
}

export class CircuitBreaker {
    private state: CircuitState = 'closed'
    private consecutiveFailures = 0
    private openedAt = 0
    private readonly threshold: number
    private readonly cooldownMs: number
    private readonly now: () => number

    constructor(options: CircuitBreakerOptions = {}) {
        this.threshold = options.threshold ?? 5
        this.cooldownMs = options.cooldownMs ?? 30_000
        this.now = options.now ?? Date.now
    }

    async execute<T>(fn: () => Promise<T>): Promise<T> {
        if (this.state === 'open') {
            const remaining = this.openedAt + this.cooldownMs - this.now()
            if (remaining > 0) throw new Error(`Circuit breaker is open for another ${remaining}ms`)
            this.state = 'half-open'
        }

        try {
            const result = await fn()
            this.state = 'closed'
            this.consecutiveFailures = 0
            return result
        } catch (error) {
            // Aborted calls do not count as failures.
            if (isAbortError(error)) throw error
            this.consecutiveFailures++
            if (this.state === 'half-open' || this.consecutiveFailures >= this.threshold) {
                this.state = 'open'
                this.openedAt = this.now()
            }
            throw error
        }
    }

    getState(): CircuitState {
        return this.state
    }
}
