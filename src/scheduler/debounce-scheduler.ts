import type { Batch, ConversationId, Message } from '../core/types.js'
import type { Logger } from '../logger/index.js'
import { systemTimers, type TimerFactory, type TimerHandle } from './timers.js'

export type BatchCloseReason = 'quiet' | 'max-size' | 'recovery'

export type ScheduleOutcome = 'opened' | 'extended' | 'closed' | 'held'

export type BatchHandler = (batch: Batch, reason: BatchCloseReason) => void

export interface DebounceSchedulerOptions {
    quietWindowMs: number
    maxBatchSize: number
    onBatch: BatchHandler
    /** A blocked conversation keeps appending to history but never opens a batch. */
    isBlocked?: (conversationId: ConversationId) => boolean
    timers?: TimerFactory
    logger: Logger
}

interface OpenBatch {
    batch: Batch
    timer: TimerHandle | null
}

export class DebounceScheduler {
    private open = new Map<ConversationId, OpenBatch>()
    private readonly timers: TimerFactory

    constructor(private options: DebounceSchedulerOptions) {
        if (options.maxBatchSize < 1) throw new Error('maxBatchSize must be at least 1')
        this.timers = options.timers ?? systemTimers
    }

    onMessage(conversationId: ConversationId, message: Message): ScheduleOutcome {
        const existing = this.open.get(conversationId)
        const now = new Date().toISOString()

        if (!existing) {
            if (this.options.isBlocked?.(conversationId)) {
                this.options.logger.debug({ conversationId }, 'scheduler:held')
                return 'held'
            }
            const entry: OpenBatch = {
                batch: { conversationId, messages: [message], open: true, openedAt: now, extendedAt: now },
                timer: null,
            }
            this.open.set(conversationId, entry)
            if (this.reachedMax(entry)) {
                this.close(conversationId, entry, 'max-size')
                return 'closed'
            }
            this.arm(conversationId, entry)
            return 'opened'
        }

        existing.batch.messages.push(message)
        existing.batch.extendedAt = now
        if (this.reachedMax(existing)) {
            this.close(conversationId, existing, 'max-size')
            return 'closed'
        }
        this.arm(conversationId, existing)
        return 'extended'
    }

    /** Reopens a batch from persisted markers. `arm` starts a fresh quiet window. */
    restore(conversationId: ConversationId, messages: Message[], openedAt: string, arm = false): void {
        if (messages.length === 0) return
        this.cancel(conversationId)
        const entry: OpenBatch = {
            batch: { conversationId, messages: [...messages], open: true, openedAt, extendedAt: openedAt },
            timer: null,
        }
        this.open.set(conversationId, entry)
        if (arm) this.arm(conversationId, entry)
    }

    flush(conversationId: ConversationId, reason: BatchCloseReason = 'recovery'): boolean {
        const entry = this.open.get(conversationId)
        if (!entry) return false
        this.close(conversationId, entry, reason)
        return true
    }

    cancel(conversationId: ConversationId): boolean {
        const entry = this.open.get(conversationId)
        if (!entry) return false
        entry.timer?.cancel()
        entry.batch.open = false
        this.open.delete(conversationId)
        this.options.logger.debug({ conversationId, discarded: entry.batch.messages.length }, 'scheduler:cancelled')
        return true
    }

    openBatch(conversationId: ConversationId): Batch | null {
        return this.open.get(conversationId)?.batch ?? null
    }

    dispose(): void {
        for (const entry of this.open.values()) entry.timer?.cancel()
        this.open.clear()
    }

    private reachedMax(entry: OpenBatch): boolean {
        return entry.batch.messages.length >= this.options.maxBatchSize
    }

    private arm(conversationId: ConversationId, entry: OpenBatch): void {
        entry.timer?.cancel()
        entry.timer = this.timers.schedule(this.options.quietWindowMs, () => {
            // A cancelled or superseded batch must never close from a stale timer.
            if (this.open.get(conversationId) !== entry || !entry.batch.open) return
            this.close(conversationId, entry, 'quiet')
        })
    }

    private close(conversationId: ConversationId, entry: OpenBatch, reason: BatchCloseReason): void {
        entry.timer?.cancel()
        entry.timer = null
        entry.batch.open = false
        this.open.delete(conversationId)
        this.options.logger.debug({ conversationId, size: entry.batch.messages.length, reason }, 'scheduler:closed')
        try {
            this.options.onBatch(entry.batch, reason)
        } catch (error) {
            this.options.logger.error({ conversationId, error }, 'scheduler:handler-failed')
        }
    }
}
