import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'
import { DebounceScheduler, type BatchHandler } from '../../../src/scheduler/debounce-scheduler.js'
import type { Batch } from '../../../src/core/types.js'
import { makeMessage, silentLogger } from '../../helpers/fixtures.js'

interface Closed {
    batch: Batch
    reason: string
}

function createScheduler(options: { quietWindowMs?: number; maxBatchSize?: number; blocked?: Set<string> } = {}) {
    const closed: Closed[] = []
    const onBatch: BatchHandler = (batch, reason) => closed.push({ batch, reason })
    const scheduler = new DebounceScheduler({
        quietWindowMs: options.quietWindowMs ?? 3000,
        maxBatchSize: options.maxBatchSize ?? 8,
        onBatch,
        isBlocked: (id) => options.blocked?.has(id) ?? false,
        logger: silentLogger,
    })
    return { scheduler, closed }
}

describe('DebounceScheduler', () => {
    beforeEach(() => {
        vi.useFakeTimers()
    })

    afterEach(() => {
        vi.useRealTimers()
    })

    it('merges messages inside the quiet window and closes a full window after the last one', () => {
        const { scheduler, closed } = createScheduler({ quietWindowMs: 3000 })

        expect(scheduler.onMessage('c1', makeMessage('c1', 'Is it available?'))).toBe('opened')
        vi.advanceTimersByTime(1000)
        expect(scheduler.onMessage('c1', makeMessage('c1', 'Also is it negotiable?'))).toBe('extended')

        vi.advanceTimersByTime(2999)
        expect(closed).toHaveLength(0)

        vi.advanceTimersByTime(1)
        expect(closed).toHaveLength(1)
        expect(closed[0]?.reason).toBe('quiet')
        expect(closed[0]?.batch.messages.map((m) => m.text)).toEqual(['Is it available?', 'Also is it negotiable?'])
        expect(closed[0]?.batch.open).toBe(false)
        expect(scheduler.openBatch('c1')).toBeNull()
    })

    it('closes at the max size and starts a fresh batch with the next message', () => {
        const { scheduler, closed } = createScheduler({ maxBatchSize: 5 })
        const outcomes = [1, 2, 3, 4, 5, 6].map((n) => scheduler.onMessage('c1', makeMessage('c1', `message ${n}`)))

        expect(outcomes).toEqual(['opened', 'extended', 'extended', 'extended', 'closed', 'opened'])
        expect(closed).toHaveLength(1)
        expect(closed[0]?.reason).toBe('max-size')
        expect(closed[0]?.batch.messages).toHaveLength(5)
        expect(scheduler.openBatch('c1')?.messages.map((m) => m.text)).toEqual(['message 6'])
    })

    it('closes immediately when a single message fills the batch', () => {
        const { scheduler, closed } = createScheduler({ maxBatchSize: 1 })
        expect(scheduler.onMessage('c1', makeMessage('c1', 'hi'))).toBe('closed')
        expect(closed).toHaveLength(1)
        vi.advanceTimersByTime(10_000)
        expect(closed).toHaveLength(1)
    })

    it('keeps conversations independent', () => {
        const { scheduler, closed } = createScheduler({ quietWindowMs: 3000 })
        scheduler.onMessage('c1', makeMessage('c1', 'first'))
        vi.advanceTimersByTime(2000)
        scheduler.onMessage('c2', makeMessage('c2', 'second'))

        vi.advanceTimersByTime(1000)
        expect(closed.map((c) => c.batch.conversationId)).toEqual(['c1'])
        vi.advanceTimersByTime(2000)
        expect(closed.map((c) => c.batch.conversationId)).toEqual(['c1', 'c2'])
    })

    it('holds messages for a blocked conversation without opening a batch', () => {
        const blocked = new Set(['c1'])
        const { scheduler, closed } = createScheduler({ blocked })

        expect(scheduler.onMessage('c1', makeMessage('c1', 'any update?'))).toBe('held')
        expect(scheduler.openBatch('c1')).toBeNull()
        vi.advanceTimersByTime(10_000)
        expect(closed).toHaveLength(0)
    })

    it('cancel discards the open batch without closing it', () => {
        const { scheduler, closed } = createScheduler()
        scheduler.onMessage('c1', makeMessage('c1', 'hi'))

        expect(scheduler.cancel('c1')).toBe(true)
        expect(scheduler.cancel('c1')).toBe(false)
        vi.advanceTimersByTime(10_000)
        expect(closed).toHaveLength(0)
    })

    it('restores a persisted batch and flushes it for recovery', () => {
        const { scheduler, closed } = createScheduler()
        const messages = [makeMessage('c1', 'one'), makeMessage('c1', 'two')]

        scheduler.restore('c1', messages, '2024-01-01T12:00:00.000Z')
        expect(scheduler.openBatch('c1')?.openedAt).toBe('2024-01-01T12:00:00.000Z')
        expect(scheduler.flush('c1')).toBe(true)

        expect(closed).toHaveLength(1)
        expect(closed[0]?.reason).toBe('recovery')
        expect(closed[0]?.batch.messages).toEqual(messages)
        expect(scheduler.flush('c1')).toBe(false)
    })

    it('closes a requeued batch after a fresh quiet window', () => {
        const { scheduler, closed } = createScheduler({ quietWindowMs: 3000 })
        scheduler.restore('c1', [makeMessage('c1', 'one')], '2024-01-01T12:00:00.000Z', true)

        vi.advanceTimersByTime(1000)
        expect(scheduler.onMessage('c1', makeMessage('c1', 'two'))).toBe('extended')
        vi.advanceTimersByTime(2999)
        expect(closed).toHaveLength(0)

        vi.advanceTimersByTime(1)
        expect(closed).toHaveLength(1)
        expect(closed[0]?.reason).toBe('quiet')
        expect(closed[0]?.batch.messages.map((m) => m.text)).toEqual(['one', 'two'])
    })

    it('logs and survives a throwing batch handler', () => {
        const scheduler = new DebounceScheduler({
            quietWindowMs: 100,
            maxBatchSize: 8,
            onBatch: () => {
                throw new Error('handler exploded')
            },
            logger: silentLogger,
        })
        scheduler.onMessage('c1', makeMessage('c1', 'hi'))
        expect(() => vi.advanceTimersByTime(100)).not.toThrow()
        expect(scheduler.openBatch('c1')).toBeNull()
    })

    it('dispose cancels every timer', () => {
        const { scheduler, closed } = createScheduler()
        scheduler.onMessage('c1', makeMessage('c1', 'a'))
        scheduler.onMessage('c2', makeMessage('c2', 'b'))
        expect(scheduler.openBatch('c2')?.messages).toHaveLength(1)

        scheduler.dispose()
        vi.advanceTimersByTime(10_000)
        expect(closed).toHaveLength(0)
        expect(scheduler.openBatch('c1')).toBeNull()
        expect(scheduler.openBatch('c2')).toBeNull()
    })

    it('rejects a max batch size below one', () => {
        expect(() => createScheduler({ maxBatchSize: 0 })).toThrow('maxBatchSize must be at least 1')
    })
})
