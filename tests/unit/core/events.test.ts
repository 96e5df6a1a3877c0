import { describe, it, expect, vi } from 'vitest'
import { TypedEventEmitter } from '../../../src/core/events.js'

describe('TypedEventEmitter', () => {
    it('emits and handles events', () => {
        const emitter = new TypedEventEmitter()
        const handler = vi.fn()

        emitter.on('reply:sent', handler)
        emitter.emit('reply:sent', { conversationId: 'c1', length: 12 })

        expect(handler).toHaveBeenCalledWith({ conversationId: 'c1', length: 12 })
    })

    it('supports multiple handlers', () => {
        const emitter = new TypedEventEmitter()
        const h1 = vi.fn()
        const h2 = vi.fn()

        emitter.on('batch:closed', h1)
        emitter.on('batch:closed', h2)
        emitter.emit('batch:closed', { conversationId: 'c1', size: 2, reason: 'quiet' })

        expect(h1).toHaveBeenCalledTimes(1)
        expect(h2).toHaveBeenCalledTimes(1)
    })

    it('removes handler with off', () => {
        const emitter = new TypedEventEmitter()
        const handler = vi.fn()

        emitter.on('approval:requested', handler)
        emitter.off('approval:requested', handler)
        emitter.emit('approval:requested', { conversationId: 'c1', token: 't1' })

        expect(handler).not.toHaveBeenCalled()
    })

    it('removeAll clears all handlers', () => {
        const emitter = new TypedEventEmitter()
        const handler = vi.fn()

        emitter.on('message:ingested', handler)
        emitter.removeAll()
        emitter.emit('message:ingested', { conversationId: 'c1', dedupKey: 'k', duplicate: false })

        expect(handler).not.toHaveBeenCalled()
    })

    it('swallows handler exceptions', () => {
        const emitter = new TypedEventEmitter()
        const badHandler = vi.fn(() => {
            throw new Error('boom')
        })
        const goodHandler = vi.fn()

        emitter.on('conversation:quarantined', badHandler)
        emitter.on('conversation:quarantined', goodHandler)
        emitter.emit('conversation:quarantined', { conversationId: 'c1', reason: 'corrupt' })

        expect(badHandler).toHaveBeenCalledTimes(1)
        expect(goodHandler).toHaveBeenCalledTimes(1)
    })
})
