import { describe, it, expect } from 'vitest'
import {
    MalformedOutputError,
    ParleyError,
    PendingApprovalError,
    StateCorruptionError,
    TransientIOError,
    classifyError,
    classifyHttpError,
    errorMessage,
    isAbortError,
    toIOError,
} from '../../../src/core/errors.js'

describe('Error classification', () => {
    it('classifies 429 and 5xx as transient', () => {
        for (const status of [429, 500, 502, 503, 504]) {
            expect(classifyHttpError(status)).toBe('transient')
        }
    })

    it('classifies client errors as permanent', () => {
        for (const status of [400, 401, 403, 404]) {
            expect(classifyHttpError(status)).toBe('permanent')
        }
    })

    it('uses the kind carried by parley errors', () => {
        expect(classifyError(new TransientIOError('disk busy'))).toBe('transient')
        expect(classifyError(new MalformedOutputError('not json'))).toBe('permanent')
        expect(classifyError(new StateCorruptionError('c1', 'bad snapshot'))).toBe('permanent')
    })

    it('classifies fetch TypeError as transient', () => {
        expect(classifyError(new TypeError('fetch failed'))).toBe('transient')
    })

    it('classifies retryable fs codes as transient', () => {
        expect(classifyError(Object.assign(new Error('busy'), { code: 'EBUSY' }))).toBe('transient')
        expect(classifyError(Object.assign(new Error('missing'), { code: 'ENOENT' }))).toBe('permanent')
    })

    it('classifies object with status', () => {
        expect(classifyError({ status: 429 })).toBe('transient')
        expect(classifyError({ status: 401 })).toBe('permanent')
    })

    it('classifies unknown error as permanent', () => {
        expect(classifyError(new Error('unknown'))).toBe('permanent')
    })
})

describe('isAbortError', () => {
    it('detects DOMException with name AbortError', () => {
        expect(isAbortError(new DOMException('The operation was aborted', 'AbortError'))).toBe(true)
    })

    it('detects Error with name AbortError', () => {
        const err = new Error('Request was aborted')
        err.name = 'AbortError'
        expect(isAbortError(err)).toBe(true)
    })

    it('returns false for everything else', () => {
        expect(isAbortError(new Error('some error'))).toBe(false)
        expect(isAbortError(null)).toBe(false)
        expect(isAbortError({ name: 'AbortError' })).toBe(false)
    })
})

describe('toIOError', () => {
    it('wraps plain errors as transient with context and cause', () => {
        const cause = new Error('EIO: i/o error')
        const wrapped = toIOError(cause, 'append to c1')
        expect(wrapped).toBeInstanceOf(TransientIOError)
        expect(wrapped.message).toBe('append to c1: EIO: i/o error')
        expect(wrapped.cause).toBe(cause)
    })

    it('passes parley errors through unchanged', () => {
        const corrupt = new StateCorruptionError('c1', 'bad')
        expect(toIOError(corrupt, 'ignored')).toBe(corrupt)
    })
})

describe('ParleyError subclasses', () => {
    it('carry names, kinds and conversation details', () => {
        const pending = new PendingApprovalError('c1', 'tok-1')
        expect(pending).toBeInstanceOf(ParleyError)
        expect(pending.name).toBe('PendingApprovalError')
        expect(pending.kind).toBe('permanent')
        expect(pending.token).toBe('tok-1')
        expect(pending.message).toBe('Conversation c1 already has a pending approval (tok-1)')

        const corrupt = new StateCorruptionError('c2', 'snapshot is torn')
        expect(corrupt.conversationId).toBe('c2')
        expect(corrupt.message).toBe('Conversation c2: snapshot is torn')
    })

    it('errorMessage stringifies non-errors', () => {
        expect(errorMessage(new Error('boom'))).toBe('boom')
        expect(errorMessage('plain')).toBe('plain')
        expect(errorMessage(42)).toBe('42')
    })
})
