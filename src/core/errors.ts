export type ErrorKind = 'transient' | 'permanent'

export class ParleyError extends Error {
    readonly kind: ErrorKind

    constructor(message: string, kind: ErrorKind, options?: ErrorOptions) {
        super(message, options)
        this.name = 'ParleyError'
        this.kind = kind
    }
}

export class TransientIOError extends ParleyError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'transient', options)
        this.name = 'TransientIOError'
    }
}

export class MalformedOutputError extends ParleyError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'permanent', options)
        this.name = 'MalformedOutputError'
    }
}

export class StateCorruptionError extends ParleyError {
    readonly conversationId: string

    constructor(conversationId: string, message: string, options?: ErrorOptions) {
        super(`Conversation ${conversationId}: ${message}`, 'permanent', options)
        this.name = 'StateCorruptionError'
        this.conversationId = conversationId
    }
}

export class PendingApprovalError extends ParleyError {
    readonly conversationId: string
    readonly token: string

    constructor(conversationId: string, token: string) {
        super(`Conversation ${conversationId} already has a pending approval (${token})`, 'permanent')
        this.name = 'PendingApprovalError'
        this.conversationId = conversationId
        this.token = token
    }
}

export function classifyHttpError(status: number): ErrorKind {
    if ([429, 500, 502, 503, 504].includes(status)) return 'transient'
    return 'permanent'
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message
    return String(error)
}

export function isAbortError(error: unknown): boolean {
    if (error instanceof DOMException && error.name === 'AbortError') return true
    if (error instanceof Error && error.name === 'AbortError') return true
    return false
}

const TRANSIENT_FS_CODES = new Set(['EAGAIN', 'EBUSY', 'EMFILE', 'ENFILE', 'EIO', 'ETIMEDOUT'])

export function classifyError(error: unknown): ErrorKind {
    if (error instanceof ParleyError) return error.kind
    if (error instanceof TypeError && error.message.includes('fetch')) return 'transient'
    if (typeof error === 'object' && error !== null) {
        if ('status' in error && typeof error.status === 'number') {
            return classifyHttpError(error.status)
        }
        if ('code' in error && typeof error.code === 'string' && TRANSIENT_FS_CODES.has(error.code)) {
            return 'transient'
        }
    }
    return 'permanent'
}

/**
 * Wraps a storage failure so callers can retry it. Errors that already carry a kind pass through.
 */
export function toIOError(error: unknown, context: string): ParleyError {
    if (error instanceof ParleyError) return error
    return new TransientIOError(`${context}: ${errorMessage(error)}`, { cause: error })
}
