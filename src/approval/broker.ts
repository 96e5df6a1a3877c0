import { randomUUID } from 'node:crypto'
import path from 'node:path'
import { PendingApprovalError, errorMessage, toIOError } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import type { FileSystem } from '../core/fs.js'
import { PerKeyLock } from '../core/per-key-lock.js'
import type { ApprovalOutcome, ApprovalRecord, ApprovalStatus, ConversationId, Decision } from '../core/types.js'
import type { Logger } from '../logger/index.js'
import { ApprovalRecordSchema } from './schemas.js'

export type ResolveResult =
    | { applied: true; record: ApprovalRecord }
    | { applied: false; reason: 'unknown' | 'already-terminal' | 'reply-required'; record?: ApprovalRecord }

interface ApprovalBrokerDeps {
    fs: FileSystem
    dataDir: string
    logger: Logger
    eventBus?: TypedEventEmitter
}

interface Waiter {
    promise: Promise<ApprovalRecord>
    resolve: (record: ApprovalRecord) => void
}

// Every registry mutation runs under this single key.
const REGISTRY = 'registry'

export class ApprovalBroker {
    private readonly dir: string
    private readonly lock = new PerKeyLock<string>()
    private records = new Map<string, ApprovalRecord>()
    private waiters = new Map<string, Waiter>()

    constructor(private deps: ApprovalBrokerDeps) {
        this.dir = path.join(deps.dataDir, 'approvals')
    }

    /** Rebuilds the registry from disk. Returns the number of records loaded. */
    async load(): Promise<number> {
        return this.lock.runExclusive(REGISTRY, async () => {
            let entries: string[]
            try {
                entries = await this.deps.fs.list(this.dir)
            } catch (error) {
                throw toIOError(error, 'list approvals')
            }

            const loaded = new Map<string, ApprovalRecord>()
            for (const entry of entries) {
                if (!entry.endsWith('.json')) continue
                const record = await this.readRecord(path.join(this.dir, entry))
                if (record) loaded.set(record.token, record)
            }
            this.records = loaded
            this.deps.logger.info(
                { total: loaded.size, pending: [...loaded.values()].filter((r) => r.status === 'pending').length },
                'approval:loaded'
            )
            return loaded.size
        })
    }

    async request(conversationId: ConversationId, decision: Decision, displayName = conversationId): Promise<string> {
        const token = await this.lock.runExclusive(REGISTRY, async () => {
            const existing = this.pendingFor(conversationId)
            if (existing) throw new PendingApprovalError(conversationId, existing.token)

            const record: ApprovalRecord = {
                token: randomUUID(),
                conversationId,
                displayName,
                decision,
                requestedAt: new Date().toISOString(),
                status: 'pending',
            }
            await this.persist(record)
            this.records.set(record.token, record)
            return record.token
        })

        this.deps.logger.info({ conversationId, token, intent: decision.intentLabel }, 'approval:requested')
        this.deps.eventBus?.emit('approval:requested', { conversationId, token })
        return token
    }

    /** A bare approval of an empty draft is refused; the request stays pending until text or a rejection arrives. */
    async resolve(token: string, outcome: ApprovalOutcome, replyOverride?: string): Promise<ResolveResult> {
        const override = replyOverride?.trim()
        return this.transition(token, outcome, outcome === 'approved' && override ? override : undefined)
    }

    async expire(token: string): Promise<ResolveResult> {
        return this.transition(token, 'expired')
    }

    /** Correlation future for a token. Calling it again after a restart resubscribes to the same request. */
    waitFor(token: string): Promise<ApprovalRecord> {
        const record = this.records.get(token)
        if (!record) return Promise.reject(new Error(`Unknown approval token: ${token}`))
        if (record.status !== 'pending') return Promise.resolve(record)

        const existing = this.waiters.get(token)
        if (existing) return existing.promise

        let resolve: (value: ApprovalRecord) => void = () => {}
        const promise = new Promise<ApprovalRecord>((res) => {
            resolve = res
        })
        this.waiters.set(token, { promise, resolve })
        return promise
    }

    get(token: string): ApprovalRecord | null {
        return this.records.get(token) ?? null
    }

    pendingFor(conversationId: ConversationId): ApprovalRecord | null {
        for (const record of this.records.values()) {
            if (record.conversationId === conversationId && record.status === 'pending') return record
        }
        return null
    }

    pending(): ApprovalRecord[] {
        return [...this.records.values()]
            .filter((r) => r.status === 'pending')
            .sort((a, b) => a.requestedAt.localeCompare(b.requestedAt))
    }

    private async transition(token: string, status: Exclude<ApprovalStatus, 'pending'>, replyOverride?: string): Promise<ResolveResult> {
        const result = await this.lock.runExclusive(REGISTRY, async (): Promise<ResolveResult> => {
            const record = this.records.get(token)
            if (!record) return { applied: false, reason: 'unknown' }
            if (record.status !== 'pending') return { applied: false, reason: 'already-terminal', record }
            if (status === 'approved' && !replyOverride && !record.decision.proposedReply.trim()) {
                return { applied: false, reason: 'reply-required', record }
            }

            const next: ApprovalRecord = { ...record, status, resolvedAt: new Date().toISOString() }
            if (replyOverride) next.replyOverride = replyOverride
            await this.persist(next)
            this.records.set(token, next)
            return { applied: true, record: next }
        })

        if (!result.applied) {
            if (result.reason === 'reply-required') this.deps.logger.warn({ token }, 'approval:reply-required')
            else this.deps.logger.info({ token, status, reason: result.reason }, 'approval:duplicate-signal')
            return result
        }

        const { record } = result
        this.deps.logger.info({ conversationId: record.conversationId, token, status }, 'approval:resolved')
        this.deps.eventBus?.emit('approval:resolved', { conversationId: record.conversationId, token, status })

        const waiter = this.waiters.get(token)
        this.waiters.delete(token)
        waiter?.resolve(record)
        return result
    }

    private async persist(record: ApprovalRecord): Promise<void> {
        const file = path.join(this.dir, `${record.token}.json`)
        const tmp = `${file}.tmp`
        try {
            await this.deps.fs.mkdir(this.dir)
            await this.deps.fs.writeJSON(tmp, record)
            await this.deps.fs.rename(tmp, file)
        } catch (error) {
            throw toIOError(error, `persist approval ${record.token}`)
        }
    }

    private async readRecord(file: string): Promise<ApprovalRecord | null> {
        let raw: unknown
        try {
            raw = await this.deps.fs.readJSON<unknown>(file)
        } catch (error) {
            this.deps.logger.warn({ file, error: errorMessage(error) }, 'approval:unreadable-record')
            return null
        }
        const result = ApprovalRecordSchema.safeParse(raw)
        if (!result.success) {
            this.deps.logger.warn({ file, issue: result.error.issues[0]?.message }, 'approval:invalid-record')
            return null
        }
        return result.data
    }
}
