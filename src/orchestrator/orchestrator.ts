import { performance } from 'node:perf_hooks'
import type { ApprovalBroker } from '../approval/broker.js'
import { toApprovalView } from '../approval/view.js'
import { PendingApprovalError, StateCorruptionError, errorMessage, toIOError } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import { PerKeyLock } from '../core/per-key-lock.js'
import { type RetryOptions, withRetry } from '../core/retry.js'
import type {
    ApprovalChannel,
    ApprovalRecord,
    Batch,
    ConversationId,
    ConversationPhase,
    ConversationStatus,
    Decision,
    InboundMessage,
    LifecycleSnapshot,
    Listing,
    Message,
    OutboundSink,
} from '../core/types.js'
import type { MeetupLog } from '../ledger/meetup-log.js'
import type { Logger } from '../logger/index.js'
import type { DecisionRouter } from '../router/decision-router.js'
import { type BatchCloseReason, DebounceScheduler, type ScheduleOutcome } from '../scheduler/debounce-scheduler.js'
import { systemTimers, type TimerFactory, type TimerHandle } from '../scheduler/timers.js'
import type { ConversationStore } from '../store/conversation-store.js'
import { dedupKey as defaultDedupKey, replyKey } from '../store/dedup.js'

export type IngestResult =
    | { status: 'accepted'; dedupKey: string; schedule: ScheduleOutcome }
    | { status: 'duplicate'; dedupKey: string }
    | { status: 'ignored'; reason: 'blank' | 'archived' | 'stopped' }

export interface OrchestratorConfig {
    quietWindowMs: number
    maxBatchSize: number
    approvalTimeoutMs: number
    historyLimit: number
    retry: Omit<RetryOptions, 'onRetry'>
}

export interface ListingSource {
    load(): Promise<Listing | null>
}

export interface OrchestratorDeps {
    store: ConversationStore
    router: DecisionRouter
    broker: ApprovalBroker
    channel: ApprovalChannel
    sink: OutboundSink
    listing: ListingSource
    meetups?: MeetupLog
    eventBus?: TypedEventEmitter
    timers?: TimerFactory
    logger: Logger
    config: OrchestratorConfig
}

export class Orchestrator {
    private readonly scheduler: DebounceScheduler
    private readonly lock = new PerKeyLock<ConversationId>()
    private readonly timers: TimerFactory
    private readonly logger: Logger

    private displayNames = new Map<ConversationId, string>()
    /** Closed batches whose decision has not been applied yet. */
    private deciding = new Map<ConversationId, Batch>()
    /** Conversations with an approval token whose outcome has not been applied yet. */
    private awaiting = new Map<ConversationId, string>()
    /** Inbound messages that arrived while a decision or an approval was outstanding. */
    private held = new Map<ConversationId, Message[]>()
    private sending = new Set<ConversationId>()
    private quarantined = new Set<ConversationId>()
    private archived = new Set<ConversationId>()

    /** Expiry, or a delivery retry once the outcome is known. One per token. */
    private tokenTimers = new Map<string, TimerHandle>()
    private watching = new Map<string, Promise<void>>()
    private inflight = new Set<Promise<void>>()
    /** Aborted on stop so backoff sleeps end early. */
    private aborter = new AbortController()
    private stopped = false

    constructor(private deps: OrchestratorDeps) {
        this.timers = deps.timers ?? systemTimers
        this.logger = deps.logger.child({ component: 'orchestrator' })
        this.scheduler = new DebounceScheduler({
            quietWindowMs: deps.config.quietWindowMs,
            maxBatchSize: deps.config.maxBatchSize,
            onBatch: (batch, reason) => this.onBatchClosed(batch, reason),
            isBlocked: (id) => this.isBlocked(id),
            timers: this.timers,
            logger: deps.logger,
        })
    }

    async ingest(input: InboundMessage): Promise<IngestResult> {
        const conversationId = input.conversationId
        if (this.stopped) return { status: 'ignored', reason: 'stopped' }
        if (this.archived.has(conversationId)) {
            this.logger.info({ conversationId }, 'orchestrator:ignored-archived')
            return { status: 'ignored', reason: 'archived' }
        }
        const text = input.text.trim()
        if (!text) return { status: 'ignored', reason: 'blank' }

        const message: Message = {
            conversationId,
            role: 'inbound',
            text,
            timestamp: input.timestamp ?? new Date().toISOString(),
            monotonic: Math.round(performance.now()),
            dedupKey: input.dedupKey ?? defaultDedupKey(conversationId, 'inbound', text),
        }

        return this.lock.runExclusive(conversationId, async (): Promise<IngestResult> => {
            const stored = await this.deps.store.append(conversationId, message)
            this.deps.eventBus?.emit('message:ingested', { conversationId, dedupKey: message.dedupKey, duplicate: !stored })
            if (!stored) {
                this.logger.debug({ conversationId, dedupKey: message.dedupKey }, 'orchestrator:duplicate')
                return { status: 'duplicate', dedupKey: message.dedupKey }
            }

            if (input.displayName) this.displayNames.set(conversationId, input.displayName)

            if (this.quarantined.has(conversationId)) {
                this.logger.warn({ conversationId }, 'orchestrator:held-quarantined')
                return { status: 'accepted', dedupKey: message.dedupKey, schedule: 'held' }
            }

            const schedule = this.scheduler.onMessage(conversationId, message)
            if (schedule === 'held') this.held.set(conversationId, [...(this.held.get(conversationId) ?? []), message])
            await this.writeSnapshot(conversationId)
            this.logger.debug({ conversationId, schedule }, 'orchestrator:ingested')
            return { status: 'accepted', dedupKey: message.dedupKey, schedule }
        })
    }

    /** Loads the approval registry and resumes every known conversation. */
    async start(): Promise<void> {
        this.stopped = false
        if (this.aborter.signal.aborted) this.aborter = new AbortController()
        await this.deps.broker.load()

        const ids = new Set(await this.deps.store.listConversations())
        for (const record of this.deps.broker.pending()) ids.add(record.conversationId)

        for (const conversationId of ids) {
            try {
                await this.recover(conversationId)
            } catch (error) {
                this.logger.error({ conversationId, error: errorMessage(error) }, 'orchestrator:recovery-failed')
            }
        }
        this.logger.info({ conversations: ids.size, awaiting: this.awaiting.size }, 'orchestrator:started')
    }

    async stop(): Promise<void> {
        this.stopped = true
        this.aborter.abort()
        this.scheduler.dispose()
        for (const timer of this.tokenTimers.values()) timer.cancel()
        this.tokenTimers.clear()
        await this.settle()
        this.logger.info('orchestrator:stopped')
    }

    /** Resolves once no decision, send or outcome is in progress. Approval waits are not awaited. */
    async settle(): Promise<void> {
        while (this.inflight.size > 0) {
            await Promise.all([...this.inflight])
        }
        await this.lock.drain()
    }

    /** Ends a conversation: drops its open batch and expires any pending approval. */
    async teardown(conversationId: ConversationId): Promise<void> {
        this.archived.add(conversationId)
        this.scheduler.cancel(conversationId)

        const token = this.awaiting.get(conversationId) ?? this.deps.broker.pendingFor(conversationId)?.token
        if (token) {
            this.cancelTokenTimer(token)
            await this.deps.broker.expire(token)
        }
        await this.lock.runExclusive(conversationId, async () => {
            this.awaiting.delete(conversationId)
            this.deciding.delete(conversationId)
            this.held.delete(conversationId)
            await this.writeSnapshot(conversationId)
        })
        this.logger.info({ conversationId, expired: token ?? null }, 'orchestrator:teardown')
    }

    /** Tears the conversation down and erases its stored history. */
    async reset(conversationId: ConversationId): Promise<void> {
        await this.teardown(conversationId)
        await this.deps.store.reset(conversationId)
        this.archived.delete(conversationId)
        this.quarantined.delete(conversationId)
        this.displayNames.delete(conversationId)
    }

    async status(conversationId: ConversationId): Promise<ConversationStatus> {
        let snapshot: LifecycleSnapshot | null = null
        let corrupt = false
        try {
            snapshot = await this.deps.store.loadState(conversationId)
        } catch (error) {
            if (!(error instanceof StateCorruptionError)) throw error
            corrupt = true
        }

        const flagged = corrupt || this.quarantined.has(conversationId) || (await this.deps.store.quarantineRecord(conversationId)) !== null
        const open = this.scheduler.openBatch(conversationId)
        const pendingToken = this.awaiting.get(conversationId) ?? this.pendingTokenFrom(snapshot)

        let phase: ConversationPhase = 'idle'
        if (flagged) phase = 'quarantined'
        else if (this.archived.has(conversationId)) phase = 'archived'
        else if (this.sending.has(conversationId)) phase = 'sending'
        else if (pendingToken) phase = 'awaiting-approval'
        else if (this.deciding.has(conversationId)) phase = 'deciding'
        else if (open || snapshot?.openBatch) phase = 'batching'

        return {
            conversationId,
            phase,
            displayName: this.displayNames.get(conversationId) ?? snapshot?.displayName ?? conversationId,
            pendingApproval: pendingToken,
            openBatchSize: open?.messages.length ?? snapshot?.openBatch?.dedupKeys.length ?? 0,
        }
    }

    async statuses(): Promise<ConversationStatus[]> {
        const ids = await this.deps.store.listConversations()
        return Promise.all(ids.sort().map((id) => this.status(id)))
    }

    private pendingTokenFrom(snapshot: LifecycleSnapshot | null): string | null {
        const token = snapshot?.pendingApproval
        if (!token) return null
        return this.deps.broker.get(token)?.status === 'pending' ? token : null
    }

    // --- Batch → decision ---

    private onBatchClosed(batch: Batch, reason: BatchCloseReason): void {
        this.deciding.set(batch.conversationId, batch)
        this.deps.eventBus?.emit('batch:closed', { conversationId: batch.conversationId, size: batch.messages.length, reason })
        this.track(this.decide(batch))
    }

    private async decide(batch: Batch): Promise<void> {
        const conversationId = batch.conversationId
        try {
            const [history, listing] = await withRetry(
                () => Promise.all([this.deps.store.history(conversationId, this.deps.config.historyLimit), this.deps.listing.load()]),
                this.retryOptions('load-context', conversationId)
            )
            const decision = await this.deps.router.classify(batch, {
                displayName: this.displayNameOf(conversationId),
                history,
                listing,
            })
            this.deps.eventBus?.emit('decision:made', {
                conversationId,
                classification: decision.classification,
                category: decision.category,
            })

            if (this.archived.has(conversationId)) {
                this.logger.info({ conversationId, decisionId: decision.id }, 'orchestrator:decision-dropped')
                return
            }

            if (decision.classification === 'auto') {
                if (!(await this.deliver(decision, decision.proposedReply))) this.requeue(batch)
                return
            }

            await this.requestApproval(decision)
        } catch (error) {
            if (error instanceof StateCorruptionError) {
                await this.quarantine(conversationId, error.message)
                return
            }
            this.logger.error({ conversationId, size: batch.messages.length, error: errorMessage(error) }, 'orchestrator:decision-failed')
            this.requeue(batch)
        } finally {
            this.deciding.delete(conversationId)
            if (!this.stopped && !this.quarantined.has(conversationId)) await this.persistOrLog(conversationId)
        }
    }

    /** Puts a batch whose decision did not complete back in the scheduler for another quiet window. */
    private requeue(batch: Batch): void {
        const conversationId = batch.conversationId
        if (this.stopped || this.awaiting.has(conversationId)) return
        if (this.archived.has(conversationId) || this.quarantined.has(conversationId)) return
        const open = this.scheduler.openBatch(conversationId)
        this.scheduler.restore(conversationId, [...batch.messages, ...(open?.messages ?? [])], batch.openedAt, true)
        this.logger.warn({ conversationId, size: batch.messages.length }, 'orchestrator:batch-requeued')
    }

    private async requestApproval(decision: Decision): Promise<void> {
        const conversationId = decision.conversationId
        let token: string
        try {
            token = await withRetry(
                () => this.deps.broker.request(conversationId, decision, this.displayNameOf(conversationId)),
                this.retryOptions('request', conversationId)
            )
        } catch (error) {
            if (!(error instanceof PendingApprovalError)) throw error
            this.logger.warn({ conversationId, token: error.token, decisionId: decision.id }, 'orchestrator:approval-already-pending')
            token = error.token
        }

        // The token is registered from here on; recovery prefers it over any batch marker.
        this.awaiting.set(conversationId, token)
        this.deciding.delete(conversationId)
        await this.persistOrLog(conversationId)

        const record = this.deps.broker.get(token)
        if (!record) throw new Error(`Approval ${token} vanished from the registry`)
        this.watch(record)
        await this.present(record)
    }

    // --- Approval ---

    private async present(record: ApprovalRecord): Promise<void> {
        const view = toApprovalView(record, this.deps.config.approvalTimeoutMs)
        try {
            await withRetry(async () => {
                try {
                    await this.deps.channel.present(view)
                } catch (error) {
                    throw toIOError(error, `present approval ${record.token}`)
                }
            }, this.retryOptions('present', record.conversationId))
        } catch (error) {
            // The request stays pending; expiry or a later signal still resolves it.
            this.logger.error({ conversationId: record.conversationId, token: record.token, error: errorMessage(error) }, 'orchestrator:present-failed')
        }
    }

    private watch(record: ApprovalRecord): void {
        const { token } = record
        if (this.watching.has(token)) return
        this.armExpiry(record)

        const watching = this.deps.broker
            .waitFor(token)
            .then((resolved) => this.track(this.applyOutcome(resolved)))
            .catch((error: unknown) => {
                this.logger.error({ conversationId: record.conversationId, token, error: errorMessage(error) }, 'orchestrator:watch-failed')
            })
            .finally(() => this.watching.delete(token))
        this.watching.set(token, watching)
    }

    private armExpiry(record: ApprovalRecord): void {
        const deadline = Date.parse(record.requestedAt) + this.deps.config.approvalTimeoutMs
        this.armTokenTimer(record.token, Math.max(0, deadline - Date.now()), () => this.expire(record.token))
    }

    private armTokenTimer(token: string, delay: number, work: () => Promise<void>): void {
        this.cancelTokenTimer(token)
        this.tokenTimers.set(
            token,
            this.timers.schedule(delay, () => {
                this.tokenTimers.delete(token)
                this.track(work())
            })
        )
    }

    private async expire(token: string): Promise<void> {
        const result = await this.deps.broker.expire(token)
        if (result.applied) this.logger.info({ conversationId: result.record.conversationId, token }, 'orchestrator:approval-expired')
    }

    private cancelTokenTimer(token: string): void {
        this.tokenTimers.get(token)?.cancel()
        this.tokenTimers.delete(token)
    }

    private async applyOutcome(record: ApprovalRecord): Promise<void> {
        const conversationId = record.conversationId
        this.cancelTokenTimer(record.token)
        if (this.stopped) return

        if (this.archived.has(conversationId)) {
            this.logger.info({ conversationId, token: record.token, status: record.status }, 'orchestrator:late-resolution-ignored')
            return
        }
        if (this.awaiting.get(conversationId) !== record.token) {
            this.logger.info({ conversationId, token: record.token }, 'orchestrator:stale-resolution-ignored')
            return
        }

        try {
            if (record.status === 'approved') {
                const text = (record.replyOverride ?? record.decision.proposedReply).trim()
                if (text && !(await this.deliver(record.decision, text))) {
                    // The token stays outstanding so a restart applies it too.
                    if (!this.stopped) this.armTokenTimer(record.token, this.deps.config.quietWindowMs, () => this.applyOutcome(record))
                    return
                }
                if (!text) this.logger.warn({ conversationId, token: record.token }, 'orchestrator:empty-approved-reply')
            } else {
                this.logger.info({ conversationId, token: record.token, status: record.status }, 'orchestrator:reply-suppressed')
            }
            this.awaiting.delete(conversationId)
            await this.persist(conversationId)
        } catch (error) {
            this.awaiting.delete(conversationId)
            await this.handleFailure(conversationId, error, 'orchestrator:outcome-failed')
        }
    }

    // --- Reply ---

    /** Sends once per decision. Returns false when delivery failed after retries. */
    private async deliver(decision: Decision, text: string): Promise<boolean> {
        const conversationId = decision.conversationId
        const key = replyKey(decision.id)
        if (await this.deps.store.hasMessage(conversationId, key)) {
            this.logger.info({ conversationId, decisionId: decision.id }, 'orchestrator:reply-already-sent')
            return true
        }

        this.sending.add(conversationId)
        try {
            await withRetry(async () => {
                try {
                    await this.deps.sink.deliver(conversationId, text)
                } catch (error) {
                    throw toIOError(error, `deliver to ${conversationId}`)
                }
            }, this.retryOptions('deliver', conversationId))
        } catch (error) {
            const failure = error instanceof Error ? error : new Error(errorMessage(error))
            this.logger.error({ conversationId, decisionId: decision.id, error: failure.message }, 'orchestrator:reply-failed')
            this.deps.eventBus?.emit('reply:failed', { conversationId, error: failure })
            return false
        } finally {
            this.sending.delete(conversationId)
        }

        const outbound: Message = {
            conversationId,
            role: 'outbound',
            text,
            timestamp: new Date().toISOString(),
            monotonic: Math.round(performance.now()),
            dedupKey: key,
        }
        await withRetry(() => this.deps.store.append(conversationId, outbound), this.retryOptions('record-reply', conversationId))
        this.deps.eventBus?.emit('reply:sent', { conversationId, length: text.length })
        this.logger.info({ conversationId, decisionId: decision.id, category: decision.category }, 'orchestrator:reply-sent')

        if (decision.meetup?.confirmed && this.deps.meetups) {
            try {
                await this.deps.meetups.record(decision, this.displayNameOf(conversationId), await this.deps.listing.load())
            } catch (error) {
                this.logger.error({ conversationId, error: errorMessage(error) }, 'orchestrator:meetup-log-failed')
            }
        }
        return true
    }

    // --- Recovery ---

    private async recover(conversationId: ConversationId): Promise<void> {
        const flag = await this.deps.store.quarantineRecord(conversationId)
        if (flag) {
            this.quarantined.add(conversationId)
            this.logger.warn({ conversationId, reason: flag.reason }, 'orchestrator:skipped-quarantined')
            return
        }

        let snapshot: LifecycleSnapshot | null
        try {
            snapshot = await this.deps.store.loadState(conversationId)
        } catch (error) {
            if (error instanceof StateCorruptionError) {
                await this.quarantine(conversationId, error.message)
                return
            }
            throw error
        }
        if (snapshot?.displayName) this.displayNames.set(conversationId, snapshot.displayName)

        const inbound = snapshot?.openBatch || snapshot?.heldKeys?.length ? await this.inboundHistory(conversationId) : []
        const held = this.pick(inbound, snapshot?.heldKeys ?? [])
        if (held.length > 0) this.held.set(conversationId, held)

        const token = snapshot?.pendingApproval ?? this.deps.broker.pendingFor(conversationId)?.token
        if (token) {
            const record = this.deps.broker.get(token)
            if (!record) {
                this.logger.warn({ conversationId, token }, 'orchestrator:unknown-token')
                await this.persist(conversationId)
                return
            }
            this.awaiting.set(conversationId, token)
            if (record.status === 'pending') {
                this.logger.info({ conversationId, token }, 'orchestrator:resubscribed')
                this.watch(record)
                await this.present(record)
            } else {
                this.track(this.applyOutcome(record))
            }
            return
        }

        if (snapshot?.openBatch) {
            const messages = this.pick(inbound, snapshot.openBatch.dedupKeys)
            if (messages.length > 0) {
                this.scheduler.restore(conversationId, messages, snapshot.openBatch.openedAt)
                this.scheduler.flush(conversationId, 'recovery')
                this.logger.info({ conversationId, size: messages.length }, 'orchestrator:batch-recovered')
                return
            }
            this.logger.warn({ conversationId }, 'orchestrator:empty-batch-marker')
        }
        if (snapshot?.openBatch || held.length > 0) await this.persist(conversationId)
    }

    private async inboundHistory(conversationId: ConversationId): Promise<Message[]> {
        return (await this.deps.store.history(conversationId)).filter((m) => m.role === 'inbound')
    }

    private pick(messages: Message[], keys: string[]): Message[] {
        const wanted = new Set(keys)
        return messages.filter((m) => wanted.has(m.dedupKey))
    }

    // --- Shared ---

    private async handleFailure(conversationId: ConversationId, error: unknown, event: string): Promise<void> {
        if (error instanceof StateCorruptionError) {
            await this.quarantine(conversationId, error.message)
            return
        }
        this.logger.error({ conversationId, error: errorMessage(error) }, event)
    }

    private async quarantine(conversationId: ConversationId, reason: string): Promise<void> {
        this.quarantined.add(conversationId)
        this.scheduler.cancel(conversationId)
        try {
            await this.deps.store.quarantine(conversationId, reason)
        } catch (error) {
            this.logger.error({ conversationId, error: errorMessage(error) }, 'orchestrator:quarantine-failed')
        }
        this.deps.eventBus?.emit('conversation:quarantined', { conversationId, reason })
    }

    private isBlocked(conversationId: ConversationId): boolean {
        return this.deciding.has(conversationId) || this.awaiting.has(conversationId)
    }

    /** Feeds held messages back to the scheduler once nothing is outstanding. Callers must hold the conversation lock. */
    private release(conversationId: ConversationId): void {
        const held = this.held.get(conversationId)
        if (!held || this.stopped || this.isBlocked(conversationId)) return
        if (this.archived.has(conversationId) || this.quarantined.has(conversationId)) return

        this.held.delete(conversationId)
        this.logger.info({ conversationId, size: held.length }, 'orchestrator:held-released')
        for (const [index, message] of held.entries()) {
            // A max-size close starts a decision, which holds the rest again.
            if (this.scheduler.onMessage(conversationId, message) === 'held') {
                this.held.set(conversationId, held.slice(index))
                return
            }
        }
    }

    private persist(conversationId: ConversationId): Promise<void> {
        return this.lock.runExclusive(conversationId, async () => {
            this.release(conversationId)
            await this.writeSnapshot(conversationId)
        })
    }

    private async persistOrLog(conversationId: ConversationId): Promise<void> {
        try {
            await withRetry(() => this.persist(conversationId), this.retryOptions('snapshot', conversationId))
        } catch (error) {
            this.logger.error({ conversationId, error: errorMessage(error) }, 'orchestrator:snapshot-failed')
        }
    }

    /** Callers must hold the conversation lock. */
    private async writeSnapshot(conversationId: ConversationId): Promise<void> {
        const batch = this.scheduler.openBatch(conversationId) ?? this.deciding.get(conversationId)
        const snapshot: LifecycleSnapshot = {
            openBatch: batch ? { dedupKeys: batch.messages.map((m) => m.dedupKey), openedAt: batch.openedAt } : null,
            pendingApproval: this.awaiting.get(conversationId) ?? null,
            updatedAt: new Date().toISOString(),
        }
        const held = this.held.get(conversationId)
        if (held?.length) snapshot.heldKeys = held.map((m) => m.dedupKey)
        const displayName = this.displayNames.get(conversationId)
        if (displayName) snapshot.displayName = displayName
        await this.deps.store.saveState(conversationId, snapshot)
    }

    private displayNameOf(conversationId: ConversationId): string {
        return this.displayNames.get(conversationId) ?? conversationId
    }

    private retryOptions(operation: string, conversationId: ConversationId): RetryOptions {
        return {
            ...this.deps.config.retry,
            signal: this.aborter.signal,
            onRetry: (error, attempt, delay) => {
                this.logger.warn({ conversationId, operation, attempt, delay: Math.round(delay), error: errorMessage(error) }, 'orchestrator:retry')
            },
        }
    }

    private track(work: Promise<void>): void {
        const tracked = work
            .catch((error: unknown) => {
                this.logger.error({ error: errorMessage(error) }, 'orchestrator:task-failed')
            })
            .finally(() => this.inflight.delete(tracked))
        this.inflight.add(tracked)
    }
}
