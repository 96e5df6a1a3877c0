import type { EventMap, TypedEventEmitter } from '../core/events.js'
import type { ApprovalStatus, Category } from '../core/types.js'

interface ConversationCounts {
    messages: number
    duplicates: number
    batches: number
    decisions: number
    repliesSent: number
    replyFailures: number
}

export interface MetricsTotals extends ConversationCounts {
    autoDecisions: number
    approvalsRequested: number
    quarantined: number
}

export class MetricsCollector {
    private conversations = new Map<string, ConversationCounts>()
    private categories = new Map<Category, number>()
    private resolutions: Record<Exclude<ApprovalStatus, 'pending'>, number> = { approved: 0, rejected: 0, expired: 0 }
    private autoDecisions = 0
    private approvalsRequested = 0
    private quarantined = 0
    private cleanups: Array<() => void> = []

    constructor(eventBus: TypedEventEmitter) {
        this.listen(eventBus, 'message:ingested', ({ conversationId, duplicate }) => {
            const c = this.countsFor(conversationId)
            if (duplicate) c.duplicates++
            else c.messages++
        })
        this.listen(eventBus, 'batch:closed', ({ conversationId }) => {
            this.countsFor(conversationId).batches++
        })
        this.listen(eventBus, 'decision:made', ({ conversationId, classification, category }) => {
            this.countsFor(conversationId).decisions++
            if (classification === 'auto') this.autoDecisions++
            this.categories.set(category, (this.categories.get(category) ?? 0) + 1)
        })
        this.listen(eventBus, 'approval:requested', () => {
            this.approvalsRequested++
        })
        this.listen(eventBus, 'approval:resolved', ({ status }) => {
            if (status !== 'pending') this.resolutions[status]++
        })
        this.listen(eventBus, 'reply:sent', ({ conversationId }) => {
            this.countsFor(conversationId).repliesSent++
        })
        this.listen(eventBus, 'reply:failed', ({ conversationId }) => {
            this.countsFor(conversationId).replyFailures++
        })
        this.listen(eventBus, 'conversation:quarantined', () => {
            this.quarantined++
        })
    }

    dispose(): void {
        for (const cleanup of this.cleanups) cleanup()
        this.cleanups = []
    }

    getTotals(): MetricsTotals {
        const totals: MetricsTotals = {
            messages: 0,
            duplicates: 0,
            batches: 0,
            decisions: 0,
            repliesSent: 0,
            replyFailures: 0,
            autoDecisions: this.autoDecisions,
            approvalsRequested: this.approvalsRequested,
            quarantined: this.quarantined,
        }
        for (const c of this.conversations.values()) {
            totals.messages += c.messages
            totals.duplicates += c.duplicates
            totals.batches += c.batches
            totals.decisions += c.decisions
            totals.repliesSent += c.repliesSent
            totals.replyFailures += c.replyFailures
        }
        return totals
    }

    getConversationMetrics(): Map<string, ConversationCounts> {
        return new Map(this.conversations)
    }

    getResolutions(): Record<Exclude<ApprovalStatus, 'pending'>, number> {
        return { ...this.resolutions }
    }

    formatStatus(): string {
        const t = this.getTotals()
        const lines: string[] = []
        lines.push(`Messages: ${t.messages} (${t.duplicates} duplicates) in ${this.conversations.size} conversations`)
        lines.push(`Decisions: ${t.decisions} from ${t.batches} batches, ${t.autoDecisions} auto`)
        lines.push(
            `Approvals: ${t.approvalsRequested} requested, ${this.resolutions.approved} approved, ${this.resolutions.rejected} rejected, ${this.resolutions.expired} expired`
        )
        lines.push(`Replies: ${t.repliesSent} sent, ${t.replyFailures} failed`)

        if (this.categories.size > 0) {
            const parts = [...this.categories].sort((a, b) => b[1] - a[1]).map(([category, n]) => `${category}=${n}`)
            lines.push(`Categories: ${parts.join(', ')}`)
        }
        if (t.quarantined > 0) lines.push(`Quarantined: ${t.quarantined}`)

        return lines.join('\n')
    }

    private listen<K extends keyof EventMap>(eventBus: TypedEventEmitter, event: K, handler: (data: EventMap[K]) => void): void {
        eventBus.on(event, handler)
        this.cleanups.push(() => eventBus.off(event, handler))
    }

    private countsFor(conversationId: string): ConversationCounts {
        let counts = this.conversations.get(conversationId)
        if (!counts) {
            counts = { messages: 0, duplicates: 0, batches: 0, decisions: 0, repliesSent: 0, replyFailures: 0 }
            this.conversations.set(conversationId, counts)
        }
        return counts
    }
}
