import { randomUUID } from 'node:crypto'
import { MalformedOutputError, TransientIOError, errorMessage, isAbortError } from '../core/errors.js'
import type {
    Batch,
    Category,
    Classification,
    Decision,
    Listing,
    Message,
    ReasoningCollaborator,
    ReasoningInput,
} from '../core/types.js'
import type { Logger } from '../logger/index.js'
import { isAutoCategory, isCategory, namedCategories, parseReasonerOutput, type ReasonerOutput } from './output-parser.js'

export interface RoutingContext {
    displayName: string
    history: Message[]
    listing: Listing | null
}

interface DecisionRouterDeps {
    reasoner: ReasoningCollaborator
    timeoutMs: number
    logger: Logger
}

export const INTENT_LABELS: Record<Category, string> = {
    availability: 'Availability question',
    pickup_location: 'Pickup location',
    faq: 'General question',
    pricing: 'Price negotiation',
    scheduling: 'Meetup scheduling',
    delivery: 'Delivery or logistics',
    escalation: 'Needs owner attention',
}

export const FAILED_INTENT = 'Reasoning unavailable'
export const MALFORMED_INTENT = 'Unrecognized request'

/** Draft offered to the approver when the reasoner produced none. Empty without a listing. */
export function fallbackReply(listing: Listing | null): string {
    if (!listing) return ''
    return `Hi! Yes, it's available. Pickup at ${listing.location}. My availability is ${listing.availabilityNote}. What time works for you?`
}

export class DecisionRouter {
    constructor(private deps: DecisionRouterDeps) {}

    async classify(batch: Batch, context: RoutingContext): Promise<Decision> {
        const input: ReasoningInput = {
            conversationId: batch.conversationId,
            displayName: context.displayName,
            history: context.history,
            batch: batch.messages,
            listing: context.listing,
            now: new Date().toISOString(),
        }

        let raw: unknown
        try {
            raw = await this.callReasoner(input)
        } catch (error) {
            this.deps.logger.warn(
                { conversationId: batch.conversationId, aborted: isAbortError(error), error: errorMessage(error) },
                'router:reasoner-failed'
            )
            return this.decision(batch, {
                classification: 'needs-approval',
                category: 'escalation',
                proposedReply: fallbackReply(context.listing),
                intentLabel: FAILED_INTENT,
            })
        }

        const parsed = parseReasonerOutput(raw)
        if (!parsed.ok) {
            const error = new MalformedOutputError(parsed.error)
            this.deps.logger.warn({ conversationId: batch.conversationId, error: error.message }, 'router:malformed-output')
            return this.decision(batch, {
                classification: 'needs-approval',
                category: 'escalation',
                proposedReply: fallbackReply(context.listing),
                intentLabel: MALFORMED_INTENT,
            })
        }

        return this.fromOutput(batch, parsed.value, context.listing)
    }

    private fromOutput(batch: Batch, output: ReasonerOutput, listing: Listing | null): Decision {
        const names = namedCategories(output)
        const known = names.filter(isCategory)
        const outOfVocabulary = names.filter((name) => !isCategory(name))
        const sensitive = known.find((category) => !isAutoCategory(category))
        const category: Category = sensitive ?? (outOfVocabulary.length > 0 ? 'escalation' : (known[0] ?? 'escalation'))
        const proposedReply = (output.proposedReply ?? '').trim()

        if (outOfVocabulary.length > 0) {
            this.deps.logger.warn({ conversationId: batch.conversationId, categories: outOfVocabulary }, 'router:out-of-vocabulary')
        }

        // The reasoner may escalate an allowlisted category but never relax a sensitive one.
        const classification: Classification =
            output.classification === 'auto' && !sensitive && outOfVocabulary.length === 0 && proposedReply !== ''
                ? 'auto'
                : 'needs-approval'

        const decision = this.decision(batch, {
            classification,
            category,
            proposedReply: proposedReply || fallbackReply(listing),
            intentLabel: output.intentLabel?.trim() || INTENT_LABELS[category],
        })
        if (output.ownerNotes?.trim()) decision.ownerNotes = output.ownerNotes.trim()
        if (output.meetup) decision.meetup = { confirmed: output.meetup.confirmed, timeText: output.meetup.timeText.trim() }

        this.deps.logger.info(
            { conversationId: batch.conversationId, classification, category, batchSize: batch.messages.length },
            'router:decided'
        )
        return decision
    }

    private decision(
        batch: Batch,
        fields: Pick<Decision, 'classification' | 'category' | 'proposedReply' | 'intentLabel'>
    ): Decision {
        return {
            id: randomUUID(),
            conversationId: batch.conversationId,
            batch: batch.messages.map((m) => ({ dedupKey: m.dedupKey, text: m.text })),
            ...fields,
            createdAt: new Date().toISOString(),
        }
    }

    private async callReasoner(input: ReasoningInput): Promise<unknown> {
        const controller = new AbortController()
        let timer: ReturnType<typeof setTimeout> | undefined
        const timeout = new Promise<never>((_, reject) => {
            timer = setTimeout(() => {
                controller.abort()
                reject(new TransientIOError(`reasoning timed out after ${this.deps.timeoutMs}ms`))
            }, this.deps.timeoutMs)
        })
        try {
            return await Promise.race([this.deps.reasoner.reason(input, controller.signal), timeout])
        } finally {
            clearTimeout(timer)
        }
    }
}
