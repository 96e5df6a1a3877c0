import type { Listing, Message, ReasoningCollaborator, ReasoningInput } from '../core/types.js'
import { PromptBuilder } from '../llm/prompt-builder.js'
import type { LLMClient } from '../llm/types.js'
import { ROUTER_SYSTEM_PROMPT } from './system-prompt.js'

export function formatHistoryLine(message: Message): string {
    const speaker = message.role === 'inbound' ? 'Buyer' : 'Me'
    return `${speaker}: ${message.text}`
}

export function formatListing(listing: Listing): string {
    const lines = [`Item: ${listing.item.name}`]
    if (listing.item.listedPrice !== undefined) lines.push(`Listed price: $${listing.item.listedPrice}`)
    if (listing.item.floorPrice !== undefined) lines.push(`Lowest acceptable: $${listing.item.floorPrice}`)
    if (listing.location) lines.push(`Pickup location: ${listing.location}`)
    if (listing.availabilityNote) lines.push(`Seller availability: ${listing.availabilityNote}`)
    return lines.join('\n')
}

export function buildReasoningPrompt(input: ReasoningInput, budget: number): string {
    const batchKeys = new Set(input.batch.map((m) => m.dedupKey))
    const builder = new PromptBuilder()
        .add('Current time', input.now, 90)
        .add('Buyer', input.displayName, 80)
        .add('Latest buyer messages', input.batch.map((m) => m.text).join('\n'), 100)
        .addLines(
            'Chat history (most recent last)',
            input.history.filter((m) => !batchKeys.has(m.dedupKey)).map(formatHistoryLine),
            10
        )
    if (input.listing) builder.add('Listing', formatListing(input.listing), 70)
    return builder.build(budget)
}

interface LLMReasonerOptions {
    llm: LLMClient
    tokenBudget: number
}

export function createLLMReasoner(options: LLMReasonerOptions): ReasoningCollaborator {
    return {
        async reason(input: ReasoningInput, signal: AbortSignal): Promise<unknown> {
            const response = await options.llm.chat({
                messages: [
                    { role: 'system', content: ROUTER_SYSTEM_PROMPT },
                    { role: 'user', content: buildReasoningPrompt(input, options.tokenBudget) },
                ],
                jsonMode: true,
                signal,
            })
            return response.content
        },
    }
}
