import pino from 'pino'
import { dedupKey } from '../../src/store/dedup.js'
import type { Batch, Decision, Listing, Message, MessageRole } from '../../src/core/types.js'

export const silentLogger = pino({ level: 'silent' })

let clock = 0

export function makeMessage(conversationId: string, text: string, role: MessageRole = 'inbound'): Message {
    clock++
    return {
        conversationId,
        role,
        text,
        timestamp: new Date(Date.UTC(2024, 0, 1, 12, 0, clock)).toISOString(),
        monotonic: clock,
        dedupKey: dedupKey(conversationId, role, text),
    }
}

export function makeBatch(conversationId: string, texts: string[]): Batch {
    const messages = texts.map((text) => makeMessage(conversationId, text))
    const at = messages[0]?.timestamp ?? new Date(0).toISOString()
    return { conversationId, messages, open: false, openedAt: at, extendedAt: at }
}

export function makeDecision(conversationId: string, overrides: Partial<Decision> = {}): Decision {
    return {
        id: 'decision-1',
        conversationId,
        batch: [{ dedupKey: 'k1', text: 'Would you take $80?' }],
        classification: 'needs-approval',
        category: 'pricing',
        proposedReply: 'I can do $90.',
        intentLabel: 'Price negotiation',
        createdAt: '2024-01-01T12:00:00.000Z',
        ...overrides,
    }
}

export const sampleListing: Listing = {
    item: { name: 'Oak desk', listedPrice: 120, floorPrice: 90 },
    location: 'Maple St library',
    availabilityNote: 'weekday evenings',
}
