import { createHash } from 'node:crypto'
import type { ConversationId, MessageRole } from '../core/types.js'

export function normalizeText(text: string): string {
    return text.trim()
}

export function dedupKey(conversationId: ConversationId, role: MessageRole, text: string): string {
    return createHash('sha256')
        .update(`${conversationId}|${role}|${normalizeText(text)}`, 'utf8')
        .digest('hex')
        .slice(0, 32)
}

export function replyKey(decisionId: string): string {
    return `reply:${decisionId}`
}
