import type { ApprovalStatus, Category, Classification, ConversationId } from './types.js'

export type EventMap = {
    'message:ingested': { conversationId: ConversationId; dedupKey: string; duplicate: boolean }
    'batch:closed': { conversationId: ConversationId; size: number; reason: 'quiet' | 'max-size' | 'recovery' }
    'decision:made': { conversationId: ConversationId; classification: Classification; category: Category }
    'approval:requested': { conversationId: ConversationId; token: string }
    'approval:resolved': { conversationId: ConversationId; token: string; status: ApprovalStatus }
    'reply:sent': { conversationId: ConversationId; length: number }
    'reply:failed': { conversationId: ConversationId; error: Error }
    'conversation:quarantined': { conversationId: ConversationId; reason: string }
}

type EventHandler<T> = (data: T) => void

type Registry = { [K in keyof EventMap]: Set<EventHandler<EventMap[K]>> }

function createRegistry(): Registry {
    return {
        'message:ingested': new Set(),
        'batch:closed': new Set(),
        'decision:made': new Set(),
        'approval:requested': new Set(),
        'approval:resolved': new Set(),
        'reply:sent': new Set(),
        'reply:failed': new Set(),
        'conversation:quarantined': new Set(),
    }
}

export class TypedEventEmitter {
    private handlers = createRegistry()

    on<K extends keyof EventMap>(event: K, handler: EventHandler<EventMap[K]>): void {
        this.handlers[event].add(handler)
    }

    off<K extends keyof EventMap>(event: K, handler: EventHandler<EventMap[K]>): void {
        this.handlers[event].delete(handler)
    }

    emit<K extends keyof EventMap>(event: K, data: EventMap[K]): void {
        for (const handler of this.handlers[event]) {
            try {
                handler(data)
            } catch {
                // cross-cutting listeners should not crash the main flow
            }
        }
    }

    removeAll(): void {
        this.handlers = createRegistry()
    }
}
