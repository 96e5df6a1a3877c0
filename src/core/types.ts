export type ConversationId = string

export type MessageRole = 'inbound' | 'outbound'

export interface Message {
    conversationId: ConversationId
    role: MessageRole
    text: string
    /** Wall-clock ISO timestamp. */
    timestamp: string
    /** Process-relative milliseconds, used for ordering within one run. */
    monotonic: number
    dedupKey: string
}

export interface Batch {
    conversationId: ConversationId
    messages: Message[]
    open: boolean
    openedAt: string
    extendedAt: string
}

export type Classification = 'auto' | 'needs-approval'

export const AUTO_CATEGORIES = ['availability', 'pickup_location', 'faq'] as const
export const APPROVAL_CATEGORIES = ['pricing', 'scheduling', 'delivery', 'escalation'] as const
export const CATEGORIES = [...AUTO_CATEGORIES, ...APPROVAL_CATEGORIES] as const

export type AutoCategory = (typeof AUTO_CATEGORIES)[number]
export type Category = (typeof CATEGORIES)[number]

export interface MeetupNote {
    confirmed: boolean
    timeText: string
}

export interface BatchEntry {
    dedupKey: string
    text: string
}

export interface Decision {
    id: string
    conversationId: ConversationId
    batch: BatchEntry[]
    classification: Classification
    category: Category
    proposedReply: string
    intentLabel: string
    ownerNotes?: string
    meetup?: MeetupNote
    createdAt: string
}

export type ApprovalStatus = 'pending' | 'approved' | 'rejected' | 'expired'
export type ApprovalOutcome = 'approved' | 'rejected'

export interface ApprovalRecord {
    token: string
    conversationId: ConversationId
    displayName: string
    decision: Decision
    requestedAt: string
    status: ApprovalStatus
    resolvedAt?: string
    replyOverride?: string
}

export interface LifecycleSnapshot {
    openBatch: { dedupKeys: string[]; openedAt: string } | null
    pendingApproval: string | null
    /** Inbound messages that arrived while a decision or an approval was outstanding. */
    heldKeys?: string[]
    displayName?: string
    updatedAt: string
}

export type ConversationPhase =
    | 'idle'
    | 'batching'
    | 'deciding'
    | 'awaiting-approval'
    | 'sending'
    | 'quarantined'
    | 'archived'

export interface ConversationStatus {
    conversationId: ConversationId
    phase: ConversationPhase
    displayName: string
    pendingApproval: string | null
    openBatchSize: number
}

// --- Collaborator contracts ---

export interface InboundMessage {
    conversationId: ConversationId
    text: string
    timestamp?: string
    dedupKey?: string
    displayName?: string
}

export interface InboundSource {
    start(handler: (message: InboundMessage) => Promise<void>): Promise<void>
    stop(): Promise<void>
}

export interface Listing {
    item: { name: string; listedPrice?: number; floorPrice?: number }
    location: string
    availabilityNote: string
}

export interface ReasoningInput {
    conversationId: ConversationId
    displayName: string
    history: Message[]
    batch: Message[]
    listing: Listing | null
    now: string
}

export interface ReasoningCollaborator {
    /** Returns raw, unvalidated output. The router owns validation. */
    reason(input: ReasoningInput, signal: AbortSignal): Promise<unknown>
}

export interface ApprovalView {
    token: string
    conversationId: ConversationId
    displayName: string
    intentLabel: string
    category: Category
    proposedReply: string
    ownerNotes?: string
    expiresAt: string
}

export interface ApprovalChannel {
    present(view: ApprovalView): Promise<void>
}

export interface OutboundSink {
    /** Resolves once the chat surface confirmed delivery. */
    deliver(conversationId: ConversationId, text: string): Promise<void>
}
