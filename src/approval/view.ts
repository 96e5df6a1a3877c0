import type { ApprovalRecord, ApprovalView } from '../core/types.js'

export function expiresAt(record: Pick<ApprovalRecord, 'requestedAt'>, timeoutMs: number): string {
    return new Date(Date.parse(record.requestedAt) + timeoutMs).toISOString()
}

export function toApprovalView(record: ApprovalRecord, timeoutMs: number): ApprovalView {
    const { decision } = record
    const view: ApprovalView = {
        token: record.token,
        conversationId: record.conversationId,
        displayName: record.displayName,
        intentLabel: decision.intentLabel,
        category: decision.category,
        proposedReply: decision.proposedReply,
        expiresAt: expiresAt(record, timeoutMs),
    }
    if (decision.ownerNotes) view.ownerNotes = decision.ownerNotes
    return view
}
