import { z } from 'zod'
import { CATEGORIES, type ApprovalRecord, type Decision } from '../core/types.js'

export const DecisionSchema: z.ZodType<Decision> = z.object({
    id: z.string(),
    conversationId: z.string(),
    batch: z.array(z.object({ dedupKey: z.string(), text: z.string() })),
    classification: z.enum(['auto', 'needs-approval']),
    category: z.enum(CATEGORIES),
    proposedReply: z.string(),
    intentLabel: z.string(),
    ownerNotes: z.string().optional(),
    meetup: z.object({ confirmed: z.boolean(), timeText: z.string() }).optional(),
    createdAt: z.string(),
})

export const ApprovalRecordSchema: z.ZodType<ApprovalRecord> = z.object({
    token: z.string().min(1),
    conversationId: z.string(),
    displayName: z.string(),
    decision: DecisionSchema,
    requestedAt: z.string(),
    status: z.enum(['pending', 'approved', 'rejected', 'expired']),
    resolvedAt: z.string().optional(),
    replyOverride: z.string().optional(),
})
