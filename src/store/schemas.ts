import { z } from 'zod'
import type { LifecycleSnapshot, Message } from '../core/types.js'

export const MessageSchema: z.ZodType<Message> = z.object({
    conversationId: z.string(),
    role: z.enum(['inbound', 'outbound']),
    text: z.string(),
    timestamp: z.string(),
    monotonic: z.number(),
    dedupKey: z.string().min(1),
})

export const SnapshotSchema: z.ZodType<LifecycleSnapshot> = z.object({
    openBatch: z
        .object({
            dedupKeys: z.array(z.string()).min(1),
            openedAt: z.string(),
        })
        .nullable(),
    pendingApproval: z.string().min(1).nullable(),
    heldKeys: z.array(z.string().min(1)).optional(),
    displayName: z.string().optional(),
    updatedAt: z.string(),
})

export const QuarantineSchema = z.object({
    reason: z.string(),
    flaggedAt: z.string(),
})

export type QuarantineRecord = z.infer<typeof QuarantineSchema>
