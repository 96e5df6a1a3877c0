import { createInterface } from 'node:readline'
import type { Readable, Writable } from 'node:stream'
import { z } from 'zod'
import { errorMessage } from '../core/errors.js'
import type {
    ApprovalChannel,
    ApprovalView,
    ConversationId,
    InboundMessage,
    InboundSource,
    OutboundSink,
} from '../core/types.js'
import type { Logger } from '../logger/index.js'

const InboundLineSchema = z.discriminatedUnion('type', [
    z.object({
        type: z.literal('message'),
        conversationId: z.string().min(1),
        text: z.string(),
        timestamp: z.string().optional(),
        dedupKey: z.string().min(1).optional(),
        displayName: z.string().optional(),
    }),
    z.object({ type: z.literal('approve'), token: z.string().min(1), text: z.string().optional() }),
    z.object({ type: z.literal('reject'), token: z.string().min(1) }),
    z.object({ type: z.literal('teardown'), conversationId: z.string().min(1) }),
])

export type InboundLine = z.infer<typeof InboundLineSchema>

export type ControlSignal = Exclude<InboundLine, { type: 'message' }>

export type OutboundLine =
    | { type: 'reply'; conversationId: ConversationId; text: string }
    | { type: 'approval'; view: ApprovalView }
    | { type: 'ack'; token: string; applied: boolean; reason?: string }
    | { type: 'error'; error: string; line?: number }

export interface JsonLinesBridgeDeps {
    input: Readable
    output: Writable
    logger: Logger
    onControl: (signal: ControlSignal) => Promise<OutboundLine | null>
}

/**
 * One JSON object per line in both directions. Inbound lines carry buyer messages and
 * approval signals; outbound lines carry replies, approval requests and acknowledgements.
 */
export class JsonLinesBridge implements InboundSource, ApprovalChannel, OutboundSink {
    private close: (() => void) | null = null

    constructor(private deps: JsonLinesBridgeDeps) {}

    /** Resolves when the input stream ends or `stop()` is called. */
    async start(handler: (message: InboundMessage) => Promise<void>): Promise<void> {
        const rl = createInterface({ input: this.deps.input, crlfDelay: Infinity })
        this.close = () => rl.close()
        let lineNo = 0

        for await (const raw of rl) {
            lineNo++
            if (!raw.trim()) continue
            const parsed = parseLine(raw)
            if (!parsed.success) {
                this.deps.logger.warn({ line: lineNo, error: parsed.error }, 'bridge:invalid-line')
                await this.write({ type: 'error', error: parsed.error, line: lineNo })
                continue
            }

            try {
                const line = parsed.data
                if (line.type === 'message') {
                    const { type: _type, ...message } = line
                    await handler(message)
                } else {
                    const response = await this.deps.onControl(line)
                    if (response) await this.write(response)
                }
            } catch (error) {
                this.deps.logger.error({ line: lineNo, error: errorMessage(error) }, 'bridge:handler-failed')
                await this.write({ type: 'error', error: errorMessage(error), line: lineNo })
            }
        }
        this.deps.logger.info({ lines: lineNo }, 'bridge:input-closed')
    }

    async stop(): Promise<void> {
        this.close?.()
        this.close = null
    }

    async present(view: ApprovalView): Promise<void> {
        await this.write({ type: 'approval', view })
    }

    async deliver(conversationId: ConversationId, text: string): Promise<void> {
        await this.write({ type: 'reply', conversationId, text })
    }

    private write(line: OutboundLine): Promise<void> {
        return new Promise((resolve, reject) => {
            this.deps.output.write(`${JSON.stringify(line)}\n`, (error) => {
                if (error) reject(error)
                else resolve()
            })
        })
    }
}

type ParsedLine = { success: true; data: InboundLine } | { success: false; error: string }

function parseLine(raw: string): ParsedLine {
    let value: unknown
    try {
        value = JSON.parse(raw)
    } catch (error) {
        return { success: false, error: `invalid JSON: ${errorMessage(error)}` }
    }
    const result = InboundLineSchema.safeParse(value)
    if (!result.success) {
        const issue = result.error.issues[0]
        return { success: false, error: issue ? `${issue.path.join('.') || 'line'}: ${issue.message}` : 'invalid line' }
    }
    return { success: true, data: result.data }
}
