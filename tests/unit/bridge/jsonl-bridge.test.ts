import { PassThrough, Writable } from 'node:stream'
import { describe, it, expect, vi } from 'vitest'
import { JsonLinesBridge, type ControlSignal, type OutboundLine } from '../../../src/bridge/jsonl-bridge.js'
import type { InboundMessage } from '../../../src/core/types.js'
import { silentLogger } from '../../helpers/fixtures.js'

function createHarness(onControl: (signal: ControlSignal) => Promise<OutboundLine | null> = async () => null) {
    const input = new PassThrough()
    const written: OutboundLine[] = []
    const output = new Writable({
        write(chunk: Buffer, _encoding, callback) {
            for (const line of chunk.toString().split('\n')) {
                if (line) written.push(JSON.parse(line))
            }
            callback()
        },
    })
    const bridge = new JsonLinesBridge({ input, output, logger: silentLogger, onControl })
    return { input, written, bridge }
}

async function feed(input: PassThrough, lines: string[]): Promise<void> {
    input.end(lines.map((l) => `${l}\n`).join(''))
}

describe('JsonLinesBridge', () => {
    it('passes message lines to the handler without the type field', async () => {
        const { input, bridge } = createHarness()
        const received: InboundMessage[] = []

        const running = bridge.start(async (message) => {
            received.push(message)
        })
        await feed(input, [
            JSON.stringify({ type: 'message', conversationId: 'c1', text: 'Is it available?', displayName: 'Dana' }),
            '',
            JSON.stringify({ type: 'message', conversationId: 'c2', text: 'Hi', dedupKey: 'ext-1' }),
        ])
        await running

        expect(received).toEqual([
            { conversationId: 'c1', text: 'Is it available?', displayName: 'Dana' },
            { conversationId: 'c2', text: 'Hi', dedupKey: 'ext-1' },
        ])
    })

    it('routes control lines and writes their response', async () => {
        const onControl = vi.fn(async (signal: ControlSignal): Promise<OutboundLine | null> =>
            signal.type === 'teardown' ? null : { type: 'ack', token: signal.token, applied: true }
        )
        const { input, written, bridge } = createHarness(onControl)

        const running = bridge.start(async () => {})
        await feed(input, [
            JSON.stringify({ type: 'approve', token: 't1', text: 'Sure' }),
            JSON.stringify({ type: 'teardown', conversationId: 'c1' }),
        ])
        await running

        expect(onControl).toHaveBeenNthCalledWith(1, { type: 'approve', token: 't1', text: 'Sure' })
        expect(onControl).toHaveBeenNthCalledWith(2, { type: 'teardown', conversationId: 'c1' })
        expect(written).toEqual([{ type: 'ack', token: 't1', applied: true }])
    })

    it('reports invalid lines and keeps reading', async () => {
        const { input, written, bridge } = createHarness()
        const handler = vi.fn(async () => {})

        const running = bridge.start(handler)
        await feed(input, [
            '{ not json',
            JSON.stringify({ type: 'message', text: 'no conversation' }),
            JSON.stringify({ type: 'message', conversationId: 'c1', text: 'ok' }),
        ])
        await running

        expect(handler).toHaveBeenCalledTimes(1)
        expect(written).toHaveLength(2)
        const first = written[0]
        expect(first).toMatchObject({ type: 'error', line: 1 })
        expect(first?.type === 'error' ? first.error.startsWith('invalid JSON: ') : false).toBe(true)
        expect(written[1]).toEqual({ type: 'error', error: 'conversationId: Required', line: 2 })
    })

    it('turns handler failures into error lines', async () => {
        const { input, written, bridge } = createHarness()

        const running = bridge.start(async () => {
            throw new Error('store offline')
        })
        await feed(input, [JSON.stringify({ type: 'message', conversationId: 'c1', text: 'hello' })])
        await running

        expect(written).toEqual([{ type: 'error', error: 'store offline', line: 1 }])
    })

    it('writes replies and approval requests as lines', async () => {
        const { written, bridge } = createHarness()

        await bridge.deliver('c1', 'Yes, still available.')
        await bridge.present({
            token: 't1',
            conversationId: 'c1',
            displayName: 'Dana',
            intentLabel: 'Price negotiation',
            category: 'pricing',
            proposedReply: 'I can do $90.',
            expiresAt: '2024-01-01T13:00:00.000Z',
        })

        expect(written[0]).toEqual({ type: 'reply', conversationId: 'c1', text: 'Yes, still available.' })
        expect(written[1]?.type).toBe('approval')
    })

    it('stops reading when stopped', async () => {
        const { input, bridge } = createHarness()
        const handler = vi.fn(async () => {})

        const running = bridge.start(handler)
        await bridge.stop()
        await running
        input.write(`${JSON.stringify({ type: 'message', conversationId: 'c1', text: 'late' })}\n`)

        expect(handler).not.toHaveBeenCalled()
    })
})
