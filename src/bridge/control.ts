import type { ApprovalBroker, ResolveResult } from '../approval/broker.js'
import type { Orchestrator } from '../orchestrator/orchestrator.js'
import type { ControlSignal, OutboundLine } from './jsonl-bridge.js'

interface ControlDeps {
    broker: Pick<ApprovalBroker, 'resolve'>
    orchestrator: Pick<Orchestrator, 'teardown'>
}

function ack(token: string, result: ResolveResult): OutboundLine {
    if (result.applied) return { type: 'ack', token, applied: true }
    return { type: 'ack', token, applied: false, reason: result.reason }
}

/** Maps approval and teardown lines onto the broker and orchestrator. */
export function createControlHandler(deps: ControlDeps): (signal: ControlSignal) => Promise<OutboundLine | null> {
    return async (signal) => {
        switch (signal.type) {
            case 'approve':
                return ack(signal.token, await deps.broker.resolve(signal.token, 'approved', signal.text))
            case 'reject':
                return ack(signal.token, await deps.broker.resolve(signal.token, 'rejected'))
            case 'teardown':
                await deps.orchestrator.teardown(signal.conversationId)
                return null
        }
    }
}
