import { expiresAt } from '../../approval/view.js'
import type { Container } from '../../core/container.js'
import { colors, formatApproval } from '../ui.js'

export async function approvalsCommand(container: Container): Promise<void> {
    await container.broker.load()
    const pending = container.broker.pending()
    if (pending.length === 0) {
        console.log(colors.dim('No pending approvals.'))
        return
    }
    for (const record of pending) {
        console.log(formatApproval(record, expiresAt(record, container.config.approvalTimeoutMs)))
    }
}
