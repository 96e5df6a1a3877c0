import type { Container } from '../../core/container.js'
import { colors, formatStatus } from '../ui.js'

export async function statusCommand(container: Container): Promise<void> {
    await container.broker.load()
    const statuses = await container.orchestrator.statuses()
    if (statuses.length === 0) {
        console.log(colors.dim('No conversations yet.'))
        return
    }
    for (const status of statuses) console.log(formatStatus(status))
}
