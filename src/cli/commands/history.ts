import type { Container } from '../../core/container.js'
import { colors, formatMessage } from '../ui.js'

export async function historyCommand(container: Container, conversationId: string, limit?: number): Promise<void> {
    const messages = await container.store.history(conversationId, limit)
    if (messages.length === 0) {
        console.log(colors.dim(`No messages for ${conversationId}.`))
        return
    }
    for (const message of messages) console.log(formatMessage(message))
}
