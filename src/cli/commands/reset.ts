import type { Container } from '../../core/container.js'
import { confirmAction, showOutro, showWelcome } from '../prompts.js'
import { colors } from '../ui.js'

export async function resetCommand(container: Container, conversationId: string, yes = false): Promise<void> {
    if (!yes) {
        showWelcome(`Reset ${conversationId}`)
        const confirmed = await confirmAction(`Erase all history and state for ${conversationId}?`)
        if (!confirmed) {
            showOutro(colors.dim('Cancelled.'))
            return
        }
    }
    await container.broker.load()
    await container.orchestrator.reset(conversationId)
    console.log(colors.success(`Reset ${conversationId}.`))
}
