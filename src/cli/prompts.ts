import * as clack from '@clack/prompts'
import { colors } from './ui.js'

export async function confirmAction(message: string): Promise<boolean> {
    const result = await clack.confirm({ message, initialValue: false })
    if (clack.isCancel(result)) return false
    return result
}

export function showWelcome(title: string): void {
    clack.intro(colors.brand(title))
}

export function showOutro(message: string): void {
    clack.outro(message)
}
