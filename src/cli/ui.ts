import pc from 'picocolors'
import type { MeetupEntry } from '../ledger/meetup-log.js'
import type { ApprovalRecord, ConversationPhase, ConversationStatus, Listing, Message } from '../core/types.js'

export const colors = {
    brand: (text: string) => pc.magenta(pc.bold(text)),
    success: (text: string) => pc.green(text),
    error: (text: string) => pc.red(text),
    warn: (text: string) => pc.yellow(text),
    dim: (text: string) => pc.dim(text),
    bold: (text: string) => pc.bold(text),
    buyer: (name: string) => pc.cyan(name),
    token: (token: string) => pc.blue(token),
}

export function banner(version: string): string {
    return `${colors.brand('parley')} ${colors.dim(`v${version}`)}`
}

export function formatError(message: string): string {
    return `${colors.error('Error:')} ${message}`
}

const PHASE_COLORS: Record<ConversationPhase, (text: string) => string> = {
    idle: colors.dim,
    batching: pc.cyan,
    deciding: pc.cyan,
    'awaiting-approval': colors.warn,
    sending: pc.cyan,
    quarantined: colors.error,
    archived: colors.dim,
}

export function formatStatus(status: ConversationStatus): string {
    const phase = PHASE_COLORS[status.phase](status.phase.padEnd(17))
    const extra: string[] = []
    if (status.openBatchSize > 0) extra.push(`${status.openBatchSize} in batch`)
    if (status.pendingApproval) extra.push(`token ${colors.token(status.pendingApproval)}`)
    const name = status.displayName === status.conversationId ? '' : ` ${colors.dim(`(${status.displayName})`)}`
    return `${phase} ${colors.bold(status.conversationId)}${name}${extra.length > 0 ? `  ${extra.join(', ')}` : ''}`
}

export function formatMessage(message: Message): string {
    const who = message.role === 'inbound' ? colors.buyer('buyer') : colors.success('me   ')
    return `${colors.dim(message.timestamp)} ${who} ${message.text}`
}

export function formatApproval(record: ApprovalRecord, expiresAt: string): string {
    const { decision } = record
    const lines = [
        `${colors.token(record.token)} ${colors.bold(record.displayName)} ${colors.dim(`[${decision.category}]`)} ${decision.intentLabel}`,
        `  ${colors.dim('draft:')} ${decision.proposedReply || colors.dim('(none)')}`,
    ]
    if (decision.ownerNotes) lines.push(`  ${colors.dim('notes:')} ${decision.ownerNotes}`)
    lines.push(`  ${colors.dim(`expires ${expiresAt}`)}`)
    return lines.join('\n')
}

export function formatListing(listing: Listing): string {
    const lines = [colors.bold(listing.item.name)]
    if (listing.item.listedPrice !== undefined) lines.push(`  listed: $${listing.item.listedPrice}`)
    if (listing.item.floorPrice !== undefined) lines.push(`  floor:  $${listing.item.floorPrice}`)
    lines.push(`  pickup: ${listing.location || colors.dim('(not set)')}`)
    lines.push(`  avail:  ${listing.availabilityNote || colors.dim('(not set)')}`)
    return lines.join('\n')
}

export function formatMeetup(entry: MeetupEntry): string {
    return `${colors.dim(entry.loggedAt)} ${colors.bold(entry.displayName)} ${entry.timeText} ${colors.dim(`${entry.item} @ ${entry.location}`)}`
}
