import path from 'node:path'
import { z } from 'zod'
import { toIOError } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import type { Decision, Listing } from '../core/types.js'
import type { Logger } from '../logger/index.js'

const MeetupEntrySchema = z.object({
    loggedAt: z.string(),
    conversationId: z.string(),
    displayName: z.string(),
    item: z.string(),
    location: z.string(),
    timeText: z.string(),
    note: z.string(),
})

export type MeetupEntry = z.infer<typeof MeetupEntrySchema>

interface MeetupLogDeps {
    fs: FileSystem
    dataDir: string
    logger: Logger
}

export const MEETUP_FILE = 'meetups.jsonl'

export class MeetupLog {
    private readonly file: string

    constructor(private deps: MeetupLogDeps) {
        this.file = path.join(deps.dataDir, MEETUP_FILE)
    }

    /** Records a confirmed meetup. Decisions without a confirmed time are ignored. */
    async record(decision: Decision, displayName: string, listing: Listing | null): Promise<MeetupEntry | null> {
        const meetup = decision.meetup
        if (!meetup?.confirmed || !meetup.timeText) return null

        const entry: MeetupEntry = {
            loggedAt: new Date().toISOString(),
            conversationId: decision.conversationId,
            displayName,
            item: listing?.item.name ?? '',
            location: listing?.location ?? '',
            timeText: meetup.timeText,
            note: decision.ownerNotes ?? decision.intentLabel,
        }
        try {
            await this.deps.fs.mkdir(this.deps.dataDir)
            await this.deps.fs.appendText(this.file, `${JSON.stringify(entry)}\n`)
        } catch (error) {
            throw toIOError(error, 'append meetup')
        }
        this.deps.logger.info({ conversationId: entry.conversationId, timeText: entry.timeText }, 'ledger:meetup-logged')
        return entry
    }

    async list(): Promise<MeetupEntry[]> {
        let raw: string
        try {
            if (!(await this.deps.fs.exists(this.file))) return []
            raw = await this.deps.fs.readText(this.file)
        } catch (error) {
            throw toIOError(error, 'read meetups')
        }
        const entries: MeetupEntry[] = []
        for (const line of raw.split('\n')) {
            if (!line.trim()) continue
            const entry = parseEntry(line)
            if (entry) entries.push(entry)
        }
        return entries
    }
}

function parseEntry(line: string): MeetupEntry | null {
    try {
        const result = MeetupEntrySchema.safeParse(JSON.parse(line))
        return result.success ? result.data : null
    } catch {
        return null
    }
}
