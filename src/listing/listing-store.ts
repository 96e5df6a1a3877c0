import path from 'node:path'
import { z } from 'zod'
import { errorMessage, toIOError } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import type { Listing } from '../core/types.js'
import type { Logger } from '../logger/index.js'

export const ListingSchema = z.object({
    item: z.object({
        name: z.string().min(1),
        listedPrice: z.number().nonnegative().optional(),
        floorPrice: z.number().nonnegative().optional(),
    }),
    location: z.string().default(''),
    availabilityNote: z.string().default(''),
})

interface ListingStoreDeps {
    fs: FileSystem
    file: string
    logger: Logger
}

/**
 * The active item the seller is answering about. Read on every decision so edits apply without a restart.
 */
export class ListingStore {
    constructor(private deps: ListingStoreDeps) {}

    get file(): string {
        return this.deps.file
    }

    /** Returns null when no listing is configured or the file is invalid. */
    async load(): Promise<Listing | null> {
        let raw: unknown
        try {
            if (!(await this.deps.fs.exists(this.deps.file))) return null
            raw = await this.deps.fs.readJSON<unknown>(this.deps.file)
        } catch (error) {
            this.deps.logger.warn({ file: this.deps.file, error: errorMessage(error) }, 'listing:unreadable')
            return null
        }
        const result = ListingSchema.safeParse(raw)
        if (!result.success) {
            this.deps.logger.warn({ file: this.deps.file, issue: result.error.issues[0]?.message }, 'listing:invalid')
            return null
        }
        return result.data
    }

    async save(listing: Listing): Promise<void> {
        const parsed = ListingSchema.parse(listing)
        try {
            await this.deps.fs.mkdir(path.dirname(this.deps.file))
            await this.deps.fs.writeJSON(this.deps.file, parsed)
        } catch (error) {
            throw toIOError(error, 'save listing')
        }
        this.deps.logger.info({ item: parsed.item.name }, 'listing:saved')
    }

    async setAvailability(note: string): Promise<Listing> {
        const current = await this.load()
        if (!current) throw new Error(`No listing configured at ${this.deps.file}`)
        const next: Listing = { ...current, availabilityNote: note.trim() }
        await this.save(next)
        return next
    }
}
