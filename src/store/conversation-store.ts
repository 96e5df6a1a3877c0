import path from 'node:path'
import { StateCorruptionError, errorMessage, toIOError } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import { PerKeyLock } from '../core/per-key-lock.js'
import type { ConversationId, LifecycleSnapshot, Message } from '../core/types.js'
import type { Logger } from '../logger/index.js'
import { MessageSchema, QuarantineSchema, type QuarantineRecord, SnapshotSchema } from './schemas.js'

export interface ConversationStore {
    append(conversationId: ConversationId, message: Message): Promise<boolean>
    history(conversationId: ConversationId, limit?: number): Promise<Message[]>
    hasMessage(conversationId: ConversationId, dedupKey: string): Promise<boolean>
    loadState(conversationId: ConversationId): Promise<LifecycleSnapshot | null>
    saveState(conversationId: ConversationId, snapshot: LifecycleSnapshot): Promise<void>
    listConversations(): Promise<ConversationId[]>
    quarantine(conversationId: ConversationId, reason: string): Promise<void>
    quarantineRecord(conversationId: ConversationId): Promise<QuarantineRecord | null>
    reset(conversationId: ConversationId): Promise<void>
}

interface ConversationLog {
    messages: Message[]
    keys: Set<string>
}

const MESSAGES_FILE = 'messages.jsonl'
const STATE_FILE = 'state.json'
const QUARANTINE_FILE = 'quarantine.json'

export function assertSnapshotInvariants(conversationId: ConversationId, snapshot: LifecycleSnapshot): void {
    if (snapshot.openBatch && snapshot.pendingApproval) {
        throw new StateCorruptionError(conversationId, 'snapshot has both an open batch and a pending approval')
    }
}

export class FileConversationStore implements ConversationStore {
    private readonly root: string
    private readonly lock = new PerKeyLock<ConversationId>()
    private logs = new Map<ConversationId, Promise<ConversationLog>>()

    constructor(
        private fs: FileSystem,
        dataDir: string,
        private logger: Logger
    ) {
        this.root = path.join(dataDir, 'conversations')
    }

    async append(conversationId: ConversationId, message: Message): Promise<boolean> {
        if (message.conversationId !== conversationId) {
            throw new Error(`Message belongs to ${message.conversationId}, not ${conversationId}`)
        }
        return this.lock.runExclusive(conversationId, async () => {
            const log = await this.loadLog(conversationId)
            if (log.keys.has(message.dedupKey)) return false

            try {
                await this.fs.mkdir(this.dirFor(conversationId))
                // Records are newline-prefixed so a torn write never merges into the next record.
                await this.fs.appendText(this.fileFor(conversationId, MESSAGES_FILE), `\n${JSON.stringify(message)}`)
            } catch (error) {
                throw toIOError(error, `append to ${conversationId}`)
            }

            log.messages.push(message)
            log.keys.add(message.dedupKey)
            return true
        })
    }

    async history(conversationId: ConversationId, limit?: number): Promise<Message[]> {
        const { messages } = await this.loadLog(conversationId)
        if (limit === undefined || messages.length <= limit) return [...messages]
        return messages.slice(messages.length - limit)
    }

    async hasMessage(conversationId: ConversationId, dedupKey: string): Promise<boolean> {
        const { keys } = await this.loadLog(conversationId)
        return keys.has(dedupKey)
    }

    async loadState(conversationId: ConversationId): Promise<LifecycleSnapshot | null> {
        const file = this.fileFor(conversationId, STATE_FILE)
        let raw: string
        try {
            if (!(await this.fs.exists(file))) return null
            raw = await this.fs.readText(file)
        } catch (error) {
            throw toIOError(error, `read snapshot of ${conversationId}`)
        }

        let parsed: unknown
        try {
            parsed = JSON.parse(raw)
        } catch (error) {
            throw new StateCorruptionError(conversationId, `snapshot is not valid JSON (${errorMessage(error)})`)
        }
        const result = SnapshotSchema.safeParse(parsed)
        if (!result.success) {
            throw new StateCorruptionError(conversationId, `snapshot failed validation: ${result.error.issues[0]?.message ?? 'unknown'}`)
        }
        assertSnapshotInvariants(conversationId, result.data)
        return result.data
    }

    async saveState(conversationId: ConversationId, snapshot: LifecycleSnapshot): Promise<void> {
        assertSnapshotInvariants(conversationId, snapshot)
        await this.lock.runExclusive(conversationId, async () => {
            const file = this.fileFor(conversationId, STATE_FILE)
            const tmp = `${file}.tmp`
            try {
                await this.fs.mkdir(this.dirFor(conversationId))
                await this.fs.writeJSON(tmp, snapshot)
                await this.fs.rename(tmp, file)
            } catch (error) {
                throw toIOError(error, `save snapshot of ${conversationId}`)
            }
        })
    }

    async listConversations(): Promise<ConversationId[]> {
        try {
            const entries = await this.fs.list(this.root)
            return entries.map((entry) => decodeURIComponent(entry))
        } catch (error) {
            throw toIOError(error, 'list conversations')
        }
    }

    async quarantine(conversationId: ConversationId, reason: string): Promise<void> {
        await this.lock.runExclusive(conversationId, async () => {
            const record: QuarantineRecord = { reason, flaggedAt: new Date().toISOString() }
            try {
                await this.fs.mkdir(this.dirFor(conversationId))
                await this.fs.writeJSON(this.fileFor(conversationId, QUARANTINE_FILE), record)
            } catch (error) {
                throw toIOError(error, `quarantine ${conversationId}`)
            }
        })
        this.logger.warn({ conversationId, reason }, 'store:quarantined')
    }

    async quarantineRecord(conversationId: ConversationId): Promise<QuarantineRecord | null> {
        const file = this.fileFor(conversationId, QUARANTINE_FILE)
        try {
            if (!(await this.fs.exists(file))) return null
            const result = QuarantineSchema.safeParse(await this.fs.readJSON<unknown>(file))
            return result.success ? result.data : { reason: 'unreadable quarantine marker', flaggedAt: '' }
        } catch (error) {
            throw toIOError(error, `read quarantine marker of ${conversationId}`)
        }
    }

    async reset(conversationId: ConversationId): Promise<void> {
        await this.lock.runExclusive(conversationId, async () => {
            try {
                await this.fs.remove(this.dirFor(conversationId))
            } catch (error) {
                throw toIOError(error, `reset ${conversationId}`)
            }
            this.logs.delete(conversationId)
        })
        this.logger.info({ conversationId }, 'store:reset')
    }

    private loadLog(conversationId: ConversationId): Promise<ConversationLog> {
        const cached = this.logs.get(conversationId)
        if (cached) return cached

        // A failed read must not stay cached; the next call retries from disk.
        const loading = this.readLog(conversationId).catch((error: unknown) => {
            this.logs.delete(conversationId)
            throw error
        })
        this.logs.set(conversationId, loading)
        return loading
    }

    private async readLog(conversationId: ConversationId): Promise<ConversationLog> {
        const file = this.fileFor(conversationId, MESSAGES_FILE)
        let raw = ''
        try {
            if (await this.fs.exists(file)) raw = await this.fs.readText(file)
        } catch (error) {
            throw toIOError(error, `read history of ${conversationId}`)
        }

        const log: ConversationLog = { messages: [], keys: new Set() }
        let skipped = 0
        for (const line of raw.split('\n')) {
            if (!line.trim()) continue
            const message = parseLine(line)
            if (!message || message.conversationId !== conversationId) {
                skipped++
                continue
            }
            if (log.keys.has(message.dedupKey)) continue
            log.messages.push(message)
            log.keys.add(message.dedupKey)
        }
        if (skipped > 0) {
            this.logger.warn({ conversationId, skipped }, 'store:skipped-unreadable-records')
        }
        return log
    }

    private dirFor(conversationId: ConversationId): string {
        return path.join(this.root, encodeURIComponent(conversationId))
    }

    private fileFor(conversationId: ConversationId, name: string): string {
        return path.join(this.dirFor(conversationId), name)
    }
}

function parseLine(line: string): Message | null {
    try {
        const result = MessageSchema.safeParse(JSON.parse(line))
        return result.success ? result.data : null
    } catch {
        return null
    }
}
