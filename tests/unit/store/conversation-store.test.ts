import { describe, it, expect } from 'vitest'
import { MockFileSystem } from '../../../src/core/fs.js'
import { StateCorruptionError, TransientIOError } from '../../../src/core/errors.js'
import { FileConversationStore } from '../../../src/store/conversation-store.js'
import type { LifecycleSnapshot } from '../../../src/core/types.js'
import { makeMessage, silentLogger } from '../../helpers/fixtures.js'

const dataDir = '/data'
const logFile = '/data/conversations/c1/messages.jsonl'
const stateFile = '/data/conversations/c1/state.json'

class FailingAppendFileSystem extends MockFileSystem {
    override async appendText(): Promise<void> {
        throw Object.assign(new Error('EIO: i/o error, write'), { code: 'EIO' })
    }
}

function createStore(fs = new MockFileSystem()) {
    return { fs, store: new FileConversationStore(fs, dataDir, silentLogger) }
}

describe('FileConversationStore', () => {
    it('appends messages and returns them oldest first', async () => {
        const { store } = createStore()
        const first = makeMessage('c1', 'Is it available?')
        const second = makeMessage('c1', 'Also is it negotiable?')

        expect(await store.append('c1', first)).toBe(true)
        expect(await store.append('c1', second)).toBe(true)

        const history = await store.history('c1')
        expect(history.map((m) => m.text)).toEqual(['Is it available?', 'Also is it negotiable?'])
    })

    it('stores a dedup key once and reports the duplicate', async () => {
        const { fs, store } = createStore()
        const message = makeMessage('c1', 'Is it available?')

        expect(await store.append('c1', message)).toBe(true)
        expect(await store.append('c1', { ...message, timestamp: '2024-02-01T00:00:00.000Z' })).toBe(false)

        expect(await store.history('c1')).toHaveLength(1)
        expect(fs.getFile(logFile)?.split('\n').filter(Boolean)).toHaveLength(1)
        expect(await store.hasMessage('c1', message.dedupKey)).toBe(true)
    })

    it('writes newline-prefixed JSON records', async () => {
        const { fs, store } = createStore()
        const message = makeMessage('c1', 'hello')
        await store.append('c1', message)
        expect(fs.getFile(logFile)).toBe(`\n${JSON.stringify(message)}`)
    })

    it('caps history to the most recent messages', async () => {
        const { store } = createStore()
        for (const text of ['one', 'two', 'three', 'four']) {
            await store.append('c1', makeMessage('c1', text))
        }
        expect((await store.history('c1', 2)).map((m) => m.text)).toEqual(['three', 'four'])
    })

    it('rejects a message addressed to another conversation', async () => {
        const { store } = createStore()
        await expect(store.append('c1', makeMessage('c2', 'hi'))).rejects.toThrow('Message belongs to c2, not c1')
    })

    it('reloads history from disk and skips a torn trailing record', async () => {
        const fs = new MockFileSystem()
        const good = makeMessage('c1', 'Is it available?')
        fs.setFile(logFile, `\n${JSON.stringify(good)}\n{"conversationId":"c1","ro`)

        const { store } = createStore(fs)
        const history = await store.history('c1')
        expect(history).toEqual([good])
    })

    it('appends after a torn record without merging into it', async () => {
        const fs = new MockFileSystem()
        fs.setFile(logFile, '\n{"conversationId":"c1","ro')
        const { store } = createStore(fs)
        const message = makeMessage('c1', 'still there?')
        await store.append('c1', message)

        const reopened = new FileConversationStore(fs, dataDir, silentLogger)
        expect(await reopened.history('c1')).toEqual([message])
    })

    it('propagates I/O failures as TransientIOError', async () => {
        const { store } = createStore(new FailingAppendFileSystem())
        await expect(store.append('c1', makeMessage('c1', 'hi'))).rejects.toBeInstanceOf(TransientIOError)
        expect(await store.history('c1')).toEqual([])
    })

    describe('lifecycle snapshot', () => {
        const snapshot: LifecycleSnapshot = {
            openBatch: { dedupKeys: ['k1', 'k2'], openedAt: '2024-01-01T12:00:00.000Z' },
            pendingApproval: null,
            displayName: 'Dana',
            updatedAt: '2024-01-01T12:00:01.000Z',
        }

        it('returns null for an unknown conversation', async () => {
            const { store } = createStore()
            expect(await store.loadState('nobody')).toBeNull()
        })

        it('saves atomically and loads back', async () => {
            const { fs, store } = createStore()
            await store.saveState('c1', snapshot)
            expect(await fs.exists(`${stateFile}.tmp`)).toBe(false)
            expect(await store.loadState('c1')).toEqual(snapshot)
        })

        it('keeps held message keys beside a pending approval', async () => {
            const { store } = createStore()
            const held = { openBatch: null, pendingApproval: 'tok-1', heldKeys: ['k3'], updatedAt: '2024-01-01T12:00:02.000Z' }
            await store.saveState('c1', held)
            expect(await store.loadState('c1')).toEqual(held)
        })

        it('refuses a snapshot with both an open batch and a pending approval', async () => {
            const { store } = createStore()
            await expect(store.saveState('c1', { ...snapshot, pendingApproval: 'tok-1' })).rejects.toBeInstanceOf(
                StateCorruptionError
            )
        })

        it('throws StateCorruptionError for unreadable or invalid snapshots', async () => {
            const fs = new MockFileSystem()
            const { store } = createStore(fs)

            fs.setFile(stateFile, '{"openBatch":')
            await expect(store.loadState('c1')).rejects.toBeInstanceOf(StateCorruptionError)

            fs.setFile(stateFile, JSON.stringify({ openBatch: null, updatedAt: 'now' }))
            await expect(store.loadState('c1')).rejects.toBeInstanceOf(StateCorruptionError)

            fs.setFile(stateFile, JSON.stringify({ ...snapshot, pendingApproval: 'tok-1' }))
            await expect(store.loadState('c1')).rejects.toThrow('both an open batch and a pending approval')
        })
    })

    it('lists conversations by their original ids', async () => {
        const { store } = createStore()
        await store.append('fb:123/4', makeMessage('fb:123/4', 'hi'))
        await store.saveState('c1', { openBatch: null, pendingApproval: null, updatedAt: 'now' })
        expect(await store.listConversations()).toEqual(['c1', 'fb:123/4'])
    })

    it('flags and reports quarantined conversations', async () => {
        const { store } = createStore()
        expect(await store.quarantineRecord('c1')).toBeNull()
        await store.quarantine('c1', 'snapshot failed validation')
        expect((await store.quarantineRecord('c1'))?.reason).toBe('snapshot failed validation')
    })

    it('reset removes history, snapshot and quarantine flag', async () => {
        const { fs, store } = createStore()
        await store.append('c1', makeMessage('c1', 'hi'))
        await store.saveState('c1', { openBatch: null, pendingApproval: null, updatedAt: 'now' })
        await store.quarantine('c1', 'manual')

        await store.reset('c1')

        expect(await store.history('c1')).toEqual([])
        expect(await store.loadState('c1')).toBeNull()
        expect(await store.quarantineRecord('c1')).toBeNull()
        expect(fs.getFiles().size).toBe(0)
    })
})
