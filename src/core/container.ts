import { ApprovalBroker } from '../approval/broker.js'
import type { ResolvedConfig } from '../config/schema.js'
import { MeetupLog } from '../ledger/meetup-log.js'
import { ListingStore } from '../listing/listing-store.js'
import { createLLMClient } from '../llm/client.js'
import type { Logger } from '../logger/index.js'
import { createLogger } from '../logger/index.js'
import { Orchestrator } from '../orchestrator/orchestrator.js'
import { DecisionRouter } from '../router/decision-router.js'
import { createLLMReasoner } from '../router/llm-reasoner.js'
import type { TimerFactory } from '../scheduler/timers.js'
import { type ConversationStore, FileConversationStore } from '../store/conversation-store.js'
import { MetricsCollector } from '../tracing/metrics.js'
import { TypedEventEmitter } from './events.js'
import { type FileSystem, NodeFileSystem } from './fs.js'
import type { ApprovalChannel, OutboundSink, ReasoningCollaborator } from './types.js'

export interface ContainerOptions {
    fs?: FileSystem
    logger?: Logger
    channel?: ApprovalChannel
    sink?: OutboundSink
    reasoner?: ReasoningCollaborator
    timers?: TimerFactory
}

export interface Container {
    config: ResolvedConfig
    logger: Logger
    eventBus: TypedEventEmitter
    fs: FileSystem
    store: ConversationStore
    broker: ApprovalBroker
    router: DecisionRouter
    listing: ListingStore
    meetups: MeetupLog
    orchestrator: Orchestrator
    metricsCollector: MetricsCollector
    initialize(): Promise<void>
    shutdown(): Promise<void>
}

// Offline commands (status, history, reset) never reach the outbound side.
const detached: ApprovalChannel & OutboundSink = {
    async present() {
        throw new Error('No approval channel attached')
    },
    async deliver() {
        throw new Error('No outbound sink attached')
    },
}

export function createContainer(config: ResolvedConfig, options: ContainerOptions = {}): Container {
    const logger = options.logger ?? createLogger(config)
    const eventBus = new TypedEventEmitter()
    const fs = options.fs ?? new NodeFileSystem()
    const store = new FileConversationStore(fs, config.dataDir, logger)
    const broker = new ApprovalBroker({ fs, dataDir: config.dataDir, logger, eventBus })
    const reasoner =
        options.reasoner ??
        createLLMReasoner({ llm: createLLMClient(config, logger), tokenBudget: config.promptTokenBudget })
    const router = new DecisionRouter({ reasoner, timeoutMs: config.reasoningTimeoutMs, logger })
    const listing = new ListingStore({ fs, file: config.listingFile, logger })
    const meetups = new MeetupLog({ fs, dataDir: config.dataDir, logger })
    const orchestrator = new Orchestrator({
        store,
        router,
        broker,
        channel: options.channel ?? detached,
        sink: options.sink ?? detached,
        listing,
        meetups,
        eventBus,
        timers: options.timers,
        logger,
        config: {
            quietWindowMs: config.quietWindowMs,
            maxBatchSize: config.maxBatchSize,
            approvalTimeoutMs: config.approvalTimeoutMs,
            historyLimit: config.historyLimit,
            retry: config.retry,
        },
    })
    const metricsCollector = new MetricsCollector(eventBus)

    const container: Container = {
        config,
        logger,
        eventBus,
        fs,
        store,
        broker,
        router,
        listing,
        meetups,
        orchestrator,
        metricsCollector,

        async initialize() {
            await orchestrator.start()
        },

        async shutdown() {
            const errors: Error[] = []
            try {
                await orchestrator.stop()
            } catch (e) {
                errors.push(e instanceof Error ? e : new Error(String(e)))
            }
            try {
                metricsCollector.dispose()
            } catch (e) {
                errors.push(e instanceof Error ? e : new Error(String(e)))
            }
            try {
                eventBus.removeAll()
            } catch (e) {
                errors.push(e instanceof Error ? e : new Error(String(e)))
            }
            if (errors.length > 0) {
                logger.warn({ errors: errors.map((e) => e.message) }, 'Errors during shutdown')
            }
        },
    }

    return container
}
