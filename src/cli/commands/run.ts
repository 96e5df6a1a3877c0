import { createControlHandler } from '../../bridge/control.js'
import { JsonLinesBridge } from '../../bridge/jsonl-bridge.js'
import type { ResolvedConfig } from '../../config/schema.js'
import { createContainer } from '../../core/container.js'
import type { FileSystem } from '../../core/fs.js'
import { createLogger } from '../../logger/index.js'

/**
 * Runs the coordinator against the JSON-lines bridge on stdin/stdout until input ends.
 * Logs go to stderr so stdout carries protocol lines only.
 */
export async function runCommand(config: ResolvedConfig, fs: FileSystem): Promise<void> {
    const logger = createLogger(config, { destination: 2 })
    if (!config.apiKey) logger.warn('run:no-api-key, every batch will wait for approval')
    let container: ReturnType<typeof createContainer> | null = null

    const bridge = new JsonLinesBridge({
        input: process.stdin,
        output: process.stdout,
        logger,
        onControl: (signal) => {
            if (!container) throw new Error('Coordinator is not ready')
            return createControlHandler(container)(signal)
        },
    })
    container = createContainer(config, { fs, logger, channel: bridge, sink: bridge })
    const ready = container

    const onSignal = () => {
        logger.info('run:interrupted')
        bridge.stop().catch((error: unknown) => logger.error({ error }, 'run:stop-failed'))
    }
    process.once('SIGINT', onSignal)
    process.once('SIGTERM', onSignal)

    try {
        await ready.initialize()
        await bridge.start(async (message) => {
            await ready.orchestrator.ingest(message)
        })
    } finally {
        process.off('SIGINT', onSignal)
        process.off('SIGTERM', onSignal)
        await ready.shutdown()
        process.stderr.write(`${ready.metricsCollector.formatStatus()}\n`)
    }
}
