import { Command, InvalidArgumentError } from 'commander'
import { loadConfig } from '../config/loader.js'
import type { Config, ResolvedConfig } from '../config/schema.js'
import { createContainer } from '../core/container.js'
import { errorMessage } from '../core/errors.js'
import { type FileSystem, NodeFileSystem } from '../core/fs.js'
import { approvalsCommand } from './commands/approvals.js'
import { historyCommand } from './commands/history.js'
import { listingAvailCommand, listingShowCommand, meetupsCommand } from './commands/listing.js'
import { resetCommand } from './commands/reset.js'
import { runCommand } from './commands/run.js'
import { statusCommand } from './commands/status.js'
import { banner, formatError } from './ui.js'

export const VERSION = '0.1.0'

interface GlobalOptions {
    dataDir?: string
    model?: string
    key?: string
    debug?: boolean
    quietWindow?: number
    maxBatch?: number
}

function positiveInt(value: string): number {
    const parsed = Number.parseInt(value, 10)
    if (!Number.isInteger(parsed) || parsed < 1) throw new InvalidArgumentError('Expected a positive integer.')
    return parsed
}

function toCliFlags(options: GlobalOptions): Partial<Config> {
    return {
        dataDir: options.dataDir,
        model: options.model,
        apiKey: options.key,
        logLevel: options.debug ? 'debug' : undefined,
        quietWindowMs: options.quietWindow,
        maxBatchSize: options.maxBatch,
    }
}

async function withConfig(program: Command, fn: (config: ResolvedConfig, fs: FileSystem) => Promise<void>): Promise<void> {
    try {
        const fs = new NodeFileSystem()
        const config = await loadConfig({ fs, cliFlags: toCliFlags(program.opts<GlobalOptions>()) })
        await fn(config, fs)
    } catch (error) {
        console.error(formatError(errorMessage(error)))
        process.exitCode = 1
    }
}

/** Offline commands log warnings only, so table output stays readable. */
function offline(config: ResolvedConfig): ResolvedConfig {
    return config.logLevel === 'debug' || config.logLevel === 'trace' ? config : { ...config, logLevel: 'warn' }
}

export function createProgram(): Command {
    const program = new Command()

    program
        .name('parley')
        .description('Coordinates marketplace conversations: debounced replies with owner approval')
        .version(VERSION)
        .addHelpText('beforeAll', `${banner(VERSION)}\n`)
        .option('-d, --data-dir <dir>', 'Directory for conversation state')
        .option('-m, --model <model>', 'LLM model to use')
        .option('-k, --key <key>', 'API key for the OpenAI-compatible endpoint')
        .option('--quiet-window <ms>', 'Quiet window before a batch closes', positiveInt)
        .option('--max-batch <n>', 'Messages that close a batch immediately', positiveInt)
        .option('--debug', 'Enable debug logging')

    program
        .command('run')
        .description('Read JSON lines from stdin and write replies and approval requests to stdout')
        .action(() => withConfig(program, (config, fs) => runCommand(config, fs)))

    program
        .command('status')
        .description('Show the lifecycle phase of every conversation')
        .action(() => withConfig(program, (config, fs) => statusCommand(createContainer(offline(config), { fs }))))

    program
        .command('history <conversationId>')
        .description('Print the stored messages of a conversation')
        .option('-n, --limit <n>', 'Only the most recent messages', positiveInt)
        .action((conversationId: string, options: { limit?: number }) =>
            withConfig(program, (config, fs) => historyCommand(createContainer(offline(config), { fs }), conversationId, options.limit))
        )

    program
        .command('approvals')
        .description('List pending approval requests')
        .action(() => withConfig(program, (config, fs) => approvalsCommand(createContainer(offline(config), { fs }))))

    program
        .command('reset <conversationId>')
        .description('Erase the history and state of a conversation')
        .option('-y, --yes', 'Skip confirmation')
        .action((conversationId: string, options: { yes?: boolean }) =>
            withConfig(program, (config, fs) => resetCommand(createContainer(offline(config), { fs }), conversationId, options.yes))
        )

    const listing = program.command('listing').description('Manage the active listing')

    listing
        .command('show')
        .description('Print the active listing')
        .action(() => withConfig(program, (config, fs) => listingShowCommand(createContainer(offline(config), { fs }))))

    listing
        .command('avail <note...>')
        .description('Update the seller availability note')
        .action((note: string[]) =>
            withConfig(program, (config, fs) => listingAvailCommand(createContainer(offline(config), { fs }), note.join(' ')))
        )

    program
        .command('meetups')
        .description('List confirmed meetups')
        .action(() => withConfig(program, (config, fs) => meetupsCommand(createContainer(offline(config), { fs }))))

    return program
}
