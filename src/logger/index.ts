import pino from 'pino'
import type { ResolvedConfig } from '../config/schema.js'

export type Logger = pino.Logger

export interface LoggerOptions {
    /** File descriptor for log output. The JSON-lines bridge keeps stdout for protocol traffic. */
    destination?: 1 | 2
}

export function createLogger(config: Pick<ResolvedConfig, 'logLevel'>, options: LoggerOptions = {}): Logger {
    const destination = options.destination ?? 1
    if (config.logLevel === 'debug' || config.logLevel === 'trace') {
        return pino({
            name: 'parley',
            level: config.logLevel,
            transport: { target: 'pino-pretty', options: { colorize: true, destination } },
        })
    }
    return pino({ name: 'parley', level: config.logLevel }, pino.destination(destination))
}
