import { z } from 'zod'
import { MAX_TIMER_DELAY_MS } from '../scheduler/timers.js'

export const LogLevelSchema = z.enum(['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'])

export const ConfigSchema = z.object({
    dataDir: z.string().optional(),
    listingFile: z.string().optional(),
    quietWindowMs: z.number().int().positive().max(MAX_TIMER_DELAY_MS).optional(),
    maxBatchSize: z.number().int().min(1).optional(),
    approvalTimeoutMs: z.number().int().positive().max(MAX_TIMER_DELAY_MS).optional(),
    reasoningTimeoutMs: z.number().int().positive().max(MAX_TIMER_DELAY_MS).optional(),
    historyLimit: z.number().int().positive().optional(),
    promptTokenBudget: z.number().int().positive().optional(),
    model: z.string().optional(),
    apiKey: z.string().optional(),
    baseURL: z.string().optional(),
    temperature: z.number().min(0).max(2).optional(),
    logLevel: LogLevelSchema.optional(),
    retry: z
        .object({
            maxRetries: z.number().int().min(0).optional(),
            baseDelay: z.number().int().min(0).optional(),
            maxDelay: z.number().int().min(0).optional(),
        })
        .optional(),
})

export type Config = z.infer<typeof ConfigSchema>
export type LogLevel = z.infer<typeof LogLevelSchema>

export interface ResolvedConfig {
    dataDir: string
    listingFile: string
    quietWindowMs: number
    maxBatchSize: number
    approvalTimeoutMs: number
    reasoningTimeoutMs: number
    historyLimit: number
    promptTokenBudget: number
    model: string
    apiKey: string
    baseURL: string
    temperature: number
    logLevel: LogLevel
    retry: { maxRetries: number; baseDelay: number; maxDelay: number }
    projectDir: string
    configDir: string
}
