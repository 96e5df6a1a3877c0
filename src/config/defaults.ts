import type { ResolvedConfig } from './schema.js'

export const DEFAULT_CONFIG: Omit<ResolvedConfig, 'apiKey' | 'projectDir' | 'configDir' | 'dataDir' | 'listingFile'> = {
    quietWindowMs: 3000,
    maxBatchSize: 8,
    approvalTimeoutMs: 60 * 60 * 1000,
    reasoningTimeoutMs: 30_000,
    historyLimit: 120,
    promptTokenBudget: 6000,
    model: 'google/gemini-2.5-flash',
    baseURL: 'https://openrouter.ai/api/v1',
    temperature: 0.2,
    logLevel: 'info',
    retry: { maxRetries: 3, baseDelay: 1000, maxDelay: 8000 },
}

export const CONFIG_DIR = `${process.env.HOME ?? '~'}/.config/parley`
export const GLOBAL_CONFIG_FILE = `${CONFIG_DIR}/config.json`
export const LOCAL_CONFIG_DIR = '.parley'
export const LOCAL_CONFIG_FILE = `${LOCAL_CONFIG_DIR}/config.json`
export const LISTING_FILE_NAME = 'listing.json'
