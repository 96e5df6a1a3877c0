import path from 'node:path'
import type { FileSystem } from '../core/fs.js'
import { CONFIG_DIR, DEFAULT_CONFIG, GLOBAL_CONFIG_FILE, LISTING_FILE_NAME, LOCAL_CONFIG_DIR, LOCAL_CONFIG_FILE } from './defaults.js'
import { type Config, ConfigSchema, LogLevelSchema, type ResolvedConfig } from './schema.js'

interface LoadConfigOptions {
    fs: FileSystem
    cliFlags?: Partial<Config>
    projectDir?: string
    env?: NodeJS.ProcessEnv
}

async function loadJsonConfig(fs: FileSystem, filePath: string): Promise<Config> {
    try {
        if (await fs.exists(filePath)) {
            const raw = await fs.readJSON<unknown>(filePath)
            return ConfigSchema.parse(raw)
        }
    } catch {
        // Invalid config file, skip
    }
    return {}
}

function mergeConfigs(...configs: Config[]): Config {
    const merged: Record<string, unknown> = {}
    for (const cfg of configs) {
        for (const [key, value] of Object.entries(cfg)) {
            if (value !== undefined) {
                merged[key] = value
            }
        }
    }
    return ConfigSchema.parse(merged)
}

function readEnv(env: NodeJS.ProcessEnv): Config {
    const envConfig: Config = {}
    if (env.PARLEY_API_KEY) envConfig.apiKey = env.PARLEY_API_KEY
    if (env.PARLEY_MODEL) envConfig.model = env.PARLEY_MODEL
    if (env.PARLEY_DATA_DIR) envConfig.dataDir = env.PARLEY_DATA_DIR
    const level = LogLevelSchema.safeParse(env.PARLEY_LOG_LEVEL)
    if (level.success) envConfig.logLevel = level.data
    return envConfig
}

export async function loadConfig(options: LoadConfigOptions): Promise<ResolvedConfig> {
    const { fs, cliFlags = {}, projectDir = process.cwd(), env = process.env } = options

    const globalConfig = await loadJsonConfig(fs, GLOBAL_CONFIG_FILE)
    const localConfig = await loadJsonConfig(fs, path.join(projectDir, LOCAL_CONFIG_FILE))

    // Priority: CLI flags > env vars > local config > global config > defaults
    const merged = mergeConfigs(globalConfig, localConfig, readEnv(env), cliFlags)

    const dataDir = path.resolve(projectDir, merged.dataDir ?? LOCAL_CONFIG_DIR)

    return {
        ...DEFAULT_CONFIG,
        ...merged,
        apiKey: merged.apiKey ?? '',
        dataDir,
        listingFile: path.resolve(projectDir, merged.listingFile ?? path.join(dataDir, LISTING_FILE_NAME)),
        retry: { ...DEFAULT_CONFIG.retry, ...merged.retry },
        projectDir,
        configDir: CONFIG_DIR,
    }
}
