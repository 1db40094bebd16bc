import os from 'node:os'
import path from 'node:path'
import { ConfigError, errorMessage } from '../core/errors.js'
import type { FileStat, FileSystem } from '../core/fs.js'
import { isWithin } from '../navigator/paths.js'
import { DEFAULT_CONFIG, GLOBAL_CONFIG_FILE, LOCAL_CONFIG_FILE } from './defaults.js'
import { type Config, ConfigSchema, LOG_LEVELS, type LogLevel, type ResolvedConfig } from './schema.js'

interface LoadConfigOptions {
    fs: FileSystem
    cliFlags?: Partial<Config>
    projectDir?: string
    env?: NodeJS.ProcessEnv
    globalConfigFile?: string
}

async function loadJsonConfig(fs: FileSystem, filePath: string): Promise<Config> {
    if (!(await fs.exists(filePath))) return {}

    let raw: unknown
    try {
        raw = await fs.readJSON<unknown>(filePath)
    } catch (error) {
        throw new ConfigError(`Invalid config file ${filePath}: ${errorMessage(error)}`, { cause: error })
    }

    const parsed = ConfigSchema.safeParse(raw)
    if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ')
        throw new ConfigError(`Invalid config file ${filePath}: ${issues}`)
    }
    return parsed.data
}

async function requireDirectory(fs: FileSystem, key: string, dirPath: string): Promise<void> {
    let stat: FileStat
    try {
        stat = await fs.stat(dirPath)
    } catch (error) {
        throw new ConfigError(`${key} ${dirPath} does not exist`, { cause: error })
    }
    if (!stat.isDirectory) throw new ConfigError(`${key} ${dirPath} is not a directory`)
}

function isLogLevel(value: string): value is LogLevel {
    return (LOG_LEVELS as readonly string[]).includes(value)
}

function parsePort(value: string): number {
    const port = Number(value)
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
        throw new ConfigError(`Invalid SHELLCAST_PORT: ${value}`)
    }
    return port
}

export function configFromEnv(env: NodeJS.ProcessEnv): Config {
    const envConfig: Config = {}
    if (env.SHELLCAST_HOST) envConfig.host = env.SHELLCAST_HOST
    if (env.SHELLCAST_PORT) envConfig.port = parsePort(env.SHELLCAST_PORT)
    if (env.SHELLCAST_ROOT) envConfig.rootDirectory = env.SHELLCAST_ROOT
    if (env.SHELLCAST_SANDBOX) envConfig.sandboxRoot = env.SHELLCAST_SANDBOX
    if (env.SHELLCAST_LOG_LEVEL) {
        if (!isLogLevel(env.SHELLCAST_LOG_LEVEL)) {
            throw new ConfigError(`Invalid SHELLCAST_LOG_LEVEL: ${env.SHELLCAST_LOG_LEVEL}`)
        }
        envConfig.logLevel = env.SHELLCAST_LOG_LEVEL
    }
    return envConfig
}

function mergeConfigs(...configs: Config[]): Config {
    const merged: Config = {}
    for (const cfg of configs) {
        for (const [key, value] of Object.entries(cfg)) {
            if (value !== undefined) {
                Object.assign(merged, { [key]: value })
            }
        }
    }
    return merged
}

export async function loadConfig(options: LoadConfigOptions): Promise<ResolvedConfig> {
    const {
        fs,
        cliFlags = {},
        projectDir = process.cwd(),
        env = process.env,
        globalConfigFile = GLOBAL_CONFIG_FILE,
    } = options

    const globalConfig = await loadJsonConfig(fs, globalConfigFile)
    const localConfig = await loadJsonConfig(fs, path.join(projectDir, LOCAL_CONFIG_FILE))

    // Priority: CLI flags > env vars > local config > global config > defaults
    const merged = mergeConfigs(globalConfig, localConfig, configFromEnv(env), cliFlags)

    const sandboxRoot = merged.sandboxRoot ? path.resolve(projectDir, merged.sandboxRoot) : undefined
    const rootDirectory = merged.rootDirectory
        ? path.resolve(projectDir, merged.rootDirectory)
        : (sandboxRoot ?? os.homedir())

    if (sandboxRoot && !isWithin(sandboxRoot, rootDirectory)) {
        throw new ConfigError(`rootDirectory ${rootDirectory} lies outside sandboxRoot ${sandboxRoot}`)
    }
    if (sandboxRoot) await requireDirectory(fs, 'sandboxRoot', sandboxRoot)
    await requireDirectory(fs, 'rootDirectory', rootDirectory)

    return {
        ...DEFAULT_CONFIG,
        ...merged,
        blockedCommands: merged.blockedCommands ?? DEFAULT_CONFIG.blockedCommands,
        rootDirectory,
        sandboxRoot,
    }
}
