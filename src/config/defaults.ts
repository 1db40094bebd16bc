import os from 'node:os'
import path from 'node:path'
import type { ResolvedConfig } from './schema.js'

export const DEFAULT_CONFIG: Omit<ResolvedConfig, 'rootDirectory' | 'sandboxRoot'> = {
    host: '0.0.0.0',
    port: 5000,
    historyLimit: 1000,
    dedupeHistory: true,
    transcriptLimit: 500,
    metricsIntervalMs: 2000,
    commandTimeoutMs: 10000,
    sessionTtlMs: 30000,
    passthrough: true,
    blockedCommands: ['rm -rf /', 'rm -rf /*', 'dd', 'mkfs', 'format'],
    nlMarker: '!',
    logLevel: 'info',
}

export const CONFIG_DIR = path.join(os.homedir(), '.config', 'shellcast')
export const GLOBAL_CONFIG_FILE = path.join(CONFIG_DIR, 'config.json')
export const LOCAL_CONFIG_DIR = '.shellcast'
export const LOCAL_CONFIG_FILE = `${LOCAL_CONFIG_DIR}/config.json`
