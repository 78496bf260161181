import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'

const __filename = fileURLToPath(import.meta.url)
const __dirname = dirname(__filename)

export const projectRoot = resolve(__dirname, '..', '..')

/**
 * Resolves the data directory holding the sync cache and logs.
 *
 * Priority:
 * 1. process.env.dataDir (explicit override, e.g. a mounted container volume)
 * 2. {projectRoot}/data
 */
export function resolveDataDir(): string {
  return process.env.dataDir
    ? resolve(process.env.dataDir)
    : resolve(projectRoot, 'data')
}

/**
 * Resolves the default sync cache file: {dataDir}/sync_cache.json
 */
export function resolveCacheFile(): string {
  return resolve(resolveDataDir(), 'sync_cache.json')
}

/**
 * Resolves the log directory path: {dataDir}/logs
 */
export function resolveLogPath(): string {
  return resolve(resolveDataDir(), 'logs')
}

/**
 * Resolves the .env file path. Always {projectRoot}/.env
 */
export function resolveEnvPath(): string {
  return resolve(projectRoot, '.env')
}
