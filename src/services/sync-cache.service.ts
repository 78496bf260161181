import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import type {
  CacheState,
  SyncRecord,
  SyncTargetTag,
  WatchlistItem,
} from '@root/types/sync.types.js'
import {
  type SyncCacheFile,
  SyncCacheFileSchema,
  type SyncRecordFile,
} from '@schemas/sync-cache/sync-cache.schema.js'
import { createServiceLogger } from '@utils/logger.js'
import { deriveSyncKey } from '@utils/sync-key.js'
import type { FastifyBaseLogger } from 'fastify'

const HOUR_MS = 60 * 60 * 1000

export interface SyncCacheOptions {
  cacheFile: string
  refreshHours: number
  /** Clock used for expiry and timestamps */
  now?: () => Date
}

function isMissingFileError(error: unknown): boolean {
  return (
    error instanceof Error && 'code' in error && error.code === 'ENOENT'
  )
}

/**
 * Persists the set of watchlist items already handed to a backend.
 *
 * The whole file is replaced by every save. The cache expires wholesale once
 * `last_refresh` is older than `refreshHours`, after which every item is
 * treated as new again and the backends' own duplicate detection takes over.
 * Concurrent runs against the same file are not coordinated: the last save
 * wins.
 */
export class SyncCacheService {
  private readonly now: () => Date

  private get log(): FastifyBaseLogger {
    return createServiceLogger(this.baseLog, 'CACHE')
  }

  constructor(
    private readonly baseLog: FastifyBaseLogger,
    private readonly options: SyncCacheOptions,
  ) {
    this.now = options.now ?? (() => new Date())
  }

  get cacheFile(): string {
    return this.options.cacheFile
  }

  createEmptyState(now: Date = this.now()): CacheState {
    return { syncedItems: {}, lastRefresh: now.toISOString() }
  }

  async load(): Promise<CacheState> {
    let raw: string
    try {
      raw = await readFile(this.cacheFile, 'utf-8')
    } catch (error) {
      if (isMissingFileError(error)) {
        this.log.info(`No cache file at ${this.cacheFile}, starting fresh`)
      } else {
        this.log.warn({ error }, 'Could not read cache file, starting fresh')
      }
      return this.createEmptyState()
    }

    let data: unknown
    try {
      data = JSON.parse(raw)
    } catch (error) {
      this.log.warn({ error }, 'Cache file is not valid JSON, starting fresh')
      return this.createEmptyState()
    }

    const parsed = SyncCacheFileSchema.safeParse(data)
    if (!parsed.success) {
      this.log.warn(
        `Cache file has an unexpected structure, starting fresh: ${parsed.error.message}`,
      )
      return this.createEmptyState()
    }

    const now = this.now()
    const lastRefreshMs = parsed.data.last_refresh
      ? Date.parse(parsed.data.last_refresh)
      : Number.NaN
    const ageMs = now.getTime() - lastRefreshMs
    // An unparseable timestamp counts as infinitely old
    if (Number.isNaN(ageMs) || ageMs > this.options.refreshHours * HOUR_MS) {
      this.log.info(
        `Cache older than ${this.options.refreshHours} hours, refreshing`,
      )
      return this.createEmptyState(now)
    }

    const syncedItems: Record<string, SyncRecord> = {}
    for (const [key, record] of Object.entries(parsed.data.synced_items)) {
      syncedItems[key] = {
        title: record.title,
        mediaKind: record.media_type,
        year: record.year,
        targetService: record.target_service ?? '',
        syncedAt: record.synced_at,
      }
    }

    this.log.debug(`Loaded ${Object.keys(syncedItems).length} cached records`)
    return { syncedItems, lastRefresh: parsed.data.last_refresh ?? '' }
  }

  /**
   * Writes the state to a temporary sibling and renames it over the cache
   * file. Returns false when the write fails.
   */
  async save(state: CacheState): Promise<boolean> {
    const synced_items: Record<string, SyncRecordFile> = {}
    for (const [key, record] of Object.entries(state.syncedItems)) {
      synced_items[key] = {
        title: record.title,
        media_type: record.mediaKind,
        year: record.year,
        target_service: record.targetService,
        synced_at: record.syncedAt,
      }
    }
    const file: SyncCacheFile = {
      synced_items,
      last_refresh: state.lastRefresh,
    }

    const tmpFile = `${this.cacheFile}.tmp`
    try {
      await mkdir(dirname(this.cacheFile), { recursive: true })
      await writeFile(tmpFile, JSON.stringify(file, null, 2), 'utf-8')
      await rename(tmpFile, this.cacheFile)
      this.log.debug(`Saved ${Object.keys(synced_items).length} cached records`)
      return true
    } catch (error) {
      this.log.error({ error }, `Failed to save cache to ${this.cacheFile}`)
      await rm(tmpFile, { force: true }).catch((rmError: unknown) => {
        this.log.warn({ error: rmError }, `Could not remove ${tmpFile}`)
      })
      return false
    }
  }

  isSynced(state: CacheState, item: WatchlistItem): boolean {
    return Object.hasOwn(
      state.syncedItems,
      deriveSyncKey(item.title, item.mediaKind, item.year),
    )
  }

  markSynced(
    state: CacheState,
    item: WatchlistItem,
    targetService: SyncTargetTag,
  ): SyncRecord {
    const record: SyncRecord = {
      title: item.title,
      mediaKind: item.mediaKind,
      year: item.year ?? null,
      targetService,
      syncedAt: this.now().toISOString(),
    }
    state.syncedItems[deriveSyncKey(item.title, item.mediaKind, item.year)] =
      record
    return record
  }
}
