/**
 * Watchlist Sync Service
 *
 * One reconciliation pass: load the dedup cache, fetch the watchlist, hand
 * every item not yet in the cache to its backend and record what the
 * backend accepted. Items are processed one at a time in watchlist order.
 */

import type { Config } from '@root/types/config.types.js'
import type {
  BackendSubmitter,
  CacheState,
  MetadataResolver,
  RunMode,
  SyncSummary,
  WatchlistItem,
  WatchlistSource,
} from '@root/types/sync.types.js'
import { WatchlistFetchError } from '@services/plex-watchlist.service.js'
import type { SyncCacheService } from '@services/sync-cache.service.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'
import {
  type CommandSink,
  createExecutionStrategy,
  resolveRunMode,
} from './watchlist-sync/execution-strategy.js'
import { processItem } from './watchlist-sync/item-processor.js'
import {
  createSummary,
  formatSkippedPreview,
  logSummary,
  recordResult,
} from './watchlist-sync/summary.js'

export interface WatchlistSyncDeps {
  cache: SyncCacheService
  watchlist: WatchlistSource
  resolver: MetadataResolver
  radarr: BackendSubmitter
  sonarr: BackendSubmitter
  /** Where emitted commands go; stdout by default */
  emitCommand?: CommandSink
}

const MODE_BANNERS: Record<RunMode, string | null> = {
  live: null,
  'dry-run': 'DRY RUN MODE - No items will actually be added',
  'emit-commands': 'COMMAND MODE - Printing curl commands instead of adding',
}

export class WatchlistSyncService {
  private get log(): FastifyBaseLogger {
    return createServiceLogger(this.baseLog, 'WATCHLIST-SYNC')
  }

  constructor(
    private readonly baseLog: FastifyBaseLogger,
    private readonly config: Config,
    private readonly deps: WatchlistSyncDeps,
  ) {}

  get mode(): RunMode {
    return resolveRunMode(this.config)
  }

  /**
   * Runs one pass. Returns null when the watchlist could not be fetched;
   * the cache is saved in that case too.
   */
  async run(): Promise<SyncSummary | null> {
    const { cache, watchlist } = this.deps
    const mode = this.mode

    this.log.info(`Sync started at ${new Date().toISOString()}`)
    const state = await cache.load()
    this.log.info(
      `Found ${Object.keys(state.syncedItems).length} previously synced items`,
    )
    const banner = MODE_BANNERS[mode]
    if (banner) this.log.info(banner)

    let items: WatchlistItem[]
    try {
      items = await watchlist.fetch()
    } catch (error) {
      if (!(error instanceof WatchlistFetchError)) throw error
      this.log.error({ error }, 'Could not fetch watchlist, ending run')
      await cache.save(state)
      return null
    }

    if (items.length === 0) {
      this.log.info('No items found in watchlist')
      return this.finish(createSummary(mode, 0, 0), state)
    }

    const newItems: WatchlistItem[] = []
    const skippedTitles: string[] = []
    for (const item of items) {
      if (cache.isSynced(state, item)) {
        skippedTitles.push(item.title)
      } else {
        newItems.push(item)
      }
    }

    this.log.info(`${skippedTitles.length} items already synced (skipping)`)
    this.log.info(`${newItems.length} new items to process`)
    if (skippedTitles.length > 0) {
      this.log.info(`Previously synced: ${formatSkippedPreview(skippedTitles)}`)
    }

    const summary = createSummary(mode, items.length, skippedTitles.length)
    if (newItems.length === 0) {
      this.log.info('Nothing new to sync')
      return this.finish(summary, state)
    }

    const sink: CommandSink =
      this.deps.emitCommand ??
      ((command) => {
        process.stdout.write(`${command}\n\n`)
      })
    const strategy = createExecutionStrategy(mode, this.log, sink)
    const itemDeps = {
      log: this.log,
      resolver: this.deps.resolver,
      submitters: { movie: this.deps.radarr, show: this.deps.sonarr },
      strategy,
    }

    for (const [index, item] of newItems.entries()) {
      this.log.info(
        `[${index + 1}/${newItems.length}] ${item.title} (${item.year ?? 'Unknown'}) - Type: ${item.rawType}`,
      )
      const result = await processItem(item, itemDeps)
      if (result.syncAs) {
        cache.markSynced(state, item, result.syncAs)
      }
      recordResult(summary, result)
    }

    return this.finish(summary, state)
  }

  private async finish(
    summary: SyncSummary,
    state: CacheState,
  ): Promise<SyncSummary> {
    summary.cacheSaved = await this.deps.cache.save(state)
    summary.cachedTotal = Object.keys(state.syncedItems).length
    logSummary(this.log, summary)
    return summary
  }
}
