import type {
  ItemResult,
  RunMode,
  SyncSummary,
} from '@root/types/sync.types.js'
import type { FastifyBaseLogger } from 'fastify'

const PREVIEW_LIMIT = 5
const RULE = '='.repeat(60)

export function createSummary(
  mode: RunMode,
  total: number,
  skipped: number,
): SyncSummary {
  return {
    mode,
    total,
    skipped,
    processed: 0,
    movies: 0,
    shows: 0,
    unknown: 0,
    synced: 0,
    alreadyExisted: 0,
    emitted: 0,
    wouldSubmit: 0,
    failed: { notFound: 0, rejected: 0, transient: 0 },
    cachedTotal: 0,
    cacheSaved: false,
    results: [],
  }
}

export function recordResult(summary: SyncSummary, result: ItemResult): void {
  summary.processed++
  summary.results.push(result)

  switch (result.mediaKind) {
    case 'movie':
      summary.movies++
      break
    case 'show':
      summary.shows++
      break
    case 'unknown':
      summary.unknown++
      break
  }

  if (result.state === 'synced') summary.synced++

  switch (result.action) {
    case 'already-exists':
      summary.alreadyExisted++
      break
    case 'emitted':
      summary.emitted++
      break
    case 'would-submit':
      summary.wouldSubmit++
      break
  }

  switch (result.failure) {
    case 'not-found':
      summary.failed.notFound++
      break
    case 'rejected':
      summary.failed.rejected++
      break
    case 'transient-failure':
      summary.failed.transient++
      break
  }
}

/**
 * Formats up to five skipped titles, e.g. `A, B, C, D, E and 2 more...`
 */
export function formatSkippedPreview(titles: string[]): string {
  const shown = titles.slice(0, PREVIEW_LIMIT).join(', ')
  const rest = titles.length - PREVIEW_LIMIT
  return rest > 0 ? `${shown} and ${rest} more...` : shown
}

export function logSummary(log: FastifyBaseLogger, summary: SyncSummary): void {
  const { failed } = summary
  log.info(RULE)
  log.info('SUMMARY')
  log.info(RULE)
  log.info(`New movies processed: ${summary.movies}`)
  log.info(`New TV shows processed: ${summary.shows}`)
  log.info(`Unknown types: ${summary.unknown}`)
  log.info(`Items newly synced: ${summary.synced}`)
  if (summary.alreadyExisted > 0) {
    log.info(`Already present in a backend: ${summary.alreadyExisted}`)
  }
  const failedTotal = failed.notFound + failed.rejected + failed.transient
  if (failedTotal > 0) {
    log.warn(
      `Failed: ${failedTotal} (not found: ${failed.notFound}, rejected: ${failed.rejected}, transient: ${failed.transient})`,
    )
  }
  log.info(`Total cached items: ${summary.cachedTotal}`)
  log.info(`Total watchlist items: ${summary.total}`)
  if (!summary.cacheSaved) {
    log.error('Sync cache could not be saved; this run will be repeated')
  }

  switch (summary.mode) {
    case 'dry-run':
      log.info(
        `Dry run: ${summary.wouldSubmit} items would be added. Run without dryRun=true to add them, or with emitCommands=true to print curl commands`,
      )
      break
    case 'emit-commands':
      log.info(
        `Emitted ${summary.emitted} curl commands. Test one command first to verify authentication`,
      )
      break
    case 'live':
      if (summary.synced > 0) {
        log.info(`Successfully synced ${summary.synced} new items`)
      } else if (summary.processed === 0) {
        log.info('All watchlist items already synced, nothing to do')
      }
      break
  }
}
