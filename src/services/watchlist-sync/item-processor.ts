import type {
  BackendSubmitter,
  ItemResult,
  ItemState,
  MetadataResolver,
  SyncableMediaKind,
  WatchlistItem,
} from '@root/types/sync.types.js'
import { deriveSyncKey } from '@utils/sync-key.js'
import type { FastifyBaseLogger } from 'fastify'
import type { ExecutionStrategy } from './execution-strategy.js'

export interface ItemProcessorDeps {
  log: FastifyBaseLogger
  resolver: MetadataResolver
  submitters: Record<SyncableMediaKind, BackendSubmitter>
  strategy: ExecutionStrategy
}

/**
 * Drives one new watchlist item through resolution and submission.
 *
 * pending -> resolving -> submitting -> synced | failed | skipped
 *
 * A dry run goes from resolving straight to skipped.
 * Unknown media kinds go straight from pending to skipped. A resolver miss
 * ends in failed (not-found) without reaching a backend. The result is
 * terminal; nothing is retried within the run.
 */
export async function processItem(
  item: WatchlistItem,
  deps: ItemProcessorDeps,
): Promise<ItemResult> {
  const { log, resolver, submitters, strategy } = deps
  const base = {
    title: item.title,
    mediaKind: item.mediaKind,
    year: item.year ?? null,
    key: deriveSyncKey(item.title, item.mediaKind, item.year),
  }

  let state: ItemState = 'pending'
  const transition = (next: ItemState) => {
    log.trace(`"${item.title}": ${state} -> ${next}`)
    state = next
  }

  if (item.mediaKind === 'unknown') {
    transition('skipped')
    log.warn(`Unknown media type "${item.rawType}" for "${item.title}"`)
    return { ...base, state: 'skipped', action: 'unknown-kind' }
  }

  const submitter = submitters[item.mediaKind]

  transition('resolving')
  const externalId = await resolver.resolve(item.title, item.mediaKind)
  if (externalId === null) {
    transition('failed')
    log.warn(`Could not find TMDB ID for ${item.mediaKind}: ${item.title}`)
    return {
      ...base,
      state: 'failed',
      target: submitter.target,
      failure: 'not-found',
      detail: 'No TMDB match',
    }
  }

  if (strategy.submits) transition('submitting')
  const result = await strategy.execute(submitter, externalId, item)
  transition(result.state)

  return {
    ...base,
    target: submitter.target,
    externalId,
    ...result,
  }
}
