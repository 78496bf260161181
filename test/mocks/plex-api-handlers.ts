import type { PlexWatchlistMetadata } from '@schemas/plex/watchlist.schema.js'
import { HttpResponse, http } from 'msw'
import { TEST_URLS } from './test-config.js'

/**
 * Builds a watchlist body in the shape Plex returns with
 * `Accept: application/json`.
 */
export function plexWatchlistBody(entries: PlexWatchlistMetadata[]) {
  return {
    MediaContainer: {
      size: entries.length,
      totalSize: entries.length,
      Metadata: entries,
    },
  }
}

export function plexWatchlistHandler(entries: PlexWatchlistMetadata[]) {
  return http.get(TEST_URLS.plexWatchlist, () =>
    HttpResponse.json(plexWatchlistBody(entries)),
  )
}

/**
 * Default: an empty watchlist, so a run without per-test handlers ends
 * quickly with nothing to do.
 */
export const plexApiHandlers = [plexWatchlistHandler([])]
