import type {
  MediaKind,
  WatchlistItem,
  WatchlistSource,
} from '@root/types/sync.types.js'
import {
  type PlexWatchlistEntry,
  PlexWatchlistMetadataSchema,
  PlexWatchlistResponseSchema,
} from '@schemas/plex/watchlist.schema.js'
import { describeFetchError, truncate } from '@utils/arr-error.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'

/**
 * Raised when the watchlist snapshot cannot be obtained. The sync run ends
 * early on this error instead of processing a partial list.
 */
export class WatchlistFetchError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
  ) {
    super(message)
    this.name = 'WatchlistFetchError'
  }
}

export interface PlexWatchlistOptions {
  token: string
  url: string
  timeoutMs: number
}

export function toMediaKind(type: string | undefined): MediaKind {
  if (type === 'movie') return 'movie'
  if (type === 'show') return 'show'
  return 'unknown'
}

export class PlexWatchlistService implements WatchlistSource {
  private get log(): FastifyBaseLogger {
    return createServiceLogger(this.baseLog, 'PLEX')
  }

  constructor(
    private readonly baseLog: FastifyBaseLogger,
    private readonly options: PlexWatchlistOptions,
  ) {}

  /**
   * Fetches the whole watchlist in one request.
   *
   * @throws {WatchlistFetchError} On a missing token, a non-2xx response,
   *   an unparseable body or a network failure
   */
  async fetch(): Promise<WatchlistItem[]> {
    const { token, url, timeoutMs } = this.options
    if (!token.trim()) {
      throw new WatchlistFetchError('No Plex token provided')
    }

    this.log.info('Fetching watchlist from Plex...')

    let response: Response
    let bodyText: string
    try {
      response = await fetch(url, {
        headers: {
          Accept: 'application/json',
          'X-Plex-Token': token,
        },
        signal: AbortSignal.timeout(timeoutMs),
      })
      bodyText = await response.text()
    } catch (error) {
      throw new WatchlistFetchError(
        `Error fetching watchlist: ${describeFetchError(error, timeoutMs)}`,
      )
    }

    if (!response.ok) {
      throw new WatchlistFetchError(
        `Plex API error: HTTP ${response.status} - ${truncate(bodyText, 200)}`,
        response.status,
      )
    }

    let data: unknown
    try {
      data = JSON.parse(bodyText)
    } catch {
      throw new WatchlistFetchError(
        `Plex returned a non-JSON watchlist body: ${truncate(bodyText, 100)}`,
        response.status,
      )
    }

    const parsed = PlexWatchlistResponseSchema.safeParse(data)
    if (!parsed.success) {
      throw new WatchlistFetchError(
        'Plex returned an unexpected watchlist structure',
        response.status,
      )
    }

    const items: WatchlistItem[] = []
    for (const [index, raw] of (
      parsed.data.MediaContainer.Metadata ?? []
    ).entries()) {
      const entry = PlexWatchlistMetadataSchema.safeParse(raw)
      if (!entry.success) {
        this.log.debug(
          { index, issues: entry.error.issues },
          'Dropping malformed watchlist entry',
        )
        continue
      }
      const item = this.toWatchlistItem(entry.data)
      if (item) items.push(item)
    }

    this.log.info(`Found ${items.length} items in watchlist`)
    return items
  }

  private toWatchlistItem(
    entry: PlexWatchlistEntry,
  ): WatchlistItem | null {
    if (!entry.title) {
      this.log.debug(
        { ratingKey: entry.ratingKey, guid: entry.guid },
        'Dropping watchlist entry without a title',
      )
      return null
    }

    const rawType = entry.type ?? ''
    return {
      title: entry.title,
      mediaKind: toMediaKind(rawType),
      rawType,
      ...(typeof entry.year === 'number' ? { year: entry.year } : {}),
    }
  }
}
