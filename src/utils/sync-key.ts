import { createHash } from 'node:crypto'
import type { MediaKind, SyncKey } from '@root/types/sync.types.js'

/** Stands in for a missing year, so every yearless item of a title shares a key. */
export const UNKNOWN_YEAR_SENTINEL = 'unknown'

/**
 * Derives the dedup key for a watchlist item.
 *
 * The raw fields are joined with `|` and hashed with MD5. Nothing is
 * normalized, so titles differing only in case or whitespace get different
 * keys. A `|` inside a title can make two different field splits produce the
 * same input string; this is a known limitation.
 *
 * @example
 * deriveSyncKey('Arrival', 'movie', 2016) // md5('Arrival|movie|2016')
 * deriveSyncKey('Arrival', 'movie') // md5('Arrival|movie|unknown')
 */
export function deriveSyncKey(
  title: string,
  mediaKind: MediaKind,
  year?: number | null,
): SyncKey {
  const keyString = `${title}|${mediaKind}|${year ?? UNKNOWN_YEAR_SENTINEL}`
  return createHash('md5').update(keyString).digest('hex')
}
