/**
 * Types shared by the watchlist reconciliation run: the watchlist snapshot,
 * the dedup cache, backend submission outcomes and the run summary.
 */

export type MediaKind = 'movie' | 'show' | 'unknown'

/** Media kinds that map onto a backend. */
export type SyncableMediaKind = Exclude<MediaKind, 'unknown'>

export interface WatchlistItem {
  title: string
  mediaKind: MediaKind
  /** Type string exactly as reported by the watchlist */
  rawType: string
  year?: number
}

/** 32-character hex fingerprint of (title, media kind, year) */
export type SyncKey = string

export type SyncTarget = 'radarr' | 'sonarr'

/** Backend tag stored on a record; `-curl` marks commands emitted for manual execution */
export type SyncTargetTag = SyncTarget | `${SyncTarget}-curl`

export interface SyncRecord {
  title: string
  mediaKind: string
  year: number | null
  targetService: string
  syncedAt: string
}

export interface CacheState {
  syncedItems: Record<SyncKey, SyncRecord>
  lastRefresh: string
}

export type SubmitOutcome =
  | { kind: 'created' }
  | { kind: 'already-exists'; message: string }
  | { kind: 'rejected'; reason: string }
  | { kind: 'transient-failure'; reason: string }

export type SubmitFailure = Extract<
  SubmitOutcome,
  { kind: 'rejected' | 'transient-failure' }
>

/** A fully built backend request, sendable as-is or printable as a command */
export interface ArrRequest {
  method: 'POST'
  url: string
  headers: Record<string, string>
  body: unknown
}

export type PreparedSubmission =
  | { ok: true; request: ArrRequest; canonicalTitle: string }
  | { ok: false; outcome: SubmitFailure }

export interface BackendSubmitter {
  readonly target: SyncTarget
  /**
   * Builds the create request without calling the backend's create endpoint.
   * Read-only lookups needed to fill the request happen here.
   */
  prepare(externalId: number, item: WatchlistItem): Promise<PreparedSubmission>
  send(request: ArrRequest): Promise<SubmitOutcome>
  submit(externalId: number, item: WatchlistItem): Promise<SubmitOutcome>
}

export interface MetadataResolver {
  /** Returns the first-ranked external id, or null when nothing usable came back. */
  resolve(title: string, mediaKind: SyncableMediaKind): Promise<number | null>
}

export interface WatchlistSource {
  fetch(): Promise<WatchlistItem[]>
}

export type RunMode = 'live' | 'dry-run' | 'emit-commands'

export type ItemState =
  | 'pending'
  | 'resolving'
  | 'submitting'
  | 'synced'
  | 'failed'
  | 'skipped'

export type TerminalItemState = Extract<
  ItemState,
  'synced' | 'failed' | 'skipped'
>

export type FailureReason = 'not-found' | 'rejected' | 'transient-failure'

export type ItemAction =
  | 'cached'
  | 'unknown-kind'
  | 'submitted'
  | 'already-exists'
  | 'would-submit'
  | 'emitted'

export interface ItemResult {
  title: string
  mediaKind: MediaKind
  year: number | null
  key: SyncKey
  state: TerminalItemState
  action?: ItemAction
  target?: SyncTarget
  /** Set when the loop should record the item as synced */
  syncAs?: SyncTargetTag
  externalId?: number
  failure?: FailureReason
  detail?: string
  command?: string
}

export interface SyncSummary {
  mode: RunMode
  total: number
  skipped: number
  processed: number
  movies: number
  shows: number
  unknown: number
  synced: number
  alreadyExisted: number
  emitted: number
  wouldSubmit: number
  failed: {
    notFound: number
    rejected: number
    transient: number
  }
  cachedTotal: number
  cacheSaved: boolean
  results: ItemResult[]
}
