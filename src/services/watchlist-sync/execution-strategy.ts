import type {
  BackendSubmitter,
  ItemResult,
  RunMode,
  SubmitOutcome,
  SyncTarget,
  SyncTargetTag,
  WatchlistItem,
} from '@root/types/sync.types.js'
import { renderCurlCommand } from '@utils/command-emitter.js'
import type { FastifyBaseLogger } from 'fastify'

/** The part of an item's result decided once its external id is known */
export type StrategyResult = Pick<
  ItemResult,
  'state' | 'action' | 'syncAs' | 'failure' | 'detail' | 'command'
>

export interface ExecutionStrategy {
  readonly mode: RunMode
  /** False when the strategy stops before anything is submitted */
  readonly submits: boolean
  execute(
    submitter: BackendSubmitter,
    externalId: number,
    item: WatchlistItem,
  ): Promise<StrategyResult>
}

/** Receives each rendered command in emit-commands mode */
export type CommandSink = (command: string) => void

/**
 * Picks the run mode from the two config flags. Emitting commands takes
 * precedence over a dry run when both are set.
 */
export function resolveRunMode(flags: {
  dryRun: boolean
  emitCommands: boolean
}): RunMode {
  if (flags.emitCommands) return 'emit-commands'
  if (flags.dryRun) return 'dry-run'
  return 'live'
}

const SERVICE_NAMES: Record<SyncTarget, string> = {
  radarr: 'Radarr',
  sonarr: 'Sonarr',
}

function curlTag(target: SyncTarget): SyncTargetTag {
  return target === 'radarr' ? 'radarr-curl' : 'sonarr-curl'
}

/**
 * Maps a backend outcome onto the item's terminal state. Both a fresh create
 * and a duplicate reported by the backend count as synced.
 */
export function outcomeToResult(
  outcome: SubmitOutcome,
  target: SyncTarget,
): StrategyResult {
  switch (outcome.kind) {
    case 'created':
      return { state: 'synced', action: 'submitted', syncAs: target }
    case 'already-exists':
      return {
        state: 'synced',
        action: 'already-exists',
        syncAs: target,
        detail: outcome.message,
      }
    case 'rejected':
      return { state: 'failed', failure: 'rejected', detail: outcome.reason }
    case 'transient-failure':
      return {
        state: 'failed',
        failure: 'transient-failure',
        detail: outcome.reason,
      }
  }
}

export class LiveStrategy implements ExecutionStrategy {
  readonly mode = 'live' as const
  readonly submits = true

  async execute(
    submitter: BackendSubmitter,
    externalId: number,
    item: WatchlistItem,
  ): Promise<StrategyResult> {
    const outcome = await submitter.submit(externalId, item)
    return outcomeToResult(outcome, submitter.target)
  }
}

export class DryRunStrategy implements ExecutionStrategy {
  readonly mode = 'dry-run' as const
  readonly submits = false

  constructor(private readonly log: FastifyBaseLogger) {}

  async execute(
    submitter: BackendSubmitter,
    externalId: number,
    item: WatchlistItem,
  ): Promise<StrategyResult> {
    this.log.info(
      `[DRY RUN] Would add ${item.mediaKind} to ${SERVICE_NAMES[submitter.target]}: ${item.title} (TMDB: ${externalId})`,
    )
    return { state: 'skipped', action: 'would-submit' }
  }
}

/**
 * Builds each create request without sending it and hands it to the sink as
 * a curl command. Read-only lookups the request depends on still run.
 */
export class EmitCommandsStrategy implements ExecutionStrategy {
  readonly mode = 'emit-commands' as const
  readonly submits = true

  constructor(
    private readonly log: FastifyBaseLogger,
    private readonly sink: CommandSink,
  ) {}

  async execute(
    submitter: BackendSubmitter,
    externalId: number,
    item: WatchlistItem,
  ): Promise<StrategyResult> {
    const prepared = await submitter.prepare(externalId, item)
    if (!prepared.ok) {
      this.log.warn(
        `Could not build ${SERVICE_NAMES[submitter.target]} command for "${item.title}": ${prepared.outcome.reason}`,
      )
      return outcomeToResult(prepared.outcome, submitter.target)
    }

    const command = renderCurlCommand(prepared.request)
    this.log.info(
      `Emitting ${SERVICE_NAMES[submitter.target]} command for "${prepared.canonicalTitle}"`,
    )
    this.sink(command)
    return {
      state: 'synced',
      action: 'emitted',
      syncAs: curlTag(submitter.target),
      command,
    }
  }
}

export function createExecutionStrategy(
  mode: RunMode,
  log: FastifyBaseLogger,
  sink: CommandSink,
): ExecutionStrategy {
  switch (mode) {
    case 'live':
      return new LiveStrategy()
    case 'dry-run':
      return new DryRunStrategy(log)
    case 'emit-commands':
      return new EmitCommandsStrategy(log, sink)
  }
}
