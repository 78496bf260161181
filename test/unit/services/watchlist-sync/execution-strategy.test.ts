import {
  createExecutionStrategy,
  DryRunStrategy,
  EmitCommandsStrategy,
  LiveStrategy,
  outcomeToResult,
  resolveRunMode,
} from '@services/watchlist-sync/execution-strategy.js'
import { renderCurlCommand } from '@utils/command-emitter.js'
import { describe, expect, it, vi } from 'vitest'
import { createMockLogger } from '../../../mocks/logger.js'
import { FakeSubmitter, movie, show } from '../../../mocks/sync-fakes.js'

describe('execution-strategy', () => {
  describe('resolveRunMode', () => {
    it.each([
      [false, false, 'live'],
      [true, false, 'dry-run'],
      [false, true, 'emit-commands'],
      [true, true, 'emit-commands'],
    ])('dryRun=%s emitCommands=%s should select %s', (dryRun, emitCommands, mode) => {
      expect(resolveRunMode({ dryRun, emitCommands })).toBe(mode)
    })
  })

  describe('outcomeToResult', () => {
    it('should treat created and already-exists as synced to the target', () => {
      expect(outcomeToResult({ kind: 'created' }, 'radarr')).toEqual({
        state: 'synced',
        action: 'submitted',
        syncAs: 'radarr',
      })
      expect(
        outcomeToResult(
          { kind: 'already-exists', message: 'already been added' },
          'sonarr',
        ),
      ).toEqual({
        state: 'synced',
        action: 'already-exists',
        syncAs: 'sonarr',
        detail: 'already been added',
      })
    })

    it('should map failures without a sync target', () => {
      expect(
        outcomeToResult({ kind: 'rejected', reason: 'bad path' }, 'radarr'),
      ).toEqual({ state: 'failed', failure: 'rejected', detail: 'bad path' })
      expect(
        outcomeToResult(
          { kind: 'transient-failure', reason: 'HTTP 502: ' },
          'radarr',
        ),
      ).toEqual({
        state: 'failed',
        failure: 'transient-failure',
        detail: 'HTTP 502: ',
      })
    })
  })

  describe('createExecutionStrategy', () => {
    it('should build the strategy for each mode', () => {
      const log = createMockLogger()
      const sink = vi.fn()

      expect(createExecutionStrategy('live', log, sink)).toBeInstanceOf(
        LiveStrategy,
      )
      expect(createExecutionStrategy('dry-run', log, sink)).toBeInstanceOf(
        DryRunStrategy,
      )
      expect(
        createExecutionStrategy('emit-commands', log, sink),
      ).toBeInstanceOf(EmitCommandsStrategy)
    })
  })

  describe('LiveStrategy', () => {
    it('should submit through the backend', async () => {
      const radarr = new FakeSubmitter('radarr')

      const result = await new LiveStrategy().execute(
        radarr,
        329865,
        movie('Arrival', 2016),
      )

      expect(result).toEqual({
        state: 'synced',
        action: 'submitted',
        syncAs: 'radarr',
      })
      expect(radarr.sent).toHaveLength(1)
    })
  })

  describe('DryRunStrategy', () => {
    it('should log the intended add without touching the backend', async () => {
      const log = createMockLogger()
      const sonarr = new FakeSubmitter('sonarr')

      const result = await new DryRunStrategy(log).execute(
        sonarr,
        95396,
        show('Severance', 2022),
      )

      expect(result).toEqual({ state: 'skipped', action: 'would-submit' })
      expect(sonarr.prepared).toEqual([])
      expect(log.info).toHaveBeenCalledWith(
        '[DRY RUN] Would add show to Sonarr: Severance (TMDB: 95396)',
      )
    })
  })

  describe('EmitCommandsStrategy', () => {
    it('should hand the rendered request to the sink', async () => {
      const sink = vi.fn()
      const sonarr = new FakeSubmitter('sonarr')

      const result = await new EmitCommandsStrategy(
        createMockLogger(),
        sink,
      ).execute(sonarr, 95396, show('Severance', 2022))

      const command = renderCurlCommand(
        FakeSubmitter.requestFor('sonarr', 95396, 'Severance'),
      )
      expect(sink).toHaveBeenCalledWith(command)
      expect(result).toEqual({
        state: 'synced',
        action: 'emitted',
        syncAs: 'sonarr-curl',
        command,
      })
      expect(sonarr.sent).toEqual([])
    })

    it('should not emit when the request cannot be built', async () => {
      const sink = vi.fn()
      const sonarr = new FakeSubmitter('sonarr')
      sonarr.prepareFailure = {
        kind: 'transient-failure',
        reason: 'Series lookup failed: HTTP 503: ',
      }

      const result = await new EmitCommandsStrategy(
        createMockLogger(),
        sink,
      ).execute(sonarr, 95396, show('Severance', 2022))

      expect(sink).not.toHaveBeenCalled()
      expect(result).toEqual({
        state: 'failed',
        failure: 'transient-failure',
        detail: 'Series lookup failed: HTTP 503: ',
      })
    })
  })
})
