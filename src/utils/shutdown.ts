import type { FastifyBaseLogger } from 'fastify'

export interface ShutdownTarget {
  log: FastifyBaseLogger
  close: () => Promise<unknown>
}

export interface ShutdownEvent {
  err?: Error
  signal?: string
}

/**
 * Builds the close-with-grace callback for a sync run.
 *
 * Anything that reaches this handler interrupted the run, so the process
 * exits non-zero once the instance is closed, signal or error alike.
 */
export function createShutdownHandler(
  target: ShutdownTarget,
  exit: (code: number) => void = (code) => process.exit(code),
) {
  return async ({ err, signal }: ShutdownEvent): Promise<void> => {
    if (err != null) {
      target.log.error(err)
    } else if (signal) {
      target.log.warn(`Received ${signal}, stopping sync`)
    }
    await target.close()
    exit(1)
  }
}
