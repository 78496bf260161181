import fs from 'node:fs'
import { config } from 'dotenv'
import type { FastifyBaseLogger } from 'fastify'
import type { LevelWithSilent, Logger, LoggerOptions } from 'pino'
import pino from 'pino'
import * as rfs from 'rotating-file-stream'
import { resolveEnvPath, resolveLogPath } from './data-dir.js'
import { redactUrl } from './url.js'

export const validLogLevels: LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
]

// Load .env file early for logger configuration
config({ path: resolveEnvPath() })

const prettyOptions = {
  translateTime: 'HH:MM:ss Z',
  ignore: 'pid,hostname',
  colorize: true, // Force colors even in Docker
}

type SerializableError =
  | Error
  | Record<string, unknown>
  | string
  | number
  | boolean

/**
 * Creates an error serializer for pino.
 *
 * Primitives become `{ message, type }`. Objects keep message, name, status,
 * statusCode and their own enumerable properties; the stack is kept unless the
 * error carries a 4xx status. Causes are serialized recursively and URLs in
 * messages have credential query parameters redacted.
 */
export function createErrorSerializer() {
  const serialize = (
    err: SerializableError | null | undefined,
  ): Record<string, unknown> | null | undefined => {
    if (err == null) {
      return err
    }

    if (typeof err !== 'object') {
      const primitiveType =
        typeof err === 'string'
          ? 'StringError'
          : typeof err === 'number'
            ? 'NumberError'
            : 'BooleanError'
      return { message: redactUrl(String(err)), type: primitiveType }
    }

    const serialized: Record<string, unknown> = {}

    if ('message' in err && err.message)
      serialized.message = redactUrl(String(err.message))
    if ('name' in err && err.name) serialized.name = err.name
    if ('status' in err && err.status !== undefined)
      serialized.status = err.status
    if ('statusCode' in err && err.statusCode !== undefined)
      serialized.statusCode = err.statusCode

    if (err instanceof TypeError) {
      serialized.type = 'TypeError'
    } else if (err instanceof SyntaxError) {
      serialized.type = 'SyntaxError'
    } else if (err instanceof RangeError) {
      serialized.type = 'RangeError'
    } else if (err instanceof AggregateError) {
      serialized.type = 'AggregateError'
    } else if (err instanceof Error) {
      serialized.type = 'Error'
    } else if ('name' in err && typeof err.name === 'string' && err.name) {
      serialized.type = err.name
    } else {
      serialized.type = 'UnknownError'
    }

    // Stack traces for 4xx responses are noise
    const statusCode =
      'statusCode' in err && typeof err.statusCode === 'number'
        ? err.statusCode
        : 'status' in err && typeof err.status === 'number'
          ? err.status
          : undefined
    const shouldIncludeStack = !statusCode || statusCode >= 500
    if ('stack' in err && err.stack && shouldIncludeStack) {
      serialized.stack = err.stack
    }

    // cause is non-enumerable on Error
    if ('cause' in err && err.cause) {
      serialized.cause = serialize(toSerializable(err.cause))
    }

    for (const [key, value] of Object.entries(err)) {
      if (
        !['message', 'stack', 'name', 'status', 'statusCode', 'type'].includes(
          key,
        )
      ) {
        serialized[key] = value
      }
    }

    return serialized
  }

  return serialize
}

function toSerializable(value: unknown): SerializableError | null | undefined {
  if (value == null) return value
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  ) {
    return value
  }
  if (value instanceof Error) return value
  if (typeof value === 'object') return { ...value }
  return String(value)
}

/**
 * Generates a log filename using the given date and optional index.
 *
 * Without a date returns 'watchlist-arr-sync-current.log', otherwise
 * 'watchlist-arr-sync-YYYY-MM-DD[-index].log'.
 */
function filename(time: number | Date, index?: number): string {
  if (!time) return 'watchlist-arr-sync-current.log'
  const date = typeof time === 'number' ? new Date(time) : time
  const year = date.getFullYear()
  const month = String(date.getMonth() + 1).padStart(2, '0')
  const day = String(date.getDate()).padStart(2, '0')
  const indexStr = index ? `-${index}` : ''
  return `watchlist-arr-sync-${year}-${month}-${day}${indexStr}.log`
}

/**
 * Creates a rotating file stream for logs, ensuring the log directory exists.
 * Falls back to stdout when the directory cannot be created.
 */
function getFileStream(): rfs.RotatingFileStream | NodeJS.WriteStream {
  const logDirectory = resolveLogPath()
  try {
    if (!fs.existsSync(logDirectory)) {
      fs.mkdirSync(logDirectory, { recursive: true })
    }
    return rfs.createStream(filename, {
      size: '10M',
      interval: '1d',
      path: logDirectory,
      compress: 'gzip',
      maxFiles: 7,
    })
  } catch (err) {
    console.error('Failed to setup log directory:', err)
    return process.stdout
  }
}

/**
 * Creates the application logger from the environment.
 *
 * Always logs to a rotating file. `enableConsoleOutput` (default true) adds
 * pretty-printed terminal output alongside it.
 */
export function createLogger(): Logger {
  const enableConsoleOutput = process.env.enableConsoleOutput !== 'false'
  const options: LoggerOptions = {
    level: 'info',
    serializers: {
      err: createErrorSerializer(),
      error: createErrorSerializer(),
    },
  }
  const fileStream = getFileStream()

  if (!enableConsoleOutput) {
    return pino(options, fileStream)
  }

  // Avoid double-logging if the file stream fell back to stdout
  if (fileStream === process.stdout) {
    return pino({
      ...options,
      transport: { target: 'pino-pretty', options: prettyOptions },
    })
  }

  const prettyStream = pino.transport({
    target: 'pino-pretty',
    options: prettyOptions,
  })

  return pino(
    options,
    pino.multistream([{ stream: prettyStream }, { stream: fileStream }]),
  )
}

/**
 * Creates a child logger whose messages are prefixed with `[SERVICE] `.
 */
export function createServiceLogger(
  parent: FastifyBaseLogger,
  service: string,
): FastifyBaseLogger {
  return parent.child({}, { msgPrefix: `[${service.toUpperCase()}] ` })
}
