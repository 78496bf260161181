import type { SubmitOutcome } from '@root/types/sync.types.js'

/**
 * Validation error item from *arr APIs (Radarr/Sonarr)
 * Uses camelCase - serialized by System.Text.Json
 */
interface ArrValidationError {
  propertyName?: string
  errorMessage?: string
  attemptedValue?: unknown
  severity?: string
  errorCode?: string
}

/** Phrase Radarr and Sonarr put in the validation error for a duplicate add */
export const ALREADY_ADDED_MARKER = 'already been added'

const REJECTED_BODY_LIMIT = 100
const FAILED_BODY_LIMIT = 200

export function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? text.slice(0, maxLength) : text
}

function isValidationError(value: unknown): value is ArrValidationError {
  return typeof value === 'object' && value !== null
}

/**
 * Extracts the error messages from a Radarr/Sonarr error body.
 * Handles both formats:
 * - Array: [{ propertyName, errorMessage, ... }] (validation errors)
 * - Object: { message: string } (general errors)
 */
export function extractArrErrorMessages(errorData: unknown): string[] {
  if (Array.isArray(errorData)) {
    return errorData
      .filter(isValidationError)
      .map((e) => e.errorMessage)
      .filter((message): message is string => Boolean(message))
  }

  if (errorData && typeof errorData === 'object' && 'message' in errorData) {
    return [String(errorData.message)]
  }

  return []
}

/**
 * Returns the message that reports a duplicate add, if any.
 */
export function findAlreadyAddedMessage(messages: string[]): string | undefined {
  return messages.find((message) =>
    message.toLowerCase().includes(ALREADY_ADDED_MARKER),
  )
}

/**
 * Classifies a create (POST) response from Radarr or Sonarr.
 *
 * A 4xx response is not automatically a failure: when its body carries the
 * "already been added" validation message, the item is already tracked by the
 * backend and the outcome is `already-exists`.
 *
 * @param status - HTTP status code of the response
 * @param bodyText - Raw response body
 */
export function classifyArrCreateResponse(
  status: number,
  bodyText: string,
): SubmitOutcome {
  if (status >= 200 && status < 300) {
    return { kind: 'created' }
  }

  if (status >= 500) {
    return {
      kind: 'transient-failure',
      reason: `HTTP ${status}: ${truncate(bodyText, FAILED_BODY_LIMIT)}`,
    }
  }

  let errorData: unknown
  try {
    errorData = JSON.parse(bodyText)
  } catch {
    return {
      kind: 'rejected',
      reason: `HTTP ${status}: ${truncate(bodyText, REJECTED_BODY_LIMIT)}`,
    }
  }

  const messages = extractArrErrorMessages(errorData)
  const alreadyAdded = findAlreadyAddedMessage(messages)
  if (alreadyAdded) {
    return { kind: 'already-exists', message: alreadyAdded }
  }

  return {
    kind: 'rejected',
    reason:
      messages.length > 0
        ? messages.join('; ')
        : `HTTP ${status}: ${truncate(bodyText, REJECTED_BODY_LIMIT)}`,
  }
}

/**
 * Describes an error thrown by fetch (timeout, refused connection, DNS).
 */
export function describeFetchError(error: unknown, timeoutMs: number): string {
  if (error instanceof Error) {
    if (error.name === 'TimeoutError' || error.name === 'AbortError') {
      return `Request timed out after ${timeoutMs}ms`
    }
    return error.message
  }
  return String(error)
}
