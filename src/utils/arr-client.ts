import type { ArrRequest, SubmitOutcome } from '@root/types/sync.types.js'
import {
  type QualityProfile,
  QualityProfilesSchema,
} from '@schemas/arr/quality-profile.schema.js'
import type { FastifyBaseLogger } from 'fastify'
import { classifyArrCreateResponse, describeFetchError } from './arr-error.js'
import { buildArrApiUrl } from './url.js'

/**
 * Connection details shared by Radarr and Sonarr
 */
export interface ArrConnection {
  /** Display name used in messages, e.g. `Radarr` */
  name: string
  baseUrl: string
  apiKey: string
  timeoutMs: number
}

export function isArrConfigured(connection: ArrConnection): boolean {
  return Boolean(connection.baseUrl.trim() && connection.apiKey.trim())
}

/**
 * Sends a prepared create request and classifies the response. Network
 * failures and timeouts come back as `transient-failure`.
 */
export async function sendArrRequest(
  request: ArrRequest,
  timeoutMs: number,
): Promise<SubmitOutcome> {
  try {
    const response = await fetch(request.url, {
      method: request.method,
      headers: request.headers,
      body: JSON.stringify(request.body),
      signal: AbortSignal.timeout(timeoutMs),
    })
    const bodyText = await response.text()
    return classifyArrCreateResponse(response.status, bodyText)
  } catch (error) {
    return {
      kind: 'transient-failure',
      reason: describeFetchError(error, timeoutMs),
    }
  }
}

export async function fetchArrQualityProfiles(
  connection: ArrConnection,
): Promise<QualityProfile[]> {
  const response = await fetch(
    buildArrApiUrl(connection.baseUrl, 'qualityprofile'),
    {
      method: 'GET',
      headers: {
        'X-Api-Key': connection.apiKey,
        Accept: 'application/json',
      },
      signal: AbortSignal.timeout(connection.timeoutMs),
    },
  )

  if (!response.ok) {
    throw new Error(
      `${connection.name} API error: HTTP ${response.status} ${response.statusText}`,
    )
  }

  return QualityProfilesSchema.parse(await response.json())
}

/**
 * Logs whether `profileId` exists on the backend. Returns the profile when
 * found; never throws.
 */
export async function validateArrQualityProfile(
  log: FastifyBaseLogger,
  connection: ArrConnection,
  profileId: number,
): Promise<QualityProfile | null> {
  if (!isArrConfigured(connection)) {
    log.warn(
      `${connection.name} is not configured, skipping quality profile check`,
    )
    return null
  }

  try {
    const profiles = await fetchArrQualityProfiles(connection)
    const profile = profiles.find((p) => p.id === profileId)
    if (profile) {
      log.info(`Using quality profile: ${profile.name} (ID: ${profileId})`)
      return profile
    }
    log.warn(
      `Quality profile ID ${profileId} not found. Available profiles: ${profiles.map((p) => `${p.name} (${p.id})`).join(', ')}`,
    )
  } catch (error) {
    log.error(
      { error },
      `Could not validate ${connection.name} quality profile`,
    )
  }
  return null
}
