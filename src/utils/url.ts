/**
 * URL helpers for the external services
 */

/**
 * Normalizes a service base URL: adds `http://` when no scheme is given and
 * strips trailing slashes.
 *
 * @example
 * normalizeBaseUrl('localhost:7878/') // 'http://localhost:7878'
 * normalizeBaseUrl('https://radarr.example.com/radarr') // 'https://radarr.example.com/radarr'
 */
export function normalizeBaseUrl(url: string): string {
  const trimmed = url.trim()
  if (!trimmed) return ''
  const hasScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed)
  const withScheme = hasScheme ? trimmed : `http://${trimmed}`
  return withScheme.replace(/\/+$/, '')
}

/**
 * Builds a `/api/v3` endpoint URL for Radarr or Sonarr.
 */
export function buildArrApiUrl(
  baseUrl: string,
  endpoint: string,
  params?: Record<string, string>,
): string {
  const url = new URL(`${normalizeBaseUrl(baseUrl)}/api/v3/${endpoint}`)
  for (const [name, value] of Object.entries(params ?? {})) {
    url.searchParams.append(name, value)
  }
  return url.toString()
}

/**
 * Replaces credential query parameters with `[REDACTED]` for logging.
 */
export function redactUrl(url: string): string {
  return url
    .replace(/([?&])apiKey=([^&]+)/gi, '$1apiKey=[REDACTED]')
    .replace(/([?&])api_key=([^&]+)/gi, '$1api_key=[REDACTED]')
    .replace(/([?&])token=([^&]+)/gi, '$1token=[REDACTED]')
    .replace(/([?&])X-Plex-Token=([^&]+)/gi, '$1X-Plex-Token=[REDACTED]')
}
