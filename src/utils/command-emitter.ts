import type { ArrRequest } from '@root/types/sync.types.js'

/**
 * Wraps a value in single quotes for a POSIX shell, escaping embedded quotes.
 *
 * @example
 * shellQuote("Ocean's Eleven") // 'Ocean'\''s Eleven'
 */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`
}

/**
 * Renders a backend request as a self-contained curl command, one option per line.
 * The body is compact JSON, byte-for-byte what the service would send.
 */
export function renderCurlCommand(request: ArrRequest): string {
  const lines = [`curl -X ${request.method} ${shellQuote(request.url)}`]

  for (const [name, value] of Object.entries(request.headers)) {
    lines.push(`  -H ${shellQuote(`${name}: ${value}`)}`)
  }

  if (request.body !== undefined) {
    lines.push(`  -d ${shellQuote(JSON.stringify(request.body))}`)
  }

  return lines.join(' \\\n')
}
