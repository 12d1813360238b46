import { StardogClientError } from './errors'

/**
 * Parse a statement or document count returned as text
 */
export function parseCount(text: string): number {
  const trimmed = text.trim()
  const count = Number(trimmed)
  if (!trimmed || !Number.isSafeInteger(count) || count < 0) {
    throw new StardogClientError(`Expected a count from the server, got "${trimmed}"`, 'UNEXPECTED_RESPONSE')
  }
  return count
}
