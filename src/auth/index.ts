/**
 * Authentication tokens for the Stardog HTTP API
 */

import type { AuthToken } from '../types'

/**
 * Creates a basic authentication token
 */
function basic(username: string, password: string): AuthToken {
  return {
    scheme: 'basic',
    principal: username,
    credentials: password,
  }
}

/**
 * Creates a bearer authentication token
 */
function bearer(token: string): AuthToken {
  return {
    scheme: 'bearer',
    credentials: token,
  }
}

/**
 * Build the Authorization header value for a token
 */
export function authorizationHeader(token: AuthToken): string {
  switch (token.scheme) {
    case 'basic':
      return `Basic ${btoa(`${token.principal ?? ''}:${token.credentials ?? ''}`)}`
    case 'bearer':
      return `Bearer ${token.credentials ?? ''}`
    default:
      // Custom scheme
      return `${token.scheme} ${token.credentials ?? ''}`
  }
}

export const auth = {
  basic,
  bearer,
}

export type { AuthToken }
