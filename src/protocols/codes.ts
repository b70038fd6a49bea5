import type { ResponseClass } from '../types/index.js';

// ============================================================================
// FTP Response Codes (RFC 959)
// ============================================================================

export const ResponseCode = {
  // 2xx - Positive Completion
  CLOSING_DATA_CONNECTION: 226,
  ENTERING_PASSIVE: 227,
  USER_LOGGED_IN: 230,

  // 3xx - Positive Intermediate
  NEED_PASSWORD: 331,

  // 4xx - Transient Negative
  SERVICE_UNAVAILABLE: 421,
} as const;

/**
 * Three-digit code at the start of a reply, or null when there is none
 */
export function responseCode(reply: string): number | null {
  const match = reply.match(/^(\d{3})/);
  return match ? parseInt(match[1], 10) : null;
}

export function hasCode(reply: string, code: number): boolean {
  return responseCode(reply) === code;
}

/**
 * Outcome class by first digit
 */
export function classifyResponse(reply: string): ResponseClass {
  const code = responseCode(reply);
  if (code === null) return 'unknown';

  switch (Math.floor(code / 100)) {
    case 1: return 'preliminary';
    case 2: return 'success';
    case 3: return 'intermediate';
    case 4: return 'transient';
    case 5: return 'permanent';
    default: return 'unknown';
  }
}
