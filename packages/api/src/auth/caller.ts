// Caller identity
//
// The registry knows principals only as addresses. The API takes the
// caller's address from a request header and does not verify it.

import type { IncomingHttpHeaders } from 'node:http';
import type { Address } from '@quire/protocol';

export const CALLER_HEADER = 'x-caller-address';

export type CallerResult =
  | { success: true; caller: Address }
  | { success: false; error: string };

/**
 * Extract the caller address from request headers.
 */
export function getCallerFromHeaders(headers: IncomingHttpHeaders): CallerResult {
  const raw = headers[CALLER_HEADER];
  const value = Array.isArray(raw) ? raw[0] : raw;
  const caller = value?.trim();

  if (!caller) {
    return { success: false, error: `Missing ${CALLER_HEADER} header` };
  }
  return { success: true, caller };
}
