// Common types used across the protocol

/**
 * ISO 8601 timestamp string
 */
export type Timestamp = string;

/**
 * Caller identity. The protocol knows principals only by address.
 */
export type Address = string;

/**
 * Page identifier. Positive, assigned in increasing order, never reused.
 */
export type PageId = number;

/**
 * Per-page update request sequence number, starting at 0.
 */
export type RequestId = number;

/**
 * Fee and balance amounts in the smallest unit.
 */
export type Amount = bigint;

/**
 * Largest amount a fee or a treasury total may reach. Stored amounts are
 * signed 64-bit integers.
 */
export const MAX_AMOUNT: Amount = 2n ** 63n - 1n;

/**
 * Pagination for list queries
 */
export type Pagination = {
  limit?: number;
  offset?: number;
};
