// Ownership types - who may authorize changes to a page

import type { Address } from './common.js';

/**
 * The three ownership variants.
 *
 * - single: one owner approves and withdraws alone
 * - multisig: a set of owners; a threshold of distinct approvals executes a request
 * - permissionless: anyone updates directly; fees leave only by distribution
 */
export type OwnershipKind = 'single' | 'multisig' | 'permissionless';

export const OWNERSHIP_KINDS: readonly OwnershipKind[] = ['single', 'multisig', 'permissionless'];

/**
 * Stored ownership configuration of a page.
 *
 * Invariants (checked on creation and on every transition):
 * - single: exactly one owner, threshold 1
 * - multisig: at least one owner, 1 <= threshold <= owners.length
 * - permissionless: no owners, threshold 0
 */
export type OwnershipConfig = {
  kind: OwnershipKind;
  owners: Address[];
  threshold: number;
};

export function isOwnershipKind(value: unknown): value is OwnershipKind {
  return typeof value === 'string' && (OWNERSHIP_KINDS as readonly string[]).includes(value);
}
