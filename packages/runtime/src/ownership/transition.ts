// Ownership transitions
//
// Only a single-owner page may change its ownership. Multisig and
// permissionless are terminal. The new configuration replaces the old one
// wholesale: nothing of the previous owner list or threshold survives.

import type { Address, OwnershipConfig, PageId } from '@quire/protocol';
import { StateConflictError } from '../errors.js';
import { policyFor, validateOwnershipConfig } from './policy.js';

export type OwnershipTransitionInput = {
  kind: unknown;
  owners: readonly Address[];
  threshold: number;
};

/**
 * @throws StateConflictError TRANSITION_NOT_ALLOWED when the current
 *   variant is terminal
 */
export function assertTransitionAllowed(pageId: PageId, current: OwnershipConfig): void {
  if (!policyFor(current).canTransition()) {
    throw new StateConflictError(
      'TRANSITION_NOT_ALLOWED',
      pageId,
      `Ownership of page ${pageId} is ${current.kind} and cannot change`
    );
  }
}

/**
 * Compute the configuration a page moves to.
 *
 * @throws StateConflictError TRANSITION_NOT_ALLOWED when the current
 *   variant is terminal
 * @throws ValidationError when the new configuration is invalid
 */
export function transitionOwnership(
  pageId: PageId,
  current: OwnershipConfig,
  next: OwnershipTransitionInput
): OwnershipConfig {
  assertTransitionAllowed(pageId, current);
  return validateOwnershipConfig(next.kind, next.owners, next.threshold);
}
