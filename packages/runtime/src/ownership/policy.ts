// Ownership policies
//
// One polymorphic object per ownership variant. Every operation that needs
// to know who may approve, how many approvals execute a request, or how a
// balance is paid out asks the policy instead of branching on the variant.

import type {
  Address,
  Amount,
  OwnershipConfig,
  OwnershipKind,
  PayoutPlan,
} from '@quire/protocol';
import { isOwnershipKind } from '@quire/protocol';
import { ValidationError } from '../errors.js';

/**
 * Behaviour shared by all ownership variants.
 */
export interface OwnershipPolicy {
  readonly kind: OwnershipKind;
  readonly owners: readonly Address[];
  readonly threshold: number;

  isAuthorized(principal: Address): boolean;

  /**
   * Distinct approvals that execute a request. 0 means the variant has no
   * approval step at all.
   */
  requiredApprovals(): number;

  /**
   * Split a balance between recipients.
   * @returns null when the variant does not allow withdrawal
   */
  payoutShares(balance: Amount): PayoutPlan | null;

  /**
   * Whether the balance goes to a randomly chosen participant instead.
   */
  acceptsDistribution(): boolean;

  /**
   * Whether the page may move to another ownership configuration.
   */
  canTransition(): boolean;

  toConfig(): OwnershipConfig;
}

class SingleOwnerPolicy implements OwnershipPolicy {
  readonly kind = 'single';
  readonly threshold = 1;
  readonly owners: readonly Address[];

  constructor(private readonly owner: Address) {
    this.owners = [owner];
  }

  isAuthorized(principal: Address): boolean {
    return principal === this.owner;
  }

  requiredApprovals(): number {
    return 1;
  }

  payoutShares(balance: Amount): PayoutPlan {
    return { transfers: [{ to: this.owner, amount: balance }], retained: 0n };
  }

  acceptsDistribution(): boolean {
    return false;
  }

  canTransition(): boolean {
    return true;
  }

  toConfig(): OwnershipConfig {
    return { kind: this.kind, owners: [this.owner], threshold: 1 };
  }
}

class MultiSigPolicy implements OwnershipPolicy {
  readonly kind = 'multisig';

  constructor(
    readonly owners: readonly Address[],
    readonly threshold: number
  ) {}

  isAuthorized(principal: Address): boolean {
    return this.owners.includes(principal);
  }

  requiredApprovals(): number {
    return this.threshold;
  }

  /**
   * Every listed owner gets balance / owners.length. The division remainder
   * stays in the treasury and is never paid to anyone.
   */
  payoutShares(balance: Amount): PayoutPlan {
    const count = BigInt(this.owners.length);
    const share = balance / count;
    if (share === 0n) {
      return { transfers: [], retained: balance };
    }
    return {
      transfers: this.owners.map((to) => ({ to, amount: share })),
      retained: balance % count,
    };
  }

  acceptsDistribution(): boolean {
    return false;
  }

  canTransition(): boolean {
    return false;
  }

  toConfig(): OwnershipConfig {
    return { kind: this.kind, owners: [...this.owners], threshold: this.threshold };
  }
}

class PermissionlessPolicy implements OwnershipPolicy {
  readonly kind = 'permissionless';
  readonly owners: readonly Address[] = [];
  readonly threshold = 0;

  isAuthorized(): boolean {
    return true;
  }

  requiredApprovals(): number {
    return 0;
  }

  payoutShares(): null {
    return null;
  }

  acceptsDistribution(): boolean {
    return true;
  }

  canTransition(): boolean {
    return false;
  }

  toConfig(): OwnershipConfig {
    return { kind: this.kind, owners: [], threshold: 0 };
  }
}

/**
 * Check an ownership configuration.
 *
 * - single: exactly one owner and threshold 1
 * - multisig: at least one owner and 0 < threshold <= owners.length
 * - permissionless: no owners and threshold 0
 *
 * @throws ValidationError INVALID_VARIANT for an unknown kind,
 *   INVALID_CONFIG for a bad owner/threshold combination
 */
export function validateOwnershipConfig(
  kind: unknown,
  owners: readonly Address[],
  threshold: number
): OwnershipConfig {
  if (!isOwnershipKind(kind)) {
    throw new ValidationError('INVALID_VARIANT', `Unknown ownership kind: ${String(kind)}`, {
      field: 'kind',
      details: { provided: kind },
    });
  }

  if (!Number.isInteger(threshold)) {
    throw new ValidationError('INVALID_CONFIG', 'threshold must be an integer', {
      field: 'threshold',
      details: { provided: threshold },
    });
  }

  const valid =
    (kind === 'single' && owners.length === 1 && threshold === 1) ||
    (kind === 'multisig' && owners.length > 0 && threshold > 0 && threshold <= owners.length) ||
    (kind === 'permissionless' && owners.length === 0 && threshold === 0);

  if (!valid) {
    throw new ValidationError(
      'INVALID_CONFIG',
      `Invalid ${kind} configuration: ${owners.length} owner(s) with threshold ${threshold}`,
      { field: 'ownership', details: { kind, ownerCount: owners.length, threshold } }
    );
  }

  return { kind, owners: [...owners], threshold };
}

/**
 * Build the policy object for a stored configuration.
 * The configuration is assumed valid; it was checked when it was stored.
 */
export function policyFor(config: OwnershipConfig): OwnershipPolicy {
  switch (config.kind) {
    case 'single':
      return new SingleOwnerPolicy(config.owners[0]);
    case 'multisig':
      return new MultiSigPolicy([...config.owners], config.threshold);
    case 'permissionless':
      return new PermissionlessPolicy();
  }
}

/**
 * Validate and build a policy in one step.
 */
export function createOwnershipPolicy(
  kind: unknown,
  owners: readonly Address[],
  threshold: number
): OwnershipPolicy {
  return policyFor(validateOwnershipConfig(kind, owners, threshold));
}
