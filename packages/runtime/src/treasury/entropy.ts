// Distribution entropy
//
// The winner of a treasury distribution is derived from a hash of the most
// recent committed state, the clock, the caller, the balance and the
// participant count. Anyone who can observe or influence those inputs can
// predict or steer the outcome. Do not treat it as fair randomness.

import { createHash } from 'node:crypto';
import type { Address, Amount } from '@quire/protocol';

export type EntropySample = {
  /** Hex digest summarising recently committed state */
  recentDigest: string;

  /** Seconds since the epoch */
  timestamp: number;
};

export interface EntropySource {
  sample(): EntropySample | Promise<EntropySample>;
}

export type SelectionSeed = EntropySample & {
  caller: Address;
  balance: Amount;
  participantCount: number;
};

export const GENESIS_DIGEST = createHash('sha256').update('genesis').digest('hex');

/**
 * Index into the participant list for a distribution.
 */
export function selectParticipantIndex(seed: SelectionSeed): number {
  if (!Number.isInteger(seed.participantCount) || seed.participantCount < 1) {
    throw new RangeError(`participantCount must be a positive integer, got ${seed.participantCount}`);
  }

  const digest = createHash('sha256')
    .update(
      [
        seed.recentDigest,
        String(seed.timestamp),
        seed.caller,
        seed.balance.toString(),
        String(seed.participantCount),
      ].join(':')
    )
    .digest('hex');

  return Number(BigInt(`0x${digest}`) % BigInt(seed.participantCount));
}

/**
 * Running hash over committed events. Each commit folds its event ids into
 * the head, so the head changes whenever state does.
 */
export class DigestChain implements EntropySource {
  private head: string;
  private readonly clock: () => Date;

  constructor(options: { clock?: () => Date; head?: string } = {}) {
    this.clock = options.clock ?? (() => new Date());
    this.head = options.head ?? GENESIS_DIGEST;
  }

  get current(): string {
    return this.head;
  }

  advance(entries: readonly string[]): string {
    if (entries.length === 0) {
      return this.head;
    }
    this.head = createHash('sha256')
      .update(this.head)
      .update('\n')
      .update(entries.join('\n'))
      .digest('hex');
    return this.head;
  }

  sample(): EntropySample {
    return {
      recentDigest: this.head,
      timestamp: Math.floor(this.clock().getTime() / 1000),
    };
  }
}

/**
 * Entropy source that always returns the same sample.
 */
export function createFixedEntropy(sample: EntropySample): EntropySource {
  return { sample: () => ({ ...sample }) };
}
