// Treasury types - per-page fee accounting

import type { Address, Amount, PageId } from './common.js';

/**
 * Accumulated fees of one page.
 */
export type Treasury = {
  pageId: PageId;

  /**
   * Withdrawable / distributable amount
   */
  balance: Amount;

  /**
   * Division remainders left behind by multisig withdrawals. Never paid out.
   */
  retained: Amount;

  /**
   * Lifetime credits
   */
  collected: Amount;

  /**
   * Lifetime payouts
   */
  paidOut: Amount;
};

/**
 * A single outgoing payment.
 */
export type Transfer = {
  to: Address;
  amount: Amount;
};

/**
 * How a payout splits a balance.
 */
export type PayoutPlan = {
  transfers: Transfer[];
  retained: Amount;
};
