import type { Amount, PageId, Treasury } from '@quire/protocol';

/**
 * Amounts leaving the balance when a treasury is settled.
 * paid + retained always equals the balance being settled.
 */
export type SettleTreasuryInput = {
  paid: Amount;
  retained: Amount;
};

/**
 * Repository interface for per-page fee balances.
 */
export interface TreasuryRepository {
  /**
   * Create an empty treasury for a new page
   */
  open(pageId: PageId): Promise<Treasury>;

  /**
   * Get a page's treasury
   * @returns Treasury or null if the page has none
   */
  get(pageId: PageId): Promise<Treasury | null>;

  /**
   * Get a page's treasury and hold it until the transaction ends. Payouts
   * are planned from this read so that concurrent withdrawals cannot both
   * see the same balance.
   */
  getForUpdate(pageId: PageId): Promise<Treasury | null>;

  /**
   * Add an amount to the balance and to the lifetime total
   */
  credit(pageId: PageId, amount: Amount): Promise<Treasury | null>;

  /**
   * Zero the balance, moving it into paidOut and retained
   */
  settle(pageId: PageId, input: SettleTreasuryInput): Promise<Treasury | null>;
}
