// Payout gateway
//
// The boundary between the registry and whatever actually moves value.
// A call either delivers every transfer in the batch or throws; the registry
// turns a throw into TRANSFER_FAILED and rolls the operation back.

import type { Address, Amount, Transfer } from '@quire/protocol';

export interface PayoutGateway {
  transfer(transfers: readonly Transfer[]): Promise<void>;
}

export class PayoutRejectedError extends Error {
  readonly recipient: Address;

  constructor(recipient: Address) {
    super(`Recipient rejected payout: ${recipient}`);
    this.name = 'PayoutRejectedError';
    this.recipient = recipient;
  }
}

export type InMemoryPayoutGatewayOptions = {
  /** Recipients that refuse every transfer */
  rejecting?: Iterable<Address>;

  /**
   * Called with each batch before it is credited. A recipient that calls
   * back into the registry is simulated here; a throw fails the batch.
   */
  onTransfer?: (transfers: readonly Transfer[]) => void | Promise<void>;
};

export interface InMemoryPayoutGateway extends PayoutGateway {
  /** Total received per recipient */
  readonly balances: Map<Address, Amount>;

  /** Delivered batches, oldest first */
  readonly history: Transfer[][];

  reject(recipient: Address): void;
  accept(recipient: Address): void;
  balanceOf(recipient: Address): Amount;
}

/**
 * Gateway that keeps balances in memory.
 *
 * @example
 * ```typescript
 * const payouts = createInMemoryPayoutGateway({ rejecting: ['0xdead'] });
 * await payouts.transfer([{ to: '0xabc', amount: 10n }]);
 * payouts.balanceOf('0xabc'); // 10n
 * ```
 */
export function createInMemoryPayoutGateway(
  options: InMemoryPayoutGatewayOptions = {}
): InMemoryPayoutGateway {
  const rejecting = new Set<Address>(options.rejecting ?? []);
  const balances = new Map<Address, Amount>();
  const history: Transfer[][] = [];

  return {
    balances,
    history,
    async transfer(transfers) {
      const refused = transfers.find((t) => rejecting.has(t.to));
      if (refused) {
        throw new PayoutRejectedError(refused.to);
      }

      if (options.onTransfer) {
        await options.onTransfer(transfers);
      }

      for (const { to, amount } of transfers) {
        balances.set(to, (balances.get(to) ?? 0n) + amount);
      }
      history.push(transfers.map((t) => ({ ...t })));
    },
    reject(recipient) {
      rejecting.add(recipient);
    },
    accept(recipient) {
      rejecting.delete(recipient);
    },
    balanceOf(recipient) {
      return balances.get(recipient) ?? 0n;
    },
  };
}
