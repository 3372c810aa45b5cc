// Fee treasury
//
// Withdrawal and distribution zero the balance before anything is paid.
// A payout that fails throws TransferError, and the enclosing transaction
// discards the zeroed balance along with everything else.

import type { Address, Amount, PageId, Transfer, Treasury } from '@quire/protocol';
import { AuthorizationError, StateConflictError, TransferError } from '../errors.js';
import { policyFor } from '../ownership/index.js';
import { listParticipants } from '../participants/index.js';
import { lockTreasury, requirePage, type OperationContext } from '../registry/context.js';
import { selectParticipantIndex } from './entropy.js';

export type WithdrawFeesInput = {
  pageId: PageId;
};

export type WithdrawFeesResult = {
  /** Balance before the withdrawal */
  amount: Amount;
  transfers: Transfer[];
  /** Part of the balance kept by the treasury */
  retained: Amount;
  treasury: Treasury;
};

export type DistributeTreasuryInput = {
  pageId: PageId;
};

export type DistributeTreasuryResult = {
  winner: Address;
  amount: Amount;
  treasury: Treasury;
};

/**
 * Pay out a page's balance to its owners.
 */
export async function withdrawFees(
  ctx: OperationContext,
  input: WithdrawFeesInput
): Promise<WithdrawFeesResult> {
  const page = await requirePage(ctx.repos, input.pageId);
  const before = await lockTreasury(ctx.repos, page.id);

  if (before.balance === 0n) {
    throw new StateConflictError('NOTHING_TO_WITHDRAW', page.id, `Page ${page.id} has no fees to withdraw`);
  }

  const policy = policyFor(page.ownership);
  const plan = policy.payoutShares(before.balance);
  if (!plan) {
    throw new StateConflictError(
      'NOT_WITHDRAWABLE',
      page.id,
      `Page ${page.id} is ${policy.kind}; its fees leave only by distribution`
    );
  }

  if (!policy.isAuthorized(ctx.caller)) {
    throw new AuthorizationError(ctx.caller, page.id, 'only owners may withdraw');
  }

  const paid = plan.transfers.reduce((sum, t) => sum + t.amount, 0n);
  const treasury = await settle(ctx, page.id, paid, plan.retained);

  await pay(ctx, page.id, plan.transfers);

  ctx.emit({
    type: 'fees.withdrawn',
    pageId: page.id,
    payload: {
      by: ctx.caller,
      amount: before.balance,
      recipients: plan.transfers.map((t) => t.to),
      retained: plan.retained,
    },
  });

  return { amount: before.balance, transfers: plan.transfers, retained: plan.retained, treasury };
}

/**
 * Pay a permissionless page's whole balance to one participant.
 *
 * The winner is picked from weak, predictable entropy. See entropy.ts.
 */
export async function distributeTreasury(
  ctx: OperationContext,
  input: DistributeTreasuryInput
): Promise<DistributeTreasuryResult> {
  const page = await requirePage(ctx.repos, input.pageId);
  const policy = policyFor(page.ownership);

  if (!policy.acceptsDistribution()) {
    throw new StateConflictError(
      'NOT_PERMISSIONLESS',
      page.id,
      `Page ${page.id} is ${policy.kind}; only permissionless treasuries are distributed`
    );
  }

  const before = await lockTreasury(ctx.repos, page.id);
  if (before.balance === 0n) {
    throw new StateConflictError('NOTHING_TO_DISTRIBUTE', page.id, `Page ${page.id} has nothing to distribute`);
  }

  const participants = await listParticipants(ctx.repos, page.id);
  if (participants.length === 0) {
    throw new StateConflictError('NO_PARTICIPANTS', page.id, `Page ${page.id} has no participants`);
  }

  const sample = await ctx.entropy.sample();
  const index = selectParticipantIndex({
    ...sample,
    caller: ctx.caller,
    balance: before.balance,
    participantCount: participants.length,
  });
  const winner = participants[index];

  const treasury = await settle(ctx, page.id, before.balance, 0n);

  await pay(ctx, page.id, [{ to: winner, amount: before.balance }]);

  ctx.emit({
    type: 'treasury.distributed',
    pageId: page.id,
    payload: { by: ctx.caller, winner, amount: before.balance },
  });

  return { winner, amount: before.balance, treasury };
}

async function settle(
  ctx: OperationContext,
  pageId: PageId,
  paid: Amount,
  retained: Amount
): Promise<Treasury> {
  const treasury = await ctx.repos.treasuries.settle(pageId, { paid, retained });
  if (!treasury) {
    throw new Error(`Page ${pageId} has no treasury`);
  }
  return treasury;
}

async function pay(ctx: OperationContext, pageId: PageId, transfers: Transfer[]): Promise<void> {
  if (transfers.length === 0) {
    return;
  }
  try {
    await ctx.payouts.transfer(transfers);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    ctx.logger.warn('Payout rejected', {
      pageId,
      recipients: transfers.map((t) => t.to),
      error: cause.message,
    });
    throw new TransferError(pageId, cause.message, cause);
  }
}
