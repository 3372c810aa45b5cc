// Update request pipeline
//
// Pending -> Executed is the only transition. Permissionless pages skip the
// pending state: a submission applies its fields immediately.

import type { Amount, PageFieldUpdate, PageId, RequestId, UpdateRequest } from '@quire/protocol';
import { MAX_AMOUNT } from '@quire/protocol';
import { AuthorizationError, RequestNotFoundError, StateConflictError, ValidationError } from '../errors.js';
import { policyFor } from '../ownership/index.js';
import { recordParticipant } from '../participants/index.js';
import { lockTreasury, requirePage, type OperationContext } from '../registry/context.js';

/**
 * Id reported for permissionless submissions. They never take a sequence
 * number.
 */
export const IMMEDIATE_REQUEST_ID: RequestId = 0;

export type SubmitUpdateInput = {
  pageId: PageId;
  proposed: PageFieldUpdate;
  paidFee: Amount;
};

export type SubmitUpdateResult = {
  request: UpdateRequest;
  /** true when the fields were applied without an approval step */
  executedImmediately: boolean;
};

export type ApproveUpdateInput = {
  pageId: PageId;
  requestId: RequestId;
};

export type ApproveUpdateResult = {
  request: UpdateRequest;
  /** true when this approval executed the request */
  executed: boolean;
  required: number;
};

/**
 * Drop absent and empty fields.
 */
export function normalizeFields(proposed: PageFieldUpdate): PageFieldUpdate {
  const fields: PageFieldUpdate = {};
  if (proposed.content) fields.content = proposed.content;
  if (proposed.name) fields.name = proposed.name;
  if (proposed.thumbnail) fields.thumbnail = proposed.thumbnail;
  return fields;
}

/**
 * Submit a proposed change to a page and pay its fee.
 *
 * Anyone may submit. The whole paid amount is credited, including any excess
 * over the page's fee.
 */
export async function submitUpdate(
  ctx: OperationContext,
  input: SubmitUpdateInput
): Promise<SubmitUpdateResult> {
  const page = await requirePage(ctx.repos, input.pageId);

  if (page.immutable) {
    throw new StateConflictError('PAGE_FROZEN', page.id, `Page ${page.id} is immutable`);
  }

  if (input.paidFee < page.updateFee) {
    throw new ValidationError(
      'INSUFFICIENT_FEE',
      `Page ${page.id} requires a fee of ${page.updateFee}, got ${input.paidFee}`,
      {
        field: 'paidFee',
        details: { required: page.updateFee.toString(), provided: input.paidFee.toString() },
      }
    );
  }

  const fields = normalizeFields(input.proposed);
  if (Object.keys(fields).length === 0) {
    throw new ValidationError('EMPTY_UPDATE', 'An update must propose at least one field', {
      field: 'proposed',
    });
  }
  if (fields.content !== undefined && !ctx.content.content(fields.content)) {
    throw new ValidationError('INVALID_CONTENT_FORMAT', 'Proposed content is not in the accepted format', {
      field: 'content',
    });
  }
  if (fields.thumbnail !== undefined && !ctx.content.thumbnail(fields.thumbnail)) {
    throw new ValidationError('INVALID_CONTENT_FORMAT', 'Proposed thumbnail is not an accepted reference', {
      field: 'thumbnail',
    });
  }

  const treasury = await lockTreasury(ctx.repos, page.id);
  if (treasury.collected + input.paidFee > MAX_AMOUNT) {
    throw new ValidationError('INVALID_FEE', `Page ${page.id} cannot hold a further ${input.paidFee}`, {
      field: 'paidFee',
      details: { collected: treasury.collected.toString(), provided: input.paidFee.toString() },
    });
  }

  const credited = await ctx.repos.treasuries.credit(page.id, input.paidFee);
  if (!credited) {
    throw new Error(`Page ${page.id} has no treasury`);
  }

  const policy = policyFor(page.ownership);

  if (policy.requiredApprovals() === 0) {
    await ctx.repos.pages.applyFields(page.id, fields);
    await recordParticipant(ctx.repos, page.id, ctx.caller);

    ctx.emit({
      type: 'update.executed',
      pageId: page.id,
      payload: { requestId: IMMEDIATE_REQUEST_ID, fields, executor: ctx.caller },
    });

    return {
      request: {
        pageId: page.id,
        id: IMMEDIATE_REQUEST_ID,
        proposed: fields,
        proposer: ctx.caller,
        fee: input.paidFee,
        executed: true,
        approvals: 0,
        voters: [],
        createdAt: ctx.timestamp,
        executedAt: ctx.timestamp,
      },
      executedImmediately: true,
    };
  }

  const request = await ctx.repos.updateRequests.create({
    pageId: page.id,
    proposed: fields,
    proposer: ctx.caller,
    fee: input.paidFee,
  });

  ctx.emit({
    type: 'update.requested',
    pageId: page.id,
    payload: { requestId: request.id, proposer: ctx.caller, fee: input.paidFee },
  });

  return { request, executedImmediately: false };
}

/**
 * Record an owner's approval. The approval that reaches the policy's
 * required count executes the request.
 */
export async function approveUpdate(
  ctx: OperationContext,
  input: ApproveUpdateInput
): Promise<ApproveUpdateResult> {
  const page = await requirePage(ctx.repos, input.pageId);

  const request = await ctx.repos.updateRequests.getForUpdate(page.id, input.requestId);
  if (!request) {
    throw new RequestNotFoundError(page.id, input.requestId);
  }

  if (request.executed) {
    throw new StateConflictError(
      'ALREADY_EXECUTED',
      page.id,
      `Request ${request.id} on page ${page.id} has already executed`
    );
  }

  const policy = policyFor(page.ownership);
  const required = policy.requiredApprovals();

  if (required === 0) {
    throw new StateConflictError(
      'APPROVAL_NOT_APPLICABLE',
      page.id,
      `Page ${page.id} is ${policy.kind} and has no approval step`
    );
  }

  if (!policy.isAuthorized(ctx.caller)) {
    throw new AuthorizationError(ctx.caller, page.id, 'only owners may approve');
  }

  if (request.voters.includes(ctx.caller)) {
    throw new StateConflictError(
      'DUPLICATE_VOTE',
      page.id,
      `${ctx.caller} already approved request ${request.id} on page ${page.id}`
    );
  }

  const voted = await ctx.repos.updateRequests.recordVote(page.id, request.id, ctx.caller);
  if (!voted) {
    throw new RequestNotFoundError(page.id, request.id);
  }

  ctx.emit({
    type: 'approval.recorded',
    pageId: page.id,
    payload: { requestId: voted.id, approver: ctx.caller, approvals: voted.approvals, required },
  });

  if (voted.approvals < required) {
    return { request: voted, executed: false, required };
  }

  await ctx.repos.pages.applyFields(page.id, voted.proposed);
  const executed = await ctx.repos.updateRequests.markExecuted(page.id, voted.id, ctx.timestamp);
  if (!executed) {
    // Another approval executed it first
    throw new StateConflictError(
      'ALREADY_EXECUTED',
      page.id,
      `Request ${voted.id} on page ${page.id} has already executed`
    );
  }

  ctx.emit({
    type: 'update.executed',
    pageId: page.id,
    payload: { requestId: executed.id, fields: executed.proposed, executor: ctx.caller },
  });

  return { request: executed, executed: true, required };
}
