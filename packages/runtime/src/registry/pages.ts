// Page creation and ownership change

import type { Address, Amount, Page, PageId } from '@quire/protocol';
import { MAX_AMOUNT } from '@quire/protocol';
import { AuthorizationError, ValidationError } from '../errors.js';
import {
  assertTransitionAllowed,
  policyFor,
  transitionOwnership,
  validateOwnershipConfig,
} from '../ownership/index.js';
import { requirePage, type OperationContext } from './context.js';

/**
 * Ownership as supplied by a caller. `kind` is checked at run time.
 */
export type OwnershipInput = {
  kind: string;
  owners: Address[];
  threshold: number;
};

export type CreatePageInput = {
  name: string;
  thumbnail: string;
  content: string;
  ownership: OwnershipInput;
  updateFee: Amount;
  immutable?: boolean;
};

export type ChangeOwnershipInput = OwnershipInput & {
  pageId: PageId;
};

export async function createPage(ctx: OperationContext, input: CreatePageInput): Promise<Page> {
  if (!input.name) {
    throw new ValidationError('EMPTY_FIELD', 'name is required', { field: 'name' });
  }
  if (!input.thumbnail) {
    throw new ValidationError('EMPTY_FIELD', 'thumbnail is required', { field: 'thumbnail' });
  }
  if (!ctx.content.thumbnail(input.thumbnail)) {
    throw new ValidationError('INVALID_CONTENT_FORMAT', 'thumbnail is not an accepted reference', {
      field: 'thumbnail',
    });
  }
  if (!ctx.content.content(input.content)) {
    throw new ValidationError('INVALID_CONTENT_FORMAT', 'content is not in the accepted format', {
      field: 'content',
    });
  }

  const ownership = validateOwnershipConfig(
    input.ownership.kind,
    input.ownership.owners,
    input.ownership.threshold
  );

  if (input.updateFee < 0n || input.updateFee > MAX_AMOUNT) {
    throw new ValidationError('INVALID_FEE', `updateFee must be between 0 and ${MAX_AMOUNT}`, {
      field: 'updateFee',
      details: { provided: input.updateFee.toString() },
    });
  }

  const immutable = input.immutable ?? false;
  const page = await ctx.repos.pages.create({
    name: input.name,
    thumbnail: input.thumbnail,
    content: input.content,
    immutable,
    updateFee: input.updateFee,
    ownership,
    creator: ctx.caller,
  });
  await ctx.repos.treasuries.open(page.id);

  ctx.emit({
    type: 'page.created',
    pageId: page.id,
    payload: {
      creator: ctx.caller,
      name: page.name,
      ownershipKind: ownership.kind,
      updateFee: page.updateFee,
      immutable,
    },
  });

  return page;
}

/**
 * Move a single-owner page to a new ownership configuration. Only the owner
 * may do this, and only once: the other variants are terminal.
 */
export async function changeOwnership(
  ctx: OperationContext,
  input: ChangeOwnershipInput
): Promise<Page> {
  const page = await requirePage(ctx.repos, input.pageId);
  const current = policyFor(page.ownership);

  assertTransitionAllowed(page.id, page.ownership);
  if (!current.isAuthorized(ctx.caller)) {
    throw new AuthorizationError(ctx.caller, page.id, 'only the owner may change ownership');
  }

  const next = transitionOwnership(page.id, page.ownership, {
    kind: input.kind,
    owners: input.owners,
    threshold: input.threshold,
  });
  const updated = await ctx.repos.pages.setOwnership(page.id, next);
  if (!updated) {
    throw new Error(`Page ${page.id} disappeared while changing ownership`);
  }

  ctx.emit({
    type: 'ownership.changed',
    pageId: page.id,
    payload: {
      from: current.kind,
      to: next.kind,
      owners: [...next.owners],
      threshold: next.threshold,
    },
  });

  return updated;
}
