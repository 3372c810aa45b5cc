// Like / dislike reactions
//
// Independent of fees and ownership. Each address holds at most one of the
// two flags per page; the page keeps running counters that never go below 0.

import type { PageId, ReactionKind, ReactionState, ReactionTally } from '@quire/protocol';
import { ValidationError } from '../errors.js';
import { requirePage, type OperationContext } from '../registry/context.js';

export type ReactInput = {
  pageId: PageId;
  kind: ReactionKind;
};

export type ReactResult = {
  state: ReactionState;
  tally: ReactionTally;
};

/**
 * Toggle one flag. Setting a flag clears the other one.
 */
export function nextReaction(current: ReactionState, kind: ReactionKind): ReactionState {
  if (kind === 'like') {
    return current.liked ? { liked: false, disliked: false } : { liked: true, disliked: false };
  }
  return current.disliked ? { liked: false, disliked: false } : { liked: false, disliked: true };
}

export function adjustTally(
  tally: ReactionTally,
  before: ReactionState,
  after: ReactionState
): ReactionTally {
  return {
    likes: Math.max(0, tally.likes + delta(before.liked, after.liked)),
    dislikes: Math.max(0, tally.dislikes + delta(before.disliked, after.disliked)),
  };
}

function delta(before: boolean, after: boolean): number {
  if (before === after) return 0;
  return after ? 1 : -1;
}

export async function react(ctx: OperationContext, input: ReactInput): Promise<ReactResult> {
  if (input.kind !== 'like' && input.kind !== 'dislike') {
    throw new ValidationError('INVALID_VARIANT', `Unknown reaction: ${String(input.kind)}`, {
      field: 'kind',
    });
  }

  const page = await requirePage(ctx.repos, input.pageId);
  const before = await ctx.repos.reactions.get(page.id, ctx.caller);
  const state = nextReaction(before, input.kind);
  const tally = adjustTally({ likes: page.likes, dislikes: page.dislikes }, before, state);

  await ctx.repos.reactions.put(page.id, ctx.caller, state);
  await ctx.repos.pages.setTally(page.id, tally);

  ctx.emit({
    type: 'reaction.changed',
    pageId: page.id,
    payload: { voter: ctx.caller, state, likes: tally.likes, dislikes: tally.dislikes },
  });

  return { state, tally };
}
