// Reaction types - per-address like/dislike flags

/**
 * The two reactions an address can toggle on a page.
 */
export type ReactionKind = 'like' | 'dislike';

/**
 * Per-page, per-address flags. At most one is true.
 */
export type ReactionState = {
  liked: boolean;
  disliked: boolean;
};

/**
 * Page-level counters. Never negative.
 */
export type ReactionTally = {
  likes: number;
  dislikes: number;
};

export const NO_REACTION: ReactionState = { liked: false, disliked: false };
