import type { Address, PageId, ReactionState } from '@quire/protocol';

/**
 * Repository interface for per-address like/dislike flags.
 */
export interface ReactionRepository {
  /**
   * Get an address's flags (both false when it never reacted)
   */
  get(pageId: PageId, address: Address): Promise<ReactionState>;

  put(pageId: PageId, address: Address, state: ReactionState): Promise<void>;
}
