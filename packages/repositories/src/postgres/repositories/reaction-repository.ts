import { and, eq } from 'drizzle-orm';
import type { Database } from '../db.js';
import { reactions } from '../schema/index.js';
import type { ReactionRepository } from '../../interfaces/index.js';
import { NO_REACTION } from '@quire/protocol';
import type { Address, PageId, ReactionState } from '@quire/protocol';

export class PgReactionRepository implements ReactionRepository {
  constructor(private db: Database) {}

  async get(pageId: PageId, address: Address): Promise<ReactionState> {
    const [row] = await this.db
      .select({ liked: reactions.liked, disliked: reactions.disliked })
      .from(reactions)
      .where(and(eq(reactions.pageId, pageId), eq(reactions.address, address)));
    return row ?? { ...NO_REACTION };
  }

  async put(pageId: PageId, address: Address, state: ReactionState): Promise<void> {
    await this.db
      .insert(reactions)
      .values({ pageId, address, liked: state.liked, disliked: state.disliked })
      .onConflictDoUpdate({
        target: [reactions.pageId, reactions.address],
        set: { liked: state.liked, disliked: state.disliked },
      });
  }
}
