import type {
  Address,
  Amount,
  OwnershipConfig,
  Page,
  PageFieldUpdate,
  PageId,
  Pagination,
  ReactionTally,
} from '@quire/protocol';

/**
 * Input for creating a new Page. The repository assigns the id.
 */
export type CreatePageInput = {
  name: string;
  thumbnail: string;
  content: string;
  immutable: boolean;
  updateFee: Amount;
  ownership: OwnershipConfig;
  creator: Address;
};

/**
 * Filter for listing pages
 */
export type PageFilter = Pagination;

/**
 * Repository interface for Page operations.
 *
 * Pages form an arena keyed by a monotonically issued integer. An id is
 * consumed only when create() succeeds inside a committed transaction.
 */
export interface PageRepository {
  /**
   * Create a page under the next id (starting at 1)
   */
  create(input: CreatePageInput): Promise<Page>;

  /**
   * Get a page by ID
   * @returns Page or null if not found
   */
  get(id: PageId): Promise<Page | null>;

  /**
   * List pages in id order
   */
  list(filter?: PageFilter): Promise<Page[]>;

  /**
   * Number of pages created so far
   */
  count(): Promise<number>;

  /**
   * Copy every non-empty field into the page
   */
  applyFields(id: PageId, fields: PageFieldUpdate): Promise<Page | null>;

  /**
   * Replace the ownership configuration entirely
   */
  setOwnership(id: PageId, ownership: OwnershipConfig): Promise<Page | null>;

  /**
   * Overwrite the like/dislike counters
   */
  setTally(id: PageId, tally: ReactionTally): Promise<Page | null>;
}
