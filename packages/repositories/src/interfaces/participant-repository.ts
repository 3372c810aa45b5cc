import type { Address, PageId } from '@quire/protocol';

/**
 * Repository interface for the participant ledger of permissionless pages.
 *
 * The ledger is an insertion-ordered set: an address is appended the first
 * time it is added and never removed.
 */
export interface ParticipantRepository {
  /**
   * Append an address unless already present
   * @returns true if the address was appended
   */
  add(pageId: PageId, address: Address): Promise<boolean>;

  /**
   * All participants in first-submission order
   */
  list(pageId: PageId): Promise<Address[]>;

  count(pageId: PageId): Promise<number>;
}
