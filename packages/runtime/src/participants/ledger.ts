// Participant ledger
//
// Addresses that contributed an executed update to a permissionless page,
// in first-contribution order. Distribution draws its winner from here.

import type { Address, PageId } from '@quire/protocol';
import type { RepositoryContext } from '@quire/repositories';

/**
 * Add an address to a page's participants. Repeat contributors keep their
 * original position.
 *
 * @returns true if the address was new
 */
export async function recordParticipant(
  repos: RepositoryContext,
  pageId: PageId,
  address: Address
): Promise<boolean> {
  return repos.participants.add(pageId, address);
}

export async function listParticipants(
  repos: RepositoryContext,
  pageId: PageId
): Promise<Address[]> {
  return repos.participants.list(pageId);
}
