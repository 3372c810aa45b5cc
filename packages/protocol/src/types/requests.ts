// Update request types - proposed page changes awaiting approval

import type { Address, Amount, PageId, RequestId, Timestamp } from './common.js';
import type { PageFieldUpdate } from './pages.js';

/**
 * Request status. Pending -> executed is the only transition.
 */
export type UpdateRequestStatus = 'pending' | 'executed';

/**
 * An UpdateRequest belongs to exactly one page and is identified by its
 * per-page sequence number.
 */
export type UpdateRequest = {
  pageId: PageId;
  id: RequestId;

  /**
   * Proposed field values. At least one is non-empty.
   */
  proposed: PageFieldUpdate;

  proposer: Address;

  /**
   * Amount paid with the submission
   */
  fee: Amount;

  /**
   * Monotonic: never reset once true
   */
  executed: boolean;

  approvals: number;

  /**
   * Distinct addresses that approved, in vote order
   */
  voters: Address[];

  createdAt: Timestamp;
  executedAt?: Timestamp;
};

export function updateRequestStatus(request: UpdateRequest): UpdateRequestStatus {
  return request.executed ? 'executed' : 'pending';
}
