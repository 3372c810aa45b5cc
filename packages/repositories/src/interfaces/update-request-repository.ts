import type {
  Address,
  Amount,
  PageFieldUpdate,
  PageId,
  Pagination,
  RequestId,
  Timestamp,
  UpdateRequest,
  UpdateRequestStatus,
} from '@quire/protocol';

/**
 * Input for creating a pending UpdateRequest
 */
export type CreateUpdateRequestInput = {
  pageId: PageId;
  proposed: PageFieldUpdate;
  proposer: Address;
  fee: Amount;
};

/**
 * Filter for listing a page's requests
 */
export type UpdateRequestFilter = Pagination & {
  status?: UpdateRequestStatus[];
};

/**
 * Repository interface for UpdateRequest operations.
 *
 * Request ids are a per-page sequence starting at 0, taken from the page's
 * requestCount. Requests are never deleted.
 */
export interface UpdateRequestRepository {
  /**
   * Create a pending request under the page's next sequence number
   */
  create(input: CreateUpdateRequestInput): Promise<UpdateRequest>;

  /**
   * Get a request
   * @returns UpdateRequest or null if not found
   */
  get(pageId: PageId, id: RequestId): Promise<UpdateRequest | null>;

  /**
   * Get a request and hold it until the transaction ends
   */
  getForUpdate(pageId: PageId, id: RequestId): Promise<UpdateRequest | null>;

  /**
   * List a page's requests in id order
   */
  list(pageId: PageId, filter?: UpdateRequestFilter): Promise<UpdateRequest[]>;

  /**
   * Add a voter and increment the approval counter
   */
  recordVote(pageId: PageId, id: RequestId, voter: Address): Promise<UpdateRequest | null>;

  /**
   * Set the executed flag on a pending request
   * @returns null if the request does not exist or has already executed
   */
  markExecuted(pageId: PageId, id: RequestId, executedAt: Timestamp): Promise<UpdateRequest | null>;
}
