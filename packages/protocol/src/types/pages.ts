// Page types - the mutable resource under management

import type { Address, Amount, PageId, Timestamp } from './common.js';
import type { OwnershipConfig } from './ownership.js';

/**
 * A Page is content plus metadata, governed by an ownership policy.
 *
 * Content changes only through an executed update request (or a direct
 * permissionless submission). Pages are never deleted.
 */
export type Page = {
  id: PageId;
  name: string;
  /**
   * Thumbnail reference (URL or content address)
   */
  thumbnail: string;
  content: string;

  /**
   * Once set the page is frozen against any update.
   */
  immutable: boolean;

  /**
   * Minimum amount a submission must pay
   */
  updateFee: Amount;

  ownership: OwnershipConfig;

  /**
   * Address that created the page
   */
  creator: Address;

  /**
   * Next update request sequence number
   */
  requestCount: number;

  likes: number;
  dislikes: number;

  createdAt: Timestamp;
  updatedAt: Timestamp;
};

/**
 * Fields an update may change. Absent or empty strings mean "leave as is".
 */
export type PageFieldUpdate = {
  content?: string;
  name?: string;
  thumbnail?: string;
};

/**
 * Read projection returned by getPageInfo.
 */
export type PageInfo = Omit<Page, 'ownership'> & {
  ownershipKind: OwnershipConfig['kind'];
  owners: Address[];
  threshold: number;
  balance: Amount;
};
