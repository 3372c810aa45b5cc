// Event types for off-system indexing
//
// Events are published after an operation commits. They carry facts only;
// nothing in the protocol reacts to them.

import type { Address, Amount, PageId, RequestId, Timestamp } from './common.js';
import type { OwnershipKind } from './ownership.js';
import type { PageFieldUpdate } from './pages.js';
import type { ReactionState } from './reactions.js';

/**
 * All possible event types.
 */
export type PageEventType =
  | 'page.created'
  | 'update.requested'
  | 'approval.recorded'
  | 'update.executed'
  | 'fees.withdrawn'
  | 'ownership.changed'
  | 'treasury.distributed'
  | 'reaction.changed';

/**
 * Base event structure.
 */
export type BaseEvent = {
  /** Unique event ID */
  id: string;
  type: PageEventType;
  timestamp: Timestamp;
  /** The page this event concerns */
  pageId: PageId;
};

export type PageCreatedEvent = BaseEvent & {
  type: 'page.created';
  payload: {
    creator: Address;
    name: string;
    ownershipKind: OwnershipKind;
    updateFee: Amount;
    immutable: boolean;
  };
};

export type UpdateRequestedEvent = BaseEvent & {
  type: 'update.requested';
  payload: {
    requestId: RequestId;
    proposer: Address;
    fee: Amount;
  };
};

export type ApprovalRecordedEvent = BaseEvent & {
  type: 'approval.recorded';
  payload: {
    requestId: RequestId;
    approver: Address;
    approvals: number;
    required: number;
  };
};

/**
 * Published when a request executes, and for every permissionless
 * submission (with the synthetic request id 0).
 */
export type UpdateExecutedEvent = BaseEvent & {
  type: 'update.executed';
  payload: {
    requestId: RequestId;
    fields: PageFieldUpdate;
    executor: Address;
  };
};

export type FeesWithdrawnEvent = BaseEvent & {
  type: 'fees.withdrawn';
  payload: {
    by: Address;
    amount: Amount;
    recipients: Address[];
    retained: Amount;
  };
};

export type OwnershipChangedEvent = BaseEvent & {
  type: 'ownership.changed';
  payload: {
    from: OwnershipKind;
    to: OwnershipKind;
    owners: Address[];
    threshold: number;
  };
};

export type TreasuryDistributedEvent = BaseEvent & {
  type: 'treasury.distributed';
  payload: {
    by: Address;
    winner: Address;
    amount: Amount;
  };
};

export type ReactionChangedEvent = BaseEvent & {
  type: 'reaction.changed';
  payload: {
    voter: Address;
    state: ReactionState;
    likes: number;
    dislikes: number;
  };
};

/**
 * Union of all event types.
 */
export type PageEvent =
  | PageCreatedEvent
  | UpdateRequestedEvent
  | ApprovalRecordedEvent
  | UpdateExecutedEvent
  | FeesWithdrawnEvent
  | OwnershipChangedEvent
  | TreasuryDistributedEvent
  | ReactionChangedEvent;

/**
 * Handler function for events.
 */
export type PageEventHandler = (event: PageEvent) => void | Promise<void>;
