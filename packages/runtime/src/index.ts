// @quire/runtime
// Page registry, update approval and fee treasury

// Registry (the operation boundary)
export {
  PageRegistry,
  createPageRegistry,
  type PageRegistryOptions,
  type PageRegistryConfig,
  createPage,
  changeOwnership,
  type CreatePageInput,
  type ChangeOwnershipInput,
  type OwnershipInput,
  requirePage,
  requireTreasury,
  lockTreasury,
  requireCaller,
  type OperationContext,
  type PageEventDraft,
} from './registry/index.js';

// Error types
export {
  RuntimeError,
  ValidationError,
  PageNotFoundError,
  RequestNotFoundError,
  AuthorizationError,
  StateConflictError,
  TransferError,
  isRuntimeError,
  type RuntimeErrorCode,
  type ValidationErrorCode,
  type AuthorizationErrorCode,
  type StateConflictErrorCode,
  type TransferErrorCode,
} from './errors.js';

// Ownership policies
export {
  validateOwnershipConfig,
  createOwnershipPolicy,
  policyFor,
  transitionOwnership,
  assertTransitionAllowed,
  type OwnershipPolicy,
  type OwnershipTransitionInput,
} from './ownership/index.js';

// Update requests
export {
  submitUpdate,
  approveUpdate,
  normalizeFields,
  IMMEDIATE_REQUEST_ID,
  type SubmitUpdateInput,
  type SubmitUpdateResult,
  type ApproveUpdateInput,
  type ApproveUpdateResult,
} from './requests/index.js';

// Treasury, payouts and entropy
export {
  withdrawFees,
  distributeTreasury,
  type WithdrawFeesInput,
  type WithdrawFeesResult,
  type DistributeTreasuryInput,
  type DistributeTreasuryResult,
  createInMemoryPayoutGateway,
  PayoutRejectedError,
  type PayoutGateway,
  type InMemoryPayoutGateway,
  type InMemoryPayoutGatewayOptions,
  selectParticipantIndex,
  createFixedEntropy,
  DigestChain,
  GENESIS_DIGEST,
  type EntropySample,
  type EntropySource,
  type SelectionSeed,
} from './treasury/index.js';

// Participants
export { recordParticipant, listParticipants } from './participants/index.js';

// Reactions
export { react, nextReaction, adjustTally, type ReactInput, type ReactResult } from './reactions/index.js';

// Logging
export {
  consoleLogger,
  createConsoleLogger,
  silentLogger,
  createCapturingLogger,
  type Logger,
  type LogLevel,
  type LogEntry,
} from './logger.js';
