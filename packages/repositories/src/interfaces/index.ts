// Repository interfaces
// These define the contracts for data access, enabling substrate independence.

export type {
  PageRepository,
  CreatePageInput,
  PageFilter,
} from './page-repository.js';

export type {
  UpdateRequestRepository,
  CreateUpdateRequestInput,
  UpdateRequestFilter,
} from './update-request-repository.js';

export type {
  TreasuryRepository,
  SettleTreasuryInput,
} from './treasury-repository.js';

export type { ParticipantRepository } from './participant-repository.js';

export type { ReactionRepository } from './reaction-repository.js';

export type {
  RepositoryContext,
  RepositoryContextFactory,
  TransactionFn,
  TransactionalRepositoryContext,
} from './repository-context.js';
