// Postgres repository implementations
export { PgPageRepository, rowToPage } from './page-repository.js';
export { PgUpdateRequestRepository, selectRequestForUpdate } from './update-request-repository.js';
export { PgTreasuryRepository, selectTreasuryForUpdate } from './treasury-repository.js';
export { PgParticipantRepository } from './participant-repository.js';
export { PgReactionRepository } from './reaction-repository.js';
export {
  createPgRepositoryContext,
  createTransactionalPgRepositoryContext,
} from './context.js';
