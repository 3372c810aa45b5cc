export {
  PageRegistry,
  createPageRegistry,
  type PageRegistryOptions,
  type PageRegistryConfig,
} from './registry.js';

export {
  createPage,
  changeOwnership,
  type CreatePageInput,
  type ChangeOwnershipInput,
  type OwnershipInput,
} from './pages.js';

export {
  requirePage,
  requireTreasury,
  lockTreasury,
  requireCaller,
  type OperationContext,
  type PageEventDraft,
} from './context.js';
