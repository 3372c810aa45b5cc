// Ownership policies and transitions

export {
  validateOwnershipConfig,
  createOwnershipPolicy,
  policyFor,
  type OwnershipPolicy,
} from './policy.js';

export {
  transitionOwnership,
  assertTransitionAllowed,
  type OwnershipTransitionInput,
} from './transition.js';
