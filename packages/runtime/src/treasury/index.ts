export {
  withdrawFees,
  distributeTreasury,
  type WithdrawFeesInput,
  type WithdrawFeesResult,
  type DistributeTreasuryInput,
  type DistributeTreasuryResult,
} from './treasury.js';

export {
  createInMemoryPayoutGateway,
  PayoutRejectedError,
  type PayoutGateway,
  type InMemoryPayoutGateway,
  type InMemoryPayoutGatewayOptions,
} from './payouts.js';

export {
  selectParticipantIndex,
  createFixedEntropy,
  DigestChain,
  GENESIS_DIGEST,
  type EntropySample,
  type EntropySource,
  type SelectionSeed,
} from './entropy.js';
