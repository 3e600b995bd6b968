// =============================================================================
// @vaultline/core: Public API
// =============================================================================

// Types
export type {
  Address,
  Hex,
  LedgerConfig,
  Logger,
  BlockInfo,
  TransactionRequest,
  EncodedLog,
  LogEntry,
  TransactionReceipt,
  RevertKind,
} from './types.js';
export type { CallContext } from './context.js';
export type { AnyContract, ContractBlueprint, ContractKind } from './contract.js';
export type { AccessState } from './access.js';

// Core classes
export { Ledger } from './ledger.js';
export { LedgerContract } from './contract.js';
export { ReentrancyGuard } from './guard.js';

// Access control
export {
  ACCESS_CONTROL_ABI,
  initialAccess,
  requireOwner,
  whenNotPaused,
  whenPaused,
  pause,
  unpause,
  transferOwnership,
  acceptOwnership,
  renounceOwnership,
} from './access.js';

// Encoding
export {
  toLogTopics,
  assertBytes32,
  assertUint256,
  assertTimestamp,
  initCodeOf,
  computeCreate2Address,
  computeCreateAddress,
} from './encoding.js';

// Errors
export {
  LedgerError,
  RevertError,
  CustomError,
  InsufficientFundsError,
  ContractNotFoundError,
  DeploymentCollisionError,
  InvalidArgumentError,
} from './errors.js';
