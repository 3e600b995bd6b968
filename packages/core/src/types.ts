// =============================================================================
// Vaultline Core Types
// In-process ledger host for deterministic, atomically executed contracts
// =============================================================================

import type { Address, Hex } from 'viem';

export type { Address, Hex };

/**
 * Ledger host configuration. Every field has a default.
 */
export interface LedgerConfig {
  chainId?: number;            // defaults to 31337
  genesisTimestamp?: number;   // unix seconds, defaults to wall-clock time
  logger?: Logger;
}

/**
 * Logger interface: plug in your own logging.
 */
export interface Logger {
  info(msg: string, data?: unknown): void;
  warn(msg: string, data?: unknown): void;
  error(msg: string, data?: unknown): void;
}

/**
 * The block a call executes in. `timestamp` is what contracts read as "now".
 */
export interface BlockInfo {
  number: number;
  timestamp: number;
  chainId: number;
}

/**
 * A transaction submitted by an externally owned account.
 */
export interface TransactionRequest {
  from: Address;
  value?: bigint;
}

/**
 * ABI-encoded event log body, as produced by contract code.
 */
export interface EncodedLog {
  topics: [Hex, ...Hex[]];
  data: Hex;
}

/**
 * A log as recorded on the ledger. Decodable with viem's `decodeEventLog`.
 */
export interface LogEntry extends EncodedLog {
  address: Address;
  blockNumber: number;
  transactionHash: Hex;
  logIndex: number;
}

/**
 * Outcome of a mined transaction. Reverted transactions never produce a
 * receipt: the submitting promise rejects instead.
 */
export interface TransactionReceipt<R> {
  transactionHash: Hex;
  blockNumber: number;
  timestamp: number;
  from: Address;
  to: Address | null;
  contractAddress?: Address;
  status: 'success';
  result: R;
  logs: LogEntry[];
}

/**
 * Failure taxonomy shared by every revert.
 */
export type RevertKind =
  | 'authorization'
  | 'state'
  | 'temporal'
  | 'signature'
  | 'transfer'
  | 'deployment'
  | 'validation';
