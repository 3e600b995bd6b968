// =============================================================================
// Ledger: Main entry point
// Queue -> Mine block -> Checkpoint -> Execute -> Commit | Roll back -> Receipt
// =============================================================================

import { encodeAbiParameters, getAddress, keccak256, type Address, type Hex } from 'viem';
import type { CallContext } from './context.js';
import type { AnyContract, ContractBlueprint, ContractKind } from './contract.js';
import { assertUint256, computeCreateAddress } from './encoding.js';
import {
  InsufficientFundsError,
  LedgerError,
  RevertError,
} from './errors.js';
import { ExecutionFrame } from './frame.js';
import type {
  BlockInfo,
  LedgerConfig,
  LogEntry,
  TransactionReceipt,
  TransactionRequest,
} from './types.js';
import { WorldState } from './world.js';

const DEFAULT_CHAIN_ID = 31337;

interface Execution<R> {
  to: Address | null;
  contractAddress?: Address;
  result: R;
}

export class Ledger {
  public readonly chainId: number;
  private config: LedgerConfig;
  private world: WorldState;
  private latest: BlockInfo;
  private nextTimestamp: number | undefined;
  private queue: Promise<void>;

  constructor(config: LedgerConfig = {}) {
    this.config = config;
    this.chainId = config.chainId ?? DEFAULT_CHAIN_ID;
    this.world = new WorldState();
    this.latest = {
      number: 0,
      timestamp: config.genesisTimestamp ?? Math.floor(Date.now() / 1000),
      chainId: this.chainId,
    };
    this.queue = Promise.resolve();
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  latestBlock(): BlockInfo {
    return { ...this.latest };
  }

  latestTimestamp(): number {
    return this.latest.timestamp;
  }

  blockNumber(): number {
    return this.latest.number;
  }

  getBalance(address: Address): bigint {
    return this.world.getBalance(getAddress(address));
  }

  getNonce(address: Address): number {
    return this.world.getNonce(getAddress(address));
  }

  /**
   * Code identity deployed at `address`, or '0x' when there is none.
   */
  getCode(address: Address): Hex {
    return this.world.getCode(getAddress(address));
  }

  getLogs(filter: { address?: Address } = {}): LogEntry[] {
    const logs = this.world.logsFrom(0);
    if (!filter.address) return logs;
    const address = getAddress(filter.address);
    return logs.filter((log) => log.address === address);
  }

  /**
   * The live contract at `address`, checked against `kind`.
   */
  contractAt<C extends AnyContract>(address: Address, kind: ContractKind<C>): C {
    return this.world.requireContract(getAddress(address), kind);
  }

  // ---------------------------------------------------------------------------
  // Transactions
  // ---------------------------------------------------------------------------

  /**
   * Invoke `fn` on `contract` as one atomic transaction from `request.from`.
   * Resolves once the transaction is mined; rejects, with every effect
   * undone, when the call reverts.
   */
  async transact<C extends AnyContract, R>(
    request: TransactionRequest,
    contract: C,
    fn: (contract: C, ctx: CallContext) => Promise<R> | R
  ): Promise<TransactionReceipt<R>> {
    return this.submit(request, async (root, value) => {
      const result = await root.call(contract, value, fn);
      return { to: contract.address, result };
    });
  }

  /**
   * Deploy a contract from an externally owned account (CREATE).
   * The address depends only on the sender and its nonce.
   */
  async deploy<C extends AnyContract, A extends readonly unknown[]>(
    request: TransactionRequest,
    blueprint: ContractBlueprint<C, A>,
    args: A
  ): Promise<TransactionReceipt<C>> {
    return this.submit(request, async (root, value, nonce) => {
      const address = computeCreateAddress(root.self, nonce);
      const contract = await root.place(address, blueprint, args, value);
      this.log('info', `Deployed ${blueprint.name} at ${address}`);
      return { to: null, contractAddress: address, result: contract };
    });
  }

  /**
   * Plain value transfer. A contract recipient must accept it through its
   * `receive` hook.
   */
  async sendValue(request: TransactionRequest & { to: Address }): Promise<TransactionReceipt<void>> {
    const to = getAddress(request.to);
    return this.submit(request, async (root, value) => {
      const accepted = await root.transfer(to, value);
      if (!accepted) {
        throw new RevertError('Transfer rejected by recipient', 'transfer', to);
      }
      return { to, result: undefined };
    });
  }

  // ---------------------------------------------------------------------------
  // Test-harness controls
  // These act at once and do not wait for the transaction queue: a time jump
  // made while a transaction is still queued lands before that transaction.
  // ---------------------------------------------------------------------------

  setBalance(address: Address, value: bigint): void {
    this.world.setBalance(getAddress(address), value);
  }

  /**
   * Mine an empty block.
   */
  mine(): BlockInfo {
    return this.mineBlock();
  }

  /**
   * Mine an empty block `seconds` after the latest one.
   */
  increaseTime(seconds: number): BlockInfo {
    return this.increaseTo(this.latest.timestamp + seconds);
  }

  /**
   * Mine an empty block at exactly `timestamp`.
   */
  increaseTo(timestamp: number): BlockInfo {
    this.setNextBlockTimestamp(timestamp);
    const block = this.mineBlock();
    this.log('info', `Advanced time to ${timestamp}`);
    return block;
  }

  /**
   * Fix the timestamp of the next mined block.
   */
  setNextBlockTimestamp(timestamp: number): void {
    if (!Number.isSafeInteger(timestamp) || timestamp <= this.latest.timestamp) {
      throw new LedgerError(
        `Timestamp ${timestamp} must be a whole number greater than the latest block timestamp ${this.latest.timestamp}`,
        'INVALID_TIMESTAMP'
      );
    }
    this.nextTimestamp = timestamp;
  }

  // ---------------------------------------------------------------------------
  // Execution
  // ---------------------------------------------------------------------------

  /**
   * Queue a transaction behind every earlier submission and run it to
   * completion before the next one starts.
   */
  private submit<R>(
    request: TransactionRequest,
    execute: (root: ExecutionFrame, value: bigint, nonce: number) => Promise<Execution<R>>
  ): Promise<TransactionReceipt<R>> {
    const run = this.queue.then(() => this.runTransaction(request, execute));
    // Failures reach the caller through `run`; the queue itself keeps going.
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async runTransaction<R>(
    request: TransactionRequest,
    execute: (root: ExecutionFrame, value: bigint, nonce: number) => Promise<Execution<R>>
  ): Promise<TransactionReceipt<R>> {
    const from = getAddress(request.from);
    const value = request.value ?? 0n;
    assertUint256('value', value);

    if (this.world.findContract(from)) {
      throw new LedgerError(`Sender ${from} is a contract, not an externally owned account`, 'INVALID_SENDER');
    }
    const balance = this.world.getBalance(from);
    if (balance < value) {
      throw new InsufficientFundsError(from, balance, value);
    }

    const nonce = this.world.incrementNonce(from);
    const block = this.mineBlock();
    const transactionHash = this.hashTransaction(from, nonce);
    const root = new ExecutionFrame(this.world, block, transactionHash, from, from, 0n);
    const firstLog = this.world.logCount;
    const restore = this.world.checkpoint();

    try {
      const execution = await execute(root, value, nonce);
      const receipt: TransactionReceipt<R> = {
        transactionHash,
        blockNumber: block.number,
        timestamp: block.timestamp,
        from,
        to: execution.to,
        status: 'success',
        result: execution.result,
        logs: this.world.logsFrom(firstLog),
      };
      if (execution.contractAddress) {
        receipt.contractAddress = execution.contractAddress;
      }

      this.log('info', `Mined ${transactionHash} in block ${block.number}`, {
        from,
        to: execution.to ? this.describe(execution.to) : null,
        value,
        logs: receipt.logs.length,
      });
      return receipt;
    } catch (err) {
      restore();
      this.log('warn', `Transaction ${transactionHash} reverted in block ${block.number}`, {
        from,
        error: err instanceof Error ? err.message : String(err),
      });
      throw err;
    }
  }

  private mineBlock(): BlockInfo {
    const timestamp = this.nextTimestamp ?? this.latest.timestamp + 1;
    this.nextTimestamp = undefined;
    this.latest = { number: this.latest.number + 1, timestamp, chainId: this.chainId };
    return { ...this.latest };
  }

  private hashTransaction(from: Address, nonce: number): Hex {
    return keccak256(
      encodeAbiParameters(
        [{ type: 'uint256' }, { type: 'address' }, { type: 'uint256' }],
        [BigInt(this.chainId), from, BigInt(nonce)]
      )
    );
  }

  private describe(address: Address): string {
    const name = this.world.nameOf(address);
    return name ? `${name}@${address}` : address;
  }

  // ---------------------------------------------------------------------------
  // Logging
  // ---------------------------------------------------------------------------

  private log(level: 'info' | 'warn' | 'error', msg: string, data?: unknown): void {
    if (this.config.logger) {
      this.config.logger[level](`[Ledger] ${msg}`, data);
    }
  }
}
