// =============================================================================
// WorldState: balances, nonces, code and logs of every account
// =============================================================================

import type { Address, Hex } from 'viem';
import type { AnyContract, ContractKind } from './contract.js';
import { assertUint256 } from './encoding.js';
import { ContractNotFoundError, InsufficientFundsError } from './errors.js';
import type { LogEntry } from './types.js';

interface DeployedCode {
  instance: AnyContract;
  code: Hex;
  name: string;
}

export class WorldState {
  private balances = new Map<Address, bigint>();
  private nonces = new Map<Address, number>();
  private deployed = new Map<Address, DeployedCode>();
  private tombstones = new Set<Address>();
  private readonly logs: LogEntry[] = [];

  // ---------------------------------------------------------------------------
  // Balances and nonces
  // ---------------------------------------------------------------------------

  getBalance(address: Address): bigint {
    return this.balances.get(address) ?? 0n;
  }

  setBalance(address: Address, value: bigint): void {
    assertUint256('balance', value);
    this.balances.set(address, value);
  }

  moveValue(from: Address, to: Address, amount: bigint): void {
    assertUint256('amount', amount);
    const balance = this.getBalance(from);
    if (balance < amount) {
      throw new InsufficientFundsError(from, balance, amount);
    }
    this.balances.set(from, balance - amount);
    this.balances.set(to, this.getBalance(to) + amount);
  }

  getNonce(address: Address): number {
    return this.nonces.get(address) ?? 0;
  }

  incrementNonce(address: Address): number {
    const nonce = this.getNonce(address);
    this.nonces.set(address, nonce + 1);
    return nonce;
  }

  // ---------------------------------------------------------------------------
  // Code
  // ---------------------------------------------------------------------------

  getCode(address: Address): Hex {
    return this.deployed.get(address)?.code ?? '0x';
  }

  findContract(address: Address): AnyContract | undefined {
    return this.deployed.get(address)?.instance;
  }

  nameOf(address: Address): string | undefined {
    return this.deployed.get(address)?.name;
  }

  requireContract<C extends AnyContract>(address: Address, kind: ContractKind<C>): C {
    const instance = this.deployed.get(address)?.instance;
    if (!(instance instanceof kind)) {
      throw new ContractNotFoundError(address, kind.name);
    }
    return instance;
  }

  /**
   * True when a deployment may not target `address`.
   */
  isOccupied(address: Address): boolean {
    return this.deployed.has(address) || this.getNonce(address) > 0 || this.tombstones.has(address);
  }

  install(instance: AnyContract, code: Hex, name: string): void {
    this.deployed.set(instance.address, { instance, code, name });
  }

  /**
   * Delete code, storage and balance; the address can never be deployed to again.
   */
  remove(address: Address): void {
    this.deployed.delete(address);
    this.balances.delete(address);
    this.nonces.delete(address);
    this.tombstones.add(address);
  }

  // ---------------------------------------------------------------------------
  // Logs
  // ---------------------------------------------------------------------------

  appendLog(entry: Omit<LogEntry, 'logIndex'>): void {
    this.logs.push({ ...entry, logIndex: this.logs.length });
  }

  get logCount(): number {
    return this.logs.length;
  }

  logsFrom(index: number): LogEntry[] {
    return this.logs.slice(index);
  }

  // ---------------------------------------------------------------------------
  // Journaling
  // ---------------------------------------------------------------------------

  /**
   * Snapshot everything a call can change. The returned function restores it.
   */
  checkpoint(): () => void {
    const balances = new Map(this.balances);
    const nonces = new Map(this.nonces);
    const deployed = new Map(this.deployed);
    const tombstones = new Set(this.tombstones);
    const logCount = this.logs.length;
    const restorers = [...this.deployed.values()].map((entry) => entry.instance.checkpoint());

    return () => {
      this.balances = new Map(balances);
      this.nonces = new Map(nonces);
      this.deployed = new Map(deployed);
      this.tombstones = new Set(tombstones);
      this.logs.length = logCount;
      for (const restore of restorers) {
        restore();
      }
    };
  }
}
