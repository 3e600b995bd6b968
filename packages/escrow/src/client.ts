import type { Ledger, LogEntry, TransactionReceipt } from '@vaultline/core';
import { decodeEventLog, getAddress, isAddressEqual, type Address, type Hex, type LocalAccount } from 'viem';
import { ESCROW_REGISTRY_ABI } from './abi.js';
import { EscrowAgreement } from './agreement.js';
import { resolveParams } from './params.js';
import { EscrowRegistry, EscrowRegistryBlueprint } from './registry.js';
import { signRelease } from './signature.js';
import type { EscrowClientConfig, EscrowInfo, EscrowParams, ResolvedEscrowParams } from './types.js';

export { parseEther, formatEther } from 'viem';

/**
 * EscrowClient: typed driver for an EscrowRegistry and its agreements.
 * Every write is submitted to the ledger as one transaction from `account`.
 */
export class EscrowClient {
  private config: EscrowClientConfig;

  constructor(config: EscrowClientConfig) {
    this.config = {
      ...config,
      registryAddress: getAddress(config.registryAddress),
    };
  }

  /**
   * Deploy a fresh registry from `deployer`, who becomes its owner.
   */
  static async deployRegistry(
    ledger: Ledger,
    deployer: LocalAccount,
    feeRecipient: Address,
  ): Promise<EscrowClient> {
    const receipt = await ledger.deploy({ from: deployer.address }, EscrowRegistryBlueprint, [feeRecipient]);
    return new EscrowClient({ ledger, registryAddress: receipt.result.address });
  }

  get ledger(): Ledger {
    return this.config.ledger;
  }

  get registryAddress(): Address {
    return this.config.registryAddress;
  }

  get registry(): EscrowRegistry {
    return this.ledger.contractAt(this.registryAddress, EscrowRegistry);
  }

  agreement(escrowAddress: Address): EscrowAgreement {
    return this.ledger.contractAt(escrowAddress, EscrowAgreement);
  }

  // ---------------------------------------------------------------------------
  // Registry
  // ---------------------------------------------------------------------------

  /**
   * Resolve deadline and salt the way `create` will, and return the address
   * the agreement will land at.
   */
  predict(params: EscrowParams, account?: LocalAccount): { escrowAddress: Address; params: ResolvedEscrowParams } {
    const resolved = this.resolve(params, account);
    const escrowAddress = this.registry.predictAddress(
      resolved.depositor,
      resolved.payee,
      resolved.deadline,
      resolved.salt,
    );
    return { escrowAddress, params: resolved };
  }

  /**
   * Create a new agreement through the registry.
   */
  async create(
    params: EscrowParams,
    account: LocalAccount,
  ): Promise<{ escrowAddress: Address; receipt: TransactionReceipt<Address> }> {
    const resolved = this.resolve(params, account);
    const receipt = await this.ledger.transact({ from: account.address }, this.registry, (registry, ctx) =>
      registry.createEscrow(ctx, resolved.depositor, resolved.payee, resolved.deadline, resolved.salt),
    );
    return { escrowAddress: this.extractEscrowAddress(receipt.logs), receipt };
  }

  listEscrows(depositor: Address): Address[] {
    return this.registry.getEscrows(depositor);
  }

  /**
   * Sweep accumulated fees to the fee recipient (owner only).
   */
  async withdrawFees(account: LocalAccount): Promise<TransactionReceipt<void>> {
    return this.ledger.transact({ from: account.address }, this.registry, (registry, ctx) =>
      registry.withdrawFees(ctx),
    );
  }

  async pause(account: LocalAccount): Promise<TransactionReceipt<void>> {
    return this.ledger.transact({ from: account.address }, this.registry, (registry, ctx) => registry.pause(ctx));
  }

  async unpause(account: LocalAccount): Promise<TransactionReceipt<void>> {
    return this.ledger.transact({ from: account.address }, this.registry, (registry, ctx) => registry.unpause(ctx));
  }

  async transferOwnership(newOwner: Address, account: LocalAccount): Promise<TransactionReceipt<void>> {
    return this.ledger.transact({ from: account.address }, this.registry, (registry, ctx) =>
      registry.transferOwnership(ctx, newOwner),
    );
  }

  async acceptOwnership(account: LocalAccount): Promise<TransactionReceipt<void>> {
    return this.ledger.transact({ from: account.address }, this.registry, (registry, ctx) =>
      registry.acceptOwnership(ctx),
    );
  }

  // ---------------------------------------------------------------------------
  // Agreements
  // ---------------------------------------------------------------------------

  /**
   * Lock `amount` in the agreement (depositor only).
   */
  async fund(escrowAddress: Address, amount: bigint, account: LocalAccount): Promise<TransactionReceipt<void>> {
    return this.ledger.transact(
      { from: account.address, value: amount },
      this.agreement(escrowAddress),
      (agreement, ctx) => agreement.fund(ctx),
    );
  }

  /**
   * Sign a release of `amount` off-ledger. `account` must be the depositor
   * for the signature to be accepted.
   */
  async authorize(escrowAddress: Address, amount: bigint, account: LocalAccount): Promise<Hex> {
    return signRelease(account, getAddress(escrowAddress), amount);
  }

  /**
   * Submit a signed release. Any account may submit it.
   */
  async release(
    escrowAddress: Address,
    amount: bigint,
    signature: Hex,
    account: LocalAccount,
  ): Promise<TransactionReceipt<void>> {
    return this.ledger.transact({ from: account.address }, this.agreement(escrowAddress), (agreement, ctx) =>
      agreement.release(ctx, amount, signature),
    );
  }

  /**
   * Return the deposit after the deadline (depositor only).
   */
  async reclaim(escrowAddress: Address, account: LocalAccount): Promise<TransactionReceipt<void>> {
    return this.ledger.transact({ from: account.address }, this.agreement(escrowAddress), (agreement, ctx) =>
      agreement.reclaim(ctx),
    );
  }

  /**
   * Remove an emptied agreement from the ledger.
   */
  async remove(escrowAddress: Address, account: LocalAccount): Promise<TransactionReceipt<void>> {
    return this.ledger.transact({ from: account.address }, this.agreement(escrowAddress), (agreement, ctx) =>
      agreement.selfRemove(ctx),
    );
  }

  /**
   * Snapshot of an agreement's fields and balance (read-only).
   */
  getEscrow(escrowAddress: Address): EscrowInfo {
    const agreement = this.agreement(escrowAddress);
    return {
      address: agreement.address,
      registry: agreement.registry,
      depositor: agreement.depositor,
      payee: agreement.payee,
      deadline: agreement.deadline,
      feePercent: agreement.feePercent,
      funded: agreement.funded,
      released: agreement.released,
      depositAmount: agreement.depositAmount,
      balance: this.ledger.getBalance(agreement.address),
      state: agreement.state,
    };
  }

  private resolve(params: EscrowParams, account?: LocalAccount): ResolvedEscrowParams {
    const depositor = params.depositor ?? account?.address;
    if (!depositor) {
      throw new Error('EscrowParams.depositor is required when no account is given');
    }
    return resolveParams(params, depositor, this.ledger.latestTimestamp());
  }

  /**
   * Extract the agreement address from the registry's EscrowCreated log.
   */
  private extractEscrowAddress(logs: LogEntry[]): Address {
    for (const log of logs) {
      if (!isAddressEqual(log.address, this.registryAddress)) continue;
      const decoded = decodeEventLog({ abi: ESCROW_REGISTRY_ABI, data: log.data, topics: log.topics });
      if (decoded.eventName === 'EscrowCreated') {
        return decoded.args.escrowAddress;
      }
    }
    throw new Error('EscrowCreated event not found in transaction receipt');
  }
}
