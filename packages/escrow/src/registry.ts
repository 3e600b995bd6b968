// =============================================================================
// EscrowRegistry: deterministic factory and fee custodian
// Agreements land at CREATE2 addresses derived from (registry, salt,
// agreement code ‖ constructor args); fees arrive through `receive`.
// =============================================================================

import {
  LedgerContract,
  LedgerError,
  ReentrancyGuard,
  RevertError,
  acceptOwnership as acceptPendingOwner,
  assertBytes32,
  assertTimestamp,
  computeCreate2Address,
  initialAccess,
  pause as enterPause,
  renounceOwnership as dropOwner,
  requireOwner,
  transferOwnership as proposeOwner,
  unpause as exitPause,
  whenNotPaused,
  type AccessState,
  type CallContext,
  type ContractBlueprint,
} from '@vaultline/core';
import { encodeAbiParameters, getAddress, isAddressEqual, zeroAddress, type Address, type Hex } from 'viem';
import { ESCROW_REGISTRY_BYTECODE, REGISTRY_CONSTRUCTOR_INPUTS } from './abi.js';
import { EscrowAgreementBlueprint, type AgreementArgs, type EscrowAgreement } from './agreement.js';
import { escrowCreatedLog, feesWithdrawnLog } from './events.js';

/** Fee rate stamped into every agreement, in whole percent. */
export const FEE_PERCENT = 1;

interface RegistryStorage extends AccessState {
  feeRecipient: Address;
  escrowsByDepositor: Map<Address, Address[]>;
}

export type RegistryArgs = readonly [feeRecipient: Address];

export class EscrowRegistry extends LedgerContract<RegistryStorage> {
  private readonly guard = new ReentrancyGuard();

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  get feeRecipient(): Address {
    return this.storage.feeRecipient;
  }

  get feePercent(): number {
    return FEE_PERCENT;
  }

  get owner(): Address {
    return this.storage.owner;
  }

  get pendingOwner(): Address {
    return this.storage.pendingOwner;
  }

  get paused(): boolean {
    return this.storage.paused;
  }

  /**
   * Where `createEscrow` will place an agreement for these exact inputs.
   */
  predictAddress(depositor: Address, payee: Address, deadline: number, salt: Hex): Address {
    assertTimestamp('deadline', deadline);
    return computeCreate2Address(this.address, salt, EscrowAgreementBlueprint, this.agreementArgs(depositor, payee, deadline));
  }

  /**
   * Agreements created on behalf of `depositor`, oldest first.
   */
  getEscrows(depositor: Address): Address[] {
    return [...(this.storage.escrowsByDepositor.get(getAddress(depositor)) ?? [])];
  }

  // ---------------------------------------------------------------------------
  // Writes
  // ---------------------------------------------------------------------------

  async createEscrow(
    ctx: CallContext,
    depositor: Address,
    payee: Address,
    deadline: number,
    salt: Hex
  ): Promise<Address> {
    this.nonPayable(ctx);
    whenNotPaused(this.storage);
    assertBytes32('salt', salt);
    assertTimestamp('deadline', deadline);

    this.ensure(!isAddressEqual(depositor, zeroAddress), 'Invalid Depositor', 'validation');
    this.ensure(!isAddressEqual(payee, zeroAddress), 'Invalid Payee', 'validation');
    this.ensure(deadline > ctx.block.timestamp, 'Invalid Deadline', 'temporal');

    let agreement: EscrowAgreement;
    try {
      agreement = await ctx.create2(salt, EscrowAgreementBlueprint, this.agreementArgs(depositor, payee, deadline));
    } catch (err) {
      if (err instanceof LedgerError) {
        throw new RevertError('Deployment failed', 'deployment', this.address);
      }
      throw err;
    }

    const owned = getAddress(depositor);
    const list = this.storage.escrowsByDepositor.get(owned) ?? [];
    list.push(agreement.address);
    this.storage.escrowsByDepositor.set(owned, list);

    ctx.emit(escrowCreatedLog(agreement.address, owned, getAddress(payee)));
    return agreement.address;
  }

  /**
   * Send every accumulated fee to the fee recipient.
   */
  async withdrawFees(ctx: CallContext): Promise<void> {
    this.nonPayable(ctx);
    requireOwner(this.storage, ctx);
    await this.guard.run(async () => {
      const amount = ctx.balanceOf(this.address);
      this.ensure(amount > 0n, 'No fees to withdraw', 'state');
      this.ensure(await ctx.transfer(this.storage.feeRecipient, amount), 'Fee withdrawal failed', 'transfer');
      ctx.emit(feesWithdrawnLog(this.storage.feeRecipient, amount));
    });
  }

  async pause(ctx: CallContext): Promise<void> {
    this.nonPayable(ctx);
    enterPause(this.storage, ctx);
  }

  async unpause(ctx: CallContext): Promise<void> {
    this.nonPayable(ctx);
    exitPause(this.storage, ctx);
  }

  async transferOwnership(ctx: CallContext, newOwner: Address): Promise<void> {
    this.nonPayable(ctx);
    proposeOwner(this.storage, ctx, getAddress(newOwner));
  }

  async acceptOwnership(ctx: CallContext): Promise<void> {
    this.nonPayable(ctx);
    acceptPendingOwner(this.storage, ctx);
  }

  async renounceOwnership(ctx: CallContext): Promise<void> {
    this.nonPayable(ctx);
    dropOwner(this.storage, ctx);
  }

  // Fee shares land here with no further bookkeeping.
  async receive(): Promise<void> {}

  private agreementArgs(depositor: Address, payee: Address, deadline: number): AgreementArgs {
    return [this.address, getAddress(depositor), getAddress(payee), deadline, FEE_PERCENT];
  }
}

export const EscrowRegistryBlueprint: ContractBlueprint<EscrowRegistry, RegistryArgs> = {
  name: 'EscrowRegistry',
  bytecode: ESCROW_REGISTRY_BYTECODE,

  encodeArgs: ([feeRecipient]) => encodeAbiParameters(REGISTRY_CONSTRUCTOR_INPUTS, [feeRecipient]),

  instantiate: (address, ctx, [feeRecipient]) =>
    new EscrowRegistry(address, {
      ...initialAccess(ctx.sender),
      feeRecipient: getAddress(feeRecipient),
      escrowsByDepositor: new Map(),
    }),
};
