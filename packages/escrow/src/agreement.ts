// =============================================================================
// EscrowAgreement: one depositor, one payee, one deposit
//
//   fund            release (signed, at or before deadline)
//   ──────► Funded ─────────────────────────────────────────► Released
//              │
//              │    reclaim (depositor, after deadline)
//              └───────────────────────────────────────────► Reclaimed
//
// Authoritative state is written before any value leaves the instance, and
// fund / release / reclaim hold the instance's reentrancy lock.
// =============================================================================

import { LedgerContract, ReentrancyGuard, type CallContext, type ContractBlueprint } from '@vaultline/core';
import { encodeAbiParameters, getAddress, isAddressEqual, type Address, type Hex } from 'viem';
import { AGREEMENT_CONSTRUCTOR_INPUTS, ESCROW_AGREEMENT_BYTECODE } from './abi.js';
import { fundedLog, reclaimedLog, releasedLog } from './events.js';
import { hasSignatureLength, recoverReleaseSigner } from './signature.js';
import { EscrowState } from './types.js';

interface AgreementStorage {
  registry: Address;
  depositor: Address;
  payee: Address;
  deadline: number;
  feePercent: number;
  funded: boolean;
  released: boolean;
  depositAmount: bigint;
}

export type AgreementArgs = readonly [
  registry: Address,
  depositor: Address,
  payee: Address,
  deadline: number,
  feePercent: number,
];

export class EscrowAgreement extends LedgerContract<AgreementStorage> {
  private readonly guard = new ReentrancyGuard();

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  get registry(): Address {
    return this.storage.registry;
  }

  get depositor(): Address {
    return this.storage.depositor;
  }

  get payee(): Address {
    return this.storage.payee;
  }

  get deadline(): number {
    return this.storage.deadline;
  }

  get feePercent(): number {
    return this.storage.feePercent;
  }

  get funded(): boolean {
    return this.storage.funded;
  }

  get released(): boolean {
    return this.storage.released;
  }

  get depositAmount(): bigint {
    return this.storage.depositAmount;
  }

  get state(): EscrowState {
    if (this.storage.released) return EscrowState.Released;
    if (!this.storage.funded) return EscrowState.Created;
    return this.storage.depositAmount > 0n ? EscrowState.Funded : EscrowState.Reclaimed;
  }

  // ---------------------------------------------------------------------------
  // Writes
  // ---------------------------------------------------------------------------

  /**
   * Lock the attached value. Depositor only, once.
   */
  async fund(ctx: CallContext): Promise<void> {
    await this.guard.run(async () => {
      const s = this.storage;
      this.ensure(isAddressEqual(ctx.sender, s.depositor), 'Only depositor can fund', 'authorization');
      this.ensure(!s.funded, 'Already funded', 'state');
      this.ensure(ctx.value > 0n, 'Must send some Ether', 'validation');

      s.depositAmount = ctx.value;
      s.funded = true;
      ctx.emit(fundedLog(ctx.value));
    });
  }

  /**
   * Pay `amount` out to the payee, less the registry's fee, against a
   * depositor signature. Anyone may submit it.
   *
   * An `amount` below the deposit leaves the remainder in the instance with
   * `released` set, where neither party can reach it again.
   */
  async release(ctx: CallContext, amount: bigint, signature: Hex): Promise<void> {
    this.nonPayable(ctx);
    await this.guard.run(async () => {
      const s = this.storage;
      this.ensure(s.funded, 'Not funded', 'state');
      this.ensure(!s.released, 'Already released', 'state');
      this.ensure(ctx.block.timestamp <= s.deadline, 'Deadline has passed', 'temporal');
      this.ensure(amount <= s.depositAmount, 'Amount exceeds deposit', 'validation');
      this.ensure(hasSignatureLength(signature), 'Invalid signature length', 'signature');

      const signer = await recoverReleaseSigner(this.address, amount, signature);
      this.ensure(signer !== null && isAddressEqual(signer, s.depositor), 'Invalid signature', 'signature');

      const feeAmount = (amount * BigInt(s.feePercent)) / 100n;
      const amountAfterFee = amount - feeAmount;

      s.released = true;

      this.ensure(await ctx.transfer(s.registry, feeAmount), 'Fee transfer failed', 'transfer');
      this.ensure(await ctx.transfer(s.payee, amountAfterFee), 'Payee transfer failed', 'transfer');

      ctx.emit(releasedLog(s.payee, amountAfterFee));
    });
  }

  /**
   * Return the whole deposit to the depositor once the deadline has passed.
   */
  async reclaim(ctx: CallContext): Promise<void> {
    this.nonPayable(ctx);
    await this.guard.run(async () => {
      const s = this.storage;
      this.ensure(isAddressEqual(ctx.sender, s.depositor), 'Only depositor can reclaim', 'authorization');
      this.ensure(ctx.block.timestamp > s.deadline, 'Deadline not passed', 'temporal');
      this.ensure(!s.released, 'Already released', 'state');
      this.ensure(s.funded && s.depositAmount > 0n, 'Not funded', 'state');

      const amount = s.depositAmount;
      s.depositAmount = 0n;

      this.ensure(await ctx.transfer(s.depositor, amount), 'Transfer failed', 'transfer');

      ctx.emit(reclaimedLog(s.depositor, amount));
    });
  }

  /**
   * Remove an emptied instance from the ledger for good.
   */
  async selfRemove(ctx: CallContext): Promise<void> {
    this.nonPayable(ctx);
    this.ensure(ctx.balanceOf(this.address) === 0n, 'Contract must be empty', 'state');
    ctx.selfDestruct(this.storage.registry);
  }
}

export const EscrowAgreementBlueprint: ContractBlueprint<EscrowAgreement, AgreementArgs> = {
  name: 'EscrowAgreement',
  bytecode: ESCROW_AGREEMENT_BYTECODE,

  encodeArgs: ([registry, depositor, payee, deadline, feePercent]) =>
    encodeAbiParameters(AGREEMENT_CONSTRUCTOR_INPUTS, [
      registry,
      depositor,
      payee,
      BigInt(deadline),
      BigInt(feePercent),
    ]),

  instantiate: (address, _ctx, [registry, depositor, payee, deadline, feePercent]) =>
    new EscrowAgreement(address, {
      registry: getAddress(registry),
      depositor: getAddress(depositor),
      payee: getAddress(payee),
      deadline,
      feePercent,
      funded: false,
      released: false,
      depositAmount: 0n,
    }),
};
