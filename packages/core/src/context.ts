import type { Address, Hex } from 'viem';
import type { AnyContract, ContractBlueprint, ContractKind } from './contract.js';
import type { BlockInfo, EncodedLog } from './types.js';

/**
 * What contract code sees while it executes: the caller, the attached value,
 * its own address, the current block, and the host operations it may perform.
 */
export interface CallContext {
  readonly sender: Address;
  readonly value: bigint;
  readonly self: Address;
  readonly block: BlockInfo;

  balanceOf(address: Address): bigint;

  /**
   * Low-level value call. Runs the receiver's `receive` hook when it is a
   * contract. Returns false, with the sub-call's effects undone, when the
   * receiver rejects the value or the sender cannot cover it. An amount
   * outside the uint256 range throws instead.
   */
  transfer(to: Address, amount: bigint): Promise<boolean>;

  /**
   * Call into another contract with `self` as the sender. Failures propagate.
   */
  call<C extends AnyContract, R>(
    target: C,
    value: bigint,
    fn: (contract: C, ctx: CallContext) => Promise<R> | R
  ): Promise<R>;

  contractAt<C extends AnyContract>(address: Address, kind: ContractKind<C>): C;

  create2<C extends AnyContract, A extends readonly unknown[]>(
    salt: Hex,
    blueprint: ContractBlueprint<C, A>,
    args: A
  ): Promise<C>;

  emit(log: EncodedLog): void;

  /**
   * Remove the running contract for good, sending its balance to `beneficiary`
   * without invoking any hook there.
   */
  selfDestruct(beneficiary: Address): void;
}
