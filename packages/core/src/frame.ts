// =============================================================================
// ExecutionFrame: the CallContext handed to one contract invocation
// Nested calls, transfers and deployments open child frames over the same
// world, each guarded by its own checkpoint.
// =============================================================================

import { getAddress, type Address, type Hex } from 'viem';
import type { CallContext } from './context.js';
import type { AnyContract, ContractBlueprint, ContractKind } from './contract.js';
import { assertUint256, computeCreate2Address } from './encoding.js';
import { DeploymentCollisionError, LedgerError, RevertError } from './errors.js';
import type { BlockInfo, EncodedLog } from './types.js';
import type { WorldState } from './world.js';

export class ExecutionFrame implements CallContext {
  constructor(
    private readonly world: WorldState,
    public readonly block: BlockInfo,
    private readonly transactionHash: Hex,
    public readonly sender: Address,
    public readonly self: Address,
    public readonly value: bigint
  ) {}

  balanceOf(address: Address): bigint {
    return this.world.getBalance(getAddress(address));
  }

  async transfer(recipient: Address, amount: bigint): Promise<boolean> {
    assertUint256('amount', amount);
    const to = getAddress(recipient);
    const restore = this.world.checkpoint();
    try {
      this.world.moveValue(this.self, to, amount);
      const receiver = this.world.findContract(to);
      if (receiver) {
        if (!receiver.receive) {
          throw new RevertError('Transfer rejected by recipient', 'transfer', to);
        }
        await receiver.receive(this.child(to, amount));
      }
      return true;
    } catch (err) {
      restore();
      // Reverts become a failed call; anything else is a host bug and escapes.
      if (err instanceof LedgerError) {
        return false;
      }
      throw err;
    }
  }

  async call<C extends AnyContract, R>(
    target: C,
    value: bigint,
    fn: (contract: C, ctx: CallContext) => Promise<R> | R
  ): Promise<R> {
    assertUint256('value', value);
    const restore = this.world.checkpoint();
    try {
      if (this.world.findContract(target.address) !== target) {
        throw new RevertError('Call to a non-contract address', 'validation', target.address);
      }
      this.world.moveValue(this.self, target.address, value);
      return await fn(target, this.child(target.address, value));
    } catch (err) {
      restore();
      throw err;
    }
  }

  contractAt<C extends AnyContract>(address: Address, kind: ContractKind<C>): C {
    return this.world.requireContract(getAddress(address), kind);
  }

  async create2<C extends AnyContract, A extends readonly unknown[]>(
    salt: Hex,
    blueprint: ContractBlueprint<C, A>,
    args: A
  ): Promise<C> {
    const address = computeCreate2Address(this.self, salt, blueprint, args);
    this.world.incrementNonce(this.self);
    return this.place(address, blueprint, args, 0n);
  }

  /**
   * Run a constructor at `address` and install the resulting contract.
   */
  async place<C extends AnyContract, A extends readonly unknown[]>(
    address: Address,
    blueprint: ContractBlueprint<C, A>,
    args: A,
    value: bigint
  ): Promise<C> {
    if (this.world.isOccupied(address)) {
      throw new DeploymentCollisionError(address);
    }

    const restore = this.world.checkpoint();
    try {
      this.world.incrementNonce(address);
      this.world.moveValue(this.self, address, value);
      const contract = await blueprint.instantiate(address, this.child(address, value), args);
      this.world.install(contract, blueprint.bytecode, blueprint.name);
      return contract;
    } catch (err) {
      restore();
      throw err;
    }
  }

  emit(log: EncodedLog): void {
    this.world.appendLog({
      ...log,
      address: this.self,
      blockNumber: this.block.number,
      transactionHash: this.transactionHash,
    });
  }

  selfDestruct(beneficiary: Address): void {
    this.world.moveValue(this.self, getAddress(beneficiary), this.world.getBalance(this.self));
    this.world.remove(this.self);
  }

  private child(self: Address, value: bigint): ExecutionFrame {
    return new ExecutionFrame(this.world, this.block, this.transactionHash, this.self, self, value);
  }
}
