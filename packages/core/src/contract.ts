// =============================================================================
// Contract model
// A contract is a TypeScript object whose mutable state lives in `storage`.
// The ledger snapshots that storage so a failed call can be undone.
// =============================================================================

import type { Address, Hex } from 'viem';
import type { CallContext } from './context.js';
import { RevertError } from './errors.js';
import type { RevertKind } from './types.js';

export abstract class LedgerContract<S extends object> {
  public readonly address: Address;
  protected readonly storage: S;

  /**
   * Payable fallback for plain value transfers.
   * Contracts that leave it undefined reject incoming transfers.
   */
  receive?(ctx: CallContext): Promise<void>;

  constructor(address: Address, storage: S) {
    this.address = address;
    this.storage = storage;
  }

  /**
   * Capture the current storage. The returned function writes it back in
   * place, so references to `this.storage` held by a running call stay valid.
   */
  checkpoint(): () => void {
    const saved = structuredClone(this.storage);
    return () => {
      Object.assign(this.storage, structuredClone(saved));
    };
  }

  /**
   * Revert with `reason` unless `condition` holds.
   */
  protected ensure(condition: boolean, reason: string, kind: RevertKind): void {
    if (!condition) {
      throw new RevertError(reason, kind, this.address);
    }
  }

  /**
   * Reject value attached to an entry point that does not accept it.
   */
  protected nonPayable(ctx: CallContext): void {
    this.ensure(ctx.value === 0n, 'Function is not payable', 'validation');
  }
}

export type AnyContract = LedgerContract<object>;

/**
 * Everything the ledger needs to deploy a contract kind.
 * `bytecode` is the code identity that feeds address derivation, exactly
 * where EVM creation bytecode would.
 */
export interface ContractBlueprint<C extends AnyContract, A extends readonly unknown[]> {
  readonly name: string;
  readonly bytecode: Hex;
  encodeArgs(args: A): Hex;
  instantiate(address: Address, ctx: CallContext, args: A): C | Promise<C>;
}

/**
 * Class reference used to check the kind of a deployed contract.
 */
export type ContractKind<C extends AnyContract> = abstract new (...args: never[]) => C;
