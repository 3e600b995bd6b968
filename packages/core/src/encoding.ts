// =============================================================================
// Encoding helpers shared by the ledger and contract code
// =============================================================================

import {
  concat,
  getCreate2Address,
  getCreateAddress,
  isHex,
  size,
  type Address,
  type Hex,
} from 'viem';
import { InvalidArgumentError, LedgerError } from './errors.js';
import type { AnyContract, ContractBlueprint } from './contract.js';

const MAX_UINT256 = 2n ** 256n - 1n;

/**
 * Flatten viem's `encodeEventTopics` output into the shape a log stores.
 * Only scalar indexed arguments are supported, so nested topic lists never occur.
 */
export function toLogTopics(topics: readonly (Hex | readonly Hex[] | null)[]): [Hex, ...Hex[]] {
  const flat = topics.filter((topic): topic is Hex => typeof topic === 'string');
  if (flat.length === 0) {
    throw new LedgerError('Event log has no signature topic', 'INVALID_LOG');
  }
  const [signature, ...rest] = flat;
  return [signature, ...rest];
}

export function assertBytes32(name: string, value: Hex): void {
  if (!isHex(value, { strict: true }) || size(value) !== 32) {
    throw new InvalidArgumentError(name, `expected 32 bytes of hex, got ${value}`);
  }
}

export function assertUint256(name: string, value: bigint): void {
  if (value < 0n || value > MAX_UINT256) {
    throw new InvalidArgumentError(name, `${value} is outside the uint256 range`);
  }
}

export function assertTimestamp(name: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new InvalidArgumentError(name, `${value} is not a whole number of seconds`);
  }
}

/**
 * Creation code of a contract: its code identity followed by the
 * ABI-encoded constructor arguments.
 */
export function initCodeOf<C extends AnyContract, A extends readonly unknown[]>(
  blueprint: ContractBlueprint<C, A>,
  args: A
): Hex {
  return concat([blueprint.bytecode, blueprint.encodeArgs(args)]);
}

/**
 * keccak256(0xff ‖ deployer ‖ salt ‖ keccak256(initCode))[12:]
 *
 * Used both to place a contract and to predict where it will be placed.
 */
export function computeCreate2Address<C extends AnyContract, A extends readonly unknown[]>(
  deployer: Address,
  salt: Hex,
  blueprint: ContractBlueprint<C, A>,
  args: A
): Address {
  assertBytes32('salt', salt);
  return getCreate2Address({ from: deployer, salt, bytecode: initCodeOf(blueprint, args) });
}

/**
 * keccak256(rlp([deployer, nonce]))[12:]
 */
export function computeCreateAddress(deployer: Address, nonce: number): Address {
  return getCreateAddress({ from: deployer, nonce: BigInt(nonce) });
}
