// =============================================================================
// Vaultline Errors
// Every failed call surfaces as one of these; effects are already rolled back
// =============================================================================

import type { Address, RevertKind } from './types.js';

/**
 * Base error for everything raised by the ledger host.
 */
export class LedgerError extends Error {
  public readonly code: string;

  constructor(message: string, code: string = 'LEDGER_ERROR') {
    super(message);
    this.name = 'LedgerError';
    this.code = code;
    // Fix prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * A contract rejected the call with a fixed reason string.
 * The reason is part of the external contract and is matched verbatim.
 */
export class RevertError extends LedgerError {
  public readonly reason: string;
  public readonly kind: RevertKind;
  public readonly contract?: Address;

  constructor(reason: string, kind: RevertKind, contract?: Address) {
    super(`Execution reverted: ${reason}`, 'REVERTED');
    this.name = 'RevertError';
    this.reason = reason;
    this.kind = kind;
    this.contract = contract;
  }
}

/**
 * A contract rejected the call with a named custom error,
 * e.g. `OwnableUnauthorizedAccount(account)`.
 */
export class CustomError extends LedgerError {
  public readonly errorName: string;
  public readonly args: readonly unknown[];
  public readonly kind: RevertKind;

  constructor(errorName: string, args: readonly unknown[], kind: RevertKind) {
    super(
      `Execution reverted with custom error ${errorName}(${args.map((a) => String(a)).join(', ')})`,
      'CUSTOM_ERROR'
    );
    this.name = 'CustomError';
    this.errorName = errorName;
    this.args = args;
    this.kind = kind;
  }
}

/**
 * The sender cannot cover the value attached to a transaction or transfer.
 */
export class InsufficientFundsError extends LedgerError {
  public readonly account: Address;
  public readonly balance: bigint;
  public readonly required: bigint;

  constructor(account: Address, balance: bigint, required: bigint) {
    super(
      `Insufficient funds: ${account} holds ${balance} but ${required} is required`,
      'INSUFFICIENT_FUNDS'
    );
    this.name = 'InsufficientFundsError';
    this.account = account;
    this.balance = balance;
    this.required = required;
  }
}

/**
 * No live contract of the expected kind at an address.
 */
export class ContractNotFoundError extends LedgerError {
  public readonly address: Address;

  constructor(address: Address, expected?: string) {
    super(
      expected
        ? `No ${expected} contract deployed at ${address}`
        : `No contract deployed at ${address}`,
      'CONTRACT_NOT_FOUND'
    );
    this.name = 'ContractNotFoundError';
    this.address = address;
  }
}

/**
 * A deployment targeted an address that already holds code, a nonce, or the
 * tombstone of a removed contract.
 */
export class DeploymentCollisionError extends LedgerError {
  public readonly address: Address;

  constructor(address: Address) {
    super(`Address ${address} is already occupied`, 'DEPLOYMENT_COLLISION');
    this.name = 'DeploymentCollisionError';
    this.address = address;
  }
}

/**
 * An argument cannot be ABI-encoded as the declared type
 * (wrong-width bytes32, negative uint, fractional timestamp).
 */
export class InvalidArgumentError extends LedgerError {
  public readonly argument: string;

  constructor(argument: string, message: string) {
    super(`Invalid argument "${argument}": ${message}`, 'INVALID_ARGUMENT');
    this.name = 'InvalidArgumentError';
    this.argument = argument;
  }
}
