import type { Ledger } from '@vaultline/core';
import type { Address, Hex } from 'viem';

export interface EscrowParams {
  depositor?: Address;       // defaults to the submitting account
  payee: Address;
  deadline: number | string; // unix timestamp, duration like '24h', or ISO date
  salt: Hex | string;        // 32-byte hex, or a label hashed with keccak256
}

export interface ResolvedEscrowParams {
  depositor: Address;
  payee: Address;
  deadline: number;
  salt: Hex;
}

export interface EscrowInfo {
  address: Address;
  registry: Address;
  depositor: Address;
  payee: Address;
  deadline: number;
  feePercent: number;
  funded: boolean;
  released: boolean;
  depositAmount: bigint;
  balance: bigint;
  state: EscrowState;
}

export enum EscrowState {
  Created = 0,
  Funded = 1,
  Released = 2,
  Reclaimed = 3,
}

export interface EscrowClientConfig {
  ledger: Ledger;
  registryAddress: Address;
}
