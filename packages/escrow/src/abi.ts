import { ACCESS_CONTROL_ABI } from '@vaultline/core';
import { keccak256, stringToHex } from 'viem';

// Code identities. They stand where creation bytecode stands in address
// derivation, so changing either string moves every predicted address.
export const ESCROW_AGREEMENT_BYTECODE = keccak256(stringToHex('vaultline:EscrowAgreement:1'));
export const ESCROW_REGISTRY_BYTECODE = keccak256(stringToHex('vaultline:EscrowRegistry:1'));

export const AGREEMENT_CONSTRUCTOR_INPUTS = [
  { name: '_registry', type: 'address', internalType: 'address' },
  { name: '_depositor', type: 'address', internalType: 'address' },
  { name: '_payee', type: 'address', internalType: 'address' },
  { name: '_deadline', type: 'uint256', internalType: 'uint256' },
  { name: '_feePercent', type: 'uint256', internalType: 'uint256' },
] as const;

export const REGISTRY_CONSTRUCTOR_INPUTS = [
  { name: '_feeRecipient', type: 'address', internalType: 'address' },
] as const;

// Events each contract emits into ledger logs.
export const ESCROW_AGREEMENT_ABI = [
  {
    type: 'event',
    name: 'Funded',
    inputs: [
      { name: 'amount', type: 'uint256', indexed: false, internalType: 'uint256' },
    ],
    anonymous: false,
  },
  {
    type: 'event',
    name: 'Released',
    inputs: [
      { name: 'payee', type: 'address', indexed: true, internalType: 'address' },
      { name: 'amount', type: 'uint256', indexed: false, internalType: 'uint256' },
    ],
    anonymous: false,
  },
  {
    type: 'event',
    name: 'Reclaimed',
    inputs: [
      { name: 'depositor', type: 'address', indexed: true, internalType: 'address' },
      { name: 'amount', type: 'uint256', indexed: false, internalType: 'uint256' },
    ],
    anonymous: false,
  },
] as const;

export const ESCROW_REGISTRY_ABI = [
  {
    type: 'event',
    name: 'EscrowCreated',
    inputs: [
      { name: 'escrowAddress', type: 'address', indexed: true, internalType: 'address' },
      { name: 'depositor', type: 'address', indexed: true, internalType: 'address' },
      { name: 'payee', type: 'address', indexed: true, internalType: 'address' },
    ],
    anonymous: false,
  },
  {
    type: 'event',
    name: 'FeesWithdrawn',
    inputs: [
      { name: 'recipient', type: 'address', indexed: true, internalType: 'address' },
      { name: 'amount', type: 'uint256', indexed: false, internalType: 'uint256' },
    ],
    anonymous: false,
  },
  ...ACCESS_CONTROL_ABI,
] as const;
