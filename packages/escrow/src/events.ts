import { toLogTopics, type EncodedLog } from '@vaultline/core';
import { encodeAbiParameters, encodeEventTopics, type Address } from 'viem';
import { ESCROW_AGREEMENT_ABI, ESCROW_REGISTRY_ABI } from './abi.js';

const AMOUNT = [{ name: 'amount', type: 'uint256' }] as const;

export function escrowCreatedLog(escrowAddress: Address, depositor: Address, payee: Address): EncodedLog {
  return {
    topics: toLogTopics(
      encodeEventTopics({
        abi: ESCROW_REGISTRY_ABI,
        eventName: 'EscrowCreated',
        args: { escrowAddress, depositor, payee },
      })
    ),
    data: '0x',
  };
}

export function feesWithdrawnLog(recipient: Address, amount: bigint): EncodedLog {
  return {
    topics: toLogTopics(
      encodeEventTopics({ abi: ESCROW_REGISTRY_ABI, eventName: 'FeesWithdrawn', args: { recipient } })
    ),
    data: encodeAbiParameters(AMOUNT, [amount]),
  };
}

export function fundedLog(amount: bigint): EncodedLog {
  return {
    topics: toLogTopics(encodeEventTopics({ abi: ESCROW_AGREEMENT_ABI, eventName: 'Funded' })),
    data: encodeAbiParameters(AMOUNT, [amount]),
  };
}

export function releasedLog(payee: Address, amount: bigint): EncodedLog {
  return {
    topics: toLogTopics(
      encodeEventTopics({ abi: ESCROW_AGREEMENT_ABI, eventName: 'Released', args: { payee } })
    ),
    data: encodeAbiParameters(AMOUNT, [amount]),
  };
}

export function reclaimedLog(depositor: Address, amount: bigint): EncodedLog {
  return {
    topics: toLogTopics(
      encodeEventTopics({ abi: ESCROW_AGREEMENT_ABI, eventName: 'Reclaimed', args: { depositor } })
    ),
    data: encodeAbiParameters(AMOUNT, [amount]),
  };
}
