import { getAddress, isHex, keccak256, size, toHex, type Address, type Hex } from 'viem';
import type { EscrowParams, ResolvedEscrowParams } from './types.js';

const DURATION_SECONDS: Record<string, number> = {
  m: 60,
  h: 3600,
  d: 86400,
  w: 604800,
};

/**
 * Parse a deadline (unix seconds, a duration like '24h' or '7d', or an ISO
 * date) into a unix timestamp. Durations count from `now`.
 */
export function parseDeadline(deadline: number | string, now: number): number {
  if (typeof deadline === 'number') {
    if (!Number.isSafeInteger(deadline) || deadline < 0) {
      throw new Error(`Invalid deadline: ${deadline}. Use whole unix seconds.`);
    }
    return deadline;
  }

  // Parse duration strings like '24h', '7d', '30m'
  const match = deadline.trim().match(/^(\d+)\s*(m|h|d|w)$/i);
  if (match) {
    return now + parseInt(match[1], 10) * DURATION_SECONDS[match[2].toLowerCase()];
  }

  if (/^\d+$/.test(deadline)) {
    return parseInt(deadline, 10);
  }

  const asDate = Date.parse(deadline);
  if (!isNaN(asDate)) {
    return Math.floor(asDate / 1000);
  }

  throw new Error(`Invalid deadline format: ${deadline}. Use unix seconds, ISO date or duration like '24h', '7d'.`);
}

/**
 * A 32-byte hex salt is used as-is; anything else is treated as a label and hashed.
 */
export function resolveSalt(salt: Hex | string): Hex {
  if (isHex(salt, { strict: true }) && size(salt) === 32) {
    return salt;
  }
  if (salt.length === 0) {
    throw new Error('Salt must be a 32-byte hex value or a non-empty label');
  }
  return keccak256(toHex(salt));
}

export function resolveParams(params: EscrowParams, depositor: Address, now: number): ResolvedEscrowParams {
  return {
    depositor: getAddress(params.depositor ?? depositor),
    payee: getAddress(params.payee),
    deadline: parseDeadline(params.deadline, now),
    salt: resolveSalt(params.salt),
  };
}
