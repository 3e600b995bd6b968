// =============================================================================
// Access control: two-step ownership and a pause switch
// The fields live inside the owning contract's storage, so they are
// snapshotted and rolled back with the rest of its state.
// =============================================================================

import { encodeAbiParameters, encodeEventTopics, isAddressEqual, zeroAddress, type Address } from 'viem';
import type { CallContext } from './context.js';
import { toLogTopics } from './encoding.js';
import { CustomError } from './errors.js';

export interface AccessState {
  owner: Address;
  pendingOwner: Address;
  paused: boolean;
}

export const ACCESS_CONTROL_ABI = [
  {
    type: 'event',
    name: 'OwnershipTransferStarted',
    inputs: [
      { name: 'previousOwner', type: 'address', indexed: true, internalType: 'address' },
      { name: 'newOwner', type: 'address', indexed: true, internalType: 'address' },
    ],
    anonymous: false,
  },
  {
    type: 'event',
    name: 'OwnershipTransferred',
    inputs: [
      { name: 'previousOwner', type: 'address', indexed: true, internalType: 'address' },
      { name: 'newOwner', type: 'address', indexed: true, internalType: 'address' },
    ],
    anonymous: false,
  },
  {
    type: 'event',
    name: 'Paused',
    inputs: [{ name: 'account', type: 'address', indexed: false, internalType: 'address' }],
    anonymous: false,
  },
  {
    type: 'event',
    name: 'Unpaused',
    inputs: [{ name: 'account', type: 'address', indexed: false, internalType: 'address' }],
    anonymous: false,
  },
] as const;

export function initialAccess(owner: Address): AccessState {
  if (isAddressEqual(owner, zeroAddress)) {
    throw new CustomError('OwnableInvalidOwner', [zeroAddress], 'validation');
  }
  return { owner, pendingOwner: zeroAddress, paused: false };
}

// ---------------------------------------------------------------------------
// Checks
// ---------------------------------------------------------------------------

export function requireOwner(state: AccessState, ctx: CallContext): void {
  if (!isAddressEqual(ctx.sender, state.owner)) {
    throw new CustomError('OwnableUnauthorizedAccount', [ctx.sender], 'authorization');
  }
}

export function whenNotPaused(state: AccessState): void {
  if (state.paused) {
    throw new CustomError('EnforcedPause', [], 'state');
  }
}

export function whenPaused(state: AccessState): void {
  if (!state.paused) {
    throw new CustomError('ExpectedPause', [], 'state');
  }
}

// ---------------------------------------------------------------------------
// Pause
// ---------------------------------------------------------------------------

export function pause(state: AccessState, ctx: CallContext): void {
  requireOwner(state, ctx);
  whenNotPaused(state);
  state.paused = true;
  ctx.emit({
    topics: toLogTopics(encodeEventTopics({ abi: ACCESS_CONTROL_ABI, eventName: 'Paused' })),
    data: encodeAbiParameters([{ name: 'account', type: 'address' }], [ctx.sender]),
  });
}

export function unpause(state: AccessState, ctx: CallContext): void {
  requireOwner(state, ctx);
  whenPaused(state);
  state.paused = false;
  ctx.emit({
    topics: toLogTopics(encodeEventTopics({ abi: ACCESS_CONTROL_ABI, eventName: 'Unpaused' })),
    data: encodeAbiParameters([{ name: 'account', type: 'address' }], [ctx.sender]),
  });
}

// ---------------------------------------------------------------------------
// Ownership
// ---------------------------------------------------------------------------

/**
 * Propose `newOwner`. Nothing changes hands until they accept.
 * Proposing the zero address cancels an outstanding proposal.
 */
export function transferOwnership(state: AccessState, ctx: CallContext, newOwner: Address): void {
  requireOwner(state, ctx);
  state.pendingOwner = newOwner;
  ctx.emit({
    topics: toLogTopics(
      encodeEventTopics({
        abi: ACCESS_CONTROL_ABI,
        eventName: 'OwnershipTransferStarted',
        args: { previousOwner: state.owner, newOwner },
      })
    ),
    data: '0x',
  });
}

export function acceptOwnership(state: AccessState, ctx: CallContext): void {
  if (isAddressEqual(state.pendingOwner, zeroAddress) || !isAddressEqual(ctx.sender, state.pendingOwner)) {
    throw new CustomError('OwnableUnauthorizedAccount', [ctx.sender], 'authorization');
  }
  setOwner(state, ctx, state.pendingOwner);
}

export function renounceOwnership(state: AccessState, ctx: CallContext): void {
  requireOwner(state, ctx);
  setOwner(state, ctx, zeroAddress);
}

function setOwner(state: AccessState, ctx: CallContext, newOwner: Address): void {
  const previousOwner = state.owner;
  state.owner = newOwner;
  state.pendingOwner = zeroAddress;
  ctx.emit({
    topics: toLogTopics(
      encodeEventTopics({
        abi: ACCESS_CONTROL_ABI,
        eventName: 'OwnershipTransferred',
        args: { previousOwner, newOwner },
      })
    ),
    data: '0x',
  });
}
