import { describe, it, expect, beforeEach } from 'vitest';
import { decodeEventLog, keccak256, toHex, zeroAddress, type Address } from 'viem';
import { privateKeyToAccount } from 'viem/accounts';
import { ACCESS_CONTROL_ABI, initialAccess } from '../src/access.js';
import { CustomError } from '../src/errors.js';
import { Ledger } from '../src/ledger.js';
import type { LogEntry } from '../src/types.js';
import { CounterBlueprint, type Counter } from './fixtures/contracts.js';

function accountFor(label: string): Address {
  return privateKeyToAccount(keccak256(toHex(label))).address;
}

const alice = accountFor('alice');
const bob = accountFor('bob');
const carol = accountFor('carol');

function decode(log: LogEntry) {
  return decodeEventLog({ abi: ACCESS_CONTROL_ABI, data: log.data, topics: log.topics });
}

describe('Access control: ownership', () => {
  let ledger: Ledger;
  let counter: Counter;

  beforeEach(async () => {
    ledger = new Ledger({ genesisTimestamp: 1_700_000_000 });
    counter = (await ledger.deploy({ from: alice }, CounterBlueprint, [])).result;
  });

  it('should make the deployer the owner with nothing pending', () => {
    expect(counter.owner).toBe(alice);
    expect(counter.pendingOwner).toBe(zeroAddress);
    expect(counter.paused).toBe(false);
  });

  it('should reject owner-only calls from anyone else with OwnableUnauthorizedAccount', async () => {
    const call = ledger.transact({ from: bob }, counter, (c, ctx) => c.reset(ctx));

    await expect(call).rejects.toBeInstanceOf(CustomError);
    await expect(call).rejects.toMatchObject({
      errorName: 'OwnableUnauthorizedAccount',
      args: [bob],
      kind: 'authorization',
    });
  });

  it('should move ownership only once the proposed owner accepts', async () => {
    const proposed = await ledger.transact({ from: alice }, counter, (c, ctx) => c.transferOwnership(ctx, bob));

    expect(counter.owner).toBe(alice);
    expect(counter.pendingOwner).toBe(bob);
    expect(decode(proposed.logs[0])).toEqual({
      eventName: 'OwnershipTransferStarted',
      args: { previousOwner: alice, newOwner: bob },
    });

    const accepted = await ledger.transact({ from: bob }, counter, (c, ctx) => c.acceptOwnership(ctx));

    expect(counter.owner).toBe(bob);
    expect(counter.pendingOwner).toBe(zeroAddress);
    expect(decode(accepted.logs[0])).toEqual({
      eventName: 'OwnershipTransferred',
      args: { previousOwner: alice, newOwner: bob },
    });
  });

  it('should refuse acceptance from anyone but the pending owner', async () => {
    await ledger.transact({ from: alice }, counter, (c, ctx) => c.transferOwnership(ctx, bob));

    await expect(
      ledger.transact({ from: carol }, counter, (c, ctx) => c.acceptOwnership(ctx)),
    ).rejects.toMatchObject({ errorName: 'OwnableUnauthorizedAccount', args: [carol] });
    expect(counter.owner).toBe(alice);
  });

  it('should refuse acceptance when nothing is pending', async () => {
    await expect(
      ledger.transact({ from: alice }, counter, (c, ctx) => c.acceptOwnership(ctx)),
    ).rejects.toMatchObject({ errorName: 'OwnableUnauthorizedAccount', args: [alice] });
  });

  it('should cancel a proposal when the zero address is proposed', async () => {
    await ledger.transact({ from: alice }, counter, (c, ctx) => c.transferOwnership(ctx, bob));
    await ledger.transact({ from: alice }, counter, (c, ctx) => c.transferOwnership(ctx, zeroAddress));

    expect(counter.pendingOwner).toBe(zeroAddress);
    await expect(
      ledger.transact({ from: bob }, counter, (c, ctx) => c.acceptOwnership(ctx)),
    ).rejects.toMatchObject({ errorName: 'OwnableUnauthorizedAccount' });
  });

  it('should leave the contract ownerless after renouncing', async () => {
    const receipt = await ledger.transact({ from: alice }, counter, (c, ctx) => c.renounceOwnership(ctx));

    expect(counter.owner).toBe(zeroAddress);
    expect(decode(receipt.logs[0])).toEqual({
      eventName: 'OwnershipTransferred',
      args: { previousOwner: alice, newOwner: zeroAddress },
    });
    await expect(
      ledger.transact({ from: alice }, counter, (c, ctx) => c.reset(ctx)),
    ).rejects.toMatchObject({ errorName: 'OwnableUnauthorizedAccount' });
  });

  it('should refuse the zero address as initial owner', () => {
    expect(() => initialAccess(zeroAddress)).toThrow(
      'Execution reverted with custom error OwnableInvalidOwner(0x0000000000000000000000000000000000000000)',
    );
  });
});

describe('Access control: pause', () => {
  let ledger: Ledger;
  let counter: Counter;

  beforeEach(async () => {
    ledger = new Ledger({ genesisTimestamp: 1_700_000_000 });
    counter = (await ledger.deploy({ from: alice }, CounterBlueprint, [])).result;
  });

  it('should block guarded calls with EnforcedPause while paused', async () => {
    const receipt = await ledger.transact({ from: alice }, counter, (c, ctx) => c.pause(ctx));

    expect(counter.paused).toBe(true);
    expect(decode(receipt.logs[0])).toEqual({ eventName: 'Paused', args: { account: alice } });
    await expect(
      ledger.transact({ from: bob }, counter, (c) => c.increment()),
    ).rejects.toMatchObject({ errorName: 'EnforcedPause', kind: 'state' });
  });

  it('should resume guarded calls after unpause', async () => {
    await ledger.transact({ from: alice }, counter, (c, ctx) => c.pause(ctx));
    const receipt = await ledger.transact({ from: alice }, counter, (c, ctx) => c.unpause(ctx));

    expect(decode(receipt.logs[0])).toEqual({ eventName: 'Unpaused', args: { account: alice } });
    const bumped = await ledger.transact({ from: bob }, counter, (c) => c.increment());
    expect(bumped.result).toBe(1);
  });

  it('should reject pausing twice and unpausing while running', async () => {
    await expect(
      ledger.transact({ from: alice }, counter, (c, ctx) => c.unpause(ctx)),
    ).rejects.toMatchObject({ errorName: 'ExpectedPause' });

    await ledger.transact({ from: alice }, counter, (c, ctx) => c.pause(ctx));
    await expect(
      ledger.transact({ from: alice }, counter, (c, ctx) => c.pause(ctx)),
    ).rejects.toMatchObject({ errorName: 'EnforcedPause' });
  });

  it('should let only the owner pause', async () => {
    await expect(
      ledger.transact({ from: bob }, counter, (c, ctx) => c.pause(ctx)),
    ).rejects.toMatchObject({ errorName: 'OwnableUnauthorizedAccount', args: [bob] });
    expect(counter.paused).toBe(false);
  });
});
