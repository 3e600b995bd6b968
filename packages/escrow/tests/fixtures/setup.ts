import { Ledger, RevertError, type RevertKind } from '@vaultline/core';
import { expect } from 'vitest';
import { keccak256, parseEther, toHex, type Address, type Hex, type LocalAccount } from 'viem';
import { privateKeyToAccount } from 'viem/accounts';
import { EscrowClient } from '../../src/client.js';
import type { EscrowRegistry } from '../../src/registry.js';

export const GENESIS = 1_700_000_000;
export const ONE_DAY = 86_400;
export const STARTING_BALANCE = parseEther('100');

/**
 * Deterministic test account: the private key is keccak256 of the label.
 */
export function accountFor(label: string): LocalAccount {
  return privateKeyToAccount(keccak256(toHex(label)));
}

export function saltFor(label: string): Hex {
  return keccak256(toHex(label));
}

export interface Fixture {
  ledger: Ledger;
  client: EscrowClient;
  registry: EscrowRegistry;
  deployer: LocalAccount;
  feeRecipient: LocalAccount;
  depositor: LocalAccount;
  payee: LocalAccount;
  stranger: LocalAccount;
}

/**
 * Fresh ledger at a fixed genesis with a registry deployed by `deployer`
 * (block 1) and every account holding STARTING_BALANCE.
 */
export async function deployFixture(): Promise<Fixture> {
  const ledger = new Ledger({ genesisTimestamp: GENESIS });
  const deployer = accountFor('deployer');
  const feeRecipient = accountFor('fee-recipient');
  const depositor = accountFor('depositor');
  const payee = accountFor('payee');
  const stranger = accountFor('stranger');

  for (const account of [deployer, feeRecipient, depositor, payee, stranger]) {
    ledger.setBalance(account.address, STARTING_BALANCE);
  }

  const client = await EscrowClient.deployRegistry(ledger, deployer, feeRecipient.address);
  return { ledger, client, registry: client.registry, deployer, feeRecipient, depositor, payee, stranger };
}

/**
 * Registry fixture plus one agreement created by the depositor with a
 * deadline one day after the latest block, optionally funded.
 */
export async function escrowFixture(
  options: { fund?: bigint; salt?: string } = {},
): Promise<Fixture & { escrowAddress: Address; deadline: number }> {
  const fixture = await deployFixture();
  const { ledger, client, depositor } = fixture;
  const deadline = ledger.latestTimestamp() + ONE_DAY;

  const { escrowAddress } = await client.create(
    { payee: fixture.payee.address, deadline, salt: options.salt ?? 'escrow-1' },
    depositor,
  );
  if (options.fund !== undefined) {
    await client.fund(escrowAddress, options.fund, depositor);
  }
  return { ...fixture, escrowAddress, deadline };
}

/**
 * Assert that `pending` rejects with a string revert carrying exactly `reason`.
 */
export async function expectRevert(pending: Promise<unknown>, reason: string, kind?: RevertKind): Promise<void> {
  const error = await pending.then(
    () => undefined,
    (err: unknown) => err,
  );
  expect(error).toBeInstanceOf(RevertError);
  expect(error).toMatchObject(kind ? { reason, kind } : { reason });
}
