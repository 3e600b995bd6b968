// =============================================================================
// Vaultline: End-to-End Demo
// Deploy a registry, then walk one agreement through release and one
// through reclaim on an in-process ledger.
//
// Run: npx tsx examples/demo.ts
// =============================================================================

import { Ledger, RevertError } from '../packages/core/src/index.js';
import type { Logger } from '../packages/core/src/index.js';
import { EscrowClient, EscrowState, formatEther, parseEther } from '../packages/escrow/src/index.js';
import { keccak256, toHex, type Address } from 'viem';
import { privateKeyToAccount } from 'viem/accounts';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function header(title: string): void {
  console.log('\n' + '='.repeat(72));
  console.log(`  ${title}`);
  console.log('='.repeat(72));
}

function subheader(title: string): void {
  console.log(`\n--- ${title} ---`);
}

function result(label: string, value: unknown): void {
  console.log(`  ${label}: ${value}`);
}

const consoleLogger: Logger = {
  info: (msg) => console.log(`  ${msg}`),
  warn: (msg, data) => console.warn(`  ${msg}`, data ?? ''),
  error: (msg, data) => console.error(`  ${msg}`, data ?? ''),
};

// Demo-only keys derived from fixed labels.
const deployer = privateKeyToAccount(keccak256(toHex('demo:deployer')));
const depositor = privateKeyToAccount(keccak256(toHex('demo:depositor')));
const payee = privateKeyToAccount(keccak256(toHex('demo:payee')));

function balanceOf(ledger: Ledger, address: Address): string {
  return `${formatEther(ledger.getBalance(address))} ETH`;
}

// ---------------------------------------------------------------------------
// DEMO 1: Deployment
// ---------------------------------------------------------------------------

async function demo1_deploy(ledger: Ledger): Promise<EscrowClient> {
  header('DEMO 1: Deploy the EscrowRegistry');

  for (const account of [deployer, depositor, payee]) {
    ledger.setBalance(account.address, parseEther('10'));
  }

  const client = await EscrowClient.deployRegistry(ledger, deployer, deployer.address);
  result('Registry', client.registryAddress);
  result('Owner', client.registry.owner);
  result('Fee', `${client.registry.feePercent}%`);
  return client;
}

// ---------------------------------------------------------------------------
// DEMO 2: Signed release before the deadline
// ---------------------------------------------------------------------------

async function demo2_release(ledger: Ledger, client: EscrowClient): Promise<void> {
  header('DEMO 2: Signed Release');

  const params = { payee: payee.address, deadline: '24h', salt: 'demo-release' };
  const { escrowAddress: predicted } = client.predict(params, depositor);
  result('Predicted address', predicted);

  const { escrowAddress } = await client.create(params, depositor);
  result('Deployed address', escrowAddress);
  result('Prediction held', escrowAddress === predicted);

  subheader('Fund 1 ETH');
  await client.fund(escrowAddress, parseEther('1'), depositor);
  result('Escrow balance', balanceOf(ledger, escrowAddress));

  subheader('Depositor signs off-ledger, payee submits');
  const signature = await client.authorize(escrowAddress, parseEther('1'), depositor);
  await client.release(escrowAddress, parseEther('1'), signature, payee);
  result('Payee balance', balanceOf(ledger, payee.address));
  result('Registry fees', balanceOf(ledger, client.registryAddress));
  result('State', EscrowState[client.getEscrow(escrowAddress).state]);

  subheader('Replaying the same signature');
  try {
    await client.release(escrowAddress, parseEther('1'), signature, payee);
  } catch (err) {
    if (!(err instanceof RevertError)) throw err;
    result('Rejected', err.reason);
  }
}

// ---------------------------------------------------------------------------
// DEMO 3: Reclaim after the deadline
// ---------------------------------------------------------------------------

async function demo3_reclaim(ledger: Ledger, client: EscrowClient): Promise<void> {
  header('DEMO 3: Reclaim After Deadline');

  const { escrowAddress } = await client.create(
    { payee: payee.address, deadline: '1h', salt: 'demo-reclaim' },
    depositor,
  );
  await client.fund(escrowAddress, parseEther('2'), depositor);
  result('Depositor balance after funding', balanceOf(ledger, depositor.address));

  ledger.increaseTime(3601);
  await client.reclaim(escrowAddress, depositor);
  result('Depositor balance after reclaim', balanceOf(ledger, depositor.address));
  result('State', EscrowState[client.getEscrow(escrowAddress).state]);

  subheader('Owner sweeps fees');
  await client.withdrawFees(deployer);
  result('Fee recipient balance', balanceOf(ledger, deployer.address));
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  const ledger = new Ledger({ logger: consoleLogger });
  const client = await demo1_deploy(ledger);
  await demo2_release(ledger, client);
  await demo3_reclaim(ledger, client);
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
