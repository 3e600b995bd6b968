// =============================================================================
// Release authorization
// The depositor signs keccak256("RELEASE" ‖ escrow ‖ amount) off-ledger;
// whoever holds the signature may submit it.
// =============================================================================

import {
  encodePacked,
  isHex,
  keccak256,
  recoverMessageAddress,
  size,
  type Address,
  type Hex,
  type LocalAccount,
} from 'viem';

export const RELEASE_DOMAIN_TAG = 'RELEASE';
export const SIGNATURE_LENGTH = 65;

/**
 * Canonical release message hash. Binding the escrow address keeps a
 * signature from being replayed against another agreement.
 */
export function releaseMessageHash(escrowAddress: Address, amount: bigint): Hex {
  return keccak256(
    encodePacked(['string', 'address', 'uint256'], [RELEASE_DOMAIN_TAG, escrowAddress, amount])
  );
}

/**
 * Sign a release with the personal-message (EIP-191) convention over the raw hash.
 */
export async function signRelease(
  account: LocalAccount,
  escrowAddress: Address,
  amount: bigint
): Promise<Hex> {
  return account.signMessage({ message: { raw: releaseMessageHash(escrowAddress, amount) } });
}

export function hasSignatureLength(signature: Hex): boolean {
  return isHex(signature, { strict: true }) && size(signature) === SIGNATURE_LENGTH;
}

/**
 * Recover who signed a release. Returns null when the signature does not
 * recover to any key (bad r/s, unknown recovery id).
 */
export async function recoverReleaseSigner(
  escrowAddress: Address,
  amount: bigint,
  signature: Hex
): Promise<Address | null> {
  try {
    return await recoverMessageAddress({
      message: { raw: releaseMessageHash(escrowAddress, amount) },
      signature,
    });
  } catch (err) {
    if (err instanceof Error) {
      return null;
    }
    throw err;
  }
}
