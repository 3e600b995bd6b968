// @vaultline/escrow: Signature-released, deadline-bounded escrow and its CREATE2 registry

export { EscrowClient, parseEther, formatEther } from './client.js';
export { EscrowAgreement, EscrowAgreementBlueprint, type AgreementArgs } from './agreement.js';
export { EscrowRegistry, EscrowRegistryBlueprint, FEE_PERCENT, type RegistryArgs } from './registry.js';
export {
  ESCROW_AGREEMENT_ABI,
  ESCROW_REGISTRY_ABI,
  ESCROW_AGREEMENT_BYTECODE,
  ESCROW_REGISTRY_BYTECODE,
} from './abi.js';
export {
  RELEASE_DOMAIN_TAG,
  SIGNATURE_LENGTH,
  releaseMessageHash,
  signRelease,
  hasSignatureLength,
  recoverReleaseSigner,
} from './signature.js';
export { parseDeadline, resolveSalt, resolveParams } from './params.js';
export {
  type EscrowParams,
  type ResolvedEscrowParams,
  type EscrowInfo,
  type EscrowClientConfig,
  EscrowState,
} from './types.js';
