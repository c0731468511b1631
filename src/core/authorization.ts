/**
 * Attach proofs: an identity's signed consent to bind its address to an
 * implementation.
 */

import { signObject, verifyObjectSignature } from './crypto.js';
import type { AuthorizationTuple, Keypair, SignedAuthorization } from './types.js';

/**
 * Sign an authorization with the identity's private key.
 * @param signer - Keypair of the identity being delegated
 * @param tuple - Chain id (0 for any), implementation (null to unbind) and the signer's current nonce
 */
export function signAuthorization(signer: Keypair, tuple: AuthorizationTuple): SignedAuthorization {
  const auth: SignedAuthorization = {
    chainId: tuple.chainId,
    implementation: tuple.implementation,
    nonce: tuple.nonce,
    authority: signer.address,
    signature: '',
  };

  const { signature: _, ...toSign } = auth;
  auth.signature = signObject(signer.privateKey, toSign);

  return auth;
}

/** Verify that `authority` signed exactly this tuple. */
export function verifyAuthorization(auth: SignedAuthorization): boolean {
  const { signature, ...toVerify } = auth;
  return verifyObjectSignature(auth.authority, toVerify, signature);
}
