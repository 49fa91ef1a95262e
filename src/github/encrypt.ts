/**
 * Secret encryption for the GitHub Actions secrets API
 *
 * GitHub only accepts secret values sealed with the repository's public key
 * (libsodium sealed box, base64 encoded).
 */

import sodium from 'libsodium-wrappers';
import { Sensitive } from '../utils/sensitive.js';

/**
 * Seal a secret value for the repository public key
 *
 * @param publicKey - base64 public key from /actions/secrets/public-key
 * @returns base64 ciphertext for the encrypted_value field
 */
export async function encryptSecret(value: string | Sensitive<string>, publicKey: string): Promise<string> {
  await sodium.ready;

  const key = sodium.from_base64(publicKey, sodium.base64_variants.ORIGINAL);
  const message = sodium.from_string(value instanceof Sensitive ? value.reveal() : value);
  const sealed = sodium.crypto_box_seal(message, key);

  return sodium.to_base64(sealed, sodium.base64_variants.ORIGINAL);
}
