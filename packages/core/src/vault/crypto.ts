/**
 * AES-256-GCM primitives for recordings at rest.
 *
 * Every payload uses the combined layout nonce(12) ‖ ciphertext ‖ tag(16),
 * whether it is a small buffer (the manifest) or a streamed file.
 */

import {
  createCipheriv,
  createDecipheriv,
  createHash,
  randomBytes,
  randomUUID,
} from "node:crypto";
import { DecryptionError } from "../errors.js";

export const ALGORITHM = "aes-256-gcm";
export const KEY_LENGTH = 32;
export const NONCE_LENGTH = 12;
export const AUTH_TAG_LENGTH = 16;

/** Extension of encrypted recording artifacts */
export const ENCRYPTED_EXTENSION = ".crvault";

export function generateKey(): Buffer {
  return randomBytes(KEY_LENGTH);
}

/** Encrypt with a fresh random nonce */
export function encryptBuffer(plaintext: Uint8Array, key: Buffer): Buffer {
  const nonce = randomBytes(NONCE_LENGTH);
  const cipher = createCipheriv(ALGORITHM, key, nonce, {
    authTagLength: AUTH_TAG_LENGTH,
  });
  const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
  return Buffer.concat([nonce, ciphertext, cipher.getAuthTag()]);
}

/** Decrypt a combined payload. Throws DecryptionError on any failure. */
export function decryptBuffer(
  payload: Uint8Array,
  key: Buffer,
  what = "data"
): Buffer {
  if (payload.length < NONCE_LENGTH + AUTH_TAG_LENGTH) {
    throw new DecryptionError(what);
  }
  const data = Buffer.from(payload);
  const nonce = data.subarray(0, NONCE_LENGTH);
  const tag = data.subarray(data.length - AUTH_TAG_LENGTH);
  const ciphertext = data.subarray(NONCE_LENGTH, data.length - AUTH_TAG_LENGTH);

  try {
    const decipher = createDecipheriv(ALGORITHM, key, nonce, {
      authTagLength: AUTH_TAG_LENGTH,
    });
    decipher.setAuthTag(tag);
    return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
  } catch (error) {
    throw new DecryptionError(what, { cause: error });
  }
}

/**
 * Opaque artifact name: the first 16 bytes of sha256(original + UUID)
 * as lowercase hex, plus the encrypted extension. The random salt makes
 * repeated calls for the same name differ.
 */
export function generateHashFilename(originalFilename: string): string {
  const digest = createHash("sha256")
    .update(`${originalFilename}${randomUUID()}`)
    .digest();
  return `${digest.subarray(0, 16).toString("hex")}${ENCRYPTED_EXTENSION}`;
}
