import { createCipheriv, createDecipheriv, randomBytes } from "node:crypto";
import {
  AES_ALGORITHM,
  AES_BLOCK_SIZE,
  AES_IV_LENGTH,
  AES_KEY_LENGTH,
  QrPassError,
} from "@qr-pass/shared";

export interface EncryptResult {
  ciphertext: Uint8Array;
  iv: Uint8Array;
}

function assertKeyLength(key: Uint8Array): void {
  if (key.length !== AES_KEY_LENGTH) {
    throw QrPassError.encryptionError(
      `AES key must be ${AES_KEY_LENGTH} bytes, got ${key.length}`,
    );
  }
}

/**
 * Encrypt plaintext with AES-256-CBC and PKCS#7 padding.
 * Always generates a fresh random IV.
 */
export function encrypt(key: Uint8Array, plaintext: Uint8Array): EncryptResult {
  assertKeyLength(key);

  const iv = randomBytes(AES_IV_LENGTH);
  const cipher = createCipheriv(AES_ALGORITHM, key, iv);
  const encrypted = Buffer.concat([cipher.update(plaintext), cipher.final()]);

  return {
    ciphertext: new Uint8Array(encrypted),
    iv: new Uint8Array(iv),
  };
}

/**
 * Decrypt AES-256-CBC ciphertext and strip PKCS#7 padding.
 */
export function decrypt(key: Uint8Array, ciphertext: Uint8Array, iv: Uint8Array): Uint8Array {
  assertKeyLength(key);
  if (iv.length !== AES_IV_LENGTH) {
    throw QrPassError.encryptionError(`IV must be ${AES_IV_LENGTH} bytes, got ${iv.length}`);
  }
  if (ciphertext.length === 0 || ciphertext.length % AES_BLOCK_SIZE !== 0) {
    throw QrPassError.encryptionError(
      `Ciphertext must be a non-empty multiple of ${AES_BLOCK_SIZE} bytes, got ${ciphertext.length}`,
    );
  }

  const decipher = createDecipheriv(AES_ALGORITHM, key, iv);

  try {
    const decrypted = Buffer.concat([decipher.update(ciphertext), decipher.final()]);
    return new Uint8Array(decrypted);
  } catch {
    throw QrPassError.encryptionError("AES-CBC decryption failed (bad padding, wrong key or corrupted)");
  }
}
