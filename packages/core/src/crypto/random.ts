import { randomBytes, randomFillSync } from "node:crypto";

/**
 * Generate cryptographically secure random bytes.
 */
export function generateRandomBytes(length: number): Uint8Array {
  return new Uint8Array(randomBytes(length));
}

/**
 * Short random hex token for temp and probe file names.
 */
export function randomToken(bytes = 6): string {
  return randomBytes(bytes).toString("hex");
}

/**
 * Securely wipe a buffer by overwriting with random bytes.
 */
export function wipeBuffer(buf: Uint8Array): void {
  randomFillSync(buf);
}
