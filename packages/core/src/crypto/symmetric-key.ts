import { AES_KEY_LENGTH, QrPassError } from "@qr-pass/shared";

declare const symmetricKeyBrand: unique symbol;

/**
 * Opaque handle to 256-bit key material. The bytes stay inside the
 * encryption boundary; only `keyMaterial` (not re-exported by the package)
 * can reach them.
 */
export interface SymmetricKey {
  readonly algorithm: "aes-256";
  readonly [symmetricKeyBrand]: true;
}

const material = new WeakMap<object, Uint8Array>();

function isSymmetricKey(handle: object): handle is SymmetricKey {
  return material.has(handle);
}

export function createSymmetricKey(bytes: Uint8Array): SymmetricKey {
  if (bytes.length !== AES_KEY_LENGTH) {
    throw QrPassError.encryptionError(
      `AES key must be ${AES_KEY_LENGTH} bytes, got ${bytes.length}`,
    );
  }

  const handle = Object.freeze({ algorithm: "aes-256" as const });
  material.set(handle, new Uint8Array(bytes));
  if (!isSymmetricKey(handle)) {
    throw QrPassError.internalError("Failed to register key material");
  }
  return handle;
}

export function keyMaterial(key: SymmetricKey): Uint8Array {
  const bytes = material.get(key);
  if (!bytes) {
    throw QrPassError.encryptionError("Unknown key handle");
  }
  return bytes;
}
