import { AES_BLOCK_SIZE, AES_IV_LENGTH, ENVELOPE_SEPARATOR, QrPassError } from "@qr-pass/shared";
import { decrypt, encrypt } from "./aes-cbc.js";
import type { SymmetricKey } from "./symmetric-key.js";
import { keyMaterial } from "./symmetric-key.js";

/** IV plus AES-256-CBC ciphertext. Decrypting needs only this and the key. */
export interface CiphertextEnvelope {
  readonly iv: Uint8Array;
  readonly ciphertext: Uint8Array;
}

const BASE64_REGEX = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Encrypt UTF-8 text under a fresh random IV.
 */
export function encryptPayload(plaintext: string, key: SymmetricKey): CiphertextEnvelope {
  const { iv, ciphertext } = encrypt(keyMaterial(key), new Uint8Array(Buffer.from(plaintext, "utf8")));
  return Object.freeze({ iv, ciphertext });
}

export function decryptPayload(envelope: CiphertextEnvelope, key: SymmetricKey): string {
  const plaintext = decrypt(keyMaterial(key), envelope.ciphertext, envelope.iv);
  return Buffer.from(plaintext).toString("utf8");
}

/**
 * `<base64-iv>:<base64-ciphertext>`, the text embedded in the QR symbol.
 */
export function formatEnvelope(envelope: CiphertextEnvelope): string {
  const iv = Buffer.from(envelope.iv).toString("base64");
  const ct = Buffer.from(envelope.ciphertext).toString("base64");
  return `${iv}${ENVELOPE_SEPARATOR}${ct}`;
}

function decodeBase64Field(field: string, label: string): Uint8Array {
  if (field.length === 0 || !BASE64_REGEX.test(field)) {
    throw QrPassError.invalidEnvelope(`${label} is not base64`);
  }
  return new Uint8Array(Buffer.from(field, "base64"));
}

export function parseEnvelope(text: string): CiphertextEnvelope {
  const parts = text.split(ENVELOPE_SEPARATOR);
  if (parts.length !== 2) {
    throw QrPassError.invalidEnvelope(`expected 2 fields, got ${parts.length}`);
  }
  const [ivField = "", ctField = ""] = parts;

  const iv = decodeBase64Field(ivField, "IV");
  if (iv.length !== AES_IV_LENGTH) {
    throw QrPassError.invalidEnvelope(`IV must be ${AES_IV_LENGTH} bytes, got ${iv.length}`);
  }

  const ciphertext = decodeBase64Field(ctField, "ciphertext");
  if (ciphertext.length % AES_BLOCK_SIZE !== 0) {
    throw QrPassError.invalidEnvelope(
      `ciphertext length ${ciphertext.length} is not a multiple of ${AES_BLOCK_SIZE}`,
    );
  }

  return Object.freeze({ iv, ciphertext });
}
