/**
 * Shared test helpers for core test files. Test-time only.
 */
import { mkdirSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import * as jsqr from "jsqr";
import pngjs from "pngjs";

/** Create a unique scratch directory under the OS temp dir. */
export function makeTempDir(label: string): string {
  const dir = join(tmpdir(), `qr-pass-${label}-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  mkdirSync(dir, { recursive: true });
  return dir;
}

export function removeTempDir(dir: string): void {
  try {
    rmSync(dir, { recursive: true, force: true });
  } catch {
    // Ignore
  }
}

/** Root ignores permission bits, so read-only directory tests are skipped for it. */
export const runningAsRoot = typeof process.getuid === "function" && process.getuid() === 0;

/** Decode the QR symbol in a PNG with a standard reader; null when none is found. */
export function decodeQrPng(png: Buffer): string | null {
  const image = pngjs.PNG.sync.read(png);
  const pixels = new Uint8ClampedArray(image.data.buffer, image.data.byteOffset, image.data.length);
  const code = jsqr.default.default(pixels, image.width, image.height);
  return code ? code.data : null;
}

