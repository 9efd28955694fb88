import { link, open, rename, unlink } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { randomToken } from "../crypto/random.js";

export interface AtomicWriteOptions {
  mode?: number;
}

function tempPathFor(target: string): string {
  return join(dirname(target), `.${basename(target)}.tmp.${process.pid}.${randomToken()}`);
}

async function writeAndSync(path: string, data: Uint8Array | string, mode?: number): Promise<void> {
  const handle = await open(path, "wx", mode);
  try {
    await handle.writeFile(data);
    await handle.sync();
  } finally {
    await handle.close();
  }
}

async function removeQuietly(path: string): Promise<void> {
  await unlink(path).catch(() => {
    // Temp file was never created or is already gone
  });
}

/**
 * Replace `target` atomically: write to a temp file in the same directory,
 * fsync, rename over the target. The temp file is removed on failure and the
 * underlying error rethrown.
 */
export async function writeFileAtomic(
  target: string,
  data: Uint8Array | string,
  options: AtomicWriteOptions = {},
): Promise<void> {
  const tmpPath = tempPathFor(target);

  try {
    await writeAndSync(tmpPath, data, options.mode);
    await rename(tmpPath, target);
  } catch (err) {
    await removeQuietly(tmpPath);
    throw err;
  }
}

/**
 * Create `target` only if it does not exist, with its full contents visible
 * from the first moment it appears. The data is synced to a temp file and
 * hard-linked into place; an existing target fails with EEXIST and is left
 * untouched.
 */
export async function writeFileExclusive(
  target: string,
  data: Uint8Array | string,
  options: AtomicWriteOptions = {},
): Promise<void> {
  const tmpPath = tempPathFor(target);

  try {
    await writeAndSync(tmpPath, data, options.mode);
    await link(tmpPath, target);
  } finally {
    await removeQuietly(tmpPath);
  }
}
