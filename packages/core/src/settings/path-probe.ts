import { unlink, writeFile } from "node:fs/promises";
import { isAbsolute, join } from "node:path";
import type { Result } from "@qr-pass/shared";
import { PROBE_FILE_PREFIX, QrPassError, err, ok } from "@qr-pass/shared";
import { randomToken } from "../crypto/random.js";

/**
 * Write-test probe: accept `path` only if it is absolute and a file can be
 * created and deleted inside it. The directory is not created.
 */
export async function validateSavePath(path: string): Promise<Result<string>> {
  if (!isAbsolute(path)) {
    return err(QrPassError.pathNotAbsolute(path));
  }

  const probe = join(path, `${PROBE_FILE_PREFIX}-${process.pid}-${randomToken()}.tmp`);
  try {
    await writeFile(probe, "test", { flag: "wx" });
  } catch (cause) {
    return err(QrPassError.pathNotWritable(path, cause));
  }

  try {
    await unlink(probe);
  } catch (cause) {
    return err(QrPassError.pathNotWritable(path, cause));
  }

  return ok(path);
}
