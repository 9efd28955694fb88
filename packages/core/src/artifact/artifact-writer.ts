import { mkdir } from "node:fs/promises";
import { isAbsolute, join } from "node:path";
import type { Result } from "@qr-pass/shared";
import { QrPassError, artifactFileName, err, ok } from "@qr-pass/shared";
import { writeFileAtomic } from "../fs/atomic-write.js";

const EMPLOYEE_ID_REGEX = /^\p{Nd}+$/u;

/**
 * Save a PNG as `<directory>/qr_code_<employeeId>.png`, creating the directory
 * if needed and replacing any earlier file of the same name. The file appears
 * complete or not at all.
 */
export async function writeArtifact(
  png: Uint8Array,
  directory: string,
  employeeId: string,
): Promise<Result<string>> {
  if (!isAbsolute(directory)) {
    return err(QrPassError.pathNotAbsolute(directory));
  }
  // The ID becomes part of the file name.
  if (!EMPLOYEE_ID_REGEX.test(employeeId)) {
    return err(QrPassError.invalidId());
  }

  const filePath = join(directory, artifactFileName(employeeId));

  try {
    await mkdir(directory, { recursive: true });
    await writeFileAtomic(filePath, png);
  } catch (cause) {
    return err(QrPassError.artifactWrite(filePath, cause));
  }

  return ok(filePath);
}
