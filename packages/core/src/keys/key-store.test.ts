import { readFileSync, readdirSync, statSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { LogEntry } from "@qr-pass/shared";
import { ErrorCode, createLogger } from "@qr-pass/shared";
import { decryptPayload, encryptPayload } from "../crypto/envelope.js";
import { makeTempDir, removeTempDir } from "../test-helpers.js";
import { KeyStore } from "./key-store.js";

let dir: string;
let keyPath: string;

beforeEach(() => {
  dir = makeTempDir("keys");
  keyPath = join(dir, "encryption_key.bin");
});

afterEach(() => {
  removeTempDir(dir);
});

describe("KeyStore.getOrCreateKey", () => {
  it("generates and persists a 32-byte key on first run", async () => {
    const report = await new KeyStore(keyPath).getOrCreateKey();

    expect(report.origin).toBe("generated");
    expect(report.persisted).toBe(true);
    expect(report.warnings).toEqual([]);
    expect(readFileSync(keyPath)).toHaveLength(32);
    expect(statSync(keyPath).mode & 0o777).toBe(0o600);
  });

  it("loads the same key in a later run", async () => {
    const first = await new KeyStore(keyPath).getOrCreateKey();
    const envelope = encryptPayload("persisted", first.key);

    const second = await new KeyStore(keyPath).getOrCreateKey();

    expect(second.origin).toBe("loaded");
    expect(second.persisted).toBe(true);
    expect(decryptPayload(envelope, second.key)).toBe("persisted");
  });

  it("returns the same report to concurrent callers", async () => {
    const store = new KeyStore(keyPath);
    const [a, b] = await Promise.all([store.getOrCreateKey(), store.getOrCreateKey()]);

    expect(a).toBe(b);
  });

  it("settles two racing stores on a single key", async () => {
    const [a, b] = await Promise.all([
      new KeyStore(keyPath).getOrCreateKey(),
      new KeyStore(keyPath).getOrCreateKey(),
    ]);

    const envelope = encryptPayload("shared", a.key);
    expect(decryptPayload(envelope, b.key)).toBe("shared");
    expect(a.persisted && b.persisted).toBe(true);
  });

  it("never lets a racing store see a partly written key file", async () => {
    const reports = await Promise.all(
      Array.from({ length: 8 }, () => new KeyStore(keyPath).getOrCreateKey()),
    );

    expect(reports.flatMap((r) => r.warnings)).toEqual([]);
    expect(reports.filter((r) => r.origin === "generated")).toHaveLength(1);
    const first = reports[0];
    if (!first) throw new Error("no reports");
    const envelope = encryptPayload("one key", first.key);
    for (const report of reports) {
      expect(decryptPayload(envelope, report.key)).toBe("one key");
    }
    expect(readdirSync(dir)).toEqual(["encryption_key.bin"]);
  });

  it("replaces a wrong-sized key file and warns", async () => {
    writeFileSync(keyPath, Buffer.alloc(10));
    const entries: LogEntry[] = [];
    const store = new KeyStore(keyPath, { logger: createLogger({ sink: (e) => entries.push(e) }) });

    const report = await store.getOrCreateKey();

    expect(report.origin).toBe("generated");
    expect(report.persisted).toBe(true);
    expect(report.warnings.map((w) => w.code)).toEqual([ErrorCode.KEY_FILE_CORRUPTED]);
    expect(report.warnings[0]?.message).toBe("Key file must hold 32 bytes, found 10");
    expect(readFileSync(keyPath)).toHaveLength(32);
    expect(entries.some((e) => e.level === "warn" && e.code === ErrorCode.KEY_FILE_CORRUPTED)).toBe(true);
  });

  it("keeps an in-memory key when the file cannot be written", async () => {
    const store = new KeyStore(join(dir, "missing-dir", "encryption_key.bin"));

    const report = await store.getOrCreateKey();

    expect(report.origin).toBe("generated");
    expect(report.persisted).toBe(false);
    expect(report.warnings.map((w) => w.code)).toEqual([ErrorCode.KEY_FILE_WRITE_ERROR]);
    expect(decryptPayload(encryptPayload("still works", report.key), report.key)).toBe("still works");
  });

  it("exposes its path", () => {
    expect(new KeyStore(keyPath).path).toBe(keyPath);
  });
});
