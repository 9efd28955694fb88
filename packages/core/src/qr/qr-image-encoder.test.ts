import { describe, expect, it } from "vitest";
import pngjs from "pngjs";
import { ErrorCode, ImageQuality, QR_SIZE_PIXELS, QrSize } from "@qr-pass/shared";
import { encryptPayload, formatEnvelope } from "../crypto/envelope.js";
import { generateRandomBytes } from "../crypto/random.js";
import { createSymmetricKey } from "../crypto/symmetric-key.js";
import { serializePayload } from "../payload/payload-codec.js";
import { decodeQrPng } from "../test-helpers.js";
import type { QrImageOptions } from "./qr-image-encoder.js";
import { encodeQrImage, toDataUrl } from "./qr-image-encoder.js";

const options: QrImageOptions = {
  size: QrSize.SMALL,
  foreground: "#000000",
  background: "#FFFFFF",
  quality: ImageQuality.HIGH,
};

const ENVELOPE_TEXT = "AAAAAAAAAAAAAAAAAAAAAA==://///////////////////w==";

describe("encodeQrImage", () => {
  it("produces a PNG a standard reader decodes back to the input", async () => {
    const result = await encodeQrImage(ENVELOPE_TEXT, options);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(decodeQrPng(result.value.png)).toBe(ENVELOPE_TEXT);
  });

  it.each([
    [QrSize.SMALL, 200],
    [QrSize.MEDIUM, 300],
    [QrSize.LARGE, 400],
    [QrSize.EXTRA_LARGE, 500],
  ] as const)("renders %s at exactly %d px", async (size, pixels) => {
    const result = await encodeQrImage("size check", { ...options, size });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const image = pngjs.PNG.sync.read(result.value.png);
    expect([image.width, image.height]).toEqual([pixels, pixels]);
    expect([result.value.width, result.value.height]).toEqual([pixels, pixels]);
  });

  it("uses error-correction level H and the smallest fitting version", async () => {
    const short = await encodeQrImage("A", options);
    const long = await encodeQrImage("x".repeat(200), options);

    expect(short.ok && short.value.errorCorrectionLevel).toBe("H");
    expect(short.ok && short.value.version).toBe(1);
    expect(short.ok && short.value.moduleCount).toBe(21);
    expect(long.ok && long.value.version).toBeGreaterThan(1);
    if (long.ok) expect(long.value.moduleCount).toBe(17 + 4 * long.value.version);
  });

  it("gives every module the same whole number of pixels, centred", async () => {
    const result = await encodeQrImage(ENVELOPE_TEXT, { ...options, size: QrSize.MEDIUM });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const { moduleCount, scale } = result.value;
    expect(scale).toBe(Math.floor(300 / (moduleCount + 8)));

    const image = pngjs.PNG.sync.read(result.value.png);
    const offset = Math.floor((300 - (moduleCount + 8) * scale) / 2);
    const pixel = (x: number, y: number) => [...image.data.subarray((y * 300 + x) * 4, (y * 300 + x) * 4 + 3)];
    const finderCorner = offset + 4 * scale;

    // Outer ring of the top-left finder pattern starts right after the quiet zone.
    expect(pixel(finderCorner, finderCorner)).toEqual([0, 0, 0]);
    expect(pixel(finderCorner - 1, finderCorner)).toEqual([255, 255, 255]);
    expect(pixel(finderCorner + scale - 1, finderCorner)).toEqual([0, 0, 0]);
    expect(pixel(finderCorner + scale, finderCorner + scale)).toEqual([255, 255, 255]);
  });

  it("paints the corners with the background color", async () => {
    const result = await encodeQrImage("colors", {
      ...options,
      foreground: "#003366",
      background: "#FFEECC",
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const image = pngjs.PNG.sync.read(result.value.png);
    expect([...image.data.subarray(0, 4)]).toEqual([0xff, 0xee, 0xcc, 0xff]);
  });

  it("normalizes short hex colors", async () => {
    const result = await encodeQrImage("short hex", { ...options, foreground: "#abc", background: "#fff" });

    expect(result.ok && result.value.foreground).toBe("#AABBCC");
    expect(result.ok && result.value.background).toBe("#FFFFFF");
  });

  it("reports the quality profile it used", async () => {
    const result = await encodeQrImage("quality", { ...options, quality: ImageQuality.LOW });
    expect(result.ok && result.value.quality).toBe(50);
  });

  it.each([
    ["foreground", { foreground: "black" }, "qr_color"],
    ["background", { background: "#GGGGGG" }, "qr_bg_color"],
  ])("rejects an invalid %s color", async (_label, override, field) => {
    const result = await encodeQrImage("x", { ...options, ...override });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(ErrorCode.INVALID_COLOR);
      expect(result.error.details?.["field"]).toBe(field);
    }
  });
});

describe("encodeQrImage with badge payloads", () => {
  const key = createSymmetricKey(generateRandomBytes(32));
  const noteLengths = [0, 20, 40, 60, 80, 100, 120];

  it.each(Object.values(QrSize))("decodes at %s for notes of 0 to 120 characters", async (size) => {
    for (const length of noteLengths) {
      const plaintext = serializePayload({
        name: "سارة أحمد",
        employeeId: "12345",
        department: "المالية",
        notes: "ن".repeat(length),
      });
      const envelopeText = formatEnvelope(encryptPayload(plaintext, key));

      const result = await encodeQrImage(envelopeText, { ...options, size });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.width).toBe(QR_SIZE_PIXELS[size]);
      expect({ length, decoded: decodeQrPng(result.value.png) }).toEqual({ length, decoded: envelopeText });
    }
  });
});

describe("toDataUrl", () => {
  it("wraps the PNG bytes in a data URL", async () => {
    const result = await encodeQrImage("data url", options);
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    const url = toDataUrl(result.value);
    expect(url.startsWith("data:image/png;base64,iVBORw0KGgo")).toBe(true);
    expect(Buffer.from(url.slice("data:image/png;base64,".length), "base64").equals(result.value.png)).toBe(true);
  });
});
