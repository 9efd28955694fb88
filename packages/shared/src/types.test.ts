import { describe, expect, it } from "vitest";

import {
  IMAGE_QUALITY_PROFILES,
  ImageQuality,
  Language,
  QR_SIZE_PIXELS,
  QrSize,
} from "./types.js";

// ---------------------------------------------------------------------------
// Enum member counts (label maps and Zod schemas depend on these)
// ---------------------------------------------------------------------------

describe("enum member counts", () => {
  it("ImageQuality has 4 members", () => {
    expect(Object.values(ImageQuality)).toHaveLength(4);
  });

  it("QrSize has 4 members", () => {
    expect(Object.values(QrSize)).toHaveLength(4);
  });

  it("Language has 2 members", () => {
    expect(Object.values(Language)).toHaveLength(2);
  });
});

describe("QR_SIZE_PIXELS", () => {
  it.each([
    [QrSize.SMALL, 200],
    [QrSize.MEDIUM, 300],
    [QrSize.LARGE, 400],
    [QrSize.EXTRA_LARGE, 500],
  ] as const)("%s → %d px", (size, pixels) => {
    expect(QR_SIZE_PIXELS[size]).toBe(pixels);
  });

  it("maps every QrSize label", () => {
    expect(Object.keys(QR_SIZE_PIXELS).sort()).toEqual(Object.values(QrSize).sort());
  });
});

describe("IMAGE_QUALITY_PROFILES", () => {
  it.each([
    [ImageQuality.VERY_HIGH, 100, 9],
    [ImageQuality.HIGH, 90, 9],
    [ImageQuality.MEDIUM, 75, 6],
    [ImageQuality.LOW, 50, 3],
  ] as const)("%s → quality %d, deflate %d", (label, quality, deflateLevel) => {
    expect(IMAGE_QUALITY_PROFILES[label]).toEqual({ quality, deflateLevel });
  });

  it("maps every ImageQuality label", () => {
    expect(Object.keys(IMAGE_QUALITY_PROFILES).sort()).toEqual(Object.values(ImageQuality).sort());
  });
});
