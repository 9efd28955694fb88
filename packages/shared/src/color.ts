import { QrPassError } from "./errors.js";

const HEX_COLOR_REGEX = /^#(?:[0-9a-fA-F]{3}){1,2}$/;

export function isValidHexColor(color: string): boolean {
  return HEX_COLOR_REGEX.test(color);
}

/**
 * Expand `#RGB` to `#RRGGBB` and upper-case the digits.
 * Throws INVALID_COLOR for anything `isValidHexColor` rejects.
 */
export function normalizeHexColor(color: string, field = "color"): string {
  if (!isValidHexColor(color)) {
    throw QrPassError.invalidColor(field, color);
  }

  const digits = color.slice(1).toUpperCase();
  if (digits.length === 6) {
    return `#${digits}`;
  }

  return `#${digits
    .split("")
    .map((c) => c + c)
    .join("")}`;
}
