/**
 * Pure utility functions for VT terminal emulation.
 */

export function clamp(value: number, min: number, max: number): number {
  if (!Number.isFinite(value)) return min;
  return Math.max(min, Math.min(max, Math.floor(value)));
}

export const REPLACEMENT_CHAR = 0xfffd;

export function isValidCodePoint(cp: number): boolean {
  if (!Number.isInteger(cp) || cp < 0 || cp > 0x10ffff) return false;
  return cp < 0xd800 || cp > 0xdfff;
}

export function codePointToString(cp: number): string {
  return String.fromCodePoint(isValidCodePoint(cp) ? cp : REPLACEMENT_CHAR);
}

/** Trailing spaces and NULs, the cells an erase leaves behind. */
export function trimTrailingBlanks(text: string): string {
  return text.replace(/[ \u0000]+$/, '');
}
