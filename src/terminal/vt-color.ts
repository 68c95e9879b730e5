/**
 * Color and palette model.
 *
 * Colors are plain RGB triples plus an `isDefault` flag; a default color is
 * resolved against the active ColorScheme at render time, never stored as
 * a second concrete color.
 */

import type { BlinkMode, Color, ColorScheme } from './vt-types.js';

export function rgb(r: number, g: number, b: number): Color {
  return { r: r & 0xff, g: g & 0xff, b: b & 0xff, isDefault: false };
}

export const DEFAULT_FOREGROUND: Color = Object.freeze({ r: 212, g: 212, b: 212, isDefault: true });
export const DEFAULT_BACKGROUND: Color = Object.freeze({ r: 30, g: 30, b: 30, isDefault: true });

/** Standard 16-color palette in ANSI index order. */
export const ANSI_COLORS: readonly Color[] = Object.freeze([
  rgb(0, 0, 0), rgb(170, 0, 0), rgb(0, 170, 0), rgb(170, 85, 0),
  rgb(0, 0, 170), rgb(170, 0, 170), rgb(0, 170, 170), rgb(170, 170, 170),
  rgb(85, 85, 85), rgb(255, 85, 85), rgb(85, 255, 85), rgb(255, 255, 85),
  rgb(85, 85, 255), rgb(255, 85, 255), rgb(85, 255, 255), rgb(255, 255, 255),
]);

export const VGA_TO_ANSI: readonly number[] = [0, 4, 2, 6, 1, 5, 3, 7, 8, 12, 10, 14, 9, 13, 11, 15];
export const ANSI_TO_VGA: readonly number[] = [0, 4, 2, 6, 1, 5, 3, 7, 8, 12, 10, 14, 9, 13, 11, 15];

/** Palette slot names in VGA order. */
export const PALETTE_COLOR_NAMES: readonly string[] = [
  '00_black', '01_dark_blue', '02_dark_green', '03_dark_cyan',
  '04_dark_red', '05_purple', '06_brown', '07_silver',
  '08_dark_gray', '09_bright_blue', '10_bright_green', '11_bright_cyan',
  '12_bright_red', '13_pink', '14_yellow', '15_white',
];

export function colorEquals(a: Color, b: Color): boolean {
  if (a.isDefault !== b.isDefault) return false;
  return a.r === b.r && a.g === b.g && a.b === b.b;
}

/**
 * Expand an xterm 256-color index. Indices outside 0-255 wrap (`& 0xff`).
 */
export function color256(index: number, palette: readonly Color[] = ANSI_COLORS): Color {
  const idx = Math.trunc(index) & 0xff;
  if (idx < 16) return palette[idx] ?? ANSI_COLORS[idx];
  if (idx < 232) {
    const i = idx - 16;
    const r = Math.floor(i / 36);
    const g = Math.floor(i / 6) % 6;
    const b = i % 6;
    return rgb(r * 51, g * 51, b * 51);
  }
  const gray = 8 + (idx - 232) * 10;
  return rgb(gray, gray, gray);
}

function hexByte(v: number): string {
  return (v & 0xff).toString(16).toUpperCase().padStart(2, '0');
}

export function toHex(color: Color): string {
  return `#${hexByte(color.r)}${hexByte(color.g)}${hexByte(color.b)}`;
}

function hexNibble(ch: string): number {
  const v = parseInt(ch, 16);
  return Number.isNaN(v) ? 0 : v;
}

/**
 * Parse `#RGB` or `#RRGGBB`. Unrecognized digits read as 0.
 */
export function parseHexColor(text: string): Color | undefined {
  if (!text.startsWith('#')) return undefined;
  const body = text.slice(1);
  if (body.length === 3) {
    return rgb(hexNibble(body[0]) * 17, hexNibble(body[1]) * 17, hexNibble(body[2]) * 17);
  }
  if (body.length === 6) {
    return rgb(
      (hexNibble(body[0]) << 4) | hexNibble(body[1]),
      (hexNibble(body[2]) << 4) | hexNibble(body[3]),
      (hexNibble(body[4]) << 4) | hexNibble(body[5]),
    );
  }
  return undefined;
}

export function parseBlinkMode(text: string): BlinkMode {
  if (text === 'blink') return 'blink';
  if (text === 'bright') return 'bright';
  return 'bounce';
}

export function defaultColorScheme(): ColorScheme {
  return {
    foreground: rgb(212, 212, 212),
    background: rgb(30, 30, 30),
    cursor: rgb(255, 255, 255),
    selection: rgb(68, 68, 68),
    palette: [...ANSI_COLORS],
    blinkMode: 'bounce',
  };
}
