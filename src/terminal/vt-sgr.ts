/**
 * SGR (Select Graphic Rendition) application for VT terminal emulation.
 *
 * Pure function: takes SGR parameters and the current pending attributes,
 * returns the updated attributes without mutating the input.
 */

import type { Color, TextAttributes } from './vt-types.js';
import { ANSI_COLORS, DEFAULT_BACKGROUND, DEFAULT_FOREGROUND, color256, rgb } from './vt-color.js';

export function defaultAttributes(): TextAttributes {
  return {
    fg: DEFAULT_FOREGROUND,
    bg: DEFAULT_BACKGROUND,
    bold: false,
    italic: false,
    underline: false,
    reverse: false,
    blink: false,
  };
}

type ExtendedColor = { color: Color; consumed: number } | undefined;

/**
 * Decode the tail of a `38;…`/`48;…` parameter run starting at `i` (the 38/48 itself).
 * Returns undefined when the run is too short to hold a color.
 */
function readExtendedColor(params: readonly number[], i: number, palette: readonly Color[]): ExtendedColor {
  const mode = params[i + 1];
  if (mode === 5 && i + 2 < params.length) {
    return { color: color256(params[i + 2], palette), consumed: 2 };
  }
  if (mode === 2 && i + 4 < params.length) {
    return { color: rgb(params[i + 2], params[i + 3], params[i + 4]), consumed: 4 };
  }
  return undefined;
}

/**
 * Apply an SGR parameter list. An empty list resets, like `CSI 0 m`.
 * A truncated extended-color run ends processing of the list.
 */
export function applySgr(
  params: readonly number[],
  current: TextAttributes,
  palette: readonly Color[] = ANSI_COLORS,
): TextAttributes {
  if (params.length === 0) {
    return defaultAttributes();
  }

  let attrs: TextAttributes = { ...current };

  for (let i = 0; i < params.length; i += 1) {
    const code = params[i];

    if (code === 0) { attrs = defaultAttributes(); continue; }
    if (code === 1) { attrs.bold = true; continue; }
    // Dim has no rendering of its own; it cancels bold.
    if (code === 2) { attrs.bold = false; continue; }
    if (code === 3) { attrs.italic = true; continue; }
    if (code === 4) { attrs.underline = true; continue; }
    if (code === 5 || code === 6) { attrs.blink = true; continue; }
    if (code === 7) { attrs.reverse = true; continue; }
    if (code === 21 || code === 22) { attrs.bold = false; continue; }
    if (code === 23) { attrs.italic = false; continue; }
    if (code === 24) { attrs.underline = false; continue; }
    if (code === 25) { attrs.blink = false; continue; }
    if (code === 27) { attrs.reverse = false; continue; }
    if (code === 39) { attrs.fg = DEFAULT_FOREGROUND; continue; }
    if (code === 49) { attrs.bg = DEFAULT_BACKGROUND; continue; }

    if (code >= 30 && code <= 37) { attrs.fg = color256(code - 30, palette); continue; }
    if (code >= 90 && code <= 97) { attrs.fg = color256(8 + (code - 90), palette); continue; }
    if (code >= 40 && code <= 47) { attrs.bg = color256(code - 40, palette); continue; }
    if (code >= 100 && code <= 107) { attrs.bg = color256(8 + (code - 100), palette); continue; }

    if (code === 38 || code === 48) {
      const extended = readExtendedColor(params, i, palette);
      if (!extended) break;
      if (code === 38) attrs.fg = extended.color;
      else attrs.bg = extended.color;
      i += extended.consumed;
    }
  }

  return attrs;
}
