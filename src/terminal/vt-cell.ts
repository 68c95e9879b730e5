import type { Cell, Color, ColorScheme } from './vt-types.js';
import { DEFAULT_BACKGROUND, DEFAULT_FOREGROUND, colorEquals } from './vt-color.js';
import { codePointToString } from './vt-utils.js';

const SPACE = 0x20;

export function emptyCell(): Cell {
  return emptyCellWithColors(DEFAULT_FOREGROUND, DEFAULT_BACKGROUND);
}

export function emptyCellWithColors(fg: Color, bg: Color): Cell {
  return {
    char: SPACE,
    fg,
    bg,
    bold: false,
    italic: false,
    underline: false,
    reverse: false,
    blink: false,
  };
}

export function cloneCell(cell: Cell): Cell {
  return { ...cell };
}

export function cellText(cell: Cell): string {
  return codePointToString(cell.char);
}

export type ResolveCellOptions = {
  /** Blink animation phase in radians, [0, 2π). */
  phase?: number;
  column?: number;
  selected?: boolean;
  /** Peak bounce offset in pixels. */
  amplitude?: number;
};

export type ResolvedCell = {
  fg: Color;
  bg: Color;
  glyphVisible: boolean;
  verticalOffset: number;
};

/**
 * Resolve a cell's colors for painting: default colors take the scheme's,
 * blink is interpreted per the scheme's blink mode, selection overrides the
 * background.
 */
export function resolveCellColors(cell: Cell, scheme: ColorScheme, options: ResolveCellOptions = {}): ResolvedCell {
  const phase = options.phase ?? 0;
  // Reverse cells store swapped colors, so a default fg there is the scheme background.
  const fg = cell.fg.isDefault ? (cell.reverse ? scheme.background : scheme.foreground) : cell.fg;
  let bg = cell.bg.isDefault ? (cell.reverse ? scheme.foreground : scheme.background) : cell.bg;
  let glyphVisible = true;
  let verticalOffset = 0;

  if (cell.blink) {
    switch (scheme.blinkMode) {
      case 'bright':
        for (let i = 0; i < 8; i += 1) {
          if (scheme.palette.length > i + 8 && colorEquals(bg, scheme.palette[i])) {
            bg = scheme.palette[i + 8];
            break;
          }
        }
        break;
      case 'blink':
        glyphVisible = phase < Math.PI;
        break;
      case 'bounce':
        verticalOffset = Math.sin(phase + (options.column ?? 0) * 0.5) * (options.amplitude ?? 2);
        break;
    }
  }

  if (options.selected) {
    bg = scheme.selection;
  }

  return { fg, bg, glyphVisible, verticalOffset };
}
