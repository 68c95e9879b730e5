/**
 * Terminal emulator types shared across VT modules.
 */

export type Color = {
  r: number;
  g: number;
  b: number;
  /** Resolve against the active scheme's foreground/background at render time. */
  isDefault: boolean;
};

export type BlinkMode = 'bounce' | 'blink' | 'bright';

export type ColorScheme = {
  foreground: Color;
  background: Color;
  cursor: Color;
  selection: Color;
  palette: Color[];
  blinkMode: BlinkMode;
};

export type Cell = {
  /** Unicode code point. */
  char: number;
  fg: Color;
  bg: Color;
  bold: boolean;
  italic: boolean;
  underline: boolean;
  reverse: boolean;
  blink: boolean;
};

export type LineAttribute = 'normal' | 'double-width' | 'double-top' | 'double-bottom';

export type CursorShape = 'block' | 'underline' | 'bar';

export type CursorBlink = 'none' | 'slow' | 'fast';

export type CursorStyle = {
  shape: CursorShape;
  blink: CursorBlink;
};

/** Pending SGR state applied to every subsequently written cell. */
export type TextAttributes = {
  fg: Color;
  bg: Color;
  bold: boolean;
  italic: boolean;
  underline: boolean;
  reverse: boolean;
  blink: boolean;
};

export type SelectionRange = {
  startX: number;
  startY: number;
  endX: number;
  endY: number;
};

export type LineDensity = 25 | 30 | 43 | 50 | 60;

export type ScrollbackLine = {
  cells: Cell[];
  attribute: LineAttribute;
};

/**
 * Mutable state bag for VtBuffer operations.
 * All fields are directly read/written by buffer-ops functions.
 */
export interface VtBufferState {
  cols: number;
  rows: number;
  screen: Cell[][];
  lineAttrs: LineAttribute[];

  cursorX: number;
  cursorY: number;
  cursorVisible: boolean;
  cursorStyle: CursorStyle;
  savedCursorX: number;
  savedCursorY: number;

  attrs: TextAttributes;

  scrollback: ScrollbackLine[];
  maxScrollback: number;
  scrollOffset: number;

  selectionActive: boolean;
  selection: SelectionRange;

  bracketedPaste: boolean;
  columns132: boolean;
  columns40: boolean;
  lineDensity: LineDensity;
  /** Size last requested by the UI through resize(). */
  physicalCols: number;
  physicalRows: number;
  /** Size requested by the byte stream (CSI 8 t); 0 means use the physical size. */
  logicalCols: number;
  logicalRows: number;
}
