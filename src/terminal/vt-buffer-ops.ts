/**
 * VtBuffer operations using the state-bag pattern.
 *
 * All functions take a mutable VtBufferState as the first argument and
 * modify it in place. VtBuffer wraps them with its read/write discipline;
 * nothing here knows about dirty tracking or callbacks.
 *
 * Every function leaves the state satisfying:
 * - 0 <= cursorX < cols, 0 <= cursorY < rows
 * - screen has `rows` rows of exactly `cols` cells, lineAttrs has `rows` entries
 * - scrollback.length <= maxScrollback, 0 <= scrollOffset <= scrollback.length
 */

import type { Cell, LineAttribute, LineDensity, SelectionRange, VtBufferState } from './vt-types.js';
import { cloneCell, emptyCell, emptyCellWithColors } from './vt-cell.js';
import { defaultAttributes } from './vt-sgr.js';
import { clamp, codePointToString, trimTrailingBlanks } from './vt-utils.js';

export const MAX_DIMENSION = 10_000;
/** Bounds for sizes requested from inside the byte stream (`CSI 8 t`). */
export const MAX_LOGICAL_COLS = 1000;
export const MAX_LOGICAL_ROWS = 500;
export const TAB_WIDTH = 8;

export function createState(cols: number, rows: number, maxScrollback: number): VtBufferState {
  const c = clamp(cols, 1, MAX_DIMENSION);
  const r = clamp(rows, 1, MAX_DIMENSION);
  const s: VtBufferState = {
    cols: c,
    rows: r,
    screen: [],
    lineAttrs: [],
    cursorX: 0,
    cursorY: 0,
    cursorVisible: true,
    cursorStyle: { shape: 'block', blink: 'none' },
    savedCursorX: 0,
    savedCursorY: 0,
    attrs: defaultAttributes(),
    scrollback: [],
    maxScrollback: Math.max(0, Math.floor(Number.isFinite(maxScrollback) ? maxScrollback : 0)),
    scrollOffset: 0,
    selectionActive: false,
    selection: { startX: 0, startY: 0, endX: 0, endY: 0 },
    bracketedPaste: false,
    columns132: false,
    columns40: false,
    lineDensity: 25,
    physicalCols: c,
    physicalRows: r,
    logicalCols: 0,
    logicalRows: 0,
  };
  initScreen(s);
  return s;
}

export function makeEmptyLine(cols: number): Cell[] {
  return Array.from({ length: cols }, () => emptyCell());
}

/** Blank cell carrying the current colors, used by erase operations. */
export function blankCell(s: VtBufferState): Cell {
  return emptyCellWithColors(s.attrs.fg, s.attrs.bg);
}

export function makeBlankLine(s: VtBufferState): Cell[] {
  return Array.from({ length: s.cols }, () => blankCell(s));
}

export function initScreen(s: VtBufferState): void {
  s.screen = Array.from({ length: s.rows }, () => makeEmptyLine(s.cols));
  s.lineAttrs = Array.from({ length: s.rows }, (): LineAttribute => 'normal');
}

/** Addressable columns of a row; doubled rows use half the grid. */
export function effectiveCols(s: VtBufferState, y: number): number {
  const attr = s.lineAttrs[y] ?? 'normal';
  if (attr === 'normal') return s.cols;
  return Math.max(1, Math.floor(s.cols / 2));
}

/** Repeat count from untrusted input: non-negative integer, 0 when not finite. */
export function toCount(n: number): number {
  return Number.isFinite(n) ? Math.max(0, Math.floor(n)) : 0;
}

export function clampCursor(s: VtBufferState): void {
  s.cursorY = clamp(s.cursorY, 0, s.rows - 1);
  s.cursorX = clamp(s.cursorX, 0, effectiveCols(s, s.cursorY) - 1);
}

export function setCursor(s: VtBufferState, x: number, y: number): void {
  s.cursorY = clamp(y, 0, s.rows - 1);
  s.cursorX = clamp(x, 0, effectiveCols(s, s.cursorY) - 1);
}

export function moveCursor(s: VtBufferState, dx: number, dy: number): void {
  setCursor(s, s.cursorX + dx, s.cursorY + dy);
}

// ---------------------------------------------------------------------------
// Scrolling
// ---------------------------------------------------------------------------

function pushScrollback(s: VtBufferState, cells: Cell[], attribute: LineAttribute): void {
  if (s.maxScrollback === 0) return;
  if (s.scrollback.length >= s.maxScrollback) {
    s.scrollback.shift();
  }
  s.scrollback.push({ cells, attribute });
  // Keep a scrolled-back view anchored on the same history lines.
  if (s.scrollOffset > 0) {
    s.scrollOffset = Math.min(s.scrollOffset + 1, s.scrollback.length);
  }
}

function scrollUpOne(s: VtBufferState): void {
  const [evicted] = s.screen.splice(0, 1);
  const [evictedAttr] = s.lineAttrs.splice(0, 1);
  pushScrollback(s, evicted, evictedAttr);
  s.screen.push(makeEmptyLine(s.cols));
  s.lineAttrs.push('normal');
}

export function scrollUp(s: VtBufferState, n: number): void {
  // Past rows + maxScrollback further iterations change nothing observable.
  const count = Math.min(toCount(n), s.rows + s.maxScrollback);
  for (let i = 0; i < count; i += 1) scrollUpOne(s);
}

/** Scroll content down; rows pushed off the bottom are discarded. */
export function scrollDown(s: VtBufferState, n: number): void {
  const count = Math.min(toCount(n), s.rows);
  for (let i = 0; i < count; i += 1) {
    s.screen.pop();
    s.lineAttrs.pop();
    s.screen.unshift(makeEmptyLine(s.cols));
    s.lineAttrs.unshift('normal');
  }
}

// ---------------------------------------------------------------------------
// Cursor-relative writes and motion
// ---------------------------------------------------------------------------

function advanceRow(s: VtBufferState): void {
  if (s.cursorY >= s.rows - 1) {
    scrollUpOne(s);
    s.cursorY = s.rows - 1;
  } else {
    s.cursorY += 1;
  }
}

export function writeChar(s: VtBufferState, codePoint: number): void {
  // A scroll can move a doubled row under the cursor; wrap before writing then.
  if (s.cursorX >= effectiveCols(s, s.cursorY)) {
    s.cursorX = 0;
    advanceRow(s);
  }

  const { attrs } = s;
  const fg = attrs.reverse ? attrs.bg : attrs.fg;
  const bg = attrs.reverse ? attrs.fg : attrs.bg;
  s.screen[s.cursorY][s.cursorX] = {
    char: codePoint,
    fg,
    bg,
    bold: attrs.bold,
    italic: attrs.italic,
    underline: attrs.underline,
    reverse: attrs.reverse,
    blink: attrs.blink,
  };

  s.cursorX += 1;
  if (s.cursorX >= effectiveCols(s, s.cursorY)) {
    s.cursorX = 0;
    advanceRow(s);
  }
}

export function lineFeed(s: VtBufferState): void {
  advanceRow(s);
  clampCursor(s);
}

export function reverseIndex(s: VtBufferState): void {
  if (s.cursorY === 0) {
    scrollDown(s, 1);
  } else {
    s.cursorY -= 1;
  }
  clampCursor(s);
}

export function carriageReturn(s: VtBufferState): void {
  s.cursorX = 0;
}

export function tab(s: VtBufferState): void {
  const next = (Math.floor(s.cursorX / TAB_WIDTH) + 1) * TAB_WIDTH;
  s.cursorX = Math.min(next, effectiveCols(s, s.cursorY) - 1);
}

export function backspace(s: VtBufferState): void {
  s.cursorX = Math.max(0, s.cursorX - 1);
}

// ---------------------------------------------------------------------------
// Erase
// ---------------------------------------------------------------------------

function fillRow(s: VtBufferState, y: number, from: number, to: number): void {
  const line = s.screen[y];
  for (let x = Math.max(0, from); x < Math.min(s.cols, to); x += 1) {
    line[x] = blankCell(s);
  }
}

export function clearToEndOfLine(s: VtBufferState): void {
  fillRow(s, s.cursorY, s.cursorX, s.cols);
}

export function clearToStartOfLine(s: VtBufferState): void {
  fillRow(s, s.cursorY, 0, s.cursorX + 1);
}

export function clearLine(s: VtBufferState): void {
  fillRow(s, s.cursorY, 0, s.cols);
}

export function clearToEndOfScreen(s: VtBufferState): void {
  clearToEndOfLine(s);
  for (let y = s.cursorY + 1; y < s.rows; y += 1) fillRow(s, y, 0, s.cols);
}

export function clearToStartOfScreen(s: VtBufferState): void {
  for (let y = 0; y < s.cursorY; y += 1) fillRow(s, y, 0, s.cols);
  clearToStartOfLine(s);
}

export function clearScreen(s: VtBufferState): void {
  s.screen = Array.from({ length: s.rows }, () => makeBlankLine(s));
  s.lineAttrs = Array.from({ length: s.rows }, (): LineAttribute => 'normal');
  clampCursor(s);
}

// ---------------------------------------------------------------------------
// Insert / delete
// ---------------------------------------------------------------------------

export function insertLines(s: VtBufferState, n: number): void {
  const count = Math.min(toCount(n), s.rows - s.cursorY);
  if (count === 0) return;
  s.screen.splice(s.rows - count, count);
  s.lineAttrs.splice(s.rows - count, count);
  s.screen.splice(s.cursorY, 0, ...Array.from({ length: count }, () => makeBlankLine(s)));
  s.lineAttrs.splice(s.cursorY, 0, ...Array.from({ length: count }, (): LineAttribute => 'normal'));
  clampCursor(s);
}

export function deleteLines(s: VtBufferState, n: number): void {
  const count = Math.min(toCount(n), s.rows - s.cursorY);
  if (count === 0) return;
  s.screen.splice(s.cursorY, count);
  s.lineAttrs.splice(s.cursorY, count);
  for (let i = 0; i < count; i += 1) {
    s.screen.push(makeBlankLine(s));
    s.lineAttrs.push('normal');
  }
  clampCursor(s);
}

export function insertChars(s: VtBufferState, n: number): void {
  const count = Math.min(toCount(n), s.cols - s.cursorX);
  if (count === 0) return;
  const line = s.screen[s.cursorY];
  line.splice(s.cursorX, 0, ...Array.from({ length: count }, () => blankCell(s)));
  line.length = s.cols;
}

export function deleteChars(s: VtBufferState, n: number): void {
  const count = Math.min(toCount(n), s.cols - s.cursorX);
  if (count === 0) return;
  const line = s.screen[s.cursorY];
  line.splice(s.cursorX, count);
  for (let i = 0; i < count; i += 1) line.push(blankCell(s));
}

export function eraseChars(s: VtBufferState, n: number): void {
  const count = Math.min(toCount(n), s.cols - s.cursorX);
  fillRow(s, s.cursorY, s.cursorX, s.cursorX + count);
}

// ---------------------------------------------------------------------------
// Geometry
// ---------------------------------------------------------------------------

/** Reallocate the grid, keeping the overlapping top-left rectangle. No reflow. */
export function resizeGrid(s: VtBufferState, cols: number, rows: number): void {
  const nextCols = clamp(cols, 1, MAX_DIMENSION);
  const nextRows = clamp(rows, 1, MAX_DIMENSION);
  if (nextCols === s.cols && nextRows === s.rows) return;

  const oldScreen = s.screen;
  const oldAttrs = s.lineAttrs;
  s.cols = nextCols;
  s.rows = nextRows;
  initScreen(s);

  const copyRows = Math.min(oldScreen.length, nextRows);
  for (let y = 0; y < copyRows; y += 1) {
    const copyCols = Math.min(oldScreen[y].length, nextCols);
    for (let x = 0; x < copyCols; x += 1) {
      s.screen[y][x] = oldScreen[y][x];
    }
    s.lineAttrs[y] = oldAttrs[y];
  }

  s.scrollOffset = 0;
  s.savedCursorX = Math.min(s.savedCursorX, nextCols - 1);
  s.savedCursorY = Math.min(s.savedCursorY, nextRows - 1);
  s.selection = clampSelection(s, s.selection);
  clampCursor(s);
}

/** Grid size after applying any logical-size override to the physical size. */
export function applyLogicalSize(s: VtBufferState): void {
  resizeGrid(s, s.logicalCols || s.physicalCols, s.logicalRows || s.physicalRows);
}

export function horizontalScale(s: VtBufferState): number {
  return (s.columns132 ? 80 / 132 : 1) * (s.columns40 ? 2 : 1);
}

export function verticalScale(s: VtBufferState): number {
  return 25 / s.lineDensity;
}

export function isLineDensity(value: number): value is LineDensity {
  return value === 25 || value === 30 || value === 43 || value === 50 || value === 60;
}

export function setLineAttribute(s: VtBufferState, attr: LineAttribute): void {
  s.lineAttrs[s.cursorY] = attr;
  clampCursor(s);
}

/** DECALN: fill the screen with `E`, reset line attributes, home the cursor. */
export function fillAlignmentPattern(s: VtBufferState): void {
  const E = 0x45;
  for (let y = 0; y < s.rows; y += 1) {
    s.lineAttrs[y] = 'normal';
    s.screen[y] = Array.from({ length: s.cols }, () => ({ ...emptyCell(), char: E }));
  }
  s.cursorX = 0;
  s.cursorY = 0;
}

/** RIS: attributes back to defaults, screen cleared with default colors, cursor home. */
export function resetToInitialState(s: VtBufferState): void {
  s.attrs = defaultAttributes();
  initScreen(s);
  s.cursorX = 0;
  s.cursorY = 0;
}

// ---------------------------------------------------------------------------
// Scrollback view
// ---------------------------------------------------------------------------

export function setScrollOffset(s: VtBufferState, offset: number): void {
  s.scrollOffset = clamp(offset, 0, s.scrollback.length);
}

/** Cell at a view position, reading history rows while scrolled back. */
export function visibleCell(s: VtBufferState, x: number, y: number): Cell {
  if (!Number.isInteger(x) || !Number.isInteger(y)) return emptyCell();
  if (x < 0 || x >= s.cols || y < 0 || y >= s.rows) return emptyCell();

  if (y < s.scrollOffset) {
    const line = s.scrollback[s.scrollback.length - s.scrollOffset + y];
    const cell = line?.cells[x];
    return cell ? cloneCell(cell) : emptyCell();
  }
  return cloneCell(s.screen[y - s.scrollOffset][x]);
}

export function visibleLineAttribute(s: VtBufferState, y: number): LineAttribute {
  if (!Number.isInteger(y) || y < 0 || y >= s.rows) return 'normal';
  if (y < s.scrollOffset) {
    return s.scrollback[s.scrollback.length - s.scrollOffset + y]?.attribute ?? 'normal';
  }
  return s.lineAttrs[y - s.scrollOffset] ?? 'normal';
}

// ---------------------------------------------------------------------------
// Selection
// ---------------------------------------------------------------------------

export function clampSelection(s: VtBufferState, range: SelectionRange): SelectionRange {
  return {
    startX: clamp(range.startX, 0, s.cols - 1),
    startY: clamp(range.startY, 0, s.rows - 1),
    endX: clamp(range.endX, 0, s.cols - 1),
    endY: clamp(range.endY, 0, s.rows - 1),
  };
}

/** Selection in reading order: (startY, startX) <= (endY, endX). */
export function normalizedSelection(s: VtBufferState): SelectionRange {
  const { startX, startY, endX, endY } = s.selection;
  if (startY > endY || (startY === endY && startX > endX)) {
    return { startX: endX, startY: endY, endX: startX, endY: startY };
  }
  return { startX, startY, endX, endY };
}

export function isInSelection(s: VtBufferState, x: number, y: number): boolean {
  if (!s.selectionActive || s.scrollOffset > 0) return false;
  const sel = normalizedSelection(s);
  if (y < sel.startY || y > sel.endY) return false;
  if (y === sel.startY && x < sel.startX) return false;
  if (y === sel.endY && x > sel.endX) return false;
  return true;
}

export function selectedText(s: VtBufferState): string {
  if (!s.selectionActive) return '';
  const sel = normalizedSelection(s);
  const lines: string[] = [];
  for (let y = sel.startY; y <= sel.endY && y < s.rows; y += 1) {
    const from = y === sel.startY ? sel.startX : 0;
    const to = y === sel.endY ? sel.endX + 1 : s.cols;
    let text = '';
    for (let x = from; x < to && x < s.cols; x += 1) {
      text += codePointToString(s.screen[y][x].char);
    }
    lines.push(trimTrailingBlanks(text));
  }
  return lines.join('\n');
}
