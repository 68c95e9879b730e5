import { incVtMetric } from './vt-diagnostics.js';
import type {
  Cell,
  CursorStyle,
  LineAttribute,
  LineDensity,
  SelectionRange,
  TextAttributes,
  VtBufferState,
} from './vt-types.js';
import { cloneCell, emptyCell } from './vt-cell.js';
import { defaultAttributes } from './vt-sgr.js';
import { clamp } from './vt-utils.js';
import * as bufOps from './vt-buffer-ops.js';

export type DirtyCallback = () => void;

/**
 * Screen grid, scrollback, cursor, selection and pending attributes.
 *
 * Access is split into reads and writes. Every public method body runs
 * inside `read()` or `write()`; a write marks the buffer dirty and then
 * invokes the dirty callback once, after the state change is complete.
 * JavaScript runs each call to completion, so these sections are exclusive
 * without a lock.
 *
 * The dirty callback must only schedule a redraw (see
 * `createRedrawScheduler`). It may read the buffer; a mutation attempted
 * from inside the callback is dropped.
 */
export class VtBuffer {
  private state: VtBufferState;
  private dirty = true;
  private onDirty?: DirtyCallback;
  private writeDepth = 0;
  private notifying = false;

  constructor(cols = 80, rows = 24, maxScrollback = 1000) {
    this.state = bufOps.createState(cols, rows, maxScrollback);
  }

  private read<T>(fn: (s: VtBufferState) => T): T {
    return fn(this.state);
  }

  private write(fn: (s: VtBufferState) => void): void {
    if (this.notifying) {
      incVtMetric('vt_reentrant_mutation');
      return;
    }
    this.writeDepth += 1;
    try {
      fn(this.state);
    } finally {
      this.writeDepth -= 1;
    }
    if (this.writeDepth === 0) this.markDirty();
  }

  private markDirty(): void {
    this.dirty = true;
    const callback = this.onDirty;
    if (!callback) return;
    this.notifying = true;
    try {
      callback();
    } finally {
      this.notifying = false;
    }
  }

  // -- dirty tracking ------------------------------------------------------

  setDirtyCallback(fn: DirtyCallback | undefined): void {
    this.onDirty = fn;
  }

  isDirty(): boolean {
    return this.read(() => this.dirty);
  }

  /** Called by the renderer after painting; does not notify. */
  clearDirty(): void {
    this.dirty = false;
  }

  // -- geometry ------------------------------------------------------------

  getSize(): { cols: number; rows: number } {
    return this.read((s) => ({ cols: s.cols, rows: s.rows }));
  }

  /** UI-originated resize. A logical size set by the byte stream still wins per axis. */
  resize(cols: number, rows: number): void {
    this.write((s) => {
      s.physicalCols = clamp(cols, 1, bufOps.MAX_DIMENSION);
      s.physicalRows = clamp(rows, 1, bufOps.MAX_DIMENSION);
      bufOps.applyLogicalSize(s);
    });
  }

  /**
   * `CSI 8 ; rows ; cols t`. Zero for either value means the physical size.
   * Requests are capped at MAX_LOGICAL_ROWS by MAX_LOGICAL_COLS.
   */
  setLogicalSize(rows: number, cols: number): void {
    this.write((s) => {
      s.logicalRows = Math.min(bufOps.toCount(rows), bufOps.MAX_LOGICAL_ROWS);
      s.logicalCols = Math.min(bufOps.toCount(cols), bufOps.MAX_LOGICAL_COLS);
      bufOps.applyLogicalSize(s);
    });
  }

  getLogicalSize(): { cols: number; rows: number } {
    return this.read((s) => ({ cols: s.logicalCols || s.physicalCols, rows: s.logicalRows || s.physicalRows }));
  }

  // -- cursor --------------------------------------------------------------

  getCursor(): { x: number; y: number } {
    return this.read((s) => ({ x: s.cursorX, y: s.cursorY }));
  }

  setCursor(x: number, y: number): void {
    this.write((s) => bufOps.setCursor(s, x, y));
  }

  moveCursorUp(n: number): void {
    this.write((s) => bufOps.moveCursor(s, 0, -bufOps.toCount(n)));
  }

  moveCursorDown(n: number): void {
    this.write((s) => bufOps.moveCursor(s, 0, bufOps.toCount(n)));
  }

  moveCursorForward(n: number): void {
    this.write((s) => bufOps.moveCursor(s, bufOps.toCount(n), 0));
  }

  moveCursorBackward(n: number): void {
    this.write((s) => bufOps.moveCursor(s, -bufOps.toCount(n), 0));
  }

  setCursorVisible(visible: boolean): void {
    this.write((s) => { s.cursorVisible = visible; });
  }

  isCursorVisible(): boolean {
    return this.read((s) => s.cursorVisible);
  }

  /** Whether a renderer should draw the cursor: visible and viewing the live screen. */
  isCursorShown(): boolean {
    return this.read((s) => s.cursorVisible && s.scrollOffset === 0);
  }

  setCursorStyle(style: CursorStyle): void {
    this.write((s) => { s.cursorStyle = { ...style }; });
  }

  getCursorStyle(): CursorStyle {
    return this.read((s) => ({ ...s.cursorStyle }));
  }

  /** Single slot; the last save wins. */
  saveCursor(): void {
    this.write((s) => {
      s.savedCursorX = s.cursorX;
      s.savedCursorY = s.cursorY;
    });
  }

  restoreCursor(): void {
    this.write((s) => bufOps.setCursor(s, s.savedCursorX, s.savedCursorY));
  }

  // -- writing -------------------------------------------------------------

  writeChar(codePoint: number): void {
    this.write((s) => bufOps.writeChar(s, codePoint));
  }

  /** CR followed by LF. */
  newline(): void {
    this.write((s) => {
      bufOps.carriageReturn(s);
      bufOps.lineFeed(s);
    });
  }

  lineFeed(): void {
    this.write((s) => bufOps.lineFeed(s));
  }

  /** IND: same motion as a line feed. */
  index(): void {
    this.write((s) => bufOps.lineFeed(s));
  }

  reverseIndex(): void {
    this.write((s) => bufOps.reverseIndex(s));
  }

  carriageReturn(): void {
    this.write((s) => bufOps.carriageReturn(s));
  }

  tab(): void {
    this.write((s) => bufOps.tab(s));
  }

  backspace(): void {
    this.write((s) => bufOps.backspace(s));
  }

  scrollUp(n: number): void {
    this.write((s) => bufOps.scrollUp(s, n));
  }

  scrollDown(n: number): void {
    this.write((s) => bufOps.scrollDown(s, n));
  }

  // -- erase / insert / delete ---------------------------------------------

  clearToEndOfLine(): void {
    this.write((s) => bufOps.clearToEndOfLine(s));
  }

  clearToStartOfLine(): void {
    this.write((s) => bufOps.clearToStartOfLine(s));
  }

  clearLine(): void {
    this.write((s) => bufOps.clearLine(s));
  }

  clearToEndOfScreen(): void {
    this.write((s) => bufOps.clearToEndOfScreen(s));
  }

  clearToStartOfScreen(): void {
    this.write((s) => bufOps.clearToStartOfScreen(s));
  }

  clearScreen(): void {
    this.write((s) => bufOps.clearScreen(s));
  }

  insertLines(n: number): void {
    this.write((s) => bufOps.insertLines(s, n));
  }

  deleteLines(n: number): void {
    this.write((s) => bufOps.deleteLines(s, n));
  }

  insertChars(n: number): void {
    this.write((s) => bufOps.insertChars(s, n));
  }

  deleteChars(n: number): void {
    this.write((s) => bufOps.deleteChars(s, n));
  }

  eraseChars(n: number): void {
    this.write((s) => bufOps.eraseChars(s, n));
  }

  /** Full reset (RIS). Modes, cursor style and scrollback are kept. */
  reset(): void {
    this.write((s) => bufOps.resetToInitialState(s));
  }

  fillAlignmentPattern(): void {
    this.write((s) => bufOps.fillAlignmentPattern(s));
  }

  // -- attributes ----------------------------------------------------------

  getAttributes(): TextAttributes {
    return this.read((s) => ({ ...s.attrs }));
  }

  setAttributes(attrs: TextAttributes): void {
    this.write((s) => { s.attrs = { ...attrs }; });
  }

  resetAttributes(): void {
    this.write((s) => { s.attrs = defaultAttributes(); });
  }

  // -- line attributes and modes -------------------------------------------

  setLineAttribute(attr: LineAttribute): void {
    this.write((s) => bufOps.setLineAttribute(s, attr));
  }

  getLineAttribute(y: number): LineAttribute {
    return this.read((s) => s.lineAttrs[y] ?? 'normal');
  }

  setBracketedPasteMode(enabled: boolean): void {
    this.write((s) => { s.bracketedPaste = enabled; });
  }

  isBracketedPasteModeEnabled(): boolean {
    return this.read((s) => s.bracketedPaste);
  }

  set132ColumnMode(enabled: boolean): void {
    this.write((s) => { s.columns132 = enabled; });
  }

  is132ColumnMode(): boolean {
    return this.read((s) => s.columns132);
  }

  set40ColumnMode(enabled: boolean): void {
    this.write((s) => { s.columns40 = enabled; });
  }

  is40ColumnMode(): boolean {
    return this.read((s) => s.columns40);
  }

  setLineDensity(density: LineDensity): void {
    this.write((s) => { s.lineDensity = density; });
  }

  getLineDensity(): LineDensity {
    return this.read((s) => s.lineDensity);
  }

  getHorizontalScale(): number {
    return this.read((s) => bufOps.horizontalScale(s));
  }

  getVerticalScale(): number {
    return this.read((s) => bufOps.verticalScale(s));
  }

  // -- cell access ---------------------------------------------------------

  /** Live-screen cell, ignoring the scroll offset. */
  getCell(x: number, y: number): Cell {
    return this.read((s) => {
      const cell = s.screen[y]?.[x];
      return cell ? cloneCell(cell) : emptyCell();
    });
  }

  getLine(y: number): Cell[] {
    return this.read((s) => (s.screen[y] ?? []).map(cloneCell));
  }

  getVisibleCell(x: number, y: number): Cell {
    return this.read((s) => bufOps.visibleCell(s, x, y));
  }

  getVisibleLineAttribute(y: number): LineAttribute {
    return this.read((s) => bufOps.visibleLineAttribute(s, y));
  }

  // -- scrollback ----------------------------------------------------------

  getScrollbackSize(): number {
    return this.read((s) => s.scrollback.length);
  }

  /** History line by index, 0 being the oldest retained. */
  getScrollbackLine(index: number): Cell[] {
    return this.read((s) => (s.scrollback[index]?.cells ?? []).map(cloneCell));
  }

  setScrollOffset(offset: number): void {
    this.write((s) => bufOps.setScrollOffset(s, offset));
  }

  getScrollOffset(): number {
    return this.read((s) => s.scrollOffset);
  }

  // -- selection -----------------------------------------------------------

  startSelection(x: number, y: number): void {
    this.write((s) => {
      s.selectionActive = true;
      s.selection = bufOps.clampSelection(s, { startX: x, startY: y, endX: x, endY: y });
    });
  }

  updateSelection(x: number, y: number): void {
    if (!this.read((s) => s.selectionActive)) return;
    this.write((s) => {
      s.selection = bufOps.clampSelection(s, { ...s.selection, endX: x, endY: y });
    });
  }

  /** Pointer released. The selection stays active until cleared so it can be copied. */
  endSelection(): void {}

  clearSelection(): void {
    this.write((s) => { s.selectionActive = false; });
  }

  selectAll(): void {
    this.write((s) => {
      s.selectionActive = true;
      s.selection = { startX: 0, startY: 0, endX: s.cols - 1, endY: s.rows - 1 };
    });
  }

  hasSelection(): boolean {
    return this.read((s) => s.selectionActive);
  }

  /** Normalized to reading order, or undefined when nothing is selected. */
  getSelection(): SelectionRange | undefined {
    return this.read((s) => (s.selectionActive ? bufOps.normalizedSelection(s) : undefined));
  }

  getSelectedText(): string {
    return this.read((s) => bufOps.selectedText(s));
  }

  isInSelection(x: number, y: number): boolean {
    return this.read((s) => bufOps.isInSelection(s, x, y));
  }
}
