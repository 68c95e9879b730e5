import { beforeEach, describe, expect, it } from 'vitest';
import { VtBuffer } from '../../src/terminal/vt-buffer.js';
import { ANSI_COLORS, DEFAULT_BACKGROUND, rgb } from '../../src/terminal/vt-color.js';
import { defaultAttributes } from '../../src/terminal/vt-sgr.js';
import { getVtMetric, resetVtMetrics } from '../../src/terminal/vt-diagnostics.js';
import type { Cell } from '../../src/terminal/vt-types.js';

function textOf(cells: Cell[]): string {
  return cells.map((cell) => String.fromCodePoint(cell.char)).join('').replace(/ +$/, '');
}

function rowText(buf: VtBuffer, y: number): string {
  return textOf(buf.getLine(y));
}

function visibleRow(buf: VtBuffer, y: number): string {
  const { cols } = buf.getSize();
  const cells: Cell[] = [];
  for (let x = 0; x < cols; x += 1) cells.push(buf.getVisibleCell(x, y));
  return textOf(cells);
}

function write(buf: VtBuffer, text: string): void {
  for (const ch of text) {
    const cp = ch.codePointAt(0);
    if (cp !== undefined) buf.writeChar(cp);
  }
}

function put(buf: VtBuffer, x: number, y: number, text: string): void {
  buf.setCursor(x, y);
  write(buf, text);
}

describe('VtBuffer', () => {
  beforeEach(() => {
    resetVtMetrics();
  });

  describe('geometry', () => {
    it('starts with the requested size and a homed cursor', () => {
      const buf = new VtBuffer(80, 24);
      expect(buf.getSize()).toEqual({ cols: 80, rows: 24 });
      expect(buf.getCursor()).toEqual({ x: 0, y: 0 });
      expect(buf.getScrollbackSize()).toBe(0);
      expect(buf.getLine(0)).toHaveLength(80);
    });

    it('clamps dimensions to 1..10000', () => {
      expect(new VtBuffer(0, -5).getSize()).toEqual({ cols: 1, rows: 1 });
      expect(new VtBuffer(20000, 3).getSize()).toEqual({ cols: 10000, rows: 3 });
    });

    it('keeps the overlapping rectangle on resize', () => {
      const buf = new VtBuffer(5, 3);
      put(buf, 0, 0, 'abcd');
      put(buf, 0, 2, 'efgh');
      buf.resize(3, 2);

      expect(buf.getSize()).toEqual({ cols: 3, rows: 2 });
      expect(rowText(buf, 0)).toBe('abc');
      expect(rowText(buf, 1)).toBe('');
      expect(buf.getCursor()).toEqual({ x: 2, y: 1 });

      buf.resize(6, 4);
      expect(rowText(buf, 0)).toBe('abc');
      expect(buf.getLine(3)).toHaveLength(6);
    });

    it('clamps the saved cursor on resize', () => {
      const buf = new VtBuffer(5, 3);
      buf.setCursor(4, 2);
      buf.saveCursor();
      buf.resize(2, 2);
      buf.setCursor(0, 0);
      buf.restoreCursor();
      expect(buf.getCursor()).toEqual({ x: 1, y: 1 });
    });

    it('lets a logical size override the physical size per axis', () => {
      const buf = new VtBuffer(80, 24);
      buf.setLogicalSize(10, 0);
      expect(buf.getSize()).toEqual({ cols: 80, rows: 10 });

      buf.resize(100, 30);
      expect(buf.getSize()).toEqual({ cols: 100, rows: 10 });
      expect(buf.getLogicalSize()).toEqual({ cols: 100, rows: 10 });

      buf.setLogicalSize(0, 0);
      expect(buf.getSize()).toEqual({ cols: 100, rows: 30 });
    });

    it('reports scale factors for column and density modes', () => {
      const buf = new VtBuffer(80, 24);
      expect(buf.getHorizontalScale()).toBe(1);
      buf.set132ColumnMode(true);
      expect(buf.getHorizontalScale()).toBeCloseTo(80 / 132);
      buf.set40ColumnMode(true);
      expect(buf.getHorizontalScale()).toBeCloseTo((80 / 132) * 2);
      expect(buf.is132ColumnMode()).toBe(true);
      expect(buf.is40ColumnMode()).toBe(true);

      buf.setLineDensity(50);
      expect(buf.getLineDensity()).toBe(50);
      expect(buf.getVerticalScale()).toBe(0.5);
    });
  });

  describe('writing', () => {
    it('wraps eagerly after the last column', () => {
      const buf = new VtBuffer(5, 3);
      write(buf, 'abcde');
      expect(rowText(buf, 0)).toBe('abcde');
      expect(buf.getCursor()).toEqual({ x: 0, y: 1 });
    });

    it('scrolls into scrollback when wrapping on the last row', () => {
      const buf = new VtBuffer(3, 2, 10);
      write(buf, 'abcdefg');
      expect(textOf(buf.getScrollbackLine(0))).toBe('abc');
      expect(rowText(buf, 0)).toBe('def');
      expect(rowText(buf, 1)).toBe('g');
      expect(buf.getCursor()).toEqual({ x: 1, y: 1 });
    });

    it('evicts the oldest scrollback line first', () => {
      const buf = new VtBuffer(2, 1, 3);
      write(buf, 'abcdefgh');
      expect(buf.getScrollbackSize()).toBe(3);
      expect([0, 1, 2].map((i) => textOf(buf.getScrollbackLine(i)))).toEqual(['cd', 'ef', 'gh']);
    });

    it('keeps no history when scrollback is disabled', () => {
      const buf = new VtBuffer(2, 1, 0);
      write(buf, 'abcd');
      expect(buf.getScrollbackSize()).toBe(0);
    });

    it('stores swapped colors for reverse video', () => {
      const buf = new VtBuffer(5, 2);
      buf.setAttributes({ ...defaultAttributes(), fg: ANSI_COLORS[1], bg: ANSI_COLORS[4], reverse: true });
      write(buf, 'x');
      const cell = buf.getCell(0, 0);
      expect(cell.fg).toEqual(ANSI_COLORS[4]);
      expect(cell.bg).toEqual(ANSI_COLORS[1]);
      expect(cell.reverse).toBe(true);
    });

    it('keeps the column on line feed and returns it on newline', () => {
      const buf = new VtBuffer(10, 4);
      write(buf, 'ab');
      buf.lineFeed();
      expect(buf.getCursor()).toEqual({ x: 2, y: 1 });
      buf.index();
      expect(buf.getCursor()).toEqual({ x: 2, y: 2 });
      buf.newline();
      expect(buf.getCursor()).toEqual({ x: 0, y: 3 });
    });

    it('scrolls down on reverse index at the top row', () => {
      const buf = new VtBuffer(5, 3);
      write(buf, 'x');
      buf.setCursor(0, 0);
      buf.reverseIndex();
      expect(rowText(buf, 0)).toBe('');
      expect(rowText(buf, 1)).toBe('x');
      expect(buf.getCursor()).toEqual({ x: 0, y: 0 });
    });

    it('advances tabs to multiples of eight and stops at the margin', () => {
      const buf = new VtBuffer(20, 2);
      buf.tab();
      expect(buf.getCursor().x).toBe(8);
      buf.tab();
      expect(buf.getCursor().x).toBe(16);
      buf.tab();
      expect(buf.getCursor().x).toBe(19);
    });

    it('stops backspace at column zero', () => {
      const buf = new VtBuffer(5, 2);
      buf.backspace();
      expect(buf.getCursor()).toEqual({ x: 0, y: 0 });
      write(buf, 'ab');
      buf.backspace();
      expect(buf.getCursor()).toEqual({ x: 1, y: 0 });
    });
  });

  describe('cursor', () => {
    it('clamps relative motion to the grid', () => {
      const buf = new VtBuffer(10, 5);
      buf.moveCursorUp(5);
      expect(buf.getCursor()).toEqual({ x: 0, y: 0 });
      buf.moveCursorForward(1000);
      buf.moveCursorDown(1000);
      expect(buf.getCursor()).toEqual({ x: 9, y: 4 });
      buf.moveCursorBackward(3);
      expect(buf.getCursor()).toEqual({ x: 6, y: 4 });
      buf.moveCursorUp(Number.NaN);
      expect(buf.getCursor()).toEqual({ x: 6, y: 4 });
    });

    it('tracks visibility and style', () => {
      const buf = new VtBuffer(10, 5);
      expect(buf.isCursorVisible()).toBe(true);
      buf.setCursorVisible(false);
      expect(buf.isCursorShown()).toBe(false);
      buf.setCursorStyle({ shape: 'bar', blink: 'fast' });
      expect(buf.getCursorStyle()).toEqual({ shape: 'bar', blink: 'fast' });
    });
  });

  describe('erase, insert and delete', () => {
    it('erases within the line', () => {
      const buf = new VtBuffer(10, 2);
      put(buf, 0, 0, 'abcdef');
      buf.setCursor(2, 0);
      buf.clearToEndOfLine();
      expect(rowText(buf, 0)).toBe('ab');

      put(buf, 0, 1, 'abcdef');
      buf.setCursor(2, 1);
      buf.clearToStartOfLine();
      expect(rowText(buf, 1)).toBe('   def');
      buf.clearLine();
      expect(rowText(buf, 1)).toBe('');
    });

    it('erases to either end of the screen', () => {
      const fill = () => {
        const buf = new VtBuffer(5, 3);
        put(buf, 0, 0, 'aaaa');
        put(buf, 0, 1, 'bbbb');
        put(buf, 0, 2, 'cccc');
        buf.setCursor(2, 1);
        return buf;
      };

      const toEnd = fill();
      toEnd.clearToEndOfScreen();
      expect([0, 1, 2].map((y) => rowText(toEnd, y))).toEqual(['aaaa', 'bb', '']);

      const toStart = fill();
      toStart.clearToStartOfScreen();
      expect([0, 1, 2].map((y) => rowText(toStart, y))).toEqual(['', '   b', 'cccc']);
    });

    it('fills erased cells with the current background', () => {
      const buf = new VtBuffer(4, 2);
      buf.setAttributes({ ...defaultAttributes(), bg: ANSI_COLORS[1] });
      buf.clearLine();
      expect(buf.getCell(3, 0).bg).toEqual(ANSI_COLORS[1]);
      expect(buf.getCell(3, 1).bg).toBe(DEFAULT_BACKGROUND);

      buf.clearScreen();
      expect(buf.getCell(0, 1).bg).toEqual(ANSI_COLORS[1]);
    });

    it('resets line attributes on clear screen', () => {
      const buf = new VtBuffer(10, 2);
      buf.setLineAttribute('double-width');
      buf.clearScreen();
      expect(buf.getLineAttribute(0)).toBe('normal');
    });

    it('inserts and deletes lines at the cursor', () => {
      const buf = new VtBuffer(5, 4);
      ['a', 'b', 'c', 'd'].forEach((text, y) => put(buf, 0, y, text));
      buf.setCursor(0, 1);

      buf.insertLines(1);
      expect([0, 1, 2, 3].map((y) => rowText(buf, y))).toEqual(['a', '', 'b', 'c']);

      buf.deleteLines(2);
      expect([0, 1, 2, 3].map((y) => rowText(buf, y))).toEqual(['a', 'c', '', '']);

      buf.insertLines(100);
      expect([0, 1, 2, 3].map((y) => rowText(buf, y))).toEqual(['a', '', '', '']);
      expect(buf.getScrollbackSize()).toBe(0);
    });

    it('inserts, deletes and erases characters without moving the cursor', () => {
      const buf = new VtBuffer(6, 2);
      put(buf, 0, 0, 'abcde');
      buf.setCursor(1, 0);

      buf.insertChars(2);
      expect(rowText(buf, 0)).toBe('a  bcd');
      expect(buf.getLine(0)).toHaveLength(6);

      buf.deleteChars(1);
      expect(rowText(buf, 0)).toBe('a bcd');
      expect(buf.getCursor()).toEqual({ x: 1, y: 0 });

      buf.setCursor(0, 0);
      buf.eraseChars(2);
      expect(rowText(buf, 0)).toBe('  bcd');
    });

    it('scrolls explicitly in both directions', () => {
      const buf = new VtBuffer(5, 3, 10);
      ['a', 'b', 'c'].forEach((text, y) => put(buf, 0, y, text));

      buf.scrollDown(1);
      expect([0, 1, 2].map((y) => rowText(buf, y))).toEqual(['', 'a', 'b']);
      expect(buf.getScrollbackSize()).toBe(0);

      buf.scrollUp(2);
      expect([0, 1, 2].map((y) => rowText(buf, y))).toEqual(['b', '', '']);
      expect(textOf(buf.getScrollbackLine(1))).toBe('a');
    });

    it('bounds the work done by a huge scroll count', () => {
      const buf = new VtBuffer(5, 2, 3);
      buf.scrollUp(1_000_000_000);
      expect(buf.getScrollbackSize()).toBe(3);
      expect(buf.getSize()).toEqual({ cols: 5, rows: 2 });
    });
  });

  describe('line attributes', () => {
    it('halves the writable width on doubled rows', () => {
      const buf = new VtBuffer(10, 3);
      buf.setLineAttribute('double-width');
      write(buf, 'abcdefg');
      expect(rowText(buf, 0)).toBe('abcde');
      expect(rowText(buf, 1)).toBe('fg');
      expect(buf.getLineAttribute(0)).toBe('double-width');

      buf.setCursor(9, 0);
      expect(buf.getCursor()).toEqual({ x: 4, y: 0 });
    });

    it('fills the alignment pattern', () => {
      const buf = new VtBuffer(3, 2);
      buf.setLineAttribute('double-top');
      buf.setCursor(2, 1);
      buf.fillAlignmentPattern();
      expect(rowText(buf, 0)).toBe('EEE');
      expect(rowText(buf, 1)).toBe('EEE');
      expect(buf.getLineAttribute(0)).toBe('normal');
      expect(buf.getCursor()).toEqual({ x: 0, y: 0 });
    });
  });

  describe('reset', () => {
    it('restores attributes, screen and cursor but keeps scrollback', () => {
      const buf = new VtBuffer(3, 1, 5);
      buf.setAttributes({ ...defaultAttributes(), bold: true, bg: rgb(9, 9, 9) });
      write(buf, 'abcd');
      buf.reset();

      expect(buf.getAttributes()).toEqual(defaultAttributes());
      expect(buf.getCell(0, 0).bg).toBe(DEFAULT_BACKGROUND);
      expect(rowText(buf, 0)).toBe('');
      expect(buf.getCursor()).toEqual({ x: 0, y: 0 });
      expect(buf.getScrollbackSize()).toBe(1);
    });

    it('resets attributes without touching the grid', () => {
      const buf = new VtBuffer(3, 1);
      buf.setAttributes({ ...defaultAttributes(), italic: true });
      buf.resetAttributes();
      expect(buf.getAttributes().italic).toBe(false);
    });
  });

  describe('scrollback view', () => {
    function scrolled(): VtBuffer {
      const buf = new VtBuffer(3, 2, 10);
      write(buf, 'abcdefghi');
      return buf;
    }

    it('shows history rows above the live screen', () => {
      const buf = scrolled();
      expect(buf.getScrollbackSize()).toBe(2);

      buf.setScrollOffset(1);
      expect(visibleRow(buf, 0)).toBe('def');
      expect(visibleRow(buf, 1)).toBe('ghi');
      expect(buf.isCursorShown()).toBe(false);

      buf.setScrollOffset(5);
      expect(buf.getScrollOffset()).toBe(2);
      expect(visibleRow(buf, 0)).toBe('abc');
      expect(visibleRow(buf, 1)).toBe('def');
    });

    it('stays on the same history lines while output arrives', () => {
      const buf = scrolled();
      buf.setScrollOffset(2);
      write(buf, 'jkl');
      expect(buf.getScrollOffset()).toBe(3);
      expect(visibleRow(buf, 0)).toBe('abc');
      expect(visibleRow(buf, 1)).toBe('def');
    });

    it('returns blank cells for out-of-range coordinates', () => {
      const buf = scrolled();
      const blank = { char: 0x20, bold: false };
      expect(buf.getVisibleCell(-1, 0)).toMatchObject(blank);
      expect(buf.getVisibleCell(0.5, 0)).toMatchObject(blank);
      expect(buf.getVisibleCell(3, 0)).toMatchObject(blank);
      expect(buf.getVisibleLineAttribute(7)).toBe('normal');
    });

    it('resets the offset on resize', () => {
      const buf = scrolled();
      buf.setScrollOffset(1);
      buf.resize(4, 2);
      expect(buf.getScrollOffset()).toBe(0);
    });
  });

  describe('selection', () => {
    function withText(): VtBuffer {
      const buf = new VtBuffer(10, 3);
      put(buf, 0, 0, 'hello');
      put(buf, 0, 1, 'world');
      put(buf, 0, 2, 'again');
      return buf;
    }

    it('normalizes a backwards selection', () => {
      const buf = withText();
      buf.startSelection(3, 1);
      buf.updateSelection(1, 0);
      buf.endSelection();

      expect(buf.getSelection()).toEqual({ startX: 1, startY: 0, endX: 3, endY: 1 });
      expect(buf.getSelectedText()).toBe('ello\nworl');
    });

    it('tests membership in reading order', () => {
      const buf = withText();
      buf.startSelection(1, 0);
      buf.updateSelection(3, 1);
      expect(buf.isInSelection(0, 0)).toBe(false);
      expect(buf.isInSelection(1, 0)).toBe(true);
      expect(buf.isInSelection(9, 0)).toBe(true);
      expect(buf.isInSelection(3, 1)).toBe(true);
      expect(buf.isInSelection(4, 1)).toBe(false);
      expect(buf.isInSelection(0, 2)).toBe(false);
    });

    it('clamps the anchor to the grid', () => {
      const buf = withText();
      buf.startSelection(50, -2);
      expect(buf.getSelection()).toEqual({ startX: 9, startY: 0, endX: 9, endY: 0 });
    });

    it('ignores updates when no selection is active', () => {
      const buf = withText();
      buf.updateSelection(2, 2);
      expect(buf.hasSelection()).toBe(false);
      expect(buf.getSelection()).toBeUndefined();
      expect(buf.getSelectedText()).toBe('');
    });

    it('selects everything and clears', () => {
      const buf = withText();
      buf.selectAll();
      expect(buf.getSelection()).toEqual({ startX: 0, startY: 0, endX: 9, endY: 2 });
      expect(buf.getSelectedText()).toBe('hello\nworld\nagain');
      buf.clearSelection();
      expect(buf.hasSelection()).toBe(false);
    });

    it('reports nothing selected while scrolled back', () => {
      const buf = new VtBuffer(3, 2, 10);
      write(buf, 'abcdefghi');
      buf.selectAll();
      buf.setScrollOffset(1);
      expect(buf.isInSelection(0, 0)).toBe(false);
      buf.setScrollOffset(0);
      expect(buf.isInSelection(0, 0)).toBe(true);
    });
  });

  describe('dirty notification', () => {
    it('notifies once per mutating call and never on reads', () => {
      const buf = new VtBuffer(10, 3);
      let calls = 0;
      buf.setDirtyCallback(() => {
        calls += 1;
      });
      buf.clearDirty();
      expect(buf.isDirty()).toBe(false);

      buf.getCursor();
      buf.getSelectedText();
      expect(calls).toBe(0);

      buf.newline();
      expect(calls).toBe(1);
      expect(buf.isDirty()).toBe(true);

      buf.clearDirty();
      expect(calls).toBe(1);
    });

    it('lets the callback read but drops mutations from it', () => {
      const buf = new VtBuffer(10, 3);
      const seen: Array<{ x: number; y: number }> = [];
      buf.setDirtyCallback(() => {
        seen.push(buf.getCursor());
        buf.writeChar(0x5a);
      });

      buf.writeChar(0x41);
      expect(seen).toEqual([{ x: 1, y: 0 }]);
      expect(rowText(buf, 0)).toBe('A');
      expect(getVtMetric('vt_reentrant_mutation')).toBe(1);
    });
  });

  describe('invariants under random operations', () => {
    function mulberry32(seed: number): () => number {
      let a = seed;
      return () => {
        a = (a + 0x6d2b79f5) | 0;
        let t = Math.imul(a ^ (a >>> 15), 1 | a);
        t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
      };
    }

    it('keeps cursor, grid and scrollback within bounds', () => {
      const random = mulberry32(1234);
      const int = (min: number, max: number) => min + Math.floor(random() * (max - min + 1));
      const buf = new VtBuffer(12, 5, 7);

      const ops: Array<() => void> = [
        () => buf.writeChar(int(0x20, 0x7e)),
        () => buf.setCursor(int(-5, 20), int(-5, 10)),
        () => buf.moveCursorForward(int(0, 30)),
        () => buf.moveCursorUp(int(0, 30)),
        () => buf.lineFeed(),
        () => buf.reverseIndex(),
        () => buf.tab(),
        () => buf.insertLines(int(0, 8)),
        () => buf.deleteLines(int(0, 8)),
        () => buf.insertChars(int(0, 20)),
        () => buf.deleteChars(int(0, 20)),
        () => buf.eraseChars(int(0, 20)),
        () => buf.scrollUp(int(0, 9)),
        () => buf.scrollDown(int(0, 9)),
        () => buf.clearToStartOfScreen(),
        () => buf.setLineAttribute(random() < 0.5 ? 'double-width' : 'normal'),
        () => buf.resize(int(1, 16), int(1, 8)),
        () => buf.setScrollOffset(int(0, 10)),
        () => buf.restoreCursor(),
        () => buf.saveCursor(),
      ];

      for (let step = 0; step < 2000; step += 1) {
        ops[int(0, ops.length - 1)]();

        const { cols, rows } = buf.getSize();
        const { x, y } = buf.getCursor();
        expect(x).toBeGreaterThanOrEqual(0);
        expect(x).toBeLessThan(cols);
        expect(y).toBeGreaterThanOrEqual(0);
        expect(y).toBeLessThan(rows);
        for (let row = 0; row < rows; row += 1) {
          expect(buf.getLine(row)).toHaveLength(cols);
        }
        expect(buf.getScrollbackSize()).toBeLessThanOrEqual(7);
        expect(buf.getScrollOffset()).toBeLessThanOrEqual(buf.getScrollbackSize());
      }
    });
  });
});
