/**
 * Read-only views of a VtBuffer for renderers and tests.
 *
 * Snapshots follow the visible view, so a buffer scrolled back shows
 * history rows at the top.
 */

import type { VtBuffer } from '../terminal/vt-buffer.js';
import type { ColorScheme, CursorStyle, LineAttribute } from '../terminal/vt-types.js';
import { cellText, resolveCellColors } from '../terminal/vt-cell.js';
import { defaultColorScheme, toHex } from '../terminal/vt-color.js';
import { trimTrailingBlanks } from '../terminal/vt-utils.js';

export type FrameSegment = {
  text: string;
  /** `#RRGGBB` after scheme resolution. */
  fg: string;
  bg: string;
  bold: boolean;
  italic: boolean;
  underline: boolean;
  blink: boolean;
};

export type FrameLine = {
  segments: FrameSegment[];
  attribute: LineAttribute;
};

export type TerminalFrame = {
  cols: number;
  rows: number;
  lines: FrameLine[];
  cursor: {
    x: number;
    y: number;
    /** False while hidden or while the view is scrolled back. */
    visible: boolean;
    style: CursorStyle;
  };
  scrollOffset: number;
};

export type SnapshotFrameOptions = {
  scheme?: ColorScheme;
  /** Blink phase in radians; in `blink` mode the second half hides glyphs. */
  phase?: number;
};

/** Visible rows as right-trimmed strings joined by `\n`. */
export function snapshotText(buffer: VtBuffer): string {
  const { cols, rows } = buffer.getSize();
  const lines: string[] = [];
  for (let y = 0; y < rows; y += 1) {
    let text = '';
    for (let x = 0; x < cols; x += 1) {
      text += cellText(buffer.getVisibleCell(x, y));
    }
    lines.push(trimTrailingBlanks(text));
  }
  return lines.join('\n');
}

function segmentKey(segment: Omit<FrameSegment, 'text'>): string {
  return [
    segment.fg,
    segment.bg,
    segment.bold ? 'b' : '',
    segment.italic ? 'i' : '',
    segment.underline ? 'u' : '',
    segment.blink ? 'k' : '',
  ].join('|');
}

export function snapshotFrame(buffer: VtBuffer, options: SnapshotFrameOptions = {}): TerminalFrame {
  const scheme = options.scheme ?? defaultColorScheme();
  const { cols, rows } = buffer.getSize();
  const lines: FrameLine[] = [];

  for (let y = 0; y < rows; y += 1) {
    const segments: FrameSegment[] = [];
    let current: FrameSegment | null = null;

    for (let x = 0; x < cols; x += 1) {
      const cell = buffer.getVisibleCell(x, y);
      const resolved = resolveCellColors(cell, scheme, {
        phase: options.phase,
        column: x,
        selected: buffer.isInSelection(x, y),
      });
      const next = {
        fg: toHex(resolved.fg),
        bg: toHex(resolved.bg),
        bold: cell.bold,
        italic: cell.italic,
        underline: cell.underline,
        blink: cell.blink,
      };
      const text = resolved.glyphVisible ? cellText(cell) : ' ';

      if (current && segmentKey(current) === segmentKey(next)) {
        current.text += text;
      } else {
        if (current) segments.push(current);
        current = { text, ...next };
      }
    }
    if (current) segments.push(current);

    lines.push({ segments, attribute: buffer.getVisibleLineAttribute(y) });
  }

  const cursor = buffer.getCursor();
  return {
    cols,
    rows,
    lines,
    cursor: {
      x: cursor.x,
      y: cursor.y,
      visible: buffer.isCursorShown(),
      style: buffer.getCursorStyle(),
    },
    scrollOffset: buffer.getScrollOffset(),
  };
}
