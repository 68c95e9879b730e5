import chalk, { Chalk, type ChalkInstance, type ColorSupportLevel } from 'chalk';
import type { FrameLine, FrameSegment, TerminalFrame } from './vt-snapshot.js';
import type { LineAttribute } from '../terminal/vt-types.js';

export type AnsiRenderOptions = {
  /** Force a chalk color level; 0 renders plain text. Defaults to chalk's detection. */
  level?: ColorSupportLevel;
};

/** DEC line-size prefix so a host terminal draws doubled rows the same way. */
function lineAttributePrefix(attribute: LineAttribute): string {
  switch (attribute) {
    case 'double-width': return '\x1b#6';
    case 'double-top': return '\x1b#3';
    case 'double-bottom': return '\x1b#4';
    case 'normal': return '';
  }
}

function paintSegment(painter: ChalkInstance, segment: FrameSegment): string {
  let style = painter.hex(segment.fg).bgHex(segment.bg);
  if (segment.bold) style = style.bold;
  if (segment.italic) style = style.italic;
  if (segment.underline) style = style.underline;
  return style(segment.text);
}

function renderLine(painter: ChalkInstance, line: FrameLine): string {
  const prefix = painter.level > 0 ? lineAttributePrefix(line.attribute) : '';
  return prefix + line.segments.map((segment) => paintSegment(painter, segment)).join('');
}

/** Render a frame as truecolor ANSI text, one terminal row per line. */
export function renderFrameAnsi(frame: TerminalFrame, options: AnsiRenderOptions = {}): string {
  const painter = options.level === undefined ? chalk : new Chalk({ level: options.level });
  return frame.lines.map((line) => renderLine(painter, line)).join('\n');
}
