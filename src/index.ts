/**
 * termgrid: a VT-compatible terminal grid driven by raw terminal output.
 */

export { VtBuffer, type DirtyCallback } from './terminal/vt-buffer.js';
export { VtParser, decodeUtf8, type ParserState, type PrivateMarker, type VtParserOptions } from './terminal/vt-parser.js';
export { applySgr, defaultAttributes } from './terminal/vt-sgr.js';
export {
  ANSI_COLORS,
  ANSI_TO_VGA,
  DEFAULT_BACKGROUND,
  DEFAULT_FOREGROUND,
  PALETTE_COLOR_NAMES,
  VGA_TO_ANSI,
  color256,
  colorEquals,
  defaultColorScheme,
  parseBlinkMode,
  parseHexColor,
  rgb,
  toHex,
} from './terminal/vt-color.js';
export {
  cellText,
  cloneCell,
  emptyCell,
  emptyCellWithColors,
  resolveCellColors,
  type ResolveCellOptions,
  type ResolvedCell,
} from './terminal/vt-cell.js';
export {
  getVtMetric,
  getVtMetricSnapshot,
  getVtMetricTotal,
  incVtMetric,
  resetVtMetrics,
  type VtMetricName,
} from './terminal/vt-diagnostics.js';
export { createRedrawScheduler, type RedrawScheduler } from './terminal/redraw-scheduler.js';
export type {
  BlinkMode,
  Cell,
  Color,
  ColorScheme,
  CursorBlink,
  CursorShape,
  CursorStyle,
  LineAttribute,
  LineDensity,
  SelectionRange,
  TextAttributes,
} from './terminal/vt-types.js';

export {
  snapshotFrame,
  snapshotText,
  type FrameLine,
  type FrameSegment,
  type SnapshotFrameOptions,
  type TerminalFrame,
} from './capture/vt-snapshot.js';
export { renderFrameAnsi, type AnsiRenderOptions } from './capture/ansi-render.js';

export {
  DEFAULT_COLS,
  DEFAULT_ROWS,
  DEFAULT_SCROLLBACK,
  TerminalConfigError,
  parseColorScheme,
  parseColorSchemeJson,
  resolveTerminalConfig,
  serializeColorScheme,
  type ColorSchemeFile,
  type TerminalConfig,
  type TerminalConfigOptions,
} from './config/terminal-config.js';
export { createTerminal, type CreateTerminalOptions, type TerminalSession } from './terminal-session.js';
