/**
 * Terminal configuration: explicit options over TERMGRID_* environment
 * variables over built-in defaults.
 */

import type { BlinkMode, Color, ColorScheme } from '../terminal/vt-types.js';
import {
  ANSI_TO_VGA,
  PALETTE_COLOR_NAMES,
  VGA_TO_ANSI,
  defaultColorScheme,
  parseBlinkMode,
  parseHexColor,
  toHex,
} from '../terminal/vt-color.js';
import { MAX_DIMENSION } from '../terminal/vt-buffer-ops.js';

export class TerminalConfigError extends Error {
  constructor(
    readonly field: string,
    message: string,
  ) {
    super(message);
    this.name = 'TerminalConfigError';
  }
}

export type TerminalConfig = {
  cols: number;
  rows: number;
  maxScrollback: number;
  colorScheme: ColorScheme;
};

/**
 * On-disk color scheme. Colors are `#RGB` or `#RRGGBB`; palette entries are
 * keyed by slot name (`00_black` ... `15_white`, VGA order).
 */
export type ColorSchemeFile = {
  foreground?: string;
  background?: string;
  cursor?: string;
  selection?: string;
  palette?: Record<string, string>;
  blinkMode?: string;
};

export type TerminalConfigOptions = {
  cols?: number;
  rows?: number;
  maxScrollback?: number;
  blinkMode?: BlinkMode;
  colorScheme?: ColorScheme;
};

export const DEFAULT_COLS = 80;
export const DEFAULT_ROWS = 24;
export const DEFAULT_SCROLLBACK = 1000;

type Env = Record<string, string | undefined>;

function readEnvInt(env: Env, name: string): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) return undefined;
  if (!/^\d+$/.test(raw)) {
    throw new TerminalConfigError(name, `${name} must be a non-negative integer, got "${raw}"`);
  }
  return Number(raw);
}

function checkRange(field: string, value: number, min: number): number {
  if (!Number.isInteger(value) || value < min || value > MAX_DIMENSION) {
    throw new TerminalConfigError(field, `${field} must be an integer between ${min} and ${MAX_DIMENSION}, got ${value}`);
  }
  return value;
}

export function resolveTerminalConfig(
  options: TerminalConfigOptions = {},
  env: Env = process.env,
): TerminalConfig {
  const cols = checkRange('cols', options.cols ?? readEnvInt(env, 'TERMGRID_COLS') ?? DEFAULT_COLS, 1);
  const rows = checkRange('rows', options.rows ?? readEnvInt(env, 'TERMGRID_ROWS') ?? DEFAULT_ROWS, 1);
  const maxScrollback = checkRange(
    'maxScrollback',
    options.maxScrollback ?? readEnvInt(env, 'TERMGRID_SCROLLBACK') ?? DEFAULT_SCROLLBACK,
    0,
  );

  const base = options.colorScheme ?? defaultColorScheme();
  const envBlink = env.TERMGRID_BLINK_MODE?.trim();
  const blinkMode = options.blinkMode ?? (envBlink ? parseBlinkMode(envBlink) : base.blinkMode);

  return {
    cols,
    rows,
    maxScrollback,
    colorScheme: { ...base, palette: [...base.palette], blinkMode },
  };
}

function readSchemeColor(field: string, text: string | undefined, fallback: Color): Color {
  if (text === undefined) return fallback;
  const color = parseHexColor(text);
  if (!color) {
    throw new TerminalConfigError(field, `${field} must be #RGB or #RRGGBB, got "${text}"`);
  }
  return color;
}

/** Overlay a scheme file on the default scheme. Missing entries keep their defaults. */
export function parseColorScheme(file: ColorSchemeFile): ColorScheme {
  const scheme = defaultColorScheme();
  const palette = scheme.palette.map((fallback, ansi) => {
    const name = PALETTE_COLOR_NAMES[ANSI_TO_VGA[ansi]];
    return readSchemeColor(`palette.${name}`, file.palette?.[name], fallback);
  });

  for (const key of Object.keys(file.palette ?? {})) {
    if (!PALETTE_COLOR_NAMES.includes(key)) {
      throw new TerminalConfigError(`palette.${key}`, `Unknown palette slot "${key}"`);
    }
  }

  return {
    foreground: readSchemeColor('foreground', file.foreground, scheme.foreground),
    background: readSchemeColor('background', file.background, scheme.background),
    cursor: readSchemeColor('cursor', file.cursor, scheme.cursor),
    selection: readSchemeColor('selection', file.selection, scheme.selection),
    palette,
    blinkMode: file.blinkMode === undefined ? scheme.blinkMode : parseBlinkMode(file.blinkMode),
  };
}

export function serializeColorScheme(scheme: ColorScheme): Required<ColorSchemeFile> {
  const palette: Record<string, string> = {};
  PALETTE_COLOR_NAMES.forEach((name, vga) => {
    const color = scheme.palette[VGA_TO_ANSI[vga]];
    if (color) palette[name] = toHex(color);
  });
  return {
    foreground: toHex(scheme.foreground),
    background: toHex(scheme.background),
    cursor: toHex(scheme.cursor),
    selection: toHex(scheme.selection),
    palette,
    blinkMode: scheme.blinkMode,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(source: Record<string, unknown>, field: string): string | undefined {
  const value = source[field];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new TerminalConfigError(field, `${field} must be a string`);
  }
  return value;
}

/** Parse and validate the JSON text of a scheme file. */
export function parseColorSchemeJson(text: string): ColorScheme {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new TerminalConfigError('scheme', `Scheme is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (!isRecord(raw)) {
    throw new TerminalConfigError('scheme', 'Scheme must be a JSON object');
  }

  const rawPalette = raw.palette;
  let palette: Record<string, string> | undefined;
  if (rawPalette !== undefined) {
    if (!isRecord(rawPalette)) {
      throw new TerminalConfigError('palette', 'palette must be an object keyed by slot name');
    }
    palette = {};
    for (const key of Object.keys(rawPalette)) {
      const value = optionalString(rawPalette, key);
      if (value !== undefined) palette[key] = value;
    }
  }

  return parseColorScheme({
    foreground: optionalString(raw, 'foreground'),
    background: optionalString(raw, 'background'),
    cursor: optionalString(raw, 'cursor'),
    selection: optionalString(raw, 'selection'),
    blinkMode: optionalString(raw, 'blinkMode'),
    palette,
  });
}
