/**
 * Byte-oriented VT escape-sequence state machine.
 *
 * Every piece of decode state (FSM state, CSI parameters, OSC text and a
 * partial UTF-8 sequence) lives on the instance, so a sequence split across
 * any number of `parse()` calls resumes where it stopped. Unknown or
 * malformed sequences are dropped and counted in vt-diagnostics; nothing
 * here throws on input.
 */

import { incVtMetric } from './vt-diagnostics.js';
import type { Color, CursorStyle } from './vt-types.js';
import type { VtBuffer } from './vt-buffer.js';
import { ANSI_COLORS } from './vt-color.js';
import { applySgr } from './vt-sgr.js';
import { isLineDensity } from './vt-buffer-ops.js';
import { REPLACEMENT_CHAR, isValidCodePoint } from './vt-utils.js';

export type ParserState =
  | 'ground'
  | 'escape'
  | 'csi-entry'
  | 'csi-param'
  | 'osc'
  | 'osc-string'
  | 'charset'
  | 'dec-line-attr';

export type PrivateMarker = '' | '?' | '>' | '!' | '<';

export type VtParserOptions = {
  /** Palette used for SGR 30-37/40-47/90-97/100-107 and 256-color 0-15. */
  palette?: readonly Color[];
  onTitleChange?: (title: string) => void;
};

const ESC = 0x1b;
const BEL = 0x07;
const CAN = 0x18;
const SUB = 0x1a;

const MAX_CSI_PARAM_BYTES = 256;
const MAX_OSC_BYTES = 4096;

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/** Decode a complete 2-4 byte UTF-8 sequence; overlong or out-of-range forms give U+FFFD. */
export function decodeUtf8(bytes: readonly number[]): number {
  let cp: number;
  let min: number;
  switch (bytes.length) {
    case 2:
      cp = ((bytes[0] & 0x1f) << 6) | (bytes[1] & 0x3f);
      min = 0x80;
      break;
    case 3:
      cp = ((bytes[0] & 0x0f) << 12) | ((bytes[1] & 0x3f) << 6) | (bytes[2] & 0x3f);
      min = 0x800;
      break;
    case 4:
      cp = ((bytes[0] & 0x07) << 18) | ((bytes[1] & 0x3f) << 12) | ((bytes[2] & 0x3f) << 6) | (bytes[3] & 0x3f);
      min = 0x10000;
      break;
    default:
      return REPLACEMENT_CHAR;
  }
  if (cp < min || !isValidCodePoint(cp)) return REPLACEMENT_CHAR;
  return cp;
}

function parseParam(text: string): number {
  if (!/^\d+$/.test(text)) return 0;
  const value = Number(text);
  return Number.isSafeInteger(value) ? value : 0;
}

function privateMarkerOf(b: number): PrivateMarker {
  switch (b) {
    case 0x3f: return '?';
    case 0x3e: return '>';
    case 0x21: return '!';
    case 0x3c: return '<';
    default: return '';
  }
}

function decscusrStyle(code: number): CursorStyle {
  switch (code) {
    case 2: return { shape: 'block', blink: 'none' };
    case 3: return { shape: 'underline', blink: 'slow' };
    case 4: return { shape: 'underline', blink: 'none' };
    case 5: return { shape: 'bar', blink: 'slow' };
    case 6: return { shape: 'bar', blink: 'none' };
    default: return { shape: 'block', blink: 'slow' };
  }
}

export class VtParser {
  private state: ParserState = 'ground';

  private params: number[] = [];
  private paramText = '';
  private paramBytes = 0;
  private privateMarker: PrivateMarker = '';
  private intermediate = '';

  private oscCommand = '';
  private oscBytes: number[] = [];

  private utf8Bytes: number[] = [];
  private utf8Need = 0;

  private title = '';
  private readonly palette: readonly Color[];

  constructor(
    private readonly buffer: VtBuffer,
    private readonly options: VtParserOptions = {},
  ) {
    this.palette = options.palette ?? ANSI_COLORS;
  }

  parse(data: Uint8Array): void {
    for (let i = 0; i < data.length; i += 1) {
      this.processByte(data[i]);
    }
  }

  parseString(text: string): void {
    this.parse(encoder.encode(text));
  }

  getState(): ParserState {
    return this.state;
  }

  /** Last title set through OSC 0 or OSC 2. */
  getTitle(): string {
    return this.title;
  }

  /** Drop any partial sequence and return to ground. */
  reset(): void {
    this.state = 'ground';
    this.utf8Bytes = [];
    this.utf8Need = 0;
    this.resetCsi();
    this.oscCommand = '';
    this.oscBytes = [];
  }

  private processByte(b: number): void {
    if (this.utf8Need > 0) {
      if ((b & 0xc0) === 0x80) {
        this.utf8Bytes.push(b);
        this.utf8Need -= 1;
        if (this.utf8Need === 0) {
          const cp = decodeUtf8(this.utf8Bytes);
          this.utf8Bytes = [];
          this.buffer.writeChar(cp);
        }
        return;
      }
      // Not a continuation: drop the partial sequence and handle b afresh.
      incVtMetric('vt_invalid_utf8', { kind: 'truncated' });
      this.utf8Bytes = [];
      this.utf8Need = 0;
    }

    if (this.state === 'ground' && b >= 0x80) {
      if ((b & 0xe0) === 0xc0) { this.startUtf8(b, 1); return; }
      if ((b & 0xf0) === 0xe0) { this.startUtf8(b, 2); return; }
      if ((b & 0xf8) === 0xf0) { this.startUtf8(b, 3); return; }
      incVtMetric('vt_invalid_utf8', { kind: 'stray' });
      return;
    }

    switch (this.state) {
      case 'ground': this.handleGround(b); break;
      case 'escape': this.handleEscape(b); break;
      case 'csi-entry':
      case 'csi-param': this.handleCsi(b); break;
      case 'osc': this.handleOsc(b); break;
      case 'osc-string': this.handleOscString(b); break;
      case 'charset': this.state = 'ground'; break;
      case 'dec-line-attr': this.handleDecLineAttr(b); break;
    }
  }

  private startUtf8(lead: number, need: number): void {
    this.utf8Bytes = [lead];
    this.utf8Need = need;
  }

  private handleGround(b: number): void {
    switch (b) {
      case 0x08: this.buffer.backspace(); return;
      case 0x09: this.buffer.tab(); return;
      case 0x0a:
      case 0x0b:
      case 0x0c: this.buffer.lineFeed(); return;
      case 0x0d: this.buffer.carriageReturn(); return;
      case ESC: this.state = 'escape'; return;
    }
    if (b >= 0x20 && b < 0x7f) {
      this.buffer.writeChar(b);
    }
    // NUL, BEL, DEL and the remaining C0 controls have no effect.
  }

  private handleEscape(b: number): void {
    this.state = 'ground';
    switch (String.fromCharCode(b)) {
      case '[':
        this.resetCsi();
        this.state = 'csi-entry';
        return;
      case ']':
        this.oscCommand = '';
        this.oscBytes = [];
        this.state = 'osc';
        return;
      case '(':
      case ')':
      case '*':
      case '+':
        this.state = 'charset';
        return;
      case '#':
        this.state = 'dec-line-attr';
        return;
      case '7': this.buffer.saveCursor(); return;
      case '8': this.buffer.restoreCursor(); return;
      case 'c': this.buffer.reset(); return;
      case 'D': this.buffer.index(); return;
      case 'E': this.buffer.newline(); return;
      case 'M': this.buffer.reverseIndex(); return;
      // Keypad modes and the tail of an ESC-terminated string.
      case '=':
      case '>':
      case '\\':
        return;
      case '\x1b':
        this.state = 'escape';
        return;
    }
    if (b === CAN || b === SUB) return;
    incVtMetric('vt_unknown_escape', { next: b < 0x20 || b > 0x7e ? `0x${b.toString(16)}` : String.fromCharCode(b) });
  }

  private handleDecLineAttr(b: number): void {
    this.state = 'ground';
    switch (String.fromCharCode(b)) {
      case '3': this.buffer.setLineAttribute('double-top'); return;
      case '4': this.buffer.setLineAttribute('double-bottom'); return;
      case '5': this.buffer.setLineAttribute('normal'); return;
      case '6': this.buffer.setLineAttribute('double-width'); return;
      case '8': this.buffer.fillAlignmentPattern(); return;
    }
    incVtMetric('vt_unknown_escape', { next: '#' });
  }

  // ---------------------------------------------------------------------------
  // CSI
  // ---------------------------------------------------------------------------

  private resetCsi(): void {
    this.params = [];
    this.paramText = '';
    this.paramBytes = 0;
    this.privateMarker = '';
    this.intermediate = '';
  }

  private commitParam(): void {
    this.params.push(parseParam(this.paramText));
    this.paramText = '';
  }

  private abandonCsi(reason: string): void {
    incVtMetric('vt_abandoned_sequence', { kind: 'csi', reason });
    this.resetCsi();
    this.state = 'ground';
  }

  private handleCsi(b: number): void {
    if (this.state === 'csi-entry') {
      this.state = 'csi-param';
      const marker = privateMarkerOf(b);
      if (marker !== '') {
        this.privateMarker = marker;
        return;
      }
    }

    if (b < 0x20) {
      if (b === ESC) {
        this.abandonCsi('escape');
        this.state = 'escape';
        return;
      }
      if (b === CAN || b === SUB) {
        this.abandonCsi('cancel');
        return;
      }
      // C0 controls inside a sequence take effect without ending it.
      this.handleGround(b);
      return;
    }

    if (b >= 0x30 && b <= 0x3f) {
      this.paramBytes += 1;
      if (this.paramBytes > MAX_CSI_PARAM_BYTES) {
        this.abandonCsi('too-long');
        return;
      }
      if (b === 0x3b) {
        this.commitParam();
      } else {
        // Digits; ':' and stray markers make the parameter unparseable (read as 0).
        this.paramText += String.fromCharCode(b);
      }
      return;
    }

    if (b >= 0x20 && b <= 0x2f) {
      this.intermediate = String.fromCharCode(b);
      return;
    }

    if (b >= 0x40 && b <= 0x7e) {
      this.commitParam();
      this.executeCsi(String.fromCharCode(b));
      this.resetCsi();
      this.state = 'ground';
      return;
    }

    if (b === 0x7f) return;
    this.abandonCsi('invalid-byte');
  }

  /** Parameter as a count: omitted or 0 gives the default. */
  private param(index: number, fallback: number): number {
    const value = this.params[index] ?? 0;
    return value > 0 ? value : fallback;
  }

  private executeCsi(final: string): void {
    const buf = this.buffer;

    if (this.intermediate !== '') {
      if (this.intermediate === ' ' && final === 'q' && this.privateMarker === '') {
        buf.setCursorStyle(decscusrStyle(this.param(0, 1)));
      } else {
        incVtMetric('vt_unknown_csi', { final: `${this.intermediate}${final}` });
      }
      return;
    }

    if (this.privateMarker !== '') {
      if (this.privateMarker === '?' && (final === 'h' || final === 'l')) {
        this.setPrivateModes(final === 'h');
      } else {
        incVtMetric('vt_unknown_csi', { final: `${this.privateMarker}${final}` });
      }
      return;
    }

    switch (final) {
      case 'A': buf.moveCursorUp(this.param(0, 1)); break;
      case 'B': buf.moveCursorDown(this.param(0, 1)); break;
      case 'C': buf.moveCursorForward(this.param(0, 1)); break;
      case 'D': buf.moveCursorBackward(this.param(0, 1)); break;
      case 'E':
        buf.moveCursorDown(this.param(0, 1));
        buf.carriageReturn();
        break;
      case 'F':
        buf.moveCursorUp(this.param(0, 1));
        buf.carriageReturn();
        break;
      case 'G':
        buf.setCursor(this.param(0, 1) - 1, buf.getCursor().y);
        break;
      case 'H':
      case 'f':
        buf.setCursor(this.param(1, 1) - 1, this.param(0, 1) - 1);
        break;
      case 'd':
        buf.setCursor(buf.getCursor().x, this.param(0, 1) - 1);
        break;
      case 'J':
        this.eraseInDisplay(this.params[0] ?? 0);
        break;
      case 'K':
        this.eraseInLine(this.params[0] ?? 0);
        break;
      case 'L': buf.insertLines(this.param(0, 1)); break;
      case 'M': buf.deleteLines(this.param(0, 1)); break;
      case 'P': buf.deleteChars(this.param(0, 1)); break;
      case '@': buf.insertChars(this.param(0, 1)); break;
      case 'X': buf.eraseChars(this.param(0, 1)); break;
      case 'S': buf.scrollUp(this.param(0, 1)); break;
      case 'T': buf.scrollDown(this.param(0, 1)); break;
      case 'm':
        buf.setAttributes(applySgr(this.params, buf.getAttributes(), this.palette));
        break;
      case 's': buf.saveCursor(); break;
      case 'u': buf.restoreCursor(); break;
      case 't': this.windowManipulation(); break;
      // Standard (non-private) modes, device status, device attributes and
      // scroll margins are consumed without effect.
      case 'h':
      case 'l':
      case 'n':
      case 'c':
      case 'r':
        break;
      default:
        incVtMetric('vt_unknown_csi', { final });
        break;
    }
  }

  private eraseInDisplay(mode: number): void {
    switch (mode) {
      case 0: this.buffer.clearToEndOfScreen(); break;
      case 1: this.buffer.clearToStartOfScreen(); break;
      case 2:
      case 3:
        this.buffer.clearScreen();
        this.buffer.setCursor(0, 0);
        break;
    }
  }

  private eraseInLine(mode: number): void {
    switch (mode) {
      case 0: this.buffer.clearToEndOfLine(); break;
      case 1: this.buffer.clearToStartOfLine(); break;
      case 2: this.buffer.clearLine(); break;
    }
  }

  private setPrivateModes(enable: boolean): void {
    for (const mode of this.params) {
      switch (mode) {
        case 3:
          this.buffer.set132ColumnMode(enable);
          break;
        case 12: {
          const { shape } = this.buffer.getCursorStyle();
          this.buffer.setCursorStyle({ shape, blink: enable ? 'fast' : 'slow' });
          break;
        }
        case 25:
          this.buffer.setCursorVisible(enable);
          break;
        case 2004:
          this.buffer.setBracketedPasteMode(enable);
          break;
        // Cursor keys, auto-wrap and the alternate screen are accepted without effect.
        case 1:
        case 7:
        case 47:
        case 1047:
        case 1049:
          break;
        default:
          incVtMetric('vt_unknown_private_mode', { mode });
          break;
      }
    }
  }

  /**
   * `CSI 8 ; rows ; cols t` sets the logical size. Extensions:
   * `CSI 9 ; 40 ; 0|1 t` toggles 40-column mode, `CSI 9 ; 25|30|43|50|60 t` sets line density.
   */
  private windowManipulation(): void {
    const [command, arg1, arg2] = this.params;
    if (command === 8) {
      this.buffer.setLogicalSize(arg1 ?? 0, arg2 ?? 0);
      return;
    }
    if (command === 9 && arg1 !== undefined) {
      if (arg1 === 40) {
        this.buffer.set40ColumnMode((arg2 ?? 0) !== 0);
      } else if (isLineDensity(arg1)) {
        this.buffer.setLineDensity(arg1);
      }
    }
  }

  // ---------------------------------------------------------------------------
  // OSC
  // ---------------------------------------------------------------------------

  private handleOsc(b: number): void {
    if (b >= 0x30 && b <= 0x39) {
      this.oscCommand += String.fromCharCode(b);
      return;
    }
    if (b === 0x3b) {
      this.oscBytes = [];
      this.state = 'osc-string';
      return;
    }
    if (b === BEL) {
      this.state = 'ground';
      return;
    }
    incVtMetric('vt_abandoned_sequence', { kind: 'osc', reason: 'invalid-byte' });
    this.state = b === ESC ? 'escape' : 'ground';
  }

  private handleOscString(b: number): void {
    if (b === BEL || b === ESC) {
      this.dispatchOsc();
      // ESC doubles as the string terminator; `ESC \` then ends in ground.
      this.state = b === ESC ? 'escape' : 'ground';
      return;
    }
    if (b === CAN || b === SUB) {
      incVtMetric('vt_abandoned_sequence', { kind: 'osc', reason: 'cancel' });
      this.oscBytes = [];
      this.state = 'ground';
      return;
    }
    if (this.oscBytes.length < MAX_OSC_BYTES) {
      this.oscBytes.push(b);
    }
  }

  private dispatchOsc(): void {
    const command = this.oscCommand;
    const text = decoder.decode(Uint8Array.from(this.oscBytes));
    this.oscBytes = [];

    if (command === '0' || command === '2') {
      this.title = text;
      this.options.onTitleChange?.(text);
      return;
    }
    // Icon name has nowhere to go.
    if (command === '1') return;
    incVtMetric('vt_unknown_osc', { command });
  }
}
