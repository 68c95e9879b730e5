import { readFileSync } from 'fs';
import { parseArgs } from 'util';
import chalk from 'chalk';
import { createTerminal } from '../../terminal-session.js';
import { snapshotFrame, snapshotText } from '../../capture/vt-snapshot.js';
import { renderFrameAnsi } from '../../capture/ansi-render.js';
import { getVtMetricSnapshot } from '../../terminal/vt-diagnostics.js';
import {
  TerminalConfigError,
  parseColorSchemeJson,
  resolveTerminalConfig,
  serializeColorScheme,
} from '../../config/terminal-config.js';
import type { ColorScheme } from '../../terminal/vt-types.js';

export const REPLAY_CHUNK_SIZE = 4096;

export const REPLAY_USAGE =
  'Usage: termgrid-replay <file> [--cols N] [--rows N] [--scrollback N] [--plain] [--stats] [--scheme FILE] [--print-scheme]';

export type ReplayIo = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env?: Record<string, string | undefined>;
};

const defaultIo: ReplayIo = {
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
};

function toNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Replay a captured terminal byte stream and print the final screen.
 * Returns the process exit code.
 */
export function runReplay(argv: string[], io: ReplayIo = defaultIo): number {
  let parsed;
  try {
    parsed = parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        cols: { type: 'string' },
        rows: { type: 'string' },
        scrollback: { type: 'string' },
        plain: { type: 'boolean', default: false },
        stats: { type: 'boolean', default: false },
        scheme: { type: 'string' },
        'print-scheme': { type: 'boolean', default: false },
      },
    });
  } catch (error) {
    io.stderr(chalk.red(errorMessage(error)));
    io.stderr(chalk.gray(REPLAY_USAGE));
    return 1;
  }
  const { values, positionals } = parsed;

  let colorScheme: ColorScheme | undefined;
  if (values.scheme !== undefined) {
    let text: string;
    try {
      text = readFileSync(values.scheme, 'utf8');
    } catch (error) {
      io.stderr(chalk.red(`Cannot read scheme ${values.scheme}: ${errorMessage(error)}`));
      return 1;
    }
    try {
      colorScheme = parseColorSchemeJson(text);
    } catch (error) {
      if (!(error instanceof TerminalConfigError)) throw error;
      io.stderr(chalk.red(`Invalid ${error.field}: ${error.message}`));
      return 1;
    }
  }

  const configOptions = {
    cols: toNumber(values.cols),
    rows: toNumber(values.rows),
    maxScrollback: toNumber(values.scrollback),
    colorScheme,
  };

  if (values['print-scheme']) {
    try {
      const config = resolveTerminalConfig(configOptions, io.env);
      io.stdout(JSON.stringify(serializeColorScheme(config.colorScheme), null, 2));
      return 0;
    } catch (error) {
      if (!(error instanceof TerminalConfigError)) throw error;
      io.stderr(chalk.red(`Invalid ${error.field}: ${error.message}`));
      return 1;
    }
  }

  const [file] = positionals;
  if (!file) {
    io.stderr(chalk.red('Missing input file.'));
    io.stderr(chalk.gray(REPLAY_USAGE));
    return 1;
  }

  let data: Buffer;
  try {
    data = readFileSync(file);
  } catch (error) {
    io.stderr(chalk.red(`Cannot read ${file}: ${errorMessage(error)}`));
    return 1;
  }

  let session;
  try {
    session = createTerminal({ ...configOptions, env: io.env });
  } catch (error) {
    if (!(error instanceof TerminalConfigError)) throw error;
    io.stderr(chalk.red(`Invalid ${error.field}: ${error.message}`));
    return 1;
  }

  for (let offset = 0; offset < data.length; offset += REPLAY_CHUNK_SIZE) {
    session.write(data.subarray(offset, offset + REPLAY_CHUNK_SIZE));
  }

  const { buffer, parser, config } = session;
  if (values.plain) {
    io.stdout(snapshotText(buffer));
  } else {
    io.stdout(renderFrameAnsi(snapshotFrame(buffer, { scheme: config.colorScheme })));
  }

  const title = parser.getTitle();
  if (title) io.stderr(chalk.gray(`title: ${title}`));

  if (values.stats) {
    const cursor = buffer.getCursor();
    io.stderr(chalk.cyan(`bytes: ${data.length}`));
    io.stderr(chalk.cyan(`cursor: ${cursor.y + 1};${cursor.x + 1}`));
    io.stderr(chalk.cyan(`scrollback: ${buffer.getScrollbackSize()}`));
    for (const [key, count] of Object.entries(getVtMetricSnapshot()).sort(([a], [b]) => a.localeCompare(b))) {
      io.stderr(chalk.yellow(`${key}: ${count}`));
    }
  }

  session.dispose();
  return 0;
}
