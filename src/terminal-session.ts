import { VtBuffer } from './terminal/vt-buffer.js';
import { VtParser } from './terminal/vt-parser.js';
import { createRedrawScheduler } from './terminal/redraw-scheduler.js';
import {
  resolveTerminalConfig,
  type TerminalConfig,
  type TerminalConfigOptions,
} from './config/terminal-config.js';

export type CreateTerminalOptions = TerminalConfigOptions & {
  /** Environment to read TERMGRID_* from. Defaults to `process.env`. */
  env?: Record<string, string | undefined>;
  /** Called at most once per event-loop turn after the buffer changes. */
  onRedraw?: (buffer: VtBuffer) => void;
  onTitleChange?: (title: string) => void;
};

export type TerminalSession = {
  buffer: VtBuffer;
  parser: VtParser;
  config: TerminalConfig;
  write: (data: Uint8Array | string) => void;
  /** Run a pending redraw now. */
  flush: () => void;
  dispose: () => void;
};

/**
 * Wire a buffer and parser from resolved configuration.
 * Throws TerminalConfigError for invalid options or environment.
 */
export function createTerminal(options: CreateTerminalOptions = {}): TerminalSession {
  const { env, onRedraw, onTitleChange, ...configOptions } = options;
  const config = resolveTerminalConfig(configOptions, env);
  const buffer = new VtBuffer(config.cols, config.rows, config.maxScrollback);
  const parser = new VtParser(buffer, { palette: config.colorScheme.palette, onTitleChange });

  const scheduler = onRedraw ? createRedrawScheduler(() => onRedraw(buffer)) : undefined;
  if (scheduler) buffer.setDirtyCallback(scheduler.notify);

  return {
    buffer,
    parser,
    config,
    write: (data) => {
      if (typeof data === 'string') {
        parser.parseString(data);
      } else {
        parser.parse(data);
      }
    },
    flush: () => scheduler?.flush(),
    dispose: () => {
      scheduler?.dispose();
      buffer.setDirtyCallback(undefined);
    },
  };
}
