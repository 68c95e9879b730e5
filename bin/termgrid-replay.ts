#!/usr/bin/env node
import { runReplay } from '../src/cli/commands/replay.js';

process.exitCode = runReplay(process.argv.slice(2));
