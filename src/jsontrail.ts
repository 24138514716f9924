#!/usr/bin/env node
import arg from 'arg';

function printHelp(): void {
  console.log(`
jsontrail - Browse streaming JSON as a collapsible tree

Usage:
  jsontrail <file>                 View a file of JSON values
  some-command | jsontrail         View JSON piped on stdin
  jsontrail --command "<cmd>"      View the stdout of a command as it runs
  jsontrail --help                 Show this help

Options:
  -c, --command <cmd>     Run <cmd> in a shell and stream its stdout
  -t, --title <text>      Title shown above the tree
      --config <path>     Config file (default: config.yaml in the install directory)
      --workers <n>       Concurrent flatten tasks (0 flattens inline)
      --max-documents <n> Keep only the latest <n> top-level values
  -h, --help              Show help

Keys:
  up/k down/j pageup/C-b pagedown/C-f home/g end/G   Move
  space/return/tab                                   Toggle
  left/h right/l                                     Collapse / expand
  1-9                                                Collapse to depth
  r                                                  Expand everything
  / n                                                Search, next match
  esc                                                Dismiss warnings
  q, C-c                                             Quit
`);
}

function parseArgs() {
  try {
    return arg({
      '--help': Boolean,
      '--command': String,
      '--title': String,
      '--config': String,
      '--workers': Number,
      '--max-documents': Number,
      '-h': '--help',
      '-c': '--command',
      '-t': '--title',
    }, {
      argv: process.argv.slice(2),
    });
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    console.error('Run jsontrail --help for usage.');
    process.exit(1);
  }
}

// Parse args before config init to handle --help without side effects
const args = parseArgs();

if (args['--help']) {
  printHelp();
  process.exit(0);
}

// Single init point - static imports now safe (help case exited above)
import { fatalExit, getLogConfig, getViewerConfig, initConfig, overrideConfig } from './app/config.js';
import { initLogger, logger } from './app/logger.js';
import { resolveUserPath } from './app/paths.js';
import type { InputSource } from './cli/source.js';

const configPath = args['--config'];
try {
  initConfig(configPath ? resolveUserPath(configPath) : undefined);
  const workers = args['--workers'];
  if (workers !== undefined) overrideConfig({ flatten: { workers } });
} catch (error) {
  fatalExit(error instanceof Error ? error.message : String(error));
}

const maxDocuments = args['--max-documents'];
if (maxDocuments !== undefined && (!Number.isInteger(maxDocuments) || maxDocuments < 1)) {
  fatalExit('--max-documents must be a positive integer');
}

function resolveSource(): InputSource {
  const command = args['--command'];
  const file = args._[0];
  if (command && file) fatalExit('Pass either a file or --command, not both');
  if (command) return { kind: 'command', command };
  if (file && file !== '-') return { kind: 'file', path: resolveUserPath(file) };
  if (process.stdin.isTTY) fatalExit('No input: pass a file, pipe JSON on stdin or use --command');
  return { kind: 'stdin' };
}

const source = resolveSource();
if (!process.stdout.isTTY) fatalExit('stdout is not a terminal');

initLogger(getLogConfig());

function handleFatalError(error: unknown): never {
  logger.fatal({ error });
  logger.flush();
  setTimeout(() => process.exit(1), 200);
  throw error; // never reached, satisfies return type
}

try {
  const { StreamWidget } = await import('./widget/stream-widget.js');
  const { JsonViewer } = await import('./cli/viewer.js');

  logger.info({ source: source.kind }, 'Starting jsontrail');
  const widget = new StreamWidget({ title: args['--title'] ?? getViewerConfig().title });
  const viewer = new JsonViewer(widget, { maxDocuments });
  await viewer.run(source);
  logger.flush();
  process.exit(0);
} catch (error) {
  handleFatalError(error);
}
