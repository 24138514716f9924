/**
 * Where the viewer reads JSON from: a file, stdin or a subprocess's stdout.
 */

import { spawn, type ChildProcess } from 'child_process';
import { createReadStream, openSync } from 'fs';
import type { Readable } from 'stream';
import { ReadStream } from 'tty';
import { logger } from '../app/logger.js';

export type InputSource =
  | { kind: 'file'; path: string }
  | { kind: 'stdin' }
  | { kind: 'command'; command: string };

export interface OpenedSource {
  stream: Readable;
  child: ChildProcess | null;
}

export function openSource(source: InputSource): OpenedSource {
  switch (source.kind) {
    case 'file':
      return { stream: createReadStream(source.path, { encoding: 'utf8' }), child: null };
    case 'stdin':
      process.stdin.setEncoding('utf8');
      return { stream: process.stdin, child: null };
    case 'command': {
      const log = logger.child({ component: 'source' });
      const child = spawn(source.command, { shell: true, stdio: ['ignore', 'pipe', 'pipe'] });
      child.stdout.setEncoding('utf8');
      child.stderr.setEncoding('utf8');
      child.stderr.on('data', (text: string) => log.warn({ stderr: text.trimEnd() }, 'Command stderr'));
      child.on('exit', (code, signal) => log.info({ code, signal }, 'Command exited'));
      return { stream: child.stdout, child };
    }
  }
}

/**
 * Terminal to read keys from. When stdin carries the data, keys come from
 * the controlling terminal instead.
 */
export function openKeyInput(source: InputSource): ReadStream {
  if (source.kind !== 'stdin' && process.stdin.isTTY) return process.stdin;
  return new ReadStream(openSync('/dev/tty', 'r'));
}
