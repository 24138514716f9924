/**
 * Interactive viewer host
 *
 * Streams a source into a StreamWidget and drives it from the keyboard on the
 * alternate screen. Frames are redrawn whole, at most once per event loop
 * turn. The bottom line is a status bar, or the search prompt while `/` is
 * being typed.
 */

import { emitKeypressEvents } from 'readline';
import type { Logger } from 'pino';
import { logger } from '../app/logger.js';
import { formatPath, rootPath } from '../json/path.js';
import type { KeyEvent } from '../widget/keymap.js';
import { truncateToWidth } from '../widget/render.js';
import { describeNotice, type StreamWidget } from '../widget/stream-widget.js';
import { openKeyInput, openSource, type InputSource } from './source.js';
import { enterScreen, leaveScreen, terminalSize, writeFrame, type TerminalOutput, type TerminalSize } from './terminal.js';

export interface ViewerOptions {
  /** Keep at most this many documents; older ones are evicted. */
  maxDocuments?: number;
  output?: TerminalOutput;
  size?: () => TerminalSize;
}

export class JsonViewer {
  private readonly log: Logger;
  private readonly output: TerminalOutput;
  private readonly size: () => TerminalSize;
  private readonly maxDocuments: number;
  private prompt: string | null = null;
  private status = 'streaming';
  private message: string | null = null;
  private drawScheduled = false;
  private closed = false;

  constructor(
    private readonly widget: StreamWidget,
    options: ViewerOptions = {},
  ) {
    this.log = logger.child({ component: 'viewer' });
    this.output = options.output ?? process.stdout;
    this.size = options.size ?? (() => terminalSize(process.stdout));
    this.maxDocuments = options.maxDocuments ?? 0;
  }

  /** Show `source` until the user quits. */
  async run(source: InputSource): Promise<void> {
    const { stream, child } = openSource(source);
    const keys = openKeyInput(source);
    emitKeypressEvents(keys);
    keys.setRawMode(true);
    keys.resume();

    const onResize = () => this.requestDraw();
    process.stdout.on('resize', onResize);
    enterScreen(this.output);
    this.requestDraw();

    try {
      await new Promise<void>((resolve, reject) => {
        keys.on('keypress', (str: string | undefined, key: KeyEvent | undefined) => {
          this.handleKeypress(str, key ?? { sequence: str }).then((keepGoing) => {
            if (!keepGoing) resolve();
          }, reject);
        });

        this.pump(stream).catch((error: unknown) => {
          if (this.closed) return;
          this.log.error({ error }, 'Reading input failed');
          this.status = `input error: ${error instanceof Error ? error.message : String(error)}`;
          this.requestDraw();
        });
      });
    } finally {
      this.closed = true;
      process.stdout.off('resize', onResize);
      keys.setRawMode(false);
      keys.pause();
      if (keys !== process.stdin) keys.destroy();
      child?.kill();
      stream.destroy();
      leaveScreen(this.output);
    }
  }

  /** Feed `input` to the widget until it ends, then signal end of stream. */
  async pump(input: AsyncIterable<string>): Promise<void> {
    for await (const chunk of input) {
      if (this.closed) return;
      const outcome = await this.widget.feedText(chunk);
      if (outcome.redraw) this.requestDraw();
      await this.enforceRetention();
    }

    const outcome = await this.widget.finish();
    await this.enforceRetention();
    this.status = 'done';
    this.log.info({ documents: this.widget.documentsSeen, malformed: outcome.malformed.length }, 'Input finished');
    this.requestDraw();
  }

  /** Handle one key. Resolves to false when the viewer should quit. */
  async handleKeypress(str: string | undefined, key: KeyEvent): Promise<boolean> {
    if (key.ctrl && key.name === 'c') return false;

    if (this.prompt !== null) {
      this.editPrompt(this.prompt, str, key);
      this.requestDraw();
      return true;
    }

    if (key.name === 'q' && !key.ctrl && !key.meta && !key.shift) return false;
    this.message = null;

    if (str === '/') {
      this.prompt = '';
    } else if (key.name === 'escape') {
      this.widget.clearNotices();
    } else if (!(await this.widget.handleKey(key))) {
      return true;
    }
    this.requestDraw();
    return true;
  }

  /** Lines of the current frame: widget rows padded to the height, then the status line. */
  frame(): string[] {
    const { width, height } = this.size();
    const body = Math.max(1, height - 1);
    const lines = this.widget.render(width, body);
    while (lines.length < body) lines.push('');
    lines.push(this.statusLine(width));
    return lines;
  }

  private editPrompt(prompt: string, str: string | undefined, key: KeyEvent): void {
    if (key.name === 'return') {
      this.prompt = null;
      if (prompt !== '' && !this.widget.search(prompt)) this.message = `no match for "${prompt}"`;
    } else if (key.name === 'escape') {
      this.prompt = null;
    } else if (key.name === 'backspace') {
      this.prompt = prompt.slice(0, -1);
    } else if (str && str.length === 1 && str >= ' ' && !key.ctrl && !key.meta) {
      this.prompt = prompt + str;
    }
  }

  private statusLine(width: number): string {
    if (this.prompt !== null) return truncateToWidth(`/${this.prompt}`, width);

    const path = this.widget.currentPath();
    const cursor = this.widget.cursor;
    const parts = [
      path ? formatPath(path) : '-',
      cursor === null ? '0/0' : `${cursor + 1}/${this.widget.rowCount}`,
      `${this.widget.documentCount} docs`,
      this.message ?? this.status,
    ];
    const fallback = this.widget.fallback;
    if (fallback) parts.push(describeNotice(fallback));
    return truncateToWidth(parts.join('  '), width);
  }

  private async enforceRetention(): Promise<void> {
    if (this.maxDocuments <= 0 || this.widget.documentCount <= this.maxDocuments) return;
    const dropped = await this.widget.evictBefore(rootPath(this.widget.documentsSeen - this.maxDocuments));
    if (dropped > 0) this.requestDraw();
  }

  private requestDraw(): void {
    if (this.drawScheduled || this.closed) return;
    this.drawScheduled = true;
    setImmediate(() => {
      this.drawScheduled = false;
      if (!this.closed) writeFrame(this.output, this.frame());
    });
  }
}
