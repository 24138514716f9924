/**
 * StreamWidget - interactive tree view over a stream of JSON values
 *
 * Ties the pieces together: chunks go through the ingestion buffer, completed
 * values are kept as documents, the flattening engine turns documents plus
 * collapse state into display rows and the viewport keeps the cursor visible.
 *
 * Every operation that flattens is run on a serial operation queue, so a
 * flatten and the mutation that triggered it never interleave with another
 * operation. Cursor movement only reads the current rows and runs inline.
 *
 * The widget does no terminal I/O: hosts feed text, pass key events to
 * handleKey() and draw the lines returned by render().
 */

import type { Logger } from 'pino';
import { getFlattenConfig, getKeymapConfig, getMaxPendingChars, getViewerConfig } from '../app/config.js';
import type { ItemAttribute, KeymapConfig } from '../app/config.js';
import { logger } from '../app/logger.js';
import { CollapseState } from '../collapse/collapse-state.js';
import { isContainerRow, type DisplayRow, type RowKind } from '../flatten/display-row.js';
import { FlatteningEngine } from '../flatten/engine.js';
import { childJobs, documentJob, type JsonDocument, type SubtreeJob } from '../flatten/flatten.js';
import { IngestionBuffer, type IngestResult, type MalformedFragment } from '../ingest/ingestion-buffer.js';
import { ancestorAt, formatPath, parentPath, pathsEqual, type JsonPath } from '../json/path.js';
import { isContainer } from '../json/value.js';
import { OperationQueue } from '../queue/manager.js';
import { reposition, visibleRange } from '../viewport/viewport.js';
import { Keymap, type KeyCommand, type KeyEvent } from './keymap.js';
import { RowRenderer } from './render.js';

export type WidgetState = 'empty' | 'streaming';

export interface ParallelFallbackNotice {
  readonly kind: 'ParallelFallback';
  readonly reason: string;
  readonly tasks: number;
}

export type WidgetNotice = MalformedFragment | ParallelFallbackNotice;

export interface FeedOutcome {
  /** Top-level values completed by this call. */
  completed: number;
  malformed: MalformedFragment[];
  /** Whether the host should draw again. */
  redraw: boolean;
}

export interface StreamWidgetOptions {
  title?: string;
  /** Visible rows; render() adjusts it to the space it is given. */
  height?: number;
  indent?: number;
  color?: boolean;
  maxNotices?: number;
  activeItem?: ItemAttribute;
  inactiveItem?: ItemAttribute;
  maxPendingChars?: number;
  keymap?: KeymapConfig;
  /** Shared engine; one is created from the flatten config otherwise. */
  engine?: FlatteningEngine;
  logger?: Logger;
}

export class StreamWidget {
  private readonly buffer: IngestionBuffer;
  private readonly engine: FlatteningEngine;
  private readonly collapse = new CollapseState();
  private readonly queue = new OperationQueue();
  private readonly keymap: Keymap;
  private readonly renderer: RowRenderer;
  private readonly log: Logger;
  private readonly title: string;
  private readonly maxNotices: number;

  private documents: JsonDocument[] = [];
  private nextOrdinal = 0;
  private rows: DisplayRow[] = [];
  private cursorIndex = 0;
  private start = 0;
  private viewHeight: number;
  private fed = false;
  private noticeList: WidgetNotice[] = [];
  private query = '';

  constructor(options: StreamWidgetOptions = {}) {
    const viewer = getViewerConfig();
    this.log = options.logger ?? logger.child({ component: 'widget' });
    this.title = options.title ?? viewer.title;
    this.maxNotices = Math.max(1, Math.floor(options.maxNotices ?? viewer.maxNotices));
    this.viewHeight = Math.max(1, options.height ?? 20);
    this.buffer = new IngestionBuffer({ maxPendingChars: options.maxPendingChars ?? getMaxPendingChars() });
    this.engine = options.engine ?? new FlatteningEngine(getFlattenConfig());
    this.keymap = new Keymap(options.keymap ?? getKeymapConfig());
    this.renderer = new RowRenderer({
      indent: options.indent ?? viewer.indent,
      color: options.color ?? viewer.color,
      activeItem: options.activeItem ?? viewer.activeItem,
      inactiveItem: options.inactiveItem ?? viewer.inactiveItem,
    });
  }

  // ============================================
  // Input
  // ============================================

  /** Feed a chunk of text. Re-flattens only when a value completed. */
  feed(chunk: string): Promise<FeedOutcome> {
    return this.queue.add(async () => {
      this.fed = true;
      return this.absorb(this.buffer.feedWithIssues(chunk));
    });
  }

  feedText(chunk: string): Promise<FeedOutcome> {
    return this.feed(chunk);
  }

  /** End of stream: completes a pending bare scalar, reports anything unterminated. */
  finish(): Promise<FeedOutcome> {
    return this.queue.add(async () => this.absorb(this.buffer.finish()));
  }

  /** Drop documents before the one `path` belongs to. Returns how many were dropped. */
  evictBefore(path: JsonPath): Promise<number> {
    return this.queue.add(async () => {
      const keep = this.documents.filter((doc) => doc.ordinal >= path.document);
      const dropped = this.documents.length - keep.length;
      if (dropped === 0) return 0;

      const anchor = this.rows[this.cursorIndex];
      this.documents = keep;
      this.collapse.deleteDocumentsBefore(path.document);
      const kept = anchor && anchor.path.document >= path.document ? anchor : undefined;
      if (!kept) this.cursorIndex = 0;
      await this.reflatten(kept?.path, kept?.kind);
      this.log.debug({ dropped, documents: this.documents.length }, 'Evicted documents');
      return dropped;
    });
  }

  // ============================================
  // Collapse
  // ============================================

  /** Toggle the container under the cursor. False on scalars or with no rows. */
  toggleAtCursor(): Promise<boolean> {
    return this.queue.add(async () => {
      const row = this.containerAtCursor();
      if (!row) return false;
      const collapsed = this.collapse.toggle(row.path);
      this.log.debug({ path: formatPath(row.path), collapsed }, 'Toggled container');
      await this.reflatten(row.path);
      return true;
    });
  }

  /** Collapse or expand the container under the cursor. False when nothing changed. */
  setCollapsedAtCursor(collapsed: boolean): Promise<boolean> {
    return this.queue.add(async () => {
      const row = this.containerAtCursor();
      if (!row || this.collapse.isCollapsed(row.path) === collapsed) return false;
      this.collapse.set(row.path, collapsed);
      await this.reflatten(row.path);
      return true;
    });
  }

  /** Expand everything. */
  resetCollapse(): Promise<boolean> {
    return this.queue.add(async () => {
      if (this.collapse.size === 0) return false;
      const anchor = this.rows[this.cursorIndex];
      this.collapse.clear();
      await this.reflatten(anchor?.path, anchor?.kind);
      return true;
    });
  }

  /**
   * Collapse every container at `depth` (0 = top-level values) and expand
   * everything above it. Returns the number of collapsed containers.
   */
  collapseToDepth(depth: number): Promise<number> {
    return this.queue.add(async () => {
      const target = Math.max(0, Math.floor(depth));
      const current = this.rows[this.cursorIndex];
      this.collapse.clear();

      let count = 0;
      const stack: SubtreeJob[] = this.documents.map(documentJob);
      for (let job = stack.pop(); job; job = stack.pop()) {
        const { node, at } = job;
        if (!isContainer(node)) continue;
        if (at.depth === target) {
          this.collapse.set(at.path, true);
          count++;
        } else if (at.depth < target) {
          stack.push(...childJobs(node, at));
        }
      }

      // Keep the cursor on the cursor row's ancestor at the collapsed depth
      await this.reflatten(current ? ancestorAt(current.path, target) : undefined);
      this.log.debug({ depth: target, collapsed: count }, 'Collapsed to depth');
      return count;
    });
  }

  // ============================================
  // Cursor
  // ============================================

  /** Move the cursor by `delta` rows. Returns whether anything moved. */
  moveCursor(delta: number): boolean {
    return this.moveCursorTo(this.cursorIndex + delta);
  }

  moveCursorTo(index: number): boolean {
    if (this.rows.length === 0) {
      this.log.debug('Cursor move with no rows');
      return false;
    }
    const before = { cursor: this.cursorIndex, start: this.start };
    this.cursorIndex = index;
    this.applyViewport();
    return before.cursor !== this.cursorIndex || before.start !== this.start;
  }

  pageUp(): boolean {
    return this.moveCursor(-this.viewHeight);
  }

  pageDown(): boolean {
    return this.moveCursor(this.viewHeight);
  }

  /** Move to the opening row of the enclosing container. */
  moveToParent(): boolean {
    const row = this.rows[this.cursorIndex];
    const parent = row ? parentPath(row.path) : null;
    if (!parent) return false;
    const index = this.indexOfPath(parent);
    return index >= 0 && this.moveCursorTo(index);
  }

  /** Jump to the next row containing `query` (case-insensitive), wrapping around. */
  search(query: string): boolean {
    this.query = query.toLowerCase();
    return this.searchNext();
  }

  searchNext(): boolean {
    if (this.query === '' || this.rows.length === 0) return false;
    const count = this.rows.length;
    for (let step = 1; step <= count; step++) {
      const index = (this.cursorIndex + step) % count;
      if (this.rows[index].text.toLowerCase().includes(this.query)) {
        this.moveCursorTo(index);
        return true;
      }
    }
    return false;
  }

  // ============================================
  // Host contract
  // ============================================

  currentRowsInView(): DisplayRow[] {
    const [from, to] = visibleRange(this.start, this.viewHeight, this.rows.length);
    return this.rows.slice(from, to);
  }

  /** Set the number of visible rows. */
  resize(height: number): void {
    this.viewHeight = Math.max(1, Math.floor(height));
    this.applyViewport();
  }

  /**
   * Lines to draw in a `width` x `height` area, never more than `height`:
   * the title (when set), the visible rows and a warning for the latest
   * malformed fragment. When space runs short the title goes first, then the
   * warning; at least one row is always kept.
   */
  render(width: number, height: number): string[] {
    const available = Math.floor(height);
    if (available < 1) return [];

    const warning = this.latestMalformed();
    const showWarning = warning !== undefined && available >= 2;
    const showTitle = this.title !== '' && available >= 2 + (showWarning ? 1 : 0);
    const rowsHeight = available - (showTitle ? 1 : 0) - (showWarning ? 1 : 0);
    if (rowsHeight !== this.viewHeight) this.resize(rowsHeight);

    const lines: string[] = [];
    if (showTitle) lines.push(this.renderer.line(this.title, width, 'title'));
    const [from, to] = visibleRange(this.start, this.viewHeight, this.rows.length);
    for (let i = from; i < to; i++) {
      lines.push(this.renderer.render(this.rows[i], width, i === this.cursorIndex));
    }
    if (showWarning && warning) lines.push(this.renderer.line(describeNotice(warning), width, 'warning'));
    return lines;
  }

  /** Run the action bound to `key`. Resolves to whether a redraw is needed. */
  async handleKey(key: KeyEvent): Promise<boolean> {
    const command = this.keymap.resolve(key);
    return command ? this.dispatch(command) : false;
  }

  clearNotices(): boolean {
    if (this.noticeList.length === 0) return false;
    this.noticeList = [];
    return true;
  }

  /** Resolves once every queued operation has finished. */
  waitForIdle(): Promise<void> {
    return this.queue.waitForIdle();
  }

  // ============================================
  // Accessors
  // ============================================

  get rowCount(): number {
    return this.rows.length;
  }

  /** Row index under the cursor, or null when there are no rows. */
  get cursor(): number | null {
    return this.rows.length === 0 ? null : this.cursorIndex;
  }

  get viewportStart(): number {
    return this.start;
  }

  get height(): number {
    return this.viewHeight;
  }

  get documentCount(): number {
    return this.documents.length;
  }

  /** Documents completed since the stream started, evicted ones included. */
  get documentsSeen(): number {
    return this.nextOrdinal;
  }

  get state(): WidgetState {
    return this.fed ? 'streaming' : 'empty';
  }

  get notices(): readonly WidgetNotice[] {
    return this.noticeList;
  }

  /** Latest parallel flatten fallback, for the host's status line. */
  get fallback(): ParallelFallbackNotice | null {
    for (let i = this.noticeList.length - 1; i >= 0; i--) {
      const notice = this.noticeList[i];
      if (notice.kind === 'ParallelFallback') return notice;
    }
    return null;
  }

  /** Path of the row under the cursor. */
  currentPath(): JsonPath | null {
    return this.rows[this.cursorIndex]?.path ?? null;
  }

  /** Streaming, with no partial value buffered. */
  isIdle(): boolean {
    return this.fed && !this.buffer.isActive();
  }

  // ============================================
  // Internals
  // ============================================

  private async dispatch(command: KeyCommand): Promise<boolean> {
    switch (command.type) {
      case 'up':
        return this.moveCursor(-1);
      case 'down':
        return this.moveCursor(1);
      case 'pageUp':
        return this.pageUp();
      case 'pageDown':
        return this.pageDown();
      case 'first':
        return this.moveCursorTo(0);
      case 'last':
        return this.moveCursorTo(this.rows.length - 1);
      case 'toggle':
        return this.toggleAtCursor();
      case 'collapse': {
        const row = this.rows[this.cursorIndex];
        if (row && (row.kind === 'scalar-leaf' || row.kind === 'collapsed-summary')) return this.moveToParent();
        return this.setCollapsedAtCursor(true);
      }
      case 'expand':
        return this.setCollapsedAtCursor(false);
      case 'reset':
        return this.resetCollapse();
      case 'searchNext':
        return this.searchNext();
      case 'collapseToDepth':
        await this.collapseToDepth(command.depth);
        return this.rows.length > 0;
    }
  }

  private async absorb(result: IngestResult): Promise<FeedOutcome> {
    for (const fragment of result.malformed) {
      this.log.warn({ reason: fragment.reason, offset: fragment.offset }, 'Malformed JSON fragment');
      this.addNotice(fragment);
    }

    for (const value of result.values) {
      this.documents.push({ ordinal: this.nextOrdinal++, value });
    }
    if (result.values.length > 0) await this.reflatten();

    return {
      completed: result.values.length,
      malformed: result.malformed,
      redraw: result.values.length > 0 || result.malformed.length > 0,
    };
  }

  /**
   * Rebuild the rows. With an anchor, the cursor moves onto that node's row
   * (its opening or summary row unless `kind` says otherwise).
   */
  private async reflatten(anchor?: JsonPath, kind?: RowKind): Promise<void> {
    const result = await this.engine.flatten(this.documents, this.collapse);
    if (result.mode === 'fallback') {
      this.addNotice({
        kind: 'ParallelFallback',
        reason: result.error?.message ?? 'unknown error',
        tasks: result.tasks,
      });
    }
    this.rows = result.rows;

    if (anchor) {
      const index = this.indexOfPath(anchor, kind);
      if (index >= 0) this.cursorIndex = index;
    }
    this.applyViewport();
  }

  private latestMalformed(): MalformedFragment | undefined {
    for (let i = this.noticeList.length - 1; i >= 0; i--) {
      const notice = this.noticeList[i];
      if (notice.kind === 'MalformedFragment') return notice;
    }
    return undefined;
  }

  private indexOfPath(path: JsonPath, kind?: RowKind): number {
    let fallback = -1;
    for (let i = 0; i < this.rows.length; i++) {
      const row = this.rows[i];
      if (!pathsEqual(row.path, path)) continue;
      if (kind === undefined || row.kind === kind) return i;
      if (fallback < 0) fallback = i;
    }
    return fallback;
  }

  private containerAtCursor(): DisplayRow | null {
    const row = this.rows[this.cursorIndex];
    if (!row) {
      this.log.debug('Collapse with no rows');
      return null;
    }
    if (!isContainerRow(row)) {
      this.log.debug({ path: formatPath(row.path) }, 'No container at cursor');
      return null;
    }
    return row;
  }

  private applyViewport(): void {
    const next = reposition({
      cursor: this.cursorIndex,
      rowCount: this.rows.length,
      height: this.viewHeight,
      viewportStart: this.start,
    });
    this.start = next.viewportStart;
    this.cursorIndex = next.cursor ?? 0;
  }

  private addNotice(notice: WidgetNotice): void {
    this.noticeList.push(notice);
    if (this.noticeList.length > this.maxNotices) {
      this.noticeList = this.noticeList.slice(-this.maxNotices);
    }
  }
}

export function describeNotice(notice: WidgetNotice): string {
  if (notice.kind === 'MalformedFragment') {
    return `Malformed JSON at offset ${notice.offset}: ${notice.reason}`;
  }
  return `sequential flatten (${notice.reason})`;
}
