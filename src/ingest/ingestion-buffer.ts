/**
 * Incremental ingestion of top-level JSON values from a text stream.
 *
 * Tracks bracket nesting across chunks, treating string contents as opaque
 * (with escape handling), and emits each top-level value once it closes.
 * Each character is scanned once: text of the value in progress is sliced
 * from the chunk rather than re-read, and emitted text is dropped.
 *
 * Top-level scalars: strings close at their closing quote; bare tokens
 * (numbers, true, false, null) close at the next whitespace, separator or
 * structural character, or when the stream ends (finish()).
 *
 * Malformed input never blocks the stream: the buffer reports a
 * MalformedFragment and, for bracket errors or oversized pending text,
 * skips forward to the next `{`/`[` or whitespace before scanning again.
 */

import { JsonSyntaxError, parseJson } from '../json/parser.js';
import type { JsonValue } from '../json/value.js';

export interface MalformedFragment {
  readonly kind: 'MalformedFragment';
  readonly reason: string;
  /** Stream offset (in characters) where the problem was detected. */
  readonly offset: number;
  /** Start of the offending text, truncated. */
  readonly preview: string;
}

export interface IngestResult {
  /** Top-level values completed by this call, in stream order. */
  values: JsonValue[];
  malformed: MalformedFragment[];
}

export interface IngestionBufferOptions {
  /** Pending text above this many characters is abandoned as malformed. */
  maxPendingChars?: number;
}

type ScanMode = 'idle' | 'container' | 'string' | 'scalar' | 'resync';

const PREVIEW_LENGTH = 40;
const DEFAULT_MAX_PENDING = 16 * 1024 * 1024;

function isSeparator(ch: string): boolean {
  return ch === ' ' || ch === '\n' || ch === '\r' || ch === '\t' || ch === ',' || ch === '\u001e' || ch === '\ufeff';
}

function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\n' || ch === '\r' || ch === '\t';
}

function isStructural(ch: string): boolean {
  return ch === '{' || ch === '}' || ch === '[' || ch === ']' || ch === '"';
}

function closerFor(opener: string): string {
  return opener === '{' ? '}' : ']';
}

function preview(text: string): string {
  return text.length > PREVIEW_LENGTH ? `${text.slice(0, PREVIEW_LENGTH)}…` : text;
}

export class IngestionBuffer {
  private mode: ScanMode = 'idle';
  private pending = '';
  private pendingStart = 0;
  private closers: string[] = [];
  private inString = false;
  private escaped = false;
  private consumedChars = 0;
  private readonly maxPendingChars: number;

  constructor(options: IngestionBufferOptions = {}) {
    this.maxPendingChars = options.maxPendingChars ?? DEFAULT_MAX_PENDING;
  }

  /**
   * Feed a chunk of text. Returns the top-level values (0 or more) that
   * completed within it. Malformed fragments are dropped silently; use
   * feedWithIssues() to see them.
   */
  feed(chunk: string): JsonValue[] {
    return this.feedWithIssues(chunk).values;
  }

  /** Feed a chunk, returning completed values and any malformed fragments. */
  feedWithIssues(chunk: string): IngestResult {
    const result: IngestResult = { values: [], malformed: [] };
    const base = this.consumedChars;
    // Start of the in-progress value's text within this chunk.
    let segmentStart = 0;

    for (let i = 0; i < chunk.length; i++) {
      const ch = chunk[i];

      if (this.mode === 'resync') {
        if (ch === '{' || ch === '[') {
          this.mode = 'idle';
        } else {
          if (isWhitespace(ch)) this.mode = 'idle';
          continue;
        }
      }

      if (this.mode === 'idle') {
        if (isSeparator(ch)) continue;
        if (ch === '}' || ch === ']') {
          this.report(result, 'Unexpected closing bracket', base + i, chunk.slice(i));
          this.mode = 'resync';
          continue;
        }

        this.pending = '';
        this.pendingStart = base + i;
        segmentStart = i;
        if (ch === '{' || ch === '[') {
          this.mode = 'container';
          this.closers.push(closerFor(ch));
        } else if (ch === '"') {
          this.mode = 'string';
          this.escaped = false;
        } else {
          this.mode = 'scalar';
        }
        continue;
      }

      if (this.mode === 'string') {
        if (this.escaped) {
          this.escaped = false;
        } else if (ch === '\\') {
          this.escaped = true;
        } else if (ch === '"') {
          this.complete(result, this.pending + chunk.slice(segmentStart, i + 1));
        }
        continue;
      }

      if (this.mode === 'scalar') {
        if (isSeparator(ch) || isStructural(ch)) {
          this.complete(result, this.pending + chunk.slice(segmentStart, i));
          // The delimiter may start the next value.
          i--;
        }
        continue;
      }

      // Inside a container
      if (this.inString) {
        if (this.escaped) {
          this.escaped = false;
        } else if (ch === '\\') {
          this.escaped = true;
        } else if (ch === '"') {
          this.inString = false;
        }
        continue;
      }

      if (ch === '"') {
        this.inString = true;
        this.escaped = false;
      } else if (ch === '{' || ch === '[') {
        this.closers.push(closerFor(ch));
      } else if (ch === '}' || ch === ']') {
        const expected = this.closers.pop();
        if (ch !== expected) {
          this.report(result, `Expected '${expected}' but found '${ch}'`, base + i, this.pending + chunk.slice(segmentStart, i + 1));
          this.abandon('resync');
        } else if (this.closers.length === 0) {
          this.complete(result, this.pending + chunk.slice(segmentStart, i + 1));
        }
      }
    }

    if (this.isActive()) {
      this.pending += chunk.slice(segmentStart);
      if (this.pending.length > this.maxPendingChars) {
        this.report(result, `Pending value exceeds ${this.maxPendingChars} characters`, this.pendingStart, this.pending);
        this.abandon('resync');
      }
    }

    this.consumedChars += chunk.length;
    return result;
  }

  /**
   * Signal end of stream. A pending bare scalar is completed; any other
   * unfinished value is reported as malformed.
   */
  finish(): IngestResult {
    const result: IngestResult = { values: [], malformed: [] };
    if (this.mode === 'scalar') {
      this.complete(result, this.pending);
    } else if (this.mode === 'container' || this.mode === 'string') {
      this.report(result, 'Unterminated value at end of stream', this.pendingStart, this.pending);
      this.abandon('idle');
    } else {
      this.mode = 'idle';
    }
    return result;
  }

  /** Text of the value in progress, as of the last chunk. */
  getPending(): string {
    return this.pending;
  }

  /** Whether a value is partially buffered. */
  isActive(): boolean {
    return this.mode === 'container' || this.mode === 'string' || this.mode === 'scalar';
  }

  /** Total characters scanned so far. */
  get consumed(): number {
    return this.consumedChars;
  }

  /** Reset all state for reuse. */
  reset(): void {
    this.abandon('idle');
    this.consumedChars = 0;
  }

  private complete(result: IngestResult, text: string): void {
    const start = this.pendingStart;
    this.abandon('idle');
    try {
      result.values.push(parseJson(text));
    } catch (error) {
      if (!(error instanceof JsonSyntaxError)) throw error;
      this.report(result, error.reason, start + error.position, text);
    }
  }

  private abandon(next: 'idle' | 'resync'): void {
    this.mode = next;
    this.pending = '';
    this.closers = [];
    this.inString = false;
    this.escaped = false;
  }

  private report(result: IngestResult, reason: string, offset: number, text: string): void {
    result.malformed.push({ kind: 'MalformedFragment', reason, offset, preview: preview(text) });
  }
}
