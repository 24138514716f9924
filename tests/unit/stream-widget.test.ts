/**
 * Unit tests for StreamWidget
 *
 * Covers ingestion through rendering: row layout, collapse, cursor movement,
 * search, eviction, notices and key handling.
 */

import { describe, it, expect } from 'vitest';
import type { DisplayRow } from '../../src/flatten/display-row.js';
import { FlatteningEngine } from '../../src/flatten/engine.js';
import { formatPath, rootPath } from '../../src/json/path.js';
import { StreamWidget, type StreamWidgetOptions } from '../../src/widget/stream-widget.js';

const SAMPLE = '{"a":1,"b":[2,3]}';

function createWidget(options: StreamWidgetOptions = {}): StreamWidget {
  return new StreamWidget({ title: '', color: false, height: 50, ...options });
}

const texts = (widget: StreamWidget) => widget.currentRowsInView().map((r) => r.text);

describe('StreamWidget', () => {
  describe('feeding', () => {
    it('starts empty', () => {
      const widget = createWidget();
      expect(widget.state).toBe('empty');
      expect(widget.rowCount).toBe(0);
      expect(widget.cursor).toBeNull();
      expect(widget.currentPath()).toBeNull();
      expect(widget.isIdle()).toBe(false);
    });

    it('flattens a completed value into rows', async () => {
      const widget = createWidget();
      const outcome = await widget.feed(SAMPLE);
      expect(outcome).toEqual({ completed: 1, malformed: [], redraw: true });
      expect(widget.state).toBe('streaming');
      expect(widget.rowCount).toBe(7);
      expect(widget.cursor).toBe(0);
      expect(widget.viewportStart).toBe(0);
      expect(widget.currentRowsInView().map((r) => [r.kind, r.depth, r.text])).toEqual([
        ['object-open', 0, '{'],
        ['scalar-leaf', 1, '"a": 1,'],
        ['array-open', 1, '"b": ['],
        ['scalar-leaf', 2, '2,'],
        ['scalar-leaf', 2, '3'],
        ['array-close', 1, ']'],
        ['object-close', 0, '}'],
      ]);
    });

    it('does not redraw for a partial value', async () => {
      const widget = createWidget();
      expect(await widget.feed('{"a"')).toEqual({ completed: 0, malformed: [], redraw: false });
      expect(widget.isIdle()).toBe(false);
      expect((await widget.feed(':1}')).completed).toBe(1);
      expect(widget.isIdle()).toBe(true);
    });

    it('gives each top-level value its own document', async () => {
      const widget = createWidget();
      await widget.feed('{"x":1}');
      await widget.feed('{"y":2}');
      expect(widget.documentCount).toBe(2);
      expect(widget.rowCount).toBe(6);
      const rows = widget.currentRowsInView();
      expect(formatPath(rows[0].path)).toBe('$0');
      expect(formatPath(rows[3].path)).toBe('$1');
    });

    it('reports an unterminated value at end of stream without changing rows', async () => {
      const widget = createWidget();
      await widget.feed('[1]');
      await widget.feed('{"a":');
      const outcome = await widget.finish();
      expect(outcome.completed).toBe(0);
      expect(outcome.malformed).toHaveLength(1);
      expect(widget.rowCount).toBe(3);
      expect(widget.notices).toEqual([
        { kind: 'MalformedFragment', reason: 'Unterminated value at end of stream', offset: 3, preview: '{"a":' },
      ]);
    });

    it('completes a trailing bare scalar at end of stream', async () => {
      const widget = createWidget();
      await widget.feed('[1] 42');
      expect(widget.rowCount).toBe(3);
      await widget.finish();
      expect(texts(widget)).toEqual(['[', '1', ']', '42']);
    });

    it('gives the same rows for any chunking', async () => {
      const input = '{"a":[1,{"b":"x}y"}]} 42 "s" [true,null]\n{"k":1,"k":2}';
      const whole = createWidget();
      await whole.feed(input);
      await whole.finish();

      for (const size of [1, 3, 8]) {
        const widget = createWidget();
        for (let i = 0; i < input.length; i += size) await widget.feed(input.slice(i, i + size));
        await widget.finish();
        expect(widget.currentRowsInView()).toEqual(whole.currentRowsInView());
      }
    });

    it('keeps only the latest notices', async () => {
      const widget = createWidget({ maxNotices: 2 });
      await widget.feed('] } ]');
      expect(widget.notices).toHaveLength(2);
      expect(widget.notices.map((n) => (n.kind === 'MalformedFragment' ? n.offset : -1))).toEqual([2, 4]);
      expect(widget.clearNotices()).toBe(true);
      expect(widget.notices).toEqual([]);
    });

    it('records a notice when parallel flattening falls back', async () => {
      class FailingEngine extends FlatteningEngine {
        protected override runTask(): Promise<DisplayRow[]> {
          return Promise.reject(new Error('worker lost'));
        }
      }
      const widget = createWidget({ engine: new FailingEngine({ workers: 2, parallelThreshold: 4 }) });
      await widget.feed('[[1,2,3],[4,5,6],[7,8,9]]');
      expect(widget.rowCount).toBe(17);
      expect(widget.notices).toEqual([{ kind: 'ParallelFallback', reason: 'worker lost', tasks: 3 }]);
    });

    it('keeps a parallel fallback out of the drawn lines', async () => {
      class FailingEngine extends FlatteningEngine {
        protected override runTask(): Promise<DisplayRow[]> {
          return Promise.reject(new Error('worker lost'));
        }
      }
      const widget = createWidget({ engine: new FailingEngine({ workers: 2, parallelThreshold: 4 }) });
      await widget.feed('[[1,2,3],[4,5,6],[7,8,9]]');
      const lines = widget.render(80, 30);
      expect(lines).toHaveLength(17);
      expect(lines[0]).toBe('[');
      expect(lines[16]).toBe(']');
      expect(widget.fallback).toEqual({ kind: 'ParallelFallback', reason: 'worker lost', tasks: 3 });
    });

    it('keeps at least one notice when maxNotices is 0', async () => {
      const widget = createWidget({ maxNotices: 0 });
      await widget.feed('] ] ]');
      expect(widget.notices).toHaveLength(1);
      expect(widget.notices.map((n) => (n.kind === 'MalformedFragment' ? n.offset : -1))).toEqual([4]);
    });
  });

  describe('collapse', () => {
    it('collapses the container under the cursor into a summary row', async () => {
      const widget = createWidget();
      await widget.feed(SAMPLE);
      widget.moveCursorTo(2);

      expect(await widget.toggleAtCursor()).toBe(true);
      expect(widget.rowCount).toBe(4);
      expect(widget.cursor).toBe(2);
      const summary = widget.currentRowsInView()[2];
      expect(summary).toMatchObject({ kind: 'collapsed-summary', depth: 1, size: 2, text: '"b": […] 2 items' });

      expect(await widget.toggleAtCursor()).toBe(true);
      expect(widget.rowCount).toBe(7);
      expect(widget.cursor).toBe(2);
    });

    it('moves the cursor to the summary when toggled from a closing row', async () => {
      const widget = createWidget();
      await widget.feed(SAMPLE);
      widget.moveCursorTo(5);
      await widget.toggleAtCursor();
      expect(widget.cursor).toBe(2);
      expect(widget.currentRowsInView()[2].kind).toBe('collapsed-summary');
    });

    it('ignores toggles on scalars and on an empty widget', async () => {
      const empty = createWidget();
      expect(await empty.toggleAtCursor()).toBe(false);

      const widget = createWidget();
      await widget.feed(SAMPLE);
      widget.moveCursorTo(1);
      expect(await widget.toggleAtCursor()).toBe(false);
      expect(widget.rowCount).toBe(7);
    });

    it('keeps collapse state while more values arrive', async () => {
      const widget = createWidget();
      await widget.feed(SAMPLE);
      widget.moveCursorTo(2);
      await widget.toggleAtCursor();
      await widget.feed('[1]');
      expect(texts(widget)).toEqual(['{', '"a": 1,', '"b": […] 2 items', '}', '[', '1', ']']);
      expect(widget.cursor).toBe(2);
    });

    it('sets collapse explicitly and reports no-ops', async () => {
      const widget = createWidget();
      await widget.feed(SAMPLE);
      widget.moveCursorTo(2);
      expect(await widget.setCollapsedAtCursor(false)).toBe(false);
      expect(await widget.setCollapsedAtCursor(true)).toBe(true);
      expect(await widget.setCollapsedAtCursor(true)).toBe(false);
      expect(widget.rowCount).toBe(4);
    });

    it('resets all collapse state', async () => {
      const widget = createWidget();
      await widget.feed(SAMPLE);
      expect(await widget.resetCollapse()).toBe(false);
      widget.moveCursorTo(2);
      await widget.toggleAtCursor();
      expect(await widget.resetCollapse()).toBe(true);
      expect(widget.rowCount).toBe(7);
      expect(widget.cursor).toBe(2);
    });

    it('collapses every container at a depth', async () => {
      const widget = createWidget();
      await widget.feed('{"a":{"b":1},"c":[1,2],"d":3}');
      widget.moveCursorTo(2);

      expect(await widget.collapseToDepth(1)).toBe(2);
      expect(texts(widget)).toEqual(['{', '"a": {…} 1 key,', '"c": […] 2 items,', '"d": 3', '}']);
      expect(widget.cursor).toBe(1);

      expect(await widget.collapseToDepth(0)).toBe(1);
      expect(texts(widget)).toEqual(['{…} 3 keys']);
      expect(widget.cursor).toBe(0);
    });
  });

  describe('cursor', () => {
    it('ignores movement with no rows', () => {
      const widget = createWidget();
      expect(widget.moveCursor(1)).toBe(false);
      expect(widget.pageDown()).toBe(false);
      expect(widget.moveToParent()).toBe(false);
    });

    it('clamps movement to the rows', async () => {
      const widget = createWidget();
      await widget.feed(SAMPLE);
      expect(widget.moveCursor(1)).toBe(true);
      expect(widget.cursor).toBe(1);
      expect(widget.moveCursor(-5)).toBe(true);
      expect(widget.cursor).toBe(0);
      expect(widget.moveCursor(-1)).toBe(false);
      expect(widget.moveCursorTo(100)).toBe(true);
      expect(widget.cursor).toBe(6);
    });

    it('pages by the viewport height and scrolls minimally', async () => {
      const widget = createWidget({ height: 3 });
      await widget.feed(SAMPLE);
      expect(widget.pageDown()).toBe(true);
      expect(widget.cursor).toBe(3);
      expect(widget.viewportStart).toBe(1);
      expect(texts(widget)).toEqual(['"a": 1,', '"b": [', '2,']);
      expect(widget.pageUp()).toBe(true);
      expect(widget.cursor).toBe(0);
      expect(widget.viewportStart).toBe(0);
    });

    it('jumps to the enclosing container', async () => {
      const widget = createWidget();
      await widget.feed(SAMPLE);
      widget.moveCursorTo(3);
      expect(widget.moveToParent()).toBe(true);
      expect(widget.cursor).toBe(2);
      expect(widget.moveToParent()).toBe(true);
      expect(widget.cursor).toBe(0);
      expect(widget.moveToParent()).toBe(false);
    });

    it('searches case-insensitively and wraps around', async () => {
      const widget = createWidget();
      await widget.feed('{"Name":"x","list":["name"]}');
      expect(widget.search('NAME')).toBe(true);
      expect(widget.cursor).toBe(1);
      expect(widget.searchNext()).toBe(true);
      expect(widget.cursor).toBe(3);
      expect(widget.searchNext()).toBe(true);
      expect(widget.cursor).toBe(1);
      expect(widget.search('missing')).toBe(false);
      expect(widget.cursor).toBe(1);
    });
  });

  describe('eviction', () => {
    it('drops older documents and keeps the cursor on its row', async () => {
      const widget = createWidget();
      await widget.feed('[1] [2] [3]');
      widget.moveCursorTo(7);
      expect(await widget.evictBefore(rootPath(2))).toBe(2);
      expect(widget.documentCount).toBe(1);
      expect(widget.documentsSeen).toBe(3);
      expect(texts(widget)).toEqual(['[', '3', ']']);
      expect(widget.cursor).toBe(1);
      expect(await widget.evictBefore(rootPath(2))).toBe(0);
    });

    it('moves the cursor to the top when its document was evicted', async () => {
      const widget = createWidget();
      await widget.feed('[1] [2]');
      widget.moveCursorTo(1);
      await widget.evictBefore(rootPath(1));
      expect(widget.cursor).toBe(0);
      expect(formatPath(widget.currentPath() ?? rootPath(-1))).toBe('$1');
    });
  });

  describe('operation ordering', () => {
    it('runs a toggle after the feed submitted before it', async () => {
      const widget = createWidget();
      const fed = widget.feed(SAMPLE);
      const toggled = widget.toggleAtCursor();
      await Promise.all([fed, toggled]);
      expect(await toggled).toBe(true);
      expect(texts(widget)).toEqual(['{…} 2 keys']);
    });
  });

  describe('render', () => {
    it('draws the title and the visible rows, indented', async () => {
      const widget = createWidget({ title: 'Events' });
      await widget.feed(SAMPLE);
      expect(widget.render(40, 5)).toEqual(['Events', '{', '  "a": 1,', '  "b": [', '    2,']);
      expect(widget.height).toBe(4);
    });

    it('truncates lines to the width', async () => {
      const widget = createWidget();
      await widget.feed(SAMPLE);
      expect(widget.render(6, 3)).toEqual(['{', '  "a"…', '  "b"…']);
    });

    it('shows the latest notice on the last line', async () => {
      const widget = createWidget();
      await widget.feed('{"a":');
      await widget.finish();
      expect(widget.render(80, 5)).toEqual(['Malformed JSON at offset 0: Unterminated value at end of stream']);
    });

    it('never returns more lines than the height', async () => {
      const widget = createWidget({ title: 'T' });
      await widget.feed('[1,2]');
      await widget.feed(']');
      expect(widget.notices).toHaveLength(1);

      expect(widget.render(40, 1)).toEqual(['[']);
      expect(widget.height).toBe(1);

      const two = widget.render(40, 2);
      expect(two).toHaveLength(2);
      expect(two[0]).toBe('[');
      expect(two[1].startsWith('Malformed JSON at offset 5')).toBe(true);

      const three = widget.render(40, 3);
      expect(three).toHaveLength(3);
      expect(three.slice(0, 2)).toEqual(['T', '[']);

      expect(widget.render(40, 0)).toEqual([]);
    });

    it('keeps the cursor visible when the height shrinks', async () => {
      const widget = createWidget();
      await widget.feed(SAMPLE);
      widget.moveCursorTo(6);
      expect(widget.render(20, 2)).toEqual(['  ]', '}']);
      expect(widget.viewportStart).toBe(5);
    });
  });

  describe('handleKey', () => {
    it('moves with the default bindings', async () => {
      const widget = createWidget();
      await widget.feed(SAMPLE);
      expect(await widget.handleKey({ name: 'j' })).toBe(true);
      expect(await widget.handleKey({ name: 'down' })).toBe(true);
      expect(widget.cursor).toBe(2);
      expect(await widget.handleKey({ name: 'k' })).toBe(true);
      expect(widget.cursor).toBe(1);
      expect(await widget.handleKey({ name: 'g', shift: true })).toBe(true);
      expect(widget.cursor).toBe(6);
      expect(await widget.handleKey({ name: 'g' })).toBe(true);
      expect(widget.cursor).toBe(0);
    });

    it('toggles, collapses and expands', async () => {
      const widget = createWidget();
      await widget.feed(SAMPLE);
      widget.moveCursorTo(2);
      expect(await widget.handleKey({ name: 'space' })).toBe(true);
      expect(widget.rowCount).toBe(4);
      expect(await widget.handleKey({ name: 'l' })).toBe(true);
      expect(widget.rowCount).toBe(7);
      expect(await widget.handleKey({ name: 'left' })).toBe(true);
      expect(widget.rowCount).toBe(4);

      // On a summary or scalar row, collapse jumps to the parent
      expect(await widget.handleKey({ name: 'h' })).toBe(true);
      expect(widget.cursor).toBe(0);
      expect(widget.rowCount).toBe(4);
    });

    it('collapses to the depth of a digit key and resets with r', async () => {
      const widget = createWidget();
      await widget.feed(SAMPLE);
      expect(await widget.handleKey({ name: '2' })).toBe(true);
      expect(texts(widget)).toEqual(['{', '"a": 1,', '"b": […] 2 items', '}']);
      expect(await widget.handleKey({ name: 'r' })).toBe(true);
      expect(widget.rowCount).toBe(7);
    });

    it('finds the next search match with n', async () => {
      const widget = createWidget();
      await widget.feed(SAMPLE);
      widget.search('2');
      expect(widget.cursor).toBe(3);
      expect(await widget.handleKey({ name: 'n' })).toBe(true);
      expect(widget.cursor).toBe(3);
    });

    it('ignores unbound keys', async () => {
      const widget = createWidget();
      await widget.feed(SAMPLE);
      expect(await widget.handleKey({ name: 'x' })).toBe(false);
      expect(await widget.handleKey({ name: 'j', ctrl: true })).toBe(false);
    });

    it('uses a custom keymap', async () => {
      const widget = createWidget({ keymap: { down: ['s'] } });
      await widget.feed(SAMPLE);
      expect(await widget.handleKey({ name: 'j' })).toBe(false);
      expect(await widget.handleKey({ name: 's' })).toBe(true);
      expect(widget.cursor).toBe(1);
    });
  });
});
