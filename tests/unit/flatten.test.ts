/**
 * Unit tests for sequential flattening and row text
 */

import { describe, it, expect } from 'vitest';
import { CollapseState } from '../../src/collapse/collapse-state.js';
import { flattenDocuments, subtreeWeight, type JsonDocument } from '../../src/flatten/flatten.js';
import { childPath, formatPath, indexSegment, keySegment, rootPath } from '../../src/json/path.js';
import { parseJson } from '../../src/json/parser.js';

const docs = (...texts: string[]): JsonDocument[] => texts.map((text, ordinal) => ({ ordinal, value: parseJson(text) }));

describe('flattenDocuments', () => {
  it('flattens an object depth-first with commas on all but the last child', () => {
    const rows = flattenDocuments(docs('{"a":1,"b":[2,3]}'), new CollapseState());
    expect(rows.map((r) => [r.kind, r.depth, r.text])).toEqual([
      ['object-open', 0, '{'],
      ['scalar-leaf', 1, '"a": 1,'],
      ['array-open', 1, '"b": ['],
      ['scalar-leaf', 2, '2,'],
      ['scalar-leaf', 2, '3'],
      ['array-close', 1, ']'],
      ['object-close', 0, '}'],
    ]);
    expect(rows.map((r) => formatPath(r.path))).toEqual(['$0', '$0.a', '$0.b', '$0.b[0]', '$0.b[1]', '$0.b', '$0']);
  });

  it('marks the value token span and container sizes', () => {
    const rows = flattenDocuments(docs('{"name":"x y","list":[1,2,3]}'), new CollapseState());
    expect(rows[1].span).toEqual([8, 13]);
    expect(rows[1].text.slice(8, 13)).toBe('"x y"');
    expect(rows[2].size).toBe(3);
    expect(rows[0].size).toBe(2);
  });

  it('replaces a collapsed container with one summary row', () => {
    const collapse = new CollapseState();
    collapse.set(childPath(rootPath(0), keySegment('b')), true);
    const rows = flattenDocuments(docs('{"a":1,"b":[2,3],"c":{}}'), collapse);
    expect(rows.map((r) => r.text)).toEqual(['{', '"a": 1,', '"b": […] 2 items,', '"c": {', '}', '}']);
    expect(rows[2]).toMatchObject({ kind: 'collapsed-summary', depth: 1, size: 2, span: [5, 8] });
  });

  it('uses singular labels for one child', () => {
    const collapse = new CollapseState();
    collapse.set(rootPath(0), true);
    collapse.set(rootPath(1), true);
    const rows = flattenDocuments(docs('[1]', '{"k":null}'), collapse);
    expect(rows.map((r) => r.text)).toEqual(['[…] 1 item', '{…} 1 key']);
  });

  it('renders scalars and escapes strings', () => {
    const rows = flattenDocuments(docs('[null,true,false,1e400,"tab\\there"]'), new CollapseState());
    expect(rows.slice(1, -1).map((r) => r.text)).toEqual(['null,', 'true,', 'false,', '1e400,', '"tab\\there"']);
  });

  it('gives top-level values their own root paths and no commas', () => {
    const rows = flattenDocuments(docs('{"x":1}', '{"y":2}', '5'), new CollapseState());
    expect(rows).toHaveLength(7);
    expect(rows.map((r) => formatPath(r.path))).toEqual(['$0', '$0.x', '$0', '$1', '$1.y', '$1', '$2']);
    expect(rows[2].text).toBe('}');
    expect(rows[6].text).toBe('5');
  });

  it('addresses duplicate keys by occurrence', () => {
    const collapse = new CollapseState();
    collapse.set(childPath(rootPath(0), keySegment('k', 1)), true);
    const rows = flattenDocuments(docs('{"k":[1],"k":[2]}'), collapse);
    expect(rows.map((r) => r.text)).toEqual(['{', '"k": [', '1', '],', '"k": […] 1 item', '}']);
    expect(formatPath(rows[4].path)).toBe('$0.k#1');
  });

  it('handles very deep nesting without recursion', () => {
    const depth = 50_000;
    const rows = flattenDocuments(docs('['.repeat(depth) + ']'.repeat(depth)), new CollapseState());
    expect(rows).toHaveLength(depth * 2);
    expect(rows[depth - 1].depth).toBe(depth - 1);
  });

  it('collapses a container deep inside a deeply nested document', () => {
    const depth = 50_000;
    let target = rootPath(0);
    for (let i = 0; i < depth / 2; i++) target = childPath(target, indexSegment(0));
    const collapse = new CollapseState();
    collapse.set(target, true);
    const rows = flattenDocuments(docs('['.repeat(depth) + ']'.repeat(depth)), collapse);
    expect(rows).toHaveLength(depth + 1);
    expect(rows[depth / 2].kind).toBe('collapsed-summary');
    expect(rows[depth / 2].text).toBe('[…] 1 item');
  });

  it('reduces the row count by K - 1 when a K-row subtree collapses', () => {
    const documents = docs('{"a":{"b":[1,2,{"c":3}],"d":4},"e":[]}');
    const expanded = flattenDocuments(documents, new CollapseState());
    const target = childPath(rootPath(0), keySegment('a'));
    const start = expanded.findIndex((r) => formatPath(r.path) === '$0.a');
    let end = start;
    for (let i = start; i < expanded.length; i++) if (formatPath(expanded[i].path) === '$0.a') end = i;
    const k = end - start + 1;

    const collapse = new CollapseState();
    collapse.set(target, true);
    expect(flattenDocuments(documents, collapse)).toHaveLength(expanded.length - (k - 1));

    collapse.set(target, false);
    expect(flattenDocuments(documents, collapse)).toEqual(expanded);
  });
});

describe('subtreeWeight', () => {
  it('counts every node in the subtree', () => {
    expect(subtreeWeight(parseJson('1'))).toBe(1);
    expect(subtreeWeight(parseJson('[]'))).toBe(1);
    expect(subtreeWeight(parseJson('{"a":[1,2],"b":{"c":null}}'))).toBe(6);
  });

  it('gives the same weight on repeated calls', () => {
    const value = parseJson('[[1],[2,3]]');
    expect(subtreeWeight(value)).toBe(6);
    if (value.type !== 'array') throw new Error('expected array');
    expect(subtreeWeight(value.items[1])).toBe(3);
    expect(subtreeWeight(value)).toBe(6);
  });
});
