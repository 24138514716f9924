import { lastKey, type JsonPath } from '../json/path.js';
import { childCount, scalarText, type JsonContainer, type JsonScalar } from '../json/value.js';

export type RowKind =
  | 'scalar-leaf'
  | 'array-open'
  | 'array-close'
  | 'object-open'
  | 'object-close'
  | 'collapsed-summary';

export interface DisplayRow {
  readonly path: JsonPath;
  readonly depth: number;
  readonly kind: RowKind;
  /** Unindented line text, e.g. `"a": 1,`. */
  readonly text: string;
  /** [start, end) of the value token within `text`. */
  readonly span: readonly [number, number];
  /** Element or key count, on open and summary rows. */
  readonly size?: number;
}

/** Where a node sits: its path, depth and whether it is the last sibling. */
export interface NodePlacement {
  readonly path: JsonPath;
  readonly depth: number;
  readonly isLast: boolean;
}

function keyPrefix(path: JsonPath): string {
  const key = lastKey(path);
  return key === undefined ? '' : `${JSON.stringify(key)}: `;
}

function comma(isLast: boolean): string {
  return isLast ? '' : ',';
}

export function scalarRow(value: JsonScalar, at: NodePlacement): DisplayRow {
  const prefix = keyPrefix(at.path);
  const token = scalarText(value);
  return {
    path: at.path,
    depth: at.depth,
    kind: 'scalar-leaf',
    text: prefix + token + comma(at.isLast),
    span: [prefix.length, prefix.length + token.length],
  };
}

export function openRow(value: JsonContainer, at: NodePlacement): DisplayRow {
  const prefix = keyPrefix(at.path);
  return {
    path: at.path,
    depth: at.depth,
    kind: value.type === 'array' ? 'array-open' : 'object-open',
    text: prefix + (value.type === 'array' ? '[' : '{'),
    span: [prefix.length, prefix.length + 1],
    size: childCount(value),
  };
}

export function closeRow(value: JsonContainer, at: NodePlacement): DisplayRow {
  return {
    path: at.path,
    depth: at.depth,
    kind: value.type === 'array' ? 'array-close' : 'object-close',
    text: (value.type === 'array' ? ']' : '}') + comma(at.isLast),
    span: [0, 1],
  };
}

function countLabel(value: JsonContainer, size: number): string {
  const noun = value.type === 'array' ? 'item' : 'key';
  return `${size} ${noun}${size === 1 ? '' : 's'}`;
}

export function summaryRow(value: JsonContainer, at: NodePlacement): DisplayRow {
  const prefix = keyPrefix(at.path);
  const size = childCount(value);
  const token = value.type === 'array' ? '[…]' : '{…}';
  return {
    path: at.path,
    depth: at.depth,
    kind: 'collapsed-summary',
    text: `${prefix}${token} ${countLabel(value, size)}${comma(at.isLast)}`,
    span: [prefix.length, prefix.length + token.length],
    size,
  };
}

export function isContainerRow(row: DisplayRow): boolean {
  return row.kind !== 'scalar-leaf';
}
