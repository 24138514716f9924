/**
 * Structural addresses of JSON nodes.
 *
 * A path starts with the ordinal of the top-level document in the stream,
 * followed by array indices and object keys. Object keys carry the occurrence
 * number among equal keys of the same object so duplicate keys stay
 * addressable.
 *
 * Paths are linked to their parent, so extending one costs the same at any
 * depth. The string form and the segment list are built only on request.
 */

export type PathSegment =
  | { readonly type: 'index'; readonly index: number }
  | { readonly type: 'key'; readonly key: string; readonly occurrence: number };

export interface JsonPath {
  readonly document: number;
  readonly parent: JsonPath | null;
  /** Last segment; null on a document root. */
  readonly segment: PathSegment | null;
  /** Number of segments. */
  readonly depth: number;
  /** Structural fingerprint: equal paths always share it. */
  readonly hash: number;
}

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

function mix(hash: number, value: number): number {
  return Math.imul(hash ^ value, 0x01000193) >>> 0;
}

function segmentHash(segment: PathSegment): number {
  if (segment.type === 'index') return mix(0x9e3779b9, segment.index);
  let hash = mix(0x85ebca6b, segment.occurrence);
  for (let i = 0; i < segment.key.length; i++) hash = mix(hash, segment.key.charCodeAt(i));
  return hash;
}

export function rootPath(document: number): JsonPath {
  return { document, parent: null, segment: null, depth: 0, hash: mix(0x811c9dc5, document) };
}

export function indexSegment(index: number): PathSegment {
  return { type: 'index', index };
}

export function keySegment(key: string, occurrence = 0): PathSegment {
  return { type: 'key', key, occurrence };
}

export function childPath(parent: JsonPath, segment: PathSegment): JsonPath {
  return {
    document: parent.document,
    parent,
    segment,
    depth: parent.depth + 1,
    hash: mix(parent.hash, segmentHash(segment)),
  };
}

export function parentPath(path: JsonPath): JsonPath | null {
  return path.parent;
}

/** The ancestor with `depth` segments, or the path itself when it is not deeper. */
export function ancestorAt(path: JsonPath, depth: number): JsonPath {
  let current = path;
  while (current.depth > depth && current.parent) current = current.parent;
  return current;
}

/** Segments from the document root down. */
export function pathSegments(path: JsonPath): PathSegment[] {
  const segments: PathSegment[] = [];
  for (let current: JsonPath | null = path; current; current = current.parent) {
    if (current.segment) segments.push(current.segment);
  }
  return segments.reverse();
}

export function lastKey(path: JsonPath): string | undefined {
  return path.segment?.type === 'key' ? path.segment.key : undefined;
}

function formatSegment(segment: PathSegment): string {
  if (segment.type === 'index') return `[${segment.index}]`;
  const base = IDENTIFIER.test(segment.key) ? `.${segment.key}` : `[${JSON.stringify(segment.key)}]`;
  return segment.occurrence > 0 ? `${base}#${segment.occurrence}` : base;
}

/**
 * Canonical string form, e.g. `$0.items[3]["display name"]`.
 * Distinct paths always format to distinct strings.
 */
export function formatPath(path: JsonPath): string {
  return `$${path.document}` + pathSegments(path).map(formatSegment).join('');
}

function segmentsEqual(a: PathSegment, b: PathSegment): boolean {
  if (a.type === 'index') return b.type === 'index' && a.index === b.index;
  return b.type === 'key' && a.key === b.key && a.occurrence === b.occurrence;
}

export function pathsEqual(a: JsonPath, b: JsonPath): boolean {
  if (a.document !== b.document || a.depth !== b.depth || a.hash !== b.hash) return false;
  let x: JsonPath | null = a;
  let y: JsonPath | null = b;
  while (x && y && x !== y) {
    if (x.segment && y.segment && !segmentsEqual(x.segment, y.segment)) return false;
    x = x.parent;
    y = y.parent;
  }
  return true;
}
