/**
 * Collapse state keyed by structural path.
 *
 * Absent entries mean "expanded", so memory grows with interaction rather
 * than with the document. Entries are bucketed by path fingerprint, so a
 * lookup costs the same at any depth unless the fingerprint matches.
 */

import { pathsEqual, type JsonPath } from '../json/path.js';

/** Read-only view handed to the flattening engine. */
export interface CollapseStateReader {
  isCollapsed(path: JsonPath): boolean;
}

export class CollapseState implements CollapseStateReader {
  private readonly buckets = new Map<number, JsonPath[]>();
  private order: JsonPath[] = [];

  isCollapsed(path: JsonPath): boolean {
    return this.find(path) !== undefined;
  }

  set(path: JsonPath, collapsed: boolean): void {
    const existing = this.find(path);
    if (collapsed) {
      if (existing) return;
      const bucket = this.buckets.get(path.hash);
      if (bucket) bucket.push(path);
      else this.buckets.set(path.hash, [path]);
      this.order.push(path);
    } else if (existing) {
      this.remove(existing);
    }
  }

  /** Flip the state for a path; returns the new state. */
  toggle(path: JsonPath): boolean {
    const next = !this.isCollapsed(path);
    this.set(path, next);
    return next;
  }

  clear(): void {
    this.buckets.clear();
    this.order = [];
  }

  /** Drop entries belonging to documents with an ordinal below `document`. */
  deleteDocumentsBefore(document: number): number {
    const stale = this.order.filter((path) => path.document < document);
    for (const path of stale) this.remove(path);
    return stale.length;
  }

  get size(): number {
    return this.order.length;
  }

  /** Collapsed paths, in the order they were collapsed. */
  entries(): JsonPath[] {
    return [...this.order];
  }

  private find(path: JsonPath): JsonPath | undefined {
    return this.buckets.get(path.hash)?.find((entry) => pathsEqual(entry, path));
  }

  private remove(path: JsonPath): void {
    const bucket = this.buckets.get(path.hash);
    if (bucket) {
      const rest = bucket.filter((entry) => entry !== path);
      if (rest.length > 0) this.buckets.set(path.hash, rest);
      else this.buckets.delete(path.hash);
    }
    this.order = this.order.filter((entry) => entry !== path);
  }
}
