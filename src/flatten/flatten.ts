/**
 * Sequential depth-first flattening of JSON documents into display rows.
 *
 * Iterative rather than recursive, so arbitrarily deep documents do not hit
 * the call stack limit.
 */

import type { CollapseStateReader } from '../collapse/collapse-state.js';
import { childPath, indexSegment, keySegment, rootPath } from '../json/path.js';
import { isContainer, type JsonContainer, type JsonValue } from '../json/value.js';
import { closeRow, openRow, scalarRow, summaryRow, type DisplayRow, type NodePlacement } from './display-row.js';

/** A completed top-level value and its position in the stream. */
export interface JsonDocument {
  readonly ordinal: number;
  readonly value: JsonValue;
}

/** A subtree to flatten, with where it sits in its document. */
export interface SubtreeJob {
  readonly node: JsonValue;
  readonly at: NodePlacement;
}

type Step = { kind: 'visit'; job: SubtreeJob } | { kind: 'emit'; row: DisplayRow };

export function documentJob(document: JsonDocument): SubtreeJob {
  return { node: document.value, at: { path: rootPath(document.ordinal), depth: 0, isLast: true } };
}

/** Placement of each direct child of a container, in document order. */
export function childJobs(node: JsonContainer, at: NodePlacement): SubtreeJob[] {
  const depth = at.depth + 1;
  if (node.type === 'array') {
    const last = node.items.length - 1;
    return node.items.map((item, index) => ({
      node: item,
      at: { path: childPath(at.path, indexSegment(index)), depth, isLast: index === last },
    }));
  }

  const seen = new Map<string, number>();
  const last = node.entries.length - 1;
  return node.entries.map((entry, index) => {
    const occurrence = seen.get(entry.key) ?? 0;
    seen.set(entry.key, occurrence + 1);
    return {
      node: entry.value,
      at: { path: childPath(at.path, keySegment(entry.key, occurrence)), depth, isLast: index === last },
    };
  });
}

/** Flatten subtrees in order, appending to `out`. */
export function flattenSubtrees(
  jobs: readonly SubtreeJob[],
  collapse: CollapseStateReader,
  out: DisplayRow[] = [],
): DisplayRow[] {
  const stack: Step[] = [];
  for (let i = jobs.length - 1; i >= 0; i--) stack.push({ kind: 'visit', job: jobs[i] });

  for (let step = stack.pop(); step; step = stack.pop()) {
    if (step.kind === 'emit') {
      out.push(step.row);
      continue;
    }

    const { node, at } = step.job;
    if (!isContainer(node)) {
      out.push(scalarRow(node, at));
    } else if (collapse.isCollapsed(at.path)) {
      out.push(summaryRow(node, at));
    } else {
      out.push(openRow(node, at));
      stack.push({ kind: 'emit', row: closeRow(node, at) });
      const children = childJobs(node, at);
      for (let i = children.length - 1; i >= 0; i--) stack.push({ kind: 'visit', job: children[i] });
    }
  }

  return out;
}

export function flattenDocuments(documents: readonly JsonDocument[], collapse: CollapseStateReader): DisplayRow[] {
  return flattenSubtrees(documents.map(documentJob), collapse);
}

const weights = new WeakMap<JsonContainer, number>();

function children(node: JsonContainer): readonly JsonValue[] {
  return node.type === 'array' ? node.items : node.entries.map((e) => e.value);
}

/** Node count of a subtree (itself included), cached per container. */
export function subtreeWeight(node: JsonValue): number {
  if (!isContainer(node)) return 1;
  const cached = weights.get(node);
  if (cached !== undefined) return cached;

  const stack: Array<{ node: JsonContainer; expanded: boolean }> = [{ node, expanded: false }];
  while (stack.length > 0) {
    const top = stack[stack.length - 1];
    if (weights.has(top.node)) {
      stack.pop();
      continue;
    }

    const kids = children(top.node);
    if (!top.expanded) {
      top.expanded = true;
      for (const child of kids) {
        if (isContainer(child) && !weights.has(child)) stack.push({ node: child, expanded: false });
      }
      continue;
    }

    let total = 1;
    for (const child of kids) total += isContainer(child) ? (weights.get(child) ?? 1) : 1;
    weights.set(top.node, total);
    stack.pop();
  }

  return weights.get(node) ?? 1;
}
