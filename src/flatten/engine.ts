/**
 * FlatteningEngine - fans large flattens out over a bounded task pool
 *
 * The planner walks the documents top-down. Expanded containers whose subtree
 * reaches `parallelThreshold` nodes are split: their open and close rows are
 * emitted inline and their children planned in turn. Consecutive smaller
 * siblings are grouped into tasks of at least `parallelThreshold` nodes.
 *
 * Each task flattens its siblings independently into its own row segment.
 * Segments are concatenated in plan order, so the output is identical to a
 * sequential flatten whatever the pool size or completion order.
 */

import PQueue from 'p-queue';
import { setImmediate as yieldToEventLoop } from 'timers/promises';
import type { Logger } from 'pino';
import { logger } from '../app/logger.js';
import type { CollapseStateReader } from '../collapse/collapse-state.js';
import { isContainer } from '../json/value.js';
import { closeRow, openRow, type DisplayRow } from './display-row.js';
import {
  childJobs,
  documentJob,
  flattenSubtrees,
  subtreeWeight,
  type JsonDocument,
  type SubtreeJob,
} from './flatten.js';

export interface FlattenEngineOptions {
  /** Concurrent tasks; 0 flattens inline. */
  workers: number;
  /** Node count below which work is not split. */
  parallelThreshold: number;
  logger?: Logger;
}

export type FlattenMode = 'sequential' | 'parallel' | 'fallback';

export interface FlattenResult {
  rows: DisplayRow[];
  mode: FlattenMode;
  /** Number of tasks dispatched to the pool. */
  tasks: number;
  /** Why a parallel flatten fell back to sequential. */
  error?: Error;
}

export type PlanPiece =
  | { kind: 'rows'; rows: DisplayRow[] }
  | { kind: 'task'; jobs: SubtreeJob[] };

interface PlanFrame {
  jobs: SubtreeJob[];
  next: number;
  close: DisplayRow | null;
}

/** Split documents into inline rows and independent flatten tasks, in output order. */
export function planFlatten(
  documents: readonly JsonDocument[],
  collapse: CollapseStateReader,
  threshold: number,
): PlanPiece[] {
  const pieces: PlanPiece[] = [];
  const frames: PlanFrame[] = [{ jobs: documents.map(documentJob), next: 0, close: null }];
  let batch: SubtreeJob[] = [];
  let batchWeight = 0;

  const flush = () => {
    if (batch.length === 0) return;
    pieces.push({ kind: 'task', jobs: batch });
    batch = [];
    batchWeight = 0;
  };

  while (frames.length > 0) {
    const frame = frames[frames.length - 1];
    if (frame.next >= frame.jobs.length) {
      flush();
      if (frame.close) pieces.push({ kind: 'rows', rows: [frame.close] });
      frames.pop();
      continue;
    }

    const job = frame.jobs[frame.next++];
    const weight = subtreeWeight(job.node);
    if (weight >= threshold && isContainer(job.node) && !collapse.isCollapsed(job.at.path)) {
      flush();
      pieces.push({ kind: 'rows', rows: [openRow(job.node, job.at)] });
      frames.push({ jobs: childJobs(job.node, job.at), next: 0, close: closeRow(job.node, job.at) });
      continue;
    }

    batch.push(job);
    batchWeight += weight;
    if (batchWeight >= threshold) flush();
  }

  return pieces;
}

export class FlatteningEngine {
  private readonly pool: PQueue | null;
  private readonly threshold: number;
  private readonly log: Logger;

  constructor(options: FlattenEngineOptions) {
    this.pool = options.workers > 0 ? new PQueue({ concurrency: options.workers }) : null;
    this.threshold = Math.max(1, options.parallelThreshold);
    this.log = options.logger ?? logger.child({ component: 'flatten' });
  }

  async flatten(documents: readonly JsonDocument[], collapse: CollapseStateReader): Promise<FlattenResult> {
    const jobs = documents.map(documentJob);
    let total = 0;
    for (const job of jobs) total += subtreeWeight(job.node);

    if (!this.pool || total < this.threshold) {
      return { rows: flattenSubtrees(jobs, collapse), mode: 'sequential', tasks: 0 };
    }

    const pieces = planFlatten(documents, collapse, this.threshold);
    const tasks = pieces.filter((piece) => piece.kind === 'task').length;
    if (tasks <= 1) {
      return { rows: flattenSubtrees(jobs, collapse), mode: 'sequential', tasks: 0 };
    }

    try {
      const segments = await Promise.all(
        pieces.map((piece) => (piece.kind === 'rows' ? piece.rows : this.runTask(piece.jobs, collapse))),
      );
      this.log.debug({ tasks, rows: segments.reduce((n, s) => n + s.length, 0) }, 'Parallel flatten complete');
      return { rows: segments.flat(), mode: 'parallel', tasks };
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.log.warn({ error: err, tasks }, 'Parallel flatten failed, flattening sequentially');
      return { rows: flattenSubtrees(jobs, collapse), mode: 'fallback', tasks, error: err };
    }
  }

  /** Run one task on the pool. */
  protected runTask(jobs: SubtreeJob[], collapse: CollapseStateReader): Promise<DisplayRow[]> {
    const pool = this.pool;
    if (!pool) return Promise.resolve(flattenSubtrees(jobs, collapse));
    return pool.add(
      async () => {
        await yieldToEventLoop();
        return flattenSubtrees(jobs, collapse);
      },
      { throwOnTimeout: true },
    );
  }

  /** Tasks queued or running. */
  get pending(): number {
    return this.pool ? this.pool.size + this.pool.pending : 0;
  }
}
