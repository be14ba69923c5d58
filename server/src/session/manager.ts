// ============================================================
// Shape Scatter - Session Manager
// Tracks scatter runs and their progress for SSE streaming
// ============================================================

import { SERVER } from '@shared/constants';
import type {
  Catalogue,
  ProgressEvent,
  RunParameters,
  ScatterConfig,
} from '@shared/types';
import { ScatterSession, type Clock } from '../../../src/engine';
import { formatSummary } from '../../../src/cli/summary';

export interface ScatterRun {
  id: string;
  status: 'running' | 'complete' | 'error';
  parameters: RunParameters;
  session: ScatterSession;
  summary?: string;
  error?: string;
  /** SSE listeners for this run */
  listeners: Set<(event: ProgressEvent) => void>;
  createdAt: number;
  /** Pinned runs are never swept (the CLI viewer serves one until exit) */
  pinned: boolean;
}

export interface CreateRunOptions {
  catalogue: Catalogue;
  parameters: RunParameters;
  config?: Partial<ScatterConfig>;
  clock?: Clock;
}

const runs = new Map<string, ScatterRun>();

/** Drops unpinned runs older than SESSION_TTL_MS. */
export function sweepExpiredRuns(now: number = Date.now()): void {
  for (const [id, run] of runs) {
    if (!run.pinned && now - run.createdAt > SERVER.SESSION_TTL_MS) {
      runs.delete(id);
    }
  }
}

// unref so the sweep never keeps the process alive
setInterval(() => sweepExpiredRuns(), SERVER.SESSION_SWEEP_MS).unref();

function nextRunId(): string {
  return `session_${Date.now()}_${Math.random().toString(36).slice(2, 8)}`;
}

/**
 * Creates a run whose session reports every committed or rejected
 * placement to the run's listeners. The run does not start placing
 * shapes until `startRun` is called.
 */
export function createRun(options: CreateRunOptions): ScatterRun {
  const id = nextRunId();
  const session = new ScatterSession({
    catalogue: options.catalogue,
    parameters: options.parameters,
    config: options.config,
    clock: options.clock,
    onPlaced: (placement) => {
      emitProgress(id, { type: 'placed', sessionId: id, placement, count: session.registry.size });
    },
    onRejected: (shape, outcome) => {
      emitProgress(id, { type: 'rejected', sessionId: id, shape, reason: outcome.reason });
    },
  });

  const run: ScatterRun = {
    id,
    status: 'running',
    parameters: options.parameters,
    session,
    listeners: new Set(),
    createdAt: Date.now(),
    pinned: false,
  };
  runs.set(id, run);
  return run;
}

/**
 * Places one shape per event-loop turn until the session deadline, so a
 * run never blocks the server for its whole duration.
 */
export function startRun(run: ScatterRun): void {
  const step = (): void => {
    try {
      if (run.session.done) {
        completeRun(run);
        return;
      }
      run.session.placeNext();
      setImmediate(step);
    } catch (err) {
      failRun(run, err);
    }
  };
  setImmediate(step);
}

/** Registers a session that already ran to completion (CLI viewer). It never expires. */
export function registerCompletedRun(session: ScatterSession, parameters: RunParameters): ScatterRun {
  const run: ScatterRun = {
    id: nextRunId(),
    status: 'running',
    parameters,
    session,
    listeners: new Set(),
    createdAt: Date.now(),
    pinned: true,
  };
  runs.set(run.id, run);
  completeRun(run);
  return run;
}

export function getRun(id: string): ScatterRun | undefined {
  return runs.get(id);
}

export function emitProgress(runId: string, event: ProgressEvent): void {
  const run = runs.get(runId);
  if (!run) return;

  for (const listener of run.listeners) {
    try {
      listener(event);
    } catch (err) {
      console.warn(`[server] Dropping progress listener for ${runId}:`, err);
      run.listeners.delete(listener);
    }
  }
}

export function addListener(
  runId: string,
  listener: (event: ProgressEvent) => void,
): () => void {
  const run = runs.get(runId);
  if (!run) throw new Error(`Session ${runId} not found`);

  run.listeners.add(listener);
  return () => {
    run.listeners.delete(listener);
  };
}

function completeRun(run: ScatterRun): void {
  const result = run.session.result();
  const count = result.placements.length;
  run.summary = formatSummary(result.startedAt, result.endedAt, count);
  run.status = 'complete';
  console.log(`[server] ${run.id} complete: ${run.summary}`);
  emitProgress(run.id, { type: 'complete', sessionId: run.id, count, summary: run.summary });
}

function failRun(run: ScatterRun, err: unknown): void {
  const message = err instanceof Error ? err.message : String(err);
  run.status = 'error';
  run.error = message;
  console.error(`[server] ${run.id} failed:`, message);
  emitProgress(run.id, { type: 'error', sessionId: run.id, error: message });
}
