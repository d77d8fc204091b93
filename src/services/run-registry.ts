import { randomUUID } from 'node:crypto';
import type { RunOptions, RunResult } from '../bot.js';
import { describeError, RunConflictError } from '../errors.js';
import type { LedgerFiles } from './ledger.js';
import type { FrozenRunConfig, RunSummary } from '../types/index.js';
import { logger } from '../utils/logger.js';

export type RunStatus = 'running' | 'completed' | 'failed' | 'terminated';

export type RunExecutor = (config: FrozenRunConfig, options: RunOptions) => Promise<RunResult>;

export interface RunListener {
  send: (event: 'log' | 'status', data: string) => void;
  end: () => void;
}

export interface RunState {
  id: string;
  status: RunStatus;
  startedAt: Date;
  finishedAt: Date | null;
  logs: string[];
  listeners: Set<RunListener>;
  controller: AbortController;
  summary: RunSummary | null;
  files: LedgerFiles | null;
  error: string | null;
  /** Settles once the run has finished and its listeners are closed. */
  done: Promise<void>;
}

export interface RunView {
  id: string;
  status: RunStatus;
  startedAt: string;
  finishedAt: string | null;
  summary: RunSummary | null;
  files: LedgerFiles | null;
  error: string | null;
}

export interface RunRegistryLimits {
  /** Finished runs kept for status and replay; older ones are forgotten. */
  maxFinishedRuns: number;
  /** Log lines kept per run for late subscribers. */
  maxLogLines: number;
}

const DEFAULT_LIMITS: RunRegistryLimits = { maxFinishedRuns: 20, maxLogLines: 2000 };

/**
 * Runs started by the worker, with their log backlog and live listeners.
 * At most one run is active at a time since a run owns the browser.
 */
export class RunRegistry {
  private readonly runs = new Map<string, RunState>();
  private activeId: string | null = null;
  private readonly limits: RunRegistryLimits;

  constructor(
    private readonly execute: RunExecutor,
    private readonly newId: () => string = randomUUID,
    limits: Partial<RunRegistryLimits> = {}
  ) {
    this.limits = { ...DEFAULT_LIMITS, ...limits };
  }

  get active(): RunState | undefined {
    return this.activeId ? this.runs.get(this.activeId) : undefined;
  }

  get(id: string): RunState | undefined {
    return this.runs.get(id);
  }

  start(config: FrozenRunConfig): RunState {
    if (this.activeId) throw new RunConflictError(this.activeId);

    const run: RunState = {
      id: this.newId(),
      status: 'running',
      startedAt: new Date(),
      finishedAt: null,
      logs: [],
      listeners: new Set(),
      controller: new AbortController(),
      summary: null,
      files: null,
      error: null,
      done: Promise.resolve(),
    };
    this.runs.set(run.id, run);
    this.activeId = run.id;

    logger.addLogSink(run.id, (entry) => this.pushLog(run, entry.message));
    this.pushLog(run, 'Run started.');

    run.done = logger
      .withRunContext(run.id, () => this.execute(config, { signal: run.controller.signal }))
      .then((result) => {
        run.summary = result.summary;
        run.files = result.files;
        run.status = result.aborted || run.controller.signal.aborted ? 'terminated' : 'completed';
      })
      .catch((error: unknown) => {
        run.error = describeError(error);
        run.status = run.controller.signal.aborted ? 'terminated' : 'failed';
        this.pushLog(run, `Run failed: ${run.error}`);
      })
      .finally(() => {
        run.finishedAt = new Date();
        logger.removeLogSink(run.id);
        if (this.activeId === run.id) this.activeId = null;
        this.pushLog(run, `Run ${run.status}.`);
        this.finish(run);
        this.evictFinished();
      });

    return run;
  }

  /** Ask a running run to stop before its next candidate. */
  end(id: string): 'requested' | 'not-found' | 'not-running' {
    const run = this.runs.get(id);
    if (!run) return 'not-found';
    if (run.status !== 'running') return 'not-running';
    run.controller.abort();
    this.pushLog(run, 'Termination requested.');
    return 'requested';
  }

  /**
   * Replay the run's log backlog to `listener`, then stream new lines until
   * the run finishes. Returns an unsubscribe function.
   */
  subscribe(id: string, listener: RunListener): (() => void) | undefined {
    const run = this.runs.get(id);
    if (!run) return undefined;

    for (const line of run.logs) listener.send('log', line);
    if (run.status !== 'running') {
      listener.send('status', run.status);
      listener.end();
      return () => undefined;
    }

    run.listeners.add(listener);
    return () => {
      run.listeners.delete(listener);
    };
  }

  view(run: RunState): RunView {
    return {
      id: run.id,
      status: run.status,
      startedAt: run.startedAt.toISOString(),
      finishedAt: run.finishedAt ? run.finishedAt.toISOString() : null,
      summary: run.summary,
      files: run.files,
      error: run.error,
    };
  }

  private pushLog(run: RunState, line: string): void {
    run.logs.push(line);
    if (run.logs.length > this.limits.maxLogLines) {
      run.logs.splice(0, run.logs.length - this.limits.maxLogLines);
    }
    for (const listener of run.listeners) {
      listener.send('log', line);
    }
  }

  private evictFinished(): void {
    const finished = [...this.runs.values()].filter((run) => run.status !== 'running');
    for (const run of finished.slice(0, Math.max(0, finished.length - this.limits.maxFinishedRuns))) {
      this.runs.delete(run.id);
    }
  }

  private finish(run: RunState): void {
    for (const listener of run.listeners) {
      listener.send('status', run.status);
      listener.end();
    }
    run.listeners.clear();
  }
}
