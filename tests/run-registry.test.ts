import { describe, expect, it } from 'vitest';
import type { RunOptions, RunResult } from '../src/bot.js';
import { RunConflictError } from '../src/errors.js';
import { RunRegistry, type RunListener } from '../src/services/run-registry.js';
import { logger } from '../src/utils/logger.js';
import { testConfig } from './helpers/site.js';

const emptyResult: RunResult = {
  records: [],
  files: { csvPath: 'out.csv', jsonPath: 'out.json' },
  summary: { attempted: 0, success: 0, verified: 0, failed: 0, error: 0 },
  candidates: 0,
  aborted: false,
};

/** An executor whose runs finish when the test says so. */
function controllableExecutor() {
  const pending: Array<{ options: RunOptions; finish: (result: RunResult) => void; fail: (error: Error) => void }> = [];
  const execute = (_config: unknown, options: RunOptions) =>
    new Promise<RunResult>((resolve, reject) => {
      logger.info('executor started');
      pending.push({ options, finish: resolve, fail: reject });
    });
  return { execute, pending };
}

function recordingListener() {
  const events: Array<[string, string]> = [];
  let ended = false;
  const listener: RunListener = {
    send: (event, data) => events.push([event, data]),
    end: () => {
      ended = true;
    },
  };
  return { listener, events, isEnded: () => ended };
}

let nextId = 0;
const ids = () => `run-${++nextId}`;

describe('RunRegistry', () => {
  it('runs one session at a time', async () => {
    const { execute, pending } = controllableExecutor();
    const registry = new RunRegistry(execute, ids);

    const run = registry.start(testConfig());

    expect(registry.active?.id).toBe(run.id);
    expect(() => registry.start(testConfig())).toThrow(RunConflictError);

    pending[0]?.finish(emptyResult);
    await run.done;

    expect(run.status).toBe('completed');
    expect(run.summary).toEqual(emptyResult.summary);
    expect(registry.active).toBeUndefined();
    expect(registry.start(testConfig()).id).not.toBe(run.id);
  });

  it('streams the run log to subscribers and closes them at the end', async () => {
    const { execute, pending } = controllableExecutor();
    const registry = new RunRegistry(execute, ids);
    const run = registry.start(testConfig());
    const { listener, events, isEnded } = recordingListener();

    registry.subscribe(run.id, listener);
    pending[0]?.finish(emptyResult);
    await run.done;

    expect(events[0]).toEqual(['log', 'Run started.']);
    expect(events.some(([event, line]) => event === 'log' && line.endsWith('INFO executor started'))).toBe(true);
    expect(events.at(-2)).toEqual(['log', 'Run completed.']);
    expect(events.at(-1)).toEqual(['status', 'completed']);
    expect(isEnded()).toBe(true);
  });

  it('replays the backlog to late subscribers of a finished run', async () => {
    const { execute, pending } = controllableExecutor();
    const registry = new RunRegistry(execute, ids);
    const run = registry.start(testConfig());
    pending[0]?.fail(new Error('browser crashed'));
    await run.done;
    const { listener, events, isEnded } = recordingListener();

    registry.subscribe(run.id, listener);

    expect(run.status).toBe('failed');
    expect(run.error).toBe('browser crashed');
    expect(events).toContainEqual(['log', 'Run failed: browser crashed']);
    expect(events.at(-1)).toEqual(['status', 'failed']);
    expect(isEnded()).toBe(true);
  });

  it('aborts a running session on request', async () => {
    const { execute, pending } = controllableExecutor();
    const registry = new RunRegistry(execute, ids);
    const run = registry.start(testConfig());

    expect(registry.end(run.id)).toBe('requested');
    expect(pending[0]?.options.signal?.aborted).toBe(true);

    pending[0]?.finish({ ...emptyResult, aborted: true });
    await run.done;

    expect(run.status).toBe('terminated');
    expect(registry.end(run.id)).toBe('not-running');
    expect(registry.end('missing')).toBe('not-found');
  });

  it('describes a run for the status endpoint', async () => {
    const { execute, pending } = controllableExecutor();
    const registry = new RunRegistry(execute, ids);
    const run = registry.start(testConfig());
    pending[0]?.finish(emptyResult);
    await run.done;

    expect(registry.view(run)).toMatchObject({
      id: run.id,
      status: 'completed',
      summary: emptyResult.summary,
      files: emptyResult.files,
      error: null,
    });
    expect(registry.subscribe('missing', recordingListener().listener)).toBeUndefined();
  });

  it('forgets the oldest finished runs and trims long backlogs', async () => {
    const { execute, pending } = controllableExecutor();
    const registry = new RunRegistry(execute, ids, { maxFinishedRuns: 1, maxLogLines: 2 });

    const first = registry.start(testConfig());
    pending[0]?.finish(emptyResult);
    await first.done;
    const second = registry.start(testConfig());
    pending[1]?.finish(emptyResult);
    await second.done;

    expect(registry.get(first.id)).toBeUndefined();
    expect(registry.get(second.id)).toBe(second);
    expect(second.logs).toHaveLength(2);
    expect(second.logs[0]?.endsWith('INFO executor started')).toBe(true);
    expect(second.logs[1]).toBe('Run completed.');
  });
});

