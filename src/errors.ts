import type { ApplicationStatus } from './types/index.js';

/**
 * Base class for faults raised while driving the target site.
 * `step` names the pipeline step that was running when the fault happened.
 */
export class AutomationError extends Error {
  readonly step: string;

  constructor(message: string, step: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AutomationError';
    this.step = step;
  }
}

/** An expected page element was not found. */
export class LocatorMiss extends AutomationError {
  readonly locator: string;

  constructor(locator: string, step: string) {
    super(`Element not found: ${locator}`, step);
    this.name = 'LocatorMiss';
    this.locator = locator;
  }
}

export class StepTimeout extends AutomationError {
  readonly timeoutMs: number;

  constructor(step: string, timeoutMs: number) {
    super(`Step "${step}" timed out after ${timeoutMs}ms`, step);
    this.name = 'StepTimeout';
    this.timeoutMs = timeoutMs;
  }
}

/** Login could not be established. Fatal to the whole run. */
export class SessionFault extends AutomationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'session', options);
    this.name = 'SessionFault';
  }
}

export class SubmissionFault extends AutomationError {
  constructor(message: string, step = 'submit', options?: { cause?: unknown }) {
    super(message, step, options);
    this.name = 'SubmissionFault';
  }
}

export class VerificationFault extends AutomationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'verify', options);
    this.name = 'VerificationFault';
  }
}

export class InvalidTransitionError extends Error {
  readonly from: ApplicationStatus;
  readonly to: ApplicationStatus;

  constructor(from: ApplicationStatus, to: ApplicationStatus) {
    super(`Illegal status transition ${from} -> ${to}`);
    this.name = 'InvalidTransitionError';
    this.from = from;
    this.to = to;
  }
}

export class LedgerAlreadyFlushedError extends Error {
  constructor() {
    super('Run ledger has already been written');
    this.name = 'LedgerAlreadyFlushedError';
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/** Faults that only fail the current candidate, as opposed to erroring it. */
export function isRecoverableStepFault(error: unknown): error is AutomationError {
  return (
    error instanceof LocatorMiss ||
    error instanceof StepTimeout ||
    error instanceof SubmissionFault
  );
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
}

/** The worker already has a run in progress. */
export class RunConflictError extends Error {
  readonly activeRunId: string;

  constructor(activeRunId: string) {
    super(`Run ${activeRunId} is still in progress`);
    this.name = 'RunConflictError';
    this.activeRunId = activeRunId;
  }
}
