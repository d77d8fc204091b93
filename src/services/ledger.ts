import { promises as fs } from 'node:fs';
import path from 'node:path';
import { InvalidTransitionError, LedgerAlreadyFlushedError } from '../errors.js';
import type { ApplicationRecord, ApplicationStatus, RunSummary } from '../types/index.js';

const TRANSITIONS: Record<ApplicationStatus, readonly ApplicationStatus[]> = {
  pending: ['success', 'failed', 'error'],
  success: ['verified', 'error'],
  verified: [],
  failed: [],
  error: [],
};

export function canTransition(from: ApplicationStatus, to: ApplicationStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * One application attempt, from the moment it starts until it is appended to
 * the ledger. Status only moves forward; an illegal move throws.
 */
export class ApplicationAttempt {
  private state: ApplicationRecord;

  constructor(jobTitle: string, appliedAt: Date = new Date()) {
    this.state = {
      jobTitle,
      company: '',
      reference: '',
      status: 'pending',
      errorMessage: '',
      appliedAt,
    };
  }

  get status(): ApplicationStatus {
    return this.state.status;
  }

  get jobTitle(): string {
    return this.state.jobTitle;
  }

  get reference(): string {
    return this.state.reference;
  }

  private move(to: ApplicationStatus, patch: Partial<Omit<ApplicationRecord, 'status'>> = {}): this {
    if (!canTransition(this.state.status, to)) {
      throw new InvalidTransitionError(this.state.status, to);
    }
    this.state = { ...this.state, ...patch, status: to };
    return this;
  }

  succeed(details: { company?: string; reference?: string } = {}): this {
    return this.move('success', {
      company: details.company?.trim() ?? '',
      reference: details.reference?.trim() ?? '',
    });
  }

  verify(): this {
    return this.move('verified');
  }

  fail(reason: string): this {
    return this.move('failed', { errorMessage: reason.trim() || 'Application failed' });
  }

  error(message: string): this {
    return this.move('error', { errorMessage: message.trim() || 'Unexpected error' });
  }

  snapshot(): ApplicationRecord {
    return { ...this.state };
  }
}

export interface LedgerFiles {
  csvPath: string;
  jsonPath: string;
}

export interface LedgerWriter {
  write(records: readonly ApplicationRecord[], startedAt: Date): Promise<LedgerFiles>;
}

/**
 * Append-only record of a run's attempts, in attempt order. Records are frozen
 * on append; the one change allowed afterwards is success -> verified.
 */
export class RunLedger {
  private readonly records: ApplicationRecord[] = [];
  private flushed: LedgerFiles | null = null;

  constructor(readonly startedAt: Date = new Date()) {}

  get size(): number {
    return this.records.length;
  }

  get isFlushed(): boolean {
    return this.flushed !== null;
  }

  append(attempt: ApplicationAttempt): Readonly<ApplicationRecord> {
    if (this.flushed) throw new LedgerAlreadyFlushedError();
    if (attempt.status === 'pending') {
      throw new InvalidTransitionError('pending', 'pending');
    }
    const record = Object.freeze(attempt.snapshot());
    this.records.push(record);
    return record;
  }

  /** Upgrade an already written success to verified. */
  escalate(index: number): Readonly<ApplicationRecord> {
    if (this.flushed) throw new LedgerAlreadyFlushedError();
    const current = this.records[index];
    if (!current) {
      throw new RangeError(`No ledger record at index ${index}`);
    }
    if (!canTransition(current.status, 'verified')) {
      throw new InvalidTransitionError(current.status, 'verified');
    }
    const upgraded = Object.freeze({ ...current, status: 'verified' as const });
    this.records[index] = upgraded;
    return upgraded;
  }

  entries(): ReadonlyArray<Readonly<ApplicationRecord>> {
    return [...this.records];
  }

  summary(): RunSummary {
    const summary: RunSummary = { attempted: this.records.length, success: 0, verified: 0, failed: 0, error: 0 };
    for (const record of this.records) {
      if (record.status !== 'pending') summary[record.status] += 1;
    }
    return summary;
  }

  /** Persist the ledger. Allowed exactly once per run. */
  async flush(writer: LedgerWriter): Promise<LedgerFiles> {
    if (this.flushed) throw new LedgerAlreadyFlushedError();
    const files = await writer.write(this.entries(), this.startedAt);
    this.flushed = files;
    return files;
  }
}

export const LEDGER_COLUMNS = [
  'job_title',
  'company',
  'reference',
  'status',
  'error_message',
  'application_date',
] as const;

export type LedgerRow = Record<(typeof LEDGER_COLUMNS)[number], string>;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

// YYYY-MM-DD HH:MM:SS, local time
export function formatApplicationDate(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

// YYYYMMDD_HHMMSS, local time
export function formatRunStamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function toLedgerRow(record: ApplicationRecord): LedgerRow {
  return {
    job_title: record.jobTitle,
    company: record.company,
    reference: record.reference,
    status: record.status,
    error_message: record.errorMessage,
    application_date: formatApplicationDate(record.appliedAt),
  };
}

function escapeCsv(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function toCsv(records: readonly ApplicationRecord[]): string {
  const lines = [LEDGER_COLUMNS.join(',')];
  for (const record of records) {
    const row = toLedgerRow(record);
    lines.push(LEDGER_COLUMNS.map((column) => escapeCsv(row[column])).join(','));
  }
  return `${lines.join('\r\n')}\r\n`;
}

export function toJson(records: readonly ApplicationRecord[]): string {
  return `${JSON.stringify(records.map(toLedgerRow), null, 2)}\n`;
}

/** Writes `job_applications_<stamp>.csv` and `.json` into `outputDir`. */
export class FileLedgerWriter implements LedgerWriter {
  constructor(private readonly outputDir: string) {}

  async write(records: readonly ApplicationRecord[], startedAt: Date): Promise<LedgerFiles> {
    await fs.mkdir(this.outputDir, { recursive: true });
    const base = `job_applications_${formatRunStamp(startedAt)}`;
    const csvPath = path.join(this.outputDir, `${base}.csv`);
    const jsonPath = path.join(this.outputDir, `${base}.json`);
    await fs.writeFile(csvPath, toCsv(records), 'utf8');
    await fs.writeFile(jsonPath, toJson(records), 'utf8');
    return { csvPath, jsonPath };
  }
}
