import { describeError, isRecoverableStepFault, AutomationError } from './errors.js';
import { captureFailureArtifacts, PlaywrightDriver, type BrowserDriver } from './services/browser.js';
import { submitApplication } from './services/applicator.js';
import { FileLedgerWriter, RunLedger, ApplicationAttempt, type LedgerFiles, type LedgerWriter } from './services/ledger.js';
import { scanListings } from './services/listing-scanner.js';
import { ensureSession } from './services/session-gate.js';
import { verifyApplication } from './services/verifier.js';
import type { ApplicationRecord, Candidate, FrozenRunConfig, RunSummary } from './types/index.js';
import { logger } from './utils/logger.js';
import { sleep } from './utils/pacing.js';

export interface RunOptions {
  signal?: AbortSignal;
  writer?: LedgerWriter;
  now?: () => Date;
}

export interface RunResult {
  records: ReadonlyArray<Readonly<ApplicationRecord>>;
  files: LedgerFiles | null;
  summary: RunSummary;
  candidates: number;
  aborted: boolean;
}

function stepOf(error: unknown): string {
  return error instanceof AutomationError ? error.step : 'apply';
}

async function attemptCandidate(
  driver: BrowserDriver,
  config: FrozenRunConfig,
  candidate: Candidate,
  listingUrl: string,
  ledger: RunLedger,
  now: () => Date
): Promise<void> {
  const attempt = new ApplicationAttempt(candidate.title, now());
  logger.application(candidate.title, 'applying');

  try {
    const outcome = await submitApplication(driver, candidate, { config, listingUrl });
    if (outcome.submitted) {
      attempt.succeed({ company: outcome.company, reference: outcome.reference });
    } else {
      attempt.fail(outcome.reason);
    }
  } catch (error) {
    const message = describeError(error);
    logger.error(`[${stepOf(error)}] ${candidate.title}: ${message}`);
    if (isRecoverableStepFault(error)) {
      attempt.fail(message);
    } else {
      attempt.error(message);
    }
  }

  if (attempt.status === 'failed' || attempt.status === 'error') {
    if (attempt.status === 'failed') logger.warn(`  ${attempt.snapshot().errorMessage}`);
    if (config.runtime.saveScreenshots) {
      await captureFailureArtifacts(
        driver,
        config.runtime.artifactsDir,
        candidate.id,
        config.runtime.stepTimeoutMs
      );
    }
  }

  const record = ledger.append(attempt);
  const index = ledger.size - 1;

  if (record.status === 'success') {
    const verified = await verifyApplication(
      driver,
      { jobTitle: record.jobTitle, reference: record.reference, listingUrl },
      { site: config.site, stepTimeoutMs: config.runtime.stepTimeoutMs, now }
    );
    logger.application(candidate.title, verified ? ledger.escalate(index).status : record.status);
  } else {
    logger.application(candidate.title, record.status);
  }
}

/**
 * Run one application session against an already launched browser: session
 * check, search, then submit and verify each candidate until the cap is hit.
 * The ledger is written exactly once, also when the run dies early.
 */
export async function runApplications(
  driver: BrowserDriver,
  config: FrozenRunConfig,
  options: RunOptions = {}
): Promise<RunResult> {
  const now = options.now ?? (() => new Date());
  const writer = options.writer ?? new FileLedgerWriter(config.runtime.outputDir);
  const ledger = new RunLedger(now());
  const maxApplications = config.search.maxApplications;
  let candidates = 0;
  let aborted = false;
  let fatal: { error: unknown } | null = null;

  logger.info(`Max applications: ${maxApplications}`);

  try {
    logger.divider('Step 1: Session');
    await ensureSession(driver, config);

    logger.divider('Step 2: Search');
    const scan = await scanListings(driver, config);
    candidates = scan.candidates.length;

    logger.divider('Step 3: Applying');
    for (const candidate of scan.candidates) {
      if (ledger.size >= maxApplications) {
        logger.info(`Reached max applications (${maxApplications})`);
        break;
      }
      if (options.signal?.aborted) {
        aborted = true;
        logger.warn('Termination requested. Stopping before next application.');
        break;
      }

      await attemptCandidate(driver, config, candidate, scan.listingUrl, ledger, now);

      // Paced after every attempt, whatever its outcome; an abort cuts the pause short.
      if (config.runtime.delayBetweenApplicationsMs > 0) {
        logger.debug('Taking a short break after this application...');
        await sleep(config.runtime.delayBetweenApplicationsMs, options.signal);
      }
    }
  } catch (error) {
    fatal = { error };
    logger.error(`Run aborted at ${stepOf(error)}: ${describeError(error)}`);
  }

  let files: LedgerFiles | null = null;
  try {
    files = await ledger.flush(writer);
    logger.success(`Results written to ${files.csvPath} and ${files.jsonPath}`);
  } catch (error) {
    logger.error(`Failed to write results: ${describeError(error)}`);
    if (!fatal) throw error;
  }

  const summary = ledger.summary();
  logger.summary({ ...summary, candidates });

  if (fatal) throw fatal.error;
  return { records: ledger.entries(), files, summary, candidates, aborted };
}

/** Launch a browser, run one session and close the browser again. */
export async function runBot(config: FrozenRunConfig, options: RunOptions = {}): Promise<RunResult> {
  logger.setLevel(config.runtime.logLevel);
  logger.banner();

  if (options.signal?.aborted) {
    throw new Error('Run terminated by user');
  }

  const driver = await PlaywrightDriver.launch({
    headless: config.runtime.headless,
    stepTimeoutMs: config.runtime.stepTimeoutMs,
  });

  try {
    const result = await runApplications(driver, config, options);
    logger.success('Run completed');
    return result;
  } finally {
    await driver.close().catch((error: unknown) => {
      logger.warn(`Browser did not close cleanly: ${describeError(error)}`);
    });
  }
}
