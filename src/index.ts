#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import { runBot } from './bot.js';
import { createRunConfig } from './config.js';
import { ConfigError, describeError, SessionFault } from './errors.js';
import { titleVariants } from './services/verifier.js';
import type { FrozenRunConfig } from './types/index.js';
import { logger } from './utils/logger.js';
import { startWorkerServer } from './worker-server.js';

function positiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

interface RunCommandOptions {
  test: boolean;
  headless?: boolean;
  max?: number;
  outputDir?: string;
  screenshots: boolean;
}

function loadConfig(options: RunCommandOptions): FrozenRunConfig | null {
  try {
    return createRunConfig(process.env, {
      test: options.test,
      headless: options.headless,
      maxApplications: options.max,
      outputDir: options.outputDir,
      saveScreenshots: options.screenshots ? undefined : false,
    });
  } catch (error) {
    if (error instanceof ConfigError) {
      for (const issue of error.issues) logger.error(issue);
      return null;
    }
    throw error;
  }
}

async function runCommand(options: RunCommandOptions): Promise<void> {
  const config = loadConfig(options);
  if (!config) {
    process.exitCode = 2;
    return;
  }

  if (options.test) {
    logger.warn(`TEST MODE - at most ${config.search.maxApplications} applications`);
  }

  try {
    const result = await runBot(config);
    if (result.summary.error > 0) process.exitCode = 1;
  } catch (error) {
    logger.error(
      error instanceof SessionFault
        ? `Could not establish a session: ${error.message}`
        : `Run failed: ${describeError(error)}`
    );
    process.exitCode = 1;
  }
}

const program = new Command();

program
  .name('application-runner')
  .description('Search a job board, apply to matching postings and record the outcome')
  .version('1.0.0');

program
  .command('run', { isDefault: true })
  .description('Run one application session')
  .option('--test', `Apply to at most 2 jobs`, false)
  .option('--headless', 'Run browser in headless mode')
  .option('-m, --max <number>', 'Maximum applications to submit', positiveInteger)
  .option('-o, --output-dir <dir>', 'Directory for the CSV and JSON results')
  .option('--no-screenshots', 'Do not save screenshots and HTML of failed applications')
  .action(runCommand);

program
  .command('variants')
  .description('Print the title spellings used to verify an application')
  .argument('<title>', 'Job title as listed')
  .action((title: string) => {
    for (const variant of titleVariants(title)) {
      console.log(variant);
    }
  });

program
  .command('serve')
  .description('Start the worker server that runs sessions on request')
  .option('-p, --port <number>', 'Port to listen on', positiveInteger)
  .action((options: { port?: number }) => {
    startWorkerServer(options.port ?? (process.env.PORT ? Number(process.env.PORT) : 8787));
  });

program.parseAsync().catch((error: unknown) => {
  logger.error(describeError(error));
  process.exitCode = 1;
});
