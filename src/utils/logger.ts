/**
 * Colored console logger with per-run sinks.
 *
 * Lines printed inside `withRunContext` are also forwarded (ANSI-stripped) to the
 * sink registered for that run, which is how the worker streams run logs.
 */
import { AsyncLocalStorage } from 'async_hooks';
import type { ApplicationStatus, LogLevel, RunSummary } from '../types/index.js';

// ANSI color codes
const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',

  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',

  bgBlue: '\x1b[44m',
};

const levelRank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

// Non-level messages (action, job, apply, divider...) print at info.
const entryLevel: Record<string, LogLevel> = {
  debug: 'debug',
  warn: 'warn',
  error: 'error',
};

function timestamp(): string {
  return new Date().toLocaleTimeString();
}

function formatMessage(prefix: string, color: string, message: string): string {
  return `${colors.dim}[${timestamp()}]${colors.reset} ${color}${prefix}${colors.reset} ${message}`;
}

export type LogEntry = { level: string; message: string; timestamp: string };
export type LogSink = (entry: LogEntry) => void;

const logSinks = new Map<string, LogSink>();
const logContext = new AsyncLocalStorage<{ runId: string }>();
let threshold: LogLevel = 'info';

export function stripAnsi(input: string): string {
  return input.replace(/\x1b\[[0-9;]*m/g, '');
}

function emit(level: string, formatted: string): void {
  const context = logContext.getStore();
  if (!context) return;
  const logSink = logSinks.get(context.runId);
  if (!logSink) return;
  const ts = timestamp();
  const lines = stripAnsi(formatted).split('\n');
  for (const line of lines) {
    const trimmed = line.trimEnd();
    if (trimmed.length === 0) continue;
    logSink({ level, message: trimmed, timestamp: ts });
  }
}

function print(level: string, formatted: string): void {
  const effective = entryLevel[level] ?? 'info';
  if (levelRank[effective] < levelRank[threshold]) return;
  console.log(formatted);
  emit(level, formatted);
}

const statusColors: Record<ApplicationStatus | 'applying', string> = {
  applying: colors.yellow,
  pending: colors.dim,
  success: colors.green,
  verified: colors.green + colors.bright,
  failed: colors.red,
  error: colors.red + colors.bright,
};

export const logger = {
  setLevel(level: LogLevel): void {
    threshold = level;
  },

  addLogSink(runId: string, sink: LogSink): void {
    logSinks.set(runId, sink);
  },

  removeLogSink(runId: string): void {
    logSinks.delete(runId);
  },

  withRunContext<T>(runId: string, fn: () => T): T {
    return logContext.run({ runId }, fn);
  },

  info(message: string): void {
    print('info', formatMessage('INFO', colors.blue, message));
  },

  success(message: string): void {
    print('success', formatMessage('SUCCESS', colors.green, message));
  },

  warn(message: string): void {
    print('warn', formatMessage('WARN', colors.yellow, message));
  },

  error(message: string): void {
    print('error', formatMessage('ERROR', colors.red, message));
  },

  debug(message: string): void {
    print('debug', formatMessage('DEBUG', colors.dim, message));
  },

  // Browser actions
  action(message: string): void {
    print('action', formatMessage('BOT', colors.cyan + colors.bright, message));
  },

  job(message: string): void {
    print('job', formatMessage('JOB', colors.magenta, message));
  },

  application(jobTitle: string, status: ApplicationStatus | 'applying'): void {
    const statusText = status.toUpperCase().padEnd(8);
    print('apply', formatMessage('APPLY', statusColors[status], `${statusText} ${jobTitle}`));
  },

  divider(title?: string): void {
    const line = '─'.repeat(50);
    if (title) {
      print('divider', `\n${colors.dim}${line}${colors.reset}`);
      print('divider', `${colors.bright}${colors.cyan}  ${title}${colors.reset}`);
      print('divider', `${colors.dim}${line}${colors.reset}\n`);
    } else {
      print('divider', `${colors.dim}${line}${colors.reset}`);
    }
  },

  summary(stats: RunSummary & { candidates?: number }): void {
    print('summary', `\n${colors.bgBlue}${colors.white}${colors.bright} SUMMARY ${colors.reset}`);
    if (stats.candidates !== undefined) {
      print('summary', `${colors.cyan}  Candidates found:${colors.reset}     ${stats.candidates}`);
    }
    print('summary', `${colors.cyan}  Applications tried:${colors.reset}   ${stats.attempted}`);
    print('summary', `${colors.green}  Verified:${colors.reset}             ${stats.verified}`);
    print('summary', `${colors.green}  Submitted (unverified):${colors.reset} ${stats.success}`);
    if (stats.failed > 0) {
      print('summary', `${colors.red}  Failed:${colors.reset}               ${stats.failed}`);
    }
    if (stats.error > 0) {
      print('summary', `${colors.red}  Errored:${colors.reset}              ${stats.error}`);
    }
    print('summary', '');
  },

  banner(): void {
    print('banner', `
${colors.cyan}${colors.bright}
   ╔═══════════════════════════════════════════╗
   ║         Job Application Runner            ║
   ║    search • apply • verify • ledger       ║
   ╚═══════════════════════════════════════════╝
${colors.reset}`);
  },
};
