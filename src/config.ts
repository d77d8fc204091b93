import dotenv from 'dotenv';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { JOBSERVE_PROFILE } from './site/jobserve.js';
import type {
  Candidate,
  FrozenRunConfig,
  LogLevel,
  RunConfig,
  SiteProfile,
} from './types/index.js';

dotenv.config();

// Titles must contain one of these to be considered at all
export const DEFAULT_INCLUDE_KEYWORDS = [
  'data',
  'ai',
  'engineer',
  'scientist',
  'tech',
  'lead',
  'analyst',
];

// Titles containing any of these are skipped
export const DEFAULT_EXCLUDE_KEYWORDS = [
  'senior manager',
  'director',
  'head of',
  'chief',
  'intern',
  'graduate',
];

// Matching titles are tried first
export const DEFAULT_PRIORITY_KEYWORDS = [
  'data scientist',
  'ai engineer',
  'machine learning',
  'data engineer',
  'tech lead',
  'ai developer',
  'data analyst',
  'python',
  'sql',
  'tensorflow',
  'pytorch',
];

export const TEST_RUN_MAX_APPLICATIONS = 2;

function isBlank(value: string | undefined): value is undefined | '' {
  return value === undefined || value.trim() === '';
}

function text(fallback: string) {
  return z
    .string()
    .optional()
    .transform((value) => (isBlank(value) ? fallback : value.trim()));
}

function booleanFlag(fallback: boolean) {
  return z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (isBlank(value)) return fallback;
      const normalized = value.trim().toLowerCase();
      if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
      if (['false', '0', 'no', 'off'].includes(normalized)) return false;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a boolean, got "${value}"` });
      return z.NEVER;
    });
}

function positiveNumber(fallback: number, options: { integer?: boolean; allowZero?: boolean } = {}) {
  return z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (isBlank(value)) return fallback;
      const parsed = Number(value.trim());
      const valid =
        Number.isFinite(parsed) &&
        (options.allowZero ? parsed >= 0 : parsed > 0) &&
        (!options.integer || Number.isInteger(parsed));
      if (!valid) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a positive number, got "${value}"` });
        return z.NEVER;
      }
      return parsed;
    });
}

function keywordList(fallback: string[]) {
  return z
    .string()
    .optional()
    .transform((value) =>
      isBlank(value)
        ? [...fallback]
        : value
            .split(',')
            .map((item) => item.trim().toLowerCase())
            .filter((item) => item.length > 0)
    );
}

export const envSchema = z.object({
  JOBSITE_EMAIL: text(''),
  JOBSITE_PASSWORD: text(''),
  APPLICANT_FIRST_NAME: text(''),
  APPLICANT_LAST_NAME: text(''),
  WORKING_STATUS_KEYWORDS: keywordList(['uk citizen', 'citizen', 'british']),

  SEARCH_KEYWORDS: text('data scientist, AI engineer'),
  SEARCH_LOCATION: text('London'),
  SEARCH_JOB_TYPE: text('Contract/Full Time'),
  SEARCH_DISTANCE: text('Within 25 miles'),
  MAX_APPLICATIONS: positiveNumber(50, { integer: true }),
  INCLUDE_KEYWORDS: keywordList(DEFAULT_INCLUDE_KEYWORDS),
  EXCLUDE_KEYWORDS: keywordList(DEFAULT_EXCLUDE_KEYWORDS),
  PRIORITY_KEYWORDS: keywordList(DEFAULT_PRIORITY_KEYWORDS),

  HEADLESS: booleanFlag(false),
  STEP_TIMEOUT_SECONDS: positiveNumber(10),
  DELAY_BETWEEN_APPLICATIONS_SECONDS: positiveNumber(5, { allowZero: true }),
  SAVE_SCREENSHOTS: booleanFlag(true),
  OUTPUT_DIR: text('output'),
  ARTIFACTS_DIR: text('artifacts'),
  LOG_LEVEL: z
    .string()
    .optional()
    .transform((value) => (isBlank(value) ? 'info' : value.trim().toLowerCase()))
    .pipe(z.enum(['debug', 'info', 'warn', 'error'])),

  SITE_HOME_URL: z.string().url().optional(),
  SITE_SEARCH_URL: z.string().url().optional(),
  SITE_HISTORY_URL: z.string().url().optional(),
});

export type EnvSettings = z.infer<typeof envSchema>;

export interface RunOverrides {
  maxApplications?: number;
  test?: boolean;
  headless?: boolean;
  saveScreenshots?: boolean;
  outputDir?: string;
  stepTimeoutMs?: number;
  delayBetweenApplicationsMs?: number;
  logLevel?: LogLevel;
  site?: SiteProfile;
}

function freezeDeep(value: object): void {
  Object.freeze(value);
  for (const child of Object.values(value)) {
    if (child && typeof child === 'object' && !Object.isFrozen(child)) {
      freezeDeep(child);
    }
  }
}

function cloneProfile(profile: SiteProfile): SiteProfile {
  return {
    ...profile,
    locators: {
      ...profile.locators,
      overlayDismiss: [...profile.locators.overlayDismiss],
      applicationForm: [...profile.locators.applicationForm],
    },
    markers: { ...profile.markers, successPhrases: [...profile.markers.successPhrases] },
  };
}

/**
 * Build the run configuration from environment variables plus CLI overrides.
 * The result is frozen all the way down; no component may change it.
 */
export function createRunConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: RunOverrides = {}
): FrozenRunConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
    );
  }
  const settings = parsed.data;

  if (overrides.maxApplications !== undefined && (!Number.isInteger(overrides.maxApplications) || overrides.maxApplications < 1)) {
    throw new ConfigError([`maxApplications: expected a positive integer, got ${overrides.maxApplications}`]);
  }

  const maxApplications = overrides.test
    ? TEST_RUN_MAX_APPLICATIONS
    : overrides.maxApplications ?? settings.MAX_APPLICATIONS;

  const site = cloneProfile(overrides.site ?? JOBSERVE_PROFILE);
  if (settings.SITE_HOME_URL) site.homeUrl = settings.SITE_HOME_URL;
  if (settings.SITE_SEARCH_URL) site.searchUrl = settings.SITE_SEARCH_URL;
  if (settings.SITE_HISTORY_URL) site.historyUrl = settings.SITE_HISTORY_URL;

  const config: RunConfig = {
    credentials: {
      email: settings.JOBSITE_EMAIL,
      password: settings.JOBSITE_PASSWORD,
    },
    applicant: {
      firstName: settings.APPLICANT_FIRST_NAME,
      lastName: settings.APPLICANT_LAST_NAME,
      workingStatusKeywords: settings.WORKING_STATUS_KEYWORDS,
    },
    search: {
      keywords: settings.SEARCH_KEYWORDS,
      location: settings.SEARCH_LOCATION,
      jobType: settings.SEARCH_JOB_TYPE,
      distance: settings.SEARCH_DISTANCE,
      maxApplications,
      includeKeywords: settings.INCLUDE_KEYWORDS,
      excludeKeywords: settings.EXCLUDE_KEYWORDS,
      priorityKeywords: settings.PRIORITY_KEYWORDS,
    },
    runtime: {
      headless: overrides.headless ?? settings.HEADLESS,
      stepTimeoutMs: overrides.stepTimeoutMs ?? Math.round(settings.STEP_TIMEOUT_SECONDS * 1000),
      delayBetweenApplicationsMs:
        overrides.delayBetweenApplicationsMs ?? Math.round(settings.DELAY_BETWEEN_APPLICATIONS_SECONDS * 1000),
      saveScreenshots: overrides.saveScreenshots ?? settings.SAVE_SCREENSHOTS,
      outputDir: path.resolve(overrides.outputDir ?? settings.OUTPUT_DIR),
      artifactsDir: path.resolve(settings.ARTIFACTS_DIR),
      logLevel: overrides.logLevel ?? settings.LOG_LEVEL,
    },
    site,
  };

  freezeDeep(config);
  return config;
}

/**
 * Keep candidates whose title contains an include keyword (or all of them when
 * the list is empty) and none of the exclude keywords. Candidates matching a
 * priority keyword move to the front; relative order is otherwise kept.
 */
export function filterCandidatesByKeywords(
  candidates: Candidate[],
  criteria: {
    includeKeywords: readonly string[];
    excludeKeywords: readonly string[];
    priorityKeywords?: readonly string[];
  }
): Candidate[] {
  const matches = (title: string, keywords: readonly string[]) =>
    keywords.some((keyword) => title.includes(keyword.toLowerCase()));

  const kept = candidates.filter((candidate) => {
    const titleLower = candidate.title.toLowerCase();
    if (matches(titleLower, criteria.excludeKeywords)) return false;
    return criteria.includeKeywords.length === 0 || matches(titleLower, criteria.includeKeywords);
  });

  const priority = criteria.priorityKeywords ?? [];
  if (priority.length === 0) return kept;

  const first = kept.filter((candidate) => matches(candidate.title.toLowerCase(), priority));
  const rest = kept.filter((candidate) => !matches(candidate.title.toLowerCase(), priority));
  return [...first, ...rest];
}
