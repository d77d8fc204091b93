export type ApplicationStatus = 'pending' | 'success' | 'verified' | 'failed' | 'error';

export interface ApplicationRecord {
  jobTitle: string;
  company: string;
  reference: string;
  status: ApplicationStatus;
  errorMessage: string;
  appliedAt: Date;
}

export interface Candidate {
  id: string;
  title: string;
  url?: string;
  company?: string;
  reference?: string;
}

export interface SearchCriteria {
  keywords: string;
  location: string;
  jobType: string;
  distance: string;
  maxApplications: number;
  includeKeywords: string[];
  excludeKeywords: string[];
  priorityKeywords: string[];
}

export interface Credentials {
  email: string;
  password: string;
}

export interface ApplicantDetails {
  firstName: string;
  lastName: string;
  workingStatusKeywords: string[];
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface RuntimeSettings {
  headless: boolean;
  stepTimeoutMs: number;
  delayBetweenApplicationsMs: number;
  saveScreenshots: boolean;
  outputDir: string;
  artifactsDir: string;
  logLevel: LogLevel;
}

export interface SiteLocators {
  signOut: string;
  signIn: string;
  emailInput: string;
  passwordInput: string;
  loginSubmit: string;
  overlayDismiss: string[];
  keywordsInput: string;
  locationInput: string;
  jobTypeSelect: string;
  distanceSelect: string;
  searchSubmit: string;
  resultRow: string;
  rowTitle: string;
  rowApply: string;
  rowCompany: string;
  rowReference: string;
  detailApply: string;
  applicationForm: string[];
  formEmail: string;
  formWorkingStatus: string;
  formCv: string;
  formFirstName: string;
  formLastName: string;
  formSubmit: string;
  successElement: string;
  company: string;
  reference: string;
}

export interface SiteMarkers {
  accessRestricted: string;
  applied: string;
  successPhrases: string[];
}

export interface SiteProfile {
  name: string;
  homeUrl: string;
  searchUrl: string;
  historyUrl: string;
  locators: SiteLocators;
  markers: SiteMarkers;
}

export interface RunConfig {
  credentials: Credentials;
  applicant: ApplicantDetails;
  search: SearchCriteria;
  runtime: RuntimeSettings;
  site: SiteProfile;
}

export type DeepReadonly<T> = T extends Date
  ? T
  : T extends (infer U)[]
    ? readonly DeepReadonly<U>[]
    : T extends object
      ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
      : T;

export type FrozenRunConfig = DeepReadonly<RunConfig>;

export interface RunSummary {
  attempted: number;
  success: number;
  verified: number;
  failed: number;
  error: number;
}
