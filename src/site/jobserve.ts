import type { SiteProfile } from '../types/index.js';

// Locators for jobserve.com. These follow the live markup and will drift as the
// site changes; every lookup treats a miss as an ordinary failure.
export const JOBSERVE_PROFILE: SiteProfile = {
  name: 'jobserve',
  homeUrl: 'https://www.jobserve.com',
  searchUrl: 'https://www.jobserve.com/gb/en/JobSearch.aspx',
  historyUrl: 'https://www.jobserve.com/ee/en/can/applications',
  locators: {
    // Session
    signOut: 'a:has-text("Sign Out")',
    signIn: 'a:has-text("Sign In"), a:has-text("Login"), a[href*="login" i]',
    emailInput: 'input[type="email"], input[name*="email" i], input[id*="email" i]',
    passwordInput: 'input[type="password"], input[name*="password" i], input[id*="password" i]',
    loginSubmit: 'input[type="submit"], button[type="submit"], button:has-text("Sign In")',

    // Cookie banners and promo modals
    overlayDismiss: [
      '#onetrust-accept-btn-handler',
      'button:has-text("Accept All")',
      '.modal.show button.close',
      'button[aria-label="Close"]',
    ],

    // Search form
    keywordsInput: 'input[name*="keyword" i], input[placeholder*="Marketing"]',
    locationInput: 'input[name*="location" i], input[placeholder*="London"]',
    jobTypeSelect: 'select[name*="jobtype" i], select[name*="type" i]',
    distanceSelect: 'select[name*="distance" i], select[name*="radius" i]',
    searchSubmit: 'button[type="submit"], input[value="Search"]',

    // Result list
    resultRow: '.jobItem, .jobListItem, [data-jobid]',
    rowTitle: 'a[href*="jobid" i], a[class*="job"]',
    rowApply: 'a:has-text("Apply"), button:has-text("Apply")',
    rowCompany: '[class*="company"]',
    rowReference: '[class*="reference"], [class*="jobref"]',

    // Job detail + application form
    detailApply: 'a:has-text("Apply"), button:has-text("Apply")',
    applicationForm: [
      'h1:has-text("Job Application")',
      'div:has-text("Job Application")',
      'input[type="email"]',
      'select[name*="status" i]',
    ],
    formEmail: 'input[type="email"]',
    formWorkingStatus: 'select[name*="status" i]',
    formCv: 'select[name*="cv" i], select[name*="resume" i]',
    formFirstName: 'input[name*="first" i], input[id*="first" i]',
    formLastName: 'input[name*="last" i], input[id*="last" i]',
    formSubmit: 'button:has-text("Apply"), button[type="submit"], input[type="submit"]',
    successElement: '[class*="success"], [class*="confirm"]',
    company: 'span[class*="company"], div[class*="company"]',
    reference: 'span[class*="reference"], div[class*="jobref"]',
  },
  markers: {
    accessRestricted: 'limited number of features',
    applied: 'applied',
    successPhrases: [
      'application submitted',
      'thank you',
      'successfully applied',
      'application received',
      'confirmation',
    ],
  },
};
