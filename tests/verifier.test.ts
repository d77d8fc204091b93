import { describe, expect, it } from 'vitest';
import { dateStamps, findVariant, titleVariants, verifyApplication } from '../src/services/verifier.js';
import { FakeDriver, type FakePageSpec } from './helpers/fake-driver.js';
import { L, LISTING_URL, SITE } from './helpers/site.js';

const today = new Date(2025, 2, 14, 9, 30, 0);
const options = { site: SITE, stepTimeoutMs: 200, now: () => today };

function board(history: FakePageSpec, rows: string[] = []): FakeDriver {
  return new FakeDriver({
    [SITE.historyUrl]: history,
    [LISTING_URL]: { elements: { [L.resultRow]: rows.map((text) => ({ text })) } },
  });
}

describe('titleVariants', () => {
  it('keeps a slash-separated title whole', () => {
    expect(titleVariants('Data Scientist/Google Gemini/PowerBI/AI/NLP')).toEqual([
      'data scientist/google gemini/powerbi/ai/nlp',
      'datascientist/googlegemini/powerbi/ai/nlp',
    ]);
  });

  it('adds the text before " ("', () => {
    expect(titleVariants('Senior Data Engineer (Python & SQL)')).toEqual([
      'senior data engineer (python & sql)',
      'seniordataengineer(python&sql)',
      'senior data engineer',
    ]);
  });

  it('adds the text before the first " - "', () => {
    expect(titleVariants('ML Engineer - Contract (Remote)')).toEqual([
      'ml engineer - contract (remote)',
      'mlengineer-contract(remote)',
      'ml engineer',
      'ml engineer - contract',
    ]);
  });

  it('always contains the lowercase title', () => {
    for (const title of ['AI Lead', 'x', '  spaced  out ', 'A - B - C', '(Remote) Analyst']) {
      const variants = titleVariants(title);
      expect(variants.length).toBeGreaterThan(0);
      expect(variants).toContain(title.toLowerCase());
    }
  });

  it('returns a single empty variant for an empty title', () => {
    expect(titleVariants('')).toEqual(['']);
  });
});

describe('findVariant', () => {
  it('ignores empty variants', () => {
    expect(findVariant('any page text', [''])).toBeUndefined();
    expect(findVariant('a data role', ['', 'data'])).toBe('data');
  });
});

describe('dateStamps', () => {
  it('formats the day both ways', () => {
    expect(dateStamps(today)).toEqual(['14/03/2025', '2025-03-14']);
  });
});

describe('verifyApplication', () => {
  it('finds a slash-separated title in the history page', async () => {
    const driver = board({ text: 'Your applications\nData Scientist/Google Gemini/PowerBI/AI/NLP  Applied' });

    const verified = await verifyApplication(
      driver,
      { jobTitle: 'Data Scientist/Google Gemini/PowerBI/AI/NLP', reference: '', listingUrl: LISTING_URL },
      options
    );

    expect(verified).toBe(true);
    expect(driver.navigations).toEqual([SITE.historyUrl]);
  });

  it('matches the title prefix when the history drops the parenthesised part', async () => {
    const driver = board({ text: 'Senior Data Engineer | ACME Ltd | 14/03/2025' });

    const verified = await verifyApplication(
      driver,
      { jobTitle: 'Senior Data Engineer (Python & SQL)', reference: '', listingUrl: LISTING_URL },
      options
    );

    expect(verified).toBe(true);
  });

  it('returns false when neither page mentions the title', async () => {
    const driver = board({ text: 'Your applications\nBI Analyst' }, ['Cloud Engineer  Applied 14/03/2025']);

    const verified = await verifyApplication(
      driver,
      { jobTitle: 'Senior Data Engineer (Python & SQL)', reference: '', listingUrl: LISTING_URL },
      options
    );

    expect(verified).toBe(false);
    expect(driver.navigations).toEqual([SITE.historyUrl, LISTING_URL]);
  });

  it('falls back to the listing when the history page is restricted', async () => {
    const driver = board(
      { text: 'Your account has a limited number of features. Senior Data Engineer' },
      ['Senior Data Engineer (Python & SQL)  ACME  Applied 14/03/2025']
    );

    const verified = await verifyApplication(
      driver,
      { jobTitle: 'Senior Data Engineer (Python & SQL)', reference: '', listingUrl: LISTING_URL },
      options
    );

    expect(verified).toBe(true);
    expect(driver.navigations).toEqual([SITE.historyUrl, LISTING_URL]);
  });

  it('accepts a listing row carrying the job reference instead of the date', async () => {
    const driver = board({ text: 'limited number of features' }, ['Senior Data Engineer  Applied  Ref: JS-4471']);

    const verified = await verifyApplication(
      driver,
      { jobTitle: 'Senior Data Engineer', reference: 'JS-4471', listingUrl: LISTING_URL },
      options
    );

    expect(verified).toBe(true);
  });

  it('rejects a listing row without the applied marker or corroboration', async () => {
    const driver = board({ text: 'limited number of features' }, [
      'Senior Data Engineer  14/03/2025',
      'Senior Data Engineer  Applied 01/01/2024',
    ]);

    const verified = await verifyApplication(
      driver,
      { jobTitle: 'Senior Data Engineer', reference: '', listingUrl: LISTING_URL },
      options
    );

    expect(verified).toBe(false);
  });

  it('never matches anything for an empty title', async () => {
    const driver = board({ text: 'Every application you ever made' }, ['Applied 14/03/2025']);

    const verified = await verifyApplication(driver, { jobTitle: '', reference: '', listingUrl: LISTING_URL }, options);

    expect(verified).toBe(false);
  });

  it('resolves false when both pages are unreachable', async () => {
    const driver = board({ text: 'Senior Data Engineer' });
    driver.unreachable.add(SITE.historyUrl);
    driver.unreachable.add(LISTING_URL);

    await expect(
      verifyApplication(
        driver,
        { jobTitle: 'Senior Data Engineer', reference: '', listingUrl: LISTING_URL },
        options
      )
    ).resolves.toBe(false);
  });

  it('resolves false when reading the page throws', async () => {
    class BrokenDriver extends FakeDriver {
      override async pageText(): Promise<string> {
        throw new Error('Target page, context or browser has been closed');
      }
    }
    const driver = new BrokenDriver({});

    const verified = await verifyApplication(
      driver,
      { jobTitle: 'Senior Data Engineer', reference: '', listingUrl: LISTING_URL },
      options
    );

    expect(verified).toBe(false);
  });
});
