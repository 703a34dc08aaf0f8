import { describe, expect, it } from 'vitest';
import {
  extractRelevantSections,
  queryKeywords,
  scoreSection,
} from '../../../src/tools/document/relevance-filter';
import { wordTokenCounter } from '../../helpers/fixtures';

const GENERAL =
  'GENERAL PROVISIONS\nThis part describes the scope of these rules and the definitions used throughout the text.';
const SAFETY =
  'SAFETY REPORTING\nSponsors must report serious adverse events in a clinical trial to the authority within fifteen days.';
const OFFICE =
  'MISCELLANEOUS MATTERS\nOffice hours and the postal address of the department are listed in the annex below.';
const APPROVAL =
  'APPROVAL TIMELINE\nThe approval timeline for a new drug is ninety days after the complete application.';

const DOCUMENT = [GENERAL, APPROVAL, OFFICE, SAFETY].join('\n');
const QUERY = 'adverse events reporting';

describe('queryKeywords', () => {
  it('should keep distinct words longer than three characters', () => {
    expect(queryKeywords('The trial and the TRIAL timeline for it')).toEqual([
      'trial',
      'timeline',
    ]);
  });
});

describe('scoreSection', () => {
  it('should add keyword, phrase and domain vocabulary points', () => {
    const keywords = queryKeywords(QUERY);
    expect(scoreSection(SAFETY, QUERY, keywords)).toBe(5);
    expect(scoreSection(APPROVAL, QUERY, keywords)).toBe(3);
    expect(scoreSection(GENERAL, QUERY, keywords)).toBe(0);
    expect(
      scoreSection('Notes on adverse events reporting', QUERY, keywords),
    ).toBe(8);
  });
});

describe('extractRelevantSections', () => {
  it('should return the text unchanged without a query', () => {
    expect(
      extractRelevantSections(DOCUMENT, undefined, {
        tokenCounter: wordTokenCounter,
      }),
    ).toBe(DOCUMENT);
  });

  it('should keep scoring sections ordered by score', () => {
    expect(
      extractRelevantSections(DOCUMENT, QUERY, {
        tokenCounter: wordTokenCounter,
      }),
    ).toBe(`${SAFETY}\n\n---\n\n${APPROVAL}`);
  });

  it('should stop at the first section that overflows the budget', () => {
    expect(
      extractRelevantSections(DOCUMENT, QUERY, {
        maxTokens: 20,
        tokenCounter: wordTokenCounter,
      }),
    ).toBe(SAFETY);
  });

  it('should truncate the raw text when no section is relevant', () => {
    expect(
      extractRelevantSections([GENERAL, OFFICE].join('\n'), 'zebra crossing', {
        maxTokens: 5,
        tokenCounter: wordTokenCounter,
      }),
    ).toBe('GENERAL PROVISIONS This part describes');
  });
});
