import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  buildPostUrl,
  cleanAuthorName,
  convertRelativeDate,
  extractHashtags,
  firstToken,
  parseActivityId,
  removeDuplicatedText,
} from '../src/core/normalize.js';

describe('extractHashtags', () => {
  it('returns null when there are no tags', () => {
    expect(extractHashtags('no tags here')).toBeNull();
    expect(extractHashtags(null)).toBeNull();
  });

  it('joins tags in order of appearance', () => {
    expect(extractHashtags('love #ai and #ML!')).toBe('#ai, #ML');
  });

  it('keeps letters outside ASCII and underscores', () => {
    expect(extractHashtags('#café_culture is #grind')).toBe('#café_culture, #grind');
  });
});

describe('removeDuplicatedText', () => {
  it('collapses an exact back-to-back repeat', () => {
    expect(removeDuplicatedText('Jane DoeJane Doe')).toBe('Jane Doe');
  });

  it('collapses a repeated first line', () => {
    expect(removeDuplicatedText('Senior Engineer\nSenior Engineer')).toBe('Senior Engineer');
    expect(removeDuplicatedText('Founder\n  Founder  \nextra')).toBe('Founder');
  });

  it('returns other text trimmed', () => {
    expect(removeDuplicatedText('  just once  ')).toBe('just once');
  });

  it('passes null through', () => {
    expect(removeDuplicatedText(null)).toBeNull();
  });
});

describe('cleanAuthorName', () => {
  it('drops everything after a bullet separator', () => {
    expect(cleanAuthorName('Jane Doe • 2nd')).toBe('Jane Doe');
  });

  it('drops a trailing connection degree', () => {
    expect(cleanAuthorName('John Smith 3rd+ Founder at Acme')).toBe('John Smith');
  });

  it('keeps ordinals that are part of the name', () => {
    expect(cleanAuthorName('7th Generation')).toBe('7th Generation');
    expect(cleanAuthorName('Acme 21st Century Coaching')).toBe('Acme 21st Century Coaching');
    expect(cleanAuthorName('Acme 21st Century Coaching 2nd')).toBe('Acme 21st Century Coaching');
  });

  it('deduplicates before cleaning', () => {
    expect(cleanAuthorName('Jane DoeJane Doe')).toBe('Jane Doe');
  });

  it('returns null for empty input', () => {
    expect(cleanAuthorName('')).toBeNull();
    expect(cleanAuthorName(undefined)).toBeNull();
  });
});

describe('convertRelativeDate', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date(2024, 2, 5, 12, 0, 0));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('subtracts days, weeks and hours', () => {
    expect(convertRelativeDate('3d')).toBe('2024-03-02');
    expect(convertRelativeDate('2w')).toBe('2024-02-20');
    expect(convertRelativeDate('5h')).toBe('2024-03-05');
    expect(convertRelativeDate('13h')).toBe('2024-03-04');
  });

  it('reads m as minutes, even when followed by more letters', () => {
    expect(convertRelativeDate('10m')).toBe('2024-03-05');
    expect(convertRelativeDate('1mo')).toBe('2024-03-05');
  });

  it('does not read years', () => {
    expect(convertRelativeDate('2y')).toBeNull();
    expect(convertRelativeDate('1yr')).toBeNull();
  });

  it('returns null for anything else', () => {
    expect(convertRelativeDate('xyz')).toBeNull();
    expect(convertRelativeDate('3 d')).toBeNull();
    expect(convertRelativeDate(null)).toBeNull();
  });
});

describe('post identity', () => {
  it('parses activity, share and ugcPost URNs', () => {
    expect(parseActivityId('urn:li:activity:7123456789012345678')).toBe('7123456789012345678');
    expect(parseActivityId('urn:li:ugcPost:42')).toBe('42');
    expect(parseActivityId('urn:li:share:9')).toBe('9');
    expect(parseActivityId('urn:li:company:1')).toBeNull();
    expect(parseActivityId(null)).toBeNull();
  });

  it('builds the public post URL', () => {
    expect(buildPostUrl('42')).toBe('https://www.linkedin.com/feed/update/urn:li:activity:42/');
    expect(buildPostUrl(null)).toBeNull();
  });

  it('takes the first token of the sub-description', () => {
    expect(firstToken('3d • Edited • 🌐')).toBe('3d');
    expect(firstToken('   ')).toBeNull();
  });
});
