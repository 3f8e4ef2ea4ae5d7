import { describe, it, expect } from 'vitest';
import {
  MessageBundle,
  createMessageBundle,
  formatCount,
  formatIncrease,
  resolveLocale,
} from '../index.js';

describe('resolveLocale', () => {
  it.each([
    ['de_DE.UTF-8', 'de'],
    ['DE', 'de'],
    ['en_US', 'en'],
    ['fr_FR', 'en'],
    ['C.UTF-8', 'en'],
    [undefined, 'en'],
  ])('resolves %s to %s', (tag, locale) => {
    expect(resolveLocale(tag)).toBe(locale);
  });
});

describe('formatCount', () => {
  it('should right-align to width 6', () => {
    expect(formatCount(42, 0)).toBe('    42');
    expect(formatCount(1234567, 0)).toBe('1234567');
    expect(formatCount(12.34, 1)).toBe('  12.3');
  });
});

describe('formatIncrease', () => {
  it('should sign and right-align to width 5', () => {
    expect(formatIncrease(30, 0)).toBe('  +30');
    expect(formatIncrease(0, 0)).toBe('   +0');
    expect(formatIncrease(-7, 0)).toBe('   -7');
    expect(formatIncrease(-1.5, 1)).toBe(' -1.5');
  });
});

describe('MessageBundle', () => {
  it('should format English lines with increases', () => {
    const messages = new MessageBundle('en');

    expect(messages.format('cases', 1500, 30)).toBe('  1500 (  +30) total cases');
    expect(messages.format('active', 120, -4)).toBe('   120 (   -4) active cases');
    expect(messages.format('incidence', 12.34, -1.5)).toBe('  12.3 ( -1.5) incidence');
  });

  it('should format lines without an increase', () => {
    expect(new MessageBundle('en').format('deaths', 40)).toBe('    40 deaths');
  });

  it('should format German lines', () => {
    const messages = createMessageBundle('de_DE.UTF-8');

    expect(messages.locale).toBe('de');
    expect(messages.format('recovered', 900, 12)).toBe('   900 (  +12) Genesene');
    expect(messages.format('hospitalised', 88)).toBe('    88 Krankenhauseinweisungen');
  });

  it('should default to English', () => {
    expect(createMessageBundle(undefined).locale).toBe('en');
  });
});
