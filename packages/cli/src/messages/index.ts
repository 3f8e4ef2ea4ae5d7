/**
 * Localized Messages
 *
 * Format strings for the summary lines, keyed by message ID. `{count}` is
 * right-aligned to width 6, `{increase}` is signed and right-aligned to
 * width 5; incidence values carry one decimal.
 *
 * @module packages/cli/messages
 */

import type { IMessageBundle, MessageId } from '@epitrend/core';

// =============================================================================
// Bundles
// =============================================================================

interface MessageTemplate {
  withIncrease: string;
  plain: string;
}

export type MessageCatalog = Record<MessageId, MessageTemplate>;

const en = {
  cases: { withIncrease: '{count} ({increase}) total cases', plain: '{count} total cases' },
  active: { withIncrease: '{count} ({increase}) active cases', plain: '{count} active cases' },
  recovered: { withIncrease: '{count} ({increase}) recovered', plain: '{count} recovered' },
  hospitalised: { withIncrease: '{count} ({increase}) hospitalised', plain: '{count} hospitalised' },
  deaths: { withIncrease: '{count} ({increase}) deaths', plain: '{count} deaths' },
  incidence: { withIncrease: '{count} ({increase}) incidence', plain: '{count} incidence' },
} satisfies MessageCatalog;

const de = {
  cases: { withIncrease: '{count} ({increase}) Fälle', plain: '{count} Fälle' },
  active: { withIncrease: '{count} ({increase}) aktive Fälle', plain: '{count} aktive Fälle' },
  recovered: { withIncrease: '{count} ({increase}) Genesene', plain: '{count} Genesene' },
  hospitalised: {
    withIncrease: '{count} ({increase}) Krankenhauseinweisungen',
    plain: '{count} Krankenhauseinweisungen',
  },
  deaths: { withIncrease: '{count} ({increase}) Sterbefälle', plain: '{count} Sterbefälle' },
  incidence: { withIncrease: '{count} ({increase}) Inzidenz', plain: '{count} Inzidenz' },
} satisfies MessageCatalog;

export const CATALOGS = { en, de } as const;

export type Locale = keyof typeof CATALOGS;

export const DEFAULT_LOCALE: Locale = 'en';

// =============================================================================
// Locale Resolution
// =============================================================================

function isLocale(value: string): value is Locale {
  return value in CATALOGS;
}

/**
 * Resolve a locale tag such as `de_DE.UTF-8` to a supported locale by its
 * language prefix, falling back to English.
 */
export function resolveLocale(tag: string | undefined): Locale {
  const language = tag?.slice(0, 2).toLowerCase() ?? '';
  return isLocale(language) ? language : DEFAULT_LOCALE;
}

// =============================================================================
// Formatting
// =============================================================================

const COUNT_WIDTH = 6;
const INCREASE_WIDTH = 5;

function decimalsFor(id: MessageId): number {
  return id === 'incidence' ? 1 : 0;
}

export function formatCount(value: number, decimals: number): string {
  return value.toFixed(decimals).padStart(COUNT_WIDTH);
}

export function formatIncrease(value: number, decimals: number): string {
  const text = value.toFixed(decimals);
  return (value >= 0 ? `+${text}` : text).padStart(INCREASE_WIDTH);
}

export class MessageBundle implements IMessageBundle {
  readonly locale: Locale;
  private readonly catalog: MessageCatalog;

  constructor(locale: Locale = DEFAULT_LOCALE) {
    this.locale = locale;
    this.catalog = CATALOGS[locale];
  }

  format(id: MessageId, count: number, increase?: number): string {
    const decimals = decimalsFor(id);
    const template = this.catalog[id];
    const text = increase === undefined ? template.plain : template.withIncrease;

    return text
      .replace('{count}', formatCount(count, decimals))
      .replace('{increase}', increase === undefined ? '' : formatIncrease(increase, decimals));
  }
}

/**
 * Bundle for the user's locale tag
 */
export function createMessageBundle(tag: string | undefined): MessageBundle {
  return new MessageBundle(resolveLocale(tag));
}
