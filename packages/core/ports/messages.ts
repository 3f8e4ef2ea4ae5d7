/**
 * Message Bundle Port
 *
 * @module packages/core/ports/messages
 */

export const MESSAGE_IDS = ['cases', 'active', 'recovered', 'hospitalised', 'deaths', 'incidence'] as const;

export type MessageId = (typeof MESSAGE_IDS)[number];

/**
 * Localized display strings for the summary, resolved once at startup.
 */
export interface IMessageBundle {
  readonly locale: string;

  /**
   * Format a count, optionally followed by its signed change.
   */
  format(id: MessageId, count: number, increase?: number): string;
}
