/**
 * Core Ports
 *
 * Port interfaces between the reconciliation core and its adapters.
 */

export * from './sources.js';
export * from './cache-store.js';
export * from './messages.js';
