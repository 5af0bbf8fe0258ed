/**
 * MARKET DATA MODULE
 *
 * Exports:
 * - Provider contract + HTTP implementation
 * - Cached service used by the portfolio routes
 */

export * from './market_data.contract.js';
export * from './market_cache.js';
export * from './market_data.provider.js';
export * from './market_data.service.js';
