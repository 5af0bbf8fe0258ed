/**
 * PORTFOLIO ENGINE MODULE
 *
 * Regime-aware allocation:
 * - Drawdown analysis of a market proxy series
 * - Regime classification (A / B / C) with stress confirmation
 * - Target positions, expense ratio, rebalance trades
 * - Recovery progress toward the next de-escalation
 */

export * from './portfolio.contract.js';
export * from './regime.rules.js';
export * from './instruments.rules.js';
export * from './drawdown.service.js';
export * from './regime.service.js';
export * from './allocation.service.js';
export * from './recovery.service.js';
export * from './portfolio_engine.service.js';
export { registerPortfolioRoutes, type PortfolioRouteDeps } from './portfolio.routes.js';
