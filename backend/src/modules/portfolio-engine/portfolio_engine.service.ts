/**
 * PORTFOLIO ENGINE: Orchestrator
 *
 * Single pass over the four pure stages:
 *   drawdown → regime → allocation
 *               └─────→ recovery (trough + current price)
 *
 * Recovery and regime are reported side by side; neither overrides the other.
 */

import { allocate } from './allocation.service.js';
import { classifyRegime } from './regime.service.js';
import { trackRecovery } from './recovery.service.js';
import { DEFAULT_RALLIES, DEFAULT_THRESHOLDS } from './regime.rules.js';
import type {
  AllocationResult,
  EquityWeights,
  Holdings,
  RecoveryRallies,
  RecoveryState,
  Regime,
  RegimeThresholds,
  ReserveWeights,
  StressIndicators,
} from './portfolio.contract.js';

export const ENGINE_VERSION = '1.0.0';

export interface PortfolioViewInput {
  drawdownPct: number;
  indicators: StressIndicators;
  portfolioValue: number;
  equityWeights: EquityWeights;
  reserveWeights: ReserveWeights;
  currentHoldings?: Holdings;
  troughPrice?: number | null;
  currentPrice?: number | null;
  thresholds?: RegimeThresholds;
  rallies?: RecoveryRallies;
}

export interface PortfolioView {
  regime: Regime;
  allocation: AllocationResult;
  recovery: RecoveryState | null;
}

export function buildPortfolioView(input: PortfolioViewInput): PortfolioView {
  const regime = classifyRegime(
    input.drawdownPct,
    input.indicators,
    input.thresholds ?? DEFAULT_THRESHOLDS
  );

  const allocation = allocate({
    regime,
    equityWeights: input.equityWeights,
    reserveWeights: input.reserveWeights,
    portfolioValue: input.portfolioValue,
    currentHoldings: input.currentHoldings,
  });

  const { troughPrice, currentPrice } = input;
  const recovery = troughPrice != null && currentPrice != null
    ? trackRecovery(troughPrice, currentPrice, input.rallies ?? DEFAULT_RALLIES)
    : null;

  return { regime, allocation, recovery };
}
