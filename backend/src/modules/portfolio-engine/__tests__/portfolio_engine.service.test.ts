/**
 * Orchestrator Tests: drawdown → regime → allocation, recovery alongside
 */

import { describe, it, expect } from 'vitest';
import { analyzeDrawdown } from '../drawdown.service.js';
import { DEFAULT_EQUITY_WEIGHTS, DEFAULT_RESERVE_WEIGHTS } from '../instruments.rules.js';
import { buildPortfolioView } from '../portfolio_engine.service.js';

describe('buildPortfolioView', () => {

  it('chains a series into regime B targets', () => {
    const dd = analyzeDrawdown([
      { date: '2024-01-01', price: 100 },
      { date: '2024-01-02', price: 120 },
      { date: '2024-01-03', price: 150 },
      { date: '2024-01-04', price: 90 },
      { date: '2024-01-05', price: 95 },
    ]);

    const view = buildPortfolioView({
      drawdownPct: dd.drawdownPct,
      indicators: { creditSpread: 3.0, volatility: 25 },
      portfolioValue: 100000,
      equityWeights: DEFAULT_EQUITY_WEIGHTS,
      reserveWeights: DEFAULT_RESERVE_WEIGHTS,
      troughPrice: dd.troughPrice,
      currentPrice: dd.currentPrice,
    });

    expect(view.regime.id).toBe('B');
    expect(view.allocation.regimeId).toBe('B');
    expect(view.allocation.equityValue).toBe(90000);
    expect(view.recovery?.cToBPrice).toBe(135);
    expect(view.recovery?.progressToB).toBeCloseTo(11.11, 2);
    expect(view.recovery?.progressToA).toBeNull();
  });

  it('keeps recovery progress independent of the regime', () => {
    // past the B → A level, yet the drawdown and spread still say B
    const view = buildPortfolioView({
      drawdownPct: -25,
      indicators: { creditSpread: 3 },
      portfolioValue: 1000,
      equityWeights: DEFAULT_EQUITY_WEIGHTS,
      reserveWeights: DEFAULT_RESERVE_WEIGHTS,
      troughPrice: 50,
      currentPrice: 100,
    });

    expect(view.regime.id).toBe('B');
    expect(view.recovery?.progressToA).toBe(100);
  });

  it('skips recovery without a trough', () => {
    const view = buildPortfolioView({
      drawdownPct: 0,
      indicators: {},
      portfolioValue: 1000,
      equityWeights: DEFAULT_EQUITY_WEIGHTS,
      reserveWeights: DEFAULT_RESERVE_WEIGHTS,
      troughPrice: null,
      currentPrice: 100,
    });

    expect(view.regime.id).toBe('A');
    expect(view.recovery).toBeNull();
  });
});
