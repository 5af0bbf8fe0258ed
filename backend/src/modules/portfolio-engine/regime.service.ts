/**
 * REGIME CLASSIFIER
 *
 * Stateless A/B/C classification, re-evaluated from scratch on every call.
 *
 * 🎯 Hierarchy (top-down):
 *   1. C (Escalation)     : drawdown <= -40% AND (spread >= 4.5 OR VIX >= 30)
 *   2. B (Equity Scarcity): drawdown <= -20% AND (spread >= 2.5 OR VIX >= 30)
 *   3. A (Normal)
 *
 * A drawdown without a stress confirmation is an ordinary pullback and stays A.
 */

import type {
  Regime,
  RegimeDefinition,
  RegimeId,
  RegimeThresholds,
  StressIndicators,
} from './portfolio.contract.js';
import { DEFAULT_THRESHOLDS, NO_TRIGGERS_MESSAGE, REGIMES, REGIME_RANK } from './regime.rules.js';

interface StressFlags {
  spreadElevated: boolean;
  spreadExtreme: boolean;
  volatilityStressed: boolean;
  triggers: string[];
}

function present(value: number | null | undefined): value is number {
  return value !== null && value !== undefined && Number.isFinite(value);
}

function evaluateStress(indicators: StressIndicators, t: RegimeThresholds): StressFlags {
  const triggers: string[] = [];
  let spreadElevated = false;
  let spreadExtreme = false;
  let volatilityStressed = false;

  const spread = indicators.creditSpread;
  if (present(spread)) {
    if (spread >= t.spreadExtreme) {
      spreadExtreme = true;
      spreadElevated = true;
      triggers.push(`Credit spread ${spread.toFixed(2)}% ≥ ${t.spreadExtreme}% (extreme)`);
    } else if (spread >= t.spreadElevated) {
      spreadElevated = true;
      triggers.push(`Credit spread ${spread.toFixed(2)}% ≥ ${t.spreadElevated}% (elevated)`);
    }
  }

  const vol = indicators.volatility;
  if (present(vol) && vol >= t.volatilityStress) {
    volatilityStressed = true;
    triggers.push(`VIX ${vol.toFixed(1)} ≥ ${t.volatilityStress}`);
  }

  return { spreadElevated, spreadExtreme, volatilityStressed, triggers };
}

function withTriggers(def: RegimeDefinition, triggersMet: string[]): Regime {
  return { ...def, triggersMet };
}

export function classifyRegime(
  drawdownPct: number,
  indicators: StressIndicators = {},
  thresholds: RegimeThresholds = DEFAULT_THRESHOLDS
): Regime {
  const stress = evaluateStress(indicators, thresholds);
  const elevatedConfirmed = stress.spreadElevated || stress.volatilityStressed;
  const extremeConfirmed = stress.spreadExtreme || stress.volatilityStressed;

  if (drawdownPct <= thresholds.drawdownC && extremeConfirmed) {
    return withTriggers(REGIMES.C, [
      `Drawdown ${drawdownPct.toFixed(1)}% ≤ ${thresholds.drawdownC}%`,
      ...stress.triggers,
    ]);
  }

  if (drawdownPct <= thresholds.drawdownB && elevatedConfirmed) {
    return withTriggers(REGIMES.B, [
      `Drawdown ${drawdownPct.toFixed(1)}% ≤ ${thresholds.drawdownB}%`,
      ...stress.triggers,
    ]);
  }

  return withTriggers(
    REGIMES.A,
    stress.triggers.length > 0 ? stress.triggers : [NO_TRIGGERS_MESSAGE]
  );
}

export function compareRegimes(a: RegimeId, b: RegimeId): number {
  return REGIME_RANK[a] - REGIME_RANK[b];
}
