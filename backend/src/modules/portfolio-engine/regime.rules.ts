/**
 * REGIME RULES
 *
 * Drawdown triggers, stress confirmations and sleeve splits
 * for the three-state model.
 */

import type {
  RegimeDefinition,
  RegimeId,
  RegimeThresholds,
  RecoveryRallies,
} from './portfolio.contract.js';

// ═══════════════════════════════════════════════════════════════
// 1️⃣ TRIGGERS
// ═══════════════════════════════════════════════════════════════

export const DEFAULT_THRESHOLDS: Readonly<RegimeThresholds> = Object.freeze({
  drawdownB: -20,          // % from ATH
  drawdownC: -40,
  spreadElevated: 2.5,     // BBB OAS, percentage points
  spreadExtreme: 4.5,
  volatilityStress: 30,    // VIX; same level confirms B and C
});

// ═══════════════════════════════════════════════════════════════
// 2️⃣ SLEEVE SPLITS
// ═══════════════════════════════════════════════════════════════

export const REGIMES: Readonly<Record<RegimeId, Readonly<RegimeDefinition>>> = Object.freeze({
  A: Object.freeze<RegimeDefinition>({
    id: 'A',
    label: 'Normal',
    description:
      'Markets operating normally. Maintain standard allocation: ' +
      '80% Equity / 20% Reserve. Rebalance quarterly.',
    equityPct: 0.80,
    reservePct: 0.20,
  }),
  B: Object.freeze<RegimeDefinition>({
    id: 'B',
    label: 'Equity Scarcity',
    description:
      'Equity scarcity detected. Deploy 50% of the Investment Reserve ' +
      'into equities. Target allocation: 90% Equity / 10% Reserve.',
    equityPct: 0.90,
    reservePct: 0.10,
  }),
  C: Object.freeze<RegimeDefinition>({
    id: 'C',
    label: 'Escalation',
    description:
      'Full-scale market panic detected. Deploy ALL remaining reserves ' +
      'into equities. Target allocation: 100% Equity / 0% Reserve.',
    equityPct: 1.00,
    reservePct: 0.00,
  }),
});

export const REGIME_RANK: Readonly<Record<RegimeId, number>> = Object.freeze({
  A: 0,
  B: 1,
  C: 2,
});

// ═══════════════════════════════════════════════════════════════
// 3️⃣ RECOVERY
// ═══════════════════════════════════════════════════════════════

export const DEFAULT_RALLIES: Readonly<RecoveryRallies> = Object.freeze({
  cToB: 0.50,
  bToA: 0.25,
});

export const NO_TRIGGERS_MESSAGE = 'No crisis triggers active';

export const RULES_VERSION = '1.0.0';
