/**
 * INSTRUMENT RULES
 *
 * UCITS universe, default Equal-Value regional weights, reserve
 * composition and the simplified 3-instrument model.
 * Frozen and validated at module load.
 */

import {
  EQUITY_KEYS,
  RESERVE_KEYS,
  SIMPLE_KEYS,
  type EquityWeights,
  type InstrumentCatalog,
  type InstrumentKey,
  type InstrumentMeta,
  type ReserveWeights,
  type SimpleModelRule,
} from './portfolio.contract.js';

// ═══════════════════════════════════════════════════════════════
// DEFAULT WEIGHTS
// ═══════════════════════════════════════════════════════════════

/** Equal-Value regional weights; sum < 1, normalized at use time */
export const DEFAULT_EQUITY_WEIGHTS: Readonly<Required<EquityWeights>> = Object.freeze({
  north_america: 0.4848,
  europe: 0.1615,
  emerging_markets: 0.0814,
  small_caps: 0.0777,
  japan: 0.0587,
  pacific_ex_jp: 0.0175,
});

/** Share of the reserve sleeve; must sum to 1 */
export const DEFAULT_RESERVE_WEIGHTS: Readonly<Required<ReserveWeights>> = Object.freeze({
  inflation_linked: 0.50,
  money_market: 0.40,
  gold: 0.05,
  cash: 0.05,
});

// ═══════════════════════════════════════════════════════════════
// CATALOG
// ═══════════════════════════════════════════════════════════════

function meta(
  displayName: string,
  identifierCode: string,
  ticker: string,
  trackedIndex: string,
  expenseRatio: number
): Readonly<InstrumentMeta> {
  return Object.freeze({ displayName, identifierCode, ticker, trackedIndex, expenseRatio });
}

export const INSTRUMENTS: InstrumentCatalog = Object.freeze({
  north_america: meta('iShares Core S&P 500 UCITS ETF', 'IE00B5BMR087', 'SXR8.DE', 'S&P 500', 0.0007),
  europe: meta('Lyxor Core STOXX Europe 600 UCITS ETF', 'LU0908500753', 'MEUD.PA', 'STOXX Europe 600', 0.0007),
  emerging_markets: meta('iShares Core MSCI EM IMI UCITS ETF', 'IE00BKM4GZ66', 'IS3N.DE', 'MSCI EM IMI', 0.0018),
  small_caps: meta('iShares MSCI World Small Cap UCITS ETF', 'IE00BF4RFH31', 'IUSN.DE', 'MSCI World Small Cap', 0.0035),
  japan: meta('Amundi Prime Japan UCITS ETF', 'LU1931974775', 'PRIJ.DE', 'MSCI Japan', 0.0005),
  pacific_ex_jp: meta('iShares MSCI Pacific ex-Japan UCITS ETF', 'IE00B52MJY50', 'IQQP.DE', 'MSCI Pacific ex-Japan', 0.0020),
  inflation_linked: meta(
    'iShares Euro Inflation Linked Govt Bond UCITS ETF',
    'IE00B0M62X26',
    'IBCI.DE',
    'Bloomberg Euro Govt Inflation-Linked',
    0.0020
  ),
  money_market: meta('Xtrackers II EUR Overnight Rate Swap UCITS ETF', 'LU0290358497', 'XEON.DE', 'EUR Overnight Rate', 0.0010),
  gold: meta('Xtrackers IE Physical Gold ETC', 'DE000A2T0VU5', 'XAD5.DE', 'Gold Spot', 0.0015),
  cash: meta('Cash / High-Yield Savings', 'N/A', 'N/A', 'N/A', 0),
  acwi_imi: meta('SPDR MSCI ACWI IMI UCITS ETF', 'IE00B3YLTY66', 'SPYI.DE', 'MSCI ACWI IMI', 0.0017),
});

// ═══════════════════════════════════════════════════════════════
// SIMPLIFIED MODEL
// ═══════════════════════════════════════════════════════════════

/** Weights of total portfolio under the 80/20 baseline; rescaled per sleeve */
export const SIMPLE_MODEL: ReadonlyArray<Readonly<SimpleModelRule>> = Object.freeze<Readonly<SimpleModelRule>[]>([
  Object.freeze<SimpleModelRule>({ key: 'acwi_imi', sleeve: 'equity', baselineWeight: 0.70 }),
  Object.freeze<SimpleModelRule>({ key: 'small_caps', sleeve: 'equity', baselineWeight: 0.10 }),
  Object.freeze<SimpleModelRule>({ key: 'cash', sleeve: 'reserve', baselineWeight: 0.20 }),
]);

/** Trades smaller than this share of the portfolio are not listed as actions */
export const REBALANCE_ACTION_THRESHOLD = 0.01;

export const WEIGHT_SUM_TOLERANCE = 1e-9;

// ═══════════════════════════════════════════════════════════════
// LOAD-TIME VALIDATION
// ═══════════════════════════════════════════════════════════════

export function sumWeights(weights: Readonly<Record<string, number | undefined>>): number {
  let total = 0;
  for (const value of Object.values(weights)) {
    total += value ?? 0;
  }
  return total;
}

export function validateReferenceData(catalog: InstrumentCatalog = INSTRUMENTS): void {
  const allKeys: InstrumentKey[] = [...EQUITY_KEYS, ...RESERVE_KEYS, ...SIMPLE_KEYS];

  for (const key of allKeys) {
    const entry = catalog[key];
    if (!entry) {
      throw new Error(`Instrument catalog is missing '${key}'`);
    }
    if (!Number.isFinite(entry.expenseRatio) || entry.expenseRatio < 0) {
      throw new Error(`Instrument '${key}' has invalid expense ratio ${entry.expenseRatio}`);
    }
  }

  const reserveSum = sumWeights(DEFAULT_RESERVE_WEIGHTS);
  if (Math.abs(reserveSum - 1) > WEIGHT_SUM_TOLERANCE) {
    throw new Error(`Default reserve weights must sum to 1, got ${reserveSum}`);
  }

  if (sumWeights(DEFAULT_EQUITY_WEIGHTS) <= 0) {
    throw new Error('Default equity weights must have a positive total');
  }

  const simpleSum = SIMPLE_MODEL.reduce((acc, rule) => acc + rule.baselineWeight, 0);
  if (Math.abs(simpleSum - 1) > WEIGHT_SUM_TOLERANCE) {
    throw new Error(`Simplified model weights must sum to 1, got ${simpleSum}`);
  }
}

validateReferenceData();
