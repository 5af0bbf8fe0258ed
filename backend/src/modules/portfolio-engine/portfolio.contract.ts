/**
 * PORTFOLIO ENGINE: Contract
 *
 * Regime-aware allocation over a two-sleeve universe:
 * - Drawdown against the running all-time high
 * - Three-state regime (A Normal / B Equity Scarcity / C Escalation)
 * - Target positions + rebalance deltas
 * - Recovery checkpoints after a trough
 */

// ═══════════════════════════════════════════════════════════════
// INSTRUMENT KEYS (closed sets)
// ═══════════════════════════════════════════════════════════════

export const EQUITY_KEYS = [
  'north_america',
  'europe',
  'emerging_markets',
  'small_caps',
  'japan',
  'pacific_ex_jp',
] as const;

export const RESERVE_KEYS = [
  'inflation_linked',
  'money_market',
  'gold',
  'cash',
] as const;

export const SIMPLE_KEYS = ['acwi_imi', 'small_caps', 'cash'] as const;

export type EquityKey = typeof EQUITY_KEYS[number];
export type ReserveKey = typeof RESERVE_KEYS[number];
export type SimpleKey = typeof SIMPLE_KEYS[number];
export type InstrumentKey = EquityKey | ReserveKey | SimpleKey;

export type Sleeve = 'equity' | 'reserve';

// ═══════════════════════════════════════════════════════════════
// REFERENCE DATA
// ═══════════════════════════════════════════════════════════════

export interface InstrumentMeta {
  displayName: string;
  identifierCode: string;    // ISIN, 'N/A' for cash
  ticker: string;
  trackedIndex: string;
  expenseRatio: number;      // fraction, 0.0007 = 0.07%
}

export type InstrumentCatalog = Readonly<Record<InstrumentKey, Readonly<InstrumentMeta>>>;

export type EquityWeights = Partial<Record<EquityKey, number>>;
export type ReserveWeights = Partial<Record<ReserveKey, number>>;

export interface SimpleModelRule {
  key: SimpleKey;
  sleeve: Sleeve;
  baselineWeight: number;    // weight of total portfolio under the 80/20 baseline
}

// ═══════════════════════════════════════════════════════════════
// DRAWDOWN
// ═══════════════════════════════════════════════════════════════

export interface PricePoint {
  date: string;              // YYYY-MM-DD
  price: number;
}

export interface DrawdownSnapshot {
  currentPrice: number;
  ath: number;
  athDate: string;
  drawdownPct: number;       // <= 0
  troughPrice: number;
  troughDate: string;
}

export interface DrawdownPoint {
  date: string;
  price: number;
  runningAth: number;
  drawdownPct: number;
}

// ═══════════════════════════════════════════════════════════════
// REGIME
// ═══════════════════════════════════════════════════════════════

export type RegimeId = 'A' | 'B' | 'C';

export interface StressIndicators {
  volatility?: number | null;
  creditSpread?: number | null;
}

export interface RegimeThresholds {
  drawdownB: number;
  drawdownC: number;
  spreadElevated: number;
  spreadExtreme: number;
  volatilityStress: number;
}

export interface RegimeDefinition {
  id: RegimeId;
  label: string;
  description: string;
  equityPct: number;
  reservePct: number;
}

export interface Regime extends RegimeDefinition {
  triggersMet: string[];
}

// ═══════════════════════════════════════════════════════════════
// ALLOCATION
// ═══════════════════════════════════════════════════════════════

export type Holdings = Readonly<Record<string, number>>;

export interface AllocationInput {
  regime: RegimeDefinition;
  equityWeights: EquityWeights;
  reserveWeights: ReserveWeights;
  portfolioValue: number;
  currentHoldings?: Holdings;
  catalog?: InstrumentCatalog;
}

export interface Position {
  instrumentKey: InstrumentKey;
  sleeve: Sleeve;
  displayName: string;
  identifierCode: string;
  trackedIndex: string;
  expenseRatio: number;
  targetWeight: number;      // share of its sleeve, 0..1
  targetValue: number;
  portfolioWeight: number;   // targetValue / portfolioValue
  currentValue?: number;
  tradeDelta?: number;       // > 0 buy, < 0 sell
}

export interface Liquidation {
  instrumentKey: string;
  currentValue: number;
  tradeDelta: number;
}

export type TradeSide = 'BUY' | 'SELL';

export interface RebalanceAction {
  instrumentKey: string;
  side: TradeSide;
  amount: number;
  description: string;
}

export interface AllocationResult {
  regimeId: RegimeId;
  portfolioValue: number;
  equityValue: number;
  reserveValue: number;
  equityPct: number;
  reservePct: number;
  positions: Position[];
  simplePositions: Position[];
  liquidations: Liquidation[];
  weightedExpenseRatio: number;
  simpleWeightedExpenseRatio: number;
  rebalanceActions: RebalanceAction[];
}

// ═══════════════════════════════════════════════════════════════
// RECOVERY
// ═══════════════════════════════════════════════════════════════

export interface RecoveryRallies {
  cToB: number;              // 0.50 = +50% from trough
  bToA: number;              // 0.25 = +25% beyond the C→B level
}

export interface RecoveryState {
  troughPrice: number;
  currentPrice: number;
  cToBPrice: number;
  bToAPrice: number;
  progressToB: number;
  progressToA: number | null;
}
