/**
 * ALLOCATION CALCULATOR
 *
 * Regime split → sleeve values → per-instrument targets.
 *
 * Policy application order (strict):
 * 1. Validate portfolio value, weights and holdings
 * 2. Split portfolio into equity / reserve sleeves
 * 3. Normalize each sleeve's weights against its own total
 * 4. Build the simplified 3-instrument view from its fixed rule
 * 5. Re-base to the whole portfolio for the blended expense ratio
 * 6. Diff against current holdings (when supplied)
 */

import { InvalidPortfolioValueError, InvalidWeightsError } from '../../common/errors.js';
import {
  EQUITY_KEYS,
  RESERVE_KEYS,
  SIMPLE_KEYS,
  type AllocationInput,
  type AllocationResult,
  type Holdings,
  type InstrumentCatalog,
  type InstrumentKey,
  type Liquidation,
  type Position,
  type RebalanceAction,
  type Sleeve,
} from './portfolio.contract.js';
import { INSTRUMENTS, REBALANCE_ACTION_THRESHOLD, SIMPLE_MODEL } from './instruments.rules.js';

const ALL_KEYS: ReadonlyArray<string> = [...EQUITY_KEYS, ...RESERVE_KEYS, ...SIMPLE_KEYS];

export function isInstrumentKey(key: string): key is InstrumentKey {
  return ALL_KEYS.includes(key);
}

// ═══════════════════════════════════════════════════════════════
// VALIDATION
// ═══════════════════════════════════════════════════════════════

function assertWeights(
  sleeve: Sleeve,
  keys: ReadonlyArray<string>,
  weights: Readonly<Record<string, number | undefined>>
): void {
  const entries = Object.entries(weights).filter(([, value]) => value !== undefined);
  if (entries.length === 0) {
    throw new InvalidWeightsError(`The ${sleeve} weight table is empty`);
  }

  for (const [key, value] of entries) {
    if (!keys.includes(key)) {
      throw new InvalidWeightsError(`Unknown ${sleeve} instrument '${key}'`);
    }
    if (value === undefined || !Number.isFinite(value) || value < 0) {
      throw new InvalidWeightsError(`Invalid ${sleeve} weight for '${key}': ${value}`);
    }
  }
}

function assertHoldings(holdings: Holdings): void {
  for (const [key, value] of Object.entries(holdings)) {
    if (!Number.isFinite(value) || value < 0) {
      throw new InvalidWeightsError(`Invalid current holding for '${key}': ${value}`);
    }
  }
}

// ═══════════════════════════════════════════════════════════════
// POSITION BUILDERS
// ═══════════════════════════════════════════════════════════════

function buildPosition(
  key: InstrumentKey,
  sleeve: Sleeve,
  share: number,
  sleeveValue: number,
  portfolioValue: number,
  catalog: InstrumentCatalog
): Position {
  const meta = catalog[key];
  const targetValue = share * sleeveValue;

  return {
    instrumentKey: key,
    sleeve,
    displayName: meta.displayName,
    identifierCode: meta.identifierCode,
    trackedIndex: meta.trackedIndex,
    expenseRatio: meta.expenseRatio,
    targetWeight: share,
    targetValue,
    portfolioWeight: portfolioValue > 0 ? targetValue / portfolioValue : 0,
  };
}

function sleevePositions<K extends InstrumentKey>(
  sleeve: Sleeve,
  keys: ReadonlyArray<K>,
  weights: Partial<Record<K, number>>,
  sleeveValue: number,
  portfolioValue: number,
  catalog: InstrumentCatalog
): Position[] {
  const entries: Array<[K, number]> = [];
  for (const key of keys) {
    const raw = weights[key];
    if (raw !== undefined) entries.push([key, raw]);
  }

  const total = entries.reduce((acc, [, raw]) => acc + raw, 0);

  return entries.map(([key, raw]) =>
    buildPosition(key, sleeve, total > 0 ? raw / total : 0, sleeveValue, portfolioValue, catalog)
  );
}

function simplePositions(
  equityValue: number,
  reserveValue: number,
  portfolioValue: number,
  catalog: InstrumentCatalog
): Position[] {
  const baselineTotals: Record<Sleeve, number> = { equity: 0, reserve: 0 };
  for (const rule of SIMPLE_MODEL) {
    baselineTotals[rule.sleeve] += rule.baselineWeight;
  }

  return SIMPLE_MODEL.map(rule => {
    const baseline = baselineTotals[rule.sleeve];
    const share = baseline > 0 ? rule.baselineWeight / baseline : 0;
    const sleeveValue = rule.sleeve === 'equity' ? equityValue : reserveValue;
    return buildPosition(rule.key, rule.sleeve, share, sleeveValue, portfolioValue, catalog);
  });
}

function weightedExpenseRatio(positions: ReadonlyArray<Position>): number {
  return positions.reduce((acc, p) => acc + p.portfolioWeight * p.expenseRatio, 0);
}

// ═══════════════════════════════════════════════════════════════
// REBALANCE
// ═══════════════════════════════════════════════════════════════

function formatAmount(amount: number): string {
  return amount.toLocaleString('en-US', { maximumFractionDigits: 0 });
}

function toAction(key: string, name: string, delta: number): RebalanceAction {
  const side = delta > 0 ? 'BUY' : 'SELL';
  const amount = Math.abs(delta);
  return {
    instrumentKey: key,
    side,
    amount,
    description: `${side} €${formatAmount(amount)} of ${name} (${key})`,
  };
}

function applyHoldings(
  positions: Position[],
  holdings: Holdings,
  portfolioValue: number,
  catalog: InstrumentCatalog
): { positions: Position[]; liquidations: Liquidation[]; actions: RebalanceAction[] } {
  const targeted = new Set<string>();
  const actions: RebalanceAction[] = [];
  const minTrade = REBALANCE_ACTION_THRESHOLD * portfolioValue;

  const diffed = positions.map(p => {
    targeted.add(p.instrumentKey);
    const currentValue = Object.hasOwn(holdings, p.instrumentKey) ? holdings[p.instrumentKey] : 0;
    const tradeDelta = p.targetValue - currentValue;
    if (Math.abs(tradeDelta) > minTrade) {
      actions.push(toAction(p.instrumentKey, p.displayName, tradeDelta));
    }
    return { ...p, currentValue, tradeDelta };
  });

  const liquidations: Liquidation[] = [];
  for (const [key, currentValue] of Object.entries(holdings)) {
    if (targeted.has(key)) continue;
    const tradeDelta = 0 - currentValue;
    liquidations.push({ instrumentKey: key, currentValue, tradeDelta });
    if (Math.abs(tradeDelta) > minTrade) {
      const name = isInstrumentKey(key) ? catalog[key].displayName : key;
      actions.push(toAction(key, name, tradeDelta));
    }
  }

  return { positions: diffed, liquidations, actions };
}

// ═══════════════════════════════════════════════════════════════
// MAIN
// ═══════════════════════════════════════════════════════════════

export function allocate(input: AllocationInput): AllocationResult {
  const { regime, portfolioValue, currentHoldings } = input;
  const catalog = input.catalog ?? INSTRUMENTS;

  if (!Number.isFinite(portfolioValue) || portfolioValue < 0) {
    throw new InvalidPortfolioValueError(portfolioValue);
  }
  assertWeights('equity', EQUITY_KEYS, input.equityWeights);
  assertWeights('reserve', RESERVE_KEYS, input.reserveWeights);
  if (currentHoldings) assertHoldings(currentHoldings);

  const equityValue = portfolioValue * regime.equityPct;
  const reserveValue = portfolioValue * regime.reservePct;

  const targets = [
    ...sleevePositions('equity', EQUITY_KEYS, input.equityWeights, equityValue, portfolioValue, catalog),
    ...sleevePositions('reserve', RESERVE_KEYS, input.reserveWeights, reserveValue, portfolioValue, catalog),
  ];
  const simple = simplePositions(equityValue, reserveValue, portfolioValue, catalog);

  const rebalance = currentHoldings
    ? applyHoldings(targets, currentHoldings, portfolioValue, catalog)
    : { positions: targets, liquidations: [], actions: [] };

  return {
    regimeId: regime.id,
    portfolioValue,
    equityValue,
    reserveValue,
    equityPct: regime.equityPct,
    reservePct: regime.reservePct,
    positions: rebalance.positions,
    simplePositions: simple,
    liquidations: rebalance.liquidations,
    weightedExpenseRatio: weightedExpenseRatio(targets),
    simpleWeightedExpenseRatio: weightedExpenseRatio(simple),
    rebalanceActions: rebalance.actions,
  };
}
