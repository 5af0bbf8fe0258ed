/**
 * PORTFOLIO ENGINE ROUTES
 *
 * Live dashboard, allocation, what-if simulation and reference data.
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { ValidationError } from '../../common/errors.js';
import type { MarketDataService } from '../market-data/market_data.service.js';
import type { WeightsService } from '../weights/weights.service.js';
import { analyzeDrawdown, buildDrawdownCurve } from './drawdown.service.js';
import {
  DEFAULT_EQUITY_WEIGHTS,
  DEFAULT_RESERVE_WEIGHTS,
  INSTRUMENTS,
  SIMPLE_MODEL,
} from './instruments.rules.js';
import { EQUITY_KEYS, RESERVE_KEYS, type RegimeThresholds } from './portfolio.contract.js';
import { ENGINE_VERSION, buildPortfolioView } from './portfolio_engine.service.js';
import { DEFAULT_RALLIES, DEFAULT_THRESHOLDS, REGIMES, RULES_VERSION } from './regime.rules.js';

export interface PortfolioRouteDeps {
  market: MarketDataService;
  weights: WeightsService;
  thresholds?: RegimeThresholds;
}

const DEFAULT_PORTFOLIO_VALUE = 100000;

// ═══════════════════════════════════════════════════════════════
// BODY SCHEMAS
// ═══════════════════════════════════════════════════════════════

const EquityWeightsSchema = z.record(z.enum(EQUITY_KEYS), z.number());
const ReserveWeightsSchema = z.record(z.enum(RESERVE_KEYS), z.number());
const HoldingsSchema = z.record(z.string(), z.number());

const AllocateBody = z.object({
  portfolioValue: z.number().default(DEFAULT_PORTFOLIO_VALUE),
  currentHoldings: HoldingsSchema.optional(),
  equityWeights: EquityWeightsSchema.optional(),
  reserveWeights: ReserveWeightsSchema.optional(),
});

const SimulateBody = z.object({
  drawdownPct: z.number().default(0),
  creditSpread: z.number().nullable().optional(),
  vix: z.number().nullable().optional(),
  portfolioValue: z.number().default(DEFAULT_PORTFOLIO_VALUE),
  currentHoldings: HoldingsSchema.optional(),
  equityWeights: EquityWeightsSchema.optional(),
  reserveWeights: ReserveWeightsSchema.optional(),
  troughPrice: z.number().optional(),
  currentPrice: z.number().optional(),
});

const AnalyzeBody = z.object({
  series: z.array(z.object({
    date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD'),
    price: z.number(),
  })).refine(
    series => series.every((p, i) => i === 0 || series[i - 1].date < p.date),
    'series must be in ascending date order without duplicates'
  ),
  lookback: z.number().int().positive().optional(),
});

const WeightsBody = z.object({
  equityWeights: EquityWeightsSchema.optional(),
  reserveWeights: ReserveWeightsSchema.optional(),
});

const CacheClearBody = z.object({
  pattern: z.string().optional(),
});

function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    const message = parsed.error.issues
      .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ValidationError(message);
  }
  return parsed.data;
}

// ═══════════════════════════════════════════════════════════════
// ROUTES
// ═══════════════════════════════════════════════════════════════

export async function registerPortfolioRoutes(
  fastify: FastifyInstance,
  deps: PortfolioRouteDeps
): Promise<void> {
  const prefix = '/api/portfolio';
  const { market, weights } = deps;
  const thresholds = deps.thresholds ?? DEFAULT_THRESHOLDS;

  // ─────────────────────────────────────────────────────────────
  // GET /api/portfolio/health
  // ─────────────────────────────────────────────────────────────

  fastify.get(`${prefix}/health`, async () => {
    return {
      ok: true,
      module: 'portfolio-engine',
      version: ENGINE_VERSION,
      rulesVersion: RULES_VERSION,
      weightStore: weights.storeKind,
      cache: market.cacheStats(),
    };
  });

  // ─────────────────────────────────────────────────────────────
  // GET /api/portfolio/dashboard: live market → regime + recovery
  // ─────────────────────────────────────────────────────────────

  fastify.get(`${prefix}/dashboard`, async () => {
    const data = await market.getDashboardData();
    const { equityWeights, reserveWeights } = await weights.getEffectiveWeights();

    const view = buildPortfolioView({
      drawdownPct: data.drawdown?.drawdownPct ?? 0,
      indicators: { volatility: data.vix, creditSpread: data.creditSpread },
      portfolioValue: DEFAULT_PORTFOLIO_VALUE,
      equityWeights,
      reserveWeights,
      troughPrice: data.drawdown?.troughPrice,
      currentPrice: data.drawdown?.currentPrice,
      thresholds,
    });

    return {
      ok: true,
      market: data,
      regime: view.regime,
      recovery: view.recovery,
    };
  });

  // ─────────────────────────────────────────────────────────────
  // POST /api/portfolio/allocate: targets under the live regime
  // ─────────────────────────────────────────────────────────────

  fastify.post(`${prefix}/allocate`, async (req) => {
    const body = parseBody(AllocateBody, req.body);
    const data = await market.getDashboardData();
    const effective = await weights.getEffectiveWeights({
      equityWeights: body.equityWeights,
      reserveWeights: body.reserveWeights,
    });

    const view = buildPortfolioView({
      drawdownPct: data.drawdown?.drawdownPct ?? 0,
      indicators: { volatility: data.vix, creditSpread: data.creditSpread },
      portfolioValue: body.portfolioValue,
      equityWeights: effective.equityWeights,
      reserveWeights: effective.reserveWeights,
      currentHoldings: body.currentHoldings,
      thresholds,
    });

    return {
      ok: true,
      regime: view.regime,
      allocation: view.allocation,
    };
  });

  // ─────────────────────────────────────────────────────────────
  // POST /api/portfolio/simulate: hypothetical drawdown / stress
  // ─────────────────────────────────────────────────────────────

  fastify.post(`${prefix}/simulate`, async (req) => {
    const body = parseBody(SimulateBody, req.body);
    const effective = await weights.getEffectiveWeights({
      equityWeights: body.equityWeights,
      reserveWeights: body.reserveWeights,
    });

    const view = buildPortfolioView({
      drawdownPct: body.drawdownPct,
      indicators: { volatility: body.vix, creditSpread: body.creditSpread },
      portfolioValue: body.portfolioValue,
      equityWeights: effective.equityWeights,
      reserveWeights: effective.reserveWeights,
      currentHoldings: body.currentHoldings,
      troughPrice: body.troughPrice,
      currentPrice: body.currentPrice,
      thresholds,
    });

    return {
      ok: true,
      regime: view.regime,
      allocation: view.allocation,
      recovery: view.recovery,
    };
  });

  // ─────────────────────────────────────────────────────────────
  // POST /api/portfolio/analyze: drawdown of a supplied series
  // ─────────────────────────────────────────────────────────────

  fastify.post(`${prefix}/analyze`, async (req) => {
    const body = parseBody(AnalyzeBody, req.body);

    return {
      ok: true,
      drawdown: analyzeDrawdown(body.series),
      curve: buildDrawdownCurve(body.series, body.lookback),
    };
  });

  // ─────────────────────────────────────────────────────────────
  // GET /api/portfolio/reference: tables incl. saved overrides
  // ─────────────────────────────────────────────────────────────

  fastify.get(`${prefix}/reference`, async () => {
    const effective = await weights.getEffectiveWeights();

    return {
      ok: true,
      equityWeights: effective.equityWeights,
      reserveWeights: effective.reserveWeights,
      originalEquityWeights: DEFAULT_EQUITY_WEIGHTS,
      originalReserveWeights: DEFAULT_RESERVE_WEIGHTS,
      hasSavedDefaults: effective.hasSavedDefaults,
      instruments: INSTRUMENTS,
      simpleModel: SIMPLE_MODEL,
      regimes: REGIMES,
      thresholds,
      rallies: DEFAULT_RALLIES,
    };
  });

  // ─────────────────────────────────────────────────────────────
  // POST / DELETE /api/portfolio/weights: saved defaults
  // ─────────────────────────────────────────────────────────────

  fastify.post(`${prefix}/weights`, async (req) => {
    const body = parseBody(WeightsBody, req.body);
    const saved = await weights.saveOverrides(body);

    return { ok: true, saved };
  });

  fastify.delete(`${prefix}/weights`, async () => {
    const deleted = await weights.clearOverrides();

    return { ok: true, deleted };
  });

  // ─────────────────────────────────────────────────────────────
  // Cache admin
  // ─────────────────────────────────────────────────────────────

  fastify.post(`${prefix}/admin/cache/clear`, async (req) => {
    const body = parseBody(CacheClearBody, req.body);
    const cleared = market.clearCache(body.pattern);

    return {
      ok: true,
      cleared,
      stats: market.cacheStats(),
    };
  });

  fastify.get(`${prefix}/admin/cache/stats`, async () => {
    return {
      ok: true,
      stats: market.cacheStats(),
    };
  });

  fastify.log.info(`[Portfolio Engine] Routes registered at ${prefix}/*`);
}

export default registerPortfolioRoutes;
