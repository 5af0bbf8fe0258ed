/**
 * MARKET DATA SERVICE
 *
 * Cached access to history, VIX and credit spread, plus the
 * dashboard aggregate. Fetch failures degrade to null / empty
 * and are logged, never thrown.
 */

import { analyzeDrawdown, buildDrawdownCurve } from '../portfolio-engine/drawdown.service.js';
import type { DrawdownSnapshot, PricePoint } from '../portfolio-engine/portfolio.contract.js';
import {
  DEFAULT_CHART_POINTS,
  SPREAD_PROXY,
  type CreditSpreadReading,
  type MarketDashboardData,
  type MarketDataOptions,
  type MarketDataProvider,
} from './market_data.contract.js';
import { TtlCache, buildCacheKey, mergeCacheStats, type CacheStats } from './market_cache.js';

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class MarketDataService {
  private readonly history: TtlCache<PricePoint[]>;
  private readonly vix: TtlCache<number>;
  private readonly spread: TtlCache<CreditSpreadReading>;

  constructor(
    private readonly provider: MarketDataProvider,
    private readonly options: MarketDataOptions
  ) {
    const now = options.now;
    const clock = now ? () => now().getTime() : Date.now;
    this.history = new TtlCache<PricePoint[]>(clock);
    this.vix = new TtlCache<number>(clock);
    this.spread = new TtlCache<CreditSpreadReading>(clock);
  }

  // ─────────────────────────────────────────────────────────────
  // Raw inputs
  // ─────────────────────────────────────────────────────────────

  async getHistory(): Promise<PricePoint[]> {
    const { proxyTicker, historyRange, cacheTtlMs } = this.options;
    const key = buildCacheKey('hist', proxyTicker, historyRange);

    const cached = this.history.get(key);
    if (cached) return cached;

    try {
      const points = await this.provider.fetchHistory(proxyTicker, historyRange);
      if (points.length === 0) {
        console.warn(`[Market Data] No history returned for ${proxyTicker}`);
        return [];
      }
      this.history.set(key, points, cacheTtlMs);
      console.log(`[Market Data] ${proxyTicker}: ${points.length} closes (${historyRange})`);
      return points;
    } catch (error) {
      console.warn(`[Market Data] Failed to fetch ${proxyTicker}:`, errorMessage(error));
      return [];
    }
  }

  async getVix(): Promise<number | null> {
    const key = buildCacheKey('vix', this.options.vixTicker);

    const cached = this.vix.get(key);
    if (cached !== null) return cached;

    try {
      const value = await this.provider.fetchLatestClose(this.options.vixTicker);
      if (value === null) return null;
      const rounded = round2(value);
      this.vix.set(key, rounded, this.options.cacheTtlMs);
      return rounded;
    } catch (error) {
      console.warn('[Market Data] VIX fetch failed:', errorMessage(error));
      return null;
    }
  }

  /**
   * BBB OAS from FRED when a key is configured; otherwise (or on failure)
   * an estimate from VIX.
   */
  async getCreditSpread(): Promise<CreditSpreadReading> {
    const key = buildCacheKey('spread', this.options.spreadSeries);

    const cached = this.spread.get(key);
    if (cached) return cached;

    const apiKey = this.options.fredApiKey;
    if (apiKey) {
      try {
        const value = await this.provider.fetchFredLatest(this.options.spreadSeries, apiKey);
        if (value !== null) {
          const reading: CreditSpreadReading = { value: round2(value), source: 'FRED' };
          this.spread.set(key, reading, this.options.cacheTtlMs);
          return reading;
        }
        console.warn(`[Market Data] FRED returned no observations for ${this.options.spreadSeries}`);
      } catch (error) {
        console.warn('[Market Data] FRED fetch failed:', errorMessage(error));
      }
    }

    const vix = await this.getVix();
    if (vix === null) {
      return { value: null, source: 'NONE' };
    }

    const reading: CreditSpreadReading = {
      value: round2(SPREAD_PROXY.intercept + vix * SPREAD_PROXY.slope),
      source: 'VIX_PROXY',
    };
    this.spread.set(key, reading, this.options.cacheTtlMs);
    return reading;
  }

  // ─────────────────────────────────────────────────────────────
  // Dashboard aggregate
  // ─────────────────────────────────────────────────────────────

  async getDashboardData(): Promise<MarketDashboardData> {
    const history = await this.getHistory();
    const vix = await this.getVix();
    // after getVix so the proxy fallback reuses the cached reading
    const spread = await this.getCreditSpread();

    const chartPoints = this.options.chartPoints ?? DEFAULT_CHART_POINTS;
    const hasSeries = history.length >= 2;

    const drawdown: DrawdownSnapshot | null = hasSeries ? roundSnapshot(analyzeDrawdown(history)) : null;
    const curve = hasSeries ? buildDrawdownCurve(history, chartPoints) : [];

    return {
      drawdown,
      vix,
      creditSpread: spread.value,
      creditSpreadSource: spread.source,
      drawdownChart: curve.map(p => ({ date: p.date, drawdown: round2(p.drawdownPct) })),
      priceChart: curve.map(p => ({ date: p.date, price: round2(p.price) })),
      lastUpdated: (this.options.now ? this.options.now() : new Date()).toISOString(),
    };
  }

  // ─────────────────────────────────────────────────────────────
  // Cache admin
  // ─────────────────────────────────────────────────────────────

  clearCache(pattern?: string): number {
    return this.history.invalidate(pattern) + this.vix.invalidate(pattern) + this.spread.invalidate(pattern);
  }

  cacheStats(): CacheStats {
    return mergeCacheStats([this.history.stats(), this.vix.stats(), this.spread.stats()]);
  }
}

function roundSnapshot(s: DrawdownSnapshot): DrawdownSnapshot {
  return {
    currentPrice: round2(s.currentPrice),
    ath: round2(s.ath),
    athDate: s.athDate,
    drawdownPct: round2(s.drawdownPct),
    troughPrice: round2(s.troughPrice),
    troughDate: s.troughDate,
  };
}
