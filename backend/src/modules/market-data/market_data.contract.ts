/**
 * MARKET DATA: Contract
 *
 * Inputs for regime detection:
 * - Index history (MSCI World proxy, daily closes)
 * - VIX (latest close)
 * - BBB corporate OAS from FRED, VIX-derived estimate as fallback
 */

import type { DrawdownSnapshot, PricePoint } from '../portfolio-engine/portfolio.contract.js';

export interface MarketDataProvider {
  fetchHistory(ticker: string, range: string): Promise<PricePoint[]>;
  fetchLatestClose(ticker: string): Promise<number | null>;
  fetchFredLatest(seriesId: string, apiKey: string): Promise<number | null>;
}

export interface MarketDataOptions {
  proxyTicker: string;
  vixTicker: string;
  spreadSeries: string;
  historyRange: string;
  fredApiKey?: string;
  cacheTtlMs: number;
  chartPoints?: number;
  now?: () => Date;
}

export type CreditSpreadSource = 'FRED' | 'VIX_PROXY' | 'NONE';

export interface CreditSpreadReading {
  value: number | null;
  source: CreditSpreadSource;
}

export interface DrawdownChartPoint {
  date: string;
  drawdown: number;
}

export interface PriceChartPoint {
  date: string;
  price: number;
}

export interface MarketDashboardData {
  drawdown: DrawdownSnapshot | null;
  vix: number | null;
  creditSpread: number | null;
  creditSpreadSource: CreditSpreadSource;
  drawdownChart: DrawdownChartPoint[];
  priceChart: PriceChartPoint[];
  lastUpdated: string;
}

/** ~2 years of trading days */
export const DEFAULT_CHART_POINTS = 504;

/** Rough VIX → BBB OAS mapping: VIX 12 → ~1.6, VIX 30 → ~3.2, VIX 50 → ~5.0 */
export const SPREAD_PROXY = {
  intercept: 0.5,
  slope: 0.09,
} as const;
