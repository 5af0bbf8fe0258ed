/**
 * MARKET DATA PROVIDER
 *
 * Yahoo Finance chart API for daily closes, FRED observations API
 * for the BBB OAS. Parsers are pure so they can be tested offline.
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { PricePoint } from '../portfolio-engine/portfolio.contract.js';
import type { MarketDataProvider } from './market_data.contract.js';

const YAHOO_CHART_URL = 'https://query1.finance.yahoo.com/v8/finance/chart';
const FRED_OBSERVATIONS_URL = 'https://api.stlouisfed.org/fred/series/observations';
const REQUEST_TIMEOUT_MS = 10000;

// ═══════════════════════════════════════════════════════════════
// RESPONSE SCHEMAS
// ═══════════════════════════════════════════════════════════════

const nullableNumbers = z.array(z.number().nullable());

const YahooChartSchema = z.object({
  chart: z.object({
    result: z.array(z.object({
      timestamp: z.array(z.number()).optional(),
      indicators: z.object({
        quote: z.array(z.object({ close: nullableNumbers.optional() })).optional(),
        adjclose: z.array(z.object({ adjclose: nullableNumbers.optional() })).optional(),
      }),
    })).nullable(),
    error: z.object({ code: z.string(), description: z.string() }).nullable().optional(),
  }),
});

const FredObservationsSchema = z.object({
  observations: z.array(z.object({
    date: z.string(),
    value: z.string(),
  })).default([]),
});

// ═══════════════════════════════════════════════════════════════
// PARSERS
// ═══════════════════════════════════════════════════════════════

function toIsoDate(epochSeconds: number): string {
  return new Date(epochSeconds * 1000).toISOString().slice(0, 10);
}

/**
 * Daily closes from a chart payload. Adjusted closes win over raw closes;
 * null or non-positive closes are dropped; one point per date (last wins).
 */
export function parseYahooChart(payload: unknown): PricePoint[] {
  const parsed = YahooChartSchema.parse(payload);

  if (parsed.chart.error) {
    throw new Error(`Chart API error ${parsed.chart.error.code}: ${parsed.chart.error.description}`);
  }

  const result = parsed.chart.result?.[0];
  if (!result || !result.timestamp) return [];

  const closes =
    result.indicators.adjclose?.[0]?.adjclose ??
    result.indicators.quote?.[0]?.close ??
    [];

  const byDate = new Map<string, number>();
  result.timestamp.forEach((ts, i) => {
    const close = closes[i];
    if (close === null || close === undefined || !Number.isFinite(close) || close <= 0) return;
    byDate.set(toIsoDate(ts), close);
  });

  return Array.from(byDate.entries())
    .map(([date, price]) => ({ date, price }))
    .sort((a, b) => a.date.localeCompare(b.date));
}

/** First numeric observation of a newest-first FRED response ('.' = missing) */
export function parseFredObservations(payload: unknown): number | null {
  const parsed = FredObservationsSchema.parse(payload);

  for (const obs of parsed.observations) {
    if (obs.value === '.') continue;
    const value = Number.parseFloat(obs.value);
    if (Number.isFinite(value)) return value;
  }
  return null;
}

// ═══════════════════════════════════════════════════════════════
// HTTP PROVIDER
// ═══════════════════════════════════════════════════════════════

export class HttpMarketDataProvider implements MarketDataProvider {
  private readonly http: AxiosInstance;

  constructor(http?: AxiosInstance) {
    this.http = http ?? axios.create({
      timeout: REQUEST_TIMEOUT_MS,
      headers: { 'User-Agent': 'Mozilla/5.0 (regime-allocator)' },
    });
  }

  async fetchHistory(ticker: string, range: string): Promise<PricePoint[]> {
    const response = await this.http.get<unknown>(
      `${YAHOO_CHART_URL}/${encodeURIComponent(ticker)}`,
      { params: { range, interval: '1d' } }
    );
    return parseYahooChart(response.data);
  }

  async fetchLatestClose(ticker: string): Promise<number | null> {
    const points = await this.fetchHistory(ticker, '5d');
    return points.length > 0 ? points[points.length - 1].price : null;
  }

  async fetchFredLatest(seriesId: string, apiKey: string): Promise<number | null> {
    const response = await this.http.get<unknown>(FRED_OBSERVATIONS_URL, {
      params: {
        series_id: seriesId,
        api_key: apiKey,
        file_type: 'json',
        sort_order: 'desc',
        limit: 5,
      },
    });
    return parseFredObservations(response.data);
  }
}
