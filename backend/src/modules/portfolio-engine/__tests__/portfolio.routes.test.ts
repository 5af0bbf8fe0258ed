/**
 * Portfolio API Tests
 *
 * Full app via inject(); market data from an in-process provider,
 * weight overrides in memory.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../../../app.js';
import { MarketDataService, type MarketDataProvider } from '../../market-data/index.js';
import { InMemoryWeightOverrideRepo, WeightsService } from '../../weights/index.js';
import type { PricePoint } from '../portfolio.contract.js';

class StubProvider implements MarketDataProvider {
  history: PricePoint[] = [100, 120, 150, 90, 95].map((price, i) => ({
    date: `2024-01-0${i + 1}`,
    price,
  }));
  vix: number | null = 25;
  historyDown = false;

  async fetchHistory(): Promise<PricePoint[]> {
    if (this.historyDown) throw new Error('network down');
    return this.history;
  }

  async fetchLatestClose(): Promise<number | null> {
    return this.vix;
  }

  async fetchFredLatest(): Promise<number | null> {
    return null;
  }
}

describe('Portfolio API', () => {
  let provider: StubProvider;
  let app: FastifyInstance;

  beforeEach(async () => {
    provider = new StubProvider();
    const market = new MarketDataService(provider, {
      proxyTicker: 'URTH',
      vixTicker: '^VIX',
      spreadSeries: 'BAMLC0A4CBBB',
      historyRange: '5y',
      cacheTtlMs: 60_000,
      now: () => new Date('2024-06-01T00:00:00.000Z'),
    });
    const weights = new WeightsService(new InMemoryWeightOverrideRepo());

    app = buildApp(
      { LOG_LEVEL: 'silent', CORS_ORIGINS: '*', NODE_ENV: 'test' },
      { market, weights }
    );
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  it('GET /health reports versions and the weight store', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/portfolio/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({
      ok: true,
      module: 'portfolio-engine',
      version: '1.0.0',
      weightStore: 'memory',
    });
  });

  describe('GET /dashboard', () => {

    it('classifies the live market and tracks recovery from the trough', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/portfolio/dashboard' });
      const body = res.json();

      expect(res.statusCode).toBe(200);
      expect(body.market.drawdown.drawdownPct).toBe(-36.67);
      expect(body.market.creditSpread).toBe(2.75);
      expect(body.regime.id).toBe('B');
      expect(body.regime.triggersMet).toEqual([
        'Drawdown -36.7% ≤ -20%',
        'Credit spread 2.75% ≥ 2.5% (elevated)',
      ]);
      expect(body.recovery.cToBPrice).toBe(135);
      expect(body.recovery.progressToA).toBeNull();
    });

    it('falls back to regime A without history', async () => {
      provider.historyDown = true;
      provider.vix = null;

      const body = (await app.inject({ method: 'GET', url: '/api/portfolio/dashboard' })).json();

      expect(body.market.drawdown).toBeNull();
      expect(body.regime.id).toBe('A');
      expect(body.recovery).toBeNull();
    });
  });

  describe('POST /allocate', () => {

    it('allocates under the live regime with defaults', async () => {
      const res = await app.inject({ method: 'POST', url: '/api/portfolio/allocate', payload: {} });
      const body = res.json();

      expect(res.statusCode).toBe(200);
      expect(body.regime.id).toBe('B');
      expect(body.allocation.portfolioValue).toBe(100000);
      expect(body.allocation.equityValue).toBe(90000);
      expect(body.allocation.positions).toHaveLength(10);
    });

    it('diffs against supplied holdings', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/portfolio/allocate',
        payload: {
          portfolioValue: 1000,
          equityWeights: { north_america: 1 },
          reserveWeights: { cash: 1 },
          currentHoldings: { north_america: 900, cash: 100 },
        },
      });
      const body = res.json();

      expect(body.allocation.positions.map((p: { tradeDelta: number }) => p.tradeDelta)).toEqual([0, 0]);
      expect(body.allocation.rebalanceActions).toEqual([]);
    });

    it('falls back to the default table when a sleeve table is empty', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/portfolio/allocate',
        payload: { portfolioValue: 100000, equityWeights: {} },
      });
      const positions: Array<{ sleeve: string; targetValue: number }> = res.json().allocation.positions;

      expect(res.statusCode).toBe(200);
      expect(positions.filter(p => p.sleeve === 'equity')).toHaveLength(6);
      expect(positions.reduce((acc, p) => acc + p.targetValue, 0)).toBeCloseTo(100000, 6);
    });

    it('rejects a negative portfolio value', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/portfolio/allocate',
        payload: { portfolioValue: -5 },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        ok: false,
        error: 'INVALID_PORTFOLIO_VALUE',
        message: 'Portfolio value must be a non-negative number, got -5',
      });
    });
  });

  describe('POST /simulate', () => {

    it('escalates to C on a hypothetical crash', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/portfolio/simulate',
        payload: { drawdownPct: -46.67, vix: 35, troughPrice: 90, currentPrice: 135 },
      });
      const body = res.json();

      expect(res.statusCode).toBe(200);
      expect(body.regime.id).toBe('C');
      expect(body.allocation.reserveValue).toBe(0);
      expect(body.recovery).toMatchObject({ progressToB: 100, progressToA: 0, bToAPrice: 168.75 });
    });

    it('defaults to a calm market without a body', async () => {
      const body = (await app.inject({ method: 'POST', url: '/api/portfolio/simulate' })).json();

      expect(body.regime.id).toBe('A');
      expect(body.regime.triggersMet).toEqual(['No crisis triggers active']);
      expect(body.recovery).toBeNull();
    });

    it('rejects unknown instrument keys', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/portfolio/simulate',
        payload: { equityWeights: { bitcoin: 1 } },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json().error).toBe('VALIDATION_ERROR');
    });
  });

  describe('POST /analyze', () => {

    it('returns the drawdown and windowed curve of a series', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/portfolio/analyze',
        payload: {
          series: [
            { date: '2024-01-01', price: 100 },
            { date: '2024-01-02', price: 200 },
            { date: '2024-01-03', price: 150 },
          ],
          lookback: 2,
        },
      });
      const body = res.json();

      expect(res.statusCode).toBe(200);
      expect(body.drawdown.drawdownPct).toBe(-25);
      expect(body.curve).toHaveLength(2);
    });

    it('rejects an unsorted series', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/portfolio/analyze',
        payload: {
          series: [
            { date: '2024-01-02', price: 100 },
            { date: '2024-01-01', price: 110 },
          ],
        },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json().message).toBe('series: series must be in ascending date order without duplicates');
    });

    it('maps engine errors to their codes', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/portfolio/analyze',
        payload: { series: [{ date: '2024-01-01', price: 100 }] },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json().error).toBe('INSUFFICIENT_DATA');
    });
  });

  describe('weights', () => {

    it('saves, exposes and clears default weights', async () => {
      const saved = await app.inject({
        method: 'POST',
        url: '/api/portfolio/weights',
        payload: { reserveWeights: { cash: 1 } },
      });
      expect(saved.json()).toEqual({ ok: true, saved: { reserveWeights: { cash: 1 } } });

      const reference = (await app.inject({ method: 'GET', url: '/api/portfolio/reference' })).json();
      expect(reference.hasSavedDefaults).toBe(true);
      expect(reference.reserveWeights).toEqual({ cash: 1 });
      expect(reference.originalReserveWeights.money_market).toBe(0.4);

      const cleared = await app.inject({ method: 'DELETE', url: '/api/portfolio/weights' });
      expect(cleared.json()).toEqual({ ok: true, deleted: true });
    });

    it('rejects an empty update', async () => {
      const res = await app.inject({ method: 'POST', url: '/api/portfolio/weights', payload: {} });

      expect(res.statusCode).toBe(400);
      expect(res.json().message).toBe('Provide equityWeights and/or reserveWeights');
    });

    it('refuses to save an empty sleeve table', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/portfolio/weights',
        payload: { equityWeights: {} },
      });
      expect(res.statusCode).toBe(400);
      expect(res.json().error).toBe('VALIDATION_ERROR');

      const allocation = (await app.inject({
        method: 'POST',
        url: '/api/portfolio/allocate',
        payload: { portfolioValue: 100000 },
      })).json().allocation;
      const total = allocation.positions.reduce(
        (acc: number, p: { targetValue: number }) => acc + p.targetValue,
        0
      );
      expect(total).toBeCloseTo(100000, 6);
    });
  });

  it('GET /reference lists the catalog and regime table', async () => {
    const body = (await app.inject({ method: 'GET', url: '/api/portfolio/reference' })).json();

    expect(body.instruments.acwi_imi.identifierCode).toBe('IE00B3YLTY66');
    expect(body.regimes.C.equityPct).toBe(1);
    expect(body.thresholds.spreadExtreme).toBe(4.5);
    expect(body.hasSavedDefaults).toBe(false);
  });

  it('clears the market cache on demand', async () => {
    await app.inject({ method: 'GET', url: '/api/portfolio/dashboard' });

    const stats = (await app.inject({ method: 'GET', url: '/api/portfolio/admin/cache/stats' })).json();
    expect(stats.stats.entries).toBe(3);

    const cleared = (await app.inject({
      method: 'POST',
      url: '/api/portfolio/admin/cache/clear',
      payload: {},
    })).json();
    expect(cleared.cleared).toBe(3);
    expect(cleared.stats.entries).toBe(0);
  });

  it('answers unknown routes with NOT_FOUND', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/portfolio/nope' });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ ok: false, error: 'NOT_FOUND', message: 'Route not found' });
  });
});
