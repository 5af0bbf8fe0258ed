/**
 * DRAWDOWN ANALYZER
 *
 * Running all-time high, current drawdown and deepest trough
 * over an ascending price series. Pure.
 */

import { InsufficientDataError, InvalidPriceError } from '../../common/errors.js';
import type { DrawdownPoint, DrawdownSnapshot, PricePoint } from './portfolio.contract.js';

const MIN_POINTS = 2;

function assertSeries(series: ReadonlyArray<PricePoint>): void {
  if (series.length < MIN_POINTS) {
    throw new InsufficientDataError(series.length, MIN_POINTS);
  }

  for (const point of series) {
    if (!Number.isFinite(point.price) || point.price <= 0) {
      throw new InvalidPriceError(`Invalid price ${point.price} on ${point.date}`);
    }
  }
}

function pctFromPeak(price: number, peak: number): number {
  return ((price - peak) / peak) * 100;
}

/**
 * Drawdown of the last point against the running ATH, plus the
 * trough: the point whose own drawdown is deepest (earliest wins ties).
 */
export function analyzeDrawdown(series: ReadonlyArray<PricePoint>): DrawdownSnapshot {
  assertSeries(series);

  let ath = series[0].price;
  let athDate = series[0].date;
  let troughPrice = series[0].price;
  let troughDate = series[0].date;
  let troughDrawdown = 0;

  for (const point of series) {
    if (point.price > ath) {
      ath = point.price;
      athDate = point.date;
    }

    const dd = pctFromPeak(point.price, ath);
    if (dd < troughDrawdown) {
      troughDrawdown = dd;
      troughPrice = point.price;
      troughDate = point.date;
    }
  }

  const last = series[series.length - 1];

  return {
    currentPrice: last.price,
    ath,
    athDate,
    drawdownPct: pctFromPeak(last.price, ath),
    troughPrice,
    troughDate,
  };
}

/**
 * Per-point drawdown curve over the trailing window.
 * The running ATH restarts at the window's first point.
 */
export function buildDrawdownCurve(
  series: ReadonlyArray<PricePoint>,
  lookback?: number
): DrawdownPoint[] {
  assertSeries(series);

  const window = lookback !== undefined && lookback > 0
    ? series.slice(-lookback)
    : series;

  const curve: DrawdownPoint[] = [];
  let runningAth = 0;

  for (const point of window) {
    runningAth = Math.max(runningAth, point.price);
    curve.push({
      date: point.date,
      price: point.price,
      runningAth,
      drawdownPct: pctFromPeak(point.price, runningAth),
    });
  }

  return curve;
}
