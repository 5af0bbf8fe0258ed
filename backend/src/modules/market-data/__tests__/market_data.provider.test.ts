/**
 * Market data payload parsers (offline)
 */

import { describe, it, expect } from 'vitest';
import { parseFredObservations, parseYahooChart } from '../market_data.provider.js';

// 2024-01-01T00:00:00Z and following days
const DAY = 86400;
const JAN_1 = 1704067200;

describe('parseYahooChart', () => {

  it('prefers adjusted closes and drops null closes', () => {
    const points = parseYahooChart({
      chart: {
        result: [{
          timestamp: [JAN_1, JAN_1 + DAY, JAN_1 + 2 * DAY],
          indicators: {
            quote: [{ close: [101, 102, 112] }],
            adjclose: [{ adjclose: [100, null, 110] }],
          },
        }],
        error: null,
      },
    });

    expect(points).toEqual([
      { date: '2024-01-01', price: 100 },
      { date: '2024-01-03', price: 110 },
    ]);
  });

  it('falls back to raw closes without adjusted data', () => {
    const points = parseYahooChart({
      chart: {
        result: [{
          timestamp: [JAN_1, JAN_1 + DAY],
          indicators: { quote: [{ close: [50, 0] }] },
        }],
      },
    });

    expect(points).toEqual([{ date: '2024-01-01', price: 50 }]);
  });

  it('sorts by date and keeps the last close per day', () => {
    const points = parseYahooChart({
      chart: {
        result: [{
          timestamp: [JAN_1 + DAY, JAN_1, JAN_1 + 3600],
          indicators: { quote: [{ close: [20, 10, 11] }] },
        }],
      },
    });

    expect(points).toEqual([
      { date: '2024-01-01', price: 11 },
      { date: '2024-01-02', price: 20 },
    ]);
  });

  it('returns no points for an empty result', () => {
    expect(parseYahooChart({ chart: { result: [], error: null } })).toEqual([]);
    expect(parseYahooChart({ chart: { result: null } })).toEqual([]);
  });

  it('throws on an API error body', () => {
    expect(() => parseYahooChart({
      chart: { result: null, error: { code: 'Not Found', description: 'No data found' } },
    })).toThrow('Chart API error Not Found: No data found');
  });

  it('throws on a malformed payload', () => {
    expect(() => parseYahooChart({ unexpected: true })).toThrow();
  });
});

describe('parseFredObservations', () => {

  it('skips missing values marked with a dot', () => {
    const value = parseFredObservations({
      observations: [
        { date: '2024-01-05', value: '.' },
        { date: '2024-01-04', value: '1.23' },
        { date: '2024-01-03', value: '1.20' },
      ],
    });

    expect(value).toBe(1.23);
  });

  it('returns null when nothing is usable', () => {
    expect(parseFredObservations({ observations: [{ date: '2024-01-05', value: '.' }] })).toBeNull();
    expect(parseFredObservations({})).toBeNull();
  });
});
