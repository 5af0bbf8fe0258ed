/**
 * Recovery Tracker Tests
 */

import { describe, it, expect } from 'vitest';
import { trackRecovery } from '../recovery.service.js';
import { InvalidPriceError } from '../../../common/errors.js';

describe('Recovery Tracker', () => {

  it('reaches the C → B checkpoint exactly at +50%', () => {
    const state = trackRecovery(90, 135);

    expect(state.cToBPrice).toBe(135);
    expect(state.bToAPrice).toBe(168.75);
    expect(state.progressToB).toBe(100);
    expect(state.progressToA).toBe(0);
  });

  it('leaves progress to A unset before the C → B level', () => {
    const state = trackRecovery(100, 125);

    expect(state.cToBPrice).toBe(150);
    expect(state.progressToB).toBe(50);
    expect(state.progressToA).toBeNull();
  });

  it('reports partial progress on the B → A leg', () => {
    // 150 → 187.5; 168.75 is halfway
    const state = trackRecovery(100, 168.75);

    expect(state.progressToB).toBe(100);
    expect(state.progressToA).toBe(50);
  });

  it('clamps progress to 0..100', () => {
    expect(trackRecovery(100, 80).progressToB).toBe(0);

    const above = trackRecovery(100, 400);
    expect(above.progressToB).toBe(100);
    expect(above.progressToA).toBe(100);
  });

  it('applies custom rally sizes', () => {
    const state = trackRecovery(100, 110, { cToB: 0.2, bToA: 0.1 });

    expect(state.cToBPrice).toBeCloseTo(120, 10);
    expect(state.bToAPrice).toBeCloseTo(132, 10);
    expect(state.progressToB).toBeCloseTo(50, 10);
  });

  it('orders trough < C → B level < B → A level for any trough', () => {
    for (const trough of [0.5, 1, 37.5, 90, 1234.56, 250000]) {
      const state = trackRecovery(trough, trough);

      expect(state.cToBPrice).toBeGreaterThan(trough);
      expect(state.bToAPrice).toBeGreaterThan(state.cToBPrice);
      expect(state.progressToB).toBe(0);
      expect(state.progressToA).toBeNull();
    }
  });

  it('rejects rally sizes that are not positive', () => {
    expect(() => trackRecovery(100, 100, { cToB: 0, bToA: 0.25 }))
      .toThrow("Recovery rally 'cToB' must be positive, got 0");
    expect(() => trackRecovery(100, 100, { cToB: 0.5, bToA: Number.NaN }))
      .toThrow(InvalidPriceError);
    expect(() => trackRecovery(100, 100, { cToB: -0.5, bToA: 0.25 }))
      .toThrow(InvalidPriceError);
  });

  it('rejects a non-positive trough', () => {
    expect(() => trackRecovery(0, 100)).toThrow(InvalidPriceError);
    expect(() => trackRecovery(-10, 100)).toThrow('Trough price must be positive, got -10');
  });

  it('rejects a non-finite current price', () => {
    expect(() => trackRecovery(100, Number.NaN)).toThrow('Current price must be finite, got NaN');
  });
});
