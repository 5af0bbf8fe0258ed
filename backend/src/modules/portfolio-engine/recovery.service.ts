/**
 * RECOVERY TRACKER
 *
 * Checkpoints on the way back from a trough:
 *   C → B at +50% from the trough
 *   B → A at a further +25% beyond the C → B level
 *
 * Informational only. The classifier is never overridden by recovery progress.
 */

import { InvalidPriceError } from '../../common/errors.js';
import type { RecoveryRallies, RecoveryState } from './portfolio.contract.js';
import { DEFAULT_RALLIES } from './regime.rules.js';

function clamp(val: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, val));
}

export function trackRecovery(
  troughPrice: number,
  currentPrice: number,
  rallies: RecoveryRallies = DEFAULT_RALLIES
): RecoveryState {
  if (!Number.isFinite(troughPrice) || troughPrice <= 0) {
    throw new InvalidPriceError(`Trough price must be positive, got ${troughPrice}`);
  }
  if (!Number.isFinite(currentPrice)) {
    throw new InvalidPriceError(`Current price must be finite, got ${currentPrice}`);
  }
  const legs: Array<[string, number]> = [['cToB', rallies.cToB], ['bToA', rallies.bToA]];
  for (const [leg, size] of legs) {
    if (!Number.isFinite(size) || size <= 0) {
      throw new InvalidPriceError(`Recovery rally '${leg}' must be positive, got ${size}`);
    }
  }

  const cToBPrice = troughPrice * (1 + rallies.cToB);
  const bToAPrice = cToBPrice * (1 + rallies.bToA);

  const progressToB = clamp(
    ((currentPrice - troughPrice) / (cToBPrice - troughPrice)) * 100,
    0,
    100
  );

  // null = B → A leg not started yet, distinct from "started, at 0%"
  const progressToA = currentPrice < cToBPrice
    ? null
    : clamp(((currentPrice - cToBPrice) / (bToAPrice - cToBPrice)) * 100, 0, 100);

  return {
    troughPrice,
    currentPrice,
    cToBPrice,
    bToAPrice,
    progressToB,
    progressToA,
  };
}
