/**
 * WEIGHTS SERVICE
 *
 * Effective weight tables = saved overrides over the frozen defaults.
 * A saved sleeve replaces the whole default table for that sleeve.
 */

import { InvalidWeightsError, ValidationError } from '../../common/errors.js';
import {
  DEFAULT_EQUITY_WEIGHTS,
  DEFAULT_RESERVE_WEIGHTS,
} from '../portfolio-engine/instruments.rules.js';
import type { EquityWeights, ReserveWeights } from '../portfolio-engine/portfolio.contract.js';
import type { WeightOverrideRepo, WeightOverrides } from './weight_override.repo.js';

export interface EffectiveWeights {
  equityWeights: EquityWeights;
  reserveWeights: ReserveWeights;
  hasSavedDefaults: boolean;
}

function assertNonNegative(label: string, weights: Readonly<Record<string, number | undefined>>): void {
  for (const [key, value] of Object.entries(weights)) {
    if (value === undefined) continue;
    if (!Number.isFinite(value) || value < 0) {
      throw new InvalidWeightsError(`Invalid ${label} weight for '${key}': ${value}`);
    }
  }
}

/** A table with no entries counts as absent */
function nonEmpty<T extends Readonly<Record<string, number | undefined>>>(table: T | undefined): T | undefined {
  if (!table) return undefined;
  return Object.values(table).some(value => value !== undefined) ? table : undefined;
}

export class WeightsService {
  constructor(private readonly repo: WeightOverrideRepo) {}

  get storeKind(): WeightOverrideRepo['kind'] {
    return this.repo.kind;
  }

  /**
   * Per sleeve: request table, else saved table, else default.
   */
  async getEffectiveWeights(request: WeightOverrides = {}): Promise<EffectiveWeights> {
    const saved = await this.repo.load();

    const equityWeights =
      nonEmpty(request.equityWeights) ?? nonEmpty(saved?.equityWeights) ?? DEFAULT_EQUITY_WEIGHTS;
    const reserveWeights =
      nonEmpty(request.reserveWeights) ?? nonEmpty(saved?.reserveWeights) ?? DEFAULT_RESERVE_WEIGHTS;

    return {
      equityWeights: { ...equityWeights },
      reserveWeights: { ...reserveWeights },
      hasSavedDefaults: saved !== null,
    };
  }

  async saveOverrides(patch: WeightOverrides): Promise<WeightOverrides> {
    const equityWeights = nonEmpty(patch.equityWeights);
    const reserveWeights = nonEmpty(patch.reserveWeights);
    if (!equityWeights && !reserveWeights) {
      throw new ValidationError('Provide equityWeights and/or reserveWeights');
    }
    if (equityWeights) assertNonNegative('equity', equityWeights);
    if (reserveWeights) assertNonNegative('reserve', reserveWeights);

    return this.repo.save({ equityWeights, reserveWeights });
  }

  async clearOverrides(): Promise<boolean> {
    return this.repo.clear();
  }
}
