/**
 * WEIGHT OVERRIDE REPOSITORY
 *
 * Persistence for user-saved default weights. The engine never reads
 * this directly; overrides are merged by WeightsService and passed in.
 */

import {
  EQUITY_KEYS,
  RESERVE_KEYS,
  type EquityWeights,
  type ReserveWeights,
} from '../portfolio-engine/portfolio.contract.js';
import { WeightOverrideModel } from './weight_override.model.js';

export interface WeightOverrides {
  equityWeights?: EquityWeights;
  reserveWeights?: ReserveWeights;
}

export interface WeightOverrideRepo {
  readonly kind: 'mongo' | 'memory';
  load(): Promise<WeightOverrides | null>;
  save(patch: WeightOverrides): Promise<WeightOverrides>;
  clear(): Promise<boolean>;
}

const DEFAULT_KEY = 'default';

export function pickWeights<K extends string>(
  keys: ReadonlyArray<K>,
  raw: Readonly<Record<string, unknown>> | null | undefined
): Partial<Record<K, number>> {
  const out: Partial<Record<K, number>> = {};
  if (!raw) return out;
  for (const key of keys) {
    const value = raw[key];
    if (typeof value === 'number') out[key] = value;
  }
  return out;
}

function copyOverrides(o: WeightOverrides): WeightOverrides {
  const copy: WeightOverrides = {};
  if (o.equityWeights) copy.equityWeights = { ...o.equityWeights };
  if (o.reserveWeights) copy.reserveWeights = { ...o.reserveWeights };
  return copy;
}

// ═══════════════════════════════════════════════════════════════
// MONGO
// ═══════════════════════════════════════════════════════════════

export class MongoWeightOverrideRepo implements WeightOverrideRepo {
  readonly kind = 'mongo' as const;

  constructor(private readonly key: string = DEFAULT_KEY) {}

  async load(): Promise<WeightOverrides | null> {
    const doc = await WeightOverrideModel.findOne({ key: this.key }).lean();
    if (!doc) return null;

    const result: WeightOverrides = {};
    if (doc.equityWeights) result.equityWeights = pickWeights(EQUITY_KEYS, doc.equityWeights);
    if (doc.reserveWeights) result.reserveWeights = pickWeights(RESERVE_KEYS, doc.reserveWeights);
    return result;
  }

  async save(patch: WeightOverrides): Promise<WeightOverrides> {
    const update: Record<string, unknown> = { key: this.key };
    if (patch.equityWeights) update.equityWeights = patch.equityWeights;
    if (patch.reserveWeights) update.reserveWeights = patch.reserveWeights;

    await WeightOverrideModel.findOneAndUpdate(
      { key: this.key },
      { $set: update },
      { upsert: true }
    );

    console.log(`[Weights] Saved overrides '${this.key}' to Mongo`);
    const saved = await this.load();
    return saved ?? copyOverrides(patch);
  }

  async clear(): Promise<boolean> {
    const result = await WeightOverrideModel.deleteOne({ key: this.key });
    if (result.deletedCount > 0) {
      console.log(`[Weights] Deleted overrides '${this.key}'`);
    }
    return result.deletedCount > 0;
  }
}

// ═══════════════════════════════════════════════════════════════
// IN-MEMORY
// ═══════════════════════════════════════════════════════════════

export class InMemoryWeightOverrideRepo implements WeightOverrideRepo {
  readonly kind = 'memory' as const;
  private stored: WeightOverrides | null = null;

  async load(): Promise<WeightOverrides | null> {
    return this.stored ? copyOverrides(this.stored) : null;
  }

  async save(patch: WeightOverrides): Promise<WeightOverrides> {
    const next = copyOverrides({
      equityWeights: patch.equityWeights ?? this.stored?.equityWeights,
      reserveWeights: patch.reserveWeights ?? this.stored?.reserveWeights,
    });
    this.stored = next;
    return copyOverrides(next);
  }

  async clear(): Promise<boolean> {
    const had = this.stored !== null;
    this.stored = null;
    return had;
  }
}
