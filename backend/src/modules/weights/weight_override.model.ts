/**
 * Weight Override Model
 *
 * MongoDB model for the weight_overrides collection.
 * One document per key; 'default' holds the user-saved defaults.
 */

import mongoose, { Schema, type Document } from 'mongoose';

export interface IWeightOverrideDoc extends Document {
  key: string;
  equityWeights?: Record<string, number>;
  reserveWeights?: Record<string, number>;
  updatedAt: Date;
}

const WeightOverrideSchema = new Schema<IWeightOverrideDoc>({
  key: { type: String, required: true, unique: true },
  equityWeights: { type: Map, of: Number },
  reserveWeights: { type: Map, of: Number },
}, {
  timestamps: true,
});

export const WeightOverrideModel = mongoose.model<IWeightOverrideDoc>(
  'WeightOverride',
  WeightOverrideSchema,
  'weight_overrides'
);
