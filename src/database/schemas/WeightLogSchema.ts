import { Schema } from 'mongoose';
import { WeightLogInterface } from '../../types/WeightLogInterface';

export type IWeightLog = WeightLogInterface;

// Append-only; several entries may share a timestamp.
export const WeightLogSchema = new Schema<IWeightLog>({
  userId: { type: String, required: true },
  timestampUtc: { type: Date, required: true },
  valueKg: { type: Number, required: true },
});

WeightLogSchema.index({ userId: 1, timestampUtc: 1 });
