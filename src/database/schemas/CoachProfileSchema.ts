import { Schema } from 'mongoose';
import { CoachProfileInterface } from '../../types/ProfileInterface';
import { ActivityLevelEnum } from '../../types/enums/activityLevelEnum';
import { GoalEnum } from '../../types/enums/goalEnum';
import { OnboardingStageEnum } from '../../types/enums/onboardingStageEnum';
import { SexEnum } from '../../types/enums/sexEnum';

export type ICoachProfile = CoachProfileInterface;

// createdAt/updatedAt are stamped by the coach, not by mongoose timestamps.
export const CoachProfileSchema = new Schema<ICoachProfile>({
  userId: { type: String, required: true, unique: true },
  sex: { type: String, enum: Object.values(SexEnum) },
  age: Number,
  heightCm: Number,
  activityLevel: { type: String, enum: Object.values(ActivityLevelEnum) },
  goal: { type: String, enum: Object.values(GoalEnum) },
  weightKg: Number,
  goalWeightKg: Number,
  deadlineDays: Number,
  unitPreference: { type: String, enum: ['metric'], default: 'metric' },
  onboardingStage: { type: String, enum: Object.values(OnboardingStageEnum), required: true },
  createdAt: { type: Date, required: true },
  updatedAt: { type: Date, required: true },
});
