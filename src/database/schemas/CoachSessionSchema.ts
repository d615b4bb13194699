import { Schema } from 'mongoose';
import { CoachSessionInterface } from '../../types/SessionInterface';
import { ActivityLevelEnum } from '../../types/enums/activityLevelEnum';
import { GoalEnum } from '../../types/enums/goalEnum';
import { OnboardingStageEnum } from '../../types/enums/onboardingStageEnum';
import { SexEnum } from '../../types/enums/sexEnum';

export type ICoachSession = CoachSessionInterface;

export const CoachSessionSchema = new Schema<ICoachSession>({
  userId: { type: String, required: true, unique: true },
  onboardingStage: { type: String, enum: Object.values(OnboardingStageEnum), required: true },
  onboardingActive: { type: Boolean, default: false },
  draft: {
    sex: { type: String, enum: Object.values(SexEnum) },
    age: Number,
    heightCm: Number,
    activityLevel: { type: String, enum: Object.values(ActivityLevelEnum) },
    goal: { type: String, enum: Object.values(GoalEnum) },
  },
  // last computed plan, stored as-is
  lastPlan: { type: Schema.Types.Mixed, default: null },
  updatedAt: { type: Date, required: true },
});
