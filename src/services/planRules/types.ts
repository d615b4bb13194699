import { ActivityLevelEnum } from "../../types/enums/activityLevelEnum";
import { GoalEnum } from "../../types/enums/goalEnum";
import { SexEnum } from "../../types/enums/sexEnum";

export type PlanRules = {
  bmr: {
    perKg: number;
    perCm: number;
    perYear: number;
    sexConstant: Record<SexEnum, number>;
  };
  activityMultiplier: Record<ActivityLevelEnum, number>;
  /** fraction of TDEE added to reach the target, e.g. -0.15 */
  goalOffset: Record<GoalEnum, number>;
  deadline: { kcalPerKg: number; minDailyDelta: number; maxDailyDelta: number };
  floorKcal: Record<SexEnum, number>;
  /** the floor is never below BMR x this ratio */
  bmrFloorRatio: number;
  proteinPerKg: Record<GoalEnum, number>;
  fatShare: number;
  referenceWeightKg: number;
};

export type SuggestionRules = {
  lookbackDays: number;
  minSamples: number;
  minStreak: number;
  adjustStepKcal: number;
  activityStepsPerDay: number;
  toleranceKgPerWeek: Record<GoalEnum, number>;
  maxLossPctPerWeek: number;
  maxGainPctPerWeek: number;
};

export type TrendRules = {
  windows: number[];
  noiseKg: number;
};

export type CoachRules = {
  plan: PlanRules;
  suggestions: SuggestionRules;
  trends: TrendRules;
};
