import { ActivityLevelEnum } from "../../types/enums/activityLevelEnum";
import { GoalEnum } from "../../types/enums/goalEnum";
import { SexEnum } from "../../types/enums/sexEnum";
import { CoachRules } from "./types";

export const DEFAULT_RULES: CoachRules = {
  plan: {
    // Mifflin-St Jeor
    bmr: {
      perKg: 10,
      perCm: 6.25,
      perYear: 5,
      sexConstant: { [SexEnum.MALE]: 5, [SexEnum.FEMALE]: -161 },
    },
    activityMultiplier: {
      [ActivityLevelEnum.SEDENTARY]: 1.2,
      [ActivityLevelEnum.LIGHT]: 1.375,
      [ActivityLevelEnum.ACTIVE]: 1.55,
      [ActivityLevelEnum.VERY_ACTIVE]: 1.725,
    },
    goalOffset: {
      [GoalEnum.LOSE]: -0.15,
      [GoalEnum.MAINTAIN]: 0,
      [GoalEnum.GAIN]: 0.1,
    },
    // 1 kg of body mass ~ 7700 kcal
    deadline: { kcalPerKg: 7700, minDailyDelta: -750, maxDailyDelta: 500 },
    floorKcal: { [SexEnum.FEMALE]: 1200, [SexEnum.MALE]: 1500 },
    bmrFloorRatio: 1,
    proteinPerKg: {
      [GoalEnum.LOSE]: 2.0,
      [GoalEnum.MAINTAIN]: 1.6,
      [GoalEnum.GAIN]: 1.8,
    },
    fatShare: 0.25,
    referenceWeightKg: 70,
  },
  suggestions: {
    lookbackDays: 14,
    minSamples: 2,
    minStreak: 2,
    adjustStepKcal: 100,
    activityStepsPerDay: 2000,
    toleranceKgPerWeek: {
      [GoalEnum.LOSE]: 0.1,
      [GoalEnum.MAINTAIN]: 0.25,
      [GoalEnum.GAIN]: 0.1,
    },
    maxLossPctPerWeek: 1.0,
    maxGainPctPerWeek: 0.5,
  },
  trends: {
    windows: [7, 30],
    noiseKg: 0.3,
  },
};

export type RuleOverrides = {
  floorKcalFemale?: number;
  floorKcalMale?: number;
  referenceWeightKg?: number;
};

export function buildRules(overrides: RuleOverrides = {}, base: CoachRules = DEFAULT_RULES): CoachRules {
  return {
    ...base,
    plan: {
      ...base.plan,
      floorKcal: {
        [SexEnum.FEMALE]: overrides.floorKcalFemale ?? base.plan.floorKcal[SexEnum.FEMALE],
        [SexEnum.MALE]: overrides.floorKcalMale ?? base.plan.floorKcal[SexEnum.MALE],
      },
      referenceWeightKg: overrides.referenceWeightKg ?? base.plan.referenceWeightKg,
    },
  };
}
