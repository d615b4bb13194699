import { ActivityLevelEnum } from "./enums/activityLevelEnum";
import { GoalEnum } from "./enums/goalEnum";
import { OnboardingStageEnum } from "./enums/onboardingStageEnum";
import { SexEnum } from "./enums/sexEnum";

export type UnitPreference = "metric";

export interface ProfileFields {
  sex?: SexEnum;
  age?: number;
  heightCm?: number;
  activityLevel?: ActivityLevelEnum;
  goal?: GoalEnum;
  // body weight used when nothing has been logged recently
  weightKg?: number;
  goalWeightKg?: number;
  deadlineDays?: number;
}

export interface CoachProfileInterface extends ProfileFields {
  userId: string;
  unitPreference: UnitPreference;
  onboardingStage: OnboardingStageEnum;
  createdAt: Date;
  updatedAt: Date;
}

export type OnboardingField = "sex" | "age" | "heightCm" | "activityLevel" | "goal";

export type CompleteProfile = CoachProfileInterface &
  Required<Pick<CoachProfileInterface, OnboardingField>>;

export type ProfileDraft = Pick<ProfileFields, OnboardingField>;
