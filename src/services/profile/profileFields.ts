import { FieldUpdate } from "../../app/Validation/profileSchemas";
import { OnboardingStageEnum } from "../../types/enums/onboardingStageEnum";
import {
  CoachProfileInterface,
  CompleteProfile,
  OnboardingField,
  ProfileFields,
} from "../../types/ProfileInterface";
import { IncompleteProfileError } from "../../utils/errors";

/** Onboarding order; a profile is complete when all of these are set. */
export const REQUIRED_FIELDS: readonly { field: OnboardingField; stage: OnboardingStageEnum }[] = [
  { field: "sex", stage: OnboardingStageEnum.AWAITING_SEX },
  { field: "age", stage: OnboardingStageEnum.AWAITING_AGE },
  { field: "heightCm", stage: OnboardingStageEnum.AWAITING_HEIGHT },
  { field: "activityLevel", stage: OnboardingStageEnum.AWAITING_ACTIVITY },
  { field: "goal", stage: OnboardingStageEnum.AWAITING_GOAL },
];

export function missingFields(fields: ProfileFields): OnboardingField[] {
  return REQUIRED_FIELDS.filter(({ field }) => fields[field] === undefined).map(({ field }) => field);
}

/** First stage whose field is still missing, or COMPLETE. */
export function stageFor(fields: ProfileFields): OnboardingStageEnum {
  const next = REQUIRED_FIELDS.find(({ field }) => fields[field] === undefined);
  return next?.stage ?? OnboardingStageEnum.COMPLETE;
}

export function isComplete(profile: CoachProfileInterface): profile is CompleteProfile {
  return missingFields(profile).length === 0;
}

export function assertComplete(profile: CoachProfileInterface): asserts profile is CompleteProfile {
  const missing = missingFields(profile);
  if (missing.length) throw new IncompleteProfileError(missing);
}

export function applyFieldUpdate<T extends ProfileFields>(target: T, update: FieldUpdate): T {
  return { ...target, [update.field]: update.value };
}

export function newProfile(userId: string, now: Date): CoachProfileInterface {
  return {
    userId,
    unitPreference: "metric",
    onboardingStage: OnboardingStageEnum.AWAITING_SEX,
    createdAt: now,
    updatedAt: now,
  };
}

/** Returns the profile with `onboardingStage` recomputed and `updatedAt` stamped. */
export function touchProfile(profile: CoachProfileInterface, now: Date): CoachProfileInterface {
  return { ...profile, onboardingStage: stageFor(profile), updatedAt: now };
}
