import { OnboardingStageEnum } from "./enums/onboardingStageEnum";
import { PlanInterface } from "./PlanInterface";
import { ProfileDraft } from "./ProfileInterface";

export interface CoachSessionInterface {
  userId: string;
  onboardingStage: OnboardingStageEnum;
  onboardingActive: boolean;
  draft: ProfileDraft;
  lastPlan: PlanInterface | null;
  updatedAt: Date;
}
