export enum OnboardingStageEnum {
  AWAITING_SEX = "awaiting_sex",
  AWAITING_AGE = "awaiting_age",
  AWAITING_HEIGHT = "awaiting_height",
  AWAITING_ACTIVITY = "awaiting_activity",
  AWAITING_GOAL = "awaiting_goal",
  COMPLETE = "complete",
}
