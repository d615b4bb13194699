import { SuggestionKindEnum } from "./enums/suggestionKindEnum";

export type SuggestionAction = "calories" | "activity" | "none";

export type SuggestionReason =
  | "not-enough-data"
  | "on-track"
  // against the goal, but not yet for enough consecutive weigh-ins
  | "trend-unconfirmed"
  | "loss-too-fast"
  | "gaining-against-goal"
  | "gain-too-fast"
  | "losing-against-goal"
  | "drifting-up"
  | "drifting-down";

export interface SuggestionInterface {
  kind: SuggestionKindEnum;
  reason: SuggestionReason;
  action: SuggestionAction;
  deltaKcal: number;
  suggestedTargetKcal: number;
  /** null when there is no trend to claim */
  weeklyRateKg: number | null;
  sampleCount: number;
  activityStepsPerDay?: number;
}
