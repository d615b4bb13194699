import { subDays } from "date-fns";
import { PlanInterface } from "../../types/PlanInterface";
import { SuggestionInterface, SuggestionReason } from "../../types/SuggestionInterface";
import { WeightLogInterface } from "../../types/WeightLogInterface";
import { GoalEnum } from "../../types/enums/goalEnum";
import { SuggestionKindEnum } from "../../types/enums/suggestionKindEnum";
import { DEFAULT_RULES } from "../planRules/rules";
import { SuggestionRules } from "../planRules/types";
import { chronological } from "../trends/trendSummarizer";

const DAY_MS = 24 * 3600 * 1000;
const round2 = (n: number) => Math.round(n * 100) / 100;

export type SuggestionInput = {
  plan: PlanInterface;
  goal: GoalEnum;
  /** stored entries, not including the new observation */
  history: WeightLogInterface[];
  observation: WeightLogInterface;
};

/** Least-squares slope of weight over time, in kg per day. */
export function slopeKgPerDay(samples: WeightLogInterface[]): number {
  if (samples.length < 2) return 0;
  const t0 = samples[0].timestampUtc.getTime();
  const xs = samples.map((s) => (s.timestampUtc.getTime() - t0) / DAY_MS);
  const ys = samples.map((s) => s.valueKg);
  const meanX = xs.reduce((a, b) => a + b, 0) / xs.length;
  const meanY = ys.reduce((a, b) => a + b, 0) / ys.length;
  let num = 0;
  let den = 0;
  xs.forEach((x, i) => {
    num += (x - meanX) * (ys[i] - meanY);
    den += (x - meanX) ** 2;
  });
  return den === 0 ? 0 : num / den;
}

/** Number of trailing consecutive steps moving in `direction` (1 up, -1 down). */
export function trailingStreak(samples: WeightLogInterface[], direction: 1 | -1): number {
  let streak = 0;
  for (let i = samples.length - 1; i > 0; i--) {
    const step = samples[i].valueKg - samples[i - 1].valueKg;
    if (Math.sign(step) !== direction) break;
    streak++;
  }
  return streak;
}

type Verdict = { direction: 1 | -1 | 0; reason: SuggestionReason };

function judge(goal: GoalEnum, weeklyRate: number, bodyWeightKg: number, samples: WeightLogInterface[], rules: SuggestionRules): Verdict {
  const tolerance = rules.toleranceKgPerWeek[goal];
  const rising = trailingStreak(samples, 1) >= rules.minStreak;
  const falling = trailingStreak(samples, -1) >= rules.minStreak;

  // movement against the goal needs a streak before it changes the target
  const unconfirmed: Verdict = { direction: 0, reason: "trend-unconfirmed" };
  switch (goal) {
    case GoalEnum.LOSE:
      if (weeklyRate < -(rules.maxLossPctPerWeek / 100) * bodyWeightKg) return { direction: 1, reason: "loss-too-fast" };
      if (weeklyRate > tolerance) return rising ? { direction: -1, reason: "gaining-against-goal" } : unconfirmed;
      break;
    case GoalEnum.GAIN:
      if (weeklyRate > (rules.maxGainPctPerWeek / 100) * bodyWeightKg) return { direction: -1, reason: "gain-too-fast" };
      if (weeklyRate < -tolerance) return falling ? { direction: 1, reason: "losing-against-goal" } : unconfirmed;
      break;
    case GoalEnum.MAINTAIN:
      if (weeklyRate > tolerance) return rising ? { direction: -1, reason: "drifting-up" } : unconfirmed;
      if (weeklyRate < -tolerance) return falling ? { direction: 1, reason: "drifting-down" } : unconfirmed;
      break;
  }
  return { direction: 0, reason: "on-track" };
}

/**
 * Coaching suggestion after a new weigh-in. Deterministic for a given input.
 *
 * Samples are the observation plus stored entries within the lookback window.
 * A reduction that would cross the plan's safety floor becomes an activity
 * suggestion instead.
 */
export function suggestAfterLog(
  { plan, goal, history, observation }: SuggestionInput,
  rules: SuggestionRules = DEFAULT_RULES.suggestions
): SuggestionInterface {
  const since = subDays(observation.timestampUtc, rules.lookbackDays).getTime();
  const until = observation.timestampUtc.getTime();
  const samples = chronological([
    ...history.filter((e) => e.timestampUtc.getTime() >= since && e.timestampUtc.getTime() <= until),
    observation,
  ]);

  const hold = { deltaKcal: 0, suggestedTargetKcal: plan.targetKcal, sampleCount: samples.length };
  if (samples.length < rules.minSamples) {
    return { ...hold, kind: SuggestionKindEnum.INSUFFICIENT_DATA, reason: "not-enough-data", action: "none", weeklyRateKg: null };
  }

  const weeklyRateKg = round2(slopeKgPerDay(samples) * 7);
  const verdict = judge(goal, weeklyRateKg, observation.valueKg, samples, rules);

  if (verdict.direction === 0) {
    return { ...hold, kind: SuggestionKindEnum.REINFORCE, reason: verdict.reason, action: "none", weeklyRateKg };
  }

  if (verdict.direction === 1) {
    return {
      kind: SuggestionKindEnum.ADJUST_UP,
      reason: verdict.reason,
      action: "calories",
      deltaKcal: rules.adjustStepKcal,
      suggestedTargetKcal: plan.targetKcal + rules.adjustStepKcal,
      weeklyRateKg,
      sampleCount: samples.length,
    };
  }

  const lowered = plan.targetKcal - rules.adjustStepKcal;
  if (lowered < plan.floorKcal) {
    return {
      ...hold,
      kind: SuggestionKindEnum.ADJUST_DOWN,
      reason: verdict.reason,
      action: "activity",
      weeklyRateKg,
      activityStepsPerDay: rules.activityStepsPerDay,
    };
  }
  return {
    kind: SuggestionKindEnum.ADJUST_DOWN,
    reason: verdict.reason,
    action: "calories",
    deltaKcal: -rules.adjustStepKcal,
    suggestedTargetKcal: lowered,
    weeklyRateKg,
    sampleCount: samples.length,
  };
}
