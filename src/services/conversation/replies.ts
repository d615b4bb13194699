import { PlanInterface } from "../../types/PlanInterface";
import { CoachProfileInterface } from "../../types/ProfileInterface";
import { SuggestionInterface } from "../../types/SuggestionInterface";
import { SummaryInterface } from "../../types/SummaryInterface";
import { WeightLogInterface } from "../../types/WeightLogInterface";
import { OnboardingStageEnum } from "../../types/enums/onboardingStageEnum";
import { FieldUpdate } from "../../app/Validation/profileSchemas";
import { Guidance } from "../guidance/guide";
import { OnboardingProgress } from "../onboarding/onboardingStateMachine";

export type Reply =
  | { kind: "onboarding-prompt"; stage: OnboardingStageEnum; progress: OnboardingProgress; started: boolean; error?: string }
  | { kind: "onboarding-complete"; progress: OnboardingProgress; plan: PlanInterface }
  | { kind: "already-complete"; progress: OnboardingProgress }
  | { kind: "plan"; plan: PlanInterface }
  | { kind: "logged"; entry: WeightLogInterface; suggestion: SuggestionInterface }
  | { kind: "history"; summaries: SummaryInterface[] }
  | { kind: "profile"; profile: CoachProfileInterface }
  | { kind: "profile-updated"; update: FieldUpdate }
  | { kind: "guide"; guidance: Guidance }
  | { kind: "reset"; purgedWeights: boolean }
  | { kind: "help" }
  | { kind: "validation-error"; message: string }
  | { kind: "needs-onboarding"; missing: string[] }
  | { kind: "unrecognized" }
  | { kind: "store-unavailable" };

export type ReplyKind = Reply["kind"];

export const HELP_TEXT = [
  "Commands:",
  "- start: begin or resume setting up your profile",
  "- plan: recompute your daily calorie and macro plan",
  "- log 72.5: record your weight in kg",
  "- history: 7-day and 30-day weight summary",
  "- profile show / profile set activity active: view or change your profile",
  "- guide: eating guidance for your goal",
  "- reset: clear your profile and start over",
  "- help: this list",
].join("\n");

export const UNRECOGNIZED_TEXT = "Sorry, I didn't catch that. Send 'help' to see what I can do.";
export const STORE_UNAVAILABLE_TEXT = "I couldn't reach your records just now. Please try again in a moment.";

const STAGE_PROMPTS: Record<OnboardingStageEnum, string> = {
  [OnboardingStageEnum.AWAITING_SEX]: "What is your sex? (male/female)",
  [OnboardingStageEnum.AWAITING_AGE]: "How old are you? (whole years, e.g. 30)",
  [OnboardingStageEnum.AWAITING_HEIGHT]: "How tall are you in cm? (e.g. 175)",
  [OnboardingStageEnum.AWAITING_ACTIVITY]: "How active are you? (sedentary/light/active/very_active)",
  [OnboardingStageEnum.AWAITING_GOAL]: "What is your goal? (lose/maintain/gain)",
  [OnboardingStageEnum.COMPLETE]: "Your profile is complete.",
};

const FIELD_LABELS: Record<FieldUpdate["field"], string> = {
  sex: "sex",
  age: "age",
  heightCm: "height (cm)",
  activityLevel: "activity",
  goal: "goal",
  weightKg: "weight (kg)",
  goalWeightKg: "goal weight (kg)",
  deadlineDays: "deadline (days)",
};

const DISCLAIMER = "Estimates only, not medical advice.";

export function progressBar({ current, total }: OnboardingProgress, width = 10): string {
  const done = Math.max(0, Math.min(current, total));
  const filled = total ? Math.floor((width * done) / total) : 0;
  return `[${"█".repeat(filled)}${"░".repeat(width - filled)}] ${done}/${total}`;
}

const signed = (n: number, digits = 0) => `${n > 0 ? "+" : ""}${n.toFixed(digits)}`;
const day = (d: Date) => d.toISOString().slice(0, 10);

export function renderPlan(plan: PlanInterface): string {
  const lines = [
    "Your daily plan",
    `BMR: ${plan.bmrKcal} kcal / TDEE: ${plan.tdeeKcal} kcal`,
    `Target: ${plan.targetKcal} kcal (maintenance ${plan.maintenanceKcal} kcal, ${signed(plan.deltaKcal)})`,
    `Macros: P ${plan.proteinG}g / F ${plan.fatG}g / C ${plan.carbG}g`,
  ];
  if (plan.notes.length) lines.push(`Note: ${plan.notes.join(" ")}`);
  lines.push(DISCLAIMER);
  return lines.join("\n");
}

export function renderSuggestion(s: SuggestionInterface): string {
  const rate = s.weeklyRateKg == null ? "" : `${signed(s.weeklyRateKg, 2)} kg/week`;
  const change = (() => {
    if (s.action === "activity") {
      return `Your target is already at the safety floor, so add about ${s.activityStepsPerDay ?? 0} steps a day instead of eating less.`;
    }
    if (s.deltaKcal < 0) return `Reduce your target by ~${-s.deltaKcal} kcal to ${s.suggestedTargetKcal} kcal.`;
    return `Increase your target by ~${s.deltaKcal} kcal to ${s.suggestedTargetKcal} kcal.`;
  })();

  switch (s.reason) {
    case "not-enough-data":
      return "Keep logging under the same conditions; I need a few more weigh-ins before I can read a trend.";
    case "on-track":
      return `Good pace (${rate}); this matches your goal. Keep your target at ${s.suggestedTargetKcal} kcal.`;
    case "trend-unconfirmed":
      return `Your weight moved against your goal (${rate}), but that isn't a steady trend yet. Keep your target at ${s.suggestedTargetKcal} kcal and keep logging.`;
    case "loss-too-fast":
      return `You're losing faster than is sustainable (${rate}). ${change}`;
    case "gaining-against-goal":
      return `Your weight is trending up (${rate}) while your goal is to lose. ${change}`;
    case "gain-too-fast":
      return `You're gaining faster than needed (${rate}). ${change}`;
    case "losing-against-goal":
      return `Your weight is trending down (${rate}) while your goal is to gain. ${change}`;
    case "drifting-up":
      return `Your weight is drifting up (${rate}). ${change}`;
    case "drifting-down":
      return `Your weight is drifting down (${rate}). ${change}`;
  }
}

function renderSummary(s: SummaryInterface): string {
  const label = `${s.windowDays} days`;
  const weighIns = `${s.sampleCount} weigh-in${s.sampleCount === 1 ? "" : "s"}`;
  if (s.status === "insufficient-data" || s.averageKg == null || s.deltaKg == null || !s.from || !s.to) {
    return `${label}: not enough data (${weighIns})`;
  }
  return `${label}: ${day(s.from)} → ${day(s.to)} (${s.trend}) avg ${s.averageKg} kg, change ${signed(s.deltaKg, 2)} kg, ${weighIns}`;
}

function renderProfile(p: CoachProfileInterface): string {
  const show = (v: string | number | undefined) => (v === undefined ? "(not set)" : String(v));
  return [
    "Your profile",
    `sex: ${show(p.sex)}`,
    `age: ${show(p.age)}`,
    `height (cm): ${show(p.heightCm)}`,
    `activity: ${show(p.activityLevel)}`,
    `goal: ${show(p.goal)}`,
    `weight (kg): ${show(p.weightKg)}`,
    `goal weight (kg): ${show(p.goalWeightKg)}`,
    `deadline (days): ${show(p.deadlineDays)}`,
    `units: ${p.unitPreference}`,
  ].join("\n");
}

export function renderReply(reply: Reply): string {
  switch (reply.kind) {
    case "onboarding-prompt": {
      const lines: string[] = [];
      if (reply.started) lines.push("Let's set up your profile.");
      if (reply.error) lines.push(reply.error);
      lines.push(progressBar(reply.progress), STAGE_PROMPTS[reply.stage]);
      return lines.join("\n");
    }
    case "onboarding-complete":
      return `Setup complete!\n${progressBar(reply.progress)}\n\n${renderPlan(reply.plan)}`;
    case "already-complete":
      return `Your profile is already complete.\n${progressBar(reply.progress)}\nSend 'plan' for your targets or 'profile show' to review it.`;
    case "plan":
      return renderPlan(reply.plan);
    case "logged":
      return `Logged ${reply.entry.valueKg} kg.\n${renderSuggestion(reply.suggestion)}`;
    case "history":
      if (reply.summaries.every((s) => s.sampleCount === 0)) {
        return "No weigh-ins yet. Record one like: log 72.5";
      }
      return ["Weight history", ...reply.summaries.map(renderSummary)].join("\n");
    case "profile":
      return renderProfile(reply.profile);
    case "profile-updated":
      return reply.update.value === undefined
        ? `Cleared ${FIELD_LABELS[reply.update.field]}.`
        : `Updated ${FIELD_LABELS[reply.update.field]} = ${reply.update.value}.`;
    case "guide":
      return [reply.guidance.title, ...reply.guidance.lines.map((l) => `- ${l}`)].join("\n");
    case "reset":
      return reply.purgedWeights
        ? "Your profile and weight history have been cleared. Send 'start' to set up again."
        : "Your profile has been cleared; your weight history was kept. Send 'start' to set up again.";
    case "help":
      return HELP_TEXT;
    case "validation-error":
      return reply.message;
    case "needs-onboarding":
      return `Let's finish setting up your profile first (missing: ${reply.missing.join(", ")}). Send 'start' to continue.`;
    case "unrecognized":
      return UNRECOGNIZED_TEXT;
    case "store-unavailable":
      return STORE_UNAVAILABLE_TEXT;
  }
}
