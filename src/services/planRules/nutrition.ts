import { BodyWeightSource, PlanInterface } from "../../types/PlanInterface";
import { CoachProfileInterface } from "../../types/ProfileInterface";
import { SexEnum } from "../../types/enums/sexEnum";
import { assertComplete } from "../profile/profileFields";
import { DEFAULT_RULES } from "./rules";
import { MAX_KCAL, capDailyDelta, clampKcal, floorKcalFor } from "./safety";
import { PlanRules } from "./types";

const round2 = (n: number) => Math.round(n * 100) / 100;

export function calculateBmr(
  sex: SexEnum,
  weightKg: number,
  heightCm: number,
  age: number,
  rules: PlanRules = DEFAULT_RULES.plan
): number {
  const { perKg, perCm, perYear, sexConstant } = rules.bmr;
  return round2(perKg * weightKg + perCm * heightCm - perYear * age + sexConstant[sex]);
}

function resolveBodyWeight(
  profile: CoachProfileInterface,
  latestLoggedKg: number | null,
  rules: PlanRules
): { kg: number; source: BodyWeightSource } {
  if (latestLoggedKg != null) return { kg: latestLoggedKg, source: "log" };
  if (profile.weightKg != null) return { kg: profile.weightKg, source: "profile" };
  return { kg: rules.referenceWeightKg, source: "reference" };
}

/**
 * Daily plan for a complete profile. Throws IncompleteProfileError otherwise.
 *
 * Body weight is the latest logged weight, then `profile.weightKg`, then the
 * reference weight. With both a goal weight and a deadline the daily delta is
 * derived from them (capped); otherwise the goal's TDEE offset applies. The
 * target never drops below the safety floor.
 */
export function calculatePlan(
  profile: CoachProfileInterface,
  latestLoggedKg: number | null = null,
  rules: PlanRules = DEFAULT_RULES.plan
): PlanInterface {
  assertComplete(profile);
  const notes: string[] = [];

  const bodyWeight = resolveBodyWeight(profile, latestLoggedKg, rules);
  if (bodyWeight.source === "reference") {
    notes.push(`No weight on record; using a reference weight of ${bodyWeight.kg} kg. Log your weight for a personal plan.`);
  }

  const bmrKcal = calculateBmr(profile.sex, bodyWeight.kg, profile.heightCm, profile.age, rules);
  const tdeeKcal = round2(bmrKcal * rules.activityMultiplier[profile.activityLevel]);
  const maintenanceKcal = Math.round(tdeeKcal);

  let dailyDelta = tdeeKcal * rules.goalOffset[profile.goal];
  if (profile.goalWeightKg != null && profile.deadlineDays != null) {
    const raw = ((profile.goalWeightKg - bodyWeight.kg) * rules.deadline.kcalPerKg) / profile.deadlineDays;
    dailyDelta = capDailyDelta(raw, rules);
    if (dailyDelta !== raw) {
      notes.push(
        `Daily change limited to ${rules.deadline.minDailyDelta}/+${rules.deadline.maxDailyDelta} kcal for safety; the goal weight will take longer than ${profile.deadlineDays} days.`
      );
    }
  }

  const floorKcal = floorKcalFor(profile.sex, bmrKcal, rules);
  const unclamped = Math.round(tdeeKcal + dailyDelta);
  const targetKcal = clampKcal(unclamped, floorKcal);
  if (unclamped < floorKcal) {
    notes.push(`Target raised to the ${floorKcal} kcal safety floor.`);
  } else if (unclamped > MAX_KCAL) {
    notes.push(`Target capped at ${MAX_KCAL} kcal.`);
  }

  const proteinG = bodyWeight.kg * rules.proteinPerKg[profile.goal];
  const fatKcal = targetKcal * rules.fatShare;
  const carbKcal = Math.max(targetKcal - proteinG * 4 - fatKcal, 0);

  return {
    bmrKcal,
    tdeeKcal,
    maintenanceKcal,
    targetKcal,
    deltaKcal: targetKcal - maintenanceKcal,
    floorKcal,
    proteinG: Math.round(proteinG),
    fatG: Math.round(fatKcal / 9),
    carbG: Math.round(carbKcal / 4),
    bodyWeightKg: bodyWeight.kg,
    bodyWeightSource: bodyWeight.source,
    notes,
  };
}
