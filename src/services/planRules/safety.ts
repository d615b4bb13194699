import { SexEnum } from "../../types/enums/sexEnum";
import { PlanRules } from "./types";

export const MAX_KCAL = 5000;

export function floorKcalFor(sex: SexEnum, bmrKcal: number, rules: PlanRules): number {
  return Math.max(rules.floorKcal[sex], Math.round(bmrKcal * rules.bmrFloorRatio));
}

export function clampKcal(k: number, floor: number) {
  return Math.max(floor, Math.min(MAX_KCAL, Math.round(k)));
}

export function capDailyDelta(delta: number, rules: PlanRules): number {
  return Math.max(rules.deadline.minDailyDelta, Math.min(rules.deadline.maxDailyDelta, delta));
}
