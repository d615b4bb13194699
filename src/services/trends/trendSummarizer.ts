import { subDays } from "date-fns";
import { SummaryInterface } from "../../types/SummaryInterface";
import { WeightLogInterface } from "../../types/WeightLogInterface";
import { TrendEnum } from "../../types/enums/trendEnum";
import { DEFAULT_RULES } from "../planRules/rules";
import { TrendRules } from "../planRules/types";

const round2 = (n: number) => Math.round(n * 100) / 100;

export function chronological(entries: WeightLogInterface[]): WeightLogInterface[] {
  return [...entries].sort((a, b) => a.timestampUtc.getTime() - b.timestampUtc.getTime());
}

export function trendOf(deltaKg: number, noiseKg: number): TrendEnum {
  if (deltaKg > noiseKg) return TrendEnum.UP;
  if (deltaKg < -noiseKg) return TrendEnum.DOWN;
  return TrendEnum.FLAT;
}

/**
 * Summarises the entries inside `[now - windowDays, now]`. Input order is not
 * trusted; entries are sorted before computing.
 */
export function summarizeWindow(
  entries: WeightLogInterface[],
  windowDays: number,
  now: Date,
  rules: TrendRules = DEFAULT_RULES.trends
): SummaryInterface {
  const start = subDays(now, windowDays).getTime();
  const end = now.getTime();
  const inWindow = chronological(entries).filter((e) => {
    const t = e.timestampUtc.getTime();
    return t >= start && t <= end;
  });

  const first = inWindow[0];
  const last = inWindow[inWindow.length - 1];
  if (!first || !last || inWindow.length < 2) {
    return {
      windowDays,
      status: "insufficient-data",
      averageKg: null,
      deltaKg: null,
      trend: TrendEnum.FLAT,
      sampleCount: inWindow.length,
      from: first?.timestampUtc ?? null,
      to: last?.timestampUtc ?? null,
    };
  }

  const sum = inWindow.reduce((s, e) => s + e.valueKg, 0);
  const deltaKg = round2(last.valueKg - first.valueKg);
  return {
    windowDays,
    status: "ok",
    averageKg: round2(sum / inWindow.length),
    deltaKg,
    trend: trendOf(deltaKg, rules.noiseKg),
    sampleCount: inWindow.length,
    from: first.timestampUtc,
    to: last.timestampUtc,
  };
}

/** One summary per configured window (7 and 30 days by default). */
export function summarizeHistory(
  entries: WeightLogInterface[],
  now: Date,
  rules: TrendRules = DEFAULT_RULES.trends
): SummaryInterface[] {
  return rules.windows.map((days) => summarizeWindow(entries, days, now, rules));
}
