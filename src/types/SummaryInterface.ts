import { TrendEnum } from "./enums/trendEnum";

export type SummaryStatus = "ok" | "insufficient-data";

export interface SummaryInterface {
  windowDays: number;
  status: SummaryStatus;
  averageKg: number | null;
  deltaKg: number | null;
  trend: TrendEnum;
  sampleCount: number;
  from: Date | null;
  to: Date | null;
}
