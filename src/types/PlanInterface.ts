export type BodyWeightSource = "log" | "profile" | "reference";

export interface PlanInterface {
  bmrKcal: number;
  tdeeKcal: number;
  maintenanceKcal: number;
  targetKcal: number;
  /** targetKcal - maintenanceKcal, after the floor clamp */
  deltaKcal: number;
  floorKcal: number;
  proteinG: number;
  fatG: number;
  carbG: number;
  bodyWeightKg: number;
  bodyWeightSource: BodyWeightSource;
  notes: string[];
}
