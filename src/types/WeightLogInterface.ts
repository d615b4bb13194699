export interface WeightLogInterface {
  userId: string;
  timestampUtc: Date;
  valueKg: number;
}
