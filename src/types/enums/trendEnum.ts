export enum TrendEnum {
  UP = "up",
  DOWN = "down",
  FLAT = "flat",
}
