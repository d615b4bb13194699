export enum GoalEnum {
  LOSE = "lose",
  MAINTAIN = "maintain",
  GAIN = "gain",
}
