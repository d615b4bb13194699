export enum ActivityLevelEnum {
  SEDENTARY = "sedentary",
  LIGHT = "light",
  ACTIVE = "active",
  VERY_ACTIVE = "very_active",
}
