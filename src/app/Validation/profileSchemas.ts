import { z } from "zod";
import { ActivityLevelEnum } from "../../types/enums/activityLevelEnum";
import { GoalEnum } from "../../types/enums/goalEnum";
import { SexEnum } from "../../types/enums/sexEnum";
import { ValidationError } from "../../utils/errors";

export type FieldUpdate =
  | { field: "sex"; value: SexEnum }
  | { field: "age"; value: number }
  | { field: "heightCm"; value: number }
  | { field: "activityLevel"; value: ActivityLevelEnum }
  | { field: "goal"; value: GoalEnum }
  | { field: "weightKg"; value: number }
  | { field: "goalWeightKg"; value: number | undefined }
  | { field: "deadlineDays"; value: number | undefined };

export type ProfileField = FieldUpdate["field"];

export const MAX_WEIGHT_KG = 400;

const GOAL_ALIASES: Record<string, GoalEnum> = {
  cut: GoalEnum.LOSE,
  recomp: GoalEnum.MAINTAIN,
  bulk: GoalEnum.GAIN,
};

const keyword = z.string().trim().toLowerCase();

const decimal = z
  .string()
  .trim()
  .regex(/^\d+(\.\d+)?$/)
  .transform(Number);

const wholeNumber = z
  .string()
  .trim()
  .regex(/^\d+$/)
  .transform(Number);

export const sexSchema = keyword.pipe(z.nativeEnum(SexEnum));
export const ageSchema = wholeNumber.pipe(z.number().int().min(13).max(100));
export const heightSchema = decimal.pipe(z.number().min(100).max(250));
export const activitySchema = keyword
  .transform((v) => v.replace(/[\s-]+/g, "_"))
  .pipe(z.nativeEnum(ActivityLevelEnum));
export const goalSchema = keyword
  .transform((v) => GOAL_ALIASES[v] ?? v)
  .pipe(z.nativeEnum(GoalEnum));
/** Weights are exclusive on both ends: (0, 400). */
export const weightSchema = decimal.pipe(z.number().gt(0).lt(MAX_WEIGHT_KG));
const deadlineSchema = wholeNumber.pipe(z.number().int().min(1).max(730));

const clearable = <T>(schema: z.ZodType<T, z.ZodTypeDef, string>) =>
  keyword.pipe(z.union([z.literal("none").transform(() => undefined), schema]));

export const FIELD_HINTS: Record<ProfileField, string> = {
  sex: "Please answer male or female.",
  age: "Age must be a whole number between 13 and 100.",
  heightCm: "Height must be a number of centimetres between 100 and 250, e.g. 175.",
  activityLevel: "Activity must be one of sedentary, light, active, very_active.",
  goal: "Goal must be one of lose, maintain, gain.",
  weightKg: "Weight must be a number of kilograms between 0 and 400, e.g. 72.5.",
  goalWeightKg: "Goal weight must be a number of kilograms between 0 and 400, or none.",
  deadlineDays: "Deadline must be a whole number of days between 1 and 730, or none.",
};

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, string>, field: ProfileField, raw: string): T {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) throw new ValidationError(FIELD_HINTS[field]);
  return parsed.data;
}

export function parseField(field: ProfileField, raw: string): FieldUpdate {
  switch (field) {
    case "sex":
      return { field, value: parseWith(sexSchema, field, raw) };
    case "age":
      return { field, value: parseWith(ageSchema, field, raw) };
    case "heightCm":
      return { field, value: parseWith(heightSchema, field, raw) };
    case "activityLevel":
      return { field, value: parseWith(activitySchema, field, raw) };
    case "goal":
      return { field, value: parseWith(goalSchema, field, raw) };
    case "weightKg":
      return { field, value: parseWith(weightSchema, field, raw) };
    case "goalWeightKg":
      return { field, value: parseWith(clearable(weightSchema), field, raw) };
    case "deadlineDays":
      return { field, value: parseWith(clearable(deadlineSchema), field, raw) };
  }
}

export function parseWeightKg(raw: string): number {
  return parseWith(weightSchema, "weightKg", raw);
}
