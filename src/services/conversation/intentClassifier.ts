import { ProfileField, parseWeightKg } from "../../app/Validation/profileSchemas";
import { UnrecognizedIntentError, ValidationError } from "../../utils/errors";

export type Intent =
  | { kind: "start" }
  | { kind: "plan" }
  | { kind: "log"; valueKg: number }
  | { kind: "history" }
  | { kind: "profile-show" }
  | { kind: "profile-set"; field: ProfileField; rawValue: string }
  | { kind: "guide" }
  | { kind: "reset" }
  | { kind: "help" }
  | { kind: "malformed"; command: "log" | "profile-set"; error: ValidationError }
  | { kind: "onboarding-answer"; text: string }
  | { kind: "unrecognized" };

export type IntentKind = Intent["kind"];

export const LOG_USAGE = "Send your weight in kg like: log 72.5";
export const PROFILE_SET_USAGE =
  "Use: profile set <key> <value>, e.g. profile set activity active. Keys: sex, age, height, activity, goal, weight, goal_weight, deadline_days.";

const PROFILE_KEYS = new Map<string, ProfileField>([
  ["sex", "sex"],
  ["age", "age"],
  ["height", "heightCm"],
  ["height_cm", "heightCm"],
  ["activity", "activityLevel"],
  ["activity_level", "activityLevel"],
  ["goal", "goal"],
  ["weight", "weightKg"],
  ["weight_kg", "weightKg"],
  ["goal_weight", "goalWeightKg"],
  ["deadline", "deadlineDays"],
  ["deadline_days", "deadlineDays"],
]);

const SIMPLE_COMMANDS = new Map<string, Intent>([
  ["start", { kind: "start" }],
  ["plan", { kind: "plan" }],
  ["history", { kind: "history" }],
  ["guide", { kind: "guide" }],
  ["reset", { kind: "reset" }],
  ["help", { kind: "help" }],
  ["profile", { kind: "profile-show" }],
  ["profile show", { kind: "profile-show" }],
]);

function parseLog(args: string[]): Intent {
  if (args.length !== 1) {
    return { kind: "malformed", command: "log", error: new ValidationError(LOG_USAGE) };
  }
  try {
    return { kind: "log", valueKg: parseWeightKg(args[0]) };
  } catch (err) {
    if (!(err instanceof ValidationError)) throw err;
    return { kind: "malformed", command: "log", error: new ValidationError(`${err.message} ${LOG_USAGE}`) };
  }
}

function parseProfileSet(args: string[]): Intent {
  const [key, ...rest] = args;
  const field = key === undefined ? undefined : PROFILE_KEYS.get(key);
  if (!field || !rest.length) {
    return { kind: "malformed", command: "profile-set", error: new ValidationError(PROFILE_SET_USAGE) };
  }
  return { kind: "profile-set", field, rawValue: rest.join(" ") };
}

/**
 * Keyword parser for the command surface (case-insensitive). Throws
 * UnrecognizedIntentError for text that is not a command.
 */
export function parseCommand(text: string): Intent {
  const words = text.trim().toLowerCase().split(/\s+/).filter(Boolean);
  const simple = SIMPLE_COMMANDS.get(words.join(" "));
  if (simple) return simple;

  if (words[0] === "log") return parseLog(words.slice(1));
  if (words[0] === "profile" && words[1] === "set") return parseProfileSet(words.slice(2));
  throw new UnrecognizedIntentError(text);
}

/** While onboarding is open, non-command text is an answer to the current question. */
export function classifyIntent(text: string, context: { onboardingActive: boolean }): Intent {
  try {
    return parseCommand(text);
  } catch (err) {
    if (!(err instanceof UnrecognizedIntentError)) throw err;
    return context.onboardingActive ? { kind: "onboarding-answer", text: text.trim() } : { kind: "unrecognized" };
  }
}
