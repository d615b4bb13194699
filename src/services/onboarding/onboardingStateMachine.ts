import { FieldUpdate, parseField } from "../../app/Validation/profileSchemas";
import { CoachSessionInterface } from "../../types/SessionInterface";
import { CoachProfileInterface, OnboardingField, ProfileDraft } from "../../types/ProfileInterface";
import { OnboardingStageEnum } from "../../types/enums/onboardingStageEnum";
import { ValidationError } from "../../utils/errors";
import { REQUIRED_FIELDS, applyFieldUpdate, stageFor } from "../profile/profileFields";

export type OnboardingProgress = { current: number; total: number };

export type OnboardingOutcome =
  | { kind: "already-complete"; progress: OnboardingProgress }
  | { kind: "prompt"; stage: OnboardingStageEnum; progress: OnboardingProgress; started: boolean }
  | { kind: "rejected"; stage: OnboardingStageEnum; progress: OnboardingProgress; error: ValidationError }
  | { kind: "completed"; draft: Required<ProfileDraft>; progress: OnboardingProgress };

export type OnboardingTransition = { session: CoachSessionInterface; outcome: OnboardingOutcome };

export const TOTAL_STEPS = REQUIRED_FIELDS.length;

function fieldFor(stage: OnboardingStageEnum): OnboardingField | undefined {
  return REQUIRED_FIELDS.find((s) => s.stage === stage)?.field;
}

/** Profile fields overlaid with what this session has collected so far. */
export function knownFields(profile: CoachProfileInterface, draft: ProfileDraft): ProfileDraft {
  return {
    sex: draft.sex ?? profile.sex,
    age: draft.age ?? profile.age,
    heightCm: draft.heightCm ?? profile.heightCm,
    activityLevel: draft.activityLevel ?? profile.activityLevel,
    goal: draft.goal ?? profile.goal,
  };
}

export function progressOf(known: ProfileDraft): OnboardingProgress {
  const current = REQUIRED_FIELDS.filter(({ field }) => known[field] !== undefined).length;
  return { current, total: TOTAL_STEPS };
}

function asComplete(known: ProfileDraft): Required<ProfileDraft> | null {
  const { sex, age, heightCm, activityLevel, goal } = known;
  if (sex === undefined || age === undefined || heightCm === undefined || activityLevel === undefined || goal === undefined) {
    return null;
  }
  return { sex, age, heightCm, activityLevel, goal };
}

export function initialSession(userId: string, now: Date): CoachSessionInterface {
  return {
    userId,
    onboardingStage: OnboardingStageEnum.AWAITING_SEX,
    onboardingActive: false,
    draft: {},
    lastPlan: null,
    updatedAt: now,
  };
}

/** `start`: resumes an active onboarding, begins a new one, or reports completion. */
export function startOnboarding(
  session: CoachSessionInterface,
  profile: CoachProfileInterface,
  now: Date
): OnboardingTransition {
  const draft: ProfileDraft = session.onboardingActive ? session.draft : {};
  const known = knownFields(profile, draft);
  const stage = stageFor(known);
  const progress = progressOf(known);

  if (stage === OnboardingStageEnum.COMPLETE && !session.onboardingActive) {
    return {
      session: { ...session, onboardingStage: stage, onboardingActive: false, draft: {}, updatedAt: now },
      outcome: { kind: "already-complete", progress },
    };
  }
  if (stage === OnboardingStageEnum.COMPLETE) {
    // every field became known while onboarding was open (e.g. via profile set)
    return finish(session, known, progress, now);
  }
  return {
    session: { ...session, onboardingStage: stage, onboardingActive: true, draft, updatedAt: now },
    outcome: { kind: "prompt", stage, progress, started: !session.onboardingActive },
  };
}

/**
 * Consumes one answer for the current stage. A rejected answer returns the
 * session untouched.
 */
export function answerOnboarding(
  session: CoachSessionInterface,
  profile: CoachProfileInterface,
  text: string,
  now: Date
): OnboardingTransition {
  const known = knownFields(profile, session.draft);
  const field = fieldFor(session.onboardingStage);
  if (!field) {
    return { session, outcome: { kind: "already-complete", progress: progressOf(known) } };
  }

  let draft: ProfileDraft;
  try {
    draft = applyFieldUpdate(session.draft, parseField(field, text));
  } catch (err) {
    if (!(err instanceof ValidationError)) throw err;
    return {
      session,
      outcome: { kind: "rejected", stage: session.onboardingStage, progress: progressOf(known), error: err },
    };
  }

  const nextKnown = knownFields(profile, draft);
  const stage = stageFor(nextKnown);
  const progress = progressOf(nextKnown);
  if (stage === OnboardingStageEnum.COMPLETE) {
    return finish(session, nextKnown, progress, now);
  }
  return {
    session: { ...session, onboardingStage: stage, draft, updatedAt: now },
    outcome: { kind: "prompt", stage, progress, started: false },
  };
}

function finish(
  session: CoachSessionInterface,
  known: ProfileDraft,
  progress: OnboardingProgress,
  now: Date
): OnboardingTransition {
  const complete = asComplete(known);
  if (!complete) {
    throw new Error("onboarding finished with missing fields");
  }
  return {
    session: { ...session, onboardingStage: OnboardingStageEnum.COMPLETE, onboardingActive: false, draft: {}, updatedAt: now },
    outcome: { kind: "completed", draft: complete, progress },
  };
}

/**
 * Brings an open onboarding in line with a field set through `profile set`.
 * The new value also replaces any answer already collected for that field, so
 * completion cannot write the older answer back.
 */
export function reconcileOnboarding(
  session: CoachSessionInterface,
  profile: CoachProfileInterface,
  update: FieldUpdate,
  now: Date
): OnboardingTransition {
  const asked = REQUIRED_FIELDS.some(({ field }) => field === update.field);
  const draft = asked ? applyFieldUpdate(session.draft, update) : session.draft;
  const known = knownFields(profile, draft);
  const stage = stageFor(known);
  const progress = progressOf(known);
  if (stage === OnboardingStageEnum.COMPLETE) {
    return finish(session, known, progress, now);
  }
  return {
    session: { ...session, onboardingStage: stage, draft, updatedAt: now },
    outcome: { kind: "prompt", stage, progress, started: false },
  };
}

/** `reset`: back to the first stage with nothing collected. */
export function resetOnboarding(session: CoachSessionInterface, now: Date): CoachSessionInterface {
  return initialSession(session.userId, now);
}
