import { FieldUpdate, parseField } from "../../app/Validation/profileSchemas";
import { PlanInterface } from "../../types/PlanInterface";
import { CoachProfileInterface, CompleteProfile } from "../../types/ProfileInterface";
import { CoachSessionInterface } from "../../types/SessionInterface";
import { WeightLogInterface } from "../../types/WeightLogInterface";
import { ValidationError } from "../../utils/errors";
import { guidanceFor } from "../guidance/guide";
import {
  answerOnboarding,
  reconcileOnboarding,
  resetOnboarding,
  startOnboarding,
} from "../onboarding/onboardingStateMachine";
import { calculatePlan } from "../planRules/nutrition";
import { CoachRules } from "../planRules/types";
import { applyFieldUpdate, isComplete, missingFields, newProfile, touchProfile } from "../profile/profileFields";
import { suggestAfterLog } from "../suggestions/suggestionEngine";
import { chronological, summarizeHistory } from "../trends/trendSummarizer";
import { Intent } from "./intentClassifier";
import { Reply } from "./replies";

export type ConversationState = {
  profile: CoachProfileInterface;
  /** true when the profile was not found in the store */
  isNewProfile: boolean;
  session: CoachSessionInterface;
  /** stored weights inside the longest history window, oldest first */
  weights: WeightLogInterface[];
};

/** Writes to perform, in order, once the whole message has been computed. */
export type Effect =
  | { type: "append-weight"; entry: WeightLogInterface }
  | { type: "put-profile"; profile: CoachProfileInterface }
  | { type: "delete-profile" }
  | { type: "purge-weights" }
  | { type: "put-session"; session: CoachSessionInterface }
  | { type: "delete-session" };

export type RouteResult = {
  profile: CoachProfileInterface;
  session: CoachSessionInterface;
  effects: Effect[];
  reply: Reply;
};

export type RouterOptions = {
  rules: CoachRules;
  resetPurgesWeights: boolean;
};

function latestLogged(weights: WeightLogInterface[]): WeightLogInterface | undefined {
  const sorted = chronological(weights);
  return sorted[sorted.length - 1];
}

function planFor(profile: CompleteProfile, weights: WeightLogInterface[], options: RouterOptions): PlanInterface {
  return calculatePlan(profile, latestLogged(weights)?.valueKg ?? null, options.rules.plan);
}

function unchanged(state: ConversationState, reply: Reply): RouteResult {
  return { profile: state.profile, session: state.session, effects: [], reply };
}

function withSession(state: ConversationState, session: CoachSessionInterface, reply: Reply): RouteResult {
  return { profile: state.profile, session, effects: [{ type: "put-session", session }], reply };
}

function requireComplete(
  state: ConversationState,
  run: (profile: CompleteProfile) => RouteResult
): RouteResult {
  const { profile } = state;
  if (!isComplete(profile)) {
    return unchanged(state, { kind: "needs-onboarding", missing: missingFields(profile) });
  }
  return run(profile);
}

function onboardingStep(
  state: ConversationState,
  intent: Extract<Intent, { kind: "start" | "onboarding-answer" }>,
  now: Date,
  options: RouterOptions
): RouteResult {
  const { profile, session, weights } = state;
  const transition =
    intent.kind === "start"
      ? startOnboarding(session, profile, now)
      : answerOnboarding(session, profile, intent.text, now);
  const { outcome } = transition;

  switch (outcome.kind) {
    case "already-complete":
      return withSession(state, transition.session, { kind: "already-complete", progress: outcome.progress });
    case "rejected":
      return unchanged(state, {
        kind: "onboarding-prompt",
        stage: outcome.stage,
        progress: outcome.progress,
        started: false,
        error: outcome.error.message,
      });
    case "prompt":
      return withSession(state, transition.session, {
        kind: "onboarding-prompt",
        stage: outcome.stage,
        progress: outcome.progress,
        started: outcome.started,
      });
    case "completed": {
      const completed = touchProfile({ ...profile, ...outcome.draft }, now);
      const plan = calculatePlan(completed, latestLogged(weights)?.valueKg ?? null, options.rules.plan);
      const nextSession = { ...transition.session, lastPlan: plan };
      return {
        profile: completed,
        session: nextSession,
        effects: [
          { type: "put-profile", profile: completed },
          { type: "put-session", session: nextSession },
        ],
        reply: { kind: "onboarding-complete", progress: outcome.progress, plan },
      };
    }
  }
}

function profileSetWhileOnboarding(
  updated: CoachProfileInterface,
  session: CoachSessionInterface,
  update: FieldUpdate,
  now: Date,
  reply: Reply
): RouteResult {
  const transition = reconcileOnboarding(session, updated, update, now);
  const { outcome } = transition;
  // the last missing field closes onboarding with the collected answers
  const profile = outcome.kind === "completed" ? touchProfile({ ...updated, ...outcome.draft }, now) : updated;
  const nextSession = { ...transition.session, lastPlan: null };
  return {
    profile,
    session: nextSession,
    effects: [
      { type: "put-profile", profile },
      { type: "put-session", session: nextSession },
    ],
    reply,
  };
}

function dispatch(state: ConversationState, intent: Intent, now: Date, options: RouterOptions): RouteResult {
  const { profile, session, weights } = state;

  switch (intent.kind) {
    case "help":
      return unchanged(state, { kind: "help" });

    case "unrecognized":
      return unchanged(state, { kind: "unrecognized" });

    case "malformed":
      return unchanged(state, { kind: "validation-error", message: intent.error.message });

    case "reset": {
      const fresh = resetOnboarding(session, now);
      const effects: Effect[] = [{ type: "delete-profile" }];
      if (options.resetPurgesWeights) effects.push({ type: "purge-weights" });
      effects.push({ type: "delete-session" });
      return {
        profile: newProfile(profile.userId, now),
        session: fresh,
        effects,
        reply: { kind: "reset", purgedWeights: options.resetPurgesWeights },
      };
    }

    case "start":
    case "onboarding-answer":
      return onboardingStep(state, intent, now, options);

    case "plan":
      return requireComplete(state, (complete) => {
        const plan = planFor(complete, weights, options);
        return withSession(state, { ...session, lastPlan: plan, updatedAt: now }, { kind: "plan", plan });
      });

    case "log": {
      const { valueKg } = intent;
      return requireComplete(state, (complete) => {
        const latest = latestLogged(weights);
        // append-only ledger: never stamp an entry before the latest stored one
        const stamp = latest && latest.timestampUtc > now ? latest.timestampUtc : now;
        const entry: WeightLogInterface = { userId: profile.userId, timestampUtc: stamp, valueKg };
        const plan = calculatePlan(complete, entry.valueKg, options.rules.plan);
        const suggestion = suggestAfterLog(
          { plan, goal: complete.goal, history: weights, observation: entry },
          options.rules.suggestions
        );
        const nextSession = { ...session, lastPlan: plan, updatedAt: now };
        return {
          profile,
          session: nextSession,
          effects: [
            { type: "append-weight", entry },
            { type: "put-session", session: nextSession },
          ],
          reply: { kind: "logged", entry, suggestion },
        };
      });
    }

    case "history":
      return requireComplete(state, () =>
        unchanged(state, { kind: "history", summaries: summarizeHistory(weights, now, options.rules.trends) })
      );

    case "guide":
      return requireComplete(state, (complete) =>
        unchanged(state, { kind: "guide", guidance: guidanceFor(complete.goal, complete.activityLevel) })
      );

    case "profile-show":
      return unchanged(state, { kind: "profile", profile });

    case "profile-set": {
      let update: FieldUpdate;
      try {
        update = parseField(intent.field, intent.rawValue);
      } catch (err) {
        if (!(err instanceof ValidationError)) throw err;
        return unchanged(state, { kind: "validation-error", message: err.message });
      }
      const updated = touchProfile(applyFieldUpdate(profile, update), now);
      const reply: Reply = { kind: "profile-updated", update };
      if (session.onboardingActive) {
        return profileSetWhileOnboarding(updated, session, update, now, reply);
      }
      const effects: Effect[] = [{ type: "put-profile", profile: updated }];
      let nextSession = session;
      if (session.lastPlan) {
        // cached plan no longer matches the profile
        nextSession = { ...session, lastPlan: null, updatedAt: now };
        effects.push({ type: "put-session", session: nextSession });
      }
      return { profile: updated, session: nextSession, effects, reply };
    }
  }
}

/**
 * Pure transition for one inbound message: next profile and session, the
 * writes needed to persist them, and the reply. Nothing is written here.
 */
export function route(state: ConversationState, intent: Intent, now: Date, options: RouterOptions): RouteResult {
  const result = dispatch(state, intent, now, options);
  const touchesProfile = result.effects.some((e) => e.type === "put-profile" || e.type === "delete-profile");
  if (state.isNewProfile && !touchesProfile) {
    // first contact creates the profile record
    return { ...result, effects: [{ type: "put-profile", profile: result.profile }, ...result.effects] };
  }
  return result;
}
