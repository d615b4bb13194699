import { subDays } from "date-fns";
import type { Logger } from "pino";
import { UserLocks } from "../../lib/userLocks";
import { logger as rootLogger } from "../../observability/logging";
import { reportError } from "../../observability/sentry";
import { CoachProfileInterface } from "../../types/ProfileInterface";
import { CoachSessionInterface } from "../../types/SessionInterface";
import { StoreUnavailableError } from "../../utils/errors";
import { initialSession } from "../onboarding/onboardingStateMachine";
import { DEFAULT_RULES } from "../planRules/rules";
import { CoachRules } from "../planRules/types";
import { newProfile } from "../profile/profileFields";
import { ProfileStore, SessionStore } from "../store/types";
import { ConversationState, Effect, route } from "./conversationRouter";
import { classifyIntent } from "./intentClassifier";
import { Reply, renderReply } from "./replies";

export type CoachServiceOptions = {
  profiles: ProfileStore;
  sessions: SessionStore;
  locks?: UserLocks;
  rules?: CoachRules;
  resetPurgesWeights?: boolean;
  clock?: () => Date;
  logger?: Logger;
};

export type CoachResponse = { reply: Reply; text: string };

// profile and session writes can be undone from the loaded records; weight
// writes cannot, so they go last
const EFFECT_ORDER: Record<Effect["type"], number> = {
  "put-profile": 0,
  "delete-profile": 0,
  "put-session": 1,
  "delete-session": 1,
  "append-weight": 2,
  "purge-weights": 2,
};

/** Stored records as loaded, before this message. */
type Loaded = {
  profile: CoachProfileInterface | null;
  session: CoachSessionInterface | null;
};

type Undo = { operation: string; run: () => Promise<void> };

export class CoachService {
  private profiles: ProfileStore;
  private sessions: SessionStore;
  private locks: UserLocks;
  private rules: CoachRules;
  private resetPurgesWeights: boolean;
  private clock: () => Date;
  private log: Logger;

  constructor(options: CoachServiceOptions) {
    this.profiles = options.profiles;
    this.sessions = options.sessions;
    this.locks = options.locks ?? new UserLocks();
    this.rules = options.rules ?? DEFAULT_RULES;
    this.resetPurgesWeights = options.resetPurgesWeights ?? false;
    this.clock = options.clock ?? (() => new Date());
    this.log = (options.logger ?? rootLogger).child({ component: "coach" });
  }

  /** One inbound message for one user; replies are produced in arrival order per user. */
  handleMessage(userId: string, text: string): Promise<CoachResponse> {
    return this.locks.run(userId, () => this.process(userId, text));
  }

  private async process(userId: string, text: string): Promise<CoachResponse> {
    try {
      const now = this.clock();
      const { state, loaded } = await this.load(userId, now);
      const intent = classifyIntent(text, { onboardingActive: state.session.onboardingActive });
      const result = route(state, intent, now, {
        rules: this.rules,
        resetPurgesWeights: this.resetPurgesWeights,
      });
      await this.apply(userId, result.effects, loaded);
      this.log.info({ userId, intent: intent.kind, outcome: result.reply.kind }, "message handled");
      return { reply: result.reply, text: renderReply(result.reply) };
    } catch (err) {
      if (!(err instanceof StoreUnavailableError)) throw err;
      this.log.error({ userId, operation: err.operation, err: err.failure }, "store unavailable");
      reportError(err, { userId, operation: err.operation });
      const reply: Reply = { kind: "store-unavailable" };
      return { reply, text: renderReply(reply) };
    }
  }

  private async load(userId: string, now: Date): Promise<{ state: ConversationState; loaded: Loaded }> {
    const windowDays = Math.max(...this.rules.trends.windows, this.rules.suggestions.lookbackDays);
    const [profile, session, weights] = await Promise.all([
      this.profiles.get(userId),
      this.sessions.get(userId),
      this.profiles.listWeights(userId, subDays(now, windowDays)),
    ]);
    const state: ConversationState = {
      profile: profile ?? newProfile(userId, now),
      isNewProfile: profile === null,
      session: session ?? initialSession(userId, now),
      weights,
    };
    return { state, loaded: { profile, session } };
  }

  /**
   * Writes the effects of one message. When a write fails, the profile and
   * session writes already made are put back to their loaded records before
   * the error is rethrown, so the message leaves no partial state.
   */
  private async apply(userId: string, effects: Effect[], loaded: Loaded): Promise<void> {
    const ordered = [...effects].sort((a, b) => EFFECT_ORDER[a.type] - EFFECT_ORDER[b.type]);
    const undo: Undo[] = [];
    try {
      for (const effect of ordered) {
        await this.write(userId, effect);
        const restore = this.undoFor(userId, effect, loaded);
        if (restore) undo.unshift(restore);
      }
    } catch (err) {
      if (err instanceof StoreUnavailableError) await this.rollback(userId, undo);
      throw err;
    }
  }

  private async write(userId: string, effect: Effect): Promise<void> {
    switch (effect.type) {
      case "append-weight":
        return this.profiles.appendWeight(userId, effect.entry);
      case "purge-weights":
        return this.profiles.purgeWeights(userId);
      case "put-profile":
        return this.profiles.put(userId, effect.profile);
      case "delete-profile":
        return this.profiles.delete(userId);
      case "put-session":
        return this.sessions.put(userId, effect.session);
      case "delete-session":
        return this.sessions.delete(userId);
    }
  }

  private undoFor(userId: string, effect: Effect, loaded: Loaded): Undo | null {
    switch (effect.type) {
      case "put-profile":
      case "delete-profile": {
        const { profile } = loaded;
        return {
          operation: "profile.restore",
          run: () => (profile ? this.profiles.put(userId, profile) : this.profiles.delete(userId)),
        };
      }
      case "put-session":
      case "delete-session": {
        const { session } = loaded;
        return {
          operation: "session.restore",
          run: () => (session ? this.sessions.put(userId, session) : this.sessions.delete(userId)),
        };
      }
      case "append-weight":
      case "purge-weights":
        // always the last writes of a message
        return null;
    }
  }

  private async rollback(userId: string, undo: Undo[]): Promise<void> {
    for (const step of undo) {
      try {
        await step.run();
      } catch (err) {
        if (!(err instanceof StoreUnavailableError)) throw err;
        this.log.error({ userId, operation: step.operation, err: err.failure }, "rollback failed");
        reportError(err, { userId, operation: step.operation });
      }
    }
  }
}
