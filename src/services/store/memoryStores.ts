import { CoachProfileInterface } from "../../types/ProfileInterface";
import { CoachSessionInterface } from "../../types/SessionInterface";
import { WeightLogInterface } from "../../types/WeightLogInterface";
import { chronological } from "../trends/trendSummarizer";
import { ProfileStore, SessionStore } from "./types";

// Values are cloned on the way in and out so callers never share state with the store.

export class InMemoryProfileStore implements ProfileStore {
  private profiles = new Map<string, CoachProfileInterface>();
  private weights = new Map<string, WeightLogInterface[]>();

  async get(userId: string): Promise<CoachProfileInterface | null> {
    const found = this.profiles.get(userId);
    return found ? structuredClone(found) : null;
  }

  async put(userId: string, profile: CoachProfileInterface): Promise<void> {
    this.profiles.set(userId, structuredClone(profile));
  }

  async delete(userId: string): Promise<void> {
    this.profiles.delete(userId);
  }

  async appendWeight(userId: string, entry: WeightLogInterface): Promise<void> {
    const list = this.weights.get(userId) ?? [];
    list.push(structuredClone(entry));
    this.weights.set(userId, list);
  }

  async listWeights(userId: string, since: Date): Promise<WeightLogInterface[]> {
    const list = this.weights.get(userId) ?? [];
    return chronological(list.filter((e) => e.timestampUtc.getTime() >= since.getTime())).map((e) =>
      structuredClone(e)
    );
  }

  async purgeWeights(userId: string): Promise<void> {
    this.weights.delete(userId);
  }

  /** every stored entry for the user, oldest first */
  allWeights(userId: string): WeightLogInterface[] {
    return chronological(this.weights.get(userId) ?? []).map((e) => structuredClone(e));
  }
}

export class InMemorySessionStore implements SessionStore {
  private sessions = new Map<string, CoachSessionInterface>();

  async get(userId: string): Promise<CoachSessionInterface | null> {
    const found = this.sessions.get(userId);
    return found ? structuredClone(found) : null;
  }

  async put(userId: string, session: CoachSessionInterface): Promise<void> {
    this.sessions.set(userId, structuredClone(session));
  }

  async delete(userId: string): Promise<void> {
    this.sessions.delete(userId);
  }
}
