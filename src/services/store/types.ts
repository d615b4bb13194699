import { CoachProfileInterface } from "../../types/ProfileInterface";
import { CoachSessionInterface } from "../../types/SessionInterface";
import { WeightLogInterface } from "../../types/WeightLogInterface";

/**
 * Profile and weight-log persistence. Implementations wrap I/O failures in
 * StoreUnavailableError.
 */
export interface ProfileStore {
  get(userId: string): Promise<CoachProfileInterface | null>;
  put(userId: string, profile: CoachProfileInterface): Promise<void>;
  delete(userId: string): Promise<void>;
  appendWeight(userId: string, entry: WeightLogInterface): Promise<void>;
  /** entries at or after `since`, oldest first */
  listWeights(userId: string, since: Date): Promise<WeightLogInterface[]>;
  purgeWeights(userId: string): Promise<void>;
}

export interface SessionStore {
  get(userId: string): Promise<CoachSessionInterface | null>;
  put(userId: string, session: CoachSessionInterface): Promise<void>;
  delete(userId: string): Promise<void>;
}
