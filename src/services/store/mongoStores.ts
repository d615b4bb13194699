import { CoachProfile } from "../../app/Models/CoachProfile";
import { CoachSession } from "../../app/Models/CoachSession";
import { WeightLog } from "../../app/Models/WeightLog";
import { ICoachProfile } from "../../database/schemas/CoachProfileSchema";
import { ICoachSession } from "../../database/schemas/CoachSessionSchema";
import { IWeightLog } from "../../database/schemas/WeightLogSchema";
import { CoachProfileInterface, ProfileDraft } from "../../types/ProfileInterface";
import { CoachSessionInterface } from "../../types/SessionInterface";
import { WeightLogInterface } from "../../types/WeightLogInterface";
import { StoreUnavailableError } from "../../utils/errors";
import { ProfileStore, SessionStore } from "./types";

async function guard<T>(operation: string, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (err) {
    throw new StoreUnavailableError(operation, err);
  }
}

// lean documents omit unset optional fields; mongoose strips undefined keys on write
function toProfile(doc: ICoachProfile): CoachProfileInterface {
  return {
    userId: doc.userId,
    sex: doc.sex,
    age: doc.age,
    heightCm: doc.heightCm,
    activityLevel: doc.activityLevel,
    goal: doc.goal,
    weightKg: doc.weightKg,
    goalWeightKg: doc.goalWeightKg,
    deadlineDays: doc.deadlineDays,
    unitPreference: doc.unitPreference,
    onboardingStage: doc.onboardingStage,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

function toWeight(doc: IWeightLog): WeightLogInterface {
  return { userId: doc.userId, timestampUtc: doc.timestampUtc, valueKg: doc.valueKg };
}

function toSession(doc: ICoachSession): CoachSessionInterface {
  // an empty draft is minimized away on save
  const draft: ProfileDraft = { ...doc.draft };
  return {
    userId: doc.userId,
    onboardingStage: doc.onboardingStage,
    onboardingActive: doc.onboardingActive,
    draft,
    lastPlan: doc.lastPlan ?? null,
    updatedAt: doc.updatedAt,
  };
}

export class MongoProfileStore implements ProfileStore {
  async get(userId: string): Promise<CoachProfileInterface | null> {
    const doc = await guard("profile.get", () => CoachProfile.findOne({ userId }).lean<ICoachProfile>().exec());
    return doc ? toProfile(doc) : null;
  }

  async put(userId: string, profile: CoachProfileInterface): Promise<void> {
    await guard("profile.put", () =>
      CoachProfile.replaceOne({ userId }, { ...profile, userId }, { upsert: true }).exec()
    );
  }

  async delete(userId: string): Promise<void> {
    await guard("profile.delete", () => CoachProfile.deleteOne({ userId }).exec());
  }

  async appendWeight(userId: string, entry: WeightLogInterface): Promise<void> {
    await guard("weights.append", () => WeightLog.create({ ...entry, userId }));
  }

  async listWeights(userId: string, since: Date): Promise<WeightLogInterface[]> {
    const docs = await guard("weights.list", () =>
      WeightLog.find({ userId, timestampUtc: { $gte: since } })
        .sort({ timestampUtc: 1, _id: 1 })
        .lean<IWeightLog[]>()
        .exec()
    );
    return docs.map(toWeight);
  }

  async purgeWeights(userId: string): Promise<void> {
    await guard("weights.purge", () => WeightLog.deleteMany({ userId }).exec());
  }
}

export class MongoSessionStore implements SessionStore {
  async get(userId: string): Promise<CoachSessionInterface | null> {
    const doc = await guard("session.get", () => CoachSession.findOne({ userId }).lean<ICoachSession>().exec());
    return doc ? toSession(doc) : null;
  }

  async put(userId: string, session: CoachSessionInterface): Promise<void> {
    await guard("session.put", () =>
      CoachSession.replaceOne({ userId }, { ...session, userId }, { upsert: true }).exec()
    );
  }

  async delete(userId: string): Promise<void> {
    await guard("session.delete", () => CoachSession.deleteOne({ userId }).exec());
  }
}
