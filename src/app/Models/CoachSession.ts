import { model, Model } from 'mongoose';
import { ICoachSession, CoachSessionSchema } from '../../database/schemas/CoachSessionSchema';

const CoachSession: Model<ICoachSession> = model<ICoachSession>('CoachSession', CoachSessionSchema);

export { CoachSession };
