import { model, Model } from 'mongoose';
import { ICoachProfile, CoachProfileSchema } from '../../database/schemas/CoachProfileSchema';

const CoachProfile: Model<ICoachProfile> = model<ICoachProfile>('CoachProfile', CoachProfileSchema);

export { CoachProfile };
