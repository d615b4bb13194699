import { model, Model } from 'mongoose';
import { IWeightLog, WeightLogSchema } from '../../database/schemas/WeightLogSchema';

const WeightLog: Model<IWeightLog> = model<IWeightLog>('WeightLog', WeightLogSchema);

export { WeightLog };
