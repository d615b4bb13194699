import { connect, connection } from "mongoose";
import { logger } from "../observability/logging";

export const connectDatabase = async (uri: string | undefined): Promise<void> => {
    if (connection.readyState !== 0) {
        return;
    }
    const url = (uri || '').trim();
    if (!url) {
        throw new Error("DB_URL (or MONGO_URI/MONGODB_URI) is not set. Add it to .env or use STORE_DRIVER=memory");
    }
    logger.info('[DB] Connecting');
    await connect(url);
    logger.info('Database connected Successfully');
};
