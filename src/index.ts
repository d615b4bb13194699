import path from "path";
import dotenv from "dotenv";
dotenv.config({ path: path.resolve(__dirname, "..", ".env") });

import { Server } from "./server";
import { CoachService } from "./services/conversation/coachService";
import { InMemoryProfileStore, InMemorySessionStore } from "./services/store/memoryStores";
import { MongoProfileStore, MongoSessionStore } from "./services/store/mongoStores";
import { userLocks } from "./lib/userLocks";
import { connectDatabase } from "./utils/dbConnection";
import { loadConfig } from "./utils/config";
import { logger, setLogLevel } from "./observability/logging";
import { initSentry } from "./observability/sentry";

(async () => {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  initSentry(config.sentryDsn);

  const memory = config.storeDriver === "memory";
  if (memory) {
    logger.warn("[BOOT] STORE_DRIVER=memory: state is lost on restart");
  } else {
    await connectDatabase(config.dbUrl);
  }

  const coach = new CoachService({
    profiles: memory ? new InMemoryProfileStore() : new MongoProfileStore(),
    sessions: memory ? new InMemorySessionStore() : new MongoSessionStore(),
    locks: userLocks,
    rules: config.rules,
    resetPurgesWeights: config.resetPurgesWeights,
  });
  new Server(config, coach).start();
})().catch((err: unknown) => {
  logger.fatal({ err }, "boot failed");
  process.exit(1);
});
