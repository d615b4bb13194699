import healthRouter from "./health";
import { coachRoutes } from "./coach.routes";

export { healthRouter, coachRoutes };
