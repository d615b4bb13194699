import http from "http";
import express, { Application, NextFunction, Request, Response } from "express";
import helmet from "helmet";
import compression from "compression";
import rateLimit from "express-rate-limit";
import { coachRoutes, healthRouter } from "./routes";
import { CoachService } from "./services/conversation/coachService";
import { AppConfig } from "./utils/config";
import { httpLogger, logger, withRequestId } from "./observability/logging";
import { reportError, sentryErrorHandler } from "./observability/sentry";

const version = "1.0.0";

export class Server {
  public app: Application;

  public port: number;

  constructor(private config: AppConfig, coach: CoachService) {
    this.app = express();
    this.port = config.port;

    this.registerMiddlewares();
    this.regsiterRoutes(coach);
    this.registerErrorHandlers();
  }

  registerMiddlewares() {
    if (this.config.env === "production") {
      // behind the platform proxy; rate limits key on the client address
      this.app.set("trust proxy", 1);
    }
    this.app.use(express.json({ limit: "64kb" }));
    this.app.use(helmet());
    this.app.use(compression());
    this.app.use(withRequestId, httpLogger);
    this.app.use("/api/backend/", rateLimit({ windowMs: 60_000, limit: 120 }));
  }

  regsiterRoutes(coach: CoachService) {
    // Lightweight healthcheck for platforms
    this.app.get("/healthz", (_req: Request, res: Response) => res.status(200).json({ ok: true }));
    this.app.get("/api/backend", (_req: Request, res: Response) => {
      res.status(200).json({ message: `App running on version ${version}. api/backend` });
    });
    this.app.use("/api/backend", healthRouter);
    this.app.use("/api/backend/v1/coach", coachRoutes(coach, { ratePerMinute: this.config.rateLimitPerMinute }));
  }

  registerErrorHandlers() {
    sentryErrorHandler(this.app);
    // eslint-disable-next-line @typescript-eslint/no-unused-vars
    this.app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
      req.log.error({ err }, "unhandled request error");
      reportError(err, { path: req.path });
      res.status(500).json({ error: "internal_error" });
    });
  }

  start(): http.Server {
    const server = http.createServer(this.app);
    server.listen(this.port, () => {
      logger.info(`HTTP Server started at port ${this.port}`);
    });
    return server;
  }
}
