import compression from "compression";
import cors from "cors";
import express, { type NextFunction, type Request, type Response } from "express";
import rateLimit from "express-rate-limit";
import helmet from "helmet";
import pinoHttp from "pino-http";

import { createAppContext, type AppContext } from "./appContext";
import { moduleForPath } from "./dashboard/systemMonitor";
import { createAssignmentRouter } from "./routes/assignment.route";
import { createAuthRouter } from "./routes/auth.route";
import { createChatRouter } from "./routes/chat.route";
import { createDashboardRouter } from "./routes/dashboard.route";
import { HttpError } from "./utils/httpError";
import { logger } from "./utils/logger";

export { HttpError };

export const createApp = (ctx: AppContext = createAppContext()) => {
  const app = express();

  app.disable("x-powered-by");

  app.use(
    pinoHttp({
      logger,
      autoLogging: {
        ignore: (req) => req.url === "/health"
      }
    })
  );

  app.use(helmet());

  app.use(
    cors({
      origin: (origin, cb) => {
        const allowed = process.env.CORS_ORIGIN;
        if (!allowed) return cb(null, true);
        if (!origin) return cb(null, true);
        const allowedList = allowed.split(",").map((s) => s.trim());
        return cb(null, allowedList.includes(origin));
      },
      credentials: true
    })
  );

  app.use(compression());
  app.use(express.json({ limit: "1mb" }));

  app.use(
    rateLimit({
      windowMs: 60_000,
      limit: 60,
      standardHeaders: true,
      legacyHeaders: false
    })
  );

  app.use((req, res, next) => {
    const start = process.hrtime.bigint();

    res.on("finish", () => {
      const durationMs = Number(process.hrtime.bigint() - start) / 1e6;

      ctx.monitor.recordRequest({
        timestamp: Date.now(),
        durationMs,
        status: res.statusCode,
        module: moduleForPath(req.originalUrl)
      });
    });

    next();
  });

  app.get("/health", (_req, res) => res.status(200).json({ ok: true }));

  app.use("/api/auth", createAuthRouter(ctx));
  app.use("/api/chat", createChatRouter(ctx));
  app.use("/api/assignment", createAssignmentRouter(ctx));
  app.use("/api/dashboard", createDashboardRouter(ctx));

  app.use((_req, _res, next) => {
    next(new HttpError(404, "Not found"));
  });

  const recordSystemError = (req: Request, status: number, message: string) => {
    ctx.telemetry
      .record({
        kind: "system_error",
        timestamp: new Date().toISOString(),
        endpoint: req.originalUrl,
        status,
        message
      })
      .catch((err: unknown) => {
        req.log.warn({ err }, "system_error_record_failed");
      });
  };

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const requestId = req.id ?? req.header("x-request-id") ?? undefined;

    if (err instanceof HttpError) {
      req.log.warn({ err, requestId }, "request_error");

      if (err.status >= 500) {
        recordSystemError(req, err.status, err.message);
      }

      return res.status(err.status).json({
        ok: false,
        error: {
          message: err.message,
          status: err.status,
          request_id: requestId,
          ...(err.details === undefined ? {} : { details: err.details })
        }
      });
    }

    req.log.error({ err, requestId }, "unhandled_error");

    recordSystemError(req, 500, "Internal server error");

    return res.status(500).json({
      ok: false,
      error: {
        message: "Internal server error",
        status: 500,
        request_id: requestId
      }
    });
  });

  return app;
};
