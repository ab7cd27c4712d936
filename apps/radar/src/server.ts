import { config } from "@/config";
import { corsOptions } from "@/config/cors";
import { logger } from "@/lib/logger";
import { ToolRouter } from "@/tools/router";
import { describeError } from "@/utils/errors";
import cors from "cors";
import express from "express";
import helmet from "helmet";

const STATUS_BY_ERROR = {
  InvalidInput: 400,
  FetchFailure: 502,
} as const;

/** Client errors raised by express.json, e.g. a malformed or oversized body. */
function clientErrorStatus(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null) return undefined;
  if (!("status" in error) || typeof error.status !== "number") {
    return undefined;
  }
  return error.status >= 400 && error.status < 500 ? error.status : undefined;
}

export function createApp(router: ToolRouter): express.Express {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(cors(corsOptions));
  app.use(express.json({ limit: "1mb" }));

  // Logging middleware
  app.use((req, res, next) => {
    logger.debug(`${req.method} ${req.path} - ${req.ip}`);
    next();
  });

  // Health check
  app.get("/health", (req, res) => {
    res.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      environment: config.app.environment,
    });
  });

  app.get("/api/tools", (req, res) => {
    res.json({ tools: router.list() });
  });

  app.post("/api/tools/:name", async (req, res, next) => {
    const { name } = req.params;
    if (!router.has(name)) {
      res.status(404).json({
        ok: false,
        tool: name,
        error: { type: "InvalidInput", message: `Unknown tool: ${name}` },
      });
      return;
    }

    try {
      const outcome = await router.run(name, req.body);
      res
        .status(outcome.ok ? 200 : STATUS_BY_ERROR[outcome.error.type])
        .json(outcome);
    } catch (error) {
      next(error);
    }
  });

  // Error handling
  app.use(
    (
      error: unknown,
      req: express.Request,
      res: express.Response,
      next: express.NextFunction
    ) => {
      const status = clientErrorStatus(error);
      if (status !== undefined) {
        logger.warn(`Rejected request body: ${describeError(error)}`);
        res.status(status).json({
          ok: false,
          error: {
            type: "InvalidInput",
            message: "Malformed request body",
            details: [describeError(error)],
          },
        });
        return;
      }

      logger.error("Unhandled error:", {
        error: error instanceof Error ? error : String(error),
      });
      res.status(500).json({
        error: "Internal server error",
        message:
          config.app.environment === "development" && error instanceof Error
            ? error.message
            : "Something went wrong",
      });
    }
  );

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({
      error: "Not found",
      message: `Route ${req.method} ${req.originalUrl} not found`,
    });
  });

  return app;
}
