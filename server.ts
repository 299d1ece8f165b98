import path from "node:path";
import express, { type NextFunction, type Request, type Response } from "express";
import { DEFAULT_SERVICE_CONFIG_FILE, applyEnvOverrides, loadServiceConfig } from "./src/config";
import { DEFAULT_STOP_TIMEOUT_MS, KILL_ESCALATION_MS } from "./src/guardrails";
import { logger } from "./src/logger";
import { createHealthRouter } from "./src/routes/health";
import { createServersRouter } from "./src/routes/servers";
import { ServerManager } from "./src/server-manager";
import { errorMessage } from "./src/types";

// ── Global error handlers (keep supervised servers alive through stray faults) ─
let uncaughtExceptionCount = 0;
const MAX_UNCAUGHT_EXCEPTIONS = 3;

process.on("uncaughtException", (err) => {
  uncaughtExceptionCount++;
  logger.error(`[fatal] Uncaught exception (${uncaughtExceptionCount}/${MAX_UNCAUGHT_EXCEPTIONS})`, {
    error: err.stack || err.message,
  });
  if (uncaughtExceptionCount >= MAX_UNCAUGHT_EXCEPTIONS) {
    logger.error(`[fatal] ${MAX_UNCAUGHT_EXCEPTIONS} uncaught exceptions reached - exiting`);
    process.exit(1);
  }
});
process.on("unhandledRejection", (reason) => {
  logger.error("[fatal] Unhandled rejection", { error: errorMessage(reason) });
});

function statusOf(err: unknown): number {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return 500;
}

function createApp(manager: ServerManager): express.Express {
  const app = express();

  // ── Security headers ───────────────────────────────────────────────────────
  app.use((_req, res, next) => {
    res.setHeader("X-Content-Type-Options", "nosniff");
    res.setHeader("X-Frame-Options", "DENY");
    res.setHeader("Referrer-Policy", "strict-origin-when-cross-origin");
    next();
  });

  app.use(express.json({ limit: "64kb" }));

  app.use(createHealthRouter(manager));
  app.use(createServersRouter(manager));

  app.all("/{*splat}", (_req, res) => {
    res.status(404).json({ error: "Not found" });
  });

  // Rejected async handlers and body-parser failures land here
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = statusOf(err);
    if (status >= 500) {
      logger.error(`[http] ${req.method} ${req.path} failed`, { error: errorMessage(err) });
    }
    if (res.headersSent) return;
    res.status(status).json({ error: status >= 500 ? "Internal server error" : errorMessage(err) });
  });

  return app;
}

// ── Startup ─────────────────────────────────────────────────────────────────
async function start() {
  applyEnvOverrides();

  const configFile = path.resolve(process.env.CONSOLE_CONFIG ?? DEFAULT_SERVICE_CONFIG_FILE);
  const config = await loadServiceConfig(configFile);
  const manager = new ServerManager(config, configFile);
  const app = createApp(manager);

  const host = process.env.HOST ?? config.host;
  const port = process.env.PORT ? parseInt(process.env.PORT, 10) : config.port;
  const server = app.listen(port, host, () => {
    logger.info(`Console supervisor listening on ${host}:${port}`);
  });

  await manager.autostart();

  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("Shutting down...");
    // Instances get their own stop timeout plus kill escalation before we give up
    setTimeout(() => process.exit(1), DEFAULT_STOP_TIMEOUT_MS + KILL_ESCALATION_MS * 2 + 5_000).unref();
    await manager.stopAll();
    server.close(() => process.exit(0));
    // Event streams never end on their own
    server.closeAllConnections();
  };

  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      logger.error("Shutdown failed", { error: errorMessage(err) });
      process.exit(1);
    });
  };
  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);
}

start().catch((err: unknown) => {
  logger.error("Failed to start", { error: errorMessage(err) });
  process.exit(1);
});
