import express from "express";
import type { ServerManager } from "../server-manager";

export function createHealthRouter(manager: ServerManager) {
  const router = express.Router();

  // Always 200 while the HTTP server is up; instance state lives under /api/servers
  router.get("/api/health", (_req, res) => {
    const { rss, heapUsed } = process.memoryUsage();
    res.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      servers: manager.list().length,
      memory: {
        rssMB: Math.round(rss / 1024 / 1024),
        heapUsedMB: Math.round(heapUsed / 1024 / 1024),
      },
    });
  });

  return router;
}
