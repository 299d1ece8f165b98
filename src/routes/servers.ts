import { randomUUID } from "node:crypto";
import express, { type Request, type Response } from "express";
import { formatSSE } from "../event-fanout";
import { OBSERVER_POLL_INTERVAL_MS } from "../guardrails";
import type { ManagedProcess } from "../managed-process";
import { ConsoleObserver } from "../observer";
import type { ServerManager } from "../server-manager";
import type { ConsoleLine } from "../types";
import { param, queryString } from "../utils/express";
import { openStream } from "../utils/sse";
import {
  isValidServerName,
  parseLineCount,
  parseRestartDelay,
  validateCommand,
  validateRestart,
  validateStartServer,
} from "../validation";

function ndjson(line: ConsoleLine): string {
  return `${JSON.stringify({ line: line.text, timestamp: line.timestamp })}\n`;
}

export function createServersRouter(manager: ServerManager) {
  const router = express.Router();

  /** Live streams end once their instance has left the registry. */
  function isCurrent(proc: ManagedProcess): boolean {
    return manager.get(proc.name) === proc;
  }

  /** Resolve `:name` to a running instance, answering 404 when there is none. */
  function lookup(req: Request, res: Response): ManagedProcess | null {
    const name = param(req.params.name);
    const proc = manager.get(name);
    if (!proc) {
      res.status(404).json({ error: `Server with name '${name}' not found` });
      return null;
    }
    return proc;
  }

  router.get("/api/servers", (_req, res) => {
    const servers = manager.list().map((proc) => ({ name: proc.name, path: proc.directory, state: proc.state }));
    res.json({ servers });
  });

  router.get("/api/servers/:name", (req: Request, res: Response) => {
    const proc = lookup(req, res);
    if (!proc) return;
    res.json(proc.info());
  });

  router.post("/api/servers/:name/start", validateStartServer, async (req: Request, res: Response) => {
    const name = param(req.params.name);
    if (!isValidServerName(name)) {
      res.status(400).json({ error: "name may only contain letters, digits, '.', '_' and '-' (max 64 chars)" });
      return;
    }
    const outcome = await manager.start(name, req.body?.path);
    switch (outcome.status) {
      case "started":
        res.json({ message: `Server started successfully with name: ${name}`, command: outcome.command });
        return;
      case "unknown":
        res.status(404).json({ error: outcome.error });
        return;
      case "conflict":
        res.status(409).json({ error: outcome.error });
        return;
      case "failed":
        res.status(400).json({ error: `Failed to start the server: ${outcome.error}` });
        return;
    }
  });

  router.post("/api/servers/:name/stop", async (req: Request, res: Response) => {
    const name = param(req.params.name);
    const result = await manager.stop(name);
    if (!result) {
      res.status(404).json({ error: `Server with name '${name}' not found` });
      return;
    }
    if (!result.ok) {
      res.status(500).json({ error: result.message });
      return;
    }
    res.json({ message: result.message });
  });

  router.post("/api/servers/:name/restart", validateRestart, async (req: Request, res: Response) => {
    const proc = lookup(req, res);
    if (!proc) return;
    const parsed = parseRestartDelay(req.body?.delay);
    if (!parsed.ok) {
      res.status(400).json({ error: parsed.error });
      return;
    }

    if (parsed.delay !== null) {
      const scheduled = await proc.scheduleRestart(parsed.delay);
      if (!scheduled.ok) {
        res.status(400).json({ error: scheduled.message });
        return;
      }
      res.json({ message: scheduled.message, pendingRestart: proc.info().pendingRestart });
      return;
    }

    const result = await proc.restart();
    if (!result.ok) {
      res.status(500).json({ error: result.error });
      return;
    }
    res.json({ message: `Triggered a server restart for '${proc.name}'` });
  });

  router.delete("/api/servers/:name/restart", (req: Request, res: Response) => {
    const proc = lookup(req, res);
    if (!proc) return;
    if (!proc.cancelScheduledRestart()) {
      res.status(404).json({ error: `No restart is pending for '${proc.name}'` });
      return;
    }
    res.json({ message: `Cancelled the pending restart for '${proc.name}'` });
  });

  router.post("/api/servers/:name/input", validateCommand, async (req: Request, res: Response) => {
    const proc = lookup(req, res);
    if (!proc) return;

    // Give up waiting for the console response if the client goes away
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) controller.abort();
    });

    const command: string = req.body.command;
    const result = await proc.serverInput(command, { signal: controller.signal });
    if (res.destroyed) return;
    if (!result.success) {
      res.status(422).json({ error: `The server did not accept the command: ${command}`, line: result.line });
      return;
    }
    res.json({ message: "success", line: result.line });
  });

  router.get("/api/servers/:name/output", (req: Request, res: Response) => {
    const proc = lookup(req, res);
    if (!proc) return;
    const parsed = parseLineCount(queryString(req.query.lines));
    if (!parsed.ok) {
      res.status(400).json({ error: parsed.error });
      return;
    }

    if (parsed.lines !== null) {
      res.type("application/x-ndjson").send(proc.scrollback.tail(parsed.lines).map(ndjson).join(""));
      return;
    }

    let cursor = 0;
    const stream = openStream(res, {
      contentType: "application/x-ndjson",
      heartbeat: "\n",
      onClose: () => clearInterval(poll),
    });
    const poll = setInterval(() => {
      const lines = proc.scrollback.since(cursor);
      cursor = proc.scrollback.total;
      for (const line of lines) {
        stream.write(ndjson(line));
      }
      if (!isCurrent(proc)) stream.end();
    }, OBSERVER_POLL_INTERVAL_MS);
  });

  router.get("/api/servers/:name/players", (req: Request, res: Response) => {
    const proc = lookup(req, res);
    if (!proc) return;
    res.json({ players: proc.connectedPlayers });
  });

  router.get("/api/servers/:name/chat", (req: Request, res: Response) => {
    const proc = lookup(req, res);
    if (!proc) return;
    res.json({ chat: proc.chatHistory });
  });

  // SSE stream of console output and lifecycle events
  router.get("/api/servers/:name/events", (req: Request, res: Response) => {
    const proc = lookup(req, res);
    if (!proc) return;

    const label = queryString(req.query.observer)?.trim().slice(0, 64) || `observer-${randomUUID().slice(0, 8)}`;
    // Unique per connection so two tabs with the same observer name keep separate queues
    const observer = new ConsoleObserver(proc, `${label}#${randomUUID()}`, label);
    observer.attach();

    const stream = openStream(res, {
      contentType: "text/event-stream",
      heartbeat: ": heartbeat\n\n",
      onClose: () => {
        clearInterval(poll);
        observer.detach();
      },
    });
    const deliver = (): number => {
      const events = observer.poll();
      for (const event of events) {
        stream.write(formatSSE(event));
      }
      return events.length;
    };
    const poll = setInterval(() => {
      if (isCurrent(proc)) {
        deliver();
        return;
      }
      // The instance is gone: flush what is left, then end the stream
      while (deliver() > 0) continue;
      stream.end();
    }, OBSERVER_POLL_INTERVAL_MS);
  });

  router.post("/api/servers/:name/reload-config", async (req: Request, res: Response) => {
    const proc = lookup(req, res);
    if (!proc) return;
    const result = await proc.reloadConfig();
    if (!result.ok) {
      res.status(400).json({ error: result.message });
      return;
    }
    res.json({ message: result.message });
  });

  router.post("/api/reload-config", async (_req, res) => {
    const result = await manager.reloadServiceConfig();
    if (!result.ok) {
      res.status(400).json({ error: result.message });
      return;
    }
    res.json({ message: result.message });
  });

  return router;
}
