import type { NextFunction, Request, Response } from "express";
import { MAX_COMMAND_LENGTH, SCROLLBACK_CAPACITY } from "./guardrails";
import { MAX_TIMER_DELAY_MS } from "./restart-scheduler";

/** Server names become registry keys and log fields: letters, digits, `.`, `_` and `-`, max 64 chars. */
const SERVER_NAME_PATTERN = /^[A-Za-z0-9._-]{1,64}$/;

export function isValidServerName(name: string): boolean {
  return SERVER_NAME_PATTERN.test(name);
}

/** Pure validation for a console command. Returns an error string or null if valid. */
export function validateCommandText(command: unknown): string | null {
  if (typeof command !== "string" || !command.trim()) {
    return "command is required and must be a non-empty string";
  }
  if (command.length > MAX_COMMAND_LENGTH) {
    return `command exceeds max length of ${MAX_COMMAND_LENGTH}`;
  }
  // One command per request: an embedded newline would send a second one
  if (/[\r\n]/.test(command)) {
    return "command must be a single line";
  }
  return null;
}

export type RestartDelay = { ok: true; delay: number | null } | { ok: false; error: string };

/** Parse an optional restart delay in seconds. Absent means restart now. */
export function parseRestartDelay(value: unknown): RestartDelay {
  if (value === undefined || value === null || value === "") return { ok: true, delay: null };
  const delay = typeof value === "string" ? Number(value) : value;
  if (typeof delay !== "number" || Number.isNaN(delay)) {
    return { ok: false, error: "delay must be a number of seconds" };
  }
  if (!Number.isFinite(delay) || delay <= 0) {
    return { ok: false, error: "Invalid time delta. Time delta must be greater than 0 seconds." };
  }
  if (delay * 1000 > MAX_TIMER_DELAY_MS) {
    return { ok: false, error: `delay must be at most ${Math.floor(MAX_TIMER_DELAY_MS / 1000)} seconds` };
  }
  return { ok: true, delay };
}

export type LineCount = { ok: true; lines: number | null } | { ok: false; error: string };

/** `?lines=N` on the output route: a positive integer up to the scrollback capacity, or absent for a live stream. */
export function parseLineCount(raw: string | undefined): LineCount {
  if (raw === undefined || raw === "") return { ok: true, lines: null };
  const lines = Number(raw);
  if (!Number.isInteger(lines) || lines < 1 || lines > SCROLLBACK_CAPACITY) {
    return { ok: false, error: `lines must be an integer between 1 and ${SCROLLBACK_CAPACITY}` };
  }
  return { ok: true, lines };
}

export function validateStartServer(req: Request, res: Response, next: NextFunction): void {
  const { path } = req.body ?? {};
  if (path !== undefined && (typeof path !== "string" || !path.trim())) {
    res.status(400).json({ error: "path must be a non-empty string" });
    return;
  }
  next();
}

export function validateCommand(req: Request, res: Response, next: NextFunction): void {
  const error = validateCommandText(req.body?.command);
  if (error) {
    res.status(400).json({ error });
    return;
  }
  next();
}

export function validateRestart(req: Request, res: Response, next: NextFunction): void {
  const parsed = parseRestartDelay(req.body?.delay);
  if (!parsed.ok) {
    res.status(400).json({ error: parsed.error });
    return;
  }
  next();
}
