import type { NextFunction, Request, Response } from "express";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { MAX_COMMAND_LENGTH } from "./guardrails";
import {
  isValidServerName,
  parseLineCount,
  parseRestartDelay,
  validateCommand,
  validateRestart,
  validateStartServer,
} from "./validation";

function mockReq(body: Record<string, unknown> = {}): Request {
  return { body, headers: {} } as unknown as Request;
}

function mockRes(): Response {
  const res = {
    status: vi.fn().mockReturnThis(),
    json: vi.fn().mockReturnThis(),
  };
  return res as unknown as Response;
}

describe("validateCommand", () => {
  let next: NextFunction;

  beforeEach(() => {
    next = vi.fn();
  });

  it("rejects a missing command", () => {
    const res = mockRes();
    validateCommand(mockReq({}), res, next);
    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json).toHaveBeenCalledWith({ error: "command is required and must be a non-empty string" });
    expect(next).not.toHaveBeenCalled();
  });

  it("rejects a blank command", () => {
    const res = mockRes();
    validateCommand(mockReq({ command: "   " }), res, next);
    expect(res.status).toHaveBeenCalledWith(400);
  });

  it("rejects a command with a line break", () => {
    const res = mockRes();
    validateCommand(mockReq({ command: "say hi\nop Steve" }), res, next);
    expect(res.json).toHaveBeenCalledWith({ error: "command must be a single line" });
  });

  it("rejects an overlong command", () => {
    const res = mockRes();
    validateCommand(mockReq({ command: "x".repeat(MAX_COMMAND_LENGTH + 1) }), res, next);
    expect(res.json).toHaveBeenCalledWith({ error: `command exceeds max length of ${MAX_COMMAND_LENGTH}` });
  });

  it("accepts a normal command", () => {
    const res = mockRes();
    validateCommand(mockReq({ command: "list" }), res, next);
    expect(next).toHaveBeenCalled();
    expect(res.status).not.toHaveBeenCalled();
  });
});

describe("validateRestart", () => {
  it("accepts an absent delay", () => {
    const next = vi.fn();
    validateRestart(mockReq({}), mockRes(), next);
    expect(next).toHaveBeenCalled();
  });

  it("rejects a zero delay", () => {
    const next = vi.fn();
    const res = mockRes();
    validateRestart(mockReq({ delay: 0 }), res, next);
    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json).toHaveBeenCalledWith({
      error: "Invalid time delta. Time delta must be greater than 0 seconds.",
    });
    expect(next).not.toHaveBeenCalled();
  });
});

describe("validateStartServer", () => {
  it("rejects a non-string path", () => {
    const res = mockRes();
    const next = vi.fn();
    validateStartServer(mockReq({ path: 42 }), res, next);
    expect(res.status).toHaveBeenCalledWith(400);
    expect(next).not.toHaveBeenCalled();
  });

  it("allows the path to be omitted", () => {
    const next = vi.fn();
    validateStartServer(mockReq({}), mockRes(), next);
    expect(next).toHaveBeenCalled();
  });
});

describe("parseRestartDelay", () => {
  it("treats absence as an immediate restart", () => {
    expect(parseRestartDelay(undefined)).toEqual({ ok: true, delay: null });
    expect(parseRestartDelay("")).toEqual({ ok: true, delay: null });
  });

  it("accepts numbers and numeric strings", () => {
    expect(parseRestartDelay(300)).toEqual({ ok: true, delay: 300 });
    expect(parseRestartDelay("90")).toEqual({ ok: true, delay: 90 });
  });

  it("rejects non-numbers", () => {
    expect(parseRestartDelay("soon")).toEqual({ ok: false, error: "delay must be a number of seconds" });
    expect(parseRestartDelay(true)).toEqual({ ok: false, error: "delay must be a number of seconds" });
  });

  it("rejects negative, infinite and oversized delays", () => {
    expect(parseRestartDelay(-5)).toMatchObject({ ok: false });
    expect(parseRestartDelay(Number.POSITIVE_INFINITY)).toMatchObject({ ok: false });
    expect(parseRestartDelay(30 * 24 * 3600)).toEqual({ ok: false, error: "delay must be at most 2147483 seconds" });
  });
});

describe("parseLineCount", () => {
  it("means a live stream when absent", () => {
    expect(parseLineCount(undefined)).toEqual({ ok: true, lines: null });
  });

  it("accepts counts up to the scrollback capacity", () => {
    expect(parseLineCount("25")).toEqual({ ok: true, lines: 25 });
    expect(parseLineCount("1000")).toEqual({ ok: true, lines: 1000 });
  });

  it("rejects anything else", () => {
    for (const raw of ["0", "-1", "2.5", "abc", "1001"]) {
      expect(parseLineCount(raw)).toEqual({ ok: false, error: "lines must be an integer between 1 and 1000" });
    }
  });
});

describe("isValidServerName", () => {
  it("allows letters, digits, dots, dashes and underscores", () => {
    expect(isValidServerName("survival-1.20_main")).toBe(true);
  });

  it("rejects spaces, slashes and empty names", () => {
    expect(isValidServerName("my server")).toBe(false);
    expect(isValidServerName("../etc")).toBe(false);
    expect(isValidServerName("")).toBe(false);
  });
});
