import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  applyEnvOverrides,
  defaultInstanceConfig,
  loadInstanceConfig,
  loadServiceConfig,
  parseInstanceConfig,
  parseServiceConfig,
} from "./config";
import { ConfigError } from "./errors";
import * as guardrails from "./guardrails";

vi.mock("./logger", () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

describe("parseInstanceConfig", () => {
  it("fills every missing field from the defaults", () => {
    expect(parseInstanceConfig({})).toEqual(defaultInstanceConfig());
  });

  it("uses the java launch defaults", () => {
    const { launch, restarts, cleanExitCodes } = defaultInstanceConfig();
    expect(launch).toEqual({
      command: "java",
      args: ["-Xms1G", "-Xmx2G", "-Djline.terminal=jline.UnsupportedTerminal"],
      artifact: "minecraft_*.jar",
      artifactFlag: "-jar",
      trailingArgs: ["nogui"],
    });
    expect(restarts).toEqual({ autoRestart: false, restartIntervalHours: 6, alertIntervals: [3600, 1800, 300, 30] });
    expect(cleanExitCodes).toEqual([0, 3221225786]);
  });

  it("reads nested sections", () => {
    const config = parseInstanceConfig({
      launch: { command: "./bedrock_server", args: [], artifact: null, trailingArgs: [] },
      restarts: { autoRestart: true, restartIntervalHours: 12, alertIntervals: [600, 60] },
      chatHistorySize: 10,
    });
    expect(config.launch).toEqual({
      command: "./bedrock_server",
      args: [],
      artifact: null,
      artifactFlag: "-jar",
      trailingArgs: [],
    });
    expect(config.restarts).toEqual({ autoRestart: true, restartIntervalHours: 12, alertIntervals: [600, 60] });
    expect(config.chatHistorySize).toBe(10);
  });

  it("names the offending key", () => {
    expect(() => parseInstanceConfig({ restarts: { autoRestart: "yes" } })).toThrow(
      "restarts.autoRestart must be a boolean",
    );
    expect(() => parseInstanceConfig({ launch: { args: ["-Xmx1G", 2] } })).toThrow(
      "launch.args must be an array of strings",
    );
    expect(() => parseInstanceConfig({ commandTimeoutMs: 50 })).toThrow(
      "commandTimeoutMs must be a number between 100 and 300000",
    );
    expect(() => parseInstanceConfig({ chatHistorySize: 1.5 })).toThrow("chatHistorySize must be an integer");
  });

  it("prefixes errors with the file name", () => {
    expect(() => parseInstanceConfig([], "/srv/a/console.json")).toThrow(
      "/srv/a/console.json: config root must be an object",
    );
  });

  it("throws ConfigError for a non-object section", () => {
    expect(() => parseInstanceConfig({ console: "patterns" })).toThrow(ConfigError);
  });
});

describe("parseServiceConfig", () => {
  it("defaults host, port and servers", () => {
    expect(parseServiceConfig({})).toEqual({ host: "127.0.0.1", port: 8080, servers: [] });
  });

  it("reads server entries", () => {
    const config = parseServiceConfig({
      port: 9000,
      servers: [{ name: "survival", path: "/srv/survival", autostart: true }, { name: "creative", path: "/srv/c" }],
    });
    expect(config.servers).toEqual([
      { name: "survival", path: "/srv/survival", autostart: true },
      { name: "creative", path: "/srv/c", autostart: false },
    ]);
    expect(config.port).toBe(9000);
  });

  it("rejects entries without a path", () => {
    expect(() => parseServiceConfig({ servers: [{ name: "survival" }] })).toThrow(
      "every entry in servers needs a name and a path",
    );
  });

  it("rejects duplicate names", () => {
    expect(() =>
      parseServiceConfig({
        servers: [
          { name: "survival", path: "/a" },
          { name: "survival", path: "/b" },
        ],
      }),
    ).toThrow('duplicate server name "survival"');
  });
});

describe("config files", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), "console-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("falls back to defaults when console.json is missing", async () => {
    await expect(loadInstanceConfig(dir)).resolves.toEqual(defaultInstanceConfig());
  });

  it("loads console.json from the server directory", async () => {
    writeFileSync(path.join(dir, "console.json"), JSON.stringify({ stopTimeoutMs: 5000 }));
    const config = await loadInstanceConfig(dir);
    expect(config.stopTimeoutMs).toBe(5000);
  });

  it("reports malformed JSON as a ConfigError", async () => {
    writeFileSync(path.join(dir, "console.json"), "{ not json");
    await expect(loadInstanceConfig(dir)).rejects.toBeInstanceOf(ConfigError);
  });

  it("treats a missing service config as empty", async () => {
    await expect(loadServiceConfig(path.join(dir, "console-config.json"))).resolves.toEqual({
      host: "127.0.0.1",
      port: 8080,
      servers: [],
    });
  });
});

describe("applyEnvOverrides", () => {
  const original = guardrails.DEFAULT_COMMAND_TIMEOUT_MS;

  afterEach(() => {
    guardrails.setDefaultCommandTimeoutMs(original);
  });

  it("sets guardrails from the environment", () => {
    applyEnvOverrides({ COMMAND_TIMEOUT_MS: "2500" });
    expect(guardrails.DEFAULT_COMMAND_TIMEOUT_MS).toBe(2500);
  });

  it("ignores unset values and rejects bad ones", () => {
    applyEnvOverrides({});
    expect(guardrails.DEFAULT_COMMAND_TIMEOUT_MS).toBe(original);
    expect(() => applyEnvOverrides({ STOP_TIMEOUT_MS: "soon" })).toThrow(
      'STOP_TIMEOUT_MS must be a positive integer, got "soon"',
    );
  });
});
