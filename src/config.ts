import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import path from "node:path";
import { ConfigError } from "./errors";
import * as guardrails from "./guardrails";
import { logger } from "./logger";
import type { InstanceConfig, ServerEntry, ServiceConfig } from "./types";
import { errorMessage } from "./types";

/** Per-instance config file, looked up inside each server directory. */
export const INSTANCE_CONFIG_FILE = "console.json";
export const DEFAULT_SERVICE_CONFIG_FILE = "console-config.json";

/** Windows STATUS_CONTROL_C_EXIT: a Ctrl+C forwarded to the child is a normal shutdown. */
const CTRL_C_EXIT_CODE = 3221225786;

export const DEFAULT_CONSOLE_PATTERNS = {
  playerConnected:
    "(?<username>\\w+)\\[\\/(?<ip>\\d{1,3}\\.\\d{1,3}\\.\\d{1,3}\\.\\d{1,3}:\\d+)\\] logged in with entity id \\d+ at \\(.*\\)",
  playerDisconnected: "(?<username>[A-Za-z0-9_]{1,16}) lost connection: (?<reason>.+)",
  playerChat: "\\]: <(?<username>[A-Za-z0-9_]{1,16})> (?<message>.*?)$",
};

export function defaultInstanceConfig(): InstanceConfig {
  return {
    launch: {
      command: "java",
      args: ["-Xms1G", "-Xmx2G", "-Djline.terminal=jline.UnsupportedTerminal"],
      artifact: "minecraft_*.jar",
      artifactFlag: "-jar",
      trailingArgs: ["nogui"],
    },
    console: { ...DEFAULT_CONSOLE_PATTERNS },
    restarts: {
      autoRestart: false,
      restartIntervalHours: 6,
      alertIntervals: [3600, 1800, 300, 30],
    },
    cleanExitCodes: [0, CTRL_C_EXIT_CODE],
    commandTimeoutMs: guardrails.DEFAULT_COMMAND_TIMEOUT_MS,
    stopTimeoutMs: guardrails.DEFAULT_STOP_TIMEOUT_MS,
    chatHistorySize: guardrails.DEFAULT_CHAT_HISTORY_SIZE,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Small typed reader over an untrusted JSON object; every failure names the offending key. */
class Fields {
  constructor(
    private readonly obj: Record<string, unknown>,
    private readonly prefix: string,
    private readonly file?: string,
  ) {}

  private fail(key: string, expected: string): never {
    throw new ConfigError(`${this.prefix}${key} must be ${expected}`, this.file);
  }

  section(key: string): Fields {
    const value = this.obj[key];
    if (value === undefined) return new Fields({}, `${this.prefix}${key}.`, this.file);
    if (!isRecord(value)) return this.fail(key, "an object");
    return new Fields(value, `${this.prefix}${key}.`, this.file);
  }

  string(key: string, fallback: string): string {
    const value = this.obj[key];
    if (value === undefined) return fallback;
    if (typeof value !== "string" || !value.trim()) return this.fail(key, "a non-empty string");
    return value;
  }

  optionalString(key: string, fallback: string | null): string | null {
    const value = this.obj[key];
    if (value === undefined) return fallback;
    if (value === null) return null;
    return this.string(key, "");
  }

  boolean(key: string, fallback: boolean): boolean {
    const value = this.obj[key];
    if (value === undefined) return fallback;
    if (typeof value !== "boolean") return this.fail(key, "a boolean");
    return value;
  }

  number(key: string, fallback: number, min: number, max: number, integer = false): number {
    const value = this.obj[key];
    if (value === undefined) return fallback;
    if (typeof value !== "number" || !Number.isFinite(value) || value < min || value > max) {
      return this.fail(key, `a number between ${min} and ${max}`);
    }
    if (integer && !Number.isInteger(value)) return this.fail(key, "an integer");
    return value;
  }

  strings(key: string, fallback: string[]): string[] {
    const value = this.obj[key];
    if (value === undefined) return fallback;
    if (!Array.isArray(value) || !value.every((v): v is string => typeof v === "string")) {
      return this.fail(key, "an array of strings");
    }
    return value;
  }

  integers(key: string, fallback: number[], min: number): number[] {
    const value = this.obj[key];
    if (value === undefined) return fallback;
    if (!Array.isArray(value) || !value.every((v): v is number => Number.isInteger(v) && v >= min)) {
      return this.fail(key, `an array of integers >= ${min}`);
    }
    return value;
  }

  array(key: string): unknown[] {
    const value = this.obj[key];
    if (value === undefined) return [];
    if (!Array.isArray(value)) return this.fail(key, "an array");
    return value;
  }
}

/** Validate a parsed instance config, filling every missing field from the defaults. */
export function parseInstanceConfig(raw: unknown, file?: string): InstanceConfig {
  if (!isRecord(raw)) throw new ConfigError("config root must be an object", file);
  const defaults = defaultInstanceConfig();
  const root = new Fields(raw, "", file);
  const launch = root.section("launch");
  const consoleFields = root.section("console");
  const restarts = root.section("restarts");

  return {
    launch: {
      command: launch.string("command", defaults.launch.command),
      args: launch.strings("args", defaults.launch.args),
      artifact: launch.optionalString("artifact", defaults.launch.artifact),
      artifactFlag: launch.optionalString("artifactFlag", defaults.launch.artifactFlag),
      trailingArgs: launch.strings("trailingArgs", defaults.launch.trailingArgs),
    },
    console: {
      playerConnected: consoleFields.string("playerConnected", defaults.console.playerConnected),
      playerDisconnected: consoleFields.string("playerDisconnected", defaults.console.playerDisconnected),
      playerChat: consoleFields.string("playerChat", defaults.console.playerChat),
    },
    restarts: {
      autoRestart: restarts.boolean("autoRestart", defaults.restarts.autoRestart),
      // setTimeout caps out just under 25 days
      restartIntervalHours: restarts.number("restartIntervalHours", defaults.restarts.restartIntervalHours, 0.01, 576),
      alertIntervals: restarts.integers("alertIntervals", defaults.restarts.alertIntervals, 1),
    },
    cleanExitCodes: root.integers("cleanExitCodes", defaults.cleanExitCodes, 0),
    commandTimeoutMs: root.number("commandTimeoutMs", defaults.commandTimeoutMs, 100, 300_000, true),
    stopTimeoutMs: root.number("stopTimeoutMs", defaults.stopTimeoutMs, 1_000, 600_000, true),
    chatHistorySize: root.number("chatHistorySize", defaults.chatHistorySize, 0, 10_000, true),
  };
}

async function readJson(file: string): Promise<unknown> {
  const text = await readFile(file, "utf-8");
  try {
    return JSON.parse(text);
  } catch (err: unknown) {
    throw new ConfigError(`invalid JSON: ${errorMessage(err)}`, file);
  }
}

/** Load `<directory>/console.json`; a missing file means all defaults. */
export async function loadInstanceConfig(directory: string): Promise<InstanceConfig> {
  const file = path.join(directory, INSTANCE_CONFIG_FILE);
  if (!existsSync(file)) {
    logger.warn(`[config] ${file} not found - using default instance config`);
    return defaultInstanceConfig();
  }
  return parseInstanceConfig(await readJson(file), file);
}

export function parseServiceConfig(raw: unknown, file?: string): ServiceConfig {
  if (!isRecord(raw)) throw new ConfigError("config root must be an object", file);
  const root = new Fields(raw, "", file);
  const servers: ServerEntry[] = root.array("servers").map((entry, i) => {
    if (!isRecord(entry)) throw new ConfigError(`servers[${i}] must be an object`, file);
    const fields = new Fields(entry, `servers[${i}].`, file);
    return {
      name: fields.string("name", ""),
      path: fields.string("path", ""),
      autostart: fields.boolean("autostart", false),
    };
  });

  const seen = new Set<string>();
  for (const server of servers) {
    if (!server.name || !server.path) {
      throw new ConfigError("every entry in servers needs a name and a path", file);
    }
    if (seen.has(server.name)) throw new ConfigError(`duplicate server name "${server.name}"`, file);
    seen.add(server.name);
  }

  return {
    host: root.string("host", "127.0.0.1"),
    port: root.number("port", 8080, 0, 65_535, true),
    servers,
  };
}

export async function loadServiceConfig(file: string): Promise<ServiceConfig> {
  if (!existsSync(file)) {
    logger.warn(`[config] ${file} not found - starting with no configured servers`);
    return parseServiceConfig({}, file);
  }
  return parseServiceConfig(await readJson(file), file);
}

/** Apply numeric guardrail overrides from the environment (e.g. COMMAND_TIMEOUT_MS=5000). */
export function applyEnvOverrides(env: NodeJS.ProcessEnv = process.env): void {
  const overrides: Array<[string, (v: number) => void]> = [
    ["COMMAND_TIMEOUT_MS", guardrails.setDefaultCommandTimeoutMs],
    ["STOP_TIMEOUT_MS", guardrails.setDefaultStopTimeoutMs],
    ["KILL_ESCALATION_MS", guardrails.setKillEscalationMs],
    ["OBSERVER_POLL_INTERVAL_MS", guardrails.setObserverPollIntervalMs],
  ];
  for (const [key, set] of overrides) {
    const raw = env[key];
    if (raw === undefined || raw === "") continue;
    const value = Number.parseInt(raw, 10);
    if (Number.isNaN(value) || value <= 0) {
      throw new ConfigError(`${key} must be a positive integer, got "${raw}"`);
    }
    set(value);
  }
}
