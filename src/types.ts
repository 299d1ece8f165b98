import type { ChildProcess, SpawnOptions } from "node:child_process";

export type ProcessState = "stopped" | "starting" | "running" | "restarting" | "crashed";

/** A single console line with the ISO-8601 time it was read. */
export interface ConsoleLine {
  text: string;
  timestamp: string;
}

export type ConsoleStream = "stdout" | "stderr";

export type StreamingHandler = (line: ConsoleLine) => void | Promise<void>;

export interface ResponseSlot {
  resolve: (line: ConsoleLine) => void;
  reject: (err: Error) => void;
}

export type ConsumerRegistration =
  | { kind: "streaming"; handler: StreamingHandler }
  | { kind: "oneShot"; slot: ResponseSlot };

export interface CommandResult {
  success: boolean;
  line: string;
}

export interface CommandOptions {
  timeoutMs?: number;
  /** Aborting the signal gives up on the response and frees the one-shot slot. */
  signal?: AbortSignal;
}

export type StartResult = { ok: true; command: string[] } | { ok: false; error: string };

export interface OperationResult {
  ok: boolean;
  message: string;
}

export type ExitKind = "clean-exit" | "unexpected-exit";

/** Called once an instance has stopped for good (not restarting, not running). */
export type ExitHandler = (name: string, exitCode: number | null) => void;

export type SpawnFn = (command: string, args: string[], options: SpawnOptions) => ChildProcess;

export interface ChatEntry {
  username: string;
  message: string;
  timestamp: string;
}

export interface LaunchConfig {
  /** Executable to run, e.g. "java". */
  command: string;
  /** Arguments placed before the artifact flag. */
  args: string[];
  /** Wildcard pattern (relative to the server directory) of the artifact to launch. */
  artifact: string | null;
  artifactFlag: string | null;
  /** Arguments placed after the artifact path. */
  trailingArgs: string[];
}

export interface ConsolePatterns {
  playerConnected: string;
  playerDisconnected: string;
  playerChat: string;
}

export interface RestartPolicy {
  autoRestart: boolean;
  restartIntervalHours: number;
  /** Seconds before a restart at which a warning is broadcast. */
  alertIntervals: number[];
}

export interface InstanceConfig {
  launch: LaunchConfig;
  console: ConsolePatterns;
  restarts: RestartPolicy;
  cleanExitCodes: number[];
  commandTimeoutMs: number;
  stopTimeoutMs: number;
  chatHistorySize: number;
}

export interface ServerEntry {
  name: string;
  path: string;
  autostart: boolean;
}

export interface ServiceConfig {
  host: string;
  port: number;
  servers: ServerEntry[];
}

export interface PendingRestart {
  trigger: "manual" | "policy";
  fireAt: string;
  reminders: Array<{ offsetSeconds: number; fireAt: string }>;
}

export interface ServerInfo {
  name: string;
  directory: string;
  state: ProcessState;
  pid: number | null;
  startedAt: string | null;
  players: string[];
  pendingRestart: PendingRestart | null;
}

/** Safely extract an error message from an unknown catch value */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
