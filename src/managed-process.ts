import { type ChildProcess, spawn } from "node:child_process";
import { defaultInstanceConfig, loadInstanceConfig } from "./config";
import { ConsoleChannel } from "./console-channel";
import { ArtifactNotFoundError, CommandTimeoutError } from "./errors";
import { EventFanout } from "./event-fanout";
import {
  CRASH_WINDOW_MS,
  DEFAULT_COMMAND_TIMEOUT_MS,
  KILL_ESCALATION_MS,
  MAX_CRASH_RESTARTS,
} from "./guardrails";
import { type LineClassifier, RegexLineClassifier } from "./line-classifier";
import { type Logger, serverLogger } from "./logger";
import { RestartScheduler, type TaskScheduler, generateDuration, restartWarning, timerScheduler } from "./restart-scheduler";
import { ScrollbackBuffer } from "./scrollback";
import type {
  ChatEntry,
  CommandOptions,
  CommandResult,
  ConsoleLine,
  ConsolePatterns,
  ExitHandler,
  ExitKind,
  InstanceConfig,
  LaunchConfig,
  OperationResult,
  ProcessState,
  ServerInfo,
  SpawnFn,
  StartResult,
} from "./types";
import { errorMessage } from "./types";
import { findMatchingFile } from "./utils/files";

export const NOT_STARTED_MESSAGE = "Server protocol is not present... has the server been started?";

export interface ManagedProcessOptions {
  name: string;
  directory: string;
  /** Told once the instance has stopped for good. */
  onExit?: ExitHandler;
  loadConfig?: (directory: string) => Promise<InstanceConfig>;
  spawn?: SpawnFn;
  clock?: TaskScheduler;
  createClassifier?: (patterns: ConsolePatterns) => LineClassifier;
  scrollbackCapacity?: number;
}

/** Build `[command, ...args]` for a launch config, resolving the artifact wildcard inside `directory`. */
export async function buildLaunchCommand(
  launch: LaunchConfig,
  directory: string,
): Promise<{ command: string; args: string[] }> {
  const args = [...launch.args];
  if (launch.artifact) {
    const artifactPath = await findMatchingFile(directory, launch.artifact);
    if (!artifactPath) throw new ArtifactNotFoundError(launch.artifact, directory);
    if (launch.artifactFlag) args.push(launch.artifactFlag);
    args.push(artifactPath);
  }
  args.push(...launch.trailingArgs);
  return { command: launch.command, args };
}

/**
 * Supervises one console subprocess: launches it, correlates commands with
 * the output line that answers them, tracks players and chat from console
 * output, restarts it after a crash or on a schedule, and tells its owner
 * when it has stopped for good.
 */
export class ManagedProcess {
  readonly name: string;
  readonly directory: string;
  readonly scrollback: ScrollbackBuffer;
  readonly events = new EventFanout();

  private _state: ProcessState = "stopped";
  private config: InstanceConfig | null = null;
  private classifier: LineClassifier | null = null;
  private channel: ConsoleChannel | null = null;
  private child: ChildProcess | null = null;
  private startedAt: string | null = null;
  private lastExitCode: number | null = null;
  private players = new Set<string>();
  private chat: ChatEntry[] = [];
  /** Set while restart() runs; suppresses crash handling and the exit notification. */
  private restarting = false;
  /** The start or restart in flight, so stop() can wait for it rather than miss it. */
  private launching: Promise<StartResult> | null = null;
  /** Set by stop() while a launch is in flight; the launch gives up before spawning. */
  private launchCancelled = false;
  /** Clock readings of recent crashes, for the crash-loop limit. */
  private crashTimes: number[] = [];
  /** Set when we asked the server to stop, so its exit is never treated as a crash. */
  private stopRequested = false;
  /** Commands run one at a time: console output has no request ids to tell responses apart. */
  private commandQueue: Promise<unknown> = Promise.resolve();
  private exitWaiters = new Set<() => void>();

  private readonly onExit?: ExitHandler;
  private readonly loadConfig: (directory: string) => Promise<InstanceConfig>;
  private readonly spawnFn: SpawnFn;
  private readonly clock: TaskScheduler;
  private readonly createClassifier: (patterns: ConsolePatterns) => LineClassifier;
  private readonly scheduler: RestartScheduler;
  private readonly log: Logger;

  constructor(opts: ManagedProcessOptions) {
    this.name = opts.name;
    this.directory = opts.directory;
    this.onExit = opts.onExit;
    this.loadConfig = opts.loadConfig ?? loadInstanceConfig;
    this.spawnFn = opts.spawn ?? spawn;
    this.clock = opts.clock ?? timerScheduler;
    this.createClassifier = opts.createClassifier ?? ((patterns) => new RegexLineClassifier(patterns));
    this.scrollback = new ScrollbackBuffer(opts.scrollbackCapacity);
    this.log = serverLogger(opts.name);
    this.scheduler = new RestartScheduler(
      {
        remind: async (offsetSeconds) => {
          await this.serverInput(restartWarning(offsetSeconds));
        },
        restart: async () => {
          const result = await this.restart();
          if (!result.ok) this.log.error("[process] Scheduled restart failed", { error: result.error });
        },
      },
      this.clock,
      this.log,
    );
  }

  get state(): ProcessState {
    return this._state;
  }

  get connectedPlayers(): string[] {
    return [...this.players];
  }

  get chatHistory(): ChatEntry[] {
    return this.chat.slice();
  }

  get pid(): number | null {
    return this.child?.pid ?? null;
  }

  info(): ServerInfo {
    return {
      name: this.name,
      directory: this.directory,
      state: this._state,
      pid: this.pid,
      startedAt: this.startedAt,
      players: this.connectedPlayers,
      pendingRestart: this.scheduler.pending(),
    };
  }

  /** Launch the server. Never throws: failures come back as `{ ok: false, error }`. */
  async start(): Promise<StartResult> {
    if (this.launching) {
      return { ok: false, error: `${this.name} is already ${this.restarting ? "restarting" : "starting"}` };
    }
    return this.track(this.launch());
  }

  private async launch(): Promise<StartResult> {
    if (this._state === "running" || this._state === "starting") {
      return { ok: false, error: `${this.name} is already ${this._state}` };
    }
    this._state = "starting";

    let config: InstanceConfig;
    let launch: { command: string; args: string[] };
    try {
      config = await this.applyConfig();
      launch = await buildLaunchCommand(config.launch, this.directory);
    } catch (err: unknown) {
      this._state = "stopped";
      this.log.error("[process] Failed to build the launch command", { error: errorMessage(err) });
      return { ok: false, error: errorMessage(err) };
    }
    if (this.launchCancelled) {
      this._state = "stopped";
      this.log.info("[process] Stop requested before the server came up - not launching it");
      return { ok: false, error: `${this.name} was stopped before it started` };
    }

    this.players.clear();
    this.chat = [];

    const commandLine = [launch.command, ...launch.args];
    const channel = new ConsoleChannel(this.scrollback, this.log);
    let child: ChildProcess;
    try {
      child = this.spawnFn(launch.command, launch.args, {
        cwd: this.directory,
        stdio: ["pipe", "pipe", "pipe"],
      });
      // Must be attached before connect(): a failed spawn reports ENOENT through this event
      child.on("error", (err: Error) => {
        this.log.error("[process] Server process error", { error: err.message });
      });
      channel.connect(child);
    } catch (err: unknown) {
      this._state = "stopped";
      this.log.error("[process] Failed to spawn the server process", { error: errorMessage(err) });
      return { ok: false, error: errorMessage(err) };
    }

    channel.registerConsumer({ kind: "streaming", handler: (line) => this.inspectLine(line) });
    child.on("close", (code: number | null) => {
      if (this.child !== child) return;
      this.procClosed(code).catch((err: unknown) => {
        this.log.error("[process] Exit handling failed", { error: errorMessage(err) });
      });
    });

    this.channel = channel;
    this.child = child;
    this.stopRequested = false;
    this.startedAt = new Date().toISOString();
    this._state = "running";
    this.log.info(`[process] Started server with command: ${commandLine.join(" ")}`, { pid: child.pid });

    if (config.restarts.autoRestart) {
      this.schedulePolicyRestart(config);
    }
    return { ok: true, command: commandLine };
  }

  /**
   * Write a command to the console and resolve with the next line of output.
   * `success` is false when that line reports an unknown command, when the
   * server is not running, or when no line arrives in time.
   */
  serverInput(command: string, options: CommandOptions = {}): Promise<CommandResult> {
    if (!this.channel) {
      return Promise.resolve({ success: false, line: NOT_STARTED_MESSAGE });
    }
    const run = this.commandQueue.then(() => this.sendCommand(command, options));
    this.commandQueue = run;
    return run;
  }

  /**
   * Stop the running server, then start it again. A stopped server is simply
   * started. If the instance does not come back up its owner is told it stopped.
   */
  async restart(): Promise<StartResult> {
    if (this.restarting) {
      return { ok: false, error: `${this.name} is already restarting` };
    }
    if (this.launching) {
      return { ok: false, error: `${this.name} is already starting` };
    }
    this.events.publish("serverRestarting", { message: `${this.name} is being restarted.` });
    this.restarting = true;
    let result: StartResult;
    try {
      result = await this.track(this.cycle());
    } finally {
      this.restarting = false;
    }
    if (!result.ok && this._state !== "running") {
      this.notifyStopped(this.lastExitCode);
    }
    return result;
  }

  /** Ask the server to stop; kill it if it has not exited within its stop timeout. */
  async stop(): Promise<OperationResult> {
    this.scheduler.cancel();
    if (this.launching) {
      this.launchCancelled = true;
      await this.launching;
      if (this._state !== "running") {
        return { ok: true, message: `Server with name '${this.name}' stopped successfully` };
      }
    }
    if (this._state !== "running") {
      return { ok: true, message: `Server with name '${this.name}' is already stopped` };
    }
    const stopped = await this.shutdown();
    return stopped
      ? { ok: true, message: `Server with name '${this.name}' stopped successfully` }
      : { ok: false, message: `Server with name '${this.name}' failed to stop within the timeout period` };
  }

  /** Warn players now, then restart after `delaySeconds` with reminders at the configured alert intervals. */
  async scheduleRestart(delaySeconds: number): Promise<OperationResult> {
    if (!Number.isFinite(delaySeconds) || delaySeconds <= 0) {
      return { ok: false, message: "Invalid time delta. Time delta must be greater than 0 seconds." };
    }
    const alertIntervals = (this.config ?? defaultInstanceConfig()).restarts.alertIntervals;
    try {
      this.scheduler.scheduleRestart(delaySeconds, alertIntervals, "manual");
    } catch (err: unknown) {
      return { ok: false, message: errorMessage(err) };
    }
    await this.serverInput(restartWarning(delaySeconds));

    const message = `Scheduled ${this.name} for a restart in ${generateDuration(delaySeconds)}`;
    this.log.info(`[process] ${message}`);
    return { ok: true, message };
  }

  cancelScheduledRestart(): boolean {
    const cancelled = this.scheduler.cancel();
    if (cancelled) this.log.info("[process] Pending restart cancelled");
    return cancelled;
  }

  /** Re-read console.json and rebuild the line classifier. Launch settings apply on the next start. */
  async reloadConfig(): Promise<OperationResult> {
    try {
      await this.applyConfig();
    } catch (err: unknown) {
      return { ok: false, message: errorMessage(err) };
    }
    return { ok: true, message: `Config file reloaded successfully for server '${this.name}'` };
  }

  /**
   * Handle the subprocess exiting. Exit codes outside `cleanExitCodes` are a
   * crash and trigger one restart, unless we asked for the stop ourselves.
   * More than MAX_CRASH_RESTARTS crashes within CRASH_WINDOW_MS leave the
   * instance stopped.
   */
  async procClosed(exitCode: number | null): Promise<void> {
    const planned = this.stopRequested || this.restarting;
    this.stopRequested = false;
    this.lastExitCode = exitCode;
    this.child = null;
    this.channel = null;
    this.startedAt = null;
    this.players.clear();

    const cleanCodes = (this.config ?? defaultInstanceConfig()).cleanExitCodes;
    const kind: ExitKind = exitCode !== null && cleanCodes.includes(exitCode) ? "clean-exit" : "unexpected-exit";
    this.log.info(`[process] Server process closed with exit code: ${exitCode}`, { kind });

    if (kind === "unexpected-exit" && !planned) {
      if (!this.recordCrash()) {
        this.log.error(
          `[process] Server crashed more than ${MAX_CRASH_RESTARTS} times in ${CRASH_WINDOW_MS / 60_000} minutes - not restarting it`,
        );
        this._state = "stopped";
        this.resolveExitWaiters();
        this.notifyStopped(exitCode);
        return;
      }
      this._state = "crashed";
      this.resolveExitWaiters();
      this.log.warn("[process] Server exited with an unexpected exit code. It may have crashed, restarting...");
      await this.restart();
      return;
    }

    this._state = this.restarting ? "restarting" : "stopped";
    this.resolveExitWaiters();
    if (!this.restarting) this.notifyStopped(exitCode);
  }

  /** Cancel timers and kill the child without waiting. Used on service shutdown. */
  dispose(): void {
    this.scheduler.cancel();
    this.stopRequested = true;
    this.kill();
  }

  /** Publish the final stop and hand the instance back to its owner. */
  private notifyStopped(exitCode: number | null): void {
    this.scheduler.cancel();
    this.events.publish("serverStopped", {
      message: `${this.name} has stopped with exit code: ${exitCode}`,
      exitCode,
    });
    this.onExit?.(this.name, exitCode);
  }

  /** Record a crash; false once there have been too many to keep restarting. */
  private recordCrash(): boolean {
    const now = this.clock.now();
    this.crashTimes = this.crashTimes.filter((at) => now - at < CRASH_WINDOW_MS);
    this.crashTimes.push(now);
    return this.crashTimes.length <= MAX_CRASH_RESTARTS;
  }

  private async track(run: Promise<StartResult>): Promise<StartResult> {
    this.launching = run;
    try {
      return await run;
    } finally {
      this.launching = null;
      this.launchCancelled = false;
    }
  }

  private async cycle(): Promise<StartResult> {
    if (this._state !== "running") {
      this.log.info("[process] Server is not currently running - starting it instead");
      return this.launch();
    }
    this.log.info("[process] Restarting the server...");
    await this.shutdown();
    this.log.info("[process] Server stopped. Starting the server again...");
    const result = await this.launch();
    if (result.ok) this.log.info("[process] Server restarted successfully");
    return result;
  }

  private async applyConfig(): Promise<InstanceConfig> {
    const config = await this.loadConfig(this.directory);
    // Build the classifier before committing, so a bad pattern leaves the old config in place
    const classifier = this.createClassifier(config.console);
    this.config = config;
    this.classifier = classifier;
    return config;
  }

  private schedulePolicyRestart(config: InstanceConfig): void {
    const { restartIntervalHours, alertIntervals } = config.restarts;
    try {
      this.scheduler.scheduleRestart(restartIntervalHours * 3600, alertIntervals, "policy");
      this.log.info(`[process] Automatic server restarts enabled. Restart interval: ${restartIntervalHours} hours`);
    } catch (err: unknown) {
      this.log.error("[process] Could not schedule the automatic restart", { error: errorMessage(err) });
    }
  }

  private async sendCommand(command: string, options: CommandOptions): Promise<CommandResult> {
    const channel = this.channel;
    if (!channel) return { success: false, line: NOT_STARTED_MESSAGE };

    const cancelled = `Command "${command}" was cancelled by the caller`;
    const callerSignal = options.signal;
    // The caller left while this command sat in the queue: never send it
    if (callerSignal?.aborted) {
      this.log.info("[process] Dropping a command whose caller has gone", { command });
      return { success: false, line: cancelled };
    }

    const timeoutMs = options.timeoutMs ?? this.config?.commandTimeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
    const controller = new AbortController();
    const timer = this.clock.schedule(timeoutMs, () => controller.abort(new CommandTimeoutError(command, timeoutMs)));
    const onCallerAbort = () => controller.abort(new Error(cancelled));
    callerSignal?.addEventListener("abort", onCallerAbort, { once: true });

    let written = false;
    try {
      this.log.info(`[process] Sending input to server stdin: ${command}`);
      // write() and nextLine() run in the same tick, so no output can slip in between them
      channel.write(command);
      written = true;
      const line = await channel.nextLine(controller.signal);
      this.events.publish("serverInput", { message: command, result: line.text });
      return { success: !line.text.toLowerCase().includes("unknown command"), line: line.text };
    } catch (err: unknown) {
      // The answer may still arrive; it must not be taken as the next command's response
      if (written && controller.signal.aborted) channel.discardNextResponse();
      this.log.warn("[process] Command failed", { command, error: errorMessage(err) });
      return { success: false, line: errorMessage(err) };
    } finally {
      timer.cancel();
      callerSignal?.removeEventListener("abort", onCallerAbort);
    }
  }

  private inspectLine(line: ConsoleLine): void {
    this.log.debug(line.text);
    if (!this.classifier) return;

    const result = this.classifier.classify(line.text);
    switch (result.kind) {
      case "chat": {
        this.chat.push({ username: result.username, message: result.message, timestamp: line.timestamp });
        const limit = this.config?.chatHistorySize ?? 0;
        if (this.chat.length > limit) this.chat.splice(0, this.chat.length - limit);
        this.events.publish("playerChat", { message: result.message, username: result.username });
        break;
      }
      case "connect":
        this.log.info(`[players] Player connected: ${result.username}`, { address: result.address });
        this.players.add(result.username);
        this.events.publish("playerList", { players: this.connectedPlayers });
        break;
      case "disconnect":
        this.log.info(`[players] ${result.username} lost connection`, { reason: result.reason });
        this.players.delete(result.username);
        this.events.publish("playerList", { players: this.connectedPlayers });
        break;
      case "unmatched":
        break;
    }
  }

  /** Send "stop" and wait for the exit, killing the child if it overruns the stop timeout. */
  private async shutdown(): Promise<boolean> {
    const timeoutMs = (this.config ?? defaultInstanceConfig()).stopTimeoutMs;
    const exited = this.waitForExit(timeoutMs);
    this.stopRequested = true;
    await this.serverInput("stop");
    if (await exited) return true;

    this.log.warn(`[process] Server did not stop within ${timeoutMs}ms - killing it`);
    this.kill();
    return this.waitForExit(KILL_ESCALATION_MS * 2);
  }

  private waitForExit(timeoutMs: number): Promise<boolean> {
    if (this._state !== "running") return Promise.resolve(true);
    return new Promise<boolean>((resolve) => {
      const waiter = () => {
        timer.cancel();
        resolve(true);
      };
      const timer = this.clock.schedule(timeoutMs, () => {
        this.exitWaiters.delete(waiter);
        resolve(false);
      });
      this.exitWaiters.add(waiter);
    });
  }

  private resolveExitWaiters(): void {
    const waiters = [...this.exitWaiters];
    this.exitWaiters.clear();
    for (const waiter of waiters) {
      waiter();
    }
  }

  /** SIGTERM, escalating to SIGKILL if the child is still alive after KILL_ESCALATION_MS. */
  private kill(): void {
    const child = this.child;
    if (!child || child.exitCode !== null || child.signalCode !== null) return;
    child.kill("SIGTERM");
    const escalation = this.clock.schedule(KILL_ESCALATION_MS, () => {
      if (child.exitCode === null && child.signalCode === null) {
        child.kill("SIGKILL");
      }
    });
    child.once("close", () => escalation.cancel());
  }
}
