import { existsSync, statSync } from "node:fs";
import path from "node:path";
import { loadServiceConfig } from "./config";
import { logger } from "./logger";
import { ManagedProcess, type ManagedProcessOptions } from "./managed-process";
import type { OperationResult, ServiceConfig } from "./types";
import { errorMessage } from "./types";

export type StartOutcome =
  | { status: "started"; command: string[] }
  | { status: "unknown"; error: string }
  | { status: "conflict"; error: string }
  | { status: "failed"; error: string };

export type ProcessFactory = (opts: ManagedProcessOptions) => ManagedProcess;

/** Running instances keyed by name. Instances leave the registry once they stop for good. */
export class ServerManager {
  private instances = new Map<string, ManagedProcess>();

  constructor(
    private config: ServiceConfig,
    private readonly configFile: string | null = null,
    private readonly createProcess: ProcessFactory = (opts) => new ManagedProcess(opts),
  ) {}

  list(): ManagedProcess[] {
    return [...this.instances.values()];
  }

  get(name: string): ManagedProcess | undefined {
    return this.instances.get(name);
  }

  get serviceConfig(): ServiceConfig {
    return this.config;
  }

  /** Start `name`, taking its directory from `directory` or else from the service config. */
  async start(name: string, directory?: string): Promise<StartOutcome> {
    const serverPath = directory ?? this.config.servers.find((s) => s.name === name)?.path;
    if (!serverPath) {
      return {
        status: "unknown",
        error: `A server doesn't exist with the name '${name}' in the service config. Please specify a path to start the server`,
      };
    }
    if (this.instances.has(name)) {
      return { status: "conflict", error: `A server with the name "${name}" is already running!` };
    }

    const resolved = path.resolve(serverPath);
    if (!existsSync(resolved) || !statSync(resolved).isDirectory()) {
      return { status: "failed", error: `Server directory does not exist: ${resolved}` };
    }

    const proc = this.createProcess({
      name,
      directory: resolved,
      onExit: (exitedName, exitCode) => this.handleExit(exitedName, exitCode, proc),
    });
    // Registered before start() resolves so a second request for the same name gets a conflict
    this.instances.set(name, proc);

    const result = await proc.start();
    if (!result.ok) {
      this.instances.delete(name);
      return { status: "failed", error: result.error };
    }
    logger.info(`[servers] Started ${name}`, { server: name, directory: resolved });
    return { status: "started", command: result.command };
  }

  /** Returns null when no instance with that name is running. */
  async stop(name: string): Promise<OperationResult | null> {
    const proc = this.instances.get(name);
    if (!proc) return null;
    const result = await proc.stop();
    if (result.ok && this.instances.get(name) === proc) {
      this.instances.delete(name);
    }
    return result;
  }

  /** Start every server marked `autostart`, one after another. */
  async autostart(): Promise<void> {
    for (const server of this.config.servers) {
      if (!server.autostart) continue;
      logger.info(`[servers] Autostarting ${server.name}`, { server: server.name });
      const outcome = await this.start(server.name);
      if (outcome.status !== "started") {
        logger.error(`[servers] Failed to autostart ${server.name}: ${outcome.error}`, { server: server.name });
      }
    }
  }

  async stopAll(): Promise<void> {
    const names = [...this.instances.keys()];
    const results = await Promise.allSettled(names.map((name) => this.stop(name)));
    results.forEach((result, i) => {
      const name = names[i];
      const failed = result.status === "rejected" || (result.value !== null && !result.value.ok);
      if (!failed) return;
      const reason = result.status === "rejected" ? errorMessage(result.reason) : result.value?.message;
      logger.warn(`[servers] ${name} did not stop cleanly - killing it`, { server: name, reason });
      this.instances.get(name)?.dispose();
    });
  }

  /** Re-read the service config file. Running instances are left alone. */
  async reloadServiceConfig(): Promise<OperationResult> {
    if (!this.configFile) {
      return { ok: false, message: "No service config file is in use" };
    }
    try {
      this.config = await loadServiceConfig(this.configFile);
    } catch (err: unknown) {
      return { ok: false, message: errorMessage(err) };
    }
    logger.info(`[servers] Reloaded service config from ${this.configFile}`);
    return { ok: true, message: "Config file reloaded successfully" };
  }

  private handleExit(name: string, exitCode: number | null, proc: ManagedProcess): void {
    logger.info(`[servers] ${name} has stopped with exit code: ${exitCode}`, { server: name });
    if (this.instances.get(name) === proc) {
      this.instances.delete(name);
    }
  }
}
