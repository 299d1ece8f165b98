import type { ChildProcess } from "node:child_process";
import type { Writable } from "node:stream";
import { StringDecoder } from "node:string_decoder";
import { ChannelClosedError, ChannelUnavailableError } from "./errors";
import { MAX_PARTIAL_LINE_LENGTH } from "./guardrails";
import { type Logger, logger } from "./logger";
import type { ScrollbackBuffer } from "./scrollback";
import type {
  ConsoleLine,
  ConsoleStream,
  ConsumerRegistration,
  ResponseSlot,
  StreamingHandler,
} from "./types";
import { errorMessage } from "./types";

interface PendingResponse {
  id: number;
  slot: ResponseSlot;
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error("Wait for console response was aborted");
}

/**
 * Bridges a child process's pipes to line consumers.
 *
 * Every decoded line is appended to the scrollback, then handed to each
 * streaming consumer as its own microtask, then to the oldest pending one-shot
 * consumer (FIFO). Console output carries no request id, so registration order
 * is the only correlation a one-shot gets.
 */
export class ConsoleChannel {
  private streaming = new Map<number, StreamingHandler>();
  private pending: PendingResponse[] = [];
  private nextId = 1;
  private stdin: Writable | null = null;
  private closed = false;
  private decoders: Record<ConsoleStream, StringDecoder> = {
    stdout: new StringDecoder("utf8"),
    stderr: new StringDecoder("utf8"),
  };
  private partial: Record<ConsoleStream, string> = { stdout: "", stderr: "" };

  constructor(
    private readonly scrollback: ScrollbackBuffer,
    private readonly log: Logger = logger,
  ) {}

  get isConnected(): boolean {
    return this.stdin !== null && !this.closed;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Number of one-shot consumers still waiting for a line. */
  get pendingResponses(): number {
    return this.pending.length;
  }

  get streamingConsumers(): number {
    return this.streaming.size;
  }

  connect(child: ChildProcess): void {
    if (this.stdin) throw new Error("Console channel is already connected");
    // A failed spawn leaves pid undefined; its "error" event arrives on the next tick
    if (child.pid === undefined || !child.stdin || !child.stdout || !child.stderr) {
      throw new ChannelUnavailableError("Server process failed to spawn - console pipes are unavailable");
    }

    this.stdin = child.stdin;
    child.stdout.on("data", (chunk: Buffer) => this.onData("stdout", chunk));
    child.stderr.on("data", (chunk: Buffer) => this.onData("stderr", chunk));
    child.stdin.on("error", (err: Error) => {
      this.log.warn("[console] stdin error", { error: err.message });
    });
    // "close" fires after both output pipes have ended, so no data is lost by closing here
    child.on("close", () => this.close());
  }

  /** Decode a raw chunk and dispatch every complete line in it. */
  onData(stream: ConsoleStream, chunk: Buffer | string): void {
    if (this.closed) return;
    const text = typeof chunk === "string" ? chunk : this.decoders[stream].write(chunk);
    const pieces = (this.partial[stream] + text).split("\n");
    let rest = pieces.pop() ?? "";
    if (rest.length > MAX_PARTIAL_LINE_LENGTH) {
      pieces.push(rest);
      rest = "";
    }
    this.partial[stream] = rest;
    for (const piece of pieces) {
      this.emitLine(piece);
    }
  }

  write(command: string): void {
    if (!this.stdin) throw new ChannelUnavailableError();
    if (this.closed || this.stdin.destroyed || !this.stdin.writable) throw new ChannelClosedError();
    this.stdin.write(`${command}\n`, "utf8");
  }

  registerConsumer(registration: ConsumerRegistration): number {
    const id = this.nextId++;
    if (registration.kind === "streaming") {
      this.streaming.set(id, registration.handler);
      return id;
    }
    if (this.closed) {
      registration.slot.reject(new ChannelClosedError());
      return id;
    }
    this.pending.push({ id, slot: registration.slot });
    return id;
  }

  unregisterConsumer(id: number): boolean {
    if (this.streaming.delete(id)) return true;
    const index = this.pending.findIndex((p) => p.id === id);
    if (index === -1) return false;
    this.pending.splice(index, 1);
    return true;
  }

  /** Register a one-shot consumer and resolve with the next line it receives. */
  nextLine(signal?: AbortSignal): Promise<ConsoleLine> {
    return new Promise<ConsoleLine>((resolve, reject) => {
      if (signal?.aborted) {
        reject(abortReason(signal));
        return;
      }
      const onAbort = () => {
        this.unregisterConsumer(id);
        if (signal) reject(abortReason(signal));
      };
      const id = this.registerConsumer({
        kind: "oneShot",
        slot: {
          resolve: (line) => {
            signal?.removeEventListener("abort", onAbort);
            resolve(line);
          },
          reject: (err) => {
            signal?.removeEventListener("abort", onAbort);
            reject(err);
          },
        },
      });
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  /**
   * Queue a one-shot that swallows the next response line. Used when a
   * command was written but its caller stopped waiting, so the late answer
   * cannot be taken as the response to the command after it.
   */
  discardNextResponse(): void {
    if (this.closed) return;
    this.registerConsumer({
      kind: "oneShot",
      slot: {
        resolve: (line) => this.log.debug("[console] Discarded late response", { line: line.text }),
        reject: () => undefined,
      },
    });
  }

  /** Flush partial lines, then fail every waiting one-shot. Idempotent. */
  close(): void {
    if (this.closed) return;
    for (const stream of ["stdout", "stderr"] as const) {
      const rest = this.partial[stream] + this.decoders[stream].end();
      this.partial[stream] = "";
      for (const piece of rest.split("\n")) {
        this.emitLine(piece);
      }
    }
    this.closed = true;

    const waiting = this.pending;
    this.pending = [];
    for (const { slot } of waiting) {
      slot.reject(new ChannelClosedError("Server console closed before responding"));
    }
    this.streaming.clear();
  }

  private emitLine(raw: string): void {
    const text = raw.trimEnd();
    if (!text) return;
    this.dispatch({ text, timestamp: new Date().toISOString() });
  }

  private dispatch(line: ConsoleLine): void {
    this.scrollback.append(line);

    for (const handler of this.streaming.values()) {
      Promise.resolve()
        .then(() => handler(line))
        .catch((err: unknown) => {
          this.log.warn("[console] Consumer error", { error: errorMessage(err) });
        });
    }

    const next = this.pending.shift();
    if (next) next.slot.resolve(line);
  }
}
