import type { Response } from "express";

const HEARTBEAT_INTERVAL_MS = 15_000;

export interface StreamWriter {
  readonly closed: boolean;
  /** Write a chunk; a failed write closes the stream. */
  write(chunk: string): void;
  /** Finish the response from our side. */
  end(): void;
}

export interface StreamOptions {
  contentType: string;
  /** Comment line sent every 15s so proxies keep the connection open. */
  heartbeat?: string;
  onClose: () => void;
}

/** Hold an HTTP response open as a long-lived stream and run `onClose` exactly once when it ends. */
export function openStream(res: Response, opts: StreamOptions): StreamWriter {
  res.setHeader("Content-Type", opts.contentType);
  res.setHeader("Cache-Control", "no-cache");
  res.setHeader("Connection", "keep-alive");
  res.setHeader("X-Accel-Buffering", "no");
  res.flushHeaders();

  let closed = false;
  let heartbeat: ReturnType<typeof setInterval> | null = null;

  const cleanup = () => {
    if (closed) return;
    closed = true;
    if (heartbeat) clearInterval(heartbeat);
    opts.onClose();
  };

  const write = (chunk: string) => {
    if (closed) return;
    // Detect connections destroyed by the proxy/client without a 'close' event
    if (res.destroyed || res.writableEnded) {
      cleanup();
      return;
    }
    try {
      res.write(chunk);
    } catch {
      cleanup();
    }
  };

  const { heartbeat: heartbeatChunk } = opts;
  if (heartbeatChunk) {
    heartbeat = setInterval(() => write(heartbeatChunk), HEARTBEAT_INTERVAL_MS);
  }

  res.on("close", cleanup);

  return {
    get closed() {
      return closed;
    },
    write,
    end: () => {
      if (closed) return;
      cleanup();
      res.end();
    },
  };
}
