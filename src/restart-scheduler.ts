import { type Logger, logger } from "./logger";
import type { PendingRestart } from "./types";
import { errorMessage } from "./types";

/** Largest delay setTimeout honours (~24.8 days); longer delays fire immediately. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export interface TimerHandle {
  cancel(): void;
}

/** Explicitly owned timer source, so callers can cancel what they schedule and tests can drive time. */
export interface TaskScheduler {
  schedule(delayMs: number, task: () => void): TimerHandle;
  now(): number;
}

export const timerScheduler: TaskScheduler = {
  schedule(delayMs, task) {
    const timer = setTimeout(task, delayMs);
    // Don't let a pending restart keep the process alive on its own
    timer.unref();
    return { cancel: () => clearTimeout(timer) };
  },
  now: () => Date.now(),
};

export interface RestartHandlers {
  /** Broadcast a warning that the restart is `offsetSeconds` away. */
  remind(offsetSeconds: number): void | Promise<void>;
  restart(): void | Promise<void>;
}

/**
 * Human readable form of a duration, e.g. 3661 -> "1 hour, 1 minute, 1 second".
 * Zero components are omitted, so 0 yields "".
 */
export function generateDuration(totalSeconds: number): string {
  const seconds = Math.max(0, Math.floor(totalSeconds));
  const parts: Array<[number, string]> = [
    [Math.floor(seconds / 3600), "hour"],
    [Math.floor((seconds % 3600) / 60), "minute"],
    [seconds % 60, "second"],
  ];
  return parts
    .filter(([value]) => value > 0)
    .map(([value, unit]) => `${value} ${unit}${value > 1 ? "s" : ""}`)
    .join(", ");
}

export function restartWarning(offsetSeconds: number): string {
  return `say WARNING: PLANNED SERVER RESTART IN ${generateDuration(offsetSeconds)}`;
}

/**
 * Holds at most one restart cycle: a restart timer plus its reminder timers.
 * Scheduling a new cycle cancels the previous one first, so a manual restart
 * pre-empting the policy restart never leaves stale timers behind.
 */
export class RestartScheduler {
  private timers: TimerHandle[] = [];
  private current: PendingRestart | null = null;

  constructor(
    private readonly handlers: RestartHandlers,
    private readonly clock: TaskScheduler = timerScheduler,
    private readonly log: Logger = logger,
  ) {}

  scheduleRestart(
    delaySeconds: number,
    reminderOffsets: number[],
    trigger: PendingRestart["trigger"] = "manual",
  ): PendingRestart {
    if (!Number.isFinite(delaySeconds) || delaySeconds <= 0) {
      throw new RangeError(`Restart delay must be greater than 0 seconds, got ${delaySeconds}`);
    }
    const delayMs = delaySeconds * 1000;
    if (delayMs > MAX_TIMER_DELAY_MS) {
      throw new RangeError(`Restart delay of ${delaySeconds}s exceeds the maximum timer delay`);
    }

    this.cancel();
    const now = this.clock.now();

    const reminders: PendingRestart["reminders"] = [];
    const offsets = [...new Set(reminderOffsets)].sort((a, b) => b - a);
    for (const offset of offsets) {
      if (!(offset > 0) || offset >= delaySeconds) continue;
      const reminderMs = (delaySeconds - offset) * 1000;
      this.timers.push(this.clock.schedule(reminderMs, () => this.run("reminder", () => this.handlers.remind(offset))));
      reminders.push({ offsetSeconds: offset, fireAt: new Date(now + reminderMs).toISOString() });
    }

    this.timers.push(
      this.clock.schedule(delayMs, () => {
        this.timers = [];
        this.current = null;
        this.run("restart", () => this.handlers.restart());
      }),
    );

    this.current = { trigger, fireAt: new Date(now + delayMs).toISOString(), reminders };
    return this.current;
  }

  /** Cancel the pending cycle. Returns false if nothing was scheduled. */
  cancel(): boolean {
    const hadPending = this.timers.length > 0;
    for (const timer of this.timers) {
      timer.cancel();
    }
    this.timers = [];
    this.current = null;
    return hadPending;
  }

  pending(): PendingRestart | null {
    return this.current;
  }

  private run(kind: "reminder" | "restart", task: () => void | Promise<void>): void {
    Promise.resolve()
      .then(task)
      .catch((err: unknown) => {
        this.log.error(`[restart] Scheduled ${kind} failed`, { error: errorMessage(err) });
      });
  }
}
