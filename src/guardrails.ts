export const SCROLLBACK_CAPACITY = 1_000;

/** Per-observer event queue cap; the oldest events are dropped past this. */
export const MAX_QUEUED_EVENTS = 1_000;

export const DEFAULT_CHAT_HISTORY_SIZE = 100;

export const MAX_COMMAND_LENGTH = 1_000;

// Partial-line buffer cap per pipe (1 MB); a longer run without a newline is emitted as-is.
export const MAX_PARTIAL_LINE_LENGTH = 1_048_576;

/** Crash restarts allowed within CRASH_WINDOW_MS before the instance is left stopped. */
export const MAX_CRASH_RESTARTS = 3;
export const CRASH_WINDOW_MS = 10 * 60_000;

export let DEFAULT_COMMAND_TIMEOUT_MS = 10_000;
export let DEFAULT_STOP_TIMEOUT_MS = 30_000;
export let KILL_ESCALATION_MS = 5_000;

/** How often an event-stream observer polls scrollback and its event queue. */
export let OBSERVER_POLL_INTERVAL_MS = 250;

// Setters: ES module namespace objects are read-only, so external modules
// must call these instead of assigning to the exports directly.
export function setDefaultCommandTimeoutMs(v: number) {
  DEFAULT_COMMAND_TIMEOUT_MS = v;
}
export function setDefaultStopTimeoutMs(v: number) {
  DEFAULT_STOP_TIMEOUT_MS = v;
}
export function setKillEscalationMs(v: number) {
  KILL_ESCALATION_MS = v;
}
export function setObserverPollIntervalMs(v: number) {
  OBSERVER_POLL_INTERVAL_MS = v;
}
