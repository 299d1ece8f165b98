import { MAX_QUEUED_EVENTS } from "./guardrails";

export const CONSOLE_EVENT_TYPES = [
  "serverOutput",
  "serverInput",
  "serverRestarting",
  "serverStopped",
  "playerChat",
  "playerList",
  "userAttach",
  "userDetach",
] as const;

export type ConsoleEventType = (typeof CONSOLE_EVENT_TYPES)[number];

export interface ConsoleEventPayloads {
  serverOutput: { message: string };
  serverInput: { message: string; result: string };
  serverRestarting: { message: string };
  serverStopped: { message: string; exitCode: number | null };
  playerChat: { message: string; username: string };
  playerList: { players: string[] };
  userAttach: { message: string; username: string };
  userDetach: { message: string; username: string };
}

export interface ConsoleEvent<T extends ConsoleEventType = ConsoleEventType> {
  type: T;
  data: ConsoleEventPayloads[T] & { timestamp: string };
}

/** Build an event, stamping the payload with `timestamp` (now, unless one is given). */
export function createEvent<T extends ConsoleEventType>(
  type: T,
  data: ConsoleEventPayloads[T],
  timestamp = new Date().toISOString(),
): ConsoleEvent<T> {
  return { type, data: { ...data, timestamp } };
}

/** Server-sent events wire form: `event: <type>\ndata: <json>\n\n`. */
export function formatSSE(event: ConsoleEvent): string {
  return `event: ${event.type}\ndata: ${JSON.stringify(event.data)}\n\n`;
}

/**
 * Per-observer queues of lifecycle events. Delivery is at-most-once: events
 * are only queued for observers subscribed when they are published, and an
 * observer's undrained events are dropped when it unsubscribes.
 */
export class EventFanout {
  private queues = new Map<string, ConsoleEvent[]>();

  constructor(private readonly maxQueued = MAX_QUEUED_EVENTS) {}

  get subscriberCount(): number {
    return this.queues.size;
  }

  has(subscriberId: string): boolean {
    return this.queues.has(subscriberId);
  }

  /** Create (or reset) the subscriber's queue and announce it to everyone, itself included. */
  subscribe(subscriberId: string, label = subscriberId): void {
    this.queues.set(subscriberId, []);
    this.publish("userAttach", { message: `${label} attached to the console`, username: label });
  }

  unsubscribe(subscriberId: string, label = subscriberId): boolean {
    if (!this.queues.delete(subscriberId)) return false;
    this.publish("userDetach", { message: `${label} detached from the console`, username: label });
    return true;
  }

  publish<T extends ConsoleEventType>(type: T, data: ConsoleEventPayloads[T]): ConsoleEvent<T> {
    const event = createEvent(type, data);
    for (const queue of this.queues.values()) {
      queue.push(event);
      if (queue.length > this.maxQueued) {
        queue.splice(0, queue.length - this.maxQueued);
      }
    }
    return event;
  }

  /** Return and clear the subscriber's queue; unknown subscribers get an empty list. */
  drain(subscriberId: string): ConsoleEvent[] {
    const queue = this.queues.get(subscriberId);
    if (!queue || queue.length === 0) return [];
    this.queues.set(subscriberId, []);
    return queue;
  }
}
