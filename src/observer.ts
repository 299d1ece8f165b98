import { type ConsoleEvent, type EventFanout, createEvent } from "./event-fanout";
import type { ScrollbackBuffer } from "./scrollback";

export interface ObservedInstance {
  readonly scrollback: ScrollbackBuffer;
  readonly events: EventFanout;
}

/**
 * One attached event-stream client. Each poll yields console output the
 * observer has not seen yet; only when there is none does it drain the
 * observer's lifecycle event queue.
 */
export class ConsoleObserver {
  /** Scrollback sequence already delivered. Starts at 0 so a new observer gets the buffered history. */
  private cursor = 0;
  private attached = false;

  constructor(
    private readonly instance: ObservedInstance,
    readonly id: string,
    readonly label: string = id,
  ) {}

  attach(): void {
    if (this.attached) return;
    this.attached = true;
    this.instance.events.subscribe(this.id, this.label);
  }

  detach(): void {
    if (!this.attached) return;
    this.attached = false;
    this.instance.events.unsubscribe(this.id, this.label);
  }

  poll(): ConsoleEvent[] {
    const { scrollback, events } = this.instance;
    const lines = scrollback.since(this.cursor);
    this.cursor = scrollback.total;
    if (lines.length > 0) {
      return lines.map((line) => createEvent("serverOutput", { message: line.text }, line.timestamp));
    }
    return events.drain(this.id);
  }
}
