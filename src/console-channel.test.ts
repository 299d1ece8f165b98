import { describe, expect, it, vi } from "vitest";
import { createFakeChild, flushMicrotasks } from "./__tests__/fakes";
import { ConsoleChannel } from "./console-channel";
import { ChannelClosedError, ChannelUnavailableError } from "./errors";
import type { Logger } from "./logger";
import { ScrollbackBuffer } from "./scrollback";
import type { ConsoleLine } from "./types";

function quietLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function setup() {
  const scrollback = new ScrollbackBuffer(50);
  const log = quietLogger();
  const channel = new ConsoleChannel(scrollback, log);
  const fake = createFakeChild();
  channel.connect(fake.child);
  const texts = () => scrollback.toArray().map((l) => l.text);
  return { scrollback, channel, fake, log, texts };
}

describe("ConsoleChannel", () => {
  describe("line splitting", () => {
    it("joins chunks that split a line", () => {
      const { fake, texts } = setup();
      fake.stdout("hel");
      fake.stdout("lo\nwor");
      expect(texts()).toEqual(["hello"]);
      fake.stdout("ld\n");
      expect(texts()).toEqual(["hello", "world"]);
    });

    it("strips trailing whitespace and skips blank lines", () => {
      const { fake, texts } = setup();
      fake.stdout("first\r\n\n   \nsecond  \n");
      expect(texts()).toEqual(["first", "second"]);
    });

    it("reads stderr into the same scrollback", () => {
      const { fake, texts } = setup();
      fake.stdout("out\n");
      fake.stderr("err\n");
      expect(texts()).toEqual(["out", "err"]);
    });

    it("decodes multi-byte characters split across chunks", () => {
      const { fake, texts } = setup();
      const bytes = Buffer.from("café\n", "utf8");
      fake.child.stdout?.emit("data", bytes.subarray(0, 4));
      fake.child.stdout?.emit("data", bytes.subarray(4));
      expect(texts()).toEqual(["café"]);
    });

    it("flushes a trailing partial line when the process closes", () => {
      const { fake, texts } = setup();
      fake.stdout("Saving chunks");
      fake.exit(0);
      expect(texts()).toEqual(["Saving chunks"]);
    });
  });

  describe("one-shot consumers", () => {
    it("receives exactly the next line and is then removed", async () => {
      const { channel, fake } = setup();
      const response = channel.nextLine();
      expect(channel.pendingResponses).toBe(1);
      fake.stdout("Unknown command\nanother line\n");
      await expect(response).resolves.toMatchObject({ text: "Unknown command" });
      expect(channel.pendingResponses).toBe(0);
    });

    it("resolves waiting consumers in registration order", async () => {
      const { channel, fake } = setup();
      const first = channel.nextLine();
      const second = channel.nextLine();
      fake.stdout("one\ntwo\n");
      await expect(first).resolves.toMatchObject({ text: "one" });
      await expect(second).resolves.toMatchObject({ text: "two" });
    });

    it("is rejected with ChannelClosedError when the process exits first", async () => {
      const { channel, fake } = setup();
      const response = channel.nextLine();
      fake.exit(1);
      await expect(response).rejects.toBeInstanceOf(ChannelClosedError);
      expect(channel.isClosed).toBe(true);
    });

    it("gets the flushed partial line before the rest are rejected", async () => {
      const { channel, fake } = setup();
      const first = channel.nextLine();
      const second = channel.nextLine();
      fake.stdout("Stopping server");
      fake.exit(0);
      await expect(first).resolves.toMatchObject({ text: "Stopping server" });
      await expect(second).rejects.toThrow("Server console closed before responding");
    });

    it("is removed when its signal aborts", async () => {
      const { channel, fake } = setup();
      const controller = new AbortController();
      const aborted = channel.nextLine(controller.signal);
      const later = channel.nextLine();
      controller.abort(new Error("gave up"));
      await expect(aborted).rejects.toThrow("gave up");
      expect(channel.pendingResponses).toBe(1);
      fake.stdout("answer\n");
      await expect(later).resolves.toMatchObject({ text: "answer" });
    });

    it("rejects immediately for an already aborted signal", async () => {
      const { channel } = setup();
      const controller = new AbortController();
      controller.abort("caller left");
      await expect(channel.nextLine(controller.signal)).rejects.toThrow("Wait for console response was aborted");
      expect(channel.pendingResponses).toBe(0);
    });

    it("swallows one line for a response nobody is waiting for", async () => {
      const { channel, fake, log } = setup();
      channel.discardNextResponse();
      const next = channel.nextLine();
      fake.stdout("late answer\nreal answer\n");
      await expect(next).resolves.toMatchObject({ text: "real answer" });
      expect(log.debug).toHaveBeenCalledWith("[console] Discarded late response", { line: "late answer" });
    });

    it("does not queue a discard once the channel has closed", () => {
      const { channel, fake } = setup();
      fake.exit(0);
      channel.discardNextResponse();
      expect(channel.pendingResponses).toBe(0);
    });

    it("rejects registrations made after the channel closed", () => {
      const { channel, fake } = setup();
      fake.exit(0);
      const reject = vi.fn();
      channel.registerConsumer({ kind: "oneShot", slot: { resolve: vi.fn(), reject } });
      expect(reject).toHaveBeenCalledWith(expect.any(ChannelClosedError));
      expect(channel.pendingResponses).toBe(0);
    });
  });

  describe("streaming consumers", () => {
    it("receive every line in order until unregistered", async () => {
      const { channel, fake } = setup();
      const seen: string[] = [];
      const id = channel.registerConsumer({ kind: "streaming", handler: (line: ConsoleLine) => void seen.push(line.text) });
      fake.stdout("a\nb\n");
      await flushMicrotasks();
      expect(seen).toEqual(["a", "b"]);

      expect(channel.unregisterConsumer(id)).toBe(true);
      fake.stdout("c\n");
      await flushMicrotasks();
      expect(seen).toEqual(["a", "b"]);
      expect(channel.unregisterConsumer(id)).toBe(false);
    });

    it("keeps delivering to others when one consumer throws", async () => {
      const { channel, fake, log } = setup();
      const good = vi.fn();
      channel.registerConsumer({
        kind: "streaming",
        handler: () => {
          throw new Error("boom");
        },
      });
      channel.registerConsumer({ kind: "streaming", handler: good });
      fake.stdout("line\n");
      await flushMicrotasks();
      expect(good).toHaveBeenCalledTimes(1);
      expect(log.warn).toHaveBeenCalledWith("[console] Consumer error", { error: "boom" });
    });

    it("still lets the one-shot consumer have the line", async () => {
      const { channel, fake } = setup();
      const streamed = vi.fn();
      channel.registerConsumer({ kind: "streaming", handler: streamed });
      const response = channel.nextLine();
      fake.stdout("shared\n");
      await expect(response).resolves.toMatchObject({ text: "shared" });
      await flushMicrotasks();
      expect(streamed).toHaveBeenCalledWith(expect.objectContaining({ text: "shared" }));
    });
  });

  describe("write", () => {
    it("appends a newline to the command", () => {
      const { channel, fake } = setup();
      channel.write("say hello");
      expect(fake.written).toEqual(["say hello\n"]);
    });

    it("throws ChannelUnavailableError before connect", () => {
      const channel = new ConsoleChannel(new ScrollbackBuffer(5), quietLogger());
      expect(() => channel.write("list")).toThrow(ChannelUnavailableError);
    });

    it("throws ChannelClosedError after the process exits", () => {
      const { channel, fake } = setup();
      fake.exit(0);
      expect(() => channel.write("list")).toThrow(ChannelClosedError);
    });
  });

  describe("connect", () => {
    it("refuses a child that failed to spawn", () => {
      const channel = new ConsoleChannel(new ScrollbackBuffer(5), quietLogger());
      const fake = createFakeChild(null);
      expect(() => channel.connect(fake.child)).toThrow(ChannelUnavailableError);
      expect(channel.isConnected).toBe(false);
    });

    it("refuses to connect twice", () => {
      const { channel } = setup();
      expect(() => channel.connect(createFakeChild().child)).toThrow("Console channel is already connected");
    });
  });
});
