import { describe, expect, it, vi } from "vitest";
import { LogChannel } from "./log-channel";

vi.mock("../logger", () => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

describe("LogChannel", () => {
  it("drains events in emission order", () => {
    const channel = new LogChannel();
    for (const n of [1, 2, 3, 4, 5]) {
      channel.append("info", `E${n}`);
    }

    const drained = channel.drain();

    expect(drained.map((event) => event.message)).toEqual(["E1", "E2", "E3", "E4", "E5"]);
    expect(drained.map((event) => event.seq)).toEqual([1, 2, 3, 4, 5]);
  });

  it("never returns an event twice", () => {
    const channel = new LogChannel();
    channel.append("debug", "first");
    channel.append("poll", "second");

    expect(channel.drain()).toHaveLength(2);
    expect(channel.drain()).toEqual([]);

    channel.append("success", "third");
    const next = channel.drain();
    expect(next.map((event) => [event.seq, event.message])).toEqual([[3, "third"]]);
  });

  it("stamps events with the injected clock and freezes them", () => {
    const channel = new LogChannel({ now: () => 1_700_000_000_000 });
    const event = channel.append("error", "boom");

    expect(event.timestamp.getTime()).toBe(1_700_000_000_000);
    expect(Object.isFrozen(event)).toBe(true);
  });

  it("notifies subscribers without consuming the buffer", () => {
    const channel = new LogChannel();
    const seen: string[] = [];
    const unsubscribe = channel.onEvent((event) => seen.push(event.message));

    channel.append("info", "a");
    unsubscribe();
    channel.append("info", "b");

    expect(seen).toEqual(["a"]);
    expect(channel.size).toBe(2);
  });

  it("keeps appending when a subscriber throws", () => {
    const channel = new LogChannel();
    channel.onEvent(() => {
      throw new Error("listener broke");
    });

    expect(() => channel.append("info", "still here")).not.toThrow();
    expect(channel.drain().map((event) => event.message)).toEqual(["still here"]);
  });

  it("retains everything by default", () => {
    const channel = new LogChannel();
    for (let i = 0; i < 10_000; i += 1) {
      channel.append("debug", "no new poll");
    }
    expect(channel.size).toBe(10_000);
    expect(channel.dropped).toBe(0);
  });

  it("drops the oldest events beyond the cap and reports the gap on drain", () => {
    const channel = new LogChannel({ maxBuffered: 3 });
    for (const n of [1, 2, 3, 4, 5]) {
      channel.append("info", `E${n}`);
    }

    expect(channel.size).toBe(3);
    expect(channel.dropped).toBe(2);

    const drained = channel.drain();
    expect(drained.map((event) => [event.seq, event.level, event.message])).toEqual([
      [2, "info", "dropped 2 earlier event(s)"],
      [3, "info", "E3"],
      [4, "info", "E4"],
      [5, "info", "E5"],
    ]);
    expect(channel.drain()).toEqual([]);
    expect(channel.totalAppended).toBe(5);
  });
});
