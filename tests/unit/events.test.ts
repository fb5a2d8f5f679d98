import { describe, expect, test, vi } from "vitest";
import { EventBus } from "../../src/events/bus.ts";
import { Topic, WILDCARD } from "../../src/events/types.ts";

describe("EventBus", () => {
  test("publish to a topic with no subscribers is a no-op", () => {
    const bus = new EventBus();
    expect(() => bus.publish("nobody_listens", { any: "thing" })).not.toThrow();
    expect(bus.listenerCount("nobody_listens")).toBe(0);
  });

  test("delivers synchronously, in registration order", () => {
    const bus = new EventBus();
    const seen: string[] = [];
    bus.subscribe(Topic.NEW_USER_MESSAGE, (text) => { seen.push(`a:${text}`); });
    bus.subscribe(Topic.NEW_USER_MESSAGE, (text) => { seen.push(`b:${text}`); });

    bus.publish(Topic.NEW_USER_MESSAGE, "hi");

    expect(seen).toEqual(["a:hi", "b:hi"]);
  });

  test("a throwing handler does not stop its siblings and is reported on error", () => {
    const bus = new EventBus();
    const second = vi.fn();
    const errors: string[] = [];
    bus.subscribe(Topic.ERROR, (e) => { errors.push(e); });
    bus.subscribe("general_log", () => {
      throw new Error("boom");
    });
    bus.subscribe("general_log", second);

    expect(() => bus.publish("general_log", "line")).not.toThrow();

    expect(second).toHaveBeenCalledWith("line", "general_log");
    expect(errors).toEqual(['Handler for "general_log" failed: boom']);
  });

  test("a rejected async handler is reported on error", async () => {
    const bus = new EventBus();
    const errorSeen = bus.waitFor(Topic.ERROR, { timeoutMs: 1000 });
    bus.subscribe(Topic.AGENT_LOG, async () => {
      throw new Error("late failure");
    });

    bus.publish(Topic.AGENT_LOG, "x");

    await expect(errorSeen).resolves.toBe('Handler for "agent_log" failed: late failure');
  });

  test("a fault on the error topic is not re-published", () => {
    const bus = new EventBus();
    const calls = vi.fn(() => {
      throw new Error("reporter broke");
    });
    bus.subscribe(Topic.ERROR, calls);

    bus.publish(Topic.ERROR, "first");

    expect(calls).toHaveBeenCalledTimes(1);
  });

  test("unsubscribe removes only that handler", () => {
    const bus = new EventBus();
    const a = vi.fn();
    const b = vi.fn();
    const subA = bus.subscribe("t", a);
    bus.subscribe("t", b);

    expect(bus.unsubscribe(subA)).toBe(true);
    expect(bus.unsubscribe(subA)).toBe(false);
    bus.publish("t", 1);

    expect(a).not.toHaveBeenCalled();
    expect(b).toHaveBeenCalledTimes(1);
    expect(bus.listenerCount("t")).toBe(1);
  });

  test("a handler subscribed during publish does not see the current publish", () => {
    const bus = new EventBus();
    const late = vi.fn();
    bus.subscribe("t", () => {
      bus.subscribe("t", late);
    });

    bus.publish("t", "first");
    expect(late).not.toHaveBeenCalled();

    bus.publish("t", "second");
    expect(late).toHaveBeenCalledWith("second", "t");
  });

  test("wildcard handlers receive every topic after topic handlers", () => {
    const bus = new EventBus();
    const order: string[] = [];
    bus.subscribe(WILDCARD, (_payload, topic) => { order.push(`*:${topic}`); });
    bus.subscribe("toolbox_log", () => { order.push("toolbox_log"); });

    bus.publish("toolbox_log", "x");
    bus.publish(Topic.EXIT_SIGNAL, "bye");

    expect(order).toEqual(["toolbox_log", "*:toolbox_log", "*:exit_signal"]);
  });

  test("history is kept only when asked and is bounded", () => {
    const plain = new EventBus();
    plain.publish("t", 1);
    expect(plain.history).toHaveLength(0);

    const bus = new EventBus({ keepHistory: true, historyLimit: 2 });
    bus.publish("t", 1);
    bus.publish("t", 2);
    bus.publish("t", 3);

    expect(bus.history.map((e) => e.payload)).toEqual([2, 3]);
    expect(bus.history[0]?.topic).toBe("t");
  });

  test("waitFor honours the predicate and times out", async () => {
    const bus = new EventBus();
    const waiting = bus.waitFor(Topic.NEW_AGENT_MESSAGE, {
      predicate: (text) => text.startsWith("done"),
    });
    bus.publish(Topic.NEW_AGENT_MESSAGE, "working");
    bus.publish(Topic.NEW_AGENT_MESSAGE, "done: 42");

    await expect(waiting).resolves.toBe("done: 42");
    expect(bus.listenerCount(Topic.NEW_AGENT_MESSAGE)).toBe(0);

    await expect(bus.waitFor("never", { timeoutMs: 10 })).rejects.toThrow(
      'Timed out after 10ms waiting for "never"',
    );
  });
});
