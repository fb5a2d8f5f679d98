import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { PassThrough } from "node:stream";
import { EventBus } from "../../../src/events/bus.ts";
import { Topic } from "../../../src/events/types.ts";
import { CLIAdapter } from "../../../src/channels/cli-adapter.ts";

describe("CLIAdapter", () => {
  let bus: EventBus;
  let input: PassThrough;
  let output: PassThrough;
  let printed: string[];
  let cli: CLIAdapter;

  beforeEach(() => {
    bus = new EventBus();
    input = new PassThrough();
    output = new PassThrough();
    printed = [];
    cli = new CLIAdapter(bus, { name: "Simmy", input, output, print: (line) => printed.push(line) });
    cli.start();
  });

  afterEach(() => {
    cli.stop();
  });

  test("greets on start", () => {
    expect(printed).toEqual(["Simmy: Hello and welcome! My name is Simmy!"]);
  });

  test("typed lines are published trimmed", async () => {
    const received = bus.waitFor(Topic.NEW_USER_MESSAGE);
    input.write("  what time is it?  \n");
    await expect(received).resolves.toBe("what time is it?");
  });

  test("exit publishes the exit signal", async () => {
    const exit = bus.waitFor(Topic.EXIT_SIGNAL);
    input.write("/quit\n");
    await expect(exit).resolves.toBe("User exit");
    expect(printed).toContain("Simmy: Goodbye!");
  });

  test("end of input publishes the exit signal", async () => {
    const exit = bus.waitFor(Topic.EXIT_SIGNAL);
    input.end();
    await expect(exit).resolves.toBe("Input closed");
  });

  test("stop does not publish the exit signal", () => {
    const signals: string[] = [];
    bus.subscribe(Topic.EXIT_SIGNAL, (reason) => {
      signals.push(reason);
    });
    cli.stop();
    expect(signals).toEqual([]);
  });

  test("/help is handled locally", async () => {
    const userMessages: string[] = [];
    bus.subscribe(Topic.NEW_USER_MESSAGE, (text) => {
      userMessages.push(text);
    });
    const next = bus.waitFor(Topic.NEW_USER_MESSAGE);

    input.write("/help\nhello\n");
    await next;

    expect(printed).toContain("    /help   Show this help message");
    expect(userMessages).toEqual(["hello"]);
  });

  test("prints bus traffic", () => {
    bus.publish(Topic.NEW_AGENT_MESSAGE, "Hi there");
    bus.publish(Topic.ACTION_NOTICE, "[2025-01-01 00:00:00] Using tool: current_time");
    bus.publish(Topic.AGENT_ERROR, "Error getting response from model: boom");
    bus.publish(Topic.ERROR, 'Tool "x" not found');

    expect(printed.slice(1)).toEqual([
      "Simmy: Hi there",
      "  [2025-01-01 00:00:00] Using tool: current_time",
      "Agent Error: Error getting response from model: boom",
      'Error: Tool "x" not found',
    ]);
  });

  test("stop unsubscribes from the bus", () => {
    cli.stop();
    bus.publish(Topic.NEW_AGENT_MESSAGE, "late");
    expect(printed).toEqual(["Simmy: Hello and welcome! My name is Simmy!"]);
  });
});
