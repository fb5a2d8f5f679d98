/**
 * CLIAdapter — interactive terminal front end.
 *
 * Reads lines from the terminal and publishes them as `new_user_message`;
 * prints replies, notices and errors as they arrive on the bus. The prompt
 * comes back once the agent has answered (or failed to).
 */
import { createInterface, type Interface as ReadlineInterface } from "node:readline";
import type { EventBus, Subscription } from "../events/bus.ts";
import { Topic } from "../events/types.ts";

export interface CLIAdapterOptions {
  /** Assistant name shown before replies. */
  name: string;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  /** Line printer; defaults to console.log. */
  print?: (line: string) => void;
}

type CommandResult = "exit" | "handled" | "none";

export class CLIAdapter {
  private rl: ReadlineInterface | null = null;
  private subscriptions: Subscription[] = [];
  private name: string;
  private input: NodeJS.ReadableStream;
  private output: NodeJS.WritableStream;
  private print: (line: string) => void;

  constructor(
    private bus: EventBus,
    opts: CLIAdapterOptions,
  ) {
    this.name = opts.name;
    this.input = opts.input ?? process.stdin;
    this.output = opts.output ?? process.stdout;
    this.print = opts.print ?? ((line) => console.log(line));
  }

  start(): void {
    if (this.rl) return;

    this.subscriptions.push(
      this.bus.subscribe(Topic.NEW_AGENT_MESSAGE, (text) => {
        this.print(`${this.name}: ${text}`);
        this.prompt();
      }),
      this.bus.subscribe(Topic.ERROR, (error) => this.print(`Error: ${error}`)),
      this.bus.subscribe(Topic.AGENT_ERROR, (error) => {
        this.print(`Agent Error: ${error}`);
        this.prompt();
      }),
      this.bus.subscribe(Topic.ACTION_NOTICE, (text) => this.print(`  ${text}`)),
    );

    const rl = createInterface({ input: this.input, output: this.output });
    this.rl = rl;
    rl.setPrompt("You: ");
    rl.on("line", (line) => this.onLine(line));
    rl.on("SIGINT", () => {
      this.print("");
      this.print("Received exit signal, shutting down...");
      this.bus.publish(Topic.EXIT_SIGNAL, "Signal exit");
    });
    // End of input (Ctrl+D) ends the session; stop() detaches rl first.
    rl.on("close", () => {
      if (this.rl !== rl) return;
      this.rl = null;
      this.bus.publish(Topic.EXIT_SIGNAL, "Input closed");
    });

    this.print(`${this.name}: Hello and welcome! My name is ${this.name}!`);
    this.prompt();
  }

  stop(): void {
    for (const sub of this.subscriptions) {
      this.bus.unsubscribe(sub);
    }
    this.subscriptions = [];
    const rl = this.rl;
    this.rl = null;
    rl?.close();
  }

  private onLine(line: string): void {
    const trimmed = line.trim();
    if (!trimmed) {
      this.prompt();
      return;
    }

    const result = this.handleCommand(trimmed);
    if (result === "exit") {
      this.print(`${this.name}: Goodbye!`);
      this.bus.publish(Topic.EXIT_SIGNAL, "User exit");
      return;
    }
    if (result === "handled") {
      this.prompt();
      return;
    }

    this.bus.publish(Topic.NEW_USER_MESSAGE, trimmed);
  }

  private handleCommand(input: string): CommandResult {
    const cmd = input.toLowerCase();

    if (cmd === "exit" || cmd === "/exit" || cmd === "/quit") {
      return "exit";
    }

    if (cmd === "/help") {
      this.print("");
      this.print("  Commands:");
      this.print("    /help   Show this help message");
      this.print("    exit    Quit (also /exit)");
      this.print("");
      return "handled";
    }

    return "none";
  }

  private prompt(): void {
    this.rl?.prompt();
  }
}
