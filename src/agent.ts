/**
 * Agent — turn-taking orchestrator.
 *
 *   idle ──user message──▶ thinking ──tool calls──▶ acting
 *                            ▲  │                     │
 *                            │  └──terminal reply──▶ idle
 *                            └────────────────────────┘
 *
 * User messages arrive on the bus and are queued; turns run strictly one at
 * a time. The Agent is the only writer of its transcript.
 */
import type { EventBus, Subscription } from "./events/bus.ts";
import { Topic } from "./events/types.ts";
import { getSettings, type Settings } from "./infra/config.ts";
import { errorToString } from "./infra/errors.ts";
import { getLogger } from "./infra/logger.ts";
import { formatToolTimestamp } from "./infra/time.ts";
import type { ModelClient } from "./llm/model-client.ts";
import { hasToolCalls, toolResultMessage, userMessage, type Message } from "./models/message.ts";
import type { ToolCall } from "./models/tool.ts";
import type { TaskTracker } from "./task/tracker.ts";
import { createTaskTools } from "./tools/builtins/task-tools.ts";
import { ToolExecutor } from "./tools/executor.ts";
import type { Toolbox } from "./tools/registry.ts";

const logger = getLogger("agent");

export const AgentState = {
  IDLE: "idle",
  THINKING: "thinking",
  ACTING: "acting",
} as const;

export type AgentState = (typeof AgentState)[keyof typeof AgentState];

export interface AgentDeps {
  bus: EventBus;
  modelClient: ModelClient;
  toolbox: Toolbox;
  tracker: TaskTracker;
  systemPrompt: string;
  settings?: Settings;
  /** Aborting it stops the agent, same as stop(). */
  signal?: AbortSignal;
}

export class Agent {
  private bus: EventBus;
  private modelClient: ModelClient;
  private toolbox: Toolbox;
  private tracker: TaskTracker;
  private executor: ToolExecutor;
  private systemPrompt: string;
  private settings: Settings;
  private signal: AbortSignal | undefined;

  private _state: AgentState = AgentState.IDLE;
  private _transcript: Message[] = [];
  private inbox: string[] = [];
  private draining: Promise<void> | null = null;
  private subscriptions: Subscription[] = [];
  private running = false;
  private stopped = false;

  constructor(deps: AgentDeps) {
    this.bus = deps.bus;
    this.modelClient = deps.modelClient;
    this.toolbox = deps.toolbox;
    this.tracker = deps.tracker;
    this.systemPrompt = deps.systemPrompt;
    this.settings = deps.settings ?? getSettings();
    this.signal = deps.signal;

    // Task tools close over this agent's tracker and share the one Toolbox.
    this.toolbox.registerMany(createTaskTools(this.tracker));

    const { timeout, allowedPaths } = this.settings.tools;
    this.executor = new ToolExecutor(this.toolbox, this.bus, {
      timeout: timeout * 1000,
      allowedPaths,
    });
  }

  get state(): AgentState {
    return this._state;
  }

  /** Copy of the conversation so far. */
  get transcript(): Message[] {
    return [...this._transcript];
  }

  get isRunning(): boolean {
    return this.running;
  }

  // ═══════════════════════════════════════════════════
  // Lifecycle
  // ═══════════════════════════════════════════════════

  async start(): Promise<void> {
    if (this.running || this.stopped) return;

    await this.modelClient.startup(this.systemPrompt);

    this.subscriptions.push(
      this.bus.subscribe(Topic.NEW_USER_MESSAGE, (text) => this.send(text)),
      this.bus.subscribe(Topic.EXIT_SIGNAL, () => this.stop()),
    );
    if (this.signal) {
      if (this.signal.aborted) {
        await this.stop();
        return;
      }
      this.signal.addEventListener("abort", this.onAbort, { once: true });
    }

    this.running = true;
    logger.info(
      { provider: this.modelClient.provider, model: this.modelClient.modelId, tools: this.toolbox.all().length },
      "agent_started",
    );
    this.bus.publish(Topic.AGENT_LOG, `Agent started with ${this.toolbox.all().length} tools`);
  }

  /**
   * No turn starts after this. A turn already in flight finishes its current
   * model or tool call; the returned promise waits for it.
   */
  async stop(): Promise<void> {
    if (!this.stopped) {
      this.stopped = true;
      this.running = false;
      this.inbox.length = 0;
      for (const sub of this.subscriptions) {
        this.bus.unsubscribe(sub);
      }
      this.subscriptions = [];
      this.signal?.removeEventListener("abort", this.onAbort);
      logger.info("agent_stopped");
      this.bus.publish(Topic.AGENT_LOG, "Agent stopped");
    }
    await this.draining;
  }

  private onAbort = (): void => {
    this.stop().catch((err: unknown) => {
      logger.error({ error: errorToString(err) }, "agent_stop_failed");
    });
  };

  /** Queue a user message; it is processed after any turn in progress. */
  send(text: string): void {
    if (this.stopped) {
      logger.warn("agent_message_after_stop");
      return;
    }
    this.inbox.push(text);
    this.processQueue();
  }

  /** Resolves once the inbox is empty and no turn is running. */
  async whenIdle(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  // ═══════════════════════════════════════════════════
  // Queue processing
  // ═══════════════════════════════════════════════════

  private processQueue(): void {
    if (this.draining) return;
    this.draining = this.drainQueue().finally(() => {
      this.draining = null;
    });
  }

  private async drainQueue(): Promise<void> {
    for (let text = this.inbox.shift(); text !== undefined && !this.stopped; text = this.inbox.shift()) {
      try {
        await this.runTurn(text);
      } catch (err) {
        const message = errorToString(err);
        logger.error({ error: message }, "agent_turn_failed");
        this.bus.publish(Topic.AGENT_ERROR, `Error getting response from model: ${message}`);
      } finally {
        this.setState(AgentState.IDLE);
      }
    }
  }

  // ═══════════════════════════════════════════════════
  // Turn
  // ═══════════════════════════════════════════════════

  private async runTurn(text: string): Promise<void> {
    this._transcript.push(userMessage(text));
    this.setState(AgentState.THINKING);

    const maxRounds = this.settings.agent.maxToolRounds;
    let rounds = 0;

    for (;;) {
      const response = await this.modelClient.getResponse(
        this._transcript,
        this.toolbox.toDefinitions(),
        { context: this.openTasksContext() },
      );
      this.logResponse(response);

      if (!hasToolCalls(response)) {
        const content = response.content ?? "";
        this._transcript.push(response);
        this.bus.publish(Topic.NEW_AGENT_MESSAGE, content);
        return;
      }

      // Checked before appending so the transcript never holds unanswered calls.
      if (rounds >= maxRounds) {
        logger.warn({ maxRounds }, "agent_tool_round_limit");
        this.bus.publish(
          Topic.AGENT_ERROR,
          `Tool call limit reached (${maxRounds} rounds); turn aborted.`,
        );
        return;
      }
      rounds++;

      this._transcript.push(response);
      this.setState(AgentState.ACTING);
      for (const call of response.toolCalls) {
        await this.dispatch(call);
      }

      if (this.stopped) return;
      this.setState(AgentState.THINKING);
    }
  }

  private async dispatch(call: ToolCall): Promise<void> {
    const startedAt = Date.now();
    this.bus.publish(Topic.AGENT_LOG, `Using tool ${call.name} (${call.id})`);
    if (!this.settings.agent.silenceActions) {
      this.bus.publish(Topic.ACTION_NOTICE, `${formatToolTimestamp(startedAt)} Using tool: ${call.name}`);
    }

    const result = await this.executor.execute(call.name, call.arguments, {
      toolCallId: call.id,
      argumentsError: call.argumentsError,
    });
    this._transcript.push(toolResultMessage(call.id, result.content));

    this.bus.publish(
      Topic.AGENT_LOG,
      `Tool ${call.name} ${result.success ? "succeeded" : "failed"} ${formatToolTimestamp(startedAt, result.durationMs)}`,
    );
  }

  private openTasksContext(): string | undefined {
    if (!this.tracker.hasIncompleteTasks()) return undefined;
    return `## Incomplete tasks\n\n${this.tracker.getIncompleteTasksDescribed()}`;
  }

  private logResponse(response: Message): void {
    const calls = response.toolCalls ?? [];
    this.bus.publish(
      Topic.AGENT_LOG,
      calls.length > 0
        ? `Model requested ${calls.length} tool call(s): ${calls.map((c) => c.name).join(", ")}`
        : "Model returned a reply",
    );
    if (this.settings.agent.verbose) {
      this.bus.publish(Topic.AGENT_LOG, `Model output: ${JSON.stringify(response)}`);
    }
  }

  private setState(next: AgentState): void {
    if (this._state === next) return;
    logger.debug({ from: this._state, to: next }, "agent_state");
    this._state = next;
  }
}
