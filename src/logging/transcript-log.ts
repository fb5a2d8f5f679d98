/**
 * TranscriptLog — plain-text log files fed from the bus.
 *
 *   `<topic>_log` payloads → `<topic>.log`  (agent.log, general.log, toolbox.log, …)
 *   conversation           → agent.thread  ("User: …" / "Agent: …")
 *
 * Every line is `YYYY-MM-DD HH:MM:SS: text`. Appends to one file are chained
 * so concurrent publishes never interleave or reorder.
 */
import path from "node:path";
import { appendFile, mkdir, writeFile } from "node:fs/promises";
import type { EventBus, Subscription } from "../events/bus.ts";
import { Topic, WILDCARD } from "../events/types.ts";
import { errorToString } from "../infra/errors.ts";
import { getLogger } from "../infra/logger.ts";
import { formatTimestamp } from "../infra/time.ts";

const logger = getLogger("transcript_log");

export const THREAD_FILE = "agent.thread";
export const AGENT_LOG_FILE = "agent.log";

const LOG_TOPIC = /^([a-z0-9_]+)_log$/;

export function formatLine(text: string, epochMs: number): string {
  return `${formatTimestamp(epochMs)}: ${text}\n`;
}

export class TranscriptLog {
  private chains = new Map<string, Promise<void>>();
  private subscriptions: Subscription[] = [];
  private dirReady: Promise<void> | null = null;

  constructor(
    private bus: EventBus,
    readonly directory: string,
    private now: () => number = Date.now,
  ) {}

  attach(): void {
    if (this.subscriptions.length > 0) return;
    this.subscriptions.push(
      this.bus.subscribe(WILDCARD, (payload, topic) => {
        const match = LOG_TOPIC.exec(topic);
        if (match && typeof payload === "string") {
          return this.write(`${match[1]}.log`, payload);
        }
      }),
      this.bus.subscribe(Topic.NEW_USER_MESSAGE, (text) => this.write(THREAD_FILE, `User: ${text}`)),
      this.bus.subscribe(Topic.NEW_AGENT_MESSAGE, (text) => this.write(THREAD_FILE, `Agent: ${text}`)),
    );
  }

  detach(): void {
    for (const sub of this.subscriptions) {
      this.bus.unsubscribe(sub);
    }
    this.subscriptions = [];
  }

  /** Queue one timestamped line; returns when it is on disk. */
  write(fileName: string, text: string): Promise<void> {
    const line = formatLine(text, this.now());
    return this.enqueue(fileName, async (filePath) => {
      await appendFile(filePath, line, "utf-8");
    });
  }

  /** Truncate a log file, in order with any pending writes to it. */
  clear(fileName: string): Promise<void> {
    return this.enqueue(fileName, async (filePath) => {
      await writeFile(filePath, "", "utf-8");
    });
  }

  /** Wait for every queued write. */
  async flush(): Promise<void> {
    await Promise.all(this.chains.values());
  }

  private enqueue(fileName: string, op: (filePath: string) => Promise<void>): Promise<void> {
    const filePath = path.join(this.directory, fileName);
    const run = async (): Promise<void> => {
      try {
        await this.ensureDir();
        await op(filePath);
      } catch (err) {
        logger.error({ file: filePath, error: errorToString(err) }, "transcript_write_failed");
      }
    };
    const previous = this.chains.get(fileName) ?? Promise.resolve();
    const next = previous.then(run);
    this.chains.set(fileName, next);
    return next;
  }

  private ensureDir(): Promise<void> {
    this.dirReady ??= mkdir(this.directory, { recursive: true }).then(
      () => undefined,
      (err: unknown) => {
        // Retry on the next write.
        this.dirReady = null;
        throw err;
      },
    );
    return this.dirReady;
  }
}
