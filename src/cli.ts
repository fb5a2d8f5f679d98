#!/usr/bin/env node
/**
 * CLI — interactive chat with the agent.
 *
 * Wires bus, tools, tracker, model and agent together, then hands the
 * terminal to the CLIAdapter until `exit`, `/exit` or Ctrl+C.
 */
import { pathToFileURL } from "node:url";
import { Command, Option } from "commander";
import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import { Agent } from "./agent.ts";
import { CLIAdapter } from "./channels/cli-adapter.ts";
import { EventBus } from "./events/bus.ts";
import { Topic } from "./events/types.ts";
import { buildSystemPrompt } from "./identity/prompt.ts";
import { getSettings, type Settings } from "./infra/config.ts";
import { LLM_PROVIDERS } from "./infra/config-schema.ts";
import { errorToString } from "./infra/errors.ts";
import { getLogger } from "./infra/logger.ts";
import { createModel } from "./llm/factory.ts";
import { ModelClient } from "./llm/model-client.ts";
import { AGENT_LOG_FILE, THREAD_FILE, TranscriptLog } from "./logging/transcript-log.ts";
import { collectRoleTools, resolveRoles } from "./roles/index.ts";
import { TaskTracker } from "./task/tracker.ts";
import { Toolbox } from "./tools/registry.ts";

const logger = getLogger("cli");

export const CliOptionsSchema = z.object({
  llm: z.enum(LLM_PROVIDERS).optional(),
  verbose: z.boolean().default(false),
  silenceActions: z.boolean().default(false),
  clearLogs: z.boolean().default(false),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

/** Fold command-line flags into the loaded settings. */
export function applyCliOptions(settings: Settings, options: CliOptions): Settings {
  return {
    ...settings,
    llm: { ...settings.llm, provider: options.llm ?? settings.llm.provider },
    agent: {
      ...settings.agent,
      verbose: settings.agent.verbose || options.verbose,
      silenceActions: settings.agent.silenceActions || options.silenceActions,
    },
  };
}

/** Run one interactive session; resolves after shutdown. */
export async function runChat(options: CliOptions): Promise<void> {
  const settings = applyCliOptions(getSettings(), options);
  const name = settings.agent.name;

  const bus = new EventBus();
  const transcriptLog = new TranscriptLog(bus, settings.logDirectory);
  if (options.clearLogs) {
    await transcriptLog.clear(AGENT_LOG_FILE);
  }
  await transcriptLog.clear(THREAD_FILE);
  transcriptLog.attach();

  const roles = resolveRoles(settings.agent.roles);
  const toolbox = new Toolbox(collectRoleTools(roles));
  const tracker = new TaskTracker(bus, { silenceActions: settings.agent.silenceActions });
  const modelClient = new ModelClient(createModel(settings));

  const shutdown = new AbortController();
  bus.subscribe(Topic.EXIT_SIGNAL, (reason) => {
    logger.info({ reason }, "exit_signal");
    shutdown.abort();
  });
  const onSigint = (): void => {
    bus.publish(Topic.EXIT_SIGNAL, "Signal exit");
  };
  process.on("SIGINT", onSigint);

  const agent = new Agent({
    bus,
    modelClient,
    toolbox,
    tracker,
    systemPrompt: buildSystemPrompt(name, roles),
    settings,
    signal: shutdown.signal,
  });
  await agent.start();

  const cli = new CLIAdapter(bus, { name });
  cli.start();

  await new Promise<void>((resolve) => {
    if (shutdown.signal.aborted) resolve();
    else shutdown.signal.addEventListener("abort", () => resolve(), { once: true });
  });

  console.log("Shutting down agent...");
  cli.stop();
  await agent.stop();
  process.off("SIGINT", onSigint);
  transcriptLog.detach();
  await transcriptLog.flush();
  console.log("Agent stopped. Exiting now.");
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("simple-agent")
    .description("Chat with a tool-using assistant that tracks its own tasks.")
    .version("0.1.0")
    .addOption(new Option("--llm <provider>", "The LLM backend to use.").choices(LLM_PROVIDERS))
    .option("--verbose", "Enable verbose logging.", false)
    .option("--silence-actions", "Silence actions like tool calls and task messages.", false)
    .option("--clear-logs", "Clear the agent log before starting.", false)
    .action(async () => {
      await runChat(CliOptionsSchema.parse(program.opts()));
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  loadDotenv();
  await createProgram().parseAsync(argv);
}

// Entry point: run when this file is executed directly
const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  main()
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      logger.fatal({ error: errorToString(err) }, "cli_fatal");
      console.error("Fatal error:", errorToString(err));
      process.exit(1);
    });
}
