/**
 * Structured logger — thin pino wrapper with file output support.
 *
 * Log format: JSON with human-readable `level` (label) and `time` (ISO 8601).
 * This applies to ALL outputs (file, console, any transport) so logs are
 * always grep-friendly and human-scannable without extra tooling.
 */
import pino from "pino";
import type { TransportSingleOptions, TransportMultiOptions } from "pino";
import { existsSync, mkdirSync, readdirSync, statSync, unlinkSync } from "node:fs";
import { dirname, join, basename } from "node:path";

// Bootstrap phase: read log level from env before config is available.
// Overridden when reinitLogger() is called with loaded settings.
const level = process.env["AGENT_LOG_LEVEL"] ?? "info";

/**
 * Shared pino options for human-readable level and timestamp.
 *
 * NOTE: pino disallows `formatters.level` with multi-target transports,
 * so it is only applied in single-target (file-only) mode.
 */
function createLoggerOptions(
  logLevel: string,
  transport: TransportSingleOptions | TransportMultiOptions,
  isMultiTarget: boolean,
): pino.LoggerOptions {
  const opts: pino.LoggerOptions = {
    level: logLevel,
    transport,
    base: undefined, // drop pid and hostname
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (!isMultiTarget) {
    opts.formatters = {
      level(label) {
        return { level: label };
      },
    };
  }

  return opts;
}

/**
 * Remove rotated log files (e.g. runtime.log.2026-01-15) older than the retention period.
 */
export function cleanupOldLogs(logFile: string, retentionDays = 30, now = Date.now()): number {
  const logDir = dirname(logFile);
  const logFileName = basename(logFile);

  if (!existsSync(logDir)) {
    return 0;
  }

  const retentionMs = retentionDays * 24 * 60 * 60 * 1000;
  const rotatedLogPattern = new RegExp(`^${logFileName.replace(/\./g, "\\.")}\\.`);
  let removed = 0;

  for (const file of readdirSync(logDir)) {
    if (!rotatedLogPattern.test(file)) {
      continue;
    }

    const filePath = join(logDir, file);
    if (now - statSync(filePath).mtimeMs > retentionMs) {
      unlinkSync(filePath);
      removed++;
    }
  }

  return removed;
}

/**
 * Resolve transports based on environment and configuration.
 * File logging is always enabled. Console output is optional.
 */
export function resolveTransports(
  nodeEnv: string | undefined,
  logFile: string,
  logConsoleEnabled?: boolean,
): { transport: TransportSingleOptions | TransportMultiOptions; isMultiTarget: boolean } {
  const transports: TransportSingleOptions[] = [];

  if (logConsoleEnabled) {
    if (nodeEnv !== "production") {
      transports.push({
        target: "pino-pretty",
        options: { colorize: true, destination: 2 },
      });
    } else {
      transports.push({
        target: "pino/file",
        options: { destination: 2 }, // stderr, stdout belongs to the conversation
      });
    }
  }

  const logDir = dirname(logFile);
  if (!existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  try {
    cleanupOldLogs(logFile, 30);
  } catch (err) {
    // The logger is not up yet, so the failure can only go to stderr.
    process.stderr.write(`log cleanup failed: ${String(err)}\n`);
  }

  transports.push({
    target: "pino-roll",
    options: {
      file: logFile,
      frequency: "daily",
      size: "10m",
      mkdir: true,
    },
  });

  const [single] = transports;
  if (transports.length === 1 && single) {
    return { transport: single, isMultiTarget: false };
  }

  return {
    transport: { targets: transports },
    isMultiTarget: true,
  };
}

function createRootLogger(
  logLevel: string,
  logFile: string,
  logConsoleEnabled?: boolean,
  nodeEnv?: string,
): pino.Logger {
  // A silent logger never writes, so it needs no transport worker.
  if (logLevel === "silent") {
    return pino({ level: "silent" });
  }
  const { transport, isMultiTarget } = resolveTransports(nodeEnv, logFile, logConsoleEnabled);
  return pino(createLoggerOptions(logLevel, transport, isMultiTarget));
}

/**
 * Bootstrap phase: settings are not loaded yet, so env vars are read directly.
 */
function initRootLogger(): pino.Logger {
  const dataDir = process.env["AGENT_DATA_DIR"] || "data";
  return createRootLogger(
    level,
    join(dataDir, "logs/runtime.log"),
    process.env["AGENT_LOG_CONSOLE_ENABLED"] === "true",
    process.env["NODE_ENV"],
  );
}

const rootLogger = initRootLogger();

/**
 * Get a child logger with a module name.
 */
export function getLogger(name: string): pino.Logger {
  return rootLogger.child({ module: name });
}

/**
 * Reinitialize the root logger once settings are loaded.
 * All parameters come from settings; no direct env var reads.
 */
export function reinitLogger(
  logLevel: string,
  logFile: string,
  logConsoleEnabled?: boolean,
  nodeEnv?: string,
): void {
  const newLogger = createRootLogger(logLevel, logFile, logConsoleEnabled, nodeEnv);

  // Replace the root logger's bindings and streams in place so existing
  // child loggers pick up the new destination.
  Object.assign(rootLogger, newLogger);
  rootLogger.level = logLevel;
}

export { rootLogger };
