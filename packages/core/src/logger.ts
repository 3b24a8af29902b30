import { pino } from "pino";
import { loadConfig } from "@faultpath/config";
import type { LogEventKind, LogSink } from "./state/types.js";

// =============================================================================
// Structured Logger
// =============================================================================
//
// Usage patterns:
//
// SUMMARY (info level):
//   log.codepath.info({ expected: 3, triggered: 3 }, "exhausted")
//
// ANOMALY (warn level):
//   log.codepath.warn({ ordinal: 2 }, "codepath did not fail")
//
// DEBUG (mode changes, verbose):
//   log.state.debug({ ordinal: 4 }, "trigger mode")
//
// The base logger is built on first use, so importing the package never
// reads configuration.
//
// =============================================================================

let baseLogger: pino.Logger | null = null;

function createLogger(): pino.Logger {
  const config = loadConfig();

  // Base logger configuration
  const baseConfig: pino.LoggerOptions = {
    level: config.LOG_LEVEL,

    // Custom log levels formatting
    formatters: {
      level: (label) => ({ level: label }),
    },

    // Timestamp format
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  // Pretty printing only when asked for
  return config.LOG_PRETTY && config.NODE_ENV !== "production"
    ? pino({
        ...baseConfig,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss.l",
            ignore: "pid,hostname",
            messageFormat: "{component} | {msg}",
            singleLine: true,
          },
        },
      })
    : pino(baseConfig);
}

export function getLogger(): pino.Logger {
  if (baseLogger === null) {
    baseLogger = createLogger();
  }
  return baseLogger;
}

// =============================================================================
// Component Loggers
// =============================================================================

type Component = "state" | "probe" | "codepath" | "report";

const children = new Map<Component, pino.Logger>();

function component(name: Component): pino.Logger {
  let child = children.get(name);
  if (child === undefined) {
    child = getLogger().child({ component: name });
    children.set(name, child);
  }
  return child;
}

export const log = {
  // Mode changes of the injection state
  get state(): pino.Logger {
    return component("state");
  },

  // Probe events routed through createPinoSink
  get probe(): pino.Logger {
    return component("probe");
  },

  // Exhaustion runs
  get codepath(): pino.Logger {
    return component("codepath");
  },

  // CodePathResult reports
  get report(): pino.Logger {
    return component("report");
  },
};

// =============================================================================
// Log Sink Adapter
// =============================================================================

const SINK_LEVELS: Record<LogEventKind, "warn" | "info" | "debug"> = {
  anomaly: "warn",
  "unexpected-failure": "warn",
  triggered: "info",
  progress: "debug",
};

/**
 * Route injection-state messages into a pino logger.
 *
 * @example
 * setLogger(createPinoSink());
 */
export function createPinoSink(target: pino.Logger = log.probe): LogSink {
  return (message, event) => {
    target[SINK_LEVELS[event.kind]]({ kind: event.kind, location: event.location }, message);
  };
}

export default log;
