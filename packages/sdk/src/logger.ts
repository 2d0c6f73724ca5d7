import pino from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";
export type LogFormat = "pretty" | "json";

export interface ResolvedLogConfig {
  level: LogLevel;
  format: LogFormat;
}

export interface LogConfigOverrides {
  level?: LogLevel;
  format?: LogFormat;
}

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];
const LOG_FORMATS: readonly LogFormat[] = ["pretty", "json"];

function readEnvLevel(): LogLevel | undefined {
  const raw = process.env.AGENTLINK_LOG?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === raw);
}

function readEnvFormat(): LogFormat | undefined {
  const raw = process.env.AGENTLINK_LOG_FORMAT?.trim().toLowerCase();
  return LOG_FORMATS.find((format) => format === raw);
}

export function resolveLogConfig(
  overrides: LogConfigOverrides | undefined,
  defaults: ResolvedLogConfig = { level: "warn", format: "json" }
): ResolvedLogConfig {
  const level: LogLevel = readEnvLevel() ?? overrides?.level ?? defaults.level;
  const format: LogFormat = readEnvFormat() ?? overrides?.format ?? defaults.format;
  return { level, format };
}

// Log lines never share stdout with the embedding program's own output.
const LOG_FD = 2;

export function createRootLogger(
  overrides?: LogConfigOverrides,
  defaults?: ResolvedLogConfig
): pino.Logger {
  const config = resolveLogConfig(overrides, defaults);
  const options = { name: "agentlink", level: config.level };

  if (config.format === "pretty") {
    return pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          singleLine: true,
          ignore: "pid,hostname",
          destination: LOG_FD,
        },
      },
    });
  }
  return pino(options, pino.destination(LOG_FD));
}

export function createChildLogger(parent: pino.Logger, name: string): pino.Logger {
  return parent.child({ name });
}
