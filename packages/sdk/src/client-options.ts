import type pino from "pino";
import { z } from "zod";
import type { HealthCheckOptions, RestartOptions } from "./connection/connection-manager.js";
import { parseCliUrl, type CliAddress } from "./transport/cli-url.js";
import type { ProcessSpec, SpawnProcess } from "./transport/process-launcher.js";
import type { TransportSettings } from "./transport/transport-factory.js";
import type { TransportFactory } from "./transport/transport.js";
import { parseOrThrow } from "./validation.js";

export const AUTH_TOKEN_ENV = "AGENTLINK_SDK_AUTH_TOKEN";
export const DEFAULT_CLI_PATH = "agent";
export const DEFAULT_REQUEST_TIMEOUT_MS = 10 * 60_000;

export const SERVER_LOG_LEVELS = ["none", "error", "warning", "info", "debug", "all"] as const;
export type ServerLogLevel = (typeof SERVER_LOG_LEVELS)[number];

const positiveInt = z.number().int().positive();

const ClientOptionsSchema = z
  .object({
    cliPath: z.string().min(1).optional(),
    cliArgs: z.array(z.string()).optional(),
    cwd: z.string().min(1).optional(),
    port: z.number().int().min(0).max(65_535).optional(),
    useStdio: z.boolean().optional(),
    cliUrl: z.string().min(1).optional(),
    logLevel: z.enum(SERVER_LOG_LEVELS).optional(),
    autoStart: z.boolean().optional(),
    autoRestart: z.boolean().optional(),
    env: z.record(z.string().optional()).optional(),
    authToken: z.string().min(1).optional(),
    useLoggedInUser: z.boolean().optional(),
    requestTimeoutMs: positiveInt.optional(),
    healthCheck: z
      .object({
        intervalMs: z.number().int().min(0).optional(),
        timeoutMs: positiveInt.optional(),
        maxFailures: positiveInt.optional(),
      })
      .optional(),
    restart: z
      .object({
        maxAttempts: z.number().int().min(0).optional(),
        baseDelayMs: positiveInt.optional(),
        maxDelayMs: positiveInt.optional(),
      })
      .optional(),
  })
  .superRefine((options, ctx) => {
    if (options.cliUrl === undefined) {
      return;
    }
    if (options.useStdio !== undefined || options.cliPath !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["cliUrl"],
        message: "cliUrl is mutually exclusive with useStdio and cliPath",
      });
    }
    if (options.authToken !== undefined || options.useLoggedInUser !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["cliUrl"],
        message:
          "authToken and useLoggedInUser cannot be used with cliUrl (the external server manages its own auth)",
      });
    }
  });

type DataOptions = z.input<typeof ClientOptionsSchema>;

export interface ClientOptions extends DataOptions {
  /** Replaces the SDK's own pino logger. */
  logger?: pino.Logger;
  /** Supplies transports directly; the process and socket options are then unused. */
  transportFactory?: TransportFactory;
  spawnProcess?: SpawnProcess;
}

export type ResolvedClientOptions = {
  cliPath: string;
  cliArgs: string[];
  cwd: string;
  port: number;
  useStdio: boolean;
  cliUrl: CliAddress | null;
  logLevel: ServerLogLevel;
  autoStart: boolean;
  autoRestart: boolean;
  env: NodeJS.ProcessEnv;
  authToken: string | undefined;
  useLoggedInUser: boolean;
  requestTimeoutMs: number;
  healthCheck: Partial<HealthCheckOptions>;
  restart: Partial<RestartOptions>;
};

/**
 * Validates options and fills in defaults. Runs synchronously in the client
 * constructor, so conflicts surface before any process or socket is touched.
 */
export function resolveClientOptions(
  options: ClientOptions = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedClientOptions {
  // Unknown keys, the injected logger and factories among them, are stripped here.
  const parsed = parseOrThrow(ClientOptionsSchema, options, "client options");
  const cliUrl = parsed.cliUrl === undefined ? null : parseCliUrl(parsed.cliUrl);

  return {
    cliPath: parsed.cliPath ?? env.AGENTLINK_CLI_PATH ?? DEFAULT_CLI_PATH,
    cliArgs: parsed.cliArgs ?? [],
    cwd: parsed.cwd ?? process.cwd(),
    port: parsed.port ?? 0,
    useStdio: cliUrl ? false : parsed.useStdio ?? true,
    cliUrl,
    logLevel: parsed.logLevel ?? "info",
    autoStart: parsed.autoStart ?? true,
    autoRestart: parsed.autoRestart ?? true,
    env: { ...(parsed.env ?? env) },
    authToken: parsed.authToken,
    useLoggedInUser: parsed.useLoggedInUser ?? parsed.authToken === undefined,
    requestTimeoutMs: parsed.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
    healthCheck: parsed.healthCheck ?? {},
    restart: parsed.restart ?? {},
  };
}

export function buildServerArgs(options: ResolvedClientOptions): string[] {
  const args = [...options.cliArgs, "--server", "--log-level", options.logLevel];
  if (options.useStdio) {
    args.push("--stdio");
  } else if (options.port > 0) {
    args.push("--port", String(options.port));
  }
  if (options.authToken !== undefined) {
    args.push("--auth-token-env", AUTH_TOKEN_ENV);
  }
  if (!options.useLoggedInUser) {
    args.push("--no-auto-login");
  }
  return args;
}

export function buildServerProcess(options: ResolvedClientOptions): ProcessSpec {
  const env: NodeJS.ProcessEnv = { ...options.env };
  if (options.authToken !== undefined) {
    env[AUTH_TOKEN_ENV] = options.authToken;
  }
  return {
    command: options.cliPath,
    args: buildServerArgs(options),
    cwd: options.cwd,
    env,
  };
}

export function toTransportSettings(options: ResolvedClientOptions): TransportSettings {
  if (options.cliUrl) {
    return { mode: "tcp-attach", host: options.cliUrl.host, port: options.cliUrl.port };
  }
  const server = buildServerProcess(options);
  return options.useStdio ? { mode: "stdio", server } : { mode: "tcp-spawn", host: "localhost", server };
}
