import type pino from "pino";
import type { ProcessSpec, SpawnProcess } from "./process-launcher.js";
import { StdioTransport } from "./stdio-transport.js";
import { TcpTransport } from "./tcp-transport.js";
import type { TransportFactory } from "./transport.js";

export type TransportSettings =
  | { mode: "stdio"; server: ProcessSpec }
  | { mode: "tcp-spawn"; host: string; server: ProcessSpec }
  | { mode: "tcp-attach"; host: string; port: number };

export interface TransportFactoryOptions {
  logger: pino.Logger;
  spawnProcess?: SpawnProcess;
  maxFrameBytes?: number;
}

/** Every call yields a fresh, unopened transport, so a restart never reuses a dead channel. */
export function createTransportFactory(
  settings: TransportSettings,
  options: TransportFactoryOptions
): TransportFactory {
  const { logger, spawnProcess, maxFrameBytes } = options;
  switch (settings.mode) {
    case "stdio":
      return () =>
        new StdioTransport({ logger, maxFrameBytes, spawnProcess, server: settings.server });
    case "tcp-spawn":
      return () =>
        new TcpTransport({
          logger,
          maxFrameBytes,
          spawnProcess,
          host: settings.host,
          port: 0,
          server: settings.server,
        });
    case "tcp-attach":
      return () =>
        new TcpTransport({ logger, maxFrameBytes, host: settings.host, port: settings.port });
  }
}
