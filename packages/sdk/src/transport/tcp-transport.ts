import net from "node:net";
import {
  LaunchedProcess,
  describeExit,
  type ProcessSpec,
  type SpawnProcess,
} from "./process-launcher.js";
import { StreamTransport, type StreamTransportOptions, type TransportStreams } from "./transport.js";

const DEFAULT_STARTUP_TIMEOUT_MS = 10_000;
const SOCKET_CLOSE_TIMEOUT_MS = 1_000;
const LISTENING_PATTERN = /listening on port (\d+)/i;

export interface TcpTransportOptions extends StreamTransportOptions {
  host: string;
  /** Ignored when `server` is set; the spawned process announces its port. */
  port: number;
  /** Spawn and own a server in TCP mode before connecting. */
  server?: ProcessSpec;
  spawnProcess?: SpawnProcess;
  startupTimeoutMs?: number;
  stopGraceMs?: number;
}

export class TcpTransport extends StreamTransport {
  readonly kind = "tcp" as const;

  private readonly options: TcpTransportOptions;
  private socket: net.Socket | null = null;
  private process: LaunchedProcess | null = null;
  private connectedPort: number | null = null;

  constructor(options: TcpTransportOptions) {
    super(options);
    this.options = options;
  }

  describe(): string {
    return `tcp agent server (${this.options.host}:${this.connectedPort ?? this.options.port})`;
  }

  protected async openStreams(): Promise<TransportStreams> {
    let port = this.options.port;
    if (this.options.server) {
      const launched = await LaunchedProcess.launch(this.options.server, {
        logger: this.logger,
        spawnProcess: this.options.spawnProcess,
        stopGraceMs: this.options.stopGraceMs,
      });
      this.process = launched;
      port = await waitForListeningPort(
        launched,
        this.options.startupTimeoutMs ?? DEFAULT_STARTUP_TIMEOUT_MS
      );
      launched.onExit((exit) => {
        this.markClosed({
          reason: `Agent server exited with ${describeExit(exit)}`,
          expected: false,
        });
      });
    }

    const socket = await connectSocket(this.options.host, port);
    this.socket = socket;
    this.connectedPort = port;
    this.logger.debug({ host: this.options.host, port }, "Connected to agent server");

    socket.on("close", () => {
      this.markClosed({ reason: `${this.describe()} closed the connection`, expected: false });
    });
    return { input: socket, output: socket };
  }

  protected async releaseResources(): Promise<void> {
    const socket = this.socket;
    if (socket && !socket.destroyed) {
      await new Promise<void>((resolve) => {
        const timer = setTimeout(() => {
          socket.destroy();
          resolve();
        }, SOCKET_CLOSE_TIMEOUT_MS);
        socket.once("close", () => {
          clearTimeout(timer);
          resolve();
        });
        socket.end();
      });
    }
    if (this.process) {
      await this.process.stop();
    }
  }

  protected forceReleaseResources(): void {
    this.socket?.destroy();
    this.process?.forceKill();
  }
}

function connectSocket(host: string, port: number): Promise<net.Socket> {
  return new Promise<net.Socket>((resolve, reject) => {
    const socket = net.connect({ host, port });
    const onError = (error: Error): void => {
      socket.destroy();
      reject(error);
    };
    socket.once("error", onError);
    socket.once("connect", () => {
      socket.off("error", onError);
      socket.setNoDelay(true);
      resolve(socket);
    });
  });
}

/**
 * Waits for the spawned server to print its `listening on port N` line.
 */
export function waitForListeningPort(launched: LaunchedProcess, timeoutMs: number): Promise<number> {
  const stdout = launched.child.stdout;
  if (!stdout) {
    launched.forceKill();
    return Promise.reject(new Error("Agent server was spawned without a stdout pipe"));
  }
  const earlyExit = launched.exitInfo;
  if (earlyExit) {
    return Promise.reject(
      new Error(`Agent server exited with ${describeExit(earlyExit)} before listening`)
    );
  }

  return new Promise<number>((resolve, reject) => {
    let output = "";
    const cleanup = (): void => {
      clearTimeout(timer);
      stdout.off("data", onData);
      unsubscribeExit();
    };
    const onData = (chunk: Buffer | string): void => {
      output += chunk.toString();
      const match = LISTENING_PATTERN.exec(output);
      if (match) {
        cleanup();
        resolve(Number(match[1]));
      }
    };
    const timer = setTimeout(() => {
      cleanup();
      launched.forceKill();
      reject(new Error(`Agent server did not announce a port within ${timeoutMs}ms`));
    }, timeoutMs);
    const unsubscribeExit = launched.onExit((exit) => {
      cleanup();
      const stderr = launched.stderrTail();
      reject(
        new Error(
          stderr
            ? `Agent server exited with ${describeExit(exit)} before listening: ${stderr}`
            : `Agent server exited with ${describeExit(exit)} before listening`
        )
      );
    });
    stdout.on("data", onData);
  });
}
