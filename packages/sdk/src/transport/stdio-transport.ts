import {
  LaunchedProcess,
  describeExit,
  type ProcessSpec,
  type SpawnProcess,
} from "./process-launcher.js";
import { StreamTransport, type StreamTransportOptions, type TransportStreams } from "./transport.js";

export interface StdioTransportOptions extends StreamTransportOptions {
  server: ProcessSpec;
  spawnProcess?: SpawnProcess;
  stopGraceMs?: number;
}

/** Spawns the agent server and talks to it over its stdin/stdout pipes. */
export class StdioTransport extends StreamTransport {
  readonly kind = "stdio" as const;

  private readonly options: StdioTransportOptions;
  private process: LaunchedProcess | null = null;

  constructor(options: StdioTransportOptions) {
    super(options);
    this.options = options;
  }

  describe(): string {
    return `stdio agent server (${this.options.server.command})`;
  }

  get pid(): number | undefined {
    return this.process?.pid;
  }

  stderrTail(): string {
    return this.process?.stderrTail() ?? "";
  }

  protected async openStreams(): Promise<TransportStreams> {
    const launched = await LaunchedProcess.launch(this.options.server, {
      logger: this.logger,
      spawnProcess: this.options.spawnProcess,
      stopGraceMs: this.options.stopGraceMs,
    });
    this.process = launched;

    const { stdin, stdout } = launched.child;
    if (!stdin || !stdout) {
      launched.forceKill();
      throw new Error("Agent server was spawned without stdio pipes");
    }

    launched.onExit((exit) => {
      const stderr = launched.stderrTail();
      this.markClosed({
        reason: stderr
          ? `Agent server exited with ${describeExit(exit)}: ${stderr}`
          : `Agent server exited with ${describeExit(exit)}`,
        expected: false,
      });
    });

    return { input: stdout, output: stdin };
  }

  protected releaseResources(): Promise<void> {
    return this.process ? this.process.stop() : Promise.resolve();
  }

  protected forceReleaseResources(): void {
    this.process?.forceKill();
  }
}
