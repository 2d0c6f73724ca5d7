import { spawn, type SpawnOptions } from "node:child_process";
import type { Readable, Writable } from "node:stream";
import type pino from "pino";

const DEFAULT_STOP_GRACE_MS = 500;
const STDERR_TAIL_BYTES = 8192;

/** The slice of `ChildProcess` the launcher relies on. */
export interface ChildProcessLike {
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  readonly pid?: number | undefined;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals | number): boolean;
  once(event: string, listener: (...args: unknown[]) => void): unknown;
  on(event: string, listener: (...args: unknown[]) => void): unknown;
  off(event: string, listener: (...args: unknown[]) => void): unknown;
}

export type SpawnProcess = (
  command: string,
  args: readonly string[],
  options: SpawnOptions
) => ChildProcessLike;

export const spawnChildProcess: SpawnProcess = (command, args, options) =>
  spawn(command, args, options);

export type ProcessSpec = {
  command: string;
  args: string[];
  cwd: string;
  env: NodeJS.ProcessEnv;
};

export type ProcessExit = {
  code: number | null;
  signal: NodeJS.Signals | null;
};

export interface LaunchOptions {
  logger: pino.Logger;
  spawnProcess?: SpawnProcess;
  stopGraceMs?: number;
}

/**
 * Scripts are run through the current Node executable so a `.js` entry point
 * works without a shebang or execute bit.
 */
export function resolveCommand(spec: ProcessSpec): { command: string; args: string[] } {
  if (spec.command.endsWith(".js")) {
    return { command: process.execPath, args: [spec.command, ...spec.args] };
  }
  return { command: spec.command, args: spec.args };
}

export function describeExit(exit: ProcessExit): string {
  if (exit.signal) {
    return `signal ${exit.signal}`;
  }
  return `code ${exit.code ?? "null"}`;
}

export class LaunchedProcess {
  private exit: ProcessExit | null = null;
  private stderrBuffer = "";
  private readonly exitHandlers = new Set<(exit: ProcessExit) => void>();
  private readonly stopGraceMs: number;
  private stopPromise: Promise<void> | null = null;

  private constructor(
    readonly child: ChildProcessLike,
    readonly spec: ProcessSpec,
    private readonly logger: pino.Logger,
    stopGraceMs: number
  ) {
    this.stopGraceMs = stopGraceMs;

    child.stderr?.on("data", (chunk: Buffer | string) => {
      const text = chunk.toString();
      this.logger.debug({ stderr: text.trimEnd() }, "Agent server stderr");
      this.stderrBuffer += text;
      if (this.stderrBuffer.length > STDERR_TAIL_BYTES) {
        this.stderrBuffer = this.stderrBuffer.slice(-STDERR_TAIL_BYTES);
      }
    });

    child.once("exit", () => {
      this.exit = { code: child.exitCode, signal: child.signalCode };
      this.logger.debug({ pid: child.pid, ...this.exit }, "Agent server exited");
      for (const handler of Array.from(this.exitHandlers)) {
        handler(this.exit);
      }
      this.exitHandlers.clear();
    });
  }

  /** Spawns the process and waits until the OS reports it started (or failed to). */
  static async launch(spec: ProcessSpec, options: LaunchOptions): Promise<LaunchedProcess> {
    const spawnProcess = options.spawnProcess ?? spawnChildProcess;
    const { command, args } = resolveCommand(spec);
    options.logger.debug({ command, args, cwd: spec.cwd }, "Spawning agent server");

    const child = spawnProcess(command, args, {
      cwd: spec.cwd,
      env: spec.env,
      stdio: ["pipe", "pipe", "pipe"],
      windowsHide: true,
    });
    const launched = new LaunchedProcess(
      child,
      spec,
      options.logger,
      options.stopGraceMs ?? DEFAULT_STOP_GRACE_MS
    );

    await new Promise<void>((resolve, reject) => {
      const onSpawn = (): void => {
        child.off("error", onError);
        resolve();
      };
      const onError = (error: unknown): void => {
        child.off("spawn", onSpawn);
        reject(error instanceof Error ? error : new Error(String(error)));
      };
      child.once("spawn", onSpawn);
      child.once("error", onError);
    });

    child.on("error", (error) => {
      launched.logger.warn({ err: error }, "Agent server process error");
    });
    return launched;
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  get exited(): boolean {
    return this.exit !== null;
  }

  get exitInfo(): ProcessExit | null {
    return this.exit;
  }

  stderrTail(): string {
    return this.stderrBuffer.trim();
  }

  onExit(handler: (exit: ProcessExit) => void): () => void {
    if (this.exit) {
      handler(this.exit);
      return () => undefined;
    }
    this.exitHandlers.add(handler);
    return () => {
      this.exitHandlers.delete(handler);
    };
  }

  /**
   * Closes stdin, then escalates to SIGTERM and SIGKILL if the process keeps
   * running. Rejects when the process survives all three steps.
   */
  stop(): Promise<void> {
    if (!this.stopPromise) {
      this.stopPromise = this.runStopSequence();
    }
    return this.stopPromise;
  }

  forceKill(): void {
    if (this.exit) {
      return;
    }
    this.child.kill("SIGKILL");
  }

  private async runStopSequence(): Promise<void> {
    if (this.exit) {
      return;
    }
    this.child.stdin?.end();
    if (await this.waitForExit(this.stopGraceMs)) {
      return;
    }

    this.logger.debug({ pid: this.pid }, "Agent server ignored stdin close, sending SIGTERM");
    this.child.kill("SIGTERM");
    if (await this.waitForExit(this.stopGraceMs)) {
      return;
    }

    this.logger.warn({ pid: this.pid }, "Agent server ignored SIGTERM, sending SIGKILL");
    this.child.kill("SIGKILL");
    if (await this.waitForExit(this.stopGraceMs)) {
      return;
    }
    throw new Error(`Agent server process ${this.pid ?? "<unknown>"} did not exit after SIGKILL`);
  }

  private waitForExit(timeoutMs: number): Promise<boolean> {
    if (this.exit) {
      return Promise.resolve(true);
    }
    return new Promise<boolean>((resolve) => {
      const timer = setTimeout(() => {
        unsubscribe();
        resolve(false);
      }, timeoutMs);
      const unsubscribe = this.onExit(() => {
        clearTimeout(timer);
        resolve(true);
      });
    });
  }
}
