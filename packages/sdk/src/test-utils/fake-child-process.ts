import { EventEmitter } from "node:events";
import { PassThrough } from "node:stream";
import type { SpawnOptions } from "node:child_process";
import type { ChildProcessLike, SpawnProcess } from "../transport/process-launcher.js";

export type FakeExitTrigger = "stdin-end" | "SIGTERM" | "SIGKILL";

export interface FakeChildProcessOptions {
  /** The first step of the stop sequence the fake obeys. SIGKILL always works. */
  exitOn?: FakeExitTrigger;
  /** Emit `error` with this code instead of `spawn`. */
  failSpawnWith?: string;
}

/** A child process made of in-memory streams, for transport tests. */
export class FakeChildProcess extends EventEmitter implements ChildProcessLike {
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly pid = 4242;
  exitCode: number | null = null;
  signalCode: NodeJS.Signals | null = null;
  readonly signals: (NodeJS.Signals | number | undefined)[] = [];
  written = "";

  private readonly exitOn: FakeExitTrigger;

  constructor(options: FakeChildProcessOptions = {}) {
    super();
    this.exitOn = options.exitOn ?? "stdin-end";
    this.stdin.setEncoding("utf8");
    this.stdin.on("data", (chunk: string) => {
      this.written += chunk;
    });
    this.stdin.on("end", () => {
      if (this.exitOn === "stdin-end") {
        this.exit(0);
      }
    });

    const failure = options.failSpawnWith;
    process.nextTick(() => {
      if (failure) {
        this.emit("error", Object.assign(new Error(`spawn ${failure}`), { code: failure }));
        return;
      }
      this.emit("spawn");
    });
  }

  /** Frames the transport wrote to stdin, without their newlines. */
  writtenFrames(): string[] {
    return this.written.split("\n").filter((line) => line.length > 0);
  }

  kill(signal?: NodeJS.Signals | number): boolean {
    this.signals.push(signal);
    if (signal === "SIGKILL" || (signal === "SIGTERM" && this.exitOn !== "SIGKILL")) {
      this.exit(null, signal);
    }
    return true;
  }

  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    if (this.exitCode !== null || this.signalCode !== null) {
      return;
    }
    this.exitCode = code;
    this.signalCode = signal;
    this.emit("exit", code, signal);
    this.stdout.end();
    this.stderr.end();
    this.emit("close", code, signal);
  }
}

export type RecordedSpawn = {
  command: string;
  args: readonly string[];
  options: SpawnOptions;
  child: FakeChildProcess;
};

/** Returns a spawn function that hands out fakes and records every call. */
export function createFakeSpawn(options: FakeChildProcessOptions = {}): {
  spawnProcess: SpawnProcess;
  calls: RecordedSpawn[];
} {
  const calls: RecordedSpawn[] = [];
  const spawnProcess: SpawnProcess = (command, args, spawnOptions) => {
    const child = new FakeChildProcess(options);
    calls.push({ command, args, options: spawnOptions, child });
    return child;
  };
  return { spawnProcess, calls };
}
