import type { Readable, Writable } from "node:stream";
import type pino from "pino";
import { ConnectionClosedError, ProtocolError, describeError } from "../errors.js";
import { LineFramer } from "./line-framer.js";
import { Pushable } from "./pushable.js";

export type TransportKind = "stdio" | "tcp";

export type InboundFrame =
  | { kind: "frame"; text: string }
  | { kind: "error"; error: ProtocolError };

export type TransportCloseEvent = {
  reason: string;
  /** True when the client asked for the close. */
  expected: boolean;
};

/**
 * A byte channel to the agent server. Stdio and TCP are two variants of the
 * same capability, so the connection manager never branches on which one it
 * holds.
 */
export interface AgentTransport {
  readonly kind: TransportKind;
  open(): Promise<void>;
  send(frame: string): Promise<void>;
  /** Inbound frames for the current open; ends when the channel closes. */
  frames(): AsyncIterable<InboundFrame>;
  onClose(handler: (event: TransportCloseEvent) => void): () => void;
  close(): Promise<void>;
  forceClose(): void;
  describe(): string;
}

export type TransportFactory = () => AgentTransport;

export type TransportStreams = {
  input: Readable;
  output: Writable;
};

export interface StreamTransportOptions {
  logger: pino.Logger;
  maxFrameBytes?: number;
}

type StreamTransportState = "idle" | "opening" | "open" | "closed";

/**
 * Shared newline-delimited framing, serialized writes and exactly-once close
 * for transports that end up as a readable/writable pair.
 */
export abstract class StreamTransport implements AgentTransport {
  abstract readonly kind: TransportKind;

  protected readonly logger: pino.Logger;
  private readonly framer: LineFramer;
  private inbound: Pushable<InboundFrame> = new Pushable();
  private output: Writable | null = null;
  private writeChain: Promise<void> = Promise.resolve();
  private closeHandlers = new Set<(event: TransportCloseEvent) => void>();
  private state: StreamTransportState = "idle";
  private closeEvent: TransportCloseEvent | null = null;
  private releasePromise: Promise<void> | null = null;

  constructor(options: StreamTransportOptions) {
    this.logger = options.logger;
    this.framer = new LineFramer(options.maxFrameBytes);
  }

  protected abstract openStreams(): Promise<TransportStreams>;
  protected abstract releaseResources(): Promise<void>;
  protected abstract forceReleaseResources(): void;
  abstract describe(): string;

  async open(): Promise<void> {
    if (this.state !== "idle") {
      throw new Error(`Transport cannot be opened while ${this.state}`);
    }
    this.state = "opening";

    let streams: TransportStreams;
    try {
      streams = await this.openStreams();
    } catch (error) {
      this.markClosed({ reason: `Failed to open ${this.describe()}: ${describeError(error)}`, expected: false });
      await this.releasePromise?.catch(() => undefined);
      throw new ConnectionClosedError(`Failed to open ${this.describe()}: ${describeError(error)}`, {
        cause: error,
      });
    }

    if (this.state !== "opening") {
      throw new ConnectionClosedError(this.closeEvent?.reason ?? "Transport closed while opening");
    }

    this.output = streams.output;
    streams.output.on("error", (error) => {
      this.logger.debug({ err: error }, "Transport output error");
    });
    streams.input.on("data", (chunk: Buffer | string) => this.handleChunk(chunk));
    streams.input.on("end", () => this.handleInputEnded());
    streams.input.on("error", (error) => {
      this.logger.debug({ err: error }, "Transport input error");
      this.handleInputEnded();
    });
    this.state = "open";
  }

  frames(): AsyncIterable<InboundFrame> {
    return this.inbound;
  }

  send(frame: string): Promise<void> {
    if (this.state !== "open" || !this.output) {
      return Promise.reject(
        new ConnectionClosedError(this.closeEvent?.reason ?? `Transport not open (${this.state})`)
      );
    }
    const task = this.writeChain.then(() => this.writeFrame(frame));
    this.writeChain = task.catch(() => undefined);
    return task;
  }

  onClose(handler: (event: TransportCloseEvent) => void): () => void {
    if (this.closeEvent) {
      handler(this.closeEvent);
    }
    this.closeHandlers.add(handler);
    return () => {
      this.closeHandlers.delete(handler);
    };
  }

  close(): Promise<void> {
    this.markClosed({ reason: "Transport closed by client", expected: true });
    return this.releasePromise ?? Promise.resolve();
  }

  forceClose(): void {
    if (this.state === "closed" && this.releasePromise) {
      this.forceReleaseResources();
      return;
    }
    this.markClosed({ reason: "Transport force-closed by client", expected: true }, { skipRelease: true });
    this.forceReleaseResources();
  }

  get isOpen(): boolean {
    return this.state === "open";
  }

  /**
   * Ends the inbound sequence and releases the underlying resource. Only the
   * first call has any effect.
   */
  protected markClosed(event: TransportCloseEvent, options?: { skipRelease?: boolean }): void {
    if (this.state === "closed") {
      return;
    }
    const wasIdle = this.state === "idle";
    this.state = "closed";
    this.closeEvent = event;
    this.output = null;
    this.inbound.end();

    if (!wasIdle && !options?.skipRelease) {
      this.releasePromise = this.releaseResources();
      if (!event.expected) {
        this.releasePromise.catch((error: unknown) => {
          this.logger.warn({ err: error }, "Failed to release transport resources");
        });
      }
    }

    for (const handler of Array.from(this.closeHandlers)) {
      try {
        handler(event);
      } catch (error) {
        this.logger.warn({ err: error }, "Transport close handler failed");
      }
    }
  }

  private writeFrame(frame: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const output = this.output;
      if (!output || this.state !== "open") {
        reject(new ConnectionClosedError(this.closeEvent?.reason ?? "Transport closed"));
        return;
      }
      output.write(`${frame}\n`, (error) => {
        if (error) {
          reject(new ConnectionClosedError(`Write failed: ${error.message}`, { cause: error }));
          return;
        }
        resolve();
      });
    });
  }

  private handleChunk(chunk: Buffer | string): void {
    for (const item of this.framer.push(chunk)) {
      this.inbound.push(toInboundFrame(item));
    }
  }

  private handleInputEnded(): void {
    if (this.state === "closed") {
      return;
    }
    for (const item of this.framer.finish()) {
      this.inbound.push(toInboundFrame(item));
    }
    this.markClosed({ reason: `${this.describe()} closed its output`, expected: false });
  }
}

function toInboundFrame(
  item: { kind: "frame"; text: string } | { kind: "error"; message: string }
): InboundFrame {
  return item.kind === "frame"
    ? item
    : { kind: "error", error: new ProtocolError(item.message) };
}
