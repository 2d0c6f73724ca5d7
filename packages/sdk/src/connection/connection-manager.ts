import type pino from "pino";
import type { CorrelationRouter } from "../correlation/router.js";
import {
  ConnectionClosedError,
  ProtocolVersionError,
  describeError,
  toError,
} from "../errors.js";
import { DecodeFailureTracker, DEFAULT_DECODE_FAILURE_THRESHOLD, decodeEnvelope } from "../protocol/codec.js";
import { METHODS, PingResponseSchema, SDK_PROTOCOL_VERSION } from "../protocol/messages.js";
import type { AgentTransport, TransportCloseEvent, TransportFactory } from "../transport/transport.js";

export type ConnectionState =
  | { status: "disconnected"; reason?: string }
  | { status: "connecting"; attempt: number }
  | { status: "connected" }
  | { status: "error"; reason: string };

export type ConnectionStatus = ConnectionState["status"];

export type HealthCheckOptions = {
  /** Zero disables the periodic ping. */
  intervalMs: number;
  timeoutMs: number;
  maxFailures: number;
};

export type RestartOptions = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
};

export const DEFAULT_HEALTH_CHECK: HealthCheckOptions = {
  intervalMs: 30_000,
  timeoutMs: 5_000,
  maxFailures: 3,
};

export const DEFAULT_RESTART: RestartOptions = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 10_000,
};

const DEFAULT_HANDSHAKE_TIMEOUT_MS = 30_000;

export interface ConnectionManagerOptions {
  logger: pino.Logger;
  router: CorrelationRouter;
  transportFactory: TransportFactory;
  autoRestart: boolean;
  healthCheck?: Partial<HealthCheckOptions>;
  restart?: Partial<RestartOptions>;
  handshakeTimeoutMs?: number;
  decodeFailureThreshold?: number;
}

type RestartedListener = () => void | Promise<void>;
type LostListener = (error: Error) => void;

export function restartDelay(attempt: number, options: RestartOptions): number {
  return Math.min(options.baseDelayMs * 2 ** attempt, options.maxDelayMs);
}

/**
 * Owns the transport for one client: opens it, verifies the protocol version,
 * feeds inbound frames to the router, pings it, and restarts it when it dies.
 */
export class ConnectionManager {
  private readonly logger: pino.Logger;
  private readonly router: CorrelationRouter;
  private readonly transportFactory: TransportFactory;
  private readonly autoRestart: boolean;
  private readonly healthCheck: HealthCheckOptions;
  private readonly restart: RestartOptions;
  private readonly handshakeTimeoutMs: number;
  private readonly decodeFailureThreshold: number;

  private state: ConnectionState = { status: "disconnected" };
  private transport: AgentTransport | null = null;
  private inFlight: Promise<void> | null = null;
  private closing = false;
  private lastError: Error | null = null;
  private healthTimer: ReturnType<typeof setInterval> | null = null;
  private healthCheckInFlight = false;
  private healthFailures = 0;
  private cancelWait: (() => void) | null = null;
  private readonly stateListeners = new Set<(state: ConnectionState) => void>();
  private readonly restartedListeners = new Set<RestartedListener>();
  private readonly lostListeners = new Set<LostListener>();

  constructor(options: ConnectionManagerOptions) {
    this.logger = options.logger;
    this.router = options.router;
    this.transportFactory = options.transportFactory;
    this.autoRestart = options.autoRestart;
    this.healthCheck = { ...DEFAULT_HEALTH_CHECK, ...options.healthCheck };
    this.restart = { ...DEFAULT_RESTART, ...options.restart };
    this.handshakeTimeoutMs = options.handshakeTimeoutMs ?? DEFAULT_HANDSHAKE_TIMEOUT_MS;
    this.decodeFailureThreshold = options.decodeFailureThreshold ?? DEFAULT_DECODE_FAILURE_THRESHOLD;
  }

  getState(): ConnectionState {
    return this.state;
  }

  get isConnected(): boolean {
    return this.state.status === "connected";
  }

  /** The listener is called with the current state right away. */
  onStateChange(listener: (state: ConnectionState) => void): () => void {
    this.stateListeners.add(listener);
    listener(this.state);
    return () => {
      this.stateListeners.delete(listener);
    };
  }

  /** Called after an automatic restart reconnected; awaited before waiters resume. */
  onRestarted(listener: RestartedListener): () => void {
    this.restartedListeners.add(listener);
    return () => {
      this.restartedListeners.delete(listener);
    };
  }

  /** Called once a lost connection will not come back on its own. */
  onLost(listener: LostListener): () => void {
    this.lostListeners.add(listener);
    return () => {
      this.lostListeners.delete(listener);
    };
  }

  /**
   * Idempotent. Concurrent callers share the same attempt, including an
   * automatic restart that is already under way.
   */
  async connect(): Promise<void> {
    if (this.isConnected) {
      return;
    }
    let pending = this.inFlight;
    if (!pending) {
      this.closing = false;
      pending = this.track(this.openInitial());
    }
    await pending;
    if (!this.isConnected) {
      throw new ConnectionClosedError(this.lastError?.message ?? "Connection lost", {
        cause: this.lastError ?? undefined,
      });
    }
  }

  /** Closes the transport gracefully. Rejects when the transport fails to clean up. */
  async disconnect(): Promise<void> {
    this.closing = true;
    this.cancelWait?.();
    if (this.inFlight) {
      await this.inFlight.catch(() => undefined);
    }
    this.stopHealthChecks();
    const transport = this.transport;
    this.transport = null;
    this.router.detach();
    this.router.failAll(new ConnectionClosedError("Connection closed by client"));
    this.setState({ status: "disconnected", reason: "closed by client" });
    if (transport) {
      await transport.close();
    }
  }

  forceDisconnect(): void {
    this.closing = true;
    this.cancelWait?.();
    this.stopHealthChecks();
    const transport = this.transport;
    this.transport = null;
    this.router.detach();
    transport?.forceClose();
    this.router.failAll(new ConnectionClosedError("Connection force-closed by client"));
    this.setState({ status: "disconnected", reason: "force-closed by client" });
  }

  private async openInitial(): Promise<void> {
    try {
      await this.openConnection(0);
    } catch (error) {
      this.lastError = toError(error);
      this.setState({ status: "disconnected", reason: this.lastError.message });
      throw error;
    }
  }

  private async openConnection(attempt: number): Promise<void> {
    this.setState({ status: "connecting", attempt });
    const transport = this.transportFactory();
    this.transport = transport;
    transport.onClose((event) => this.handleTransportClosed(transport, event));

    try {
      await transport.open();
      this.router.attach((frame) => transport.send(frame));
      void this.runReader(transport);
      await this.verifyProtocolVersion();
      if (this.closing) {
        throw new ConnectionClosedError("Connection closed by client");
      }
    } catch (error) {
      if (this.transport === transport) {
        this.transport = null;
        this.router.detach();
      }
      await transport.close().catch((closeError: unknown) => {
        this.logger.debug({ err: closeError }, "Failed to close transport after a failed connect");
      });
      throw error;
    }

    this.logger.info({ transport: transport.describe(), attempt }, "Connected to agent server");
    this.lastError = null;
    this.setState({ status: "connected" });
    this.startHealthChecks(transport);
  }

  private async verifyProtocolVersion(): Promise<void> {
    const response = await this.router.request(METHODS.ping, {}, PingResponseSchema, {
      timeoutMs: this.handshakeTimeoutMs,
    });
    const actual = response.protocolVersion ?? null;
    if (actual !== SDK_PROTOCOL_VERSION) {
      throw new ProtocolVersionError(SDK_PROTOCOL_VERSION, actual);
    }
  }

  private async runReader(transport: AgentTransport): Promise<void> {
    const tracker = new DecodeFailureTracker(this.decodeFailureThreshold);
    try {
      for await (const frame of transport.frames()) {
        if (frame.kind === "error") {
          this.recordDecodeFailure(transport, tracker, frame.error);
          continue;
        }
        const decoded = decodeEnvelope(frame.text);
        if (!decoded.ok) {
          this.recordDecodeFailure(transport, tracker, decoded.error);
          continue;
        }
        tracker.recordSuccess();
        this.router.handleEnvelope(decoded.envelope);
      }
    } catch (error) {
      this.logger.error({ err: error }, "Reader loop failed");
      this.handleConnectionFailure(
        transport,
        new ConnectionClosedError(`Reader loop failed: ${describeError(error)}`, { cause: error })
      );
    }
  }

  private recordDecodeFailure(
    transport: AgentTransport,
    tracker: DecodeFailureTracker,
    error: Error & { frame?: string | null }
  ): void {
    this.logger.warn({ err: error, frame: error.frame }, "Discarding undecodable frame");
    if (tracker.recordFailure()) {
      this.handleConnectionFailure(
        transport,
        new ConnectionClosedError(
          `Connection unhealthy: ${tracker.consecutiveFailures} consecutive undecodable frames`
        )
      );
    }
  }

  private handleTransportClosed(transport: AgentTransport, event: TransportCloseEvent): void {
    if (event.expected) {
      return;
    }
    this.logger.warn({ reason: event.reason }, "Agent server connection closed unexpectedly");
    this.handleConnectionFailure(transport, new ConnectionClosedError(event.reason));
  }

  private handleConnectionFailure(transport: AgentTransport, error: Error): void {
    if (transport !== this.transport) {
      return;
    }
    if (this.state.status === "connecting") {
      // Fails the pending handshake; openConnection cleans up.
      this.router.failAll(error);
      return;
    }
    if (this.state.status !== "connected") {
      return;
    }

    this.stopHealthChecks();
    this.transport = null;
    this.router.detach();
    this.lastError = error;
    this.setState({ status: "error", reason: error.message });
    this.router.failAll(error);
    transport.close().catch((closeError: unknown) => {
      this.logger.warn({ err: closeError }, "Failed to close the broken transport");
    });

    if (!this.autoRestart || this.closing) {
      this.setState({ status: "disconnected", reason: error.message });
      this.emitLost(error);
      return;
    }
    this.track(this.restartLoop(error));
  }

  private track(work: Promise<void>): Promise<void> {
    const tracked: Promise<void> = work.finally(() => {
      if (this.inFlight === tracked) {
        this.inFlight = null;
      }
    });
    this.inFlight = tracked;
    return tracked;
  }

  private async restartLoop(cause: Error): Promise<void> {
    let lastError: Error = cause;
    for (let attempt = 0; attempt < this.restart.maxAttempts; attempt += 1) {
      const delay = restartDelay(attempt, this.restart);
      this.logger.info({ attempt: attempt + 1, delay }, "Restarting agent server connection");
      await this.wait(delay);
      if (this.closing) {
        return;
      }
      try {
        await this.openConnection(attempt + 1);
        await this.emitRestarted();
        return;
      } catch (error) {
        lastError = toError(error);
        this.logger.warn({ err: lastError, attempt: attempt + 1 }, "Restart attempt failed");
        if (this.closing) {
          return;
        }
      }
    }

    this.lastError = lastError;
    this.setState({ status: "disconnected", reason: lastError.message });
    this.emitLost(lastError);
  }

  private wait(ms: number): Promise<void> {
    return new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        this.cancelWait = null;
        resolve();
      }, ms);
      this.cancelWait = () => {
        clearTimeout(timer);
        this.cancelWait = null;
        resolve();
      };
    });
  }

  private startHealthChecks(transport: AgentTransport): void {
    this.stopHealthChecks();
    this.healthFailures = 0;
    if (this.healthCheck.intervalMs <= 0) {
      return;
    }
    this.healthTimer = setInterval(() => {
      void this.runHealthCheck(transport);
    }, this.healthCheck.intervalMs);
  }

  private stopHealthChecks(): void {
    if (this.healthTimer) {
      clearInterval(this.healthTimer);
      this.healthTimer = null;
    }
  }

  private async runHealthCheck(transport: AgentTransport): Promise<void> {
    if (this.healthCheckInFlight) {
      return;
    }
    this.healthCheckInFlight = true;
    try {
      await this.router.issue(METHODS.ping, { message: "health" }, {
        timeoutMs: this.healthCheck.timeoutMs,
      });
      this.healthFailures = 0;
    } catch (error) {
      if (transport !== this.transport) {
        return;
      }
      this.healthFailures += 1;
      this.logger.warn({ err: error, failures: this.healthFailures }, "Health check failed");
      if (this.healthFailures >= this.healthCheck.maxFailures) {
        this.handleConnectionFailure(
          transport,
          new ConnectionClosedError(
            `Connection unhealthy: ${this.healthFailures} consecutive health checks failed`
          )
        );
      }
    } finally {
      this.healthCheckInFlight = false;
    }
  }

  private setState(next: ConnectionState): void {
    this.state = next;
    for (const listener of Array.from(this.stateListeners)) {
      try {
        listener(next);
      } catch (error) {
        this.logger.warn({ err: error }, "Connection state listener threw");
      }
    }
  }

  private async emitRestarted(): Promise<void> {
    await Promise.all(
      Array.from(this.restartedListeners).map(async (listener) => {
        try {
          await listener();
        } catch (error) {
          this.logger.warn({ err: error }, "Restart listener failed");
        }
      })
    );
  }

  private emitLost(error: Error): void {
    for (const listener of Array.from(this.lostListeners)) {
      try {
        listener(error);
      } catch (listenerError) {
        this.logger.warn({ err: listenerError }, "Connection lost listener threw");
      }
    }
  }
}
