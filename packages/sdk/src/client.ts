import type pino from "pino";
import {
  resolveClientOptions,
  toTransportSettings,
  type ClientOptions,
  type ResolvedClientOptions,
} from "./client-options.js";
import {
  ConnectionManager,
  type ConnectionState,
} from "./connection/connection-manager.js";
import { CorrelationRouter, type CallOptions, type EventHandler } from "./correlation/router.js";
import { ConnectionClosedError, RemoteError, toError } from "./errors.js";
import { createChildLogger, createRootLogger } from "./logger.js";
import {
  GetAuthStatusResponseSchema,
  GetLastSessionIdResponseSchema,
  GetStatusResponseSchema,
  ListModelsResponseSchema,
  ListSessionsResponseSchema,
  DeleteSessionResponseSchema,
  METHODS,
  PingResponseSchema,
  type GetAuthStatusResponse,
  type GetStatusResponse,
  type ModelInfo,
  type PingResponse,
  type SessionMetadata,
} from "./protocol/messages.js";
import type { AgentSession } from "./session/agent-session.js";
import type { ResumeSessionConfig, SessionConfig } from "./session/session-config.js";
import { SessionEngine } from "./session/session-engine.js";
import { createTransportFactory } from "./transport/transport-factory.js";

export type StopError = {
  stage: "session" | "connection";
  error: Error;
};

/**
 * Entry point of the SDK. Owns one agent server connection and the sessions
 * opened over it.
 *
 * ```ts
 * const client = new AgentClient({ cliPath: "agent" });
 * const session = await client.createSession({ model: "test-model" });
 * const reply = await session.sendAndWait({ prompt: "Hello" });
 * await client.stop();
 * ```
 */
export class AgentClient {
  private readonly options: ResolvedClientOptions;
  private readonly logger: pino.Logger;
  private readonly router: CorrelationRouter;
  private readonly connection: ConnectionManager;
  private readonly engine: SessionEngine;
  private started = false;

  /** Throws ConfigurationError for invalid or conflicting options. */
  constructor(options: ClientOptions = {}) {
    this.options = resolveClientOptions(options);
    this.logger = options.logger ?? createRootLogger();

    this.router = new CorrelationRouter({
      logger: createChildLogger(this.logger, "router"),
      defaultTimeoutMs: this.options.requestTimeoutMs,
    });
    const transportFactory =
      options.transportFactory ??
      createTransportFactory(toTransportSettings(this.options), {
        logger: createChildLogger(this.logger, "transport"),
        spawnProcess: options.spawnProcess,
      });
    this.connection = new ConnectionManager({
      logger: createChildLogger(this.logger, "connection"),
      router: this.router,
      transportFactory,
      autoRestart: this.options.autoRestart,
      healthCheck: this.options.healthCheck,
      restart: this.options.restart,
    });
    this.engine = new SessionEngine({
      router: this.router,
      logger: createChildLogger(this.logger, "session"),
    });

    this.connection.onStateChange((state) => {
      if (state.status === "error") {
        this.engine.markAllReconnecting();
      }
    });
    this.connection.onRestarted(() => this.engine.resumeAll());
    this.connection.onLost((error) => this.engine.failAll(error));
  }

  async start(): Promise<void> {
    this.started = true;
    await this.connection.connect();
  }

  /**
   * Destroys every session, then closes the connection. Each cleanup failure
   * is returned; none stops the rest of the teardown.
   */
  async stop(): Promise<StopError[]> {
    this.started = false;
    const errors: StopError[] = [];
    if (this.connection.isConnected) {
      for (const error of await this.engine.destroyAll()) {
        errors.push({ stage: "session", error });
      }
    } else {
      this.engine.failAll(new ConnectionClosedError("Client stopped"));
    }
    try {
      await this.connection.disconnect();
    } catch (error) {
      errors.push({ stage: "connection", error: toError(error) });
    }
    if (errors.length > 0) {
      this.logger.warn({ count: errors.length }, "Client stopped with cleanup errors");
    }
    return errors;
  }

  /** Kills the server without destroying sessions on it. */
  forceStop(): void {
    this.started = false;
    this.engine.failAll(new ConnectionClosedError("Client force-stopped"));
    this.connection.forceDisconnect();
  }

  getState(): ConnectionState {
    return this.connection.getState();
  }

  onConnectionStateChange(listener: (state: ConnectionState) => void): () => void {
    return this.connection.onStateChange(listener);
  }

  /** Server events that are not addressed to a session. */
  onEvent(handler: EventHandler): () => void {
    return this.router.onGlobalEvent(handler);
  }

  // Every request below takes an optional AbortSignal in `call`; aborting
  // rejects with RequestCancelledError and tells the server to drop it.

  async createSession(config: SessionConfig = {}, call: CallOptions = {}): Promise<AgentSession> {
    await this.ensureConnected();
    return this.engine.create(config, call);
  }

  async resumeSession(
    sessionId: string,
    config: ResumeSessionConfig = {},
    call: CallOptions = {}
  ): Promise<AgentSession> {
    await this.ensureConnected();
    return this.engine.resume(sessionId, config, call);
  }

  async ping(message?: string, call: CallOptions = {}): Promise<PingResponse> {
    await this.ensureConnected();
    return this.router.request(METHODS.ping, { message }, PingResponseSchema, call);
  }

  async getStatus(call: CallOptions = {}): Promise<GetStatusResponse> {
    await this.ensureConnected();
    return this.router.request(METHODS.statusGet, {}, GetStatusResponseSchema, call);
  }

  async getAuthStatus(call: CallOptions = {}): Promise<GetAuthStatusResponse> {
    await this.ensureConnected();
    return this.router.request(METHODS.authGetStatus, {}, GetAuthStatusResponseSchema, call);
  }

  async listModels(call: CallOptions = {}): Promise<ModelInfo[]> {
    await this.ensureConnected();
    const response = await this.router.request(METHODS.modelsList, {}, ListModelsResponseSchema, call);
    return response.models;
  }

  async listSessions(call: CallOptions = {}): Promise<SessionMetadata[]> {
    await this.ensureConnected();
    const response = await this.router.request(
      METHODS.sessionList,
      {},
      ListSessionsResponseSchema,
      call
    );
    return response.sessions;
  }

  /** Deletes a stored session on the server, whether or not it is open here. */
  async deleteSession(sessionId: string, call: CallOptions = {}): Promise<void> {
    await this.ensureConnected();
    const response = await this.router.request(
      METHODS.sessionDelete,
      { sessionId },
      DeleteSessionResponseSchema,
      call
    );
    if (!response.success) {
      throw new RemoteError({
        method: METHODS.sessionDelete,
        message: `Failed to delete session ${sessionId}: ${response.error ?? "unknown error"}`,
      });
    }
    this.engine.get(sessionId)?.markReplaced();
  }

  async getLastSessionId(call: CallOptions = {}): Promise<string | undefined> {
    await this.ensureConnected();
    const response = await this.router.request(
      METHODS.sessionGetLastId,
      {},
      GetLastSessionIdResponseSchema,
      call
    );
    return response.sessionId;
  }

  private async ensureConnected(): Promise<void> {
    if (this.connection.isConnected) {
      return;
    }
    if (!this.options.autoStart && !this.started) {
      throw new ConnectionClosedError("Client is not connected; call start() first");
    }
    await this.connection.connect();
  }
}
