import type pino from "pino";
import type { CallOptions, CorrelationRouter } from "../correlation/router.js";
import { ProtocolError, SessionFailedError, describeError, toError } from "../errors.js";
import type { EventEnvelope } from "../protocol/envelope.js";
import {
  METHODS,
  PermissionRequestParamsSchema,
  SessionIdResponseSchema,
  ToolCallRequestSchema,
} from "../protocol/messages.js";
import { AgentSession } from "./agent-session.js";
import { DEFAULT_PERMISSION_DENIAL } from "./permission-dispatch.js";
import {
  toCreatePayload,
  toResumePayload,
  validateResumeConfig,
  validateSessionConfig,
  type ResumeSessionConfig,
  type SessionConfig,
  type ValidatedResumeConfig,
} from "./session-config.js";
import { unsupportedToolResult } from "./tool-dispatch.js";

const EARLY_EVENT_LIMIT = 256;
const EARLY_SESSION_LIMIT = 32;

export interface SessionEngineOptions {
  router: CorrelationRouter;
  logger: pino.Logger;
}

/**
 * Registry of live sessions. Answers the server's `tool.call` and
 * `permission.request` callbacks by routing them to the owning session and
 * carries sessions across connection restarts.
 */
export class SessionEngine {
  private readonly router: CorrelationRouter;
  private readonly logger: pino.Logger;
  private readonly sessions = new Map<string, AgentSession>();
  // Events for a session id can beat the create/resume response to the reader.
  private readonly earlyEvents = new Map<string, EventEnvelope[]>();
  private readonly disposers: (() => void)[] = [];

  constructor(options: SessionEngineOptions) {
    this.router = options.router;
    this.logger = options.logger.child({ module: "session-engine" });

    this.disposers.push(
      this.router.setRequestHandler(METHODS.toolCall, (payload) => this.handleToolCall(payload)),
      this.router.setRequestHandler(METHODS.permissionRequest, (payload) =>
        this.handlePermissionRequest(payload)
      ),
      this.router.onUnroutedSessionEvent((envelope) => this.bufferEarlyEvent(envelope))
    );
  }

  get size(): number {
    return this.sessions.size;
  }

  get(sessionId: string): AgentSession | undefined {
    return this.sessions.get(sessionId);
  }

  list(): AgentSession[] {
    return Array.from(this.sessions.values());
  }

  async create(config: SessionConfig = {}, call: CallOptions = {}): Promise<AgentSession> {
    const validated = validateSessionConfig(config);
    const response = await this.router.request(
      METHODS.sessionCreate,
      toCreatePayload(validated),
      SessionIdResponseSchema,
      call
    );
    return this.register(response.sessionId, validated);
  }

  /**
   * Re-attaches to a session the server already knows. A local object for the
   * same id is closed and replaced.
   */
  async resume(
    sessionId: string,
    config: ResumeSessionConfig = {},
    call: CallOptions = {}
  ): Promise<AgentSession> {
    const validated = validateResumeConfig(config);
    const response = await this.router.request(
      METHODS.sessionResume,
      toResumePayload(sessionId, validated),
      SessionIdResponseSchema,
      call
    );
    this.sessions.get(response.sessionId)?.markReplaced();
    return this.register(response.sessionId, validated);
  }

  markAllReconnecting(): void {
    for (const session of this.sessions.values()) {
      session.markReconnecting();
    }
  }

  /**
   * Resumes every live session on a fresh connection with its last config.
   * Sessions the server refuses, or hands back under another id, are marked
   * failed and dropped.
   */
  async resumeAll(): Promise<void> {
    const sessions = this.list();
    await Promise.all(
      sessions.map(async (session) => {
        try {
          const response = await this.router.request(
            METHODS.sessionResume,
            toResumePayload(session.sessionId, session.resumeConfig),
            SessionIdResponseSchema
          );
          if (response.sessionId !== session.sessionId) {
            throw new ProtocolError(`server resumed it as ${response.sessionId}`);
          }
          session.markResumed();
        } catch (error) {
          this.logger.warn({ err: error, sessionId: session.sessionId }, "Failed to resume session");
          session.markFailed(
            new SessionFailedError(
              session.sessionId,
              `Session ${session.sessionId} could not be resumed after restart: ${describeError(error)}`,
              { cause: error }
            )
          );
        }
      })
    );
  }

  /** The connection is gone for good; every session fails with the cause. */
  failAll(error: Error): void {
    for (const session of this.list()) {
      session.markFailed(
        new SessionFailedError(session.sessionId, `Session ${session.sessionId} lost: ${error.message}`, {
          cause: error,
        })
      );
    }
    this.sessions.clear();
    this.earlyEvents.clear();
  }

  /** Destroys every session, collecting failures instead of stopping at the first. */
  async destroyAll(): Promise<Error[]> {
    const errors: Error[] = [];
    for (const session of this.list()) {
      try {
        await session.destroy();
      } catch (error) {
        errors.push(toError(error));
      }
    }
    this.earlyEvents.clear();
    return errors;
  }

  dispose(): void {
    for (const dispose of this.disposers.splice(0)) {
      dispose();
    }
  }

  private register(sessionId: string, config: ValidatedResumeConfig): AgentSession {
    const session = new AgentSession({
      sessionId,
      config,
      router: this.router,
      logger: this.logger,
      onClosed: (closed) => {
        if (this.sessions.get(closed.sessionId) === closed) {
          this.sessions.delete(closed.sessionId);
        }
      },
    });
    this.sessions.set(sessionId, session);

    const early = this.earlyEvents.get(sessionId);
    if (early) {
      this.earlyEvents.delete(sessionId);
      for (const envelope of early) {
        session.handleEnvelope(envelope);
      }
    }
    return session;
  }

  private bufferEarlyEvent(envelope: EventEnvelope): void {
    const sessionId = envelope.sessionId;
    if (sessionId === undefined) {
      return;
    }
    let buffered = this.earlyEvents.get(sessionId);
    if (!buffered) {
      if (this.earlyEvents.size >= EARLY_SESSION_LIMIT) {
        const oldest = this.earlyEvents.keys().next();
        if (!oldest.done) {
          this.earlyEvents.delete(oldest.value);
        }
      }
      buffered = [];
      this.earlyEvents.set(sessionId, buffered);
    }
    if (buffered.length >= EARLY_EVENT_LIMIT) {
      buffered.shift();
    }
    buffered.push(envelope);
  }

  private async handleToolCall(payload: unknown) {
    const parsed = ToolCallRequestSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ProtocolError(`Malformed tool.call request: ${parsed.error.message}`);
    }
    const session = this.sessions.get(parsed.data.sessionId);
    if (!session) {
      this.logger.warn(
        { sessionId: parsed.data.sessionId, toolName: parsed.data.toolName },
        "Tool call for an unknown session"
      );
      return { result: unsupportedToolResult(parsed.data.toolName) };
    }
    return { result: await session.handleToolCall(parsed.data) };
  }

  private async handlePermissionRequest(payload: unknown) {
    const parsed = PermissionRequestParamsSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ProtocolError(`Malformed permission.request: ${parsed.error.message}`);
    }
    const session = this.sessions.get(parsed.data.sessionId);
    if (!session) {
      this.logger.warn({ sessionId: parsed.data.sessionId }, "Permission request for an unknown session");
      return { result: DEFAULT_PERMISSION_DENIAL };
    }
    return { result: await session.handlePermissionRequest(parsed.data.permissionRequest) };
  }
}
