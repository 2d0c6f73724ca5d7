import type pino from "pino";
import type { CallOptions, CorrelationRouter } from "../correlation/router.js";
import { RequestTimeoutError, SessionFailedError, cancelledBy } from "../errors.js";
import type { EventEnvelope } from "../protocol/envelope.js";
import {
  EVENTS,
  EmptyResponseSchema,
  GetMessagesResponseSchema,
  METHODS,
  SendMessageResponseSchema,
  type PermissionRequest,
  type PermissionRequestResult,
  type ToolCallRequest,
  type ToolResult,
} from "../protocol/messages.js";
import {
  SESSION_EVENT_TYPES,
  SessionErrorDataSchema,
  SessionEventSchema,
  type SessionEvent,
} from "../protocol/session-events.js";
import { CompactionTracker, type CompactionState } from "./compaction-tracker.js";
import { dispatchPermissionRequest } from "./permission-dispatch.js";
import {
  validateMessageOptions,
  type MessageOptions,
  type PermissionHandler,
  type Tool,
  type ValidatedMessageOptions,
  type ValidatedResumeConfig,
} from "./session-config.js";
import { StreamAssembler, type StreamKind } from "./stream-assembler.js";
import { dispatchToolCall } from "./tool-dispatch.js";

export const DEFAULT_SEND_AND_WAIT_TIMEOUT_MS = 60_000;

export type SessionLifecycleState = "active" | "reconnecting" | "failed" | "destroyed";

export type SessionLifecycleEvent = {
  state: SessionLifecycleState;
  error?: Error;
};

export type SessionEventHandler = (event: SessionEvent) => void;

export interface AgentSessionOptions {
  sessionId: string;
  config: ValidatedResumeConfig;
  router: CorrelationRouter;
  logger: pino.Logger;
  onClosed: (session: AgentSession) => void;
}

type WaitOutcome =
  | { kind: "idle" }
  | { kind: "error"; error: Error }
  | { kind: "timeout" }
  | { kind: "cancelled"; reason: unknown };

const SEND_AND_WAIT = "session.sendAndWait";

/** Settles with `promise`, or rejects as cancelled as soon as `signal` aborts. */
function unlessAborted<T>(promise: Promise<T>, signal: AbortSignal | undefined, method: string): Promise<T> {
  if (!signal) {
    return promise;
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(cancelledBy(method, signal.reason));
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

/**
 * A live conversation on the agent server. Owns the session's tool registry,
 * its permission handler, its event subscribers and the state derived from
 * its event stream.
 */
export class AgentSession {
  readonly sessionId: string;

  private config: ValidatedResumeConfig;
  private tools: Map<string, Tool>;
  private permissionHandler: PermissionHandler | undefined;
  private assembler: StreamAssembler;
  private readonly compaction: CompactionTracker;
  private readonly router: CorrelationRouter;
  private readonly logger: pino.Logger;
  private readonly onClosed: (session: AgentSession) => void;
  private readonly subscribers = new Set<SessionEventHandler>();
  private readonly typedSubscribers = new Map<string, Set<SessionEventHandler>>();
  private readonly lifecycleListeners = new Set<(event: SessionLifecycleEvent) => void>();
  private lifecycle: SessionLifecycleState = "active";
  private enqueueChain: Promise<unknown> = Promise.resolve();
  private detachRouter: () => void;

  constructor(options: AgentSessionOptions) {
    this.sessionId = options.sessionId;
    this.config = options.config;
    this.router = options.router;
    this.logger = options.logger.child({ sessionId: options.sessionId });
    this.onClosed = options.onClosed;
    this.tools = new Map(options.config.tools.map((tool) => [tool.name, tool]));
    this.permissionHandler = options.config.onPermissionRequest;
    this.assembler = new StreamAssembler(this.logger, options.config.streaming);
    this.compaction = new CompactionTracker(options.config.infiniteSessions, this.logger);
    this.detachRouter = this.router.onSessionEvent(this.sessionId, (envelope) =>
      this.handleEnvelope(envelope)
    );
  }

  get state(): SessionLifecycleState {
    return this.lifecycle;
  }

  get compactionState(): CompactionState {
    return this.compaction.state;
  }

  /** Last utilization the server reported, if any. */
  get contextUtilization(): number | null {
    return this.compaction.utilization;
  }

  /** The configuration a resume after restart re-sends. */
  get resumeConfig(): ValidatedResumeConfig {
    return this.config;
  }

  /**
   * Sends a prompt and resolves with the server's message id once it accepted
   * it. `enqueue` sends leave in call order; `immediate` sends skip the queue.
   * Both wait while the session is blocked on compaction. Aborting `signal`
   * rejects with RequestCancelledError; a send still queued is never issued.
   */
  async send(options: MessageOptions, call: CallOptions = {}): Promise<string> {
    this.assertUsable();
    const message = validateMessageOptions(options);
    if (call.signal?.aborted) {
      throw cancelledBy(METHODS.sessionSend, call.signal.reason);
    }
    if (message.mode === "immediate") {
      return this.dispatchSend(message, call);
    }
    const task = this.enqueueChain.then(() => this.dispatchSend(message, call));
    this.enqueueChain = task.catch(() => undefined);
    return unlessAborted(task, call.signal, METHODS.sessionSend);
  }

  /**
   * Sends a prompt and waits for the session to go idle. Resolves with the
   * last `assistant.message` of the turn, or undefined when there was none.
   * Aborting `signal` stops the wait; the turn itself keeps running on the
   * server until `abort()`.
   */
  async sendAndWait(
    options: MessageOptions,
    timeoutMs = DEFAULT_SEND_AND_WAIT_TIMEOUT_MS,
    call: CallOptions = {}
  ): Promise<SessionEvent | undefined> {
    let lastAssistantMessage: SessionEvent | undefined;
    const cleanups: (() => void)[] = [];
    const idle = new Promise<WaitOutcome>((resolve) => {
      cleanups.push(
        this.on((event) => {
          if (event.type === SESSION_EVENT_TYPES.message) {
            lastAssistantMessage = event;
          } else if (event.type === SESSION_EVENT_TYPES.sessionIdle) {
            resolve({ kind: "idle" });
          } else if (event.type === SESSION_EVENT_TYPES.sessionError) {
            const data = SessionErrorDataSchema.safeParse(event.data);
            resolve({
              kind: "error",
              error: new SessionFailedError(
                this.sessionId,
                data.success ? data.data.message : "Session reported an error"
              ),
            });
          }
        })
      );
      cleanups.push(
        this.onLifecycle((event) => {
          if (event.state === "failed" || event.state === "destroyed") {
            resolve({
              kind: "error",
              error:
                event.error ?? new SessionFailedError(this.sessionId, `Session ${this.sessionId} was ${event.state}`),
            });
          }
        })
      );
    });
    const timeout = new Promise<WaitOutcome>((resolve) => {
      const timer = setTimeout(() => resolve({ kind: "timeout" }), timeoutMs);
      cleanups.push(() => clearTimeout(timer));
    });
    const { signal } = call;
    const cancelled = new Promise<WaitOutcome>((resolve) => {
      if (!signal) {
        return;
      }
      const onAbort = (): void => resolve({ kind: "cancelled", reason: signal.reason });
      signal.addEventListener("abort", onAbort, { once: true });
      cleanups.push(() => signal.removeEventListener("abort", onAbort));
    });

    try {
      await this.send(options, call);
      const outcome = await Promise.race([idle, timeout, cancelled]);
      switch (outcome.kind) {
        case "error":
          throw outcome.error;
        case "timeout":
          throw new RequestTimeoutError(SEND_AND_WAIT, timeoutMs);
        case "cancelled":
          throw cancelledBy(SEND_AND_WAIT, outcome.reason);
        case "idle":
          return lastAssistantMessage;
      }
    } finally {
      for (const cleanup of cleanups) {
        cleanup();
      }
    }
  }

  on(handler: SessionEventHandler): () => void;
  on(type: string, handler: SessionEventHandler): () => void;
  on(arg1: string | SessionEventHandler, arg2?: SessionEventHandler): () => void {
    if (typeof arg1 === "function") {
      this.subscribers.add(arg1);
      return () => {
        this.subscribers.delete(arg1);
      };
    }
    if (!arg2) {
      throw new TypeError("on(type, handler) requires a handler");
    }
    const type = arg1;
    const handler = arg2;
    let handlers = this.typedSubscribers.get(type);
    if (!handlers) {
      handlers = new Set();
      this.typedSubscribers.set(type, handlers);
    }
    handlers.add(handler);
    return () => {
      const current = this.typedSubscribers.get(type);
      if (!current) {
        return;
      }
      current.delete(handler);
      if (current.size === 0) {
        this.typedSubscribers.delete(type);
      }
    };
  }

  onLifecycle(listener: (event: SessionLifecycleEvent) => void): () => void {
    this.lifecycleListeners.add(listener);
    return () => {
      this.lifecycleListeners.delete(listener);
    };
  }

  /** Text buffered so far for a block that is still streaming. */
  getPendingContent(kind: StreamKind, blockId: string): string | undefined {
    return this.assembler.getPending(kind, blockId);
  }

  async abort(call: CallOptions = {}): Promise<void> {
    this.assertUsable();
    await this.router.request(
      METHODS.sessionAbort,
      { sessionId: this.sessionId },
      EmptyResponseSchema,
      call
    );
  }

  async getMessages(call: CallOptions = {}): Promise<SessionEvent[]> {
    this.assertUsable();
    const response = await this.router.request(
      METHODS.sessionGetMessages,
      { sessionId: this.sessionId },
      GetMessagesResponseSchema,
      call
    );
    return response.events;
  }

  /**
   * Destroys the session on the server. The local object is closed even when
   * the server call fails; the failure is rethrown.
   */
  async destroy(): Promise<void> {
    if (this.lifecycle === "destroyed") {
      return;
    }
    const wasFailed = this.lifecycle === "failed";
    try {
      if (!wasFailed) {
        await this.router.request(
          METHODS.sessionDestroy,
          { sessionId: this.sessionId },
          EmptyResponseSchema
        );
      }
    } finally {
      this.close("destroyed");
    }
  }

  handleToolCall(request: ToolCallRequest): Promise<ToolResult> {
    return dispatchToolCall(
      this.tools,
      {
        sessionId: request.sessionId,
        toolCallId: request.toolCallId,
        toolName: request.toolName,
        arguments: request.arguments,
      },
      this.logger
    );
  }

  handlePermissionRequest(request: PermissionRequest): Promise<PermissionRequestResult> {
    return dispatchPermissionRequest(
      this.permissionHandler,
      request,
      { sessionId: this.sessionId },
      this.logger
    );
  }

  /** Connection dropped; a restart may still bring the session back. */
  markReconnecting(): void {
    if (this.lifecycle !== "active") {
      return;
    }
    this.setLifecycle({ state: "reconnecting" });
  }

  /** The server accepted a resume; handler registries follow the given config. */
  markResumed(config: ValidatedResumeConfig = this.config): void {
    if (this.lifecycle === "destroyed" || this.lifecycle === "failed") {
      return;
    }
    this.config = config;
    this.tools = new Map(config.tools.map((tool) => [tool.name, tool]));
    this.permissionHandler = config.onPermissionRequest;
    this.assembler = new StreamAssembler(this.logger, config.streaming);
    this.compaction.reset();
    this.setLifecycle({ state: "active" });
  }

  markFailed(error: Error): void {
    if (this.lifecycle === "destroyed" || this.lifecycle === "failed") {
      return;
    }
    this.close("failed", error);
  }

  /** Another local object took over this session id. */
  markReplaced(): void {
    if (this.lifecycle === "destroyed") {
      return;
    }
    this.close("destroyed");
  }

  private close(state: "failed" | "destroyed", error?: Error): void {
    this.detachRouter();
    this.detachRouter = () => undefined;
    this.assembler.clear();
    this.compaction.failWaiters(
      error ?? new SessionFailedError(this.sessionId, `Session ${this.sessionId} was ${state}`)
    );
    this.setLifecycle(error ? { state, error } : { state });
    this.onClosed(this);
  }

  private setLifecycle(event: SessionLifecycleEvent): void {
    this.lifecycle = event.state;
    this.logger.debug({ state: event.state, err: event.error }, "Session lifecycle changed");
    for (const listener of Array.from(this.lifecycleListeners)) {
      try {
        listener(event);
      } catch (error) {
        this.logger.warn({ err: error }, "Session lifecycle listener threw");
      }
    }
  }

  private assertUsable(): void {
    if (this.lifecycle === "destroyed" || this.lifecycle === "failed") {
      throw new SessionFailedError(
        this.sessionId,
        `Session ${this.sessionId} is ${this.lifecycle}`
      );
    }
  }

  private async dispatchSend(message: ValidatedMessageOptions, call: CallOptions): Promise<string> {
    if (call.signal?.aborted) {
      throw cancelledBy(METHODS.sessionSend, call.signal.reason);
    }
    await this.compaction.waitForAdmission(call.signal);
    this.assertUsable();
    const response = await this.router.request(
      METHODS.sessionSend,
      {
        sessionId: this.sessionId,
        prompt: message.prompt,
        attachments: message.attachments,
        mode: message.mode,
      },
      SendMessageResponseSchema,
      call
    );
    return response.messageId;
  }

  /** Entry point for envelopes routed to this session id. */
  handleEnvelope(envelope: EventEnvelope): void {
    if (envelope.event !== EVENTS.sessionEvent) {
      this.logger.debug({ event: envelope.event }, "Ignoring non-session event for session");
      return;
    }
    const parsed = SessionEventSchema.safeParse(envelope.payload);
    if (!parsed.success) {
      this.logger.warn(
        { error: parsed.error.message },
        "Discarding malformed session event"
      );
      return;
    }
    this.handleEvent(parsed.data);
  }

  private handleEvent(event: SessionEvent): void {
    this.assembler.handleEvent(event);
    this.compaction.handleEvent(event);
    this.deliver(this.subscribers, event);
    const typed = this.typedSubscribers.get(event.type);
    if (typed) {
      this.deliver(typed, event);
    }
  }

  private deliver(handlers: Set<SessionEventHandler>, event: SessionEvent): void {
    for (const handler of Array.from(handlers)) {
      try {
        handler(event);
      } catch (error) {
        this.logger.warn({ err: error, eventType: event.type }, "Session event handler threw");
      }
    }
  }
}
