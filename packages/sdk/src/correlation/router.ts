import type pino from "pino";
import type { z } from "zod";
import {
  AgentLinkError,
  ConnectionClosedError,
  ProtocolError,
  RemoteError,
  RequestTimeoutError,
  cancelledBy,
  describeError,
} from "../errors.js";
import { encodeEnvelope } from "../protocol/codec.js";
import type {
  Envelope,
  EnvelopeId,
  ErrorEnvelope,
  EventEnvelope,
  RequestEnvelope,
  ResponseEnvelope,
} from "../protocol/envelope.js";
import { EVENTS } from "../protocol/messages.js";
import { PendingOperationTable } from "./pending-operations.js";

export type FrameSender = (frame: string) => Promise<void>;

export type EventHandler = (envelope: EventEnvelope) => void;

export type InboundRequestContext = {
  id: EnvelopeId;
  method: string;
};

export type RequestHandler = (payload: unknown, context: InboundRequestContext) => unknown;

export type IssueOptions = {
  /** Defaults to the router's request timeout. Zero or less disables the deadline. */
  timeoutMs?: number;
  signal?: AbortSignal;
};

/** Per-call options the public API passes through to `issue`. */
export type CallOptions = Pick<IssueOptions, "signal">;

export interface CorrelationRouterOptions {
  logger: pino.Logger;
  defaultTimeoutMs: number;
}

export const METHOD_NOT_FOUND_CODE = "method_not_found";
export const HANDLER_FAILED_CODE = "handler_failed";

/**
 * Matches responses to requests by id, fans events out to session and global
 * subscribers, and answers server-initiated requests exactly once. Every
 * mutation of the pending table happens synchronously, so the event loop
 * serializes concurrent callers.
 */
export class CorrelationRouter {
  private readonly logger: pino.Logger;
  private readonly defaultTimeoutMs: number;
  private readonly table = new PendingOperationTable();
  private readonly sessionHandlers = new Map<string, Set<EventHandler>>();
  private readonly globalHandlers = new Set<EventHandler>();
  private readonly unroutedHandlers = new Set<EventHandler>();
  private readonly requestHandlers = new Map<string, RequestHandler>();
  private sender: FrameSender | null = null;
  private nextId = 1;

  constructor(options: CorrelationRouterOptions) {
    this.logger = options.logger;
    this.defaultTimeoutMs = options.defaultTimeoutMs;
  }

  /** Routes outgoing frames to a freshly opened transport. */
  attach(sender: FrameSender): void {
    this.sender = sender;
  }

  detach(): void {
    this.sender = null;
  }

  get isAttached(): boolean {
    return this.sender !== null;
  }

  pendingCount(direction?: "outbound" | "inbound"): number {
    return this.table.size(direction);
  }

  issue(method: string, payload?: unknown, options: IssueOptions = {}): Promise<unknown> {
    const sender = this.sender;
    if (!sender) {
      return Promise.reject(new ConnectionClosedError(`Cannot send ${method}: not connected`));
    }
    const { signal } = options;
    if (signal?.aborted) {
      return Promise.reject(cancelledBy(method, signal.reason));
    }

    const id = this.nextId++;
    let frame: string;
    try {
      frame = encodeEnvelope({ type: "request", id, method, payload });
    } catch (error) {
      return Promise.reject(
        new ProtocolError(`Failed to encode ${method} request: ${describeError(error)}`)
      );
    }

    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;

    return new Promise<unknown>((resolve, reject) => {
      const onAbort = (): void => {
        const operation = this.table.takeOutbound(id);
        if (!operation) {
          return;
        }
        operation.reject(cancelledBy(method, signal?.reason));
        this.notify(EVENTS.requestCancel, { id }).catch((error: unknown) => {
          this.logger.debug({ err: error, id, method }, "Failed to notify server of cancellation");
        });
      };
      const detachAbort = (): void => {
        signal?.removeEventListener("abort", onAbort);
      };

      const timer =
        timeoutMs > 0 && Number.isFinite(timeoutMs)
          ? setTimeout(() => {
              const operation = this.table.takeOutbound(id);
              operation?.reject(new RequestTimeoutError(method, timeoutMs));
            }, timeoutMs)
          : null;

      this.table.addOutbound({
        direction: "outbound",
        id,
        method,
        issuedAt: Date.now(),
        timer,
        resolve: (value) => {
          detachAbort();
          resolve(value);
        },
        reject: (error) => {
          detachAbort();
          reject(error);
        },
      });
      signal?.addEventListener("abort", onAbort, { once: true });

      sender(frame).catch((error: unknown) => {
        const operation = this.table.takeOutbound(id);
        operation?.reject(
          error instanceof AgentLinkError
            ? error
            : new ConnectionClosedError(`Failed to send ${method}: ${describeError(error)}`, {
                cause: error,
              })
        );
      });
    });
  }

  /** Issues a request and validates the response payload. */
  async request<Schema extends z.ZodTypeAny>(
    method: string,
    payload: unknown,
    schema: Schema,
    options?: IssueOptions
  ): Promise<z.output<Schema>> {
    const response = await this.issue(method, payload, options);
    const parsed = schema.safeParse(response ?? {});
    if (!parsed.success) {
      throw new ProtocolError(
        `Unexpected ${method} response: ${parsed.error.issues
          .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
          .join("; ")}`
      );
    }
    return parsed.data;
  }

  notify(event: string, payload?: unknown, sessionId?: string): Promise<void> {
    const sender = this.sender;
    if (!sender) {
      return Promise.reject(new ConnectionClosedError(`Cannot send ${event}: not connected`));
    }
    let frame: string;
    try {
      frame = encodeEnvelope({ type: "event", event, payload, ...(sessionId ? { sessionId } : {}) });
    } catch (error) {
      return Promise.reject(
        new ProtocolError(`Failed to encode ${event} event: ${describeError(error)}`)
      );
    }
    return sender(frame);
  }

  handleEnvelope(envelope: Envelope): void {
    switch (envelope.type) {
      case "response":
        this.handleResponse(envelope);
        return;
      case "error":
        this.handleError(envelope);
        return;
      case "event":
        this.handleEvent(envelope);
        return;
      case "request":
        void this.handleInboundRequest(envelope);
        return;
    }
  }

  onSessionEvent(sessionId: string, handler: EventHandler): () => void {
    let handlers = this.sessionHandlers.get(sessionId);
    if (!handlers) {
      handlers = new Set();
      this.sessionHandlers.set(sessionId, handlers);
    }
    handlers.add(handler);
    return () => {
      const current = this.sessionHandlers.get(sessionId);
      if (!current) {
        return;
      }
      current.delete(handler);
      if (current.size === 0) {
        this.sessionHandlers.delete(sessionId);
      }
    };
  }

  onGlobalEvent(handler: EventHandler): () => void {
    this.globalHandlers.add(handler);
    return () => {
      this.globalHandlers.delete(handler);
    };
  }

  /** Receives session events whose session has no local subscriber. */
  onUnroutedSessionEvent(handler: EventHandler): () => void {
    this.unroutedHandlers.add(handler);
    return () => {
      this.unroutedHandlers.delete(handler);
    };
  }

  setRequestHandler(method: string, handler: RequestHandler): () => void {
    this.requestHandlers.set(method, handler);
    return () => {
      if (this.requestHandlers.get(method) === handler) {
        this.requestHandlers.delete(method);
      }
    };
  }

  /**
   * Rejects every outstanding request and forgets inbound requests that can
   * no longer be answered on this connection.
   */
  failAll(error: Error): void {
    const drained = this.table.drainOutbound();
    const forgotten = this.table.clearInbound();
    if (drained.length > 0 || forgotten > 0) {
      this.logger.debug(
        { outbound: drained.length, inbound: forgotten, reason: error.message },
        "Failing pending operations"
      );
    }
    for (const operation of drained) {
      operation.reject(error);
    }
  }

  private handleResponse(envelope: ResponseEnvelope): void {
    const operation = this.table.takeOutbound(envelope.id);
    if (!operation) {
      this.logger.warn({ id: envelope.id }, "Discarding response for unknown or settled request");
      return;
    }
    operation.resolve(envelope.payload);
  }

  private handleError(envelope: ErrorEnvelope): void {
    if (envelope.id === undefined) {
      this.logger.warn(
        { code: envelope.error.code, data: envelope.error.data },
        `Agent server reported an error: ${envelope.error.message}`
      );
      return;
    }
    const operation = this.table.takeOutbound(envelope.id);
    if (!operation) {
      this.logger.warn({ id: envelope.id }, "Discarding error for unknown or settled request");
      return;
    }
    operation.reject(
      new RemoteError({
        method: operation.method,
        message: envelope.error.message,
        remoteCode: envelope.error.code,
        data: envelope.error.data,
      })
    );
  }

  private handleEvent(envelope: EventEnvelope): void {
    if (envelope.sessionId === undefined) {
      this.dispatch(this.globalHandlers, envelope);
      return;
    }
    const handlers = this.sessionHandlers.get(envelope.sessionId);
    if (handlers && handlers.size > 0) {
      this.dispatch(handlers, envelope);
      return;
    }
    if (this.unroutedHandlers.size > 0) {
      this.dispatch(this.unroutedHandlers, envelope);
      return;
    }
    this.logger.debug(
      { sessionId: envelope.sessionId, event: envelope.event },
      "Dropping event for unknown session"
    );
  }

  private dispatch(handlers: Set<EventHandler>, envelope: EventEnvelope): void {
    for (const handler of Array.from(handlers)) {
      try {
        handler(envelope);
      } catch (error) {
        this.logger.warn({ err: error, event: envelope.event }, "Event handler threw");
      }
    }
  }

  private async handleInboundRequest(envelope: RequestEnvelope): Promise<void> {
    const { id, method } = envelope;
    if (!this.table.addInbound({ direction: "inbound", id, method, receivedAt: Date.now() })) {
      this.logger.warn({ id, method }, "Ignoring duplicate server request id");
      return;
    }

    const handler = this.requestHandlers.get(method);
    if (!handler) {
      this.logger.warn({ id, method }, "No handler for server request");
      await this.answer(id, {
        type: "error",
        id,
        error: { code: METHOD_NOT_FOUND_CODE, message: `method not found: ${method}` },
      });
      return;
    }

    let answer: Envelope;
    try {
      const result = await handler(envelope.payload, { id, method });
      answer = { type: "response", id, payload: result };
    } catch (error) {
      this.logger.warn({ err: error, id, method }, "Server request handler failed");
      answer = {
        type: "error",
        id,
        error: { code: HANDLER_FAILED_CODE, message: describeError(error) },
      };
    }
    await this.answer(id, answer);
  }

  private async answer(id: EnvelopeId, envelope: Envelope): Promise<void> {
    const operation = this.table.takeInbound(id);
    if (!operation) {
      this.logger.debug({ id }, "Server request no longer pending, dropping answer");
      return;
    }
    const sender = this.sender;
    if (!sender) {
      this.logger.warn({ id, method: operation.method }, "Connection gone before answering server request");
      return;
    }

    let frame: string;
    try {
      frame = encodeEnvelope(envelope);
    } catch (error) {
      frame = encodeEnvelope({
        type: "error",
        id,
        error: {
          code: HANDLER_FAILED_CODE,
          message: `Failed to encode ${operation.method} result: ${describeError(error)}`,
        },
      });
    }

    try {
      await sender(frame);
    } catch (error) {
      this.logger.warn({ err: error, id, method: operation.method }, "Failed to answer server request");
    }
  }
}
