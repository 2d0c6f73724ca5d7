import { ConnectionClosedError } from "../errors.js";
import type { EnvelopeId } from "../protocol/envelope.js";
import { SDK_PROTOCOL_VERSION } from "../protocol/messages.js";
import type { SessionEvent } from "../protocol/session-events.js";
import { Pushable } from "../transport/pushable.js";
import type {
  AgentTransport,
  InboundFrame,
  TransportCloseEvent,
  TransportFactory,
} from "../transport/transport.js";

export type ReceivedRequest = {
  id: EnvelopeId;
  method: string;
  payload: unknown;
};

export type ReceivedEvent = {
  event: string;
  sessionId?: string;
  payload: unknown;
};

export type FakeMethodHandler = (payload: unknown, request: ReceivedRequest) => unknown;

type PendingCall = {
  resolve: (payload: unknown) => void;
  reject: (error: Error) => void;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Reads a string field from an untyped payload, or undefined. */
export function readString(payload: unknown, key: string): string | undefined {
  if (!isRecord(payload)) {
    return undefined;
  }
  const value = payload[key];
  return typeof value === "string" ? value : undefined;
}

export class FakeTransport implements AgentTransport {
  readonly kind = "stdio" as const;
  readonly inbound = new Pushable<InboundFrame>();
  private state: "idle" | "open" | "closed" = "idle";
  private readonly closeHandlers = new Set<(event: TransportCloseEvent) => void>();
  closeEvent: TransportCloseEvent | null = null;

  constructor(private readonly server: FakeAgentServer) {}

  async open(): Promise<void> {
    if (this.server.failNextOpens > 0) {
      this.server.failNextOpens -= 1;
      this.closeWith({ reason: "spawn failed", expected: false });
      throw new ConnectionClosedError("Failed to open fake agent server: spawn failed");
    }
    this.state = "open";
  }

  send(frame: string): Promise<void> {
    if (this.state !== "open") {
      return Promise.reject(new ConnectionClosedError("Fake transport is not open"));
    }
    queueMicrotask(() => this.server.receive(this, frame));
    return Promise.resolve();
  }

  frames(): AsyncIterable<InboundFrame> {
    return this.inbound;
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

  async close(): Promise<void> {
    this.closeWith({ reason: "Transport closed by client", expected: true });
  }

  forceClose(): void {
    this.closeWith({ reason: "Transport force-closed by client", expected: true });
  }

  describe(): string {
    return "fake agent server";
  }

  get isOpen(): boolean {
    return this.state === "open";
  }

  /** Pushes a raw line as if the server had written it. */
  deliver(text: string): void {
    if (this.state === "open") {
      this.inbound.push({ kind: "frame", text });
    }
  }

  deliverJson(value: unknown): void {
    this.deliver(JSON.stringify(value));
  }

  crash(reason = "Agent server exited with code 1"): void {
    this.closeWith({ reason, expected: false });
  }

  private closeWith(event: TransportCloseEvent): void {
    if (this.state === "closed") {
      return;
    }
    this.state = "closed";
    this.closeEvent = event;
    this.inbound.end();
    for (const handler of Array.from(this.closeHandlers)) {
      handler(event);
    }
  }
}

/**
 * An in-process stand-in for the agent server. It answers the client's
 * requests from a table of method handlers, records everything it receives,
 * and can push events, call the client back, or crash on demand.
 */
export class FakeAgentServer {
  readonly transports: FakeTransport[] = [];
  readonly requests: ReceivedRequest[] = [];
  readonly events: ReceivedEvent[] = [];
  readonly createdSessions = new Map<string, unknown>();
  protocolVersion: number | null = SDK_PROTOCOL_VERSION;
  failNextOpens = 0;

  private readonly handlers = new Map<string, FakeMethodHandler>();
  private readonly pendingCalls = new Map<string, PendingCall>();
  private nextCallId = 1;
  private nextSessionId = 1;
  private nextMessageId = 1;

  readonly factory: TransportFactory = () => {
    const transport = new FakeTransport(this);
    this.transports.push(transport);
    return transport;
  };

  constructor() {
    this.handle("ping", (payload) => ({
      message: `pong: ${readString(payload, "message") ?? ""}`,
      timestamp: 1_700_000_000_000,
      ...(this.protocolVersion === null ? {} : { protocolVersion: this.protocolVersion }),
    }));
    this.handle("status.get", () => ({ version: "0.0.0-test", protocolVersion: SDK_PROTOCOL_VERSION }));
    this.handle("auth.getStatus", () => ({ isAuthenticated: true, authType: "token", login: "tester" }));
    this.handle("models.list", () => ({
      models: [
        {
          id: "test-model",
          name: "Test Model",
          capabilities: {
            supports: { vision: false },
            limits: { maxContextWindowTokens: 128_000 },
          },
        },
      ],
    }));
    this.handle("session.create", (payload) => {
      const sessionId = readString(payload, "sessionId") ?? `session-${this.nextSessionId++}`;
      this.createdSessions.set(sessionId, payload);
      return { sessionId };
    });
    this.handle("session.resume", (payload) => ({ sessionId: readString(payload, "sessionId") }));
    this.handle("session.send", () => ({ messageId: `msg-${this.nextMessageId++}` }));
    this.handle("session.abort", () => ({}));
    this.handle("session.destroy", () => ({}));
    this.handle("session.getMessages", () => ({ events: [] }));
    this.handle("session.list", () => ({
      sessions: [
        {
          sessionId: "session-a",
          startTime: "2026-01-01T00:00:00.000Z",
          modifiedTime: "2026-01-02T00:00:00.000Z",
          summary: "first session",
          isRemote: false,
        },
      ],
    }));
    this.handle("session.delete", () => ({ success: true }));
    this.handle("session.getLastId", () => ({ sessionId: "session-a" }));
  }

  get current(): FakeTransport {
    const transport = this.transports[this.transports.length - 1];
    if (!transport) {
      throw new Error("No transport has been opened");
    }
    return transport;
  }

  handle(method: string, handler: FakeMethodHandler): void {
    this.handlers.set(method, handler);
  }

  requestsFor(method: string): ReceivedRequest[] {
    return this.requests.filter((request) => request.method === method);
  }

  emitSessionEvent(sessionId: string, event: Partial<SessionEvent> & { type: string }): void {
    this.current.deliverJson({
      type: "event",
      event: "session.event",
      sessionId,
      payload: { data: {}, ...event },
    });
  }

  emitEvent(event: string, payload?: unknown): void {
    this.current.deliverJson({ type: "event", event, payload });
  }

  /** Sends a server-initiated request and resolves with the client's answer. */
  callClient(method: string, payload: unknown): Promise<unknown> {
    const id = `srv-${this.nextCallId++}`;
    return new Promise<unknown>((resolve, reject) => {
      this.pendingCalls.set(id, { resolve, reject });
      this.current.deliverJson({ type: "request", id, method, payload });
    });
  }

  receive(transport: FakeTransport, frame: string): void {
    const message: unknown = JSON.parse(frame);
    if (!isRecord(message)) {
      return;
    }
    switch (message.type) {
      case "request":
        void this.answer(transport, message);
        return;
      case "response":
      case "error":
        this.settleCall(message);
        return;
      case "event":
        this.events.push({
          event: String(message.event),
          sessionId: typeof message.sessionId === "string" ? message.sessionId : undefined,
          payload: message.payload,
        });
        return;
    }
  }

  private async answer(transport: FakeTransport, message: Record<string, unknown>): Promise<void> {
    const id = message.id;
    if (typeof id !== "number" && typeof id !== "string") {
      return;
    }
    const request: ReceivedRequest = { id, method: String(message.method), payload: message.payload };
    this.requests.push(request);

    const handler = this.handlers.get(request.method);
    if (!handler) {
      transport.deliverJson({
        type: "error",
        id,
        error: { code: "method_not_found", message: `method not found: ${request.method}` },
      });
      return;
    }
    try {
      const result = await handler(request.payload, request);
      transport.deliverJson({ type: "response", id, payload: result });
    } catch (error) {
      transport.deliverJson({
        type: "error",
        id,
        error: { code: "server_error", message: error instanceof Error ? error.message : String(error) },
      });
    }
  }

  private settleCall(message: Record<string, unknown>): void {
    const id = typeof message.id === "string" ? message.id : undefined;
    const pending = id === undefined ? undefined : this.pendingCalls.get(id);
    if (!id || !pending) {
      return;
    }
    this.pendingCalls.delete(id);
    if (message.type === "response") {
      pending.resolve(message.payload);
      return;
    }
    const error = isRecord(message.error) ? message.error : {};
    pending.reject(new Error(typeof error.message === "string" ? error.message : "client error"));
  }
}

export function flushIo(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export async function waitFor(predicate: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error("Timed out waiting for condition");
    }
    await new Promise((resolve) => setTimeout(resolve, 2));
  }
}
