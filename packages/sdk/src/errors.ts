export type AgentLinkErrorCode =
  | "configuration"
  | "protocol"
  | "timeout"
  | "cancelled"
  | "connection_closed"
  | "remote"
  | "session_failed"
  | "protocol_version";

export class AgentLinkError extends Error {
  readonly code: AgentLinkErrorCode;

  constructor(code: AgentLinkErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AgentLinkError";
    this.code = code;
  }
}

/** Invalid or conflicting client/session options. Always raised before any I/O. */
export class ConfigurationError extends AgentLinkError {
  constructor(message: string) {
    super("configuration", message);
    this.name = "ConfigurationError";
  }
}

export class ProtocolError extends AgentLinkError {
  readonly frame: string | null;

  constructor(message: string, frame: string | null = null) {
    super("protocol", message);
    this.name = "ProtocolError";
    this.frame = frame;
  }
}

export class RequestTimeoutError extends AgentLinkError {
  readonly method: string;
  readonly timeoutMs: number;

  constructor(method: string, timeoutMs: number) {
    super("timeout", `Request ${method} timed out after ${timeoutMs}ms`);
    this.name = "RequestTimeoutError";
    this.method = method;
    this.timeoutMs = timeoutMs;
  }
}

export class RequestCancelledError extends AgentLinkError {
  readonly method: string;

  constructor(method: string, reason?: string) {
    super("cancelled", reason ? `Request ${method} cancelled: ${reason}` : `Request ${method} cancelled`);
    this.name = "RequestCancelledError";
    this.method = method;
  }
}

export class ConnectionClosedError extends AgentLinkError {
  constructor(message = "Connection closed", options?: { cause?: unknown }) {
    super("connection_closed", message, options);
    this.name = "ConnectionClosedError";
  }
}

export class RemoteError extends AgentLinkError {
  readonly method: string;
  readonly remoteCode: string | number | undefined;
  readonly data: unknown;

  constructor(params: { method: string; message: string; remoteCode?: string | number; data?: unknown }) {
    super("remote", params.message);
    this.name = "RemoteError";
    this.method = params.method;
    this.remoteCode = params.remoteCode;
    this.data = params.data;
  }
}

export class SessionFailedError extends AgentLinkError {
  readonly sessionId: string;

  constructor(sessionId: string, message: string, options?: { cause?: unknown }) {
    super("session_failed", message, options);
    this.name = "SessionFailedError";
    this.sessionId = sessionId;
  }
}

export class ProtocolVersionError extends AgentLinkError {
  readonly expected: number;
  readonly actual: number | null;

  constructor(expected: number, actual: number | null) {
    super(
      "protocol_version",
      actual === null
        ? `Protocol version mismatch: SDK expects version ${expected}, but the server does not report a protocol version`
        : `Protocol version mismatch: SDK expects version ${expected}, but the server reports version ${actual}`
    );
    this.name = "ProtocolVersionError";
    this.expected = expected;
    this.actual = actual;
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

/** The error an operation rejects with once its AbortSignal fires. */
export function cancelledBy(method: string, reason: unknown): RequestCancelledError {
  return new RequestCancelledError(method, reason === undefined ? undefined : describeError(reason));
}
