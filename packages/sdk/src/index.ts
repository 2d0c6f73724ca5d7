export { AgentClient, type StopError } from "./client.js";
export {
  AUTH_TOKEN_ENV,
  DEFAULT_CLI_PATH,
  DEFAULT_REQUEST_TIMEOUT_MS,
  SERVER_LOG_LEVELS,
  buildServerArgs,
  buildServerProcess,
  resolveClientOptions,
  toTransportSettings,
  type ClientOptions,
  type ResolvedClientOptions,
  type ServerLogLevel,
} from "./client-options.js";
export {
  AgentLinkError,
  ConfigurationError,
  ConnectionClosedError,
  ProtocolError,
  ProtocolVersionError,
  RemoteError,
  RequestCancelledError,
  RequestTimeoutError,
  SessionFailedError,
  describeError,
  toError,
} from "./errors.js";
export {
  createChildLogger,
  createRootLogger,
  resolveLogConfig,
  type LogConfigOverrides,
  type LogFormat,
  type LogLevel,
  type ResolvedLogConfig,
} from "./logger.js";
export {
  ConnectionManager,
  DEFAULT_HEALTH_CHECK,
  DEFAULT_RESTART,
  restartDelay,
  type ConnectionManagerOptions,
  type ConnectionState,
  type ConnectionStatus,
  type HealthCheckOptions,
  type RestartOptions,
} from "./connection/connection-manager.js";
export {
  CorrelationRouter,
  type EventHandler,
  type CallOptions,
  type IssueOptions,
  type RequestHandler,
} from "./correlation/router.js";
export { PendingOperationTable } from "./correlation/pending-operations.js";
export * from "./protocol/envelope.js";
export * from "./protocol/codec.js";
export * from "./protocol/messages.js";
export * from "./protocol/session-events.js";
export {
  AgentSession,
  DEFAULT_SEND_AND_WAIT_TIMEOUT_MS,
  type SessionEventHandler,
  type SessionLifecycleEvent,
  type SessionLifecycleState,
} from "./session/agent-session.js";
export { SessionEngine } from "./session/session-engine.js";
export { CompactionTracker, type CompactionState } from "./session/compaction-tracker.js";
export { StreamAssembler, type CompletedBlock, type StreamKind } from "./session/stream-assembler.js";
export { DEFAULT_PERMISSION_DENIAL } from "./session/permission-dispatch.js";
export { normalizeToolResult } from "./session/tool-dispatch.js";
export * from "./session/session-config.js";
export { parseCliUrl, type CliAddress } from "./transport/cli-url.js";
export {
  createTransportFactory,
  type TransportSettings,
} from "./transport/transport-factory.js";
export { StdioTransport } from "./transport/stdio-transport.js";
export { TcpTransport } from "./transport/tcp-transport.js";
export type {
  AgentTransport,
  InboundFrame,
  TransportCloseEvent,
  TransportFactory,
  TransportKind,
} from "./transport/transport.js";
export type { ProcessSpec, SpawnProcess } from "./transport/process-launcher.js";
