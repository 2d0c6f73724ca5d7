import { z } from "zod";
import { SessionEventSchema } from "./session-events.js";

/** Bumped whenever the wire contract changes incompatibly. */
export const SDK_PROTOCOL_VERSION = 2;

export const METHODS = {
  ping: "ping",
  statusGet: "status.get",
  authGetStatus: "auth.getStatus",
  modelsList: "models.list",
  sessionCreate: "session.create",
  sessionResume: "session.resume",
  sessionSend: "session.send",
  sessionAbort: "session.abort",
  sessionDestroy: "session.destroy",
  sessionGetMessages: "session.getMessages",
  sessionList: "session.list",
  sessionDelete: "session.delete",
  sessionGetLastId: "session.getLastId",
  toolCall: "tool.call",
  permissionRequest: "permission.request",
} as const;

export const EVENTS = {
  sessionEvent: "session.event",
  requestCancel: "request.cancel",
} as const;

// ============================================================================
// Client -> server responses
// ============================================================================

export const PingResponseSchema = z.object({
  message: z.string(),
  timestamp: z.number(),
  protocolVersion: z.number().int().optional(),
});

export const GetStatusResponseSchema = z.object({
  version: z.string(),
  protocolVersion: z.number().int(),
});

export const GetAuthStatusResponseSchema = z.object({
  isAuthenticated: z.boolean(),
  authType: z.string().optional(),
  host: z.string().optional(),
  login: z.string().optional(),
  statusMessage: z.string().optional(),
});

const ModelVisionLimitsSchema = z.object({
  supportedMediaTypes: z.array(z.string()).optional(),
  maxPromptImages: z.number().int().optional(),
  maxPromptImageSize: z.number().int().optional(),
});

export const ModelInfoSchema = z.object({
  id: z.string(),
  name: z.string(),
  capabilities: z.object({
    supports: z.object({ vision: z.boolean() }),
    limits: z.object({
      maxPromptTokens: z.number().int().optional(),
      maxContextWindowTokens: z.number().int(),
      vision: ModelVisionLimitsSchema.optional(),
    }),
  }),
  policy: z.object({ state: z.string(), terms: z.string() }).optional(),
  billing: z.object({ multiplier: z.number() }).optional(),
});

export const ListModelsResponseSchema = z.object({
  models: z.array(ModelInfoSchema),
});

export const SessionMetadataSchema = z.object({
  sessionId: z.string(),
  startTime: z.string(),
  modifiedTime: z.string(),
  summary: z.string().optional(),
  isRemote: z.boolean(),
});

export const ListSessionsResponseSchema = z.object({
  sessions: z.array(SessionMetadataSchema),
});

export const DeleteSessionResponseSchema = z.object({
  success: z.boolean(),
  error: z.string().optional(),
});

export const GetLastSessionIdResponseSchema = z.object({
  sessionId: z.string().optional(),
});

export const SessionIdResponseSchema = z.object({
  sessionId: z.string().min(1),
});

export const SendMessageResponseSchema = z.object({
  messageId: z.string().min(1),
});

export const GetMessagesResponseSchema = z.object({
  events: z.array(SessionEventSchema),
});

export const EmptyResponseSchema = z.object({}).passthrough();

// ============================================================================
// Server -> client requests
// ============================================================================

export const ToolCallRequestSchema = z.object({
  sessionId: z.string().min(1),
  toolCallId: z.string().min(1),
  toolName: z.string().min(1),
  arguments: z.unknown(),
});

export const PERMISSION_REQUEST_KINDS = ["shell", "write", "mcp", "read", "url"] as const;

export const PermissionRequestSchema = z
  .object({
    kind: z.enum(PERMISSION_REQUEST_KINDS),
    toolCallId: z.string().optional(),
  })
  .passthrough();

export const PermissionRequestParamsSchema = z.object({
  sessionId: z.string().min(1),
  permissionRequest: PermissionRequestSchema,
});

export const TOOL_RESULT_TYPES = ["success", "failure", "rejected", "denied"] as const;

export const ToolBinaryResultSchema = z.object({
  data: z.string(),
  mimeType: z.string(),
  type: z.string(),
  description: z.string().optional(),
});

export const ToolResultSchema = z.object({
  textResultForLlm: z.string(),
  binaryResultsForLlm: z.array(ToolBinaryResultSchema).optional(),
  resultType: z.enum(TOOL_RESULT_TYPES),
  error: z.string().optional(),
  sessionLog: z.string().optional(),
  toolTelemetry: z.record(z.unknown()).optional(),
});

export const PERMISSION_RESULT_KINDS = [
  "approved",
  "denied-by-rules",
  "denied-no-approval-rule-and-could-not-request-from-user",
  "denied-interactively-by-user",
] as const;

export const PermissionRequestResultSchema = z.object({
  kind: z.enum(PERMISSION_RESULT_KINDS),
  rules: z.array(z.unknown()).optional(),
});

export type PingResponse = z.infer<typeof PingResponseSchema>;
export type GetStatusResponse = z.infer<typeof GetStatusResponseSchema>;
export type GetAuthStatusResponse = z.infer<typeof GetAuthStatusResponseSchema>;
export type ModelInfo = z.infer<typeof ModelInfoSchema>;
export type SessionMetadata = z.infer<typeof SessionMetadataSchema>;
export type DeleteSessionResponse = z.infer<typeof DeleteSessionResponseSchema>;
export type ToolCallRequest = z.infer<typeof ToolCallRequestSchema>;
export type PermissionRequest = z.infer<typeof PermissionRequestSchema>;
export type PermissionRequestParams = z.infer<typeof PermissionRequestParamsSchema>;
export type ToolResultType = (typeof TOOL_RESULT_TYPES)[number];
export type ToolBinaryResult = z.infer<typeof ToolBinaryResultSchema>;
export type ToolResult = z.infer<typeof ToolResultSchema>;
export type PermissionResultKind = (typeof PERMISSION_RESULT_KINDS)[number];
export type PermissionRequestResult = z.infer<typeof PermissionRequestResultSchema>;
