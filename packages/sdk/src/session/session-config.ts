import { z } from "zod";
import { parseOrThrow } from "../validation.js";
import type { PermissionRequest, PermissionRequestResult } from "../protocol/messages.js";

// MCP tools are addressed as `server:tool`, so ':' is allowed alongside '.'.
const TOOL_NAME_PATTERN = /^[A-Za-z0-9_.:-]{1,128}$/;

export const ToolNameSchema = z
  .string()
  .regex(
    TOOL_NAME_PATTERN,
    "Tool names must be 1-128 letters, digits, '_', '.', ':' or '-'"
  );

export type ToolInvocation = {
  sessionId: string;
  toolCallId: string;
  toolName: string;
  arguments: unknown;
};

/**
 * Return a string for a plain-text success, a `ToolResult` to control the
 * outcome, or any other JSON-serializable value. Throwing marks the call failed.
 */
export type ToolHandler = (args: unknown, invocation: ToolInvocation) => unknown;

export type PermissionInvocation = {
  sessionId: string;
};

export type PermissionHandler = (
  request: PermissionRequest,
  invocation: PermissionInvocation
) => PermissionRequestResult | Promise<PermissionRequestResult>;

const functionSchema = <T>(label: string) =>
  z.custom<T>((value) => typeof value === "function", { message: `${label} must be a function` });

export const ToolSchema = z.object({
  name: ToolNameSchema,
  description: z.string().optional(),
  parameters: z.record(z.unknown()).optional(),
  handler: functionSchema<ToolHandler>("Tool handler"),
});

const ToolListSchema = z
  .array(ToolSchema)
  .default([])
  .superRefine((tools, ctx) => {
    const seen = new Set<string>();
    tools.forEach((tool, index) => {
      if (seen.has(tool.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, "name"],
          message: `Duplicate tool name '${tool.name}'`,
        });
      }
      seen.add(tool.name);
    });
  });

export const SystemMessageSchema = z
  .object({
    mode: z.enum(["append", "replace"]).default("append"),
    content: z.string().optional(),
  })
  .superRefine((value, ctx) => {
    if (value.mode === "replace" && !value.content) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["content"],
        message: "content is required when mode is 'replace'",
      });
    }
  });

export const ProviderConfigSchema = z.object({
  type: z.enum(["openai", "azure", "anthropic"]).optional(),
  wireApi: z.enum(["completions", "responses"]).optional(),
  baseUrl: z.string().url(),
  apiKey: z.string().optional(),
  bearerToken: z.string().optional(),
  azure: z.object({ apiVersion: z.string().optional() }).optional(),
});

const McpLocalServerSchema = z.object({
  type: z.enum(["local", "stdio"]).optional(),
  tools: z.array(z.string()),
  timeout: z.number().int().positive().optional(),
  command: z.string().min(1),
  args: z.array(z.string()),
  env: z.record(z.string()).optional(),
  cwd: z.string().optional(),
});

const McpRemoteServerSchema = z.object({
  type: z.enum(["http", "sse"]),
  tools: z.array(z.string()),
  timeout: z.number().int().positive().optional(),
  url: z.string().url(),
  headers: z.record(z.string()).optional(),
});

export const McpServerConfigSchema = z.union([McpRemoteServerSchema, McpLocalServerSchema]);

export const CustomAgentConfigSchema = z.object({
  name: z.string().min(1),
  displayName: z.string().optional(),
  description: z.string().optional(),
  tools: z.array(ToolNameSchema).nullable().optional(),
  prompt: z.string(),
  mcpServers: z.record(McpServerConfigSchema).optional(),
  infer: z.boolean().optional(),
});

export const DEFAULT_BACKGROUND_COMPACTION_THRESHOLD = 0.8;
export const DEFAULT_BUFFER_EXHAUSTION_THRESHOLD = 0.95;

const ThresholdSchema = z.number().min(0).max(1);

export const InfiniteSessionConfigSchema = z
  .object({
    enabled: z.boolean().default(true),
    backgroundCompactionThreshold: ThresholdSchema.default(DEFAULT_BACKGROUND_COMPACTION_THRESHOLD),
    bufferExhaustionThreshold: ThresholdSchema.default(DEFAULT_BUFFER_EXHAUSTION_THRESHOLD),
  })
  .refine((value) => value.backgroundCompactionThreshold <= value.bufferExhaustionThreshold, {
    path: ["backgroundCompactionThreshold"],
    message: "backgroundCompactionThreshold must not exceed bufferExhaustionThreshold",
  });

const sharedSessionFields = {
  tools: ToolListSchema,
  provider: ProviderConfigSchema.optional(),
  onPermissionRequest: functionSchema<PermissionHandler>("onPermissionRequest").optional(),
  streaming: z.boolean().default(false),
  mcpServers: z.record(McpServerConfigSchema).optional(),
  customAgents: z.array(CustomAgentConfigSchema).optional(),
  skillDirectories: z.array(z.string().min(1)).optional(),
  disabledSkills: z.array(z.string().min(1)).optional(),
  infiniteSessions: InfiniteSessionConfigSchema.default({}),
};

export const SessionConfigSchema = z.object({
  sessionId: z.string().min(1).optional(),
  model: z.string().min(1, "model must not be empty").optional(),
  configDir: z.string().min(1).optional(),
  systemMessage: SystemMessageSchema.optional(),
  availableTools: z.array(ToolNameSchema).optional(),
  excludedTools: z.array(ToolNameSchema).optional(),
  ...sharedSessionFields,
});

export const ResumeSessionConfigSchema = z.object(sharedSessionFields);

export type SessionConfig = z.input<typeof SessionConfigSchema>;
export type ResumeSessionConfig = z.input<typeof ResumeSessionConfigSchema>;
export type ValidatedSessionConfig = z.output<typeof SessionConfigSchema>;
export type ValidatedResumeConfig = z.output<typeof ResumeSessionConfigSchema>;
export type Tool = z.output<typeof ToolSchema>;
export type SystemMessageConfig = z.input<typeof SystemMessageSchema>;
export type ProviderConfig = z.output<typeof ProviderConfigSchema>;
export type McpServerConfig = z.output<typeof McpServerConfigSchema>;
export type CustomAgentConfig = z.output<typeof CustomAgentConfigSchema>;
export type InfiniteSessionConfig = z.output<typeof InfiniteSessionConfigSchema>;

export const ATTACHMENT_TYPES = ["file", "directory"] as const;

export const AttachmentSchema = z.object({
  type: z.enum(ATTACHMENT_TYPES),
  path: z.string().min(1),
  displayName: z.string().optional(),
});

export const MESSAGE_MODES = ["enqueue", "immediate"] as const;

export const MessageOptionsSchema = z.object({
  prompt: z.string(),
  attachments: z.array(AttachmentSchema).optional(),
  mode: z.enum(MESSAGE_MODES).default("enqueue"),
});

export type Attachment = z.output<typeof AttachmentSchema>;
export type MessageMode = (typeof MESSAGE_MODES)[number];
export type MessageOptions = z.input<typeof MessageOptionsSchema>;
export type ValidatedMessageOptions = z.output<typeof MessageOptionsSchema>;

export function validateSessionConfig(config: SessionConfig = {}): ValidatedSessionConfig {
  return parseOrThrow(SessionConfigSchema, config, "session config");
}

export function validateResumeConfig(config: ResumeSessionConfig = {}): ValidatedResumeConfig {
  return parseOrThrow(ResumeSessionConfigSchema, config, "resume config");
}

export function validateMessageOptions(options: MessageOptions): ValidatedMessageOptions {
  return parseOrThrow(MessageOptionsSchema, options, "message options");
}

function toToolDefinitions(tools: Tool[]) {
  return tools.map((tool) => ({
    name: tool.name,
    description: tool.description,
    parameters: tool.parameters,
  }));
}

function sharedPayload(config: ValidatedResumeConfig) {
  return {
    tools: toToolDefinitions(config.tools),
    provider: config.provider,
    requestPermission: config.onPermissionRequest !== undefined,
    streaming: config.streaming,
    mcpServers: config.mcpServers,
    customAgents: config.customAgents,
    skillDirectories: config.skillDirectories,
    disabledSkills: config.disabledSkills,
    infiniteSessions: config.infiniteSessions,
  };
}

/** Wire payload for `session.create`. Handlers stay on this side of the wire. */
export function toCreatePayload(config: ValidatedSessionConfig) {
  return {
    sessionId: config.sessionId,
    model: config.model,
    configDir: config.configDir,
    systemMessage: config.systemMessage,
    availableTools: config.availableTools,
    excludedTools: config.excludedTools,
    ...sharedPayload(config),
  };
}

export function toResumePayload(sessionId: string, config: ValidatedResumeConfig) {
  return { sessionId, ...sharedPayload(config) };
}
