import { z } from "zod";

/**
 * Session events arrive as `session.event` envelopes. The outer shape is
 * validated strictly; `data` is kept open so new server event types flow
 * through to subscribers untouched.
 */
export const SessionEventSchema = z.object({
  id: z.string().optional(),
  type: z.string().min(1),
  timestamp: z.string().optional(),
  parentId: z.string().nullable().optional(),
  ephemeral: z.boolean().optional(),
  data: z.record(z.unknown()).default({}),
});

export type SessionEvent = z.infer<typeof SessionEventSchema>;

export const SESSION_EVENT_TYPES = {
  sessionStart: "session.start",
  sessionResume: "session.resume",
  sessionIdle: "session.idle",
  sessionError: "session.error",
  usageInfo: "session.usage_info",
  compactionStart: "session.compaction_start",
  compactionComplete: "session.compaction_complete",
  userMessage: "user.message",
  messageDelta: "assistant.message_delta",
  message: "assistant.message",
  reasoningDelta: "assistant.reasoning_delta",
  reasoning: "assistant.reasoning",
  turnStart: "assistant.turn_start",
  turnEnd: "assistant.turn_end",
  toolExecutionStart: "tool.execution_start",
  toolExecutionComplete: "tool.execution_complete",
} as const;

export type KnownSessionEventType = (typeof SESSION_EVENT_TYPES)[keyof typeof SESSION_EVENT_TYPES];

export const MessageDeltaDataSchema = z.object({
  messageId: z.string().min(1),
  deltaContent: z.string(),
});

export const MessageDataSchema = z.object({
  messageId: z.string().min(1),
  content: z.string(),
});

export const ReasoningDeltaDataSchema = z.object({
  reasoningId: z.string().min(1),
  deltaContent: z.string(),
});

export const ReasoningDataSchema = z.object({
  reasoningId: z.string().min(1),
  content: z.string(),
});

export const UsageInfoDataSchema = z.object({
  utilization: z.number().min(0),
  currentTokens: z.number().optional(),
  tokenLimit: z.number().optional(),
});

export const CompactionStartDataSchema = z.object({
  blocking: z.boolean().optional(),
  utilization: z.number().min(0).optional(),
});

export const CompactionCompleteDataSchema = z.object({
  success: z.boolean().optional(),
  error: z.string().optional(),
  utilization: z.number().min(0).optional(),
});

export const SessionErrorDataSchema = z.object({
  errorType: z.string().optional(),
  message: z.string(),
});
