import type pino from "pino";
import { describeError } from "../errors.js";
import { ToolResultSchema, type ToolResult } from "../protocol/messages.js";
import type { Tool, ToolInvocation } from "./session-config.js";

export function unsupportedToolResult(toolName: string): ToolResult {
  return {
    textResultForLlm: `Tool '${toolName}' is not supported by this client.`,
    resultType: "rejected",
    error: `tool '${toolName}' not supported`,
    toolTelemetry: {},
  };
}

export function failedToolResult(toolName: string, error: unknown): ToolResult {
  const message = describeError(error);
  return {
    textResultForLlm: `Tool '${toolName}' failed: ${message}`,
    resultType: "failure",
    error: message,
    toolTelemetry: {},
  };
}

/**
 * Strings become plain successes, values that already look like a ToolResult
 * pass through, and anything else is sent as JSON text.
 */
export function normalizeToolResult(value: unknown): ToolResult {
  if (typeof value === "string") {
    return { textResultForLlm: value, resultType: "success" };
  }
  if (value === undefined || value === null) {
    return { textResultForLlm: "", resultType: "success" };
  }
  const asResult = ToolResultSchema.safeParse(value);
  if (asResult.success) {
    return asResult.data;
  }
  return { textResultForLlm: JSON.stringify(value) ?? "", resultType: "success" };
}

/** Runs the registered handler for one invocation. Never throws. */
export async function dispatchToolCall(
  tools: ReadonlyMap<string, Tool>,
  invocation: ToolInvocation,
  logger: pino.Logger
): Promise<ToolResult> {
  const tool = tools.get(invocation.toolName);
  if (!tool) {
    logger.warn(
      { toolName: invocation.toolName, toolCallId: invocation.toolCallId },
      "Server requested a tool this session does not provide"
    );
    return unsupportedToolResult(invocation.toolName);
  }

  try {
    const value = await tool.handler(invocation.arguments, invocation);
    return normalizeToolResult(value);
  } catch (error) {
    logger.warn(
      { err: error, toolName: invocation.toolName, toolCallId: invocation.toolCallId },
      "Tool handler failed"
    );
    return failedToolResult(invocation.toolName, error);
  }
}
