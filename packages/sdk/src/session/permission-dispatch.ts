import type pino from "pino";
import {
  PermissionRequestResultSchema,
  type PermissionRequest,
  type PermissionRequestResult,
} from "../protocol/messages.js";
import type { PermissionHandler, PermissionInvocation } from "./session-config.js";

export const DEFAULT_PERMISSION_DENIAL: PermissionRequestResult = {
  kind: "denied-no-approval-rule-and-could-not-request-from-user",
};

/** Always yields exactly one answer; a missing or failing handler denies. */
export async function dispatchPermissionRequest(
  handler: PermissionHandler | undefined,
  request: PermissionRequest,
  invocation: PermissionInvocation,
  logger: pino.Logger
): Promise<PermissionRequestResult> {
  if (!handler) {
    return DEFAULT_PERMISSION_DENIAL;
  }
  try {
    const result = PermissionRequestResultSchema.safeParse(await handler(request, invocation));
    if (!result.success) {
      logger.warn(
        { sessionId: invocation.sessionId, kind: request.kind },
        "Permission handler returned an invalid result"
      );
      return DEFAULT_PERMISSION_DENIAL;
    }
    return result.data;
  } catch (error) {
    logger.warn(
      { err: error, sessionId: invocation.sessionId, kind: request.kind },
      "Permission handler failed"
    );
    return DEFAULT_PERMISSION_DENIAL;
  }
}
