import pino from "pino";
import { describe, expect, test } from "vitest";
import type { PermissionRequest } from "../protocol/messages.js";
import { DEFAULT_PERMISSION_DENIAL, dispatchPermissionRequest } from "./permission-dispatch.js";

const logger = pino({ level: "silent" });
const request: PermissionRequest = { kind: "shell", toolCallId: "call-1", command: "ls" };

describe("dispatchPermissionRequest", () => {
  test("denies when no handler is registered", async () => {
    await expect(
      dispatchPermissionRequest(undefined, request, { sessionId: "s1" }, logger)
    ).resolves.toEqual({ kind: "denied-no-approval-rule-and-could-not-request-from-user" });
  });

  test("returns the handler's answer and passes along the request", async () => {
    const seen: unknown[] = [];
    const result = await dispatchPermissionRequest(
      (incoming, invocation) => {
        seen.push(incoming.command, invocation.sessionId);
        return { kind: "approved" };
      },
      request,
      { sessionId: "s1" },
      logger
    );

    expect(result).toEqual({ kind: "approved" });
    expect(seen).toEqual(["ls", "s1"]);
  });

  test("denies when the handler throws", async () => {
    const result = await dispatchPermissionRequest(
      async () => {
        throw new Error("prompt closed");
      },
      request,
      { sessionId: "s1" },
      logger
    );

    expect(result).toBe(DEFAULT_PERMISSION_DENIAL);
  });
});
