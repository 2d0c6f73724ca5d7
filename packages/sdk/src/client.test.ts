import pino from "pino";
import { afterEach, describe, expect, it } from "vitest";
import { AgentClient } from "./client.js";
import type { ClientOptions } from "./client-options.js";
import { ConfigurationError, ConnectionClosedError, RequestCancelledError } from "./errors.js";
import type { EventEnvelope } from "./protocol/envelope.js";
import type { SessionLifecycleEvent } from "./session/agent-session.js";
import { FakeAgentServer, readString, waitFor } from "./test-utils/fake-agent-server.js";

const logger = pino({ level: "silent" });
const clients: AgentClient[] = [];

function setup(options: ClientOptions = {}) {
  const server = new FakeAgentServer();
  const client = new AgentClient({
    logger,
    transportFactory: server.factory,
    autoRestart: false,
    healthCheck: { intervalMs: 0 },
    ...options,
  });
  clients.push(client);
  return { server, client };
}

afterEach(() => {
  for (const client of clients) {
    client.forceStop();
  }
  clients.length = 0;
});

describe("AgentClient", () => {
  it("validates options before touching the server", () => {
    expect(() => new AgentClient({ logger, cliUrl: "localhost:8080", useStdio: true })).toThrow(
      ConfigurationError
    );
  });

  it("starts on first use", async () => {
    const { server, client } = setup();

    const pong = await client.ping("hi");

    expect(pong).toEqual({ message: "pong: hi", timestamp: 1_700_000_000_000, protocolVersion: 2 });
    expect(client.getState()).toEqual({ status: "connected" });
    expect(server.transports).toHaveLength(1);
  });

  it("requires start() when autoStart is off", async () => {
    const { client } = setup({ autoStart: false });

    await expect(client.ping()).rejects.toThrow(
      new ConnectionClosedError("Client is not connected; call start() first")
    );

    await client.start();
    await expect(client.ping()).resolves.toMatchObject({ message: "pong: " });
  });

  it("exposes the server's status, auth and catalog queries", async () => {
    const { client } = setup();

    await expect(client.getStatus()).resolves.toEqual({ version: "0.0.0-test", protocolVersion: 2 });
    await expect(client.getAuthStatus()).resolves.toEqual({
      isAuthenticated: true,
      authType: "token",
      login: "tester",
    });
    expect((await client.listModels()).map((model) => model.id)).toEqual(["test-model"]);
    expect((await client.listSessions()).map((session) => session.sessionId)).toEqual(["session-a"]);
    await expect(client.getLastSessionId()).resolves.toBe("session-a");
  });

  it("reports a refused delete", async () => {
    const { server, client } = setup();
    server.handle("session.delete", () => ({ success: false, error: "not found" }));

    await expect(client.deleteSession("session-x")).rejects.toThrow(
      "Failed to delete session session-x: not found"
    );
  });

  it("forwards events without a session id to onEvent", async () => {
    const { server, client } = setup();
    const received: EventEnvelope[] = [];
    client.onEvent((envelope) => received.push(envelope));
    await client.start();

    server.emitEvent("server.notice", { text: "maintenance" });
    await waitFor(() => received.length === 1);

    expect(received).toEqual([
      { type: "event", event: "server.notice", payload: { text: "maintenance" } },
    ]);
  });

  it("destroys sessions before disconnecting on stop", async () => {
    const { server, client } = setup();
    const session = await client.createSession();

    const errors = await client.stop();

    expect(errors).toEqual([]);
    expect(server.requestsFor("session.destroy").map((request) => request.payload)).toEqual([
      { sessionId: "session-1" },
    ]);
    expect(session.state).toBe("destroyed");
    expect(client.getState()).toEqual({ status: "disconnected", reason: "closed by client" });
  });

  it("returns every cleanup failure from stop", async () => {
    const { server, client } = setup();
    await client.createSession();
    await client.createSession();
    server.handle("session.destroy", (payload) => {
      if (readString(payload, "sessionId") === "session-2") {
        throw new Error("busy");
      }
      return {};
    });

    const errors = await client.stop();

    expect(errors.map((entry) => [entry.stage, entry.error.message])).toEqual([["session", "busy"]]);
    expect(client.getState().status).toBe("disconnected");
  });

  it("resumes open sessions after an automatic restart", async () => {
    const { server, client } = setup({
      autoRestart: true,
      restart: { baseDelayMs: 1, maxDelayMs: 1, maxAttempts: 2 },
    });
    const session = await client.createSession({ streaming: true });
    const lifecycle: SessionLifecycleEvent[] = [];
    session.onLifecycle((event) => lifecycle.push(event));

    server.current.crash();
    await waitFor(() => lifecycle.length === 2);

    expect(lifecycle).toEqual([{ state: "reconnecting" }, { state: "active" }]);
    expect(server.transports).toHaveLength(2);
    expect(server.requestsFor("session.resume")[0]?.payload).toMatchObject({
      sessionId: "session-1",
      streaming: true,
    });
    await expect(session.send({ prompt: "still here" })).resolves.toBe("msg-1");
  });

  it("lifts a compaction block when the session is resumed after a restart", async () => {
    const { server, client } = setup({
      autoRestart: true,
      restart: { baseDelayMs: 1, maxDelayMs: 1, maxAttempts: 2 },
    });
    const session = await client.createSession();
    const lifecycle: SessionLifecycleEvent[] = [];
    session.onLifecycle((event) => lifecycle.push(event));
    server.emitSessionEvent("session-1", {
      type: "session.compaction_start",
      data: { blocking: true, utilization: 0.97 },
    });
    await waitFor(() => session.compactionState === "blocked-compacting");
    const held = session.send({ prompt: "held" });

    server.current.crash();
    await waitFor(() => lifecycle.length === 2);

    expect(lifecycle).toEqual([{ state: "reconnecting" }, { state: "active" }]);
    expect(session.compactionState).toBe("normal");
    expect(session.contextUtilization).toBeNull();
    await expect(held).resolves.toBe("msg-1");
    await expect(session.send({ prompt: "after" })).resolves.toBe("msg-2");
  });

  it("fails a session the server resumes under another id", async () => {
    const { server, client } = setup({
      autoRestart: true,
      restart: { baseDelayMs: 1, maxDelayMs: 1, maxAttempts: 2 },
    });
    const session = await client.createSession({ tools: [{ name: "t", handler: () => "ok" }] });
    const lifecycle: SessionLifecycleEvent[] = [];
    session.onLifecycle((event) => lifecycle.push(event));
    server.handle("session.resume", () => ({ sessionId: "session-new" }));

    server.current.crash();
    await waitFor(() => session.state === "failed");

    expect(lifecycle.map((event) => event.state)).toEqual(["reconnecting", "failed"]);
    expect(lifecycle[1]?.error?.message).toBe(
      "Session session-1 could not be resumed after restart: server resumed it as session-new"
    );
    await expect(session.send({ prompt: "hi" })).rejects.toThrow("Session session-1 is failed");
  });

  it("cancels a request when the caller's signal aborts", async () => {
    const { server, client } = setup();
    await client.start();
    server.handle("models.list", () => new Promise(() => undefined));
    const controller = new AbortController();

    const models = client.listModels({ signal: controller.signal });
    await waitFor(() => server.requestsFor("models.list").length === 1);
    controller.abort("not needed");

    await expect(models).rejects.toThrow(new RequestCancelledError("models.list", "not needed"));
    await waitFor(() => server.events.length === 1);
    expect(server.events[0]).toMatchObject({
      event: "request.cancel",
      payload: { id: server.requestsFor("models.list")[0]?.id },
    });
  });

  it("fails open sessions when the connection is lost for good", async () => {
    const { server, client } = setup();
    const session = await client.createSession();
    const lifecycle: SessionLifecycleEvent[] = [];
    session.onLifecycle((event) => lifecycle.push(event));

    server.current.crash();
    await waitFor(() => session.state === "failed");

    expect(lifecycle.map((event) => event.state)).toEqual(["reconnecting", "failed"]);
    expect(lifecycle[1]?.error?.message).toBe("Session session-1 lost: Agent server exited with code 1");
    expect(client.getState()).toEqual({
      status: "disconnected",
      reason: "Agent server exited with code 1",
    });
  });
});
