import pino from "pino";
import { afterEach, describe, expect, it } from "vitest";
import { CorrelationRouter } from "../correlation/router.js";
import { ConnectionClosedError, ProtocolVersionError } from "../errors.js";
import { FakeAgentServer, flushIo, waitFor } from "../test-utils/fake-agent-server.js";
import {
  ConnectionManager,
  restartDelay,
  type ConnectionManagerOptions,
  type ConnectionState,
} from "./connection-manager.js";

const logger = pino({ level: "silent" });

function setup(overrides: Partial<ConnectionManagerOptions> = {}) {
  const server = new FakeAgentServer();
  const router = new CorrelationRouter({ logger, defaultTimeoutMs: 5_000 });
  const manager = new ConnectionManager({
    logger,
    router,
    transportFactory: server.factory,
    autoRestart: false,
    healthCheck: { intervalMs: 0 },
    restart: { baseDelayMs: 1, maxDelayMs: 4, maxAttempts: 2 },
    ...overrides,
  });
  const states: ConnectionState[] = [];
  manager.onStateChange((state) => states.push(state));
  const lost: Error[] = [];
  manager.onLost((error) => lost.push(error));
  return { server, router, manager, states, lost };
}

describe("ConnectionManager", () => {
  const managers: ConnectionManager[] = [];

  afterEach(() => {
    for (const manager of managers) {
      manager.forceDisconnect();
    }
    managers.length = 0;
  });

  it("connects, verifies the protocol version and reports each state", async () => {
    const { server, manager, states } = setup();
    managers.push(manager);

    await manager.connect();

    expect(states).toEqual([
      { status: "disconnected" },
      { status: "connecting", attempt: 0 },
      { status: "connected" },
    ]);
    expect(server.requestsFor("ping")).toHaveLength(1);
  });

  it("shares one attempt between concurrent connect calls", async () => {
    const { server, manager } = setup();
    managers.push(manager);

    await Promise.all([manager.connect(), manager.connect(), manager.connect()]);
    await manager.connect();

    expect(server.transports).toHaveLength(1);
  });

  it("rejects a server speaking another protocol version", async () => {
    const { server, manager } = setup();
    managers.push(manager);
    server.protocolVersion = 1;

    const error = await manager.connect().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ProtocolVersionError);
    expect(error).toHaveProperty(
      "message",
      "Protocol version mismatch: SDK expects version 2, but the server reports version 1"
    );
    expect(manager.getState()).toEqual({ status: "disconnected", reason: expect.any(String) });
    expect(server.current.isOpen).toBe(false);
  });

  it("rejects a server that reports no protocol version", async () => {
    const { server, manager } = setup();
    managers.push(manager);
    server.protocolVersion = null;

    await expect(manager.connect()).rejects.toThrow(
      "Protocol version mismatch: SDK expects version 2, but the server does not report a protocol version"
    );
  });

  it("fails pending requests and reports the loss when auto-restart is off", async () => {
    const { server, router, manager, states, lost } = setup();
    managers.push(manager);
    await manager.connect();
    server.handle("session.send", () => new Promise(() => undefined));

    const pending = router.issue("session.send", { sessionId: "s1" });
    await flushIo();
    server.current.crash("Agent server exited with code 1");

    await expect(pending).rejects.toBeInstanceOf(ConnectionClosedError);
    expect(states.slice(-2)).toEqual([
      { status: "error", reason: "Agent server exited with code 1" },
      { status: "disconnected", reason: "Agent server exited with code 1" },
    ]);
    expect(lost.map((error) => error.message)).toEqual(["Agent server exited with code 1"]);
    await expect(manager.connect()).resolves.toBeUndefined();
    expect(server.transports).toHaveLength(2);
  });

  it("restarts after an unexpected close and notifies restart listeners", async () => {
    const { server, manager, lost } = setup({ autoRestart: true });
    managers.push(manager);
    let restarted = 0;
    manager.onRestarted(() => {
      restarted += 1;
    });
    await manager.connect();

    server.current.crash();
    await manager.connect();

    expect(restarted).toBe(1);
    expect(lost).toEqual([]);
    expect(server.transports).toHaveLength(2);
    expect(manager.getState()).toEqual({ status: "connected" });
  });

  it("gives up after the configured number of restart attempts", async () => {
    const { server, manager, lost } = setup({ autoRestart: true });
    managers.push(manager);
    await manager.connect();

    server.failNextOpens = 5;
    server.current.crash();
    await waitFor(() => lost.length === 1);

    expect(server.transports).toHaveLength(3);
    expect(lost[0]?.message).toBe("Failed to open fake agent server: spawn failed");
    expect(manager.getState()).toEqual({
      status: "disconnected",
      reason: "Failed to open fake agent server: spawn failed",
    });
    await expect(manager.connect()).rejects.toThrow("spawn failed");
  });

  it("marks the connection unhealthy after repeated undecodable frames", async () => {
    const { server, manager, lost } = setup({ decodeFailureThreshold: 3 });
    managers.push(manager);
    await manager.connect();

    server.current.deliver("not json");
    server.current.deliver('{"type":"bogus"}');
    await flushIo();
    expect(manager.getState()).toEqual({ status: "connected" });

    server.current.deliver('{"type":"response"}');
    await waitFor(() => lost.length === 1);

    expect(lost[0]?.message).toBe("Connection unhealthy: 3 consecutive undecodable frames");
    expect(server.current.isOpen).toBe(false);
  });

  it("resets the decode failure count after a good frame", async () => {
    const { server, manager, lost } = setup({ decodeFailureThreshold: 2 });
    managers.push(manager);
    await manager.connect();

    server.current.deliver("garbage");
    server.emitEvent("server.notice", {});
    server.current.deliver("garbage");
    await flushIo();

    expect(lost).toEqual([]);
    expect(manager.getState()).toEqual({ status: "connected" });
  });

  it("declares the connection lost after three failed health checks", async () => {
    const { server, manager, lost } = setup({
      healthCheck: { intervalMs: 5, timeoutMs: 5, maxFailures: 3 },
    });
    managers.push(manager);
    await manager.connect();
    server.handle("ping", () => new Promise(() => undefined));

    await waitFor(() => lost.length === 1);

    expect(lost[0]?.message).toBe("Connection unhealthy: 3 consecutive health checks failed");
    expect(server.requestsFor("ping").length).toBeGreaterThanOrEqual(4);
  });

  it("closes the transport on disconnect without treating it as a failure", async () => {
    const { server, manager, lost } = setup({ autoRestart: true });
    managers.push(manager);
    await manager.connect();

    await manager.disconnect();

    expect(server.current.closeEvent).toEqual({ reason: "Transport closed by client", expected: true });
    expect(manager.getState()).toEqual({ status: "disconnected", reason: "closed by client" });
    expect(lost).toEqual([]);
    expect(server.transports).toHaveLength(1);
  });

  it("force-closes the transport on forceDisconnect", async () => {
    const { server, manager } = setup();
    await manager.connect();

    manager.forceDisconnect();

    expect(server.current.closeEvent?.reason).toBe("Transport force-closed by client");
    expect(manager.getState()).toEqual({ status: "disconnected", reason: "force-closed by client" });
  });
});

describe("restartDelay", () => {
  it("doubles from the base delay up to the cap", () => {
    const options = { baseDelayMs: 500, maxDelayMs: 10_000, maxAttempts: 10 };
    expect([0, 1, 2, 3, 4, 5, 6].map((attempt) => restartDelay(attempt, options))).toEqual([
      500, 1000, 2000, 4000, 8000, 10_000, 10_000,
    ]);
  });
});
