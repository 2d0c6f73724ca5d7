import pino from "pino";
import { describe, expect, it } from "vitest";
import { ConnectionClosedError } from "../errors.js";
import { createFakeSpawn } from "../test-utils/fake-child-process.js";
import { resolveCommand, type ProcessSpec } from "./process-launcher.js";
import { StdioTransport } from "./stdio-transport.js";
import type { TransportCloseEvent } from "./transport.js";

const logger = pino({ level: "silent" });

const server: ProcessSpec = {
  command: "agent",
  args: ["--server", "--log-level", "info", "--stdio"],
  cwd: "/tmp/work",
  env: { AGENTLINK_SDK_AUTH_TOKEN: "test-secret" },
};

function tick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe("StdioTransport", () => {
  it("spawns the server with pipes in the configured directory", async () => {
    const fake = createFakeSpawn();
    const transport = new StdioTransport({ logger, server, spawnProcess: fake.spawnProcess });

    await transport.open();

    expect(fake.calls).toHaveLength(1);
    expect(fake.calls[0]?.command).toBe("agent");
    expect(fake.calls[0]?.args).toEqual(["--server", "--log-level", "info", "--stdio"]);
    expect(fake.calls[0]?.options.cwd).toBe("/tmp/work");
    expect(fake.calls[0]?.options.env).toEqual({ AGENTLINK_SDK_AUTH_TOKEN: "test-secret" });
    expect(fake.calls[0]?.options.stdio).toEqual(["pipe", "pipe", "pipe"]);
    expect(transport.pid).toBe(4242);

    await transport.close();
  });

  it("writes one newline-terminated frame per send, in call order", async () => {
    const fake = createFakeSpawn();
    const transport = new StdioTransport({ logger, server, spawnProcess: fake.spawnProcess });
    await transport.open();

    await Promise.all([transport.send('{"n":1}'), transport.send('{"n":2}'), transport.send('{"n":3}')]);
    await tick();

    expect(fake.calls[0]?.child.written).toBe('{"n":1}\n{"n":2}\n{"n":3}\n');
    await transport.close();
  });

  it("reassembles frames split across stdout chunks", async () => {
    const fake = createFakeSpawn();
    const transport = new StdioTransport({ logger, server, spawnProcess: fake.spawnProcess });
    await transport.open();
    const child = fake.calls[0]?.child;
    if (!child) throw new Error("no child spawned");

    child.stdout.write('{"type":"event","event":"a"}\n{"type":"ev');
    child.stdout.write('ent","event":"b"}\n');

    const iterator = transport.frames()[Symbol.asyncIterator]();
    expect(await iterator.next()).toEqual({
      done: false,
      value: { kind: "frame", text: '{"type":"event","event":"a"}' },
    });
    expect(await iterator.next()).toEqual({
      done: false,
      value: { kind: "frame", text: '{"type":"event","event":"b"}' },
    });
    await transport.close();
  });

  it("reports an unexpected exit with the stderr tail and ends the frame sequence", async () => {
    const fake = createFakeSpawn();
    const transport = new StdioTransport({ logger, server, spawnProcess: fake.spawnProcess });
    const events: TransportCloseEvent[] = [];
    transport.onClose((event) => events.push(event));
    await transport.open();
    const child = fake.calls[0]?.child;
    if (!child) throw new Error("no child spawned");

    child.stderr.write("boom\n");
    await tick();
    child.exit(1);

    expect(events).toEqual([{ reason: "Agent server exited with code 1: boom", expected: false }]);
    const iterator = transport.frames()[Symbol.asyncIterator]();
    expect(await iterator.next()).toEqual({ done: true, value: undefined });
    await expect(transport.send("{}")).rejects.toBeInstanceOf(ConnectionClosedError);
  });

  it("closes stdin first and fires close handlers once", async () => {
    const fake = createFakeSpawn({ exitOn: "stdin-end" });
    const transport = new StdioTransport({ logger, server, spawnProcess: fake.spawnProcess });
    const events: TransportCloseEvent[] = [];
    transport.onClose((event) => events.push(event));
    await transport.open();

    await transport.close();
    await transport.close();

    expect(fake.calls[0]?.child.exitCode).toBe(0);
    expect(fake.calls[0]?.child.signals).toEqual([]);
    expect(events).toEqual([{ reason: "Transport closed by client", expected: true }]);
  });

  it("escalates to SIGTERM and then SIGKILL when the server keeps running", async () => {
    const fake = createFakeSpawn({ exitOn: "SIGKILL" });
    const transport = new StdioTransport({
      logger,
      server,
      spawnProcess: fake.spawnProcess,
      stopGraceMs: 10,
    });
    await transport.open();

    await transport.close();

    expect(fake.calls[0]?.child.signals).toEqual(["SIGTERM", "SIGKILL"]);
    expect(fake.calls[0]?.child.signalCode).toBe("SIGKILL");
  });

  it("kills the process immediately on forceClose", async () => {
    const fake = createFakeSpawn({ exitOn: "SIGKILL" });
    const transport = new StdioTransport({ logger, server, spawnProcess: fake.spawnProcess });
    await transport.open();

    transport.forceClose();

    expect(fake.calls[0]?.child.signals).toEqual(["SIGKILL"]);
    expect(transport.isOpen).toBe(false);
  });

  it("fails to open when the executable cannot be spawned", async () => {
    const fake = createFakeSpawn({ failSpawnWith: "ENOENT" });
    const transport = new StdioTransport({ logger, server, spawnProcess: fake.spawnProcess });

    const error = await transport.open().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ConnectionClosedError);
    expect(error).toHaveProperty(
      "message",
      "Failed to open stdio agent server (agent): spawn ENOENT"
    );
  });
});

describe("resolveCommand", () => {
  it("runs .js entry points through the current node executable", () => {
    expect(resolveCommand({ ...server, command: "/opt/agent/index.js" })).toEqual({
      command: process.execPath,
      args: ["/opt/agent/index.js", "--server", "--log-level", "info", "--stdio"],
    });
  });

  it("runs other commands directly", () => {
    expect(resolveCommand(server)).toEqual({ command: "agent", args: server.args });
  });
});
