import { describe, expect, it } from "vitest";
import {
  buildServerProcess,
  resolveClientOptions,
  toTransportSettings,
  type ClientOptions,
} from "./client-options.js";
import { ConfigurationError } from "./errors.js";

describe("resolveClientOptions", () => {
  it("fills in defaults", () => {
    const resolved = resolveClientOptions({}, {});

    expect(resolved).toEqual({
      cliPath: "agent",
      cliArgs: [],
      cwd: process.cwd(),
      port: 0,
      useStdio: true,
      cliUrl: null,
      logLevel: "info",
      autoStart: true,
      autoRestart: true,
      env: {},
      authToken: undefined,
      useLoggedInUser: true,
      requestTimeoutMs: 600_000,
      healthCheck: {},
      restart: {},
    });
  });

  it("takes the server path from the environment when none is given", () => {
    expect(resolveClientOptions({}, { AGENTLINK_CLI_PATH: "/opt/agent/bin/agent" }).cliPath).toBe(
      "/opt/agent/bin/agent"
    );
    expect(
      resolveClientOptions({ cliPath: "./agent.js" }, { AGENTLINK_CLI_PATH: "/opt/agent/bin/agent" })
        .cliPath
    ).toBe("./agent.js");
  });

  it("switches to attach mode for a cliUrl", () => {
    const resolved = resolveClientOptions({ cliUrl: "http://127.0.0.1:9000" }, {});

    expect(resolved.useStdio).toBe(false);
    expect(resolved.cliUrl).toEqual({ host: "127.0.0.1", port: 9000 });
    expect(toTransportSettings(resolved)).toEqual({
      mode: "tcp-attach",
      host: "127.0.0.1",
      port: 9000,
    });
  });

  it.each<[string, ClientOptions]>([
    ["useStdio", { cliUrl: "localhost:8080", useStdio: false }],
    ["cliPath", { cliUrl: "localhost:8080", cliPath: "agent" }],
  ])("rejects cliUrl combined with %s", (_name, options) => {
    expect(() => resolveClientOptions(options, {})).toThrow(
      "cliUrl is mutually exclusive with useStdio and cliPath"
    );
  });

  it.each<[string, ClientOptions]>([
    ["authToken", { cliUrl: "localhost:8080", authToken: "test-secret" }],
    ["useLoggedInUser", { cliUrl: "localhost:8080", useLoggedInUser: false }],
  ])("rejects cliUrl combined with %s", (_name, options) => {
    expect(() => resolveClientOptions(options, {})).toThrow(
      "authToken and useLoggedInUser cannot be used with cliUrl"
    );
  });

  it("reports a malformed cliUrl as a configuration error", () => {
    expect(() => resolveClientOptions({ cliUrl: "invalid-url" }, {})).toThrow(
      new ConfigurationError("Invalid cliUrl format: invalid-url")
    );
  });

  it("rejects values outside their schema", () => {
    const options: ClientOptions = JSON.parse('{"logLevel":"loud","port":70000}');

    expect(() => resolveClientOptions(options, {})).toThrow(ConfigurationError);
    expect(() => resolveClientOptions(options, {})).toThrow(/^Invalid client options: port: /);
  });

  it("ignores injected collaborators while validating", () => {
    const transportFactory = () => {
      throw new Error("not called");
    };

    const resolved = resolveClientOptions({ transportFactory }, {});

    expect(resolved.useStdio).toBe(true);
  });
});

describe("server process", () => {
  it("hands an auth token over through the environment", () => {
    const resolved = resolveClientOptions(
      { authToken: "test-secret", cwd: "/work", env: { PATH: "/usr/bin" } },
      {}
    );

    expect(resolved.useLoggedInUser).toBe(false);
    expect(buildServerProcess(resolved)).toEqual({
      command: "agent",
      args: [
        "--server",
        "--log-level",
        "info",
        "--stdio",
        "--auth-token-env",
        "AGENTLINK_SDK_AUTH_TOKEN",
        "--no-auto-login",
      ],
      cwd: "/work",
      env: { PATH: "/usr/bin", AGENTLINK_SDK_AUTH_TOKEN: "test-secret" },
    });
  });

  it("keeps auto-login when asked to alongside a token", () => {
    const resolved = resolveClientOptions({ authToken: "test-secret", useLoggedInUser: true }, {});

    expect(buildServerProcess(resolved).args).toEqual([
      "--server",
      "--log-level",
      "info",
      "--stdio",
      "--auth-token-env",
      "AGENTLINK_SDK_AUTH_TOKEN",
    ]);
  });

  it("spawns a TCP server on the requested port", () => {
    const resolved = resolveClientOptions(
      { useStdio: false, port: 4321, cliArgs: ["--verbose"], logLevel: "debug", cwd: "/work" },
      {}
    );

    expect(toTransportSettings(resolved)).toEqual({
      mode: "tcp-spawn",
      host: "localhost",
      server: {
        command: "agent",
        args: ["--verbose", "--server", "--log-level", "debug", "--port", "4321"],
        cwd: "/work",
        env: {},
      },
    });
  });
});
