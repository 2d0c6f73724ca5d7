import { ConfigurationError } from "../errors.js";

export type CliAddress = {
  host: string;
  port: number;
};

const SCHEME_PATTERN = /^(?:https?|tcp):\/\//i;
const DIGITS_PATTERN = /^\d+$/;

/**
 * Accepts `host:port`, `[ipv6]:port`, a bare port (meaning localhost), or a
 * URL form such as `http://host:port` or `tcp://host:port`.
 */
export function parseCliUrl(input: string): CliAddress {
  const trimmed = input.trim();
  const withoutScheme = trimmed.replace(SCHEME_PATTERN, "").replace(/\/+$/, "");

  if (DIGITS_PATTERN.test(withoutScheme)) {
    return { host: "localhost", port: parsePort(withoutScheme, input) };
  }

  const separator = withoutScheme.lastIndexOf(":");
  if (separator === -1 || withoutScheme.includes("/")) {
    throw new ConfigurationError(`Invalid cliUrl format: ${input}`);
  }

  const host = parseHost(withoutScheme.slice(0, separator), input);
  return { host, port: parsePort(withoutScheme.slice(separator + 1), input) };
}

// `[::1]` is the IPv6 form; net.connect wants the address without brackets.
function parseHost(raw: string, input: string): string {
  if (raw === "") {
    return "localhost";
  }
  const bracketed = /^\[([0-9A-Fa-f:.]+)\]$/.exec(raw);
  if (bracketed) {
    return bracketed[1];
  }
  if (raw.includes("[") || raw.includes("]")) {
    throw new ConfigurationError(`Invalid cliUrl format: ${input}`);
  }
  return raw;
}

function parsePort(raw: string, input: string): number {
  const port = DIGITS_PATTERN.test(raw) ? Number(raw) : Number.NaN;
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigurationError(`Invalid port in cliUrl: ${input}`);
  }
  return port;
}
