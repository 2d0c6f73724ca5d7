import type { Command } from 'commander'
import type pino from 'pino'
import { AgentClient, createRootLogger, type ClientOptions, type SessionMetadata } from '@agentlink/sdk'
import type { CommandError } from '../output/index.js'

export interface ConnectOptions {
  url?: string
  cliPath?: string
}

export type ClientFactory = (options: ClientOptions) => AgentClient

let cliLogger: pino.Logger | null = null

/** Human-readable logs on stderr unless AGENTLINK_LOG_FORMAT says otherwise */
export function getCliLogger(): pino.Logger {
  if (!cliLogger) {
    cliLogger = createRootLogger(undefined, { level: 'warn', format: 'pretty' })
  }
  return cliLogger
}

const defaultClientFactory: ClientFactory = (options) =>
  new AgentClient({ ...options, logger: getCliLogger() })

/** Read the global connection flags from a command */
export function connectOptionsOf(command: Command): ConnectOptions {
  const options = command.optsWithGlobals()
  return {
    url: typeof options.url === 'string' ? options.url : undefined,
    cliPath: typeof options.cliPath === 'string' ? options.cliPath : undefined,
  }
}

/**
 * Map CLI flags to client options. Flags win over the environment; a URL
 * means attaching to a running server instead of spawning one.
 */
export function buildClientOptions(
  options: ConnectOptions,
  env: NodeJS.ProcessEnv = process.env
): ClientOptions {
  const url = options.url ?? env.AGENTLINK_CLI_URL
  if (url) {
    return { cliUrl: url, autoRestart: false }
  }
  const cliPath = options.cliPath ?? env.AGENTLINK_CLI_PATH
  return cliPath ? { cliPath, autoRestart: false } : { autoRestart: false }
}

/**
 * Run one piece of work against a fresh client, then stop it. Cleanup
 * failures are logged; they never replace the work's own result or error.
 */
export async function withClient<R>(
  options: ConnectOptions,
  run: (client: AgentClient) => Promise<R>,
  createClient: ClientFactory = defaultClientFactory
): Promise<R> {
  const client = createClient(buildClientOptions(options))
  try {
    return await run(client)
  } finally {
    const errors = await client.stop()
    for (const { stage, error } of errors) {
      getCliLogger().warn({ stage, err: error }, 'Cleanup after command failed')
    }
  }
}

/**
 * Resolve a session ID from a full ID or a unique prefix.
 * Returns the full session ID if found, null otherwise.
 */
export function resolveSessionId(idOrPrefix: string, sessions: SessionMetadata[]): string | null {
  if (!idOrPrefix || sessions.length === 0) {
    return null
  }

  const exactMatch = sessions.find((s) => s.sessionId === idOrPrefix)
  if (exactMatch) {
    return exactMatch.sessionId
  }

  const query = idOrPrefix.toLowerCase()
  const prefixMatches = sessions.filter((s) => s.sessionId.toLowerCase().startsWith(query))
  if (prefixMatches.length === 1 && prefixMatches[0]) {
    return prefixMatches[0].sessionId
  }

  return null
}

/** Like resolveSessionId, but asks the server for the list and fails with a CommandError */
export async function requireSessionId(client: AgentClient, idOrPrefix: string): Promise<string> {
  const sessions = await client.listSessions()
  const sessionId = resolveSessionId(idOrPrefix, sessions)
  if (!sessionId) {
    const error: CommandError = {
      code: 'SESSION_NOT_FOUND',
      message: `No session matches: ${idOrPrefix}`,
      details: 'Use `agentlink sessions ls` to list stored sessions',
    }
    throw error
  }
  return sessionId
}
