import type { Command } from 'commander'
import type { AgentClient } from '@agentlink/sdk'
import type { CommandError, CommandOptions, OutputSchema, SingleResult } from '../../output/index.js'
import { connectOptionsOf, withClient } from '../../utils/client.js'

export interface LastSessionResult {
  sessionId: string
}

export const sessionsLastSchema: OutputSchema<LastSessionResult> = {
  idField: 'sessionId',
  columns: [{ header: 'SESSION ID', field: 'sessionId' }],
}

export async function getLastSession(client: AgentClient): Promise<SingleResult<LastSessionResult>> {
  const sessionId = await client.getLastSessionId()
  if (!sessionId) {
    const error: CommandError = {
      code: 'NO_SESSIONS',
      message: 'The server has no stored sessions',
    }
    throw error
  }
  return { type: 'single', data: { sessionId }, schema: sessionsLastSchema }
}

export async function runLastCommand(
  _options: CommandOptions,
  command: Command
): Promise<SingleResult<LastSessionResult>> {
  return withClient(connectOptionsOf(command), getLastSession)
}
