import type { Command } from 'commander'
import type { AgentClient } from '@agentlink/sdk'
import type { CommandOptions, OutputSchema, SingleResult } from '../../output/index.js'
import { connectOptionsOf, requireSessionId, withClient } from '../../utils/client.js'

export interface SessionRemoveResult {
  sessionId: string
  status: 'deleted'
}

export const sessionsRmSchema: OutputSchema<SessionRemoveResult> = {
  idField: 'sessionId',
  columns: [
    { header: 'SESSION ID', field: 'sessionId' },
    { header: 'STATUS', field: 'status', color: () => 'green' },
  ],
}

export async function removeSession(
  client: AgentClient,
  idOrPrefix: string
): Promise<SingleResult<SessionRemoveResult>> {
  const sessionId = await requireSessionId(client, idOrPrefix)
  await client.deleteSession(sessionId)
  return { type: 'single', data: { sessionId, status: 'deleted' }, schema: sessionsRmSchema }
}

export async function runRmCommand(
  id: string,
  _options: CommandOptions,
  command: Command
): Promise<SingleResult<SessionRemoveResult>> {
  return withClient(connectOptionsOf(command), (client) => removeSession(client, id))
}
