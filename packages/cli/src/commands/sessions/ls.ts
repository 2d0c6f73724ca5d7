import type { Command } from 'commander'
import type { AgentClient, SessionMetadata } from '@agentlink/sdk'
import type { CommandOptions, ListResult, OutputSchema } from '../../output/index.js'
import { connectOptionsOf, withClient } from '../../utils/client.js'

export interface SessionListItem {
  sessionId: string
  modified: string
  remote: boolean
  summary: string | null
}

export const sessionsLsSchema: OutputSchema<SessionListItem> = {
  idField: 'sessionId',
  columns: [
    { header: 'SESSION ID', field: 'sessionId', width: 36 },
    { header: 'MODIFIED', field: 'modified', width: 24 },
    { header: 'REMOTE', field: 'remote', width: 6 },
    { header: 'SUMMARY', field: 'summary' },
  ],
}

function toListItem(session: SessionMetadata): SessionListItem {
  return {
    sessionId: session.sessionId,
    modified: session.modifiedTime,
    remote: session.isRemote,
    summary: session.summary ?? null,
  }
}

/** Most recently modified first */
export async function listSessions(client: AgentClient): Promise<ListResult<SessionListItem>> {
  const sessions = await client.listSessions()
  const items = sessions
    .map(toListItem)
    .sort((a, b) => Date.parse(b.modified) - Date.parse(a.modified))
  return { type: 'list', data: items, schema: sessionsLsSchema }
}

export async function runLsCommand(
  _options: CommandOptions,
  command: Command
): Promise<ListResult<SessionListItem>> {
  return withClient(connectOptionsOf(command), listSessions)
}
