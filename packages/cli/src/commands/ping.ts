import type { Command } from 'commander'
import type { AgentClient } from '@agentlink/sdk'
import type { CommandOptions, OutputSchema, SingleResult } from '../output/index.js'
import { connectOptionsOf, withClient } from '../utils/client.js'

export interface PingRow {
  message: string
  timestamp: string
  protocolVersion: number | null
}

export const pingSchema: OutputSchema<PingRow> = {
  idField: 'message',
  columns: [
    { header: 'MESSAGE', field: 'message' },
    { header: 'SERVER TIME', field: 'timestamp' },
    { header: 'PROTOCOL', field: 'protocolVersion' },
  ],
}

export async function pingServer(client: AgentClient, message?: string): Promise<SingleResult<PingRow>> {
  const pong = await client.ping(message)
  return {
    type: 'single',
    data: {
      message: pong.message,
      timestamp: new Date(pong.timestamp).toISOString(),
      protocolVersion: pong.protocolVersion ?? null,
    },
    schema: pingSchema,
  }
}

export async function runPingCommand(
  message: string | undefined,
  _options: CommandOptions,
  command: Command
): Promise<SingleResult<PingRow>> {
  return withClient(connectOptionsOf(command), (client) => pingServer(client, message))
}
