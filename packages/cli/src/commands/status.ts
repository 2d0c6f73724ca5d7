import type { Command } from 'commander'
import { SDK_PROTOCOL_VERSION, type AgentClient } from '@agentlink/sdk'
import type { CommandOptions, ListResult, OutputSchema } from '../output/index.js'
import { connectOptionsOf, withClient } from '../utils/client.js'

interface StatusRow {
  key: string
  value: string
}

export const statusSchema: OutputSchema<StatusRow> = {
  idField: 'value',
  columns: [
    { header: 'KEY', field: 'key', width: 18 },
    {
      header: 'VALUE',
      field: 'value',
      color: (value, item) => {
        if (item.key !== 'Compatible') return undefined
        return value === 'yes' ? 'green' : 'red'
      },
    },
  ],
}

export async function getServerStatus(client: AgentClient): Promise<ListResult<StatusRow>> {
  const status = await client.getStatus()
  return {
    type: 'list',
    data: [
      { key: 'Server version', value: status.version },
      { key: 'Server protocol', value: String(status.protocolVersion) },
      { key: 'SDK protocol', value: String(SDK_PROTOCOL_VERSION) },
      { key: 'Compatible', value: status.protocolVersion === SDK_PROTOCOL_VERSION ? 'yes' : 'no' },
    ],
    schema: statusSchema,
  }
}

export async function runStatusCommand(
  _options: CommandOptions,
  command: Command
): Promise<ListResult<StatusRow>> {
  return withClient(connectOptionsOf(command), getServerStatus)
}
