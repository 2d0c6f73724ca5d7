import type { Command } from 'commander'
import type { AgentClient } from '@agentlink/sdk'
import type { CommandOptions, OutputSchema, SingleResult } from '../output/index.js'
import { connectOptionsOf, withClient } from '../utils/client.js'

export interface AuthRow {
  authenticated: boolean
  authType: string | null
  login: string | null
  host: string | null
  statusMessage: string | null
}

export const authSchema: OutputSchema<AuthRow> = {
  idField: 'authenticated',
  columns: [
    {
      header: 'AUTHENTICATED',
      field: 'authenticated',
      color: (value) => (value === true ? 'green' : 'red'),
    },
    { header: 'TYPE', field: 'authType' },
    { header: 'LOGIN', field: 'login' },
    { header: 'HOST', field: 'host' },
    { header: 'STATUS', field: 'statusMessage' },
  ],
}

export async function getAuthStatus(client: AgentClient): Promise<SingleResult<AuthRow>> {
  const auth = await client.getAuthStatus()
  return {
    type: 'single',
    data: {
      authenticated: auth.isAuthenticated,
      authType: auth.authType ?? null,
      login: auth.login ?? null,
      host: auth.host ?? null,
      statusMessage: auth.statusMessage ?? null,
    },
    schema: authSchema,
  }
}

export async function runAuthCommand(
  _options: CommandOptions,
  command: Command
): Promise<SingleResult<AuthRow>> {
  return withClient(connectOptionsOf(command), getAuthStatus)
}
