import type { Command } from 'commander'
import type { AgentClient, ModelInfo } from '@agentlink/sdk'
import type { CommandOptions, ListResult, OutputSchema } from '../output/index.js'
import { connectOptionsOf, withClient } from '../utils/client.js'

export interface ModelRow {
  id: string
  name: string
  vision: boolean
  contextWindow: number
  policy: string | null
}

export const modelsSchema: OutputSchema<ModelRow> = {
  idField: 'id',
  columns: [
    { header: 'ID', field: 'id', width: 24 },
    { header: 'NAME', field: 'name', width: 24 },
    { header: 'VISION', field: 'vision', width: 6 },
    { header: 'CONTEXT', field: 'contextWindow', width: 9 },
    {
      header: 'POLICY',
      field: 'policy',
      color: (value) => (value === 'enabled' ? 'green' : value === null ? undefined : 'yellow'),
    },
  ],
}

function toModelRow(model: ModelInfo): ModelRow {
  return {
    id: model.id,
    name: model.name,
    vision: model.capabilities.supports.vision,
    contextWindow: model.capabilities.limits.maxContextWindowTokens,
    policy: model.policy?.state ?? null,
  }
}

export async function listModels(client: AgentClient): Promise<ListResult<ModelRow>> {
  const models = await client.listModels()
  return { type: 'list', data: models.map(toModelRow), schema: modelsSchema }
}

export async function runModelsCommand(
  _options: CommandOptions,
  command: Command
): Promise<ListResult<ModelRow>> {
  return withClient(connectOptionsOf(command), listModels)
}
