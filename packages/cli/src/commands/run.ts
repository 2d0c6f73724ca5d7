import type { Command } from 'commander'
import {
  MessageDataSchema,
  MessageDeltaDataSchema,
  SESSION_EVENT_TYPES,
  type AgentClient,
  type PermissionHandler,
} from '@agentlink/sdk'
import type { CommandError, CommandOptions, OutputSchema, SingleResult } from '../output/index.js'
import { connectOptionsOf, requireSessionId, withClient } from '../utils/client.js'

/** Result type for the run command */
export interface RunResult {
  sessionId: string
  messageId: string | null
  reply: string
}

export const runSchema: OutputSchema<RunResult> = {
  idField: 'sessionId',
  columns: [
    { header: 'SESSION ID', field: 'sessionId' },
    { header: 'MESSAGE ID', field: 'messageId' },
    { header: 'REPLY', field: 'reply' },
  ],
}

export interface RunOptions extends CommandOptions {
  model?: string
  stream?: boolean
  resume?: string
  allowAll?: boolean
  timeout?: string
}

const approveEverything: PermissionHandler = () => ({ kind: 'approved' })

function parseTimeout(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined
  const value = Number(raw)
  if (!Number.isInteger(value) || value <= 0) {
    const error: CommandError = {
      code: 'INVALID_OPTIONS',
      message: `--timeout must be a positive number of milliseconds, got: ${raw}`,
    }
    throw error
  }
  return value
}

/**
 * Send one prompt and wait for the turn to finish. With `stream`, reply
 * deltas are written through `write` as they arrive.
 */
export async function runPrompt(
  client: AgentClient,
  prompt: string,
  options: RunOptions,
  write: (text: string) => void = (text) => {
    process.stdout.write(text)
  }
): Promise<SingleResult<RunResult>> {
  if (!prompt || prompt.trim().length === 0) {
    const error: CommandError = {
      code: 'MISSING_PROMPT',
      message: 'A prompt is required',
      details: 'Usage: agentlink run [options] <prompt>',
    }
    throw error
  }
  const timeoutMs = parseTimeout(options.timeout)
  const streaming = options.stream === true
  const onPermissionRequest = options.allowAll ? approveEverything : undefined

  const session = options.resume
    ? await client.resumeSession(await requireSessionId(client, options.resume), {
        streaming,
        onPermissionRequest,
      })
    : await client.createSession({ model: options.model, streaming, onPermissionRequest })

  if (streaming) {
    session.on(SESSION_EVENT_TYPES.messageDelta, (event) => {
      const delta = MessageDeltaDataSchema.safeParse(event.data)
      if (delta.success) {
        write(delta.data.deltaContent)
      }
    })
  }

  const reply = await session.sendAndWait({ prompt }, timeoutMs)
  if (streaming) {
    write('\n')
  }

  const message = MessageDataSchema.safeParse(reply?.data)
  return {
    type: 'single',
    data: {
      sessionId: session.sessionId,
      messageId: message.success ? message.data.messageId : null,
      reply: message.success ? message.data.content : '',
    },
    schema: runSchema,
  }
}

export async function runRunCommand(
  prompt: string,
  options: RunOptions,
  command: Command
): Promise<SingleResult<RunResult>> {
  return withClient(connectOptionsOf(command), (client) => runPrompt(client, prompt, options))
}
