import chalk from 'chalk'
import { AgentLinkError } from '@agentlink/sdk'
import type {
  AnyCommandResult,
  ColumnDef,
  CommandError,
  OutputColor,
  OutputOptions,
} from './types.js'

export const defaultOutputOptions: OutputOptions = {
  format: 'table',
  quiet: false,
  noHeaders: false,
  noColor: false,
}

const COLUMN_GAP = '  '

function formatValue(value: unknown): string {
  if (value === null || value === undefined) return '-'
  if (typeof value === 'boolean') return value ? 'yes' : 'no'
  if (typeof value === 'object') return JSON.stringify(value)
  return String(value)
}

function fit(text: string, width: number | undefined): string {
  if (width === undefined) return text
  if (text.length > width) return `${text.slice(0, Math.max(width - 1, 0))}…`
  return text.padEnd(width)
}

function paint(text: string, color: OutputColor | undefined, options: OutputOptions): string {
  if (!color || options.noColor) return text
  return chalk[color](text)
}

function renderCell<T>(column: ColumnDef<T>, item: T, isLast: boolean, options: OutputOptions): string {
  const value = item[column.field]
  const text = fit(formatValue(value), isLast ? undefined : column.width)
  return paint(text, column.color?.(value, item), options)
}

function renderTable<T>(items: T[], columns: ColumnDef<T>[], options: OutputOptions): string {
  const lines: string[] = []
  if (!options.noHeaders) {
    lines.push(
      columns
        .map((column, index) => fit(column.header, index === columns.length - 1 ? undefined : column.width))
        .join(COLUMN_GAP)
        .trimEnd()
    )
  }
  for (const item of items) {
    lines.push(
      columns
        .map((column, index) => renderCell(column, item, index === columns.length - 1, options))
        .join(COLUMN_GAP)
        .trimEnd()
    )
  }
  return lines.join('\n')
}

function renderKeyValue<T>(item: T, columns: ColumnDef<T>[], options: OutputOptions): string {
  const labelWidth = Math.max(...columns.map((column) => column.header.length))
  return columns
    .map((column) => {
      const label = options.noHeaders ? '' : `${column.header.padEnd(labelWidth)}${COLUMN_GAP}`
      return `${label}${renderCell(column, item, true, options)}`.trimEnd()
    })
    .join('\n')
}

export function render<T>(result: AnyCommandResult<T>, options: OutputOptions): string {
  const { schema } = result

  if (options.format === 'json') {
    const data = schema.serialize ? schema.serialize(result.data) : result.data
    return JSON.stringify(data, null, 2)
  }

  if (options.quiet) {
    const items = result.type === 'list' ? result.data : [result.data]
    return items.map((item) => formatValue(item[schema.idField])).join('\n')
  }

  if (result.type === 'list') {
    return renderTable(result.data, schema.columns, options)
  }
  return renderKeyValue(result.data, schema.columns, options)
}

function isCommandError(value: unknown): value is CommandError {
  if (typeof value !== 'object' || value === null || value instanceof Error) return false
  return (
    'code' in value &&
    typeof value.code === 'string' &&
    'message' in value &&
    typeof value.message === 'string'
  )
}

export function toCommandError(error: unknown): CommandError {
  if (isCommandError(error)) return error
  if (error instanceof AgentLinkError) {
    return { code: error.code.toUpperCase(), message: error.message }
  }
  if (error instanceof Error) {
    return { code: 'UNKNOWN_ERROR', message: error.message }
  }
  return { code: 'UNKNOWN_ERROR', message: String(error) }
}

export function renderError(error: CommandError, options: OutputOptions): string {
  if (options.format === 'json') {
    return JSON.stringify({ error }, null, 2)
  }
  const lines = [paint(`Error: ${error.message}`, 'red', options)]
  if (error.details) {
    lines.push(error.details)
  }
  return lines.join('\n')
}
