/**
 * Output types shared by every command.
 *
 * Commands return a result object and never print directly; `withOutput`
 * renders it in the format the user picked.
 */

export type OutputFormat = 'table' | 'json'

export type OutputColor = 'green' | 'red' | 'yellow' | 'cyan' | 'gray'

export interface OutputOptions {
  format: OutputFormat
  /** Print only the id field of each item */
  quiet: boolean
  noHeaders: boolean
  noColor: boolean
}

export interface ColumnDef<T> {
  header: string
  field: keyof T & string
  width?: number
  color?(value: unknown, item: T): OutputColor | undefined
}

export interface OutputSchema<T> {
  idField: keyof T & string
  columns: ColumnDef<T>[]
  /** Replaces the data in JSON output */
  serialize?(data: T | T[]): unknown
}

export interface SingleResult<T> {
  type: 'single'
  data: T
  schema: OutputSchema<T>
}

export interface ListResult<T> {
  type: 'list'
  data: T[]
  schema: OutputSchema<T>
}

export type AnyCommandResult<T> = SingleResult<T> | ListResult<T>

export interface CommandError {
  code: string
  message: string
  details?: string
}
