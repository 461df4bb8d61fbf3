// Store contract shared by the SQLite and Supabase implementations

import type { StoredTableName } from './tables'

export type CellValue = string | number | boolean | null
export type WarehouseRow = Record<string, CellValue>

// Rows written to fact_anomaly alongside a fact table replace
export interface AnomalyReplacement {
  entity: string
  rows: WarehouseRow[]
}

export interface WarehouseStore {
  readonly kind: 'sqlite' | 'supabase'
  readonly target: string

  // Creates the schema on an empty store, otherwise checks its version
  initialize(): Promise<void>

  // natural key -> surrogate key
  loadKeyLookup(table: StoredTableName): Promise<Map<string, number>>

  // Insert or update by natural key in one transaction; surrogate keys are never rewritten
  upsertRows(table: StoredTableName, rows: WarehouseRow[]): Promise<number>

  // Delete and re-insert the whole table (plus the entity's anomaly rows) in one transaction
  replaceRows(table: StoredTableName, rows: WarehouseRow[], anomalies?: AnomalyReplacement): Promise<number>

  readRows(table: StoredTableName): Promise<WarehouseRow[]>
  countRows(table: StoredTableName): Promise<number>
  close(): Promise<void>
}

export class StoreError extends Error {
  readonly table?: StoredTableName

  constructor(message: string, options: { table?: StoredTableName; cause?: unknown } = {}) {
    super(message, { cause: options.cause })
    this.name = 'StoreError'
    this.table = options.table
  }
}

// Missing or unusable connection target
export class StoreConfigurationError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause })
    this.name = 'StoreConfigurationError'
  }
}

export class SchemaVersionMismatchError extends StoreConfigurationError {
  readonly expected: number
  readonly actual: number | null

  constructor(expected: number, actual: number | null) {
    super(`Store schema version ${actual ?? 'unknown'} does not match expected version ${expected}`)
    this.name = 'SchemaVersionMismatchError'
    this.expected = expected
    this.actual = actual
  }
}
