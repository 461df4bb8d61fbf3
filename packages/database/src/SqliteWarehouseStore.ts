/**
 * SQLite warehouse store
 * Synchronous better-sqlite3 calls behind the async store contract;
 * every load runs inside db.transaction so a failure leaves the previous rows in place.
 */

import Database from 'better-sqlite3'
import { SCHEMA_VERSION, TABLES, type StoredTableName, type TableSpec } from './tables'
import { sqliteSchemaStatements } from './schema'
import { describeError, toWarehouseRow } from './rows'
import {
  SchemaVersionMismatchError,
  StoreConfigurationError,
  StoreError,
  type AnomalyReplacement,
  type WarehouseRow,
  type WarehouseStore,
} from './types'

type SqliteValue = string | number | null

function toSqliteParams(table: TableSpec, row: WarehouseRow): Record<string, SqliteValue> {
  const params: Record<string, SqliteValue> = {}
  for (const column of table.columns) {
    const value = row[column.name] ?? null
    params[column.name] = typeof value === 'boolean' ? (value ? 1 : 0) : value
  }
  return params
}

export class SqliteWarehouseStore implements WarehouseStore {
  readonly kind = 'sqlite' as const
  readonly target: string
  private readonly db: Database.Database

  constructor(filename: string) {
    this.target = filename
    try {
      this.db = new Database(filename)
    } catch (error) {
      throw new StoreConfigurationError(`Cannot open SQLite store at ${filename}`, error)
    }
    this.db.pragma('foreign_keys = ON')
    if (filename !== ':memory:') {
      this.db.pragma('journal_mode = WAL')
    }
  }

  async initialize(): Promise<void> {
    const meta = this.db
      .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'warehouse_meta'")
      .get()

    if (!meta) {
      const create = this.db.transaction(() => {
        for (const statement of sqliteSchemaStatements()) {
          this.db.exec(statement)
        }
        this.db.prepare('INSERT INTO warehouse_meta (schema_version) VALUES (?)').run(SCHEMA_VERSION)
      })
      create()
      return
    }

    const row = toWarehouseRow(this.db.prepare('SELECT schema_version FROM warehouse_meta LIMIT 1').get())
    const version = typeof row.schema_version === 'number' ? row.schema_version : null
    if (version !== SCHEMA_VERSION) {
      throw new SchemaVersionMismatchError(SCHEMA_VERSION, version)
    }
  }

  async loadKeyLookup(tableName: StoredTableName): Promise<Map<string, number>> {
    const table = TABLES[tableName]
    const lookup = new Map<string, number>()
    const rows = this.db
      .prepare(`SELECT ${table.naturalKey} AS natural_key, ${table.primaryKey} AS surrogate_key FROM ${table.name}`)
      .all()

    for (const raw of rows) {
      const row = toWarehouseRow(raw)
      if (typeof row.natural_key === 'string' && typeof row.surrogate_key === 'number') {
        lookup.set(row.natural_key, row.surrogate_key)
      }
    }
    return lookup
  }

  async upsertRows(tableName: StoredTableName, rows: WarehouseRow[]): Promise<number> {
    const table = TABLES[tableName]
    const names = table.columns.map((column) => column.name)
    const updates = names
      .filter((name) => name !== table.primaryKey && name !== table.naturalKey)
      .map((name) => `${name} = excluded.${name}`)

    const sql =
      `INSERT INTO ${table.name} (${names.join(', ')}) VALUES (${names.map((name) => `@${name}`).join(', ')}) ` +
      `ON CONFLICT(${table.naturalKey}) DO UPDATE SET ${updates.join(', ')}`

    try {
      const statement = this.db.prepare(sql)
      const upsert = this.db.transaction((batch: WarehouseRow[]) => {
        for (const row of batch) {
          statement.run(toSqliteParams(table, row))
        }
        return batch.length
      })
      return upsert(rows)
    } catch (error) {
      throw new StoreError(`Upsert into ${table.name} failed: ${describeError(error)}`, { table: tableName, cause: error })
    }
  }

  async replaceRows(
    tableName: StoredTableName,
    rows: WarehouseRow[],
    anomalies?: AnomalyReplacement
  ): Promise<number> {
    const table = TABLES[tableName]
    const anomalyTable = TABLES.fact_anomaly

    try {
      const insert = this.db.prepare(insertSql(table))
      const insertAnomaly = this.db.prepare(insertSql(anomalyTable))
      const replace = this.db.transaction((batch: WarehouseRow[]) => {
        if (anomalies) {
          // Anomaly rows point at the fact rows being replaced
          this.db.prepare('DELETE FROM fact_anomaly WHERE entity = ?').run(anomalies.entity)
        }
        this.db.prepare(`DELETE FROM ${table.name}`).run()
        for (const row of batch) {
          insert.run(toSqliteParams(table, row))
        }
        if (anomalies) {
          for (const row of anomalies.rows) {
            insertAnomaly.run(toSqliteParams(anomalyTable, row))
          }
        }
        return batch.length
      })
      return replace(rows)
    } catch (error) {
      throw new StoreError(`Replace of ${table.name} failed: ${describeError(error)}`, { table: tableName, cause: error })
    }
  }

  async readRows(tableName: StoredTableName): Promise<WarehouseRow[]> {
    const table = TABLES[tableName]
    return this.db
      .prepare(`SELECT * FROM ${table.name} ORDER BY ${table.primaryKey}`)
      .all()
      .map(toWarehouseRow)
  }

  async countRows(tableName: StoredTableName): Promise<number> {
    const row = toWarehouseRow(this.db.prepare(`SELECT COUNT(*) AS total FROM ${TABLES[tableName].name}`).get())
    return typeof row.total === 'number' ? row.total : 0
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close()
    }
  }
}

function insertSql(table: TableSpec): string {
  const names = table.columns.map((column) => column.name)
  return `INSERT INTO ${table.name} (${names.join(', ')}) VALUES (${names.map((name) => `@${name}`).join(', ')})`
}
