// Supabase (Postgres) warehouse store
// Upserts go through PostgREST; full replaces call warehouse_replace_rows so the
// delete and insert share one Postgres transaction

import type { SupabaseClient } from '@supabase/supabase-js'
import { SCHEMA_VERSION, TABLES, type StoredTableName } from './tables'
import { describeError, toWarehouseRow } from './rows'
import {
  SchemaVersionMismatchError,
  StoreConfigurationError,
  StoreError,
  type AnomalyReplacement,
  type WarehouseRow,
  type WarehouseStore,
} from './types'

const PAGE_SIZE = 1000

export class SupabaseWarehouseStore implements WarehouseStore {
  readonly kind = 'supabase' as const

  constructor(
    private readonly client: SupabaseClient,
    readonly target: string
  ) {}

  async initialize(): Promise<void> {
    const { data, error } = await this.client
      .from('warehouse_meta')
      .select('schema_version')
      .limit(1)
      .maybeSingle()

    if (error) {
      throw new StoreConfigurationError(
        `Cannot read warehouse_meta from ${this.target}: ${describeError(error)}`,
        error
      )
    }

    const row = toWarehouseRow(data)
    const version = typeof row.schema_version === 'number' ? row.schema_version : null
    if (version !== SCHEMA_VERSION) {
      throw new SchemaVersionMismatchError(SCHEMA_VERSION, version)
    }
  }

  async loadKeyLookup(tableName: StoredTableName): Promise<Map<string, number>> {
    const table = TABLES[tableName]
    const lookup = new Map<string, number>()
    const rows = await this.selectAll(tableName, `${table.naturalKey},${table.primaryKey}`)

    for (const row of rows) {
      const naturalKey = row[table.naturalKey]
      const surrogateKey = row[table.primaryKey]
      if (typeof naturalKey === 'string' && typeof surrogateKey === 'number') {
        lookup.set(naturalKey, surrogateKey)
      }
    }
    return lookup
  }

  async upsertRows(tableName: StoredTableName, rows: WarehouseRow[]): Promise<number> {
    if (rows.length === 0) {
      return 0
    }

    const table = TABLES[tableName]
    const { error } = await this.client
      .from(table.name)
      .upsert(rows, { onConflict: table.naturalKey })

    if (error) {
      throw new StoreError(`Upsert into ${table.name} failed: ${describeError(error)}`, {
        table: tableName,
        cause: error,
      })
    }
    return rows.length
  }

  async replaceRows(
    tableName: StoredTableName,
    rows: WarehouseRow[],
    anomalies?: AnomalyReplacement
  ): Promise<number> {
    const table = TABLES[tableName]
    const { data, error } = await this.client.rpc('warehouse_replace_rows', {
      p_table: table.name,
      p_rows: rows,
      p_anomaly_entity: anomalies?.entity ?? null,
      p_anomalies: anomalies?.rows ?? [],
    })

    if (error) {
      throw new StoreError(`Replace of ${table.name} failed: ${describeError(error)}`, {
        table: tableName,
        cause: error,
      })
    }
    return typeof data === 'number' ? data : rows.length
  }

  async readRows(tableName: StoredTableName): Promise<WarehouseRow[]> {
    return this.selectAll(tableName, '*')
  }

  async countRows(tableName: StoredTableName): Promise<number> {
    const { count, error } = await this.client
      .from(TABLES[tableName].name)
      .select('*', { count: 'exact', head: true })

    if (error) {
      throw new StoreError(`Count of ${tableName} failed: ${describeError(error)}`, {
        table: tableName,
        cause: error,
      })
    }
    return count ?? 0
  }

  async close(): Promise<void> {
    await this.client.removeAllChannels()
  }

  // PostgREST caps responses, so read in primary-key order a page at a time
  private async selectAll(tableName: StoredTableName, columns: string): Promise<WarehouseRow[]> {
    const table = TABLES[tableName]
    const rows: WarehouseRow[] = []

    for (let from = 0; ; from += PAGE_SIZE) {
      const { data, error } = await this.client
        .from(table.name)
        .select(columns)
        .order(table.primaryKey, { ascending: true })
        .range(from, from + PAGE_SIZE - 1)

      if (error) {
        throw new StoreError(`Read of ${table.name} failed: ${describeError(error)}`, {
          table: tableName,
          cause: error,
        })
      }

      const page: unknown[] = data ?? []
      rows.push(...page.map(toWarehouseRow))
      if (page.length < PAGE_SIZE) {
        return rows
      }
    }
  }
}
