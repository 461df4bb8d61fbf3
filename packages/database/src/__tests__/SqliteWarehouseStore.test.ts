/**
 * SQLite store tests
 * In-memory databases, except where a reopen is needed
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals'
import Database from 'better-sqlite3'
import { mkdtempSync, rmSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { SqliteWarehouseStore } from '../SqliteWarehouseStore'
import { SchemaVersionMismatchError, StoreError, type WarehouseRow } from '../types'
import { SCHEMA_VERSION } from '../tables'

const habitat = (key: number, id: string, name: string): WarehouseRow => ({
  habitat_key: key,
  habitat_id: id,
  habitat_name: name,
  state: 'MT',
  region: 'Rockies',
  total_acres: 1200,
  habitat_quality_score: 80,
  conservation_status: 'Stable',
  primary_threats: '["drought"]',
})

const elk = (rowId: number, habitatKey: number, year: number, count: number): WarehouseRow => ({
  row_id: rowId,
  natural_key: `HAB-1|${year}`,
  habitat_id: 'HAB-1',
  habitat_key: habitatKey,
  year,
  date_key: year * 10000 + 1231,
  elk_count: count,
  population_change: null,
  population_change_pct: null,
})

describe('SqliteWarehouseStore', () => {
  let store: SqliteWarehouseStore

  beforeEach(async () => {
    store = new SqliteWarehouseStore(':memory:')
    await store.initialize()
  })

  afterEach(async () => {
    await store.close()
  })

  it('should create every table on an empty database', async () => {
    expect(await store.countRows('dim_donor')).toBe(0)
    expect(await store.countRows('fact_program_service')).toBe(0)
    expect(await store.countRows('fact_anomaly')).toBe(0)
  })

  it('should upsert by natural key without changing the surrogate key', async () => {
    await store.upsertRows('dim_habitat', [habitat(101, 'HAB-1', 'North Ridge')])
    await store.upsertRows('dim_habitat', [habitat(101, 'HAB-1', 'North Ridge Basin'), habitat(102, 'HAB-2', 'Elk Flats')])

    const rows = await store.readRows('dim_habitat')
    expect(rows).toHaveLength(2)
    expect(rows[0].habitat_key).toBe(101)
    expect(rows[0].habitat_name).toBe('North Ridge Basin')
    expect(rows[1].habitat_id).toBe('HAB-2')
  })

  it('should return the natural to surrogate key lookup', async () => {
    await store.upsertRows('dim_habitat', [habitat(101, 'HAB-1', 'North Ridge'), habitat(102, 'HAB-2', 'Elk Flats')])

    const lookup = await store.loadKeyLookup('dim_habitat')
    expect([...lookup.entries()]).toEqual([
      ['HAB-1', 101],
      ['HAB-2', 102],
    ])
  })

  it('should replace a fact table and its anomaly rows together', async () => {
    await store.upsertRows('dim_habitat', [habitat(101, 'HAB-1', 'North Ridge')])
    await store.replaceRows('fact_elk_population', [elk(1, 101, 2020, 500), elk(2, 101, 2021, 400)], {
      entity: 'elk_population',
      rows: [
        {
          anomaly_id: 1,
          anomaly_key: 'elk_population:HAB-1|2021:population_decline',
          entity: 'elk_population',
          natural_key: 'HAB-1|2021',
          rule: 'population_decline',
          severity: 'warning',
          observed_value: '-20',
          threshold: '-10',
          message: 'Population fell 20% year over year',
        },
      ],
    })

    expect(await store.countRows('fact_elk_population')).toBe(2)
    expect(await store.countRows('fact_anomaly')).toBe(1)

    await store.replaceRows('fact_elk_population', [elk(1, 101, 2022, 450)], { entity: 'elk_population', rows: [] })

    expect(await store.countRows('fact_elk_population')).toBe(1)
    expect(await store.countRows('fact_anomaly')).toBe(0)
  })

  it('should leave the previous rows in place when a replace fails', async () => {
    await store.upsertRows('dim_habitat', [habitat(101, 'HAB-1', 'North Ridge')])
    await store.replaceRows('fact_elk_population', [elk(1, 101, 2020, 500), elk(2, 101, 2021, 400)])

    // habitat_key 999 has no dim_habitat row
    await expect(
      store.replaceRows('fact_elk_population', [elk(1, 101, 2022, 450), elk(2, 999, 2023, 300)])
    ).rejects.toBeInstanceOf(StoreError)

    const rows = await store.readRows('fact_elk_population')
    expect(rows.map((row) => row.elk_count)).toEqual([500, 400])
  })

  it('should store booleans as integers', async () => {
    await store.replaceRows('dim_date', [
      {
        date_key: 20240106,
        full_date: '2024-01-06',
        year: 2024,
        quarter: 1,
        month: 1,
        month_name: 'January',
        week: 1,
        day_of_month: 6,
        day_of_week: 5,
        day_name: 'Saturday',
        is_weekend: true,
        fiscal_year: 2024,
        fiscal_quarter: 2,
      },
    ])

    const [row] = await store.readRows('dim_date')
    expect(row.is_weekend).toBe(1)
  })
})

describe('SqliteWarehouseStore schema version', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'warehouse-store-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('should accept a database created at the current version', async () => {
    const filename = join(dir, 'warehouse.db')
    const first = new SqliteWarehouseStore(filename)
    await first.initialize()
    await first.close()

    const second = new SqliteWarehouseStore(filename)
    await expect(second.initialize()).resolves.toBeUndefined()
    await second.close()
  })

  it('should reject a database at another version', async () => {
    const filename = join(dir, 'warehouse.db')
    const first = new SqliteWarehouseStore(filename)
    await first.initialize()
    await first.close()

    const raw = new Database(filename)
    raw.prepare('UPDATE warehouse_meta SET schema_version = ?').run(SCHEMA_VERSION - 1)
    raw.close()

    const second = new SqliteWarehouseStore(filename)
    const error = await second.initialize().catch((e: unknown) => e)
    expect(error).toBeInstanceOf(SchemaVersionMismatchError)
    expect(error).toMatchObject({ expected: SCHEMA_VERSION, actual: SCHEMA_VERSION - 1 })
    await second.close()
  })
})
