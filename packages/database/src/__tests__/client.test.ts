import { describe, it, expect, jest } from '@jest/globals'
import type { SupabaseClient } from '@supabase/supabase-js'
import { createWarehouseStore, parseStoreTarget } from '../client'
import { SqliteWarehouseStore } from '../SqliteWarehouseStore'
import { SupabaseWarehouseStore } from '../SupabaseWarehouseStore'
import { StoreConfigurationError } from '../types'

describe('parseStoreTarget', () => {
  it('should recognise SQLite targets', () => {
    expect(parseStoreTarget(':memory:')).toEqual({ kind: 'sqlite', filename: ':memory:' })
    expect(parseStoreTarget('sqlite:./data/warehouse')).toEqual({ kind: 'sqlite', filename: './data/warehouse' })
    expect(parseStoreTarget('warehouse.sqlite')).toEqual({ kind: 'sqlite', filename: 'warehouse.sqlite' })
  })

  it('should recognise Supabase URLs', () => {
    expect(parseStoreTarget('https://abc.supabase.co')).toEqual({ kind: 'supabase', url: 'https://abc.supabase.co' })
  })

  it('should reject anything else', () => {
    expect(() => parseStoreTarget('')).toThrow(StoreConfigurationError)
    expect(() => parseStoreTarget('sqlite:')).toThrow(StoreConfigurationError)
    expect(() => parseStoreTarget('postgres://localhost/warehouse')).toThrow('Unrecognised store target')
  })
})

describe('createWarehouseStore', () => {
  it('should open a SQLite store', async () => {
    const store = createWarehouseStore({ target: ':memory:' })
    expect(store).toBeInstanceOf(SqliteWarehouseStore)
    await store.close()
  })

  it('should require a service key for Supabase', () => {
    expect(() => createWarehouseStore({ target: 'https://abc.supabase.co' })).toThrow(
      'Supabase store requires SUPABASE_SERVICE_ROLE_KEY'
    )
  })

  it('should build the Supabase store from the client factory', () => {
    const client = { from: jest.fn(), rpc: jest.fn() } as unknown as SupabaseClient
    const factory = jest.fn((_url: string, _key: string) => client)

    const store = createWarehouseStore({ target: 'https://abc.supabase.co', serviceKey: 'test-secret' }, factory)

    expect(store).toBeInstanceOf(SupabaseWarehouseStore)
    expect(store.target).toBe('https://abc.supabase.co')
    expect(factory).toHaveBeenCalledWith('https://abc.supabase.co', 'test-secret')
  })
})
