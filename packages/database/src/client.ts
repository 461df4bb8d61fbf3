// Store selection for the warehouse
// sqlite:<path>, :memory: or a .db/.sqlite path -> SQLite; http(s):// -> Supabase

import { createClient, type SupabaseClient } from '@supabase/supabase-js'
import { SqliteWarehouseStore } from './SqliteWarehouseStore'
import { SupabaseWarehouseStore } from './SupabaseWarehouseStore'
import { StoreConfigurationError, type WarehouseStore } from './types'

export interface StoreTargetConfig {
  target: string
  serviceKey?: string
}

export type StoreTarget =
  | { kind: 'sqlite'; filename: string }
  | { kind: 'supabase'; url: string }

export function parseStoreTarget(target: string): StoreTarget {
  const trimmed = target.trim()
  if (!trimmed) {
    throw new StoreConfigurationError('Store target is empty')
  }
  if (trimmed === ':memory:') {
    return { kind: 'sqlite', filename: ':memory:' }
  }
  if (trimmed.startsWith('sqlite:')) {
    const filename = trimmed.slice('sqlite:'.length)
    if (!filename) {
      throw new StoreConfigurationError(`Store target ${trimmed} names no database file`)
    }
    return { kind: 'sqlite', filename }
  }
  if (/^https?:\/\//i.test(trimmed)) {
    return { kind: 'supabase', url: trimmed }
  }
  if (/\.(db|sqlite3?)$/i.test(trimmed)) {
    return { kind: 'sqlite', filename: trimmed }
  }
  throw new StoreConfigurationError(`Unrecognised store target: ${trimmed}`)
}

// Service-role client: the ETL writes every table and never holds a user session
export function createServiceClient(url: string, serviceKey: string): SupabaseClient {
  return createClient(url, serviceKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
    db: {
      schema: 'public',
    },
    global: {
      headers: {
        'X-Client-Info': 'conservation-warehouse-etl',
      },
    },
  })
}

export function createWarehouseStore(
  config: StoreTargetConfig,
  clientFactory: (url: string, serviceKey: string) => SupabaseClient = createServiceClient
): WarehouseStore {
  const target = parseStoreTarget(config.target)

  if (target.kind === 'sqlite') {
    return new SqliteWarehouseStore(target.filename)
  }

  if (!config.serviceKey) {
    throw new StoreConfigurationError('Supabase store requires SUPABASE_SERVICE_ROLE_KEY')
  }
  return new SupabaseWarehouseStore(clientFactory(target.url, config.serviceKey), target.url)
}
