// Database package exports for the conservation warehouse

export { createServiceClient, createWarehouseStore, parseStoreTarget } from './client'
export type { StoreTarget, StoreTargetConfig } from './client'

export { SqliteWarehouseStore } from './SqliteWarehouseStore'
export { SupabaseWarehouseStore } from './SupabaseWarehouseStore'

export * from './types'
export * from './tables'
export { createTableStatement, sqliteSchemaStatements } from './schema'
export { toWarehouseRow } from './rows'
