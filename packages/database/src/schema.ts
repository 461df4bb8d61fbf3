// SQLite DDL generated from the table catalogue

import { TABLES, TABLE_ORDER, type ColumnSpec, type TableSpec } from './tables'

const SQLITE_TYPES: Record<ColumnSpec['type'], string> = {
  integer: 'INTEGER',
  real: 'REAL',
  text: 'TEXT',
  boolean: 'INTEGER',
}

function columnDefinition(table: TableSpec, column: ColumnSpec): string {
  const parts = [column.name, SQLITE_TYPES[column.type]]
  if (column.name === table.primaryKey) {
    parts.push('PRIMARY KEY')
  } else if (!column.nullable) {
    parts.push('NOT NULL')
  }
  if (column.name === table.naturalKey) {
    parts.push('UNIQUE')
  }
  if (column.references) {
    const target = TABLES[column.references]
    parts.push(`REFERENCES ${target.name}(${target.primaryKey})`)
  }
  return parts.join(' ')
}

export function createTableStatement(table: TableSpec): string {
  const columns = table.columns.map((column) => `  ${columnDefinition(table, column)}`)
  return `CREATE TABLE IF NOT EXISTS ${table.name} (\n${columns.join(',\n')}\n)`
}

export function sqliteSchemaStatements(): string[] {
  const statements = [
    'CREATE TABLE IF NOT EXISTS warehouse_meta (schema_version INTEGER NOT NULL)',
    ...TABLE_ORDER.map((name) => createTableStatement(TABLES[name])),
  ]

  // Lookup paths used by the dashboard collaborator
  for (const name of TABLE_ORDER) {
    const table = TABLES[name]
    for (const column of table.columns) {
      if (column.references || (column.name === 'date_key' && table.kind === 'fact')) {
        statements.push(`CREATE INDEX IF NOT EXISTS idx_${table.name}_${column.name} ON ${table.name}(${column.name})`)
      }
    }
  }
  statements.push('CREATE INDEX IF NOT EXISTS idx_fact_anomaly_entity ON fact_anomaly(entity)')

  return statements
}
