// Row narrowing for values coming back from a driver

import type { CellValue, WarehouseRow } from './types'

export function isCell(value: unknown): value is CellValue {
  return value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean'
}

// Non-scalar cells (JSON columns read back by PostgREST) become their JSON text
export function toWarehouseRow(value: unknown): WarehouseRow {
  const row: WarehouseRow = {}
  if (typeof value !== 'object' || value === null) {
    return row
  }
  for (const [key, cell] of Object.entries(value)) {
    if (isCell(cell)) {
      row[key] = cell
    } else if (cell === undefined) {
      row[key] = null
    } else {
      row[key] = JSON.stringify(cell)
    }
  }
  return row
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message
  }
  return String(error)
}
