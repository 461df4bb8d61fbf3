import {
  ENTITY_TABLES,
  toWarehouseRow,
  type StoredTableName,
  type WarehouseRow,
  type WarehouseStore,
} from '@conservation-warehouse/database';
import type {
  AnomalyFlag,
  ConformedRecord,
  DateRow,
  DimensionEntity,
  EntityName,
  FactEntity,
} from '@conservation-warehouse/types';
import { LoadError } from '../errors';
import { DeduplicationEngine } from '../validation/DeduplicationEngine';
import { logger } from '../utils/logger';

function byNaturalKey(a: ConformedRecord, b: ConformedRecord): number {
  if (a.naturalKey < b.naturalKey) return -1;
  if (a.naturalKey > b.naturalKey) return 1;
  return 0;
}

export function anomalyRow(flag: AnomalyFlag): WarehouseRow {
  const anomalyKey = `${flag.entity}:${flag.naturalKey}:${flag.rule}`;
  return {
    anomaly_id: DeduplicationEngine.hashKey('anomaly', anomalyKey),
    anomaly_key: anomalyKey,
    entity: flag.entity,
    natural_key: flag.naturalKey,
    rule: flag.rule,
    severity: flag.severity,
    observed_value: String(flag.observedValue),
    threshold: String(flag.threshold),
    message: flag.message,
  };
}

/**
 * Writes validated batches. Dimensions are upserted by natural key; facts and
 * the date dimension replace the whole table. Each call is one transaction.
 */
export class WarehouseLoader {
  private readonly log = logger.child({ component: 'WarehouseLoader' });

  constructor(private readonly store: WarehouseStore) {}

  async loadDimension(entity: DimensionEntity, records: readonly ConformedRecord[]): Promise<number> {
    const rows = records.map((record) => toWarehouseRow(record.row));
    return this.write(entity, ENTITY_TABLES[entity], () => this.store.upsertRows(ENTITY_TABLES[entity], rows));
  }

  async loadDateDimension(rows: readonly DateRow[]): Promise<number> {
    const table = ENTITY_TABLES.date;
    return this.write('date', table, () => this.store.replaceRows(table, rows.map(toWarehouseRow)));
  }

  /**
   * Row ids follow natural-key order so an unchanged batch reloads identically
   */
  async loadFacts(
    entity: FactEntity,
    records: readonly ConformedRecord[],
    anomalies: readonly AnomalyFlag[] = []
  ): Promise<number> {
    const table = ENTITY_TABLES[entity];
    const rows = [...records].sort(byNaturalKey).map((record, index) => ({
      row_id: index + 1,
      natural_key: record.naturalKey,
      ...toWarehouseRow(record.row),
    }));

    return this.write(entity, table, () =>
      this.store.replaceRows(table, rows, { entity, rows: anomalies.map(anomalyRow) })
    );
  }

  private async write(entity: EntityName, table: StoredTableName, operation: () => Promise<number>): Promise<number> {
    try {
      const written = await operation();
      this.log.info('Entity loaded', { entity, table, rows: written });
      return written;
    } catch (error) {
      throw new LoadError(entity, table, error);
    }
  }
}

export default WarehouseLoader;
