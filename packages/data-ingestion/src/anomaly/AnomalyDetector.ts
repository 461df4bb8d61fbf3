import type { AnomalyFlag, ConformedRecord, FactEntity } from '@conservation-warehouse/types';
import type { AnomalyThresholds } from '../types';
import { logger } from '../utils/logger';

export const DEFAULT_THRESHOLDS: AnomalyThresholds = {
  largeDonationAmount: 10000,
  atRiskStatuses: ['At Risk'],
  populationDeclinePct: 10,
};

export interface AnomalyContext {
  // habitat_id -> conservation_status
  habitatStatuses: ReadonlyMap<string, string | null>;
}

function normalizeStatus(status: string): string {
  return status.trim().toLowerCase();
}

/**
 * Threshold rules over validated facts. Flags never exclude a record from load.
 */
export class AnomalyDetector {
  private readonly thresholds: AnomalyThresholds;
  private readonly atRisk: Set<string>;
  private readonly log = logger.child({ component: 'AnomalyDetector' });

  constructor(thresholds: Partial<AnomalyThresholds> = {}) {
    this.thresholds = { ...DEFAULT_THRESHOLDS, ...thresholds };
    this.atRisk = new Set(this.thresholds.atRiskStatuses.map(normalizeStatus));
  }

  detect(records: readonly ConformedRecord[], context: AnomalyContext): AnomalyFlag[] {
    const flags = records.flatMap((record) => this.detectRecord(record, context));
    for (const flag of flags) {
      this.log.info(flag.message, { entity: flag.entity, naturalKey: flag.naturalKey, rule: flag.rule });
    }
    return flags;
  }

  private detectRecord(record: ConformedRecord, context: AnomalyContext): AnomalyFlag[] {
    switch (record.entity) {
      case 'donation': {
        const { amount } = record.row;
        if (amount === null || amount <= this.thresholds.largeDonationAmount) {
          return [];
        }
        return [
          {
            entity: 'donation',
            naturalKey: record.naturalKey,
            rule: 'large_donation',
            severity: 'info',
            observedValue: amount,
            threshold: this.thresholds.largeDonationAmount,
            message: `Donation ${record.naturalKey} of ${amount} exceeds ${this.thresholds.largeDonationAmount}`,
          },
        ];
      }
      case 'elk_population': {
        const flags = this.habitatAtRisk('elk_population', record.naturalKey, record.row.habitat_id, context);
        const { elk_count: count, population_change: change, population_change_pct: pct } = record.row;
        // Compared unrounded; the stored percentage is rounded to 2 places
        const decline = count !== null && change !== null && pct !== null ? (-change / (count - change)) * 100 : 0;
        if (pct !== null && decline > this.thresholds.populationDeclinePct) {
          flags.push({
            entity: 'elk_population',
            naturalKey: record.naturalKey,
            rule: 'population_decline',
            severity: 'warning',
            observedValue: -pct,
            threshold: this.thresholds.populationDeclinePct,
            message: `Elk population in habitat ${record.row.habitat_id} declined ${-pct}% in ${record.row.year}`,
          });
        }
        return flags;
      }
      case 'conservation_metric': {
        const flags = this.habitatAtRisk('conservation_metric', record.naturalKey, record.row.habitat_id, context);
        const { budget, spent_to_date: spent } = record.row;
        if (budget !== null && spent !== null && spent > budget) {
          flags.push({
            entity: 'conservation_metric',
            naturalKey: record.naturalKey,
            rule: 'budget_overrun',
            severity: 'warning',
            observedValue: spent,
            threshold: budget,
            message: `Project ${record.row.project_id} spent ${spent} against a budget of ${budget}`,
          });
        }
        return flags;
      }
      default:
        return [];
    }
  }

  private habitatAtRisk(
    entity: FactEntity,
    naturalKey: string,
    habitatId: string | null,
    context: AnomalyContext
  ): AnomalyFlag[] {
    const status = habitatId === null ? undefined : context.habitatStatuses.get(habitatId);
    if (!status || !this.atRisk.has(normalizeStatus(status))) {
      return [];
    }
    return [
      {
        entity,
        naturalKey,
        rule: 'habitat_at_risk',
        severity: 'warning',
        observedValue: status,
        threshold: this.thresholds.atRiskStatuses.join(', '),
        message: `Habitat ${habitatId} has conservation status ${status}`,
      },
    ];
  }
}

export default AnomalyDetector;
