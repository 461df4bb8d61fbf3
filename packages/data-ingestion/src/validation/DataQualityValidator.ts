import type {
  ConformedRecord,
  DimensionLookups,
  EntityName,
  ReferentialIntegrityViolation,
  ValidationViolation,
  ViolationCategory,
  ViolationSeverity,
} from '@conservation-warehouse/types';
import { DeduplicationEngine } from './DeduplicationEngine';
import type { ValidationOutcome } from '../types';

type Finding = Omit<ValidationViolation, 'entity' | 'naturalKey' | 'ref'>;

export interface ValidationContext {
  lookups: DimensionLookups;
}

// Attributes that must be present for the record to load
const REQUIRED_ATTRIBUTES: Partial<Record<EntityName, string[]>> = {
  campaign: ['campaign_name'],
  habitat: ['habitat_name'],
  project: ['project_name'],
  donation: ['amount'],
  elk_population: ['elk_count'],
  program_service: ['program_name'],
};

const REVENUE_TOLERANCE = 1;

function attribute(row: object, name: string): unknown {
  const entry = Object.entries(row).find(([key]) => key === name);
  return entry ? entry[1] : undefined;
}

function isMissing(value: unknown): boolean {
  return value === undefined || value === null || value === '';
}

function finding(
  rule: string,
  category: ViolationCategory,
  severity: ViolationSeverity,
  message: string,
  field?: string,
  value?: unknown
): Finding {
  return { rule, category, severity, message, field, value };
}

function negative(rule: string, field: string, value: number | null): Finding[] {
  if (value === null || value >= 0) {
    return [];
  }
  return [finding(rule, 'business_rule', 'blocking', `${field} must not be negative, got ${value}`, field, value)];
}

function endBeforeStart(start: string | null, end: string | null): Finding[] {
  if (start === null || end === null || end >= start) {
    return [];
  }
  return [
    finding('end_before_start', 'business_rule', 'blocking', `end_date ${end} precedes start_date ${start}`, 'end_date', end),
  ];
}

/**
 * Entity invariants. Each rule is evaluated on its own; a record may break several.
 */
function businessRules(record: ConformedRecord): Finding[] {
  switch (record.entity) {
    case 'donor': {
      const { email } = record.row;
      if (email !== null && !email.includes('@')) {
        return [finding('invalid_email', 'business_rule', 'warning', `Email "${email}" has no @`, 'email', email)];
      }
      return [];
    }
    case 'campaign':
      return [
        ...endBeforeStart(record.row.start_date, record.row.end_date),
        ...negative('negative_goal', 'goal_amount', record.row.goal_amount),
      ];
    case 'habitat': {
      const score = record.row.habitat_quality_score;
      const findings = negative('negative_acres', 'total_acres', record.row.total_acres);
      if (score !== null && (score < 0 || score > 100)) {
        findings.push(
          finding(
            'quality_score_out_of_range',
            'business_rule',
            'warning',
            `habitat_quality_score ${score} is outside 0-100`,
            'habitat_quality_score',
            score
          )
        );
      }
      return findings;
    }
    case 'project':
      return endBeforeStart(record.row.start_date, record.row.end_date);
    case 'donation': {
      const { amount } = record.row;
      if (amount !== null && amount <= 0) {
        return [finding('non_positive_amount', 'business_rule', 'blocking', `amount must be positive, got ${amount}`, 'amount', amount)];
      }
      return [];
    }
    case 'elk_population':
      return negative('negative_count', 'elk_count', record.row.elk_count);
    case 'conservation_metric':
      return [
        ...negative('negative_measure', 'budget', record.row.budget),
        ...negative('negative_measure', 'spent_to_date', record.row.spent_to_date),
        ...negative('negative_measure', 'acres_protected', record.row.acres_protected),
        ...negative('negative_measure', 'elk_population_impacted', record.row.elk_population_impacted),
      ];
    case 'financial_filing': {
      const row = record.row;
      const components = [
        row.contributions_and_grants,
        row.program_service_revenue,
        row.investment_income,
        row.other_revenue,
      ];
      if (row.total_revenue === null || components.some((value) => value === null)) {
        return [];
      }
      const sum = components.reduce<number>((total, value) => total + (value ?? 0), 0);
      if (Math.abs(sum - row.total_revenue) > REVENUE_TOLERANCE) {
        return [
          finding(
            'revenue_components_mismatch',
            'business_rule',
            'warning',
            `Revenue components sum to ${sum} but total_revenue is ${row.total_revenue}`,
            'total_revenue',
            row.total_revenue
          ),
        ];
      }
      return [];
    }
    case 'program_service':
      return [
        ...negative('negative_measure', 'expenses', record.row.expenses),
        ...negative('negative_measure', 'grants', record.row.grants),
        ...negative('negative_measure', 'revenue', record.row.revenue),
      ];
    case 'date':
      return [];
  }
}

/**
 * Classifies one entity batch against completeness, uniqueness, referential
 * integrity and business rules. Records are never modified; a record with any
 * blocking violation is returned as rejected.
 */
export class DataQualityValidator {
  validate(records: readonly ConformedRecord[], context: ValidationContext): ValidationOutcome {
    const perRecord: ValidationViolation[][] = records.map((record) => this.checkRecord(record, context));

    for (const duplicate of DeduplicationEngine.findDuplicates(records, (record) => record.naturalKey)) {
      perRecord[duplicate.index].push(
        this.violation(
          duplicate.item,
          finding(
            'duplicate_natural_key',
            'uniqueness',
            'blocking',
            `Duplicate ${duplicate.item.entity} natural key ${duplicate.key}, first seen at position ${duplicate.firstIndex + 1}`
          )
        )
      );
    }

    const accepted: ConformedRecord[] = [];
    const rejected: ConformedRecord[] = [];
    records.forEach((record, index) => {
      const blocked = perRecord[index].some((violation) => violation.severity === 'blocking');
      (blocked ? rejected : accepted).push(record);
    });

    return { accepted, rejected, violations: perRecord.flat() };
  }

  private checkRecord(record: ConformedRecord, context: ValidationContext): ValidationViolation[] {
    const violations: ValidationViolation[] = [];

    for (const name of REQUIRED_ATTRIBUTES[record.entity] ?? []) {
      if (isMissing(attribute(record.row, name))) {
        violations.push(
          this.violation(
            record,
            finding('required_attribute', 'completeness', 'blocking', `${record.entity} ${record.naturalKey} has no ${name}`, name, null)
          )
        );
      }
    }

    for (const foreignKey of record.foreignKeys) {
      if (foreignKey.naturalKey === null) {
        if (!foreignKey.nullable) {
          violations.push(
            this.violation(
              record,
              finding(
                'missing_foreign_key',
                'completeness',
                'blocking',
                `${record.entity} ${record.naturalKey} has no ${foreignKey.dimension} reference`,
                foreignKey.column,
                null
              )
            )
          );
        }
        continue;
      }

      if (!context.lookups[foreignKey.dimension].has(foreignKey.naturalKey)) {
        const violation: ReferentialIntegrityViolation = {
          ...this.violation(
            record,
            finding(
              'unresolved_foreign_key',
              'referential_integrity',
              'blocking',
              `${record.entity} ${record.naturalKey} references unknown ${foreignKey.dimension} "${foreignKey.naturalKey}"`,
              foreignKey.column,
              foreignKey.naturalKey
            )
          ),
          category: 'referential_integrity',
          dimension: foreignKey.dimension,
          unresolvedKey: foreignKey.naturalKey,
        };
        violations.push(violation);
      }
    }

    for (const result of businessRules(record)) {
      violations.push(this.violation(record, result));
    }

    return violations;
  }

  private violation(record: ConformedRecord, result: Finding): ValidationViolation {
    return { entity: record.entity, naturalKey: record.naturalKey, ref: record.ref, ...result };
  }
}

export default DataQualityValidator;
