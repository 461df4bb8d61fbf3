import type {
  Conformed,
  ConformedRecord,
  DimensionEntity,
  DimensionLookups,
  EntityName,
  EntityRowMap,
  FactEntity,
  ForeignKeyRef,
  KeyLookup,
  RecordRef,
  ValidationViolation,
} from '@conservation-warehouse/types';
import { ConformanceError } from '../errors';
import { DataNormalizer } from '../validation/DataNormalizer';
import { logger } from '../utils/logger';
import { fieldBuilders, type FieldSchema } from './fields';
import { entitySchemas, type EntitySchemas } from './entitySchemas';
import { SurrogateKeyAssigner } from './SurrogateKeyAssigner';
import { dateKey } from './DateDimension';
import type { ConformanceResult, StagedRecord } from '../types';

export type FactLookups = Pick<DimensionLookups, DimensionEntity>;

export interface ConformanceOptions {
  normalizer?: DataNormalizer;
  hashKey?: (namespace: string, naturalKey: string) => number;
}

function conformed<E extends EntityName>(
  entity: E,
  naturalKey: string,
  ref: RecordRef,
  row: EntityRowMap[E],
  foreignKeys: ForeignKeyRef[] = [],
  businessDate: string | null = null
): Conformed<E> {
  return { entity, naturalKey, ref, row, foreignKeys, businessDate };
}

function required<T>(entity: EntityName, value: T | null, field: string): T {
  if (value === null) {
    throw new ConformanceError(entity, `Natural key field ${field} is missing`, {
      rule: 'missing_natural_key',
      failure: 'completeness',
      field,
    });
  }
  return value;
}

function yearEnd(year: number | null): string | null {
  return year === null ? null : `${String(year).padStart(4, '0')}-12-31`;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Converts staged records into typed dimension and fact records.
 * Coercion failures and missing natural keys are blocking violations and the
 * record is left out; nothing here throws past a single record.
 */
export class ConformanceLayer {
  private readonly normalizer: DataNormalizer;
  private readonly schemas: EntitySchemas;
  private readonly hashKey?: (namespace: string, naturalKey: string) => number;
  private readonly log = logger.child({ component: 'ConformanceLayer' });

  constructor(options: ConformanceOptions = {}) {
    this.normalizer = options.normalizer ?? new DataNormalizer();
    this.schemas = entitySchemas(fieldBuilders(this.normalizer));
    this.hashKey = options.hashKey;
  }

  conformDimension(entity: DimensionEntity, staged: StagedRecord[], persisted: KeyLookup): ConformanceResult {
    const assigner = new SurrogateKeyAssigner(entity, persisted, this.hashKey);

    return this.conformEach(entity, staged, (record, warnings) => {
      switch (entity) {
        case 'donor': {
          const data = this.coerce('donor', this.schemas.donor, record);
          const naturalKey = required(entity, data.donor_id, 'donor_id');
          return conformed('donor', naturalKey, record.ref, {
            ...data,
            donor_key: this.assignKey(assigner, entity, naturalKey),
            donor_id: naturalKey,
            phone: this.conformPhone(data.phone, naturalKey, record.ref, warnings),
          });
        }
        case 'campaign': {
          const data = this.coerce('campaign', this.schemas.campaign, record);
          const naturalKey = required(entity, data.campaign_id, 'campaign_id');
          return conformed('campaign', naturalKey, record.ref, {
            ...data,
            campaign_key: this.assignKey(assigner, entity, naturalKey),
            campaign_id: naturalKey,
          });
        }
        case 'habitat': {
          const data = this.coerce('habitat', this.schemas.habitat, record);
          const naturalKey = required(entity, data.habitat_id, 'habitat_id');
          return conformed('habitat', naturalKey, record.ref, {
            ...data,
            habitat_key: this.assignKey(assigner, entity, naturalKey),
            habitat_id: naturalKey,
          });
        }
        case 'project': {
          const data = this.coerce('project', this.schemas.project, record);
          const naturalKey = required(entity, data.project_id, 'project_id');
          return conformed('project', naturalKey, record.ref, {
            ...data,
            project_key: this.assignKey(assigner, entity, naturalKey),
            project_id: naturalKey,
          });
        }
      }
    });
  }

  conformFacts(entity: FactEntity, staged: StagedRecord[], lookups: FactLookups): ConformanceResult {
    const result = this.conformEach(entity, staged, (record, warnings) => {
      switch (entity) {
        case 'donation':
          return this.conformDonation(record, lookups);
        case 'elk_population':
          return this.conformElkPopulation(record, lookups);
        case 'conservation_metric':
          return this.conformConservationMetric(record, lookups);
        case 'financial_filing':
          return this.conformFinancialFiling(record, warnings);
        case 'program_service':
          return this.conformProgramService(record);
      }
    });

    if (entity === 'elk_population') {
      result.records = this.withPopulationChange(result.records);
    }
    return result;
  }

  private conformDonation(record: StagedRecord, lookups: FactLookups): Conformed<'donation'> {
    const data = this.coerce('donation', this.schemas.donation, record);
    const naturalKey = required('donation', data.donation_id, 'donation_id');
    const donor = this.foreignKey(lookups, 'donor', 'donor_key', data.donor_id, false);
    const campaign = this.foreignKey(lookups, 'campaign', 'campaign_key', data.campaign_id, false);
    const date = this.dateForeignKey(data.donation_date);

    return conformed(
      'donation',
      naturalKey,
      record.ref,
      {
        donation_id: naturalKey,
        donor_key: donor.surrogateKey,
        campaign_key: campaign.surrogateKey,
        date_key: date.surrogateKey,
        amount: data.amount,
        payment_method: data.payment_method,
        is_recurring: data.is_recurring ?? false,
        notes: data.notes,
      },
      [donor, campaign, date],
      data.donation_date
    );
  }

  private conformElkPopulation(record: StagedRecord, lookups: FactLookups): Conformed<'elk_population'> {
    const data = this.coerce('elk_population', this.schemas.elk_population, record);
    const habitatId = required('elk_population', data.habitat_id, 'habitat_id');
    const year = required('elk_population', data.year, 'year');
    const businessDate = yearEnd(year);
    const habitat = this.foreignKey(lookups, 'habitat', 'habitat_key', habitatId, false);
    const date = this.dateForeignKey(businessDate);

    return conformed(
      'elk_population',
      `${habitatId}|${year}`,
      record.ref,
      {
        habitat_id: habitatId,
        habitat_key: habitat.surrogateKey,
        year,
        date_key: dateKey(`${year}-12-31`),
        elk_count: data.elk_count,
        population_change: null,
        population_change_pct: null,
      },
      [habitat, date],
      businessDate
    );
  }

  private conformConservationMetric(record: StagedRecord, lookups: FactLookups): Conformed<'conservation_metric'> {
    const data = this.coerce('conservation_metric', this.schemas.conservation_metric, record);
    const projectId = required('conservation_metric', data.project_id, 'project_id');
    const project = this.foreignKey(lookups, 'project', 'project_key', projectId, false);
    const habitat = this.foreignKey(lookups, 'habitat', 'habitat_key', data.habitat_id, true);
    const date = this.dateForeignKey(data.start_date);

    return conformed(
      'conservation_metric',
      `${projectId}|${data.habitat_id ?? ''}`,
      record.ref,
      {
        project_id: projectId,
        habitat_id: data.habitat_id,
        project_key: project.surrogateKey,
        habitat_key: habitat.surrogateKey,
        date_key: date.surrogateKey,
        budget: data.budget,
        spent_to_date: data.spent_to_date,
        acres_protected: data.acres_protected,
        elk_population_impacted: data.elk_population_impacted,
      },
      [project, habitat, date],
      data.start_date
    );
  }

  private conformFinancialFiling(record: StagedRecord, warnings: ValidationViolation[]): Conformed<'financial_filing'> {
    const data = this.coerce('financial_filing', this.schemas.financial_filing, record);
    const taxYear = required('financial_filing', data.tax_year, 'tax_year');
    const naturalKey = String(taxYear);
    const businessDate = yearEnd(taxYear);

    // Missing labels degrade the filing, they do not reject it
    for (const label of record.missingLabels) {
      warnings.push({
        entity: 'financial_filing',
        naturalKey,
        ref: record.ref,
        rule: 'filing_label_missing',
        category: 'completeness',
        severity: 'warning',
        field: label,
        value: null,
        message: `Filing for tax year ${taxYear} has no value for ${label}`,
      });
    }

    const derived =
      data.revenue_less_expenses ??
      (data.total_revenue !== null && data.total_expenses !== null
        ? round2(data.total_revenue - data.total_expenses)
        : null);

    return conformed(
      'financial_filing',
      naturalKey,
      record.ref,
      {
        ...data,
        tax_year: taxYear,
        fiscal_year: taxYear,
        date_key: dateKey(`${taxYear}-12-31`),
        revenue_less_expenses: derived,
      },
      [this.dateForeignKey(businessDate)],
      businessDate
    );
  }

  private conformProgramService(record: StagedRecord): Conformed<'program_service'> {
    const data = this.coerce('program_service', this.schemas.program_service, record);
    const taxYear = required('program_service', data.tax_year, 'tax_year');
    const code = required('program_service', data.program_code, 'program_code');
    const businessDate = yearEnd(taxYear);

    return conformed(
      'program_service',
      `${taxYear}|${code}`,
      record.ref,
      {
        ...data,
        tax_year: taxYear,
        program_code: code,
        date_key: dateKey(`${taxYear}-12-31`),
      },
      [this.dateForeignKey(businessDate)],
      businessDate
    );
  }

  /**
   * Year-over-year change per habitat against the previous calendar year's count.
   * No observation for the previous year leaves the change null.
   */
  private withPopulationChange(records: ConformedRecord[]): ConformedRecord[] {
    const counts = new Map<string, number>();
    for (const record of records) {
      if (record.entity === 'elk_population' && record.row.elk_count !== null && !counts.has(record.naturalKey)) {
        counts.set(record.naturalKey, record.row.elk_count);
      }
    }

    return records.map((record) => {
      if (record.entity !== 'elk_population' || record.row.elk_count === null) {
        return record;
      }
      const previous = counts.get(`${record.row.habitat_id}|${record.row.year - 1}`);
      if (previous === undefined) {
        return record;
      }
      const change = record.row.elk_count - previous;
      return {
        ...record,
        row: {
          ...record.row,
          population_change: change,
          population_change_pct: previous === 0 ? null : round2((change / previous) * 100),
        },
      };
    });
  }

  private conformEach(
    entity: EntityName,
    staged: StagedRecord[],
    build: (record: StagedRecord, warnings: ValidationViolation[]) => ConformedRecord
  ): ConformanceResult {
    const records: ConformedRecord[] = [];
    const violations: ValidationViolation[] = [];
    let rejected = 0;

    for (const record of staged) {
      const warnings: ValidationViolation[] = [];
      try {
        records.push(build(record, warnings));
        violations.push(...warnings);
      } catch (error) {
        if (!(error instanceof AggregateConformanceError) && !(error instanceof ConformanceError)) {
          throw error;
        }
        rejected++;
        const failures = error instanceof AggregateConformanceError ? error.errors : [error];
        for (const failure of failures) {
          violations.push({
            entity,
            naturalKey: null,
            ref: record.ref,
            rule: failure.rule,
            category: failure.failure,
            severity: 'blocking',
            field: failure.field,
            value: failure.value,
            message: failure.message,
          });
        }
      }
    }

    for (const violation of violations) {
      const level = violation.severity === 'blocking' ? 'warn' : 'info';
      this.log.log(level, violation.message, {
        entity,
        rule: violation.rule,
        source: violation.ref.source,
        line: violation.ref.line,
        path: violation.ref.path,
      });
    }

    return { records, violations, rejected };
  }

  private coerce<T>(entity: EntityName, schema: FieldSchema<T>, record: StagedRecord): T {
    const result = schema.safeParse(record.fields);
    if (result.success) {
      return result.data;
    }

    throw new AggregateConformanceError(
      result.error.issues.map((issue) => {
        const field = issue.path.map(String).join('.');
        return new ConformanceError(entity, `${field}: ${issue.message}`, {
          field,
          value: record.fields[field],
        });
      })
    );
  }

  private assignKey(assigner: SurrogateKeyAssigner, entity: DimensionEntity, naturalKey: string): number {
    const assignment = assigner.assign(naturalKey);
    if (!assignment.ok) {
      throw new ConformanceError(
        entity,
        `Surrogate key for ${naturalKey} collides with the key of ${assignment.collidesWith}`,
        { rule: 'surrogate_key_collision', failure: 'conformance', value: naturalKey }
      );
    }
    return assignment.key;
  }

  private conformPhone(
    phone: string | null,
    naturalKey: string,
    ref: RecordRef,
    warnings: ValidationViolation[]
  ): string | null {
    if (phone === null) {
      return null;
    }
    const result = this.normalizer.normalizePhoneNumber(phone);
    if (result.isValid && result.normalized) {
      return result.normalized;
    }
    warnings.push({
      entity: 'donor',
      naturalKey,
      ref,
      rule: 'phone_not_normalized',
      category: 'conformance',
      severity: 'warning',
      field: 'phone',
      value: phone,
      message: `Phone number "${phone}" for donor ${naturalKey} could not be normalized to E.164`,
    });
    return phone;
  }

  private foreignKey(
    lookups: FactLookups,
    dimension: DimensionEntity,
    column: string,
    naturalKey: string | null,
    nullable: boolean
  ): ForeignKeyRef {
    const surrogateKey = naturalKey === null ? null : lookups[dimension].get(naturalKey) ?? null;
    return { dimension, column, naturalKey, surrogateKey, nullable };
  }

  private dateForeignKey(businessDate: string | null): ForeignKeyRef {
    return {
      dimension: 'date',
      column: 'date_key',
      naturalKey: businessDate,
      surrogateKey: businessDate === null ? null : dateKey(businessDate),
      nullable: false,
    };
  }
}

// Every field that failed coercion in one record
class AggregateConformanceError extends Error {
  constructor(readonly errors: ConformanceError[]) {
    super(errors.map((error) => error.message).join('; '));
    this.name = 'AggregateConformanceError';
  }
}
