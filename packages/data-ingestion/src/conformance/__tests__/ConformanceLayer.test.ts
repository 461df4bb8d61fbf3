/**
 * ConformanceLayer Tests
 */

import { describe, it, expect } from '@jest/globals';
import type { ConformedRecord } from '@conservation-warehouse/types';
import { ConformanceLayer, type FactLookups } from '../ConformanceLayer';
import { DeduplicationEngine } from '../../validation/DeduplicationEngine';
import type { StagedRecord } from '../../types';

const staged = (
  entity: StagedRecord['entity'],
  fields: Record<string, unknown>,
  line = 2,
  missingLabels: string[] = []
): StagedRecord => ({ entity, ref: { source: `${entity}.csv`, line }, fields, missingLabels });

const noLookups = (): FactLookups => ({ donor: new Map(), campaign: new Map(), habitat: new Map(), project: new Map() });

// Plain view of a conformed row for assertions
const rowOf = (record: ConformedRecord): Record<string, unknown> => ({ ...record.row });

describe('ConformanceLayer', () => {
  const layer = new ConformanceLayer();

  describe('dimensions', () => {
    it('should reuse persisted surrogate keys and hash new natural keys', () => {
      const result = layer.conformDimension(
        'habitat',
        [staged('habitat', { habitat_id: 'HAB-1', habitat_name: 'North Fork' }), staged('habitat', { habitat_id: 'HAB-2', habitat_name: 'Elk Creek' }, 3)],
        new Map([['HAB-1', 101]])
      );

      expect(result.rejected).toBe(0);
      expect(result.records.map((record) => record.naturalKey)).toEqual(['HAB-1', 'HAB-2']);
      expect(rowOf(result.records[0]).habitat_key).toBe(101);
      expect(rowOf(result.records[1]).habitat_key).toBe(DeduplicationEngine.hashKey('habitat', 'HAB-2'));
    });

    it('should coerce attributes and store lists as JSON text', () => {
      const result = layer.conformDimension(
        'habitat',
        [staged('habitat', { habitat_id: ' HAB-1 ', habitat_name: 'North Fork', total_acres: '12,000', primary_threats: 'drought;fencing' })],
        new Map()
      );

      expect(rowOf(result.records[0])).toEqual({
        habitat_key: DeduplicationEngine.hashKey('habitat', 'HAB-1'),
        habitat_id: 'HAB-1',
        habitat_name: 'North Fork',
        state: null,
        region: null,
        total_acres: 12000,
        habitat_quality_score: null,
        conservation_status: null,
        primary_threats: '["drought","fencing"]',
      });
    });

    it('should turn a coercion failure into a blocking violation and exclude the record', () => {
      const result = layer.conformDimension(
        'campaign',
        [staged('campaign', { campaign_id: 'C-1', campaign_name: 'Spring', start_date: 'soon', goal_amount: 'lots' })],
        new Map()
      );

      expect(result.records).toEqual([]);
      expect(result.rejected).toBe(1);
      expect(result.violations.map((violation) => [violation.rule, violation.category, violation.severity, violation.field])).toEqual([
        ['type_coercion', 'conformance', 'blocking', 'start_date'],
        ['type_coercion', 'conformance', 'blocking', 'goal_amount'],
      ]);
      expect(result.violations[0].message).toBe('start_date: "soon" is not a recognised date');
    });

    it('should reject a record without a natural key as incomplete', () => {
      const result = layer.conformDimension('donor', [staged('donor', { first_name: 'Ada' })], new Map());

      expect(result.rejected).toBe(1);
      expect(result.violations).toEqual([
        {
          entity: 'donor',
          naturalKey: null,
          ref: { source: 'donor.csv', line: 2 },
          rule: 'missing_natural_key',
          category: 'completeness',
          severity: 'blocking',
          field: 'donor_id',
          value: undefined,
          message: 'Natural key field donor_id is missing',
        },
      ]);
    });

    it('should report a surrogate key collision as blocking', () => {
      const collidingLayer = new ConformanceLayer({ hashKey: () => 7 });
      const result = collidingLayer.conformDimension(
        'project',
        [staged('project', { project_id: 'P-1', project_name: 'A' }), staged('project', { project_id: 'P-2', project_name: 'B' }, 3)],
        new Map()
      );

      expect(result.records.map((record) => record.naturalKey)).toEqual(['P-1']);
      expect(result.violations.map((violation) => [violation.rule, violation.category])).toEqual([
        ['surrogate_key_collision', 'conformance'],
      ]);
      expect(result.violations[0].message).toBe('Surrogate key for P-2 collides with the key of P-1');
    });

    it('should normalize donor phones and warn on numbers it cannot read', () => {
      const result = layer.conformDimension(
        'donor',
        [staged('donor', { donor_id: 'D-1', phone: '(201) 555-0123' }), staged('donor', { donor_id: 'D-2', phone: '12' }, 3)],
        new Map()
      );

      expect(rowOf(result.records[0]).phone).toBe('+12015550123');
      expect(rowOf(result.records[1]).phone).toBe('12');
      expect(result.violations.map((violation) => [violation.naturalKey, violation.rule, violation.severity])).toEqual([
        ['D-2', 'phone_not_normalized', 'warning'],
      ]);
    });
  });

  describe('facts', () => {
    it('should resolve foreign keys and keep unresolved natural keys', () => {
      const lookups = { ...noLookups(), donor: new Map([['D-1', 11]]), campaign: new Map([['C-1', 22]]) };
      const result = layer.conformFacts(
        'donation',
        [
          staged('donation', { donation_id: 'DN-1', donor_id: 'D-1', campaign_id: 'C-1', donation_date: '3/15/2023', amount: '$250.00' }),
          staged('donation', { donation_id: 'DN-2', donor_id: 'D-9', campaign_id: 'C-1', donation_date: '2023-04-02', amount: '10' }, 3),
        ],
        lookups
      );

      expect(rowOf(result.records[0])).toEqual({
        donation_id: 'DN-1',
        donor_key: 11,
        campaign_key: 22,
        date_key: 20230315,
        amount: 250,
        payment_method: null,
        is_recurring: false,
        notes: null,
      });
      expect(result.records[0].businessDate).toBe('2023-03-15');
      expect(result.records[1].foreignKeys[0]).toEqual({
        dimension: 'donor',
        column: 'donor_key',
        naturalKey: 'D-9',
        surrogateKey: null,
        nullable: false,
      });
    });

    it('should compute year-over-year population change per habitat', () => {
      const lookups = { ...noLookups(), habitat: new Map([['HAB-1', 5]]) };
      const result = layer.conformFacts(
        'elk_population',
        [
          staged('elk_population', { habitat_id: 'HAB-1', year: 2023, elk_count: 400 }),
          staged('elk_population', { habitat_id: 'HAB-1', year: 2022, elk_count: 500 }, 3),
          staged('elk_population', { habitat_id: 'HAB-1', year: 2025, elk_count: 450 }, 4),
        ],
        lookups
      );

      const rows = result.records.map((record) => rowOf(record));
      expect(rows.map((row) => [row.year, row.population_change, row.population_change_pct])).toEqual([
        [2023, -100, -20],
        [2022, null, null],
        [2025, null, null],
      ]);
      expect(result.records.map((record) => record.naturalKey)).toEqual(['HAB-1|2023', 'HAB-1|2022', 'HAB-1|2025']);
      expect(rows[0].date_key).toBe(20231231);
      expect(rows[0].habitat_key).toBe(5);
    });

    it('should key conservation metrics by project and optional habitat', () => {
      const lookups = { ...noLookups(), project: new Map([['P-2', 3]]) };
      const result = layer.conformFacts(
        'conservation_metric',
        [staged('conservation_metric', { project_id: 'P-2', habitat_id: null, start_date: '2024-01-10', budget: 50000 })],
        lookups
      );

      expect(result.records[0].naturalKey).toBe('P-2|');
      expect(result.records[0].foreignKeys.map((key) => [key.dimension, key.surrogateKey, key.nullable])).toEqual([
        ['project', 3, false],
        ['habitat', null, true],
        ['date', 20240110, false],
      ]);
    });

    it('should warn on missing filing labels and derive revenue less expenses', () => {
      const result = layer.conformFacts(
        'financial_filing',
        [
          staged(
            'financial_filing',
            { tax_year: 2023, total_revenue: 1500, total_expenses: 1100, revenue_less_expenses: null },
            1,
            ['grants_and_similar_paid']
          ),
        ],
        noLookups()
      );

      const row = rowOf(result.records[0]);
      expect(row.revenue_less_expenses).toBe(400);
      expect(row.fiscal_year).toBe(2023);
      expect(row.grants_and_similar_paid).toBeNull();
      expect(result.rejected).toBe(0);
      expect(result.violations.map((violation) => [violation.rule, violation.severity, violation.field, violation.naturalKey])).toEqual([
        ['filing_label_missing', 'warning', 'grants_and_similar_paid', '2023'],
      ]);
    });

    it('should key program service lines by tax year and code', () => {
      const result = layer.conformFacts(
        'program_service',
        [staged('program_service', { tax_year: 2022, program_code: '4a', program_name: 'Land Protection', expenses: 300000 })],
        noLookups()
      );

      expect(result.records[0].naturalKey).toBe('2022|4a');
      expect(rowOf(result.records[0]).date_key).toBe(20221231);
    });

    it('should reject facts missing part of a composite natural key', () => {
      const result = layer.conformFacts('elk_population', [staged('elk_population', { habitat_id: 'HAB-1', elk_count: 10 })], noLookups());

      expect(result.records).toEqual([]);
      expect(result.violations.map((violation) => [violation.rule, violation.field])).toEqual([['missing_natural_key', 'year']]);
    });
  });
});
