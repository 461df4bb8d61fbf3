/**
 * AnomalyDetector Tests
 */

import { describe, it, expect } from '@jest/globals';
import type { Conformed, ConservationMetricRow, ElkPopulationRow } from '@conservation-warehouse/types';
import { AnomalyDetector } from '../AnomalyDetector';

const ref = { source: 'test', line: 1 };

const donation = (id: string, amount: number): Conformed<'donation'> => ({
  entity: 'donation',
  naturalKey: id,
  ref,
  foreignKeys: [],
  businessDate: '2023-04-02',
  row: {
    donation_id: id,
    donor_key: 1,
    campaign_key: 2,
    date_key: 20230402,
    amount,
    payment_method: null,
    is_recurring: false,
    notes: null,
  },
});

const elk = (habitatId: string, year: number, overrides: Partial<ElkPopulationRow> = {}): Conformed<'elk_population'> => ({
  entity: 'elk_population',
  naturalKey: `${habitatId}|${year}`,
  ref,
  foreignKeys: [],
  businessDate: `${year}-12-31`,
  row: {
    habitat_id: habitatId,
    habitat_key: 1,
    year,
    date_key: year * 10000 + 1231,
    elk_count: 400,
    population_change: null,
    population_change_pct: null,
    ...overrides,
  },
});

const metric = (overrides: Partial<ConservationMetricRow>): Conformed<'conservation_metric'> => ({
  entity: 'conservation_metric',
  naturalKey: `P-1|${overrides.habitat_id ?? ''}`,
  ref,
  foreignKeys: [],
  businessDate: '2023-04-15',
  row: {
    project_id: 'P-1',
    habitat_id: null,
    project_key: 1,
    habitat_key: null,
    date_key: 20230415,
    budget: 100000,
    spent_to_date: 50000,
    acres_protected: 10,
    elk_population_impacted: 0,
    ...overrides,
  },
});

const context = { habitatStatuses: new Map<string, string | null>([['HAB-1', 'Stable'], ['HAB-2', ' at risk ']]) };

describe('AnomalyDetector', () => {
  const detector = new AnomalyDetector();

  it('should flag a donation above the threshold exactly once', () => {
    const flags = detector.detect([donation('DN-1', 250), donation('DN-2', 15000), donation('DN-3', 10000)], context);

    expect(flags).toEqual([
      {
        entity: 'donation',
        naturalKey: 'DN-2',
        rule: 'large_donation',
        severity: 'info',
        observedValue: 15000,
        threshold: 10000,
        message: 'Donation DN-2 of 15000 exceeds 10000',
      },
    ]);
  });

  it('should flag a population decline beyond the threshold', () => {
    const flags = detector.detect(
      [
        elk('HAB-1', 2023, { population_change: -100, population_change_pct: -20 }),
        elk('HAB-1', 2024, { population_change: -20, population_change_pct: -5 }),
        elk('HAB-1', 2022),
      ],
      context
    );

    expect(flags.map((flag) => [flag.naturalKey, flag.rule, flag.observedValue, flag.threshold])).toEqual([
      ['HAB-1|2023', 'population_decline', 20, 10],
    ]);
  });

  it('should compare the unrounded decline with the threshold', () => {
    const flags = detector.detect(
      [
        elk('HAB-1', 2023, { elk_count: 89996, population_change: -10004, population_change_pct: -10 }),
        elk('HAB-1', 2024, { elk_count: 90000, population_change: -10000, population_change_pct: -10 }),
      ],
      context
    );

    expect(flags.map((flag) => [flag.naturalKey, flag.rule, flag.observedValue])).toEqual([
      ['HAB-1|2023', 'population_decline', 10],
    ]);
  });

  it('should match at-risk statuses case-insensitively', () => {
    const flags = detector.detect([elk('HAB-2', 2023), metric({ habitat_id: 'HAB-2' }), metric({ habitat_id: 'HAB-1' })], context);

    expect(flags.map((flag) => [flag.entity, flag.naturalKey, flag.rule, flag.observedValue])).toEqual([
      ['elk_population', 'HAB-2|2023', 'habitat_at_risk', ' at risk '],
      ['conservation_metric', 'P-1|HAB-2', 'habitat_at_risk', ' at risk '],
    ]);
  });

  it('should flag spending beyond the budget', () => {
    const flags = detector.detect([metric({ spent_to_date: 120000 }), metric({ budget: null, spent_to_date: 5 })], context);

    expect(flags.map((flag) => [flag.rule, flag.severity, flag.observedValue, flag.threshold])).toEqual([
      ['budget_overrun', 'warning', 120000, 100000],
    ]);
  });

  it('should use configured thresholds', () => {
    const strict = new AnomalyDetector({ largeDonationAmount: 100, atRiskStatuses: ['Stable'] });
    const flags = strict.detect([donation('DN-1', 250), elk('HAB-1', 2023)], context);

    expect(flags.map((flag) => flag.rule)).toEqual(['large_donation', 'habitat_at_risk']);
  });
});
