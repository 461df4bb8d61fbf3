/**
 * Configuration Tests
 */

import { describe, it, expect } from '@jest/globals';
import { resolve } from 'path';
import { DEFAULT_PROGRAM_NAMES, parseConfig, resolveSource } from '../config';
import { FatalConfigurationError } from '../errors';

const baseDir = resolve('/srv/etl');

describe('parseConfig', () => {
  it('should fill in defaults and resolve relative paths against the base directory', () => {
    const config = parseConfig(
      { store: { target: 'sqlite:warehouse.db' }, sources: { donor: { path: 'data/donors.csv' } } },
      {},
      baseDir
    );

    expect(config.store.target).toBe(`sqlite:${resolve(baseDir, 'warehouse.db')}`);
    expect(config.sources.donor?.path).toBe(resolve(baseDir, 'data/donors.csv'));
    expect(config.anomalies).toEqual({ largeDonationAmount: 10000, atRiskStatuses: ['At Risk'], populationDeclinePct: 10 });
    expect(config.filing.programNames).toEqual(DEFAULT_PROGRAM_NAMES);
    expect(config.run.timeoutMs).toBe(300_000);
    expect(config.run.lockPath).toBe(resolve(baseDir, '.etl-run.lock'));
    expect(config.run.fiscalYearStartMonth).toBe(10);
  });

  it('should keep an in-memory SQLite target as written', () => {
    expect(parseConfig({ store: { target: 'sqlite::memory:' } }, {}, baseDir).store.target).toBe('sqlite::memory:');
  });

  it('should let environment variables override the file', () => {
    const config = parseConfig(
      { store: { target: 'sqlite::memory:' } },
      { WAREHOUSE_STORE_TARGET: 'https://warehouse.example.org', SUPABASE_SERVICE_ROLE_KEY: 'test-secret', ETL_RUN_TIMEOUT_MS: '5000' },
      baseDir
    );

    expect(config.store).toEqual({ target: 'https://warehouse.example.org', serviceKey: 'test-secret' });
    expect(config.run.timeoutMs).toBe(5000);
  });

  it('should collect every issue into one fatal configuration error', () => {
    let caught: unknown;
    try {
      parseConfig({ store: {}, sources: { volunteers: { path: 'v.csv' } } }, {}, baseDir);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(FatalConfigurationError);
    if (caught instanceof FatalConfigurationError) {
      expect(caught.code).toBe('FATAL_CONFIGURATION');
      expect(caught.issues).toHaveLength(2);
      expect(caught.issues[0]).toMatch(/^store\.target: /);
      expect(caught.issues[1]).toMatch(/^sources: /);
    }
  });
});

describe('resolveSource', () => {
  const config = parseConfig(
    {
      store: { target: 'sqlite::memory:' },
      sources: {
        donor: { path: 'donors.csv', requiredColumns: ['donor_id'] },
        project: { path: 'projects.json', flatten: { field: 'habitat_ids', as: 'habitat_id' } },
        financial_filing: { path: ['filing-2022.txt', 'filing-2023.pdf'] },
        program_service: { path: 'filing-2022.txt' },
        campaign: { path: 'campaigns.zzq' },
      },
    },
    {},
    baseDir
  );

  it('should return null for an entity without a source', () => {
    expect(resolveSource('habitat', config)).toBeNull();
  });

  it('should detect the reader from the first file', () => {
    expect(resolveSource('donor', config)).toEqual({
      entity: 'donor',
      paths: [resolve(baseDir, 'donors.csv')],
      type: 'tabular',
      requiredColumns: ['donor_id'],
      minPopulated: 1,
      flatten: undefined,
      section: 'summary',
    });
    expect(resolveSource('project', config)?.type).toBe('document');
    expect(resolveSource('financial_filing', config)?.paths).toHaveLength(2);
  });

  it('should read program lines from filings by default', () => {
    expect(resolveSource('program_service', config)?.section).toBe('programs');
    expect(resolveSource('financial_filing', config)?.section).toBe('summary');
  });

  it('should reject a source whose type cannot be detected', () => {
    expect(() => resolveSource('campaign', config)).toThrow(FatalConfigurationError);
  });
});
