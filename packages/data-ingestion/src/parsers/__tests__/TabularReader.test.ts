/**
 * TabularReader Tests
 * Files are written to a temporary directory per test
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { TabularReader } from '../TabularReader';
import { SourceReadError } from '../../errors';
import type { SourceLocator } from '../../types';

const locator = (path: string, overrides: Partial<SourceLocator> = {}): SourceLocator => ({
  entity: 'donor',
  paths: [path],
  type: 'tabular',
  requiredColumns: [],
  minPopulated: 1,
  section: 'summary',
  ...overrides,
});

describe('TabularReader', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'tabular-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  const write = (name: string, content: string | Buffer): string => {
    const path = join(dir, name);
    writeFileSync(path, content);
    return path;
  };

  it('should stage one record per row with line references', async () => {
    const path = write('donors.csv', 'donor_id,first_name\nD-1,Ada\nD-2,Ben\n');
    const { records, skipped } = await new TabularReader(locator(path)).readAll();

    expect(skipped).toEqual([]);
    expect(records).toEqual([
      { entity: 'donor', ref: { source: path, line: 2 }, fields: { donor_id: 'D-1', first_name: 'Ada' }, missingLabels: [] },
      { entity: 'donor', ref: { source: path, line: 3 }, fields: { donor_id: 'D-2', first_name: 'Ben' }, missingLabels: [] },
    ]);
  });

  it('should detect semicolon delimiters and strip a UTF-8 byte order mark', async () => {
    const path = write('habitats.csv', '\uFEFFhabitat_id;habitat_name\nHAB-1;North Fork\n');
    const { records } = await new TabularReader(locator(path, { entity: 'habitat' })).readAll();

    expect(records.map((record) => record.fields)).toEqual([{ habitat_id: 'HAB-1', habitat_name: 'North Fork' }]);
  });

  it('should keep quoted delimiters inside a value', async () => {
    const path = write('donations.csv', 'donation_id,amount\nDN-2,"$15,000.00"\n');
    const { records } = await new TabularReader(locator(path, { entity: 'donation' })).readAll();

    expect(records[0].fields).toEqual({ donation_id: 'DN-2', amount: '$15,000.00' });
  });

  it('should skip rows with too few required columns and keep reading', async () => {
    const path = write('donors.csv', 'donor_id,email\n,\nD-2,ben@example.org\n');
    const reader = new TabularReader(locator(path, { requiredColumns: ['donor_id', 'email'], minPopulated: 2 }));
    const { records, skipped } = await reader.readAll();

    expect(records.map((record) => record.fields.donor_id)).toEqual(['D-2']);
    expect(skipped).toHaveLength(1);
    expect(skipped[0]).toBeInstanceOf(SourceReadError);
    expect(skipped[0].message).toBe(`Row 2 of ${path} has 0 of 2 required columns populated`);
    expect(skipped[0].ref).toEqual({ source: path, line: 2 });
  });

  it('should fail the source when a required column is missing from the header', async () => {
    const path = write('donors.csv', 'donor_id\nD-1\n');
    const reader = new TabularReader(locator(path, { requiredColumns: ['donor_id', 'email', 'phone'] }));

    await expect(reader.readAll()).rejects.toThrow(`${path} is missing required columns: email, phone`);
  });

  it('should reject UTF-16 files', async () => {
    const path = write('donors.csv', Buffer.from([0xff, 0xfe, 0x64, 0x00, 0x6f, 0x00]));

    await expect(new TabularReader(locator(path)).readAll()).rejects.toThrow(
      `Unsupported encoding in ${path}: UTF-16 byte order mark`
    );
  });

  it('should reject bytes that are not UTF-8', async () => {
    const path = write('donors.csv', Buffer.concat([Buffer.from('donor_id,first_name\nD-1,Jos'), Buffer.from([0xe9, 0x0a])]));
    const reading = new TabularReader(locator(path)).readAll();

    await expect(reading).rejects.toBeInstanceOf(SourceReadError);
    await expect(reading).rejects.toThrow(`Unsupported encoding in ${path}: not valid UTF-8`);
  });

  it('should report a missing file as a source read error', async () => {
    const path = join(dir, 'absent.csv');

    await expect(new TabularReader(locator(path)).readAll()).rejects.toBeInstanceOf(SourceReadError);
  });
});
