import { EventEmitter } from 'events';
import { readFile } from 'fs/promises';
import { TextDecoder } from 'util';
import type { SourcedEntity } from '@conservation-warehouse/types';
import { SourceReadError } from '../errors';
import { getErrorMessage } from '../utils/errorUtils';
import type { ReadResult, SourceLocator, StagedRecord } from '../types';

/**
 * Base class for the per-format readers. read() is a lazy sequence of staged
 * records; a structural failure rejects with SourceReadError, while a bad row
 * is reported through the rowSkipped event and the sequence continues.
 */
export abstract class SourceReader extends EventEmitter {
  protected readonly locator: SourceLocator;

  constructor(locator: SourceLocator) {
    super();
    this.locator = locator;
  }

  get entity(): SourcedEntity {
    return this.locator.entity;
  }

  abstract read(): AsyncIterable<StagedRecord>;

  /**
   * Drain the sequence, collecting skipped rows alongside the records
   */
  async readAll(): Promise<ReadResult> {
    const records: StagedRecord[] = [];
    const skipped: SourceReadError[] = [];
    const onSkip = (error: SourceReadError) => skipped.push(error);

    this.on('rowSkipped', onSkip);
    try {
      for await (const record of this.read()) {
        records.push(record);
      }
    } finally {
      this.off('rowSkipped', onSkip);
    }

    return { records, skipped };
  }

  protected async readSourceFile(path: string): Promise<Buffer> {
    try {
      return await readFile(path);
    } catch (error) {
      throw new SourceReadError(`Cannot read ${path}: ${getErrorMessage(error)}`, { source: path }, error);
    }
  }

  // Sources are UTF-8; a leading byte order mark is dropped
  protected decodeText(buffer: Buffer, path: string): string {
    try {
      return new TextDecoder('utf-8', { fatal: true }).decode(buffer);
    } catch (error) {
      throw new SourceReadError(`Unsupported encoding in ${path}: not valid UTF-8`, { source: path }, error);
    }
  }

  protected skipRow(error: SourceReadError): void {
    this.emit('rowSkipped', error);
  }

  protected staged(fields: Record<string, unknown>, ref: StagedRecord['ref'], missingLabels: string[] = []): StagedRecord {
    return { entity: this.locator.entity, ref, fields, missingLabels };
  }
}
