import csv from 'csv-parser';
import { Readable } from 'stream';
import { SourceReader } from './SourceReader';
import { SourceReadError } from '../errors';
import type { StagedRecord } from '../types';

/**
 * Delimited text reader. The first row is the header; column names must match
 * the staged field names exactly.
 */
export class TabularReader extends SourceReader {
  async *read(): AsyncIterable<StagedRecord> {
    for (const path of this.locator.paths) {
      yield* this.readFile(path);
    }
  }

  private async *readFile(path: string): AsyncIterable<StagedRecord> {
    const buffer = await this.readSourceFile(path);
    const encodingProblem = this.detectUnsupportedEncoding(buffer);
    if (encodingProblem) {
      throw new SourceReadError(`Unsupported encoding in ${path}: ${encodingProblem}`, { source: path });
    }

    const text = this.decodeText(buffer, path);

    const firstLine = text.split(/\r?\n/, 1)[0] ?? '';
    if (!firstLine.trim()) {
      throw new SourceReadError(`${path} has no header row`, { source: path, line: 1 });
    }

    const delimiter = this.detectDelimiter(firstLine);
    const header = this.parseRow(firstLine, delimiter);
    const missing = this.locator.requiredColumns.filter((column) => !header.includes(column));
    if (missing.length > 0) {
      throw new SourceReadError(`${path} is missing required columns: ${missing.join(', ')}`, {
        source: path,
        line: 1,
      });
    }

    const rows = Readable.from([text]).pipe(
      csv({
        separator: delimiter,
        strict: false,
        mapHeaders: ({ header: name }) => name.trim(),
      })
    );

    let index = 0;
    for await (const row of rows) {
      // Header is line 1
      const line = index + 2;
      index++;

      const fields = this.toFields(row);
      const populated = this.locator.requiredColumns.filter((column) => (fields[column] ?? '').trim() !== '').length;

      if (this.locator.requiredColumns.length > 0 && populated < this.locator.minPopulated) {
        this.skipRow(
          new SourceReadError(
            `Row ${line} of ${path} has ${populated} of ${this.locator.requiredColumns.length} required columns populated`,
            { source: path, line }
          )
        );
        continue;
      }

      yield this.staged(fields, { source: path, line });
    }
  }

  /**
   * Detect CSV delimiter from the header line
   */
  private detectDelimiter(sample: string): string {
    const delimiters = [',', ';', '\t', '|'];
    const counts = delimiters.map((delimiter) => ({
      delimiter,
      count: sample.split(delimiter).length - 1,
    }));

    // Return the delimiter with the highest count
    const best = counts.reduce((max, current) => (current.count > max.count ? current : max));

    return best.count > 0 ? best.delimiter : ',';
  }

  /**
   * UTF-16/UTF-32 byte order marks, or NUL bytes in the first kilobyte
   */
  private detectUnsupportedEncoding(buffer: Buffer): string | null {
    if (buffer.length >= 4 && buffer[0] === 0xff && buffer[1] === 0xfe && buffer[2] === 0x00 && buffer[3] === 0x00) {
      return 'UTF-32LE byte order mark';
    }
    if (buffer.length >= 4 && buffer[0] === 0x00 && buffer[1] === 0x00 && buffer[2] === 0xfe && buffer[3] === 0xff) {
      return 'UTF-32BE byte order mark';
    }
    if (buffer.length >= 2 && ((buffer[0] === 0xff && buffer[1] === 0xfe) || (buffer[0] === 0xfe && buffer[1] === 0xff))) {
      return 'UTF-16 byte order mark';
    }
    if (buffer.subarray(0, 1024).includes(0x00)) {
      return 'NUL bytes (not UTF-8 text)';
    }
    return null;
  }

  /**
   * Parse a single row with given delimiter
   */
  private parseRow(line: string, delimiter: string): string[] {
    const result: string[] = [];
    let current = '';
    let inQuotes = false;

    for (const char of line) {
      if (char === '"') {
        inQuotes = !inQuotes;
      } else if (char === delimiter && !inQuotes) {
        result.push(current.trim());
        current = '';
      } else {
        current += char;
      }
    }

    result.push(current.trim());
    return result;
  }

  private toFields(row: unknown): Record<string, string> {
    const fields: Record<string, string> = {};
    if (typeof row === 'object' && row !== null) {
      for (const [key, value] of Object.entries(row)) {
        fields[key] = typeof value === 'string' ? value : String(value ?? '');
      }
    }
    return fields;
  }
}
