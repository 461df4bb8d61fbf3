import { z } from 'zod';
import { SourceReader } from './SourceReader';
import { SourceReadError } from '../errors';
import { getErrorMessage } from '../utils/errorUtils';
import type { FlattenOptions, StagedRecord } from '../types';

const documentSchema = z.array(z.record(z.unknown()));

/**
 * Structured-document reader: a top-level JSON array of objects, one staged
 * record per object. With `flatten`, one nested collection is expanded into
 * repeated records that share the parent's fields.
 */
export class DocumentReader extends SourceReader {
  async *read(): AsyncIterable<StagedRecord> {
    for (const path of this.locator.paths) {
      yield* this.readFile(path);
    }
  }

  private async *readFile(path: string): AsyncIterable<StagedRecord> {
    const buffer = await this.readSourceFile(path);

    const text = this.decodeText(buffer, path);

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new SourceReadError(`Malformed JSON in ${path}: ${getErrorMessage(error)}`, { source: path }, error);
    }

    const documents = documentSchema.safeParse(parsed);
    if (!documents.success) {
      throw new SourceReadError(`${path} is not a top-level array of objects`, { source: path });
    }

    const { flatten } = this.locator;
    for (const [index, entry] of documents.data.entries()) {
      const ref = { source: path, path: `[${index}]` };
      if (!flatten) {
        yield this.staged(entry, ref);
        continue;
      }
      yield* this.expand(entry, flatten, path, index);
    }
  }

  private *expand(
    entry: Record<string, unknown>,
    flatten: FlattenOptions,
    path: string,
    index: number
  ): Iterable<StagedRecord> {
    const { [flatten.field]: collection, ...parent } = entry;

    let items: unknown[];
    if (Array.isArray(collection)) {
      items = collection;
    } else if (collection === undefined || collection === null) {
      items = [];
    } else {
      this.skipRow(
        new SourceReadError(`${flatten.field} of entry ${index} in ${path} is not a list`, {
          source: path,
          path: `[${index}].${flatten.field}`,
        })
      );
      return;
    }

    if (items.length === 0) {
      if (flatten.whenEmpty === 'parent') {
        const fields = flatten.as ? { ...parent, [flatten.as]: null } : parent;
        yield this.staged(fields, { source: path, path: `[${index}]` });
      }
      return;
    }

    for (const [position, item] of items.entries()) {
      const ref = { source: path, path: `[${index}].${flatten.field}[${position}]` };
      if (typeof item === 'object' && item !== null && !Array.isArray(item)) {
        yield this.staged({ ...parent, ...item }, ref);
      } else {
        yield this.staged({ ...parent, [flatten.as ?? flatten.field]: item }, ref);
      }
    }
  }
}
