import mimeTypes from 'mime-types';
import { extname } from 'path';
import type { SourceType } from '../types';

// MIME type -> reader
const MIME_SOURCE_TYPES: Record<string, SourceType> = {
  'text/csv': 'tabular',
  'application/csv': 'tabular',
  'text/tab-separated-values': 'tabular',
  'application/json': 'document',
  'application/pdf': 'filing',
  'text/plain': 'filing',
};

// File type detection utilities
export class FileDetectionService {
  /**
   * Detect the reader for a source from its file name, or null when the type is not one we read
   */
  static detectSourceType(filename: string): SourceType | null {
    const mimetype = this.getExpectedMimeType(filename);
    if (mimetype && MIME_SOURCE_TYPES[mimetype]) {
      return MIME_SOURCE_TYPES[mimetype];
    }

    // Fallback to file extension
    switch (extname(filename).toLowerCase()) {
      case '.csv':
      case '.tsv':
        return 'tabular';
      case '.json':
        return 'document';
      case '.pdf':
      case '.txt':
        return 'filing';
      default:
        return null;
    }
  }

  /**
   * Get expected MIME type from filename
   */
  static getExpectedMimeType(filename: string): string | null {
    return mimeTypes.lookup(filename) || null;
  }

  static isPdf(filename: string): boolean {
    return this.getExpectedMimeType(filename) === 'application/pdf';
  }
}
