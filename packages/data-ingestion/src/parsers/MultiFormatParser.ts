import { SourceReader } from './SourceReader';
import { TabularReader } from './TabularReader';
import { DocumentReader } from './DocumentReader';
import { FilingReader } from './FilingReader';
import { LabelProximityStrategy, type FilingExtractionStrategy } from './FilingExtractionStrategy';
import type { SourceLocator } from '../types';

export interface ReaderOptions {
  filingStrategy?: FilingExtractionStrategy;
}

/**
 * Pick the reader for a source type
 */
export function createSourceReader(locator: SourceLocator, options: ReaderOptions = {}): SourceReader {
  switch (locator.type) {
    case 'tabular':
      return new TabularReader(locator);
    case 'document':
      return new DocumentReader(locator);
    case 'filing':
      return new FilingReader(locator, options.filingStrategy ?? new LabelProximityStrategy());
  }
}
