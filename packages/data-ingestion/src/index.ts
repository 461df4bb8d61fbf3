// Main exports for the data-ingestion package

import type { RunReport } from '@conservation-warehouse/types';
import type { EtlConfig } from './config';
import { RunCoordinator, type RunOptions } from './workers/RunCoordinator';

// Types
export * from './types';
export * from './errors';

// Configuration
export { configSchema, parseConfig, loadConfig, resolveSource, DEFAULT_PROGRAM_NAMES } from './config';
export type { EtlConfig, EtlConfigInput, SourceConfig } from './config';

// Readers
export { FileDetectionService } from './utils/fileDetection';
export { SourceReader } from './parsers/SourceReader';
export { TabularReader } from './parsers/TabularReader';
export { DocumentReader } from './parsers/DocumentReader';
export { FilingReader } from './parsers/FilingReader';
export { LabelProximityStrategy, DEFAULT_FILING_RULES, parseAmount } from './parsers/FilingExtractionStrategy';
export type {
  FilingExtractionStrategy,
  FilingFieldRule,
  FilingSummary,
  FilingValueKind,
  ProgramServiceLine,
} from './parsers/FilingExtractionStrategy';
export { createSourceReader } from './parsers/MultiFormatParser';
export type { ReaderOptions } from './parsers/MultiFormatParser';

// Conformance, validation and anomalies
export { ConformanceLayer } from './conformance/ConformanceLayer';
export type { ConformanceOptions, FactLookups } from './conformance/ConformanceLayer';
export { SurrogateKeyAssigner } from './conformance/SurrogateKeyAssigner';
export { buildDateRow, dateKey, generateDateDimension, isoDateFromKey } from './conformance/DateDimension';
export { DataQualityValidator, DataNormalizer, DeduplicationEngine, ETLPipeline } from './validation';
export type { EntityBatch, ETLPipelineOptions, ValidationContext } from './validation';
export { AnomalyDetector, DEFAULT_THRESHOLDS } from './anomaly/AnomalyDetector';
export type { AnomalyContext } from './anomaly/AnomalyDetector';

// Loading and run coordination
export { WarehouseLoader, anomalyRow } from './loader/WarehouseLoader';
export { RunCoordinator, DIMENSION_ORDER, FACT_ORDER } from './workers/RunCoordinator';
export type { RunOptions } from './workers/RunCoordinator';
export { RunTracker } from './workers/RunTracker';
export { RunLock } from './workers/RunLock';
export { logger } from './utils/logger';

/**
 * Run one full refresh and return its report
 */
export function runPipeline(config: EtlConfig, options: RunOptions = {}): Promise<RunReport> {
  return new RunCoordinator(config, options).run();
}

// success 0, failed 1, degraded 2
export function exitCodeFor(report: Pick<RunReport, 'status'>): number {
  switch (report.status) {
    case 'success':
      return 0;
    case 'failed':
      return 1;
    case 'degraded':
      return 2;
  }
}
