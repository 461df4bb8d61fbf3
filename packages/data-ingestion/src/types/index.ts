import type {
  ConformedRecord,
  RecordRef,
  SourcedEntity,
  ValidationViolation,
} from '@conservation-warehouse/types';
import type { SourceReadError } from '../errors';

export const SourceType = {
  TABULAR: 'tabular' as const,
  DOCUMENT: 'document' as const,
  FILING: 'filing' as const,
} as const;

export type SourceType = typeof SourceType[keyof typeof SourceType];

export type FilingSection = 'summary' | 'programs';

export interface FlattenOptions {
  field: string;
  as?: string;
  whenEmpty: 'parent' | 'skip';
}

// Where and how to read one entity's source
export interface SourceLocator {
  entity: SourcedEntity;
  paths: string[];
  type: SourceType;
  requiredColumns: string[];
  minPopulated: number;
  flatten?: FlattenOptions;
  section: FilingSection;
}

/**
 * Source-native record, one per row or document entry.
 * Fields are untyped until the conformance layer coerces them.
 */
export interface StagedRecord {
  entity: SourcedEntity;
  ref: RecordRef;
  fields: Record<string, unknown>;
  // Filing labels that were required but not found
  missingLabels: string[];
}

export interface ReadResult {
  records: StagedRecord[];
  skipped: SourceReadError[];
}

export interface ConformanceResult {
  records: ConformedRecord[];
  violations: ValidationViolation[];
  rejected: number;
}

export interface ValidationOutcome {
  accepted: ConformedRecord[];
  rejected: ConformedRecord[];
  violations: ValidationViolation[];
}

export interface AnomalyThresholds {
  largeDonationAmount: number;
  atRiskStatuses: string[];
  populationDeclinePct: number;
}

