// Conformance-side validation components

export { default as DataQualityValidator } from './DataQualityValidator';
export { default as DataNormalizer } from './DataNormalizer';
export { default as DeduplicationEngine } from './DeduplicationEngine';
export { default as ETLPipeline } from './ETLPipeline';

export type { ValidationContext } from './DataQualityValidator';
export type { Normalized } from './DataNormalizer';
export type { DuplicateOccurrence } from './DeduplicationEngine';
export type { EntityBatch, ETLPipelineOptions } from './ETLPipeline';
