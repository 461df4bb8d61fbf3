import type {
  AnomalyFlag,
  DimensionEntity,
  DimensionLookups,
  FactEntity,
  KeyLookup,
  ValidationViolation,
} from '@conservation-warehouse/types';
import type { AnomalyThresholds, ConformanceResult, StagedRecord, ValidationOutcome } from '../types';
import { ConformanceLayer, type FactLookups } from '../conformance/ConformanceLayer';
import { AnomalyDetector, type AnomalyContext } from '../anomaly/AnomalyDetector';
import { DataQualityValidator } from './DataQualityValidator';
import DataNormalizer from './DataNormalizer';
import { logger } from '../utils/logger';

export interface EntityBatch {
  conformance: ConformanceResult;
  validation: ValidationOutcome;
  anomalies: AnomalyFlag[];
  // Conformance violations followed by validator violations
  violations: ValidationViolation[];
}

export interface ETLPipelineOptions {
  normalizer?: DataNormalizer;
  thresholds?: Partial<AnomalyThresholds>;
  hashKey?: (namespace: string, naturalKey: string) => number;
}

/**
 * Conform, validate and (for facts) flag one entity batch.
 * Nothing here touches the store.
 */
export class ETLPipeline {
  private readonly conformance: ConformanceLayer;
  private readonly validator = new DataQualityValidator();
  private readonly detector: AnomalyDetector;
  private readonly log = logger.child({ component: 'ETLPipeline' });

  constructor(options: ETLPipelineOptions = {}) {
    this.conformance = new ConformanceLayer({
      normalizer: options.normalizer ?? new DataNormalizer(),
      hashKey: options.hashKey,
    });
    this.detector = new AnomalyDetector(options.thresholds);
  }

  processDimension(
    entity: DimensionEntity,
    staged: StagedRecord[],
    persisted: KeyLookup,
    lookups: DimensionLookups
  ): EntityBatch {
    const conformance = this.conformance.conformDimension(entity, staged, persisted);
    const validation = this.validate(conformance, lookups);
    return {
      conformance,
      validation,
      anomalies: [],
      violations: [...conformance.violations, ...validation.violations],
    };
  }

  // Facts are conformed before the date dimension exists, validated after
  conformFacts(entity: FactEntity, staged: StagedRecord[], lookups: FactLookups): ConformanceResult {
    return this.conformance.conformFacts(entity, staged, lookups);
  }

  checkFacts(conformance: ConformanceResult, lookups: DimensionLookups, context: AnomalyContext): EntityBatch {
    const validation = this.validate(conformance, lookups);
    const anomalies = this.detector.detect(validation.accepted, context);
    return {
      conformance,
      validation,
      anomalies,
      violations: [...conformance.violations, ...validation.violations],
    };
  }

  private validate(conformance: ConformanceResult, lookups: DimensionLookups): ValidationOutcome {
    const outcome = this.validator.validate(conformance.records, { lookups });
    for (const violation of outcome.violations) {
      this.log.log(violation.severity === 'blocking' ? 'warn' : 'info', violation.message, {
        entity: violation.entity,
        naturalKey: violation.naturalKey,
        rule: violation.rule,
        category: violation.category,
      });
    }
    return outcome;
  }
}

export default ETLPipeline;
