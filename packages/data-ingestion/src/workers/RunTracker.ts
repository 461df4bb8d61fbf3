import { EventEmitter } from 'events';
import type {
  AnomalyFlag,
  EntityCounts,
  EntityName,
  EntityReport,
  EntityStatus,
  RunReport,
  RunStatus,
  ValidationViolation,
} from '@conservation-warehouse/types';
import { toReportError } from '../utils/errorUtils';
import { logger } from '../utils/logger';

type EntityKind = EntityReport['kind'];

const emptyCounts = (): EntityCounts => ({ read: 0, skipped: 0, conformed: 0, rejected: 0, loaded: 0 });

function increment<K extends string>(tally: Partial<Record<K, number>>, key: K): void {
  tally[key] = (tally[key] ?? 0) + 1;
}

/**
 * Collects per-entity outcomes into the run report.
 * Emits `entityStarted`, `entityCompleted` and `runCompleted`.
 */
export class RunTracker extends EventEmitter {
  readonly startedAt = new Date();
  private readonly entities = new Map<EntityName, EntityReport>();
  private readonly started = new Map<EntityName, number>();
  private readonly violations: ValidationViolation[] = [];
  private readonly anomalies: AnomalyFlag[] = [];
  private readonly log = logger.child({ component: 'RunTracker' });

  constructor(readonly runId: string) {
    super();
  }

  startEntity(entity: EntityName, kind: EntityKind): void {
    this.started.set(entity, Date.now());
    this.entities.set(entity, {
      entity,
      kind,
      status: 'loaded',
      counts: emptyCounts(),
      violations: { blocking: 0, warning: 0 },
      violationsByRule: {},
      anomaliesByRule: {},
      elapsedMs: 0,
    });
    this.emit('entityStarted', entity);
  }

  recordCounts(entity: EntityName, counts: Partial<EntityCounts>): void {
    const report = this.report(entity);
    report.counts = { ...report.counts, ...counts };
  }

  addViolations(entity: EntityName, violations: readonly ValidationViolation[]): void {
    const report = this.report(entity);
    for (const violation of violations) {
      report.violations[violation.severity]++;
      increment(report.violationsByRule, violation.rule);
      this.violations.push(violation);
    }
  }

  addAnomalies(entity: EntityName, anomalies: readonly AnomalyFlag[]): void {
    const report = this.report(entity);
    for (const anomaly of anomalies) {
      increment(report.anomaliesByRule, anomaly.rule);
      this.anomalies.push(anomaly);
    }
  }

  completeEntity(entity: EntityName, status: EntityStatus, error?: unknown): EntityReport {
    const report = this.report(entity);
    report.status = status;
    report.elapsedMs = Date.now() - (this.started.get(entity) ?? Date.now());
    if (error !== undefined) {
      report.error = toReportError(error);
    }

    if (status === 'failed') {
      this.log.error('Entity failed', { runId: this.runId, entity, error: report.error });
    } else {
      this.log.info('Entity completed', { runId: this.runId, entity, status, counts: report.counts });
    }
    this.emit('entityCompleted', report);
    return report;
  }

  // A source that is not configured; does not degrade the run
  skipEntity(entity: EntityName, kind: EntityKind): void {
    this.startEntity(entity, kind);
    this.completeEntity(entity, 'skipped');
  }

  finish(options: { error?: unknown; cancelled?: boolean } = {}): RunReport {
    const finishedAt = new Date();
    const entities = [...this.entities.values()];
    const degraded = entities.some((report) => report.status === 'failed' || report.status === 'cancelled');
    const status: RunStatus = options.error !== undefined ? 'failed' : degraded ? 'degraded' : 'success';

    const totals = entities.reduce(
      (sum, report) => ({
        read: sum.read + report.counts.read,
        skipped: sum.skipped + report.counts.skipped,
        conformed: sum.conformed + report.counts.conformed,
        rejected: sum.rejected + report.counts.rejected,
        loaded: sum.loaded + report.counts.loaded,
      }),
      emptyCounts()
    );

    const report: RunReport = {
      runId: this.runId,
      startedAt: this.startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      elapsedMs: finishedAt.getTime() - this.startedAt.getTime(),
      status,
      cancelled: options.cancelled ?? false,
      entities,
      totals: { ...totals, violations: this.violations.length, anomalies: this.anomalies.length },
      violations: [...this.violations],
      anomalies: [...this.anomalies],
    };
    if (options.error !== undefined) {
      report.error = toReportError(options.error);
    }

    const level = status === 'success' ? 'info' : status === 'degraded' ? 'warn' : 'error';
    this.log.log(level, 'Run finished', { runId: this.runId, status, elapsedMs: report.elapsedMs, totals: report.totals });
    this.emit('runCompleted', report);
    return report;
  }

  private report(entity: EntityName): EntityReport {
    const report = this.entities.get(entity);
    if (!report) {
      throw new Error(`Entity ${entity} was not started`);
    }
    return report;
  }
}

export default RunTracker;
