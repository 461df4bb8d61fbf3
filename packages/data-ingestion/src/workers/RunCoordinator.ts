import { writeFile } from 'fs/promises';
import { v4 as uuidv4 } from 'uuid';
import {
  ENTITY_TABLES,
  StoreConfigurationError,
  createWarehouseStore,
  type WarehouseStore,
} from '@conservation-warehouse/database';
import type {
  DimensionEntity,
  DimensionLookups,
  FactEntity,
  KeyLookup,
  RunReport,
  SourcedEntity,
} from '@conservation-warehouse/types';
import type { EtlConfig } from '../config';
import { resolveSource } from '../config';
import { FatalConfigurationError, RunCancelledError } from '../errors';
import { createSourceReader } from '../parsers/MultiFormatParser';
import { LabelProximityStrategy, type FilingExtractionStrategy } from '../parsers/FilingExtractionStrategy';
import { ETLPipeline } from '../validation/ETLPipeline';
import { WarehouseLoader } from '../loader/WarehouseLoader';
import { generateDateDimension, isoDateFromKey } from '../conformance/DateDimension';
import type { ConformanceResult, ReadResult, SourceLocator } from '../types';
import { withTimeout } from '../utils/timeout';
import { getErrorMessage } from '../utils/errorUtils';
import { logger } from '../utils/logger';
import { RunLock } from './RunLock';
import { RunTracker } from './RunTracker';

export const DIMENSION_ORDER: DimensionEntity[] = ['donor', 'campaign', 'habitat', 'project'];
export const FACT_ORDER: FactEntity[] = [
  'donation',
  'elk_population',
  'conservation_metric',
  'financial_filing',
  'program_service',
];

export interface RunOptions {
  signal?: AbortSignal;
  // Supplied stores are initialized but not closed by the run
  store?: WarehouseStore;
  runId?: string;
  filingStrategy?: FilingExtractionStrategy;
}

type ReadOutcomes<E extends SourcedEntity> = Map<E, PromiseSettledResult<ReadResult>>;

function emptyLookups(): DimensionLookups {
  return { donor: new Map(), campaign: new Map(), habitat: new Map(), project: new Map(), date: new Map() };
}

function asFatal(error: unknown): unknown {
  if (error instanceof StoreConfigurationError) {
    return new FatalConfigurationError(error.message, [], error);
  }
  return error;
}

/**
 * Runs one full refresh: dimensions in order, then the date dimension, then facts.
 * Each entity ends as an outcome in the report; only configuration, lock and
 * store initialization failures fail the whole run.
 */
export class RunCoordinator {
  readonly runId: string;
  private readonly tracker: RunTracker;
  private readonly pipeline: ETLPipeline;
  private readonly filingStrategy: FilingExtractionStrategy;
  private readonly log = logger.child({ component: 'RunCoordinator' });

  constructor(
    private readonly config: EtlConfig,
    private readonly options: RunOptions = {}
  ) {
    this.runId = options.runId ?? uuidv4();
    this.tracker = new RunTracker(this.runId);
    this.pipeline = new ETLPipeline({ thresholds: config.anomalies });
    this.filingStrategy =
      options.filingStrategy ??
      new LabelProximityStrategy({ extraLabels: config.filing.labels, programNames: config.filing.programNames });
  }

  get events(): RunTracker {
    return this.tracker;
  }

  async run(): Promise<RunReport> {
    const lock = new RunLock(this.config.run.lockPath, this.runId, this.config.run.staleLockMs);
    const ownsStore = this.options.store === undefined;
    let store: WarehouseStore | undefined;
    let report: RunReport;

    this.log.info('Run started', { runId: this.runId, target: this.config.store.target });
    try {
      const locators = this.resolveSources();
      await lock.acquire();
      store = this.options.store ?? createWarehouseStore(this.config.store);
      await store.initialize();

      await this.execute(store, locators);
      report = this.tracker.finish({ cancelled: this.cancelled });
    } catch (error) {
      report = this.tracker.finish({ error: asFatal(error), cancelled: this.cancelled });
    } finally {
      if (store && ownsStore) {
        await store.close();
      }
      await lock.release();
    }

    if (this.config.run.reportPath) {
      await this.writeReport(this.config.run.reportPath, report);
    }
    return report;
  }

  private get cancelled(): boolean {
    return this.options.signal?.aborted ?? false;
  }

  private resolveSources(): Map<SourcedEntity, SourceLocator> {
    const locators = new Map<SourcedEntity, SourceLocator>();
    for (const entity of [...DIMENSION_ORDER, ...FACT_ORDER]) {
      const locator = resolveSource(entity, this.config);
      if (locator) {
        locators.set(entity, locator);
      }
    }
    return locators;
  }

  private async execute(store: WarehouseStore, locators: Map<SourcedEntity, SourceLocator>): Promise<void> {
    const loader = new WarehouseLoader(store);

    const dimensionReads = await this.readSources(DIMENSION_ORDER, locators);
    for (const entity of DIMENSION_ORDER) {
      await this.processDimension(entity, dimensionReads, store, loader);
    }

    const factReads = await this.readSources(FACT_ORDER, locators);
    let lookups: DimensionLookups;
    try {
      lookups = await this.dimensionLookups(store);
    } catch (error) {
      // Nothing downstream can resolve keys
      for (const entity of ['date' as const, ...FACT_ORDER]) {
        this.tracker.startEntity(entity, entity === 'date' ? 'dimension' : 'fact');
        this.tracker.completeEntity(entity, 'failed', error);
      }
      return;
    }

    const conformed = new Map<FactEntity, ConformanceResult>();
    for (const entity of FACT_ORDER) {
      const read = factReads.get(entity);
      if (read?.status === 'fulfilled') {
        conformed.set(entity, this.pipeline.conformFacts(entity, read.value.records, lookups));
      }
    }

    await this.processDateDimension(conformed, store, loader);

    let habitatStatuses: Map<string, string | null>;
    try {
      lookups = { ...lookups, date: await store.loadKeyLookup(ENTITY_TABLES.date) };
      habitatStatuses = await this.habitatStatuses(store);
    } catch (error) {
      for (const entity of FACT_ORDER) {
        this.tracker.startEntity(entity, 'fact');
        this.tracker.completeEntity(entity, 'failed', error);
      }
      return;
    }

    for (const entity of FACT_ORDER) {
      await this.processFact(entity, factReads, conformed.get(entity), lookups, habitatStatuses, loader);
    }
  }

  /**
   * Independent sources are read concurrently; a failed or timed-out read only affects its entity
   */
  private async readSources<E extends SourcedEntity>(
    entities: E[],
    locators: Map<SourcedEntity, SourceLocator>
  ): Promise<ReadOutcomes<E>> {
    const outcomes: ReadOutcomes<E> = new Map();
    if (this.cancelled) {
      return outcomes;
    }

    const jobs = entities.flatMap((entity) => {
      const locator = locators.get(entity);
      return locator ? [{ entity, locator }] : [];
    });
    const settled = await Promise.allSettled(
      jobs.map(({ entity, locator }) =>
        withTimeout(
          createSourceReader(locator, { filingStrategy: this.filingStrategy }).readAll(),
          this.config.run.timeoutMs,
          `Read of ${entity}`
        )
      )
    );
    jobs.forEach(({ entity }, index) => outcomes.set(entity, settled[index]));
    return outcomes;
  }

  /**
   * Shared start of an entity: skipped when unconfigured, cancelled or failed before any work.
   * Returns the read result when the entity should proceed.
   */
  private begin(
    entity: SourcedEntity,
    kind: 'dimension' | 'fact',
    configured: boolean,
    read: PromiseSettledResult<ReadResult> | undefined
  ): ReadResult | null {
    if (!configured) {
      this.tracker.skipEntity(entity, kind);
      return null;
    }
    this.tracker.startEntity(entity, kind);
    if (this.cancelled || read === undefined) {
      this.tracker.completeEntity(entity, 'cancelled', new RunCancelledError(`Run cancelled before ${entity}`));
      return null;
    }
    if (read.status === 'rejected') {
      this.tracker.completeEntity(entity, 'failed', read.reason);
      return null;
    }

    const { records, skipped } = read.value;
    for (const error of skipped) {
      this.log.warn(error.message, { entity, source: error.ref.source, line: error.ref.line, path: error.ref.path });
    }
    this.tracker.recordCounts(entity, { read: records.length, skipped: skipped.length });
    return read.value;
  }

  // The in-flight entity is not loaded once cancellation is seen
  private stopIfCancelled(entity: SourcedEntity | 'date'): boolean {
    if (!this.cancelled) {
      return false;
    }
    this.tracker.completeEntity(entity, 'cancelled', new RunCancelledError(`Run cancelled before loading ${entity}`));
    return true;
  }

  private async processDimension(
    entity: DimensionEntity,
    reads: ReadOutcomes<DimensionEntity>,
    store: WarehouseStore,
    loader: WarehouseLoader
  ): Promise<void> {
    const read = this.begin(entity, 'dimension', this.config.sources[entity] !== undefined, reads.get(entity));
    if (!read) {
      return;
    }

    try {
      const persisted = await store.loadKeyLookup(ENTITY_TABLES[entity]);
      const batch = this.pipeline.processDimension(entity, read.records, persisted, emptyLookups());
      this.tracker.addViolations(entity, batch.violations);
      this.tracker.recordCounts(entity, {
        conformed: batch.conformance.records.length,
        rejected: batch.conformance.rejected + batch.validation.rejected.length,
      });
      if (this.stopIfCancelled(entity)) {
        return;
      }

      const loaded = await withTimeout(
        loader.loadDimension(entity, batch.validation.accepted),
        this.config.run.timeoutMs,
        `Load of ${entity}`
      );
      this.tracker.recordCounts(entity, { loaded });
      this.tracker.completeEntity(entity, 'loaded');
    } catch (error) {
      this.tracker.completeEntity(entity, 'failed', error);
    }
  }

  /**
   * Covers the dates of this run's conformed facts and of every fact row already
   * stored, so fact tables this run leaves in place (skipped, failed, cancelled)
   * keep resolving against dim_date.
   */
  private async processDateDimension(
    conformed: Map<FactEntity, ConformanceResult>,
    store: WarehouseStore,
    loader: WarehouseLoader
  ): Promise<void> {
    this.tracker.startEntity('date', 'dimension');
    if (this.stopIfCancelled('date')) {
      return;
    }

    try {
      const dates: string[] = [];
      for (const result of conformed.values()) {
        for (const record of result.records) {
          if (record.businessDate !== null) {
            dates.push(record.businessDate);
          }
        }
      }
      dates.push(...(await this.storedFactDates(store)));

      const rows = generateDateDimension(dates, this.config.run.fiscalYearStartMonth);
      this.tracker.recordCounts('date', { read: rows.length, conformed: rows.length });
      const loaded = await withTimeout(loader.loadDateDimension(rows), this.config.run.timeoutMs, 'Load of date');
      this.tracker.recordCounts('date', { loaded });
      this.tracker.completeEntity('date', 'loaded');
    } catch (error) {
      this.tracker.completeEntity('date', 'failed', error);
    }
  }

  private async processFact(
    entity: FactEntity,
    reads: ReadOutcomes<FactEntity>,
    conformance: ConformanceResult | undefined,
    lookups: DimensionLookups,
    habitatStatuses: ReadonlyMap<string, string | null>,
    loader: WarehouseLoader
  ): Promise<void> {
    const read = this.begin(entity, 'fact', this.config.sources[entity] !== undefined, reads.get(entity));
    if (!read || !conformance) {
      return;
    }

    try {
      const batch = this.pipeline.checkFacts(conformance, lookups, { habitatStatuses });
      this.tracker.addViolations(entity, batch.violations);
      this.tracker.addAnomalies(entity, batch.anomalies);
      this.tracker.recordCounts(entity, {
        conformed: conformance.records.length,
        rejected: conformance.rejected + batch.validation.rejected.length,
      });
      if (this.stopIfCancelled(entity)) {
        return;
      }

      const loaded = await withTimeout(
        loader.loadFacts(entity, batch.validation.accepted, batch.anomalies),
        this.config.run.timeoutMs,
        `Load of ${entity}`
      );
      this.tracker.recordCounts(entity, { loaded });
      this.tracker.completeEntity(entity, 'loaded');
    } catch (error) {
      this.tracker.completeEntity(entity, 'failed', error);
    }
  }

  private async dimensionLookups(store: WarehouseStore): Promise<DimensionLookups> {
    const entries = await Promise.all(
      DIMENSION_ORDER.map(async (entity): Promise<[DimensionEntity, KeyLookup]> => [
        entity,
        await store.loadKeyLookup(ENTITY_TABLES[entity]),
      ])
    );
    const lookups = emptyLookups();
    for (const [entity, lookup] of entries) {
      lookups[entity] = lookup;
    }
    return lookups;
  }

  private async storedFactDates(store: WarehouseStore): Promise<string[]> {
    const keys = new Set<number>();
    for (const entity of FACT_ORDER) {
      for (const row of await store.readRows(ENTITY_TABLES[entity])) {
        if (typeof row.date_key === 'number') {
          keys.add(row.date_key);
        }
      }
    }
    return [...keys].map(isoDateFromKey);
  }

  private async habitatStatuses(store: WarehouseStore): Promise<Map<string, string | null>> {
    const statuses = new Map<string, string | null>();
    for (const row of await store.readRows(ENTITY_TABLES.habitat)) {
      const { habitat_id: id, conservation_status: status } = row;
      if (typeof id === 'string') {
        statuses.set(id, typeof status === 'string' ? status : null);
      }
    }
    return statuses;
  }

  private async writeReport(path: string, report: RunReport): Promise<void> {
    try {
      await writeFile(path, `${JSON.stringify(report, null, 2)}\n`, 'utf8');
    } catch (error) {
      this.log.error('Cannot write run report', { runId: this.runId, path, error: getErrorMessage(error) });
    }
  }
}

export default RunCoordinator;
