// Error taxonomy for the ETL run
// Validation outcomes are values (ValidationViolation), not exceptions

import type { EntityName, RecordRef } from '@conservation-warehouse/types';

export type EtlErrorCode =
  | 'SOURCE_READ'
  | 'CONFORMANCE'
  | 'LOAD'
  | 'FATAL_CONFIGURATION'
  | 'RUN_LOCK'
  | 'TIMEOUT'
  | 'CANCELLED';

export class EtlError extends Error {
  readonly code: EtlErrorCode;

  constructor(code: EtlErrorCode, message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'EtlError';
    this.code = code;
  }
}

/**
 * Source unreachable or structurally unparseable. Raised for the whole source,
 * or emitted per row by a reader that keeps going.
 */
export class SourceReadError extends EtlError {
  readonly ref: RecordRef;

  constructor(message: string, ref: RecordRef, cause?: unknown) {
    super('SOURCE_READ', message, { cause });
    this.name = 'SourceReadError';
    this.ref = ref;
  }
}

export type ConformanceFailure = 'conformance' | 'completeness';

// One record that cannot be coerced; the conformance layer turns it into a blocking violation
export class ConformanceError extends EtlError {
  readonly entity: EntityName;
  readonly rule: string;
  readonly failure: ConformanceFailure;
  readonly field?: string;
  readonly value?: unknown;

  constructor(
    entity: EntityName,
    message: string,
    details: { rule?: string; failure?: ConformanceFailure; field?: string; value?: unknown } = {}
  ) {
    super('CONFORMANCE', message);
    this.name = 'ConformanceError';
    this.entity = entity;
    this.rule = details.rule ?? 'type_coercion';
    this.failure = details.failure ?? 'conformance';
    this.field = details.field;
    this.value = details.value;
  }
}

export class LoadError extends EtlError {
  readonly entity: EntityName;
  readonly table: string;

  constructor(entity: EntityName, table: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('LOAD', `Load of ${entity} into ${table} rolled back: ${reason}`, { cause });
    this.name = 'LoadError';
    this.entity = entity;
    this.table = table;
  }
}

export class FatalConfigurationError extends EtlError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], cause?: unknown) {
    super('FATAL_CONFIGURATION', issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, { cause });
    this.name = 'FatalConfigurationError';
    this.issues = issues;
  }
}

export class RunLockError extends EtlError {
  readonly lockPath: string;
  readonly holder?: string;

  constructor(lockPath: string, holder?: string, cause?: unknown) {
    super(
      'RUN_LOCK',
      holder ? `Run lock ${lockPath} is held by run ${holder}` : `Cannot acquire run lock ${lockPath}`,
      { cause }
    );
    this.name = 'RunLockError';
    this.lockPath = lockPath;
    this.holder = holder;
  }
}

export class OperationTimeoutError extends EtlError {
  readonly operation: string;
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super('TIMEOUT', `${operation} timed out after ${timeoutMs}ms`);
    this.name = 'OperationTimeoutError';
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

export class RunCancelledError extends EtlError {
  constructor(message = 'Run cancelled') {
    super('CANCELLED', message);
    this.name = 'RunCancelledError';
  }
}
