// Error handling utilities for data-ingestion package

import { EtlError } from '../errors';

export function isError(error: unknown): error is Error {
  return error instanceof Error;
}

export function getErrorMessage(error: unknown): string {
  if (isError(error)) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return 'Unknown error occurred';
}

// Shape used in run reports
export function toReportError(error: unknown): { code: string; message: string } {
  if (error instanceof EtlError) {
    return { code: error.code, message: error.message };
  }
  return { code: 'UNEXPECTED', message: getErrorMessage(error) };
}
