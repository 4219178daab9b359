import type { ZodIssue } from 'zod';
import { formatRecordKey, type BinName, type RecordKey } from './types';

export type ExpiryErrorCode = 'validation_failed' | 'not_found' | 'transport_failed' | 'conflict';

export class ExpiryError extends Error {
  constructor(
    readonly code: ExpiryErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed input, rejected before any storage access. */
export class ValidationError extends ExpiryError {
  constructor(
    message: string,
    readonly issues: ZodIssue[] = [],
  ) {
    super('validation_failed', message);
  }
}

export class NotFoundError extends ExpiryError {
  constructor(
    readonly key: RecordKey,
    readonly bin?: BinName,
  ) {
    super(
      'not_found',
      bin === undefined
        ? `record ${formatRecordKey(key)} not found`
        : `bin "${bin}" not found in record ${formatRecordKey(key)}`,
    );
  }
}

/** Host store unreachable or failing. Never retried here. */
export class TransportError extends ExpiryError {
  constructor(
    readonly operation: string,
    readonly key: string,
    cause: unknown,
  ) {
    super('transport_failed', `${operation} failed for ${key}: ${describeCause(cause)}`, { cause });
  }
}

export class ConflictError extends ExpiryError {
  constructor(
    readonly key: string,
    readonly attempts: number,
  ) {
    super('conflict', `record ${key} kept changing; gave up after ${attempts} attempts`);
  }
}

export function isExpiryError(err: unknown): err is ExpiryError {
  return err instanceof ExpiryError;
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
