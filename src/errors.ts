/**
 * Error taxonomy for the orchestration engine.
 *
 * Only conditions that stop a request are thrown. Single backend failures
 * and malformed model output travel as data (GatewayFailure, null parses)
 * and are recorded or discarded where they occur.
 */

import type { BudgetScope, BudgetSnapshot } from './types/index.js';

export type ConclaveErrorCode =
  | 'ADMISSION_DENIED'
  | 'PIPELINE_FAILURE'
  | 'CONFIGURATION_ERROR';

export class ConclaveError extends Error {
  public readonly code: ConclaveErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(code: ConclaveErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ConclaveError';
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/** Budget pre-flight rejected the request. Nothing was spent or recorded. */
export class AdmissionDeniedError extends ConclaveError {
  public readonly scope: BudgetScope;
  public readonly snapshot: BudgetSnapshot;

  constructor(scope: BudgetScope, snapshot: BudgetSnapshot) {
    super(
      'ADMISSION_DENIED',
      `${scope === 'day' ? 'Daily' : 'Per-query'} budget exhausted: $${snapshot.amount.toFixed(4)} of $${snapshot.limit.toFixed(2)} used`,
      { scope, snapshot },
    );
    this.name = 'AdmissionDeniedError';
    this.scope = scope;
    this.snapshot = snapshot;
  }
}

/** Every Stage1 backend failed. */
export class PipelineFailureError extends ConclaveError {
  public readonly attempted: string[];

  constructor(attempted: string[], failures: Record<string, string>) {
    super(
      'PIPELINE_FAILURE',
      `All ${attempted.length} backend(s) failed: ${attempted.join(', ')}`,
      { attempted_count: attempted.length, attempted, failures },
    );
    this.name = 'PipelineFailureError';
    this.attempted = attempted;
  }
}

export class ConfigurationError extends ConclaveError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFIGURATION_ERROR', message, details);
    this.name = 'ConfigurationError';
  }
}

export function isConclaveError(error: unknown): error is ConclaveError {
  return error instanceof ConclaveError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
