/**
 * Error taxonomy
 *
 * Every error the engine raises carries a `kind` discriminant so callers can
 * branch on it without string matching. Only CancelledError and ConfigError
 * ever escape to the caller; the rest are folded into the report.
 */

import type { AnalysisReport } from '../types.js';

export type PlanwardenErrorKind = 'validation' | 'diff' | 'dependency' | 'cancelled' | 'config';

export abstract class PlanwardenError extends Error {
  abstract readonly kind: PlanwardenErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A sensitivity rule that was rejected and left out of the index */
export class ValidationError extends PlanwardenError {
  readonly kind = 'validation' as const;

  constructor(
    readonly ruleIndex: number,
    readonly field: 'resourceType' | 'property',
    message: string
  ) {
    super(message);
  }
}

/** Two values at the same path whose shapes cannot be diffed */
export class DiffError extends PlanwardenError {
  readonly kind = 'diff' as const;

  constructor(
    readonly path: readonly string[],
    readonly beforeKind: string,
    readonly afterKind: string
  ) {
    super(`incomparable values at ${formatPath(path)}: ${beforeKind} vs ${afterKind}`);
  }
}

export class DependencyError extends PlanwardenError {
  readonly kind = 'dependency' as const;

  constructor(readonly address: string, message: string) {
    super(message);
  }
}

export class CancelledError extends PlanwardenError {
  readonly kind = 'cancelled' as const;

  constructor(readonly partialReport: AnalysisReport) {
    super('analysis cancelled');
  }
}

export class ConfigError extends PlanwardenError {
  readonly kind = 'config' as const;

  constructor(readonly configPath: string, message: string, options?: { cause?: unknown }) {
    super(`${configPath}: ${message}`, options);
  }
}

export type AnyPlanwardenError =
  | ValidationError
  | DiffError
  | DependencyError
  | CancelledError
  | ConfigError;

export function isPlanwardenError(error: unknown): error is AnyPlanwardenError {
  return error instanceof PlanwardenError;
}

export function formatPath(path: readonly string[]): string {
  return path.length === 0 ? '(root)' : path.join('.');
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** One-line message for the CLI, prefixed with the kind for engine errors */
export function describeFailure(error: unknown): string {
  if (isPlanwardenError(error)) {
    return `${error.kind} error: ${error.message}`;
  }
  return errorMessage(error);
}
