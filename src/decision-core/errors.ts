import type { ErrorCode } from '@shared/types';
import type { PipelineState } from './state-machine';

// ---------------------------------------------------------------------------
// Result type shared by every pipeline step
// ---------------------------------------------------------------------------

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function success<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function failure<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

// ---------------------------------------------------------------------------
// Error taxonomy
// ---------------------------------------------------------------------------

export type GovernanceErrorCode = Extract<
  ErrorCode,
  'UnknownField' | 'OutOfRange' | 'BoundaryViolation'
>;

export interface FieldViolation {
  field: string;
  code: GovernanceErrorCode;
  reason: string;
}

/**
 * Base class for every failure the pipeline reports. Instances are returned
 * as values inside a `Result`, never thrown across a stage boundary.
 */
export abstract class DecisionEngineError extends Error {
  abstract readonly code: ErrorCode;
  readonly stage: PipelineState;
  readonly reasons: readonly string[];

  protected constructor(message: string, stage: PipelineState, reasons: readonly string[]) {
    super(message);
    this.name = new.target.name;
    this.stage = stage;
    this.reasons = reasons.length > 0 ? [...reasons] : [message];
  }

  toJSON(): { code: ErrorCode; stage: PipelineState; message: string; reasons: readonly string[] } {
    return { code: this.code, stage: this.stage, message: this.message, reasons: this.reasons };
  }
}

export class GovernanceError extends DecisionEngineError {
  readonly code: GovernanceErrorCode;
  readonly violations: readonly FieldViolation[];

  constructor(stage: PipelineState, violations: readonly FieldViolation[]) {
    const code = governanceCode(violations);
    const reasons = violations.map((v) => v.reason);
    super(`${code}: ${reasons.join('; ')}`, stage, reasons);
    this.code = code;
    this.violations = [...violations];
  }
}

/** UnknownField outranks OutOfRange, which outranks BoundaryViolation. */
function governanceCode(violations: readonly FieldViolation[]): GovernanceErrorCode {
  if (violations.some((v) => v.code === 'UnknownField')) return 'UnknownField';
  if (violations.some((v) => v.code === 'OutOfRange')) return 'OutOfRange';
  return 'BoundaryViolation';
}

export class AdvisoryUnavailableError extends DecisionEngineError {
  readonly code = 'AdvisoryUnavailable' as const;

  constructor(reasons: readonly string[]) {
    super('AdvisoryUnavailable: the advisory model produced no usable suggestion', 'ADVISED', reasons);
  }
}

export class MissingRationaleError extends DecisionEngineError {
  readonly code = 'MissingRationale' as const;

  constructor() {
    super('MissingRationale: a non-empty override reason is required', 'HUMAN_CONFIRMED', [
      'Human confirmation must include a non-empty override reason',
    ]);
  }
}

export class LedgerUnavailableError extends DecisionEngineError {
  readonly code = 'LedgerUnavailable' as const;

  constructor(stage: PipelineState, reasons: readonly string[]) {
    super(`LedgerUnavailable: could not durably record stage ${stage}`, stage, reasons);
  }
}

export type EngineError =
  | GovernanceError
  | AdvisoryUnavailableError
  | MissingRationaleError
  | LedgerUnavailableError;

// ---------------------------------------------------------------------------
// Contract violations (thrown: these indicate caller or configuration bugs)
// ---------------------------------------------------------------------------

export class PolicyPackError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PolicyPackError';
  }
}

export class InvalidTransitionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidTransitionError';
  }
}

export class SettledDecisionError extends Error {
  readonly claimId: string;

  constructor(claimId: string, detail: string) {
    super(`Pending decision ${claimId} ${detail}`);
    this.name = 'SettledDecisionError';
    this.claimId = claimId;
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
