import { z } from 'zod';
import type { AuditStage } from '@shared/types';
import type { AdvisorySuggestion } from './advisory';
import type { ClaimInput, SeverityCategory } from './claim-input';
import {
  GovernanceError,
  LedgerUnavailableError,
  MissingRationaleError,
  failure,
  success,
  type FieldViolation,
  type Result,
} from './errors';
import type { GovernanceEnvelope } from './governance';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface HumanConfirmation {
  readonly confirmed: boolean;
  readonly overrideReason: string;
  readonly decisionMakerId: string;
  readonly timestamp: string;
}

/** Everything a reviewer sees while a claim waits at PENDING_HUMAN. */
export interface DecisionContext {
  readonly claimId: string;
  readonly input: ClaimInput;
  readonly envelope: GovernanceEnvelope;
  readonly suggestion: AdvisorySuggestion;
  readonly policy: { readonly packId: string; readonly version: string };
}

export type RejectionKind = 'human' | 'abandoned';

/** Writes one audit record for the claim under review. */
export type StageRecorder = (
  stage: AuditStage,
  payload: unknown,
) => Promise<Result<number, LedgerUnavailableError>>;

const CONFIRMATION_FIELDS = ['confirmed', 'overrideReason', 'decisionMakerId'] as const;

const confirmationInputSchema = z.object({
  confirmed: z.boolean({ invalid_type_error: 'confirmed must be true or false' }),
  overrideReason: z.string({ invalid_type_error: 'overrideReason must be a string' }),
  decisionMakerId: z
    .string({ invalid_type_error: 'decisionMakerId must be a string' })
    .trim()
    .min(1, 'decisionMakerId must not be empty'),
});

// ---------------------------------------------------------------------------
// Terminal values
// ---------------------------------------------------------------------------

const GATE_KEY = Symbol('HumanGate');

/**
 * A human-ratified decision. The constructor demands a key that never leaves
 * this module, so `HumanGate.confirm` is the only way to obtain one.
 */
export class Decision {
  readonly status = 'FINALIZED' as const;
  readonly claimId: string;
  readonly category: SeverityCategory;
  readonly suggestion: AdvisorySuggestion;
  readonly confirmation: HumanConfirmation;
  /** Sequence numbers of every audit record for this claim, FINALIZED last. */
  readonly auditChain: readonly number[];

  constructor(
    key: typeof GATE_KEY,
    context: DecisionContext,
    confirmation: HumanConfirmation,
    auditChain: readonly number[],
  ) {
    if (key !== GATE_KEY) {
      throw new TypeError('Decisions can only be issued by the HumanGate');
    }
    this.claimId = context.claimId;
    this.category = context.suggestion.category;
    this.suggestion = context.suggestion;
    this.confirmation = confirmation;
    this.auditChain = Object.freeze([...auditChain]);
    Object.freeze(this);
  }
}

export class RejectedDecision {
  readonly status = 'REJECTED' as const;
  readonly claimId: string;
  readonly kind: RejectionKind;
  readonly reasons: readonly string[];
  readonly suggestion: AdvisorySuggestion;
  readonly confirmation: HumanConfirmation | null;
  readonly auditChain: readonly number[];

  constructor(
    key: typeof GATE_KEY,
    context: DecisionContext,
    kind: RejectionKind,
    reasons: readonly string[],
    confirmation: HumanConfirmation | null,
    auditChain: readonly number[],
  ) {
    if (key !== GATE_KEY) {
      throw new TypeError('Rejections can only be issued by the HumanGate');
    }
    this.claimId = context.claimId;
    this.kind = kind;
    this.reasons = Object.freeze([...reasons]);
    this.suggestion = context.suggestion;
    this.confirmation = confirmation;
    this.auditChain = Object.freeze([...auditChain]);
    Object.freeze(this);
  }
}

export type GateOutcome = Decision | RejectedDecision;

export type GateError = GovernanceError | MissingRationaleError | LedgerUnavailableError;

// ---------------------------------------------------------------------------
// Gate
// ---------------------------------------------------------------------------

export class HumanGate {
  constructor(private readonly clock: () => Date = () => new Date()) {}

  /** Boundary validation of a reviewer's submission. */
  parseConfirmation(raw: unknown): Result<HumanConfirmation, GovernanceError | MissingRationaleError> {
    if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
      return failure(
        new GovernanceError('HUMAN_CONFIRMED', [
          { field: '(confirmation)', code: 'OutOfRange', reason: 'Confirmation must be a JSON object' },
        ]),
      );
    }

    const known: readonly string[] = CONFIRMATION_FIELDS;
    const unknown: FieldViolation[] = Object.keys(raw)
      .filter((key) => !known.includes(key))
      .map((field) => ({
        field,
        code: 'UnknownField',
        reason: `${field} is not part of a human confirmation`,
      }));
    if (unknown.length > 0) {
      return failure(new GovernanceError('HUMAN_CONFIRMED', unknown));
    }

    const parsed = confirmationInputSchema.safeParse(raw);
    if (!parsed.success) {
      return failure(
        new GovernanceError(
          'HUMAN_CONFIRMED',
          parsed.error.issues.map((issue) => ({
            field: issue.path.join('.') || '(confirmation)',
            code: 'OutOfRange',
            reason: issue.message,
          })),
        ),
      );
    }

    const overrideReason = parsed.data.overrideReason.trim();
    if (overrideReason === '') {
      return failure(new MissingRationaleError());
    }

    return success(
      Object.freeze({
        confirmed: parsed.data.confirmed,
        overrideReason,
        decisionMakerId: parsed.data.decisionMakerId,
        timestamp: this.clock().toISOString(),
      }),
    );
  }

  /**
   * PENDING_HUMAN → HUMAN_CONFIRMED → FINALIZED | REJECTED. Each record is
   * written before the next step; nothing is returned for a step that could
   * not be recorded.
   */
  async confirm(
    context: DecisionContext,
    raw: unknown,
    record: StageRecorder,
    priorChain: readonly number[],
  ): Promise<Result<GateOutcome, GateError>> {
    const parsed = this.parseConfirmation(raw);
    if (!parsed.ok) return parsed;
    const confirmation = parsed.value;

    const confirmed = await record('HUMAN_CONFIRMED', confirmation);
    if (!confirmed.ok) return confirmed;

    if (!confirmation.confirmed) {
      const rejected = await record('REJECTED', {
        kind: 'human',
        decisionMakerId: confirmation.decisionMakerId,
        reasons: [confirmation.overrideReason],
      });
      if (!rejected.ok) return rejected;
      return success(
        new RejectedDecision(
          GATE_KEY,
          context,
          'human',
          [confirmation.overrideReason],
          confirmation,
          [...priorChain, confirmed.value, rejected.value],
        ),
      );
    }

    const finalized = await record('FINALIZED', {
      category: context.suggestion.category,
      confidence: context.suggestion.confidence,
      decisionMakerId: confirmation.decisionMakerId,
      overrideReason: confirmation.overrideReason,
    });
    if (!finalized.ok) return finalized;

    return success(
      new Decision(GATE_KEY, context, confirmation, [
        ...priorChain,
        confirmed.value,
        finalized.value,
      ]),
    );
  }

  /** Close a pending claim without human ratification. */
  async abandon(
    context: DecisionContext,
    reason: string,
    record: StageRecorder,
    priorChain: readonly number[],
  ): Promise<Result<RejectedDecision, LedgerUnavailableError>> {
    const rejected = await record('REJECTED', { kind: 'abandoned', reasons: [reason] });
    if (!rejected.ok) return rejected;
    return success(
      new RejectedDecision(GATE_KEY, context, 'abandoned', [reason], null, [
        ...priorChain,
        rejected.value,
      ]),
    );
  }
}
