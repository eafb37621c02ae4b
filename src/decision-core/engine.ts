import { randomUUID } from 'crypto';
import type { AuditStage } from '@shared/types';
import type { AdvisoryModel } from './advisory';
import {
  AdvisoryUnavailableError,
  GovernanceError,
  InvalidTransitionError,
  LedgerUnavailableError,
  MissingRationaleError,
  SettledDecisionError,
  describeError,
  failure,
  success,
  type EngineError,
  type Result,
} from './errors';
import { GovernanceValidator } from './governance';
import {
  HumanGate,
  type DecisionContext,
  type GateError,
  type GateOutcome,
  type RejectedDecision,
  type StageRecorder,
} from './human-gate';
import { deepFreeze } from './immutable';
import type { AuditLedger, AuditRecord } from './ledger';
import type { PolicyPack } from './policy-pack';
import { transition, type PipelineState } from './state-machine';
import { withTimeout } from './timeout';

// ---------------------------------------------------------------------------
// Public interfaces
// ---------------------------------------------------------------------------

/** A claim that has been advised and now waits for a human at PENDING_HUMAN. */
export interface PendingDecision extends DecisionContext {
  /** Sequence numbers recorded so far, ADVISED last. */
  readonly auditChain: readonly number[];
}

/**
 * Supplies a raw HumanConfirmation for a pending claim. Returning null or
 * undefined means no human reviewed the claim.
 */
export type HumanReviewer = (pending: PendingDecision) => unknown;

export interface StageRecordedEvent {
  claimId: string;
  stage: AuditStage;
  sequenceNumber: number;
}

export interface DecisionEngineOptions {
  policy: PolicyPack;
  model: AdvisoryModel;
  ledger: AuditLedger;
  advisoryTimeoutMs?: number;
  ledgerTimeoutMs?: number;
  clock?: () => Date;
  generateClaimId?: () => string;
  onRecord?: (event: StageRecordedEvent) => void;
  onHalt?: (claimId: string, error: EngineError) => void;
}

export const DEFAULT_ADVISORY_TIMEOUT_MS = 2000;
export const DEFAULT_LEDGER_TIMEOUT_MS = 5000;

export const ABANDONED_REASON = 'Abandoned before human review';
export const NO_REVIEWER_REASON = 'No human confirmation was provided';
export const MISSING_RATIONALE_REASON =
  'Human confirmation lacked an override reason; claim closed without a decision';

type HaltKind = 'governance' | 'advisory';

// A listener failure is logged and never aborts an audited transition.
function notify(listener: string, claimId: string, call: () => void): void {
  try {
    call();
  } catch (err) {
    console.error(`[ENGINE] ${listener} listener failed for claim ${claimId}: ${describeError(err)}`);
  }
}

// ---------------------------------------------------------------------------
// Per-claim run
// ---------------------------------------------------------------------------

type RunStatus = 'open' | 'resolving' | 'settled';

/**
 * Tracks one claim through the pipeline. Every audited transition is checked
 * against the state machine, then written to the ledger before the state
 * advances.
 */
class PipelineRun {
  state: PipelineState | null = null;
  status: RunStatus = 'open';
  readonly sequence: number[] = [];

  constructor(
    readonly claimId: string,
    private readonly deps: {
      ledger: AuditLedger;
      ledgerTimeoutMs: number;
      clock: () => Date;
      onRecord?: (event: StageRecordedEvent) => void;
    },
  ) {}

  /** Move without an audit record; only PENDING_HUMAN is entered this way. */
  advance(next: PipelineState): void {
    const result = transition(this.state, next);
    if (!result.ok) throw new InvalidTransitionError(`Claim ${this.claimId}: ${result.error}`);
    if (result.audited) {
      throw new InvalidTransitionError(`Claim ${this.claimId}: ${next} must be recorded`);
    }
    this.state = result.newState;
  }

  readonly record: StageRecorder = async (stage, payload) => {
    const result = transition(this.state, stage);
    if (!result.ok) throw new InvalidTransitionError(`Claim ${this.claimId}: ${result.error}`);

    let sequenceNumber: number;
    try {
      sequenceNumber = await withTimeout(
        this.deps.ledger.append({
          claimId: this.claimId,
          stage,
          payload,
          timestamp: this.deps.clock().toISOString(),
        }),
        this.deps.ledgerTimeoutMs,
        `Audit append for ${stage}`,
      );
    } catch (err) {
      this.status = 'settled';
      return failure(
        err instanceof LedgerUnavailableError
          ? err
          : new LedgerUnavailableError(stage, [
              `Audit record for claim ${this.claimId} was not stored: ${describeError(err)}`,
            ]),
      );
    }

    this.state = result.newState;
    this.sequence.push(sequenceNumber);
    notify('onRecord', this.claimId, () =>
      this.deps.onRecord?.({ claimId: this.claimId, stage, sequenceNumber }),
    );
    return success(sequenceNumber);
  };

  /**
   * Record a REJECTED terminal for a governance or advisory failure. When that
   * record cannot be written the ledger failure is reported instead.
   */
  async halt<E extends GovernanceError | AdvisoryUnavailableError>(
    kind: HaltKind,
    error: E,
  ): Promise<E | LedgerUnavailableError> {
    this.status = 'settled';
    const recorded = await this.record('REJECTED', {
      kind,
      code: error.code,
      stage: error.stage,
      reasons: error.reasons,
    });
    if (recorded.ok) return error;
    return new LedgerUnavailableError(recorded.error.stage, [
      ...error.reasons,
      ...recorded.error.reasons,
    ]);
  }
}

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

/**
 * Orchestrates RECEIVED → VALIDATED → GOVERNED → ADVISED → PENDING_HUMAN →
 * FINALIZED | REJECTED. Holds no per-claim state outside the PendingDecision
 * handles it has issued.
 */
export class DecisionEngine {
  readonly policy: PolicyPack;
  private readonly model: AdvisoryModel;
  private readonly ledger: AuditLedger;
  private readonly validator: GovernanceValidator;
  private readonly gate: HumanGate;
  private readonly advisoryTimeoutMs: number;
  private readonly ledgerTimeoutMs: number;
  private readonly clock: () => Date;
  private readonly generateClaimId: () => string;
  private readonly onRecord?: (event: StageRecordedEvent) => void;
  private readonly onHalt?: (claimId: string, error: EngineError) => void;
  private readonly runs = new WeakMap<PendingDecision, PipelineRun>();

  constructor(options: DecisionEngineOptions) {
    this.policy = options.policy;
    this.model = options.model;
    this.ledger = options.ledger;
    this.validator = new GovernanceValidator(options.policy);
    this.clock = options.clock ?? (() => new Date());
    this.gate = new HumanGate(this.clock);
    this.advisoryTimeoutMs = options.advisoryTimeoutMs ?? DEFAULT_ADVISORY_TIMEOUT_MS;
    this.ledgerTimeoutMs = options.ledgerTimeoutMs ?? DEFAULT_LEDGER_TIMEOUT_MS;
    this.generateClaimId = options.generateClaimId ?? randomUUID;
    this.onRecord = options.onRecord;
    this.onHalt = options.onHalt;
  }

  /** Run a claim up to PENDING_HUMAN. */
  async evaluate(rawInput: unknown): Promise<Result<PendingDecision, EngineError>> {
    const claimId = this.generateClaimId();
    const run = new PipelineRun(claimId, {
      ledger: this.ledger,
      ledgerTimeoutMs: this.ledgerTimeoutMs,
      clock: this.clock,
      onRecord: this.onRecord,
    });
    const { packId, version } = this.policy.meta;

    const received = await run.record('RECEIVED', {
      input: rawInput ?? null,
      policy: { packId, version },
    });
    if (!received.ok) return this.fail(claimId, received.error);

    const validated = this.validator.validateInput(claimId, rawInput);
    if (!validated.ok) return this.fail(claimId, await run.halt('governance', validated.error));
    const claim = validated.value;

    const recordedInput = await run.record('VALIDATED', claim.input);
    if (!recordedInput.ok) return this.fail(claimId, recordedInput.error);

    const governed = this.validator.govern(claim);
    if (!governed.ok) return this.fail(claimId, await run.halt('governance', governed.error));
    const { envelope } = governed.value;

    const recordedEnvelope = await run.record('GOVERNED', envelope);
    if (!recordedEnvelope.ok) return this.fail(claimId, recordedEnvelope.error);

    let output: unknown;
    try {
      output = await withTimeout(
        Promise.resolve().then(() => this.model.suggest(claim)),
        this.advisoryTimeoutMs,
        `Advisory model ${this.model.modelId}`,
      );
    } catch (err) {
      const unavailable = new AdvisoryUnavailableError([
        `Advisory model ${this.model.modelId} failed: ${describeError(err)}`,
      ]);
      return this.fail(claimId, await run.halt('advisory', unavailable));
    }

    const checked = this.validator.validateSuggestion(governed.value, output);
    if (!checked.ok) {
      const kind: HaltKind = checked.error instanceof GovernanceError ? 'governance' : 'advisory';
      return this.fail(claimId, await run.halt(kind, checked.error));
    }
    const suggestion = checked.value;

    const advised = await run.record('ADVISED', suggestion);
    if (!advised.ok) return this.fail(claimId, advised.error);

    run.advance('PENDING_HUMAN');

    const pending: PendingDecision = deepFreeze({
      claimId,
      input: claim.input,
      envelope,
      suggestion,
      policy: { packId, version },
      auditChain: [...run.sequence],
    });
    this.runs.set(pending, run);
    return success(pending);
  }

  /**
   * Submit a human confirmation. MissingRationale leaves the claim open for a
   * corrected submission; any other outcome settles it.
   */
  async resolve(
    pending: PendingDecision,
    rawConfirmation: unknown,
  ): Promise<Result<GateOutcome, GateError>> {
    const run = this.claim(pending);
    let result: Result<GateOutcome, GateError>;
    try {
      result = await this.gate.confirm(pending, rawConfirmation, run.record, [...run.sequence]);
    } catch (err) {
      run.status = 'settled';
      throw err;
    }

    if (result.ok) {
      run.status = 'settled';
      return result;
    }

    const { error } = result;
    if (error instanceof MissingRationaleError) {
      run.status = 'open';
      return result;
    }
    if (error instanceof GovernanceError) {
      return this.fail(pending.claimId, await run.halt('governance', error));
    }
    run.status = 'settled';
    return this.fail(pending.claimId, error);
  }

  /** Close a pending claim as REJECTED without a human decision. */
  async abandon(
    pending: PendingDecision,
    reason: string = ABANDONED_REASON,
  ): Promise<Result<RejectedDecision, LedgerUnavailableError>> {
    const run = this.claim(pending);
    run.status = 'settled';
    const result = await this.gate.abandon(pending, reason, run.record, [...run.sequence]);
    return result.ok ? result : this.fail(pending.claimId, result.error);
  }

  /** True while `pending` can still be resolved or abandoned. */
  isOpen(pending: PendingDecision): boolean {
    return this.runs.get(pending)?.status === 'open';
  }

  /** The whole pipeline with a reviewer standing in at PENDING_HUMAN. */
  async makeDecision(
    rawInput: unknown,
    reviewer: HumanReviewer,
  ): Promise<Result<GateOutcome, EngineError>> {
    const evaluated = await this.evaluate(rawInput);
    if (!evaluated.ok) return evaluated;
    const pending = evaluated.value;

    let confirmation: unknown;
    try {
      confirmation = await reviewer(pending);
    } catch (err) {
      return this.abandon(pending, `Reviewer failed: ${describeError(err)}`);
    }

    if (confirmation === null || confirmation === undefined) {
      return this.abandon(pending, NO_REVIEWER_REASON);
    }

    const resolved = await this.resolve(pending, confirmation);
    if (!resolved.ok && resolved.error instanceof MissingRationaleError) {
      const abandoned = await this.abandon(pending, MISSING_RATIONALE_REASON);
      return abandoned.ok ? resolved : abandoned;
    }
    return resolved;
  }

  readChain(claimId: string): Promise<readonly AuditRecord[]> {
    return this.ledger.readChain(claimId);
  }

  private claim(pending: PendingDecision): PipelineRun {
    const run = this.runs.get(pending);
    if (!run) {
      throw new SettledDecisionError(pending.claimId, 'was not issued by this engine');
    }
    if (run.status === 'settled') {
      throw new SettledDecisionError(pending.claimId, 'has already been settled');
    }
    if (run.status === 'resolving') {
      throw new SettledDecisionError(pending.claimId, 'is already being resolved');
    }
    run.status = 'resolving';
    return run;
  }

  private fail<E extends EngineError>(claimId: string, error: E): { ok: false; error: E } {
    notify('onHalt', claimId, () => this.onHalt?.(claimId, error));
    return failure(error);
  }
}
