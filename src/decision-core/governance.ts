import { GOVERNANCE_STATUS } from '@shared/constants';
import {
  advisorySuggestionSchema,
  isAdvisoryAction,
  isSeverityCategory,
  type AdvisorySuggestion,
} from './advisory';
import { admissibleCategories, matchRules } from './boundaries';
import { claimInputSchema } from './claim-input';
import type { ClaimInput, SeverityCategory } from './claim-input';
import {
  AdvisoryUnavailableError,
  GovernanceError,
  failure,
  success,
  type FieldViolation,
  type Result,
} from './errors';
import type { AdvisoryAction, CapabilityDictionary, FieldCapability, PolicyPack } from './policy-pack';

// ---------------------------------------------------------------------------
// Validated values
// ---------------------------------------------------------------------------

const VALIDATION_KEY = Symbol('GovernanceValidator');

/**
 * A claim input that passed the capability dictionary. Only this module can
 * construct one, so an AdvisoryModel can never be handed raw input.
 */
export class ValidatedClaim {
  readonly claimId: string;
  readonly input: ClaimInput;

  constructor(key: typeof VALIDATION_KEY, claimId: string, input: ClaimInput) {
    if (key !== VALIDATION_KEY) {
      throw new TypeError('ValidatedClaim can only be issued by the GovernanceValidator');
    }
    this.claimId = claimId;
    this.input = Object.freeze({ ...input });
    Object.freeze(this);
  }
}

export interface GovernanceEnvelope {
  readonly action: AdvisoryAction;
  readonly admissibleCategories: readonly SeverityCategory[];
  readonly matchedRules: readonly { ruleId: string; rationale: string }[];
}

export interface GovernedClaim {
  readonly claim: ValidatedClaim;
  readonly envelope: GovernanceEnvelope;
}

/** The only action the engine ever asks a model for. */
export const ADVISORY_ACTION: AdvisoryAction = 'suggest_severity';

// ---------------------------------------------------------------------------
// Field checks
// ---------------------------------------------------------------------------

function checkField(field: string, value: unknown, spec: FieldCapability): FieldViolation | null {
  switch (spec.type) {
    case 'enum': {
      const values = spec.values ?? [];
      if (typeof value !== 'string' || !values.includes(value)) {
        return {
          field,
          code: 'OutOfRange',
          reason: `${field} must be one of ${values.join(', ')}; got ${JSON.stringify(value)}`,
        };
      }
      return null;
    }
    case 'number': {
      if (typeof value !== 'number' || !Number.isFinite(value)) {
        return { field, code: 'OutOfRange', reason: `${field} must be a finite number` };
      }
      if (spec.min !== undefined && value < spec.min) {
        return { field, code: 'OutOfRange', reason: `${field} must be at least ${spec.min}; got ${value}` };
      }
      if (spec.max !== undefined && value > spec.max) {
        return { field, code: 'OutOfRange', reason: `${field} must be at most ${spec.max}; got ${value}` };
      }
      return null;
    }
    case 'boolean':
      return typeof value === 'boolean'
        ? null
        : { field, code: 'OutOfRange', reason: `${field} must be true or false` };
    case undefined:
      return { field, code: 'UnknownField', reason: `${field} has no declared type` };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

// ---------------------------------------------------------------------------
// Validator
// ---------------------------------------------------------------------------

/**
 * Pure checks of claim input and advisory output against the policy pack.
 * Nothing is ever corrected; every problem is reported.
 */
export class GovernanceValidator {
  constructor(private readonly policy: PolicyPack) {}

  /** Raw input against the capability dictionary. */
  validateInput(claimId: string, raw: unknown): Result<ValidatedClaim, GovernanceError> {
    if (!isRecord(raw)) {
      return failure(
        new GovernanceError('VALIDATED', [
          { field: '(input)', code: 'OutOfRange', reason: 'Claim input must be a JSON object' },
        ]),
      );
    }

    const { fields } = this.policy.capabilities;
    const violations: FieldViolation[] = [];

    for (const field of Object.keys(raw)) {
      const spec = Object.hasOwn(fields, field) ? fields[field] : undefined;
      if (!spec) {
        violations.push({
          field,
          code: 'UnknownField',
          reason: `${field} is not declared in capability dictionary ${this.policy.capabilities.dictionaryId}`,
        });
      } else if (!spec.allowed) {
        violations.push({
          field,
          code: 'UnknownField',
          reason: `${field} is not a permitted input${spec.reason ? `: ${spec.reason}` : ''}`,
        });
      }
    }

    for (const [field, spec] of Object.entries(fields)) {
      if (!spec.allowed) continue;
      if (!(field in raw)) {
        violations.push({ field, code: 'OutOfRange', reason: `${field} is required` });
        continue;
      }
      const violation = checkField(field, raw[field], spec);
      if (violation) violations.push(violation);
    }

    if (violations.length > 0) {
      return failure(new GovernanceError('VALIDATED', violations));
    }

    const parsed = claimInputSchema.safeParse(raw);
    if (!parsed.success) {
      return failure(
        new GovernanceError(
          'VALIDATED',
          parsed.error.issues.map((issue) => ({
            field: issue.path.join('.') || '(input)',
            code: 'OutOfRange',
            reason: issue.message,
          })),
        ),
      );
    }

    return success(new ValidatedClaim(VALIDATION_KEY, claimId, parsed.data));
  }

  /** Decide what the advisory step is allowed to propose for this claim. */
  govern(claim: ValidatedClaim): Result<GovernedClaim, GovernanceError> {
    const { capabilities, boundaries } = this.policy;
    const violations: FieldViolation[] = [];

    const actionViolation = this.checkAction(ADVISORY_ACTION, claim, capabilities);
    if (actionViolation) violations.push(actionViolation);

    const matched = matchRules(boundaries, claim.input);
    const admissible = admissibleCategories(capabilities.categories, matched);
    if (admissible.length === 0) {
      violations.push({
        field: 'category',
        code: 'BoundaryViolation',
        reason: `No category satisfies boundary rules ${matched.map((r) => r.ruleId).join(', ')}`,
      });
    }

    if (violations.length > 0) {
      return failure(new GovernanceError('GOVERNED', violations));
    }

    return success({
      claim,
      envelope: {
        action: ADVISORY_ACTION,
        admissibleCategories: admissible,
        matchedRules: matched.map((r) => ({ ruleId: r.ruleId, rationale: r.rationale })),
      },
    });
  }

  /** Raw input through both dictionary and boundary checks. */
  validate(claimId: string, raw: unknown): Result<GovernedClaim, GovernanceError> {
    const validated = this.validateInput(claimId, raw);
    return validated.ok ? this.govern(validated.value) : validated;
  }

  /** Second pass: model output before it may reach a human. */
  validateSuggestion(
    governed: GovernedClaim,
    raw: unknown,
  ): Result<AdvisorySuggestion, GovernanceError | AdvisoryUnavailableError> {
    const parsed = advisorySuggestionSchema.safeParse(raw);
    if (!parsed.success) {
      return failure(
        new AdvisoryUnavailableError(
          parsed.error.issues.map(
            (issue) => `Malformed suggestion at ${issue.path.join('.') || '(root)'}: ${issue.message}`,
          ),
        ),
      );
    }

    const s = parsed.data;
    const violations: FieldViolation[] = [];
    const { capabilities } = this.policy;

    if (s.governanceStatus !== GOVERNANCE_STATUS) {
      violations.push({
        field: 'governanceStatus',
        code: 'BoundaryViolation',
        reason: `Suggestion must be ${GOVERNANCE_STATUS}; got ${s.governanceStatus}`,
      });
    }

    if (!Number.isFinite(s.confidence) || s.confidence < 0 || s.confidence > 1) {
      violations.push({
        field: 'confidence',
        code: 'OutOfRange',
        reason: `confidence must be within [0, 1]; got ${s.confidence}`,
      });
    }

    if (s.ruleSignals.length === 0) {
      violations.push({
        field: 'ruleSignals',
        code: 'BoundaryViolation',
        reason: 'Suggestion carries no rule signals to explain it',
      });
    }

    const category = isSeverityCategory(s.category) ? s.category : null;
    if (category === null || !capabilities.categories.includes(category)) {
      violations.push({
        field: 'category',
        code: 'BoundaryViolation',
        reason: `${s.category} is not a declared advisory category`,
      });
    } else if (!governed.envelope.admissibleCategories.includes(category)) {
      violations.push({
        field: 'category',
        code: 'BoundaryViolation',
        reason: `${category} is outside the admissible categories ${governed.envelope.admissibleCategories.join(', ')} (${governed.envelope.matchedRules.map((r) => r.ruleId).join(', ')})`,
      });
    }

    const action = isAdvisoryAction(s.action) ? s.action : null;
    if (action === null) {
      violations.push({
        field: 'action',
        code: 'BoundaryViolation',
        reason: `${s.action} is not a declared action`,
      });
    } else if (action !== governed.envelope.action) {
      violations.push({
        field: 'action',
        code: 'BoundaryViolation',
        reason: `Model proposed ${action}; only ${governed.envelope.action} was requested`,
      });
    } else {
      const actionViolation = this.checkAction(action, governed.claim, capabilities);
      if (actionViolation) violations.push(actionViolation);
    }

    if (violations.length > 0 || category === null || action === null) {
      return failure(new GovernanceError('ADVISED', violations));
    }

    return success({
      category,
      confidence: s.confidence,
      action,
      ruleSignals: s.ruleSignals,
      uncertainty: s.uncertainty,
      contributions: s.contributions,
      governanceStatus: GOVERNANCE_STATUS,
      modelId: s.modelId,
    });
  }

  private checkAction(
    action: AdvisoryAction,
    claim: ValidatedClaim,
    capabilities: CapabilityDictionary,
  ): FieldViolation | null {
    const spec = capabilities.actions[action];
    if (!spec || !spec.allowed) {
      return {
        field: 'action',
        code: 'BoundaryViolation',
        reason: `Action ${action} is not permitted${spec?.reason ? `: ${spec.reason}` : ''}`,
      };
    }
    if (spec.claimTypes && !spec.claimTypes.includes(claim.input.claim_type)) {
      return {
        field: 'action',
        code: 'BoundaryViolation',
        reason: `Action ${action} is not permitted for ${claim.input.claim_type} claims`,
      };
    }
    return null;
  }
}
