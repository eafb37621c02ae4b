export const API_PREFIX = '/api';

export const WS_EVENTS = {
  CONNECTION_ESTABLISHED: 'connection_established',
  HEARTBEAT: 'heartbeat',
  AUDIT_RECORD_APPENDED: 'audit_record_appended',
} as const;

export const CLAIM_TYPES = ['Auto', 'Property', 'Health', 'Liability'] as const;

export const RISK_FACTORS = ['low', 'medium', 'high'] as const;

// Ordered from least to most severe.
export const SEVERITY_CATEGORIES = ['Low', 'Medium', 'High'] as const;

export const AUDIT_STAGES = [
  'RECEIVED',
  'VALIDATED',
  'GOVERNED',
  'ADVISED',
  'HUMAN_CONFIRMED',
  'FINALIZED',
  'REJECTED',
] as const;

export const PIPELINE_STATES = [
  'RECEIVED',
  'VALIDATED',
  'GOVERNED',
  'ADVISED',
  'PENDING_HUMAN',
  'HUMAN_CONFIRMED',
  'FINALIZED',
  'REJECTED',
] as const;

export const ERROR_CODES = [
  'UnknownField',
  'OutOfRange',
  'BoundaryViolation',
  'AdvisoryUnavailable',
  'MissingRationale',
  'LedgerUnavailable',
] as const;

export const ADVISORY_ACTIONS = [
  'suggest_severity',
  'auto_approve',
  'auto_deny',
] as const;

export const GOVERNANCE_STATUS = 'ADVISORY_ONLY' as const;

export const LEDGER_BACKENDS = ['memory', 'file', 'postgres'] as const;

export const GENESIS_HASH = '0'.repeat(64);
