import { createHash } from 'crypto';
import { z } from 'zod';
import { AUDIT_STAGES, GENESIS_HASH } from '@shared/constants';
import type { AuditStage } from '@shared/types';
import { LedgerUnavailableError, describeError } from './errors';
import { deepFreeze, snapshot } from './immutable';

// ---------------------------------------------------------------------------
// Public interfaces
// ---------------------------------------------------------------------------

export interface AuditEntry {
  readonly claimId: string;
  readonly stage: AuditStage;
  readonly payload: unknown;
  readonly timestamp: string;
}

export interface AuditRecord extends AuditEntry {
  readonly sequenceNumber: number;
  readonly prevHash: string;
  readonly hash: string;
}

export interface LedgerVerification {
  valid: boolean;
  records: number;
  brokenAt?: number;
  reason?: string;
}

/** Append-only, totally ordered audit log. Records are never updated or deleted. */
export interface AuditLedger {
  /** Resolves to the record's sequence number; rejects with LedgerUnavailableError. */
  append(entry: AuditEntry): Promise<number>;
  readChain(claimId: string): Promise<readonly AuditRecord[]>;
  /** Global order, starting at `fromSequence` (inclusive). */
  readAll(fromSequence?: number): Promise<readonly AuditRecord[]>;
  verify(): Promise<LedgerVerification>;
}

export const auditRecordSchema = z
  .object({
    sequenceNumber: z.number().int().positive(),
    claimId: z.string().min(1),
    stage: z.enum(AUDIT_STAGES),
    payload: z.unknown(),
    timestamp: z.string().min(1),
    prevHash: z.string().length(64),
    hash: z.string().length(64),
  })
  .transform((r): AuditRecord => ({ ...r, payload: r.payload ?? null }));

// ---------------------------------------------------------------------------
// Hash chain
// ---------------------------------------------------------------------------

/** JSON with object keys sorted at every depth. */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item: unknown) => canonicalJson(item)).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.keys(value)
      .sort()
      .filter((key) => Reflect.get(value, key) !== undefined)
      .map((key) => `${JSON.stringify(key)}:${canonicalJson(Reflect.get(value, key))}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value ?? null);
}

export function hashRecord(record: Omit<AuditRecord, 'hash'>): string {
  const body = canonicalJson({
    sequenceNumber: record.sequenceNumber,
    claimId: record.claimId,
    stage: record.stage,
    payload: record.payload,
    timestamp: record.timestamp,
    prevHash: record.prevHash,
  });
  return createHash('sha256').update(body).digest('hex');
}

export function verifyRecords(records: readonly AuditRecord[]): LedgerVerification {
  let prevHash = GENESIS_HASH;
  let prevSequence = 0;
  for (const record of records) {
    if (record.sequenceNumber <= prevSequence) {
      return {
        valid: false,
        records: records.length,
        brokenAt: record.sequenceNumber,
        reason: `sequence ${record.sequenceNumber} does not follow ${prevSequence}`,
      };
    }
    if (record.prevHash !== prevHash) {
      return {
        valid: false,
        records: records.length,
        brokenAt: record.sequenceNumber,
        reason: 'prevHash does not match the preceding record',
      };
    }
    if (hashRecord(record) !== record.hash) {
      return {
        valid: false,
        records: records.length,
        brokenAt: record.sequenceNumber,
        reason: 'record content does not match its hash',
      };
    }
    prevHash = record.hash;
    prevSequence = record.sequenceNumber;
  }
  return { valid: true, records: records.length };
}

// ---------------------------------------------------------------------------
// Sequenced base: serializes appends within this process
// ---------------------------------------------------------------------------

export abstract class SequencedAuditLedger implements AuditLedger {
  private tail: Promise<unknown> = Promise.resolve();
  protected lastSequence = 0;
  protected lastHash = GENESIS_HASH;

  /** Durably store `record`. Must throw if the record was not stored. */
  protected abstract persist(record: AuditRecord): Promise<void>;

  abstract readChain(claimId: string): Promise<readonly AuditRecord[]>;
  abstract readAll(fromSequence?: number): Promise<readonly AuditRecord[]>;
  abstract verify(): Promise<LedgerVerification>;

  append(entry: AuditEntry): Promise<number> {
    const next = this.tail.then(() => this.write(entry));
    // Keep the queue moving after a failed write; the failure reaches the caller through `next`.
    this.tail = next.catch(() => undefined);
    return next;
  }

  private async write(entry: AuditEntry): Promise<number> {
    const sequenceNumber = this.lastSequence + 1;
    const unsigned = {
      sequenceNumber,
      claimId: entry.claimId,
      stage: entry.stage,
      payload: snapshot(entry.payload),
      timestamp: entry.timestamp,
      prevHash: this.lastHash,
    };
    const record: AuditRecord = deepFreeze({ ...unsigned, hash: hashRecord(unsigned) });

    try {
      await this.persist(record);
    } catch (err) {
      throw new LedgerUnavailableError(entry.stage, [
        `Audit record for claim ${entry.claimId} was not stored: ${describeError(err)}`,
      ]);
    }

    this.lastSequence = sequenceNumber;
    this.lastHash = record.hash;
    return sequenceNumber;
  }
}

// ---------------------------------------------------------------------------
// In-memory backend
// ---------------------------------------------------------------------------

export class InMemoryAuditLedger extends SequencedAuditLedger {
  private readonly records: AuditRecord[] = [];

  protected async persist(record: AuditRecord): Promise<void> {
    this.records.push(record);
  }

  async readChain(claimId: string): Promise<readonly AuditRecord[]> {
    return this.records.filter((r) => r.claimId === claimId);
  }

  async readAll(fromSequence = 1): Promise<readonly AuditRecord[]> {
    return this.records.filter((r) => r.sequenceNumber >= fromSequence);
  }

  async verify(): Promise<LedgerVerification> {
    return verifyRecords(this.records);
  }
}
