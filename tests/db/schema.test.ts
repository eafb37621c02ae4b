import { describe, it, expect } from 'vitest';
import { getTableColumns, getTableName } from 'drizzle-orm';
import { GENESIS_HASH } from '@shared/constants';
import { hashRecord } from '@core/ledger';
import { auditRecords, type AuditRecordRow } from '@db/schema';
import { toAuditRecord } from '../../src/db/ledger';

describe('audit_records schema', () => {
  it('exports the audit_records table', () => {
    expect(getTableName(auditRecords)).toBe('audit_records');
  });

  it('has the ledger columns', () => {
    expect(Object.keys(getTableColumns(auditRecords))).toEqual([
      'sequenceNumber',
      'claimId',
      'stage',
      'payload',
      'recordedAt',
      'prevHash',
      'hash',
      'createdAt',
    ]);
  });

  it('keys rows by sequence number and keeps hashes unique', () => {
    expect(auditRecords.sequenceNumber.name).toBe('sequence_number');
    expect(auditRecords.sequenceNumber.primary).toBe(true);
    expect(auditRecords.hash.isUnique).toBe(true);
    expect(auditRecords.payload.notNull).toBe(false);
  });
});

describe('toAuditRecord', () => {
  const unsigned = {
    sequenceNumber: 1,
    claimId: 'claim-1',
    stage: 'RECEIVED' as const,
    payload: { input: { claim_type: 'Auto' } },
    timestamp: '2026-03-01T12:00:00.000Z',
    prevHash: GENESIS_HASH,
  };
  const row: AuditRecordRow = {
    sequenceNumber: unsigned.sequenceNumber,
    claimId: unsigned.claimId,
    stage: unsigned.stage,
    payload: unsigned.payload,
    recordedAt: unsigned.timestamp,
    prevHash: unsigned.prevHash,
    hash: hashRecord(unsigned),
    createdAt: new Date('2026-03-01T12:00:01.000Z'),
  };

  it('maps a row to an audit record whose hash still verifies', () => {
    const record = toAuditRecord(row);
    expect(record).toEqual({ ...unsigned, hash: row.hash });
    expect(hashRecord(record)).toBe(record.hash);
  });

  it('maps a SQL null payload to null', () => {
    expect(toAuditRecord({ ...row, payload: null }).payload).toBeNull();
  });

  it('refuses a row with a truncated hash', () => {
    expect(() => toAuditRecord({ ...row, hash: 'abc' })).toThrow();
  });
});
