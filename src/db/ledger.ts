// Postgres-backed audit ledger. A transaction-scoped advisory lock gives every
// writer, in any process, one total order over sequence numbers.

import { asc, desc, eq, gte, sql } from 'drizzle-orm';
import { GENESIS_HASH } from '@shared/constants';
import { LedgerUnavailableError, describeError } from '@core/errors';
import { snapshot } from '@core/immutable';
import {
  auditRecordSchema,
  hashRecord,
  verifyRecords,
  type AuditEntry,
  type AuditLedger,
  type AuditRecord,
  type LedgerVerification,
} from '@core/ledger';
import type { Database } from './connection';
import { auditRecords, type AuditRecordRow } from './schema/audit-records';

// Arbitrary constant shared by every writer of audit_records.
export const LEDGER_LOCK_KEY = 0x4155_4449;

export function toAuditRecord(row: AuditRecordRow): AuditRecord {
  return auditRecordSchema.parse({
    sequenceNumber: row.sequenceNumber,
    claimId: row.claimId,
    stage: row.stage,
    payload: row.payload,
    timestamp: row.recordedAt,
    prevHash: row.prevHash,
    hash: row.hash,
  });
}

export class PostgresAuditLedger implements AuditLedger {
  constructor(private readonly db: Database) {}

  async append(entry: AuditEntry): Promise<number> {
    try {
      return await this.db.transaction(async (tx) => {
        await tx.execute(sql`select pg_advisory_xact_lock(${LEDGER_LOCK_KEY})`);

        const [last] = await tx
          .select({ sequenceNumber: auditRecords.sequenceNumber, hash: auditRecords.hash })
          .from(auditRecords)
          .orderBy(desc(auditRecords.sequenceNumber))
          .limit(1);

        const unsigned = {
          sequenceNumber: (last?.sequenceNumber ?? 0) + 1,
          claimId: entry.claimId,
          stage: entry.stage,
          payload: snapshot(entry.payload),
          timestamp: entry.timestamp,
          prevHash: last?.hash ?? GENESIS_HASH,
        };

        await tx.insert(auditRecords).values({
          sequenceNumber: unsigned.sequenceNumber,
          claimId: unsigned.claimId,
          stage: unsigned.stage,
          payload: unsigned.payload,
          recordedAt: unsigned.timestamp,
          prevHash: unsigned.prevHash,
          hash: hashRecord(unsigned),
        });

        return unsigned.sequenceNumber;
      });
    } catch (err) {
      throw new LedgerUnavailableError(entry.stage, [
        `Audit record for claim ${entry.claimId} was not stored: ${describeError(err)}`,
      ]);
    }
  }

  async readChain(claimId: string): Promise<readonly AuditRecord[]> {
    const rows = await this.db
      .select()
      .from(auditRecords)
      .where(eq(auditRecords.claimId, claimId))
      .orderBy(asc(auditRecords.sequenceNumber));
    return rows.map(toAuditRecord);
  }

  async readAll(fromSequence = 1): Promise<readonly AuditRecord[]> {
    const rows = await this.db
      .select()
      .from(auditRecords)
      .where(gte(auditRecords.sequenceNumber, fromSequence))
      .orderBy(asc(auditRecords.sequenceNumber));
    return rows.map(toAuditRecord);
  }

  async verify(): Promise<LedgerVerification> {
    return verifyRecords(await this.readAll());
  }
}
