import { pgTable, bigint, text, jsonb, timestamp, index } from 'drizzle-orm/pg-core';
import { AUDIT_STAGES } from '@shared/constants';

export const auditRecords = pgTable(
  'audit_records',
  {
    sequenceNumber: bigint('sequence_number', { mode: 'number' }).primaryKey(),
    claimId: text('claim_id').notNull(),
    stage: text('stage', { enum: AUDIT_STAGES }).notNull(),
    payload: jsonb('payload'),
    recordedAt: text('recorded_at').notNull(),
    prevHash: text('prev_hash').notNull(),
    hash: text('hash').notNull().unique(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    claimIdx: index('audit_records_claim_idx').on(table.claimId, table.sequenceNumber),
  }),
);

export type AuditRecordRow = typeof auditRecords.$inferSelect;
