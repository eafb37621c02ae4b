import path from 'path';
import { FileAuditLedger } from '@core/file-ledger';
import { InMemoryAuditLedger, type AuditLedger } from '@core/ledger';
import { createDatabase } from '@db/connection';
import { PostgresAuditLedger } from '@db/ledger';
import type { Config } from './config';

export interface LedgerHandle {
  ledger: AuditLedger;
  description: string;
  close: () => Promise<void>;
}

export async function createLedger(cfg: Pick<Config, 'ledger' | 'database'>): Promise<LedgerHandle> {
  switch (cfg.ledger.backend) {
    case 'memory':
      return {
        ledger: new InMemoryAuditLedger(),
        description: 'in-memory (not durable)',
        close: async () => undefined,
      };
    case 'file': {
      const filePath = path.resolve(cfg.ledger.file);
      return {
        ledger: await FileAuditLedger.open(filePath),
        description: `file ${filePath}`,
        close: async () => undefined,
      };
    }
    case 'postgres': {
      const { db, close } = createDatabase(cfg.database.url);
      return {
        ledger: new PostgresAuditLedger(db),
        description: 'postgres audit_records',
        close,
      };
    }
  }
}
