// Write-ahead JSON-lines audit ledger. One record per line, fsync per append.

import { mkdir, open, readFile, type FileHandle } from 'fs/promises';
import path from 'path';
import { describeError } from './errors';
import { deepFreeze } from './immutable';
import {
  SequencedAuditLedger,
  auditRecordSchema,
  verifyRecords,
  type AuditRecord,
  type LedgerVerification,
} from './ledger';

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

async function readExisting(filePath: string): Promise<AuditRecord[]> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (err) {
    if (isMissingFile(err)) return [];
    throw err;
  }

  const records: AuditRecord[] = [];
  const lines = raw.split('\n');
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (line === '') continue;
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (err) {
      throw new Error(`${filePath}:${i + 1}: invalid JSON (${describeError(err)})`);
    }
    const result = auditRecordSchema.safeParse(parsed);
    if (!result.success) {
      throw new Error(`${filePath}:${i + 1}: not an audit record (${result.error.message})`);
    }
    records.push(deepFreeze(result.data));
  }
  return records;
}

export class FileAuditLedger extends SequencedAuditLedger {
  private readonly filePath: string;
  private readonly records: AuditRecord[];
  // Set when a failed append could not be rolled back; the file tail is unknown.
  private poisoned = false;

  private constructor(filePath: string, records: AuditRecord[]) {
    super();
    this.filePath = filePath;
    this.records = records;
    const last = records.at(-1);
    if (last) {
      this.lastSequence = last.sequenceNumber;
      this.lastHash = last.hash;
    }
  }

  /**
   * Open (or create) the ledger file, replaying and verifying every stored
   * record. A broken hash chain refuses to open.
   */
  static async open(filePath: string): Promise<FileAuditLedger> {
    await mkdir(path.dirname(filePath), { recursive: true });
    const records = await readExisting(filePath);
    const verification = verifyRecords(records);
    if (!verification.valid) {
      throw new Error(
        `Audit ledger ${filePath} failed verification at sequence ${verification.brokenAt}: ${verification.reason}`,
      );
    }
    return new FileAuditLedger(filePath, records);
  }

  /**
   * Append one line and fsync it. On failure the file is truncated back to
   * its previous length, so a record is either fully stored or absent.
   */
  protected async persist(record: AuditRecord): Promise<void> {
    if (this.poisoned) {
      throw new Error(
        `Audit ledger ${this.filePath} could not be restored after a failed append; refusing further writes`,
      );
    }

    const handle = await open(this.filePath, 'a');
    try {
      const { size } = await handle.stat();
      try {
        await handle.appendFile(`${JSON.stringify(record)}\n`, 'utf-8');
        await handle.sync();
      } catch (err) {
        await this.rollback(handle, size);
        throw err;
      }
    } finally {
      await handle.close();
    }
    this.records.push(record);
  }

  private async rollback(handle: FileHandle, size: number): Promise<void> {
    try {
      await handle.truncate(size);
      await handle.sync();
    } catch (err) {
      this.poisoned = true;
      console.error(`[LEDGER] Could not roll back ${this.filePath}: ${describeError(err)}`);
    }
  }

  async readChain(claimId: string): Promise<readonly AuditRecord[]> {
    return this.records.filter((r) => r.claimId === claimId);
  }

  async readAll(fromSequence = 1): Promise<readonly AuditRecord[]> {
    return this.records.filter((r) => r.sequenceNumber >= fromSequence);
  }

  async verify(): Promise<LedgerVerification> {
    return verifyRecords(await readExisting(this.filePath));
  }
}
