import type { PendingDecision } from '@core/engine';

/** Claims waiting at PENDING_HUMAN, keyed by claim id. Process-local. */
export class PendingStore {
  private readonly pending = new Map<string, PendingDecision>();

  add(decision: PendingDecision): void {
    this.pending.set(decision.claimId, decision);
  }

  get(claimId: string): PendingDecision | undefined {
    return this.pending.get(claimId);
  }

  remove(claimId: string): void {
    this.pending.delete(claimId);
  }

  list(): PendingDecision[] {
    return [...this.pending.values()];
  }

  get size(): number {
    return this.pending.size;
  }
}
