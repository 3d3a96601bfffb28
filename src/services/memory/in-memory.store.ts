import { EngineConfig } from '../../config/engine';
import { BuyerStage, ConversationRecord, ConversationTotals } from '../../types/memory';
import { ConcurrentUpdateError } from '../../utils/errors';
import { CURRENT_SCHEMA_VERSION, MemoryStore, createDefaultRecord, isExpired, normalizeRecord } from './memory.store';

const ACTIVE_WINDOW_MS = 7 * 24 * 60 * 60 * 1000;

/** Process-local store with the same version semantics as the database one. */
export class InMemoryMemoryStore implements MemoryStore {
  private readonly rows = new Map<string, ConversationRecord>();

  constructor(private readonly config: Pick<EngineConfig, 'expiryWindowMs'>) {}

  async load(userId: string, now: Date = new Date()): Promise<ConversationRecord> {
    const row = this.rows.get(userId);
    if (!row) return createDefaultRecord(userId, now);

    if (isExpired(row.lastUpdatedAt, now, this.config.expiryWindowMs)) {
      return createDefaultRecord(userId, now, row.version);
    }
    return normalizeRecord(userId, structuredClone(row), now);
  }

  async upsert(record: ConversationRecord, now: Date = new Date()): Promise<ConversationRecord> {
    const currentVersion = this.rows.get(record.userId)?.version ?? 0;
    if (record.version !== currentVersion) {
      throw new ConcurrentUpdateError(record.userId, record.version);
    }

    const stored: ConversationRecord = {
      ...structuredClone(record),
      lastUpdatedAt: now.toISOString(),
      schemaVersion: CURRENT_SCHEMA_VERSION,
      version: currentVersion + 1,
    };
    this.rows.set(record.userId, stored);
    return structuredClone(stored);
  }

  async delete(userId: string): Promise<boolean> {
    return this.rows.delete(userId);
  }

  async sweepExpired(now: Date = new Date()): Promise<number> {
    let removed = 0;
    for (const [userId, row] of this.rows) {
      if (isExpired(row.lastUpdatedAt, now, this.config.expiryWindowMs)) {
        this.rows.delete(userId);
        removed++;
      }
    }
    return removed;
  }

  async findCompletedRenders(): Promise<ConversationRecord[]> {
    return [...this.rows.values()]
      .filter((row) => row.renderRequested && row.renderStatus === 'complete')
      .sort((a, b) => b.lastUpdatedAt.localeCompare(a.lastUpdatedAt))
      .map((row) => structuredClone(row));
  }

  async totals(now: Date = new Date()): Promise<ConversationTotals> {
    const buyerStages: Partial<Record<BuyerStage, number>> = {};
    let activeUsers7Days = 0;
    let renderRequests = 0;

    for (const row of this.rows.values()) {
      buyerStages[row.buyerStage] = (buyerStages[row.buyerStage] ?? 0) + 1;
      if (row.renderRequested) renderRequests++;
      if (now.getTime() - Date.parse(row.lastUpdatedAt) <= ACTIVE_WINDOW_MS) activeUsers7Days++;
    }

    return { totalUsers: this.rows.size, activeUsers7Days, renderRequests, buyerStages };
  }
}
