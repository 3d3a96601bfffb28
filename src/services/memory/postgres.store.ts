import { query } from '../../config/database';
import { EngineConfig } from '../../config/engine';
import { BUYER_STAGES, BuyerStage, ConversationRecord, ConversationTotals } from '../../types/memory';
import { ConcurrentUpdateError, ServiceError, toError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { CURRENT_SCHEMA_VERSION, MemoryStore, createDefaultRecord, isExpired, normalizeRecord } from './memory.store';

interface MemoryRow {
  user_id: string;
  created_at: Date | string | null;
  last_updated_at: Date | string | null;
  interactions: unknown;
  key_facts: unknown;
  buyer_stage: string | null;
  engagement_level: number | null;
  render_requested: boolean | null;
  render_status: string | null;
  render_details: unknown;
  contact_info: unknown;
  cta_attempts: unknown;
  last_cta_attempt_at: Date | string | null;
  schema_version: number | null;
  version: number | null;
}

const COLUMNS = `user_id, created_at, last_updated_at, interactions, key_facts, buyer_stage,
  engagement_level, render_requested, render_status, render_details, contact_info,
  cta_attempts, last_cta_attempt_at, schema_version, version`;

function isoOrNull(value: Date | string | null): string | null {
  if (value === null) return null;
  return value instanceof Date ? value.toISOString() : value;
}

export function rowToRecord(row: MemoryRow, now: Date): ConversationRecord {
  return normalizeRecord(
    row.user_id,
    {
      createdAt: isoOrNull(row.created_at),
      lastUpdatedAt: isoOrNull(row.last_updated_at),
      interactions: row.interactions,
      keyFacts: row.key_facts,
      buyerStage: row.buyer_stage,
      engagementLevel: row.engagement_level,
      renderRequested: row.render_requested,
      renderStatus: row.render_status,
      renderDetails: row.render_details,
      contactInfo: row.contact_info,
      ctaAttempts: row.cta_attempts,
      lastCtaAttemptAt: isoOrNull(row.last_cta_attempt_at),
      version: row.version,
    },
    now
  );
}

function recordParams(record: ConversationRecord, now: Date): unknown[] {
  return [
    record.userId,
    record.createdAt,
    now.toISOString(),
    JSON.stringify(record.interactions),
    JSON.stringify(record.keyFacts),
    record.buyerStage,
    record.engagementLevel,
    record.renderRequested,
    record.renderStatus,
    JSON.stringify(record.renderDetails),
    JSON.stringify(record.contactInfo),
    JSON.stringify(record.ctaAttempts),
    record.lastCtaAttemptAt,
    CURRENT_SCHEMA_VERSION,
  ];
}

export class PostgresMemoryStore implements MemoryStore {
  constructor(private readonly config: Pick<EngineConfig, 'expiryWindowMs'>) {}

  async load(userId: string, now: Date = new Date()): Promise<ConversationRecord> {
    const result = await this.run('load', userId, () =>
      query<MemoryRow>(`SELECT ${COLUMNS} FROM user_memories WHERE user_id = $1`, [userId])
    );

    const row = result.rows[0];
    if (!row) return createDefaultRecord(userId, now);

    const record = rowToRecord(row, now);
    if (isExpired(record.lastUpdatedAt, now, this.config.expiryWindowMs)) {
      logger.debug('Expired memory treated as new', { userId, lastUpdatedAt: record.lastUpdatedAt });
      return createDefaultRecord(userId, now, record.version);
    }
    return record;
  }

  /**
   * Single-statement write. Version 0 inserts and fails if a row appeared in
   * the meantime; any other version updates only the row still at that version.
   */
  async upsert(record: ConversationRecord, now: Date = new Date()): Promise<ConversationRecord> {
    const params = recordParams(record, now);

    const result =
      record.version === 0
        ? await this.run('insert', record.userId, () =>
            query<MemoryRow>(
              `INSERT INTO user_memories (${COLUMNS})
               VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, 1)
               ON CONFLICT (user_id) DO NOTHING
               RETURNING ${COLUMNS}`,
              params
            )
          )
        : await this.run('update', record.userId, () =>
            query<MemoryRow>(
              `UPDATE user_memories SET
                 last_updated_at = $3, interactions = $4, key_facts = $5, buyer_stage = $6,
                 engagement_level = $7, render_requested = $8, render_status = $9,
                 render_details = $10, contact_info = $11, cta_attempts = $12,
                 last_cta_attempt_at = $13, schema_version = $14,
                 created_at = $2, version = version + 1
               WHERE user_id = $1 AND version = $15
               RETURNING ${COLUMNS}`,
              [...params, record.version]
            )
          );

    const row = result.rows[0];
    if (!row) {
      throw new ConcurrentUpdateError(record.userId, record.version);
    }
    return rowToRecord(row, now);
  }

  async delete(userId: string): Promise<boolean> {
    const result = await this.run('delete', userId, () =>
      query('DELETE FROM user_memories WHERE user_id = $1', [userId])
    );
    return (result.rowCount ?? 0) > 0;
  }

  /** The cutoff is checked by the DELETE itself, so a row refreshed meanwhile survives. */
  async sweepExpired(now: Date = new Date()): Promise<number> {
    const cutoff = new Date(now.getTime() - this.config.expiryWindowMs);
    const result = await this.run('sweepExpired', null, () =>
      query('DELETE FROM user_memories WHERE last_updated_at < $1', [cutoff.toISOString()])
    );
    const removed = result.rowCount ?? 0;
    if (removed > 0) {
      logger.info('Expired memories removed', { removed, cutoff: cutoff.toISOString() });
    }
    return removed;
  }

  async findCompletedRenders(): Promise<ConversationRecord[]> {
    const now = new Date();
    const result = await this.run('findCompletedRenders', null, () =>
      query<MemoryRow>(
        `SELECT ${COLUMNS} FROM user_memories
         WHERE render_requested = TRUE AND render_status = 'complete'
         ORDER BY last_updated_at DESC`
      )
    );
    return result.rows.map((row) => rowToRecord(row, now));
  }

  async totals(now: Date = new Date()): Promise<ConversationTotals> {
    const weekAgo = new Date(now.getTime() - 7 * 24 * 60 * 60 * 1000).toISOString();

    const [summary, stages] = await Promise.all([
      this.run('totals', null, () =>
        query<{ total_users: string; active_users: string; render_requests: string }>(
          `SELECT COUNT(*) AS total_users,
                  COUNT(*) FILTER (WHERE last_updated_at >= $1) AS active_users,
                  COUNT(*) FILTER (WHERE render_requested) AS render_requests
           FROM user_memories`,
          [weekAgo]
        )
      ),
      this.run('totals', null, () =>
        query<{ buyer_stage: string; count: string }>(
          'SELECT buyer_stage, COUNT(*) AS count FROM user_memories GROUP BY buyer_stage'
        )
      ),
    ]);

    const buyerStages: Partial<Record<BuyerStage, number>> = {};
    for (const row of stages.rows) {
      const stage = BUYER_STAGES.find((known) => known === row.buyer_stage);
      if (stage) buyerStages[stage] = Number(row.count);
    }

    const counts = summary.rows[0];
    return {
      totalUsers: Number(counts?.total_users ?? 0),
      activeUsers7Days: Number(counts?.active_users ?? 0),
      renderRequests: Number(counts?.render_requests ?? 0),
      buyerStages,
    };
  }

  /** Wraps driver failures as retryable ServiceErrors with diagnostic context. */
  private async run<T>(operation: string, userId: string | null, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (error) {
      logger.error('Memory store operation failed', { operation, userId, error: toError(error).message });
      throw new ServiceError('MemoryStore', operation, toError(error), true);
    }
  }
}
