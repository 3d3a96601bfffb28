import { QueryResult, QueryResultRow } from 'pg';

jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

// Mock the pool module so no connection is attempted
jest.mock('../../src/config/database', () => ({
  query: jest.fn(),
}));

import { query } from '../../src/config/database';
import { PostgresMemoryStore } from '../../src/services/memory/postgres.store';
import { createDefaultRecord } from '../../src/services/memory/memory.store';
import { ConcurrentUpdateError, ServiceError } from '../../src/utils/errors';
import { logger } from '../../src/utils/logger';
import { NOW, makeRecord } from '../helpers';

const DAY = 24 * 60 * 60 * 1000;
const mockQuery = jest.mocked(query);

function result(rows: QueryResultRow[], rowCount: number = rows.length): QueryResult {
  return { rows, rowCount, command: '', oid: 0, fields: [] };
}

function makeRow(overrides: QueryResultRow = {}): QueryResultRow {
  return {
    user_id: 'user-1',
    created_at: new Date('2024-06-01T10:00:00Z'),
    last_updated_at: new Date('2024-06-05T14:00:00Z'),
    interactions: [{ timestamp: '2024-06-05T14:00:00.000Z', userText: 'hi', botText: 'hello' }, { bogus: true }],
    key_facts: { preferredSize: '12x24', features: ['bench', 'bench'], focus: 'underwater' },
    buyer_stage: 'weird',
    engagement_level: 9,
    render_requested: true,
    render_status: 'collecting_info',
    render_details: {},
    contact_info: { name: 'Jordan', email: '' },
    cta_attempts: [],
    last_cta_attempt_at: null,
    schema_version: 1,
    version: 3,
    ...overrides,
  };
}

describe('PostgresMemoryStore', () => {
  const store = new PostgresMemoryStore({ expiryWindowMs: 90 * DAY });

  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('load', () => {
    it('should return defaults when no row exists', async () => {
      mockQuery.mockResolvedValueOnce(result([]));

      expect(await store.load('user-1', NOW)).toEqual(createDefaultRecord('user-1', NOW));
      expect(mockQuery).toHaveBeenCalledWith(expect.stringContaining('FROM user_memories WHERE user_id = $1'), ['user-1']);
    });

    it('should normalize a stored row', async () => {
      mockQuery.mockResolvedValueOnce(result([makeRow()]));

      expect(await store.load('user-1', NOW)).toEqual({
        userId: 'user-1',
        createdAt: '2024-06-01T10:00:00.000Z',
        lastUpdatedAt: '2024-06-05T14:00:00.000Z',
        interactions: [{ timestamp: '2024-06-05T14:00:00.000Z', userText: 'hi', botText: 'hello' }],
        keyFacts: { preferredSize: '12x24', features: ['bench'] },
        buyerStage: 'browsing',
        engagementLevel: 5,
        renderRequested: true,
        renderStatus: 'collecting_info',
        renderDetails: {},
        contactInfo: { name: 'Jordan' },
        ctaAttempts: [],
        lastCtaAttemptAt: null,
        schemaVersion: 1,
        version: 3,
      });
    });

    it('should treat an expired row as new but keep its version', async () => {
      mockQuery.mockResolvedValueOnce(result([makeRow({ last_updated_at: new Date(NOW.getTime() - 100 * DAY) })]));

      expect(await store.load('user-1', NOW)).toEqual(createDefaultRecord('user-1', NOW, 3));
    });

    it('should wrap driver failures', async () => {
      mockQuery.mockRejectedValueOnce(new Error('connection refused'));

      await expect(store.load('user-1', NOW)).rejects.toBeInstanceOf(ServiceError);
      expect(logger.error).toHaveBeenCalledWith('Memory store operation failed', {
        operation: 'load',
        userId: 'user-1',
        error: 'connection refused',
      });
    });
  });

  describe('upsert', () => {
    it('should insert a first write', async () => {
      mockQuery.mockResolvedValueOnce(result([makeRow({ version: 1 })]));

      const stored = await store.upsert(makeRecord(), NOW);

      const [sql, params] = mockQuery.mock.calls[0];
      expect(sql).toContain('ON CONFLICT (user_id) DO NOTHING');
      expect(params).toHaveLength(14);
      expect(params?.[0]).toBe('user-1');
      expect(params?.[2]).toBe(NOW.toISOString());
      expect(stored.version).toBe(1);
    });

    it('should update only the row at the expected version', async () => {
      mockQuery.mockResolvedValueOnce(result([makeRow({ version: 3 })]));

      await store.upsert(makeRecord({ version: 2 }), NOW);

      const [sql, params] = mockQuery.mock.calls[0];
      expect(sql).toContain('WHERE user_id = $1 AND version = $15');
      expect(params?.[14]).toBe(2);
    });

    it('should report a lost race as a concurrent update', async () => {
      mockQuery.mockResolvedValueOnce(result([]));

      await expect(store.upsert(makeRecord({ version: 2 }), NOW)).rejects.toBeInstanceOf(ConcurrentUpdateError);
    });
  });

  it('should report whether a row was deleted', async () => {
    mockQuery.mockResolvedValueOnce(result([], 1)).mockResolvedValueOnce(result([], 0));

    expect(await store.delete('user-1')).toBe(true);
    expect(await store.delete('user-1')).toBe(false);
  });

  it('should sweep rows older than the expiry window', async () => {
    mockQuery.mockResolvedValueOnce(result([], 4));

    expect(await store.sweepExpired(NOW)).toBe(4);
    expect(mockQuery).toHaveBeenCalledWith('DELETE FROM user_memories WHERE last_updated_at < $1', [
      new Date(NOW.getTime() - 90 * DAY).toISOString(),
    ]);
  });

  it('should map totals from count rows', async () => {
    mockQuery
      .mockResolvedValueOnce(result([{ total_users: '5', active_users: '2', render_requests: '1' }]))
      .mockResolvedValueOnce(result([{ buyer_stage: 'browsing', count: '3' }, { buyer_stage: 'ready', count: '2' }]));

    expect(await store.totals(NOW)).toEqual({
      totalUsers: 5,
      activeUsers7Days: 2,
      renderRequests: 1,
      buyerStages: { browsing: 3, ready: 2 },
    });
  });
});
