import { z } from 'zod';
import { redis } from '../config/redis';
import { BUYER_STAGES, MemoryStats, RENDER_STAGES, RENDER_STATUSES } from '../types/memory';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { keyFactsSchema } from './memory/memory.store';

const CACHE_TTL = 60; // seconds
const KEY_PREFIX = 'memstats:';

const memoryStatsSchema = z.object({
  userId: z.string(),
  totalInteractions: z.number(),
  keyFacts: keyFactsSchema,
  buyerStage: z.enum(BUYER_STAGES),
  engagementLevel: z.number(),
  renderRequested: z.boolean(),
  renderStatus: z.enum(RENDER_STATUSES).nullable(),
  renderStage: z.enum(RENDER_STAGES),
  ctaAttempts: z.number(),
  lastActive: z.string(),
  contextSummary: z.string(),
});

/** Short-lived cache of the read-only stats projection. Failures never reach callers. */
export class CacheService {
  async getStats(userId: string): Promise<MemoryStats | null> {
    try {
      const data = await redis.get(`${KEY_PREFIX}${userId}`);
      if (!data) return null;
      const parsed = memoryStatsSchema.safeParse(JSON.parse(data));
      return parsed.success ? parsed.data : null;
    } catch (error) {
      logger.warn('Cache get failed', { userId, error: errorMessage(error) });
      return null;
    }
  }

  async setStats(stats: MemoryStats): Promise<void> {
    try {
      await redis.set(`${KEY_PREFIX}${stats.userId}`, JSON.stringify(stats), { EX: CACHE_TTL });
    } catch (error) {
      logger.warn('Cache set failed', { userId: stats.userId, error: errorMessage(error) });
    }
  }

  async invalidate(userId: string): Promise<void> {
    try {
      await redis.del(`${KEY_PREFIX}${userId}`);
    } catch (error) {
      logger.warn('Cache invalidate failed', { userId, error: errorMessage(error) });
    }
  }
}
