import { EngineConfig } from '../config/engine';
import {
  ContactField,
  ContactInfo,
  ConversationRecord,
  ConversationTotals,
  CtaKind,
  MemoryStats,
  RenderDetails,
  RenderExport,
  RenderStage,
} from '../types/memory';
import { ConcurrentUpdateError, NotFoundError, ServiceError, ValidationError, toError } from '../utils/errors';
import { logger } from '../utils/logger';
import { StatsInvalidator } from './agent.service';
import { ContextSummaryService } from './context.service';
import { CtaService } from './cta.service';
import { missingContactFields } from './facts.service';
import { ConversationFlowService } from './flow.service';
import { MemoryStore } from './memory/memory.store';
import { getRenderStage, renderItem } from './render.service';

export interface StatsCache extends StatsInvalidator {
  getStats(userId: string): Promise<MemoryStats | null>;
  setStats(stats: MemoryStats): Promise<void>;
}

export interface RenderStatusView {
  userId: string;
  renderRequested: boolean;
  renderStage: RenderStage;
  contactInfo: ContactInfo;
  missingFields: ContactField[];
  renderDetails: RenderDetails;
}

export interface CtaCheck {
  userId: string;
  shouldAttemptCta: boolean;
  ctaType: CtaKind | 'none';
  buyerStage: ConversationRecord['buyerStage'];
  engagementLevel: number;
  lastCtaAttemptAt: string | null;
  ctaAttemptsCount: number;
  sampleCtaMessage?: string;
}

export type FulfilmentStatus = 'in_progress' | 'complete';

export class AdminService {
  private readonly summary = new ContextSummaryService();
  private readonly cta: CtaService;

  constructor(
    private readonly store: MemoryStore,
    private readonly flow: ConversationFlowService,
    private readonly config: EngineConfig,
    private readonly cache?: StatsCache
  ) {
    this.cta = new CtaService(config);
  }

  async getStats(userId: string, now: Date = new Date()): Promise<MemoryStats> {
    const cached = this.cache ? await this.cache.getStats(userId) : null;
    if (cached) return cached;

    const record = await this.loadExisting(userId, now);
    const stats: MemoryStats = {
      userId,
      totalInteractions: record.interactions.length,
      keyFacts: record.keyFacts,
      buyerStage: record.buyerStage,
      engagementLevel: record.engagementLevel,
      renderRequested: record.renderRequested,
      renderStatus: record.renderStatus,
      renderStage: getRenderStage(record),
      ctaAttempts: record.ctaAttempts.length,
      lastActive: record.lastUpdatedAt,
      contextSummary: this.summary.summarize(record),
    };

    if (this.cache) await this.cache.setStats(stats);
    return stats;
  }

  async reset(userId: string): Promise<boolean> {
    const deleted = await this.store.delete(userId);
    if (this.cache) await this.cache.invalidate(userId);
    logger.info('Memory reset', { userId, deleted });
    return deleted;
  }

  async sweep(now: Date = new Date()): Promise<number> {
    return this.store.sweepExpired(now);
  }

  async exportCompletedRenders(): Promise<RenderExport[]> {
    const records = await this.store.findCompletedRenders();
    return records.map((record) => ({
      userId: record.userId,
      name: record.contactInfo.name ?? '',
      email: record.contactInfo.email ?? '',
      phone: record.contactInfo.phone ?? '',
      photoProvided: Boolean(record.contactInfo.photo),
      preferredSize: record.keyFacts.preferredSize ?? '',
      focus: record.keyFacts.focus ?? '',
      features: record.keyFacts.features ?? [],
      budgetConscious: record.keyFacts.budgetConscious ?? false,
      requestedItem: record.renderDetails.requestedItem ?? renderItem(record.keyFacts),
      readyBy: record.renderDetails.readyBy ?? null,
      createdAt: record.createdAt,
      lastUpdatedAt: record.lastUpdatedAt,
    }));
  }

  async renderStatus(userId: string, now: Date = new Date()): Promise<RenderStatusView> {
    const record = await this.store.load(userId, now);
    return {
      userId,
      renderRequested: record.renderRequested,
      renderStage: getRenderStage(record),
      contactInfo: record.contactInfo,
      missingFields: missingContactFields(record.contactInfo),
      renderDetails: record.renderDetails,
    };
  }

  /** Evaluates the gate without recording anything. */
  async checkCta(userId: string, now: Date = new Date()): Promise<CtaCheck> {
    const record = await this.store.load(userId, now);
    const decision = this.cta.shouldAttemptCta(record, now);

    const result: CtaCheck = {
      userId,
      shouldAttemptCta: decision.attempt,
      ctaType: decision.kind,
      buyerStage: record.buyerStage,
      engagementLevel: record.engagementLevel,
      lastCtaAttemptAt: record.lastCtaAttemptAt,
      ctaAttemptsCount: record.ctaAttempts.length,
    };
    if (decision.kind !== 'none') {
      result.sampleCtaMessage = this.flow.ctaMessage(record, decision.kind);
    }
    return result;
  }

  /** Records an answer given outside the chat, such as a reply to a follow-up email. */
  async recordCtaResponse(userId: string, kind: CtaKind, response: string, now: Date = new Date()): Promise<ConversationRecord> {
    if (!response.trim()) throw new ValidationError('response is required');
    return this.mutate(userId, now, (record) => this.cta.recordCtaAttempt(record, kind, response.trim().toLowerCase(), now));
  }

  /** Out-of-band fulfilment update from the render team. */
  async setRenderStatus(userId: string, status: FulfilmentStatus, now: Date = new Date()): Promise<ConversationRecord> {
    return this.mutate(userId, now, (record) => {
      if (record.version === 0) throw new NotFoundError(`No conversation found for ${userId}`);
      if (!record.renderRequested) throw new ValidationError('No render has been requested for this user');
      return { ...record, renderStatus: status };
    });
  }

  async conversationStats(now: Date = new Date()): Promise<ConversationTotals> {
    return this.store.totals(now);
  }

  private async loadExisting(userId: string, now: Date): Promise<ConversationRecord> {
    const record = await this.store.load(userId, now);
    if (record.version === 0) throw new NotFoundError(`No conversation found for ${userId}`);
    return record;
  }

  private async mutate(
    userId: string,
    now: Date,
    change: (record: ConversationRecord) => ConversationRecord
  ): Promise<ConversationRecord> {
    const maxAttempts = Math.max(1, this.config.maxPersistAttempts);
    for (let attempt = 1; ; attempt++) {
      const record = await this.store.load(userId, now);
      try {
        const stored = await this.store.upsert(change(record), now);
        if (this.cache) await this.cache.invalidate(userId);
        return stored;
      } catch (error) {
        if (!(error instanceof ConcurrentUpdateError)) throw error;
        if (attempt >= maxAttempts) {
          throw new ServiceError('MemoryStore', 'upsert', toError(error), true);
        }
        logger.warn('Version conflict on admin update, retrying', { userId, attempt });
      }
    }
  }
}
