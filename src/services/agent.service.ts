import { EngineConfig } from '../config/engine';
import { NotificationJobData } from '../config/queue';
import { CompletionClient, IncomingTurn, TurnResult } from '../types/agent';
import { ConversationRecord, CtaKind, PENDING_OUTCOME } from '../types/memory';
import { ConcurrentUpdateError, ServiceError, ValidationError, errorMessage, toError } from '../utils/errors';
import { logger } from '../utils/logger';
import { buildCompletionMessages } from '../utils/prompts';
import { ContextSummaryService } from './context.service';
import { CtaService, hasAcceptedConsult } from './cta.service';
import { FactExtractionService } from './facts.service';
import { ConversationFlowService } from './flow.service';
import { JourneyService } from './journey.service';
import { MemoryStore, appendInteraction } from './memory/memory.store';
import { PhraseSelector } from './phrase.service';
import { RenderWorkflowService, getRenderStage, renderItem } from './render.service';

export interface StatsInvalidator {
  invalidate(userId: string): Promise<void>;
}

export type NotificationSink = (data: NotificationJobData) => Promise<void>;

export interface AgentDependencies {
  store: MemoryStore;
  completion: CompletionClient;
  phrases: PhraseSelector;
  persona: string;
  config: EngineConfig;
  cache?: StatsInvalidator;
  notify?: NotificationSink;
  flow?: ConversationFlowService;
}

interface UtteranceEffects {
  record: ConversationRecord;
  acceptedCta: CtaKind | null;
}

interface ComposedTurn {
  record: ConversationRecord;
  reply: string;
  delivered: boolean;
  ctaOffered: CtaKind | null;
  renderCompleted: boolean;
}

const RENDER_OR_CONSULT = /\b(?:render\w*|consult\w*)\b/i;

export class AgentService {
  private readonly facts = new FactExtractionService();
  private readonly journey = new JourneyService();
  private readonly summary = new ContextSummaryService();
  private readonly cta: CtaService;
  private readonly render: RenderWorkflowService;
  private readonly flow: ConversationFlowService;

  constructor(private readonly deps: AgentDependencies) {
    this.cta = new CtaService(deps.config);
    this.render = new RenderWorkflowService(this.facts, deps.phrases, deps.config);
    this.flow = deps.flow ?? new ConversationFlowService(deps.phrases);
  }

  /**
   * One chat turn: load, apply the utterance, ask the completion service,
   * compose the reply, persist. The model is called once; a write that
   * loses a version race is replayed against the fresh record.
   */
  async processTurn(turn: IncomingTurn): Promise<TurnResult> {
    const userId = turn.userId.trim();
    const message = turn.message.trim();
    if (!userId) throw new ValidationError('user_id is required');
    if (!message) throw new ValidationError('message is required');

    const now = turn.now ?? new Date();
    let base = await this.load(userId, now);

    const briefing = this.applyUtterance(base, message).record;
    const prompt = buildCompletionMessages({
      persona: this.deps.persona,
      contextSummary: this.summary.summarize(briefing),
      openingLine: this.flow.openingLine(base),
      history: base.interactions,
      historyWindow: this.deps.config.historyWindow,
      utterance: message,
    });

    let completion: string | null = null;
    try {
      completion = await this.deps.completion.complete(prompt);
    } catch (error) {
      logger.error('Completion failed', {
        userId,
        buyerStage: briefing.buyerStage,
        operation: 'complete',
        provider: this.deps.completion.provider,
        error: errorMessage(error),
      });
    }

    const maxAttempts = Math.max(1, this.deps.config.maxPersistAttempts);
    for (let attempt = 1; ; attempt++) {
      const composed = this.composeTurn(base, message, completion, now);
      try {
        const stored = await this.deps.store.upsert(composed.record, now);
        await this.afterPersist(stored, composed);

        const renderStage = getRenderStage(stored);
        logger.info('Turn handled', {
          userId,
          buyerStage: stored.buyerStage,
          engagementLevel: stored.engagementLevel,
          renderStage,
          ctaOffered: composed.ctaOffered,
          delivered: composed.delivered,
          attempt,
        });

        return {
          reply: composed.reply,
          delivered: composed.delivered,
          renderStage,
          ctaOffered: composed.ctaOffered,
          record: stored,
        };
      } catch (error) {
        if (!(error instanceof ConcurrentUpdateError)) {
          logger.error('Failed to persist turn', {
            userId,
            buyerStage: composed.record.buyerStage,
            operation: 'upsert',
            error: errorMessage(error),
          });
          throw error;
        }
        if (attempt >= maxAttempts) {
          logger.error('Gave up persisting turn after version conflicts', { userId, attempts: attempt });
          throw new ServiceError('MemoryStore', 'upsert', toError(error), true);
        }
        logger.warn('Version conflict, replaying turn', { userId, attempt });
        base = await this.load(userId, now);
      }
    }
  }

  /** Mutations that depend only on the user's words. */
  applyUtterance(record: ConversationRecord, message: string): UtteranceEffects {
    const resolved = this.cta.resolvePendingCta(record, message);
    const withFacts: ConversationRecord = {
      ...resolved.record,
      keyFacts: this.facts.extract(resolved.record.keyFacts, message),
    };
    const next: ConversationRecord = {
      ...withFacts,
      buyerStage: this.journey.advanceStage(withFacts, message),
      engagementLevel: this.journey.advanceEngagement(withFacts, message),
    };
    return { record: next, acceptedCta: resolved.accepted };
  }

  private composeTurn(base: ConversationRecord, message: string, completion: string | null, now: Date): ComposedTurn {
    const previousBotText = lastBotText(base);
    const effects = this.applyUtterance(base, message);
    if (effects.acceptedCta) {
      logger.debug('CTA accepted', { userId: base.userId, kind: effects.acceptedCta });
    }
    const renderTurn = this.render.advance(effects.record, message, {
      now,
      acceptedThisTurn: effects.acceptedCta === 'render',
      previousBotText,
    });
    let record = renderTurn.record;
    const timestamp = now.toISOString();

    if (completion === null) {
      const notice = this.deps.phrases.select('tryAgain');
      const reply = renderTurn.message ? `${notice} ${renderTurn.message}` : notice;
      record = appendInteraction(record, { timestamp, userText: message, botText: null }, this.deps.config.maxInteractions);
      return { record, reply, delivered: false, ctaOffered: null, renderCompleted: renderTurn.completed };
    }

    const parts = [completion];
    if (this.flow.wantsCredibility(message)) {
      parts.push(this.flow.credibility(previousBotText));
    }
    const philosophy = this.flow.philosophyLine(completion, record.keyFacts, previousBotText);
    if (philosophy) parts.push(philosophy);
    if (renderTurn.message) parts.push(renderTurn.message);

    let reply = parts.join(' ');
    let ctaOffered: CtaKind | null = null;

    const decision = this.cta.shouldAttemptCta(record, now);
    if (decision.kind !== 'none' && !renderTurn.message && !RENDER_OR_CONSULT.test(reply)) {
      const blocked =
        (decision.kind === 'render' && record.renderRequested) || (decision.kind === 'consult' && hasAcceptedConsult(record));
      if (!blocked) {
        reply += `\n\n${this.flow.ctaMessage(record, decision.kind, previousBotText)}`;
        record = this.cta.recordCtaAttempt(record, decision.kind, PENDING_OUTCOME, now);
        if (decision.kind === 'render') {
          record = { ...record, renderDetails: { ...record.renderDetails, requestedItem: renderItem(record.keyFacts) } };
        }
        ctaOffered = decision.kind;
      }
    }

    if (!ctaOffered && !renderTurn.message) {
      const recentUserTexts = [...record.interactions.map((interaction) => interaction.userText), message];
      if (this.flow.isStalled(recentUserTexts)) {
        reply += ` ${this.flow.restart(record.keyFacts, previousBotText)}`;
      } else if (!reply.trimEnd().endsWith('?')) {
        const followup = this.flow.followup(record, previousBotText);
        if (followup) reply += ` ${followup}`;
      }
    }

    record = appendInteraction(record, { timestamp, userText: message, botText: reply }, this.deps.config.maxInteractions);
    return { record, reply, delivered: true, ctaOffered, renderCompleted: renderTurn.completed };
  }

  private async afterPersist(stored: ConversationRecord, composed: ComposedTurn): Promise<void> {
    if (this.deps.cache) {
      await this.deps.cache.invalidate(stored.userId);
    }

    if (composed.renderCompleted && this.deps.notify) {
      await this.deps.notify({
        type: 'render_request_complete',
        userId: stored.userId,
        requestedItem: stored.renderDetails.requestedItem ?? renderItem(stored.keyFacts),
        name: stored.contactInfo.name ?? '',
        email: stored.contactInfo.email ?? '',
        phone: stored.contactInfo.phone ?? '',
        readyBy: stored.renderDetails.readyBy ?? null,
      });
    }
  }

  private async load(userId: string, now: Date): Promise<ConversationRecord> {
    try {
      return await this.deps.store.load(userId, now);
    } catch (error) {
      logger.error('Failed to load memory', { userId, operation: 'load', error: errorMessage(error) });
      throw error;
    }
  }
}

function lastBotText(record: ConversationRecord): string | null {
  const last = record.interactions[record.interactions.length - 1];
  return last ? last.botText : null;
}
