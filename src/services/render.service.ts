import { EngineConfig } from '../config/engine';
import { CONTACT_FIELDS, ContactField, ConversationRecord, KeyFacts, RenderStage } from '../types/memory';
import { addBusinessDays } from '../utils/businessHours';
import { logger } from '../utils/logger';
import { FactExtractionService, mergeContactInfo, missingContactFields } from './facts.service';
import { PhraseSelector } from './phrase.service';

type RenderView = Pick<ConversationRecord, 'renderRequested' | 'renderStatus' | 'contactInfo'>;

/** Pure projection of the workflow position from stored fields alone. */
export function getRenderStage(record: RenderView): RenderStage {
  if (!record.renderRequested) return 'not_requested';
  if (record.renderStatus === 'complete') return 'complete';
  if (record.renderStatus === 'in_progress') return 'in_progress';

  const present = CONTACT_FIELDS.filter((field) => Boolean(record.contactInfo[field]));
  if (present.length === CONTACT_FIELDS.length) return 'complete';
  if (record.renderStatus === 'collecting_info' || present.length > 0) return 'collecting_info';
  return 'info_needed';
}

export function renderItem(facts: KeyFacts): string {
  const size = facts.preferredSize;
  const feature = facts.features?.[0];

  if (size && feature) return `${size} pool with ${feature}`;
  if (size) return `${size} cocktail pool`;
  if (feature) return `cocktail pool with ${feature}`;
  return 'cocktail pool setup';
}

export interface RenderTurnOptions {
  now: Date;
  /** the render offer was accepted by this very utterance */
  acceptedThisTurn: boolean;
  previousBotText?: string | null;
}

export interface RenderTurn {
  record: ConversationRecord;
  message: string | null;
  /** contact collection finished on this turn */
  completed: boolean;
}

export class RenderWorkflowService {
  constructor(
    private readonly facts: FactExtractionService,
    private readonly phrases: PhraseSelector,
    private readonly config: EngineConfig
  ) {}

  advance(record: ConversationRecord, utterance: string, options: RenderTurnOptions): RenderTurn {
    const stage = getRenderStage(record);

    switch (stage) {
      case 'not_requested':
      case 'in_progress':
      case 'complete':
        return { record, message: null, completed: false };

      case 'info_needed':
        if (options.acceptedThisTurn) {
          const requested: ConversationRecord = {
            ...record,
            renderDetails: {
              ...record.renderDetails,
              requestedItem: record.renderDetails.requestedItem ?? renderItem(record.keyFacts),
            },
          };
          const avoid = options.previousBotText;
          const message = `${this.phrases.select('contactRequest', { avoid })} ${this.phrases.select('renderTimeline', { avoid })}`;
          return { record: requested, message, completed: false };
        }
        return this.collect({ ...record, renderStatus: 'collecting_info' }, utterance, options);

      case 'collecting_info':
        return this.collect(record, utterance, options);
    }
  }

  private collect(record: ConversationRecord, utterance: string, options: RenderTurnOptions): RenderTurn {
    const avoid = options.previousBotText;
    const hadAnyField = CONTACT_FIELDS.some((field) => Boolean(record.contactInfo[field]));
    const contactInfo = mergeContactInfo(record.contactInfo, this.facts.extractContactInfo(utterance));
    const missing = missingContactFields(contactInfo);

    const renderDetails = {
      ...record.renderDetails,
      requestedItem: record.renderDetails.requestedItem ?? renderItem(record.keyFacts),
    };

    if (missing.length === 0) {
      const completed: ConversationRecord = {
        ...record,
        contactInfo,
        renderStatus: 'complete',
        renderDetails: {
          ...renderDetails,
          infoCompletedAt: options.now.toISOString(),
          readyBy: addBusinessDays(options.now, this.config.renderTurnaroundBusinessDays, this.config.businessTimezone),
        },
      };
      logger.info('Render contact collection complete', { userId: record.userId, readyBy: completed.renderDetails.readyBy });
      return { record: completed, message: this.phrases.select('renderComplete', { avoid }), completed: true };
    }

    const next: ConversationRecord = { ...record, contactInfo, renderDetails };

    if (this.shouldOfferPartial(record, missing, hadAnyField)) {
      return { record: next, message: this.phrases.select('partialInfoOffer', { avoid }), completed: false };
    }

    let message = this.collectionMessage(missing, avoid);
    if (missing.length >= 3) {
      message += ` ${this.phrases.select('softContact', { avoid })}`;
    }
    return { record: next, message, completed: false };
  }

  /** One-time offer: only possible while nothing had been captured before this turn. */
  private shouldOfferPartial(record: ConversationRecord, missing: ContactField[], hadAnyField: boolean): boolean {
    if (hadAnyField || missing.length > 2) return false;
    if (record.engagementLevel < 2) return false;
    return missing.includes('name') || missing.includes('email');
  }

  collectionMessage(missing: ContactField[], avoid?: string | null): string {
    if (missing.length === CONTACT_FIELDS.length) {
      return this.phrases.select('contactRequest', { avoid });
    }
    if (missing.length === 1) {
      return this.phrases.bank.contactFieldPrompts[missing[0]];
    }
    return this.phrases.select('contactMissing', { avoid, vars: { fields: missing.join(', ') } });
  }
}
