import { CtaKind, ConversationRecord, KeyFacts } from '../types/memory';
import { countFacts } from './journey.service';
import { PhraseSelector } from './phrase.service';
import { renderItem } from './render.service';

const CREDIBILITY_SIGNAL =
  /\b(?:experience\w*|qualified|certified|professional|expertise|quality|trust\w*|credentials|builders?|years|reputation)\b/i;

const MATERIALS_TOPIC = /\b(?:costs?|price\w*|budget\w*|materials?)\b/i;
const LIGHTING_TOPIC = /\blighting\b/i;
const SEATING_TOPIC = /\b(?:tanning ledge|bench\w*|seating)\b/i;
const WATER_TOPIC = /\b(?:fountains?|jets?|waterfalls?|water features?|spillover)\b/i;
const GEOMETRY_TOPIC = /\b(?:shapes?|geometric|rectangle\w*|modern|layout)\b/i;

const STALL_WINDOW = 3;
const SHORT_REPLY_WORDS = 3;

/** Probabilities for the optional flourishes added to a reply. */
export interface FlourishRates {
  materials: number;
  lighting: number;
  seating: number;
  water: number;
  geometry: number;
  followup: number;
}

export const DEFAULT_FLOURISH_RATES: FlourishRates = Object.freeze({
  materials: 0.3,
  lighting: 0.4,
  seating: 0.3,
  water: 0.3,
  geometry: 0.2,
  followup: 0.6,
});

export class ConversationFlowService {
  constructor(
    private readonly phrases: PhraseSelector,
    private readonly rates: FlourishRates = DEFAULT_FLOURISH_RATES
  ) {}

  /** Line handed to the completion call for returning users. */
  openingLine(record: ConversationRecord): string | null {
    if (record.renderStatus === 'in_progress') {
      return this.phrases.select('renderInProgress');
    }
    if (record.interactions.length > 2) {
      return this.phrases.select('reengagement');
    }
    return null;
  }

  ctaMessage(record: Pick<ConversationRecord, 'keyFacts'>, kind: CtaKind, avoid?: string | null): string {
    if (kind === 'render') {
      return this.phrases.select('render', { avoid, vars: { item: renderItem(record.keyFacts) } });
    }
    const base = this.phrases.select('consult', { avoid });
    const focus = record.keyFacts.focus;
    return focus ? `${base} ${this.phrases.bank.consultFocus[focus]}` : base;
  }

  wantsCredibility(utterance: string): boolean {
    return CREDIBILITY_SIGNAL.test(utterance);
  }

  credibility(avoid?: string | null): string {
    return this.phrases.select('credibility', { avoid });
  }

  /** At most one philosophy line, keyed on what the reply talks about. */
  philosophyLine(reply: string, facts: KeyFacts, avoid?: string | null): string | null {
    if (MATERIALS_TOPIC.test(reply) && this.phrases.chance(this.rates.materials)) {
      return this.phrases.philosophy('materials_that_last', { avoid });
    }
    if (LIGHTING_TOPIC.test(reply) && this.phrases.chance(this.rates.lighting)) {
      return this.phrases.philosophy('lighting_mood', { avoid });
    }
    if (SEATING_TOPIC.test(reply) && this.phrases.chance(this.rates.seating)) {
      const bank = this.phrases.bank.purposeByFocus;
      const purpose = facts.focus ? bank[facts.focus] : bank.default;
      const feature = /\bledge\b/i.test(reply) ? 'tanning ledge' : 'bench seating';
      return this.phrases.philosophy('purpose_driven', { avoid, vars: { feature, purpose } });
    }
    if (WATER_TOPIC.test(reply) && this.phrases.chance(this.rates.water)) {
      return this.phrases.philosophy('water_feature', { avoid });
    }
    if (GEOMETRY_TOPIC.test(reply) && this.phrases.chance(this.rates.geometry)) {
      return this.phrases.philosophy('clean_geometry', { avoid });
    }
    return null;
  }

  followup(record: ConversationRecord, avoid?: string | null): string | null {
    if (!this.phrases.chance(this.rates.followup)) return null;

    const facts = record.keyFacts;
    switch (record.buyerStage) {
      case 'browsing':
        if (record.interactions.length <= 3) return this.phrases.followup('early', { avoid });
        break;
      case 'interested':
        if (!facts.preferredSize) return this.phrases.followup('size', { avoid });
        if (!facts.focus) return this.phrases.followup('focus', { avoid });
        if (!facts.features || facts.features.length === 0) return this.phrases.followup('features', { avoid });
        break;
      case 'considering':
        if (!facts.timelineInterest) return this.phrases.followup('timeline', { avoid });
        break;
      case 'ready':
        break;
    }
    return this.phrases.followup('general', { avoid });
  }

  /**
   * Looks at the latest user turns, the current utterance included.
   * Stalled when most of them are very short or none of them asks anything.
   */
  isStalled(recentUserTexts: string[]): boolean {
    const window = recentUserTexts.slice(-STALL_WINDOW);
    if (window.length < STALL_WINDOW) return false;

    const short = window.filter((text) => countWords(text) <= SHORT_REPLY_WORDS).length;
    if (short >= 2) return true;

    return window.every((text) => !text.includes('?'));
  }

  restart(facts: KeyFacts, avoid?: string | null): string {
    const base = this.phrases.select('restart', { avoid });
    const hints = this.phrases.bank.restartHints;

    if (facts.budgetConscious) return `${base} ${hints.budget}`;
    if (facts.spaceConcerns) return `${base} ${hints.space}`;
    if (countFacts(facts) === 0) return `${base} ${hints.unknown}`;
    return base;
  }
}

function countWords(text: string): number {
  return text.trim().split(/\s+/).filter((word) => word.length > 0).length;
}
