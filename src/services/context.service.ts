import { BuyerStage, ConversationRecord, RenderStage } from '../types/memory';
import { getRenderStage } from './render.service';

const STAGE_DESCRIPTORS: Record<BuyerStage, string | null> = {
  browsing: null,
  interested: 'showing specific interest',
  considering: 'seriously considering a pool',
  ready: 'ready to move forward',
};

const RENDER_DESCRIPTORS: Record<RenderStage, string | null> = {
  not_requested: null,
  info_needed: 'agreed to a render',
  collecting_info: 'providing info for render',
  in_progress: 'waiting for their render',
  complete: 'render info collected',
};

const MAX_HINTS = 3;

/**
 * Briefing handed to the completion call. Deterministic for a given record
 * and deliberately silent on CTA timing.
 */
export class ContextSummaryService {
  summarize(record: ConversationRecord): string {
    const facts = record.keyFacts;
    const parts: string[] = [];

    if (facts.focus) parts.push(`focused on ${facts.focus}`);
    if (facts.budgetConscious) parts.push('is budget-conscious');
    if (facts.poolType) parts.push(`interested in ${facts.poolType} pools`);
    if (facts.preferredSize) parts.push(`prefers the ${facts.preferredSize} size`);
    if (facts.features && facts.features.length > 0) {
      parts.push(`interested in features: ${facts.features.join(', ')}`);
    }
    if (facts.timelineInterest) parts.push('asking about timing');
    if (facts.spaceConcerns) parts.push('concerned about space');

    const stage = STAGE_DESCRIPTORS[record.buyerStage];
    if (stage) parts.push(stage);

    const render = RENDER_DESCRIPTORS[getRenderStage(record)];
    if (render) parts.push(render);

    if (parts.length === 0) return '';

    let summary = `CONVERSATION CONTEXT: Customer ${parts.join(', ')}.`;
    const hints = this.guidance(record);
    if (hints.length > 0) {
      summary += ` GUIDANCE: ${hints.join('. ')}.`;
    }
    return summary;
  }

  guidance(record: ConversationRecord): string[] {
    const facts = record.keyFacts;
    const hints: string[] = [];

    switch (record.buyerStage) {
      case 'browsing':
        if (record.engagementLevel >= 2) hints.push('ask about their vision for the space');
        break;
      case 'interested':
        if (!facts.preferredSize) hints.push('explore size preferences');
        if (!facts.focus) hints.push('understand their main use (relaxing vs entertaining)');
        break;
      case 'considering':
        if (!facts.timelineInterest) hints.push('confirm their timeline');
        break;
      case 'ready':
        break;
    }

    switch (facts.focus) {
      case 'entertaining':
        hints.push('discuss layout for gatherings', 'mention lighting importance');
        break;
      case 'relaxation':
        hints.push('emphasize clean lines', 'discuss peaceful features');
        break;
      case 'family':
        hints.push('highlight safety features', 'discuss kid-friendly elements');
        break;
      default:
        break;
    }

    if (facts.budgetConscious) hints.push('emphasize value and materials that last');

    return hints.slice(0, MAX_HINTS);
  }
}
