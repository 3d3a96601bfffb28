import { BUYER_STAGES, BuyerStage, ConversationRecord } from '../types/memory';

const SPECIFICS_SIGNAL = /\b(?:sizes?|costs?|prices?|pricing|timelines?|process|how long|when|schedul\w*)\b/i;
const COMMITMENT_SIGNAL = /\b(?:ready|interested|wants?|wanted|needs?|planning|thinking about)\b/i;
const SCHEDULING_SIGNAL = /\b(?:timelines?|schedul\w*|when can|how soon)\b/i;
const AGREEMENT_SIGNAL = /\b(?:ready|let'?s do|schedul\w*|visit|consult\w*)\b/i;

const ENGAGEMENT_TERMS = ['size', 'cost', 'feature', 'timeline', 'process'];
const MAX_ENGAGEMENT = 5;
const MIN_ENGAGEMENT = 1;
const FACT_BREADTH_THRESHOLD = 3;

export function stageRank(stage: BuyerStage): number {
  return BUYER_STAGES.indexOf(stage);
}

export function laterStage(a: BuyerStage, b: BuyerStage): BuyerStage {
  return stageRank(a) >= stageRank(b) ? a : b;
}

export function clampEngagement(level: number): number {
  return Math.min(MAX_ENGAGEMENT, Math.max(MIN_ENGAGEMENT, Math.trunc(level)));
}

export class JourneyService {
  /** Moves at most one stage forward per utterance. */
  advanceStage(record: Pick<ConversationRecord, 'buyerStage' | 'keyFacts'>, utterance: string): BuyerStage {
    const current = record.buyerStage;

    switch (current) {
      case 'browsing':
        if (SPECIFICS_SIGNAL.test(utterance) || COMMITMENT_SIGNAL.test(utterance)) return 'interested';
        return current;
      case 'interested':
        if (SCHEDULING_SIGNAL.test(utterance)) return 'considering';
        if (countFacts(record.keyFacts) >= FACT_BREADTH_THRESHOLD) return 'considering';
        return current;
      case 'considering':
        if (AGREEMENT_SIGNAL.test(utterance)) return 'ready';
        return current;
      case 'ready':
        return current;
    }
  }

  advanceEngagement(record: Pick<ConversationRecord, 'engagementLevel'>, utterance: string): number {
    const current = clampEngagement(record.engagementLevel);
    const score = engagementScore(utterance);
    return Math.min(MAX_ENGAGEMENT, Math.max(current, Math.trunc(current + score)));
  }
}

export function engagementScore(utterance: string): number {
  const lower = utterance.toLowerCase();
  const questions = (utterance.match(/\?/g) ?? []).length;
  const terms = ENGAGEMENT_TERMS.filter((term) => lower.includes(term)).length;
  const wordCount = utterance.trim().split(/\s+/).filter((word) => word.length > 0).length;

  return Math.min(questions * 0.5, 1) + Math.min(terms * 0.3, 1) + Math.min(wordCount / 20, 1);
}

/** Number of facts that hold a value. */
export function countFacts(facts: ConversationRecord['keyFacts']): number {
  return Object.values(facts).filter((value) => value !== undefined).length;
}
