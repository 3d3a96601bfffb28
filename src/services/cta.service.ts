import { EngineConfig } from '../config/engine';
import { ConversationRecord, CtaAttempt, CtaKind, PENDING_OUTCOME } from '../types/memory';
import { CtaDecision } from '../types/agent';
import { laterStage } from './journey.service';

const AFFIRMATIVE = /\b(?:yes|sure|okay)\b/i;

export const NO_CTA: CtaDecision = Object.freeze({ attempt: false, kind: 'none' });

export function isAffirmative(outcome: string): boolean {
  return AFFIRMATIVE.test(outcome);
}

/** True once the user has said yes to an in-home consult. */
export function hasAcceptedConsult(record: Pick<ConversationRecord, 'ctaAttempts'>): boolean {
  return record.ctaAttempts.some((attempt) => attempt.kind === 'consult' && isAffirmative(attempt.outcome));
}

type GateView = Pick<
  ConversationRecord,
  'buyerStage' | 'engagementLevel' | 'keyFacts' | 'interactions' | 'ctaAttempts' | 'lastCtaAttemptAt'
>;

export class CtaService {
  constructor(private readonly config: EngineConfig) {}

  /** Sole authority on CTA timing. */
  shouldAttemptCta(record: GateView, now: Date): CtaDecision {
    const nowMs = now.getTime();

    if (record.lastCtaAttemptAt) {
      const sinceLast = nowMs - Date.parse(record.lastCtaAttemptAt);
      if (sinceLast < this.config.ctaCooldownMs) return NO_CTA;
    }

    const recent = record.ctaAttempts.filter(
      (attempt) => nowMs - Date.parse(attempt.timestamp) < this.config.ctaWindowMs
    );
    if (recent.length >= this.config.ctaMaxPerWindow) return NO_CTA;

    const { buyerStage, engagementLevel, keyFacts } = record;

    if ((buyerStage === 'considering' || buyerStage === 'ready') && engagementLevel >= 3) {
      return { attempt: true, kind: 'consult' };
    }
    if (buyerStage === 'interested' && engagementLevel >= 2 && keyFacts.spaceConcerns === true) {
      return { attempt: true, kind: 'render' };
    }
    if (record.interactions.length >= 4 && engagementLevel >= 3) {
      return { attempt: true, kind: 'consult' };
    }
    return NO_CTA;
  }

  /**
   * Appends an attempt and applies consent effects for an affirmative outcome.
   * Returns a new record; the input is left untouched.
   */
  recordCtaAttempt(record: ConversationRecord, kind: CtaKind, outcome: string, now: Date): ConversationRecord {
    const attempt: CtaAttempt = { timestamp: now.toISOString(), kind, outcome };
    const next: ConversationRecord = {
      ...record,
      ctaAttempts: [...record.ctaAttempts, attempt],
      lastCtaAttemptAt: attempt.timestamp,
    };
    return outcome === PENDING_OUTCOME ? next : applyConsent(next, kind, outcome);
  }

  /**
   * Settles the latest attempt if it is still awaiting the user's answer.
   * The attempt keeps its original timestamp, so the rate cap counts it once.
   */
  resolvePendingCta(record: ConversationRecord, utterance: string): { record: ConversationRecord; accepted: CtaKind | null } {
    const last = record.ctaAttempts[record.ctaAttempts.length - 1];
    if (!last || last.outcome !== PENDING_OUTCOME) return { record, accepted: null };

    const outcome = utterance.trim().toLowerCase();
    const resolved: CtaAttempt = { ...last, outcome };
    const next: ConversationRecord = {
      ...record,
      ctaAttempts: [...record.ctaAttempts.slice(0, -1), resolved],
    };
    const accepted = isAffirmative(outcome) ? last.kind : null;
    return { record: applyConsent(next, last.kind, outcome), accepted };
  }
}

function applyConsent(record: ConversationRecord, kind: CtaKind, outcome: string): ConversationRecord {
  if (!isAffirmative(outcome)) return record;

  if (kind === 'consult') {
    return { ...record, buyerStage: laterStage(record.buyerStage, 'ready') };
  }
  // an accepted render offer never rewinds a workflow already under way
  if (record.renderRequested && record.renderStatus !== null) return record;
  return { ...record, renderRequested: true, renderStatus: 'info_needed' };
}
