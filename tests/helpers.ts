import { loadPhraseBank } from '../src/config/phrases';
import { PhraseSelector, RandomSource } from '../src/services/phrase.service';
import { createDefaultRecord } from '../src/services/memory/memory.store';
import { ConversationRecord } from '../src/types/memory';

export const NOW = new Date('2024-06-05T15:00:00.000Z');

export function minutesBefore(now: Date, minutes: number): string {
  return new Date(now.getTime() - minutes * 60 * 1000).toISOString();
}

export function makeRecord(overrides: Partial<ConversationRecord> = {}, now: Date = NOW): ConversationRecord {
  return { ...createDefaultRecord('user-1', now), ...overrides };
}

/** random() === 0 picks the first usable variant and passes every chance() roll. */
export function makePhrases(random: RandomSource = () => 0): PhraseSelector {
  return new PhraseSelector(loadPhraseBank('config/phrases.json'), random);
}
