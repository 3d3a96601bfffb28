import { CONTACT_FIELDS, ContactField, ContactInfo, KeyFacts } from '../types/memory';
import { logger } from '../utils/logger';

type ScalarFactKey = Exclude<keyof KeyFacts, 'features'>;

type FactRule = {
  [K in ScalarFactKey]: {
    key: K;
    value: NonNullable<KeyFacts[K]>;
    pattern: RegExp;
    /** lower runs first; the first matching rule for an unset fact wins */
    priority: number;
  };
}[ScalarFactKey];

interface FeatureRule {
  name: string;
  pattern: RegExp;
}

function words(...terms: string[]): RegExp {
  const escaped = terms.map((term) => term.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'));
  return new RegExp(`\\b(?:${escaped.join('|')})\\b`, 'i');
}

const FACT_RULES: FactRule[] = [
  { key: 'focus', value: 'both', priority: 10, pattern: /(?=[\s\S]*\bboth\b)(?=[\s\S]*\b(?:relax|entertain))/i },
  { key: 'focus', value: 'relaxation', priority: 20, pattern: /\b(?:relax\w*|peaceful|quiet|unwind\w*)/i },
  { key: 'focus', value: 'entertaining', priority: 30, pattern: /\b(?:entertain\w*|party|parties|friends|gather\w*|host\w*)/i },
  { key: 'focus', value: 'family', priority: 40, pattern: words('family', 'families', 'kids', 'children', 'grandkids') },

  { key: 'budgetConscious', value: true, priority: 10, pattern: /\$|\b(?:budget\w*|costs?|pric(?:e|es|ey|ing)|expensive|affordable|cheap\w*|financ\w*|payments?)\b/i },

  { key: 'poolType', value: 'cocktail', priority: 10, pattern: words('cocktail') },
  { key: 'poolType', value: 'semi-inground', priority: 20, pattern: /\bsemi[\s\S]*ground/i },
  { key: 'poolType', value: 'custom', priority: 30, pattern: words('custom') },

  { key: 'preferredSize', value: '12x24', priority: 10, pattern: /\b12\s*'?\s*(?:x|by|×)\s*24\b/i },
  { key: 'preferredSize', value: '14x28', priority: 20, pattern: /\b14\s*'?\s*(?:x|by|×)\s*28\b/i },

  { key: 'timelineInterest', value: true, priority: 10, pattern: /\b(?:timelines?|when|how long|schedul\w*|start\w*|soon|ready)\b/i },

  { key: 'spaceConcerns', value: true, priority: 10, pattern: words('space', 'spaces', 'yard', 'backyard', 'small', 'tight', 'fit', 'fits', 'room') },
];
FACT_RULES.sort((a, b) => a.priority - b.priority);

const FEATURE_RULES: FeatureRule[] = [
  { name: 'tanning ledge', pattern: words('tanning ledge', 'tanning shelf', 'sun shelf', 'ledge') },
  { name: 'bench', pattern: words('bench', 'benches', 'seating', 'wraparound', 'built-in seating') },
  { name: 'lighting', pattern: words('lighting', 'light', 'lights', 'underwater lights', 'led', 'leds') },
  { name: 'heating', pattern: words('heated', 'heating', 'heater', 'heat', 'warm', 'year-round') },
  { name: 'jets', pattern: words('jets', 'hydrotherapy', 'massage', 'spa jets') },
  { name: 'fountains', pattern: words('fountain', 'fountains', 'water feature', 'bubblers', 'spillover') },
];

const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/;
const PHONE_PATTERN = /\(?\b\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}\b/;
const NAME_PATTERNS = [
  /\bmy name is\s+([a-z]+(?:\s+[a-z]+)?)/i,
  /\bname'?s\s+([a-z]+(?:\s+[a-z]+)?)/i,
  /\bcall me\s+([a-z]+(?:\s+[a-z]+)?)/i,
  /\b(?:i'?m|i am)\s+([a-z]+(?:\s+[a-z]+)?)/i,
];
const PHOTO_SUBJECT = words('photo', 'photos', 'picture', 'pictures', 'pic', 'pics', 'image', 'images');
const PHOTO_DELIVERY = words('sent', 'attached', 'here', 'uploaded');

const NON_NAME_WORDS = new Set([
  'a', 'about', 'also', 'an', 'at', 'back', 'considering', 'curious', 'done', 'excited', 'fine', 'from',
  'glad', 'going', 'gonna', 'good', 'happy', 'here', 'hoping', 'in', 'interested', 'just', 'looking', 'new',
  'not', 'ok', 'okay', 'on', 'planning', 'ready', 'really', 'sending', 'so', 'still', 'sure', 'the',
  'thinking', 'trying', 'very', 'with', 'wondering', 'working', 'worried',
]);

function setFact<K extends ScalarFactKey>(facts: KeyFacts, key: K, value: KeyFacts[K]): void {
  facts[key] = value;
}

function properCase(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

export class FactExtractionService {
  /**
   * Returns a new fact set: unset scalar facts filled from the utterance,
   * set ones left untouched, newly seen features appended.
   */
  extract(current: KeyFacts, utterance: string): KeyFacts {
    const next: KeyFacts = { ...current };
    if (current.features) next.features = [...current.features];

    for (const rule of FACT_RULES) {
      if (next[rule.key] !== undefined) continue;
      if (rule.pattern.test(utterance)) {
        setFact(next, rule.key, rule.value);
      }
    }

    const matched = FEATURE_RULES.filter((rule) => rule.pattern.test(utterance)).map((rule) => rule.name);
    if (matched.length > 0) {
      const features = next.features ?? [];
      for (const name of matched) {
        if (!features.includes(name)) features.push(name);
      }
      next.features = features;
    }

    return next;
  }

  extractContactInfo(utterance: string): ContactInfo {
    const found: ContactInfo = {};

    const email = utterance.match(EMAIL_PATTERN);
    if (email) found.email = email[0];

    // strip the email first so its digits never read as a phone number
    const withoutEmail = email ? utterance.replace(email[0], ' ') : utterance;
    const phone = withoutEmail.match(PHONE_PATTERN);
    if (phone) found.phone = phone[0];

    const name = this.extractName(utterance);
    if (name) found.name = name;

    if (PHOTO_SUBJECT.test(utterance) && PHOTO_DELIVERY.test(utterance)) {
      found.photo = 'provided';
    }

    if (Object.keys(found).length > 0) {
      logger.debug('Contact fields detected', { fields: Object.keys(found) });
    }

    return found;
  }

  private extractName(utterance: string): string | null {
    for (const pattern of NAME_PATTERNS) {
      const match = utterance.match(pattern);
      if (!match) continue;

      const [first, second] = match[1].split(/\s+/);
      if (NON_NAME_WORDS.has(first.toLowerCase())) continue;

      const parts = [properCase(first)];
      if (second && /^[A-Z]/.test(second) && !NON_NAME_WORDS.has(second.toLowerCase())) {
        parts.push(properCase(second));
      }
      return parts.join(' ');
    }
    return null;
  }
}

/** First non-empty value wins; captured fields are never overwritten. */
export function mergeContactInfo(current: ContactInfo, found: ContactInfo): ContactInfo {
  const merged: ContactInfo = { ...current };
  for (const field of CONTACT_FIELDS) {
    const value = found[field];
    if (!merged[field] && value) merged[field] = value;
  }
  return merged;
}

export function missingContactFields(contactInfo: ContactInfo): ContactField[] {
  return CONTACT_FIELDS.filter((field) => !contactInfo[field]);
}
