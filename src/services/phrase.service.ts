import { FollowupTopic, PhilosophyTopic, PhraseBank, PhraseIntent } from '../config/phrases';

/** Returns a number in [0, 1), like Math.random. */
export type RandomSource = () => number;

export interface PickOptions {
  /** Text the previous bot turn contained; any variant it already includes is skipped. */
  avoid?: string | null;
  vars?: Record<string, string>;
}

export function fillTemplate(template: string, vars: Record<string, string> = {}): string {
  return template.replace(/\{(\w+)\}/g, (whole, key: string) => vars[key] ?? whole);
}

export class PhraseSelector {
  constructor(
    readonly bank: PhraseBank,
    private readonly random: RandomSource = Math.random
  ) {}

  pick(templates: readonly string[], options: PickOptions = {}): string {
    const rendered = templates.map((template) => fillTemplate(template, options.vars));
    const avoid = options.avoid;
    const fresh = avoid ? rendered.filter((text) => !avoid.includes(text)) : rendered;
    const candidates = fresh.length > 0 ? fresh : rendered;
    const index = Math.min(candidates.length - 1, Math.floor(this.random() * candidates.length));
    return candidates[index];
  }

  select(intent: PhraseIntent, options: PickOptions = {}): string {
    return this.pick(this.bank[intent], options);
  }

  followup(topic: FollowupTopic, options: PickOptions = {}): string {
    return this.pick(this.bank.followup[topic], options);
  }

  philosophy(topic: PhilosophyTopic, options: PickOptions = {}): string {
    return this.pick(this.bank.philosophy[topic], options);
  }

  chance(probability: number): boolean {
    return this.random() < probability;
  }
}
