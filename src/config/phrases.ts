import fs from 'fs';
import path from 'path';
import { z } from 'zod';

const variants = z.array(z.string().min(1)).min(1);

const phraseBankSchema = z.object({
  consult: variants,
  consultFocus: z.object({
    entertaining: z.string(),
    relaxation: z.string(),
    family: z.string(),
    both: z.string(),
  }),
  render: variants,
  reengagement: variants,
  renderInProgress: variants,
  contactRequest: variants,
  contactFieldPrompts: z.object({
    name: z.string(),
    email: z.string(),
    phone: z.string(),
    photo: z.string(),
  }),
  contactMissing: variants,
  partialInfoOffer: variants,
  softContact: variants,
  renderTimeline: variants,
  renderComplete: variants,
  credibility: variants,
  restart: variants,
  restartHints: z.object({
    budget: z.string(),
    space: z.string(),
    unknown: z.string(),
  }),
  followup: z.object({
    general: variants,
    early: variants,
    size: variants,
    focus: variants,
    features: variants,
    timeline: variants,
  }),
  philosophy: z.object({
    purpose_driven: variants,
    clean_geometry: variants,
    materials_that_last: variants,
    lighting_mood: variants,
    water_feature: variants,
  }),
  purposeByFocus: z.object({
    entertaining: z.string(),
    relaxation: z.string(),
    family: z.string(),
    both: z.string(),
    default: z.string(),
  }),
  tryAgain: variants,
});

export type PhraseBank = Readonly<z.infer<typeof phraseBankSchema>>;

export type PhraseIntent = {
  [K in keyof PhraseBank]: PhraseBank[K] extends string[] ? K : never;
}[keyof PhraseBank];

export type FollowupTopic = keyof PhraseBank['followup'];
export type PhilosophyTopic = keyof PhraseBank['philosophy'];

export function parsePhraseBank(data: unknown): PhraseBank {
  const parsed = phraseBankSchema.safeParse(data);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid phrase bank: ${problems.join('; ')}`);
  }
  return Object.freeze(parsed.data);
}

export function loadPhraseBank(filePath: string): PhraseBank {
  const resolved = path.resolve(process.cwd(), filePath);
  return parsePhraseBank(JSON.parse(fs.readFileSync(resolved, 'utf8')));
}

export function loadPersonaPrompt(filePath: string): string {
  const resolved = path.resolve(process.cwd(), filePath);
  const text = fs.readFileSync(resolved, 'utf8').trim();
  if (text.length === 0) {
    throw new Error(`Persona prompt is empty: ${resolved}`);
  }
  return text;
}
