import { z } from 'zod';
import {
  BUYER_STAGES,
  ConversationRecord,
  ConversationTotals,
  FOCUS_VALUES,
  Interaction,
  POOL_SIZES,
  POOL_TYPES,
  RENDER_STATUSES,
} from '../../types/memory';
import { clampEngagement } from '../journey.service';

export const CURRENT_SCHEMA_VERSION = 1;

/**
 * Persistence boundary for conversation records.
 *
 * Writes are guarded by `record.version`: an upsert whose version no longer
 * matches the stored row fails with ConcurrentUpdateError and leaves the row
 * as it was.
 */
export interface MemoryStore {
  /** Stored record, or a fresh default when absent or expired. */
  load(userId: string, now?: Date): Promise<ConversationRecord>;
  /** Returns the record as stored: stamped `lastUpdatedAt`, bumped `version`. */
  upsert(record: ConversationRecord, now?: Date): Promise<ConversationRecord>;
  delete(userId: string): Promise<boolean>;
  sweepExpired(now?: Date): Promise<number>;
  findCompletedRenders(): Promise<ConversationRecord[]>;
  totals(now?: Date): Promise<ConversationTotals>;
}

export function createDefaultRecord(userId: string, now: Date, version = 0): ConversationRecord {
  const timestamp = now.toISOString();
  return {
    userId,
    createdAt: timestamp,
    lastUpdatedAt: timestamp,
    interactions: [],
    keyFacts: {},
    buyerStage: 'browsing',
    engagementLevel: 1,
    renderRequested: false,
    renderStatus: null,
    renderDetails: {},
    contactInfo: {},
    ctaAttempts: [],
    lastCtaAttemptAt: null,
    schemaVersion: CURRENT_SCHEMA_VERSION,
    version,
  };
}

export function isExpired(lastUpdatedAt: string, now: Date, expiryWindowMs: number): boolean {
  const updated = Date.parse(lastUpdatedAt);
  if (Number.isNaN(updated)) return true;
  return now.getTime() - updated > expiryWindowMs;
}

/** Appends a turn and drops the oldest entries beyond `cap`. */
export function appendInteraction(record: ConversationRecord, interaction: Interaction, cap: number): ConversationRecord {
  const interactions = [...record.interactions, interaction];
  return { ...record, interactions: interactions.slice(-Math.max(1, cap)) };
}

const optional = <T extends z.ZodTypeAny>(schema: T) => schema.optional().catch(undefined);

/** Keeps the entries that parse and drops the rest. */
function lenientArray<T extends z.ZodTypeAny>(item: T) {
  return z
    .array(z.unknown())
    .catch([])
    .transform((entries) =>
      entries.flatMap((entry): z.output<T>[] => {
        const parsed = item.safeParse(entry);
        return parsed.success ? [parsed.data] : [];
      })
    );
}

const timestamp = z.string().refine((value) => !Number.isNaN(Date.parse(value)));

export const keyFactsSchema = z
  .object({
    focus: optional(z.enum(FOCUS_VALUES)),
    budgetConscious: optional(z.boolean()),
    poolType: optional(z.enum(POOL_TYPES)),
    preferredSize: optional(z.enum(POOL_SIZES)),
    features: optional(z.array(z.string()).transform((features) => [...new Set(features)])),
    timelineInterest: optional(z.boolean()),
    spaceConcerns: optional(z.boolean()),
  })
  .catch({});

const contactInfoSchema = z
  .object({
    name: optional(z.string().min(1)),
    email: optional(z.string().min(1)),
    phone: optional(z.string().min(1)),
    photo: optional(z.string().min(1)),
  })
  .catch({});

const interactionSchema = z.object({
  timestamp,
  userText: z.string(),
  botText: z.string().nullable().catch(null),
});

const ctaAttemptSchema = z.object({
  timestamp,
  kind: z.enum(['consult', 'render']),
  outcome: z.string().catch(''),
});

const renderDetailsSchema = z
  .object({
    requestedItem: optional(z.string()),
    infoCompletedAt: optional(timestamp),
    readyBy: optional(timestamp),
  })
  .catch({});

/**
 * Backfills every missing or malformed field with its default. A stored
 * record never fails to load because of drift in its shape.
 */
export function normalizeRecord(userId: string, raw: unknown, now: Date): ConversationRecord {
  const fallback = now.toISOString();
  const schema = z.object({
    createdAt: timestamp.catch(fallback),
    lastUpdatedAt: timestamp.catch(fallback),
    interactions: lenientArray(interactionSchema),
    keyFacts: keyFactsSchema,
    buyerStage: z.enum(BUYER_STAGES).catch('browsing'),
    engagementLevel: z.number().finite().catch(1).transform(clampEngagement),
    renderRequested: z.boolean().catch(false),
    renderStatus: z.enum(RENDER_STATUSES).nullable().catch(null),
    renderDetails: renderDetailsSchema,
    contactInfo: contactInfoSchema,
    ctaAttempts: lenientArray(ctaAttemptSchema),
    lastCtaAttemptAt: timestamp.nullable().catch(null),
    version: z.number().int().nonnegative().catch(0),
  });

  const source = typeof raw === 'object' && raw !== null ? raw : {};
  const parsed = schema.parse(source);

  return { userId, ...parsed, schemaVersion: CURRENT_SCHEMA_VERSION };
}
