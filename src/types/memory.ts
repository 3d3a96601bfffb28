export const BUYER_STAGES = ['browsing', 'interested', 'considering', 'ready'] as const;
export type BuyerStage = (typeof BUYER_STAGES)[number];

export const FOCUS_VALUES = ['relaxation', 'entertaining', 'family', 'both'] as const;
export type Focus = (typeof FOCUS_VALUES)[number];

export const POOL_TYPES = ['cocktail', 'semi-inground', 'custom'] as const;
export type PoolType = (typeof POOL_TYPES)[number];

export const POOL_SIZES = ['12x24', '14x28'] as const;
export type PoolSize = (typeof POOL_SIZES)[number];

export const RENDER_STATUSES = ['info_needed', 'collecting_info', 'in_progress', 'complete'] as const;
export type RenderStatus = (typeof RENDER_STATUSES)[number];

export const RENDER_STAGES = ['not_requested', ...RENDER_STATUSES] as const;
export type RenderStage = (typeof RENDER_STAGES)[number];

export const CONTACT_FIELDS = ['name', 'email', 'phone', 'photo'] as const;
export type ContactField = (typeof CONTACT_FIELDS)[number];

export type CtaKind = 'consult' | 'render';

export const PENDING_OUTCOME = 'pending';

export interface KeyFacts {
  focus?: Focus;
  budgetConscious?: boolean;
  poolType?: PoolType;
  preferredSize?: PoolSize;
  features?: string[];
  timelineInterest?: boolean;
  spaceConcerns?: boolean;
}

export type ContactInfo = Partial<Record<ContactField, string>>;

export interface Interaction {
  timestamp: string;
  userText: string;
  /** null when the completion call failed and no reply was delivered */
  botText: string | null;
}

export interface CtaAttempt {
  timestamp: string;
  kind: CtaKind;
  outcome: string;
}

export interface RenderDetails {
  requestedItem?: string;
  infoCompletedAt?: string;
  readyBy?: string;
}

export interface ConversationRecord {
  userId: string;
  createdAt: string;
  lastUpdatedAt: string;
  interactions: Interaction[];
  keyFacts: KeyFacts;
  buyerStage: BuyerStage;
  engagementLevel: number;
  renderRequested: boolean;
  renderStatus: RenderStatus | null;
  renderDetails: RenderDetails;
  contactInfo: ContactInfo;
  ctaAttempts: CtaAttempt[];
  lastCtaAttemptAt: string | null;
  /** storage format version of the serialized record */
  schemaVersion: number;
  /** optimistic concurrency counter; 0 means no row has been written yet */
  version: number;
}

export interface MemoryStats {
  userId: string;
  totalInteractions: number;
  keyFacts: KeyFacts;
  buyerStage: BuyerStage;
  engagementLevel: number;
  renderRequested: boolean;
  renderStatus: RenderStatus | null;
  renderStage: RenderStage;
  ctaAttempts: number;
  lastActive: string;
  contextSummary: string;
}

export interface RenderExport {
  userId: string;
  name: string;
  email: string;
  phone: string;
  photoProvided: boolean;
  preferredSize: string;
  focus: string;
  features: string[];
  budgetConscious: boolean;
  requestedItem: string;
  readyBy: string | null;
  createdAt: string;
  lastUpdatedAt: string;
}

export interface ConversationTotals {
  totalUsers: number;
  activeUsers7Days: number;
  renderRequests: number;
  buyerStages: Partial<Record<BuyerStage, number>>;
}
