import { ConversationRecord, CtaKind, RenderStage } from './memory';

export interface CtaDecision {
  attempt: boolean;
  kind: CtaKind | 'none';
}

export interface CompletionMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionClient {
  readonly provider: string;
  complete(messages: CompletionMessage[]): Promise<string>;
}

export interface IncomingTurn {
  userId: string;
  message: string;
  now?: Date;
}

export interface TurnResult {
  reply: string;
  /** false when the completion service failed and the reply is the retry notice */
  delivered: boolean;
  renderStage: RenderStage;
  ctaOffered: CtaKind | null;
  record: ConversationRecord;
}

export interface ChatResponse {
  success: boolean;
  reply: string;
  user_id: string;
  buyer_stage: string;
  engagement_level: number;
  render_status: RenderStage;
}
