import { Router, Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { AgentService } from '../services/agent.service';
import { ChatResponse, TurnResult } from '../types/agent';
import { ValidationError } from '../utils/errors';

export const chatMessageSchema = z.object({
  user_id: z.string().trim().min(1).max(200).optional(),
  message: z.string().trim().min(1, 'message is required').max(5000),
});

export function toChatResponse(userId: string, result: TurnResult): ChatResponse {
  return {
    success: true,
    reply: result.reply,
    user_id: userId,
    buyer_stage: result.record.buyerStage,
    engagement_level: result.record.engagementLevel,
    render_status: result.renderStage,
  };
}

export function createChatRouter(agent: AgentService): Router {
  const router = Router();

  router.post('/message', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = chatMessageSchema.safeParse(req.body);
      if (!parsed.success) {
        throw new ValidationError(parsed.error.issues.map((i) => i.message).join(', '));
      }

      const userId = parsed.data.user_id ?? uuidv4();
      const result = await agent.processTurn({ userId, message: parsed.data.message });

      res.json(toChatResponse(userId, result));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
