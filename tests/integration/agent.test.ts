jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

import { DEFAULT_ENGINE_CONFIG } from '../../src/config/engine';
import { AgentService, AgentDependencies } from '../../src/services/agent.service';
import { InMemoryMemoryStore } from '../../src/services/memory/in-memory.store';
import { stageRank } from '../../src/services/journey.service';
import { RandomSource } from '../../src/services/phrase.service';
import { CompletionMessage } from '../../src/types/agent';
import { ConcurrentUpdateError, ServiceError, ValidationError } from '../../src/utils/errors';
import { logger } from '../../src/utils/logger';
import { NOW, makePhrases, makeRecord, minutesBefore } from '../helpers';

function minutesAfter(minutes: number): Date {
  return new Date(NOW.getTime() + minutes * 60 * 1000);
}

describe('Agent Integration', () => {
  let store: InMemoryMemoryStore;
  let complete: jest.Mock<Promise<string>, [CompletionMessage[]]>;
  let notify: jest.Mock<Promise<void>, [unknown]>;
  let invalidate: jest.Mock<Promise<void>, [string]>;

  function makeAgent(random: RandomSource = () => 0.99, overrides: Partial<AgentDependencies> = {}): AgentService {
    return new AgentService({
      store,
      completion: { provider: 'Scripted', complete },
      phrases: makePhrases(random),
      persona: 'persona',
      config: DEFAULT_ENGINE_CONFIG,
      cache: { invalidate },
      notify,
      ...overrides,
    });
  }

  beforeEach(() => {
    jest.clearAllMocks();
    store = new InMemoryMemoryStore(DEFAULT_ENGINE_CONFIG);
    complete = jest.fn();
    notify = jest.fn().mockResolvedValue(undefined);
    invalidate = jest.fn().mockResolvedValue(undefined);
  });

  it('should carry a buyer from a pricing question to a completed render request', async () => {
    const agent = makeAgent();
    complete
      .mockResolvedValueOnce('Great choice!')
      .mockResolvedValueOnce('Awesome.')
      .mockResolvedValueOnce('Thanks Jordan!')
      .mockResolvedValueOnce('Got it.');

    const first = await agent.processTurn({
      userId: 'user-1',
      message: "What's the price for a 12x24 with a tanning ledge? I'm worried about my small backyard",
      now: NOW,
    });

    expect(complete).toHaveBeenLastCalledWith([
      { role: 'system', content: 'persona' },
      {
        role: 'system',
        content:
          'CONVERSATION CONTEXT: Customer is budget-conscious, prefers the 12x24 size, interested in features: tanning ledge, ' +
          'concerned about space, showing specific interest. ' +
          'GUIDANCE: understand their main use (relaxing vs entertaining). emphasize value and materials that last.',
      },
      { role: 'user', content: "What's the price for a 12x24 with a tanning ledge? I'm worried about my small backyard" },
    ]);
    expect(first.reply).toBe(
      'Great choice!\n\nWant to visualize it first? We can put together a concept of that 12x24 pool with tanning ledge from a photo of your backyard.'
    );
    expect(first.ctaOffered).toBe('render');
    expect(first.record.keyFacts).toEqual({
      preferredSize: '12x24',
      features: ['tanning ledge'],
      spaceConcerns: true,
      budgetConscious: true,
    });
    expect(first.record.buyerStage).toBe('interested');
    expect(first.record.engagementLevel).toBe(2);
    expect(first.record.ctaAttempts).toEqual([{ timestamp: NOW.toISOString(), kind: 'render', outcome: 'pending' }]);

    const second = await agent.processTurn({ userId: 'user-1', message: 'Sure, that sounds great', now: minutesAfter(1) });
    expect(second.reply).toBe(
      'Awesome. Sounds good! To make this render specific to your space, I need your name, email, phone, and a backyard photo. ' +
        "We'll have it ready in 2-3 business days. We review it internally to make sure it's a pool we'd actually build."
    );
    expect(second.renderStage).toBe('info_needed');
    expect(second.record.buyerStage).toBe('considering');
    expect(second.record.ctaAttempts[0].outcome).toBe('sure, that sounds great');

    const third = await agent.processTurn({
      userId: 'user-1',
      message: 'My name is Jordan Lee and my email is jordan@example.com',
      now: minutesAfter(2),
    });
    expect(third.reply).toBe('Thanks Jordan! Great! I still need: phone, photo.');
    expect(third.renderStage).toBe('collecting_info');

    const fourth = await agent.processTurn({ userId: 'user-1', message: "555-123-4567, here's a photo, sent it", now: minutesAfter(3) });
    expect(fourth.reply).toBe("Got it. That's everything! Your render is in the queue and you'll have it within 2-3 business days.");
    expect(fourth.renderStage).toBe('complete');
    expect(notify).toHaveBeenCalledTimes(1);
    expect(notify).toHaveBeenCalledWith({
      type: 'render_request_complete',
      userId: 'user-1',
      requestedItem: '12x24 pool with tanning ledge',
      name: 'Jordan Lee',
      email: 'jordan@example.com',
      phone: '555-123-4567',
      readyBy: '2024-06-10T23:59:59-05:00',
    });

    const turns = [first, second, third, fourth];
    for (let i = 1; i < turns.length; i++) {
      expect(stageRank(turns[i].record.buyerStage)).toBeGreaterThanOrEqual(stageRank(turns[i - 1].record.buyerStage));
      expect(turns[i].record.engagementLevel).toBeGreaterThanOrEqual(turns[i - 1].record.engagementLevel);
    }
    expect(fourth.record.version).toBe(4);
    expect(fourth.record.interactions).toHaveLength(4);
    expect(invalidate).toHaveBeenCalledTimes(4);
  });

  it('should store the turn without a reply when the completion service fails', async () => {
    complete.mockRejectedValueOnce(new ServiceError('Scripted', 'complete', new Error('timeout'), true));

    const result = await makeAgent().processTurn({ userId: 'user-1', message: 'Do you have lighting options?', now: NOW });

    expect(result.delivered).toBe(false);
    expect(result.reply).toBe("Sorry, I'm having trouble connecting right now. Please try again in a moment.");
    expect(result.record.interactions).toEqual([
      { timestamp: NOW.toISOString(), userText: 'Do you have lighting options?', botText: null },
    ]);
    expect(result.record.keyFacts).toEqual({ features: ['lighting'] });
    expect(logger.error).toHaveBeenCalledWith('Completion failed', {
      userId: 'user-1',
      buyerStage: 'browsing',
      operation: 'complete',
      provider: 'Scripted',
      error: 'Scripted.complete failed: timeout',
    });
  });

  it('should replay the turn on a fresh record after losing a version race', async () => {
    await store.upsert(makeRecord(), NOW);
    complete.mockResolvedValue('We do.');

    const upsert = jest.spyOn(store, 'upsert');
    upsert.mockImplementationOnce(async () => {
      const fresh = await store.load('user-1', NOW);
      await store.upsert({ ...fresh, keyFacts: { ...fresh.keyFacts, focus: 'family' } }, NOW);
      throw new ConcurrentUpdateError('user-1', 1);
    });

    const result = await makeAgent().processTurn({ userId: 'user-1', message: 'Do you have lighting options?', now: NOW });

    expect(complete).toHaveBeenCalledTimes(1);
    expect(result.reply).toBe('We do.');
    expect(result.record.version).toBe(3);
    expect(result.record.keyFacts).toEqual({ focus: 'family', features: ['lighting'] });
    expect(result.record.interactions).toHaveLength(1);
    expect(logger.warn).toHaveBeenCalledWith('Version conflict, replaying turn', { userId: 'user-1', attempt: 1 });
  });

  it('should give up after repeated version conflicts', async () => {
    complete.mockResolvedValue('We do.');
    const upsert = jest.spyOn(store, 'upsert').mockRejectedValue(new ConcurrentUpdateError('user-1', 0));

    await expect(
      makeAgent().processTurn({ userId: 'user-1', message: 'Do you have lighting options?', now: NOW })
    ).rejects.toBeInstanceOf(ServiceError);
    expect(upsert).toHaveBeenCalledTimes(DEFAULT_ENGINE_CONFIG.maxPersistAttempts);
  });

  it('should reject an empty message', async () => {
    await expect(makeAgent().processTurn({ userId: 'user-1', message: '   ' })).rejects.toBeInstanceOf(ValidationError);
    expect(complete).not.toHaveBeenCalled();
  });

  it('should add credibility and a follow-up when the rolls allow', async () => {
    complete.mockResolvedValueOnce('We have built pools for a long time.');

    const result = await makeAgent(() => 0).processTurn({
      userId: 'user-1',
      message: 'How many years have you been doing this?',
      now: NOW,
    });

    expect(result.reply).toBe(
      'We have built pools for a long time. ' +
        "I should mention that I'm trained by our lead builder, a Master Certified Building Professional with over two decades of pool building experience. " +
        "What's drawing you to cocktail pools specifically?"
    );
  });

  it('should vary the philosophy line between consecutive replies', async () => {
    complete.mockResolvedValue('Our materials are great.');
    const agent = makeAgent(() => 0);

    const first = await agent.processTurn({ userId: 'user-1', message: 'What do you use for coping?', now: NOW });
    const second = await agent.processTurn({ userId: 'user-1', message: 'And for the tile?', now: minutesAfter(1) });

    const lasting =
      "We stick with materials that hold up, like concrete coping and solid tile, so you're not redoing things in a few years.";
    expect(first.reply).toContain(`Our materials are great. ${lasting}`);
    expect(second.reply).toContain(
      "Our materials are great. We don't cut corners on materials when the weather swings like it does here. That just means problems later."
    );
    expect(second.reply).not.toContain(lasting);
  });

  it('should not offer another consult in the reply that accepts one', async () => {
    const offeredAt = minutesBefore(NOW, 6);
    await store.upsert(
      makeRecord({
        buyerStage: 'considering',
        engagementLevel: 4,
        ctaAttempts: [{ timestamp: offeredAt, kind: 'consult', outcome: 'pending' }],
        lastCtaAttemptAt: offeredAt,
      }),
      NOW
    );
    complete.mockResolvedValueOnce('Great.');

    const result = await makeAgent().processTurn({ userId: 'user-1', message: 'yes sure', now: NOW });

    expect(result.reply).toBe('Great.');
    expect(result.ctaOffered).toBeNull();
    expect(result.record.buyerStage).toBe('ready');
    expect(result.record.ctaAttempts).toEqual([{ timestamp: offeredAt, kind: 'consult', outcome: 'yes sure' }]);
  });

  it('should greet a returning user and restart a stalled conversation', async () => {
    const turn = { timestamp: NOW.toISOString(), userText: 'hi', botText: 'hello' };
    await store.upsert(makeRecord({ interactions: [turn, turn, turn] }), NOW);
    complete.mockResolvedValueOnce('Good to hear from you.');

    const result = await makeAgent().processTurn({ userId: 'user-1', message: 'hello again', now: minutesAfter(1) });

    expect(complete).toHaveBeenCalledWith([
      { role: 'system', content: 'persona' },
      { role: 'assistant', content: "Welcome back! What's on your mind today?" },
      { role: 'user', content: 'hi' },
      { role: 'assistant', content: 'hello' },
      { role: 'user', content: 'hi' },
      { role: 'assistant', content: 'hello' },
      { role: 'user', content: 'hi' },
      { role: 'assistant', content: 'hello' },
      { role: 'user', content: 'hello again' },
    ]);
    expect(result.reply).toBe(
      "Good to hear from you. Let me step back. What's the one thing you really need to understand about this process? " +
        "I want to make sure I'm giving you the right information."
    );
  });
});
