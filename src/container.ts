import { env } from './config/env';
import { buildEngineConfig, EngineConfig } from './config/engine';
import { loadPersonaPrompt, loadPhraseBank } from './config/phrases';
import { addNotificationJob } from './config/queue';
import { AdminService } from './services/admin.service';
import { AgentService } from './services/agent.service';
import { CacheService } from './services/cache.service';
import { CompletionFactory } from './services/completion.factory';
import { SendGridAdapter } from './services/email/sendgrid.adapter';
import { ConversationFlowService } from './services/flow.service';
import { MemoryStore } from './services/memory/memory.store';
import { PostgresMemoryStore } from './services/memory/postgres.store';
import { PhraseSelector } from './services/phrase.service';

export interface Container {
  config: EngineConfig;
  store: MemoryStore;
  agent: AgentService;
  admin: AdminService;
  mailer: SendGridAdapter;
}

/** Builds the service graph once at startup. Phrase bank and persona problems fail here. */
export function createContainer(): Container {
  const config = buildEngineConfig(env);
  const phrases = new PhraseSelector(loadPhraseBank(env.PHRASE_BANK_PATH));
  const persona = loadPersonaPrompt(env.PERSONA_PROMPT_PATH);
  const store = new PostgresMemoryStore(config);
  const cache = new CacheService();
  const flow = new ConversationFlowService(phrases);

  const agent = new AgentService({
    store,
    completion: CompletionFactory.create(env),
    phrases,
    persona,
    config,
    cache,
    notify: addNotificationJob,
    flow,
  });

  return {
    config,
    store,
    agent,
    admin: new AdminService(store, flow, config, cache),
    mailer: new SendGridAdapter({ apiKey: env.SENDGRID_API_KEY, fromEmail: env.SENDGRID_FROM_EMAIL }),
  };
}
