import type { CatalogClient } from './catalog/types.js';
import { loadCatalogConfig } from './config/catalog.js';
import { loadChatConfig, type ChatConfig } from './config/chat.js';
import { loadLlmConfig } from './config/llm.js';
import { loadSessionConfig, type SessionConfig } from './config/session.js';
import { ResponseComposer } from './core/composers.js';
import { IntentExtractor } from './core/intent_extractor.js';
import { createChatCompletionsClient, type LlmClient } from './core/llm.js';
import { Orchestrator } from './core/orchestrator.js';
import { createSessionMemory, type SessionMemory } from './core/session_store.js';
import { TvdbCatalogClient } from './vendors/tvdb_client.js';
import { createLogger, type Logger } from './util/logging.js';

export interface RuntimeOptions {
  log?: Logger;
  /** Replaces the TheTVDB client. */
  catalog?: CatalogClient;
  /** Replaces the chat-completions client. */
  llm?: LlmClient;
  chat?: ChatConfig;
  session?: SessionConfig;
}

export interface Runtime {
  orchestrator: Orchestrator;
  memory: SessionMemory;
  log: Logger;
  close(): Promise<void>;
}

/**
 * Builds the chat stack from environment config. Every collaborator can be
 * swapped through `opts`.
 */
export function createRuntime(opts: RuntimeOptions = {}): Runtime {
  const log = opts.log ?? createLogger();
  const chat = opts.chat ?? loadChatConfig();
  const session = opts.session ?? loadSessionConfig();

  const memory = createSessionMemory(session, { log: log.child({ component: 'session' }) });
  const catalog = opts.catalog ?? new TvdbCatalogClient(loadCatalogConfig(), log.child({ component: 'tvdb' }));
  const llm = opts.llm ?? createChatCompletionsClient(loadLlmConfig(), log.child({ component: 'llm' }));

  const extractor = new IntentExtractor(llm, log, { timeoutMs: chat.llmTimeoutMs });
  const composer = new ResponseComposer(llm, log, { timeoutMs: chat.llmTimeoutMs });
  const orchestrator = new Orchestrator({
    memory,
    extractor,
    catalog,
    composer,
    log,
    config: chat,
    historyWindow: session.historyWindow,
  });

  log.debug(
    { topK: chat.topK, minConfidence: chat.minConfidence, tieBreak: chat.tieBreak, ttlSec: session.ttlSec },
    'runtime_ready',
  );

  return {
    orchestrator,
    memory,
    log,
    async close() {
      await orchestrator.close();
      memory.dispose();
    },
  };
}
