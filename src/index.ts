export { createRuntime, type Runtime, type RuntimeOptions } from './runtime.js';
export { Orchestrator, type ChatReply, type OrchestratorDeps } from './core/orchestrator.js';
export { IntentExtractor, parseIntentResponse, type IntentExtraction } from './core/intent_extractor.js';
export { ResponseComposer, type TurnOutcome } from './core/composers.js';
export { resolveAction, type ResolvedAction, type ClarifyReason } from './core/slot_resolution.js';
export { createSessionMemory, type SessionMemory, type Turn } from './core/session_store.js';
export { createChatCompletionsClient, LlmError, type LlmClient } from './core/llm.js';
export { TvdbCatalogClient } from './vendors/tvdb_client.js';
export type { CatalogClient, SeriesDetail, SeriesSummary } from './catalog/types.js';
export { CatalogError, CatalogNotFoundError, CatalogTransportError } from './catalog/errors.js';
export { createApp } from './api/server.js';
