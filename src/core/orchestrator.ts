import { CatalogNotFoundError, CatalogTransportError } from '../catalog/errors.js';
import type { CatalogClient, SearchOptions, SeriesSummary } from '../catalog/types.js';
import type { ChatConfig } from '../config/chat.js';
import type { CarriedSlotsT } from '../schemas/intent.js';
import type { Logger } from '../util/logging.js';
import { isTimeoutError, KeyedSerialQueue, withTimeout } from '../util/resilience.js';
import {
  CATALOG_UNAVAILABLE_REPLY,
  HELP_REPLY,
  describeCriteria,
  type NotFoundLookup,
  type ResponseComposer,
  type TurnOutcome,
} from './composers.js';
import type { IntentExtractor } from './intent_extractor.js';
import { pickBestMatch, rankByPreference, type PreferenceCriteria } from './series_ranker.js';
import { normalizeSessionId } from './session_manager.js';
import type { CarriedSlotsPatch, SessionMemory, Turn } from './session_store.js';
import { resolveAction, type ResolvedAction, type SeriesTarget } from './slot_resolution.js';

export interface ChatReply {
  replyText: string;
  sessionId: string;
}

export interface OrchestratorDeps {
  memory: SessionMemory;
  extractor: Pick<IntentExtractor, 'extract'>;
  catalog: CatalogClient;
  composer: Pick<ResponseComposer, 'compose'>;
  log: Logger;
  config: ChatConfig;
  /** Turns handed to the extractor and the chat prompt, including the new message. */
  historyWindow: number;
  now?: () => number;
}

type SearchFilters = Pick<SearchOptions, 'year' | 'network'>;

interface DispatchResult {
  outcome: TurnOutcome;
  patch?: CarriedSlotsPatch;
}

// Candidates fetched per recommendation before re-ranking.
const RECOMMEND_POOL_FACTOR = 3;

function lookupFor(action: ResolvedAction): NotFoundLookup {
  if (action.kind === 'similar') return 'similar';
  if (action.kind === 'recommend') return 'recommendations';
  return 'series';
}

function appendUnique(list: readonly string[] | undefined, value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  const current = list ?? [];
  const wanted = value.trim().toLowerCase();
  if (current.some((v) => v.trim().toLowerCase() === wanted)) return undefined;
  return [...current, value];
}

/**
 * Runs one conversational turn per call: intent extraction, slot resolution,
 * catalog dispatch and reply composition. Turns of the same session are
 * serialized in arrival order; different sessions proceed in parallel.
 */
export class Orchestrator {
  private readonly queue = new KeyedSerialQueue();
  private readonly now: () => number;

  constructor(private readonly deps: OrchestratorDeps) {
    this.now = deps.now ?? Date.now;
  }

  /**
   * Never rejects for a non-empty message: catalog and LLM failures become
   * replies. An unknown or missing `sessionId` starts a new session, whose id is
   * returned.
   */
  async handleMessage(message: string, sessionId?: string): Promise<ChatReply> {
    const { memory } = this.deps;
    const provided = normalizeSessionId(sessionId);
    const id = provided && memory.has(provided) ? provided : memory.create();
    const text = message.trim();
    if (!text) return { replyText: HELP_REPLY, sessionId: id };

    return this.queue.run(id, () => this.runTurn(id, text));
  }

  /** Drops a session's history and carried slots. */
  endSession(sessionId: string): boolean {
    const id = normalizeSessionId(sessionId);
    if (!id || !this.deps.memory.has(id)) return false;
    this.deps.memory.clear(id);
    this.deps.log.info({ sessionId: id }, 'session_cleared');
    return true;
  }

  async close(): Promise<void> {
    await this.queue.close();
  }

  private async runTurn(id: string, text: string): Promise<ChatReply> {
    const { memory, log } = this.deps;
    const release = memory.retain(id);
    const started = this.now();
    try {
      memory.append(id, { role: 'user', content: text, timestamp: started });
      const prior = memory.getHistory(id, this.deps.historyWindow).slice(0, -1);

      let reply: string;
      try {
        reply = await this.respond(id, text, prior);
      } catch (error) {
        log.error({ err: error, sessionId: id }, 'turn_failed');
        reply = CATALOG_UNAVAILABLE_REPLY;
      }

      memory.append(id, { role: 'assistant', content: reply, timestamp: this.now() });
      log.debug({ sessionId: id, ms: this.now() - started }, 'turn_done');
      return { replyText: reply, sessionId: id };
    } finally {
      release();
    }
  }

  private async respond(id: string, text: string, prior: Turn[]): Promise<string> {
    const { memory, extractor, composer, config, log } = this.deps;
    const extraction = await extractor.extract(prior, text);
    const carried = memory.getSlots(id);
    const action = resolveAction(extraction, carried, { minConfidence: config.minConfidence });
    log.info(
      {
        sessionId: id,
        intent: extraction.intent,
        confidence: extraction.confidence,
        failure: extraction.failure,
        action: action.kind,
      },
      'turn_intent',
    );

    const { outcome, patch } = await this.dispatch(action, carried);
    if (patch) memory.setSlots(id, patch);
    return composer.compose(outcome, { history: prior, message: text });
  }

  private async dispatch(action: ResolvedAction, carried: CarriedSlotsT): Promise<DispatchResult> {
    try {
      return await this.perform(action, carried);
    } catch (error) {
      if (error instanceof CatalogNotFoundError) {
        this.deps.log.info({ query: error.query, action: action.kind }, 'catalog_not_found');
        return { outcome: { kind: 'not_found', query: error.query, lookup: lookupFor(action) } };
      }
      if (error instanceof CatalogTransportError || isTimeoutError(error)) {
        this.deps.log.warn(
          { err: error, action: action.kind, timeout: isTimeoutError(error) },
          'catalog_unavailable',
        );
        return { outcome: { kind: 'catalog_unavailable' } };
      }
      throw error;
    }
  }

  private async perform(action: ResolvedAction, carried: CarriedSlotsT): Promise<DispatchResult> {
    switch (action.kind) {
      case 'chat':
        return { outcome: { kind: 'chat' } };
      case 'clarify':
        return { outcome: { kind: 'clarify', reason: action.reason } };
      case 'search':
        return this.searchByTitle(action.title, { year: action.year, network: action.network });
      case 'details':
        return this.details(action.target);
      case 'similar':
        return this.similar(action.target);
      case 'recommend':
        return this.recommend({ genre: action.genre, network: action.network, year: action.year }, carried);
    }
  }

  private catalogCall<T>(fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
    return withTimeout(this.deps.config.catalogTimeoutMs, fn);
  }

  private async searchByTitle(title: string, filters: SearchFilters): Promise<DispatchResult> {
    const { catalog, config } = this.deps;
    const results = await this.catalogCall((signal) =>
      catalog.search(title, { ...filters, limit: config.topK, signal }),
    );
    const top = results.slice(0, config.topK);
    const first = top[0];
    if (!first) throw new CatalogNotFoundError(title);
    return {
      outcome: { kind: 'series_list', query: title, series: top },
      patch: { lastSeriesId: first.id, lastSeriesTitle: first.title },
    };
  }

  /** Title targets go through search and the tie-break policy; id targets are used as-is. */
  private async resolveReference(target: SeriesTarget): Promise<{ id: string; title: string }> {
    if (target.by === 'id') return { id: target.id, title: target.title ?? target.id };
    const { catalog, config } = this.deps;
    const results = await this.catalogCall((signal) =>
      catalog.search(target.title, { limit: config.topK, signal }),
    );
    const best = pickBestMatch(results, target.title, config.tieBreak);
    if (!best) throw new CatalogNotFoundError(target.title);
    return { id: best.id, title: best.title };
  }

  private async details(target: SeriesTarget): Promise<DispatchResult> {
    const ref = await this.resolveReference(target);
    const series = await this.catalogCall((signal) => this.deps.catalog.getSeries(ref.id, { signal }));
    if (!series) throw new CatalogNotFoundError(target.by === 'title' ? target.title : ref.title);
    return {
      outcome: { kind: 'series_detail', series },
      patch: { lastSeriesId: series.id, lastSeriesTitle: series.title },
    };
  }

  private async similar(target: SeriesTarget): Promise<DispatchResult> {
    const { catalog, config } = this.deps;
    const ref = await this.resolveReference(target);
    const results = await this.catalogCall((signal) =>
      catalog.getSimilar(ref.id, { limit: config.topK, signal }),
    );
    const series = results.filter((s) => s.id !== ref.id).slice(0, config.topK);
    if (series.length === 0) throw new CatalogNotFoundError(ref.title);
    return {
      outcome: { kind: 'similar', referenceTitle: ref.title, series },
      patch: { lastSeriesId: ref.id, lastSeriesTitle: ref.title },
    };
  }

  private async recommend(criteria: PreferenceCriteria, carried: CarriedSlotsT): Promise<DispatchResult> {
    const { catalog, config } = this.deps;
    const query = [criteria.genre, criteria.network].filter(Boolean).join(' ');
    const results: SeriesSummary[] = await this.catalogCall((signal) =>
      catalog.search(query, { year: criteria.year, limit: config.topK * RECOMMEND_POOL_FACTOR, signal }),
    );
    const series = rankByPreference(results, criteria, config.topK);
    if (series.length === 0) throw new CatalogNotFoundError(describeCriteria(criteria));
    return {
      outcome: { kind: 'recommendations', criteria, series },
      patch: {
        lastGenreFilter: criteria.genre,
        lastNetworkFilter: criteria.network,
        favoriteGenres: appendUnique(carried.favoriteGenres, criteria.genre),
        preferredNetworks: appendUnique(carried.preferredNetworks, criteria.network),
      },
    };
  }
}
