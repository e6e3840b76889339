import type Bottleneck from 'bottleneck';
import type { RetryPolicy } from 'cockatiel';
import type { ZodType, ZodTypeDef } from 'zod';
import type { CatalogConfig } from '../config/catalog.js';
import type {
  CatalogCallOptions,
  CatalogClient,
  SearchOptions,
  SeriesDetail,
  SeriesSummary,
} from '../catalog/types.js';
import { CatalogTransportError } from '../catalog/errors.js';
import {
  TvdbEnvelope,
  TvdbLoginData,
  TvdbSearchData,
  TvdbSearchItem,
  TvdbSeriesExtended,
  type TvdbSearchItemT,
  type TvdbSeriesExtendedT,
} from '../schemas/catalog.js';
import { httpFetch, isAbortError, readErrorBody, type HttpResponse } from '../util/fetch.js';
import { createLimiter, createRetry } from '../util/resilience.js';
import type { Logger } from '../util/logging.js';

// Tokens are valid for a month; refresh a day early.
const TOKEN_TTL_MS = 29 * 24 * 60 * 60 * 1000;
const DEFAULT_SEARCH_LIMIT = 10;
const DEFAULT_SIMILAR_LIMIT = 5;

/**
 * TheTVDB ids come back as `81189`, `"81189"` or `"series-81189"`.
 */
export function normalizeTvdbId(raw: string | number | null | undefined): string | undefined {
  if (raw === null || raw === undefined) return undefined;
  const text = String(raw).trim().replace(/^series-/, '');
  return /^\d+$/.test(text) ? text : undefined;
}

function parseYear(raw: string | number | null | undefined): number | undefined {
  if (raw === null || raw === undefined || raw === '') return undefined;
  const n = Number.parseInt(String(raw), 10);
  return Number.isFinite(n) ? n : undefined;
}

function clean(value: string | null | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function toSeriesSummary(item: TvdbSearchItemT): SeriesSummary | undefined {
  const id = normalizeTvdbId(item.tvdb_id ?? item.id);
  if (!id) return undefined;
  return {
    id,
    title: item.name,
    overview: clean(item.overview) ?? clean(item.overviews?.eng),
    genres: item.genres ?? [],
    network: clean(item.network),
    year: parseYear(item.year),
    country: clean(item.country),
    status: clean(item.status),
  };
}

export function toSeriesDetail(data: TvdbSeriesExtendedT): SeriesDetail {
  return {
    id: String(data.id),
    title: data.name,
    overview: clean(data.overview),
    genres: (data.genres ?? []).map((g) => g.name),
    network: clean(data.originalNetwork?.name) ?? clean(data.latestNetwork?.name),
    year: parseYear(data.year) ?? parseYear(data.firstAired?.slice(0, 4)),
    country: clean(data.originalCountry),
    status: clean(data.status?.name),
    firstAired: clean(data.firstAired),
    lastAired: clean(data.lastAired),
    originalLanguage: clean(data.originalLanguage),
    averageRuntime: data.averageRuntime ?? undefined,
    score: data.score ?? undefined,
  };
}

/**
 * Catalog client for TheTVDB v4.
 *
 * Logs in lazily with the project API key, re-authenticates once on a 401, and
 * retries 429/5xx/network failures according to `maxAttempts`. The network
 * filter runs on the result page; TheTVDB cannot apply it server-side.
 */
export class TvdbCatalogClient implements CatalogClient {
  private token?: string;
  private tokenExpiresAt = 0;
  private pendingLogin?: Promise<string>;
  private readonly limiter: Bottleneck;
  private readonly retryPolicy?: RetryPolicy;

  constructor(
    private readonly config: CatalogConfig,
    private readonly log: Logger,
  ) {
    this.limiter = createLimiter({ minTime: config.minTimeMs, maxConcurrent: config.maxConcurrent });
    this.retryPolicy = createRetry(
      config.maxAttempts,
      (err) => err instanceof CatalogTransportError && err.retryable,
    );
  }

  async search(query: string, opts: SearchOptions = {}): Promise<SeriesSummary[]> {
    const params = new URLSearchParams({ q: query, type: 'series' });
    if (opts.year) params.set('year', String(opts.year));
    const data = await this.get(`/search?${params.toString()}`, TvdbSearchData, opts.signal);
    if (!data) return [];

    const network = opts.network?.toLowerCase();
    const results: SeriesSummary[] = [];
    let skipped = 0;
    for (const raw of data) {
      const item = TvdbSearchItem.safeParse(raw);
      const series = item.success ? toSeriesSummary(item.data) : undefined;
      if (!series) {
        skipped++;
        continue;
      }
      if (opts.year && series.year !== opts.year) continue;
      if (network && series.network && !series.network.toLowerCase().includes(network)) continue;
      results.push(series);
    }
    if (skipped > 0) this.log.debug({ query, skipped }, 'tvdb_search_rows_skipped');
    return results.slice(0, opts.limit ?? DEFAULT_SEARCH_LIMIT);
  }

  async getSeries(id: string, opts: CatalogCallOptions = {}): Promise<SeriesDetail | null> {
    const tvdbId = normalizeTvdbId(id);
    if (!tvdbId) return null;
    const data = await this.get(`/series/${tvdbId}/extended?short=true`, TvdbSeriesExtended, opts.signal);
    return data ? toSeriesDetail(data) : null;
  }

  /**
   * Series sharing the reference's primary genre, reference excluded.
   */
  async getSimilar(id: string, opts: SearchOptions = {}): Promise<SeriesSummary[]> {
    const reference = await this.getSeries(id, opts);
    if (!reference) return [];
    const primaryGenre = reference.genres[0];
    if (!primaryGenre) return [];

    const candidates = await this.search(primaryGenre, { limit: DEFAULT_SEARCH_LIMIT, signal: opts.signal });
    return candidates
      .filter((s) => s.id !== reference.id)
      .slice(0, opts.limit ?? DEFAULT_SIMILAR_LIMIT);
  }

  private async get<T>(path: string, schema: ZodType<T, ZodTypeDef, unknown>, signal?: AbortSignal): Promise<T | null> {
    const run = () => this.limiter.schedule(() => this.getOnce(path, schema, signal));
    return this.retryPolicy ? this.retryPolicy.execute(run, signal) : run();
  }

  private async getOnce<T>(path: string, schema: ZodType<T, ZodTypeDef, unknown>, signal?: AbortSignal): Promise<T | null> {
    let res = await this.send('GET', path, await this.ensureToken(signal), undefined, signal);
    if (res.status === 401) {
      this.log.debug({ path }, 'tvdb_token_rejected');
      this.token = undefined;
      res = await this.send('GET', path, await this.ensureToken(signal), undefined, signal);
    }
    if (res.status === 404) return null;
    if (!res.ok) {
      const body = await readErrorBody(res);
      this.log.debug({ path, status: res.status, body }, 'tvdb_request_failed');
      throw new CatalogTransportError(`tvdb_http_${res.status}`, {
        status: res.status,
        retryable: res.status === 429 || res.status >= 500,
      });
    }
    return this.unwrap(await res.json(), schema, path);
  }

  private unwrap<T>(payload: unknown, schema: ZodType<T, ZodTypeDef, unknown>, path: string): T {
    const envelope = TvdbEnvelope.safeParse(payload);
    const parsed = envelope.success ? schema.safeParse(envelope.data.data) : undefined;
    if (!parsed?.success) {
      this.log.warn({ path }, 'tvdb_unexpected_payload');
      throw new CatalogTransportError('tvdb_bad_payload');
    }
    return parsed.data;
  }

  /** Concurrent callers share one login request. */
  private async ensureToken(signal?: AbortSignal): Promise<string> {
    if (this.token && Date.now() < this.tokenExpiresAt) return this.token;
    if (this.pendingLogin) return this.pendingLogin;
    const login = this.login(signal);
    this.pendingLogin = login;
    try {
      return await login;
    } finally {
      if (this.pendingLogin === login) this.pendingLogin = undefined;
    }
  }

  private async login(signal?: AbortSignal): Promise<string> {
    if (!this.config.apiKey) {
      throw new CatalogTransportError('tvdb_missing_api_key');
    }
    const body = JSON.stringify({ apikey: this.config.apiKey, ...(this.config.pin ? { pin: this.config.pin } : {}) });
    const res = await this.send('POST', '/login', undefined, body, signal);
    if (!res.ok) {
      throw new CatalogTransportError(`tvdb_login_${res.status}`, {
        status: res.status,
        retryable: res.status >= 500,
      });
    }
    const { token } = this.unwrap(await res.json(), TvdbLoginData, '/login');
    this.token = token;
    this.tokenExpiresAt = Date.now() + TOKEN_TTL_MS;
    return token;
  }

  private async send(
    method: 'GET' | 'POST',
    path: string,
    token: string | undefined,
    body: string | undefined,
    signal?: AbortSignal,
  ): Promise<HttpResponse> {
    const url = `${this.config.baseUrl.replace(/\/$/, '')}${path}`;
    const headers: Record<string, string> = { 'Content-Type': 'application/json', Accept: 'application/json' };
    if (token) headers.Authorization = `Bearer ${token}`;
    try {
      return await httpFetch(url, { method, headers, body, signal });
    } catch (error) {
      if (isAbortError(error)) {
        throw new CatalogTransportError('tvdb_aborted', { cause: error });
      }
      throw new CatalogTransportError('tvdb_network_error', { retryable: true, cause: error });
    }
  }
}
