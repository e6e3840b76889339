/**
 * Read-only projections of catalog data. The chat core aggregates and formats
 * these but never edits them.
 */
export interface SeriesSummary {
  id: string;
  title: string;
  overview?: string;
  genres: string[];
  network?: string;
  year?: number;
  country?: string;
  status?: string;
}

export interface SeriesDetail extends SeriesSummary {
  firstAired?: string;
  lastAired?: string;
  originalLanguage?: string;
  averageRuntime?: number;
  score?: number;
}

export interface CatalogCallOptions {
  signal?: AbortSignal;
}

export interface SearchOptions extends CatalogCallOptions {
  limit?: number;
  /** Exact first-aired year. */
  year?: number;
  /** Case-insensitive substring of the network name. */
  network?: string;
}

/**
 * Catalog capability consumed by the orchestrator.
 *
 * `search` returns results in relevance order and may be empty; `getSeries`
 * resolves to null when the id is unknown. Transport problems reject with a
 * {@link CatalogTransportError}.
 */
export interface CatalogClient {
  search(query: string, opts?: SearchOptions): Promise<SeriesSummary[]>;
  getSeries(id: string, opts?: CatalogCallOptions): Promise<SeriesDetail | null>;
  getSimilar(id: string, opts?: SearchOptions): Promise<SeriesSummary[]>;
}
