import { z } from 'zod';

const idLike = z.union([z.string(), z.number()]);

export const TvdbEnvelope = z.object({
  status: z.string().optional(),
  data: z.unknown(),
});

export const TvdbLoginData = z.object({
  token: z.string().min(1),
});

export const TvdbSearchItem = z.object({
  id: idLike.nullish(),
  tvdb_id: idLike.nullish(),
  name: z.string(),
  overview: z.string().nullish(),
  overviews: z.record(z.string()).nullish(),
  genres: z.array(z.string()).nullish(),
  network: z.string().nullish(),
  year: idLike.nullish(),
  country: z.string().nullish(),
  status: z.string().nullish(),
});
export type TvdbSearchItemT = z.infer<typeof TvdbSearchItem>;

// Rows are validated one at a time by the client.
export const TvdbSearchData = z.array(z.unknown());

const named = z.object({ name: z.string() });

export const TvdbSeriesExtended = z.object({
  id: z.number(),
  name: z.string(),
  overview: z.string().nullish(),
  year: idLike.nullish(),
  firstAired: z.string().nullish(),
  lastAired: z.string().nullish(),
  status: z.object({ name: z.string().nullish() }).nullish(),
  originalNetwork: named.nullish(),
  latestNetwork: named.nullish(),
  genres: z.array(named).nullish(),
  originalCountry: z.string().nullish(),
  originalLanguage: z.string().nullish(),
  averageRuntime: z.number().nullish(),
  score: z.number().nullish(),
});
export type TvdbSeriesExtendedT = z.infer<typeof TvdbSeriesExtended>;
