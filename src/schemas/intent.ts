import { z } from 'zod';

export const Intent = z.enum([
  'SEARCH_BY_TITLE',
  'GET_DETAILS',
  'FIND_SIMILAR',
  'RECOMMEND_BY_PREFERENCE',
  'GENERAL_CHAT',
  'UNKNOWN',
]);
export type IntentT = z.infer<typeof Intent>;

export const SlotSet = z.object({
  title: z.string().nullable().optional(),
  genre: z.string().nullable().optional(),
  network: z.string().nullable().optional(),
  year: z.number().int().nullable().optional(),
});
export type SlotSetT = z.infer<typeof SlotSet>;

// What the model is asked to return. Values are normalized by the extractor;
// a mismatch here means UNKNOWN.
export const RawExtraction = z.object({
  intent: z.string(),
  slots: z.record(z.unknown()).nullable().optional(),
  confidence: z.union([z.number(), z.string()]).nullable().optional(),
});

export const CarriedSlots = z.object({
  lastSeriesId: z.string().optional(),
  lastSeriesTitle: z.string().optional(),
  lastGenreFilter: z.string().optional(),
  lastNetworkFilter: z.string().optional(),
  favoriteGenres: z.array(z.string()).optional(),
  preferredNetworks: z.array(z.string()).optional(),
});
export type CarriedSlotsT = z.infer<typeof CarriedSlots>;
