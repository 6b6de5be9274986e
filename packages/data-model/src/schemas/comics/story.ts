import { z } from 'zod';

/* ------------------------------------------------------------------ */
/*  Raw payloads                                                      */
/* ------------------------------------------------------------------ */

export const ResourceSummarySchema = z
  .object({
    resourceURI: z.string(),
    name: z.string()
  })
  .passthrough();

export const CreatorSummarySchema = ResourceSummarySchema.extend({
  role: z.string().default('')
});

export const ResourceListSchema = z
  .object({ items: z.array(ResourceSummarySchema).default([]) })
  .passthrough();

export const CreatorListSchema = z
  .object({ items: z.array(CreatorSummarySchema).default([]) })
  .passthrough();

export const StoryResultSchema = z
  .object({
    id: z.number().int(),
    title: z.string().nullish(),
    description: z.string().nullish(),
    resourceURI: z.string().optional(),
    creators: CreatorListSchema.default({ items: [] }),
    series: ResourceListSchema.default({ items: [] }),
    events: ResourceListSchema.default({ items: [] }),
    characters: ResourceListSchema.default({ items: [] })
  })
  .passthrough();

/** Only the id is read from story listings. */
export const StoryRefSchema = z.object({ id: z.number().int() }).passthrough();

export type ResourceSummary = z.infer<typeof ResourceSummarySchema>;
export type CreatorSummary = z.infer<typeof CreatorSummarySchema>;
export type StoryResult = z.infer<typeof StoryResultSchema>;

/* ------------------------------------------------------------------ */
/*  Domain record                                                     */
/* ------------------------------------------------------------------ */

export interface Story {
  readonly id: number;
  readonly title: string;
  readonly description: string;
  readonly attributionHTML: string;
  /** `"Name (Role), Name (Role)"`; empty when the story lists no creators. */
  readonly authorList: string;
  readonly seriesList: string;
  readonly eventList: string;
  readonly characterURIs: readonly string[];
}

const LIST_SEPARATOR = ', ';

export function formatCreators(creators: readonly CreatorSummary[]): string {
  return creators.map((creator) => `${creator.name} (${creator.role})`).join(LIST_SEPARATOR);
}

export function joinNames(items: readonly ResourceSummary[]): string {
  return items.map((item) => item.name).join(LIST_SEPARATOR);
}

/**
 * Build a Story from a raw result. `attributionHTML` is passed separately
 * because the API only sends it on the response envelope.
 */
export function toStory(raw: StoryResult, attributionHTML: string): Story {
  return Object.freeze({
    id: raw.id,
    title: raw.title ?? '',
    description: raw.description ?? '',
    attributionHTML,
    authorList: formatCreators(raw.creators.items),
    seriesList: joinNames(raw.series.items),
    eventList: joinNames(raw.events.items),
    characterURIs: Object.freeze(raw.characters.items.map((item) => item.resourceURI))
  });
}
