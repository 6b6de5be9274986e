import { z } from 'zod';

export const ImageSchema = z.object({
  path: z.string(),
  extension: z.string()
});

export const CharacterResultSchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    description: z.string().nullish(),
    thumbnail: ImageSchema.nullish(),
    resourceURI: z.string().optional()
  })
  .passthrough();

export type Image = z.infer<typeof ImageSchema>;
export type CharacterResult = z.infer<typeof CharacterResultSchema>;

export interface Character {
  readonly id: number;
  readonly name: string;
  readonly description: string;
  readonly thumbnailURL: string;
}

/** `path` + `.` + `extension`, the form the image CDN serves. */
export function thumbnailUrl(image: Image | null | undefined): string {
  if (!image) return '';
  return `${image.path}.${image.extension}`;
}

export function toCharacter(raw: CharacterResult): Character {
  return Object.freeze({
    id: raw.id,
    name: raw.name,
    description: raw.description ?? '',
    thumbnailURL: thumbnailUrl(raw.thumbnail)
  });
}
