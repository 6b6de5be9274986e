import type { ResourceFetcher } from '@storypage/api-client';
import { format } from './log';

export type StoryCatalog = Pick<ResourceFetcher, 'resolveCharacterId' | 'listStoryIdsForCharacter'>;

/** Uniform pick; `random` returns values in [0, 1) like Math.random. */
export function pickRandom<T>(items: readonly T[], random: () => number = Math.random): T {
  if (items.length === 0) {
    throw new RangeError('Cannot pick from an empty list');
  }
  const index = Math.min(Math.floor(random() * items.length), items.length - 1);
  return items[index];
}

/**
 * Resolve a character by name and pick one of its stories at random.
 * Lists every story first, so popular characters take many requests.
 */
export async function pickRandomStoryId(
  catalog: StoryCatalog,
  characterName: string,
  random: () => number = Math.random
): Promise<number> {
  format.info(`Looking for a comic from ${characterName}...`);
  format.warn('This may take a while for popular characters!');

  const characterId = await catalog.resolveCharacterId(characterName);
  const storyIds = await catalog.listStoryIdsForCharacter(characterId);
  return pickRandom(storyIds, random);
}
