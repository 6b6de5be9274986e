import type { ResourceFetcher } from '@storypage/api-client';
import type { Character, Story } from '@storypage/data-model';

export type StoryPageSource = Pick<ResourceFetcher, 'fetchStory' | 'fetchCharacterByUrl'>;

export interface StoryPage {
  readonly story: Story;
  readonly characters: readonly Character[];
}

/** Story first, then its characters one request at a time, in story order. */
export async function assembleStoryPage(
  source: StoryPageSource,
  storyId: number
): Promise<StoryPage> {
  const story = await source.fetchStory(storyId);
  const characters: Character[] = [];
  for (const uri of story.characterURIs) {
    characters.push(await source.fetchCharacterByUrl(uri));
  }
  return { story, characters };
}
