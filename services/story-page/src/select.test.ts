import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { NotFoundError } from '@storypage/api-client';
import { pickRandom, pickRandomStoryId, type StoryCatalog } from './select';

function fakeCatalog(storyIds: number[]): StoryCatalog {
  return {
    resolveCharacterId: vi.fn().mockResolvedValue(1009368),
    listStoryIdsForCharacter: vi.fn().mockResolvedValue(storyIds)
  };
}

describe('pickRandom', () => {
  it('maps the random value onto an index', () => {
    const items = ['a', 'b', 'c', 'd'];

    expect(pickRandom(items, () => 0)).toBe('a');
    expect(pickRandom(items, () => 0.5)).toBe('c');
    expect(pickRandom(items, () => 0.999)).toBe('d');
  });

  it('clamps a random source that returns 1', () => {
    expect(pickRandom(['a', 'b'], () => 1)).toBe('b');
  });

  it('refuses an empty list', () => {
    expect(() => pickRandom([], () => 0)).toThrow(RangeError);
  });
});

describe('pickRandomStoryId', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('resolves the character and picks from its stories', async () => {
    const catalog = fakeCatalog([11, 22, 33]);

    await expect(pickRandomStoryId(catalog, 'Iron Man', () => 0.4)).resolves.toBe(22);
    expect(catalog.resolveCharacterId).toHaveBeenCalledWith('Iron Man');
    expect(catalog.listStoryIdsForCharacter).toHaveBeenCalledWith(1009368);
  });

  it('logs what it is looking for', async () => {
    await pickRandomStoryId(fakeCatalog([1]), 'Storm', () => 0);

    expect(console.log).toHaveBeenCalledWith(expect.stringContaining('Looking for a comic from Storm...'));
    expect(console.warn).toHaveBeenCalledWith(
      expect.stringContaining('This may take a while for popular characters!')
    );
  });

  it('propagates lookup failures unchanged', async () => {
    const failure = new NotFoundError('character', 'Nobody');
    const catalog: StoryCatalog = {
      resolveCharacterId: vi.fn().mockRejectedValue(failure),
      listStoryIdsForCharacter: vi.fn()
    };

    await expect(pickRandomStoryId(catalog, 'Nobody')).rejects.toBe(failure);
    expect(catalog.listStoryIdsForCharacter).not.toHaveBeenCalled();
  });
});
