import { describe, expect, it } from 'vitest';
import type { Story } from '@storypage/data-model';
import { escapeHtml, renderCharacterCard, renderStoryPage, toAsciiHtml } from './render';

const story: Story = {
  id: 108992,
  title: 'Spider & Friends',
  description: 'Peter meets "Tony" <again>',
  attributionHTML: '<a href="http://marvel.com">Data provided by Marvel. © 2024 MARVEL</a>',
  authorList: 'Alice Writer (writer), Bob Artist (penciller)',
  seriesList: 'Test Series',
  eventList: '',
  characterURIs: []
};

const ironMan = {
  id: 1,
  name: 'Iron Man',
  description: "Tony's suit",
  thumbnailURL: 'http://img.example/iron.jpg'
};

const amelie = { id: 2, name: 'Amélie', description: '', thumbnailURL: '' };

describe('escapeHtml', () => {
  it('escapes markup-significant characters', () => {
    expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe(
      '&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#39;s&lt;/a&gt;'
    );
  });
});

describe('toAsciiHtml', () => {
  it('writes non-ASCII code points as numeric references', () => {
    expect(toAsciiHtml('Amélie © 🦸')).toBe('Am&#233;lie &#169; &#129464;');
  });

  it('leaves ASCII untouched', () => {
    expect(toAsciiHtml('<p>plain</p>')).toBe('<p>plain</p>');
  });
});

describe('renderCharacterCard', () => {
  it('renders image, name and description', () => {
    expect(renderCharacterCard(ironMan).split('\n')).toEqual([
      '        <article class="character">',
      '          <img src="http://img.example/iron.jpg" alt="Iron Man">',
      '          <h3>Iron Man</h3>',
      '          <p>Tony&#39;s suit</p>',
      '        </article>'
    ]);
  });

  it('omits the image and description when absent', () => {
    expect(renderCharacterCard(amelie).split('\n')).toEqual([
      '        <article class="character">',
      '          <h3>Amélie</h3>',
      '        </article>'
    ]);
  });
});

describe('renderStoryPage', () => {
  const lines = renderStoryPage({ story, characters: [ironMan, amelie] }).split('\n');

  it('escapes the title and description', () => {
    expect(lines).toContain('    <title>Spider &amp; Friends</title>');
    expect(lines).toContain('      <h1>Spider &amp; Friends</h1>');
    expect(lines).toContain('      <p class="description">Peter meets &quot;Tony&quot; &lt;again&gt;</p>');
  });

  it('lists credits and marks empty ones', () => {
    expect(lines).toContain(
      '        <dt>Authors</dt><dd>Alice Writer (writer), Bob Artist (penciller)</dd>'
    );
    expect(lines).toContain('        <dt>Series</dt><dd>Test Series</dd>');
    expect(lines).toContain('        <dt>Events</dt><dd>&mdash;</dd>');
  });

  it('renders one card per character', () => {
    expect(lines.filter((line) => line === '        <article class="character">')).toHaveLength(2);
    expect(lines).toContain('          <h3>Am&#233;lie</h3>');
  });

  it('inserts the attribution markup unescaped', () => {
    expect(lines).toContain(
      '    <footer class="attribution"><a href="http://marvel.com">Data provided by Marvel. &#169; 2024 MARVEL</a></footer>'
    );
  });

  it('produces a pure ASCII document', () => {
    expect(lines.every((line) => /^[\x00-\x7f]*$/.test(line))).toBe(true);
    expect(lines[0]).toBe('<!DOCTYPE html>');
  });

  it('falls back to the story id for an empty title', () => {
    const untitled = renderStoryPage({ story: { ...story, title: '' }, characters: [] }).split('\n');

    expect(untitled).toContain('      <h1>Story 108992</h1>');
    expect(untitled).toContain('        <p class="empty">No characters are listed for this story.</p>');
  });
});
