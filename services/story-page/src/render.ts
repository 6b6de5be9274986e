/**
 * Static HTML for a story page.
 *
 * Text from the API is escaped; `attributionHTML` is markup the API supplies
 * for display and is inserted as-is. The finished document is pure ASCII,
 * with every other code point written as a numeric character reference.
 */

import type { Character } from '@storypage/data-model';
import type { StoryPage } from './page';

const EMPTY_FIELD = '&mdash;';

const STYLES = [
  'body{font-family:system-ui,sans-serif;margin:0;background:#f4f4f4;color:#202020}',
  'main{max-width:960px;margin:0 auto;padding:2rem}',
  'dt{font-weight:600}',
  '.characters{display:grid;grid-template-columns:repeat(auto-fill,minmax(200px,1fr));gap:1rem}',
  '.characters h2{grid-column:1/-1}',
  '.character img{width:100%;border-radius:4px}',
  '.attribution{text-align:center;padding:1rem;font-size:.875rem}'
].join('');

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function toAsciiHtml(html: string): string {
  return html.replace(/[^\x00-\x7f]/gu, (char) => `&#${char.codePointAt(0) ?? 0};`);
}

function field(value: string): string {
  return value ? escapeHtml(value) : EMPTY_FIELD;
}

export function renderCharacterCard(character: Character): string {
  const lines = ['        <article class="character">'];
  if (character.thumbnailURL) {
    lines.push(
      `          <img src="${escapeHtml(character.thumbnailURL)}" alt="${escapeHtml(character.name)}">`
    );
  }
  lines.push(`          <h3>${escapeHtml(character.name)}</h3>`);
  if (character.description) {
    lines.push(`          <p>${escapeHtml(character.description)}</p>`);
  }
  lines.push('        </article>');
  return lines.join('\n');
}

function renderCharacters(characters: readonly Character[]): string {
  if (characters.length === 0) {
    return '        <p class="empty">No characters are listed for this story.</p>';
  }
  return characters.map(renderCharacterCard).join('\n');
}

export function renderStoryPage({ story, characters }: StoryPage): string {
  const title = story.title ? escapeHtml(story.title) : `Story ${story.id}`;

  const html = [
    '<!DOCTYPE html>',
    '<html lang="en">',
    '  <head>',
    '    <meta charset="utf-8">',
    '    <meta name="viewport" content="width=device-width, initial-scale=1">',
    `    <title>${title}</title>`,
    `    <style>${STYLES}</style>`,
    '  </head>',
    '  <body>',
    '    <main>',
    `      <h1>${title}</h1>`,
    `      <p class="description">${field(story.description)}</p>`,
    '      <dl class="credits">',
    `        <dt>Authors</dt><dd>${field(story.authorList)}</dd>`,
    `        <dt>Series</dt><dd>${field(story.seriesList)}</dd>`,
    `        <dt>Events</dt><dd>${field(story.eventList)}</dd>`,
    '      </dl>',
    '      <section class="characters">',
    '        <h2>Characters</h2>',
    renderCharacters(characters),
    '      </section>',
    '    </main>',
    `    <footer class="attribution">${story.attributionHTML}</footer>`,
    '  </body>',
    '</html>',
    ''
  ].join('\n');

  return toAsciiHtml(html);
}
