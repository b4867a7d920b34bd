import { describe, expect, it } from 'vitest';
import { Matches, createMatches } from '../../services/matches/index.js';
import { createRuleContext } from '../../services/logger/correlation.js';
import { TitleFromPosition, markerSorted, fileparts } from '../../services/titles/index.js';
import { spans, tag, values } from '../helpers/spans.js';

function run(matches: Matches): number {
  const consequences = new TitleFromPosition().when(matches, createRuleContext(matches.input));
  matches.apply(consequences);
  return consequences.length;
}

describe('TitleFromPosition', () => {
  it('takes the unmatched text before the episode markers', () => {
    const input = 'Show.Name.S01E02.mkv';
    const matches = createMatches(input, [
      tag(input, 'season', 'S01'),
      tag(input, 'episodeNumber', 'E02'),
      tag(input, 'container', 'mkv', { tags: ['extension'] }),
    ]);

    run(matches);

    expect(values(matches, 'title')).toEqual(['Show Name']);
    expect(spans(matches, 'title')).toEqual([[0, 10]]);
    expect(matches.named('title')[0]?.tags).toEqual(['title']);
  });

  it('splits an alternative title on a spaced separator', () => {
    const input = 'Show - Other Name.mkv';
    const matches = createMatches(input, [tag(input, 'container', 'mkv', { tags: ['extension'] })]);

    run(matches);

    expect(values(matches, 'title')).toEqual(['Show']);
    expect(values(matches, 'alternativeTitle')).toEqual(['Other Name']);
    expect(spans(matches, 'alternativeTitle')).toEqual([[6, 18]]);
  });

  it('does not split a hyphenated word', () => {
    const input = 'Spider-Man.mkv';
    const matches = createMatches(input, [tag(input, 'container', 'mkv', { tags: ['extension'] })]);

    run(matches);

    expect(values(matches, 'title')).toEqual(['Spider-Man']);
    expect(matches.named('alternativeTitle')).toEqual([]);
  });

  it('keeps a trailing language out of the title', () => {
    const input = 'Show.FRENCH.mkv';
    const matches = createMatches(input, [
      tag(input, 'language', 'FRENCH'),
      tag(input, 'container', 'mkv', { tags: ['extension'] }),
    ]);

    run(matches);

    expect(values(matches, 'title')).toEqual(['Show']);
    expect(values(matches, 'language')).toEqual(['FRENCH']);
  });

  it('crops bracketed groups out of the hole', () => {
    const input = '[Group] Show.mkv';
    const matches = createMatches(input, [tag(input, 'container', 'mkv', { tags: ['extension'] })]);

    run(matches);

    expect(values(matches, 'title')).toEqual(['Show']);
    expect(spans(matches, 'title')).toEqual([[7, 13]]);
  });

  it('also reads a title from a segment holding a year', () => {
    const input = 'Show (2010)/Show.S01E02.mkv';
    const matches = createMatches(input, [
      tag(input, 'year', '2010'),
      tag(input, 'season', 'S01'),
      tag(input, 'episodeNumber', 'E02'),
      tag(input, 'container', 'mkv', { tags: ['extension'] }),
    ]);

    run(matches);

    expect(spans(matches, 'title')).toEqual([
      [0, 6],
      [12, 17],
    ]);
    expect(values(matches, 'title')).toEqual(['Show', 'Show']);
  });

  it('does nothing once a tagged title exists', () => {
    const input = 'Show.Name.S01E02.mkv';
    const matches = createMatches(input, [tag(input, 'season', 'S01')]);

    expect(run(matches)).toBeGreaterThan(0);
    expect(run(matches)).toBe(0);
  });
});

describe('markerSorted', () => {
  it('puts segments with more matches first', () => {
    const input = 'Show/Season 1/S01E02.mkv';
    const matches = createMatches(input, [
      tag(input, 'season', 'Season 1'),
      tag(input, 'season', 'S01'),
      tag(input, 'episodeNumber', 'E02'),
      tag(input, 'container', 'mkv', { tags: ['extension'] }),
    ]);

    expect(markerSorted(fileparts(matches), matches).map((m) => m.raw)).toEqual([
      'S01E02.mkv',
      'Season 1',
      'Show',
    ]);
  });

  it('prefers the deeper segment on a tie', () => {
    const matches = createMatches('A/B');
    expect(markerSorted(fileparts(matches), matches).map((m) => m.raw)).toEqual(['B', 'A']);
  });
});

describe('fileparts', () => {
  it('falls back to the whole input without path markers', () => {
    const parts = fileparts(new Matches('Show.mkv'));
    expect(parts.map((m) => [m.name, m.start, m.end])).toEqual([['path', 0, 8]]);
  });
});
