import { describe, expect, it } from 'vitest';
import {
  Match,
  Matches,
  SEPS,
  TITLE_SEPS,
  byName,
  cleanup,
  hasTag,
  hasValue,
} from '../../services/matches/index.js';
import { MatchNotFoundError } from '../../utils/errors.js';
import { first, tag } from '../helpers/spans.js';

const INPUT = 'Show.S01E02.Pilot.mkv';

function episodeMatches(): Matches {
  return new Matches(INPUT, {
    matches: [
      tag(INPUT, 'container', 'mkv', { tags: ['extension'] }),
      tag(INPUT, 'episodeNumber', 'E02'),
      tag(INPUT, 'title', 'Show', { tags: ['title'] }),
      tag(INPUT, 'season', 'S01'),
    ],
  });
}

describe('Matches queries', () => {
  it('keeps matches in document order', () => {
    expect(episodeMatches().all.map((m) => m.name)).toEqual(['title', 'season', 'episodeNumber', 'container']);
  });

  it('named returns every match with the name', () => {
    expect(episodeMatches().named('season').map((m) => m.value)).toEqual(['S01']);
    expect(episodeMatches().named('crc32')).toEqual([]);
  });

  it('range returns matches fully inside the bounds', () => {
    const matches = episodeMatches();
    expect(matches.range(5, 11).map((m) => m.name)).toEqual(['season', 'episodeNumber']);
    expect(matches.range(5, 10).map((m) => m.name)).toEqual(['season']);
    expect(matches.range(0, undefined, byName('title'), 0)?.value).toBe('Show');
  });

  describe('previous', () => {
    it('returns the matches ending closest before the span', () => {
      const matches = episodeMatches();
      const episode = first(matches, 'episodeNumber');
      expect(matches.previous(episode).map((m) => m.name)).toEqual(['season']);
    });

    it('filters only the closest matches, it does not keep walking', () => {
      const matches = episodeMatches();
      const episode = first(matches, 'episodeNumber');
      expect(matches.previous(episode, byName('title'))).toEqual([]);
    });

    it('skips unmatched text', () => {
      const matches = episodeMatches();
      expect(matches.previous({ start: 12, end: 17 }, undefined, 0)?.name).toBe('episodeNumber');
    });

    it('finds nothing before the first match', () => {
      const matches = episodeMatches();
      const title = first(matches, 'title');
      expect(matches.previous(title, undefined, 0)).toBeUndefined();
    });
  });

  describe('holes', () => {
    it('returns raw gaps between matches', () => {
      expect(episodeMatches().holes(0, INPUT.length).map((h) => h.raw)).toEqual(['.', '.Pilot.']);
    });

    it('formats holes and drops the empty ones', () => {
      const holes = episodeMatches().holes(0, INPUT.length, { formatter: cleanup, predicate: hasValue() });
      expect(holes.map((h) => h.value)).toEqual(['Pilot']);
      expect(holes.map((h) => [h.start, h.end])).toEqual([[11, 18]]);
    });

    it('closes a hole at a separator', () => {
      const matches = new Matches('Show - Pilot');
      expect(matches.holes(0, 12, { seps: TITLE_SEPS }).map((h) => h.raw)).toEqual(['Show ', ' Pilot']);
    });

    it('looks through ignored matches', () => {
      const input = 'Pilot.FRENCH.mkv';
      const matches = new Matches(input, {
        matches: [tag(input, 'language', 'FRENCH'), tag(input, 'container', 'mkv')],
      });
      const hole = matches.holes(
        0,
        input.length,
        { ignore: byName('language'), formatter: cleanup, predicate: hasValue() },
        0,
      );
      expect(hole?.value).toBe('Pilot FRENCH');
      expect([hole?.start, hole?.end]).toEqual([0, 13]);
    });

    it('returns undefined for a missing index', () => {
      expect(episodeMatches().holes(0, 4, {}, 0)).toBeUndefined();
    });
  });

  describe('chains', () => {
    const input = 'S01 Show - Alt';
    const chained = (): Matches =>
      new Matches(input, {
        matches: [
          tag(input, 'season', 'S01'),
          tag(input, 'title', 'Show', { tags: ['title'] }),
          tag(input, 'alternativeTitle', 'Alt'),
        ],
      });

    it('chainBefore walks back over separators', () => {
      expect(chained().chainBefore(11, SEPS, hasTag('title'), 0)?.value).toBe('Show');
    });

    it('chainBefore without predicate collects the whole run', () => {
      expect(chained().chainBefore(11, SEPS).map((m) => m.name)).toEqual(['title', 'season']);
    });

    it('chainBefore stops at a match failing the predicate', () => {
      expect(chained().chainBefore(11, SEPS, byName('season'))).toEqual([]);
    });

    it('chainAfter walks forward over separators', () => {
      expect(chained().chainAfter(3, SEPS, hasTag('title'), 0)?.value).toBe('Show');
      expect(chained().chainAfter(0, SEPS, hasTag('title'))).toEqual([]);
    });
  });
});

describe('Matches mutation', () => {
  it('relabel swaps the entry in place', () => {
    const matches = episodeMatches();
    const title = first(matches, 'title');
    const renamed = matches.relabel(title, 'episodeTitle');

    expect(renamed.value).toBe('Show');
    expect([renamed.start, renamed.end]).toEqual([0, 4]);
    expect(matches.has(title)).toBe(false);
    expect(matches.has(renamed)).toBe(true);
    expect(matches.size).toBe(4);
    expect(matches.all.map((m) => m.name)).toEqual(['episodeTitle', 'season', 'episodeNumber', 'container']);
  });

  it('remove throws for a match it does not hold', () => {
    const matches = episodeMatches();
    expect(() => matches.remove(new Match(0, 4, INPUT, { name: 'title' }))).toThrow(MatchNotFoundError);
  });

  it('apply rejects the whole batch when one target is missing', () => {
    const matches = episodeMatches();
    const stranger = new Match(12, 17, INPUT, { name: 'title' });

    expect(() =>
      matches.apply([
        { kind: 'append', match: new Match(12, 17, INPUT, { name: 'episodeTitle' }) },
        { kind: 'remove', match: stranger },
      ]),
    ).toThrow(MatchNotFoundError);
    expect(matches.size).toBe(4);
    expect(matches.named('episodeTitle')).toEqual([]);
  });

  it('apply returns the affected matches', () => {
    const matches = episodeMatches();
    const season = first(matches, 'season');
    const pilot = new Match(12, 17, INPUT, { name: 'episodeTitle' });

    const affected = matches.apply([
      { kind: 'append', match: pilot },
      { kind: 'relabel', match: season, name: 'seasonCount' },
    ]);

    expect(affected.map((m) => `${m.name}:${m.value}`)).toEqual(['episodeTitle:Pilot', 'seasonCount:S01']);
    expect(matches.named('season')).toEqual([]);
  });
});
