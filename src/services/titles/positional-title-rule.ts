/**
 * Positional title inference — carve a title out of the unmatched text of a
 * path segment. Subclasses steer it through the protected hooks.
 *
 * Pipeline per segment:
 * 1. Holes over the segment, ignoring `ignoredNames` matches
 * 2. Holes cropped by bracketed group markers
 * 3. First hole passing `holeFilter` wins
 * 4. Ignored matches at either end of the hole: keep and/or crop (`shouldKeep`)
 * 5. Ignored matches left inside the hole are removed (`shouldRemove`)
 * 6. Optional split into title + alternative titles on TITLE_SEPS
 */
import {
  Match,
  SEPS,
  TITLE_SEPS,
  allOf,
  anyName,
  byName,
  cleanup,
  formatters,
  hasTag,
  hasValue,
  isMatch,
  not,
  reorderTitle,
} from '../matches/index.js';
import type { Consequence, Matches } from '../matches/index.js';
import type { RuleContext } from '../logger/correlation.js';
import { Rule, append, remove } from '../rules/index.js';

export interface KeepDecision {
  /** Leave the ignored match in the collection. */
  keep: boolean;
  /** Shrink the hole so it no longer covers the ignored match. */
  crop: boolean;
}

const KEEP: KeepDecision = { keep: true, crop: true };
const DROP: KeepDecision = { keep: false, crop: false };

export const TITLE_FORMATTER = formatters(cleanup, reorderTitle);

// Title-like and extension matches say nothing about where a title lives.
const SEGMENT_WEIGHT = allOf(
  not(anyName(['title', 'episodeTitle', 'alternativeTitle'])),
  not(allOf(byName('container'), hasTag('extension'))),
);

/**
 * Segments holding more matches first; ties go to the deeper segment.
 */
export function markerSorted(markers: readonly Match[], matches: Matches): Match[] {
  return markers
    .map((marker, index) => ({
      marker,
      index,
      weight: matches.range(marker.start, marker.end, SEGMENT_WEIGHT).length,
    }))
    .sort((a, b) => b.weight - a.weight || b.index - a.index)
    .map(({ marker }) => marker);
}

/** Path segments of the collection, or the whole input when none were marked. */
export function fileparts(matches: Matches): Match[] {
  const paths = matches.markers.named('path');
  if (paths.length > 0) return paths;
  return [new Match(0, matches.input.length, matches.input, { name: 'path' })];
}

export abstract class PositionalTitleRule extends Rule {
  /** Matches the title may swallow; they do not interrupt a hole. */
  protected readonly ignoredNames: readonly string[] = ['language', 'country'];

  constructor(
    protected readonly matchName: string,
    protected readonly matchTags: readonly string[] = [],
    protected readonly alternativeMatchName?: string,
  ) {
    super();
  }

  protected holeFilter(_hole: Match, _matches: Matches, _filepart: Match): boolean {
    return true;
  }

  protected filepartFilter(_filepart: Match, _matches: Matches): boolean {
    return true;
  }

  /**
   * Language and country tags survive when they are the whole hole, or when
   * they are the only one of their kind in the segment and either trail the
   * title or are short codes ("FR", "US").
   */
  protected shouldKeep(
    match: Match,
    toKeep: readonly Match[],
    matches: Matches,
    filepart: Match,
    hole: Match,
    starting: boolean,
  ): KeepDecision {
    if (match.name !== 'language' && match.name !== 'country') return DROP;
    if (hole.value.length === match.raw.length) return KEEP;

    const others = filepart
      .crop([hole])
      .flatMap((outside) => matches.range(outside.start, outside.end, byName(match.name)))
      .filter((other) => !toKeep.includes(other));
    if (others.length === 0 && (!starting || match.raw.length <= 3)) return KEEP;
    return DROP;
  }

  protected shouldRemove(
    _match: Match,
    _matches: Matches,
    _filepart: Match,
    _hole: Match,
    _context: RuleContext,
  ): boolean {
    return true;
  }

  protected holesProcess(holes: readonly Match[], matches: Matches): Match[] {
    const paths = matches.markers.named('path');
    const groups = matches.markers
      .named('group')
      .filter((group) => !paths.some((path) => path.start === group.start && path.end === group.end));
    return holes.flatMap((hole) => hole.crop(groups));
  }

  when(matches: Matches, context: RuleContext): Consequence[] {
    const segments = markerSorted(fileparts(matches), matches).filter((filepart) =>
      this.filepartFilter(filepart, matches),
    );
    const yearSegments = segments.filter(
      (filepart) => matches.range(filepart.start, filepart.end, byName('year'), 0) !== undefined,
    );

    const consequences: Consequence[] = [];
    const scanned = new Set<Match>();
    for (const filepart of segments) {
      scanned.add(filepart);
      const found = this.checkTitlesInFilepart(filepart, matches, context);
      if (found) {
        consequences.push(...found);
        break;
      }
    }

    // A year pins its segment as a title source even after a title was found.
    for (const filepart of yearSegments) {
      if (scanned.has(filepart)) continue;
      const found = this.checkTitlesInFilepart(filepart, matches, context);
      if (found) consequences.push(...found);
    }

    return consequences;
  }

  private checkTitlesInFilepart(
    filepart: Match,
    matches: Matches,
    context: RuleContext,
  ): Consequence[] | undefined {
    const ignored = anyName(this.ignoredNames);
    const holes = this.holesProcess(
      matches.holes(filepart.start, filepart.end, {
        formatter: TITLE_FORMATTER,
        ignore: ignored,
        predicate: hasValue(),
      }),
      matches,
    );

    for (const candidate of holes) {
      if (!candidate.value || !this.holeFilter(candidate, matches, filepart)) continue;

      let hole = candidate;
      const toKeep: Match[] = [];
      const ignoredMatches = matches.range(hole.start, hole.end, ignored);

      for (const ignoredMatch of [...ignoredMatches].reverse()) {
        const trailing = matches.chainBefore(hole.end, SEPS, isMatch(ignoredMatch));
        if (trailing.length === 0) continue;
        const decision = this.shouldKeep(ignoredMatch, toKeep, matches, filepart, hole, false);
        if (decision.keep) toKeep.push(ignoredMatch);
        if (decision.crop) hole = hole.withSpan(hole.start, ignoredMatch.start);
      }

      for (const ignoredMatch of ignoredMatches) {
        if (toKeep.includes(ignoredMatch)) continue;
        const leading = matches.chainAfter(hole.start, SEPS, isMatch(ignoredMatch));
        if (leading.length === 0) continue;
        const decision = this.shouldKeep(ignoredMatch, toKeep, matches, filepart, hole, true);
        if (decision.keep) toKeep.push(ignoredMatch);
        if (decision.crop) hole = hole.withSpan(ignoredMatch.end, hole.end);
      }

      if (!hole.value) continue;

      const toRemove = ignoredMatches.filter(
        (match) => !toKeep.includes(match) && this.shouldRemove(match, matches, filepart, hole, context),
      );
      const title = hole.rename(this.matchName, this.matchTags);
      const titles = this.alternativeMatchName
        ? this.splitAlternatives(title, this.alternativeMatchName, matches)
        : [title];

      return [...toRemove.map(remove), ...titles.map(append)];
    }

    return undefined;
  }

  /**
   * "Show - Other Name" → title "Show" + alternative "Other Name".
   * A bare hyphen between word characters ("Spider-Man") does not split.
   */
  private splitAlternatives(title: Match, alternativeName: string, matches: Matches): Match[] {
    const merged: Match[] = [];
    for (const piece of title.split(TITLE_SEPS)) {
      const previous = merged.at(-1);
      if (previous) {
        const separator = matches.input.slice(previous.end, piece.start);
        const hyphenated =
          separator === '-' &&
          !SEPS.includes(previous.raw.slice(-1)) &&
          !SEPS.includes(piece.raw.charAt(0));
        if (hyphenated) {
          merged[merged.length - 1] = previous.withSpan(previous.start, piece.end);
          continue;
        }
      }
      merged.push(piece);
    }

    if (merged.length === 0) return [title];
    return merged.map((piece, index) => (index === 0 ? piece : piece.rename(alternativeName)));
  }
}
