import { MatchNotFoundError } from '../../utils/errors.js';
import { Match } from './match.js';
import type { Formatter, Span } from './match.js';
import { test } from './predicates.js';
import type { MatchPredicate } from './predicates.js';

/**
 * A change a rule asks for. The store applies a rule's whole batch or none of it.
 */
export type Consequence =
  | { kind: 'append'; match: Match }
  | { kind: 'remove'; match: Match }
  | { kind: 'relabel'; match: Match; name: string };

export interface HolesOptions {
  formatter?: Formatter;
  /** Characters that close an open hole. */
  seps?: string;
  /** Matches treated as absent while looking for gaps. */
  ignore?: MatchPredicate;
  /** Filter applied to the finished holes. */
  predicate?: MatchPredicate;
}

function filterIndex(items: Match[], predicate?: MatchPredicate): Match[];
function filterIndex(items: Match[], predicate: MatchPredicate | undefined, index: number): Match | undefined;
function filterIndex(
  items: Match[],
  predicate?: MatchPredicate,
  index?: number,
): Match[] | Match | undefined;
function filterIndex(
  items: Match[],
  predicate?: MatchPredicate,
  index?: number,
): Match[] | Match | undefined {
  const filtered = predicate ? items.filter((item) => test(predicate, item)) : items;
  return index === undefined ? filtered : filtered.at(index);
}

function byPosition(a: Span, b: Span): number {
  return a.start - b.start || a.end - b.end;
}

/**
 * Read-only marker lookups (path segments, group brackets).
 */
export class Markers {
  private readonly items: readonly Match[];

  constructor(markers: readonly Match[] = []) {
    this.items = [...markers].sort(byPosition);
  }

  get all(): readonly Match[] {
    return this.items;
  }

  named(name: string): Match[] {
    return this.items.filter((marker) => marker.name === name);
  }
}

/**
 * Mutable collection of matches over one input string, with the span query
 * surface rules are written against. Owned by a single caller at a time.
 */
export class Matches {
  readonly markers: Markers;
  private items: Match[] = [];

  constructor(
    readonly input: string,
    options: { matches?: readonly Match[]; markers?: readonly Match[] } = {},
  ) {
    this.markers = new Markers(options.markers);
    for (const match of options.matches ?? []) this.append(match);
  }

  /** All matches in document order. */
  get all(): readonly Match[] {
    return this.items;
  }

  get size(): number {
    return this.items.length;
  }

  get maxEnd(): number {
    return this.items.reduce((max, m) => Math.max(max, m.end), this.input.length);
  }

  has(match: Match): boolean {
    return this.items.includes(match);
  }

  named(name: string, predicate?: MatchPredicate): Match[] {
    return filterIndex(
      this.items.filter((m) => m.name === name),
      predicate,
    );
  }

  /** Matches covering offset `i`. */
  atIndex(i: number): Match[] {
    return this.items.filter((m) => m.start <= i && i < m.end);
  }

  starting(i: number): Match[] {
    return this.items.filter((m) => m.start === i);
  }

  ending(i: number): Match[] {
    return this.items.filter((m) => m.end === i && m.length > 0);
  }

  /**
   * Matches at the closest offset before `span` where anything ends,
   * filtered afterwards. A predicate does not make the walk skip over a
   * nearer match that fails it.
   */
  previous(span: Span, predicate?: MatchPredicate): Match[];
  previous(span: Span, predicate: MatchPredicate | undefined, index: number): Match | undefined;
  previous(span: Span, predicate?: MatchPredicate, index?: number): Match[] | Match | undefined {
    for (let current = span.start; current >= 0; current--) {
      const ending = this.ending(current).filter((m) => m !== span);
      if (ending.length > 0) return filterIndex(ending, predicate, index);
    }
    return filterIndex([], predicate, index);
  }

  /** Matches fully inside `[start, end)`. */
  range(start?: number, end?: number, predicate?: MatchPredicate): Match[];
  range(start: number | undefined, end: number | undefined, predicate: MatchPredicate | undefined, index: number): Match | undefined;
  range(start = 0, end?: number, predicate?: MatchPredicate, index?: number): Match[] | Match | undefined {
    const stop = end ?? this.maxEnd;
    const inside = this.items.filter((m) => m.start >= start && m.end <= stop);
    return filterIndex(inside, predicate, index);
  }

  /**
   * Gaps in `[start, end)` not covered by any match. With `seps`, a
   * separator character closes the hole it falls in.
   */
  holes(start?: number, end?: number, options?: HolesOptions): Match[];
  holes(start: number | undefined, end: number | undefined, options: HolesOptions, index: number): Match | undefined;
  holes(start = 0, end?: number, options: HolesOptions = {}, index?: number): Match[] | Match | undefined {
    const { formatter, seps, ignore, predicate } = options;
    const stop = Math.min(end ?? this.maxEnd, this.maxEnd);
    const found: Match[] = [];
    let holeStart: number | null = null;

    const close = (at: number): void => {
      if (holeStart !== null) found.push(new Match(holeStart, at, this.input, { formatter }));
      holeStart = null;
    };

    for (let i = start; i < stop; i++) {
      const covered = this.atIndex(i).some((m) => !(ignore && test(ignore, m)));
      if (seps && holeStart !== null && seps.includes(this.input.charAt(i))) {
        close(i);
      } else if (!covered && holeStart === null) {
        holeStart = i;
      } else if (covered && holeStart !== null) {
        close(i);
      }
    }
    close(stop);

    return filterIndex(found, predicate, index);
  }

  /**
   * Walking back from `position`, collect matches satisfying `predicate`.
   * Separator characters with no such match are skipped; anything else
   * ends the chain.
   */
  chainBefore(position: number, seps: string, predicate?: MatchPredicate): Match[];
  chainBefore(position: number, seps: string, predicate: MatchPredicate | undefined, index: number): Match | undefined;
  chainBefore(position: number, seps: string, predicate?: MatchPredicate, index?: number): Match[] | Match | undefined {
    const chain: Match[] = [];
    for (let i = Math.min(position, this.maxEnd) - 1; i >= 0; i--) {
      if (!this.extendChain(chain, i, predicate) && !seps.includes(this.input.charAt(i))) break;
    }
    return filterIndex(chain, undefined, index);
  }

  /** Mirror of `chainBefore`, walking forward from `position`. */
  chainAfter(position: number, seps: string, predicate?: MatchPredicate): Match[];
  chainAfter(position: number, seps: string, predicate: MatchPredicate | undefined, index: number): Match | undefined;
  chainAfter(position: number, seps: string, predicate?: MatchPredicate, index?: number): Match[] | Match | undefined {
    const chain: Match[] = [];
    const maxEnd = this.maxEnd;
    for (let i = position; i < maxEnd; i++) {
      if (!this.extendChain(chain, i, predicate) && !seps.includes(this.input.charAt(i))) break;
    }
    return filterIndex(chain, undefined, index);
  }

  private extendChain(chain: Match[], i: number, predicate?: MatchPredicate): boolean {
    const matching = predicate ? this.atIndex(i).filter((m) => test(predicate, m)) : this.atIndex(i);
    for (const m of matching) {
      if (!chain.includes(m)) chain.push(m);
    }
    return matching.length > 0;
  }

  append(match: Match): void {
    // Insert after every match sorting at or before it, so equal spans keep arrival order.
    const at = this.items.findIndex((m) => byPosition(m, match) > 0);
    if (at === -1) this.items.push(match);
    else this.items.splice(at, 0, match);
  }

  remove(match: Match): void {
    const at = this.items.indexOf(match);
    if (at === -1) throw new MatchNotFoundError(match.name, match.start, match.end);
    this.items.splice(at, 1);
  }

  /**
   * Replace `match` by a copy carrying `name`, in place. The old entry is
   * never visible alongside the new one.
   */
  relabel(match: Match, name: string): Match {
    const at = this.items.indexOf(match);
    if (at === -1) throw new MatchNotFoundError(match.name, match.start, match.end);
    const renamed = match.rename(name);
    this.items[at] = renamed;
    return renamed;
  }

  /**
   * Apply a rule's consequences. Every referenced match is checked first so a
   * bad batch leaves the collection untouched.
   */
  apply(consequences: readonly Consequence[]): Match[] {
    for (const consequence of consequences) {
      if (consequence.kind !== 'append' && !this.has(consequence.match)) {
        const { name, start, end } = consequence.match;
        throw new MatchNotFoundError(name, start, end);
      }
    }

    const affected: Match[] = [];
    for (const consequence of consequences) {
      switch (consequence.kind) {
        case 'append':
          this.append(consequence.match);
          affected.push(consequence.match);
          break;
        case 'remove':
          this.remove(consequence.match);
          affected.push(consequence.match);
          break;
        case 'relabel':
          affected.push(this.relabel(consequence.match, consequence.name));
          break;
      }
    }
    return affected;
  }
}
