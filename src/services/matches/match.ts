/**
 * A tagged span over the normalized input string.
 * Immutable — span or name changes produce a new Match.
 */

export type Formatter = (raw: string) => string;

export interface Span {
  start: number;
  end: number;
}

export interface MatchInit {
  name?: string;
  tags?: readonly string[];
  value?: string;
  formatter?: Formatter;
}

export class Match implements Span {
  readonly name: string;
  readonly tags: readonly string[];
  readonly formatter?: Formatter;
  private readonly explicitValue?: string;

  constructor(
    readonly start: number,
    readonly end: number,
    readonly input: string,
    init: MatchInit = {},
  ) {
    this.name = init.name ?? '';
    this.tags = init.tags ?? [];
    this.formatter = init.formatter;
    this.explicitValue = init.value;
  }

  get raw(): string {
    return this.input.slice(this.start, this.end);
  }

  get value(): string {
    if (this.explicitValue !== undefined) return this.explicitValue;
    return this.formatter ? this.formatter(this.raw) : this.raw;
  }

  get length(): number {
    return this.end - this.start;
  }

  /** Same name, tags and formatter over a different span. */
  withSpan(start: number, end: number): Match {
    return new Match(start, end, this.input, {
      name: this.name,
      tags: this.tags,
      formatter: this.formatter,
      value: this.explicitValue,
    });
  }

  /** Same span and value under a new name (and optionally new tags). */
  rename(name: string, tags: readonly string[] = this.tags): Match {
    return new Match(this.start, this.end, this.input, {
      name,
      tags,
      formatter: this.formatter,
      value: this.explicitValue,
    });
  }

  hasTag(tag: string): boolean {
    return this.tags.includes(tag);
  }

  /** Pieces of this match not covered by any of `spans`. */
  crop(spans: readonly Span[]): Match[] {
    let pieces: Match[] = [this];
    for (const span of spans) {
      const next: Match[] = [];
      for (const piece of pieces) {
        if (span.end <= piece.start || span.start >= piece.end) {
          next.push(piece);
          continue;
        }
        if (span.start > piece.start) next.push(piece.withSpan(piece.start, span.start));
        if (span.end < piece.end) next.push(piece.withSpan(span.end, piece.end));
      }
      pieces = next;
    }
    return pieces;
  }

  /**
   * Cut at every character of `seps`. Pieces keep this match's name, tags
   * and formatter; pieces whose value is empty are dropped.
   */
  split(seps: string): Match[] {
    const pieces: Match[] = [];
    let pieceStart = this.start;
    for (let i = this.start; i < this.end; i++) {
      if (seps.includes(this.input.charAt(i))) {
        if (i > pieceStart) pieces.push(this.withSpan(pieceStart, i));
        pieceStart = i + 1;
      }
    }
    if (this.end > pieceStart) pieces.push(this.withSpan(pieceStart, this.end));
    return pieces.filter((piece) => piece.value.length > 0);
  }

  toJSON(): { name: string; value: string; start: number; end: number; tags: readonly string[] } {
    return { name: this.name, value: this.value, start: this.start, end: this.end, tags: this.tags };
  }
}
