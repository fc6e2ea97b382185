/**
 * Position-tracked view over source text.
 *
 * A cursor never mutates the text it wraps. Advancing returns a new cursor,
 * so a parser that fails simply hands back nothing and the caller keeps
 * the cursor it started with.
 */

import type { Position, Span } from "./types.js";

export class Cursor {
  private constructor(
    /** Full, original source text */
    readonly source: string,
    /** Absolute index into `source` (UTF-16 code units) */
    readonly offset: number,
    /** 1-based line number at `offset` */
    readonly line: number
  ) {}

  static from(source: string): Cursor {
    return new Cursor(source, 0, 1);
  }

  /** Remaining, unconsumed text. */
  get fragment(): string {
    return this.source.slice(this.offset);
  }

  get position(): Position {
    return { line: this.line, offset: this.offset };
  }

  get atEnd(): boolean {
    return this.offset >= this.source.length;
  }

  /** Character at `offset + index`, or "" past the end. */
  peek(index = 0): string {
    return this.source.charAt(this.offset + index);
  }

  startsWith(prefix: string): boolean {
    return this.source.startsWith(prefix, this.offset);
  }

  /**
   * Consume `count` characters, counting the newlines passed over.
   */
  advance(count: number): Cursor {
    const end = Math.min(this.source.length, this.offset + count);
    let line = this.line;
    for (let i = this.offset; i < end; i++) {
      if (this.source.charCodeAt(i) === 10) line++;
    }
    return new Cursor(this.source, end, line);
  }

  /** Move to an absolute offset at or after the current one. */
  seek(offset: number): Cursor {
    return this.advance(offset - this.offset);
  }

  /**
   * Match a sticky regex at the cursor. Returns the matched text, or null.
   */
  match(pattern: RegExp): string | null {
    const sticky = pattern.sticky ? pattern : new RegExp(pattern.source, pattern.flags + "y");
    sticky.lastIndex = this.offset;
    const result = sticky.exec(this.source);
    return result ? result[0] : null;
  }

  /** Offset of the next `needle` at or after the cursor, or -1. */
  indexOf(needle: string): number {
    return this.source.indexOf(needle, this.offset);
  }

  /** Text between this cursor and a later one. */
  sliceTo(later: Cursor): string {
    return this.source.slice(this.offset, later.offset);
  }

  spanTo(later: Cursor): Span {
    return { start: this.position, end: later.position };
  }
}
