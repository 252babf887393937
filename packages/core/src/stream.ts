/**
 * Token streams
 *
 * A `TokenStream<T>` is the remainder every engine threads through a parse:
 * an immutable view of the tokens not yet consumed. Taking a token yields a
 * new stream and leaves the old one untouched, so any number of alternatives
 * can start from the same remainder.
 */

/**
 * Persistent sequence of tokens.
 */
export interface TokenStream<T> {
  /** Tokens taken from the underlying source so far, minus tokens pushed back. */
  readonly offset: number;
  /**
   * Tokens taken by `uncons` so far, pushed-back tokens included. Unlike
   * `offset` it never goes down, so it tells whether a parser moved at all.
   */
  readonly consumed: number;
  /** The next token and the stream after it, or `undefined` at end of input. */
  uncons(): readonly [T, TokenStream<T>] | undefined;
  /** A stream that yields `tokens` first, then this stream. */
  prepend(tokens: readonly T[]): TokenStream<T>;
}

/** Anything an engine driver accepts as input. */
export type Input<T> = TokenStream<T> | Iterable<T>;

abstract class BaseStream<T> implements TokenStream<T> {
  abstract readonly offset: number;
  abstract readonly consumed: number;
  abstract uncons(): readonly [T, TokenStream<T>] | undefined;

  prepend(tokens: readonly T[]): TokenStream<T> {
    return tokens.length === 0 ? this : new PushbackStream(tokens, 0, this, this.consumed);
  }
}

class ArrayStream<T> extends BaseStream<T> {
  constructor(
    private readonly tokens: readonly T[],
    private readonly index: number,
  ) {
    super();
  }

  get offset(): number {
    return this.index;
  }

  get consumed(): number {
    return this.index;
  }

  uncons(): readonly [T, TokenStream<T>] | undefined {
    if (this.index >= this.tokens.length) return undefined;
    return [this.tokens[this.index], new ArrayStream(this.tokens, this.index + 1)];
  }
}

class StringStream extends BaseStream<string> {
  constructor(
    private readonly text: string,
    private readonly index: number,
    readonly offset: number,
  ) {
    super();
  }

  get consumed(): number {
    return this.offset;
  }

  uncons(): readonly [string, TokenStream<string>] | undefined {
    const code = this.text.codePointAt(this.index);
    if (code === undefined) return undefined;
    const char = String.fromCodePoint(code);
    return [char, new StringStream(this.text, this.index + char.length, this.offset + 1)];
  }
}

/**
 * Pulls from an iterator the first time a position is demanded and remembers
 * the answer, so re-reading a position never touches the source again.
 */
class IteratorStream<T> extends BaseStream<T> {
  private cell: readonly [T, TokenStream<T>] | undefined | null = null;

  constructor(
    private readonly source: Iterator<T>,
    readonly offset: number,
  ) {
    super();
  }

  get consumed(): number {
    return this.offset;
  }

  uncons(): readonly [T, TokenStream<T>] | undefined {
    if (this.cell === null) {
      const step = this.source.next();
      this.cell = step.done ? undefined : [step.value, new IteratorStream(this.source, this.offset + 1)];
    }
    return this.cell;
  }
}

class PushbackStream<T> extends BaseStream<T> {
  constructor(
    private readonly tokens: readonly T[],
    private readonly index: number,
    private readonly base: TokenStream<T>,
    readonly consumed: number,
  ) {
    super();
  }

  get offset(): number {
    return this.base.offset - (this.tokens.length - this.index);
  }

  uncons(): readonly [T, TokenStream<T>] | undefined {
    const next = this.index + 1;
    const rest =
      next === this.tokens.length
        ? shifted(this.base, this.consumed + 1 - this.base.consumed)
        : new PushbackStream(this.tokens, next, this.base, this.consumed + 1);
    return [this.tokens[this.index], rest];
  }
}

/**
 * The stream after a pushback has been read: `base`, with the re-read tokens
 * added to its `consumed` count.
 */
class ShiftedStream<T> extends BaseStream<T> {
  constructor(
    readonly base: TokenStream<T>,
    readonly extra: number,
  ) {
    super();
  }

  get offset(): number {
    return this.base.offset;
  }

  get consumed(): number {
    return this.base.consumed + this.extra;
  }

  uncons(): readonly [T, TokenStream<T>] | undefined {
    const cell = this.base.uncons();
    return cell === undefined ? undefined : [cell[0], shifted(cell[1], this.extra)];
  }
}

function shifted<T>(base: TokenStream<T>, extra: number): TokenStream<T> {
  if (extra === 0) return base;
  // Flattened, so repeated pushbacks never nest wrappers
  return base instanceof ShiftedStream
    ? new ShiftedStream(base.base, base.extra + extra)
    : new ShiftedStream(base, extra);
}

// ============================================================================
// Adapters
// ============================================================================

export function fromArray<T>(tokens: readonly T[]): TokenStream<T> {
  return new ArrayStream(tokens, 0);
}

/** A stream of the code points of `text`. */
export function fromString(text: string): TokenStream<string> {
  return new StringStream(text, 0, 0);
}

/**
 * Wrap an iterator. Tokens are pulled only as parsing reaches them, so the
 * source may be unbounded or still being produced.
 */
export function fromIterator<T>(source: Iterator<T>): TokenStream<T> {
  return new IteratorStream(source, 0);
}

export function fromIterable<T>(source: Iterable<T>): TokenStream<T> {
  return fromIterator(source[Symbol.iterator]());
}

export function isTokenStream<T>(input: Input<T>): input is TokenStream<T> {
  return typeof input === "object" && input !== null && "uncons" in input && typeof input.uncons === "function";
}

export function toStream<T>(input: Input<T>): TokenStream<T> {
  return isTokenStream(input) ? input : fromIterable(input);
}

/**
 * Drain the rest of a stream into an array.
 */
export function collect<T>(stream: TokenStream<T>): T[] {
  const out: T[] = [];
  for (let cell = stream.uncons(); cell !== undefined; cell = cell[1].uncons()) {
    out.push(cell[0]);
  }
  return out;
}
