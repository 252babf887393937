/**
 * Error reporting
 */

/** Descriptive parse error with the position of the failure. */
export class ParseError extends Error {
  /** Stream offset at which parsing failed. */
  readonly offset: number;
  /** The parser's failure message. */
  readonly reason: string;

  constructor(reason: string, offset: number) {
    super(`Parse error at token ${offset}: ${reason}`);
    this.name = "ParseError";
    this.offset = offset;
    this.reason = reason;
  }
}
