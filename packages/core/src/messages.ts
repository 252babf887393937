/**
 * Failure messages shared by every engine, so that the same parser fails with
 * the same text whichever engine runs it.
 */

import { config } from "./config.js";

export const END_OF_INPUT = "unexpected end of input";
export const EXPECTED_END_OF_INPUT = "expected end of input";
export const NO_CHOICE = "failed to parse any of the possible choices";

/**
 * Prefix every line of `text` with `width` spaces (default: the configured
 * `indent`).
 */
export function indent(text: string, width: number = config.get("indent")): string {
  const pad = " ".repeat(width);
  return text
    .split("\n")
    .map((line) => pad + line)
    .join("\n");
}

/** Render a token for a message. */
export function showToken(token: unknown): string {
  if (typeof token === "string") return JSON.stringify(token);
  if (token === undefined || typeof token === "function" || typeof token === "symbol") {
    return String(token);
  }
  try {
    return JSON.stringify(token) ?? String(token);
  } catch {
    return String(token);
  }
}

export function unexpectedToken(token: unknown): string {
  return `satisfy: unexpected token ${showToken(token)}`;
}

/**
 * Message for a labeled choice in which every alternative failed:
 *
 * ```
 * failed to parse any of the possible choices:
 *   num:
 *     satisfy: unexpected token "x"
 *   alpha:
 *     ...
 * ```
 */
export function choiceFailure(failures: ReadonlyArray<readonly [string, string]>): string {
  if (failures.length === 0) return NO_CHOICE;
  const listed = failures.map(([label, message]) => `${label}:\n${indent(message)}`).join("\n");
  return `${NO_CHOICE}:\n${indent(listed)}`;
}
