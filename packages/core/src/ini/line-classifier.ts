/**
 * Classifies one physical line against the running parse state.
 *
 * Precedence, first match wins:
 *
 *   1. BOM strip (line 1 only)
 *   2. blank line                → ignore
 *   3. start-of-line comment     → ignore
 *   4. indented line after a key → continuation (multi-line mode)
 *   5. [section]                 → section
 *   6. name = value / name: value
 *   7. bare name                 → key with empty value (no-value mode)
 *   8. anything else             → invalid when strict, otherwise ignore
 *
 * An inline comment trigger only counts when the character before it is
 * whitespace, so `4#5#6` and `test;3` pass through untouched.
 */

import {
  isIniWhitespace,
  startsWithAny,
  stripBom,
  trimIni,
  trimIniStart,
} from './line-normalizer.js';
import type { ResolvedIniParseOptions } from './options.js';

/** The part of the parse state the classifier reads. */
export interface LineContext {
  /** 1-based physical line number. */
  readonly lineNumber: number;
  /** Name of the last key seen in the current section; empty when none. */
  readonly previousKey: string;
}

export type LineOutcome =
  | { type: 'ignore' }
  | { type: 'section'; section: string }
  | { type: 'key-value'; name: string; value: string }
  | { type: 'continuation'; value: string }
  | { type: 'invalid'; reason: string };

type CommentOptions = Pick<ResolvedIniParseOptions, 'allowInlineComments' | 'inlineCommentPrefixes'>;

const IGNORE: LineOutcome = { type: 'ignore' };
const SEPARATORS = '=:';

/**
 * Index of the first character of `text` that is one of `targets`, or of
 * the first inline comment trigger if that comes earlier. -1 when neither
 * occurs. Callers check which of the two they got.
 */
export function findCharOrComment(text: string, targets: string, options: CommentOptions): number {
  let wasSpace = false;
  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    if (targets.includes(ch)) return i;
    if (options.allowInlineComments && wasSpace && options.inlineCommentPrefixes.includes(ch)) {
      return i;
    }
    wasSpace = isIniWhitespace(ch);
  }
  return -1;
}

/** Drop an inline comment (if any) and trim what is left. */
export function removeInlineComment(text: string, prefixes: string): string {
  let wasSpace = false;
  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    if (wasSpace && prefixes.includes(ch)) {
      return trimIni(text.slice(0, i));
    }
    wasSpace = isIniWhitespace(ch);
  }
  return trimIni(text);
}

export function classifyLine(
  rawLine: string,
  context: LineContext,
  options: ResolvedIniParseOptions,
): LineOutcome {
  const line = context.lineNumber === 1 && options.allowBom ? stripBom(rawLine) : rawLine;
  const trimmed = trimIni(line);

  if (trimmed.length === 0) return IGNORE;
  if (startsWithAny(trimmed, options.startCommentPrefixes)) return IGNORE;

  if (options.allowMultiline && context.previousKey !== '' && isIniWhitespace(line.charAt(0))) {
    return { type: 'continuation', value: continuationValue(line, trimmed, options) };
  }

  if (trimmed.startsWith('[')) {
    return classifySectionHeader(trimmed, options);
  }

  const separator = findCharOrComment(trimmed, SEPARATORS, options);
  if (separator !== -1 && SEPARATORS.includes(trimmed.charAt(separator))) {
    const rest = trimmed.slice(separator + 1);
    return {
      type: 'key-value',
      name: trimIni(trimmed.slice(0, separator)),
      value: options.allowInlineComments
        ? removeInlineComment(rest, options.inlineCommentPrefixes)
        : trimIni(rest),
    };
  }

  if (options.allowNoValue) {
    const name = options.allowInlineComments
      ? removeInlineComment(trimmed, options.inlineCommentPrefixes)
      : trimmed;
    return { type: 'key-value', name, value: '' };
  }

  // Lenient mode skips lines it cannot make sense of.
  return options.stopOnFirstError ? { type: 'invalid', reason: 'invalid line format' } : IGNORE;
}

function continuationValue(line: string, trimmed: string, options: ResolvedIniParseOptions): string {
  if (!options.allowInlineComments) return line;
  const indent = line.slice(0, line.length - trimIniStart(line).length);
  return indent + removeInlineComment(trimmed, options.inlineCommentPrefixes);
}

/**
 * The `]` search stops at an inline comment trigger the same way the
 * separator search does. A trigger ahead of the bracket hides it, so
 * `[abc ;x]` is a missing closing bracket, not a section named `abc `.
 */
function classifySectionHeader(trimmed: string, options: ResolvedIniParseOptions): LineOutcome {
  const end = findCharOrComment(trimmed, ']', options);
  if (end === -1 || trimmed.charAt(end) !== ']') {
    return { type: 'invalid', reason: 'missing closing bracket' };
  }
  if (end === 1) {
    return { type: 'invalid', reason: 'empty section name' };
  }
  // Interior spaces are part of the name: "[ a ]" is section " a ".
  return { type: 'section', section: trimmed.slice(1, end) };
}
