import { IniOptionsError } from './errors.js';

export interface IniParseOptions {
  /** Indented lines continue the value of the previous key. */
  allowMultiline?: boolean;
  /** Strip a UTF-8 byte order mark from the first line. */
  allowBom?: boolean;
  /** Honour inline comments; the trigger character must follow whitespace. */
  allowInlineComments?: boolean;
  /** Characters that start an inline comment. */
  inlineCommentPrefixes?: string;
  /** Characters that start a comment when they open a line. */
  startCommentPrefixes?: string;
  /** Abort on the first fault instead of reporting it after the full pass. */
  stopOnFirstError?: boolean;
  /** Deliver section-only events (empty name and value) to the handler. */
  callHandlerOnNewSection?: boolean;
  /** Treat a line without separator as a key with an empty value. */
  allowNoValue?: boolean;
  /** Longest accepted line, in UTF-8 bytes. */
  maxLine?: number;
}

export type ResolvedIniParseOptions = Readonly<Required<IniParseOptions>>;

export const DEFAULT_PARSE_OPTIONS: ResolvedIniParseOptions = Object.freeze({
  allowMultiline: false,
  allowBom: true,
  allowInlineComments: true,
  inlineCommentPrefixes: ';',
  startCommentPrefixes: ';#',
  stopOnFirstError: false,
  callHandlerOnNewSection: true,
  allowNoValue: false,
  maxLine: 200,
});

/**
 * Merge caller options over the defaults and freeze the result.
 * Fields left `undefined` keep their default.
 */
export function resolveParseOptions(options: IniParseOptions = {}): ResolvedIniParseOptions {
  const defaults = DEFAULT_PARSE_OPTIONS;
  const resolved: Required<IniParseOptions> = {
    allowMultiline: options.allowMultiline ?? defaults.allowMultiline,
    allowBom: options.allowBom ?? defaults.allowBom,
    allowInlineComments: options.allowInlineComments ?? defaults.allowInlineComments,
    inlineCommentPrefixes: options.inlineCommentPrefixes ?? defaults.inlineCommentPrefixes,
    startCommentPrefixes: options.startCommentPrefixes ?? defaults.startCommentPrefixes,
    stopOnFirstError: options.stopOnFirstError ?? defaults.stopOnFirstError,
    callHandlerOnNewSection: options.callHandlerOnNewSection ?? defaults.callHandlerOnNewSection,
    allowNoValue: options.allowNoValue ?? defaults.allowNoValue,
    maxLine: options.maxLine ?? defaults.maxLine,
  };

  if (!Number.isInteger(resolved.maxLine) || resolved.maxLine <= 0) {
    throw new IniOptionsError(`maxLine must be a positive integer, got ${String(resolved.maxLine)}`);
  }
  for (const field of ['inlineCommentPrefixes', 'startCommentPrefixes'] as const) {
    if (typeof resolved[field] !== 'string') {
      throw new IniOptionsError(`${field} must be a string of prefix characters`);
    }
    if (/\s/.test(resolved[field])) {
      throw new IniOptionsError(`${field} must not contain whitespace`);
    }
  }

  return Object.freeze(resolved);
}
