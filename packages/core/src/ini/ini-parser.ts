/**
 * INI parse driver. Feeds lines through the classifier and hands every
 * (section, name, value) event to a caller-supplied handler.
 *
 *   [section]          → handle('section', '', '')
 *   name = value       → handle('section', 'name', 'value')
 *     continued        → handle('section', 'name', '  continued')   (multi-line mode)
 *
 * Error policy:
 *   - stopOnFirstError: the first fault ends the parse and is returned.
 *   - otherwise every line is processed, so the handler sees all valid
 *     events, and the earliest fault is returned at the end.
 */

import { readFileSync } from 'node:fs';
import type { Readable } from 'node:stream';

import {
  IniError,
  IniFileOpenError,
  IniHandlerError,
  IniMemoryError,
  IniSyntaxError,
} from './errors.js';
import { classifyLine, type LineContext } from './line-classifier.js';
import { lineByteLength, splitIniLines } from './line-normalizer.js';
import { resolveParseOptions, type IniParseOptions, type ResolvedIniParseOptions } from './options.js';

/**
 * Receives parse events. Return a string to reject the event with that
 * reason; return nothing to accept it.
 *
 * `name` is empty for a section-only notification; `value` is empty for a
 * key without value.
 */
export interface IniHandler {
  handle(section: string, name: string, value: string): string | void;
}

export type IniHandlerFn = (section: string, name: string, value: string) => string | void;

export type IniParseResult = { ok: true } | { ok: false; error: IniError };

/** Running state of one parse call. */
export interface ParseState extends LineContext {
  lineNumber: number;
  previousKey: string;
  /** Current section; empty until the first header. */
  section: string;
  firstError: IniError | null;
}

/** Parse an ordered sequence of raw lines. */
export function parseIniLines(
  lines: Iterable<string>,
  handler: IniHandler | IniHandlerFn,
  options?: IniParseOptions,
): IniParseResult {
  const resolved = resolveParseOptions(options);
  const emit = toHandlerFn(handler);
  const state: ParseState = {
    lineNumber: 0,
    previousKey: '',
    section: '',
    firstError: null,
  };

  for (const line of lines) {
    state.lineNumber++;
    const error = parseLine(line, state, emit, resolved);
    if (!error) continue;
    if (resolved.stopOnFirstError) {
      return { ok: false, error };
    }
    if (!state.firstError) {
      state.firstError = error;
    }
  }

  return state.firstError ? { ok: false, error: state.firstError } : { ok: true };
}

/** Parse INI text held in memory. */
export function parseIniString(
  text: string,
  handler: IniHandler | IniHandlerFn,
  options?: IniParseOptions,
): IniParseResult {
  return parseIniLines(splitIniLines(text), handler, options);
}

/**
 * Parse an INI file. A file that cannot be read, or that is not valid
 * UTF-8, is reported as an `IniFileOpenError` result before any event is
 * delivered.
 */
export function parseIniFile(
  path: string,
  handler: IniHandler | IniHandlerFn,
  options?: IniParseOptions,
): IniParseResult {
  let text: string;
  try {
    text = decodeUtf8(readFileSync(path));
  } catch (error) {
    return { ok: false, error: new IniFileOpenError(`${path}: ${describeError(error)}`) };
  }
  return parseIniString(text, handler, options);
}

/**
 * Parse INI text from a readable stream. The whole stream is read and
 * decoded first, then parsed in one synchronous pass.
 */
export async function parseIniStream(
  input: Readable,
  handler: IniHandler | IniHandlerFn,
  options?: IniParseOptions,
): Promise<IniParseResult> {
  let text: string;
  try {
    const chunks: Buffer[] = [];
    for await (const chunk of input) {
      chunks.push(toBuffer(chunk));
    }
    text = decodeUtf8(Buffer.concat(chunks));
  } catch (error) {
    return { ok: false, error: new IniFileOpenError(describeError(error)) };
  }
  return parseIniString(text, handler, options);
}

function parseLine(
  line: string,
  state: ParseState,
  emit: IniHandlerFn,
  options: ResolvedIniParseOptions,
): IniError | null {
  if (lineByteLength(line) > options.maxLine) {
    return new IniSyntaxError(state.lineNumber, 'line too long');
  }

  const outcome = classifyLine(line, state, options);
  switch (outcome.type) {
    case 'ignore':
      return null;
    case 'invalid':
      return new IniSyntaxError(state.lineNumber, outcome.reason);
    case 'section':
      state.section = outcome.section;
      state.previousKey = '';
      return options.callHandlerOnNewSection ? deliver(emit, state, '', '') : null;
    case 'key-value':
      state.previousKey = outcome.name;
      return deliver(emit, state, outcome.name, outcome.value);
    case 'continuation':
      return deliver(emit, state, state.previousKey, outcome.value);
  }
}

function deliver(emit: IniHandlerFn, state: ParseState, name: string, value: string): IniError | null {
  let verdict: string | void;
  try {
    verdict = emit(state.section, name, value);
  } catch (error) {
    if (isAllocationFailure(error)) {
      return new IniMemoryError(state.lineNumber);
    }
    return new IniHandlerError(state.lineNumber, describeError(error));
  }
  return typeof verdict === 'string' ? new IniHandlerError(state.lineNumber, verdict) : null;
}

function toHandlerFn(handler: IniHandler | IniHandlerFn): IniHandlerFn {
  if (typeof handler === 'function') return handler;
  return (section, name, value) => handler.handle(section, name, value);
}

// Engine messages for exhausted string, array, buffer or collection sizes.
const ALLOCATION_FAILURE = /^(Invalid (string|array|typed array) length|Array buffer allocation failed|.*maximum size exceeded)/;

function isAllocationFailure(error: unknown): boolean {
  return error instanceof RangeError && ALLOCATION_FAILURE.test(error.message);
}

/** Strict UTF-8 decode; a leading BOM is kept for the `allowBom` rule. */
function decodeUtf8(bytes: Uint8Array): string {
  try {
    return new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(bytes);
  } catch {
    throw new Error('invalid UTF-8 data');
  }
}

function toBuffer(chunk: unknown): Buffer {
  if (typeof chunk === 'string') return Buffer.from(chunk, 'utf-8');
  if (chunk instanceof Uint8Array) return Buffer.from(chunk);
  throw new TypeError('stream yielded a chunk that is neither bytes nor text');
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
