/**
 * In-memory INI reader.
 *
 * Runs the parse driver with a collecting handler, then keeps a read-only
 * snapshot keyed by lowercased section and name. Repeated keys and
 * continuation lines accumulate, joined with '\n' in order of appearance.
 *
 *   const reader = IniReader.fromString(text);
 *   reader.getInteger('protocol', 'version', -1);
 *   reader.getString('user', 'name', 'UNKNOWN');
 */

import type { Readable } from 'node:stream';

import { IniFileOpenError, type IniError } from './errors.js';
import {
  parseIniFile,
  parseIniLines,
  parseIniStream,
  type IniHandler,
  type IniParseResult,
} from './ini-parser.js';
import { splitIniLines } from './line-normalizer.js';
import type { IniParseOptions } from './options.js';
import {
  INT64_MAX,
  INT64_MIN,
  UINT64_MAX,
  parseBooleanText,
  parseIntegerText,
  parseRealText,
  parseUnsignedText,
} from './value-parsers.js';

/** Plain-object form of a reader: section → name → value. */
export type IniSnapshot = Record<string, Record<string, string>>;

type SectionValues = ReadonlyMap<string, ReadonlyMap<string, string>>;

/** Handler that accumulates events into lowercased lookup maps. */
class IniCollector implements IniHandler {
  readonly values = new Map<string, Map<string, string>>();
  readonly sections = new Set<string>();

  handle(section: string, name: string, value: string): void {
    const sectionKey = section.toLowerCase();
    if (section !== '') {
      this.sections.add(sectionKey);
    }
    // Section-only notification.
    if (name === '') return;

    let entries = this.values.get(sectionKey);
    if (!entries) {
      entries = new Map();
      this.values.set(sectionKey, entries);
    }
    const key = name.toLowerCase();
    const existing = entries.get(key);
    entries.set(key, existing === undefined ? value : `${existing}\n${value}`);
  }
}

export class IniReader {
  private constructor(
    private readonly values: SectionValues,
    private readonly sectionNames: ReadonlySet<string>,
    /** First fault met while parsing, or null. */
    readonly parseError: IniError | null,
  ) {
    Object.freeze(this);
  }

  /**
   * Build a reader from raw lines. Grammar and handler faults do not throw;
   * they are kept in `parseError` and every valid line is still indexed
   * (unless `stopOnFirstError` cut the parse short).
   */
  static fromLines(lines: Iterable<string>, options?: IniParseOptions): IniReader {
    const collector = new IniCollector();
    const result = parseIniLines(lines, collector, withSectionEvents(options));
    return IniReader.fromCollector(collector, result);
  }

  static fromString(text: string, options?: IniParseOptions): IniReader {
    return IniReader.fromLines(splitIniLines(text), options);
  }

  /** @throws IniFileOpenError when the file cannot be read. */
  static fromFile(path: string, options?: IniParseOptions): IniReader {
    const collector = new IniCollector();
    const result = parseIniFile(path, collector, withSectionEvents(options));
    return IniReader.fromCollector(collector, result);
  }

  /** @throws IniFileOpenError when the stream fails. */
  static async fromStream(input: Readable, options?: IniParseOptions): Promise<IniReader> {
    const collector = new IniCollector();
    const result = await parseIniStream(input, collector, withSectionEvents(options));
    return IniReader.fromCollector(collector, result);
  }

  private static fromCollector(collector: IniCollector, result: IniParseResult): IniReader {
    if (!result.ok && result.error instanceof IniFileOpenError) {
      throw result.error;
    }
    return new IniReader(
      collector.values,
      collector.sections,
      result.ok ? null : result.error,
    );
  }

  get ok(): boolean {
    return this.parseError === null;
  }

  /** Raw value, or `defaultValue` when the key is absent. */
  get(section: string, name: string, defaultValue: string): string {
    return this.lookup(section, name) ?? defaultValue;
  }

  /** Like `get`, but an empty value also yields the default. */
  getString(section: string, name: string, defaultValue: string): string {
    const value = this.get(section, name, '');
    return value === '' ? defaultValue : value;
  }

  /**
   * Integer value; `0x`/`0X` selects hex. Values outside the safe integer
   * range fall back to the default, use `getInteger64` for those.
   */
  getInteger(section: string, name: string, defaultValue: number): number {
    const parsed = parseIntegerText(this.get(section, name, ''));
    if (parsed === null) return defaultValue;
    const value = Number(parsed);
    return Number.isSafeInteger(value) ? value : defaultValue;
  }

  getInteger64(section: string, name: string, defaultValue: bigint): bigint {
    const parsed = parseIntegerText(this.get(section, name, ''));
    if (parsed === null || parsed < INT64_MIN || parsed > INT64_MAX) return defaultValue;
    return parsed;
  }

  /** Non-negative decimal integer. */
  getUnsigned(section: string, name: string, defaultValue: number): number {
    const parsed = parseUnsignedText(this.get(section, name, ''));
    if (parsed === null) return defaultValue;
    const value = Number(parsed);
    return Number.isSafeInteger(value) ? value : defaultValue;
  }

  getUnsigned64(section: string, name: string, defaultValue: bigint): bigint {
    const parsed = parseUnsignedText(this.get(section, name, ''));
    if (parsed === null || parsed > UINT64_MAX) return defaultValue;
    return parsed;
  }

  getReal(section: string, name: string, defaultValue: number): number {
    return parseRealText(this.get(section, name, '')) ?? defaultValue;
  }

  /**
   * true/yes/on/1 and false/no/off/0, case-insensitive; anything else
   * yields the default.
   */
  getBoolean(section: string, name: string, defaultValue: boolean): boolean {
    return parseBooleanText(this.get(section, name, '')) ?? defaultValue;
  }

  /** Lowercased section names, sorted. */
  sections(): string[] {
    return [...this.sectionNames].sort();
  }

  /** Lowercased key names of a section, sorted. */
  keys(section: string): string[] {
    const entries = this.values.get(section.toLowerCase());
    return entries ? [...entries.keys()].sort() : [];
  }

  hasSection(section: string): boolean {
    return this.sectionNames.has(section.toLowerCase());
  }

  hasValue(section: string, name: string): boolean {
    return this.lookup(section, name) !== undefined;
  }

  /**
   * Plain-object snapshot with sorted sections and keys. Declared sections
   * without keys appear as empty objects; keys before the first header sit
   * under the "" section.
   */
  toObject(): IniSnapshot {
    const names = new Set([...this.sectionNames, ...this.values.keys()]);
    return Object.fromEntries(
      [...names].sort().map((section) => [
        section,
        Object.fromEntries(this.keys(section).map((key) => [key, this.get(section, key, '')] as const)),
      ] as const),
    );
  }

  private lookup(section: string, name: string): string | undefined {
    return this.values.get(section.toLowerCase())?.get(name.toLowerCase());
  }
}

function withSectionEvents(options: IniParseOptions = {}): IniParseOptions {
  return { ...options, callHandlerOnNewSection: true };
}
