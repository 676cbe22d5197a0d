export {
  parseIniLines,
  parseIniString,
  parseIniFile,
  parseIniStream,
} from './ini-parser.js';
export type {
  IniHandler,
  IniHandlerFn,
  IniParseResult,
  ParseState,
} from './ini-parser.js';
export { IniReader } from './ini-reader.js';
export type { IniSnapshot } from './ini-reader.js';
export {
  classifyLine,
  findCharOrComment,
  removeInlineComment,
} from './line-classifier.js';
export type { LineContext, LineOutcome } from './line-classifier.js';
export { splitIniLines, stripBom } from './line-normalizer.js';
export { DEFAULT_PARSE_OPTIONS, resolveParseOptions } from './options.js';
export type { IniParseOptions, ResolvedIniParseOptions } from './options.js';
export {
  IniError,
  IniFileOpenError,
  IniSyntaxError,
  IniMemoryError,
  IniHandlerError,
  IniOptionsError,
  toErrorRecord,
  formatIniError,
} from './errors.js';
export type { IniErrorKind, IniErrorRecord } from './errors.js';
