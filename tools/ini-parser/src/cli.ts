/**
 * INI Parser CLI
 *
 * Usage:
 *   ini-parser --input <file.ini> [--output <file.json>]
 *   ini-parser --dir <dir> --output <dir>
 *   ini-parser --input <file.ini> --events
 *
 * Options:
 *   --input     Path to a single .ini file
 *   --output    Output JSON file or directory (stdout when omitted in single-file mode)
 *   --dir       Process all .ini files in a directory (recursive)
 *   --events    Write the handler event stream as JSON lines instead of the snapshot
 *   --stats     Print summary statistics
 *   --help      Show this help message
 *
 * Parser options:
 *   --strict, --multiline, --allow-no-value, --no-inline-comments, --no-bom,
 *   --inline-prefixes <chars>, --comment-prefixes <chars>, --max-line <n>
 */

import { readdirSync, mkdirSync, writeFileSync } from 'node:fs';
import { dirname, extname, join, relative, resolve } from 'node:path';
import {
  IniReader,
  formatIniError,
  parseIniFile,
  resolveParseOptions,
  type IniError,
  type IniParseOptions,
  type IniSnapshot,
} from '@inikit/core';

interface CliArgs {
  input: string | undefined;
  output: string | undefined;
  dir: string | undefined;
  events: boolean;
  stats: boolean;
  parse: IniParseOptions;
}

interface ParseStats {
  files: number;
  sections: number;
  keys: number;
  errors: number;
}

interface IniEvent {
  readonly section: string;
  readonly name: string;
  readonly value: string;
}

interface ProcessedFile {
  /** Serialized output, newline-terminated. */
  readonly text: string;
  readonly sections: number;
  readonly keys: number;
  readonly error: IniError | null;
}

// ============================================================================
// Argument parsing
// ============================================================================

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = {
    input: undefined,
    output: undefined,
    dir: undefined,
    events: false,
    stats: false,
    parse: {},
  };

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--input':
      case '-i':
        args.input = readArgValue(argv, ++i, '--input');
        break;
      case '--output':
      case '-o':
        args.output = readArgValue(argv, ++i, '--output');
        break;
      case '--dir':
      case '-d':
        args.dir = readArgValue(argv, ++i, '--dir');
        break;
      case '--events':
        args.events = true;
        break;
      case '--stats':
        args.stats = true;
        break;
      case '--strict':
        args.parse.stopOnFirstError = true;
        break;
      case '--multiline':
        args.parse.allowMultiline = true;
        break;
      case '--allow-no-value':
        args.parse.allowNoValue = true;
        break;
      case '--no-inline-comments':
        args.parse.allowInlineComments = false;
        break;
      case '--no-bom':
        args.parse.allowBom = false;
        break;
      case '--inline-prefixes':
        args.parse.inlineCommentPrefixes = readArgValue(argv, ++i, '--inline-prefixes');
        break;
      case '--comment-prefixes':
        args.parse.startCommentPrefixes = readArgValue(argv, ++i, '--comment-prefixes');
        break;
      case '--max-line':
        args.parse.maxLine = Number(readArgValue(argv, ++i, '--max-line'));
        break;
      case '--help':
      case '-h':
        printUsage();
        process.exit(0);
        break;
      default:
        console.error(`Unknown argument: ${arg}`);
        printUsage();
        process.exit(1);
    }
  }

  return args;
}

function readArgValue(argv: string[], index: number, flag: string): string {
  const value = argv[index];
  if (!value) {
    console.error(`Error: ${flag} requires a value`);
    printUsage();
    process.exit(1);
  }
  return value;
}

function printUsage(): void {
  console.log(`
INI Parser

Usage:
  ini-parser --input <file.ini> [--output <file.json>] [--events] [--stats]
  ini-parser --dir <dir> --output <dir> [--events] [--stats]

Options:
  --input,    -i   Path to a single .ini file
  --output,   -o   Output JSON file or directory (stdout when omitted with --input)
  --dir,      -d   Process all .ini files in a directory (recursive)
  --events         Write handler events as JSON lines instead of the snapshot
  --stats          Print summary statistics
  --help,     -h   Show this help message

Parser options:
  --strict                   Stop at the first error
  --multiline                Indented lines continue the previous value
  --allow-no-value           Lines without '=' or ':' are keys with empty values
  --no-inline-comments       Keep ';' comments inside values
  --no-bom                   Do not strip a UTF-8 byte order mark
  --inline-prefixes <chars>  Inline comment characters (default ";")
  --comment-prefixes <chars> Start-of-line comment characters (default ";#")
  --max-line <n>             Maximum line length in bytes (default 200)
  `.trim());
}

// ---------------------------------------------------------------------------
// File helpers
// ---------------------------------------------------------------------------

function findIniFiles(dir: string): string[] {
  const results: string[] = [];
  const entries = readdirSync(dir, { withFileTypes: true });
  for (const entry of entries) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      results.push(...findIniFiles(fullPath));
    } else if (extname(entry.name).toLowerCase() === '.ini') {
      results.push(fullPath);
    }
  }
  return results.sort();
}

// ---------------------------------------------------------------------------
// Deterministic JSON serialization
// ---------------------------------------------------------------------------

function compareKeys(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Serialize any value to deterministic JSON with sorted object keys. */
function toSortedJson(value: unknown, indent: number = 2): string {
  return JSON.stringify(value, (_key: string, fieldValue: unknown) => {
    if (fieldValue !== null && typeof fieldValue === 'object' && !Array.isArray(fieldValue)) {
      return Object.fromEntries(
        Object.entries(fieldValue).sort(([a], [b]) => compareKeys(a, b)),
      );
    }
    return fieldValue;
  }, indent);
}

// ---------------------------------------------------------------------------
// Single file processing
// ---------------------------------------------------------------------------

function countKeys(snapshot: IniSnapshot): number {
  return Object.values(snapshot).reduce((total, entries) => total + Object.keys(entries).length, 0);
}

function snapshotFile(inputPath: string, options: IniParseOptions): ProcessedFile {
  const reader = IniReader.fromFile(inputPath, options);
  const snapshot = reader.toObject();
  return {
    text: toSortedJson(snapshot) + '\n',
    sections: reader.sections().length,
    keys: countKeys(snapshot),
    error: reader.parseError,
  };
}

function eventsFile(inputPath: string, options: IniParseOptions): ProcessedFile {
  const events: IniEvent[] = [];
  const sections = new Set<string>();
  const result = parseIniFile(inputPath, (section, name, value) => {
    events.push({ section, name, value });
    if (section !== '') sections.add(section.toLowerCase());
  }, options);
  if (!result.ok && result.error.kind === 'file-open') {
    throw result.error;
  }
  return {
    text: events.map((event) => toSortedJson(event, 0) + '\n').join(''),
    sections: sections.size,
    keys: events.filter((event) => event.name !== '').length,
    error: result.ok ? null : result.error,
  };
}

function processFile(inputPath: string, args: CliArgs): ProcessedFile {
  return args.events ? eventsFile(inputPath, args.parse) : snapshotFile(inputPath, args.parse);
}

function writeOutput(outputPath: string, text: string): void {
  mkdirSync(dirname(outputPath), { recursive: true });
  writeFileSync(outputPath, text);
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

function main(): void {
  const args = parseArgs(process.argv);

  if (!args.input && !args.dir) {
    console.error('Error: --input or --dir is required\n');
    printUsage();
    process.exit(1);
  }

  if (args.dir && !args.output) {
    console.error('Error: --output is required with --dir\n');
    printUsage();
    process.exit(1);
  }

  try {
    resolveParseOptions(args.parse);
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }

  const stats: ParseStats = { files: 0, sections: 0, keys: 0, errors: 0 };
  // Progress goes to stderr when the result itself is written to stdout.
  const log = args.output ? console.log : console.error;
  let runtimeError = false;

  const record = (inputPath: string, result: ProcessedFile): void => {
    stats.files++;
    stats.sections += result.sections;
    stats.keys += result.keys;
    if (result.error) {
      stats.errors++;
      console.error(`  [WARN] ${formatIniError(result.error, inputPath)}`);
    }
  };

  if (args.input) {
    // Single file mode
    const inputPath = resolve(args.input);
    log(`Parsing: ${inputPath}`);
    try {
      const result = processFile(inputPath, args);
      record(inputPath, result);
      if (args.output) {
        const outputPath = resolve(args.output);
        writeOutput(outputPath, result.text);
        log(`  → ${outputPath} (${result.sections} section(s), ${result.keys} key(s))`);
      } else {
        process.stdout.write(result.text);
      }
    } catch (error) {
      runtimeError = true;
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[ERROR] failed processing ${inputPath}: ${message}`);
    }
  } else if (args.dir && args.output) {
    // Directory mode
    const dirPath = resolve(args.dir);
    const outputDir = resolve(args.output);
    const extension = args.events ? '.jsonl' : '.json';

    let iniFiles: string[] = [];
    try {
      iniFiles = findIniFiles(dirPath);
    } catch (error) {
      runtimeError = true;
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[ERROR] cannot read directory ${dirPath}: ${message}`);
    }
    log(`Found ${iniFiles.length} .ini file(s) in ${dirPath}`);

    for (const file of iniFiles) {
      const relPath = relative(dirPath, file);
      const outPath = join(outputDir, relPath.replace(/\.ini$/i, extension));
      try {
        const result = processFile(file, args);
        record(file, result);
        writeOutput(outPath, result.text);
      } catch (error) {
        runtimeError = true;
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[ERROR] failed processing ${file}: ${message}`);
      }
    }

    log(`\nProcessed ${stats.files} file(s) → ${outputDir}`);
  }

  if (args.stats || stats.errors > 0) {
    log(`\nSummary:`);
    log(`  Files:    ${stats.files}`);
    log(`  Sections: ${stats.sections}`);
    log(`  Keys:     ${stats.keys}`);
    log(`  Errors:   ${stats.errors}`);
  }

  if (runtimeError || stats.errors > 0) {
    process.exit(1);
  }
}

main();
