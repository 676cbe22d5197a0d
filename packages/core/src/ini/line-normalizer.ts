/**
 * Line-level helpers shared by the classifier and the input sources.
 *
 * Whitespace follows the Unicode White_Space set, except that U+FEFF is
 * not whitespace here (String.prototype.trim would drop it), so a BOM that
 * was not stripped stays visible to the grammar.
 */

const BOM = '\uFEFF';
const WHITESPACE = /\s/;
const LINE_BREAK = /\r\n|\n|\r/;

export function isIniWhitespace(ch: string): boolean {
  return ch !== BOM && WHITESPACE.test(ch);
}

export function trimIniStart(text: string): string {
  let start = 0;
  while (start < text.length && isIniWhitespace(text.charAt(start))) start++;
  return text.slice(start);
}

export function trimIniEnd(text: string): string {
  let end = text.length;
  while (end > 0 && isIniWhitespace(text.charAt(end - 1))) end--;
  return text.slice(0, end);
}

export function trimIni(text: string): string {
  return trimIniEnd(trimIniStart(text));
}

export function isBlank(text: string): boolean {
  return trimIniStart(text).length === 0;
}

/** True when the first character of `text` is one of `prefixes`. */
export function startsWithAny(text: string, prefixes: string): boolean {
  return text.length > 0 && prefixes.includes(text.charAt(0));
}

export function stripBom(line: string): string {
  return line.startsWith(BOM) ? line.slice(BOM.length) : line;
}

/** Length of the line as encoded in UTF-8, which is what `maxLine` caps. */
export function lineByteLength(line: string): number {
  return Buffer.byteLength(line, 'utf8');
}

/**
 * Split text into lines on any line-ending convention. A trailing line
 * ending does not add an empty last line; content is left untrimmed.
 */
export function splitIniLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.split(LINE_BREAK);
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}
