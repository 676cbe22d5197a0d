import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Readable } from 'node:stream';

import { describe, it, expect } from 'vitest';
import { IniFileOpenError, IniSyntaxError } from './errors.js';
import { IniReader } from './ini-reader.js';

const NORMAL_INI = `; This is an INI file
[section1]  ; section comment
one=This is a test  ; name=value comment
two = 1234
; x=y

[ section 2 ]
happy  =  4
sad =

[empty]
; do nothing

[comment_test]
test1 = 1;2;3 ; only this will be a comment
test2 = 2;3;4;this won't be a comment, needs whitespace before ';'
test;3 = 345 ; key should be "test;3"
test4 = 4#5#6 ; '#' only starts a comment at start of line
#test5 = 567 ; entire line commented
 # test6 = 678 ; entire line commented, except in MULTILINE mode
test7 = ; blank value, except if inline comments disabled
test8 =; not a comment, needs whitespace before ';'

[colon_tests]
Content-Type: text/html
foo:bar
adams : 42
funny1 : with = equals
funny2 = with : colons
funny3 = two = equals
funny4 : two : colons
`;

describe('IniReader', () => {
  describe('a typical file', () => {
    const reader = IniReader.fromString(NORMAL_INI);

    it('parses without error', () => {
      expect(reader.ok).toBe(true);
      expect(reader.parseError).toBeNull();
    });

    it('reads plain values', () => {
      expect(reader.getString('section1', 'one', '')).toBe('This is a test');
      expect(reader.getInteger('section1', 'two', 0)).toBe(1234);
    });

    it('keeps spaces inside section brackets', () => {
      expect(reader.getInteger(' section 2 ', 'happy', 0)).toBe(4);
      expect(reader.getInteger('section 2', 'happy', 0)).toBe(0);
    });

    it('distinguishes an empty value from a missing one', () => {
      expect(reader.get(' section 2 ', 'sad', 'fallback')).toBe('');
      expect(reader.getString(' section 2 ', 'sad', 'fallback')).toBe('fallback');
      expect(reader.hasValue(' section 2 ', 'sad')).toBe(true);
      expect(reader.get(' section 2 ', 'glad', 'fallback')).toBe('fallback');
    });

    it('registers sections without keys', () => {
      expect(reader.hasSection('empty')).toBe(true);
      expect(reader.keys('empty')).toEqual([]);
    });

    it('applies the inline comment rules', () => {
      expect(reader.getString('comment_test', 'test1', '')).toBe('1;2;3');
      expect(reader.getString('comment_test', 'test2', '')).toBe(
        "2;3;4;this won't be a comment, needs whitespace before ';'",
      );
      expect(reader.getString('comment_test', 'test;3', '')).toBe('345');
      expect(reader.getString('comment_test', 'test4', '')).toBe('4#5#6');
      expect(reader.hasValue('comment_test', 'test5')).toBe(false);
      expect(reader.hasValue('comment_test', '#test5')).toBe(false);
      expect(reader.getString('comment_test', 'test7', 'none')).toBe('none');
      expect(reader.getString('comment_test', 'test8', '')).toBe(
        "; not a comment, needs whitespace before ';'",
      );
    });

    it('splits on the first of = and :', () => {
      expect(reader.getString('colon_tests', 'Content-Type', '')).toBe('text/html');
      expect(reader.getString('colon_tests', 'foo', '')).toBe('bar');
      expect(reader.getInteger('colon_tests', 'adams', 0)).toBe(42);
      expect(reader.getString('colon_tests', 'funny1', '')).toBe('with = equals');
      expect(reader.getString('colon_tests', 'funny2', '')).toBe('with : colons');
      expect(reader.getString('colon_tests', 'funny3', '')).toBe('two = equals');
      expect(reader.getString('colon_tests', 'funny4', '')).toBe('two : colons');
    });

    it('lists sections and keys sorted and lowercased', () => {
      expect(reader.sections()).toEqual([
        ' section 2 ',
        'colon_tests',
        'comment_test',
        'empty',
        'section1',
      ]);
      expect(reader.keys('COLON_TESTS')).toEqual([
        'adams',
        'content-type',
        'foo',
        'funny1',
        'funny2',
        'funny3',
        'funny4',
      ]);
    });
  });

  it('looks up sections and keys case-insensitively', () => {
    const reader = IniReader.fromString('[Section1]\nKey1=value1\nKEY2=value2\n');
    expect(reader.getString('section1', 'key1', '')).toBe('value1');
    expect(reader.getString('Section1', 'Key1', '')).toBe('value1');
    expect(reader.getString('SECTION1', 'KEY1', '')).toBe('value1');
    expect(reader.getString('section1', 'key2', '')).toBe('value2');
    expect(reader.hasSection('SECTION1')).toBe(true);
    expect(reader.sections()).toEqual(['section1']);
  });

  it('joins repeated keys with newlines in order', () => {
    const reader = IniReader.fromString('[s]\na=1\na=2\n');
    expect(reader.getString('s', 'a', '')).toBe('1\n2');
  });

  it('joins continuation lines when multi-line mode is on', () => {
    const source = `[section1]
key1 = value1
    continuation line 1
    continuation line 2
key2 = value2
    another continuation
key3 = value3
`;
    const reader = IniReader.fromString(source, { allowMultiline: true });
    expect(reader.getString('section1', 'key1', '')).toBe(
      'value1\n    continuation line 1\n    continuation line 2',
    );
    expect(reader.getString('section1', 'key2', '')).toBe('value2\n    another continuation');
    expect(reader.getString('section1', 'key3', '')).toBe('value3');
  });

  it('skips indented lines when multi-line mode is off', () => {
    const reader = IniReader.fromString(
      '[section1]\nkey1 = value1\n    continuation without separator\nkey2 = value2\n',
    );
    expect(reader.ok).toBe(true);
    expect(reader.getString('section1', 'key1', '')).toBe('value1');
    expect(reader.getString('section1', 'key2', '')).toBe('value2');
  });

  it('merges a section declared twice', () => {
    const reader = IniReader.fromString('[section1]\nkey1 = value1\n[section2]\nkey2 = value2\n[section1]\nkey3 = value3\n');
    expect(reader.sections()).toEqual(['section1', 'section2']);
    expect(reader.keys('section1')).toEqual(['key1', 'key3']);
    expect(reader.keys('section2')).toEqual(['key2']);
  });

  it('keeps keys before the first header under the empty section', () => {
    const reader = IniReader.fromString('key1=value1\nkey2=value2\n\n[section1]\nkey3=value3\n');
    expect(reader.getString('', 'key1', '')).toBe('value1');
    expect(reader.getString('', 'key2', '')).toBe('value2');
    expect(reader.getString('section1', 'key3', '')).toBe('value3');
    expect(reader.sections()).toEqual(['section1']);
    expect(reader.hasSection('')).toBe(false);
  });

  it('strips a byte order mark', () => {
    const reader = IniReader.fromString('\uFEFF[section1]\nkey1=value1\n');
    expect(reader.getString('section1', 'key1', '')).toBe('value1');
  });

  it('registers sections even when section events are turned off', () => {
    const reader = IniReader.fromString('[empty]\n', { callHandlerOnNewSection: false });
    expect(reader.hasSection('empty')).toBe(true);
  });

  describe('parse errors', () => {
    it('records an unterminated section with its line and keeps later values', () => {
      const reader = IniReader.fromString('\n[section1]\nkey1=value1\n[unclosed_section\nkey2=value2\n');
      expect(reader.ok).toBe(false);
      expect(reader.parseError).toBeInstanceOf(IniSyntaxError);
      expect(reader.parseError?.line).toBe(4);
      expect(reader.parseError?.message).toBe('Parse error on line 4: missing closing bracket');
      expect(reader.getString('section1', 'key2', '')).toBe('value2');
    });

    it('stops indexing at the first fault when strict', () => {
      const source = '[section1]\nkey1 = value1\nkey2\nkey3 = value3\n';
      const reader = IniReader.fromString(source, { stopOnFirstError: true });
      expect(reader.parseError?.message).toBe('Parse error on line 3: invalid line format');
      expect(reader.hasValue('section1', 'key1')).toBe(true);
      expect(reader.hasValue('section1', 'key3')).toBe(false);
    });

    it('accepts keys without value when allowed', () => {
      const source = '[section1]\nkey1 = value1\nkey2\nkey3 = value3\n';
      const reader = IniReader.fromString(source, { stopOnFirstError: true, allowNoValue: true });
      expect(reader.ok).toBe(true);
      expect(reader.hasValue('section1', 'key2')).toBe(true);
      expect(reader.get('section1', 'key2', 'x')).toBe('');
    });
  });

  describe('typed accessors', () => {
    const reader = IniReader.fromString(`
[types]
integer = 42
negative = -123
float = 3.14159
scientific = 6.02e23
hex = 0x1A
big = 9223372036854775807
too_big = 9223372036854775808
unsafe = 9007199254740993
huge_unsigned = 18446744073709551615
text = hello
boolean_true = true
boolean_false = false
boolean_yes = YES
boolean_no = no
boolean_on = On
boolean_off = off
boolean_1 = 1
boolean_0 = 0
`);

    it('reads integers, hex first', () => {
      expect(reader.getInteger('types', 'integer', 0)).toBe(42);
      expect(reader.getInteger('types', 'negative', 0)).toBe(-123);
      expect(reader.getInteger('types', 'hex', 0)).toBe(26);
      expect(reader.getInteger('types', 'text', -1)).toBe(-1);
      expect(reader.getInteger('types', 'float', -1)).toBe(-1);
      expect(reader.getInteger('types', 'missing', 7)).toBe(7);
    });

    it('falls back when an integer is not safely representable', () => {
      expect(reader.getInteger('types', 'unsafe', -1)).toBe(-1);
      expect(reader.getInteger64('types', 'unsafe', -1n)).toBe(9007199254740993n);
    });

    it('reads 64-bit integers within range', () => {
      expect(reader.getInteger64('types', 'big', 0n)).toBe(9223372036854775807n);
      expect(reader.getInteger64('types', 'too_big', 0n)).toBe(0n);
      expect(reader.getInteger64('types', 'hex', 0n)).toBe(26n);
    });

    it('reads unsigned integers', () => {
      expect(reader.getUnsigned('types', 'integer', 0)).toBe(42);
      expect(reader.getUnsigned('types', 'negative', 5)).toBe(5);
      expect(reader.getUnsigned('types', 'hex', 5)).toBe(5);
      expect(reader.getUnsigned64('types', 'huge_unsigned', 0n)).toBe(18446744073709551615n);
      expect(reader.getUnsigned64('types', 'too_big', 0n)).toBe(9223372036854775808n);
    });

    it('reads reals', () => {
      expect(reader.getReal('types', 'float', 0)).toBe(3.14159);
      expect(reader.getReal('types', 'scientific', 0)).toBe(6.02e23);
      expect(reader.getReal('types', 'integer', 0)).toBe(42);
      expect(reader.getReal('types', 'text', 1.5)).toBe(1.5);
    });

    it('reads booleans', () => {
      expect(reader.getBoolean('types', 'boolean_true', false)).toBe(true);
      expect(reader.getBoolean('types', 'boolean_false', true)).toBe(false);
      expect(reader.getBoolean('types', 'boolean_yes', false)).toBe(true);
      expect(reader.getBoolean('types', 'boolean_no', true)).toBe(false);
      expect(reader.getBoolean('types', 'boolean_on', false)).toBe(true);
      expect(reader.getBoolean('types', 'boolean_off', true)).toBe(false);
      expect(reader.getBoolean('types', 'boolean_1', false)).toBe(true);
      expect(reader.getBoolean('types', 'boolean_0', true)).toBe(false);
      expect(reader.getBoolean('types', 'text', true)).toBe(true);
      expect(reader.getBoolean('types', 'missing', false)).toBe(false);
    });
  });

  describe('snapshot', () => {
    it('is frozen', () => {
      expect(Object.isFrozen(IniReader.fromString('[s]\nk=v'))).toBe(true);
    });

    it('converts to a sorted plain object', () => {
      const reader = IniReader.fromString('top=1\n[B]\nz=2\ny=3\n[empty]\n');
      const snapshot = reader.toObject();
      expect(snapshot).toEqual({ '': { top: '1' }, b: { y: '3', z: '2' }, empty: {} });
      expect(Object.keys(snapshot)).toEqual(['', 'b', 'empty']);
      expect(Object.keys(snapshot['b'] ?? {})).toEqual(['y', 'z']);
    });

    it('is identical across repeated parses', () => {
      expect(IniReader.fromString(NORMAL_INI).toObject()).toEqual(IniReader.fromString(NORMAL_INI).toObject());
    });
  });

  describe('input sources', () => {
    it('reads a file', () => {
      const dir = mkdtempSync(join(tmpdir(), 'inikit-reader-'));
      try {
        const path = join(dir, 'app.ini');
        writeFileSync(path, '[protocol]\nversion=6\n');
        expect(IniReader.fromFile(path).getInteger('protocol', 'version', -1)).toBe(6);
        expect(() => IniReader.fromFile(join(dir, 'missing.ini'))).toThrow(IniFileOpenError);
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });

    it('reads a stream', async () => {
      const reader = await IniReader.fromStream(Readable.from([Buffer.from('[user]\r\nname = Bob Smith\r\n')]));
      expect(reader.getString('user', 'name', 'UNKNOWN')).toBe('Bob Smith');
    });
  });
});
