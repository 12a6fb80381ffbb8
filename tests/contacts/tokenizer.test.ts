import { describe, it, expect } from 'vitest';
import { parseContentLine, tokenize, unfoldLines } from '../../src/contacts/tokenizer.js';
import { VCardParseError } from '../../src/utils/errors.js';
import { VCARD_30, VCARD_MULTI, crlf } from '../helpers.js';

function single(...lines: string[]) {
  const components = tokenize(crlf('BEGIN:VCARD', 'VERSION:3.0', ...lines, 'END:VCARD'));
  expect(components).toHaveLength(1);
  return components[0];
}

describe('unfoldLines', () => {
  it('should join continuation lines and drop the leading whitespace character', () => {
    const lines = unfoldLines('NOTE:Hello\r\n  world\r\nFN:A\r\n');
    expect(lines).toEqual([
      { text: 'NOTE:Hello world', line: 1 },
      { text: 'FN:A', line: 3 },
    ]);
  });

  it('should accept LF and bare CR line endings', () => {
    expect(unfoldLines('FN:A\nN:B;;;;\rNOTE:C').map(l => l.text)).toEqual(['FN:A', 'N:B;;;;', 'NOTE:C']);
  });

  it('should join quoted-printable soft line breaks without the trailing =', () => {
    const lines = unfoldLines('NOTE;ENCODING=QUOTED-PRINTABLE:abc=\r\ndef\r\nFN:A\r\n');
    expect(lines.map(l => l.text)).toEqual(['NOTE;ENCODING=QUOTED-PRINTABLE:abcdef', 'FN:A']);
  });

  it('should not treat a trailing = as a soft break outside quoted-printable', () => {
    const lines = unfoldLines('NOTE:a=\r\nFN:A\r\n');
    expect(lines.map(l => l.text)).toEqual(['NOTE:a=', 'FN:A']);
  });

  it('should drop blank lines', () => {
    expect(unfoldLines('\r\nFN:A\r\n\r\n   \r\n')).toEqual([{ text: 'FN:A', line: 2 }]);
  });
});

describe('parseContentLine', () => {
  it('should split group, name, parameters and value', () => {
    const parsed = parseContentLine('item1.email;type=INTERNET,pref:a@example.com');
    expect(parsed?.group).toBe('item1');
    expect(parsed?.name).toBe('EMAIL');
    expect(parsed?.parameters.get('TYPE')).toEqual(['INTERNET', 'pref']);
    expect(parsed?.rawValue).toBe('a@example.com');
  });

  it('should keep colons in the value', () => {
    expect(parseContentLine('TEL;VALUE=uri:tel:+15550100')?.rawValue).toBe('tel:+15550100');
  });

  it('should ignore colons inside quoted parameter values', () => {
    const parsed = parseContentLine('EMAIL;X-LABEL="a:b";TYPE="work,home":x@example.com');
    expect(parsed?.parameters.get('X-LABEL')).toEqual(['a:b']);
    expect(parsed?.parameters.get('TYPE')).toEqual(['work,home']);
    expect(parsed?.rawValue).toBe('x@example.com');
  });

  it('should return null for a line without a colon or a name', () => {
    expect(parseContentLine('no colon here')).toBeNull();
    expect(parseContentLine(';TYPE=work:value')).toBeNull();
  });
});

describe('tokenize', () => {
  it('should read a vCard 3.0 component', () => {
    const [card] = tokenize(VCARD_30);

    expect(card.version).toBe('3.0');
    const tel = card.all('TEL');
    expect(tel).toHaveLength(1);
    expect(tel[0].parameters.get('TYPE')).toEqual(['CELL', 'HOME']);
    expect(tel[0].value).toBe(' +1 555 0100');

    const org = card.first('ORG');
    expect(org.present && org.value.components).toEqual(['Acme', 'Sales']);
    const n = card.first('N');
    expect(n.present && n.value.components).toEqual(['Doe', 'John', '', '', '']);
  });

  it('should read every component in order', () => {
    const cards = tokenize(VCARD_MULTI);
    expect(cards).toHaveLength(2);
    const names = cards.map(c => {
      const fn = c.first('FN');
      return fn.present ? fn.value.value : undefined;
    });
    expect(names).toEqual(['Ada Alpha', 'Bob Beta']);
  });

  it('should return no components for empty input', () => {
    expect(tokenize('')).toEqual([]);
    expect(tokenize('\r\n \r\n')).toEqual([]);
  });

  it('should report absent properties as empty or not present', () => {
    const card = single('TITLE:Boss', 'X-CUSTOM:ignored');
    expect(card.first('FN')).toEqual({ present: false });
    expect(card.all('EMAIL')).toEqual([]);
  });

  it('should keep vCard 2.1 bare parameters as flags without values', () => {
    const [tel] = single('TEL;HOME;VOICE:555 0100').all('TEL');
    expect([...tel.parameters.entries()]).toEqual([['HOME', []], ['VOICE', []]]);
  });

  it('should merge repeated parameters', () => {
    const [tel] = single('TEL;TYPE=work;type=voice:1').all('TEL');
    expect(tel.parameters.get('TYPE')).toEqual(['work', 'voice']);
  });

  it('should unescape values and structured components', () => {
    const card = single('FN:Doe\\, John', 'N:O\\;Brien;Pat;;;', 'NOTE:Line one\\nLine two');
    const fn = card.first('FN');
    expect(fn.present && fn.value.value).toBe('Doe, John');
    expect(fn.present && fn.value.rawValue).toBe('Doe\\, John');
    const n = card.first('N');
    expect(n.present && n.value.components).toEqual(['O;Brien', 'Pat', '', '', '']);
    expect(card.all('NOTE')[0].value).toBe('Line one\nLine two');
  });

  it('should skip malformed property lines inside a component', () => {
    const card = single('this line has no colon', 'FN:Kept');
    const fn = card.first('FN');
    expect(fn.present && fn.value.value).toBe('Kept');
  });

  it('should decode quoted-printable values with their charset', () => {
    const card = single(
      'FN;CHARSET=ISO-8859-1;ENCODING=QUOTED-PRINTABLE:J=F6hn D=F6r',
      'NOTE;ENCODING=QUOTED-PRINTABLE:Caf=C3=A9',
      'NOTE;CHARSET=X-UNKNOWN;QUOTED-PRINTABLE:na=C3=AFve',
    );
    const fn = card.first('FN');
    expect(fn.present && fn.value.value).toBe('Jöhn Dör');
    expect(card.all('NOTE').map(p => p.value)).toEqual(['Café', 'naïve']);
  });

  it('should decode quoted-printable values spread over soft line breaks', () => {
    const card = single('NOTE;ENCODING=QUOTED-PRINTABLE:first=0Aline=', 'second');
    expect(card.all('NOTE')[0].value).toBe('first\nlinesecond');
  });

  it('should decode very long quoted-printable values', () => {
    const card = single(`NOTE;ENCODING=QUOTED-PRINTABLE:${'a'.repeat(300_000)}=0A`);
    const note = card.all('NOTE')[0].value;
    expect(note).toHaveLength(300_001);
    expect(note.endsWith('a\n')).toBe(true);
  });

  it('should tolerate a missing VERSION', () => {
    const [card] = tokenize(crlf('BEGIN:VCARD', 'FN:No Version', 'END:VCARD'));
    expect(card.version).toBeUndefined();
  });

  it('should accept lowercase BEGIN/END markers', () => {
    expect(tokenize(crlf('begin:vcard', 'fn:A', 'end:vcard'))).toHaveLength(1);
  });

  describe('fatal structure errors', () => {
    it('should reject END without BEGIN', () => {
      expect(() => tokenize(crlf('END:VCARD'))).toThrow(VCardParseError);
      expect(() => tokenize(crlf('END:VCARD'))).toThrow('Line 1: END:VCARD without a matching BEGIN:VCARD');
    });

    it('should reject a component that is never closed', () => {
      expect(() => tokenize(crlf('BEGIN:VCARD', 'FN:Open'))).toThrow('Line 1: vCard opened on line 1 is never closed');
    });

    it('should reject a nested BEGIN', () => {
      const text = crlf('BEGIN:VCARD', 'FN:Outer', 'BEGIN:VCARD', 'END:VCARD', 'END:VCARD');
      expect(() => tokenize(text)).toThrow('Line 3: BEGIN:VCARD inside the vCard opened on line 1');
    });

    it('should reject an END for another component type', () => {
      const text = crlf('BEGIN:VCARD', 'FN:A', 'END:VCALENDAR');
      expect(() => tokenize(text)).toThrow('Line 3: END:VCALENDAR does not close the vCard opened on line 1');
    });

    it('should reject non-vCard components', () => {
      expect(() => tokenize(crlf('BEGIN:VCALENDAR', 'END:VCALENDAR'))).toThrow('Line 1: Unsupported component BEGIN:VCALENDAR');
    });

    it('should reject properties outside a component', () => {
      const text = crlf('BEGIN:VCARD', 'FN:A', 'END:VCARD', 'FN:Stray');
      expect(() => tokenize(text)).toThrow('Line 4: Content outside of a vCard: FN:Stray');
    });

    it('should carry the line number on the error', () => {
      try {
        tokenize(crlf('BEGIN:VCARD', 'FN:A', 'END:VCARD', 'END:VCARD'));
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(VCardParseError);
        expect(err instanceof VCardParseError && err.line).toBe(4);
      }
    });
  });
});
