import type { Field, KnownPropertyName, ParameterMap, RawProperty } from '../types/index.js';
import { isKnownProperty } from '../types/index.js';
import { VCardParseError, errorMessage, logger } from '../utils/index.js';
import { splitComponents, unescapeText } from './escape.js';

/** One tokenized BEGIN:VCARD … END:VCARD block. */
export class RawComponent {
  constructor(
    readonly version: string | undefined,
    private readonly properties: readonly RawProperty[],
  ) {}

  /** Every occurrence of `name`, in input order; empty when the property is absent. */
  all(name: KnownPropertyName): RawProperty[] {
    return this.properties.filter(p => p.name === name);
  }

  first(name: KnownPropertyName): Field<RawProperty> {
    const found = this.properties.find(p => p.name === name);
    return found ? { present: true, value: found } : { present: false };
  }
}

export interface ContentLine {
  text: string;
  /** 1-based physical line the content line starts on. */
  line: number;
}

export interface ParsedLine {
  group?: string;
  name: string;
  parameters: ParameterMap;
  rawValue: string;
}

interface OpenComponent {
  line: number;
  version?: string;
  properties: RawProperty[];
}

/**
 * Split vCard text into components. Unknown properties are dropped and
 * malformed property lines are skipped; broken BEGIN/END structure throws
 * a {@link VCardParseError}.
 */
export function tokenize(text: string): RawComponent[] {
  const components: RawComponent[] = [];
  let open: OpenComponent | undefined;

  for (const { text: line, line: lineNo } of unfoldLines(text)) {
    const parsed = parseContentLine(line);

    if (!parsed) {
      if (!open) throw new VCardParseError(`Content outside of a vCard: ${preview(line)}`, lineNo);
      logger.debug(`Skipping malformed line ${lineNo}: ${preview(line)}`);
      continue;
    }

    if (parsed.name === 'BEGIN') {
      const kind = parsed.rawValue.trim().toUpperCase();
      if (kind !== 'VCARD') throw new VCardParseError(`Unsupported component BEGIN:${kind}`, lineNo);
      if (open) throw new VCardParseError(`BEGIN:VCARD inside the vCard opened on line ${open.line}`, lineNo);
      open = { line: lineNo, properties: [] };
      continue;
    }

    if (parsed.name === 'END') {
      const kind = parsed.rawValue.trim().toUpperCase();
      if (!open) throw new VCardParseError(`END:${kind} without a matching BEGIN:VCARD`, lineNo);
      if (kind !== 'VCARD') {
        throw new VCardParseError(`END:${kind} does not close the vCard opened on line ${open.line}`, lineNo);
      }
      components.push(new RawComponent(open.version, open.properties));
      open = undefined;
      continue;
    }

    if (!open) throw new VCardParseError(`Content outside of a vCard: ${preview(line)}`, lineNo);

    if (parsed.name === 'VERSION') {
      open.version = parsed.rawValue.trim();
      continue;
    }

    if (!isKnownProperty(parsed.name)) continue;
    open.properties.push(toRawProperty(parsed.name, parsed));
  }

  if (open) throw new VCardParseError(`vCard opened on line ${open.line} is never closed`, open.line);

  return components;
}

/**
 * Unfold continuation lines (RFC 6350 §3.2) and vCard 2.1 quoted-printable
 * soft line breaks. Accepts CRLF, LF and bare CR. Blank lines are dropped.
 */
export function unfoldLines(text: string): ContentLine[] {
  const physical = text.replace(/\r\n/g, '\n').replace(/\r/g, '\n').split('\n');
  const result: ContentLine[] = [];

  physical.forEach((raw, index) => {
    const last = result[result.length - 1];
    if (last && last.text.endsWith('=') && isQuotedPrintableLine(last.text)) {
      last.text = last.text.slice(0, -1) + raw;
    } else if (last && (raw.startsWith(' ') || raw.startsWith('\t'))) {
      last.text += raw.substring(1);
    } else {
      result.push({ text: raw, line: index + 1 });
    }
  });

  return result.filter(l => l.text.trim().length > 0);
}

/** Parse `[group.]NAME[;PARAM...]:VALUE`. Returns null when the line has no usable name. */
export function parseContentLine(line: string): ParsedLine | null {
  const colonIdx = indexOutsideQuotes(line, ':');
  if (colonIdx === -1) return null;

  const namePart = line.slice(0, colonIdx);
  const rawValue = line.slice(colonIdx + 1);

  const [nameAndGroup = '', ...paramParts] = splitOutsideQuotes(namePart, ';');
  const dotIdx = nameAndGroup.indexOf('.');
  const group = dotIdx === -1 ? undefined : nameAndGroup.slice(0, dotIdx).trim();
  const name = nameAndGroup.slice(dotIdx + 1).trim().toUpperCase();
  if (!name) return null;

  return { group, name, parameters: parseParameters(paramParts), rawValue };
}

function parseParameters(parts: string[]): ParameterMap {
  const map: ParameterMap = new Map();
  for (const part of parts) {
    const trimmed = part.trim();
    if (!trimmed) continue;

    const eq = trimmed.indexOf('=');
    const key = (eq === -1 ? trimmed : trimmed.slice(0, eq)).trim().toUpperCase();
    if (!key) continue;

    // Bare keys are vCard 2.1 flags (`TEL;HOME;VOICE:`), kept with no values.
    const values = eq === -1
      ? []
      : splitOutsideQuotes(trimmed.slice(eq + 1), ',').map(v => unquote(v.trim())).filter(v => v.length > 0);

    const existing = map.get(key);
    map.set(key, existing ? [...existing, ...values] : values);
  }
  return map;
}

function toRawProperty(name: KnownPropertyName, parsed: ParsedLine): RawProperty {
  const rawValue = isQuotedPrintable(parsed.parameters)
    ? decodeQuotedPrintable(parsed.rawValue, parsed.parameters.get('CHARSET')?.[0])
    : parsed.rawValue;

  return {
    name,
    group: parsed.group,
    parameters: parsed.parameters,
    rawValue,
    value: unescapeText(rawValue),
    components: splitComponents(rawValue).map(unescapeText),
  };
}

// --- vCard 2.1 quoted-printable ---

function isQuotedPrintable(parameters: ParameterMap): boolean {
  if (parameters.has('QUOTED-PRINTABLE')) return true;
  return (parameters.get('ENCODING') ?? []).some(v => v.toUpperCase() === 'QUOTED-PRINTABLE');
}

function isQuotedPrintableLine(line: string): boolean {
  const colonIdx = indexOutsideQuotes(line, ':');
  return colonIdx !== -1 && /QUOTED-PRINTABLE/i.test(line.slice(0, colonIdx));
}

function decodeQuotedPrintable(encoded: string, charset: string | undefined): string {
  const chunks: Buffer[] = [];
  for (const part of encoded.split(/(=[0-9A-Fa-f]{2})/)) {
    if (/^=[0-9A-Fa-f]{2}$/.test(part)) {
      chunks.push(Buffer.of(parseInt(part.slice(1), 16)));
    } else if (part) {
      chunks.push(Buffer.from(part, 'utf8'));
    }
  }
  return decoderFor(charset).decode(Buffer.concat(chunks));
}

function decoderFor(charset: string | undefined) {
  try {
    return new TextDecoder(charset ?? 'utf-8');
  } catch (err) {
    logger.debug(`Unknown charset ${charset}, decoding as UTF-8:`, errorMessage(err));
    return new TextDecoder('utf-8');
  }
}

// --- Helpers ---

function indexOutsideQuotes(s: string, target: string): number {
  let inQuotes = false;
  for (let i = 0; i < s.length; i++) {
    const ch = s.charAt(i);
    if (ch === '"') inQuotes = !inQuotes;
    else if (ch === target && !inQuotes) return i;
  }
  return -1;
}

function splitOutsideQuotes(s: string, separator: string): string[] {
  const parts: string[] = [];
  let rest = s;
  let idx = indexOutsideQuotes(rest, separator);
  while (idx !== -1) {
    parts.push(rest.slice(0, idx));
    rest = rest.slice(idx + 1);
    idx = indexOutsideQuotes(rest, separator);
  }
  parts.push(rest);
  return parts;
}

function unquote(value: string): string {
  return value.length >= 2 && value.startsWith('"') && value.endsWith('"') ? value.slice(1, -1) : value;
}

function preview(line: string): string {
  return line.length > 40 ? `${line.slice(0, 40)}…` : line;
}
