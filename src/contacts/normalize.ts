import type { Contact, EmailEntry, ParameterMap, PhoneEntry, StructuredName } from '../types/index.js';
import { FieldError, errorMessage, logger } from '../utils/index.js';
import { createContact, splitDisplayName } from './model.js';
import type { RawComponent } from './tokenizer.js';

export type TypedKind = 'email' | 'tel';

export const KNOWN_TEL_TYPES: ReadonlySet<string> = new Set([
  'home', 'work', 'cell', 'voice', 'fax', 'pager', 'text', 'textphone', 'main', 'iphone',
]);

export const KNOWN_EMAIL_TYPES: ReadonlySet<string> = new Set(['home', 'work', 'internet', 'pref', 'x-mobileme']);

/** Map one tokenized vCard onto a Contact. Never throws; bad fields are dropped. */
export function normalizeComponent(raw: RawComponent): Contact {
  const fn = raw.first('FN');
  const displayName = fn.present ? fn.value.value : undefined;

  const emails: EmailEntry[] = raw.all('EMAIL').map(p => ({
    value: p.value,
    types: extractTypes('email', p.parameters),
  }));

  const phones: PhoneEntry[] = raw.all('TEL').map(p => ({
    value: p.value,
    types: extractTypes('tel', p.parameters),
  }));

  return createContact({
    displayName,
    structuredName: resolveName(raw, displayName),
    emails,
    phones,
    organization: recoverField(() => extractOrganization(raw)),
    birthday: recoverField(() => extractBirthday(raw)),
    notes: recoverField(() => extractNotes(raw)),
  });
}

/**
 * Collect the type labels of an EMAIL or TEL property from its `TYPE`
 * parameter, from bare vCard 2.1 flags (`TEL;HOME;FAX:`) that belong to the
 * kind's vocabulary, and from any extra values the caller found elsewhere.
 */
export function extractTypes(kind: TypedKind, parameters: ParameterMap, extraValues: readonly string[] = []): string[] {
  const vocabulary = kind === 'email' ? KNOWN_EMAIL_TYPES : KNOWN_TEL_TYPES;
  const types = splitTypeValues(parameters.get('TYPE') ?? []);

  for (const key of parameters.keys()) {
    const flag = key.toLowerCase();
    if (flag !== 'type' && vocabulary.has(flag)) types.push(flag);
  }

  types.push(...splitTypeValues(extraValues));
  return normalizeTypes(kind, types);
}

/**
 * Lowercase, deduplicate and sort. `internet` is dropped from email types;
 * `voice` is dropped from tel types unless it is the only one.
 */
export function normalizeTypes(kind: TypedKind, types: Iterable<string>): string[] {
  const set = new Set(Array.from(types, t => t.toLowerCase()));
  if (kind === 'email') set.delete('internet');
  if (kind === 'tel' && set.size > 1) set.delete('voice');
  return [...set].sort();
}

/** `+1 (555) 010-2000` → `tel:+15550102000`. No validation of the number itself. */
export function normalizeTelUri(raw: string): string {
  const stripped = raw.replace(/[\s().-]/g, '');
  return stripped.startsWith('tel:') ? stripped : `tel:${stripped}`;
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ]\d.*)?$/;
const BASIC_DATE = /^(\d{4})(\d{2})(\d{2})(?:T\d.*)?$/;

/**
 * Reduce a BDAY value to `YYYY-MM-DD`, dropping any time part. Partial dates
 * (`--0415`), free text and impossible calendar dates throw a FieldError.
 */
export function parseBirthday(value: string): string {
  const trimmed = value.trim();
  const match = ISO_DATE.exec(trimmed) ?? BASIC_DATE.exec(trimmed);
  if (!match) throw new FieldError('BDAY', `unsupported date "${trimmed}"`);

  const [, year, month, day] = match;
  const date = new Date(0);
  date.setUTCFullYear(Number(year), Number(month) - 1, Number(day));
  if (date.getUTCFullYear() !== Number(year) || date.getUTCMonth() !== Number(month) - 1 || date.getUTCDate() !== Number(day)) {
    throw new FieldError('BDAY', `not a calendar date "${trimmed}"`);
  }
  return `${year}-${month}-${day}`;
}

// --- Field extraction ---

function resolveName(raw: RawComponent, displayName: string | undefined): StructuredName | undefined {
  const n = raw.first('N');
  if (n.present) {
    const [family = '', given = '', additional = '', prefix = '', suffix = ''] = n.value.components;
    return { family, given, additional, prefix, suffix };
  }
  if (displayName?.trim()) return splitDisplayName(displayName);
  return undefined;
}

function extractOrganization(raw: RawComponent): string[] | undefined {
  const org = raw.first('ORG');
  if (!org.present) return undefined;
  const components = org.value.components;
  return components.some(c => c.length > 0) ? components : undefined;
}

function extractBirthday(raw: RawComponent): string | undefined {
  const bday = raw.first('BDAY');
  return bday.present ? parseBirthday(bday.value.value) : undefined;
}

function extractNotes(raw: RawComponent): string[] | undefined {
  const notes = raw.all('NOTE').map(p => p.value);
  return notes.length > 0 ? notes : undefined;
}

function splitTypeValues(values: readonly string[]): string[] {
  return values
    .flatMap(v => v.split(','))
    .map(v => v.trim().toLowerCase())
    .filter(v => v.length > 0);
}

function recoverField<T>(extract: () => T | undefined): T | undefined {
  try {
    return extract();
  } catch (err) {
    logger.warn('Dropping field', errorMessage(err));
    return undefined;
  }
}
