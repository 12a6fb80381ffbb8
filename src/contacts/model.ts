import type { Contact, StructuredName } from '../types/index.js';

const PREFIXES = new Set(['mr', 'mrs', 'ms', 'dr', 'prof']);
const SUFFIXES = new Set(['jr', 'sr', 'ii', 'iii', 'iv', 'phd', 'md']);

export function emptyName(): StructuredName {
  return { family: '', given: '', additional: '', prefix: '', suffix: '' };
}

export function createContact(fields: Partial<Contact> = {}): Contact {
  return {
    displayName: fields.displayName,
    structuredName: fields.structuredName,
    emails: fields.emails ?? [],
    phones: fields.phones ?? [],
    organization: fields.organization,
    birthday: fields.birthday,
    notes: fields.notes,
  };
}

/**
 * Best-effort split of a display name into structured name fields.
 *
 * A leading honorific becomes the prefix and a trailing generational or
 * academic suffix becomes the suffix (matched case-insensitively, ignoring
 * trailing dots). Of what remains, the first token is the given name and the
 * rest is the family name; the additional-names field is never filled.
 */
export function splitDisplayName(displayName: string): StructuredName {
  const tokens = displayName.trim().split(/\s+/).filter(t => t.length > 0);
  if (tokens.length === 0) return emptyName();

  let core = tokens;
  let prefix = '';
  let suffix = '';

  if (PREFIXES.has(honorificKey(core[0]))) {
    prefix = core[0];
    core = core.slice(1);
  }
  if (core.length > 0 && SUFFIXES.has(honorificKey(core[core.length - 1]))) {
    suffix = core[core.length - 1];
    core = core.slice(0, -1);
  }

  if (core.length === 0) {
    return { family: '', given: tokens[0], additional: '', prefix, suffix };
  }
  return {
    family: core.slice(1).join(' '),
    given: core[0],
    additional: '',
    prefix,
    suffix,
  };
}

function honorificKey(token: string): string {
  return token.replace(/\.+$/, '').toLowerCase();
}
