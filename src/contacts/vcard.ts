import type { Contact, StructuredName } from '../types/index.js';
import { generateId } from '../utils/index.js';
import { escapeText } from './escape.js';
import { normalizeComponent, normalizeTelUri, normalizeTypes } from './normalize.js';
import { tokenize } from './tokenizer.js';

export const PRODUCT_ID = '-//vcf-normalize-mcp//0.1.0//EN';
export const FALLBACK_DISPLAY_NAME = 'Unnamed';

const CRLF = '\r\n';

export interface SerializeOptions {
  /** Source of the UUID written as `UID:urn:uuid:<id>`. */
  generateId?: () => string;
  /** Fold lines longer than 75 octets (RFC 6350 §3.2). */
  foldLines?: boolean;
}

/**
 * Parse vCard 2.1/3.0/4.0 text into contacts, one per BEGIN:VCARD block.
 * Throws a VCardParseError when the block structure is broken.
 */
export function parseVCards(text: string): Contact[] {
  return tokenize(text).map(normalizeComponent);
}

/** Render contacts as concatenated vCard 4.0 components, CRLF-terminated. */
export function serializeContacts(contacts: readonly Contact[], options: SerializeOptions = {}): string {
  return contacts.map(c => serializeContact(c, options)).join('');
}

export function serializeContact(contact: Contact, options: SerializeOptions = {}): string {
  const nextId = options.generateId ?? generateId;
  const displayName = contact.displayName?.trim() ? contact.displayName : undefined;
  const fn = displayName ?? FALLBACK_DISPLAY_NAME;
  const n: StructuredName = contact.structuredName ?? {
    family: '',
    given: displayName ?? '',
    additional: '',
    prefix: '',
    suffix: '',
  };

  const lines: string[] = [
    'BEGIN:VCARD',
    'VERSION:4.0',
    `N:${[n.family, n.given, n.additional, n.prefix, n.suffix].map(escapeText).join(';')}`,
    `FN:${escapeText(fn)}`,
  ];

  for (const email of contact.emails) {
    lines.push(`EMAIL${typeParam(normalizeTypes('email', email.types))}:${escapeText(email.value)}`);
  }

  for (const phone of contact.phones) {
    const types = typeParam(normalizeTypes('tel', phone.types));
    lines.push(`TEL${types};VALUE=uri:${escapeText(normalizeTelUri(phone.value))}`);
  }

  if (contact.organization && contact.organization.length > 0) {
    lines.push(`ORG:${contact.organization.map(escapeText).join(';')}`);
  }

  if (contact.birthday) {
    lines.push(`BDAY:${escapeText(contact.birthday)}`);
  }

  for (const note of contact.notes ?? []) {
    lines.push(`NOTE:${escapeText(note)}`);
  }

  lines.push(`PRODID:${PRODUCT_ID}`);
  lines.push(`UID:urn:uuid:${nextId()}`);
  lines.push('END:VCARD');

  const folded = options.foldLines ? lines.map(foldLine) : lines;
  return folded.join(CRLF) + CRLF;
}

/** Parse and re-serialize in one step; the parsed contacts come back with the text. */
export function convertVCards(text: string, options: SerializeOptions = {}): { contacts: Contact[]; vcard: string } {
  const contacts = parseVCards(text);
  return { contacts, vcard: serializeContacts(contacts, options) };
}

function typeParam(types: string[]): string {
  return types.length > 0 ? `;TYPE=${types.join(',')}` : '';
}

/** Fold at 75 octets with CRLF + space, never inside a multi-byte character. */
export function foldLine(line: string): string {
  if (Buffer.byteLength(line, 'utf-8') <= 75) return line;

  const chunks: string[] = [];
  let current = '';
  let used = 0;
  let limit = 75;
  for (const ch of line) {
    const size = Buffer.byteLength(ch, 'utf-8');
    if (used + size > limit) {
      chunks.push(current);
      current = '';
      used = 0;
      limit = 74; // continuation lines lose one octet to the leading space
    }
    current += ch;
    used += size;
  }
  chunks.push(current);
  return chunks.join(`${CRLF} `);
}
