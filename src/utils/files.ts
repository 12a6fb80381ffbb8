import * as path from 'node:path';

export const VCARD_MEDIA_TYPE = 'text/vcard; charset=utf-8';

const DEFAULT_BASE_NAME = 'contacts';

const utf8 = new TextDecoder('utf-8', { fatal: false, ignoreBOM: false });

/**
 * Decode uploaded bytes as UTF-8 without ever failing. Invalid sequences are
 * dropped rather than replaced, and a leading byte order mark is removed.
 */
export function decodeBestEffort(bytes: Uint8Array): string {
  // Also removes U+FFFD characters that were validly encoded in the input.
  return utf8.decode(bytes).replace(/\uFFFD/g, '');
}

/** `Work Contacts.VCF` → `Work Contacts-4.0.vcf`; no name → `contacts-4.0.vcf`. */
export function outputFileName(name?: string): string {
  const base = path.basename(name ?? '').replace(/\.vcf$/i, '');
  return `${base || DEFAULT_BASE_NAME}-4.0.vcf`;
}
