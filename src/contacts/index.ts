export { createContact, emptyName, splitDisplayName } from './model.js';
export { RawComponent, tokenize, unfoldLines } from './tokenizer.js';
export { escapeText, unescapeText, splitComponents } from './escape.js';
export {
  normalizeComponent,
  extractTypes,
  normalizeTypes,
  normalizeTelUri,
  parseBirthday,
  KNOWN_EMAIL_TYPES,
  KNOWN_TEL_TYPES,
} from './normalize.js';
export type { TypedKind } from './normalize.js';
export {
  parseVCards,
  serializeContacts,
  serializeContact,
  convertVCards,
  foldLine,
  PRODUCT_ID,
  FALLBACK_DISPLAY_NAME,
} from './vcard.js';
export type { SerializeOptions } from './vcard.js';
