import { randomUUID } from 'node:crypto';

export { logger } from './logger.js';
export { VCardParseError, FieldError, ConfigError, InputFileError, errorMessage } from './errors.js';
export { decodeBestEffort, outputFileName, VCARD_MEDIA_TYPE } from './files.js';

export function generateId(): string {
  return randomUUID();
}
