export type { Contact, EmailEntry, PhoneEntry, StructuredName } from './contact.js';
export type { Field, KnownPropertyName, ParameterMap, RawProperty } from './raw.js';
export { KNOWN_PROPERTIES, isKnownProperty } from './raw.js';
