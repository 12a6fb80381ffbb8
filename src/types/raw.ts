export const KNOWN_PROPERTIES = ['FN', 'N', 'EMAIL', 'TEL', 'ORG', 'BDAY', 'NOTE'] as const;

export type KnownPropertyName = typeof KNOWN_PROPERTIES[number];

/** Upper-cased parameter name → values. A bare vCard 2.1 flag (`;HOME`) maps to `[]`. */
export type ParameterMap = Map<string, string[]>;

export interface RawProperty {
  name: KnownPropertyName;
  group?: string;
  parameters: ParameterMap;
  /** Value as it appeared on the wire, still escaped. */
  rawValue: string;
  /** Unescaped, unsplit value. */
  value: string;
  /** Value split on unescaped `;`, each part unescaped. */
  components: string[];
}

export type Field<T> = { present: true; value: T } | { present: false };

const KNOWN_PROPERTY_SET: ReadonlySet<string> = new Set(KNOWN_PROPERTIES);

export function isKnownProperty(name: string): name is KnownPropertyName {
  return KNOWN_PROPERTY_SET.has(name);
}
