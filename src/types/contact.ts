export interface StructuredName {
  family: string;
  given: string;
  additional: string;
  prefix: string;
  suffix: string;
}

export interface EmailEntry {
  value: string;
  /** Lowercase, deduplicated, sorted. */
  types: string[];
}

export interface PhoneEntry {
  value: string;
  /** Lowercase, deduplicated, sorted. */
  types: string[];
}

export interface Contact {
  displayName?: string;
  structuredName?: StructuredName;
  emails: EmailEntry[];
  phones: PhoneEntry[];
  organization?: string[];
  /** ISO-8601 date, YYYY-MM-DD. */
  birthday?: string;
  notes?: string[];
}
