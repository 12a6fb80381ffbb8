/** Fatal tokenizer failure: the component structure of the input is broken. */
export class VCardParseError extends Error {
  constructor(message: string, readonly line: number) {
    super(`Line ${line}: ${message}`);
    this.name = 'VCardParseError';
  }
}

/** A single property could not be normalized; the field is dropped, the contact is kept. */
export class FieldError extends Error {
  constructor(readonly property: string, message: string) {
    super(`${property}: ${message}`);
    this.name = 'FieldError';
  }
}

export class ConfigError extends Error {
  constructor(path: string, message: string) {
    super(`Invalid config ${path}: ${message}`);
    this.name = 'ConfigError';
  }
}

export class InputFileError extends Error {
  constructor(filePath: string, message: string) {
    super(`Cannot read ${filePath}: ${message}`);
    this.name = 'InputFileError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
