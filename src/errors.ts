export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class NamingPatternError extends ConfigError {
  readonly placeholder: string;

  constructor(placeholder: string, pattern: string) {
    super(`Unknown placeholder {${placeholder}} in naming pattern "${pattern}"`);
    this.name = 'NamingPatternError';
    this.placeholder = placeholder;
  }
}

export class MetadataLibraryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MetadataLibraryError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }

  return undefined;
}
