/** Error classes for instanceof detection at the export boundary. */

/** The asset handed to the encoder is absent or not a script asset. */
export class InputError extends Error {
  constructor(message = 'Invalid script asset') {
    super(message);
    this.name = 'InputError';
  }
}

/** An asset source file failed schema or structural checks. */
export class AssetFormatError extends Error {
  readonly source: string;
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`Invalid asset source "${source}": ${issues.join('; ')}`);
    this.name = 'AssetFormatError';
    this.source = source;
    this.issues = issues;
  }
}

/** The configuration file could not be read or failed validation. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
