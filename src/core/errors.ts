/**
 * Errors that abort an operation. Everything else is reported as a
 * Diagnostic.
 */

export class SpectraceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * The graph schema is internally inconsistent.
 */
export class SchemaError extends SpectraceError {}

/**
 * A configuration or record file failed validation.
 */
export class ConfigError extends SpectraceError {
  constructor(
    readonly file: string,
    readonly issues: string[]
  ) {
    super(`Invalid ${file}:\n  ${issues.join('\n  ')}`);
  }
}
