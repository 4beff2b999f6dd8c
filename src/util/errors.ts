/** Error codes attached to every AnalyzerError. */
export const ErrorCodes = {
  PROJECT_ROOT_NOT_FOUND: 'PROJECT_ROOT_NOT_FOUND',
  SCHEMA_FILE_MISSING: 'SCHEMA_FILE_MISSING',
  CONFIG_FILE_MISSING: 'CONFIG_FILE_MISSING',
  CONFIG_PARSE_ERROR: 'CONFIG_PARSE_ERROR',
  MALFORMED_SCHEMA: 'MALFORMED_SCHEMA',
  FILE_READ_ERROR: 'FILE_READ_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base class for every error the analyzer raises.
 * The CLI maps any AnalyzerError to a fatal exit and prints its code; anything else is a bug.
 */
export class AnalyzerError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'AnalyzerError';
  }
}

export class ProjectRootNotFoundError extends AnalyzerError {
  constructor(startDir: string) {
    super(
      ErrorCodes.PROJECT_ROOT_NOT_FOUND,
      `Not in a Rails application directory (no config/application.rb above ${startDir})`,
    );
    this.name = 'ProjectRootNotFoundError';
  }
}

export class SchemaFileMissingError extends AnalyzerError {
  constructor(schemaPath: string) {
    super(ErrorCodes.SCHEMA_FILE_MISSING, `Could not find db/schema.rb at ${schemaPath}`);
    this.name = 'SchemaFileMissingError';
  }
}

export class ConfigFileMissingError extends AnalyzerError {
  constructor(configPath: string) {
    super(ErrorCodes.CONFIG_FILE_MISSING, `Could not find config/database.yml at ${configPath}`);
    this.name = 'ConfigFileMissingError';
  }
}

export class ConfigParseError extends AnalyzerError {
  constructor(configPath: string, reason: string, cause?: unknown) {
    super(
      ErrorCodes.CONFIG_PARSE_ERROR,
      `Error parsing database.yml (${configPath}): ${reason}`,
      cause !== undefined ? { cause } : undefined,
    );
    this.name = 'ConfigParseError';
  }
}

export class MalformedSchemaError extends AnalyzerError {
  constructor(schemaPath: string, cause: unknown) {
    super(
      ErrorCodes.MALFORMED_SCHEMA,
      `Could not read schema file ${schemaPath}: ${describeError(cause)}`,
      { cause },
    );
    this.name = 'MalformedSchemaError';
  }
}

export class FileReadError extends AnalyzerError {
  constructor(
    public readonly filePath: string,
    cause: unknown,
  ) {
    super(ErrorCodes.FILE_READ_ERROR, describeError(cause), { cause });
    this.name = 'FileReadError';
  }
}

/** Message of an unknown thrown value. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
