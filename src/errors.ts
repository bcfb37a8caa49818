import chalk from 'chalk';

export const EXIT_CODES = {
  DATABASE_NOT_FOUND: 1,
  CREDENTIAL_NOT_FOUND: 2,
  CREDENTIALS_NOT_STORED: 3,
  IO_ERROR: 4,
  DESERIALIZATION_ERROR: 5,
  PATH_RESOLUTION_ERROR: 6,
  SERIALIZATION_ERROR: 7,
  DUPLICATE_SERVICE: 8,
  CONFIG_ERROR: 9,
  BACKUP_NOT_FOUND: 10,
  UNEXPECTED: 99,
  USER_CANCELLED: 100,
} as const;

export type ErrorCode = Exclude<keyof typeof EXIT_CODES, 'UNEXPECTED'>;

export class CrabError extends Error {
  public readonly exitCode: number;

  constructor(
    message: string,
    public code: ErrorCode,
    public suggestions?: string[],
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CrabError';
    this.exitCode = EXIT_CODES[code];
  }
}

export class PathResolutionError extends CrabError {
  constructor(reason = 'Home directory not found') {
    super(`Could not resolve the credential database path: ${reason}`, 'PATH_RESOLUTION_ERROR', [
      'Make sure your user account has a home directory',
      'Use --dir <path> to point crab at a directory explicitly',
    ]);
    this.name = 'PathResolutionError';
  }
}

export class StorageIoError extends CrabError {
  constructor(operation: string, path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`File operation failed: cannot ${operation} ${path}: ${reason}`, 'IO_ERROR', [
      'Check file permissions',
      'Check available disk space',
    ], { cause });
    this.name = 'StorageIoError';
  }
}

export class DeserializationError extends CrabError {
  constructor(path: string, reason: string, cause?: unknown) {
    super(`Database file is corrupted: ${path}: ${reason}`, 'DESERIALIZATION_ERROR', [
      'Inspect the file manually, or restore one with `crab backups` and `crab restore <backup>`',
    ], { cause });
    this.name = 'DeserializationError';
  }
}

export class SerializationError extends CrabError {
  constructor(reason: string, cause?: unknown) {
    super(`Data serialization failed: ${reason}`, 'SERIALIZATION_ERROR', undefined, { cause });
    this.name = 'SerializationError';
  }
}

export class DatabaseNotFoundError extends CrabError {
  constructor(path?: string) {
    super(
      path
        ? `Database file not found: ${path}`
        : "Database file not found. Use 'add' command to create your first entry.",
      'DATABASE_NOT_FOUND',
      ["Run `crab add` to create your first credential"]
    );
    this.name = 'DatabaseNotFoundError';
  }
}

export class CredentialNotFoundError extends CrabError {
  constructor(public readonly service: string) {
    super(`No credential found for '${service}'`, 'CREDENTIAL_NOT_FOUND', [
      'Run `crab list` to see available services',
      `Run \`crab add --service ${service}\` to create it`,
    ]);
    this.name = 'CredentialNotFoundError';
  }
}

export class CredentialsNotStoredError extends CrabError {
  constructor() {
    super('No credentials stored yet', 'CREDENTIALS_NOT_STORED', [
      'Run `crab add` to store your first credential',
    ]);
    this.name = 'CredentialsNotStoredError';
  }
}

export class DuplicateServiceError extends CrabError {
  constructor(public readonly service: string) {
    super(`A credential for '${service}' already exists`, 'DUPLICATE_SERVICE', [
      `Run \`crab edit ${service}\` to change it`,
      `Run \`crab remove ${service}\` first to replace it`,
    ]);
    this.name = 'DuplicateServiceError';
  }
}

export class ConfigError extends CrabError {
  constructor(message: string) {
    super(`Configuration error: ${message}`, 'CONFIG_ERROR', [
      'Check your .crabrc file for typos',
      'Delete the file to fall back to the defaults',
    ]);
    this.name = 'ConfigError';
  }
}

export class BackupNotFoundError extends CrabError {
  constructor(path: string) {
    super(`Backup not found: ${path}`, 'BACKUP_NOT_FOUND', [
      'Run `crab backups` to see available backups',
    ]);
    this.name = 'BackupNotFoundError';
  }
}

export class UserCancelledError extends CrabError {
  constructor() {
    super('Operation cancelled by user', 'USER_CANCELLED');
    this.name = 'UserCancelledError';
  }
}

export const getExitCode = (error: unknown): number => {
  return error instanceof CrabError ? error.exitCode : EXIT_CODES.UNEXPECTED;
};

export const handleError = (error: unknown): never => {
  if (error instanceof UserCancelledError) {
    console.log(chalk.blue('ℹ'), 'Operation cancelled.');
    process.exit(error.exitCode);
  }

  if (error instanceof CrabError) {
    console.error(chalk.red('x'), error.message);
    if (error.suggestions && error.suggestions.length > 0) {
      console.error();
      console.error(chalk.dim('Suggestions:'));
      error.suggestions.forEach((s) => console.error(chalk.dim(`  → ${s}`)));
    }
    if (process.env.DEBUG && error.cause instanceof Error) {
      console.error(error.cause.stack);
    }
    process.exit(error.exitCode);
  }

  if (error instanceof Error) {
    console.error(chalk.red('x'), 'An unexpected error occurred:', error.message);
    if (process.env.DEBUG) {
      console.error(error.stack);
    }
    process.exit(EXIT_CODES.UNEXPECTED);
  }

  console.error(chalk.red('x'), 'An unknown error occurred');
  process.exit(EXIT_CODES.UNEXPECTED);
};
