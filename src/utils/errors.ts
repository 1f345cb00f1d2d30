/**
 * Custom error classes for edr-profile-gen with helpful user-facing messages
 */

export type ErrorCode =
  | 'UNKNOWN_QUERY_TYPE'
  | 'UNKNOWN_FORMAT'
  | 'DUPLICATE_IDENTIFIER'
  | 'DANGLING_REFERENCE'
  | 'INCLUDE_MISMATCH'
  | 'UNRESOLVED_PLACEHOLDER'
  | 'INVALID_CONFIG'
  | 'CONFIG_NOT_FOUND'
  | 'FILE_READ_ERROR'
  | 'FILE_WRITE_ERROR'
  | 'OUTPUT_EXISTS'
  | 'UNKNOWN_ERROR';

/**
 * Base error class for edr-profile-gen with code and suggestion
 */
export class ProfileGenError extends Error {
  constructor(
    message: string,
    public code: ErrorCode,
    public suggestion?: string
  ) {
    super(message);
    this.name = 'ProfileGenError';
    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Format error for CLI display with color support
   */
  format(useColor = true): string {
    const red = useColor ? '\x1b[31m' : '';
    const yellow = useColor ? '\x1b[33m' : '';
    const reset = useColor ? '\x1b[0m' : '';

    let output = `${red}Error [${this.code}]:${reset} ${this.message}`;

    if (this.suggestion) {
      output += `\n\n${yellow}Suggestion:${reset} ${this.suggestion}`;
    }

    return output;
  }
}

function describeKeys(keys: string[]): string {
  return keys.map(k => `"${k}"`).join(', ');
}

/**
 * Error factory functions with predefined messages and suggestions
 */
export const errors = {
  unknownQueryType(queryType: string, known: string[], collection?: string): ProfileGenError {
    const where = collection ? ` in collection "${collection}"` : '';
    return new ProfileGenError(
      `Unknown query type "${queryType}"${where}: every query type must exist in the query-type catalog`,
      'UNKNOWN_QUERY_TYPE',
      `Supported query types: ${known.join(', ')}`
    );
  },

  unknownFormat(format: string, known: string[], collection?: string): ProfileGenError {
    const where = collection ? ` in collection "${collection}"` : '';
    return new ProfileGenError(
      `Unknown output format "${format}"${where}: every format must exist in the format catalog`,
      'UNKNOWN_FORMAT',
      `Supported formats: ${known.join(', ')}`
    );
  },

  duplicateIdentifier(id: string, what = 'identifier'): ProfileGenError {
    return new ProfileGenError(
      `Duplicate ${what} "${id}": identifiers must be unique within a profile`,
      'DUPLICATE_IDENTIFIER',
      `Rename one of the colliding collections, filters or schemas.`
    );
  },

  danglingReference(from: string, to: string, invariant: string): ProfileGenError {
    return new ProfileGenError(
      `Dangling reference from "${from}" to "${to}": ${invariant}`,
      'DANGLING_REFERENCE',
      `Remove the reference or make sure its target is generated in the same run.`
    );
  },

  includeMismatch(orphaned: string[], missing: string[]): ProfileGenError {
    const details: string[] = [];
    if (orphaned.length > 0) {
      details.push(`orphaned (generated but never included): ${describeKeys(orphaned)}`);
    }
    if (missing.length > 0) {
      details.push(`missing (included but not generated): ${describeKeys(missing)}`);
    }
    return new ProfileGenError(
      `Document include list does not match generated files; ${details.join('; ')}`,
      'INCLUDE_MISMATCH',
      `This indicates a generator bug. Please report it with the profile configuration attached.`
    );
  },

  unresolvedPlaceholder(source: string, markers: string[]): ProfileGenError {
    return new ProfileGenError(
      `Unresolved placeholder(s) ${describeKeys(markers)} in ${source}: rendered templates must not contain substitution markers`,
      'UNRESOLVED_PLACEHOLDER',
      `Check the catalog template for a misspelled marker.`
    );
  },

  invalidConfig(source: string, details?: string): ProfileGenError {
    return new ProfileGenError(
      `Invalid profile configuration in ${source}${details ? `:\n${details}` : ''}`,
      'INVALID_CONFIG',
      `Fix the listed fields, or run 'edr-profile-gen create' to build a configuration interactively.`
    );
  },

  configNotFound(path: string): ProfileGenError {
    return new ProfileGenError(
      `Configuration file not found at ${path}`,
      'CONFIG_NOT_FOUND',
      `Run 'edr-profile-gen create' to create a profile and its profile_config.yml.`
    );
  },

  fileReadError(path: string, reason?: string): ProfileGenError {
    return new ProfileGenError(
      `Failed to read file ${path}${reason ? `: ${reason}` : ''}`,
      'FILE_READ_ERROR',
      `Check that the file exists and you have read permissions.`
    );
  },

  fileWriteError(path: string, reason?: string): ProfileGenError {
    return new ProfileGenError(
      `Failed to write file ${path}${reason ? `: ${reason}` : ''}`,
      'FILE_WRITE_ERROR',
      `Check that you have write permissions for the directory.`
    );
  },

  outputExists(path: string): ProfileGenError {
    return new ProfileGenError(
      `Output directory ${path} already exists and is not empty`,
      'OUTPUT_EXISTS',
      `Use --force to regenerate into it, or choose another directory with --output.`
    );
  },

  unknown(error: unknown): ProfileGenError {
    const message = error instanceof Error ? error.message : String(error);
    return new ProfileGenError(
      `An unexpected error occurred: ${message}`,
      'UNKNOWN_ERROR',
      `Run again with --verbose for more details.`
    );
  },
};

/**
 * Type guard to check if an error is a ProfileGenError
 */
export function isProfileGenError(error: unknown): error is ProfileGenError {
  return error instanceof ProfileGenError;
}

/**
 * Format any error for CLI display
 */
export function formatError(error: unknown, useColor = true): string {
  if (isProfileGenError(error)) {
    return error.format(useColor);
  }

  return errors.unknown(error).format(useColor);
}

/**
 * Handle errors in CLI commands by formatting and logging them
 */
export function handleError(error: unknown): void {
  console.error(formatError(error, process.stdout.isTTY === true));
  process.exitCode = 1;
}
