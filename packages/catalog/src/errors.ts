/**
 * Deterministic Error Codes for cudarch
 *
 * Format: CA_<CATEGORY>_<NUMBER>
 *
 * Categories:
 * - CONFIG: Configuration errors
 * - INDEX: Package index / download errors
 * - ARCHIVE: Package archive errors
 * - INSPECT: Binary inspection tool errors
 * - IO: File system errors
 * - RESULTS: Results store errors
 * - CLI: Command line argument errors
 */

export const ErrorCodes = {
  // CONFIG errors (001-099)
  CONFIG_INVALID: 'CA_CONFIG_001',
  CONFIG_SCHEMA_ERROR: 'CA_CONFIG_002',

  // INDEX errors (100-199)
  INDEX_NOT_FOUND: 'CA_INDEX_101',
  INDEX_HTTP_ERROR: 'CA_INDEX_102',
  INDEX_NETWORK_ERROR: 'CA_INDEX_103',
  INDEX_INVALID_RESPONSE: 'CA_INDEX_104',
  DOWNLOAD_FAILED: 'CA_INDEX_105',

  // ARCHIVE errors (200-299)
  ARCHIVE_INVALID: 'CA_ARCHIVE_201',

  // INSPECT errors (300-399)
  INSPECT_TOOL_NOT_FOUND: 'CA_INSPECT_301',
  INSPECT_FAILED: 'CA_INSPECT_302',

  // IO errors (400-499)
  IO_READ_ERROR: 'CA_IO_401',
  IO_WRITE_ERROR: 'CA_IO_402',
  IO_PATH_NOT_FOUND: 'CA_IO_403',

  // RESULTS errors (500-599)
  RESULTS_INVALID: 'CA_RESULTS_501',

  // CLI errors (600-699)
  CLI_INVALID_ARGUMENT: 'CA_CLI_601',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * User-friendly error messages for each error code
 */
export const ErrorMessages: Record<ErrorCode, string> = {
  [ErrorCodes.CONFIG_INVALID]: 'Configuration file could not be parsed',
  [ErrorCodes.CONFIG_SCHEMA_ERROR]: 'Configuration does not match expected schema',

  [ErrorCodes.INDEX_NOT_FOUND]: 'Package or release not found on the index',
  [ErrorCodes.INDEX_HTTP_ERROR]: 'Package index returned an error',
  [ErrorCodes.INDEX_NETWORK_ERROR]: 'Could not reach the package index',
  [ErrorCodes.INDEX_INVALID_RESPONSE]: 'Unexpected response from the package index',
  [ErrorCodes.DOWNLOAD_FAILED]: 'Download failed',

  [ErrorCodes.ARCHIVE_INVALID]: 'Package archive is not a valid zip file',

  [ErrorCodes.INSPECT_TOOL_NOT_FOUND]: 'Binary inspection tool not found',
  [ErrorCodes.INSPECT_FAILED]: 'Binary inspection tool failed',

  [ErrorCodes.IO_READ_ERROR]: 'Failed to read file',
  [ErrorCodes.IO_WRITE_ERROR]: 'Failed to write file',
  [ErrorCodes.IO_PATH_NOT_FOUND]: 'Path not found',

  [ErrorCodes.RESULTS_INVALID]: 'Results file is invalid',

  [ErrorCodes.CLI_INVALID_ARGUMENT]: 'Invalid argument provided',
};

/**
 * Remediation guidance for each error code
 */
export const ErrorRemediation: Record<ErrorCode, string> = {
  [ErrorCodes.CONFIG_INVALID]: `
Check cudarch.config.yaml (or .cudarchrc.json) for syntax errors.

Run with --verbose for the parser message.
`.trim(),

  [ErrorCodes.CONFIG_SCHEMA_ERROR]: `
Your configuration has invalid options. Check these common issues:

- 'libraries' must be an array of glob patterns
- 'index.timeout' and 'estimatedWheelBytes' must be numbers
- 'inspector.command' must be a non-empty string
`.trim(),

  [ErrorCodes.INDEX_NOT_FOUND]: `
The package or release does not exist on the configured index.

Check:
1. The 'package' name in your configuration
2. The version string (list them with: cudarch versions)
3. The 'index.url' setting
`.trim(),

  [ErrorCodes.INDEX_HTTP_ERROR]: `
The package index answered with an error status.

This is usually temporary. Wait a moment and retry.
`.trim(),

  [ErrorCodes.INDEX_NETWORK_ERROR]: `
Could not connect to the package index.

Check:
1. Your internet connection
2. Firewall/proxy settings
3. The 'index.url' and 'index.timeout' settings
`.trim(),

  [ErrorCodes.INDEX_INVALID_RESPONSE]: `
The index did not return PyPI JSON API data.

Make sure 'index.url' points at a JSON API root such as:
  https://pypi.org/pypi
`.trim(),

  [ErrorCodes.DOWNLOAD_FAILED]: `
A package file could not be downloaded.

Wheels are large; make sure there is enough space in the temp directory
and retry with --resume to skip packages already analyzed.
`.trim(),

  [ErrorCodes.ARCHIVE_INVALID]: `
The file could not be opened as a wheel (zip) archive.

If the download was interrupted, retry. For conda packages, unpack the
archive first and pass the directory to: cudarch inspect <dir>
`.trim(),

  [ErrorCodes.INSPECT_TOOL_NOT_FOUND]: `
cuobjdump was not found. It ships with the CUDA toolkit.

Either put it on your PATH, or configure a wrapper command:

  inspector:
    command: singularity exec --bind /data /images/cuda.sif cuobjdump

Environment variable:
  export CUDARCH_INSPECTOR="cuobjdump"
`.trim(),

  [ErrorCodes.INSPECT_FAILED]: `
cuobjdump exited with an error. Run it by hand on the library to see
the full output:

  cuobjdump <library.so>

Libraries without embedded device code make cuobjdump fail.
`.trim(),

  [ErrorCodes.IO_READ_ERROR]: `
Failed to read a file. Check that it exists and is readable.
`.trim(),

  [ErrorCodes.IO_WRITE_ERROR]: `
Failed to write a file. Check:

1. The directory exists
2. You have write permission
3. There's enough disk space
`.trim(),

  [ErrorCodes.IO_PATH_NOT_FOUND]: `
The specified path doesn't exist.

Run: ls <path> to verify it.
`.trim(),

  [ErrorCodes.RESULTS_INVALID]: `
The results file is malformed or was written by an incompatible version.

Fix:
1. Move the file away:
   mv .cudarch/results.json .cudarch/results.json.bak
2. Re-run the analysis:
   cudarch analyze
`.trim(),

  [ErrorCodes.CLI_INVALID_ARGUMENT]: `
Invalid command-line argument.

Run: cudarch --help
`.trim(),
};

/**
 * Structured error with deterministic error code
 */
export class CatalogError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: unknown;
  public override readonly cause?: Error;

  constructor(code: ErrorCode, message?: string, options?: { details?: unknown; cause?: Error }) {
    const baseMessage = message ?? ErrorMessages[code];
    super(baseMessage, { cause: options?.cause });

    this.name = 'CatalogError';
    this.code = code;
    this.details = options?.details;
    this.cause = options?.cause;

    Error.captureStackTrace?.(this, CatalogError);
  }

  getRemediation(): string {
    return ErrorRemediation[this.code];
  }

  /**
   * Format error for user display
   */
  toUserString(verbose = false): string {
    const parts: string[] = [`[${this.code}] ${this.message}`];

    if (verbose && this.details) {
      parts.push(`\nDetails: ${JSON.stringify(this.details, null, 2)}`);
    }

    if (verbose && this.cause) {
      parts.push(`\nCaused by: ${this.cause.message}`);
      if (this.cause.stack) {
        parts.push(`\n${this.cause.stack}`);
      }
    }

    return parts.join('');
  }

  /**
   * Format error with remediation for user display
   */
  toUserStringWithRemediation(verbose = false): string {
    const parts: string[] = [this.toUserString(verbose)];
    const remediation = this.getRemediation();

    if (remediation) {
      parts.push('\n\nHow to fix:\n');
      const indented = remediation
        .split('\n')
        .map((line) => `  ${line}`)
        .join('\n');
      parts.push(indented);
    }

    return parts.join('');
  }

  toJSON(): Record<string, unknown> {
    return {
      code: this.code,
      message: this.message,
      remediation: this.getRemediation(),
      details: this.details,
      cause: this.cause
        ? {
            message: this.cause.message,
            stack: this.cause.stack,
          }
        : undefined,
    };
  }
}

export function isCatalogError(error: unknown): error is CatalogError {
  return error instanceof CatalogError;
}

/**
 * Wrap an unknown error in a CatalogError
 */
export function wrapError(error: unknown, code: ErrorCode, message?: string): CatalogError {
  if (error instanceof CatalogError) {
    return error;
  }

  const cause = error instanceof Error ? error : new Error(String(error));
  return new CatalogError(code, message ?? cause.message, { cause });
}

/** Message of an unknown thrown value */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
