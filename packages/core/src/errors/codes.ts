/**
 * Error Code Infrastructure
 * Stable error codes and exit code mappings.
 */

// Severity levels used across the system
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Configuration Errors (E300–E399)
  CONFIG_UNREADABLE = 'E300',
  CONFIG_PARSE_FAILED = 'E301',
  CONFIG_INVALID = 'E302',

  // Setup Errors (E400–E499)
  PACKAGE_MANAGER_NOT_FOUND = 'E400',
  PACKAGE_INSTALL_FAILED = 'E401',

  // Output Errors (E600–E699)
  OUTPUT_WRITE_FAILED = 'E600',

  // Internal Errors (E900–E999)
  INTERNAL_ERROR = 'E900',
}

// CLI exit codes mapping
export const EXIT_CODES = {
  [ErrorCode.CONFIG_UNREADABLE]: 50,
  [ErrorCode.CONFIG_PARSE_FAILED]: 50,
  [ErrorCode.CONFIG_INVALID]: 50,
  [ErrorCode.PACKAGE_MANAGER_NOT_FOUND]: 60,
  [ErrorCode.PACKAGE_INSTALL_FAILED]: 60,
  [ErrorCode.OUTPUT_WRITE_FAILED]: 70,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
