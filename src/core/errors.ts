/**
 * Standardized exit codes for tagsift
 */
export enum ExitCode {
  SUCCESS = 0,
  GENERAL_ERROR = 1,
  PARSE_CONFIG_ERROR = 4,
  MISSING_FILE = 5,
  CATALOG_ERROR = 8,
  QUERY_PAYLOAD_ERROR = 9
}

/**
 * Base class for tagsift errors with exit codes
 */
export class TagsiftError extends Error {
  public readonly exitCode: ExitCode;

  constructor(message: string, exitCode: ExitCode) {
    super(message);
    this.exitCode = exitCode;
    this.name = this.constructor.name;
  }
}

/**
 * Parse or configuration error
 */
export class ParseConfigError extends TagsiftError {
  constructor(message: string) {
    super(message, ExitCode.PARSE_CONFIG_ERROR);
  }
}

/**
 * A file the command needs (catalogue, query payload) does not exist
 */
export class MissingFileError extends TagsiftError {
  constructor(public readonly filepath: string, what: string = "file") {
    super(`Missing ${what}: ${filepath}`, ExitCode.MISSING_FILE);
  }
}

/**
 * Catalogue snapshot could not be read or has the wrong shape
 */
export class CatalogError extends TagsiftError {
  constructor(message: string, public readonly filepath?: string) {
    super(message, ExitCode.CATALOG_ERROR);
  }
}

/**
 * Structured query payload failed validation
 */
export class QueryPayloadError extends TagsiftError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    const msg = issues.length === 1
      ? `Invalid query payload: ${issues[0]}`
      : `Invalid query payload (${issues.length} issues):\n${issues.map(i => `  - ${i}`).join("\n")}`;
    super(msg, ExitCode.QUERY_PAYLOAD_ERROR);
    this.issues = issues;
  }
}

/**
 * Helper to get exit code description for help text
 */
export function getExitCodeDescription(code: ExitCode): string {
  switch (code) {
    case ExitCode.SUCCESS:
      return "Success";
    case ExitCode.GENERAL_ERROR:
      return "Unexpected error";
    case ExitCode.PARSE_CONFIG_ERROR:
      return "Parse or configuration error";
    case ExitCode.MISSING_FILE:
      return "Missing catalogue or payload file";
    case ExitCode.CATALOG_ERROR:
      return "Invalid catalogue snapshot";
    case ExitCode.QUERY_PAYLOAD_ERROR:
      return "Invalid query payload";
    default:
      return "Unknown error";
  }
}

/**
 * Format exit codes for help text
 */
export function formatExitCodesHelp(): string {
  const codes = [
    ExitCode.SUCCESS,
    ExitCode.GENERAL_ERROR,
    ExitCode.PARSE_CONFIG_ERROR,
    ExitCode.MISSING_FILE,
    ExitCode.CATALOG_ERROR,
    ExitCode.QUERY_PAYLOAD_ERROR
  ];

  return codes
    .map(code => `  ${code} - ${getExitCodeDescription(code)}`)
    .join("\n");
}
