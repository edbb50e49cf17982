/**
 * Raised when an assignment definition cannot be read or does not validate
 */
export class AssignmentConfigError extends Error {
  constructor(message: string, public readonly source: string) {
    super(`Invalid assignment config ${source}: ${message}`);
    this.name = 'AssignmentConfigError';
  }
}

/**
 * Raised when a workbook file cannot be opened or parsed
 */
export class WorkbookLoadError extends Error {
  constructor(message: string, public readonly filePath: string) {
    super(`Failed to open workbook ${filePath}: ${message}`);
    this.name = 'WorkbookLoadError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
