export enum BuildErrorCode {
  SPAWN_FAILED = 'SPAWN_FAILED',
  EXECUTION_FAILED = 'EXECUTION_FAILED',
  MISSING_ARTIFACT = 'MISSING_ARTIFACT',
  AMBIGUOUS_ARTIFACT = 'AMBIGUOUS_ARTIFACT',
  UNEXPECTED_STRUCTURE = 'UNEXPECTED_STRUCTURE',
  MISSING_ENTRY_POINT = 'MISSING_ENTRY_POINT',
  INVALID_CONFIG = 'INVALID_CONFIG',
}

export class BuildError extends Error {
  readonly code: BuildErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: BuildErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'BuildError';
    this.code = code;
    this.context = context;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
