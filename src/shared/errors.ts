export enum HarnessErrorCode {
  INVALID_CHOICE = 'INVALID_CHOICE',
  UNKNOWN_TOOL = 'UNKNOWN_TOOL',
  UNKNOWN_TASK = 'UNKNOWN_TASK',
  MISSING_PARAMETER = 'MISSING_PARAMETER',
  INVALID_PARAMETER = 'INVALID_PARAMETER',
  INVALID_CONFIG = 'INVALID_CONFIG',
  INVALID_SCENARIO = 'INVALID_SCENARIO',
  SPAWN_FAILED = 'SPAWN_FAILED',
  COMMAND_FAILED = 'COMMAND_FAILED',
  EMPTY_OUTPUT = 'EMPTY_OUTPUT',
  TOOL_ERROR = 'TOOL_ERROR',
}

export class HarnessError extends Error {
  readonly code: HarnessErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: HarnessErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'HarnessError';
    this.code = code;
    this.context = context;
  }
}

/**
 * Render an error for the terminal. HarnessError context (stderr, usage text,
 * offending values) is listed under the headline.
 */
export function formatError(err: unknown): string {
  if (err instanceof HarnessError) {
    const ctxLines = err.context && Object.keys(err.context).length > 0
      ? '\n' + Object.entries(err.context).map(([k, v]) => `  ${k}: ${typeof v === 'string' ? v : JSON.stringify(v)}`).join('\n')
      : '';
    return `Error [${err.code}]: ${err.message}${ctxLines}`;
  }
  const msg = err instanceof Error ? err.message : String(err);
  return `Error: ${msg}`;
}
