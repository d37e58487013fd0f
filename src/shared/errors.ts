export enum EmbeddedPipErrorCode {
  SPAWN_FAILED = 'SPAWN_FAILED',
  INTERPRETER_NOT_FOUND = 'INTERPRETER_NOT_FOUND',
}

export class EmbeddedPipError extends Error {
  readonly code: EmbeddedPipErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: EmbeddedPipErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'EmbeddedPipError';
    this.code = code;
    this.context = context;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof EmbeddedPipError && err.context?.['cause'] !== undefined) {
    return `${err.message} (${String(err.context['cause'])})`;
  }
  return err instanceof Error ? err.message : String(err);
}
