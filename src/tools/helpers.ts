import type { ErrorCategory, ErrorResponse, SuccessResponse } from '../types/response.js';

// ── Response Builders ──────────────────────────────────────────────

export function success(tool: string, durationMs: number, data: Record<string, unknown>): SuccessResponse {
  return { status: 'success', tool, duration_ms: durationMs, data };
}

export function error(tool: string, durationMs: number, opts: { code: string; category: ErrorCategory; message: string; remediation?: string[] }): ErrorResponse {
  return {
    status: 'error', tool, duration_ms: durationMs,
    error_code: opts.code, error_category: opts.category, message: opts.message,
    remediation: opts.remediation ?? [],
  };
}

/** The workflows report failure as false/null and put the detail in the log. */
export function operationFailed(tool: string, durationMs: number, message: string): ErrorResponse {
  return error(tool, durationMs, {
    code: 'OPERATION_FAILED', category: 'state', message,
    remediation: ['Check the server log on stderr for the pip output', 'Run python_locate to confirm the interpreter is found'],
  });
}

export function elapsed(start: number): number {
  return Math.round(performance.now() - start);
}
