export type ErrorCategory = 'not_found' | 'state' | 'validation';

/** Fields present in every tool response. */
export interface ResponseBase {
  status: 'success' | 'error';
  tool: string;
  duration_ms: number;
}

export interface SuccessResponse extends ResponseBase {
  status: 'success';
  data: Record<string, unknown>;
}

export interface ErrorResponse extends ResponseBase {
  status: 'error';
  error_code: string;
  error_category: ErrorCategory;
  message: string;
  remediation: string[];
}

export type ToolResponse = SuccessResponse | ErrorResponse;
