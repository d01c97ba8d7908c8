export interface ErrorResponse {
  success: false;
  code: string;
  message: string;
  details?: unknown;
  requestId?: string;
  timestamp: string;
}

function createErrorResponse(code: string, message: string, details: unknown, requestId?: string): ErrorResponse {
  const base: ErrorResponse = {
    success: false,
    code,
    message,
    timestamp: new Date().toISOString(),
  };

  if (details !== undefined) {
    base.details = details;
  }

  if (requestId !== undefined) {
    base.requestId = requestId;
  }

  return base;
}

export function createClientErrorResponse(code: string, message: string, details?: unknown, requestId?: string): ErrorResponse {
  return createErrorResponse(code, message, details, requestId);
}

/** Server errors never carry details: whatever went wrong stays in the logs. */
export function createServerErrorResponse(code: string, message: string, requestId?: string): ErrorResponse {
  return createErrorResponse(code, message, undefined, requestId);
}
