export interface SuccessHandlerResponse {
  success: true;
  message: string;
  data?: unknown;
}

export interface ErrorHandlerResponse {
  success: false;
  error: string;
  data?: unknown;
}

export type HandlerResponse = SuccessHandlerResponse | ErrorHandlerResponse;

export function buildSuccessResponse(message: string, data?: unknown): SuccessHandlerResponse {
  if (data === undefined) {
    return { success: true, message };
  }
  return { success: true, message, data };
}

export function buildErrorResponse(message: string, data?: unknown): ErrorHandlerResponse {
  if (data === undefined) {
    return { success: false, error: message };
  }
  return { success: false, error: message, data };
}
