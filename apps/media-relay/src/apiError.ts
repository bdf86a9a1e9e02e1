import type { Response } from 'express';

/**
 * Error bodies share one shape:
 *
 *  {
 *    "error":   "MACHINE_READABLE_CODE",
 *    "message": "Human-readable description.",
 *    "details": { ... }                          // optional
 *  }
 */
export interface ApiErrorBody {
  error: string;
  message: string;
  details?: Record<string, unknown>;
}

export function sendError(
  res: Response,
  status: number,
  error: string,
  message: string,
  details?: Record<string, unknown>
): Response {
  const body: ApiErrorBody = { error, message };
  if (details && Object.keys(details).length > 0) body.details = details;
  return res.status(status).json(body);
}

export const Errors = {
  /** 400 Bad Request */
  badRequest: (res: Response, error: string, message: string) => sendError(res, 400, error, message),

  /** 404 Not Found */
  notFound: (res: Response, error = 'NOT_FOUND', message = 'Resource not found.') =>
    sendError(res, 404, error, message),

  /** 413 Payload Too Large */
  tooLarge: (res: Response, message = 'Upload exceeds the size limit.') =>
    sendError(res, 413, 'PAYLOAD_TOO_LARGE', message),

  /** 503 Queue full: the backpressure signal uploaders retry on */
  queueFull: (res: Response, details?: Record<string, unknown>) =>
    sendError(res, 503, 'QUEUE_FULL', 'Processing queue is full. Retry later.', details),

  /** 500 Internal Server Error */
  internal: (res: Response, error = 'INTERNAL_ERROR', message = 'An unexpected error occurred.') =>
    sendError(res, 500, error, message)
};
