/**
 * Error Handling Service for the Customer 360 orchestration engine
 *
 * Structured error logging and timeouts for external calls.
 */

import {
  ErrorCategory,
  PipelineError,
  createErrorResponse,
} from '../types/error-handling.js';

/**
 * Log error for debugging (without exposing to user)
 */
export function logError(
  error: unknown,
  context: Record<string, unknown> = {}
): void {
  const errorResponse = createErrorResponse(error);

  console.error('[PipelineError]', {
    category: errorResponse.category,
    errorCode: errorResponse.errorCode,
    correlationId: errorResponse.correlationId,
    timestamp: errorResponse.timestamp,
    technicalDetails: errorResponse.technicalDetails,
    context,
  });
}

/**
 * Reject with a TIMEOUT PipelineError if the operation does not settle in time
 */
export async function withTimeout<T>(
  operation: Promise<T>,
  timeoutMs: number,
  description: string
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new PipelineError(`${description} timed out after ${timeoutMs}ms`, ErrorCategory.TIMEOUT, true)),
      timeoutMs
    );
  });

  try {
    return await Promise.race([operation, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
