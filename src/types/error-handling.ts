/**
 * Error Handling Types for the Customer 360 orchestration engine
 *
 * Provides:
 * - Error categories and response types
 * - Categorised error classes for stage, store and state failures
 * - The extraction error value returned (never thrown) by JSON extraction
 */

import { AgentName, PipelineStage } from './common.js';

// ==================== Error Category Enum ====================

export enum ErrorCategory {
  /** Generative model output could not be parsed */
  MODEL_OUTPUT_UNPARSEABLE = 'MODEL_OUTPUT_UNPARSEABLE',
  /** An agent failed during a pipeline stage */
  STAGE_FAILED = 'STAGE_FAILED',
  /** Networked state store unreachable */
  STORE_UNAVAILABLE = 'STORE_UNAVAILABLE',
  /** A persisted record could not be decoded */
  STATE_CORRUPTED = 'STATE_CORRUPTED',
  /** Operation not allowed in the current project state */
  INVALID_STATE = 'INVALID_STATE',
  /** Network error */
  NETWORK_ERROR = 'NETWORK_ERROR',
  /** Request timeout */
  TIMEOUT = 'TIMEOUT',
  /** Unknown error */
  UNKNOWN = 'UNKNOWN',
}

// ==================== Error Response Interface ====================

/**
 * Error response structure for callers and logs
 */
export interface ErrorResponse {
  category: ErrorCategory;
  /** Message safe to show to a user */
  userMessage: string;
  /** Technical details (for logging only) */
  technicalDetails?: string;
  retryable: boolean;
  errorCode: string;
  timestamp?: Date;
  correlationId?: string;
}

const ERROR_HANDLERS: Record<ErrorCategory, Omit<ErrorResponse, 'technicalDetails' | 'timestamp' | 'correlationId'>> = {
  [ErrorCategory.MODEL_OUTPUT_UNPARSEABLE]: {
    category: ErrorCategory.MODEL_OUTPUT_UNPARSEABLE,
    userMessage: 'The model response could not be read as structured data. A fallback value was used.',
    retryable: true,
    errorCode: 'ERR_MODEL_OUTPUT',
  },
  [ErrorCategory.STAGE_FAILED]: {
    category: ErrorCategory.STAGE_FAILED,
    userMessage: 'A pipeline stage failed. The project has been marked as failed.',
    retryable: false,
    errorCode: 'ERR_STAGE_FAILED',
  },
  [ErrorCategory.STORE_UNAVAILABLE]: {
    category: ErrorCategory.STORE_UNAVAILABLE,
    userMessage: 'The state store is unavailable. Project state is kept in memory for this process.',
    retryable: false,
    errorCode: 'ERR_STORE_UNAVAILABLE',
  },
  [ErrorCategory.STATE_CORRUPTED]: {
    category: ErrorCategory.STATE_CORRUPTED,
    userMessage: 'The stored project state could not be read.',
    retryable: false,
    errorCode: 'ERR_STATE_CORRUPTED',
  },
  [ErrorCategory.INVALID_STATE]: {
    category: ErrorCategory.INVALID_STATE,
    userMessage: 'That operation is not allowed for the project in its current state.',
    retryable: false,
    errorCode: 'ERR_INVALID_STATE',
  },
  [ErrorCategory.NETWORK_ERROR]: {
    category: ErrorCategory.NETWORK_ERROR,
    userMessage: 'There seems to be a network issue. Please try again.',
    retryable: true,
    errorCode: 'ERR_NETWORK',
  },
  [ErrorCategory.TIMEOUT]: {
    category: ErrorCategory.TIMEOUT,
    userMessage: 'That request took too long.',
    retryable: true,
    errorCode: 'ERR_TIMEOUT',
  },
  [ErrorCategory.UNKNOWN]: {
    category: ErrorCategory.UNKNOWN,
    userMessage: 'Something unexpected happened. Please try again.',
    retryable: true,
    errorCode: 'ERR_UNKNOWN',
  },
};

// ==================== Extraction Error ====================

/**
 * Returned by the JSON extraction utility when no structured value could be
 * recovered. The raw text is kept verbatim for diagnostics.
 */
export interface ExtractionError {
  category: ErrorCategory.MODEL_OUTPUT_UNPARSEABLE;
  message: string;
  rawText: string;
}

// ==================== Custom Error Classes ====================

/**
 * Base error class for pipeline errors
 */
export class PipelineError extends Error {
  public readonly category: ErrorCategory;
  public readonly retryable: boolean;
  public readonly correlationId: string;
  public readonly timestamp: Date;

  constructor(
    message: string,
    category: ErrorCategory = ErrorCategory.UNKNOWN,
    retryable: boolean = false,
    correlationId?: string
  ) {
    super(message);
    this.name = 'PipelineError';
    this.category = category;
    this.retryable = retryable;
    this.correlationId = correlationId || generateCorrelationId();
    this.timestamp = new Date();
  }

  toErrorResponse(): ErrorResponse {
    const handler = ERROR_HANDLERS[this.category];
    return {
      ...handler,
      technicalDetails: this.message,
      timestamp: this.timestamp,
      correlationId: this.correlationId,
    };
  }
}

/**
 * An agent threw during a pipeline stage
 */
export class StageFailureError extends PipelineError {
  public readonly stage: PipelineStage;
  public readonly agentName: AgentName;
  public readonly originalError: unknown;

  constructor(stage: PipelineStage, agentName: AgentName, originalError: unknown, correlationId?: string) {
    super(errorMessage(originalError), ErrorCategory.STAGE_FAILED, false, correlationId);
    this.name = 'StageFailureError';
    this.stage = stage;
    this.agentName = agentName;
    this.originalError = originalError;
  }
}

/**
 * The networked state store failed its startup probe
 */
export class StoreUnavailableError extends PipelineError {
  public readonly backend: string;

  constructor(backend: string, message: string, correlationId?: string) {
    super(message, ErrorCategory.STORE_UNAVAILABLE, false, correlationId);
    this.name = 'StoreUnavailableError';
    this.backend = backend;
  }
}

/**
 * A stored project record does not decode into a ProjectState
 */
export class StateCorruptionError extends PipelineError {
  public readonly key: string;

  constructor(key: string, message: string, correlationId?: string) {
    super(message, ErrorCategory.STATE_CORRUPTED, false, correlationId);
    this.name = 'StateCorruptionError';
    this.key = key;
  }
}

// ==================== Utility Functions ====================

export function generateCorrelationId(): string {
  return `err-${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Categorize an error based on its type and message
 */
export function categorizeError(error: unknown): ErrorCategory {
  if (error instanceof PipelineError) {
    return error.category;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();

    if (message.includes('timeout') || message.includes('timed out')) {
      return ErrorCategory.TIMEOUT;
    }
    if (
      message.includes('network') ||
      message.includes('connection') ||
      message.includes('econnrefused') ||
      message.includes('socket')
    ) {
      return ErrorCategory.NETWORK_ERROR;
    }
  }

  return ErrorCategory.UNKNOWN;
}

/**
 * Create an ErrorResponse from any error
 */
export function createErrorResponse(error: unknown, correlationId?: string): ErrorResponse {
  if (error instanceof PipelineError) {
    return error.toErrorResponse();
  }

  const category = categorizeError(error);
  return {
    ...ERROR_HANDLERS[category],
    technicalDetails: errorMessage(error),
    timestamp: new Date(),
    correlationId: correlationId || generateCorrelationId(),
  };
}
