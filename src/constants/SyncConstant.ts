export const SyncProcessConfig = {
  // Outbox push retries
  MAX_RETRIES: 3,

  // Timing configurations
  BASE_RETRY_DELAY: 500, // 0.5 seconds
  MAX_RETRY_DELAY: 5000, // 5 seconds
  RETRY_JITTER: 250, // Random jitter up to 0.25 second

  // Circuit breaker
  CIRCUIT_BREAKER_THRESHOLD: 5,
  CIRCUIT_BREAKER_TIMEOUT: 30000, // 30 seconds
} as const;

/**
 * Error type classifications for remote store calls
 */
export enum ErrorType {
  TRANSIENT = "transient", // Network/temporary issues, retry
  MALFORMED_RESPONSE = "malformed_response", // Backend answered with junk, do not retry
  FATAL = "fatal", // Unrecoverable, stop immediately
}

export interface ErrorClassification {
  type: ErrorType;
  message: string;
  shouldRetry: boolean;
}

export interface RetryHandlerConfig {
  maxRetries?: number;
  baseDelay?: number;
  maxDelay?: number;
  jitter?: number;
}

export interface CircuitBreakerConfig {
  threshold?: number;
  timeout?: number;
}

export interface RetryOptions {
  context?: string;
  shouldRetry?: (error: Error, attempt: number) => boolean;
  onRetry?: (error: Error, attempt: number, delay: number) => void;
}

/**
 * Circuit breaker state
 */
export interface CircuitBreakerState {
  state: "CLOSED" | "OPEN" | "HALF_OPEN";
  failureCount: number;
  lastFailureTime: number | null;
}
