import {
  SyncProcessConfig,
  RetryHandlerConfig,
  CircuitBreakerConfig,
  CircuitBreakerState,
  RetryOptions,
} from "../constants/SyncConstant";
import logger from "../utils/logger";

export class CircuitOpenError extends Error {
  constructor(
    context: string,
    public readonly failureCount: number,
    public readonly retryInSeconds: number,
  ) {
    super(
      `Circuit breaker is OPEN for ${context}. ` +
        `Too many failures (${failureCount}). ` +
        `Try again in ${retryInSeconds}s`,
    );
    Object.setPrototypeOf(this, CircuitOpenError.prototype);
  }
}

/**
 * Retry with exponential backoff and jitter behind a circuit breaker.
 * One instance guards one downstream dependency.
 */
export class ResilienceExecutor {
  private maxRetries: number;
  private baseDelay: number;
  private maxDelay: number;
  private jitter: number;
  private threshold: number;
  private timeout: number;
  private failureCount: number = 0;
  private lastFailureTime: number | null = null;
  private state: CircuitBreakerState["state"] = "CLOSED";

  constructor(
    retryConfig: RetryHandlerConfig = {},
    circuitBreakerConfig: CircuitBreakerConfig = {},
  ) {
    // Retry configuration
    this.maxRetries = retryConfig.maxRetries ?? SyncProcessConfig.MAX_RETRIES;
    this.baseDelay = retryConfig.baseDelay ?? SyncProcessConfig.BASE_RETRY_DELAY;
    this.maxDelay = retryConfig.maxDelay ?? SyncProcessConfig.MAX_RETRY_DELAY;
    this.jitter = retryConfig.jitter ?? SyncProcessConfig.RETRY_JITTER;

    // Circuit breaker configuration
    this.threshold = circuitBreakerConfig.threshold ?? SyncProcessConfig.CIRCUIT_BREAKER_THRESHOLD;
    this.timeout = circuitBreakerConfig.timeout ?? SyncProcessConfig.CIRCUIT_BREAKER_TIMEOUT;
  }

  /**
   * Execute a function with retry logic and circuit breaker protection
   * @param fn - receives the 1-based attempt number
   */
  async execute<T>(
    fn: (attempt: number) => Promise<T>,
    options: RetryOptions = {},
  ): Promise<T> {
    const { context = "", shouldRetry = () => true, onRetry = () => {} } = options;

    // Check circuit breaker state first
    this.checkCircuitState(context);

    for (let attempt = 1; ; attempt++) {
      try {
        const result = await fn(attempt);
        this.onSuccess(context);
        return result;
      } catch (error) {
        const lastError = error instanceof Error ? error : new Error(String(error));

        this.onFailure(context);

        if (attempt >= this.maxRetries || !shouldRetry(lastError, attempt)) {
          throw lastError;
        }

        const delay = this.calculateDelay(attempt);

        logger.debug(
          `[RESILIENCE] ${context} - Attempt ${attempt}/${this.maxRetries} failed. ` +
            `Circuit state: ${this.state}, Failures: ${this.failureCount}. ` +
            `Retrying in ${Math.round(delay)}ms... Error: ${lastError.message}`,
        );

        onRetry(lastError, attempt, delay);

        await this.sleep(delay);

        // Re-check circuit state before next attempt
        this.checkCircuitState(context);
      }
    }
  }

  /**
   * Check and update circuit breaker state
   */
  private checkCircuitState(context: string): void {
    if (this.state !== "OPEN") return;

    if (this.lastFailureTime !== null && Date.now() - this.lastFailureTime > this.timeout) {
      logger.info(`[RESILIENCE] ${context} - Circuit moving to HALF_OPEN state`);
      this.state = "HALF_OPEN";
      this.failureCount = 0;
      return;
    }

    const timeRemaining =
      this.lastFailureTime !== null
        ? Math.ceil((this.timeout - (Date.now() - this.lastFailureTime)) / 1000)
        : 0;
    throw new CircuitOpenError(context, this.failureCount, timeRemaining);
  }

  private onSuccess(context: string): void {
    if (this.state === "HALF_OPEN") {
      logger.info(`[RESILIENCE] ${context} - Circuit CLOSED after successful recovery`);
      this.state = "CLOSED";
    }
    this.failureCount = 0;
  }

  private onFailure(context: string): void {
    this.failureCount++;
    this.lastFailureTime = Date.now();

    // A failed trial call re-opens immediately
    if (this.state === "HALF_OPEN" || (this.state === "CLOSED" && this.failureCount >= this.threshold)) {
      logger.warn(
        `[RESILIENCE] ${context} - Circuit OPEN after ${this.failureCount} consecutive failures`,
      );
      this.state = "OPEN";
    }
  }

  /**
   * Exponential backoff: baseDelay * 2^(attempt-1), plus jitter, capped
   */
  private calculateDelay(attempt: number): number {
    const exponentialDelay = this.baseDelay * Math.pow(2, attempt - 1);
    const jitter = Math.random() * this.jitter;
    return Math.min(this.maxDelay, exponentialDelay + jitter);
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  reset(): void {
    this.state = "CLOSED";
    this.failureCount = 0;
    this.lastFailureTime = null;
    logger.info("[RESILIENCE] Circuit breaker and retry state reset");
  }

  getState(): CircuitBreakerState {
    return {
      state: this.state,
      failureCount: this.failureCount,
      lastFailureTime: this.lastFailureTime,
    };
  }
}
