import { ZodError } from "zod";
import { ErrorType, ErrorClassification } from "../../constants/SyncConstant";
import { RemoteStoreError } from "../../errors/facility.errors";
import { CircuitOpenError } from "../../executors/resilienceExecutor";

/**
 * Classifies remote store failures for the retry policy
 */
export class ErrorClassifier {
  static classify(error: unknown): ErrorClassification {
    const errorMessage = error instanceof Error ? error.message : String(error);

    // Open circuit: fail fast, the next scheduled flush tries again
    if (error instanceof CircuitOpenError) {
      return { type: ErrorType.FATAL, message: errorMessage, shouldRetry: false };
    }

    if (error instanceof RemoteStoreError) {
      if (error.originalError instanceof ZodError) {
        return { type: ErrorType.MALFORMED_RESPONSE, message: errorMessage, shouldRetry: false };
      }
      if (error.status !== undefined) {
        return this.isTransientStatus(error.status)
          ? { type: ErrorType.TRANSIENT, message: errorMessage, shouldRetry: true }
          : { type: ErrorType.FATAL, message: errorMessage, shouldRetry: false };
      }
    }

    if (this.isTransientError(errorMessage)) {
      return { type: ErrorType.TRANSIENT, message: errorMessage, shouldRetry: true };
    }

    // Unknown error - treat as fatal
    return { type: ErrorType.FATAL, message: errorMessage, shouldRetry: false };
  }

  static isTransientStatus(status: number): boolean {
    return status >= 500 || status === 408 || status === 429;
  }

  /**
   * Network-level failures with no HTTP status
   */
  static isTransientError(errorText: string): boolean {
    const normalizedText = errorText.toUpperCase();
    const transientIndicators = [
      "TIMEOUT",
      "ETIMEDOUT",
      "ECONNRESET",
      "ECONNREFUSED",
      "ENOTFOUND",
      "EAI_AGAIN",
      "NETWORK ERROR",
      "SOCKET HANG UP",
    ];
    return transientIndicators.some((indicator) => normalizedText.includes(indicator));
  }
}
