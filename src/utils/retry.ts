/**
 * Retry utility with exponential backoff
 * Retries failed operations with increasing delays between attempts
 */

import axios from "axios";
import { BaseAppError, StoreErrors, MembershipErrors } from "../errors";

export interface RetryOptions {
  retries?: number;
  delay?: number;
  factor?: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number) => void;
}

export async function retry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const { retries = 3, delay = 300, factor = 2, shouldRetry = isTransientError, onRetry } = options;

  let lastError: unknown;

  for (let attempt = 0; attempt <= retries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      // Don't retry on last attempt
      if (attempt === retries) {
        break;
      }

      if (!shouldRetry(error)) {
        throw error;
      }

      onRetry?.(error, attempt + 1);

      const backoffDelay = delay * Math.pow(factor, attempt);
      await new Promise(resolve => setTimeout(resolve, backoffDelay));
    }
  }

  throw lastError;
}

/**
 * Transient failures: network errors, 5xx responses, and storage or
 * membership read failures. Invalid input is never retried.
 */
export function isTransientError(error: unknown): boolean {
  if (axios.isAxiosError(error)) {
    // Network errors (no response)
    if (!error.response) {
      return true;
    }

    if (error.response.status >= 500) {
      return true;
    }

    if (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT" || error.code === "ENOTFOUND") {
      return true;
    }

    return false;
  }

  if (error instanceof StoreErrors.ReadFailedError || error instanceof MembershipErrors.FetchFailedError) {
    return true;
  }

  if (error instanceof BaseAppError) {
    return false;
  }

  // OpenAI API errors carry an HTTP status
  if (error && typeof error === "object" && "status" in error) {
    const status = error.status;
    if (typeof status === "number" && status >= 500) {
      return true;
    }
  }

  return false;
}
