import axios from "axios";
import { createLogger, type Logger } from "./logger.js";

/**
 * Resilience Utility
 *
 * Retry logic for IO-bound operations (E-utilities requests).
 */

const RETRY_DEFAULTS = {
    retries: 3,
    factor: 2,
    minTimeout: 1000,
    maxTimeout: 10000,
};

export type RetryOptions = Partial<typeof RETRY_DEFAULTS> & {
    name?: string;
    logger?: Logger;
};

// Client errors that will not go away on a second attempt
const NON_RETRYABLE_STATUS = new Set([400, 401, 403, 404]);

function sleep(ms: number) {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/** HTTP status carried by an axios error or by an error with a numeric `status`. */
export function statusOf(error: unknown): number | undefined {
    if (axios.isAxiosError(error)) {
        return error.response?.status;
    }
    if (error instanceof Error && "status" in error && typeof error.status === "number") {
        return error.status;
    }
    return undefined;
}

export function shouldRetry(error: unknown): boolean {
    const status = statusOf(error);
    if (status !== undefined && NON_RETRYABLE_STATUS.has(status)) {
        return false;
    }
    // Network failures, timeouts, 429 and 5xx
    return true;
}

/**
 * Wraps an async operation with exponential backoff retry logic.
 *
 * @param operation The async function to retry
 * @param options Retry configuration
 */
export async function withRetry<T>(
    operation: () => Promise<T>,
    options: RetryOptions = {},
): Promise<T> {
    const config = { ...RETRY_DEFAULTS, ...options };
    const name = options.name || "Operation";
    const logger = options.logger ?? createLogger("Resilience");

    for (let attempt = 1; ; attempt++) {
        try {
            return await operation();
        } catch (error) {
            if (!shouldRetry(error) || attempt > config.retries) {
                logger.error(`${name} failed on attempt ${attempt}. Giving up.`);
                throw error;
            }

            const delay = Math.min(
                config.minTimeout * Math.pow(config.factor, attempt - 1),
                config.maxTimeout,
            );

            logger.warn(
                `${name} failed (Attempt ${attempt}/${config.retries}). Retrying in ${delay}ms... Error: ${errorMessage(error)}`,
            );
            await sleep(delay);
        }
    }
}
