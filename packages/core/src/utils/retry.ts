import { ErrorCode, MqrouteError } from "../domain/errors";

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

export type RetryOptions = {
	/** Total attempts, the first one included. */
	attempts: number;
	/** Delay before the first retry in milliseconds; doubled after each failure. */
	delay: number;
	/** Errors for which this returns false are rethrown at once. */
	retryIf?: (error: unknown) => boolean;
	/** Called before sleeping ahead of the next attempt. */
	onRetry?: (error: unknown, attempt: number) => void;
};

/**
 * Runs `fn` until it resolves or the attempts run out, backing off
 * exponentially in between. The last error is rethrown as is.
 */
export async function retry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
	if (options.attempts < 1) throw new MqrouteError(ErrorCode.UNKNOWN, `Retry needs at least one attempt, got ${options.attempts}`);

	for (let attempt = 1; ; attempt++) {
		try {
			return await fn();
		} catch (error) {
			if (attempt >= options.attempts || (options.retryIf && !options.retryIf(error))) throw error;
			options.onRetry?.(error, attempt);
			await sleep(options.delay * 2 ** (attempt - 1));
		}
	}
}
