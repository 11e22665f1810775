import type { MessagingError } from "../domain/errors";

/** A class whose instances an exception mapper handles. */
export type ErrorClass<E extends Error> = abstract new (...args: never[]) => E;

export type ExceptionMapper<E extends Error> = (error: E) => MessagingError;

type Entry = {
	type: ErrorClass<Error>;
	map: (error: Error) => MessagingError | null;
};

/**
 * Maps errors thrown by handlers to `MessagingError`s that can be sent back
 * to a requester. A mapper registered for the error's exact class wins;
 * otherwise the first one registered for a base class applies.
 */
export class ExceptionMappers {
	private readonly entries: Entry[] = [];

	add<E extends Error>(type: ErrorClass<E>, mapper: ExceptionMapper<E>): void {
		this.entries.push({ type, map: (error) => (error instanceof type ? mapper(error) : null) });
	}

	map(error: unknown): MessagingError | null {
		if (!(error instanceof Error)) return null;
		const entry = this.entries.find((candidate) => error.constructor === candidate.type) ?? this.entries.find((candidate) => error instanceof candidate.type);
		return entry ? entry.map(error) : null;
	}
}
