/**
 * Counting semaphore bounding how many handler invocations run at once.
 * Waiters are granted slots in the order they asked.
 */
export class Semaphore {
	private available: number;
	private readonly waiters: Array<() => void> = [];

	constructor(public readonly capacity: number) {
		if (!Number.isInteger(capacity) || capacity < 1) throw new RangeError(`Concurrency must be a positive integer, got ${capacity}`);
		this.available = capacity;
	}

	/** Slots currently held. */
	get inUse(): number {
		return this.capacity - this.available;
	}

	/** Callers waiting for a slot. */
	get pending(): number {
		return this.waiters.length;
	}

	/**
	 * Resolves once a slot is held by the caller.
	 */
	acquire(): Promise<void> {
		if (this.available > 0) {
			this.available--;
			return Promise.resolve();
		}
		return new Promise((resolve) => this.waiters.push(resolve));
	}

	/**
	 * Gives a slot back, handing it straight to the longest waiter if any.
	 */
	release(): void {
		const next = this.waiters.shift();
		if (next) {
			next();
			return;
		}
		if (this.available === this.capacity) throw new RangeError("Semaphore released more often than acquired");
		this.available++;
	}
}
