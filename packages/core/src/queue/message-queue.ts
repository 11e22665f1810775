type Waiter<T> = {
	resolve: (result: IteratorResult<T, undefined>) => void;
	reject: (error: Error) => void;
};

export type MessageQueueOptions = {
	/** Buffered items at which `whenWritable` starts holding producers back. Unbounded by default. */
	highWaterMark?: number;
};

/**
 * Async queue bridging push-style producers, such as event emitters, to the
 * pull-style iteration the dispatcher consumes.
 *
 * `push` never refuses an open queue. Producers that can pause wait on
 * `whenWritable` between items to keep the buffer at the high-water mark.
 *
 * Items pushed before `close` are still delivered; after them iteration ends,
 * or throws the error `close` was given.
 */
export class MessageQueue<T> implements AsyncIterableIterator<T> {
	private readonly buffer: T[] = [];
	private readonly waiters: Waiter<T>[] = [];
	private readonly writers: (() => void)[] = [];
	private readonly highWaterMark: number;
	private closed = false;
	private failure: Error | null = null;

	constructor(options: MessageQueueOptions = {}) {
		const { highWaterMark } = options;
		if (highWaterMark !== undefined && (!Number.isInteger(highWaterMark) || highWaterMark < 1)) throw new RangeError(`High-water mark must be a positive integer, got ${highWaterMark}`);
		this.highWaterMark = highWaterMark ?? Number.POSITIVE_INFINITY;
	}

	get size(): number {
		return this.buffer.length;
	}

	get isFull(): boolean {
		return this.buffer.length >= this.highWaterMark;
	}

	get isClosed(): boolean {
		return this.closed;
	}

	/**
	 * Enqueues an item. Returns `false`, dropping the item, once closed.
	 */
	push(item: T): boolean {
		if (this.closed) return false;
		const waiter = this.waiters.shift();
		if (waiter) waiter.resolve({ done: false, value: item });
		else this.buffer.push(item);
		return true;
	}

	/**
	 * Resolves once the buffer is below the high-water mark, or the queue is
	 * closed.
	 */
	whenWritable(): Promise<void> {
		if (this.closed || !this.isFull) return Promise.resolve();
		return new Promise((resolve) => this.writers.push(resolve));
	}

	/**
	 * Ends the queue. Pending and future reads past the buffered items end,
	 * or reject with `error` when one is given.
	 */
	close(error?: Error): void {
		if (this.closed) return;
		this.closed = true;
		this.failure = error ?? null;
		for (const waiter of this.waiters.splice(0)) this.settle(waiter);
		this.release();
	}

	next(): Promise<IteratorResult<T, undefined>> {
		const item = this.buffer.shift();
		if (item !== undefined) {
			this.release();
			return Promise.resolve({ done: false, value: item });
		}
		return new Promise((resolve, reject) => {
			const waiter = { resolve, reject };
			if (this.closed) this.settle(waiter);
			else this.waiters.push(waiter);
		});
	}

	/**
	 * Stops iteration from the consumer side, discarding buffered items.
	 */
	return(): Promise<IteratorResult<T, undefined>> {
		this.buffer.length = 0;
		this.failure = null;
		this.close();
		return Promise.resolve({ done: true, value: undefined });
	}

	[Symbol.asyncIterator](): this {
		return this;
	}

	private release(): void {
		if (this.closed || !this.isFull) for (const writer of this.writers.splice(0)) writer();
	}

	private settle(waiter: Waiter<T>): void {
		if (this.failure) waiter.reject(this.failure);
		else waiter.resolve({ done: true, value: undefined });
	}
}
