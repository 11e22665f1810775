import EventEmitter from "eventemitter3";
import { PayloadType } from "../codec/primitives";
import type { CodecRegistry } from "../codec/registry";
import { DEFAULT_CONCURRENCY } from "../constants";
import { DispatcherState } from "../domain/dispatcher-state";
import { AlreadyStartedError, DecodeError, describe, ErrorCode, HandlerError, MessagingError, MqrouteError, PublishError, SourceClosedError } from "../domain/errors";
import type { DeliveryResult, HandlerContext, HandlerReturn, OutboundMessage } from "../domain/handler";
import type { RawMessage } from "../domain/message";
import type { IMessageSink, IMessageSource } from "../domain/transport";
import type { Route, RouteTable } from "../routing/route-table";
import { ExceptionMappers } from "./exceptions";
import { Publisher } from "./publisher";
import { Semaphore } from "./semaphore";

/** User property carrying the error code of a failed request. */
export const ERROR_USER_PROPERTY = "error";

export type DispatcherOptions = {
	source: IMessageSource;
	sink: IMessageSink;
	routes: RouteTable;
	codecs: CodecRegistry;
	/** Handler invocations allowed in flight at once. Defaults to 16. */
	concurrency?: number;
	/** Values made available to every handler through its context, read once at start. */
	shared?: Record<string, unknown>;
	exceptionMappers?: ExceptionMappers;
};

export type DispatcherStats = {
	received: number;
	unrouted: number;
	delivered: number;
	failed: number;
	inFlight: number;
};

export type DispatcherEvents = {
	state: (state: DispatcherState) => void;
	delivery: (result: DeliveryResult) => void;
	unrouted: (message: RawMessage) => void;
	error: (error: MqrouteError) => void;
};

type Decoding = { ok: true; value: unknown } | { ok: false; error: DecodeError };

const STOP = Symbol("stop");

/**
 * Pulls messages from the source one at a time, resolves their routes and
 * runs the matching handlers with at most `concurrency` invocations in
 * flight. Intake pauses while every slot is taken.
 *
 * Every invocation is isolated: decode failures, handler errors and failed
 * replies become `failed` delivery results and never reach sibling handlers
 * or the consumption loop.
 */
export class Dispatcher extends EventEmitter<DispatcherEvents> {
	private state = DispatcherState.IDLE;
	private readonly slots: Semaphore;
	private readonly publisher: Publisher;
	private readonly exceptionMappers: ExceptionMappers;
	private shared: Readonly<Record<string, unknown>> = Object.freeze({});
	private readonly inFlight = new Set<Promise<void>>();
	private readonly counters = { received: 0, unrouted: 0, delivered: 0, failed: 0 };
	private readonly waiters: Array<{ resolve: () => void; reject: (error: MqrouteError) => void }> = [];
	private outcome: { error: MqrouteError | null } | null = null;
	private loop: Promise<void> | null = null;
	private signalStop: () => void = () => {};

	constructor(private readonly options: DispatcherOptions) {
		super();
		this.slots = new Semaphore(options.concurrency ?? DEFAULT_CONCURRENCY);
		this.publisher = new Publisher(options.sink, options.codecs);
		this.exceptionMappers = options.exceptionMappers ?? new ExceptionMappers();
	}

	get currentState(): DispatcherState {
		return this.state;
	}

	get concurrency(): number {
		return this.slots.capacity;
	}

	stats(): DispatcherStats {
		return { ...this.counters, inFlight: this.inFlight.size };
	}

	/**
	 * Seals the route table, snapshots the shared values and begins consuming
	 * the source.
	 * @throws AlreadyStartedError unless the dispatcher is idle
	 */
	start(): void {
		if (this.state !== DispatcherState.IDLE) throw new AlreadyStartedError(`Cannot start dispatcher in state ${this.state}`);
		this.options.routes.seal();
		this.shared = Object.freeze({ ...this.options.shared });
		const iterator = this.options.source.messages()[Symbol.asyncIterator]();
		this.setState(DispatcherState.RUNNING);
		this.loop = this.consume(iterator);
	}

	/**
	 * Stops intake and resolves once every in-flight invocation has finished.
	 * Calling it again, or after the source closed, resolves the same way.
	 */
	async stop(): Promise<void> {
		if (this.state === DispatcherState.IDLE) {
			this.setState(DispatcherState.STOPPED);
			this.settle(null);
			return;
		}
		if (this.state === DispatcherState.RUNNING) {
			this.setState(DispatcherState.DRAINING);
			this.signalStop();
		}
		await this.loop;
	}

	/**
	 * Resolves when the dispatcher stops on request; rejects with
	 * `SourceClosedError` when it stopped because the source ended or failed.
	 */
	wait(): Promise<void> {
		if (this.outcome) return this.outcome.error ? Promise.reject(this.outcome.error) : Promise.resolve();
		return new Promise((resolve, reject) => this.waiters.push({ resolve, reject }));
	}

	private async consume(iterator: AsyncIterator<RawMessage>): Promise<void> {
		let failure: MqrouteError | null = null;
		try {
			while (this.state === DispatcherState.RUNNING) {
				await this.slots.acquire();
				if (this.state !== DispatcherState.RUNNING) {
					this.slots.release();
					break;
				}

				// A fresh signal per pull so settled races do not pile up reactions.
				const stopped = new Promise<typeof STOP>((resolve) => {
					this.signalStop = () => resolve(STOP);
				});
				let next: IteratorResult<RawMessage> | typeof STOP;
				try {
					next = await Promise.race([iterator.next(), stopped]);
				} catch (error) {
					this.slots.release();
					throw new SourceClosedError(`Message source failed: ${describe(error)}`, { cause: error });
				}
				if (next === STOP) {
					this.slots.release();
					break;
				}
				if (next.done) {
					this.slots.release();
					if (this.state === DispatcherState.RUNNING) failure = new SourceClosedError("Message source ended");
					break;
				}
				await this.dispatch(next.value);
			}
		} catch (error) {
			failure = error instanceof MqrouteError ? error : new MqrouteError(ErrorCode.UNKNOWN, `Dispatch loop failed: ${describe(error)}`, { cause: error });
		}

		this.close(iterator);
		if (this.state === DispatcherState.RUNNING) this.setState(DispatcherState.DRAINING);
		await Promise.all(this.inFlight);
		this.setState(DispatcherState.STOPPED);
		if (failure) this.report(failure);
		this.settle(failure);
	}

	/**
	 * Launches one invocation per matching route. Called holding one slot;
	 * each sibling after the first waits for a slot of its own.
	 */
	private async dispatch(message: RawMessage): Promise<void> {
		this.counters.received++;
		const routes = this.options.routes.resolve(message.topic);
		if (routes.length === 0) {
			this.slots.release();
			this.counters.unrouted++;
			this.emit("unrouted", message);
			return;
		}

		const decodings = new Map<string, Decoding>();
		for (const route of routes) {
			if (!decodings.has(route.payloadType)) decodings.set(route.payloadType, this.decode(route.payloadType, message));
		}

		for (const [index, route] of routes.entries()) {
			if (index > 0) await this.slots.acquire();
			const decoding = decodings.get(route.payloadType) ?? this.decode(route.payloadType, message);
			this.track(this.invoke(route, message, decoding));
		}
	}

	private decode(payloadType: string, message: RawMessage): Decoding {
		try {
			return { ok: true, value: this.options.codecs.decode(payloadType, message.payload, message.topic) };
		} catch (error) {
			const decodeError = error instanceof DecodeError ? error : new DecodeError(message.topic, payloadType, message.payload.length, describe(error), { cause: error });
			this.report(decodeError);
			return { ok: false, error: decodeError };
		}
	}

	private async invoke(route: Route, message: RawMessage, decoding: Decoding): Promise<void> {
		const filter = route.filter.source;
		const payloadType = route.payloadType;
		let result: DeliveryResult;
		try {
			if (!decoding.ok) {
				result = { status: "failed", message, filter, payloadType, error: decoding.error };
			} else {
				result = await this.run(route, message, decoding.value);
			}
		} finally {
			this.slots.release();
		}

		if (result.status === "delivered") this.counters.delivered++;
		else this.counters.failed++;
		this.emit("delivery", result);
	}

	private async run(route: Route, message: RawMessage, value: unknown): Promise<DeliveryResult> {
		const filter = route.filter.source;
		const payloadType = route.payloadType;
		const capture = route.filter.capture(message.topic) ?? { params: {}, rest: null };

		let returned: HandlerReturn;
		try {
			returned = await route.handle({ ...message, value, params: capture.params, rest: capture.rest }, this.contextFor(route));
		} catch (thrown) {
			const error = new HandlerError(message.topic, filter, thrown);
			this.report(error);
			await this.replyWithError(message, this.exceptionMappers.map(thrown) ?? (thrown instanceof MessagingError ? thrown : null), error);
			return { status: "failed", message, filter, payloadType, error };
		}

		// A requester waiting on a response topic gets an empty reply when the handler returns nothing.
		const outbound: OutboundMessage | null = isOutbound(returned) ? returned : message.properties?.responseTopic !== undefined ? { value: null, payloadType: PayloadType.EMPTY } : null;
		if (!outbound) return { status: "delivered", message, filter, payloadType, reply: null };
		try {
			const reply = await this.reply(route, message, outbound);
			return { status: "delivered", message, filter, payloadType, reply };
		} catch (thrown) {
			const error = thrown instanceof MqrouteError ? thrown : new PublishError(outbound.topic ?? "", thrown);
			this.report(error);
			return { status: "failed", message, filter, payloadType, error };
		}
	}

	/**
	 * Publishes a handler's outbound message. Without an explicit topic it
	 * goes to the inbound response topic, echoing the correlation data; with
	 * neither there is nowhere to send it and it is dropped.
	 */
	private async reply(route: Route, message: RawMessage, outbound: OutboundMessage): Promise<OutboundMessage | null> {
		const responseTopic = message.properties?.responseTopic;
		const topic = outbound.topic ?? responseTopic;
		if (topic === undefined) return null;

		const correlationData = outbound.topic === undefined ? message.properties?.correlationData : undefined;
		const properties = correlationData ? { ...outbound.properties, correlationData } : outbound.properties;
		const payloadType = outbound.payloadType ?? route.payloadType;
		await this.publisher.publish(topic, payloadType, outbound.value, { qos: outbound.qos ?? message.qos, retain: outbound.retain ?? false, properties });
		return { ...outbound, topic, payloadType };
	}

	/**
	 * Sends a failure back to the requester when the inbound message asked
	 * for a response: the error text as UTF-8 with its code in the `error`
	 * user property.
	 */
	private async replyWithError(message: RawMessage, mapped: MessagingError | null, error: HandlerError): Promise<void> {
		const responseTopic = message.properties?.responseTopic;
		if (responseTopic === undefined) return;

		const userProperties = { [ERROR_USER_PROPERTY]: mapped?.errorCode?.toString() ?? "unknown" };
		const correlationData = message.properties?.correlationData;
		try {
			await this.publisher.publish(responseTopic, "string", mapped?.message ?? error.message, { qos: message.qos, properties: { userProperties, correlationData } });
		} catch (thrown) {
			this.report(thrown instanceof MqrouteError ? thrown : new PublishError(responseTopic, thrown));
		}
	}

	private contextFor(route: Route): HandlerContext {
		return {
			filter: route.filter.source,
			payloadType: route.payloadType,
			shared: this.shared,
			publish: (topic, payloadType, value, options) => this.publisher.publish(topic, payloadType, value, options),
		};
	}

	private track(task: Promise<void>): void {
		const tracked: Promise<void> = task
			.catch((error: unknown) => this.report(new MqrouteError(ErrorCode.UNKNOWN, `Delivery listener failed: ${describe(error)}`, { cause: error })))
			.finally(() => this.inFlight.delete(tracked));
		this.inFlight.add(tracked);
	}

	private close(iterator: AsyncIterator<RawMessage>): void {
		const closing = iterator.return?.();
		if (!closing) return;
		closing.catch((error: unknown) => this.report(new SourceClosedError(`Failed to close message source: ${describe(error)}`, { cause: error })));
	}

	private report(error: MqrouteError): void {
		if (this.listenerCount("error") === 0) console.warn(`Dispatcher: ${error.message}`);
		this.emit("error", error);
	}

	private setState(state: DispatcherState): void {
		if (this.state === state) return;
		this.state = state;
		this.emit("state", state);
	}

	private settle(error: MqrouteError | null): void {
		if (this.outcome) return;
		this.outcome = { error };
		for (const waiter of this.waiters.splice(0)) {
			if (error) waiter.reject(error);
			else waiter.resolve();
		}
	}
}

function isOutbound(value: HandlerReturn): value is OutboundMessage {
	return typeof value === "object" && value !== null;
}
