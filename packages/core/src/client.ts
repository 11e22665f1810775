import EventEmitter from "eventemitter3";
import type { Codec } from "./codec/codec";
import { CodecRegistry } from "./codec/registry";
import { type DispatcherEvents, Dispatcher, type DispatcherStats } from "./dispatch/dispatcher";
import { type ErrorClass, type ExceptionMapper, ExceptionMappers } from "./dispatch/exceptions";
import { Publisher } from "./dispatch/publisher";
import type { DispatcherState } from "./domain/dispatcher-state";
import { AlreadyStartedError, DuplicateCodecError, type MqrouteError } from "./domain/errors";
import type { Handler } from "./domain/handler";
import type { PublishOptions } from "./domain/message";
import type { IMessageSink, IMessageSource, ITransport, Subscription } from "./domain/transport";
import { type RouteOptions, RouteTable } from "./routing/route-table";
import type { Router } from "./routing/router";

/**
 * Where messages come from and go to: one transport, or a separate source
 * and sink.
 */
export type ConnectionOptions = { transport: ITransport } | { source: IMessageSource; sink: IMessageSink };

export type ClientOptions = ConnectionOptions & {
	/** Codecs bound in addition to the built-in ones. */
	codecs?: Iterable<Codec<unknown>>;
	/** Handler invocations allowed in flight at once. Defaults to 16. */
	concurrency?: number;
	/** Payloads longer than this many bytes fail decoding. Defaults to 1 MiB. */
	maxPayloadSize?: number;
	/** Values handed to every handler through its context. */
	shared?: Record<string, unknown>;
};

/**
 * The object applications work with: declare routes, start dispatching,
 * publish typed values and stop.
 *
 * Routes are fixed once `start` is called. Publishing works in any state.
 *
 * @example
 * const client = new Client({ transport });
 * client.route("sensors/{room}/temperature", "float", ({ params, value }) => {
 *   console.log(params.room, value);
 * });
 * await client.start();
 * await client.publish("sensors/kitchen/temperature", "float", 21.5);
 */
export class Client extends EventEmitter<DispatcherEvents> {
	private readonly source: IMessageSource;
	private readonly codecs: CodecRegistry;
	private readonly routes = new RouteTable();
	private readonly exceptionMappers = new ExceptionMappers();
	private readonly shared: Record<string, unknown>;
	private readonly publisher: Publisher;
	private readonly dispatcher: Dispatcher;
	private phase: "idle" | "starting" | "started" = "idle";

	constructor(options: ClientOptions) {
		super();
		const { source, sink } = "transport" in options ? { source: options.transport, sink: options.transport } : options;
		this.source = source;
		this.codecs = CodecRegistry.withDefaults({ maxPayloadSize: options.maxPayloadSize });
		for (const codec of options.codecs ?? []) this.codecs.register(codec);
		this.shared = { ...options.shared };
		this.publisher = new Publisher(sink, this.codecs);
		this.dispatcher = new Dispatcher({
			source,
			sink,
			routes: this.routes,
			codecs: this.codecs,
			concurrency: options.concurrency,
			shared: this.shared,
			exceptionMappers: this.exceptionMappers,
		});

		this.dispatcher.on("state", (state) => this.emit("state", state));
		this.dispatcher.on("delivery", (result) => this.emit("delivery", result));
		this.dispatcher.on("unrouted", (message) => this.emit("unrouted", message));
		this.dispatcher.on("error", (error) => this.reportError(error));
		for (const endpoint of new Set<IMessageSource | IMessageSink>([source, sink])) endpoint.on?.("error", (error) => this.reportError(error));
	}

	get state(): DispatcherState {
		return this.dispatcher.currentState;
	}

	stats(): DispatcherStats {
		return this.dispatcher.stats();
	}

	/** Filters the source is asked to deliver, as computed from the routes. */
	subscriptions(): Subscription[] {
		return this.routes.subscriptions();
	}

	/**
	 * Binds a codec to its payload type.
	 * @throws DuplicateCodecError if a different codec is already bound to the type
	 */
	codec<T>(codec: Codec<T>): this {
		this.bind(codec);
		return this;
	}

	/**
	 * Registers a handler for a topic filter. `payloadType` names a bound
	 * codec, or is a codec to bind on the spot.
	 *
	 * @throws AlreadyStartedError after `start`, leaving the routes unchanged
	 * @throws InvalidTopicFilterError if the filter is malformed
	 * @throws CodecNotFoundError if no codec is bound to the payload type
	 * @throws DuplicateRouteError if the filter is already routed with this payload type
	 */
	route<T>(filter: string, payloadType: string | Codec<T>, handler: Handler<T>, options?: RouteOptions): this {
		this.assertNotStarted("Cannot register routes after start");
		const type = typeof payloadType === "string" ? payloadType : this.bind(payloadType);
		this.codecs.get(type);
		this.routes.register(filter, type, handler, options);
		return this;
	}

	/**
	 * Registers every route of a router.
	 * @throws AlreadyStartedError after `start`
	 * @throws CodecNotFoundError if a route names an unbound payload type; nothing is registered then
	 */
	include(router: Router): this {
		this.assertNotStarted("Cannot include routers after start");
		for (const type of router.payloadTypes()) this.codecs.get(type);
		router.registerIn(this.routes);
		return this;
	}

	/**
	 * Maps errors of the given class, thrown by handlers, to the error sent
	 * back to requesters that asked for a response.
	 */
	catch<E extends Error>(type: ErrorClass<E>, mapper: ExceptionMapper<E>): this {
		this.assertNotStarted("Cannot add exception handlers after start");
		this.exceptionMappers.add(type, mapper);
		return this;
	}

	/**
	 * Adds values handed to every handler through `context.shared`.
	 */
	provide(values: Record<string, unknown>): this {
		this.assertNotStarted("Cannot provide shared values after start");
		Object.assign(this.shared, values);
		return this;
	}

	/**
	 * Subscribes the source to every routed filter, then starts dispatching.
	 * Routes are fixed while the subscription is in progress. If it fails the
	 * client is left as it was, and `start` can be called again.
	 * @throws AlreadyStartedError if called while starting, once started, or after `stop`
	 */
	async start(): Promise<void> {
		this.assertNotStarted("Client already started");
		this.phase = "starting";
		try {
			if (this.source.subscribe) await this.source.subscribe(this.routes.subscriptions());
		} catch (error) {
			if (this.phase === "starting") this.phase = "idle";
			throw error;
		}
		if (this.phase !== "starting") throw new AlreadyStartedError("Client stopped while starting");
		this.phase = "started";
		this.dispatcher.start();
	}

	/**
	 * Publishes a value encoded with the codec bound to `payloadType`.
	 * Invalid topics and values throw synchronously; a failed send rejects
	 * with `PublishError`.
	 */
	publish<T>(topic: string, payloadType: string | Codec<T>, value: T, options?: PublishOptions): Promise<void> {
		const type = typeof payloadType === "string" ? payloadType : this.bind(payloadType);
		return this.publisher.publish(topic, type, value, options);
	}

	/**
	 * Stops intake and waits for in-flight handlers. Safe to call repeatedly.
	 */
	async stop(): Promise<void> {
		this.phase = "started";
		this.routes.seal();
		await this.dispatcher.stop();
	}

	/**
	 * Resolves when the client stops on request; rejects with
	 * `SourceClosedError` when the source ended on its own.
	 */
	wait(): Promise<void> {
		return this.dispatcher.wait();
	}

	private bind<T>(codec: Codec<T>): string {
		if (!this.codecs.has(codec.payloadType)) this.codecs.register(codec);
		else if (this.codecs.get(codec.payloadType) !== codec) throw new DuplicateCodecError(codec.payloadType);
		return codec.payloadType;
	}

	private reportError(error: MqrouteError): void {
		if (this.listenerCount("error") === 0) console.warn(`Client: ${error.message}`);
		this.emit("error", error);
	}

	private assertNotStarted(message: string): void {
		if (this.phase !== "idle") throw new AlreadyStartedError(message);
	}
}
