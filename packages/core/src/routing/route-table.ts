import { AlreadyStartedError, DuplicateRouteError } from "../domain/errors";
import type { Handler, HandlerContext, HandlerReturn } from "../domain/handler";
import type { DecodedMessage } from "../domain/message";
import { QoS } from "../domain/qos";
import type { Subscription } from "../domain/transport";
import { TopicFilter } from "../topic/filter";

/**
 * A registered binding of filter, payload type and handler.
 */
export interface Route<T = unknown> {
	readonly filter: TopicFilter;
	readonly payloadType: string;
	/** QoS requested when subscribing to the filter. */
	readonly qos: QoS;
	handle(message: DecodedMessage<T>, context: HandlerContext): HandlerReturn | Promise<HandlerReturn>;
}

export type RouteOptions = {
	qos?: QoS;
};

/**
 * A route waiting to be registered, as collected by a `Router`.
 */
export interface RouteSpec {
	readonly filter: string | TopicFilter;
	readonly payloadType: string;
	readonly options?: RouteOptions;
	handle(message: DecodedMessage<unknown>, context: HandlerContext): HandlerReturn | Promise<HandlerReturn>;
}

/**
 * Ordered set of routes. Registration happens before dispatch starts; once
 * sealed the table is read-only, so lookups need no locking.
 */
export class RouteTable {
	private readonly routes: Route[] = [];
	private readonly keys = new Set<string>();
	private sealed = false;

	get size(): number {
		return this.routes.length;
	}

	get isSealed(): boolean {
		return this.sealed;
	}

	/**
	 * Appends a route. Identity is the canonical filter together with the
	 * payload type, so `a/{id}` and `a/+` count as the same filter.
	 * @throws InvalidTopicFilterError if the filter is malformed
	 * @throws DuplicateRouteError if the pair is already registered
	 * @throws AlreadyStartedError if the table has been sealed
	 */
	register<T>(filter: string | TopicFilter, payloadType: string, handler: Handler<T>, options: RouteOptions = {}): Route<T> {
		if (this.sealed) throw new AlreadyStartedError("Cannot register routes after start");
		const parsed = TopicFilter.from(filter);
		const key = keyOf(parsed, payloadType);
		if (this.keys.has(key)) throw new DuplicateRouteError(parsed.source, payloadType);
		return this.add<T>(key, { filter: parsed, payloadType, qos: options.qos ?? QoS.AtMostOnce, handle: handler });
	}

	/**
	 * Appends several routes in order, or none of them: every filter and
	 * identity is checked before the first route is added.
	 * @throws InvalidTopicFilterError if a filter is malformed
	 * @throws DuplicateRouteError if a pair is already registered or repeats within `specs`
	 * @throws AlreadyStartedError if the table has been sealed
	 */
	registerAll(specs: readonly RouteSpec[]): Route[] {
		if (this.sealed) throw new AlreadyStartedError("Cannot register routes after start");
		const pending = new Map<string, Route>();
		for (const spec of specs) {
			const parsed = TopicFilter.from(spec.filter);
			const key = keyOf(parsed, spec.payloadType);
			if (this.keys.has(key) || pending.has(key)) throw new DuplicateRouteError(parsed.source, spec.payloadType);
			pending.set(key, { filter: parsed, payloadType: spec.payloadType, qos: spec.options?.qos ?? QoS.AtMostOnce, handle: (message, context) => spec.handle(message, context) });
		}
		return [...pending].map(([key, route]) => this.add(key, route));
	}

	/**
	 * Returns every route matching the topic, in registration order.
	 */
	resolve(topic: string): Route[] {
		return this.routes.filter((route) => route.filter.matches(topic));
	}

	/**
	 * Returns each distinct canonical filter once, with the highest QoS any of
	 * its routes asked for.
	 */
	subscriptions(): Subscription[] {
		const byFilter = new Map<string, QoS>();
		for (const route of this.routes) {
			const current = byFilter.get(route.filter.canonical);
			if (current === undefined || route.qos > current) byFilter.set(route.filter.canonical, route.qos);
		}
		return [...byFilter].map(([filter, qos]) => ({ filter, qos }));
	}

	list(): readonly Route[] {
		return this.routes;
	}

	/**
	 * Freezes the table. Further registration fails.
	 */
	seal(): void {
		this.sealed = true;
	}

	private add<T>(key: string, route: Route<T>): Route<T> {
		this.keys.add(key);
		this.routes.push(route);
		return route;
	}
}

function keyOf(filter: TopicFilter, payloadType: string): string {
	return `${filter.canonical}\u0000${payloadType}`;
}
