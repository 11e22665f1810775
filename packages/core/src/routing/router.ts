import { TOPIC_SEPARATOR } from "../constants";
import type { Handler, HandlerContext, HandlerReturn } from "../domain/handler";
import type { DecodedMessage } from "../domain/message";
import { TopicFilter } from "../topic/filter";
import type { RouteOptions, RouteTable } from "./route-table";

interface RouteDefinition<T = unknown> {
	readonly filter: string;
	readonly payloadType: string;
	readonly options: RouteOptions;
	handle(message: DecodedMessage<T>, context: HandlerContext): HandlerReturn | Promise<HandlerReturn>;
}

/**
 * A group of routes declared apart from any client, optionally under a
 * common topic prefix. Routers nest, and a client takes them in with
 * `include` before it starts.
 *
 * @example
 * const sensors = new Router("sensors");
 * sensors.route("{room}/temperature", "float", ({ params, value }) => store(params.room, value));
 * client.include(sensors);
 */
export class Router {
	private readonly definitions: RouteDefinition[] = [];

	constructor(public readonly prefix = "") {}

	/**
	 * Declares a route. The filter is checked immediately, prefixed.
	 * @throws InvalidTopicFilterError if the prefixed filter is malformed
	 */
	route<T>(filter: string, payloadType: string, handler: Handler<T>, options: RouteOptions = {}): this {
		const full = this.qualify(filter);
		TopicFilter.parse(full);
		const definition: RouteDefinition<T> = { filter: full, payloadType, options, handle: handler };
		this.definitions.push(definition);
		return this;
	}

	/**
	 * Adds every route of another router under this router's prefix.
	 */
	include(router: Router): this {
		for (const definition of router.definitions) {
			const full = this.qualify(definition.filter);
			TopicFilter.parse(full);
			this.definitions.push({ ...definition, filter: full });
		}
		return this;
	}

	/**
	 * Registers every declared route in the table, in declaration order. A
	 * duplicate leaves the table as it was.
	 */
	registerIn(table: RouteTable): void {
		table.registerAll(this.definitions);
	}

	/** Fully qualified filters of the declared routes. */
	filters(): string[] {
		return this.definitions.map((definition) => definition.filter);
	}

	/** Distinct payload types the declared routes decode. */
	payloadTypes(): string[] {
		return [...new Set(this.definitions.map((definition) => definition.payloadType))];
	}

	private qualify(filter: string): string {
		return this.prefix ? `${this.prefix}${TOPIC_SEPARATOR}${filter}` : filter;
	}
}
