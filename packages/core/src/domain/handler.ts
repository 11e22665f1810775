import type { MqrouteError } from "./errors";
import type { DecodedMessage, MessageProperties, PublishOptions, RawMessage } from "./message";
import type { QoS } from "./qos";

/**
 * A message a handler asks to have published once it returns.
 */
export type OutboundMessage<T = unknown> = {
	/** Where to publish. Defaults to the inbound message's response topic. */
	topic?: string;
	value: T;
	/** Codec to encode `value` with. Defaults to the payload type of the route that produced it. */
	payloadType?: string;
	/** Defaults to the QoS the inbound message arrived with. */
	qos?: QoS;
	retain?: boolean;
	properties?: MessageProperties;
};

/**
 * What a handler can reach besides its decoded message.
 */
export interface HandlerContext {
	/** Filter, as registered, of the route being invoked. */
	readonly filter: string;
	readonly payloadType: string;
	/** Values registered with the client for handlers to share. */
	readonly shared: Readonly<Record<string, unknown>>;
	publish(topic: string, payloadType: string, value: unknown, options?: PublishOptions): Promise<void>;
}

// biome-ignore lint/suspicious/noConfusingVoidType: handlers may return nothing
export type HandlerReturn = OutboundMessage | void;

export type Handler<T> = (message: DecodedMessage<T>, context: HandlerContext) => HandlerReturn | Promise<HandlerReturn>;

/**
 * The outcome of one handler invocation. Failures are values, never thrown
 * out of the dispatcher.
 */
export type DeliveryResult =
	| { status: "delivered"; message: RawMessage; filter: string; payloadType: string; reply: OutboundMessage | null }
	| { status: "failed"; message: RawMessage; filter: string; payloadType: string; error: MqrouteError };
