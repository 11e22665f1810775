import type { MqrouteError } from "./errors";
import type { MessageProperties, RawMessage } from "./message";
import type { QoS } from "./qos";

/**
 * A filter the source should subscribe to, with the QoS requested for it.
 */
export type Subscription = {
	filter: string;
	qos: QoS;
};

/**
 * Produces inbound messages. The connection behind it is managed elsewhere;
 * the framework only consumes what it yields.
 *
 * Iteration ending, or throwing, means the source is closed. The dispatcher
 * treats either as fatal and stops.
 */
export interface IMessageSource {
	/**
	 * Returns the inbound message sequence. It may be infinite and is pulled
	 * lazily, one message at a time.
	 */
	messages(): AsyncIterable<RawMessage>;

	/**
	 * Asks the underlying connection to deliver messages for the given filters.
	 * Sources fed by a fixed subscription can leave this out.
	 */
	subscribe?(subscriptions: Subscription[]): Promise<void>;

	/**
	 * Lets the client listen for failures the connection reports outside of
	 * any call, such as a dropped socket.
	 */
	on?(event: "error", listener: (error: MqrouteError) => void): unknown;
}

/**
 * Accepts outbound messages. A rejected promise means the publish failed and
 * is reported to whoever published.
 */
export interface IMessageSink {
	publish(topic: string, payload: Uint8Array, qos: QoS, retain: boolean, properties?: MessageProperties): Promise<void>;

	on?(event: "error", listener: (error: MqrouteError) => void): unknown;
}

/**
 * A connection that is both source and sink, such as an MQTT client.
 */
export interface ITransport extends IMessageSource, IMessageSink {}
