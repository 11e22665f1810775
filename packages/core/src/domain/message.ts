import type { QoS } from "./qos";

/**
 * MQTT v5 publish properties the framework reads or forwards.
 */
export type MessageProperties = {
	/** Topic the sender expects a reply on. */
	responseTopic?: string;
	/** Opaque bytes echoed back with a reply so the requester can pair it. */
	correlationData?: Uint8Array;
	userProperties?: Record<string, string>;
};

/**
 * A message as it arrives from the message source: a concrete topic,
 * the undecoded payload and its delivery metadata.
 */
export type RawMessage = {
	readonly topic: string;
	readonly payload: Uint8Array;
	readonly qos: QoS;
	readonly retain: boolean;
	readonly properties?: Readonly<MessageProperties>;
};

/**
 * A raw message paired with its typed payload and the values captured by the
 * matching filter's named segments.
 */
export type DecodedMessage<T> = RawMessage & {
	readonly value: T;
	readonly params: Readonly<Record<string, string>>;
	/** Topic segments matched by a trailing `#`, joined with `/`. */
	readonly rest: string | null;
};

/**
 * Options accompanying an outbound publish.
 */
export type PublishOptions = {
	qos?: QoS;
	retain?: boolean;
	properties?: MessageProperties;
};
