import { describe, type ITransport, type MessageProperties, MessageQueue, QoS, type RawMessage, retry, SourceClosedError, SubscribeError, type Subscription, TransportError } from "@mqroute/core";
import EventEmitter from "eventemitter3";
import { connectAsync, type IClientOptions, type MqttClient } from "mqtt";
import { v4 as uuid } from "uuid";

/**
 * Options for connecting an MqttTransport.
 */
export type MqttTransportOptions = {
	/** Broker URL, such as `mqtt://localhost:1883`. */
	url: string;
	/** Defaults to a random `mqroute-` prefixed id. */
	clientId?: string;
	/** Milliseconds a publish may take before it fails. */
	publishTimeout?: number;
	/** Attempts made for a subscribe request that fails at the transport. */
	subscribeAttempts?: number;
	/** Base delay in milliseconds between subscribe attempts. */
	subscribeDelay?: number;
	/** Inbound messages buffered before reading from the broker pauses. */
	maxBufferedMessages?: number;
	/** Passed through to mqtt.js. Protocol version 5 is always used. */
	mqtt?: IClientOptions;
};

export type MqttTransportEvents = {
	connected: () => void;
	disconnected: () => void;
	error: (error: TransportError) => void;
};

/** Default time allowed for a publish to be acknowledged. */
const DEFAULT_PUBLISH_TIMEOUT = 5000;
const DEFAULT_SUBSCRIBE_ATTEMPTS = 3;
const DEFAULT_SUBSCRIBE_DELAY = 100;
const DEFAULT_MAX_BUFFERED_MESSAGES = 100;
/** Grants at or above this reason code mean the broker refused the subscription. */
const SUBACK_FAILURE = 0x80;
const MQTT_V5 = 5;

/**
 * An ITransport over an MQTT v5 connection, using mqtt.js.
 *
 * Inbound publishes are buffered until the dispatcher pulls them. Once
 * `maxBufferedMessages` are waiting, mqtt.js is held from reading further
 * packets until the dispatcher catches up. The message sequence ends when
 * the connection is ended, by `close` or by mqtt.js.
 */
export class MqttTransport extends EventEmitter<MqttTransportEvents> implements ITransport {
	private readonly queue: MessageQueue<RawMessage>;
	private readonly publishTimeout: number;
	private readonly subscribeAttempts: number;
	private readonly subscribeDelay: number;

	/**
	 * Connects to the broker and resolves once the session is established.
	 */
	static async connect(options: MqttTransportOptions): Promise<MqttTransport> {
		const client = await connectAsync(options.url, {
			...options.mqtt,
			clientId: options.clientId ?? options.mqtt?.clientId ?? `mqroute-${uuid()}`,
			protocolVersion: MQTT_V5,
		});
		return new MqttTransport(client, options);
	}

	/**
	 * Wraps a client that is already set up. Use `connect` to create one.
	 */
	constructor(
		private readonly client: MqttClient,
		options: Omit<MqttTransportOptions, "url" | "clientId" | "mqtt"> = {},
	) {
		super();
		this.publishTimeout = options.publishTimeout ?? DEFAULT_PUBLISH_TIMEOUT;
		this.subscribeAttempts = options.subscribeAttempts ?? DEFAULT_SUBSCRIBE_ATTEMPTS;
		this.subscribeDelay = options.subscribeDelay ?? DEFAULT_SUBSCRIBE_DELAY;
		this.queue = new MessageQueue<RawMessage>({ highWaterMark: options.maxBufferedMessages ?? DEFAULT_MAX_BUFFERED_MESSAGES });

		// mqtt.js processes the next inbound packet only after this callback.
		this.client.handleMessage = (_packet, callback) => {
			this.queue.whenWritable().then(
				() => callback(),
				(error: Error) => callback(error),
			);
		};

		this.client.on("message", (topic, payload, packet) => {
			this.queue.push({ topic, payload: toBytes(payload), qos: toQoS(packet.qos), retain: packet.retain, properties: toProperties(packet.properties) });
		});
		this.client.on("connect", () => this.emit("connected"));
		this.client.on("offline", () => this.emit("disconnected"));
		this.client.on("error", (error) => this.emit("error", new TransportError(`MQTT client error: ${error.message}`, { cause: error })));
		this.client.on("end", () => this.queue.close(new SourceClosedError("MQTT connection ended")));
	}

	messages(): AsyncIterable<RawMessage> {
		return this.queue;
	}

	/**
	 * Subscribes to every filter in one request, retrying transport failures
	 * while the client is not disconnecting. Each retry is reported as an
	 * `error` event.
	 * @throws SubscribeError if the request keeps failing or the broker refuses a filter
	 */
	async subscribe(subscriptions: Subscription[]): Promise<void> {
		if (subscriptions.length === 0) return;
		const request = Object.fromEntries(subscriptions.map(({ filter, qos }): [string, { qos: 0 | 1 | 2 }] => [filter, { qos: toMqttQoS(qos) }]));

		let grants: Awaited<ReturnType<MqttClient["subscribeAsync"]>>;
		try {
			grants = await retry(() => this.client.subscribeAsync(request), {
				attempts: this.subscribeAttempts,
				delay: this.subscribeDelay,
				retryIf: () => !this.client.disconnecting,
				onRetry: (error, attempt) => this.emit("error", new TransportError(`Subscribe attempt ${attempt} failed: ${describe(error)}; retrying`, { cause: error })),
			});
		} catch (error) {
			throw new SubscribeError(subscriptions.map(({ filter }) => filter).join(", "), error);
		}

		const refused = grants.find((grant) => grant.qos >= SUBACK_FAILURE);
		if (refused) throw new SubscribeError(refused.topic, new Error(`broker refused with reason code 0x${refused.qos.toString(16)}`));
	}

	async publish(topic: string, payload: Uint8Array, qos: QoS, retain: boolean, properties?: MessageProperties): Promise<void> {
		let timer: ReturnType<typeof setTimeout> | undefined;
		const timeout = new Promise<never>((_, reject) => {
			timer = setTimeout(() => reject(new TransportError(`Publish timed out after ${this.publishTimeout} ms`)), this.publishTimeout);
		});

		try {
			await Promise.race([this.client.publishAsync(topic, Buffer.from(payload.buffer, payload.byteOffset, payload.byteLength), { qos: toMqttQoS(qos), retain, properties: toPacketProperties(properties) }), timeout]);
		} finally {
			clearTimeout(timer);
		}
	}

	/**
	 * Ends the MQTT connection. The message sequence ends after any messages
	 * already buffered.
	 */
	async close(): Promise<void> {
		await this.client.endAsync();
		this.queue.close(new SourceClosedError("MQTT connection ended"));
	}
}

function toBytes(buffer: Buffer): Uint8Array {
	return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
}

function toQoS(qos: number): QoS {
	switch (qos) {
		case 2:
			return QoS.ExactlyOnce;
		case 1:
			return QoS.AtLeastOnce;
		default:
			return QoS.AtMostOnce;
	}
}

function toMqttQoS(qos: QoS): 0 | 1 | 2 {
	switch (qos) {
		case QoS.AtMostOnce:
			return 0;
		case QoS.AtLeastOnce:
			return 1;
		case QoS.ExactlyOnce:
			return 2;
	}
}

type PacketProperties = { responseTopic?: string; correlationData?: Buffer; userProperties?: Record<string, string | string[]> };

function toProperties(properties: PacketProperties | undefined): MessageProperties | undefined {
	if (!properties) return undefined;
	const { responseTopic, correlationData, userProperties } = properties;
	if (responseTopic === undefined && correlationData === undefined && userProperties === undefined) return undefined;

	const result: MessageProperties = {};
	if (responseTopic !== undefined) result.responseTopic = responseTopic;
	if (correlationData !== undefined) result.correlationData = toBytes(correlationData);
	if (userProperties !== undefined) {
		// Repeated keys arrive as arrays; handlers see them comma-joined.
		result.userProperties = Object.fromEntries(Object.entries(userProperties).map(([key, value]): [string, string] => [key, Array.isArray(value) ? value.join(",") : value]));
	}
	return result;
}

function toPacketProperties(properties: MessageProperties | undefined): PacketProperties | undefined {
	if (!properties) return undefined;
	const { responseTopic, correlationData, userProperties } = properties;
	const result: PacketProperties = {};
	if (responseTopic !== undefined) result.responseTopic = responseTopic;
	if (correlationData !== undefined) result.correlationData = Buffer.from(correlationData);
	if (userProperties !== undefined) result.userProperties = userProperties;
	return Object.keys(result).length > 0 ? result : undefined;
}
