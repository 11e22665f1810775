import type { CodecRegistry } from "../codec/registry";
import { PublishError } from "../domain/errors";
import type { PublishOptions } from "../domain/message";
import { QoS } from "../domain/qos";
import type { IMessageSink } from "../domain/transport";
import { validateTopic } from "../topic/filter";

/**
 * Encodes typed values and hands them to the sink.
 */
export class Publisher {
	constructor(
		private readonly sink: IMessageSink,
		private readonly codecs: CodecRegistry,
	) {}

	/**
	 * Publishes `value` encoded with the codec bound to `payloadType`.
	 * Topic and encoding problems throw before anything is sent; a failed
	 * send rejects the returned promise with `PublishError`.
	 *
	 * @throws InvalidTopicError if the topic is empty or contains wildcards
	 * @throws CodecNotFoundError if nothing is bound to the payload type
	 * @throws EncodeError if the codec rejects the value
	 */
	publish(topic: string, payloadType: string, value: unknown, options: PublishOptions = {}): Promise<void> {
		validateTopic(topic);
		const payload = this.codecs.encode(payloadType, value);
		return this.send(topic, payload, options);
	}

	private async send(topic: string, payload: Uint8Array, options: PublishOptions): Promise<void> {
		try {
			await this.sink.publish(topic, payload, options.qos ?? QoS.AtLeastOnce, options.retain ?? false, options.properties);
		} catch (error) {
			throw new PublishError(topic, error);
		}
	}
}
