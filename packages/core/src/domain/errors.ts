export enum ErrorCode {
	// Topic errors
	INVALID_TOPIC = "INVALID_TOPIC",
	INVALID_TOPIC_FILTER = "INVALID_TOPIC_FILTER",

	// Registration errors
	DUPLICATE_ROUTE = "DUPLICATE_ROUTE",
	ALREADY_STARTED = "ALREADY_STARTED",

	// Codec errors
	DUPLICATE_CODEC = "DUPLICATE_CODEC",
	CODEC_NOT_FOUND = "CODEC_NOT_FOUND",
	DECODE_FAILED = "DECODE_FAILED",
	ENCODE_FAILED = "ENCODE_FAILED",

	// Delivery errors
	HANDLER_FAILED = "HANDLER_FAILED",
	MESSAGING_FAILED = "MESSAGING_FAILED",

	// Transport errors
	PUBLISH_FAILED = "PUBLISH_FAILED",
	SUBSCRIBE_FAILED = "SUBSCRIBE_FAILED",
	TRANSPORT_FAILED = "TRANSPORT_FAILED",
	SOURCE_CLOSED = "SOURCE_CLOSED",

	// Generic fallback
	UNKNOWN = "UNKNOWN",
}

export class MqrouteError extends Error {
	constructor(
		public readonly code: ErrorCode,
		message?: string,
		options?: { cause?: unknown },
	) {
		super(message || code, options);
		this.name = code;
	}
}

export class InvalidTopicError extends MqrouteError {
	constructor(
		public readonly topic: string,
		reason: string,
	) {
		super(ErrorCode.INVALID_TOPIC, `Invalid topic ${JSON.stringify(topic)}: ${reason}`);
	}
}

export class InvalidTopicFilterError extends MqrouteError {
	constructor(
		public readonly filter: string,
		reason: string,
	) {
		super(ErrorCode.INVALID_TOPIC_FILTER, `Invalid topic filter ${JSON.stringify(filter)}: ${reason}`);
	}
}

export class DuplicateRouteError extends MqrouteError {
	constructor(
		public readonly filter: string,
		public readonly payloadType: string,
	) {
		super(ErrorCode.DUPLICATE_ROUTE, `Route already registered for filter ${JSON.stringify(filter)} with payload type ${JSON.stringify(payloadType)}`);
	}
}

export class AlreadyStartedError extends MqrouteError {
	constructor(message = "Operation not allowed after start") {
		super(ErrorCode.ALREADY_STARTED, message);
	}
}

export class DuplicateCodecError extends MqrouteError {
	constructor(public readonly payloadType: string) {
		super(ErrorCode.DUPLICATE_CODEC, `Codec already bound for payload type ${JSON.stringify(payloadType)}`);
	}
}

export class CodecNotFoundError extends MqrouteError {
	constructor(public readonly payloadType: string) {
		super(ErrorCode.CODEC_NOT_FOUND, `No codec bound for payload type ${JSON.stringify(payloadType)}`);
	}
}

/**
 * A payload could not be turned into its typed form. Reported per message;
 * never stops the dispatcher.
 */
export class DecodeError extends MqrouteError {
	constructor(
		public readonly topic: string,
		public readonly payloadType: string,
		public readonly payloadLength: number,
		reason: string,
		options?: { cause?: unknown },
	) {
		super(ErrorCode.DECODE_FAILED, `Failed to decode ${payloadLength} byte payload on ${JSON.stringify(topic)} as ${JSON.stringify(payloadType)}: ${reason}`, options);
	}
}

export class EncodeError extends MqrouteError {
	constructor(
		public readonly payloadType: string,
		reason: string,
		options?: { cause?: unknown },
	) {
		super(ErrorCode.ENCODE_FAILED, `Failed to encode value as ${JSON.stringify(payloadType)}: ${reason}`, options);
	}
}

export class HandlerError extends MqrouteError {
	constructor(
		public readonly topic: string,
		public readonly filter: string,
		cause: unknown,
	) {
		super(ErrorCode.HANDLER_FAILED, `Handler for ${JSON.stringify(filter)} failed on ${JSON.stringify(topic)}: ${describe(cause)}`, { cause });
	}
}

/**
 * An error meant to travel back to the requester. Handlers throw it directly
 * or exception mappers produce it from other errors.
 */
export class MessagingError extends MqrouteError {
	constructor(
		message: string,
		public readonly errorCode: number | null = null,
	) {
		super(ErrorCode.MESSAGING_FAILED, message);
	}
}

export class PublishError extends MqrouteError {
	constructor(
		public readonly topic: string,
		cause: unknown,
	) {
		super(ErrorCode.PUBLISH_FAILED, `Publish to ${JSON.stringify(topic)} failed: ${describe(cause)}`, { cause });
	}
}

export class SubscribeError extends MqrouteError {
	constructor(
		public readonly filter: string,
		cause: unknown,
	) {
		super(ErrorCode.SUBSCRIBE_FAILED, `Subscribe to ${JSON.stringify(filter)} failed: ${describe(cause)}`, { cause });
	}
}

/**
 * A connection-level failure reported by a transport outside any single
 * publish or subscribe.
 */
export class TransportError extends MqrouteError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(ErrorCode.TRANSPORT_FAILED, message, options);
	}
}

export class SourceClosedError extends MqrouteError {
	constructor(message = "Message source closed", options?: { cause?: unknown }) {
		super(ErrorCode.SOURCE_CLOSED, message, options);
	}
}

export function describe(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
