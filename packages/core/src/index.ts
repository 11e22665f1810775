export { Client, type ClientOptions, type ConnectionOptions } from "./client";
export type { Codec } from "./codec/codec";
export { boolCodec, bytesCodec, emptyCodec, floatCodec, intCodec, PayloadType, stringCodec } from "./codec/primitives";
export { CodecRegistry, type CodecRegistryOptions, DEFAULT_CODECS } from "./codec/registry";
export { jsonCodec, msgpackCodec, type Schema } from "./codec/schema";
export { type TaggedValue, TypeTag, taggedCodec } from "./codec/tagged";
export { DEFAULT_CONCURRENCY, MAX_PAYLOAD_SIZE } from "./constants";
export { Dispatcher, type DispatcherEvents, type DispatcherOptions, type DispatcherStats, ERROR_USER_PROPERTY } from "./dispatch/dispatcher";
export { type ErrorClass, type ExceptionMapper, ExceptionMappers } from "./dispatch/exceptions";
export { Publisher } from "./dispatch/publisher";
export { DispatcherState } from "./domain/dispatcher-state";
export {
	AlreadyStartedError,
	CodecNotFoundError,
	DecodeError,
	DuplicateCodecError,
	DuplicateRouteError,
	EncodeError,
	ErrorCode,
	HandlerError,
	InvalidTopicError,
	InvalidTopicFilterError,
	MessagingError,
	MqrouteError,
	PublishError,
	SourceClosedError,
	SubscribeError,
	TransportError,
	describe,
} from "./domain/errors";
export type { DeliveryResult, Handler, HandlerContext, HandlerReturn, OutboundMessage } from "./domain/handler";
export type { DecodedMessage, MessageProperties, PublishOptions, RawMessage } from "./domain/message";
export { QoS } from "./domain/qos";
export type { IMessageSink, IMessageSource, ITransport, Subscription } from "./domain/transport";
export { MessageQueue, type MessageQueueOptions } from "./queue/message-queue";
export { type Route, type RouteOptions, type RouteSpec, RouteTable } from "./routing/route-table";
export { Router } from "./routing/router";
export { matchTopic, type TopicCapture, TopicFilter, validateTopic } from "./topic/filter";
export { type RetryOptions, retry } from "./utils/retry";
