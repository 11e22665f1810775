/**
 * Converts values of one payload type to bytes and back.
 *
 * `decode` throws on malformed input; the registry turns whatever it throws
 * into a `DecodeError` tied to the offending message.
 */
export interface Codec<T> {
	/** Identifier routes and publishers use to select this codec. */
	readonly payloadType: string;
	encode(value: T): Uint8Array;
	decode(payload: Uint8Array): T;
}
