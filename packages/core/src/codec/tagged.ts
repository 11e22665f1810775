import type { Codec } from "./codec";
import { boolCodec, bytesCodec, emptyCodec, floatCodec, intCodec, PayloadType, stringCodec } from "./primitives";

/** Leading byte identifying the kind of a tagged payload. */
export enum TypeTag {
	EMPTY = 0x00,
	BYTES = 0x01,
	STRING = 0x02,
	INT = 0x03,
	FLOAT = 0x04,
	BOOL = 0x05,
}

export type TaggedValue = null | Uint8Array | string | bigint | number | boolean;

/**
 * Self-describing payloads: one tag byte followed by the bytes of the
 * matching primitive codec. Lets a route accept any of the primitive kinds.
 */
export const taggedCodec: Codec<TaggedValue> = {
	payloadType: PayloadType.TAGGED,
	encode(value) {
		const [tag, body] = encodeBody(value);
		const payload = new Uint8Array(body.length + 1);
		payload[0] = tag;
		payload.set(body, 1);
		return payload;
	},
	decode(payload) {
		if (payload.length === 0) throw new RangeError("cannot decode empty data");
		const body = payload.subarray(1);
		switch (payload[0]) {
			case TypeTag.EMPTY:
				return emptyCodec.decode(body);
			case TypeTag.BYTES:
				return bytesCodec.decode(body);
			case TypeTag.STRING:
				return stringCodec.decode(body);
			case TypeTag.INT:
				return intCodec.decode(body);
			case TypeTag.FLOAT:
				return floatCodec.decode(body);
			case TypeTag.BOOL:
				return boolCodec.decode(body);
			default:
				throw new RangeError(`unrecognised type tag: 0x${payload[0].toString(16).padStart(2, "0")}`);
		}
	},
};

function encodeBody(value: TaggedValue): [TypeTag, Uint8Array] {
	if (value === null) return [TypeTag.EMPTY, emptyCodec.encode(value)];
	if (value instanceof Uint8Array) return [TypeTag.BYTES, bytesCodec.encode(value)];
	switch (typeof value) {
		case "string":
			return [TypeTag.STRING, stringCodec.encode(value)];
		case "bigint":
			return [TypeTag.INT, intCodec.encode(value)];
		case "number":
			return [TypeTag.FLOAT, floatCodec.encode(value)];
		case "boolean":
			return [TypeTag.BOOL, boolCodec.encode(value)];
		default:
			throw new TypeError(`unsupported value of type ${typeof value}`);
	}
}
