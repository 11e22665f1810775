import type { Codec } from "./codec";

/** Payload type identifiers of the built-in codecs. */
export const PayloadType = {
	EMPTY: "empty",
	BYTES: "bytes",
	STRING: "string",
	INT: "int",
	FLOAT: "float",
	BOOL: "bool",
	TAGGED: "tagged",
} as const;

const FLOAT_BYTE_LENGTH = 8;
const BOOL_FALSE_BYTE = 0x00;
const BOOL_TRUE_BYTE = 0x01;

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/** Carries no data: `null` on the wire as zero bytes. */
export const emptyCodec: Codec<null> = {
	payloadType: PayloadType.EMPTY,
	encode(value) {
		if (value !== null) throw new TypeError(`expected null, got ${typeof value}`);
		return new Uint8Array(0);
	},
	decode(payload) {
		if (payload.length !== 0) throw new RangeError(`invalid empty payload length: ${payload.length}`);
		return null;
	},
};

/** Passes bytes through untouched. */
export const bytesCodec: Codec<Uint8Array> = {
	payloadType: PayloadType.BYTES,
	encode(value) {
		if (!(value instanceof Uint8Array)) throw new TypeError(`expected a Uint8Array, got ${typeof value}`);
		return value;
	},
	decode(payload) {
		return payload;
	},
};

/** UTF-8 text. Invalid sequences fail decoding instead of being replaced. */
export const stringCodec: Codec<string> = {
	payloadType: PayloadType.STRING,
	encode(value) {
		if (typeof value !== "string") throw new TypeError(`expected a string, got ${typeof value}`);
		return textEncoder.encode(value);
	},
	decode(payload) {
		return textDecoder.decode(payload);
	},
};

/**
 * Arbitrary-precision integers as big-endian two's complement, using the
 * fewest bytes that keep the sign.
 */
export const intCodec: Codec<bigint> = {
	payloadType: PayloadType.INT,
	encode(value) {
		if (typeof value !== "bigint") throw new TypeError(`expected a bigint, got ${typeof value}`);
		const bytes: number[] = [];
		let rest = value;
		for (;;) {
			const byte = Number(BigInt.asUintN(8, rest));
			bytes.unshift(byte);
			rest >>= 8n;
			const signBit = (byte & 0x80) !== 0;
			if ((rest === 0n && !signBit) || (rest === -1n && signBit)) break;
		}
		return Uint8Array.from(bytes);
	},
	decode(payload) {
		if (payload.length === 0) throw new RangeError("invalid integer payload length: 0");
		let value = 0n;
		for (const byte of payload) value = (value << 8n) | BigInt(byte);
		return BigInt.asIntN(payload.length * 8, value);
	},
};

/** IEEE 754 double precision, big-endian. */
export const floatCodec: Codec<number> = {
	payloadType: PayloadType.FLOAT,
	encode(value) {
		if (typeof value !== "number") throw new TypeError(`expected a number, got ${typeof value}`);
		const payload = new Uint8Array(FLOAT_BYTE_LENGTH);
		new DataView(payload.buffer).setFloat64(0, value);
		return payload;
	},
	decode(payload) {
		if (payload.length !== FLOAT_BYTE_LENGTH) throw new RangeError(`invalid float payload length: ${payload.length}`);
		return new DataView(payload.buffer, payload.byteOffset, payload.byteLength).getFloat64(0);
	},
};

/** A single `0x00` or `0x01` byte. */
export const boolCodec: Codec<boolean> = {
	payloadType: PayloadType.BOOL,
	encode(value) {
		if (typeof value !== "boolean") throw new TypeError(`expected a boolean, got ${typeof value}`);
		return Uint8Array.of(value ? BOOL_TRUE_BYTE : BOOL_FALSE_BYTE);
	},
	decode(payload) {
		if (payload.length !== 1) throw new RangeError(`invalid boolean payload length: ${payload.length}`);
		const [byte] = payload;
		if (byte !== BOOL_FALSE_BYTE && byte !== BOOL_TRUE_BYTE) throw new RangeError(`invalid boolean payload value: 0x${byte.toString(16).padStart(2, "0")}`);
		return byte === BOOL_TRUE_BYTE;
	},
};
