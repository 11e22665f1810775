import { decode as unpack, encode as pack } from "@msgpack/msgpack";
import type { z } from "zod";
import type { Codec } from "./codec";

/** Any zod schema producing `T`, whatever its input looks like. */
export type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/**
 * Structured payloads as MessagePack, checked against `schema` on the way out
 * and on the way in.
 */
export function msgpackCodec<T>(payloadType: string, schema: Schema<T>): Codec<T> {
	return {
		payloadType,
		encode(value) {
			return pack(validate(schema, value));
		},
		decode(payload) {
			return validate(schema, unpack(payload));
		},
	};
}

/**
 * Structured payloads as UTF-8 JSON, checked against `schema` on the way out
 * and on the way in.
 */
export function jsonCodec<T>(payloadType: string, schema: Schema<T>): Codec<T> {
	return {
		payloadType,
		encode(value) {
			return textEncoder.encode(JSON.stringify(validate(schema, value)));
		},
		decode(payload) {
			return validate(schema, JSON.parse(textDecoder.decode(payload)));
		},
	};
}

function validate<T>(schema: Schema<T>, value: unknown): T {
	const result = schema.safeParse(value);
	if (!result.success) {
		const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
		throw new TypeError(`schema mismatch (${issues.join("; ")})`);
	}
	return result.data;
}
