import { MAX_PAYLOAD_SIZE } from "../constants";
import { CodecNotFoundError, DecodeError, DuplicateCodecError, describe, EncodeError } from "../domain/errors";
import type { Codec } from "./codec";
import { boolCodec, bytesCodec, emptyCodec, floatCodec, intCodec, stringCodec } from "./primitives";
import { taggedCodec } from "./tagged";

export type CodecRegistryOptions = {
	/** Codecs to bind up front. */
	codecs?: Iterable<Codec<unknown>>;
	/** Payloads longer than this many bytes fail decoding. */
	maxPayloadSize?: number;
};

/** The primitive and tagged codecs every registry created by `withDefaults` starts with. */
export const DEFAULT_CODECS: readonly Codec<unknown>[] = [emptyCodec, bytesCodec, stringCodec, intCodec, floatCodec, boolCodec, taggedCodec];

/**
 * Binds exactly one codec to each payload type and performs encoding and
 * decoding on behalf of routes and publishers.
 */
export class CodecRegistry {
	public readonly maxPayloadSize: number;
	private readonly codecs = new Map<string, Codec<unknown>>();

	constructor(options: CodecRegistryOptions = {}) {
		this.maxPayloadSize = options.maxPayloadSize ?? MAX_PAYLOAD_SIZE;
		for (const codec of options.codecs ?? []) this.register(codec);
	}

	/**
	 * Creates a registry holding the built-in codecs.
	 */
	static withDefaults(options: Omit<CodecRegistryOptions, "codecs"> = {}): CodecRegistry {
		return new CodecRegistry({ ...options, codecs: DEFAULT_CODECS });
	}

	/**
	 * Binds a codec to its payload type.
	 * @throws DuplicateCodecError if the type is already bound and `override` is not set
	 */
	register<T>(codec: Codec<T>, options: { override?: boolean } = {}): void {
		if (this.codecs.has(codec.payloadType) && !options.override) throw new DuplicateCodecError(codec.payloadType);
		this.codecs.set(codec.payloadType, codec);
	}

	has(payloadType: string): boolean {
		return this.codecs.has(payloadType);
	}

	/**
	 * @throws CodecNotFoundError if nothing is bound to the type
	 */
	get(payloadType: string): Codec<unknown> {
		const codec = this.codecs.get(payloadType);
		if (!codec) throw new CodecNotFoundError(payloadType);
		return codec;
	}

	payloadTypes(): string[] {
		return [...this.codecs.keys()];
	}

	/**
	 * Returns an independent registry with the same bindings.
	 */
	clone(): CodecRegistry {
		return new CodecRegistry({ codecs: this.codecs.values(), maxPayloadSize: this.maxPayloadSize });
	}

	/**
	 * Encodes `value` with the codec bound to `payloadType`.
	 * @throws CodecNotFoundError if nothing is bound to the type
	 * @throws EncodeError if the codec rejects the value
	 */
	encode(payloadType: string, value: unknown): Uint8Array {
		const codec = this.get(payloadType);
		try {
			return codec.encode(value);
		} catch (error) {
			if (error instanceof EncodeError) throw error;
			throw new EncodeError(payloadType, describe(error), { cause: error });
		}
	}

	/**
	 * Decodes a payload received on `topic` with the codec bound to `payloadType`.
	 * @throws DecodeError if the payload is too large or the codec rejects it
	 */
	decode(payloadType: string, payload: Uint8Array, topic: string): unknown {
		if (payload.length > this.maxPayloadSize) {
			throw new DecodeError(topic, payloadType, payload.length, `payload exceeds maximum size of ${this.maxPayloadSize} bytes`);
		}
		const codec = this.codecs.get(payloadType);
		if (!codec) throw new DecodeError(topic, payloadType, payload.length, "no codec bound");
		try {
			return codec.decode(payload);
		} catch (error) {
			throw new DecodeError(topic, payloadType, payload.length, describe(error), { cause: error });
		}
	}
}
