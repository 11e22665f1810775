import { MAX_TOPIC_LENGTH, MULTI_LEVEL_WILDCARD, SINGLE_LEVEL_WILDCARD, SYSTEM_TOPIC_PREFIX, TOPIC_SEPARATOR } from "../constants";
import { InvalidTopicError, InvalidTopicFilterError } from "../domain/errors";

/**
 * One level of a topic filter. A single-level wildcard written as `{name}`
 * captures the level it matches under that name.
 */
export type FilterSegment = { readonly kind: "literal"; readonly value: string } | { readonly kind: "single"; readonly name: string | null } | { readonly kind: "multi" };

/**
 * Values a filter extracted from a concrete topic.
 */
export type TopicCapture = {
	params: Record<string, string>;
	/** Levels matched by a trailing `#`, joined with `/`; `null` when the filter has none. */
	rest: string | null;
};

const PARAMETER_PATTERN = /^\{([A-Za-z_][A-Za-z0-9_]*)\}$/;

const encoder = new TextEncoder();

/**
 * An immutable, validated MQTT topic filter.
 *
 * Besides the standard `+` and `#` wildcards, a level may be written as
 * `{name}`: it matches like `+` and exposes the matched level by name.
 * The canonical form, used for subscriptions and route identity, writes
 * such levels as `+`.
 */
export class TopicFilter {
	/** The canonical MQTT form of this filter. */
	public readonly canonical: string;

	private constructor(
		public readonly source: string,
		public readonly segments: readonly FilterSegment[],
	) {
		this.canonical = segments.map(toCanonical).join(TOPIC_SEPARATOR);
	}

	/**
	 * Parses and validates a filter string.
	 * @throws InvalidTopicFilterError if the filter is malformed
	 */
	static parse(filter: string): TopicFilter {
		if (filter.length === 0) throw new InvalidTopicFilterError(filter, "must not be empty");
		if (filter.includes("\u0000")) throw new InvalidTopicFilterError(filter, "must not contain U+0000");
		if (encoder.encode(filter).length > MAX_TOPIC_LENGTH) throw new InvalidTopicFilterError(filter, `must not exceed ${MAX_TOPIC_LENGTH} bytes`);

		const levels = filter.split(TOPIC_SEPARATOR);
		const names = new Set<string>();
		const segments = levels.map((level, index): FilterSegment => {
			if (level.includes(MULTI_LEVEL_WILDCARD)) {
				if (level !== MULTI_LEVEL_WILDCARD) throw new InvalidTopicFilterError(filter, "multi-level wildcard must occupy an entire level");
				if (index !== levels.length - 1) throw new InvalidTopicFilterError(filter, "multi-level wildcard must be the last level");
				return { kind: "multi" };
			}
			if (level.includes(SINGLE_LEVEL_WILDCARD)) {
				if (level !== SINGLE_LEVEL_WILDCARD) throw new InvalidTopicFilterError(filter, "single-level wildcard must occupy an entire level");
				return { kind: "single", name: null };
			}
			if (level.includes("{") || level.includes("}")) {
				const match = PARAMETER_PATTERN.exec(level);
				if (!match) throw new InvalidTopicFilterError(filter, `parameters must occupy an entire level and be named like an identifier (e.g. '{id}'), got '${level}'`);
				const name = match[1];
				if (names.has(name)) throw new InvalidTopicFilterError(filter, `parameter '${name}' is used more than once`);
				names.add(name);
				return { kind: "single", name };
			}
			return { kind: "literal", value: level };
		});

		return new TopicFilter(filter, Object.freeze(segments));
	}

	static from(filter: string | TopicFilter): TopicFilter {
		return typeof filter === "string" ? TopicFilter.parse(filter) : filter;
	}

	get hasWildcards(): boolean {
		return this.segments.some((segment) => segment.kind !== "literal");
	}

	/**
	 * Returns whether the concrete topic matches this filter.
	 */
	matches(topic: string): boolean {
		return this.capture(topic) !== null;
	}

	/**
	 * Matches the concrete topic against this filter and returns the named
	 * levels and the `#` remainder, or `null` when it does not match.
	 *
	 * Topics starting with `$` are reserved for the broker; a filter whose
	 * first level is a wildcard never matches them.
	 */
	capture(topic: string): TopicCapture | null {
		const levels = topic.split(TOPIC_SEPARATOR);
		if (levels[0].startsWith(SYSTEM_TOPIC_PREFIX) && this.segments[0].kind !== "literal") return null;

		const params: Record<string, string> = {};
		for (let index = 0; index < this.segments.length; index++) {
			const segment = this.segments[index];
			if (segment.kind === "multi") {
				return { params, rest: levels.slice(index).join(TOPIC_SEPARATOR) };
			}
			if (index >= levels.length) return null;
			if (segment.kind === "literal") {
				if (segment.value !== levels[index]) return null;
			} else if (segment.name !== null) {
				params[segment.name] = levels[index];
			}
		}

		return levels.length === this.segments.length ? { params, rest: null } : null;
	}

	toString(): string {
		return this.canonical;
	}
}

/**
 * Returns whether `topic` matches `filter`. Pure: the same inputs always give
 * the same answer.
 */
export function matchTopic(filter: string | TopicFilter, topic: string): boolean {
	return TopicFilter.from(filter).matches(topic);
}

/**
 * Checks that a topic is concrete enough to publish to.
 * @throws InvalidTopicError if the topic is empty, too long or contains wildcards
 */
export function validateTopic(topic: string): void {
	if (topic.length === 0) throw new InvalidTopicError(topic, "must not be empty");
	if (topic.includes(SINGLE_LEVEL_WILDCARD) || topic.includes(MULTI_LEVEL_WILDCARD)) throw new InvalidTopicError(topic, "must not contain wildcards");
	if (topic.includes("\u0000")) throw new InvalidTopicError(topic, "must not contain U+0000");
	if (encoder.encode(topic).length > MAX_TOPIC_LENGTH) throw new InvalidTopicError(topic, `must not exceed ${MAX_TOPIC_LENGTH} bytes`);
}

function toCanonical(segment: FilterSegment): string {
	switch (segment.kind) {
		case "literal":
			return segment.value;
		case "single":
			return SINGLE_LEVEL_WILDCARD;
		case "multi":
			return MULTI_LEVEL_WILDCARD;
	}
}
