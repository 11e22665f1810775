/** Separator between topic levels. */
export const TOPIC_SEPARATOR = "/";

/** Filter segment matching exactly one topic level. */
export const SINGLE_LEVEL_WILDCARD = "+";

/** Filter segment matching the remaining topic levels, including none. */
export const MULTI_LEVEL_WILDCARD = "#";

/** Leading character of broker-internal topics such as `$SYS/...`. */
export const SYSTEM_TOPIC_PREFIX = "$";

/** The largest topic or filter MQTT can carry, in UTF-8 bytes. */
export const MAX_TOPIC_LENGTH = 65_535;

/** Handler invocations allowed in flight at once unless configured otherwise. */
export const DEFAULT_CONCURRENCY = 16;

/** The largest payload decoded unless configured otherwise (1 MiB). */
export const MAX_PAYLOAD_SIZE = 1_048_576;
