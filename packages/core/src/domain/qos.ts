/**
 * MQTT delivery guarantee levels.
 */
export enum QoS {
	/** Delivered at most once, or not at all. */
	AtMostOnce = 0,
	/** Always delivered, possibly more than once. */
	AtLeastOnce = 1,
	/** Always delivered exactly once. */
	ExactlyOnce = 2,
}
