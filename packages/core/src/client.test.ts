import EventEmitter from "eventemitter3";
import * as t from "vitest";
import { z } from "zod";
import { Client } from "./client";
import type { Codec } from "./codec/codec";
import { jsonCodec } from "./codec/schema";
import { DispatcherState } from "./domain/dispatcher-state";
import { AlreadyStartedError, CodecNotFoundError, DuplicateCodecError, DuplicateRouteError, MessagingError, type MqrouteError, SourceClosedError, TransportError } from "./domain/errors";
import type { DeliveryResult } from "./domain/handler";
import type { MessageProperties, RawMessage } from "./domain/message";
import { QoS } from "./domain/qos";
import type { ITransport } from "./domain/transport";
import { MessageQueue } from "./queue/message-queue";
import { Router } from "./routing/router";

const encoder = new TextEncoder();

const Reading = z.object({ room: z.string(), celsius: z.number() });
type Reading = z.infer<typeof Reading>;

const createTransport = () => {
	const queue = new MessageQueue<RawMessage>();
	return {
		queue,
		messages: () => queue,
		subscribe: t.vi.fn().mockResolvedValue(undefined),
		publish: t.vi.fn().mockResolvedValue(undefined),
	};
};

class ReportingTransport extends EventEmitter<{ error: (error: MqrouteError) => void }> implements ITransport {
	readonly queue = new MessageQueue<RawMessage>();
	readonly publish = t.vi.fn().mockResolvedValue(undefined);

	messages(): AsyncIterable<RawMessage> {
		return this.queue;
	}
}

const message = (topic: string, payload: Uint8Array, properties?: MessageProperties): RawMessage => ({ topic, payload, qos: QoS.AtLeastOnce, retain: false, properties });

const gate = () => {
	let open: () => void = () => {};
	const opened = new Promise<void>((resolve) => {
		open = resolve;
	});
	return { opened, open };
};

const nextDelivery = (client: Client) => new Promise<DeliveryResult>((resolve) => client.once("delivery", resolve));

t.describe("Client", () => {
	let transport: ReturnType<typeof createTransport>;
	let client: Client;

	t.beforeEach(() => {
		transport = createTransport();
		client = new Client({ transport });
	});

	t.afterEach(async () => {
		await client.stop();
	});

	t.describe("Registration", () => {
		t.it("should subscribe to each routed filter on start", async () => {
			client.route("sensors/{room}/temperature", "float", () => undefined, { qos: QoS.AtLeastOnce });
			client.route("sensors/+/temperature", "string", () => undefined);
			client.route("alerts/#", "string", () => undefined, { qos: QoS.ExactlyOnce });

			await client.start();

			t.expect(transport.subscribe).toHaveBeenCalledWith([
				{ filter: "sensors/+/temperature", qos: QoS.AtLeastOnce },
				{ filter: "alerts/#", qos: QoS.ExactlyOnce },
			]);
			t.expect(client.state).toBe(DispatcherState.RUNNING);
		});

		t.it("should refuse routes after start and leave the table unchanged", async () => {
			client.route("a", "string", () => undefined);
			await client.start();

			t.expect(() => client.route("b", "string", () => undefined)).toThrow(AlreadyStartedError);
			t.expect(client.subscriptions()).toEqual([{ filter: "a", qos: QoS.AtMostOnce }]);
		});

		t.it("should refuse a second start", async () => {
			await client.start();

			await t.expect(client.start()).rejects.toThrow("Client already started");
		});

		t.it("should stay idle after a failed subscribe and start on a second attempt", async () => {
			transport.subscribe.mockRejectedValueOnce(new Error("not authorized"));
			client.route("a", "string", () => undefined);

			await t.expect(client.start()).rejects.toThrow("not authorized");
			t.expect(client.state).toBe(DispatcherState.IDLE);
			client.route("b", "string", () => undefined);

			await client.start();

			t.expect(transport.subscribe).toHaveBeenCalledTimes(2);
			t.expect(transport.subscribe).toHaveBeenLastCalledWith([
				{ filter: "a", qos: QoS.AtMostOnce },
				{ filter: "b", qos: QoS.AtMostOnce },
			]);
			t.expect(client.state).toBe(DispatcherState.RUNNING);
		});

		t.it("should refuse routes while a start is subscribing", async () => {
			const subscribed = gate();
			transport.subscribe.mockReturnValueOnce(subscribed.opened);
			const starting = client.start();

			t.expect(() => client.route("a", "string", () => undefined)).toThrow(AlreadyStartedError);
			subscribed.open();
			await starting;
			t.expect(client.state).toBe(DispatcherState.RUNNING);
		});

		t.it("should not start dispatching when stopped during the subscribe", async () => {
			const subscribed = gate();
			transport.subscribe.mockReturnValueOnce(subscribed.opened);
			const starting = client.start();
			await client.stop();
			subscribed.open();

			await t.expect(starting).rejects.toThrow("Client stopped while starting");
			t.expect(client.state).toBe(DispatcherState.STOPPED);
		});

		t.it("should refuse a route whose payload type has no codec", () => {
			t.expect(() => client.route("a", "protobuf", () => undefined)).toThrow(CodecNotFoundError);
			t.expect(client.subscriptions()).toEqual([]);
		});

		t.it("should bind a codec passed in place of a payload type", () => {
			const readings = jsonCodec("reading", Reading);
			client.route<Reading>("readings", readings, () => undefined);

			t.expect(() => client.route("readings/+", "reading", () => undefined)).not.toThrow();
			t.expect(() => client.codec(jsonCodec("reading", Reading))).toThrow(DuplicateCodecError);
		});

		t.it("should include a router's routes under its prefix", async () => {
			const rooms = new Router("rooms");
			rooms.route("{room}/light", "bool", () => undefined);
			const home = new Router("home").include(rooms);

			client.include(home);

			t.expect(client.subscriptions()).toEqual([{ filter: "home/rooms/+/light", qos: QoS.AtMostOnce }]);
		});

		t.it("should include nothing when a router needs a missing codec", () => {
			const router = new Router().route("a", "string", () => undefined).route("b", "protobuf", () => undefined);

			t.expect(() => client.include(router)).toThrow(CodecNotFoundError);
			t.expect(client.subscriptions()).toEqual([]);
		});

		t.it("should include nothing when a router repeats a registered route", () => {
			client.route("b", "string", () => undefined);
			const router = new Router().route("a", "string", () => undefined).route("b", "string", () => undefined);

			t.expect(() => client.include(router)).toThrow(DuplicateRouteError);
			t.expect(client.subscriptions()).toEqual([{ filter: "b", qos: QoS.AtMostOnce }]);
		});

		t.it("should reject an invalid concurrency", () => {
			t.expect(() => new Client({ transport, concurrency: -1 })).toThrow("Concurrency must be a positive integer, got -1");
		});
	});

	t.describe("Dispatch", () => {
		t.it("should deliver typed values decoded by a schema codec", async () => {
			const handler = t.vi.fn();
			client.codec(jsonCodec("reading", Reading)).route<Reading>("readings/{room}", "reading", handler);
			await client.start();
			const delivered = nextDelivery(client);

			transport.queue.push(message("readings/kitchen", encoder.encode('{"room":"kitchen","celsius":21.5}')));
			await delivered;

			t.expect(handler.mock.calls[0][0].value).toEqual({ room: "kitchen", celsius: 21.5 });
			t.expect(handler.mock.calls[0][0].params).toEqual({ room: "kitchen" });
		});

		t.it("should report one decode error for a malformed payload and keep going", async () => {
			const errors: MqrouteError[] = [];
			client.on("error", (error) => errors.push(error));
			const handler = t.vi.fn();
			client.route("counters/+", "int", handler);
			await client.start();

			const failed = nextDelivery(client);
			transport.queue.push(message("counters/a", new Uint8Array()));
			t.expect((await failed).status).toBe("failed");

			const delivered = nextDelivery(client);
			transport.queue.push(message("counters/a", Uint8Array.of(0xff, 0x9c)));
			t.expect((await delivered).status).toBe("delivered");

			t.expect(errors.map((error) => error.message)).toEqual(['Failed to decode 0 byte payload on "counters/a" as "int": invalid integer payload length: 0']);
			t.expect(handler).toHaveBeenCalledTimes(1);
			t.expect(handler.mock.calls[0][0].value).toBe(-100n);
		});

		t.it("should hand shared values to handlers", async () => {
			const seen: unknown[] = [];
			client.provide({ greeting: "hello" }).route("a", "empty", (_message, context) => {
				seen.push(context.shared.greeting);
			});
			await client.start();
			const delivered = nextDelivery(client);

			transport.queue.push(message("a", new Uint8Array()));
			await delivered;

			t.expect(seen).toEqual(["hello"]);
		});

		t.it("should forward unrouted messages", async () => {
			client.route("a", "string", () => undefined);
			await client.start();
			const unrouted = new Promise<RawMessage>((resolve) => client.once("unrouted", resolve));

			transport.queue.push(message("b", new Uint8Array()));

			t.expect((await unrouted).topic).toBe("b");
			t.expect(client.stats().unrouted).toBe(1);
		});

		t.it("should map handler errors registered with catch into error replies", async () => {
			class Overheated extends Error {}
			client.on("error", () => undefined);
			client.catch(Overheated, (error) => new MessagingError(`too hot: ${error.message}`, 503));
			client.route("rpc/heat", "float", () => {
				throw new Overheated("90");
			});
			await client.start();
			const delivered = nextDelivery(client);

			transport.queue.push(message("rpc/heat", new Uint8Array(8), { responseTopic: "rpc/heat/reply", correlationData: Uint8Array.of(1, 2) }));
			await delivered;

			t.expect(transport.publish).toHaveBeenCalledWith("rpc/heat/reply", encoder.encode("too hot: 90"), QoS.AtLeastOnce, false, {
				userProperties: { error: "503" },
				correlationData: Uint8Array.of(1, 2),
			});
		});
	});

	t.describe("Publishing", () => {
		t.it("should encode with a bound codec", async () => {
			await client.publish("flags/ready", "bool", false, { retain: true });

			t.expect(transport.publish).toHaveBeenCalledWith("flags/ready", Uint8Array.of(0), QoS.AtLeastOnce, true, undefined);
		});

		t.it("should encode with a codec passed directly", async () => {
			const shout: Codec<string> = {
				payloadType: "shout",
				encode: (value) => encoder.encode(value.toUpperCase()),
				decode: (payload) => new TextDecoder().decode(payload),
			};

			await client.publish("chat", shout, "hey");

			t.expect(transport.publish).toHaveBeenCalledWith("chat", encoder.encode("HEY"), QoS.AtLeastOnce, false, undefined);
		});
	});

	t.describe("Shutdown", () => {
		t.it("should stop before start and refuse to start afterwards", async () => {
			await client.stop();

			t.expect(client.state).toBe(DispatcherState.STOPPED);
			await t.expect(client.start()).rejects.toThrow(AlreadyStartedError);
			await t.expect(client.wait()).resolves.toBeUndefined();
		});

		t.it("should resolve wait when stopped on request", async () => {
			await client.start();
			const waiting = client.wait();

			await client.stop();

			await t.expect(waiting).resolves.toBeUndefined();
		});

		t.it("should reject wait when the source closes", async () => {
			client.on("error", () => undefined);
			await client.start();

			transport.queue.close();

			await t.expect(client.wait()).rejects.toBeInstanceOf(SourceClosedError);
			t.expect(client.state).toBe(DispatcherState.STOPPED);
		});
	});

	t.describe("Transport errors", () => {
		t.afterEach(() => {
			t.vi.restoreAllMocks();
		});

		t.it("should forward errors the transport reports", () => {
			const reporting = new ReportingTransport();
			const reported = new Client({ transport: reporting });
			const errors: MqrouteError[] = [];
			reported.on("error", (error) => errors.push(error));
			const error = new TransportError("MQTT client error: connection refused");

			reporting.emit("error", error);

			t.expect(errors).toEqual([error]);
		});

		t.it("should listen once when the source and sink are the same object", () => {
			const reporting = new ReportingTransport();
			const reported = new Client({ source: reporting, sink: reporting });
			const listener = t.vi.fn();
			reported.on("error", listener);

			reporting.emit("error", new TransportError("MQTT client error: connection refused"));

			t.expect(listener).toHaveBeenCalledTimes(1);
		});

		t.it("should forward errors from a separate sink", () => {
			const sink = new ReportingTransport();
			const reported = new Client({ source: transport, sink });
			const listener = t.vi.fn();
			reported.on("error", listener);
			const error = new TransportError("Publish timed out after 50 ms");

			sink.emit("error", error);

			t.expect(listener).toHaveBeenCalledWith(error);
		});

		t.it("should warn when nothing listens for transport errors", () => {
			const warn = t.vi.spyOn(console, "warn").mockImplementation(() => undefined);
			const reporting = new ReportingTransport();
			new Client({ transport: reporting });

			reporting.emit("error", new TransportError("MQTT client error: connection refused"));

			t.expect(warn).toHaveBeenCalledWith("Client: MQTT client error: connection refused");
		});
	});
});
