import * as t from "vitest";
import { InvalidTopicFilterError } from "../domain/errors";
import { QoS } from "../domain/qos";
import { RouteTable } from "./route-table";
import { Router } from "./router";

const noop = () => undefined;

t.describe("Router", () => {
	t.it("should qualify filters with its prefix", () => {
		const router = new Router("sensors").route("{room}/temperature", "float", noop).route("#", "bytes", noop);

		t.expect(router.filters()).toEqual(["sensors/{room}/temperature", "sensors/#"]);
	});

	t.it("should leave filters alone without a prefix", () => {
		t.expect(new Router().route("a/b", "string", noop).filters()).toEqual(["a/b"]);
	});

	t.it("should nest routers under the outer prefix", () => {
		const inner = new Router("lights").route("{id}/on", "bool", noop);
		const outer = new Router("home").include(inner).route("status", "string", noop);

		t.expect(outer.filters()).toEqual(["home/lights/{id}/on", "home/status"]);
	});

	t.it("should reject malformed filters when declared", () => {
		t.expect(() => new Router("a/#").route("b", "string", noop)).toThrow(InvalidTopicFilterError);
	});

	t.it("should register its routes in a table with their options", async () => {
		const handler = t.vi.fn(() => undefined);
		const table = new RouteTable();
		new Router("home").route("{room}/light", "bool", handler, { qos: QoS.AtLeastOnce }).registerIn(table);

		const [route] = table.resolve("home/kitchen/light");
		t.expect(route.filter.source).toBe("home/{room}/light");
		t.expect(route.payloadType).toBe("bool");
		t.expect(route.qos).toBe(QoS.AtLeastOnce);

		const context = { filter: "home/{room}/light", payloadType: "bool", shared: {}, publish: t.vi.fn() };
		const message = { topic: "home/kitchen/light", payload: Uint8Array.of(1), qos: QoS.AtMostOnce, retain: false, value: true, params: { room: "kitchen" }, rest: null };
		await route.handle(message, context);
		t.expect(handler).toHaveBeenCalledWith(message, context);
	});
});
