import * as t from "vitest";
import { retry } from "./retry";

t.describe("retry", () => {
	t.it("should return the result of a first successful attempt", async () => {
		const fn = t.vi.fn().mockResolvedValue("granted");

		t.expect(await retry(fn, { attempts: 3, delay: 100 })).toBe("granted");
		t.expect(fn).toHaveBeenCalledTimes(1);
	});

	t.it("should retry until an attempt succeeds", async () => {
		const fn = t.vi.fn().mockRejectedValueOnce(new Error("first failure")).mockResolvedValueOnce("granted");

		t.expect(await retry(fn, { attempts: 3, delay: 1 })).toBe("granted");
		t.expect(fn).toHaveBeenCalledTimes(2);
	});

	t.it("should rethrow the last error once attempts run out", async () => {
		const last = new Error("final failure");
		const fn = t.vi.fn().mockRejectedValueOnce(new Error("fail 1")).mockRejectedValueOnce(new Error("fail 2")).mockRejectedValue(last);

		await t.expect(retry(fn, { attempts: 3, delay: 1 })).rejects.toBe(last);
		t.expect(fn).toHaveBeenCalledTimes(3);
	});

	t.it("should stop at once for errors that are not retryable", async () => {
		const fatal = new TypeError("not authorized");
		const fn = t.vi.fn().mockRejectedValue(fatal);

		await t.expect(retry(fn, { attempts: 5, delay: 1, retryIf: (error) => !(error instanceof TypeError) })).rejects.toBe(fatal);
		t.expect(fn).toHaveBeenCalledTimes(1);
	});

	t.it("should announce each retry with the failed attempt number", async () => {
		const onRetry = t.vi.fn();
		const first = new Error("fail 1");
		const fn = t.vi.fn().mockRejectedValueOnce(first).mockResolvedValueOnce("ok");

		await retry(fn, { attempts: 2, delay: 0, onRetry });

		t.expect(onRetry).toHaveBeenCalledTimes(1);
		t.expect(onRetry).toHaveBeenCalledWith(first, 1);
	});

	t.it("should refuse zero attempts without calling the function", async () => {
		const fn = t.vi.fn();

		await t.expect(retry(fn, { attempts: 0, delay: 100 })).rejects.toThrow("Retry needs at least one attempt, got 0");
		t.expect(fn).not.toHaveBeenCalled();
	});

	t.it("should back off exponentially between attempts", async () => {
		const fn = t.vi.fn().mockRejectedValue(new Error("down"));
		const startTime = Date.now();

		await t.expect(retry(fn, { attempts: 3, delay: 10 })).rejects.toThrow("down");

		// 10ms then 20ms, with some tolerance for timer granularity
		t.expect(Date.now() - startTime).toBeGreaterThanOrEqual(25);
	});
});
