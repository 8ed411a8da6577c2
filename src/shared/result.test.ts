import { describe, expect, it } from "vitest";
import { err, map, ok } from "./result.js";

describe("Result", () => {
	it("ok and err carry their payload", () => {
		expect(ok(1)).toEqual({ ok: true, value: 1 });
		expect(err("boom")).toEqual({ ok: false, error: "boom" });
	});

	it("map transforms only successes", () => {
		expect(map(ok(2), (n) => n * 3)).toEqual(ok(6));
		expect(map(err("e"), (n: number) => n * 3)).toEqual(err("e"));
	});
});
