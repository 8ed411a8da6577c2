import { describe, expect, it } from "vitest";
import { Verdict } from "../domain/types.js";
import { silentLogger } from "../lib/logger/index.js";
import { LookupNotFoundError } from "../shared/errors.js";
import { AvailabilityProber } from "./availability-prober.js";
import type { DomainLookup, LookupResponse } from "./types.js";

type Behaviour = LookupResponse | Error | "hang";

function fakeLookup(name: string, behaviour: Behaviour): DomainLookup & { calls: string[] } {
	const calls: string[] = [];
	return {
		name,
		calls,
		lookup(domain: string, signal: AbortSignal): Promise<LookupResponse> {
			calls.push(domain);
			if (behaviour === "hang") {
				return new Promise((_, reject) => {
					signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
				});
			}
			return behaviour instanceof Error ? Promise.reject(behaviour) : Promise.resolve(behaviour);
		},
	};
}

function createProber(primary: Behaviour, secondary: Behaviour) {
	const rdap = fakeLookup("rdap", primary);
	const whois = fakeLookup("whois", secondary);
	const prober = new AvailabilityProber({
		primary: rdap,
		secondary: whois,
		timeouts: { primaryMs: 30, secondaryMs: 30 },
		logger: silentLogger(),
	});
	return { prober, rdap, whois };
}

const REGISTERED: LookupResponse = { text: "{}", fields: { registrar: "Example Registrar" } };
const NO_MATCH: LookupResponse = { text: 'No match for "FREE.TEST".', fields: {} };
const AMBIGUOUS: LookupResponse = { text: "try again later", fields: {} };

describe("AvailabilityProber", () => {
	it("classifies a successful primary reply without asking the secondary", async () => {
		const { prober, whois } = createProber(REGISTERED, NO_MATCH);

		expect(await prober.explain("example.com")).toEqual({
			domain: "example.com",
			verdict: Verdict.Unavailable,
			stage: "primary",
			reason: 'registration field "registrar" present',
		});
		expect(whois.calls).toEqual([]);
	});

	it("primary not-found answers available", async () => {
		const { prober, whois } = createProber(new LookupNotFoundError("RDAP: domain not found"), REGISTERED);

		expect(await prober.probe("free.com")).toBe(Verdict.Available);
		expect(whois.calls).toEqual([]);
	});

	it("a not-found message from the primary answers available", async () => {
		const { prober } = createProber(new Error("Object does not exist"), REGISTERED);

		expect(await prober.probe("free.com")).toBe(Verdict.Available);
	});

	it("falls back to the secondary after a primary network error", async () => {
		const { prober, whois } = createProber(new Error("fetch failed"), NO_MATCH);

		expect(await prober.explain("free.test")).toEqual({
			domain: "free.test",
			verdict: Verdict.Available,
			stage: "secondary",
			reason: 'reply matched "no match"',
		});
		expect(whois.calls).toEqual(["free.test"]);
	});

	it("defaults to unavailable for an ambiguous secondary reply", async () => {
		const { prober } = createProber(new Error("fetch failed"), AMBIGUOUS);

		expect(await prober.probe("maybe.test")).toBe(Verdict.Unavailable);
	});

	it("secondary not-found answers available", async () => {
		const { prober } = createProber(new Error("fetch failed"), new LookupNotFoundError("gone"));

		expect(await prober.probe("free.test")).toBe(Verdict.Available);
	});

	it("times out both stages and degrades to unavailable", async () => {
		const { prober, rdap, whois } = createProber("hang", "hang");

		expect(await prober.explain("slow.test")).toEqual({
			domain: "slow.test",
			verdict: Verdict.Unavailable,
			stage: "secondary",
			reason: "PROBE_TIMEOUT",
		});
		expect(rdap.calls).toEqual(["slow.test"]);
		expect(whois.calls).toEqual(["slow.test"]);
	});

	it("never rejects, whatever the secondary throws", async () => {
		const { prober } = createProber(new Error("fetch failed"), new Error("ECONNRESET boom"));

		await expect(prober.probe("x.test")).resolves.toBe(Verdict.Unavailable);
	});
});
