import { bench, describe } from "vitest";
import { applyVerdict } from "../src/domain/transition.js";
import { Verdict, createDomainEntry } from "../src/domain/types.js";

describe("transition engine", () => {
	bench("1000 alternating verdicts", () => {
		let entry = createDomainEntry();
		for (let i = 0; i < 1000; i++) {
			const verdict = i % 3 === 0 ? Verdict.Unavailable : Verdict.Available;
			entry = applyVerdict(entry, verdict, i).entry;
		}
	});
});
