import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { applyVerdict, releaseNotification, resetEntry } from "./transition.js";
import { type DomainEntry, DomainStatus, Verdict, createDomainEntry } from "./types.js";

const verdictArb = fc.constantFrom(Verdict.Available, Verdict.Unavailable);
const verdictsArb = fc.array(verdictArb, { maxLength: 60 });

/** Number of maximal runs of Available in the sequence. */
function countAvailableRuns(verdicts: readonly Verdict[]): number {
	let runs = 0;
	let previous: Verdict | null = null;
	for (const v of verdicts) {
		if (v === Verdict.Available && previous !== Verdict.Available) runs++;
		previous = v;
	}
	return runs;
}

function assertInvariants(entry: DomainEntry, seenAvailable: boolean): void {
	if (entry.notificationSent) {
		expect(entry.status).toBe(DomainStatus.Available);
	}
	expect(entry.firstAvailableAt !== null).toBe(seenAvailable);
}

describe("transition engine (property-based)", () => {
	it("notifies exactly once per contiguous Available run", () => {
		fc.assert(
			fc.property(verdictsArb, (verdicts) => {
				let entry = createDomainEntry();
				let notifications = 0;
				let previous: Verdict | null = null;
				verdicts.forEach((verdict, i) => {
					const outcome = applyVerdict(entry, verdict, i * 1000);
					if (outcome.shouldNotify) {
						notifications++;
						// only ever at the first element of a run
						expect(verdict).toBe(Verdict.Available);
						expect(previous).not.toBe(Verdict.Available);
					}
					entry = outcome.entry;
					previous = verdict;
				});
				expect(notifications).toBe(countAvailableRuns(verdicts));
			}),
			{ numRuns: 500 },
		);
	});

	it("keeps the gate and history invariants after every step", () => {
		fc.assert(
			fc.property(verdictsArb, (verdicts) => {
				let entry = createDomainEntry();
				let seenAvailable = false;
				verdicts.forEach((verdict, i) => {
					entry = applyVerdict(entry, verdict, i * 1000).entry;
					seenAvailable ||= verdict === Verdict.Available;
					assertInvariants(entry, seenAvailable);
				});
			}),
			{ numRuns: 500 },
		);
	});

	it("re-applying the same verdict is idempotent apart from lastCheckedAt", () => {
		fc.assert(
			fc.property(verdictsArb, verdictArb, (prefix, verdict) => {
				let entry = createDomainEntry();
				prefix.forEach((v, i) => {
					entry = applyVerdict(entry, v, i * 1000).entry;
				});
				const first = applyVerdict(entry, verdict, 1_000_000);
				const second = applyVerdict(first.entry, verdict, 2_000_000);

				expect(second.shouldNotify).toBe(false);
				expect(second.changed).toBe(false);
				expect(second.entry).toEqual({ ...first.entry, lastCheckedAt: 2_000_000 });
			}),
			{ numRuns: 500 },
		);
	});

	it("after a reset the next Available verdict notifies", () => {
		fc.assert(
			fc.property(verdictsArb, (prefix) => {
				let entry = createDomainEntry();
				prefix.forEach((v, i) => {
					entry = applyVerdict(entry, v, i * 1000).entry;
				});
				const historyBefore = entry.firstAvailableAt;
				const reset = resetEntry(entry, 5_000_000);

				expect(reset.status).toBe(DomainStatus.Unknown);
				expect(reset.notificationSent).toBe(false);
				expect(reset.firstAvailableAt).toBe(historyBefore);
				expect(applyVerdict(reset, Verdict.Available, 6_000_000).shouldNotify).toBe(true);
			}),
			{ numRuns: 300 },
		);
	});

	it("with failed sends released, each run delivers once iff some attempt succeeds", () => {
		const stepArb = fc.record({ verdict: verdictArb, sendOk: fc.boolean() });
		fc.assert(
			fc.property(fc.array(stepArb, { maxLength: 60 }), (steps) => {
				let entry = createDomainEntry();
				const delivered: number[] = [];
				const expected: boolean[] = [];
				let previous: Verdict | null = null;

				steps.forEach(({ verdict, sendOk }, i) => {
					if (verdict === Verdict.Available && previous !== Verdict.Available) {
						delivered.push(0);
						expected.push(false);
					}
					const run = delivered.length - 1;
					if (verdict === Verdict.Available && sendOk) expected[run] = true;
					const outcome = applyVerdict(entry, verdict, i * 1000);
					entry = outcome.entry;
					if (outcome.shouldNotify) {
						if (sendOk) {
							delivered[run] = (delivered[run] ?? 0) + 1;
						} else {
							entry = releaseNotification(entry, entry.firstAvailableAt);
						}
					}
					previous = verdict;
				});

				for (let run = 0; run < delivered.length; run++) {
					expect(delivered[run]).toBe(expected[run] ? 1 : 0);
				}
			}),
			{ numRuns: 500 },
		);
	});
});
