import { describe, expect, it } from "vitest";
import { FakeClock } from "../shared/time.js";
import { MonitorPhase, MonitorPhaseMachine, PhaseErrorKind } from "./phase-machine.js";

function createMachine() {
	const clock = new FakeClock(1000);
	const machine = new MonitorPhaseMachine(clock);
	return { machine, clock };
}

describe("MonitorPhaseMachine", () => {
	it("starts Idle", () => {
		const { machine } = createMachine();
		expect(machine.phase()).toBe(MonitorPhase.Idle);
		expect(machine.snapshot()).toEqual({
			phase: MonitorPhase.Idle,
			enteredAt: 1000,
			metadata: { type: "none" },
		});
	});

	it("walks a full cycle back to Idle", () => {
		const { machine } = createMachine();

		expect(machine.transition({ type: "begin_cycle", cycle: 3 })).toEqual({
			ok: true,
			value: MonitorPhase.Selecting,
		});
		machine.transition({ type: "domains_selected", count: 4 });
		expect(machine.snapshot().metadata).toEqual({ type: "checking", cycle: 3, domains: 4 });
		machine.transition({ type: "checks_done" });
		machine.transition({ type: "report_done" });
		expect(machine.phase()).toBe(MonitorPhase.Sleeping);
		machine.transition({ type: "wake" });

		expect(machine.phase()).toBe(MonitorPhase.Idle);
		expect(machine.history().map((h) => h.transition)).toEqual([
			"begin_cycle",
			"domains_selected",
			"checks_done",
			"report_done",
			"wake",
		]);
	});

	it("rejects a skipped phase", () => {
		const { machine } = createMachine();

		const result = machine.transition({ type: "checks_done" });

		expect(result).toEqual({
			ok: false,
			error: {
				kind: PhaseErrorKind.InvalidTransition,
				message: "Cannot transition from idle via checks_done",
				from: MonitorPhase.Idle,
				transition: "checks_done",
			},
		});
		expect(machine.phase()).toBe(MonitorPhase.Idle);
	});

	it("fails from inside a cycle into Sleeping", () => {
		const { machine } = createMachine();
		machine.transition({ type: "begin_cycle", cycle: 1 });
		machine.transition({ type: "domains_selected", count: 1 });

		expect(machine.transition({ type: "fail", reason: "boom" }).ok).toBe(true);
		expect(machine.snapshot().metadata).toEqual({ type: "failed", reason: "boom" });
		expect(machine.phase()).toBe(MonitorPhase.Sleeping);
	});

	it("cannot fail while Idle", () => {
		const { machine } = createMachine();
		expect(machine.transition({ type: "fail", reason: "x" }).ok).toBe(false);
	});

	it("Stopped is terminal", () => {
		const { machine } = createMachine();
		machine.transition({ type: "stop" });

		const result = machine.transition({ type: "wake" });

		expect(result.ok).toBe(false);
		if (result.ok) return;
		expect(result.error.kind).toBe(PhaseErrorKind.AlreadyStopped);
	});

	it("tracks time in phase", () => {
		const { machine, clock } = createMachine();
		machine.transition({ type: "begin_cycle", cycle: 1 });
		clock.advance(250);
		expect(machine.timeInPhase()).toBe(250);
	});

	it("bounds the history", () => {
		const { machine } = createMachine();
		for (let i = 0; i < 30; i++) {
			machine.transition({ type: "begin_cycle", cycle: i });
			machine.transition({ type: "domains_selected", count: 0 });
			machine.transition({ type: "checks_done" });
			machine.transition({ type: "report_done" });
			machine.transition({ type: "wake" });
		}
		expect(machine.history()).toHaveLength(100);
	});
});
