import { type TrackerState, emptyTrackerState } from "../domain/types.js";
import { BaseStateStore, type StateStoreDeps } from "./state-store.js";

/**
 * StateStore that keeps everything in memory. Same queueing and transition
 * semantics as FileStateStore; used by tests and dry runs.
 */
export class MemoryStateStore extends BaseStateStore {
	private writes = 0;
	private failWrites = false;

	constructor(deps: StateStoreDeps, initial: TrackerState = emptyTrackerState()) {
		super(initial, deps);
	}

	/** Number of states committed so far. */
	writeCount(): number {
		return this.writes;
	}

	/** Make subsequent writes fail, to exercise the unpersisted path. */
	setWriteFailure(fail: boolean): void {
		this.failWrites = fail;
	}

	protected async write(_state: TrackerState): Promise<void> {
		if (this.failWrites) {
			throw new Error("simulated write failure");
		}
		this.writes++;
	}
}
