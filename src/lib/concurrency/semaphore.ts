import { ConfigError } from "../../shared/errors.js";

/**
 * Counting semaphore bounding how many async tasks run at once.
 *
 * Waiters are served FIFO. `run()` always releases its permit, whether the
 * task resolves or rejects.
 */
export class Semaphore {
	private readonly capacity: number;
	private inUse = 0;
	private readonly waiters: Array<() => void> = [];

	constructor(capacity: number) {
		if (!Number.isInteger(capacity) || capacity < 1) {
			throw new ConfigError("semaphore capacity must be a positive integer", { capacity });
		}
		this.capacity = capacity;
	}

	/** Permits currently held. */
	active(): number {
		return this.inUse;
	}

	/** Tasks waiting for a permit. */
	pending(): number {
		return this.waiters.length;
	}

	acquire(): Promise<void> {
		if (this.inUse < this.capacity) {
			this.inUse++;
			return Promise.resolve();
		}
		return new Promise((resolve) => {
			this.waiters.push(() => {
				this.inUse++;
				resolve();
			});
		});
	}

	release(): void {
		if (this.inUse === 0) return;
		this.inUse--;
		const next = this.waiters.shift();
		if (next) next();
	}

	async run<T>(task: () => Promise<T>): Promise<T> {
		await this.acquire();
		try {
			return await task();
		} finally {
			this.release();
		}
	}
}
