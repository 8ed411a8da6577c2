/**
 * StateStore — the single owner of TrackerState.
 *
 * Reads are served from the in-memory copy. Every mutation is queued behind
 * the previous one (one writer at a time), applied through the transition
 * engine, and persisted before its promise resolves. A failed save does not
 * undo the in-memory change; the receipt reports `persisted: false`.
 */

import { normalizeDomain, validateDomain } from "../domain/domain-name.js";
import { type DomainStats, computeStats, domainRows } from "../domain/stats.js";
import { applyVerdict, releaseNotification, resetEntry } from "../domain/transition.js";
import {
	type DomainEntry,
	type TrackerState,
	type Verdict,
	createDomainEntry,
	entryFor,
	isAlerted,
} from "../domain/types.js";
import type { Logger } from "../lib/logger/index.js";
import {
	CommandErrorKind,
	CommandValidationError,
	StoreIOError,
	toError,
} from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import type { Clock } from "../shared/time.js";

export interface MutationReceipt<T> {
	readonly value: T;
	/** False when the in-memory change could not be written out */
	readonly persisted: boolean;
}

export interface VerdictReceipt {
	readonly domain: string;
	readonly entry: DomainEntry;
	readonly shouldNotify: boolean;
	readonly changed: boolean;
	readonly persisted: boolean;
}

export type CommandMutation = Promise<Result<MutationReceipt<string>, CommandValidationError>>;

export interface StateStore {
	snapshot(): TrackerState;
	/** Every domain except those already Available and alerted, sorted. */
	domainsToCheck(): string[];
	addDomain(raw: string): CommandMutation;
	removeDomain(raw: string): CommandMutation;
	resetDomain(raw: string): CommandMutation;
	/** Creates the entry when the domain is unseen. */
	recordVerdict(domain: string, verdict: Verdict): Promise<VerdictReceipt>;
	/** Re-open the gate of the given streak; value is whether anything changed. */
	releaseNotification(domain: string, streakStartedAt: number | null): Promise<MutationReceipt<boolean>>;
	/** Bump and persist the cycle counter; value is the new cycle number. */
	beginCycle(): Promise<MutationReceipt<number>>;
	stats(): DomainStats;
	/** Resolves once every queued mutation has settled. */
	flush(): Promise<void>;
}

export interface StateStoreDeps {
	readonly clock: Clock;
	readonly logger: Logger;
}

const noop = (): void => {};

/**
 * Queueing and mutation logic shared by the file and memory stores.
 * Subclasses only decide where a committed state goes.
 */
export abstract class BaseStateStore implements StateStore {
	protected state: TrackerState;
	protected readonly clock: Clock;
	protected readonly logger: Logger;
	private queue: Promise<void> = Promise.resolve();

	protected constructor(initial: TrackerState, deps: StateStoreDeps) {
		this.state = initial;
		this.clock = deps.clock;
		this.logger = deps.logger;
	}

	/** Write a committed state out. Throwing marks the mutation unpersisted. */
	protected abstract write(state: TrackerState): Promise<void>;

	snapshot(): TrackerState {
		return this.state;
	}

	domainsToCheck(): string[] {
		return domainRows(this.state, (entry) => !isAlerted(entry)).map((row) => row.domain);
	}

	stats(): DomainStats {
		return computeStats(this.state);
	}

	addDomain(raw: string): CommandMutation {
		return this.exclusive(async (): CommandMutation => {
			const valid = validateDomain(raw);
			if (!valid.ok) return valid;
			const domain = valid.value;
			if (entryFor(this.state, domain) !== undefined) {
				return err(
					new CommandValidationError(
						CommandErrorKind.DuplicateDomain,
						`Domain ${domain} is already being monitored`,
						{ domain },
					),
				);
			}
			const persisted = await this.commit({
				...this.state,
				domains: { ...this.state.domains, [domain]: createDomainEntry() },
			});
			return ok({ value: domain, persisted });
		});
	}

	removeDomain(raw: string): CommandMutation {
		return this.exclusive(async (): CommandMutation => {
			const valid = validateDomain(raw);
			if (!valid.ok) return valid;
			const domain = valid.value;
			if (entryFor(this.state, domain) === undefined) return err(notFound(domain));
			const { [domain]: _removed, ...rest } = this.state.domains;
			const persisted = await this.commit({ ...this.state, domains: rest });
			return ok({ value: domain, persisted });
		});
	}

	resetDomain(raw: string): CommandMutation {
		return this.exclusive(async (): CommandMutation => {
			const valid = validateDomain(raw);
			if (!valid.ok) return valid;
			const domain = valid.value;
			const entry = entryFor(this.state, domain);
			if (entry === undefined) return err(notFound(domain));
			const persisted = await this.commit(
				withEntry(this.state, domain, resetEntry(entry, this.clock.now())),
			);
			return ok({ value: domain, persisted });
		});
	}

	recordVerdict(raw: string, verdict: Verdict): Promise<VerdictReceipt> {
		return this.exclusive(async () => {
			const domain = normalizeDomain(raw);
			const current = entryFor(this.state, domain) ?? createDomainEntry();
			const outcome = applyVerdict(current, verdict, this.clock.now());
			const persisted = await this.commit(withEntry(this.state, domain, outcome.entry));
			return { domain, ...outcome, persisted };
		});
	}

	releaseNotification(
		raw: string,
		streakStartedAt: number | null,
	): Promise<MutationReceipt<boolean>> {
		return this.exclusive(async () => {
			const domain = normalizeDomain(raw);
			const entry = entryFor(this.state, domain);
			if (entry === undefined) return { value: false, persisted: true };
			const released = releaseNotification(entry, streakStartedAt);
			if (released === entry) return { value: false, persisted: true };
			const persisted = await this.commit(withEntry(this.state, domain, released));
			return { value: true, persisted };
		});
	}

	beginCycle(): Promise<MutationReceipt<number>> {
		return this.exclusive(async () => {
			const cycle = this.state.totalChecks + 1;
			const persisted = await this.commit({ ...this.state, totalChecks: cycle });
			return { value: cycle, persisted };
		});
	}

	async flush(): Promise<void> {
		await this.queue;
	}

	/** Run `task` after every previously queued mutation has settled. */
	protected exclusive<T>(task: () => Promise<T>): Promise<T> {
		const run = this.queue.then(task);
		this.queue = run.then(noop, noop);
		return run;
	}

	private async commit(next: TrackerState): Promise<boolean> {
		this.state = { ...next, lastUpdatedAt: this.clock.now() };
		try {
			await this.write(this.state);
			return true;
		} catch (error: unknown) {
			const cause = toError(error);
			const ioError = new StoreIOError(`Failed to save state: ${cause.message}`, { cause });
			this.logger.error({ err: ioError }, "state save failed; change kept in memory only");
			return false;
		}
	}
}

function withEntry(state: TrackerState, domain: string, entry: DomainEntry): TrackerState {
	return { ...state, domains: { ...state.domains, [domain]: entry } };
}

function notFound(domain: string): CommandValidationError {
	return new CommandValidationError(
		CommandErrorKind.DomainNotFound,
		`Domain ${domain} is not being monitored`,
		{ domain },
	);
}
