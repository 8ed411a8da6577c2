/**
 * AvailabilityProber — RDAP first, WHOIS as fallback, verdict always.
 *
 * Each stage runs under its own deadline. Whatever goes wrong (timeout,
 * socket error, unexpected reply) ends as Unavailable and a log line; the
 * returned promise never rejects.
 */

import { Verdict } from "../domain/types.js";
import { withTimeout } from "../lib/concurrency/timeout.js";
import type { Logger } from "../lib/logger/index.js";
import {
	ProbeTimeoutError,
	type WatchError,
	classifyProbeError,
	isLookupNotFound,
} from "../shared/errors.js";
import type { FetchFn } from "../shared/fetch.js";
import { type Result, err, ok } from "../shared/result.js";
import { type Classification, classifyLookupResponse, classifyPrimaryError } from "./classifier.js";
import { RdapLookup } from "./rdap-lookup.js";
import {
	type DomainAvailabilityProbe,
	type DomainLookup,
	type LookupResponse,
	type ProbeReport,
	ProbeStage,
	type ProbeTimeouts,
} from "./types.js";
import { WhoisLookup } from "./whois-lookup.js";

export interface AvailabilityProberDeps {
	readonly primary: DomainLookup;
	readonly secondary: DomainLookup;
	readonly timeouts: ProbeTimeouts;
	readonly logger: Logger;
}

export class AvailabilityProber implements DomainAvailabilityProbe {
	private readonly primary: DomainLookup;
	private readonly secondary: DomainLookup;
	private readonly timeouts: ProbeTimeouts;
	private readonly log: Logger;

	constructor(deps: AvailabilityProberDeps) {
		this.primary = deps.primary;
		this.secondary = deps.secondary;
		this.timeouts = deps.timeouts;
		this.log = deps.logger.child({ module: "probe" });
	}

	async probe(domain: string): Promise<Verdict> {
		const report = await this.explain(domain);
		return report.verdict;
	}

	/** Like `probe`, with the stage and rule that decided. */
	async explain(domain: string): Promise<ProbeReport> {
		try {
			return await this.evaluate(domain);
		} catch (error: unknown) {
			const classified = classifyProbeError(error);
			this.log.error({ domain, err: classified }, "probe failed unexpectedly");
			return report(domain, ProbeStage.Secondary, {
				verdict: Verdict.Unavailable,
				reason: classified.code,
			});
		}
	}

	private async evaluate(domain: string): Promise<ProbeReport> {
		const primary = await this.attempt(this.primary, domain, this.timeouts.primaryMs);
		if (primary.ok) {
			return report(domain, ProbeStage.Primary, classifyLookupResponse(primary.value));
		}

		const early = classifyPrimaryError(primary.error);
		if (early !== null) {
			return report(domain, ProbeStage.Primary, early);
		}
		this.log.debug(
			{ domain, code: primary.error.code, reason: primary.error.message },
			`${this.primary.name} lookup failed; falling back to ${this.secondary.name}`,
		);

		const secondary = await this.attempt(this.secondary, domain, this.timeouts.secondaryMs);
		if (secondary.ok) {
			return report(domain, ProbeStage.Secondary, classifyLookupResponse(secondary.value));
		}
		if (isLookupNotFound(secondary.error)) {
			return report(domain, ProbeStage.Secondary, {
				verdict: Verdict.Available,
				reason: "registry has no record",
			});
		}

		this.log.warn(
			{ domain, code: secondary.error.code, reason: secondary.error.message },
			"all lookups failed; treating domain as unavailable",
		);
		return report(domain, ProbeStage.Secondary, {
			verdict: Verdict.Unavailable,
			reason: secondary.error.code,
		});
	}

	private async attempt(
		lookup: DomainLookup,
		domain: string,
		timeoutMs: number,
	): Promise<Result<LookupResponse, WatchError>> {
		const controller = new AbortController();
		try {
			const response = await withTimeout(
				lookup.lookup(domain, controller.signal),
				timeoutMs,
				() =>
					new ProbeTimeoutError(`${lookup.name} lookup timed out after ${timeoutMs}ms`, {
						domain,
					}),
			);
			return ok(response);
		} catch (error: unknown) {
			return err(classifyProbeError(error));
		} finally {
			// stops the socket or request still running after a timeout
			controller.abort();
		}
	}
}

function report(domain: string, stage: ProbeStage, c: Classification): ProbeReport {
	return { domain, stage, verdict: c.verdict, reason: c.reason };
}

export interface ProberOptions {
	readonly timeouts: ProbeTimeouts;
	readonly logger: Logger;
	readonly fetchFn?: FetchFn;
}

/** Prober over the public RDAP bootstrap service and WHOIS. */
export function createAvailabilityProber(options: ProberOptions): AvailabilityProber {
	return new AvailabilityProber({
		primary: new RdapLookup({ fetchFn: options.fetchFn }),
		secondary: new WhoisLookup(),
		timeouts: options.timeouts,
		logger: options.logger,
	});
}
