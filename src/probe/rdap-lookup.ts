/**
 * RDAP lookup over HTTPS. A 404 from the bootstrap service means the registry
 * has no record of the name.
 */

import { validate, z } from "../lib/validation/index.js";
import {
	LookupNotFoundError,
	ProbeNetworkError,
	ProbeUnclassifiedError,
} from "../shared/errors.js";
import { type FetchFn, defaultFetch } from "../shared/fetch.js";
import type { DomainLookup, LookupResponse } from "./types.js";

export const DEFAULT_RDAP_BASE_URL = "https://rdap.org/domain/";

export interface RdapLookupConfig {
	readonly baseUrl?: string;
	readonly fetchFn?: FetchFn;
}

const rdapEventSchema = z.object({
	eventAction: z.string(),
	eventDate: z.string().optional(),
});

const rdapEntitySchema = z.object({
	roles: z.array(z.string()).optional(),
	handle: z.string().optional(),
	vcardArray: z.unknown().optional(),
});

const rdapDomainSchema = z
	.object({
		ldhName: z.string().optional(),
		status: z.array(z.string()).optional(),
		events: z.array(rdapEventSchema).optional(),
		entities: z.array(rdapEntitySchema).optional(),
	})
	.passthrough();

export type RdapDomain = z.infer<typeof rdapDomainSchema>;

const vcardSchema = z.tuple([z.literal("vcard"), z.array(z.array(z.unknown()))]);

const EVENT_FIELDS: Readonly<Record<string, string>> = {
	registration: "created",
	expiration: "expiry_date",
	"last changed": "updated",
};

export class RdapLookup implements DomainLookup {
	readonly name = "rdap";
	private readonly baseUrl: string;
	private readonly fetchFn: FetchFn;

	constructor(config: RdapLookupConfig = {}) {
		this.baseUrl = config.baseUrl ?? DEFAULT_RDAP_BASE_URL;
		this.fetchFn = config.fetchFn ?? defaultFetch;
	}

	async lookup(domain: string, signal: AbortSignal): Promise<LookupResponse> {
		const url = `${this.baseUrl}${encodeURIComponent(domain)}`;
		const response = await this.fetchFn(url, {
			headers: { accept: "application/rdap+json, application/json" },
			signal,
		});

		if (response.status === 404) {
			throw new LookupNotFoundError(`RDAP: domain not found (${domain})`, { domain });
		}
		if (!response.ok) {
			throw new ProbeNetworkError(`RDAP HTTP ${response.status}`, {
				domain,
				status: response.status,
			});
		}

		const text = await response.text();
		let body: unknown;
		try {
			body = JSON.parse(text);
		} catch (error: unknown) {
			throw new ProbeUnclassifiedError("RDAP reply is not JSON", { domain, cause: error });
		}
		const parsed = validate(rdapDomainSchema, body);
		if (!parsed.ok) {
			throw new ProbeUnclassifiedError(
				`RDAP reply has an unexpected shape: ${parsed.error.describe()}`,
				{ domain, cause: parsed.error },
			);
		}
		return { text, fields: rdapFields(parsed.value) };
	}
}

/** Map an RDAP domain object onto the WHOIS-style field names. */
export function rdapFields(rdap: RdapDomain): Record<string, unknown> {
	const fields: Record<string, unknown> = {};
	if (rdap.ldhName !== undefined) fields["domain_name"] = rdap.ldhName.toLowerCase();
	if (rdap.status !== undefined && rdap.status.length > 0) fields["status"] = rdap.status;

	for (const event of rdap.events ?? []) {
		const key = EVENT_FIELDS[event.eventAction.toLowerCase()];
		if (key !== undefined && event.eventDate !== undefined) fields[key] = event.eventDate;
	}

	const registrar = rdap.entities?.find((e) => e.roles?.includes("registrar"));
	if (registrar !== undefined) {
		fields["registrar"] = vcardFullName(registrar.vcardArray) ?? registrar.handle ?? null;
	}
	return fields;
}

function vcardFullName(vcard: unknown): string | undefined {
	const parsed = vcardSchema.safeParse(vcard);
	if (!parsed.success) return undefined;
	for (const property of parsed.data[1]) {
		const [name, , , value] = property;
		if (name === "fn" && typeof value === "string") return value;
	}
	return undefined;
}
