/**
 * WHOIS lookup over TCP port 43.
 *
 * Two hops: ask IANA which server is authoritative for the TLD (`refer:`),
 * then ask that server about the domain.
 */

import { connect } from "node:net";
import { ProbeNetworkError, ProbeTimeoutError, ProbeUnclassifiedError } from "../shared/errors.js";
import type { DomainLookup, LookupResponse } from "./types.js";

export const IANA_WHOIS_SERVER = "whois.iana.org";
export const WHOIS_PORT = 43;

/** Send one query and collect the reply until the server closes. */
export type WhoisQueryFn = (server: string, query: string, signal: AbortSignal) => Promise<string>;

export interface WhoisLookupConfig {
	readonly rootServer?: string;
	readonly port?: number;
	readonly queryFn?: WhoisQueryFn;
}

/** Registry-specific key spellings folded onto the indicator keys. */
const KEY_ALIASES: Readonly<Record<string, string>> = {
	created_on: "created",
	created_date: "created",
	registered_on: "registered",
	registration_time: "registered",
	registry_expiry_date: "expiry_date",
	registrar_registration_expiration_date: "expiry_date",
	expiration_date: "expiry_date",
	expires_on: "expires",
	paid_till: "expires",
	updated_date: "updated",
	last_updated: "updated",
	last_modified: "updated",
	domain_status: "status",
	domain: "domain_name",
	registrar_name: "registrar",
	sponsoring_registrar: "registrar",
};

export class WhoisLookup implements DomainLookup {
	readonly name = "whois";
	private readonly rootServer: string;
	private readonly queryFn: WhoisQueryFn;

	constructor(config: WhoisLookupConfig = {}) {
		const port = config.port ?? WHOIS_PORT;
		this.rootServer = config.rootServer ?? IANA_WHOIS_SERVER;
		this.queryFn =
			config.queryFn ?? ((server, query, signal) => queryWhoisServer(server, query, port, signal));
	}

	async lookup(domain: string, signal: AbortSignal): Promise<LookupResponse> {
		const tld = domain.slice(domain.lastIndexOf(".") + 1);
		const referral = await this.queryFn(this.rootServer, tld, signal);
		const server = findReferral(referral);
		if (server === undefined) {
			throw new ProbeUnclassifiedError(`No WHOIS server known for .${tld}`, { domain, tld });
		}
		const text = await this.queryFn(server, domain, signal);
		return { text, fields: parseWhoisText(text) };
	}
}

/** The `refer:` (or `whois:`) server named in an IANA reply. */
export function findReferral(text: string): string | undefined {
	for (const line of text.split(/\r?\n/)) {
		const match = /^\s*(refer|whois):\s*(\S+)/i.exec(line);
		if (match?.[2] !== undefined) return match[2].toLowerCase();
	}
	return undefined;
}

/**
 * `Key: value` lines into a field map. Keys are lower-cased with `_`
 * separators and folded through the alias table; the first non-empty value of
 * a key wins. Comment lines (`%`, `#`, `>>>`) are skipped.
 */
export function parseWhoisText(text: string): Record<string, string> {
	const fields: Record<string, string> = {};
	for (const rawLine of text.split(/\r?\n/)) {
		const line = rawLine.trim();
		if (line.length === 0 || line.startsWith("%") || line.startsWith("#") || line.startsWith(">>>")) {
			continue;
		}
		const colon = line.indexOf(":");
		if (colon <= 0) continue;
		const value = line.slice(colon + 1).trim();
		if (value.length === 0) continue;
		const key = normalizeKey(line.slice(0, colon));
		if (fields[key] === undefined) fields[key] = value;
	}
	return fields;
}

function normalizeKey(raw: string): string {
	const key = raw
		.trim()
		.toLowerCase()
		.replace(/[^a-z0-9]+/g, "_")
		.replace(/^_+|_+$/g, "");
	return KEY_ALIASES[key] ?? key;
}

export function queryWhoisServer(
	server: string,
	query: string,
	port: number,
	signal: AbortSignal,
): Promise<string> {
	return new Promise((resolve, reject) => {
		if (signal.aborted) {
			reject(new ProbeTimeoutError(`WHOIS query to ${server} aborted`, { server }));
			return;
		}
		const chunks: Buffer[] = [];
		const socket = connect({ host: server, port });

		const onAbort = (): void => {
			socket.destroy();
			reject(new ProbeTimeoutError(`WHOIS query to ${server} aborted`, { server }));
		};
		signal.addEventListener("abort", onAbort, { once: true });

		socket.on("connect", () => {
			socket.write(`${query}\r\n`);
		});
		socket.on("data", (chunk: Buffer) => {
			chunks.push(chunk);
		});
		socket.on("end", () => {
			resolve(Buffer.concat(chunks).toString("utf-8"));
		});
		socket.on("error", (error: Error) => {
			reject(new ProbeNetworkError(`WHOIS query to ${server} failed: ${error.message}`, {
				server,
				cause: error,
			}));
		});
		socket.on("close", () => {
			signal.removeEventListener("abort", onAbort);
		});
	});
}
