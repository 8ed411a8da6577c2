/**
 * Message bodies for the alert and report channels (Telegram HTML mode).
 * Domain names are escaped; everything else is fixed text.
 */

import type { DomainRow, DomainStats } from "../domain/stats.js";
import { DomainStatus } from "../domain/types.js";
import { formatTimestamp } from "../shared/time.js";

/** Unavailable rows listed in a status report before "... and N more". */
export const REPORT_UNAVAILABLE_LIMIT = 10;

export function escapeHtml(text: string): string {
	return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

export function statusEmoji(status: DomainStatus): string {
	switch (status) {
		case DomainStatus.Available:
			return "✅";
		case DomainStatus.Unavailable:
			return "⏳";
		default:
			return "❓";
	}
}

export function formatAvailabilityAlert(domain: string, at: number): string {
	return [
		"🚨 <b>DOMAIN AVAILABLE!</b> 🚨",
		"",
		`Domain: <code>${escapeHtml(domain)}</code>`,
		"Status: ✅ Available for registration",
		`Time: ${formatTimestamp(at)} UTC`,
		"",
		"Act fast! Register this domain now!",
	].join("\n");
}

export interface StatusReportInput {
	readonly cycle: number;
	readonly at: number;
	readonly stats: DomainStats;
	/** Every watched domain, in display order. */
	readonly rows: readonly DomainRow[];
	readonly reportEveryCycles: number;
}

export function formatStatusReport(input: StatusReportInput): string {
	const { stats } = input;
	const available = input.rows.filter((r) => r.entry.status === DomainStatus.Available);
	const pending = input.rows.filter((r) => r.entry.status !== DomainStatus.Available);

	const lines = [
		"📊 <b>Domain Monitoring Status Report</b>",
		"",
		`🔄 Cycle: #${input.cycle}`,
		`⏰ Time: ${formatTimestamp(input.at)} UTC`,
		`📋 Total domains: ${stats.total}`,
		`✅ Available: ${stats.available}`,
		`⏳ Unavailable: ${stats.unavailable}`,
		`❓ Unknown: ${stats.unknown}`,
		`🔍 Total checks: ${stats.totalChecks}`,
		"",
	];

	if (available.length > 0) {
		lines.push(`✅ <b>Available domains (${available.length}):</b>`);
		for (const { domain, entry } of available) {
			lines.push(`   • ${escapeHtml(domain)} (since: ${formatTimestamp(entry.firstAvailableAt)})`);
		}
		lines.push("");
	}

	if (pending.length > 0) {
		lines.push(`⏳ <b>Still unavailable (${pending.length}):</b>`);
		for (const { domain, entry } of pending.slice(0, REPORT_UNAVAILABLE_LIMIT)) {
			lines.push(`   • ${escapeHtml(domain)} (checked: ${formatTimestamp(entry.lastCheckedAt, "Never")})`);
		}
		if (pending.length > REPORT_UNAVAILABLE_LIMIT) {
			lines.push(`   ... and ${pending.length - REPORT_UNAVAILABLE_LIMIT} more`);
		}
		lines.push("");
	}

	lines.push(`🤖 Next report in ${input.reportEveryCycles} cycles`);
	return lines.join("\n");
}

/** Telegram rejects messages longer than this. */
export const MAX_MESSAGE_LENGTH = 4096;

/**
 * Split on line boundaries so each part fits `limit`. A single line longer
 * than the limit is cut at the last point outside any tag or entity,
 * preferring one where every element opened so far is closed.
 */
export function chunkMessage(text: string, limit = MAX_MESSAGE_LENGTH): string[] {
	if (text.length <= limit) return [text];
	const chunks: string[] = [];
	let current = "";
	for (const line of text.split("\n")) {
		const candidate = current.length === 0 ? line : `${current}\n${line}`;
		if (candidate.length <= limit) {
			current = candidate;
			continue;
		}
		if (current.length > 0) chunks.push(current);
		let rest = line;
		while (rest.length > limit) {
			const cut = cutPoint(rest, limit);
			chunks.push(rest.slice(0, cut));
			rest = rest.slice(cut);
		}
		current = rest;
	}
	if (current.length > 0) chunks.push(current);
	return chunks;
}

function cutPoint(line: string, limit: number): number {
	let depth = 0;
	let inTag = false;
	let closing = false;
	let inEntity = false;
	let outside = 0;
	let balanced = 0;
	for (let i = 0; i < limit; i++) {
		const ch = line[i];
		if (inTag) {
			if (ch === ">") {
				inTag = false;
				depth = closing ? Math.max(0, depth - 1) : depth + 1;
			} else if (ch === "/" && line[i - 1] === "<") {
				closing = true;
			}
		} else if (inEntity) {
			if (ch === ";") inEntity = false;
		} else if (ch === "<") {
			inTag = true;
			closing = false;
		} else if (ch === "&") {
			inEntity = true;
		}
		// never end a part on the first half of a surrogate pair
		const code = line.charCodeAt(i);
		if (inTag || inEntity || (code >= 0xd800 && code <= 0xdbff)) continue;
		outside = i + 1;
		if (depth === 0) balanced = i + 1;
	}
	if (balanced > 0) return balanced;
	return outside > 0 ? outside : limit;
}
