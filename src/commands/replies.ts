/** Operator-facing reply texts (Telegram HTML). */

import type { DomainRow, DomainStats } from "../domain/stats.js";
import { escapeHtml, statusEmoji } from "../notify/format.js";
import type { DomainVerb } from "./parser.js";

const code = (domain: string): string => `<code>${escapeHtml(domain)}</code>`;

export const Replies = {
	added: (domain: string) => `✅ Domain ${code(domain)} added to monitoring list successfully!`,
	duplicate: (domain: string) => `⚠️ Domain ${code(domain)} is already being monitored.`,
	invalidDomain: () =>
		"❌ Invalid domain format. Please provide a valid domain (e.g., example.com)",
	removed: (domain: string) => `✅ Domain ${code(domain)} removed from monitoring list successfully!`,
	notInList: (domain: string) => `⚠️ Domain ${code(domain)} is not in the monitoring list.`,
	reset: (domain: string) => `✅ Domain ${code(domain)} has been reset and will be monitored again.`,
	resetUnknown: (domain: string) =>
		`❌ Domain ${code(domain)} is not being monitored. Use /add to add it first.`,
	usage: (verb: DomainVerb) => `❌ Usage: /${verb} &lt;domain&gt;`,
	unknown: () => "❓ Unknown command. Use /help to see available commands.",
	notSaved: () => "⚠️ The change is active but could not be saved; it may not survive a restart.",
} as const;

export function formatDomainList(rows: readonly DomainRow[]): string {
	if (rows.length === 0) return "📋 No domains are currently being monitored.";
	const lines = [`📋 <b>Monitored Domains (${rows.length}):</b>`, ""];
	for (const { domain, entry } of rows) {
		lines.push(`${statusEmoji(entry.status)} ${code(domain)} (${entry.status})`);
	}
	return lines.join("\n");
}

export function formatStatusSummary(stats: DomainStats): string {
	return [
		"📊 <b>Domain Monitoring Status</b>",
		"",
		`📋 Total domains: ${stats.total}`,
		`✅ Available: ${stats.available}`,
		`⏳ Monitoring: ${stats.unavailable}`,
		`❓ Unknown: ${stats.unknown}`,
		`🔍 Total checks: ${stats.totalChecks}`,
		"",
		"Use /list to see detailed domain status.",
	].join("\n");
}

export const HELP_TEXT = [
	"🤖 <b>Domain Watch Bot Commands</b>",
	"",
	"<b>Domain Management:</b>",
	"/add &lt;domain&gt; - Add domain to monitoring",
	"/remove &lt;domain&gt; - Remove domain from monitoring",
	"/reset &lt;domain&gt; - Reset available domain to monitoring",
	"",
	"<b>Information:</b>",
	"/list - Show all monitored domains",
	"/status - Show monitoring statistics",
	"/help - Show this help message",
	"",
	"<b>Examples:</b>",
	"<code>/add example.com</code>",
	"<code>/remove example.com</code>",
	"<code>/reset example.com</code>",
	"",
	"<b>Note:</b> Available in every authorized chat.",
].join("\n");
