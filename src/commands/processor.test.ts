import { describe, expect, it } from "vitest";
import { DomainStatus, Verdict } from "../domain/types.js";
import { silentLogger } from "../lib/logger/index.js";
import { FakeClock } from "../shared/time.js";
import { MemoryStateStore } from "../store/memory-state-store.js";
import { CommandProcessor } from "./processor.js";
import { HELP_TEXT } from "./replies.js";

const ALERTS = "-1001";
const REPORTS = "-1002";

function createProcessor() {
	const store = new MemoryStateStore({ clock: new FakeClock(0), logger: silentLogger() });
	const processor = new CommandProcessor({
		store,
		allowedChannelIds: [ALERTS, REPORTS],
		logger: silentLogger(),
	});
	const send = (rawText: string, channelId = ALERTS) => processor.handle({ channelId, rawText });
	return { store, processor, send };
}

describe("CommandProcessor", () => {
	it("drops commands from unauthorized channels without touching the store", async () => {
		const { store, send } = createProcessor();

		expect(await send("/add example.com", "-999")).toBeNull();
		expect(store.snapshot().domains).toEqual({});
	});

	it("ignores non-command text", async () => {
		const { send } = createProcessor();

		expect(await send("just chatting")).toBeNull();
	});

	it("adds a domain", async () => {
		const { store, send } = createProcessor();

		expect(await send("/add Example.com", REPORTS)).toBe(
			"✅ Domain <code>example.com</code> added to monitoring list successfully!",
		);
		expect(store.snapshot().domains["example.com"]?.status).toBe(DomainStatus.Unknown);
	});

	it("rejects an invalid domain", async () => {
		const { store, send } = createProcessor();

		expect(await send("/add localhost")).toBe(
			"❌ Invalid domain format. Please provide a valid domain (e.g., example.com)",
		);
		expect(store.snapshot().domains).toEqual({});
	});

	it("reports a duplicate", async () => {
		const { send } = createProcessor();
		await send("/add example.com");

		expect(await send("/add EXAMPLE.COM")).toBe(
			"⚠️ Domain <code>example.com</code> is already being monitored.",
		);
	});

	it("removes a domain and reports a missing one", async () => {
		const { send } = createProcessor();
		await send("/add example.com");

		expect(await send("/remove example.com")).toBe(
			"✅ Domain <code>example.com</code> removed from monitoring list successfully!",
		);
		expect(await send("/remove example.com")).toBe(
			"⚠️ Domain <code>example.com</code> is not in the monitoring list.",
		);
	});

	it("resets an alerted domain so it is checked again", async () => {
		const { store, send } = createProcessor();
		await store.recordVerdict("example.com", Verdict.Available);
		expect(store.domainsToCheck()).toEqual([]);

		expect(await send("/reset example.com")).toBe(
			"✅ Domain <code>example.com</code> has been reset and will be monitored again.",
		);
		expect(store.domainsToCheck()).toEqual(["example.com"]);
	});

	it("refuses to reset an unknown domain", async () => {
		const { send } = createProcessor();

		expect(await send("/reset nope.com")).toBe(
			"❌ Domain <code>nope.com</code> is not being monitored. Use /add to add it first.",
		);
	});

	it("answers a missing argument with usage", async () => {
		const { send } = createProcessor();

		expect(await send("/add")).toBe("❌ Usage: /add &lt;domain&gt;");
	});

	it("rejects remove and reset of names that are not domains", async () => {
		const { store, send } = createProcessor();
		const invalid = "❌ Invalid domain format. Please provide a valid domain (e.g., example.com)";

		expect(await send("/reset constructor")).toBe(invalid);
		expect(await send("/remove __proto__")).toBe(invalid);
		expect(store.snapshot().domains).toEqual({});
	});

	it("escapes markup in an echoed domain", async () => {
		const { send } = createProcessor();

		expect(await send("/remove <b>.com")).toBe(
			"⚠️ Domain <code>&lt;b&gt;.com</code> is not in the monitoring list.",
		);
	});

	it("lists domains sorted with their status", async () => {
		const { store, send } = createProcessor();
		await send("/add zeta.io");
		await store.recordVerdict("alpha.com", Verdict.Unavailable);
		await store.recordVerdict("mid.net", Verdict.Available);

		expect(await send("/list")).toBe(
			[
				"📋 <b>Monitored Domains (3):</b>",
				"",
				"⏳ <code>alpha.com</code> (unavailable)",
				"✅ <code>mid.net</code> (available)",
				"❓ <code>zeta.io</code> (unknown)",
			].join("\n"),
		);
	});

	it("lists nothing for an empty store", async () => {
		const { send } = createProcessor();

		expect(await send("/list")).toBe("📋 No domains are currently being monitored.");
	});

	it("summarizes status", async () => {
		const { store, send } = createProcessor();
		await send("/add a.com");
		await store.recordVerdict("b.com", Verdict.Available);
		await store.beginCycle();

		expect(await send("/status")).toBe(
			[
				"📊 <b>Domain Monitoring Status</b>",
				"",
				"📋 Total domains: 2",
				"✅ Available: 1",
				"⏳ Monitoring: 0",
				"❓ Unknown: 1",
				"🔍 Total checks: 1",
				"",
				"Use /list to see detailed domain status.",
			].join("\n"),
		);
	});

	it("answers help and unknown verbs", async () => {
		const { send } = createProcessor();

		expect(await send("/help")).toBe(HELP_TEXT);
		expect(await send("/logs")).toBe("❓ Unknown command. Use /help to see available commands.");
	});

	it("flags a change that could not be saved", async () => {
		const { store, send } = createProcessor();
		store.setWriteFailure(true);

		expect(await send("/add example.com")).toBe(
			[
				"✅ Domain <code>example.com</code> added to monitoring list successfully!",
				"⚠️ The change is active but could not be saved; it may not survive a restart.",
			].join("\n"),
		);
	});
});
