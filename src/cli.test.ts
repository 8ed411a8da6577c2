import { describe, expect, it } from "vitest";
import { VERSION, runCli } from "./cli.js";
import { silentLogger } from "./lib/logger/index.js";
import type { FetchFn } from "./shared/fetch.js";

function createIo(fetchFn?: FetchFn) {
	const out: string[] = [];
	const err: string[] = [];
	const deps = {
		env: {},
		stdout: (text: string) => out.push(text),
		stderr: (text: string) => err.push(text),
		signal: new AbortController().signal,
		fetchFn,
		logger: silentLogger(),
	};
	return { deps, out, err };
}

const argv = (...args: string[]): string[] => ["node", "domain-watch", ...args];

describe("runCli check", () => {
	it("prints an Available verdict when RDAP has no record", async () => {
		const { deps, out } = createIo(async () => new Response("{}", { status: 404 }));

		const code = await runCli(argv("check", "Free-Example.com"), deps);

		expect(code).toBe(0);
		expect(out).toEqual(["free-example.com: available (primary: registry has no record)\n"]);
	});

	it("prints an Unavailable verdict for a registered domain", async () => {
		const body = {
			ldhName: "TAKEN.COM",
			events: [{ eventAction: "registration", eventDate: "2001-01-01T00:00:00Z" }],
		};
		const { deps, out } = createIo(
			async () => new Response(JSON.stringify(body), { status: 200 }),
		);

		const code = await runCli(argv("check", "taken.com"), deps);

		expect(code).toBe(0);
		expect(out).toEqual([
			'taken.com: unavailable (primary: registration field "created" present)\n',
		]);
	});

	it("rejects a malformed domain before probing", async () => {
		let probed = false;
		const { deps, err } = createIo(async () => {
			probed = true;
			return new Response("{}", { status: 404 });
		});

		const code = await runCli(argv("check", "no-dot"), deps);

		expect(code).toBe(1);
		expect(err).toEqual(["Invalid domain: domain must contain a dot\n"]);
		expect(probed).toBe(false);
	});

	it("rejects a non-numeric timeout", async () => {
		const { deps } = createIo();

		const code = await runCli(argv("check", "example.com", "--timeout", "soon"), deps);

		expect(code).toBe(1);
	});
});

describe("runCli run", () => {
	it("exits 1 with the config error when the token is missing", async () => {
		const { deps, err } = createIo();

		const code = await runCli(argv("run"), deps);

		expect(code).toBe(1);
		expect(err).toEqual(["DOMAIN_WATCH_TELEGRAM_TOKEN is required\n"]);
	});
});

describe("runCli built-ins", () => {
	it("prints the version", async () => {
		const { deps, out } = createIo();

		const code = await runCli(argv("--version"), deps);

		expect(code).toBe(0);
		expect(out).toEqual([`${VERSION}\n`]);
	});

	it("lists the commands in help", async () => {
		const { deps, out } = createIo();

		const code = await runCli(argv("--help"), deps);

		expect(code).toBe(0);
		expect(out.join("")).toContain("check [options] <domain>");
	});
});
