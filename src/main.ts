#!/usr/bin/env node
import { runCli } from "./cli.js";

const controller = new AbortController();
const shutdown = (signal: NodeJS.Signals): void => {
	process.stderr.write(`${signal} received, shutting down\n`);
	controller.abort();
};
process.once("SIGINT", shutdown);
process.once("SIGTERM", shutdown);

runCli(process.argv, {
	env: process.env,
	stdout: (text) => process.stdout.write(text),
	stderr: (text) => process.stderr.write(text),
	signal: controller.signal,
})
	.then((code) => {
		process.exitCode = code;
	})
	.catch((error: unknown) => {
		console.error("Fatal:", error);
		process.exit(1);
	});
