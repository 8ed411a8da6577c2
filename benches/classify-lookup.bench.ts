import { bench, describe } from "vitest";
import { classifyLookupResponse } from "../src/probe/classifier.js";
import { parseWhoisText } from "../src/probe/whois-lookup.js";

const registered = [
	"Domain Name: EXAMPLE-TAKEN.COM",
	"Registry Domain ID: 1234_DOMAIN_COM-VRSN",
	"Registrar: Placeholder Registrar, Inc.",
	"Creation Date: 2001-01-01T00:00:00Z",
	"Registry Expiry Date: 2031-01-01T00:00:00Z",
	"Domain Status: clientTransferProhibited",
	">>> Last update of whois database: 2024-01-01T00:00:00Z <<<",
].join("\n");

const free = 'No match for "EXAMPLE-FREE.COM".\n>>> Last update of whois database <<<';

describe("lookup classification", () => {
	bench("parse and classify a registered reply", () => {
		classifyLookupResponse({ text: registered, fields: parseWhoisText(registered) });
	});

	bench("parse and classify a no-match reply", () => {
		classifyLookupResponse({ text: free, fields: parseWhoisText(free) });
	});
});
