export {
	type LookupResponse,
	type DomainLookup,
	type ProbeTimeouts,
	type ProbeReport,
	type DomainAvailabilityProbe,
	ProbeStage,
} from "./types.js";

export {
	type TextRule,
	PRIMARY_NOT_FOUND_RULES,
	REGISTRATION_INDICATOR_KEYS,
	AVAILABLE_TEXT_RULES,
	DEFAULT_VERDICT,
} from "./rules.js";

export {
	type Classification,
	matchRule,
	classifyPrimaryError,
	classifyLookupResponse,
	findRegistrationIndicator,
} from "./classifier.js";

export { RdapLookup, type RdapLookupConfig, DEFAULT_RDAP_BASE_URL, rdapFields } from "./rdap-lookup.js";
export {
	WhoisLookup,
	type WhoisLookupConfig,
	type WhoisQueryFn,
	IANA_WHOIS_SERVER,
	WHOIS_PORT,
	findReferral,
	parseWhoisText,
	queryWhoisServer,
} from "./whois-lookup.js";
export {
	AvailabilityProber,
	type AvailabilityProberDeps,
	type ProberOptions,
	createAvailabilityProber,
} from "./availability-prober.js";
