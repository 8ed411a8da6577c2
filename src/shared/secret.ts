/**
 * Opaque secret container. The wrapped value never leaks through toString,
 * JSON.stringify, util.inspect or the logger; `reveal()` is the only way out.
 */

import { inspect } from "node:util";
import { SystemError } from "./errors.js";

const REDACTED = "[REDACTED]";
const store = new WeakMap<Secret, string>();

export class Secret {
	readonly __opaque = true as const;

	private constructor() {}

	static seal(value: string): Secret {
		const secret = new Secret();
		store.set(secret, value);
		return secret;
	}

	reveal(): string {
		const value = store.get(this);
		if (value === undefined) {
			throw new SystemError("Secret was not created through Secret.seal");
		}
		return value;
	}

	toString(): string {
		return REDACTED;
	}

	toJSON(): string {
		return REDACTED;
	}

	[inspect.custom](): string {
		return REDACTED;
	}
}
