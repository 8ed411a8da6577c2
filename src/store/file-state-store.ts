/**
 * FileStateStore — TrackerState persisted as one JSON document.
 *
 * Saves go to a temp file beside the target and are renamed over it, so a
 * crash mid-write leaves the previous state intact.
 */

import { copyFile, mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { validateDomain } from "../domain/domain-name.js";
import {
	type DomainEntry,
	type TrackerState,
	createDomainEntry,
	emptyTrackerState,
} from "../domain/types.js";
import { StoreIOError, isErrnoException, toError } from "../shared/errors.js";
import { type Result, err } from "../shared/result.js";
import { decodeState, serializeState } from "./schema.js";
import { BaseStateStore, type StateStoreDeps } from "./state-store.js";

export interface FileStateStoreConfig {
	readonly filePath: string;
	/** Seeded only when the file does not exist yet. */
	readonly defaultDomains?: readonly string[];
}

/** How `open()` came by its initial state. */
export type LoadSource = "file" | "seeded" | "recovered";

export class FileStateStore extends BaseStateStore {
	readonly filePath: string;
	readonly loadSource: LoadSource;

	private constructor(
		filePath: string,
		initial: TrackerState,
		loadSource: LoadSource,
		deps: StateStoreDeps,
	) {
		super(initial, deps);
		this.filePath = filePath;
		this.loadSource = loadSource;
	}

	/**
	 * Load the state file, or start fresh.
	 *
	 * - missing file: seeded with `defaultDomains` and written immediately
	 * - unreadable or invalid file: copied to `<file>.corrupt`, empty state
	 */
	static async open(config: FileStateStoreConfig, deps: StateStoreDeps): Promise<FileStateStore> {
		const log = deps.logger;
		const { filePath } = config;

		let content: string;
		try {
			content = await readFile(filePath, "utf-8");
		} catch (error: unknown) {
			if (isErrnoException(error) && error.code === "ENOENT") {
				const seeded = seedState(config.defaultDomains ?? [], deps);
				const store = new FileStateStore(filePath, seeded, "seeded", deps);
				await store.persistInitial();
				log.info(
					{ filePath, domains: Object.keys(seeded.domains).length },
					"state file not found; created a new one",
				);
				return store;
			}
			const ioError = new StoreIOError(`Failed to read state file ${filePath}`, {
				cause: toError(error),
				filePath,
			});
			log.error({ err: ioError }, "state file unreadable; starting with an empty state");
			return new FileStateStore(filePath, emptyTrackerState(), "recovered", deps);
		}

		const decoded = parseState(content);
		if (!decoded.ok) {
			log.error(
				{ err: decoded.error, filePath },
				"state file is corrupt; starting with an empty state",
			);
			await quarantine(filePath, deps);
			return new FileStateStore(filePath, emptyTrackerState(), "recovered", deps);
		}

		log.info(
			{ filePath, domains: Object.keys(decoded.value.domains).length },
			"state loaded",
		);
		return new FileStateStore(filePath, decoded.value, "file", deps);
	}

	protected async write(state: TrackerState): Promise<void> {
		const tmp = `${this.filePath}.${process.pid}.tmp`;
		await mkdir(dirname(this.filePath), { recursive: true });
		await writeFile(tmp, serializeState(state), "utf-8");
		await rename(tmp, this.filePath);
	}

	private persistInitial(): Promise<void> {
		return this.exclusive(async () => {
			try {
				await this.write(this.state);
			} catch (error: unknown) {
				const ioError = new StoreIOError(`Failed to create state file ${this.filePath}`, {
					cause: toError(error),
				});
				this.logger.error({ err: ioError }, "initial state save failed");
			}
		});
	}
}

function parseState(content: string): Result<TrackerState, StoreIOError> {
	let raw: unknown;
	try {
		raw = JSON.parse(content);
	} catch (error: unknown) {
		return err(new StoreIOError("State file is not valid JSON", { cause: toError(error) }));
	}
	const decoded = decodeState(raw);
	if (!decoded.ok) {
		return err(
			new StoreIOError(`State file failed validation: ${decoded.error.describe()}`, {
				cause: decoded.error,
			}),
		);
	}
	return decoded;
}

async function quarantine(filePath: string, deps: StateStoreDeps): Promise<void> {
	const target = `${filePath}.corrupt`;
	try {
		await copyFile(filePath, target);
		deps.logger.warn({ filePath, target }, "corrupt state file copied aside");
	} catch (error: unknown) {
		deps.logger.warn({ err: toError(error), filePath }, "could not copy corrupt state file aside");
	}
}

function seedState(defaults: readonly string[], deps: StateStoreDeps): TrackerState {
	const domains: Record<string, DomainEntry> = {};
	for (const raw of defaults) {
		const valid = validateDomain(raw);
		if (valid.ok) {
			domains[valid.value] = createDomainEntry();
		} else {
			deps.logger.warn({ domain: raw }, `skipping default domain: ${valid.error.message}`);
		}
	}
	return { domains, totalChecks: 0, lastUpdatedAt: deps.clock.now() };
}
