export {
	type StateStore,
	type StateStoreDeps,
	type MutationReceipt,
	type VerdictReceipt,
	type CommandMutation,
	BaseStateStore,
} from "./state-store.js";

export { FileStateStore, type FileStateStoreConfig, type LoadSource } from "./file-state-store.js";
export { MemoryStateStore } from "./memory-state-store.js";
export {
	type PersistedState,
	type PersistedEntry,
	persistedStateSchema,
	encodeState,
	decodeState,
	serializeState,
} from "./schema.js";
