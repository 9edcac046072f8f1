/**
 * Remote store synchronization.
 */

export {
  RemoteStateSchema,
  type RemoteState,
  type RemoteStore,
  type FetchResult,
} from "./types.js";
export { MemoryRemoteStore, type MemoryRemoteStoreOptions } from "./memory-store.js";
export { HttpRemoteStore, type HttpRemoteStoreOptions } from "./http-store.js";
export {
  SyncEngine,
  createSyncEngine,
  type SyncEngineOptions,
  type CreateSyncEngineOptions,
  type UploadOutcome,
  type UploadResult,
} from "./engine.js";
