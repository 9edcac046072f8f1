/**
 * Client side of container synchronization.
 *
 * Uploading decides between creating, replacing and deduplicating:
 *
 *   static    → look up an identical static container (same type name and
 *               hash); adopt it if found, else create
 *   unknown   → create
 *   known     → replace, unless the remote entry is complete or static
 *               (ImmutableRemote) or not older than the local copy
 *               (StaleWrite)
 *
 * Downloads follow successor redirects until an archive is reached.
 */

import type { CodecRegistry } from "../codecs/registry.js";
import { config, ConfigError, getIdentityDefaults, type IdentityDefaults } from "../config/index.js";
import { Container } from "../container/container.js";
import { ImmutableRemoteError, RemoteError, StaleWriteError } from "../container/errors.js";
import { compareTimestamps } from "../container/timestamp.js";
import { getDefaultLogger, type Logger } from "../logging/index.js";
import { HttpRemoteStore } from "./http-store.js";
import type { RemoteStore } from "./types.js";
import type { Dispatcher } from "undici";

export type UploadOutcome = "created" | "replaced" | "deduplicated";

export interface UploadResult {
  outcome: UploadOutcome;
  /** Identifier the remote store holds the data under */
  uuid: string;
  created: string;
  modified: string;
}

export interface SyncEngineOptions {
  store: RemoteStore;
  /** Opaque credential token */
  credential: string;
  /** Registry for decoding downloaded archives */
  registry?: CodecRegistry;
  /** Author and email defaults for downloaded containers */
  defaults?: IdentityDefaults;
  logger?: Logger;
}

export class SyncEngine {
  private readonly store: RemoteStore;
  private readonly credential: string;
  private readonly registry: CodecRegistry | undefined;
  private readonly defaults: IdentityDefaults | undefined;
  private readonly logger: Logger;

  constructor(options: SyncEngineOptions) {
    this.store = options.store;
    this.credential = options.credential;
    this.registry = options.registry;
    this.defaults = options.defaults;
    this.logger = (options.logger ?? getDefaultLogger()).child({ component: "sync" });
  }

  /**
   * Upload a container. The container becomes immutable whatever the
   * outcome; on success its timestamps are those the store accepted.
   *
   * @throws ImmutableRemoteError if the remote copy is complete or static
   * @throws StaleWriteError if the remote copy is not older than this one
   * @throws NotOwnerError if another principal owns the identifier
   */
  async upload(container: Container): Promise<UploadResult> {
    container.markUploaded();
    const content = container.content;

    if (content.static) {
      container.verifyHash();
      const hash = content.hash ?? container.hash();
      const existing = await this.store.findStatic(content.containerType.name, hash, this.credential);
      if (existing !== null) {
        const remote = this.load(existing);
        container.adopt(remote);
        this.logger.info("Static container deduplicated", {
          local: content.uuid,
          remote: remote.uuid,
          hash,
        });
        return this.result("deduplicated", container);
      }
    }

    const remote = await this.store.stat(content.uuid, this.credential);
    const archive = container.toBytes();

    if (remote === null) {
      const state = await this.store.create(archive, this.credential);
      container.applyAcceptedTimestamps(state);
      this.logger.info("Container created", { uuid: state.uuid, bytes: archive.length });
      return this.result("created", container);
    }

    if (remote.complete || remote.static) {
      throw new ImmutableRemoteError(content.uuid);
    }
    if (compareTimestamps(content.modified, remote.modified) <= 0) {
      throw new StaleWriteError(
        `Container ${content.uuid} was modified ${remote.modified} remotely; local copy is from ${content.modified}`
      );
    }

    const state = await this.store.replace(content.uuid, archive, this.credential);
    container.applyAcceptedTimestamps(state);
    this.logger.info("Container replaced", { uuid: state.uuid, bytes: archive.length });
    return this.result("replaced", container);
  }

  /**
   * Download a container, following successors to the current one.
   *
   * @throws NotFoundError if an identifier in the chain is unknown
   * @throws RemoteError if the chain loops
   */
  async download(uuid: string): Promise<Container> {
    const visited = new Set<string>();
    let current = uuid;

    for (;;) {
      if (visited.has(current)) {
        throw new RemoteError(`Successor chain of ${uuid} loops at ${current}`);
      }
      visited.add(current);

      const fetched = await this.store.get(current, this.credential);
      if (fetched.kind === "archive") {
        const container = this.load(fetched.bytes);
        this.logger.debug("Container downloaded", {
          requested: uuid,
          uuid: container.uuid,
          hops: visited.size - 1,
        });
        return container;
      }
      this.logger.debug("Following successor", { from: current, to: fetched.uuid });
      current = fetched.uuid;
    }
  }

  private load(bytes: Uint8Array): Container {
    return Container.fromBytes(bytes, {
      registry: this.registry,
      defaults: this.defaults,
      logger: this.logger,
    });
  }

  private result(outcome: UploadOutcome, container: Container): UploadResult {
    const { uuid, created, modified } = container.content;
    return { outcome, uuid, created, modified };
  }
}

export interface CreateSyncEngineOptions {
  /** Server URL (default: identity defaults `server`) */
  server?: string;
  /** Credential token (default: identity defaults `key`) */
  key?: string;
  /** Per-request timeout (default: SCIDATA_TIMEOUT_MS) */
  timeoutMs?: number;
  dispatcher?: Dispatcher;
  registry?: CodecRegistry;
  defaults?: IdentityDefaults;
  logger?: Logger;
}

/**
 * Sync engine against a REST server, configured from the identity
 * defaults where options are absent.
 *
 * @throws ConfigError if no server URL or credential is available
 */
export function createSyncEngine(options: CreateSyncEngineOptions = {}): SyncEngine {
  const defaults = options.defaults ?? getIdentityDefaults();
  const server = options.server ?? defaults.server;
  const key = options.key ?? defaults.key;

  if (!server) {
    throw new ConfigError("No server configured: pass `server` or set SCIDATA_SERVER");
  }
  if (!key) {
    throw new ConfigError("No credential configured: pass `key` or set SCIDATA_KEY");
  }

  return new SyncEngine({
    store: new HttpRemoteStore({
      server,
      timeoutMs: options.timeoutMs ?? config.requestTimeoutMs,
      dispatcher: options.dispatcher,
    }),
    credential: key,
    registry: options.registry,
    defaults,
    logger: options.logger,
  });
}
