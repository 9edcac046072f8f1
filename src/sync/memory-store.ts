/**
 * In-process remote store.
 *
 * Holds archives in memory and applies the same acceptance rules a server
 * does: identifiers are created once, only incomplete non-static entries
 * may be replaced and only with a strictly later `modified`, and only the
 * creator of an entry may replace or supersede it.
 */

import type { CodecRegistry } from "../codecs/registry.js";
import { Container } from "../container/container.js";
import {
  ImmutableRemoteError,
  NotFoundError,
  NotOwnerError,
  RemoteError,
  SchemaViolationError,
  StaleWriteError,
} from "../container/errors.js";
import type { ContentAttributes } from "../container/schema.js";
import { compareTimestamps } from "../container/timestamp.js";
import { silentLogger } from "../logging/index.js";
import type { FetchResult, RemoteState, RemoteStore } from "./types.js";

interface StoredEntry {
  state: RemoteState;
  archive: Uint8Array;
}

export interface MemoryRemoteStoreOptions {
  /** Credential token → principal name */
  tokens: Record<string, string>;
  /** Registry used to decode uploaded archives */
  registry?: CodecRegistry;
}

function stateOf(content: ContentAttributes, owner: string): RemoteState {
  const state: RemoteState = {
    uuid: content.uuid,
    containerType: content.containerType.name,
    created: content.created,
    modified: content.modified,
    complete: content.complete,
    static: content.static,
    owner,
  };
  if (content.hash !== undefined) state.hash = content.hash;
  if (content.replaces !== undefined) state.replaces = content.replaces;
  return state;
}

export class MemoryRemoteStore implements RemoteStore {
  private readonly entries = new Map<string, StoredEntry>();
  private readonly principals: ReadonlyMap<string, string>;
  private readonly registry: CodecRegistry | undefined;

  constructor(options: MemoryRemoteStoreOptions) {
    this.principals = new Map(Object.entries(options.tokens));
    this.registry = options.registry;
  }

  async create(archive: Uint8Array, credential: string): Promise<RemoteState> {
    const owner = this.authenticate(credential);
    const content = this.parse(archive);

    if (this.entries.has(content.uuid)) {
      throw new StaleWriteError(`Container ${content.uuid} already exists`);
    }
    const predecessor =
      content.replaces === undefined ? undefined : this.checkPredecessor(content.replaces, owner);

    const state = stateOf(content, owner);
    this.entries.set(content.uuid, { state, archive: archive.slice() });
    if (predecessor) {
      predecessor.state = { ...predecessor.state, replacedBy: content.uuid };
    }
    return { ...state };
  }

  async replace(uuid: string, archive: Uint8Array, credential: string): Promise<RemoteState> {
    const owner = this.authenticate(credential);
    const entry = this.entries.get(uuid);
    if (!entry) {
      throw new NotFoundError(`Unknown container ${uuid}`);
    }

    const content = this.parse(archive);
    if (content.uuid !== uuid) {
      throw new SchemaViolationError(`Archive is container ${content.uuid}, not ${uuid}`);
    }
    if (entry.state.owner !== owner) {
      throw new NotOwnerError(`Container ${uuid} belongs to another principal`);
    }
    if (entry.state.complete || entry.state.static || entry.state.replacedBy !== undefined) {
      throw new ImmutableRemoteError(uuid);
    }
    if (compareTimestamps(content.modified, entry.state.modified) <= 0) {
      throw new StaleWriteError(
        `Container ${uuid} was modified ${entry.state.modified}; upload is from ${content.modified}`
      );
    }
    if (content.replaces !== entry.state.replaces) {
      throw new SchemaViolationError(`Container ${uuid} cannot change its predecessor`);
    }

    const state = { ...stateOf(content, owner), created: entry.state.created };
    this.entries.set(uuid, { state, archive: archive.slice() });
    return { ...state };
  }

  async get(uuid: string, credential: string): Promise<FetchResult> {
    this.authenticate(credential);
    const entry = this.entries.get(uuid);
    if (!entry) {
      throw new NotFoundError(`Unknown container ${uuid}`);
    }
    if (entry.state.replacedBy !== undefined) {
      return { kind: "redirect", uuid: entry.state.replacedBy };
    }
    return { kind: "archive", bytes: entry.archive.slice() };
  }

  async findStatic(name: string, hash: string, credential: string): Promise<Uint8Array | null> {
    this.authenticate(credential);
    for (const entry of this.entries.values()) {
      const { state } = entry;
      if (
        state.static &&
        state.containerType === name &&
        state.hash === hash &&
        state.replacedBy === undefined
      ) {
        return entry.archive.slice();
      }
    }
    return null;
  }

  async stat(uuid: string, credential: string): Promise<RemoteState | null> {
    this.authenticate(credential);
    const entry = this.entries.get(uuid);
    return entry ? { ...entry.state } : null;
  }

  /**
   * Number of stored entries.
   */
  get size(): number {
    return this.entries.size;
  }

  private authenticate(credential: string): string {
    const principal = this.principals.get(credential);
    if (principal === undefined) {
      throw new RemoteError("Invalid credential", 401);
    }
    return principal;
  }

  private parse(archive: Uint8Array): ContentAttributes {
    return Container.fromBytes(archive, {
      registry: this.registry,
      defaults: {},
      logger: silentLogger,
    }).content;
  }

  private checkPredecessor(uuid: string, owner: string): StoredEntry {
    const predecessor = this.entries.get(uuid);
    if (!predecessor) {
      throw new NotFoundError(`Replaced container ${uuid} does not exist`);
    }
    if (predecessor.state.owner !== owner) {
      throw new NotOwnerError(`Only ${predecessor.state.owner} may replace container ${uuid}`);
    }
    if (predecessor.state.replacedBy !== undefined) {
      throw new StaleWriteError(
        `Container ${uuid} is already replaced by ${predecessor.state.replacedBy}`
      );
    }
    return predecessor;
  }
}
