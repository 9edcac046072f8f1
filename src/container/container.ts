/**
 * The scientific data container.
 *
 * A container is a set of items addressed by qualified name, plus two
 * reserved root items holding its attributes: content.json (identity,
 * type, lifecycle flags) and meta.json (authorship and description).
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * LIFECYCLE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Built from items, a container is mutable: items and attributes may be
 * changed, and every accepted change advances `modified`. Serializing,
 * hashing, freezing or uploading makes it immutable for good; release()
 * is the only way back, and it forks a new identity from the current
 * content. Containers read from an archive or a store start immutable.
 *
 * ```typescript
 * const dc = Container.create({
 *   "content.json": { containerType: { name: "dice-roll" } },
 *   "meta.json": { title: "Three dice", author: "A. Author", email: "a@example.org" },
 *   "sim/dice.json": [2, 5, 1],
 * });
 * dc.set("log/run.txt", "seed=7\n");
 * dc.freeze();
 * dc.write("dice.zdc");
 * ```
 */

import type { CodecRegistry } from "../codecs/registry.js";
import { defaultRegistry } from "../codecs/registry.js";
import { getIdentityDefaults, type IdentityDefaults } from "../config/identity.js";
import { getDefaultLogger, type Logger } from "../logging/index.js";
import { packArchive, readArchiveFile, unpackArchive, writeFileAtomic } from "./archive.js";
import { validateAndDefault, type Attributes } from "./attributes.js";
import {
  AlreadyStaticError,
  CorruptArchiveError,
  SchemaViolationError,
  describeError,
} from "./errors.js";
import { computeContentHash, type EncodedItem } from "./hashing.js";
import { copyValue, deepFreeze, ItemStore } from "./items.js";
import { Lifecycle, type LifecycleState } from "./lifecycle.js";
import { CONTENT_ITEM, META_ITEM, isReservedItem, parseItemName, sortItemNames } from "./names.js";
import {
  isModelVersionCompatible,
  MODEL_VERSION,
  type ContentAttributes,
  type MetaAttributes,
} from "./schema.js";
import { advanceTimestamp, formatTimestamp, systemClock, type Clock } from "./timestamp.js";

export interface ContainerOptions {
  /** Codec registry (default: the process-wide registry) */
  registry?: CodecRegistry;
  /** Author and email defaults (default: getIdentityDefaults()) */
  defaults?: IdentityDefaults;
  /** Time source for created/modified */
  clock?: Clock;
  logger?: Logger;
}

/** Items payload: qualified name → value, reserved records included */
export type ItemsInput = Record<string, unknown>;

/**
 * Bookkeeping a remote store assigns on accepting an upload.
 */
export interface AcceptedTimestamps {
  created: string;
  modified: string;
}

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8", { fatal: true });

function encodeRecord(record: ContentAttributes | MetaAttributes): Uint8Array {
  return encoder.encode(JSON.stringify(record, null, 2));
}

function decodeRecord(name: string, bytes: Uint8Array | undefined): unknown {
  if (bytes === undefined) {
    throw new CorruptArchiveError(`Archive has no ${name}`);
  }
  try {
    return JSON.parse(decoder.decode(bytes));
  } catch (err) {
    throw new CorruptArchiveError(`Failed to decode ${name}: ${describeError(err)}`);
  }
}

export class Container {
  private _content: ContentAttributes;
  private _meta: MetaAttributes;
  private readonly items: ItemStore;
  private readonly lifecycle: Lifecycle;
  private readonly registry: CodecRegistry;
  private readonly defaults: IdentityDefaults;
  private readonly clock: Clock;
  private readonly logger: Logger;

  private constructor(
    attributes: Attributes,
    initial: LifecycleState,
    options: ContainerOptions
  ) {
    this._content = attributes.content;
    this._meta = attributes.meta;
    this.registry = options.registry ?? defaultRegistry;
    this.defaults = options.defaults ?? getIdentityDefaults();
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? getDefaultLogger();
    this.lifecycle = new Lifecycle(initial, { onLock: () => this.lockValues() });
    this.items = new ItemStore(this.lifecycle);
  }

  // ============================================================
  // Construction
  // ============================================================

  /**
   * Build a mutable container from an items payload.
   *
   * A payload whose content.json is already static (carrying its hash) is
   * verified against the items and the container starts immutable.
   *
   * @throws SchemaViolationError if the attributes are invalid
   * @throws InvalidNameError if an item name is malformed
   */
  static create(payload: ItemsInput, options: ContainerOptions = {}): Container {
    const { [CONTENT_ITEM]: content = {}, [META_ITEM]: meta = {}, ...rest } = payload;
    const clock = options.clock ?? systemClock;
    const attributes = validateAndDefault(copyValue(content, CONTENT_ITEM), copyValue(meta, META_ITEM), {
      now: formatTimestamp(clock()),
      defaults: options.defaults ?? getIdentityDefaults(),
    });

    const container = new Container(attributes, "mutable", options);
    for (const [name, value] of Object.entries(rest)) {
      container.items.set(name, value);
    }

    if (container._content.static) {
      container.verifyHash();
      container.lifecycle.fire("freeze");
    }
    return container;
  }

  /**
   * Load an immutable container from archive bytes.
   *
   * @throws CorruptArchiveError if the package or an item cannot be decoded,
   *   a reserved record is missing, or a static hash does not match
   * @throws SchemaViolationError if the attributes are invalid
   */
  static fromBytes(data: Uint8Array, options: ContainerOptions = {}): Container {
    const entries = unpackArchive(data);
    const content = decodeRecord(CONTENT_ITEM, entries.get(CONTENT_ITEM));
    const meta = decodeRecord(META_ITEM, entries.get(META_ITEM));

    if (content !== null && typeof content === "object" && "modelVersion" in content) {
      const version = content.modelVersion;
      if (typeof version === "string" && !isModelVersionCompatible(version)) {
        throw new SchemaViolationError(
          `Incompatible model version: ${version} (current: ${MODEL_VERSION})`
        );
      }
    }

    const clock = options.clock ?? systemClock;
    const attributes = validateAndDefault(content, meta, {
      now: formatTimestamp(clock()),
      defaults: options.defaults ?? getIdentityDefaults(),
    });

    const container = new Container(attributes, "immutable", options);
    for (const [name, bytes] of entries) {
      if (isReservedItem(name)) {
        continue;
      }
      try {
        container.items.load(name, container.registry.decode(parseItemName(name).extension, bytes));
      } catch (err) {
        throw new CorruptArchiveError(`Failed to load item ${name}: ${describeError(err)}`);
      }
    }

    if (container._content.static) {
      try {
        container.verifyHash();
      } catch (err) {
        throw err instanceof SchemaViolationError
          ? new CorruptArchiveError(err.message)
          : err;
      }
    }

    container.lockValues();
    container.logger.debug("Container loaded", {
      uuid: container.uuid,
      items: container.items.names().length,
    });
    return container;
  }

  /**
   * Read an immutable container from an archive file.
   */
  static read(filePath: string, options: ContainerOptions = {}): Container {
    return Container.fromBytes(readArchiveFile(filePath), options);
  }

  // ============================================================
  // Attributes
  // ============================================================

  get uuid(): string {
    return this._content.uuid;
  }

  /** Copy of the content.json record */
  get content(): ContentAttributes {
    return structuredClone(this._content);
  }

  /** Copy of the meta.json record */
  get meta(): MetaAttributes {
    return structuredClone(this._meta);
  }

  get state(): LifecycleState {
    return this.lifecycle.state;
  }

  get isMutable(): boolean {
    return this.lifecycle.isMutable;
  }

  get isStatic(): boolean {
    return this._content.static;
  }

  get isComplete(): boolean {
    return this._content.complete;
  }

  /**
   * Merge fields into content.json. static and hash are set by freeze().
   *
   * @throws ImmutableContainerError outside the mutable state
   * @throws SchemaViolationError if the result is invalid
   */
  updateContent(patch: Record<string, unknown>): void {
    this.lifecycle.assertMutable("update content.json");
    this.replaceContent({ ...this._content, ...patch });
  }

  /**
   * Merge fields into meta.json.
   */
  updateMeta(patch: Record<string, unknown>): void {
    this.lifecycle.assertMutable("update meta.json");
    this.replaceMeta({ ...this._meta, ...patch });
  }

  // ============================================================
  // Items
  // ============================================================

  has(name: string): boolean {
    return isReservedItem(name) || this.items.has(name);
  }

  /**
   * Value of an item; the reserved names return copies of the records.
   *
   * @throws NotFoundError if no item has this name
   */
  get(name: string): unknown {
    if (name === CONTENT_ITEM) return this.content;
    if (name === META_ITEM) return this.meta;
    return this.items.get(name);
  }

  /**
   * Store an item. Setting a reserved name replaces that record.
   *
   * The extension picks the codec. Under an extension with no codec the
   * value is encoded by the default for its kind, but it reads back from
   * an archive as raw bytes: `"notes/a.md": "hi"` loads as a Uint8Array.
   *
   * @throws ImmutableContainerError outside the mutable state
   * @throws InvalidNameError if the name is malformed
   */
  set(name: string, value: unknown): void {
    this.lifecycle.assertMutable(`set ${name}`);
    if (name === CONTENT_ITEM) {
      this.replaceContent(value);
      return;
    }
    if (name === META_ITEM) {
      this.replaceMeta(value);
      return;
    }
    this.items.set(name, value);
    this.touch();
  }

  /**
   * Remove an item. The reserved records cannot be removed.
   */
  delete(name: string): void {
    this.items.delete(name);
    this.touch();
  }

  /**
   * All qualified names, reserved records included, in canonical order.
   */
  names(): string[] {
    return sortItemNames([CONTENT_ITEM, META_ITEM, ...this.items.names()]);
  }

  // ============================================================
  // Hashing and lifecycle
  // ============================================================

  /**
   * Compute the content hash. The container becomes immutable.
   */
  hash(): string {
    const digest = this.computeHash();
    this.lifecycle.fire("hash");
    return digest;
  }

  /**
   * Mark the container static under its content hash. A container that is
   * already immutable (hashed or serialized) but not static may be frozen.
   *
   * @throws AlreadyStaticError if the container is already static
   */
  freeze(): this {
    if (this._content.static) {
      throw new AlreadyStaticError(this.uuid);
    }

    const hash = this.computeHash();
    this._content = {
      ...this._content,
      static: true,
      hash,
      modified: advanceTimestamp(this._content.modified, this.clock),
    };
    this.lifecycle.fire("freeze");
    deepFreeze(this._content);
    this.logger.debug("Container frozen", { uuid: this.uuid, hash });
    return this;
  }

  /**
   * Fork a new mutable lineage from the current content: fresh identifier,
   * no predecessor, new timestamps, no hash. Item values are copied so
   * nothing is shared with what callers obtained before.
   */
  release(): this {
    const previous = this.uuid;
    const { uuid, replaces, created, modified, hash, modelVersion, ...kept } = this._content;
    const attributes = validateAndDefault(
      { ...structuredClone(kept), static: false },
      structuredClone(this._meta),
      { now: formatTimestamp(this.clock()), defaults: this.defaults }
    );

    this.items.detach();
    this._content = attributes.content;
    this._meta = attributes.meta;
    this.lifecycle.fire("release");
    this.logger.debug("Container released", { previous, uuid: this.uuid });
    return this;
  }

  /**
   * Check the stored hash of a static container against its items.
   *
   * @throws SchemaViolationError on mismatch
   */
  verifyHash(): string {
    const digest = this.computeHash();
    if (this._content.hash !== digest) {
      throw new SchemaViolationError(
        `Hash mismatch for ${this.uuid}: stored ${this._content.hash ?? "none"}, computed ${digest}`
      );
    }
    return digest;
  }

  // ============================================================
  // Serialization
  // ============================================================

  /**
   * Encode as archive bytes. The container becomes immutable.
   */
  toBytes(): Uint8Array {
    this.lifecycle.fire("serialize");
    return packArchive(this.encodeItems().map((item) => [item.name, item.bytes]));
  }

  /**
   * Write the archive to a file, replacing it atomically.
   */
  write(filePath: string): void {
    const bytes = this.toBytes();
    writeFileAtomic(filePath, bytes);
    this.logger.debug("Container written", { uuid: this.uuid, path: filePath, bytes: bytes.length });
  }

  // ============================================================
  // Synchronization hooks
  // ============================================================

  /**
   * Mark the container as handed to a remote store.
   */
  markUploaded(): void {
    this.lifecycle.fire("upload");
  }

  /**
   * Take over the complete state of another container (the remote copy
   * of an identical static dataset).
   */
  adopt(other: Container): void {
    this._content = other.content;
    this._meta = other.meta;
    this.items.clear();
    for (const [name, value] of other.items.entries()) {
      this.items.load(name, copyValue(value, name));
    }
    this.lifecycle.fire("upload");
    this.lockValues();
  }

  /**
   * Record the timestamps a remote store accepted.
   */
  applyAcceptedTimestamps(accepted: AcceptedTimestamps): void {
    this._content = deepFreeze({
      ...this._content,
      created: accepted.created,
      modified: accepted.modified,
    });
  }

  // ============================================================
  // Internals
  // ============================================================

  /**
   * Replace content.json. Identity and timestamps carry over unless the
   * new record sets them.
   */
  private replaceContent(value: unknown): void {
    if (value === null || typeof value !== "object" || Array.isArray(value)) {
      throw new SchemaViolationError("content.json must be an object");
    }
    const current = this._content;
    const changesStatic = "static" in value && value.static !== current.static;
    const changesHash = "hash" in value && value.hash !== current.hash;
    if (changesStatic || changesHash) {
      throw new SchemaViolationError("static and hash are set by freeze()");
    }

    const merged = {
      uuid: current.uuid,
      created: current.created,
      modified: current.modified,
      ...copyValue(value, CONTENT_ITEM),
    };
    const attributes = validateAndDefault(merged, this._meta, {
      now: formatTimestamp(this.clock()),
      defaults: this.defaults,
    });
    this._content = attributes.content;
    this.touch();
  }

  private replaceMeta(value: unknown): void {
    const attributes = validateAndDefault(this._content, copyValue(value, META_ITEM), {
      now: formatTimestamp(this.clock()),
      defaults: this.defaults,
    });
    this._meta = attributes.meta;
    this.touch();
  }

  private touch(): void {
    this._content = {
      ...this._content,
      modified: advanceTimestamp(this._content.modified, this.clock),
    };
  }

  private encodeItems(): EncodedItem[] {
    const encoded: EncodedItem[] = [
      { name: CONTENT_ITEM, bytes: encodeRecord(this._content) },
      { name: META_ITEM, bytes: encodeRecord(this._meta) },
    ];
    for (const [name, value] of this.items.entries()) {
      encoded.push({
        name,
        bytes: this.registry.encode(parseItemName(name).extension, value),
      });
    }
    return encoded;
  }

  private computeHash(): string {
    return computeContentHash(this._content, this.encodeItems(), this.registry);
  }

  private lockValues(): void {
    deepFreeze(this._content);
    deepFreeze(this._meta);
    this.items.lock();
  }
}
