/**
 * Remote store contract.
 *
 * A store keeps archives by container UUID and enforces the server side of
 * the synchronization rules. Implementations: MemoryRemoteStore (in
 * process), HttpRemoteStore (REST). Every call carries the caller's opaque
 * credential token.
 */

import { z } from "zod";
import { TIMESTAMP_PATTERN } from "../container/timestamp.js";

/**
 * What a store records about an accepted container.
 */
export const RemoteStateSchema = z.object({
  uuid: z.string().uuid(),
  /** containerType.name */
  containerType: z.string().min(1),
  created: z.string().regex(TIMESTAMP_PATTERN),
  modified: z.string().regex(TIMESTAMP_PATTERN),
  complete: z.boolean(),
  static: z.boolean(),
  hash: z.string().optional(),
  /** Predecessor this entry supersedes */
  replaces: z.string().uuid().optional(),
  /** Principal that created the entry */
  owner: z.string().min(1),
  /** Successor that supersedes this entry */
  replacedBy: z.string().uuid().optional(),
});

export type RemoteState = z.infer<typeof RemoteStateSchema>;

export type FetchResult =
  | { kind: "archive"; bytes: Uint8Array }
  | { kind: "redirect"; uuid: string };

export interface RemoteStore {
  /**
   * Store a container under a new identifier.
   *
   * @throws StaleWriteError if the identifier exists
   * @throws NotFoundError, NotOwnerError for a bad replaces link
   */
  create(archive: Uint8Array, credential: string): Promise<RemoteState>;

  /**
   * Replace a multi-step container under its identifier.
   *
   * @throws NotFoundError, NotOwnerError, ImmutableRemoteError, StaleWriteError
   */
  replace(uuid: string, archive: Uint8Array, credential: string): Promise<RemoteState>;

  /**
   * Fetch an archive, or the identifier that superseded it.
   *
   * @throws NotFoundError if the identifier is unknown
   */
  get(uuid: string, credential: string): Promise<FetchResult>;

  /**
   * Archive of a current static container with this type name and hash.
   */
  findStatic(name: string, hash: string, credential: string): Promise<Uint8Array | null>;

  /**
   * Recorded state of an identifier, or null if unknown.
   */
  stat(uuid: string, credential: string): Promise<RemoteState | null>;
}
